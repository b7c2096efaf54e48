import PQueue from 'p-queue';

/**
 * Serializes work per invoice within this process.
 *
 * Row locks (SELECT ... FOR UPDATE) cover concurrent writers across
 * processes; this queue keeps requests in one process from piling up
 * on the same row lock and gives the in-memory store the same ordering.
 */
export class InvoiceLocks {
  private readonly queues = new Map<string, PQueue>();

  async run<T>(invoiceId: string, task: () => Promise<T>): Promise<T> {
    let queue = this.queues.get(invoiceId);
    if (!queue) {
      queue = new PQueue({ concurrency: 1 });
      this.queues.set(invoiceId, queue);
    }
    const owned = queue;

    try {
      return await owned.add(task);
    } finally {
      if (owned.size === 0 && owned.pending === 0 && this.queues.get(invoiceId) === owned) {
        this.queues.delete(invoiceId);
      }
    }
  }

  /** Number of invoices with queued or running work. */
  get activeCount(): number {
    return this.queues.size;
  }
}
