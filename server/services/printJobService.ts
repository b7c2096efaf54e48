/**
 * Print Job Service
 *
 * Opens production for an invoice (at most one job per invoice) and moves
 * the job through its production states.
 */

import type { Actor } from '../../shared/permissions';
import type {
  CreatePrintJobInput,
  Invoice,
  PrintJob,
  PrintJobSpecification,
  ProductionStatus,
} from '../../shared/schema';
import { parseDecimal } from '../../shared/money';
import {
  evaluatePrintJobEligibility,
  type EligibilityResult,
  type EligibilityWarning,
} from '../../shared/production/printJobEligibility';
import {
  buildJobNumber,
  calculatePriority,
  determineJobType,
  estimateCompletion,
  jobNumberPrefix,
} from '../../shared/production/printJobPlanning';
import {
  buildProductionPatch,
  getAllowedNextProductionStatuses,
  validateProductionTransition,
} from '../../shared/production/productionTransition';
import { ConflictError, ForbiddenError, NotFoundError, ValidationError } from '../errors';
import { logger } from '../logger';
import type { BillingRepositories, PrintJobFilters } from '../storage/types';
import {
  findInvoiceForActor,
  requirePermission,
  type ServiceDeps,
} from './serviceContext';

const log = logger.child({ service: 'production' });

export type PrintJobCreated = {
  printJob: PrintJob;
  warnings: EligibilityWarning[];
};

export type PrintJobView = PrintJob & {
  allowedNextStatuses: readonly ProductionStatus[];
};

function toView(job: PrintJob): PrintJobView {
  return { ...job, allowedNextStatuses: getAllowedNextProductionStatuses(job.productionStatus) };
}

export class PrintJobService {
  constructor(private readonly deps: ServiceDeps) { }

  private now(): Date {
    return this.deps.now ? this.deps.now() : new Date();
  }

  private async evaluate(repos: BillingRepositories, actor: Actor, invoice: Invoice): Promise<EligibilityResult> {
    const [existing, canCreatePrintJob] = await Promise.all([
      repos.printJobs.findByInvoice(invoice.id),
      this.deps.permissions.can(actor, 'create_print_job'),
    ]);
    return evaluatePrintJobEligibility({
      canCreatePrintJob,
      hasExistingJob: existing !== undefined,
      invoiceStatus: invoice.status,
      paymentStatus: invoice.paymentStatus,
      deleted: invoice.deletedAt !== null,
    });
  }

  async getEligibility(actor: Actor, invoiceId: string): Promise<EligibilityResult> {
    const invoice = await findInvoiceForActor(this.deps.store, actor, invoiceId, { includeDeleted: true });
    return this.evaluate(this.deps.store, actor, invoice);
  }

  /**
   * Creates the invoice's print job. Unpaid invoices are accepted; the
   * result carries a PAYMENT_INCOMPLETE warning instead.
   */
  async createFromInvoice(actor: Actor, invoiceId: string, input: CreatePrintJobInput = {}): Promise<PrintJobCreated> {
    const now = this.now();

    const created = await this.deps.locks.run(invoiceId, () => this.deps.store.transaction(async (repos) => {
      const invoice = await findInvoiceForActor(repos, actor, invoiceId, { lock: true, includeDeleted: true });
      const eligibility = await this.evaluate(repos, actor, invoice);

      if (!eligibility.ok) {
        const message = eligibility.message ?? 'A print job cannot be created for this invoice.';
        if (eligibility.code === 'PERMISSION_DENIED') throw new ForbiddenError(message);
        throw new ConflictError(message, eligibility.code);
      }

      const items = await repos.invoices.getItems(invoiceId);
      const productIds = items.map((i) => i.productId).filter((id): id is string => id !== null);
      const products = await repos.catalog.getProducts(productIds);
      const productNames = new Map(products.map((p) => [p.id, p.name]));
      const customer = await repos.catalog.getCustomer(invoice.customerId);
      const branch = await repos.catalog.lockBranch(invoice.branchId);
      const branchCode = branch?.code ?? '';

      const totalWeightKg = parseDecimal(invoice.totalWeightKg);
      const specifications: PrintJobSpecification[] = items.map((item) => ({
        description: item.description,
        quantity: item.quantity,
        weightKg: parseDecimal(item.lineWeightKg),
        specifications: item.specifications,
      }));

      const lastJobNumber = await repos.printJobs.getLastJobNumber(invoice.branchId, jobNumberPrefix(branchCode, now));
      const printJob = await repos.printJobs.createPrintJob({
        invoiceId,
        branchId: invoice.branchId,
        jobNumber: buildJobNumber(branchCode, now, lastJobNumber),
        jobType: input.jobType ?? determineJobType(
          items.map((i) => (i.productId ? productNames.get(i.productId) : undefined) ?? i.description),
        ),
        priority: input.priority ?? calculatePriority({
          customerType: customer?.customerType,
          totalAmountCents: invoice.totalAmountCents,
          dueDate: invoice.dueDate,
          now,
        }),
        estimatedCompletion: input.estimatedCompletion ?? estimateCompletion({
          totalWeightKg,
          totalAmountCents: invoice.totalAmountCents,
          now,
        }),
        customerInstructions: input.customerInstructions ?? null,
        specifications,
        createdByUserId: actor.userId,
      });

      return { printJob, warnings: eligibility.warnings };
    }));

    log.info('Print job created', {
      companyId: actor.companyId,
      userId: actor.userId,
      invoiceId,
      printJobId: created.printJob.id,
      jobNumber: created.printJob.jobNumber,
      priority: created.printJob.priority,
      warnings: created.warnings.map((w) => w.code),
    });
    return created;
  }

  private async findJobForActor(repos: BillingRepositories, actor: Actor, jobId: string): Promise<PrintJob> {
    const job = await repos.printJobs.getPrintJob(jobId);
    if (!job) throw new NotFoundError('Print job');
    const invoice = await repos.invoices.getInvoice(job.invoiceId);
    if (!invoice || invoice.companyId !== actor.companyId) throw new NotFoundError('Print job');
    return job;
  }

  async getPrintJob(actor: Actor, jobId: string): Promise<PrintJobView> {
    return toView(await this.findJobForActor(this.deps.store, actor, jobId));
  }

  async listPrintJobs(actor: Actor, filters: PrintJobFilters = {}): Promise<PrintJobView[]> {
    const jobs = await this.deps.store.printJobs.listPrintJobs(actor.companyId, filters);
    return jobs.map(toView);
  }

  async transitionStatus(
    actor: Actor,
    jobId: string,
    to: ProductionStatus,
    productionNotes?: string | null,
  ): Promise<PrintJobView> {
    await requirePermission(this.deps.permissions, actor, 'manage_production');
    const now = this.now();

    const job = await this.findJobForActor(this.deps.store, actor, jobId);
    const updated = await this.deps.locks.run(job.invoiceId, () => this.deps.store.transaction(async (repos) => {
      const current = await this.findJobForActor(repos, actor, jobId);
      const result = validateProductionTransition(current.productionStatus, to);
      if (!result.ok) {
        throw new ConflictError(result.message ?? 'Invalid production status change.', result.code);
      }

      return repos.printJobs.updatePrintJob(jobId, {
        ...buildProductionPatch(current, to, now),
        ...(productionNotes !== undefined ? { productionNotes } : {}),
      });
    }));

    log.info('Print job status changed', {
      companyId: actor.companyId,
      userId: actor.userId,
      printJobId: jobId,
      from: job.productionStatus,
      to,
    });
    return toView(updated);
  }

  async updateProgress(actor: Actor, jobId: string, progressPercentage: number): Promise<PrintJobView> {
    await requirePermission(this.deps.permissions, actor, 'manage_production');
    if (!Number.isInteger(progressPercentage) || progressPercentage < 0 || progressPercentage > 100) {
      throw new ValidationError('Invalid progress', {
        progressPercentage: 'Progress must be a whole number between 0 and 100',
      });
    }

    const job = await this.findJobForActor(this.deps.store, actor, jobId);
    const updated = await this.deps.locks.run(job.invoiceId, () => this.deps.store.transaction(async (repos) => {
      const current = await this.findJobForActor(repos, actor, jobId);
      if (current.productionStatus === 'completed') {
        throw new ConflictError('Completed print jobs cannot be changed.', 'COMPLETED_TERMINAL');
      }
      return repos.printJobs.updatePrintJob(jobId, { progressPercentage });
    }));

    log.debug('Print job progress updated', { printJobId: jobId, progressPercentage });
    return toView(updated);
  }
}
