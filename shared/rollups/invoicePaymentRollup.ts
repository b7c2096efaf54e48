import type { InvoicePaymentStatus, PaymentStatus, VerificationStatus } from '../schema';

export type PaymentRollupInput = {
  id?: string | number | null | undefined;
  status: PaymentStatus | string | null | undefined;
  verificationStatus?: VerificationStatus | string | null | undefined;
  amountCents: number | null | undefined;
};

export type InvoicePaymentRollup = {
  totalPaidCents: number;
  pendingAmountCents: number;
  refundedAmountCents: number;
  /** Signed: negative means the invoice has been overpaid. */
  remainingBalanceCents: number;
  /** remainingBalanceCents floored at zero */
  displayBalanceCents: number;
  overpaid: boolean;
  paymentStatus: InvoicePaymentStatus;
};

export type InvoicePaymentStatusLabel = 'Draft' | 'Cancelled' | 'Unpaid' | 'Partially Paid' | 'Paid' | 'Refunded';

export function getInvoicePaymentStatusLabel(params: {
  invoiceStatus: string | null | undefined;
  rollup: InvoicePaymentRollup;
}): InvoicePaymentStatusLabel {
  const base = String(params.invoiceStatus || '').trim().toLowerCase();
  if (base === 'cancelled' || base === 'canceled') return 'Cancelled';
  if (base === 'draft' && params.rollup.totalPaidCents <= 0) return 'Draft';

  switch (params.rollup.paymentStatus) {
    case 'paid':
      return 'Paid';
    case 'partially_paid':
      return 'Partially Paid';
    case 'refunded':
      return 'Refunded';
    default:
      return 'Unpaid';
  }
}

const normalizeStatus = (raw: unknown): PaymentStatus | 'unknown' => {
  if (!raw) return 'unknown';
  const s = String(raw).trim().toLowerCase();
  if (s === 'pending') return 'pending';
  if (s === 'completed') return 'completed';
  if (s === 'failed') return 'failed';
  if (s === 'refunded') return 'refunded';
  return 'unknown';
};

const toSafeCents = (v: unknown): number => {
  const n = Number(v ?? 0);
  if (!Number.isFinite(n)) return 0;
  return Math.max(0, Math.round(n));
};

export function derivePaymentStatus(params: {
  invoiceTotalCents: number;
  totalPaidCents: number;
  hadRefund: boolean;
}): InvoicePaymentStatus {
  const { invoiceTotalCents, totalPaidCents, hadRefund } = params;
  if (totalPaidCents <= 0 && hadRefund) return 'refunded';
  if (invoiceTotalCents - totalPaidCents <= 0) return 'paid';
  if (totalPaidCents > 0) return 'partially_paid';
  return 'pending';
}

/**
 * Aggregates an invoice's payments.
 *
 * Only completed payments count toward the amount paid. Payments still
 * awaiting verification are reported separately; failed (rejected) and
 * refunded payments count toward neither. A payment id seen twice is
 * counted once.
 */
export function computeInvoicePaymentRollup(params: {
  invoiceTotalCents: number;
  payments: readonly PaymentRollupInput[];
}): InvoicePaymentRollup {
  const invoiceTotalCents = toSafeCents(params.invoiceTotalCents);

  let paid = 0;
  let pending = 0;
  let refunded = 0;
  let hadRefund = false;

  const seenPaymentIds = new Set<string>();

  for (const p of params.payments) {
    const rawId = p.id;
    if (rawId !== null && rawId !== undefined && String(rawId).trim()) {
      const id = String(rawId);
      if (seenPaymentIds.has(id)) continue;
      seenPaymentIds.add(id);
    }

    const status = normalizeStatus(p.status);
    const amountCents = toSafeCents(p.amountCents);

    if (status === 'completed') {
      paid += amountCents;
    } else if (status === 'pending') {
      const verification = String(p.verificationStatus || 'pending').trim().toLowerCase();
      if (verification === 'pending') pending += amountCents;
    } else if (status === 'refunded') {
      hadRefund = true;
      refunded += amountCents;
    }
  }

  const remaining = invoiceTotalCents - paid;

  return {
    totalPaidCents: paid,
    pendingAmountCents: pending,
    refundedAmountCents: refunded,
    remainingBalanceCents: remaining,
    displayBalanceCents: Math.max(0, remaining),
    overpaid: remaining < 0,
    paymentStatus: derivePaymentStatus({ invoiceTotalCents, totalPaidCents: paid, hadRefund }),
  };
}
