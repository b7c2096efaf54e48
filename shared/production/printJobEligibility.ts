import type { InvoicePaymentStatus, InvoiceStatus } from '../schema';

/**
 * Derived per invoice, never stored:
 *
 *   not_eligible ──▶ eligible ──▶ job_created
 *
 * Full payment is not a precondition; an unpaid invoice stays eligible and
 * the result carries a PAYMENT_INCOMPLETE warning for the caller to show.
 */
export type ProductionEligibilityState = 'not_eligible' | 'eligible' | 'job_created';

export type EligibilityBlockCode = 'JOB_EXISTS' | 'PERMISSION_DENIED' | 'INVOICE_CANCELLED' | 'INVOICE_DELETED';

export type EligibilityWarning = {
  code: 'PAYMENT_INCOMPLETE';
  message: string;
};

export interface EligibilityContext {
  canCreatePrintJob: boolean;
  hasExistingJob: boolean;
  invoiceStatus: InvoiceStatus;
  paymentStatus: InvoicePaymentStatus;
  deleted: boolean;
}

export interface EligibilityResult {
  state: ProductionEligibilityState;
  ok: boolean;
  code?: EligibilityBlockCode;
  message?: string;
  warnings: EligibilityWarning[];
}

export function evaluatePrintJobEligibility(ctx: EligibilityContext): EligibilityResult {
  if (ctx.hasExistingJob) {
    return {
      state: 'job_created',
      ok: false,
      code: 'JOB_EXISTS',
      message: 'A print job already exists for this invoice.',
      warnings: [],
    };
  }

  if (!ctx.canCreatePrintJob) {
    return {
      state: 'not_eligible',
      ok: false,
      code: 'PERMISSION_DENIED',
      message: 'You do not have permission to create print jobs.',
      warnings: [],
    };
  }

  if (ctx.deleted) {
    return {
      state: 'not_eligible',
      ok: false,
      code: 'INVOICE_DELETED',
      message: 'Print jobs cannot be created for deleted invoices.',
      warnings: [],
    };
  }

  if (ctx.invoiceStatus === 'cancelled') {
    return {
      state: 'not_eligible',
      ok: false,
      code: 'INVOICE_CANCELLED',
      message: 'Print jobs cannot be created for cancelled invoices.',
      warnings: [],
    };
  }

  const warnings: EligibilityWarning[] = [];
  if (ctx.paymentStatus !== 'paid') {
    warnings.push({
      code: 'PAYMENT_INCOMPLETE',
      message: 'Invoice is not fully paid. Production will start before payment is complete.',
    });
  }

  return { state: 'eligible', ok: true, warnings };
}
