/**
 * Payment Service
 *
 * Records payments against invoices and moves them through verification.
 *
 * Every write that can change how much of an invoice is paid runs inside
 * the invoice's lock: the in-process queue first, then a row lock on the
 * invoice inside a transaction. The balance check and the write therefore
 * see the same set of payments, and concurrent submissions cannot jointly
 * overpay. Payment references are allocated under the branch row lock.
 */

import type { Actor } from '../../shared/permissions';
import type { Invoice, Payment, RecordPaymentInput, UpdatePaymentInput } from '../../shared/schema';
import { formatRupees } from '../../shared/money';
import { initialPaymentState, validatePaymentSubmission } from '../../shared/payments/paymentRules';
import {
  validateRefund,
  validateVerificationTransition,
  type VerificationResult,
} from '../../shared/payments/verificationTransition';
import { buildPaymentReference, paymentReferencePrefix } from '../../shared/production/printJobPlanning';
import {
  computeInvoicePaymentRollup,
  type InvoicePaymentRollup,
} from '../../shared/rollups/invoicePaymentRollup';
import { BillingError, ConflictError, NotFoundError, ValidationError } from '../errors';
import { logger } from '../logger';
import type { BillingRepositories, PaymentPatch } from '../storage/types';
import {
  findInvoiceForActor,
  requirePermission,
  syncInvoicePaymentStatus,
  type ServiceDeps,
} from './serviceContext';

const log = logger.child({ service: 'payments' });

export type PaymentOutcome = {
  payment: Payment;
  invoice: Invoice;
  rollup: InvoicePaymentRollup;
};

export type PaymentSummary = {
  invoiceId: string;
  invoiceNumber: string;
  totalAmountCents: number;
  totalPaidCents: number;
  pendingAmountCents: number;
  refundedAmountCents: number;
  remainingBalanceCents: number;
  paymentStatus: Invoice['paymentStatus'];
  formatted: {
    totalAmount: string;
    totalPaid: string;
    pendingAmount: string;
    remainingBalance: string;
  };
  counts: {
    total: number;
    verified: number;
    pending: number;
    rejected: number;
    refunded: number;
  };
  payments: Payment[];
};

function verificationFailure(result: VerificationResult): BillingError {
  const message = result.message ?? 'Payment cannot be changed.';
  if (result.code === 'REASON_REQUIRED') {
    return new ValidationError(message, { reason: message }, result.code);
  }
  return new ConflictError(message, result.code);
}

function byPaymentDateDesc(a: Payment, b: Payment): number {
  return b.paymentDate.getTime() - a.paymentDate.getTime();
}

export class PaymentService {
  constructor(private readonly deps: ServiceDeps) { }

  private now(): Date {
    return this.deps.now ? this.deps.now() : new Date();
  }

  /**
   * Runs fn with the invoice locked. The payment is re-read under the lock
   * so the transition is validated against its current state.
   */
  private async withLockedPayment<T>(
    actor: Actor,
    paymentId: string,
    fn: (repos: BillingRepositories, invoice: Invoice, payment: Payment) => Promise<T>,
  ): Promise<T> {
    const located = await this.deps.store.payments.getPayment(paymentId);
    if (!located) throw new NotFoundError('Payment');

    return this.deps.locks.run(located.invoiceId, () => this.deps.store.transaction(async (repos) => {
      const invoice = await findInvoiceForActor(repos, actor, located.invoiceId, { lock: true }).catch((error: unknown) => {
        if (error instanceof NotFoundError) throw new NotFoundError('Payment');
        throw error;
      });
      const payment = await repos.payments.getPayment(paymentId);
      if (!payment) throw new NotFoundError('Payment');
      return fn(repos, invoice, payment);
    }));
  }

  async recordPayment(actor: Actor, invoiceId: string, input: RecordPaymentInput): Promise<PaymentOutcome> {
    await requirePermission(this.deps.permissions, actor, 'create_payment');
    const now = this.now();

    const outcome = await this.deps.locks.run(invoiceId, () => this.deps.store.transaction(async (repos) => {
      const invoice = await findInvoiceForActor(repos, actor, invoiceId, { lock: true });
      if (invoice.status === 'cancelled') {
        throw new ConflictError('Payments cannot be recorded against a cancelled invoice.', 'INVOICE_CANCELLED');
      }

      const existing = await repos.payments.listByInvoice(invoiceId);
      const before = computeInvoicePaymentRollup({ invoiceTotalCents: invoice.totalAmountCents, payments: existing });
      if (before.remainingBalanceCents <= 0) {
        throw new ConflictError('Invoice is already fully paid.', 'ALREADY_PAID');
      }

      const fieldErrors = validatePaymentSubmission(input, {
        remainingBalanceCents: before.remainingBalanceCents,
        now,
      });
      if (Object.keys(fieldErrors).length > 0) {
        throw new ValidationError('Payment validation failed', fieldErrors);
      }

      const branch = await repos.catalog.lockBranch(invoice.branchId);
      const branchCode = branch?.code ?? '';
      const lastReference = await repos.payments.getLastReference(
        invoice.branchId,
        paymentReferencePrefix(branchCode, now),
      );
      const state = initialPaymentState(input.paymentMethod);

      const payment = await repos.payments.createPayment({
        invoiceId,
        branchId: invoice.branchId,
        paymentReference: buildPaymentReference(branchCode, now, lastReference),
        amountCents: input.amountCents,
        paymentMethod: input.paymentMethod,
        paymentDate: input.paymentDate ?? now,
        bankName: input.bankName ?? null,
        chequeNumber: input.chequeNumber ?? null,
        gatewayReference: input.gatewayReference ?? null,
        transactionId: input.transactionId ?? null,
        notes: input.notes ?? null,
        status: state.status,
        verificationStatus: state.verificationStatus,
        verifiedAt: state.verificationStatus === 'verified' ? now : null,
        receivedByUserId: actor.userId,
      });

      const synced = await syncInvoicePaymentStatus(repos, invoice);
      return { payment, ...synced };
    }));

    log.info('Payment recorded', {
      companyId: actor.companyId,
      userId: actor.userId,
      invoiceId,
      paymentId: outcome.payment.id,
      paymentReference: outcome.payment.paymentReference,
      amountCents: outcome.payment.amountCents,
      method: outcome.payment.paymentMethod,
      verificationStatus: outcome.payment.verificationStatus,
      paymentStatus: outcome.rollup.paymentStatus,
    });
    return outcome;
  }

  /**
   * Edits a payment still awaiting verification. The edited payment is
   * validated again against the invoice's remaining balance.
   */
  async updatePayment(actor: Actor, paymentId: string, input: UpdatePaymentInput): Promise<PaymentOutcome> {
    await requirePermission(this.deps.permissions, actor, 'create_payment');
    const now = this.now();

    const outcome = await this.withLockedPayment(actor, paymentId, async (repos, invoice, payment) => {
      if (payment.status !== 'pending' || payment.verificationStatus !== 'pending') {
        throw new ConflictError('Only payments awaiting verification can be edited.', 'NOT_PENDING');
      }

      const edited = {
        amountCents: input.amountCents ?? payment.amountCents,
        paymentMethod: input.paymentMethod ?? payment.paymentMethod,
        paymentDate: input.paymentDate ?? payment.paymentDate,
        bankName: input.bankName !== undefined ? input.bankName : payment.bankName,
        chequeNumber: input.chequeNumber !== undefined ? input.chequeNumber : payment.chequeNumber,
        gatewayReference: input.gatewayReference !== undefined ? input.gatewayReference : payment.gatewayReference,
        transactionId: input.transactionId !== undefined ? input.transactionId : payment.transactionId,
        notes: input.notes !== undefined ? input.notes : payment.notes,
      };
      if (edited.paymentMethod === 'online') {
        throw new ValidationError('Payment validation failed', {
          paymentMethod: 'Online payments are recorded by the gateway and cannot replace a pending payment',
        });
      }

      const payments = await repos.payments.listByInvoice(invoice.id);
      const rollup = computeInvoicePaymentRollup({ invoiceTotalCents: invoice.totalAmountCents, payments });
      const fieldErrors = validatePaymentSubmission(edited, {
        remainingBalanceCents: rollup.remainingBalanceCents,
        now,
      });
      if (Object.keys(fieldErrors).length > 0) {
        throw new ValidationError('Payment validation failed', fieldErrors);
      }

      const updated = await repos.payments.updatePayment(payment.id, edited);
      const synced = await syncInvoicePaymentStatus(repos, invoice);
      return { payment: updated, ...synced };
    });

    log.info('Payment updated', {
      companyId: actor.companyId,
      userId: actor.userId,
      invoiceId: outcome.invoice.id,
      paymentId,
      amountCents: outcome.payment.amountCents,
      method: outcome.payment.paymentMethod,
    });
    return outcome;
  }

  /**
   * pending → verified. Verifying a verified payment changes nothing.
   */
  async verifyPayment(actor: Actor, paymentId: string): Promise<PaymentOutcome> {
    await requirePermission(this.deps.permissions, actor, 'verify_payment');
    const now = this.now();

    let changed = false;
    const outcome = await this.withLockedPayment(actor, paymentId, async (repos, invoice, payment) => {
      const payments = await repos.payments.listByInvoice(invoice.id);
      const rollup = computeInvoicePaymentRollup({ invoiceTotalCents: invoice.totalAmountCents, payments });

      const result = validateVerificationTransition(payment.verificationStatus, 'verify', {
        amountCents: payment.amountCents,
        remainingBalanceCents: rollup.remainingBalanceCents,
      });
      if (!result.ok) throw verificationFailure(result);
      if (result.noop) return { payment, invoice, rollup };

      const updated = await repos.payments.updatePayment(payment.id, {
        status: 'completed',
        verificationStatus: 'verified',
        verifiedByUserId: actor.userId,
        verifiedAt: now,
      });
      changed = true;
      const synced = await syncInvoicePaymentStatus(repos, invoice);
      return { payment: updated, ...synced };
    });

    if (changed) {
      log.info('Payment verified', {
        companyId: actor.companyId,
        userId: actor.userId,
        invoiceId: outcome.invoice.id,
        paymentId,
        amountCents: outcome.payment.amountCents,
        paymentStatus: outcome.rollup.paymentStatus,
      });
    }
    return outcome;
  }

  /** pending → rejected. The payment is marked failed and never counts. */
  async rejectPayment(actor: Actor, paymentId: string, reason: string): Promise<PaymentOutcome> {
    await requirePermission(this.deps.permissions, actor, 'verify_payment');
    const now = this.now();

    const outcome = await this.withLockedPayment(actor, paymentId, async (repos, invoice, payment) => {
      const result = validateVerificationTransition(payment.verificationStatus, 'reject', {
        amountCents: payment.amountCents,
        remainingBalanceCents: 0,
        reason,
      });
      if (!result.ok) throw verificationFailure(result);

      const updated = await repos.payments.updatePayment(payment.id, {
        status: 'failed',
        verificationStatus: 'rejected',
        rejectionReason: reason.trim(),
        verifiedByUserId: actor.userId,
        verifiedAt: now,
      });
      const synced = await syncInvoicePaymentStatus(repos, invoice);
      return { payment: updated, ...synced };
    });

    log.info('Payment rejected', {
      companyId: actor.companyId,
      userId: actor.userId,
      invoiceId: outcome.invoice.id,
      paymentId,
      reason: outcome.payment.rejectionReason,
    });
    return outcome;
  }

  async refundPayment(actor: Actor, paymentId: string, reason: string): Promise<PaymentOutcome> {
    await requirePermission(this.deps.permissions, actor, 'refund_payment');
    const now = this.now();

    const outcome = await this.withLockedPayment(actor, paymentId, async (repos, invoice, payment) => {
      const result = validateRefund(payment.status, reason);
      if (!result.ok) throw verificationFailure(result);

      const patch: PaymentPatch = {
        status: 'refunded',
        refundReason: reason.trim(),
        refundedAt: now,
      };
      const updated = await repos.payments.updatePayment(payment.id, patch);
      const synced = await syncInvoicePaymentStatus(repos, invoice);
      return { payment: updated, ...synced };
    });

    log.warn('Payment refunded', {
      companyId: actor.companyId,
      userId: actor.userId,
      invoiceId: outcome.invoice.id,
      paymentId,
      amountCents: outcome.payment.amountCents,
      paymentStatus: outcome.rollup.paymentStatus,
    });
    return outcome;
  }

  async getPaymentSummary(actor: Actor, invoiceId: string): Promise<PaymentSummary> {
    const invoice = await findInvoiceForActor(this.deps.store, actor, invoiceId);
    const payments = [...await this.deps.store.payments.listByInvoice(invoiceId)].sort(byPaymentDateDesc);
    const rollup = computeInvoicePaymentRollup({ invoiceTotalCents: invoice.totalAmountCents, payments });

    return {
      invoiceId: invoice.id,
      invoiceNumber: invoice.invoiceNumber,
      totalAmountCents: invoice.totalAmountCents,
      totalPaidCents: rollup.totalPaidCents,
      pendingAmountCents: rollup.pendingAmountCents,
      refundedAmountCents: rollup.refundedAmountCents,
      remainingBalanceCents: rollup.displayBalanceCents,
      paymentStatus: rollup.paymentStatus,
      formatted: {
        totalAmount: formatRupees(invoice.totalAmountCents),
        totalPaid: formatRupees(rollup.totalPaidCents),
        pendingAmount: formatRupees(rollup.pendingAmountCents),
        remainingBalance: formatRupees(rollup.displayBalanceCents),
      },
      counts: {
        total: payments.length,
        verified: payments.filter((p) => p.verificationStatus === 'verified').length,
        pending: payments.filter((p) => p.verificationStatus === 'pending').length,
        rejected: payments.filter((p) => p.verificationStatus === 'rejected').length,
        refunded: payments.filter((p) => p.status === 'refunded').length,
      },
      payments,
    };
  }

  async listPendingVerification(actor: Actor): Promise<Payment[]> {
    await requirePermission(this.deps.permissions, actor, 'verify_payment');
    return this.deps.store.payments.listPendingVerification(actor.companyId);
  }
}
