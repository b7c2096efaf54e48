import { formatRupees } from '../money';
import type { PaymentMethod, PaymentStatus, VerificationStatus } from '../schema';

export type PaymentDetailField = 'bankName' | 'chequeNumber' | 'gatewayReference';

export const METHOD_REQUIRED_FIELDS: Record<PaymentMethod, readonly PaymentDetailField[]> = {
  cash: [],
  bank_transfer: ['bankName'],
  cheque: ['bankName', 'chequeNumber'],
  online: ['gatewayReference'],
};

const FIELD_LABELS: Record<PaymentDetailField, string> = {
  bankName: 'Bank name',
  chequeNumber: 'Cheque number',
  gatewayReference: 'Gateway reference',
};

const METHOD_LABELS: Record<PaymentMethod, string> = {
  cash: 'cash',
  bank_transfer: 'bank transfer',
  cheque: 'cheque',
  online: 'online',
};

export type PaymentSubmission = {
  amountCents: number;
  paymentMethod: PaymentMethod;
  paymentDate?: Date | null;
  bankName?: string | null;
  chequeNumber?: string | null;
  gatewayReference?: string | null;
};

export type PaymentFieldErrors = Record<string, string>;

/**
 * Validates a payment before it is accepted against an invoice.
 * Returns field-level errors; an empty object means the payment may be recorded.
 */
export function validatePaymentSubmission(
  submission: PaymentSubmission,
  ctx: { remainingBalanceCents: number; now: Date },
): PaymentFieldErrors {
  const errors: PaymentFieldErrors = {};

  if (!Number.isInteger(submission.amountCents) || submission.amountCents <= 0) {
    errors.amountCents = 'Payment amount must be greater than zero';
  } else if (submission.amountCents > ctx.remainingBalanceCents) {
    errors.amountCents = `Payment amount cannot exceed remaining balance of ${formatRupees(Math.max(0, ctx.remainingBalanceCents))}`;
  }

  for (const field of METHOD_REQUIRED_FIELDS[submission.paymentMethod]) {
    const value = submission[field];
    if (!value || !value.trim()) {
      errors[field] = `${FIELD_LABELS[field]} is required for ${METHOD_LABELS[submission.paymentMethod]} payments`;
    }
  }

  if (submission.paymentDate && submission.paymentDate.getTime() > ctx.now.getTime()) {
    errors.paymentDate = 'Payment date cannot be in the future';
  }

  return errors;
}

/**
 * Gateway payments arrive already confirmed; everything else waits for verification.
 */
export function initialPaymentState(method: PaymentMethod): {
  status: PaymentStatus;
  verificationStatus: VerificationStatus;
} {
  if (method === 'online') return { status: 'completed', verificationStatus: 'verified' };
  return { status: 'pending', verificationStatus: 'pending' };
}
