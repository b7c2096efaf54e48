/**
 * Payment verification state machine.
 *
 *   pending ──verify──▶ verified   (payment completed, counts toward amount paid)
 *   pending ──reject──▶ rejected   (payment failed, never counted)
 *
 * verified and rejected are terminal. Verifying a verified payment is a no-op.
 * A completed payment may later be refunded; that moves the payment status,
 * not the verification status.
 */

import type { PaymentStatus, VerificationStatus } from '../schema';

export type VerificationAction = 'verify' | 'reject';

export type VerificationErrorCode =
  | 'ALREADY_VERIFIED'
  | 'ALREADY_REJECTED'
  | 'REASON_REQUIRED'
  | 'EXCEEDS_BALANCE'
  | 'NOT_REFUNDABLE';

export interface VerificationResult {
  ok: boolean;
  /** true when the action has already taken effect and nothing should change */
  noop?: boolean;
  code?: VerificationErrorCode;
  message?: string;
}

export interface VerificationContext {
  amountCents: number;
  /** Remaining balance before this payment is counted. */
  remainingBalanceCents: number;
  reason?: string | null;
}

export function isTerminalVerificationStatus(status: VerificationStatus): boolean {
  return status === 'verified' || status === 'rejected';
}

export function validateVerificationTransition(
  from: VerificationStatus,
  action: VerificationAction,
  ctx: VerificationContext,
): VerificationResult {
  if (from === 'verified') {
    if (action === 'verify') return { ok: true, noop: true };
    return {
      ok: false,
      code: 'ALREADY_VERIFIED',
      message: 'Verified payments cannot be rejected. Record a refund instead.',
    };
  }

  if (from === 'rejected') {
    return {
      ok: false,
      code: 'ALREADY_REJECTED',
      message: 'Rejected payments cannot be changed. Record a new payment if needed.',
    };
  }

  if (action === 'reject') {
    if (!ctx.reason || !ctx.reason.trim()) {
      return { ok: false, code: 'REASON_REQUIRED', message: 'A rejection reason is required.' };
    }
    return { ok: true };
  }

  if (ctx.amountCents > ctx.remainingBalanceCents) {
    return {
      ok: false,
      code: 'EXCEEDS_BALANCE',
      message: 'Verifying this payment would exceed the invoice total.',
    };
  }

  return { ok: true };
}

export function validateRefund(status: PaymentStatus, reason: string | null | undefined): VerificationResult {
  if (status !== 'completed') {
    return { ok: false, code: 'NOT_REFUNDABLE', message: 'Only completed payments can be refunded.' };
  }
  if (!reason || !reason.trim()) {
    return { ok: false, code: 'REASON_REQUIRED', message: 'A refund reason is required.' };
  }
  return { ok: true };
}
