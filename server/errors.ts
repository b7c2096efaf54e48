/**
 * Billing Error Taxonomy
 *
 * Every failure the billing core reports to a caller is one of these.
 * Each carries a stable code and the HTTP status the routes answer with.
 * None of them leave partial state behind.
 */

export type BillingErrorCode =
  | 'VALIDATION_FAILED'
  | 'FORBIDDEN'
  | 'NOT_FOUND'
  | 'CONFLICT';

export class BillingError extends Error {
  readonly code: BillingErrorCode;
  readonly httpStatus: number;
  /** Narrower reason, e.g. JOB_EXISTS or ALREADY_REJECTED */
  readonly reason?: string;

  constructor(code: BillingErrorCode, httpStatus: number, message: string, reason?: string) {
    super(message);
    this.name = 'BillingError';
    this.code = code;
    this.httpStatus = httpStatus;
    this.reason = reason;
  }

  toJSON(): Record<string, unknown> {
    return {
      error: this.message,
      code: this.code,
      ...(this.reason ? { reason: this.reason } : {}),
    };
  }
}

export class ValidationError extends BillingError {
  readonly fieldErrors: Record<string, string>;

  constructor(message: string, fieldErrors: Record<string, string> = {}, reason?: string) {
    super('VALIDATION_FAILED', 400, message, reason);
    this.name = 'ValidationError';
    this.fieldErrors = fieldErrors;
  }

  toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), fieldErrors: this.fieldErrors };
  }
}

export class ForbiddenError extends BillingError {
  constructor(message: string = 'You do not have permission to perform this action.') {
    super('FORBIDDEN', 403, message);
    this.name = 'ForbiddenError';
  }
}

export class NotFoundError extends BillingError {
  constructor(entity: string) {
    super('NOT_FOUND', 404, `${entity} not found`);
    this.name = 'NotFoundError';
  }
}

export class ConflictError extends BillingError {
  constructor(message: string, reason?: string) {
    super('CONFLICT', 409, message, reason);
    this.name = 'ConflictError';
  }
}

export function isBillingError(error: unknown): error is BillingError {
  return error instanceof BillingError;
}
