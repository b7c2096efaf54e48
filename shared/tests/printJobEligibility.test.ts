import { evaluatePrintJobEligibility, type EligibilityContext } from '../production/printJobEligibility';

const base: EligibilityContext = {
  canCreatePrintJob: true,
  hasExistingJob: false,
  invoiceStatus: 'pending',
  paymentStatus: 'paid',
  deleted: false,
};

describe('evaluatePrintJobEligibility', () => {
  test('a paid invoice without a job is eligible', () => {
    expect(evaluatePrintJobEligibility(base)).toEqual({ state: 'eligible', ok: true, warnings: [] });
  });

  test('an unpaid invoice is eligible with a warning', () => {
    const result = evaluatePrintJobEligibility({ ...base, paymentStatus: 'partially_paid' });
    expect(result.ok).toBe(true);
    expect(result.warnings.map((w) => w.code)).toEqual(['PAYMENT_INCOMPLETE']);
  });

  test('an existing job wins over every other check', () => {
    const result = evaluatePrintJobEligibility({
      ...base,
      hasExistingJob: true,
      canCreatePrintJob: false,
      invoiceStatus: 'cancelled',
    });
    expect(result.state).toBe('job_created');
    expect(result.code).toBe('JOB_EXISTS');
  });

  test('permission is checked before the invoice state', () => {
    const result = evaluatePrintJobEligibility({ ...base, canCreatePrintJob: false, invoiceStatus: 'cancelled' });
    expect(result).toEqual({
      state: 'not_eligible',
      ok: false,
      code: 'PERMISSION_DENIED',
      message: 'You do not have permission to create print jobs.',
      warnings: [],
    });
  });

  test('deleted and cancelled invoices are blocked', () => {
    expect(evaluatePrintJobEligibility({ ...base, deleted: true }).code).toBe('INVOICE_DELETED');
    expect(evaluatePrintJobEligibility({ ...base, invoiceStatus: 'cancelled' }).code).toBe('INVOICE_CANCELLED');
  });
});
