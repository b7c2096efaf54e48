import {
  computeInvoicePaymentRollup,
  derivePaymentStatus,
  getInvoicePaymentStatusLabel,
} from '../rollups/invoicePaymentRollup';

describe('computeInvoicePaymentRollup', () => {
  test('unpaid', () => {
    const r = computeInvoicePaymentRollup({ invoiceTotalCents: 1000, payments: [] });
    expect(r).toEqual({
      totalPaidCents: 0,
      pendingAmountCents: 0,
      refundedAmountCents: 0,
      remainingBalanceCents: 1000,
      displayBalanceCents: 1000,
      overpaid: false,
      paymentStatus: 'pending',
    });
  });

  test('partial', () => {
    const r = computeInvoicePaymentRollup({
      invoiceTotalCents: 1000,
      payments: [{ id: 'a', status: 'completed', amountCents: 250 }],
    });
    expect(r.totalPaidCents).toBe(250);
    expect(r.remainingBalanceCents).toBe(750);
    expect(r.paymentStatus).toBe('partially_paid');
  });

  test('overpaid keeps the signed balance and floors the displayed one', () => {
    const r = computeInvoicePaymentRollup({
      invoiceTotalCents: 1000,
      payments: [
        { id: 'a', status: 'completed', amountCents: 600 },
        { id: 'b', status: 'completed', amountCents: 600 },
      ],
    });
    expect(r.totalPaidCents).toBe(1200);
    expect(r.remainingBalanceCents).toBe(-200);
    expect(r.displayBalanceCents).toBe(0);
    expect(r.overpaid).toBe(true);
    expect(r.paymentStatus).toBe('paid');
  });

  test('counts a repeated payment id once', () => {
    const r = computeInvoicePaymentRollup({
      invoiceTotalCents: 1000,
      payments: [
        { id: 'a', status: 'completed', amountCents: 400 },
        { id: 'a', status: 'completed', amountCents: 400 },
      ],
    });
    expect(r.totalPaidCents).toBe(400);
  });

  test('reports unverified payments separately', () => {
    const r = computeInvoicePaymentRollup({
      invoiceTotalCents: 1000,
      payments: [
        { id: 'a', status: 'completed', verificationStatus: 'verified', amountCents: 250 },
        { id: 'b', status: 'pending', verificationStatus: 'pending', amountCents: 300 },
        { id: 'c', status: 'failed', verificationStatus: 'rejected', amountCents: 500 },
      ],
    });
    expect(r.totalPaidCents).toBe(250);
    expect(r.pendingAmountCents).toBe(300);
    expect(r.remainingBalanceCents).toBe(750);
    expect(r.paymentStatus).toBe('partially_paid');
  });

  test('a fully refunded invoice is refunded', () => {
    const r = computeInvoicePaymentRollup({
      invoiceTotalCents: 1000,
      payments: [{ id: 'a', status: 'refunded', amountCents: 1000 }],
    });
    expect(r.totalPaidCents).toBe(0);
    expect(r.refundedAmountCents).toBe(1000);
    expect(r.remainingBalanceCents).toBe(1000);
    expect(r.paymentStatus).toBe('refunded');
  });

  test('a partial refund leaves the rest paid', () => {
    const r = computeInvoicePaymentRollup({
      invoiceTotalCents: 1000,
      payments: [
        { id: 'a', status: 'completed', amountCents: 400 },
        { id: 'b', status: 'refunded', amountCents: 600 },
      ],
    });
    expect(r.paymentStatus).toBe('partially_paid');
    expect(r.refundedAmountCents).toBe(600);
  });

  test('ignores unknown statuses and bad amounts', () => {
    const r = computeInvoicePaymentRollup({
      invoiceTotalCents: 1000,
      payments: [
        { status: 'voided', amountCents: 500 },
        { status: 'completed', amountCents: Number.NaN },
        { status: 'completed', amountCents: -50 },
        { status: 'COMPLETED', amountCents: 100 },
      ],
    });
    expect(r.totalPaidCents).toBe(100);
  });
});

describe('derivePaymentStatus', () => {
  test('a zero-total invoice is paid', () => {
    expect(derivePaymentStatus({ invoiceTotalCents: 0, totalPaidCents: 0, hadRefund: false })).toBe('paid');
  });
});

describe('getInvoicePaymentStatusLabel', () => {
  const rollup = (invoiceTotalCents: number, paidCents: number) =>
    computeInvoicePaymentRollup({
      invoiceTotalCents,
      payments: paidCents > 0 ? [{ id: 'p', status: 'completed', amountCents: paidCents }] : [],
    });

  test('draft without payments', () => {
    expect(getInvoicePaymentStatusLabel({ invoiceStatus: 'draft', rollup: rollup(1000, 0) })).toBe('Draft');
  });

  test('cancelled wins', () => {
    expect(getInvoicePaymentStatusLabel({ invoiceStatus: 'cancelled', rollup: rollup(1000, 1000) })).toBe('Cancelled');
  });

  test('follows the payment status otherwise', () => {
    expect(getInvoicePaymentStatusLabel({ invoiceStatus: 'pending', rollup: rollup(1000, 0) })).toBe('Unpaid');
    expect(getInvoicePaymentStatusLabel({ invoiceStatus: 'pending', rollup: rollup(1000, 400) })).toBe('Partially Paid');
    expect(getInvoicePaymentStatusLabel({ invoiceStatus: 'draft', rollup: rollup(1000, 1000) })).toBe('Paid');
  });
});
