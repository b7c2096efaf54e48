/**
 * Document Numbering Tests
 *
 * Invoice numbers, payment references and job numbers are allocated per
 * branch under the branch row lock, so concurrent writers on one branch
 * never draw the same number.
 */

import { describe, it, expect } from '@jest/globals';
import type { CreateInvoiceInput } from '../../shared/schema';
import { InvoiceService } from '../services/invoiceService';
import { PaymentService } from '../services/paymentService';
import { PrintJobService } from '../services/printJobService';
import { FIXED_NOW, actors, createTestDeps } from './fixtures';

const invoiceInput: CreateInvoiceInput = {
  branchId: 'br-main',
  customerId: 'cu-regular',
  discountAmountCents: 0,
  status: 'pending',
  items: [{ productId: 'p-cards', quantity: 1 }],
};

function setup() {
  const deps = createTestDeps();
  return {
    store: deps.store,
    invoices: new InvoiceService(deps),
    payments: new PaymentService(deps),
    printJobs: new PrintJobService(deps),
  };
}

async function twoInvoices(invoices: InvoiceService): Promise<[string, string]> {
  const first = await invoices.createInvoice(actors.admin, invoiceInput);
  const second = await invoices.createInvoice(actors.admin, invoiceInput);
  return [first.invoice.id, second.invoice.id];
}

describe('concurrent number allocation', () => {
  it('gives concurrent invoices of one branch distinct numbers', async () => {
    const { invoices, store } = setup();

    const created = await Promise.all([
      invoices.createInvoice(actors.admin, invoiceInput),
      invoices.createInvoice(actors.cashier, invoiceInput),
    ]);

    expect(created.map((c) => c.invoice.invoiceNumber).sort()).toEqual(['MAIN-000001', 'MAIN-000002']);
    expect(store.rollbacks).toBe(0);
  });

  it('gives concurrent payments on different invoices distinct references', async () => {
    const { invoices, payments, store } = setup();
    const [a, b] = await twoInvoices(invoices);

    const outcomes = await Promise.all([
      payments.recordPayment(actors.cashier, a, { amountCents: 1_000, paymentMethod: 'cash' }),
      payments.recordPayment(actors.manager, b, { amountCents: 1_000, paymentMethod: 'cash' }),
    ]);

    expect(outcomes.map((o) => o.payment.paymentReference).sort()).toEqual(['MAIN2603100001', 'MAIN2603100002']);
    expect(store.tables.payments.size).toBe(2);
  });

  it('gives concurrent print jobs on different invoices distinct numbers', async () => {
    const { invoices, printJobs } = setup();
    const [a, b] = await twoInvoices(invoices);

    const created = await Promise.all([
      printJobs.createFromInvoice(actors.manager, a),
      printJobs.createFromInvoice(actors.admin, b),
    ]);

    expect(created.map((c) => c.printJob.jobNumber).sort()).toEqual(['MAIN-20260310-001', 'MAIN-20260310-002']);
  });
});

describe('unique number indexes', () => {
  it('refuses a second payment with the same branch reference', async () => {
    const { invoices, payments, store } = setup();
    const [invoiceId] = await twoInvoices(invoices);
    const { payment } = await payments.recordPayment(actors.cashier, invoiceId, { amountCents: 1_000, paymentMethod: 'cash' });

    await expect(store.payments.createPayment({
      invoiceId,
      branchId: 'br-main',
      paymentReference: payment.paymentReference,
      amountCents: 500,
      paymentMethod: 'cash',
      paymentDate: FIXED_NOW,
      receivedByUserId: 'u-cashier',
    })).rejects.toThrow('duplicate key value violates unique constraint "payments_branch_reference_uq"');
  });

  it('refuses a second invoice with the same branch number', async () => {
    const { invoices, store } = setup();
    const { invoice } = await invoices.createInvoice(actors.admin, invoiceInput);

    await expect(store.invoices.createInvoice({
      companyId: invoice.companyId,
      branchId: invoice.branchId,
      customerId: invoice.customerId,
      invoiceNumber: invoice.invoiceNumber,
      createdByUserId: 'u-admin',
    })).rejects.toThrow('duplicate key value violates unique constraint "invoices_branch_number_uq"');
  });
});
