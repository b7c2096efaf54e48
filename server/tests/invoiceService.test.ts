/**
 * Invoice Service Tests
 *
 * Creation, pricing, editing guards and soft delete against the in-memory store.
 */

import { describe, it, expect } from '@jest/globals';
import type { CreateInvoiceInput } from '../../shared/schema';
import { ConflictError, ForbiddenError, NotFoundError, ValidationError } from '../errors';
import { InvoiceService } from '../services/invoiceService';
import { COMPANY_ID, FIXED_NOW, actors, createTestDeps } from './fixtures';

const DAY_MS = 24 * 60 * 60 * 1000;

function invoiceInput(overrides: Partial<CreateInvoiceInput> = {}): CreateInvoiceInput {
  return {
    branchId: 'br-main',
    customerId: 'cu-regular',
    discountAmountCents: 2_000,
    status: 'draft',
    items: [
      { productId: 'p-cards', quantity: 2 },
      { productId: 'p-flyers', quantity: 1 },
    ],
    ...overrides,
  };
}

function setup() {
  const deps = createTestDeps();
  return { deps, store: deps.store, invoices: new InvoiceService(deps) };
}

describe('InvoiceService.createInvoice', () => {
  it('prices and numbers a new invoice', async () => {
    const { invoices } = setup();

    const detail = await invoices.createInvoice(actors.cashier, invoiceInput());

    expect(detail.invoice).toMatchObject({
      companyId: COMPANY_ID,
      invoiceNumber: 'MAIN-000001',
      status: 'draft',
      paymentStatus: 'pending',
      subtotalCents: 25_000,
      weightChargeCents: 30_000,
      taxAmountCents: 0,
      discountAmountCents: 2_000,
      totalAmountCents: 53_000,
      totalWeightKg: '2.000',
      createdByUserId: 'u-cashier',
    });
    expect(detail.invoice.invoiceDate).toEqual(FIXED_NOW);
    expect(detail.invoice.dueDate).toEqual(new Date(FIXED_NOW.getTime() + 30 * DAY_MS));
    expect(detail.items.map((i) => [i.description, i.quantity, i.lineTotalCents, i.lineWeightKg])).toEqual([
      ['Business Cards', 2, 20_000, '2.000'],
      ['Flyers', 1, 5_000, '0.000'],
    ]);
    expect(detail.paymentStatusLabel).toBe('Draft');
    expect(detail.canBeModified).toBe(true);
    expect(detail.canBeDeleted).toBe(true);
    expect(detail.printJob).toBeNull();
  });

  it('applies product tax rates', async () => {
    const { invoices } = setup();

    const detail = await invoices.createInvoice(
      actors.admin,
      invoiceInput({ discountAmountCents: 0, items: [{ productId: 'p-banner', quantity: 1 }] }),
    );

    expect(detail.invoice.taxAmountCents).toBe(25_000);
    expect(detail.invoice.weightChargeCents).toBe(30_000);
    expect(detail.invoice.totalAmountCents).toBe(305_000);
    expect(detail.items[0].taxRate).toBe('10.00');
  });

  it('numbers invoices sequentially per branch', async () => {
    const { invoices } = setup();

    await invoices.createInvoice(actors.cashier, invoiceInput());
    const second = await invoices.createInvoice(actors.cashier, invoiceInput());

    expect(second.invoice.invoiceNumber).toBe('MAIN-000002');
  });

  it('uses company weight tiers', async () => {
    const { invoices, store } = setup();
    await store.catalog.createWeightTier(COMPANY_ID, {
      tierName: 'Flat',
      minWeightKg: 0,
      maxWeightKg: null,
      basePriceCents: 5_000,
      pricePerKgCents: 0,
      status: 'active',
      sortOrder: 0,
    });

    const detail = await invoices.createInvoice(actors.cashier, invoiceInput());

    expect(detail.invoice.weightChargeCents).toBe(5_000);
    expect(detail.invoice.totalAmountCents).toBe(28_000);
  });

  it('accepts custom items without a product', async () => {
    const { invoices } = setup();

    const detail = await invoices.createInvoice(
      actors.cashier,
      invoiceInput({
        discountAmountCents: 0,
        items: [{ description: 'Custom die-cut stickers', quantity: 10, unitPriceCents: 150, unitWeightKg: 0.05 }],
      }),
    );

    expect(detail.items[0].productId).toBeNull();
    expect(detail.invoice.subtotalCents).toBe(1_500);
    expect(detail.invoice.totalWeightKg).toBe('0.500');
    expect(detail.invoice.totalAmountCents).toBe(21_500);
  });

  it('rejects unknown products and incomplete custom items', async () => {
    const { invoices, store } = setup();

    const error = await invoices
      .createInvoice(
        actors.cashier,
        invoiceInput({
          items: [
            { productId: 'p-missing', quantity: 1 },
            { description: 'Custom', quantity: 1 },
            { quantity: 1, unitPriceCents: 100 },
          ],
        }),
      )
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ValidationError);
    expect(error instanceof ValidationError && error.fieldErrors).toEqual({
      'items.0.productId': 'Product not found',
      'items.1.unitPriceCents': 'Unit price is required for items without a product',
      'items.2.description': 'Description is required for items without a product',
    });
    expect(store.tables.invoices.size).toBe(0);
    expect(store.rollbacks).toBe(1);
  });

  it('rejects a discount larger than the invoice', async () => {
    const { invoices } = setup();

    const error = await invoices
      .createInvoice(actors.cashier, invoiceInput({ discountAmountCents: 55_001 }))
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ValidationError);
    expect(error instanceof ValidationError && error.fieldErrors).toEqual({
      discountAmountCents: 'Discount cannot exceed the invoice amount',
    });
  });

  it('rejects branches of another company', async () => {
    const { invoices } = setup();

    const error = await invoices
      .createInvoice(actors.cashier, invoiceInput({ branchId: 'br-other', customerId: 'cu-missing' }))
      .catch((e: unknown) => e);

    expect(error instanceof ValidationError && error.fieldErrors).toEqual({
      branchId: 'Branch not found',
      customerId: 'Customer not found',
    });
  });

  it('requires create_invoice', async () => {
    const { invoices } = setup();
    await expect(invoices.createInvoice(actors.production, invoiceInput())).rejects.toBeInstanceOf(ForbiddenError);
  });

  it('refuses amounts the money columns cannot hold', async () => {
    const { invoices, store } = setup();

    const error = await invoices
      .createInvoice(actors.cashier, invoiceInput({
        items: [{ description: 'Poster run', quantity: 1_000, unitPriceCents: 5_000_000 }],
      }))
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ValidationError);
    expect(error).toMatchObject({
      message: 'Invoice cannot be priced',
      fieldErrors: { 'items.0.quantity': 'Line amount cannot exceed Rs. 21,474,836.47' },
    });
    expect(store.tables.invoices.size).toBe(0);
  });
});

describe('InvoiceService.quote', () => {
  it('prices without saving', async () => {
    const { invoices, store } = setup();

    const quote = await invoices.quote(actors.cashier, {
      items: [{ productId: 'p-banner', quantity: 1 }],
      discountAmountCents: 0,
    });

    expect(quote.totalAmountCents).toBe(305_000);
    expect(quote.weightCharge.tierName).toBe('Medium');
    expect(quote.lines[0].productName).toBe('Vinyl Banner');
    expect(store.tables.invoices.size).toBe(0);
  });
});

describe('InvoiceService.updateInvoice', () => {
  it('reprices a draft with new items and keeps the discount', async () => {
    const { invoices } = setup();
    const created = await invoices.createInvoice(actors.manager, invoiceInput());

    const updated = await invoices.updateInvoice(actors.manager, created.invoice.id, {
      items: [{ productId: 'p-flyers', quantity: 4 }],
    });

    expect(updated.items).toHaveLength(1);
    expect(updated.invoice.subtotalCents).toBe(20_000);
    expect(updated.invoice.weightChargeCents).toBe(20_000);
    expect(updated.invoice.totalAmountCents).toBe(38_000);
  });

  it('reprices the stored items when only the discount changes', async () => {
    const { invoices } = setup();
    const created = await invoices.createInvoice(actors.manager, invoiceInput());

    const updated = await invoices.updateInvoice(actors.manager, created.invoice.id, {
      discountAmountCents: 0,
      status: 'pending',
    });

    expect(updated.invoice.totalAmountCents).toBe(55_000);
    expect(updated.invoice.status).toBe('pending');
    expect(updated.items).toHaveLength(2);
  });

  it('refuses invoices that already have payments', async () => {
    const { invoices, store } = setup();
    const created = await invoices.createInvoice(actors.manager, invoiceInput());
    await store.payments.createPayment({
      invoiceId: created.invoice.id,
      branchId: 'br-main',
      paymentReference: 'MAIN2603100001',
      amountCents: 1_000,
      paymentMethod: 'cash',
      paymentDate: FIXED_NOW,
      receivedByUserId: 'u-cashier',
    });

    const update = invoices.updateInvoice(actors.manager, created.invoice.id, { discountAmountCents: 0 });
    await expect(update).rejects.toBeInstanceOf(ConflictError);
    await expect(update).rejects.toMatchObject({ reason: 'NOT_MODIFIABLE' });

    const detail = await invoices.getInvoice(actors.manager, created.invoice.id);
    expect(detail.invoice.totalAmountCents).toBe(53_000);
    expect(detail.canBeModified).toBe(false);
  });

  it('requires edit_invoice', async () => {
    const { invoices } = setup();
    const created = await invoices.createInvoice(actors.cashier, invoiceInput());
    await expect(
      invoices.updateInvoice(actors.cashier, created.invoice.id, { discountAmountCents: 0 }),
    ).rejects.toBeInstanceOf(ForbiddenError);
  });
});

describe('InvoiceService.deleteInvoice', () => {
  it('soft deletes a draft', async () => {
    const { invoices, store } = setup();
    const created = await invoices.createInvoice(actors.admin, invoiceInput());

    await invoices.deleteInvoice(actors.admin, created.invoice.id);

    expect(store.tables.invoices.get(created.invoice.id)?.deletedAt).toEqual(FIXED_NOW);
    await expect(invoices.getInvoice(actors.admin, created.invoice.id)).rejects.toBeInstanceOf(NotFoundError);
    expect(await invoices.listInvoices(actors.admin)).toEqual([]);
  });

  it('keeps pending invoices', async () => {
    const { invoices } = setup();
    const created = await invoices.createInvoice(actors.admin, invoiceInput({ status: 'pending' }));

    await expect(invoices.deleteInvoice(actors.admin, created.invoice.id)).rejects.toMatchObject({
      code: 'CONFLICT',
      reason: 'NOT_DELETABLE',
    });
  });

  it('requires delete_invoice', async () => {
    const { invoices } = setup();
    const created = await invoices.createInvoice(actors.manager, invoiceInput());
    await expect(invoices.deleteInvoice(actors.manager, created.invoice.id)).rejects.toBeInstanceOf(ForbiddenError);
  });
});

describe('InvoiceService.duplicateInvoice', () => {
  it('copies items and discount into a new draft', async () => {
    const { invoices } = setup();
    const source = await invoices.createInvoice(actors.cashier, invoiceInput({ status: 'pending' }));

    const copy = await invoices.duplicateInvoice(actors.cashier, source.invoice.id);

    expect(copy.invoice.id).not.toBe(source.invoice.id);
    expect(copy.invoice.invoiceNumber).toBe('MAIN-000002');
    expect(copy.invoice.status).toBe('draft');
    expect(copy.invoice.totalAmountCents).toBe(53_000);
    expect(copy.items.map((i) => i.description)).toEqual(['Business Cards', 'Flyers']);
  });
});

describe('company isolation', () => {
  it('reports invoices of other companies as missing', async () => {
    const { invoices } = setup();
    const created = await invoices.createInvoice(actors.admin, invoiceInput());

    await expect(invoices.getInvoice(actors.outsider, created.invoice.id)).rejects.toBeInstanceOf(NotFoundError);
    await expect(invoices.deleteInvoice(actors.outsider, created.invoice.id)).rejects.toBeInstanceOf(NotFoundError);
    expect(await invoices.listInvoices(actors.outsider)).toEqual([]);
  });
});
