/**
 * Invoice Service
 *
 * Creates, prices, edits and retires invoices. Totals are always derived
 * from the stored items through the pricing engine; nothing writes a total
 * by hand.
 */

import type { Actor } from '../../shared/permissions';
import type {
  CreateInvoiceInput,
  InsertInvoiceItem,
  Invoice,
  InvoiceItem,
  InvoiceItemInput,
  Payment,
  PrintJob,
  UpdateInvoiceInput,
} from '../../shared/schema';
import { formatDecimal, parseDecimal } from '../../shared/money';
import {
  priceInvoice,
  validatePricingInput,
  type InvoiceTotals,
  type PricedItemInput,
} from '../../shared/pricing/invoicePricing';
import type { WeightTierRule } from '../../shared/pricing/weightCharge';
import { buildInvoiceNumber, invoiceNumberPrefix } from '../../shared/production/printJobPlanning';
import {
  computeInvoicePaymentRollup,
  derivePaymentStatus,
  getInvoicePaymentStatusLabel,
  type InvoicePaymentRollup,
  type InvoicePaymentStatusLabel,
} from '../../shared/rollups/invoicePaymentRollup';
import { ConflictError, ValidationError } from '../errors';
import { logger } from '../logger';
import type { BillingRepositories, InvoiceFilters } from '../storage/types';
import {
  findInvoiceForActor,
  loadActiveWeightTiers,
  requirePermission,
  type ServiceDeps,
} from './serviceContext';

const DAY_MS = 24 * 60 * 60 * 1000;
export const DEFAULT_PAYMENT_TERM_DAYS = 30;

const log = logger.child({ service: 'invoices' });

export type ResolvedInvoiceItem = PricedItemInput & {
  productId: string | null;
  productName: string | null;
  description: string;
  specifications: Record<string, unknown> | null;
};

export type InvoiceQuote = InvoiceTotals<ResolvedInvoiceItem>;

export type InvoiceDetail = {
  invoice: Invoice;
  items: InvoiceItem[];
  payments: Payment[];
  rollup: InvoicePaymentRollup;
  paymentStatusLabel: InvoicePaymentStatusLabel;
  printJob: PrintJob | null;
  canBeModified: boolean;
  canBeDeleted: boolean;
};

/** Draft and pending invoices without payments may still be edited. */
export function canBeModified(invoice: Pick<Invoice, 'status'>, paymentCount: number): boolean {
  return (invoice.status === 'draft' || invoice.status === 'pending') && paymentCount === 0;
}

export function canBeDeleted(invoice: Pick<Invoice, 'status'>, paymentCount: number): boolean {
  return invoice.status === 'draft' && paymentCount === 0;
}

function itemFromRow(row: InvoiceItem): ResolvedInvoiceItem {
  return {
    productId: row.productId,
    productName: null,
    description: row.description,
    quantity: row.quantity,
    unitPriceCents: row.unitPriceCents,
    unitWeightKg: parseDecimal(row.unitWeightKg),
    taxRate: parseDecimal(row.taxRate),
    specifications: row.specifications,
  };
}

function itemRows(invoiceId: string, quote: InvoiceQuote): InsertInvoiceItem[] {
  return quote.lines.map((line) => ({
    invoiceId,
    productId: line.productId,
    description: line.description,
    quantity: line.quantity,
    unitPriceCents: line.unitPriceCents,
    unitWeightKg: formatDecimal(line.unitWeightKg),
    lineTotalCents: line.lineTotalCents,
    lineWeightKg: formatDecimal(line.lineWeightKg),
    taxRate: formatDecimal(line.taxRate, 2),
    taxAmountCents: line.taxAmountCents,
    specifications: line.specifications,
  }));
}

function totalsPatch(quote: InvoiceQuote) {
  return {
    subtotalCents: quote.subtotalCents,
    weightChargeCents: quote.weightChargeCents,
    taxAmountCents: quote.taxAmountCents,
    discountAmountCents: quote.discountAmountCents,
    totalAmountCents: quote.totalAmountCents,
    totalWeightKg: formatDecimal(quote.totalWeightKg),
  };
}

export class InvoiceService {
  constructor(private readonly deps: ServiceDeps) { }

  private now(): Date {
    return this.deps.now ? this.deps.now() : new Date();
  }

  /**
   * Fills product defaults into item inputs. Explicit values on the input win.
   */
  private async resolveItems(
    repos: BillingRepositories,
    companyId: string,
    inputs: readonly InvoiceItemInput[],
  ): Promise<ResolvedInvoiceItem[]> {
    const productIds = Array.from(new Set(
      inputs.map((i) => i.productId).filter((id): id is string => typeof id === 'string' && id.length > 0),
    ));
    const products = await repos.catalog.getProducts(productIds);
    const byId = new Map(products.filter((p) => p.companyId === companyId).map((p) => [p.id, p]));

    const fieldErrors: Record<string, string> = {};
    const resolved: ResolvedInvoiceItem[] = [];

    inputs.forEach((input, i) => {
      const product = input.productId ? byId.get(input.productId) : undefined;
      if (input.productId && !product) {
        fieldErrors[`items.${i}.productId`] = 'Product not found';
        return;
      }

      const description = input.description?.trim() || product?.name;
      if (!description) {
        fieldErrors[`items.${i}.description`] = 'Description is required for items without a product';
        return;
      }

      const unitPriceCents = input.unitPriceCents ?? product?.basePriceCents;
      if (unitPriceCents === undefined) {
        fieldErrors[`items.${i}.unitPriceCents`] = 'Unit price is required for items without a product';
        return;
      }

      resolved.push({
        productId: product?.id ?? null,
        productName: product?.name ?? null,
        description,
        quantity: input.quantity,
        unitPriceCents,
        unitWeightKg: input.unitWeightKg ?? parseDecimal(product?.weightPerUnitKg),
        taxRate: input.taxRate ?? parseDecimal(product?.taxRate),
        specifications: input.specifications ?? null,
      });
    });

    if (Object.keys(fieldErrors).length > 0) {
      throw new ValidationError('Invoice items are invalid', fieldErrors);
    }
    return resolved;
  }

  private priceOrThrow(
    items: readonly ResolvedInvoiceItem[],
    discountAmountCents: number,
    weightTiers: readonly WeightTierRule[],
  ): InvoiceQuote {
    const issues = validatePricingInput(items, discountAmountCents, weightTiers);
    if (issues.length > 0) {
      const fieldErrors: Record<string, string> = {};
      for (const issue of issues) fieldErrors[issue.field] = issue.message;
      throw new ValidationError('Invoice cannot be priced', fieldErrors);
    }
    return priceInvoice({ items, discountAmountCents, weightTiers });
  }

  /** Prices an item set with the company's tiers without saving anything. */
  async quote(
    actor: Actor,
    input: { items: readonly InvoiceItemInput[]; discountAmountCents: number },
  ): Promise<InvoiceQuote> {
    await requirePermission(this.deps.permissions, actor, 'create_invoice');
    const repos = this.deps.store;
    const items = await this.resolveItems(repos, actor.companyId, input.items);
    const tiers = await loadActiveWeightTiers(repos, actor.companyId);
    return this.priceOrThrow(items, input.discountAmountCents, tiers);
  }

  async createInvoice(actor: Actor, input: CreateInvoiceInput): Promise<InvoiceDetail> {
    await requirePermission(this.deps.permissions, actor, 'create_invoice');
    const now = this.now();

    const created = await this.deps.store.transaction(async (repos) => {
      // The branch lock serializes number allocation with other writers on the branch.
      const branch = await repos.catalog.lockBranch(input.branchId);
      const customer = await repos.catalog.getCustomer(input.customerId);
      const fieldErrors: Record<string, string> = {};
      if (!branch || branch.companyId !== actor.companyId) fieldErrors.branchId = 'Branch not found';
      if (!customer || customer.companyId !== actor.companyId) fieldErrors.customerId = 'Customer not found';
      if (!branch || Object.keys(fieldErrors).length > 0) {
        throw new ValidationError('Invoice references unknown records', fieldErrors);
      }

      const items = await this.resolveItems(repos, actor.companyId, input.items);
      const tiers = await loadActiveWeightTiers(repos, actor.companyId);
      const quote = this.priceOrThrow(items, input.discountAmountCents, tiers);

      const invoiceDate = input.invoiceDate ?? now;
      const dueDate = input.dueDate ?? new Date(invoiceDate.getTime() + DEFAULT_PAYMENT_TERM_DAYS * DAY_MS);
      const lastNumber = await repos.invoices.getLastInvoiceNumber(branch.id, invoiceNumberPrefix(branch.code));

      const invoice = await repos.invoices.createInvoice({
        companyId: actor.companyId,
        branchId: branch.id,
        customerId: input.customerId,
        invoiceNumber: buildInvoiceNumber(branch.code, lastNumber),
        invoiceDate,
        dueDate,
        status: input.status,
        paymentStatus: derivePaymentStatus({
          invoiceTotalCents: quote.totalAmountCents,
          totalPaidCents: 0,
          hadRefund: false,
        }),
        notes: input.notes ?? null,
        createdByUserId: actor.userId,
        ...totalsPatch(quote),
      });
      await repos.invoices.replaceItems(invoice.id, itemRows(invoice.id, quote));
      return invoice;
    });

    log.info('Invoice created', {
      companyId: actor.companyId,
      userId: actor.userId,
      invoiceId: created.id,
      invoiceNumber: created.invoiceNumber,
      totalAmountCents: created.totalAmountCents,
    });
    return this.getInvoice(actor, created.id);
  }

  async updateInvoice(actor: Actor, invoiceId: string, input: UpdateInvoiceInput): Promise<InvoiceDetail> {
    await requirePermission(this.deps.permissions, actor, 'edit_invoice');

    await this.deps.locks.run(invoiceId, () => this.deps.store.transaction(async (repos) => {
      const invoice = await findInvoiceForActor(repos, actor, invoiceId, { lock: true });
      const payments = await repos.payments.listByInvoice(invoiceId);
      if (!canBeModified(invoice, payments.length)) {
        throw new ConflictError(
          'Only draft or pending invoices without payments can be modified.',
          'NOT_MODIFIABLE',
        );
      }

      const items = input.items
        ? await this.resolveItems(repos, actor.companyId, input.items)
        : (await repos.invoices.getItems(invoiceId)).map(itemFromRow);
      const tiers = await loadActiveWeightTiers(repos, actor.companyId);
      const quote = this.priceOrThrow(items, input.discountAmountCents ?? invoice.discountAmountCents, tiers);

      await repos.invoices.updateInvoice(invoiceId, {
        ...totalsPatch(quote),
        paymentStatus: derivePaymentStatus({
          invoiceTotalCents: quote.totalAmountCents,
          totalPaidCents: 0,
          hadRefund: false,
        }),
        ...(input.status ? { status: input.status } : {}),
        ...(input.dueDate ? { dueDate: input.dueDate } : {}),
        ...(input.notes !== undefined ? { notes: input.notes } : {}),
      });
      if (input.items) {
        await repos.invoices.replaceItems(invoiceId, itemRows(invoiceId, quote));
      }
    }));

    log.info('Invoice updated', { companyId: actor.companyId, userId: actor.userId, invoiceId });
    return this.getInvoice(actor, invoiceId);
  }

  /** Soft delete; the row stays for audit. */
  async deleteInvoice(actor: Actor, invoiceId: string): Promise<void> {
    await requirePermission(this.deps.permissions, actor, 'delete_invoice');
    const now = this.now();

    await this.deps.locks.run(invoiceId, () => this.deps.store.transaction(async (repos) => {
      const invoice = await findInvoiceForActor(repos, actor, invoiceId, { lock: true });
      const payments = await repos.payments.listByInvoice(invoiceId);
      if (!canBeDeleted(invoice, payments.length)) {
        throw new ConflictError('Only draft invoices without payments can be deleted.', 'NOT_DELETABLE');
      }
      await repos.invoices.updateInvoice(invoiceId, { deletedAt: now });
    }));

    log.info('Invoice deleted', { companyId: actor.companyId, userId: actor.userId, invoiceId });
  }

  /** Copies an invoice's items, prices and discount into a new draft. */
  async duplicateInvoice(actor: Actor, invoiceId: string): Promise<InvoiceDetail> {
    await requirePermission(this.deps.permissions, actor, 'create_invoice');
    const source = await findInvoiceForActor(this.deps.store, actor, invoiceId);
    const sourceItems = await this.deps.store.invoices.getItems(invoiceId);

    const copy = await this.createInvoice(actor, {
      branchId: source.branchId,
      customerId: source.customerId,
      notes: source.notes,
      discountAmountCents: source.discountAmountCents,
      status: 'draft',
      items: sourceItems.map((row) => ({
        productId: row.productId,
        description: row.description,
        quantity: row.quantity,
        unitPriceCents: row.unitPriceCents,
        unitWeightKg: parseDecimal(row.unitWeightKg),
        taxRate: parseDecimal(row.taxRate),
        specifications: row.specifications,
      })),
    });

    log.info('Invoice duplicated', {
      companyId: actor.companyId,
      userId: actor.userId,
      sourceInvoiceId: invoiceId,
      invoiceId: copy.invoice.id,
    });
    return copy;
  }

  async getInvoice(actor: Actor, invoiceId: string): Promise<InvoiceDetail> {
    const repos = this.deps.store;
    const invoice = await findInvoiceForActor(repos, actor, invoiceId);
    const [items, payments, printJob] = await Promise.all([
      repos.invoices.getItems(invoiceId),
      repos.payments.listByInvoice(invoiceId),
      repos.printJobs.findByInvoice(invoiceId),
    ]);
    const rollup = computeInvoicePaymentRollup({ invoiceTotalCents: invoice.totalAmountCents, payments });

    return {
      invoice,
      items,
      payments,
      rollup,
      paymentStatusLabel: getInvoicePaymentStatusLabel({ invoiceStatus: invoice.status, rollup }),
      printJob: printJob ?? null,
      canBeModified: canBeModified(invoice, payments.length),
      canBeDeleted: canBeDeleted(invoice, payments.length),
    };
  }

  async listInvoices(actor: Actor, filters: InvoiceFilters = {}): Promise<Invoice[]> {
    return this.deps.store.invoices.listInvoices(actor.companyId, { ...filters, includeDeleted: false });
  }
}
