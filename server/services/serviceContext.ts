/**
 * Dependencies and guards shared by the billing services.
 */

import type { Actor, Permission, PermissionChecker } from '../../shared/permissions';
import type { Invoice, WeightPricingTier } from '../../shared/schema';
import { parseDecimal } from '../../shared/money';
import type { WeightTierRule } from '../../shared/pricing/weightCharge';
import { computeInvoicePaymentRollup, type InvoicePaymentRollup } from '../../shared/rollups/invoicePaymentRollup';
import { ForbiddenError, NotFoundError } from '../errors';
import type { InvoiceLocks } from '../lib/invoiceLocks';
import type { BillingRepositories, BillingStore } from '../storage/types';

export interface ServiceDeps {
  store: BillingStore;
  permissions: PermissionChecker;
  locks: InvoiceLocks;
  now?: () => Date;
}

export async function requirePermission(
  permissions: PermissionChecker,
  actor: Actor,
  permission: Permission,
  message?: string,
): Promise<void> {
  if (!(await permissions.can(actor, permission))) {
    throw new ForbiddenError(message);
  }
}

/**
 * Loads an invoice the actor's company owns. Invoices of other companies
 * are reported as missing.
 */
export async function findInvoiceForActor(
  repos: BillingRepositories,
  actor: Actor,
  invoiceId: string,
  opts: { lock?: boolean; includeDeleted?: boolean } = {},
): Promise<Invoice> {
  const invoice = opts.lock
    ? await repos.invoices.lockInvoice(invoiceId)
    : await repos.invoices.getInvoice(invoiceId);

  if (!invoice || invoice.companyId !== actor.companyId) {
    throw new NotFoundError('Invoice');
  }
  if (invoice.deletedAt && !opts.includeDeleted) {
    throw new NotFoundError('Invoice');
  }
  return invoice;
}

export function toWeightTierRules(tiers: readonly WeightPricingTier[]): WeightTierRule[] {
  return tiers.map((tier) => ({
    tierName: tier.tierName,
    minWeightKg: parseDecimal(tier.minWeightKg),
    maxWeightKg: tier.maxWeightKg === null ? null : parseDecimal(tier.maxWeightKg),
    basePriceCents: tier.basePriceCents,
    pricePerKgCents: tier.pricePerKgCents,
  }));
}

export async function loadActiveWeightTiers(repos: BillingRepositories, companyId: string): Promise<WeightTierRule[]> {
  return toWeightTierRules(await repos.catalog.listWeightTiers(companyId, { activeOnly: true }));
}

/**
 * Re-derives the invoice's payment status from its payments and stores it
 * when it changed.
 */
export async function syncInvoicePaymentStatus(
  repos: BillingRepositories,
  invoice: Invoice,
): Promise<{ invoice: Invoice; rollup: InvoicePaymentRollup }> {
  const payments = await repos.payments.listByInvoice(invoice.id);
  const rollup = computeInvoicePaymentRollup({
    invoiceTotalCents: invoice.totalAmountCents,
    payments,
  });

  if (rollup.paymentStatus === invoice.paymentStatus) {
    return { invoice, rollup };
  }

  const updated = await repos.invoices.updateInvoice(invoice.id, { paymentStatus: rollup.paymentStatus });
  return { invoice: updated, rollup };
}
