import type { Actor } from '../../shared/permissions';
import type { Branch, Customer, Product } from '../../shared/schema';
import { InvoiceLocks } from '../lib/invoiceLocks';
import { createRolePermissionChecker } from '../../shared/permissions';
import type { ServiceDeps } from '../services/serviceContext';
import { MemoryBillingStore } from './memoryStore';

export const COMPANY_ID = 'co-1';
export const OTHER_COMPANY_ID = 'co-2';

/** 2026-03-10 09:00 UTC */
export const FIXED_NOW = new Date(Date.UTC(2026, 2, 10, 9, 0, 0));

export const actors = {
  admin: { userId: 'u-admin', companyId: COMPANY_ID, role: 'Company Admin' },
  manager: { userId: 'u-manager', companyId: COMPANY_ID, role: 'Branch Manager' },
  cashier: { userId: 'u-cashier', companyId: COMPANY_ID, role: 'Cashier' },
  production: { userId: 'u-prod', companyId: COMPANY_ID, role: 'Production Staff' },
  outsider: { userId: 'u-outsider', companyId: OTHER_COMPANY_ID, role: 'Company Admin' },
} satisfies Record<string, Actor>;

const epoch = new Date(Date.UTC(2026, 0, 1));

function branch(id: string, companyId: string, code: string): Branch {
  return { id, companyId, name: `${code} branch`, code, createdAt: epoch, updatedAt: epoch };
}

function customer(id: string, customerType: Customer['customerType']): Customer {
  return {
    id,
    companyId: COMPANY_ID,
    name: `Customer ${id}`,
    email: null,
    phone: null,
    customerType,
    createdAt: epoch,
    updatedAt: epoch,
  };
}

function product(id: string, name: string, basePriceCents: number, weightPerUnitKg: string, taxRate: string): Product {
  return {
    id,
    companyId: COMPANY_ID,
    name,
    basePriceCents,
    weightPerUnitKg,
    taxRate,
    status: 'active',
    createdAt: epoch,
    updatedAt: epoch,
  };
}

/**
 * Reference data:
 * - branch "br-main" (code MAIN) in co-1, branch "br-other" (code OTH) in co-2
 * - customers "cu-regular" and "cu-vip"
 * - products: Business Cards Rs. 100 / 1 kg, Flyers Rs. 50 / 0 kg,
 *   Vinyl Banner Rs. 2,500 / 3 kg with 10% tax
 */
export function seedCatalog(store: MemoryBillingStore): void {
  for (const b of [branch('br-main', COMPANY_ID, 'MAIN'), branch('br-other', OTHER_COMPANY_ID, 'OTH')]) {
    store.tables.branches.set(b.id, b);
  }
  for (const c of [customer('cu-regular', 'regular'), customer('cu-vip', 'vip')]) {
    store.tables.customers.set(c.id, c);
  }
  for (const p of [
    product('p-cards', 'Business Cards', 10_000, '1.000', '0.00'),
    product('p-flyers', 'Flyers', 5_000, '0.000', '0.00'),
    product('p-banner', 'Vinyl Banner', 250_000, '3.000', '10.00'),
  ]) {
    store.tables.products.set(p.id, p);
  }
}

export function createTestDeps(overrides: Partial<Omit<ServiceDeps, 'store'>> = {}): ServiceDeps & { store: MemoryBillingStore } {
  const store = new MemoryBillingStore();
  seedCatalog(store);
  return {
    permissions: createRolePermissionChecker(),
    locks: new InvoiceLocks(),
    now: () => FIXED_NOW,
    ...overrides,
    store,
  };
}
