import { describe, it, expect } from '@jest/globals';
import type { InsertWeightPricingTier } from '../../shared/schema';
import { ForbiddenError, NotFoundError, ValidationError } from '../errors';
import { WeightPricingService } from '../services/weightPricingService';
import { COMPANY_ID, OTHER_COMPANY_ID, actors, createTestDeps } from './fixtures';

const tier = (overrides: Partial<InsertWeightPricingTier>): InsertWeightPricingTier => ({
  tierName: 'Local',
  minWeightKg: 0,
  maxWeightKg: 2,
  basePriceCents: 15_000,
  pricePerKgCents: 0,
  status: 'active',
  sortOrder: 0,
  ...overrides,
});

function setup() {
  const deps = createTestDeps();
  return { store: deps.store, weightPricing: new WeightPricingService(deps) };
}

describe('WeightPricingService', () => {
  it('quotes from the default table when the company has no tiers', async () => {
    const { weightPricing } = setup();

    const quote = await weightPricing.quoteWeight(actors.cashier, 12);

    expect(quote).toMatchObject({ tierName: 'Bulk', totalCents: 90_000, source: 'default' });
  });

  it('rejects negative weights', async () => {
    const { weightPricing } = setup();

    const error = await weightPricing.quoteWeight(actors.cashier, -1).catch((e: unknown) => e);

    expect(error instanceof ValidationError && error.fieldErrors).toEqual({
      weightKg: 'Weight must be zero or more kilograms',
    });
  });

  it('creates tiers and prices with them', async () => {
    const { weightPricing } = setup();

    const created = await weightPricing.createTier(actors.admin, tier({}));
    expect(created).toMatchObject({ companyId: COMPANY_ID, minWeightKg: '0.000', maxWeightKg: '2.000' });

    expect((await weightPricing.quoteWeight(actors.cashier, 1.5)).totalCents).toBe(15_000);
    expect((await weightPricing.quoteWeight(actors.cashier, 3)).source).toBe('default');
    expect((await weightPricing.listTiers(actors.cashier)).map((t) => t.tierName)).toEqual(['Local']);
  });

  it('ignores inactive tiers when pricing', async () => {
    const { weightPricing } = setup();
    await weightPricing.createTier(actors.admin, tier({ status: 'inactive' }));

    expect((await weightPricing.quoteWeight(actors.cashier, 1.5)).tierName).toBe('Medium');
  });

  it('keeps tiers per company', async () => {
    const { weightPricing, store } = setup();
    await weightPricing.createTier(actors.admin, tier({}));

    expect(await weightPricing.listTiers(actors.outsider)).toEqual([]);
    expect(await store.catalog.listWeightTiers(OTHER_COMPANY_ID)).toEqual([]);
  });

  it('refuses overlapping ranges', async () => {
    const { weightPricing } = setup();
    await weightPricing.createTier(actors.admin, tier({}));

    const error = await weightPricing
      .createTier(actors.admin, tier({ tierName: 'Regional', minWeightKg: 1, maxWeightKg: 5 }))
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ValidationError);
    expect(error).toMatchObject({
      reason: 'OVERLAP',
      fieldErrors: { minWeightKg: 'Weight range overlaps with existing tier: Local' },
    });
  });

  it('refuses an empty range', async () => {
    const { weightPricing } = setup();

    await expect(
      weightPricing.createTier(actors.admin, tier({ minWeightKg: 5, maxWeightKg: 5 })),
    ).rejects.toMatchObject({ reason: 'INVALID_RANGE' });
  });

  it('requires manage_pricing', async () => {
    const { weightPricing } = setup();
    await expect(weightPricing.createTier(actors.manager, tier({}))).rejects.toBeInstanceOf(ForbiddenError);
  });

  it('prices the sample table', async () => {
    const { weightPricing } = setup();
    const table = await weightPricing.samplePricingTable(actors.cashier);
    expect(table).toHaveLength(10);
    expect(table[2]).toMatchObject({ weightKg: 2, tierName: 'Medium', totalCents: 30_000 });
  });
});

describe('WeightPricingService.updateTier', () => {
  async function twoTiers() {
    const { weightPricing, store } = setup();
    const local = await weightPricing.createTier(actors.admin, tier({}));
    await weightPricing.createTier(actors.admin, tier({ tierName: 'Regional', minWeightKg: 2.5, maxWeightKg: 10 }));
    return { weightPricing, store, localId: local.id };
  }

  it('checks the new range against the other tiers only', async () => {
    const { weightPricing, localId } = await twoTiers();

    const updated = await weightPricing.updateTier(actors.admin, localId, { maxWeightKg: 2.5 });

    expect(updated).toMatchObject({ tierName: 'Local', minWeightKg: '0.000', maxWeightKg: '2.500' });
    expect((await weightPricing.quoteWeight(actors.cashier, 2.5)).tierName).toBe('Regional');
  });

  it('refuses a range that runs into another tier', async () => {
    const { weightPricing, store, localId } = await twoTiers();

    const error = await weightPricing.updateTier(actors.admin, localId, { maxWeightKg: 3 }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ValidationError);
    expect(error).toMatchObject({
      reason: 'OVERLAP',
      fieldErrors: { minWeightKg: 'Weight range overlaps with existing tier: Regional' },
    });
    expect(store.tables.weightTiers.get(localId)?.maxWeightKg).toBe('2.000');
  });

  it('deactivates a tier', async () => {
    const { weightPricing, localId } = await twoTiers();

    await weightPricing.updateTier(actors.admin, localId, { status: 'inactive' });
    const renamed = await weightPricing.updateTier(actors.admin, localId, { tierName: 'Local Zone' });

    expect(renamed).toMatchObject({ tierName: 'Local Zone', status: 'inactive' });
    expect((await weightPricing.quoteWeight(actors.cashier, 1.5)).source).toBe('default');
  });

  it('hides tiers of other companies', async () => {
    const { weightPricing, localId } = await twoTiers();
    await expect(weightPricing.updateTier(actors.outsider, localId, { status: 'inactive' })).rejects.toBeInstanceOf(NotFoundError);
  });

  it('requires manage_pricing', async () => {
    const { weightPricing, localId } = await twoTiers();
    await expect(weightPricing.updateTier(actors.manager, localId, { status: 'inactive' })).rejects.toBeInstanceOf(ForbiddenError);
  });
});
