import type { Actor } from '../../shared/permissions';
import type { InsertWeightPricingTier, UpdateWeightPricingTier, WeightPricingTier } from '../../shared/schema';
import {
  buildSamplePricingTable,
  calculateWeightCharge,
  findTierRangeIssue,
  type TierRangeIssue,
  type WeightChargeBreakdown,
} from '../../shared/pricing/weightCharge';
import { parseDecimal } from '../../shared/money';
import { NotFoundError, ValidationError } from '../errors';
import { logger } from '../logger';
import {
  loadActiveWeightTiers,
  requirePermission,
  toWeightTierRules,
  type ServiceDeps,
} from './serviceContext';

const log = logger.child({ service: 'weight-pricing' });

function rangeFailure(issue: TierRangeIssue): ValidationError {
  const field = issue.code === 'INVALID_RANGE' ? 'maxWeightKg' : 'minWeightKg';
  return new ValidationError(issue.message, { [field]: issue.message }, issue.code);
}

export class WeightPricingService {
  constructor(private readonly deps: ServiceDeps) { }

  async quoteWeight(actor: Actor, weightKg: number): Promise<WeightChargeBreakdown> {
    if (!Number.isFinite(weightKg) || weightKg < 0) {
      throw new ValidationError('Invalid weight', { weightKg: 'Weight must be zero or more kilograms' });
    }
    const tiers = await loadActiveWeightTiers(this.deps.store, actor.companyId);
    return calculateWeightCharge(weightKg, tiers);
  }

  async samplePricingTable(actor: Actor): Promise<WeightChargeBreakdown[]> {
    return buildSamplePricingTable(await loadActiveWeightTiers(this.deps.store, actor.companyId));
  }

  async listTiers(actor: Actor): Promise<WeightPricingTier[]> {
    return this.deps.store.catalog.listWeightTiers(actor.companyId);
  }

  async createTier(actor: Actor, input: InsertWeightPricingTier): Promise<WeightPricingTier> {
    await requirePermission(this.deps.permissions, actor, 'manage_pricing');

    const tier = await this.deps.store.transaction(async (repos) => {
      const existing = toWeightTierRules(await repos.catalog.listWeightTiers(actor.companyId));
      const issue = findTierRangeIssue(
        { minWeightKg: input.minWeightKg, maxWeightKg: input.maxWeightKg ?? null },
        existing,
      );
      if (issue) throw rangeFailure(issue);
      return repos.catalog.createWeightTier(actor.companyId, input);
    });

    log.info('Weight pricing tier created', {
      companyId: actor.companyId,
      userId: actor.userId,
      tierId: tier.id,
      tierName: tier.tierName,
    });
    return tier;
  }

  /**
   * Edits or deactivates a tier. The range is checked against the company's
   * other tiers only.
   */
  async updateTier(actor: Actor, tierId: string, input: UpdateWeightPricingTier): Promise<WeightPricingTier> {
    await requirePermission(this.deps.permissions, actor, 'manage_pricing');

    const tier = await this.deps.store.transaction(async (repos) => {
      const current = await repos.catalog.getWeightTier(tierId);
      if (!current || current.companyId !== actor.companyId) throw new NotFoundError('Weight pricing tier');

      const range = {
        minWeightKg: input.minWeightKg ?? parseDecimal(current.minWeightKg),
        maxWeightKg: input.maxWeightKg !== undefined
          ? input.maxWeightKg
          : current.maxWeightKg === null ? null : parseDecimal(current.maxWeightKg),
      };
      const others = (await repos.catalog.listWeightTiers(actor.companyId)).filter((t) => t.id !== tierId);
      const issue = findTierRangeIssue(range, toWeightTierRules(others));
      if (issue) throw rangeFailure(issue);

      return repos.catalog.updateWeightTier(tierId, input);
    });

    log.info('Weight pricing tier updated', {
      companyId: actor.companyId,
      userId: actor.userId,
      tierId: tier.id,
      tierName: tier.tierName,
      status: tier.status,
    });
    return tier;
  }
}
