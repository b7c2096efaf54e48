/**
 * Weight-based delivery surcharge.
 *
 * The surcharge is charged once per invoice on the total invoice weight.
 * Companies may publish their own tiers; weights no company tier covers
 * fall back to the default table below.
 */

import { roundWeightKg } from '../money';

export type WeightTierRule = {
  tierName: string;
  minWeightKg: number;
  /** null means the tier is open-ended */
  maxWeightKg: number | null;
  basePriceCents: number;
  pricePerKgCents: number;
};

export type WeightChargeSource = 'default' | 'company' | 'none';

export type WeightChargeBreakdown = {
  weightKg: number;
  tierName: string | null;
  basePriceCents: number;
  additionalPriceCents: number;
  totalCents: number;
  source: WeightChargeSource;
};

/**
 * Default tiers. Lower bounds are exclusive: 1 kg is Light, 1.001 kg is Medium.
 */
export const DEFAULT_WEIGHT_TIERS: readonly WeightTierRule[] = [
  { tierName: 'Light', minWeightKg: 0, maxWeightKg: 1, basePriceCents: 20_000, pricePerKgCents: 0 },
  { tierName: 'Medium', minWeightKg: 1, maxWeightKg: 3, basePriceCents: 30_000, pricePerKgCents: 0 },
  { tierName: 'Heavy', minWeightKg: 3, maxWeightKg: 5, basePriceCents: 40_000, pricePerKgCents: 0 },
  { tierName: 'Extra Heavy', minWeightKg: 5, maxWeightKg: 10, basePriceCents: 50_000, pricePerKgCents: 5_000 },
  { tierName: 'Bulk', minWeightKg: 10, maxWeightKg: null, basePriceCents: 75_000, pricePerKgCents: 7_500 },
];

export const SAMPLE_WEIGHTS_KG: readonly number[] = [0.5, 1, 2, 3, 5, 10, 15, 20, 25, 50];

function priceWithTier(tier: WeightTierRule, weightKg: number, source: WeightChargeSource): WeightChargeBreakdown {
  const additionalPriceCents = Math.round(Math.max(0, weightKg - tier.minWeightKg) * tier.pricePerKgCents);
  return {
    weightKg,
    tierName: tier.tierName,
    basePriceCents: tier.basePriceCents,
    additionalPriceCents,
    totalCents: tier.basePriceCents + additionalPriceCents,
    source,
  };
}

export function findDefaultTier(weightKg: number): WeightTierRule {
  const w = roundWeightKg(Math.max(0, weightKg));
  for (const tier of DEFAULT_WEIGHT_TIERS) {
    if (tier.maxWeightKg === null || w <= tier.maxWeightKg) return tier;
  }
  return DEFAULT_WEIGHT_TIERS[DEFAULT_WEIGHT_TIERS.length - 1];
}

/**
 * Company tiers are inclusive on both ends; when several cover the weight
 * the one starting highest wins.
 */
export function findCompanyTier(weightKg: number, tiers: readonly WeightTierRule[]): WeightTierRule | null {
  const w = roundWeightKg(Math.max(0, weightKg));
  let best: WeightTierRule | null = null;
  for (const tier of tiers) {
    if (tier.minWeightKg > w) continue;
    if (tier.maxWeightKg !== null && w > tier.maxWeightKg) continue;
    if (!best || tier.minWeightKg > best.minWeightKg) best = tier;
  }
  return best;
}

export function calculateWeightCharge(
  weightKg: number,
  companyTiers: readonly WeightTierRule[] = [],
): WeightChargeBreakdown {
  const w = roundWeightKg(Math.max(0, weightKg));
  const companyTier = findCompanyTier(w, companyTiers);
  if (companyTier) return priceWithTier(companyTier, w, 'company');
  return priceWithTier(findDefaultTier(w), w, 'default');
}

/** Charge used when an invoice has nothing to deliver. */
export function noWeightCharge(): WeightChargeBreakdown {
  return {
    weightKg: 0,
    tierName: null,
    basePriceCents: 0,
    additionalPriceCents: 0,
    totalCents: 0,
    source: 'none',
  };
}

export function buildSamplePricingTable(companyTiers: readonly WeightTierRule[] = []): WeightChargeBreakdown[] {
  return SAMPLE_WEIGHTS_KG.map((w) => calculateWeightCharge(w, companyTiers));
}

export type TierRangeIssue =
  | { code: 'INVALID_RANGE'; message: string }
  | { code: 'OVERLAP'; message: string; tierName: string };

/**
 * Checks a proposed range against existing tiers. Returns null when the range is usable.
 */
export function findTierRangeIssue(
  range: { minWeightKg: number; maxWeightKg: number | null },
  existing: readonly WeightTierRule[],
): TierRangeIssue | null {
  const newMax = range.maxWeightKg ?? Number.POSITIVE_INFINITY;
  if (range.minWeightKg < 0 || newMax <= range.minWeightKg) {
    return { code: 'INVALID_RANGE', message: 'Maximum weight must be greater than minimum weight' };
  }

  for (const tier of existing) {
    const tierMax = tier.maxWeightKg ?? Number.POSITIVE_INFINITY;
    if (range.minWeightKg < tierMax && newMax > tier.minWeightKg) {
      return {
        code: 'OVERLAP',
        message: `Weight range overlaps with existing tier: ${tier.tierName}`,
        tierName: tier.tierName,
      };
    }
  }
  return null;
}
