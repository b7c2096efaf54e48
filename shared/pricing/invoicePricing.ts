import { formatRupees, MAX_STORED_CENTS, MAX_WEIGHT_KG, roundWeightKg } from '../money';
import {
  calculateWeightCharge,
  noWeightCharge,
  type WeightChargeBreakdown,
  type WeightTierRule,
} from './weightCharge';

export type PricedItemInput = {
  quantity: number;
  unitPriceCents: number;
  unitWeightKg: number;
  /** percent, e.g. 12.5 */
  taxRate: number;
};

export type LineAmounts = {
  lineTotalCents: number;
  lineWeightKg: number;
  taxAmountCents: number;
};

export type InvoiceTotals<T extends PricedItemInput = PricedItemInput> = {
  lines: Array<T & LineAmounts>;
  subtotalCents: number;
  totalWeightKg: number;
  weightCharge: WeightChargeBreakdown;
  weightChargeCents: number;
  taxAmountCents: number;
  discountAmountCents: number;
  totalAmountCents: number;
};

export type PricingIssue = {
  field: string;
  message: string;
};

export function priceLine(item: PricedItemInput): LineAmounts {
  const lineTotalCents = item.quantity * item.unitPriceCents;
  return {
    lineTotalCents,
    lineWeightKg: roundWeightKg(item.quantity * item.unitWeightKg),
    taxAmountCents: Math.round(lineTotalCents * (item.taxRate / 100)),
  };
}

/**
 * Prices an invoice. Pure function of the items, the discount and the
 * company's weight tiers (if any).
 *
 * An invoice without items carries no weight surcharge.
 */
export function priceInvoice<T extends PricedItemInput>(params: {
  items: readonly T[];
  discountAmountCents: number;
  weightTiers?: readonly WeightTierRule[];
}): InvoiceTotals<T> {
  const lines = params.items.map((item) => ({ ...item, ...priceLine(item) }));

  const subtotalCents = lines.reduce((s, l) => s + l.lineTotalCents, 0);
  const taxAmountCents = lines.reduce((s, l) => s + l.taxAmountCents, 0);
  const totalWeightKg = roundWeightKg(lines.reduce((s, l) => s + l.lineWeightKg, 0));

  const weightCharge = lines.length === 0
    ? noWeightCharge()
    : calculateWeightCharge(totalWeightKg, params.weightTiers ?? []);

  const discountAmountCents = Math.round(params.discountAmountCents);

  return {
    lines,
    subtotalCents,
    totalWeightKg,
    weightCharge,
    weightChargeCents: weightCharge.totalCents,
    taxAmountCents,
    discountAmountCents,
    totalAmountCents: subtotalCents + weightCharge.totalCents + taxAmountCents - discountAmountCents,
  };
}

function fitsStoredCents(cents: number): boolean {
  return Number.isSafeInteger(cents) && cents <= MAX_STORED_CENTS;
}

/**
 * Field-level problems with an item set and discount. Empty when the input can be priced.
 */
export function validatePricingInput(
  items: readonly PricedItemInput[],
  discountAmountCents: number,
  weightTiers: readonly WeightTierRule[] = [],
): PricingIssue[] {
  const issues: PricingIssue[] = [];

  items.forEach((item, i) => {
    if (!Number.isInteger(item.quantity) || item.quantity <= 0) {
      issues.push({ field: `items.${i}.quantity`, message: 'Quantity must be a positive whole number' });
    }
    if (!Number.isInteger(item.unitPriceCents) || item.unitPriceCents < 0) {
      issues.push({ field: `items.${i}.unitPriceCents`, message: 'Unit price cannot be negative' });
    }
    if (!Number.isFinite(item.unitWeightKg) || item.unitWeightKg < 0) {
      issues.push({ field: `items.${i}.unitWeightKg`, message: 'Unit weight cannot be negative' });
    }
    if (!Number.isFinite(item.taxRate) || item.taxRate < 0 || item.taxRate > 100) {
      issues.push({ field: `items.${i}.taxRate`, message: 'Tax rate must be between 0 and 100' });
    }
  });

  if (!Number.isInteger(discountAmountCents) || discountAmountCents < 0) {
    issues.push({ field: 'discountAmountCents', message: 'Discount cannot be negative' });
  }

  if (issues.length > 0) return issues;

  const totals = priceInvoice({ items, discountAmountCents, weightTiers });

  totals.lines.forEach((line, i) => {
    if (!fitsStoredCents(line.lineTotalCents + line.taxAmountCents)) {
      issues.push({ field: `items.${i}.quantity`, message: `Line amount cannot exceed ${formatRupees(MAX_STORED_CENTS)}` });
    }
  });
  if (issues.length > 0) return issues;

  const grossCents = totals.subtotalCents + totals.weightChargeCents + totals.taxAmountCents;
  if (!fitsStoredCents(grossCents)) {
    issues.push({ field: 'items', message: `Invoice amount cannot exceed ${formatRupees(MAX_STORED_CENTS)}` });
  }
  if (totals.totalWeightKg > MAX_WEIGHT_KG) {
    issues.push({ field: 'items', message: 'Total weight is too large to record' });
  }
  if (issues.length > 0) return issues;

  if (totals.totalAmountCents < 0) {
    issues.push({ field: 'discountAmountCents', message: 'Discount cannot exceed the invoice amount' });
  }

  return issues;
}
