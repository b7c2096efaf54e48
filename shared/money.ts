/**
 * Money and weight helpers.
 *
 * Amounts travel through the billing core as integer cents; weights as
 * kilograms rounded to the gram. Conversions to and from display values
 * live here so callers never do float arithmetic on money.
 */

/** Largest single amount accepted from a caller: Rs. 9,999,999.99. */
export const MAX_AMOUNT_CENTS = 999_999_999;

/** Ceiling of the integer money columns. Stored totals must not pass it. */
export const MAX_STORED_CENTS = 2_147_483_647;

/** Ceiling of the decimal(10,3) weight columns. */
export const MAX_WEIGHT_KG = 9_999_999.999;

const rupeeFormatter = new Intl.NumberFormat('en-US', {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

export const toSafeCents = (v: unknown): number => {
  const n = Number(v ?? 0);
  if (!Number.isFinite(n)) return 0;
  return Math.round(n);
};

export function rupeesToCents(rupees: number): number {
  return Math.round(rupees * 100);
}

export function centsToRupees(cents: number): number {
  return Math.round(cents) / 100;
}

/**
 * Renders cents as "Rs. 1,234.56". Negative amounts keep their sign after the prefix.
 */
export function formatRupees(cents: number): string {
  const safe = toSafeCents(cents);
  const sign = safe < 0 ? '-' : '';
  return `Rs. ${sign}${rupeeFormatter.format(Math.abs(safe) / 100)}`;
}

/** Rounds a weight to grams precision. */
export function roundWeightKg(kg: number): number {
  if (!Number.isFinite(kg)) return 0;
  return Math.round(kg * 1000) / 1000;
}

/** Parses a decimal column value (drizzle returns numerics as strings). */
export function parseDecimal(value: string | number | null | undefined): number {
  if (value === null || value === undefined || value === '') return 0;
  const n = typeof value === 'number' ? value : Number(value);
  return Number.isFinite(n) ? n : 0;
}

export function formatDecimal(value: number, scale: number = 3): string {
  return value.toFixed(scale);
}
