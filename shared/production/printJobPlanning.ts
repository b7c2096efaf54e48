/**
 * Defaults for a print job created from an invoice: number, type,
 * priority and estimated completion. Callers may override any of them.
 */

import type { CustomerType, JobPriority } from '../schema';

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

export const HIGH_PRIORITY_TOTAL_CENTS = 5_000_000; // Rs. 50,000
export const LONG_RUN_TOTAL_CENTS = 2_500_000; // Rs. 25,000
export const HEAVY_JOB_WEIGHT_KG = 10;

const pad = (n: number, width: number) => String(n).padStart(width, '0');

/** YYYYMMDD in UTC */
export function formatDateKey(date: Date): string {
  return `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1, 2)}${pad(date.getUTCDate(), 2)}`;
}

/**
 * Reads the trailing sequence from the last number issued under a prefix.
 * Returns 0 when there is none or it does not parse.
 */
export function parseTrailingSequence(lastNumber: string | null | undefined): number {
  if (!lastNumber) return 0;
  const match = /(\d+)$/.exec(lastNumber);
  return match ? Number(match[1]) : 0;
}

const branchPrefix = (branchCode: string, fallback: string) => branchCode.trim().toUpperCase() || fallback;

export function jobNumberPrefix(branchCode: string, date: Date): string {
  return `${branchPrefix(branchCode, 'JOB')}-${formatDateKey(date)}-`;
}

export function invoiceNumberPrefix(branchCode: string): string {
  return `${branchPrefix(branchCode, 'INV')}-`;
}

export function paymentReferencePrefix(branchCode: string, date: Date): string {
  return `${branchPrefix(branchCode, 'PAY')}${formatDateKey(date).slice(2)}`;
}

export function buildJobNumber(branchCode: string, date: Date, lastJobNumber: string | null | undefined): string {
  return `${jobNumberPrefix(branchCode, date)}${pad(parseTrailingSequence(lastJobNumber) + 1, 3)}`;
}

export function buildInvoiceNumber(branchCode: string, lastInvoiceNumber: string | null | undefined): string {
  return `${invoiceNumberPrefix(branchCode)}${pad(parseTrailingSequence(lastInvoiceNumber) + 1, 6)}`;
}

/** Sequence restarts daily: PREFIX + YYMMDD + NNNN */
export function buildPaymentReference(branchCode: string, date: Date, lastReference: string | null | undefined): string {
  const prefix = paymentReferencePrefix(branchCode, date);
  const last = lastReference && lastReference.startsWith(prefix) ? lastReference.slice(prefix.length) : null;
  return `${prefix}${pad(parseTrailingSequence(last) + 1, 4)}`;
}

export function determineJobType(productNames: readonly string[]): string {
  const names = productNames.map((n) => n.toLowerCase());
  if (names.some((n) => n.includes('business card'))) return 'business_cards';
  if (names.some((n) => n.includes('brochure'))) return 'brochures';
  if (names.some((n) => n.includes('banner'))) return 'banners';
  return 'general_printing';
}

export function calculatePriority(params: {
  customerType: CustomerType | null | undefined;
  totalAmountCents: number;
  dueDate: Date | null | undefined;
  now: Date;
}): JobPriority {
  if (params.customerType === 'vip') return 'urgent';
  if (params.totalAmountCents > HIGH_PRIORITY_TOTAL_CENTS) return 'high';
  // overdue invoices count as due soon
  if (params.dueDate && params.dueDate.getTime() - params.now.getTime() <= 2 * DAY_MS) return 'medium';
  return 'normal';
}

export function estimateCompletion(params: {
  totalWeightKg: number;
  totalAmountCents: number;
  now: Date;
}): Date {
  let hours = 24;
  if (params.totalWeightKg > HEAVY_JOB_WEIGHT_KG) hours += 12;
  if (params.totalAmountCents > LONG_RUN_TOTAL_CENTS) hours += 8;
  return new Date(params.now.getTime() + hours * HOUR_MS);
}
