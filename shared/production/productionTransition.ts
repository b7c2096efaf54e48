/**
 * Print job production status transitions.
 *
 * Single source of truth for valid moves and the fields each move stamps.
 */

import type { PrintJob, ProductionStatus } from '../schema';

export interface ProductionTransitionResult {
  ok: boolean;
  code?: 'COMPLETED_TERMINAL' | 'SAME_STATUS' | 'INVALID_TRANSITION';
  message?: string;
}

const ALLOWED_NEXT: Record<ProductionStatus, readonly ProductionStatus[]> = {
  pending: ['in_progress', 'on_hold'],
  in_progress: ['quality_check', 'on_hold'],
  quality_check: ['completed', 'in_progress'],
  on_hold: ['pending', 'in_progress'],
  completed: [],
};

export function getAllowedNextProductionStatuses(from: ProductionStatus): readonly ProductionStatus[] {
  return ALLOWED_NEXT[from];
}

export function validateProductionTransition(from: ProductionStatus, to: ProductionStatus): ProductionTransitionResult {
  if (from === 'completed') {
    return {
      ok: false,
      code: 'COMPLETED_TERMINAL',
      message: 'Completed print jobs cannot be changed.',
    };
  }

  if (from === to) {
    return {
      ok: false,
      code: 'SAME_STATUS',
      message: `Print job is already ${to}.`,
    };
  }

  const allowed = ALLOWED_NEXT[from];
  if (!allowed.includes(to)) {
    return {
      ok: false,
      code: 'INVALID_TRANSITION',
      message: `Cannot move a print job from ${from} to ${to}. Valid options: ${allowed.join(', ')}.`,
    };
  }

  return { ok: true };
}

export type ProductionPatch = Pick<Partial<PrintJob>, 'productionStatus' | 'startedAt' | 'completedAt' | 'progressPercentage'>;

/**
 * Fields to write for a validated transition.
 */
export function buildProductionPatch(
  job: Pick<PrintJob, 'startedAt' | 'progressPercentage'>,
  to: ProductionStatus,
  now: Date,
): ProductionPatch {
  const patch: ProductionPatch = { productionStatus: to };
  if (to === 'in_progress' && !job.startedAt) {
    patch.startedAt = now;
  }
  if (to === 'completed') {
    patch.completedAt = now;
    patch.progressPercentage = 100;
  }
  return patch;
}
