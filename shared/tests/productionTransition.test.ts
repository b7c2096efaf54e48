import {
  buildProductionPatch,
  getAllowedNextProductionStatuses,
  validateProductionTransition,
} from '../production/productionTransition';

describe('validateProductionTransition', () => {
  test.each([
    ['pending', 'in_progress'],
    ['pending', 'on_hold'],
    ['in_progress', 'quality_check'],
    ['quality_check', 'completed'],
    ['quality_check', 'in_progress'],
    ['on_hold', 'pending'],
  ] as const)('%s -> %s is allowed', (from, to) => {
    expect(validateProductionTransition(from, to)).toEqual({ ok: true });
  });

  test('skipping quality check is refused', () => {
    expect(validateProductionTransition('in_progress', 'completed')).toEqual({
      ok: false,
      code: 'INVALID_TRANSITION',
      message: 'Cannot move a print job from in_progress to completed. Valid options: quality_check, on_hold.',
    });
  });

  test('completed is terminal', () => {
    expect(validateProductionTransition('completed', 'in_progress').code).toBe('COMPLETED_TERMINAL');
    expect(getAllowedNextProductionStatuses('completed')).toEqual([]);
  });

  test('moving to the same status is refused', () => {
    expect(validateProductionTransition('pending', 'pending').code).toBe('SAME_STATUS');
  });
});

describe('buildProductionPatch', () => {
  const now = new Date(Date.UTC(2026, 2, 10, 9, 0, 0));
  const earlier = new Date(Date.UTC(2026, 2, 9, 9, 0, 0));

  test('stamps the start time once', () => {
    expect(buildProductionPatch({ startedAt: null, progressPercentage: 0 }, 'in_progress', now)).toEqual({
      productionStatus: 'in_progress',
      startedAt: now,
    });
    expect(buildProductionPatch({ startedAt: earlier, progressPercentage: 40 }, 'in_progress', now)).toEqual({
      productionStatus: 'in_progress',
    });
  });

  test('completion stamps the time and fills progress', () => {
    expect(buildProductionPatch({ startedAt: earlier, progressPercentage: 80 }, 'completed', now)).toEqual({
      productionStatus: 'completed',
      completedAt: now,
      progressPercentage: 100,
    });
  });
});
