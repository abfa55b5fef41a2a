import type { ComputedMetric, Metric, NotComputableMetric, NotComputableReason } from './types.js';

export const computed = (value: number): ComputedMetric => ({ status: 'computed', value });

export const notComputable = (reason: NotComputableReason): NotComputableMetric => ({
  status: 'not_computable',
  reason,
});

export const metricValue = (metric: Metric): number | undefined =>
  metric.status === 'computed' ? metric.value : undefined;

/**
 * Percentage change from baseline to current.
 * Not rounded; presentation decides precision.
 */
export function growthMetric(current: number, baseline: number | undefined): Metric {
  if (baseline === undefined) return notComputable('missing_baseline');
  if (baseline === 0) return notComputable('zero_baseline');
  return computed(((current - baseline) / baseline) * 100);
}

/**
 * Part as a percentage of whole.
 */
export function shareMetric(part: number, whole: number): Metric {
  if (whole === 0) return notComputable('zero_baseline');
  return computed((part / whole) * 100);
}
