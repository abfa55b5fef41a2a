/**
 * Registration source health checker
 *
 * Loads and validates the record set, then reports its size and the months
 * it covers. Unhealthy when the source cannot be read or holds invalid records.
 */

import { listDimensions } from '../../../registrations/core/summary.js';

import type { RegistrationSource } from '../../../registrations/core/ports.js';
import type { HealthChecker, HealthCheckResult } from '../../core/types.js';

export interface SourceHealthCheckerOptions {
  name?: string;
  /** Default: true */
  critical?: boolean;
}

/**
 * @example
 * ```typescript
 * await makeSourceHealthChecker(source)();
 * // {
 * //   name: 'registrations', status: 'healthy', message: '120 records', latencyMs: 2,
 * //   critical: true,
 * //   dataset: { records: 120, registrations: 48210, periodRange: { from: '2023-01', to: '2024-12' } },
 * // }
 * ```
 */
export const makeSourceHealthChecker = (
  source: RegistrationSource,
  options: SourceHealthCheckerOptions = {}
): HealthChecker => {
  const { name = 'registrations', critical = true } = options;

  return async (): Promise<HealthCheckResult> => {
    const startedAt = Date.now();
    const unhealthy = (message: string): HealthCheckResult => ({
      name,
      status: 'unhealthy',
      message,
      latencyMs: Date.now() - startedAt,
      critical,
    });

    const loaded = await source.loadRecords();
    if (loaded.isErr()) return unhealthy(loaded.error.message);

    const records = loaded.value;
    const dimensions = listDimensions(records);
    if (dimensions.isErr()) return unhealthy(dimensions.error.message);

    return {
      name,
      status: 'healthy',
      message: `${String(records.length)} records`,
      latencyMs: Date.now() - startedAt,
      critical,
      dataset: {
        records: records.length,
        registrations: records.reduce((sum, record) => sum + record.count, 0),
        periodRange: dimensions.value.periodRange ?? null,
      },
    };
  };
};
