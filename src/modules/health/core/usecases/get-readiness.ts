import type {
  DatasetSnapshot,
  HealthChecker,
  HealthCheckResult,
  ReadinessResponse,
  ReadinessStatus,
} from '../types.js';

export interface GetReadinessDeps {
  checkers: HealthChecker[];
  version?: string | undefined;
}

export interface GetReadinessInput {
  uptime: number;
  timestamp: string;
}

const toCheckResult = (settled: PromiseSettledResult<HealthCheckResult>): HealthCheckResult =>
  settled.status === 'fulfilled'
    ? settled.value
    : {
        name: 'unknown',
        status: 'unhealthy',
        message: settled.reason instanceof Error ? settled.reason.message : 'Check failed',
        critical: true,
      };

/**
 * Critical failure → unhealthy (503), non-critical failure → degraded (200).
 */
export const determineOverallStatus = (checks: readonly HealthCheckResult[]): ReadinessStatus => {
  const failed = checks.filter((check) => check.status === 'unhealthy');
  if (failed.length === 0) return 'ok';
  return failed.some((check) => check.critical !== false) ? 'unhealthy' : 'degraded';
};

export const pickDatasetSnapshot = (
  checks: readonly HealthCheckResult[]
): DatasetSnapshot | null =>
  checks.find((check) => check.status === 'healthy' && check.dataset !== undefined)?.dataset ??
  null;

/**
 * Runs the checkers concurrently and reports the overall status together
 * with the dataset the service is answering from.
 */
export async function getReadiness(
  deps: GetReadinessDeps,
  input: GetReadinessInput
): Promise<ReadinessResponse> {
  const settled = await Promise.allSettled(deps.checkers.map((checker) => checker()));
  const checks = settled.map(toCheckResult);

  return {
    status: determineOverallStatus(checks),
    timestamp: input.timestamp,
    ...(deps.version !== undefined && { version: deps.version }),
    uptime: input.uptime,
    dataset: pickDatasetSnapshot(checks),
    checks,
  };
}
