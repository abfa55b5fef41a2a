/**
 * Health module exports
 */

export { makeHealthRoutes, type HealthRoutesDeps } from './shell/rest/routes.js';

export {
  makeSourceHealthChecker,
  type SourceHealthCheckerOptions,
} from './shell/checkers/source-checker.js';

export {
  getReadiness,
  determineOverallStatus,
  pickDatasetSnapshot,
} from './core/usecases/get-readiness.js';

export type {
  DatasetSnapshot,
  HealthChecker,
  HealthCheckResult,
  LivenessResponse,
  ReadinessResponse,
  ReadinessStatus,
} from './core/types.js';
