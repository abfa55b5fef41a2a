/**
 * Health Module - Types
 *
 * Probe payloads. Readiness carries a snapshot of the registration dataset
 * so operators can see what the analytics endpoints are serving.
 */

import { Type, type Static } from '@sinclair/typebox';

// ─────────────────────────────────────────────────────────────────────────────
// Dataset snapshot
// ─────────────────────────────────────────────────────────────────────────────

export const DatasetSnapshotSchema = Type.Object({
  records: Type.Integer({ minimum: 0, description: 'Rows held by the record source' }),
  registrations: Type.Integer({ minimum: 0, description: 'Sum of all registration counts' }),
  periodRange: Type.Union([
    Type.Object({ from: Type.String(), to: Type.String() }),
    Type.Null(),
  ]),
});

export type DatasetSnapshot = Static<typeof DatasetSnapshotSchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Checks
// ─────────────────────────────────────────────────────────────────────────────

export const CheckResultSchema = Type.Object({
  name: Type.String(),
  status: Type.Union([Type.Literal('healthy'), Type.Literal('unhealthy')]),
  message: Type.Optional(Type.String()),
  latencyMs: Type.Optional(Type.Number()),
  /** Defaults to true: an unhealthy check makes the service unready */
  critical: Type.Optional(Type.Boolean()),
  dataset: Type.Optional(DatasetSnapshotSchema),
});

export type HealthCheckResult = Static<typeof CheckResultSchema>;

/**
 * Probes one dependency. A rejection counts as a critical failure.
 */
export type HealthChecker = () => Promise<HealthCheckResult>;

// ─────────────────────────────────────────────────────────────────────────────
// Probe responses
// ─────────────────────────────────────────────────────────────────────────────

export const LivenessResponseSchema = Type.Object({
  status: Type.Literal('ok'),
});

export type LivenessResponse = Static<typeof LivenessResponseSchema>;

export const ReadinessStatusSchema = Type.Union([
  Type.Literal('ok'),
  Type.Literal('degraded'),
  Type.Literal('unhealthy'),
]);

export type ReadinessStatus = Static<typeof ReadinessStatusSchema>;

export const ReadinessResponseSchema = Type.Object({
  status: ReadinessStatusSchema,
  timestamp: Type.String({ format: 'date-time' }),
  version: Type.Optional(Type.String()),
  uptime: Type.Number({ description: 'Seconds since the routes were registered' }),
  /** Snapshot from the first healthy check that reports one */
  dataset: Type.Union([DatasetSnapshotSchema, Type.Null()]),
  checks: Type.Array(CheckResultSchema),
});

export type ReadinessResponse = Static<typeof ReadinessResponseSchema>;
