import type { z } from 'zod';
import type { HttpTransport, Logger, MetricsSink } from '@libs/http-client-core';
import type {
  alertEventSchema,
  alertLevelSchema,
  alertsPageSchema,
  healthStatusSchema,
  historyPointSchema,
  openApiDocumentSchema,
  pruneResultSchema,
  skillDescriptorSchema,
  skillFileSchema,
  skillsIndexSchema,
  statSummarySchema,
  trendPeriodSchema,
  trendWindowSchema,
} from './schemas';

// ============================================================================
// Client Configuration
// ============================================================================

export interface DashboardClientConfig {
  /** Service root, e.g. `http://localhost:3008`. Trailing slashes are stripped. */
  baseUrl: string;
  /** Write key sent as a bearer credential on submit, delete and prune. */
  writeKey?: string;
  /**
   * Per-request timeout in milliseconds (default 10000). Values that are not a
   * positive finite number fall back to the default.
   */
  timeoutMs?: number;
  logger?: Logger;
  metrics?: MetricsSink;
  transport?: HttpTransport;
}

// ============================================================================
// Submission Types
// ============================================================================

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export interface MetricSample {
  key: string;
  value: number;
  metadata?: JsonObject;
}

/**
 * Mapping form of a submission: metric key to value. Plain objects list
 * integer-like keys (`'7'`, `'2024'`) first in ascending order; pass a `Map`
 * when such keys must keep their insertion order.
 */
export type MetricMap = Record<string, number> | ReadonlyMap<string, number>;

export type SubmissionInput = MetricMap | readonly MetricSample[];

/** Canonical wire body for POST /api/v1/stats. */
export type SubmissionBatch = MetricSample[];

// ============================================================================
// Query Types
// ============================================================================

export interface HistoryOptions {
  /**
   * One of `24h`, `7d`, `30d`, `90d`. Other values are sent as given and
   * rejected by the server.
   */
  period?: string;
  /** Range start, ISO-8601 timestamp or `YYYY-MM-DD`. Used only with `end`. */
  start?: string;
  /** Range end, ISO-8601 timestamp or `YYYY-MM-DD`. Used only with `start`. */
  end?: string;
}

export interface AlertsOptions {
  key?: string;
  /** Server default 50, documented maximum 500. */
  limit?: number;
}

/** Which path a mirrored discovery document is read from. */
export type DiscoverySource = 'root' | 'api';

export type QueryParams = Record<string, string | number | undefined>;

// ============================================================================
// Response Types
// ============================================================================

export type TrendPeriod = z.infer<typeof trendPeriodSchema>;
export type TrendWindow = z.infer<typeof trendWindowSchema>;
export type StatSummary = z.infer<typeof statSummarySchema>;
export type HistoryPoint = z.infer<typeof historyPointSchema>;
export type AlertLevel = z.infer<typeof alertLevelSchema>;
export type AlertEvent = z.infer<typeof alertEventSchema>;
export type AlertsPage = z.infer<typeof alertsPageSchema>;
export type HealthStatus = z.infer<typeof healthStatusSchema>;
export type PruneResult = z.infer<typeof pruneResultSchema>;
export type OpenApiDocument = z.infer<typeof openApiDocumentSchema>;
export type SkillFile = z.infer<typeof skillFileSchema>;
export type SkillDescriptor = z.infer<typeof skillDescriptorSchema>;
export type SkillsIndex = z.infer<typeof skillsIndexSchema>;
