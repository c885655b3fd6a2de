/**
 * @libs/dashboard-client
 *
 * Dashboard API Client Library
 *
 * Typed access to a metrics dashboard service:
 * - Metric submission (map or sample-list form)
 * - Latest values, trends and sparklines
 * - Per-metric history
 * - Alert history
 * - Health and discovery documents
 *
 * ## Usage
 *
 * ```typescript
 * import { createDashboardClient } from '@libs/dashboard-client';
 *
 * // Create client (reads from env vars)
 * const dash = createDashboardClient();
 *
 * await dash.submit({ tests_total: 1500, repos_count: 9 });
 *
 * const points = await dash.history('tests_total', { period: '7d' });
 * const hot = await dash.hotAlerts(10);
 * ```
 *
 * ## Environment Variables
 *
 * - `DASHBOARD_URL` - Base URL (required unless passed explicitly)
 * - `DASHBOARD_KEY` - Write key, needed only for submit, delete and prune
 * - `DASHBOARD_TIMEOUT_MS` - Request timeout in ms (default: 10000)
 */

// ============================================================================
// Primary API - Client and Factory
// ============================================================================

export { DashboardClient, createDashboardClient } from './dashboardClient';
export { normalizeSubmission } from './submissions';
export { encodePathSegment } from './request';

// ============================================================================
// Type Exports
// ============================================================================

export type {
  // Core config
  DashboardClientConfig,
  // Submission types
  JsonObject,
  JsonPrimitive,
  JsonValue,
  MetricMap,
  MetricSample,
  SubmissionBatch,
  SubmissionInput,
  // Query types
  AlertsOptions,
  DiscoverySource,
  HistoryOptions,
  // Response types
  AlertEvent,
  AlertLevel,
  AlertsPage,
  HealthStatus,
  HistoryPoint,
  OpenApiDocument,
  PruneResult,
  SkillDescriptor,
  SkillFile,
  SkillsIndex,
  StatSummary,
  TrendPeriod,
  TrendWindow,
} from './types';

// ============================================================================
// Error Exports
// ============================================================================

export {
  AuthError,
  DashboardError,
  DecodeError,
  GenericHttpError,
  NotFoundError,
  RateLimitError,
  ServerError,
  TransportError,
  ValidationError,
  isDashboardError,
} from './errors';
export type { DashboardClientError, DashboardErrorKind } from './errors';
