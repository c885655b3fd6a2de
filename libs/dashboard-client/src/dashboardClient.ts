import type { z } from 'zod';
import type { HttpTransport, Logger, MetricsSink } from '@libs/http-client-core';
import type {
  AlertEvent,
  AlertsOptions,
  AlertsPage,
  DashboardClientConfig,
  DiscoverySource,
  HealthStatus,
  HistoryOptions,
  HistoryPoint,
  JsonObject,
  OpenApiDocument,
  PruneResult,
  QueryParams,
  SkillsIndex,
  StatSummary,
  SubmissionInput,
  TrendPeriod,
} from './types';
import { DecodeError, TransportError, mapErrorResponse } from './errors';
import {
  alertsPageSchema,
  deleteResponseSchema,
  healthStatusSchema,
  historyResponseSchema,
  openApiDocumentSchema,
  pruneResultSchema,
  skillsIndexSchema,
  statsResponseSchema,
  submitResponseSchema,
} from './schemas';
import {
  API_PREFIX,
  alertsQuery,
  buildUrl,
  historyQuery,
  statPath,
  stripTrailingSlashes,
} from './request';
import { normalizeSubmission } from './submissions';

const DEFAULT_TIMEOUT_MS = 10_000;
const DEFAULT_HOT_ALERTS_LIMIT = 20;
const CLIENT_NAME = 'dashboard';
const SKILL_NAME = 'private-dashboard';

type HttpMethod = 'GET' | 'POST' | 'DELETE';

interface SendOptions {
  operation: string;
  query?: QueryParams;
  body?: unknown;
  auth?: boolean;
  accept?: string;
}

interface RawResponse {
  ok: boolean;
  status: number;
  headers: Headers;
  text: string;
}

/**
 * Dashboard API Client
 *
 * Submits metric samples and reads current values, history, trends, alerts,
 * health and discovery documents. Read operations are unauthenticated; submit,
 * delete and prune send the write key as a bearer credential.
 *
 * Every operation is a single request bounded by the configured timeout. There
 * are no retries and nothing is cached, so a read always reflects the server's
 * current state.
 */
export class DashboardClient {
  readonly baseUrl: string;
  private readonly writeKey: string;
  private readonly timeoutMs: number;
  private readonly logger?: Logger;
  private readonly metrics?: MetricsSink;
  private readonly transport: HttpTransport;

  constructor(config: DashboardClientConfig) {
    this.baseUrl = stripTrailingSlashes(config.baseUrl ?? '');
    if (!this.baseUrl) {
      throw new Error('baseUrl is required');
    }
    this.writeKey = config.writeKey ?? '';
    this.timeoutMs = positiveOrDefault(config.timeoutMs, DEFAULT_TIMEOUT_MS);
    this.logger = config.logger;
    this.metrics = config.metrics;
    this.transport = config.transport ?? ((url, init) => fetch(url, init));
  }

  // ==========================================================================
  // Core API
  // ==========================================================================

  async health(): Promise<HealthStatus> {
    return this.requestJson('GET', `${API_PREFIX}/health`, healthStatusSchema, {
      operation: 'health',
    });
  }

  /**
   * All tracked metrics with latest value, trends and sparkline, sorted by key.
   */
  async stats(): Promise<StatSummary[]> {
    const response = await this.requestJson('GET', `${API_PREFIX}/stats`, statsResponseSchema, {
      operation: 'stats',
    });
    return response.stats;
  }

  /**
   * Single metric looked up from the full stats listing.
   *
   * @returns The summary, or null when the key is not tracked
   */
  async stat(key: string): Promise<StatSummary | null> {
    const stats = await this.stats();
    return stats.find((summary) => summary.key === key) ?? null;
  }

  /**
   * Time-series history for a metric, oldest first. A key with no data yields
   * an empty list; an unrecognized period is rejected with a ValidationError.
   */
  async history(key: string, options: HistoryOptions = {}): Promise<HistoryPoint[]> {
    const response = await this.requestJson('GET', statPath(key), historyResponseSchema, {
      operation: 'history',
      query: historyQuery(options),
    });
    return response.points;
  }

  /**
   * Submit metric values, either as a `{ key: value }` map or as a list of
   * samples with optional metadata.
   *
   * @returns The number of samples the server accepted, which may be lower
   * than the number sent when individual items are rejected
   */
  async submit(metrics: SubmissionInput): Promise<number> {
    const response = await this.requestJson('POST', `${API_PREFIX}/stats`, submitResponseSchema, {
      operation: 'submit',
      body: normalizeSubmission(metrics),
      auth: true,
    });
    return response.accepted;
  }

  /**
   * Delete every stored point for a metric.
   *
   * @returns Number of deleted points
   */
  async delete(key: string): Promise<number> {
    const response = await this.requestJson('DELETE', statPath(key), deleteResponseSchema, {
      operation: 'delete',
      auth: true,
    });
    return response.deleted;
  }

  /** Trigger server-side retention cleanup. */
  async prune(): Promise<PruneResult> {
    return this.requestJson('POST', `${API_PREFIX}/stats/prune`, pruneResultSchema, {
      operation: 'prune',
      auth: true,
    });
  }

  /** Alert history, newest first. */
  async alerts(options: AlertsOptions = {}): Promise<AlertEvent[]> {
    const page = await this.alertsPage(options);
    return page.alerts;
  }

  /**
   * Alert listing with the server's total count. `limit` is forwarded as given;
   * the server clamps it to [1, 500], so a page longer than a smaller requested
   * limit (0 or negative) is cut down to `max(limit, 0)` items. `total` is
   * never adjusted.
   */
  async alertsPage(options: AlertsOptions = {}): Promise<AlertsPage> {
    const page = await this.requestJson('GET', `${API_PREFIX}/alerts`, alertsPageSchema, {
      operation: 'alerts',
      query: alertsQuery(options),
    });
    if (options.limit !== undefined && page.alerts.length > options.limit) {
      return { ...page, alerts: page.alerts.slice(0, Math.max(options.limit, 0)) };
    }
    return page;
  }

  /** Total number of recorded alerts as reported by the server. */
  async alertCount(): Promise<number> {
    const page = await this.alertsPage({ limit: 1 });
    return page.total;
  }

  // ==========================================================================
  // Discovery
  // ==========================================================================

  async llmsTxt(source: DiscoverySource = 'root'): Promise<string> {
    const path = source === 'api' ? `${API_PREFIX}/llms.txt` : '/llms.txt';
    return this.requestText(path, 'llmsTxt', 'text/plain');
  }

  async openApi(): Promise<OpenApiDocument> {
    return this.requestJson('GET', '/openapi.json', openApiDocumentSchema, {
      operation: 'openApi',
    });
  }

  async skillsIndex(): Promise<SkillsIndex> {
    return this.requestJson('GET', '/.well-known/skills/index.json', skillsIndexSchema, {
      operation: 'skillsIndex',
    });
  }

  async skillMd(source: DiscoverySource = 'root'): Promise<string> {
    const path =
      source === 'api'
        ? `${API_PREFIX}/skills/SKILL.md`
        : `/.well-known/skills/${SKILL_NAME}/SKILL.md`;
    return this.requestText(path, 'skillMd', 'text/markdown');
  }

  // ==========================================================================
  // Convenience Helpers
  // ==========================================================================

  async getValue(key: string): Promise<number | null> {
    const summary = await this.stat(key);
    return summary ? summary.current : null;
  }

  /**
   * Percentage change of a metric over a trend period.
   *
   * @returns null when the key is unknown or the trend has no baseline
   */
  async getTrend(key: string, period: TrendPeriod = '24h'): Promise<number | null> {
    const summary = await this.stat(key);
    if (!summary) {
      return null;
    }
    return summary.trends[period].pct;
  }

  async submitOne(key: string, value: number, metadata?: JsonObject): Promise<boolean> {
    const accepted = await this.submit([{ key, value, metadata }]);
    return accepted >= 1;
  }

  /** Never throws: any failure reading health counts as unhealthy. */
  async isHealthy(): Promise<boolean> {
    try {
      const health = await this.health();
      return health.status === 'ok';
    } catch (error) {
      this.logger?.debug?.('[DashboardClient] Health check failed', { error });
      return false;
    }
  }

  async hotAlerts(limit: number = DEFAULT_HOT_ALERTS_LIMIT): Promise<AlertEvent[]> {
    const alerts = await this.alerts({ limit });
    return alerts.filter((alert) => alert.level === 'hot');
  }

  async keys(): Promise<string[]> {
    const stats = await this.stats();
    return stats.map((summary) => summary.key);
  }

  // ==========================================================================
  // HTTP Internals
  // ==========================================================================

  private async requestJson<S extends z.ZodTypeAny>(
    method: HttpMethod,
    path: string,
    schema: S,
    options: SendOptions,
  ): Promise<z.output<S>> {
    const response = await this.send(method, path, options);
    const data = parseJsonBody(response, options.operation);
    const result = schema.safeParse(data);
    if (!result.success) {
      throw new DecodeError(
        `Unexpected ${options.operation} response shape: ${result.error.message}`,
        response.status,
        data,
        result.error,
      );
    }
    return result.data;
  }

  private async requestText(path: string, operation: string, accept: string): Promise<string> {
    const response = await this.send('GET', path, { operation, accept });
    return response.text;
  }

  private async send(method: HttpMethod, path: string, options: SendOptions): Promise<RawResponse> {
    const url = buildUrl(this.baseUrl, path, options.query);
    const headers: Record<string, string> = {
      Accept: options.accept ?? 'application/json',
    };
    if (options.auth) {
      headers.Authorization = `Bearer ${this.writeKey}`;
    }

    let body: string | undefined;
    if (options.body !== undefined) {
      headers['Content-Type'] = 'application/json';
      body = JSON.stringify(options.body);
    }

    const start = Date.now();
    let response: RawResponse;
    try {
      response = await this.executeHttp(url, { method, headers, body });
    } catch (error) {
      this.logger?.warn?.(`[DashboardClient] ${method} ${path} failed without a response`, {
        operation: options.operation,
        error,
      });
      await this.recordRequest(options.operation, method, start, 0);
      throw error;
    }

    await this.recordRequest(options.operation, method, start, response.status);

    if (!response.ok) {
      const error = mapErrorResponse({
        status: response.status,
        headers: response.headers,
        bodyText: response.text,
      });
      this.logger?.warn?.(`[DashboardClient] ${method} ${path} failed with status ${response.status}`, {
        operation: options.operation,
        kind: error.kind,
        durationMs: Date.now() - start,
      });
      throw error;
    }

    this.logger?.debug?.(`[DashboardClient] ${method} ${path} -> ${response.status}`, {
      operation: options.operation,
      durationMs: Date.now() - start,
    });
    return response;
  }

  /**
   * Issue the request and read the body under one timeout. Any failure before
   * the body is in hand becomes a TransportError.
   */
  private async executeHttp(url: string, init: RequestInit): Promise<RawResponse> {
    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);

    try {
      const response = await this.transport(url, { ...init, signal: controller.signal });
      const text = response.ok ? await response.text() : await readErrorBody(response);
      return { ok: response.ok, status: response.status, headers: response.headers, text };
    } catch (error) {
      if (timedOut) {
        throw new TransportError(`Request timed out after ${this.timeoutMs}ms`, true, error);
      }
      throw new TransportError(`Connection error: ${describeError(error)}`, false, error);
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private async recordRequest(
    operation: string,
    method: HttpMethod,
    start: number,
    status: number,
  ): Promise<void> {
    try {
      await this.metrics?.recordRequest?.({
        client: CLIENT_NAME,
        operation,
        method,
        durationMs: Date.now() - start,
        status,
      });
    } catch (error) {
      this.logger?.warn?.('[DashboardClient] Metrics sink failed', { operation, error });
    }
  }
}

function parseJsonBody(response: RawResponse, operation: string): unknown {
  if (!response.text.trim()) {
    return {};
  }
  try {
    return JSON.parse(response.text) as unknown;
  } catch (error) {
    throw new DecodeError(
      `Failed to parse ${operation} response as JSON`,
      response.status,
      response.text,
      error,
    );
  }
}

/** Error bodies are best effort: a body that cannot be read counts as empty. */
async function readErrorBody(response: Response): Promise<string> {
  try {
    return await response.text();
  } catch (error) {
    return '';
  }
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Factory function to create a dashboard client from environment variables
 *
 * - `DASHBOARD_URL` - Service base URL (required unless overridden)
 * - `DASHBOARD_KEY` - Write key for submit, delete and prune
 * - `DASHBOARD_TIMEOUT_MS` - Request timeout (default: 10000)
 */
export function createDashboardClient(
  overrides: Partial<DashboardClientConfig> = {},
): DashboardClient {
  const baseUrl = overrides.baseUrl ?? process.env.DASHBOARD_URL;
  if (!baseUrl) {
    throw new Error('DASHBOARD_URL environment variable is required');
  }

  return new DashboardClient({
    ...overrides,
    baseUrl,
    writeKey: overrides.writeKey ?? process.env.DASHBOARD_KEY,
    timeoutMs:
      overrides.timeoutMs ??
      parseNumberOrDefault(process.env.DASHBOARD_TIMEOUT_MS, DEFAULT_TIMEOUT_MS),
  });
}

function parseNumberOrDefault(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }
  return positiveOrDefault(Number(value), fallback);
}

function positiveOrDefault(value: number | undefined, fallback: number): number {
  return value !== undefined && Number.isFinite(value) && value > 0 ? value : fallback;
}
