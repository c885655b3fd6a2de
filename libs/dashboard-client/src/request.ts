import type { AlertsOptions, HistoryOptions, QueryParams } from './types';

export const API_PREFIX = '/api/v1';
export const DEFAULT_HISTORY_PERIOD = '24h';

/**
 * Percent-encode a metric key for use as a single path segment. Everything
 * outside the RFC 3986 unreserved set is escaped, including `!'()*`.
 */
export function encodePathSegment(segment: string): string {
  return encodeURIComponent(segment).replace(
    /[!'()*]/g,
    (char) => `%${char.charCodeAt(0).toString(16).toUpperCase()}`,
  );
}

export function statPath(key: string): string {
  return `${API_PREFIX}/stats/${encodePathSegment(key)}`;
}

/**
 * Range selection for history reads. A complete start/end pair wins, then an
 * explicit period, then the 24h default. Values are forwarded verbatim.
 */
export function historyQuery(options: HistoryOptions = {}): QueryParams {
  const { period, start, end } = options;
  if (start && end) {
    return { start, end };
  }
  if (period) {
    return { period };
  }
  return { period: DEFAULT_HISTORY_PERIOD };
}

export function alertsQuery(options: AlertsOptions = {}): QueryParams {
  const query: QueryParams = {};
  if (options.key) {
    query.key = options.key;
  }
  if (options.limit !== undefined) {
    query.limit = options.limit;
  }
  return query;
}

/**
 * Join the base URL and path and append query parameters in key order.
 * Any path prefix on the base URL is kept.
 */
export function buildUrl(baseUrl: string, path: string, params?: QueryParams): string {
  const entries = Object.entries(params ?? {}).filter(
    (entry): entry is [string, string | number] => entry[1] !== undefined,
  );
  if (entries.length === 0) {
    return `${baseUrl}${path}`;
  }

  entries.sort(([a], [b]) => a.localeCompare(b));
  const search = new URLSearchParams();
  for (const [key, value] of entries) {
    search.append(key, String(value));
  }
  return `${baseUrl}${path}?${search.toString()}`;
}

export function stripTrailingSlashes(url: string): string {
  return url.replace(/\/+$/, '');
}
