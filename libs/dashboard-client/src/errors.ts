/**
 * Dashboard client error taxonomy.
 *
 * Every failure surfaced by the client is a `DashboardError` subclass with a
 * literal `kind`. Callers branch on `kind` (or `instanceof`), never on the
 * message text.
 */

export type DashboardErrorKind =
  | 'validation'
  | 'auth'
  | 'not_found'
  | 'rate_limit'
  | 'server'
  | 'generic'
  | 'transport'
  | 'decode';

export abstract class DashboardError extends Error {
  abstract readonly kind: DashboardErrorKind;

  constructor(
    message: string,
    /** HTTP status, absent when no response was obtained. */
    public readonly status: number | undefined,
    /** Parsed JSON body, raw text when it was not JSON, undefined when empty. */
    public readonly body: unknown,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** 400 */
export class ValidationError extends DashboardError {
  readonly kind = 'validation' as const;
  declare readonly status: number;

  constructor(message: string, status: number, body: unknown) {
    super(message, status, body);
  }
}

/** 403 — missing or wrong write key. */
export class AuthError extends DashboardError {
  readonly kind = 'auth' as const;
  declare readonly status: number;

  constructor(message: string, status: number, body: unknown) {
    super(message, status, body);
  }
}

/** 404 */
export class NotFoundError extends DashboardError {
  readonly kind = 'not_found' as const;
  declare readonly status: number;

  constructor(message: string, status: number, body: unknown) {
    super(message, status, body);
  }
}

/** 429 */
export class RateLimitError extends DashboardError {
  readonly kind = 'rate_limit' as const;
  declare readonly status: number;

  constructor(
    message: string,
    status: number,
    body: unknown,
    /** Seconds from the Retry-After header, when it was numeric. */
    public readonly retryAfterSeconds?: number,
  ) {
    super(message, status, body);
  }
}

/** 5xx */
export class ServerError extends DashboardError {
  readonly kind = 'server' as const;
  declare readonly status: number;

  constructor(message: string, status: number, body: unknown) {
    super(message, status, body);
  }
}

/** Any other non-2xx status. */
export class GenericHttpError extends DashboardError {
  readonly kind = 'generic' as const;
  declare readonly status: number;

  constructor(message: string, status: number, body: unknown) {
    super(message, status, body);
  }
}

/** No response was obtained: connection failure or timeout. */
export class TransportError extends DashboardError {
  readonly kind = 'transport' as const;
  declare readonly status: undefined;

  constructor(
    message: string,
    public readonly timedOut: boolean,
    cause?: unknown,
  ) {
    super(message, undefined, undefined, { cause });
  }
}

/** A 2xx response whose body was not the JSON shape the operation expects. */
export class DecodeError extends DashboardError {
  readonly kind = 'decode' as const;
  declare readonly status: number;

  constructor(message: string, status: number, body: unknown, cause?: unknown) {
    super(message, status, body, { cause });
  }
}

export type DashboardClientError =
  | ValidationError
  | AuthError
  | NotFoundError
  | RateLimitError
  | ServerError
  | GenericHttpError
  | TransportError
  | DecodeError;

export function isDashboardError(value: unknown): value is DashboardClientError {
  return value instanceof DashboardError;
}

export interface FailedResponse {
  status: number;
  headers: Headers;
  bodyText: string;
}

/**
 * Map a non-2xx response to exactly one error.
 */
export function mapErrorResponse(response: FailedResponse): DashboardClientError {
  const { status, headers, bodyText } = response;
  const body = parseBody(bodyText);
  const message = extractMessage(body, bodyText, status);

  if (status === 400) {
    return new ValidationError(message, status, body);
  }
  if (status === 403) {
    return new AuthError(message, status, body);
  }
  if (status === 404) {
    return new NotFoundError(message, status, body);
  }
  if (status === 429) {
    return new RateLimitError(message, status, body, parseRetryAfterSeconds(headers));
  }
  if (status >= 500) {
    return new ServerError(message, status, body);
  }
  return new GenericHttpError(message, status, body);
}

export function parseRetryAfterSeconds(headers: Headers): number | undefined {
  const header = headers.get('retry-after');
  if (!header || !header.trim()) {
    return undefined;
  }

  const seconds = Number(header);
  return Number.isFinite(seconds) ? seconds : undefined;
}

function parseBody(text: string): unknown {
  if (!text) {
    return undefined;
  }
  try {
    return JSON.parse(text) as unknown;
  } catch {
    return text;
  }
}

function extractMessage(body: unknown, rawText: string, status: number): string {
  if (isRecord(body) && typeof body.error === 'string' && body.error) {
    return body.error;
  }
  return rawText || `HTTP ${status}`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
