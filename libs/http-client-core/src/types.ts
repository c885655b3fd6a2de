export interface Logger {
  debug?(message: string, meta?: unknown): void;
  info?(message: string, meta?: unknown): void;
  warn?(message: string, meta?: unknown): void;
  error?(message: string, meta?: unknown): void;
}

export interface RequestMetricsInfo {
  client: string;
  operation: string;
  method: string;
  durationMs: number;
  /** HTTP status, or 0 when no response was obtained. */
  status: number;
}

export interface MetricsSink {
  recordRequest?(info: RequestMetricsInfo): void | Promise<void>;
}

/** Fetch-compatible function the clients send requests through. */
export interface HttpTransport {
  (url: string, init: RequestInit): Promise<Response>;
}
