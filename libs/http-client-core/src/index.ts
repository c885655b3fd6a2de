export type { HttpTransport, Logger, MetricsSink, RequestMetricsInfo } from './types';
