import type { MetricSample, SubmissionBatch, SubmissionInput } from './types';

/**
 * Convert either submission form into the canonical batch sent on the wire.
 *
 * Sizes and key lengths are not checked here; the server decides which items
 * it accepts.
 */
export function normalizeSubmission(input: SubmissionInput): SubmissionBatch {
  if (isSampleList(input)) {
    return input.map(copySample);
  }
  if (isMetricEntries(input)) {
    return Array.from(input, ([key, value]) => ({ key, value }));
  }
  return Object.entries(input).map(([key, value]) => ({ key, value }));
}

function isSampleList(input: SubmissionInput): input is readonly MetricSample[] {
  return Array.isArray(input);
}

function isMetricEntries(input: SubmissionInput): input is ReadonlyMap<string, number> {
  return input instanceof Map;
}

function copySample(sample: MetricSample): MetricSample {
  const { key, value, metadata } = sample;
  return metadata === undefined ? { key, value } : { key, value, metadata };
}
