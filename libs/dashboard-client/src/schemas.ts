import { z } from 'zod';

/**
 * Response schemas for the dashboard API.
 *
 * Objects pass unknown fields through untouched. Collection and counter fields
 * default to empty/zero when the server omits them. Envelopes that can arrive
 * as an empty success body (health, prune, the OpenAPI document) accept `{}`.
 */

export const trendPeriodSchema = z.enum(['24h', '7d', '30d', '90d']);

export const alertLevelSchema = z.enum(['alert', 'hot']);

const nullableNumber = z.number().nullable().default(null);

export const trendWindowSchema = z
  .object({
    start: nullableNumber,
    end: nullableNumber,
    change: nullableNumber,
    pct: nullableNumber,
  })
  .passthrough();

export const trendsSchema = z
  .object({
    '24h': trendWindowSchema,
    '7d': trendWindowSchema,
    '30d': trendWindowSchema,
    '90d': trendWindowSchema,
  })
  .passthrough();

export const statSummarySchema = z
  .object({
    key: z.string(),
    label: z.string(),
    current: z.number(),
    trends: trendsSchema,
    sparkline_24h: z.array(z.number()).default([]),
    last_updated: z.string(),
  })
  .passthrough();

export const historyPointSchema = z
  .object({
    value: z.number(),
    recorded_at: z.string(),
  })
  .passthrough();

export const alertEventSchema = z
  .object({
    key: z.string(),
    label: z.string(),
    level: alertLevelSchema,
    value: z.number(),
    change_pct: z.number(),
    triggered_at: z.string(),
  })
  .passthrough();

export const healthStatusSchema = z
  .object({
    status: z.string().optional(),
    version: z.string().optional(),
    stats_count: z.number().int().default(0),
    keys_count: z.number().int().default(0),
    retention_days: z.number().int().optional(),
    oldest_stat: z.string().nullable().default(null),
  })
  .passthrough();

export const statsResponseSchema = z
  .object({
    stats: z.array(statSummarySchema).default([]),
  })
  .passthrough();

export const historyResponseSchema = z
  .object({
    key: z.string().optional(),
    points: z.array(historyPointSchema).default([]),
  })
  .passthrough();

export const submitResponseSchema = z
  .object({
    accepted: z.number().int().default(0),
  })
  .passthrough();

export const deleteResponseSchema = z
  .object({
    key: z.string().optional(),
    deleted: z.number().int().default(0),
  })
  .passthrough();

export const pruneResultSchema = z
  .object({
    deleted: z.number().int().default(0),
    retention_days: z.number().int().optional(),
    remaining: z.number().int().default(0),
  })
  .passthrough();

export const alertsPageSchema = z
  .object({
    alerts: z.array(alertEventSchema).default([]),
    total: z.number().int().default(0),
  })
  .passthrough();

export const openApiDocumentSchema = z
  .object({
    openapi: z.string().optional(),
  })
  .passthrough();

/** Skill files are listed either as bare paths or as `{ path }` records. */
export const skillFileSchema = z
  .object({
    path: z.string(),
  })
  .passthrough();

export const skillDescriptorSchema = z
  .object({
    name: z.string(),
    description: z.string().optional(),
    files: z.array(z.union([z.string(), skillFileSchema])).default([]),
  })
  .passthrough();

export const skillsIndexSchema = z
  .object({
    skills: z.array(skillDescriptorSchema).default([]),
  })
  .passthrough();
