/**
 * Runtime configuration.
 * Pipeline tuning lives in explicit structs handed to the services that use
 * them; deployment settings are read from the environment and validated
 * with zod at startup.
 */

import { z } from 'zod';
import { ConfigurationError } from './errors.js';

// ── Pipeline tuning ──

export interface RecencyBucket {
  /** Inclusive upper bound in days since publish. */
  maxDays: number;
  score: number;
}

export interface ScoringWeights {
  rating: number;
  topic: number;
  recency: number;
}

export interface PipelineConfig {
  weights: ScoringWeights;
  dualSourceBonus: number;
  /** Rating component used when a candidate has no rated source. */
  neutralRatingScore: number;
  /** Topic component used when the user has no topics. */
  neutralTopicScore: number;
  recencyBuckets: RecencyBucket[];
  /** Recency score for anything older than the last bucket. */
  recencyFloor: number;
  defaultThreshold: number;
  maxPendingSuggestions: number;
  maxSuggestionsPerRequest: number;
  expiryDays: number;
  lookbackDays: number;
  maxResultsPerSource: number;
  maxResultsPerTopic: number;
}

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = {
  weights: { rating: 0.6, topic: 0.25, recency: 0.15 },
  dualSourceBonus: 1.0,
  neutralRatingScore: 6.0,
  neutralTopicScore: 5.0,
  recencyBuckets: [
    { maxDays: 1, score: 10 },
    { maxDays: 3, score: 8 },
    { maxDays: 7, score: 6 },
    { maxDays: 14, score: 4 },
    { maxDays: 30, score: 2 },
  ],
  recencyFloor: 1,
  defaultThreshold: 5.0,
  maxPendingSuggestions: 1000,
  maxSuggestionsPerRequest: 50,
  expiryDays: 30,
  lookbackDays: 30,
  maxResultsPerSource: 50,
  maxResultsPerTopic: 25,
};

/** Highest total a single candidate can reach under `config`. */
export function maxPossibleScore(config: PipelineConfig): number {
  const top = Math.max(
    config.neutralRatingScore,
    config.neutralTopicScore,
    ...config.recencyBuckets.map((b) => b.score),
    config.recencyFloor,
    10
  );
  const { rating, topic, recency } = config.weights;
  return top * (rating + topic + recency) + config.dualSourceBonus;
}

// ── Video platform client ──

export interface VideoApiConfig {
  apiKey: string;
  baseUrl: string;
  dailyQuotaLimit: number;
  nearLimitFraction: number;
  criticalFraction: number;
  maxConcurrentRequests: number;
  requestTimeoutMs: number;
  cacheTtlMs: number;
  searchCacheCapacity: number;
  detailCacheCapacity: number;
  detailBatchSize: number;
  searchCost: number;
  detailCost: number;
}

export const DEFAULT_VIDEO_API_CONFIG: Omit<VideoApiConfig, 'apiKey'> = {
  baseUrl: 'https://www.googleapis.com/youtube/v3',
  dailyQuotaLimit: 10_000,
  nearLimitFraction: 0.8,
  criticalFraction: 0.95,
  maxConcurrentRequests: 3,
  requestTimeoutMs: 30_000,
  cacheTtlMs: 15 * 60 * 1000,
  searchCacheCapacity: 100,
  detailCacheCapacity: 500,
  detailBatchSize: 50,
  searchCost: 100,
  detailCost: 1,
};

// ── Environment ──

const EnvSchema = z.object({
  SUPABASE_URL: z.string().url(),
  SUPABASE_SERVICE_ROLE_KEY: z.string().min(1),
  YOUTUBE_API_KEY: z.string().min(1),
  YOUTUBE_DAILY_QUOTA: z.coerce.number().int().positive().optional(),
  AXIOM_API_KEY: z.string().optional(),
  AXIOM_DATASET: z.string().optional(),
  SCHEDULER_RETRY_BACKOFF_MS: z.coerce.number().int().positive().optional(),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional(),
});

export interface AppConfig {
  supabaseUrl: string;
  supabaseServiceRoleKey: string;
  videoApi: VideoApiConfig;
  pipeline: PipelineConfig;
  axiom: { apiToken: string; dataset: string } | null;
  schedulerRetryBackoffMs: number;
  logLevel: 'debug' | 'info' | 'warn' | 'error';
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const keys = parsed.error.issues.map((issue) => issue.path.join('.'));
    throw new ConfigurationError(
      `Invalid or missing environment variables: ${keys.join(', ')}`,
      { keys }
    );
  }

  const vars = parsed.data;
  return {
    supabaseUrl: vars.SUPABASE_URL,
    supabaseServiceRoleKey: vars.SUPABASE_SERVICE_ROLE_KEY,
    videoApi: {
      ...DEFAULT_VIDEO_API_CONFIG,
      apiKey: vars.YOUTUBE_API_KEY,
      dailyQuotaLimit: vars.YOUTUBE_DAILY_QUOTA ?? DEFAULT_VIDEO_API_CONFIG.dailyQuotaLimit,
    },
    pipeline: DEFAULT_PIPELINE_CONFIG,
    axiom:
      vars.AXIOM_API_KEY && vars.AXIOM_DATASET
        ? { apiToken: vars.AXIOM_API_KEY, dataset: vars.AXIOM_DATASET }
        : null,
    schedulerRetryBackoffMs: vars.SCHEDULER_RETRY_BACKOFF_MS ?? 5 * 60 * 1000,
    logLevel: vars.LOG_LEVEL ?? 'info',
  };
}
