// utils/config.ts
import { z } from 'zod';
import { CONSTANTS } from './constants';
import { isIsoDate } from './helpers';
import { ConfigError } from './AppError';

const isoDate = z.string().refine(isIsoDate, 'Expected a YYYY-MM-DD date');

const positiveNumber = (fallback: string) =>
  z.string().default(fallback).transform(Number).pipe(z.number().positive());

const positiveInt = (fallback: string) =>
  z.string().default(fallback).transform(Number).pipe(z.number().int().positive());

// Define the schema for our environment variables
const envSchema = z.object({
  PORT: positiveInt('3001'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Remote metrics service
  METRICS_BASE_URL: z.string().url().default('http://localhost:8000'),
  METRICS_API_TOKEN: z.string().optional(),
  METRICS_TIMEOUT: positiveNumber('60'), // seconds
  METRICS_MAX_TIMEOUT: positiveNumber('120'), // seconds
  METRICS_MAX_ATTEMPTS: positiveInt(String(CONSTANTS.RETRY.MAX_ATTEMPTS)),
  METRICS_BACKOFF_BASE_MS: positiveInt(String(CONSTANTS.RETRY.BASE_DELAY_MS)),
  METRICS_BACKOFF_MAX_MS: positiveInt(String(CONSTANTS.RETRY.MAX_DELAY_MS)),
  METRICS_CACHE_TTL_MS: positiveInt(String(CONSTANTS.CACHE.TTL_MS)),
  METRICS_MIN_DATE: isoDate.default(CONSTANTS.METRICS.MIN_DATE),
  METRICS_MAX_DATE: isoDate.optional(), // Rolling "today" when unset

  // Batch analysis
  ANALYSIS_PACING_MS: z.string().default(String(CONSTANTS.ANALYSIS.PACING_MS)).transform(Number).pipe(z.number().int().min(0)),
  ALERT_THRESHOLD: positiveNumber(String(CONSTANTS.STATS.ALERT_THRESHOLD)),

  // Rate Limiting
  RATE_LIMIT_WINDOW_MS: positiveInt(String(CONSTANTS.RATE_LIMIT.WINDOW_MS)),
  RATE_LIMIT_MAX_API: positiveInt(String(CONSTANTS.RATE_LIMIT.API_MAX_REQUESTS)),

  CORS_ORIGINS: z.string().default(''),
});

export interface MetricsServiceConfig {
  baseUrl: string;
  apiToken?: string;
  timeoutMs: number;
  maxTimeoutMs: number;
  timeoutPerDayMs: number;
  minDate: string;
  maxDate?: string;
  window: number;
  percentileWindow: number;
}

export interface AppConfig {
  port: number;
  env: 'development' | 'production' | 'test';
  isProduction: boolean;
  corsOrigins: string[];
  metrics: MetricsServiceConfig;
  retry: {
    maxAttempts: number;
    baseDelayMs: number;
    maxDelayMs: number;
    jitterMs: number;
  };
  cache: {
    ttlMs: number;
    maxEntries: number;
  };
  analysis: {
    pacingMs: number;
    alertThreshold: number;
  };
  rateLimit: {
    windowMs: number;
    maxApi: number;
  };
}

const getCorsOrigins = (raw: string): string[] => {
  const origins = raw.split(',').map(s => s.trim()).filter(Boolean);
  return Array.from(new Set(origins));
};

/**
 * Validates an environment map and builds the typed application config.
 * Throws ConfigError listing every invalid variable.
 */
export const loadConfig = (source: NodeJS.ProcessEnv = process.env): AppConfig => {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError('Invalid Environment Configuration', issues);
  }

  const env = result.data;

  return {
    port: env.PORT,
    env: env.NODE_ENV,
    isProduction: env.NODE_ENV === 'production',
    corsOrigins: getCorsOrigins(env.CORS_ORIGINS),

    metrics: {
      baseUrl: env.METRICS_BASE_URL.replace(/\/+$/, ''),
      apiToken: env.METRICS_API_TOKEN?.trim() || undefined,
      timeoutMs: env.METRICS_TIMEOUT * 1000,
      maxTimeoutMs: Math.max(env.METRICS_MAX_TIMEOUT, env.METRICS_TIMEOUT) * 1000,
      timeoutPerDayMs: CONSTANTS.METRICS.TIMEOUT_PER_DAY_MS,
      minDate: env.METRICS_MIN_DATE,
      maxDate: env.METRICS_MAX_DATE,
      window: CONSTANTS.METRICS.BASELINE_WINDOW,
      percentileWindow: CONSTANTS.METRICS.PERCENTILE_WINDOW,
    },

    retry: {
      maxAttempts: env.METRICS_MAX_ATTEMPTS,
      baseDelayMs: env.METRICS_BACKOFF_BASE_MS,
      maxDelayMs: Math.max(env.METRICS_BACKOFF_MAX_MS, env.METRICS_BACKOFF_BASE_MS),
      jitterMs: CONSTANTS.RETRY.JITTER_MS,
    },

    cache: {
      ttlMs: env.METRICS_CACHE_TTL_MS,
      maxEntries: CONSTANTS.CACHE.MAX_ENTRIES,
    },

    analysis: {
      pacingMs: env.ANALYSIS_PACING_MS,
      alertThreshold: env.ALERT_THRESHOLD,
    },

    rateLimit: {
      windowMs: env.RATE_LIMIT_WINDOW_MS,
      maxApi: env.RATE_LIMIT_MAX_API,
    },
  };
};
