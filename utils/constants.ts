// utils/constants.ts

export const ONE_SECOND = 1000;
export const ONE_MINUTE = 60 * ONE_SECOND;
export const FIFTEEN_MINUTES = 15 * ONE_MINUTE;
export const ONE_DAY_MS = 24 * 60 * ONE_MINUTE;

// --- CENTRAL CONFIGURATION ---
export const CONSTANTS = {
  // Remote metrics service
  METRICS: {
    TIMEOUT_MS: 60 * ONE_SECOND,
    MAX_TIMEOUT_MS: 120 * ONE_SECOND,
    TIMEOUT_PER_DAY_MS: 500, // Larger ranges take longer server-side
    MIN_DATE: '2024-09-01',
    BASELINE_WINDOW: 60,
    PERCENTILE_WINDOW: 365,
    USER_AGENT: 'NarrativeMonitor/1.0',
  },

  // Retry Policy (attempt k waits base * 2^(k-1) + jitter, capped)
  RETRY: {
    MAX_ATTEMPTS: 3,
    BASE_DELAY_MS: ONE_SECOND,
    MAX_DELAY_MS: 8 * ONE_SECOND,
    JITTER_MS: 250,
  },

  // Cache Settings
  CACHE: {
    TTL_MS: 5 * ONE_MINUTE,
    MAX_ENTRIES: 256,
  },

  // Batch Analysis
  ANALYSIS: {
    PACING_MS: 500,
  },

  // Statistics
  STATS: {
    HORIZONS: [1, 2, 5, 10, 20] as const,
    ALERT_THRESHOLD: 1.0,
    ZSCORE_WINDOW: 60,
    ZSCORE_MIN_OBSERVATIONS: 10,
    ZSCORE_EPSILON: 0.25, // Same std-dev floor the remote service applies
    PERCENTILE_WINDOW_DAYS: 365,
    PERCENTILE_MIN_SAMPLES: 20,
  },

  // Alert scan
  ALERTS: {
    TOP_NARRATIVES: 10,
  },

  // Rate Limiting
  RATE_LIMIT: {
    WINDOW_MS: FIFTEEN_MINUTES,
    API_MAX_REQUESTS: 150,
  },
};

export const DATE_PERIODS = ['30d', '90d', '180d', '365d', 'custom'] as const;
export type DatePeriod = typeof DATE_PERIODS[number];
