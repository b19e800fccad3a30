import { describe, it, expect } from 'vitest';
import { loadConfig } from '../config';
import { ConfigError } from '../AppError';

describe('loadConfig', () => {
    it('applies defaults to an empty environment', () => {
        const config = loadConfig({});

        expect(config.port).toBe(3001);
        expect(config.env).toBe('development');
        expect(config.metrics).toMatchObject({
            baseUrl: 'http://localhost:8000',
            apiToken: undefined,
            timeoutMs: 60000,
            maxTimeoutMs: 120000,
            minDate: '2024-09-01',
            maxDate: undefined,
        });
        expect(config.retry).toEqual({ maxAttempts: 3, baseDelayMs: 1000, maxDelayMs: 8000, jitterMs: 250 });
        expect(config.cache.ttlMs).toBe(300000);
        expect(config.analysis).toEqual({ pacingMs: 500, alertThreshold: 1 });
        expect(config.corsOrigins).toEqual([]);
    });

    it('normalises url, token and origins', () => {
        const config = loadConfig({
            METRICS_BASE_URL: 'https://metrics.example.test/api//',
            METRICS_API_TOKEN: '  test-secret  ',
            METRICS_TIMEOUT: '30',
            CORS_ORIGINS: 'http://a.test, http://b.test,http://a.test',
            NODE_ENV: 'production',
        });

        expect(config.metrics.baseUrl).toBe('https://metrics.example.test/api');
        expect(config.metrics.apiToken).toBe('test-secret');
        expect(config.metrics.timeoutMs).toBe(30000);
        expect(config.corsOrigins).toEqual(['http://a.test', 'http://b.test']);
        expect(config.isProduction).toBe(true);
    });

    it('treats a blank token as absent', () => {
        expect(loadConfig({ METRICS_API_TOKEN: '   ' }).metrics.apiToken).toBeUndefined();
    });

    it('lists every invalid variable', () => {
        try {
            loadConfig({ METRICS_MAX_ATTEMPTS: '0', METRICS_MAX_DATE: '2025-02-30' });
            expect.unreachable('loadConfig should throw');
        } catch (error) {
            expect(error).toBeInstanceOf(ConfigError);
            if (!(error instanceof ConfigError)) return;
            expect(error.issues).toHaveLength(2);
            expect(error.issues.some(i => i.startsWith('METRICS_MAX_ATTEMPTS:'))).toBe(true);
            expect(error.issues.some(i => i.startsWith('METRICS_MAX_DATE:'))).toBe(true);
        }
    });
});
