// services/metricsClient.ts
import {
    FetchOutcome,
    IFetchFailure,
    IFetchFailureOutcome,
    IFetchHooks,
    IFetchSuccess,
    IMetricsRequest,
} from '../types';
import { IMetricsProvider, MetricsProviderError } from './metrics/IMetricsProvider';
import defaultCatalog, { NarrativeCatalog } from './narrativeCatalog';
import { hasOrderViolation, validateSeries } from './metricsEngine';
import TtlCache from '../utils/TtlCache';
import { DEFAULT_RETRY_POLICY, RetryPolicy, executeWithRetry } from '../utils/RetryPolicy';
import { CONSTANTS } from '../utils/constants';
import { daysBetween, errorMessage, parseIsoDate, sleep as defaultSleep, todayIso } from '../utils/helpers';
import type { MetricsServiceConfig } from '../utils/config';
import logger from '../utils/logger';

export type MetricsClientSettings = Omit<MetricsServiceConfig, 'baseUrl' | 'apiToken'>;

export const DEFAULT_CLIENT_SETTINGS: MetricsClientSettings = {
    timeoutMs: CONSTANTS.METRICS.TIMEOUT_MS,
    maxTimeoutMs: CONSTANTS.METRICS.MAX_TIMEOUT_MS,
    timeoutPerDayMs: CONSTANTS.METRICS.TIMEOUT_PER_DAY_MS,
    minDate: CONSTANTS.METRICS.MIN_DATE,
    window: CONSTANTS.METRICS.BASELINE_WINDOW,
    percentileWindow: CONSTANTS.METRICS.PERCENTILE_WINDOW,
};

export interface MetricsClientOptions {
    provider: IMetricsProvider;
    catalog?: NarrativeCatalog;
    settings?: Partial<MetricsClientSettings>;
    retry?: Partial<RetryPolicy>;
    cache?: { ttlMs?: number; maxEntries?: number };
    now?: () => number;
    sleep?: (ms: number) => Promise<void>;
    random?: () => number;
}

/**
 * Longer ranges take longer to compute server-side: base + perDay * days, capped.
 */
export const effectiveTimeoutMs = (
    startDate: string,
    endDate: string,
    settings: Pick<MetricsClientSettings, 'timeoutMs' | 'maxTimeoutMs' | 'timeoutPerDayMs'>
): number => {
    const days = Math.max(0, daysBetween(startDate, endDate));
    return Math.min(settings.maxTimeoutMs, settings.timeoutMs + days * settings.timeoutPerDayMs);
};

const toFetchFailure = (thrown: unknown): IFetchFailure => {
    if (thrown instanceof MetricsProviderError) {
        return { kind: thrown.kind, message: thrown.message, statusCode: thrown.statusCode };
    }
    return { kind: 'Unexpected', message: errorMessage(thrown) };
};

// Each outcome owns its series; the cache keeps a private copy
const copyOutcome = (outcome: IFetchSuccess): IFetchSuccess => ({
    ...outcome,
    series: { ...outcome.series, points: outcome.series.points.map(point => ({ ...point })) },
    violations: outcome.violations.map(violation => ({ ...violation })),
});

const cacheKey = (request: Required<IMetricsRequest>): string =>
    JSON.stringify([request.narrativeId, request.startDate, request.endDate, request.window, request.percentileWindow]);

const failure = (narrativeId: string, error: IFetchFailure, attempts: number): IFetchFailureOutcome => ({
    status: 'failure',
    narrativeId,
    error,
    attempts,
});

/**
 * Fetches per-narrative metric series with a TTL cache, retries and exponential backoff.
 * `fetch` is total: every problem comes back as a failure outcome, never as a rejection.
 */
export class MetricsClient {
    private readonly provider: IMetricsProvider;
    private readonly catalog: NarrativeCatalog;
    private readonly settings: MetricsClientSettings;
    private readonly retryPolicy: RetryPolicy;
    private readonly cache: TtlCache<IFetchSuccess>;
    private readonly inFlight = new Map<string, Promise<FetchOutcome>>();
    private readonly now: () => number;
    private readonly sleep: (ms: number) => Promise<void>;
    private readonly random: () => number;

    constructor(options: MetricsClientOptions) {
        this.provider = options.provider;
        this.catalog = options.catalog ?? defaultCatalog;
        this.settings = { ...DEFAULT_CLIENT_SETTINGS, ...options.settings };
        this.retryPolicy = { ...DEFAULT_RETRY_POLICY, ...options.retry };
        this.now = options.now ?? Date.now;
        this.sleep = options.sleep ?? ((ms: number) => defaultSleep(ms));
        this.random = options.random ?? Math.random;
        this.cache = new TtlCache<IFetchSuccess>({
            ttlMs: options.cache?.ttlMs ?? CONSTANTS.CACHE.TTL_MS,
            maxEntries: options.cache?.maxEntries ?? CONSTANTS.CACHE.MAX_ENTRIES,
            now: this.now,
        });
    }

    async fetch(request: IMetricsRequest, hooks: IFetchHooks = {}): Promise<FetchOutcome> {
        try {
            return await this.fetchOutcome(request, hooks);
        } catch (error: unknown) {
            // Last line of defence; the contract is that fetch never rejects
            logger.error(`🔥 Unexpected failure fetching '${request.narrativeId}': ${errorMessage(error)}`);
            return failure(request.narrativeId, { kind: 'Unexpected', message: errorMessage(error) }, 0);
        }
    }

    /**
     * Drops every cached series. Requests already in flight still complete
     * (and may repopulate the cache); new requests never join them.
     */
    invalidateAll(): number {
        const cleared = this.cache.size;
        this.cache.clear();
        this.inFlight.clear();
        logger.info(`🧹 Metrics cache cleared (${cleared} entries)`);
        return cleared;
    }

    // True when `fetch(request)` would be answered without a backend call
    isCached(request: IMetricsRequest): boolean {
        return this.cache.has(cacheKey(this.withDefaults(request)));
    }

    get cacheSize(): number {
        return this.cache.size;
    }

    get maxAttempts(): number {
        return this.retryPolicy.maxAttempts;
    }

    // Effective upper bound of the supported date domain
    get latestAvailableDate(): string {
        return this.settings.maxDate ?? todayIso(this.now());
    }

    private withDefaults(request: IMetricsRequest): Required<IMetricsRequest> {
        return {
            narrativeId: request.narrativeId,
            startDate: request.startDate,
            endDate: request.endDate,
            window: request.window ?? this.settings.window,
            percentileWindow: request.percentileWindow ?? this.settings.percentileWindow,
        };
    }

    private async fetchOutcome(request: IMetricsRequest, hooks: IFetchHooks): Promise<FetchOutcome> {
        const { narrativeId, startDate, endDate } = request;

        // 1. Local checks (never retried, no remote call)
        if (!this.catalog.has(narrativeId)) {
            return failure(narrativeId, { kind: 'NotFound', message: `Unknown narrative: "${narrativeId}"` }, 0);
        }

        if (parseIsoDate(startDate) === null || parseIsoDate(endDate) === null) {
            return failure(narrativeId, {
                kind: 'ClientError',
                message: `Dates must be YYYY-MM-DD (got ${startDate} .. ${endDate})`,
            }, 0);
        }
        if (startDate > endDate) {
            return failure(narrativeId, {
                kind: 'ClientError',
                message: `startDate ${startDate} is after endDate ${endDate}`,
            }, 0);
        }

        const { minDate } = this.settings;
        const maxDate = this.latestAvailableDate;
        if (endDate < minDate || startDate > maxDate) {
            return failure(narrativeId, {
                kind: 'OutOfRange',
                message: `Range ${startDate} .. ${endDate} is outside the supported range ${minDate} .. ${maxDate}`,
            }, 0);
        }

        const full = this.withDefaults(request);
        const key = cacheKey(full);

        // 2. Cache
        const cached = this.cache.get(key);
        if (cached) {
            logger.debug(`⚡ Cache hit for '${narrativeId}' ${startDate} .. ${endDate}`);
            return { ...copyOutcome(cached), attempts: 0, fromCache: true };
        }

        // 3. Share an identical request that is already running
        const pending = this.inFlight.get(key);
        if (pending) return pending.then(shared => (shared.status === 'success' ? copyOutcome(shared) : shared));

        const remote = this.fetchRemote(full, key, hooks);
        this.inFlight.set(key, remote);
        try {
            return await remote;
        } finally {
            if (this.inFlight.get(key) === remote) this.inFlight.delete(key);
        }
    }

    private async fetchRemote(request: Required<IMetricsRequest>, key: string, hooks: IFetchHooks): Promise<FetchOutcome> {
        const { narrativeId } = request;
        const timeoutMs = effectiveTimeoutMs(request.startDate, request.endDate, this.settings);

        const result = await executeWithRetry(
            () => this.provider.fetchMetrics(request, { timeoutMs }),
            {
                policy: this.retryPolicy,
                isTransient: (error: IFetchFailure) => error.kind === 'Transient',
                toError: toFetchFailure,
                sleep: this.sleep,
                random: this.random,
                onAttempt: (attempt, maxAttempts) => {
                    logger.info(`🔄 Attempt ${attempt}/${maxAttempts} for '${narrativeId}'`);
                    hooks.onAttempt?.(attempt, maxAttempts);
                },
                onRetry: (attempt, delayMs, error) => {
                    logger.warn(`⏳ '${narrativeId}' failed (${error.message}). Retrying in ${delayMs}ms (attempt ${attempt}).`);
                },
            }
        );

        if (!result.ok) {
            const reason = result.exhausted ? `after ${result.attempts} attempt(s)` : '(not retried)';
            logger.warn(`❌ ${result.error.kind} fetching '${narrativeId}' ${reason}: ${result.error.message}`);
            return failure(narrativeId, result.error, result.attempts);
        }

        const points = result.value;
        const violations = validateSeries(points);

        if (hasOrderViolation(violations)) {
            const first = violations.find(v => v.kind === 'DATE_ORDER');
            return failure(narrativeId, {
                kind: 'InvalidResponse',
                message: `Series for '${narrativeId}' is not strictly increasing by date: ${first?.message ?? 'order violation'}`,
            }, result.attempts);
        }

        if (violations.length > 0) {
            logger.warn(`⚠️ '${narrativeId}' series has ${violations.length} contract violation(s); first: ${violations[0].message}`);
        }

        const outcome: IFetchSuccess = {
            status: 'success',
            narrativeId,
            series: {
                narrativeId,
                startDate: request.startDate,
                endDate: request.endDate,
                points,
            },
            attempts: result.attempts,
            fromCache: false,
            violations,
        };

        this.cache.set(key, copyOutcome(outcome));
        logger.debug(`✅ Fetched ${points.length} points for '${narrativeId}' in ${result.attempts} attempt(s)`);
        return outcome;
    }
}

export default MetricsClient;
