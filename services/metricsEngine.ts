// services/metricsEngine.ts
//
// Pure statistics over one metric series. Nothing here performs I/O or keeps state,
// so recomputing on identical input always yields identical numbers.
//
// The remote service already reports intensity z-scores and percentiles; these functions
// follow the same methodology for local recomputation but are not guaranteed to reproduce
// the server's values bit for bit.
import {
    EngineResult,
    HorizonMove,
    IAlert,
    IHorizonAlert,
    IMetricPoint,
    IMetricSeries,
    ISeriesViolation,
    NumericField,
} from '../types';
import { CONSTANTS, ONE_DAY_MS } from '../utils/constants';
import { addDays, parseIsoDate } from '../utils/helpers';

type SeriesInput = IMetricSeries | readonly IMetricPoint[];

const pointsOf = (series: SeriesInput): readonly IMetricPoint[] =>
    'points' in series ? series.points : series;

export const readField = (point: IMetricPoint, field: NumericField): number | null => {
    const value = point[field];
    return typeof value === 'number' && Number.isFinite(value) ? value : null;
};

// Binary search; falls back to a linear scan if the input is not sorted
export const indexOfDate = (points: readonly IMetricPoint[], date: string): number => {
    let lo = 0;
    let hi = points.length - 1;
    while (lo <= hi) {
        const mid = (lo + hi) >> 1;
        const current = points[mid].date;
        if (current === date) return mid;
        if (current < date) lo = mid + 1;
        else hi = mid - 1;
    }
    return points.findIndex(p => p.date === date);
};

const dateNotFound = <T>(date: string): EngineResult<T> => ({
    ok: false,
    error: { kind: 'DateNotFound', message: `No observation dated ${date} in series` },
});

const insufficient = <T>(message: string, required: number, available: number): EngineResult<T> => ({
    ok: false,
    error: { kind: 'InsufficientData', message, required, available },
});

// --- Z-Score ---

export interface ZScoreOptions {
    window?: number;
    minObservations?: number;
    field?: NumericField;
    epsilon?: number;
    // Include the scored observation in its own baseline
    includeDate?: boolean;
}

export interface ZScoreValue {
    z: number;
    value: number;
    mean: number;
    std: number;
    observations: number;
}

/**
 * Standard score of `field` at `date` against a trailing baseline.
 * Baseline = the `window` observations before `date` (or ending at it with includeDate),
 * sample standard deviation, denominator floored at `epsilon`.
 */
export const zScore = (series: SeriesInput, date: string, options: ZScoreOptions = {}): EngineResult<ZScoreValue> => {
    const {
        window = CONSTANTS.STATS.ZSCORE_WINDOW,
        minObservations = CONSTANTS.STATS.ZSCORE_MIN_OBSERVATIONS,
        field = 'articleCount',
        epsilon = CONSTANTS.STATS.ZSCORE_EPSILON,
        includeDate = false,
    } = options;

    const points = pointsOf(series);
    const idx = indexOfDate(points, date);
    if (idx === -1) return dateNotFound(date);

    const value = readField(points[idx], field);
    const required = Math.max(2, minObservations);
    if (value === null) {
        return insufficient(`No ${field} value on ${date}`, required, 0);
    }

    const end = includeDate ? idx + 1 : idx;
    const start = Math.max(0, end - window);
    const baseline: number[] = [];
    for (let i = start; i < end; i++) {
        const v = readField(points[i], field);
        if (v !== null) baseline.push(v);
    }

    if (baseline.length < required) {
        return insufficient(
            `Baseline for ${date} has ${baseline.length} observations, needs ${required}`,
            required,
            baseline.length
        );
    }

    // Two-pass mean/variance keeps the result independent of accumulation order drift
    let sum = 0;
    for (const v of baseline) sum += v;
    const mean = sum / baseline.length;

    let squares = 0;
    for (const v of baseline) squares += (v - mean) ** 2;
    const std = Math.sqrt(squares / (baseline.length - 1));

    return {
        ok: true,
        value: {
            z: (value - mean) / Math.max(std, epsilon),
            value,
            mean,
            std,
            observations: baseline.length,
        },
    };
};

// --- Rolling Percentile ---

export interface PercentileOptions {
    windowDays?: number;
    minSamples?: number;
}

export interface PercentileValue {
    percentile: number; // 0-100
    rank: number; // Average rank, 1-based
    samples: number;
}

/**
 * Percentile rank of `field` at `date` among the values dated within the trailing
 * `windowDays` calendar days (inclusive of `date`). Ties share their average rank,
 * so the maximum scores 100 and the result never drops below 100 / n.
 */
export const rollingPercentile = (
    series: SeriesInput,
    date: string,
    field: NumericField = 'intensityZ',
    options: PercentileOptions = {}
): EngineResult<PercentileValue> => {
    const {
        windowDays = CONSTANTS.STATS.PERCENTILE_WINDOW_DAYS,
        minSamples = CONSTANTS.STATS.PERCENTILE_MIN_SAMPLES,
    } = options;

    const points = pointsOf(series);
    const idx = indexOfDate(points, date);
    if (idx === -1) return dateNotFound(date);

    const target = readField(points[idx], field);
    const required = Math.max(1, minSamples);
    if (target === null) {
        return insufficient(`No ${field} value on ${date}`, required, 0);
    }

    const windowStart = addDays(date, -(Math.max(1, windowDays) - 1));
    let less = 0;
    let equal = 0;
    let samples = 0;

    for (const point of points) {
        if (point.date < windowStart || point.date > date) continue;
        const v = readField(point, field);
        if (v === null) continue;
        samples++;
        if (v < target) less++;
        else if (v === target) equal++;
    }

    if (samples < required) {
        return insufficient(
            `Percentile window for ${date} has ${samples} samples, needs ${required}`,
            required,
            samples
        );
    }

    const rank = less + (equal + 1) / 2;
    return {
        ok: true,
        value: { percentile: (100 * rank) / samples, rank, samples },
    };
};

// --- Horizon Moves ---

/**
 * intensityZ(date) - intensityZ(h observations earlier) for each horizon.
 * Offsets count series entries (trading days), not calendar days.
 */
export const horizonMoves = (
    series: SeriesInput,
    date: string,
    horizons: readonly number[] = CONSTANTS.STATS.HORIZONS
): HorizonMove[] => {
    const points = pointsOf(series);
    const idx = indexOfDate(points, date);

    return horizons.map((horizon): HorizonMove => {
        if (!Number.isInteger(horizon) || horizon < 1) {
            return { horizon, status: 'undefined', reason: 'INVALID_HORIZON' };
        }
        if (idx === -1) {
            return { horizon, status: 'undefined', reason: 'TARGET_MISSING' };
        }

        const lookback = idx - horizon;
        if (lookback < 0) {
            return { horizon, status: 'undefined', reason: 'LOOKBACK_MISSING' };
        }

        const today = points[idx];
        const earlier = points[lookback];
        return {
            horizon,
            status: 'defined',
            move: today.intensityZ - earlier.intensityZ,
            fromDate: earlier.date,
            toDate: today.date,
        };
    });
};

// --- Alerts ---

export const detectAlerts = (
    moves: Iterable<HorizonMove>,
    threshold: number = CONSTANTS.STATS.ALERT_THRESHOLD
): IHorizonAlert[] => {
    if (!Number.isFinite(threshold) || threshold < 0) {
        throw new RangeError(`Alert threshold must be a non-negative number, got ${threshold}`);
    }

    const alerts: IHorizonAlert[] = [];
    for (const move of moves) {
        if (move.status !== 'defined') continue;
        const absMove = Math.abs(move.move);
        if (absMove > threshold) {
            alerts.push({ horizon: move.horizon, move: move.move, absMove, threshold });
        }
    }
    return alerts;
};

export const toAlerts = (
    narrativeId: string,
    date: string,
    moves: Iterable<HorizonMove>,
    threshold: number = CONSTANTS.STATS.ALERT_THRESHOLD
): IAlert[] => detectAlerts(moves, threshold).map(alert => ({ narrativeId, date, ...alert }));

// --- Data Contract Checks ---

const inRange = (value: number, min: number, max: number) => value >= min && value <= max;

/**
 * Reports every place the series breaks its contract. Values are never clamped.
 */
export const validateSeries = (series: SeriesInput): ISeriesViolation[] => {
    const points = pointsOf(series);
    const violations: ISeriesViolation[] = [];
    let previous: { date: string; ms: number } | null = null;

    for (const point of points) {
        const ms = parseIsoDate(point.date);
        if (ms === null) {
            violations.push({ kind: 'DATE_ORDER', date: point.date, message: `Unparseable date "${point.date}"` });
            continue;
        }

        if (previous) {
            if (ms <= previous.ms) {
                violations.push({
                    kind: 'DATE_ORDER',
                    date: point.date,
                    message: ms === previous.ms
                        ? `Duplicate date ${point.date}`
                        : `${point.date} follows ${previous.date}`,
                });
            } else if (ms - previous.ms > ONE_DAY_MS) {
                const missing = Math.round((ms - previous.ms) / ONE_DAY_MS) - 1;
                violations.push({
                    kind: 'DATE_GAP',
                    date: point.date,
                    message: `${missing} day(s) missing after ${previous.date}`,
                });
            }
        }
        previous = { date: point.date, ms };

        if (!Number.isFinite(point.intensityZ)) {
            violations.push({ kind: 'NON_FINITE', date: point.date, message: 'intensityZ is not a finite number' });
        }
        if (!inRange(point.intensityPercentile, 0, 100)) {
            violations.push({
                kind: 'PERCENTILE_RANGE',
                date: point.date,
                message: `intensityPercentile ${point.intensityPercentile} outside [0, 100]`,
            });
        }
        if (point.sentimentPercentile !== null && !inRange(point.sentimentPercentile, 0, 100)) {
            violations.push({
                kind: 'PERCENTILE_RANGE',
                date: point.date,
                message: `sentimentPercentile ${point.sentimentPercentile} outside [0, 100]`,
            });
        }
        if (point.sentiment !== null && !inRange(point.sentiment, -1, 1)) {
            violations.push({
                kind: 'SENTIMENT_RANGE',
                date: point.date,
                message: `sentiment ${point.sentiment} outside [-1, 1]`,
            });
        }
    }

    return violations;
};

export const hasOrderViolation = (violations: readonly ISeriesViolation[]): boolean =>
    violations.some(v => v.kind === 'DATE_ORDER');
