// utils/validationSchemas.ts
import { z } from 'zod';
import { CONSTANTS, DATE_PERIODS } from './constants';
import { isIsoDate } from './helpers';

/**
 * Reusable Validation Rules
 */
const rules = {
    isoDate: z.string().refine(isIsoDate, 'Expected a valid YYYY-MM-DD date'),

    narrativeId: z.string().trim().min(1, 'Narrative id cannot be empty').max(100),

    group: z.enum(['all', 'core', 'supplementary']),

    period: z.enum(DATE_PERIODS),

    threshold: z.coerce.number().positive('Threshold must be positive').max(10),

    // "a,b,c" -> ["a", "b", "c"]
    csv: z.string().transform(value => value.split(',').map(part => part.trim()).filter(Boolean)),
};

const horizonList = rules.csv.pipe(
    z.array(z.coerce.number().int('Horizons must be whole trading days').min(1).max(250)).min(1, 'At least one horizon is required')
);

const checkDateOrder = (value: { startDate?: string; endDate?: string }) =>
    !value.startDate || !value.endDate || value.startDate <= value.endDate;

const DATE_ORDER_MESSAGE = { message: 'startDate must be on or before endDate', path: ['startDate'] };

/**
 * Remote metrics service payloads (wire format, snake_case, percentiles as fractions)
 */
export const MetricPointWireSchema = z.object({
    date: rules.isoDate,
    article_count: z.number().optional(),
    rolling_mean: z.number().nullable().optional(),
    rolling_std: z.number().nullable().optional(),
    intensity: z.number(),
    sentiment_mean: z.number().nullable().optional(),
    intensity_percentile: z.number(),
    sentiment_percentile: z.number().nullable().optional(),
});

export type MetricPointWire = z.infer<typeof MetricPointWireSchema>;

// The service answers with a bare array; older deployments wrap it in { data } or send one point
export const MetricsResponseSchema = z.union([
    z.array(MetricPointWireSchema),
    z.object({ data: z.array(MetricPointWireSchema) }).transform(body => body.data),
    MetricPointWireSchema.transform(point => [point]),
]);

export const ErrorBodySchema = z.object({
    detail: z.unknown().optional(),
    message: z.string().optional(),
});

/**
 * HTTP API Schemas
 */
export const NarrativeListQuerySchema = z.object({
    group: rules.group.default('all'),
    search: z.string().trim().max(100).optional(),
});

export const NarrativeParamsSchema = z.object({
    id: rules.narrativeId,
});

export const MetricsQuerySchema = z.object({
    startDate: rules.isoDate.optional(),
    endDate: rules.isoDate.optional(),
    period: rules.period.default('180d'),
    date: rules.isoDate.optional(),
    threshold: rules.threshold.default(CONSTANTS.STATS.ALERT_THRESHOLD),
}).refine(checkDateOrder, DATE_ORDER_MESSAGE);

export const AnalysisStartSchema = z.object({
    narrativeIds: z.array(rules.narrativeId).min(1).max(50).optional(),
    group: rules.group.default('all'),
    startDate: rules.isoDate.optional(),
    endDate: rules.isoDate.optional(),
    period: rules.period.default('180d'),
}).refine(checkDateOrder, DATE_ORDER_MESSAGE);

export const AnalysisQuerySchema = z.object({
    date: rules.isoDate.optional(),
    threshold: rules.threshold.default(CONSTANTS.STATS.ALERT_THRESHOLD),
});

export const AlertScanQuerySchema = z.object({
    narrativeIds: rules.csv.pipe(z.array(rules.narrativeId).min(1)).optional(),
    startDate: rules.isoDate.optional(),
    endDate: rules.isoDate.optional(),
    horizons: horizonList.optional(),
    threshold: rules.threshold.default(CONSTANTS.STATS.ALERT_THRESHOLD),
}).refine(checkDateOrder, DATE_ORDER_MESSAGE);

