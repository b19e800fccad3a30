import axios, { AxiosError, AxiosInstance } from 'axios';
import { IMetricPoint, IMetricsRequest } from '../../types';
import { IMetricsProvider, IProviderRequestOptions, MetricsProviderError } from './IMetricsProvider';
import { createApiClient } from '../../utils/apiClient';
import { ErrorBodySchema, MetricPointWire, MetricsResponseSchema } from '../../utils/validationSchemas';
import logger from '../../utils/logger';

export interface HttpMetricsProviderOptions {
    baseUrl: string;
    apiToken?: string;
    // Injected in tests; defaults to an axios instance built from baseUrl/apiToken
    http?: AxiosInstance;
}

const TRANSIENT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT', 'ECONNRESET', 'ECONNREFUSED', 'EPIPE', 'EAI_AGAIN', 'ENOTFOUND', 'ERR_NETWORK']);
const RETRYABLE_STATUS = new Set([429, 500, 502, 503, 504]);
const MAX_DETAIL_LENGTH = 500;

// FastAPI style bodies carry the reason in `detail`
const extractDetail = (data: unknown): string => {
    if (typeof data === 'string') return data.slice(0, MAX_DETAIL_LENGTH);

    const parsed = ErrorBodySchema.safeParse(data);
    if (!parsed.success) return '';

    const { detail, message } = parsed.data;
    if (typeof detail === 'string') return detail;
    if (detail !== undefined) return JSON.stringify(detail).slice(0, MAX_DETAIL_LENGTH);
    return message ?? '';
};

/**
 * Maps an axios failure onto the client's failure taxonomy.
 */
export const classifyHttpError = (error: AxiosError, narrativeId: string): MetricsProviderError => {
    const response = error.response;

    if (!response) {
        const code = error.code ?? 'UNKNOWN';
        if (code === 'ECONNABORTED' || code === 'ETIMEDOUT') {
            return new MetricsProviderError('Transient', `Backend timeout while fetching metrics for '${narrativeId}'`);
        }
        const kind = TRANSIENT_CODES.has(code) ? 'Transient' : 'ClientError';
        return new MetricsProviderError(kind, `Network error fetching metrics for '${narrativeId}': ${code} ${error.message}`);
    }

    const { status } = response;
    const detail = extractDetail(response.data);
    const suffix = detail ? ` - ${detail}` : '';

    if (status === 401 || status === 403) {
        return new MetricsProviderError('AuthFailure', `Metrics service rejected credentials (${status})${suffix}`, status);
    }
    if (RETRYABLE_STATUS.has(status) || status >= 500) {
        return new MetricsProviderError('Transient', `Metrics service error for '${narrativeId}': ${status}${suffix}`, status);
    }
    if (status === 404) {
        return new MetricsProviderError('ClientError', `Narrative '${narrativeId}' not found on metrics service (404)${suffix}`, status);
    }
    return new MetricsProviderError('ClientError', `Metrics request for '${narrativeId}' rejected: ${status}${suffix}`, status);
};

const toPoint = (wire: MetricPointWire): IMetricPoint => ({
    date: wire.date,
    intensityZ: wire.intensity,
    // Wire percentiles are fractions; the domain uses 0-100
    intensityPercentile: wire.intensity_percentile * 100,
    sentiment: wire.sentiment_mean ?? null,
    sentimentPercentile: wire.sentiment_percentile == null ? null : wire.sentiment_percentile * 100,
    articleCount: wire.article_count,
    rollingMean: wire.rolling_mean,
    rollingStd: wire.rolling_std,
});

/**
 * GET {baseUrl}/narratives/{id}/metrics
 */
export class HttpMetricsProvider implements IMetricsProvider {
    name = 'HttpMetrics';
    private readonly http: AxiosInstance;

    constructor({ baseUrl, apiToken, http }: HttpMetricsProviderOptions) {
        this.http = http ?? createApiClient({ baseURL: baseUrl, bearerToken: apiToken });
    }

    async fetchMetrics(request: Required<IMetricsRequest>, { timeoutMs }: IProviderRequestOptions): Promise<IMetricPoint[]> {
        // One path segment, even for ids such as "Markets/Rate-watch"
        const url = `/narratives/${encodeURIComponent(request.narrativeId)}/metrics`;

        let data: unknown;
        try {
            const response = await this.http.get<unknown>(url, {
                timeout: timeoutMs,
                params: {
                    window: request.window,
                    percentile_window: request.percentileWindow,
                    start_date: request.startDate,
                    end_date: request.endDate,
                },
            });
            data = response.data;
        } catch (error: unknown) {
            // Anything that is not an HTTP failure propagates unclassified
            if (!axios.isAxiosError(error)) throw error;
            throw classifyHttpError(error, request.narrativeId);
        }

        return this.normalize(data, request.narrativeId);
    }

    private normalize(data: unknown, narrativeId: string): IMetricPoint[] {
        const result = MetricsResponseSchema.safeParse(data);

        if (!result.success) {
            const issues = result.error.issues.slice(0, 3).map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
            logger.error(`[${this.name}] Schema Mismatch for '${narrativeId}': ${issues}`);
            throw new MetricsProviderError('InvalidResponse', `Malformed metrics payload for '${narrativeId}': ${issues}`);
        }

        return result.data.map(toPoint);
    }
}

export default HttpMetricsProvider;
