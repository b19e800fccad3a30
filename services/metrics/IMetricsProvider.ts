import { FailureKind, IMetricPoint, IMetricsRequest } from '../../types';

export interface IProviderRequestOptions {
    timeoutMs: number;
}

/**
 * A backend that can produce a daily metric series for one narrative.
 * Implementations throw MetricsProviderError for classified failures.
 */
export interface IMetricsProvider {
    name: string;
    fetchMetrics(request: Required<IMetricsRequest>, options: IProviderRequestOptions): Promise<IMetricPoint[]>;
}

export type ProviderFailureKind = Extract<FailureKind, 'Transient' | 'AuthFailure' | 'ClientError' | 'InvalidResponse'>;

export class MetricsProviderError extends Error {
    constructor(
        public readonly kind: ProviderFailureKind,
        message: string,
        public readonly statusCode?: number
    ) {
        super(message);
        this.name = 'MetricsProviderError';
    }
}
