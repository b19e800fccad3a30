// services/__tests__/fixtures.ts
import { IMetricPoint, IMetricSeries, IMetricsRequest } from '../../types';
import { IMetricsProvider, IProviderRequestOptions } from '../metrics/IMetricsProvider';
import { addDays } from '../../utils/helpers';

export const makePoint = (date: string, intensityZ: number, overrides: Partial<IMetricPoint> = {}): IMetricPoint => ({
    date,
    intensityZ,
    intensityPercentile: 50,
    sentiment: 0,
    sentimentPercentile: 50,
    articleCount: 10,
    ...overrides,
});

// Consecutive daily points starting at `start`
export const makePoints = (values: readonly number[], start = '2025-01-01'): IMetricPoint[] =>
    values.map((value, i) => makePoint(addDays(start, i), value));

export const makeSeries = (narrativeId: string, values: readonly number[], start = '2025-01-01'): IMetricSeries => {
    const points = makePoints(values, start);
    return {
        narrativeId,
        startDate: start,
        endDate: points.length > 0 ? points[points.length - 1].date : start,
        points,
    };
};

type Step = IMetricPoint[] | Error;

/**
 * Scripted provider: each call consumes the next step (the last one repeats).
 * An Error step is thrown.
 */
export class FakeProvider implements IMetricsProvider {
    name = 'Fake';
    readonly calls: { request: Required<IMetricsRequest>; options: IProviderRequestOptions }[] = [];
    private steps: Step[];

    constructor(...steps: Step[]) {
        this.steps = steps.length > 0 ? steps : [makePoints([0, 1, 2])];
    }

    script(...steps: Step[]): void {
        this.steps = steps;
    }

    async fetchMetrics(request: Required<IMetricsRequest>, options: IProviderRequestOptions): Promise<IMetricPoint[]> {
        this.calls.push({ request, options });
        const step = this.steps.length > 1 ? this.steps.shift() : this.steps[0];
        if (step === undefined) throw new Error('FakeProvider has no script');
        if (step instanceof Error) throw step;
        return step;
    }
}

// Manual clock; `sleep` advances it instead of waiting
export const createFakeClock = (start = 0) => {
    let current = start;
    const sleeps: number[] = [];
    return {
        sleeps,
        now: () => current,
        advance: (ms: number) => {
            current += ms;
        },
        sleep: async (ms: number) => {
            sleeps.push(ms);
            current += ms;
        },
    };
};

export const flushPromises = () => new Promise<void>(resolve => setImmediate(resolve));
