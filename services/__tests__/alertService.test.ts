import { describe, it, expect } from 'vitest';
import { AlertService, IMetricsSource, summarizeAlerts } from '../alertService';
import { NarrativeCatalog } from '../narrativeCatalog';
import RequestPacer from '../../utils/RequestPacer';
import { FetchOutcome, IMetricsRequest, IMetricSeries } from '../../types';
import { createFakeClock, makeSeries } from './fixtures';

const catalog = new NarrativeCatalog();

class SeriesSource implements IMetricsSource {
    readonly requests: IMetricsRequest[] = [];

    constructor(private readonly series: Record<string, IMetricSeries>) {}

    async fetch(request: IMetricsRequest): Promise<FetchOutcome> {
        this.requests.push(request);
        const series = this.series[request.narrativeId];
        if (!series) {
            return {
                status: 'failure',
                narrativeId: request.narrativeId,
                error: { kind: 'Transient', message: 'Metrics service error: 503', statusCode: 503 },
                attempts: 3,
            };
        }
        return { status: 'success', narrativeId: request.narrativeId, series, attempts: 1, fromCache: false, violations: [] };
    }
}

const setup = () => {
    const source = new SeriesSource({
        // Jan 1 .. Jan 10
        'Inflation': makeSeries('Inflation', [0, 0, 0, 0, 0, 2, 2, 0.5, 0.5, 3]),
        'Trade war': makeSeries('Trade war', [0, 0, 0, 0, 0, 0, 0, 0, 0, 4]),
    });
    const clock = createFakeClock();
    const pacer = new RequestPacer({ minIntervalMs: 500, now: clock.now, sleep: clock.sleep });
    return { source, clock, service: new AlertService({ client: source, catalog, pacer }) };
};

describe('AlertService.scan', () => {
    it('lists alerts newest first, then by size', async () => {
        const { service } = setup();

        const report = await service.scan({
            narrativeIds: ['Inflation', 'Trade war'],
            startDate: '2025-01-05',
            endDate: '2025-01-10',
            horizons: [1],
        });

        expect(report.alerts.map(a => [a.date, a.narrativeId, a.move])).toEqual([
            ['2025-01-10', 'Trade war', 4],
            ['2025-01-10', 'Inflation', 2.5],
            ['2025-01-08', 'Inflation', -1.5],
            ['2025-01-06', 'Inflation', 2],
        ]);
        expect(report.alerts[0]).toMatchObject({ displayName: 'Trade War', intensityZ: 4, articleCount: 10, threshold: 1 });
    });

    it('summarises the alerts', async () => {
        const { service } = setup();

        const { summary } = await service.scan({
            narrativeIds: ['Inflation', 'Trade war'],
            startDate: '2025-01-05',
            endDate: '2025-01-10',
            horizons: [1],
        });

        expect(summary).toEqual({
            total: 4,
            avgAbsMove: 2.5,
            maxAbsMove: 4,
            narratives: 2,
            topNarratives: [
                { narrativeId: 'Inflation', count: 3 },
                { narrativeId: 'Trade war', count: 1 },
            ],
        });
    });

    it('pads the fetch range for lookback and paces the requests', async () => {
        const { service, source, clock } = setup();

        await service.scan({
            narrativeIds: ['Inflation', 'Trade war', 'Inflation'],
            startDate: '2025-01-05',
            endDate: '2025-01-10',
            horizons: [1, 2],
        });

        expect(source.requests).toEqual([
            { narrativeId: 'Inflation', startDate: '2025-01-01', endDate: '2025-01-10' },
            { narrativeId: 'Trade war', startDate: '2025-01-01', endDate: '2025-01-10' },
        ]);
        expect(clock.sleeps).toEqual([500]);
    });

    it('reports failed narratives separately', async () => {
        const { service } = setup();

        const report = await service.scan({
            narrativeIds: ['Stagflation', 'Trade war'],
            startDate: '2025-01-05',
            endDate: '2025-01-10',
            horizons: [1],
        });

        expect(report.failures).toHaveLength(1);
        expect(report.failures[0]).toMatchObject({ narrativeId: 'Stagflation', error: { kind: 'Transient' } });
        expect(report.alerts).toHaveLength(1);
    });
});

describe('summarizeAlerts', () => {
    it('returns null statistics for no alerts', () => {
        expect(summarizeAlerts([])).toEqual({
            total: 0,
            avgAbsMove: null,
            maxAbsMove: null,
            narratives: 0,
            topNarratives: [],
        });
    });
});
