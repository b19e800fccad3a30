import { describe, it, expect, beforeAll, afterAll, beforeEach, vi } from 'vitest';
import axios, { AxiosInstance } from 'axios';
import { Server } from 'http';
import { createApp } from '../app';
import { NarrativeCatalog } from '../services/narrativeCatalog';
import { MetricsClient } from '../services/metricsClient';
import { AnalysisOrchestrator } from '../services/analysisOrchestrator';
import { AlertService } from '../services/alertService';
import { MetricsProviderError } from '../services/metrics/IMetricsProvider';
import RequestPacer from '../utils/RequestPacer';
import { FakeProvider, makePoints } from '../services/__tests__/fixtures';

describe('HTTP API', () => {
    let server: Server;
    let http: AxiosInstance;
    let provider: FakeProvider;
    let orchestrator: AnalysisOrchestrator;
    let pacer: RequestPacer;

    beforeAll(async () => {
        const catalog = new NarrativeCatalog();
        provider = new FakeProvider();
        const client = new MetricsClient({
            provider,
            catalog,
            settings: { maxDate: '2025-06-30' },
            sleep: async () => undefined,
        });
        pacer = new RequestPacer({ minIntervalMs: 0 });
        orchestrator = new AnalysisOrchestrator(client, pacer);
        const alertService = new AlertService({ client, catalog, pacer });

        const app = createApp({
            config: { corsOrigins: [], rateLimit: { windowMs: 60_000, maxApi: 1000 } },
            catalog,
            client,
            orchestrator,
            alertService,
            pacer,
        });

        server = await new Promise<Server>(resolve => {
            const s = app.listen(0, '127.0.0.1', () => resolve(s));
        });
        const address = server.address();
        if (address === null || typeof address === 'string') throw new Error('Server is not listening on a TCP port');

        http = axios.create({ baseURL: `http://127.0.0.1:${address.port}`, validateStatus: () => true });
    });

    afterAll(async () => {
        server.closeAllConnections();
        await new Promise<void>(resolve => server.close(() => resolve()));
    });

    beforeEach(async () => {
        // Each test starts with a clean cache and a well-behaved backend
        provider.script(makePoints([0, 0.5, 1, 3], '2025-01-01'));
        await http.post('/api/v1/cache/invalidate');
        orchestrator.reset();
    });

    it('GET /health reports the analysis state', async () => {
        const res = await http.get('/health');

        expect(res.status).toBe(200);
        expect(res.data).toMatchObject({ status: 'OK', analysis: 'idle', latestDate: '2025-06-30' });
    });

    it('GET /narratives filters by group', async () => {
        const res = await http.get('/api/v1/narratives', { params: { group: 'core' } });

        expect(res.status).toBe(200);
        expect(res.data.count).toBe(5);
    });

    it('GET /narratives/:id decodes an id containing a slash', async () => {
        const res = await http.get(`/api/v1/narratives/${encodeURIComponent('Markets/Rate-watch')}`);

        expect(res.status).toBe(200);
        expect(res.data.data.id).toBe('Markets/Rate-watch');
    });

    it('GET /narratives/:id answers 404 for an unknown id', async () => {
        const res = await http.get('/api/v1/narratives/Tulip%20mania');

        expect(res.status).toBe(404);
        expect(res.data).toMatchObject({ status: 'fail', message: 'Unknown narrative: "Tulip mania"' });
    });

    it('GET /narratives/:id/metrics returns the series and the snapshot', async () => {
        const res = await http.get('/api/v1/narratives/Inflation/metrics', {
            params: { startDate: '2025-01-01', endDate: '2025-01-04', date: '2025-01-04' },
        });

        expect(res.status).toBe(200);
        expect(res.data.data.series.points).toHaveLength(4);
        expect(res.data.data.snapshot).toMatchObject({ date: '2025-01-04', usedLatestFallback: false, intensityZ: 3 });
        expect(res.data.data.fromCache).toBe(false);
    });

    it('GET /narratives/:id/metrics takes a pacing slot only when the backend is called', async () => {
        const waitTurn = vi.spyOn(pacer, 'waitTurn');
        const params = { startDate: '2025-01-01', endDate: '2025-01-04' };

        try {
            const first = await http.get('/api/v1/narratives/Inflation/metrics', { params });
            const second = await http.get('/api/v1/narratives/Inflation/metrics', { params });

            expect(first.data.data.fromCache).toBe(false);
            expect(second.data.data.fromCache).toBe(true);
            expect(waitTurn).toHaveBeenCalledTimes(1);
        } finally {
            waitTurn.mockRestore();
        }
    });

    it('GET /narratives/:id/metrics validates the query', async () => {
        const res = await http.get('/api/v1/narratives/Inflation/metrics', { params: { startDate: '2025-13-01' } });

        expect(res.status).toBe(400);
        expect(res.data.message).toBe('Invalid input data');
        expect(res.data.errors[0]).toEqual({ field: 'query.startDate', message: 'Expected a valid YYYY-MM-DD date' });
    });

    it('GET /narratives/:id/metrics maps an exhausted backend to 503', async () => {
        provider.script(new MetricsProviderError('Transient', 'Metrics service error for \'Inflation\': 502', 502));

        const res = await http.get('/api/v1/narratives/Inflation/metrics', {
            params: { startDate: '2025-01-01', endDate: '2025-01-04' },
        });

        expect(res.status).toBe(503);
        expect(res.data).toMatchObject({ success: false, kind: 'Transient', attempts: 3 });
    });

    it('runs a batch analysis and serves the dashboard', async () => {
        const start = await http.post('/api/v1/analysis', {
            narrativeIds: ['Inflation', 'Stagflation'],
            startDate: '2025-01-01',
            endDate: '2025-01-04',
        });
        expect(start.status).toBe(202);

        await vi.waitFor(() => expect(orchestrator.getState()).toBe('completed'));

        const res = await http.get('/api/v1/analysis', { params: { date: '2025-01-04' } });
        expect(res.status).toBe(200);
        expect(res.data.data.state).toBe('completed');
        expect(res.data.data.dashboard.rows.map((r: { narrativeId: string }) => r.narrativeId)).toEqual(['Inflation', 'Stagflation']);
        // Horizons 1 and 2 both move by more than 1 on the last day
        expect(res.data.data.dashboard.alerts).toHaveLength(4);
    });

    it('POST /analysis/cancel answers 409 when nothing runs', async () => {
        const res = await http.post('/api/v1/analysis/cancel');

        expect(res.status).toBe(409);
        expect(res.data).toMatchObject({ success: false, kind: 'NotRunning' });
    });

    it('GET /alerts scans the requested range', async () => {
        const res = await http.get('/api/v1/alerts', {
            params: { narrativeIds: 'Inflation', startDate: '2025-01-02', endDate: '2025-01-04', horizons: '1' },
        });

        expect(res.status).toBe(200);
        expect(res.data.data.alerts).toHaveLength(1);
        expect(res.data.data.alerts[0]).toMatchObject({ narrativeId: 'Inflation', date: '2025-01-04', move: 2 });
        expect(res.data.data.summary.total).toBe(1);
    });

    it('POST /cache/invalidate reports the cleared entries', async () => {
        await http.get('/api/v1/narratives/Inflation/metrics', { params: { startDate: '2025-01-01', endDate: '2025-01-04' } });

        const res = await http.post('/api/v1/cache/invalidate');

        expect(res.status).toBe(200);
        expect(res.data.data).toEqual({ cleared: 1 });
    });

    it('answers 404 for unknown API routes', async () => {
        const res = await http.get('/api/v1/nope');

        expect(res.status).toBe(404);
        expect(res.data.message).toBe('API Endpoint Not Found');
    });
});
