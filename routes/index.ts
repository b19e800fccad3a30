// routes/index.ts
import express from 'express';
import { NarrativeCatalog } from '../services/narrativeCatalog';
import { MetricsClient } from '../services/metricsClient';
import { AnalysisOrchestrator } from '../services/analysisOrchestrator';
import { AlertService } from '../services/alertService';
import RequestPacer from '../utils/RequestPacer';

// Controllers
import { createNarrativeController } from '../controllers/narrativeController';
import { createAnalysisController } from '../controllers/analysisController';
import { createAlertController } from '../controllers/alertController';
import { createCacheController } from '../controllers/cacheController';

// Routes
import { createNarrativeRoutes } from './narrativeRoutes';
import { createAnalysisRoutes } from './analysisRoutes';
import { createAlertRoutes } from './alertRoutes';
import { createCacheRoutes } from './cacheRoutes';

export interface ApiServices {
    catalog: NarrativeCatalog;
    client: MetricsClient;
    orchestrator: AnalysisOrchestrator;
    alertService: AlertService;
    pacer: RequestPacer;
}

export const createApiRouter = ({ catalog, client, orchestrator, alertService, pacer }: ApiServices) => {
    const router = express.Router();

    // --- 1. Catalog & Single-Narrative Metrics ---
    router.use('/narratives', createNarrativeRoutes(createNarrativeController(catalog, client, pacer)));

    // --- 2. Batch Analysis ---
    router.use('/analysis', createAnalysisRoutes(createAnalysisController({ catalog, client, orchestrator })));

    // --- 3. Alerts ---
    router.use('/alerts', createAlertRoutes(createAlertController(catalog, client, alertService)));

    // --- 4. Cache Control ---
    router.use('/cache', createCacheRoutes(createCacheController(client)));

    // --- 5. API 404 Handler ---
    // Catches any request that didn't match the routes above
    router.use('*', (req, res) => {
        res.status(404).json({
            success: false,
            message: 'API Endpoint Not Found',
            path: req.originalUrl
        });
    });

    return router;
};

export default createApiRouter;
