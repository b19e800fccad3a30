// routes/narrativeRoutes.ts
import express from 'express';
import { NarrativeController } from '../controllers/narrativeController';

export const createNarrativeRoutes = (controller: NarrativeController) => {
    const router = express.Router();

    router.get('/', controller.listNarratives);
    // Ids such as "Markets/Rate-watch" arrive percent-encoded as one segment
    router.get('/:id/metrics', controller.getNarrativeMetrics);
    router.get('/:id', controller.getNarrative);

    return router;
};
