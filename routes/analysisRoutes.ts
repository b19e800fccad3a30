// routes/analysisRoutes.ts
import express from 'express';
import { AnalysisController } from '../controllers/analysisController';

export const createAnalysisRoutes = (controller: AnalysisController) => {
    const router = express.Router();

    router.post('/', controller.startAnalysis);
    router.get('/', controller.getAnalysis);
    router.post('/cancel', controller.cancelAnalysis);
    router.post('/reset', controller.resetAnalysis);

    return router;
};
