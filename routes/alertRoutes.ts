// routes/alertRoutes.ts
import express from 'express';
import { AlertController } from '../controllers/alertController';

export const createAlertRoutes = (controller: AlertController) => {
    const router = express.Router();
    router.get('/', controller.scanAlerts);
    return router;
};
