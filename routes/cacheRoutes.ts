// routes/cacheRoutes.ts
import express from 'express';
import { CacheController } from '../controllers/cacheController';

export const createCacheRoutes = (controller: CacheController) => {
    const router = express.Router();
    router.post('/invalidate', controller.invalidateCache);
    return router;
};
