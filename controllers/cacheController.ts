// controllers/cacheController.ts
import { Request, Response } from 'express';
import { MetricsClient } from '../services/metricsClient';

export const createCacheController = (client: MetricsClient) => ({
  // POST /cache/invalidate
  invalidateCache: (req: Request, res: Response) => {
    const cleared = client.invalidateAll();
    res.json({ success: true, data: { cleared } });
  },
});

export type CacheController = ReturnType<typeof createCacheController>;
