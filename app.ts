// app.ts
import express, { Request, Response, NextFunction } from 'express';
import cors from 'cors';
import compression from 'compression';
import helmet from 'helmet';
import hpp from 'hpp';

import logger from './utils/logger';
import type { AppConfig } from './utils/config';
import { errorHandler } from './middleware/errorMiddleware';
import { createApiLimiter } from './middleware/rateLimiters';
import { ApiServices, createApiRouter } from './routes/index';

export interface AppDeps extends ApiServices {
    config: Pick<AppConfig, 'corsOrigins' | 'rateLimit'>;
}

export const createApp = (deps: AppDeps) => {
    const { config, client, orchestrator } = deps;
    const app = express();

    // --- 1. Request Logging ---
    app.use((req: Request, res: Response, next: NextFunction) => {
        if (req.url !== '/health' && req.url !== '/ping') {
            logger.http(`${req.method} ${req.url}`);
        }
        next();
    });

    // --- 2. Security Middleware ---
    // SECURITY: Hide Express signature
    app.disable('x-powered-by');
    app.use(helmet());
    app.use(compression());
    app.use(hpp());

    // --- 3. CORS Configuration ---
    app.use(cors({
        origin: config.corsOrigins.length > 0 ? config.corsOrigins : false,
        methods: ['GET', 'POST', 'OPTIONS'],
        allowedHeaders: ['Content-Type', 'Authorization'],
    }));

    app.use(express.json({ limit: '100kb' }));

    // --- 4. System Routes ---
    app.get('/ping', (req: Request, res: Response) => {
        res.status(200).send('OK');
    });

    app.get('/health', (req: Request, res: Response) => {
        res.status(200).json({
            status: 'OK',
            analysis: orchestrator.getState(),
            cacheEntries: client.cacheSize,
            latestDate: client.latestAvailableDate,
        });
    });

    // --- 5. Global Rate Limiter ---
    app.use('/api/v1/', createApiLimiter(config.rateLimit));

    // --- 6. Mount Routes ---
    app.use('/api/v1', createApiRouter(deps));

    // --- 7. Error Handling ---
    app.use(errorHandler);

    return app;
};

export default createApp;
