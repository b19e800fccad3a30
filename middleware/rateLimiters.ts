// middleware/rateLimiters.ts
import rateLimit, { RateLimitRequestHandler } from 'express-rate-limit';
import { Request, Response, NextFunction } from 'express';
import logger from '../utils/logger';

export interface RateLimitSettings {
    windowMs: number;
    maxApi: number;
}

const keyGenerator = (req: Request): string => req.ip || 'unknown-ip';

// In-memory limiter; one process serves the whole API
export const createApiLimiter = ({ windowMs, maxApi }: RateLimitSettings): RateLimitRequestHandler =>
    rateLimit({
        windowMs,
        max: maxApi,
        standardHeaders: true,
        legacyHeaders: false,
        keyGenerator,
        message: {
            success: false,
            message: 'Too many requests, please try again later.',
        },
        skipFailedRequests: true,
        handler: (req: Request, res: Response, _next: NextFunction, options) => {
            logger.warn(`Rate Limit Exceeded (API): ${keyGenerator(req)}`);
            res.status(options.statusCode).send(options.message);
        },
    });
