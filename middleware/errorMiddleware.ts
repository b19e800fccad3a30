// middleware/errorMiddleware.ts
import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import logger from '../utils/logger';
import AppError from '../utils/AppError';
import { sendValidationError } from './validate';

// Body parser failures carry a status (e.g. 400 malformed JSON, 413 too large)
const httpStatusOf = (err: unknown): number | null => {
  if (typeof err !== 'object' || err === null || !('status' in err)) return null;
  const { status } = err;
  return typeof status === 'number' && status >= 400 && status < 600 ? status : null;
};

// Express recognises error handlers by arity, so `next` stays in the signature
// eslint-disable-next-line @typescript-eslint/no-unused-vars
const errorHandler = (err: unknown, req: Request, res: Response, next: NextFunction) => {
  if (err instanceof ZodError) {
    sendValidationError(req, res, err);
    return;
  }

  // 1. Log the Error
  // Operational errors were expected; anything else might be a bug, so keep the stack
  if (err instanceof AppError) {
    logger.warn(`⚠️ Operational Error [${req.method} ${req.url}]: ${err.message}`);
  } else {
    logger.error(`🔥 Unexpected Error [${req.method} ${req.url}]:`);
    logger.error(err);
  }

  // 2. Normalise into an AppError
  let error: AppError;
  if (err instanceof AppError) {
    error = err;
  } else {
    const status = httpStatusOf(err);
    const message = err instanceof Error && status !== null ? err.message : 'Internal Server Error';
    error = new AppError(message, status ?? 500);
  }

  // 3. Send Response
  res.status(error.statusCode).json({
    status: error.status,
    message: error.message,
    // Only show stack in development
    stack: process.env.NODE_ENV === 'development' && err instanceof Error ? err.stack : undefined,
  });
};

export { errorHandler };
