// middleware/validate.ts
import { Request, Response, NextFunction, RequestHandler } from 'express';
import { ZodError, ZodTypeAny, z } from 'zod';
import asyncHandler from '../utils/asyncHandler';
import logger from '../utils/logger';

/**
 * 'request' validates { body, query, params } together; the others validate one part.
 */
export type ValidationSource = 'body' | 'query' | 'params' | 'request';

type ValidatedHandler<S extends ZodTypeAny> = (
  input: z.output<S>,
  req: Request,
  res: Response,
  next: NextFunction
) => Promise<unknown>;

const pick = (req: Request, source: ValidationSource): unknown =>
  source === 'request'
    ? { body: req.body, query: req.query, params: req.params }
    : req[source];

export const sendValidationError = (req: Request, res: Response, error: ZodError) => {
  logger.warn(`🛡️ Validation Failed [${req.method} ${req.originalUrl}]: ${error.errors.map(e => e.message).join(', ')}`);

  return res.status(400).json({
    status: 'error',
    message: 'Invalid input data',
    errors: error.errors.map((err) => ({
      field: err.path.join('.'),
      message: err.message
    }))
  });
};

/**
 * Parses the request with a Zod schema and hands the parsed (coerced, defaulted)
 * value to the handler. Invalid input never reaches the handler.
 */
const validate = <S extends ZodTypeAny>(schema: S, source: ValidationSource, handler: ValidatedHandler<S>): RequestHandler =>
  asyncHandler(async (req: Request, res: Response, next: NextFunction) => {
    const result = await schema.safeParseAsync(pick(req, source));
    if (!result.success) {
      sendValidationError(req, res, result.error);
      return;
    }
    await handler(result.data, req, res, next);
  });

export default validate;
