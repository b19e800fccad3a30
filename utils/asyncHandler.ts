// utils/asyncHandler.ts
import { Request, Response, NextFunction, RequestHandler } from 'express';

// Defines a function that takes Express arguments and returns a Promise
type AsyncFunction = (req: Request, res: Response, next: NextFunction) => Promise<unknown>;

const asyncHandler = (fn: AsyncFunction): RequestHandler => (req: Request, res: Response, next: NextFunction) => {
  Promise.resolve(fn(req, res, next)).catch(next);
};

export default asyncHandler;
