import { Request, Response, NextFunction, ErrorRequestHandler } from 'express';
import { AppError, RequestAbortedError } from '../errors/AppError';

export const asyncHandler =
  (fn: (req: Request, res: Response) => Promise<void>) =>
  (req: Request, res: Response, next: NextFunction): void => {
    void Promise.resolve(fn(req, res)).catch((err: unknown) => {
      next(err);
    });
  };

/**
 * Single mapping point from thrown errors to responses. Unexpected faults are
 * logged in full and answered without internal detail.
 */
export const errorHandler: ErrorRequestHandler = (err: unknown, req, res, next) => {
  if (res.headersSent) {
    next(err);
    return;
  }

  if (err instanceof RequestAbortedError) {
    console.info(`[http] ${req.method} ${req.originalUrl}: client disconnected, response dropped`);
    return;
  }

  if (err instanceof AppError) {
    res.status(err.statusCode).json({ error: err.message, code: err.code });
    return;
  }

  console.error(`[http] ${req.method} ${req.originalUrl} failed:`, err);
  res.status(500).json({ error: 'Internal server error' });
};
