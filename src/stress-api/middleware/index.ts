import type { Request, Response, NextFunction } from 'express';
import morgan from 'morgan';
import { ConfigurationError, RuptureNotFoundError, RuptureParseError } from '@shared/errors';
import type { ApiResponse } from '@shared/types';

export const requestLogger = morgan('dev');

export function statusFor(err: Error): number {
  if (err instanceof ConfigurationError) return 400;
  if (err instanceof RuptureNotFoundError) return 404;
  if (err instanceof RuptureParseError) return 422;
  return 500;
}

export function errorHandler(err: Error, _req: Request, res: Response, _next: NextFunction) {
  const status = statusFor(err);
  if (status >= 500) {
    console.error('[ERROR]', err.message);
  } else {
    console.warn(`[ERROR] ${err.name}: ${err.message}`);
  }
  const body: ApiResponse = { success: false, error: err.message };
  res.status(status).json(body);
}
