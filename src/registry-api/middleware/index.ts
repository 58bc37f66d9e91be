import type { Request, Response, NextFunction } from 'express';
import morgan from 'morgan';
import { RegistryError, ValidationError } from '@core/errors';
import type { ApiResponse } from '@shared/types';

export const requestLogger = morgan('dev');

// body-parser reports malformed or oversized bodies with a 4xx `status`.
function clientErrorStatus(err: Error): number | undefined {
  if ('status' in err && typeof err.status === 'number' && err.status >= 400 && err.status < 500) {
    return err.status;
  }
  return undefined;
}

export function notFoundHandler(req: Request, res: Response<ApiResponse>) {
  res.status(404).json({ success: false, error: `No route for ${req.method} ${req.path}` });
}

export function errorHandler(
  err: Error,
  _req: Request,
  res: Response<ApiResponse>,
  _next: NextFunction,
) {
  if (err instanceof ValidationError) {
    res.status(err.status).json({ success: false, error: err.message, details: err.violations });
    return;
  }
  if (err instanceof RegistryError) {
    res.status(err.status).json({ success: false, error: err.message });
    return;
  }

  const status = clientErrorStatus(err);
  if (status !== undefined) {
    res.status(status).json({ success: false, error: err.message });
    return;
  }

  console.error('[ERROR]', err.message);
  res.status(500).json({ success: false, error: err.message });
}
