import { Request, Response, NextFunction } from 'express';
import { AppError } from '@inferlab/shared-utils';
import { createServiceLogger } from '@inferlab/observability';

const logger = createServiceLogger('mock-llm-service');

export function errorHandler(
  err: Error | AppError,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const meta = { path: req.path, method: req.method };

  if (err instanceof AppError) {
    // 5xx here includes injected unavailability
    if (err.statusCode >= 500) {
      logger.warn('Request failed', { ...meta, code: err.code, error: err.message });
    } else {
      logger.debug('Request rejected', { ...meta, code: err.code, error: err.message });
    }
    res.status(err.statusCode).json({ error: err.message, code: err.code, details: err.details });
    return;
  }

  logger.error('Request error', err, meta);
  res.status(500).json({ error: 'Internal server error' });
}

export function notFoundHandler(_req: Request, res: Response): void {
  res.status(404).json({ error: 'Not found' });
}
