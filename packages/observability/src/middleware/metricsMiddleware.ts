import { Request, Response, NextFunction } from 'express';
import { recordRequestMetrics } from '../metrics';

/**
 * Records count and duration per request once the response is flushed.
 * Streaming responses are measured until their final byte.
 */
export function createMetricsMiddleware(serviceName?: string) {
  return function metricsMiddleware(req: Request, res: Response, next: NextFunction): void {
    const startTime = Date.now();

    res.on('finish', () => {
      const route = req.route && typeof req.route.path === 'string' ? `${req.baseUrl}${req.route.path}` : req.path;
      recordRequestMetrics(req.method, route, res.statusCode, Date.now() - startTime, serviceName);
    });

    next();
  };
}
