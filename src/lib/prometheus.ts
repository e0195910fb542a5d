import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { Logger } from './logger';
import { silentLogger } from './logger';
import type { QuotaMetrics } from './metrics';

export interface PrometheusOptions {
  metrics: QuotaMetrics;
  path?: string;
  prefix?: string;
  logger?: Logger;
}

export function prometheusMetrics(options: PrometheusOptions): RequestHandler {
  const { metrics, path = '/metrics', prefix = 'quota_gate_', logger = silentLogger } = options;

  return (req: Request, res: Response, next: NextFunction) => {
    if (req.path !== path) {
      next();
      return;
    }
    try {
      const body = metrics.getPrometheusMetrics(prefix);
      res.setHeader('Content-Type', 'text/plain; version=0.0.4; charset=utf-8');
      res.setHeader('Cache-Control', 'no-cache, no-store, must-revalidate');
      res.status(200).send(body);
    } catch (error) {
      logger.error('failed to render quota metrics', { error });
      res.status(500).json({ error: 'Failed to generate metrics' });
    }
  };
}
