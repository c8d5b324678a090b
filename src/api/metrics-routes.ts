/**
 * Metrics Routes
 *
 * Baseline Prometheus text with no resource section. Served with the
 * Prometheus text exposition content type.
 */

import { Router, Request, Response } from 'express';
import { register } from 'prom-client';
import type { MetricsGenerator } from '../services/metrics-generator';

export function createMetricsRoutes(generator: MetricsGenerator): Router {
  const router = Router();

  router.get('/metrics', (req: Request, res: Response) => {
    res.set('Content-Type', register.contentType);
    res.send(generator.generate());
  });

  return router;
}
