/**
 * Probe Routes
 *
 * Azure-style resource probe. subscription, target and metric are required;
 * when any is missing the response is a metrics-shaped error block, still
 * with status 200, so the scrape agent records it like any other payload.
 *
 * interval and aggregation default only when absent. An empty value is kept.
 */

import { Router, Request, Response } from 'express';
import { register } from 'prom-client';
import { v4 as uuidv4 } from 'uuid';
import { config } from '../config';
import { logger } from '../config/logger';
import type { MetricsGenerator } from '../services/metrics-generator';
import { readQueryParam } from './query-params';

export function createProbeRoutes(generator: MetricsGenerator): Router {
  const router = Router();

  router.get('/probe/metrics/resource', (req: Request, res: Response) => {
    const params = {
      subscription: readQueryParam(req.query, 'subscription'),
      target: readQueryParam(req.query, 'target'),
      metric: readQueryParam(req.query, 'metric'),
      interval: readQueryParam(req.query, 'interval') ?? config.probe.defaultInterval,
      aggregation: readQueryParam(req.query, 'aggregation') ?? config.probe.defaultAggregation,
      name: readQueryParam(req.query, 'name'),
      metricNamespace: readQueryParam(req.query, 'metricNamespace'),
    };

    logger.info('Probe request received', {
      correlationId: uuidv4(),
      ...params,
    });

    res.set('Content-Type', register.contentType);
    res.send(generator.probe(params));
  });

  return router;
}
