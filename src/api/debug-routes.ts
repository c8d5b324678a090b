/**
 * Debug Routes
 *
 * Echoes the query parameters exactly as the server parsed them, with no
 * defaults applied, so agent URL construction can be checked directly.
 */

import { Router, Request, Response } from 'express';
import type { MetricsGenerator } from '../services/metrics-generator';
import { readQueryParam } from './query-params';

export const DEBUG_PARAMETER_KEYS = [
  'subscription',
  'target',
  'metric',
  'interval',
  'aggregation',
] as const;

export type DebugParameterKey = (typeof DEBUG_PARAMETER_KEYS)[number];

export interface DebugParamsResponse {
  received_parameters: Record<DebugParameterKey, string | null>;
  parameter_count: number;
  required_params_present: boolean;
  timestamp: number;
}

export function createDebugRoutes(generator: MetricsGenerator): Router {
  const router = Router();

  router.get('/debug/params', (req: Request, res: Response) => {
    const read = (key: DebugParameterKey): string | null => readQueryParam(req.query, key) ?? null;

    const received: DebugParamsResponse['received_parameters'] = {
      subscription: read('subscription'),
      target: read('target'),
      metric: read('metric'),
      interval: read('interval'),
      aggregation: read('aggregation'),
    };

    const body: DebugParamsResponse = {
      received_parameters: received,
      parameter_count: DEBUG_PARAMETER_KEYS.filter((key) => Boolean(received[key])).length,
      required_params_present: Boolean(received.subscription && received.target && received.metric),
      timestamp: generator.timestamp(),
    };

    res.json(body);
  });

  return router;
}
