/**
 * Root Route
 *
 * Plain-text welcome message listing the available endpoints.
 */

import { Router, Request, Response } from 'express';

export const WELCOME_MESSAGE = `Azure Metrics Mock Exporter

This server simulates azure-metrics-exporter output for testing a scrape agent's URL parameter support.

Available endpoints:
- GET /metrics - Prometheus format metrics (baseline only)
- GET /probe/metrics/resource - Azure-style metrics endpoint (requires parameters)
- GET /debug/params - Echo of the received query parameters
- GET /health - Health check
- GET / - This welcome message

Example with parameters:
/probe/metrics/resource?subscription=test-sub&target=Microsoft.Sql/test&metric=avg_cpu_percent,virtual_core_count&interval=PT1M&aggregation=average
`;

const router = Router();

router.get('/', (req: Request, res: Response) => {
  res.type('text/plain').send(WELCOME_MESSAGE);
});

export { router as rootRoutes };
