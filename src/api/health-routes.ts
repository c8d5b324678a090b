/**
 * Health Check Routes
 *
 * Liveness endpoint for the scrape agent and for container health checks.
 * The service has no dependencies to probe, so it is healthy whenever it
 * answers.
 */

import { Router, Request, Response } from 'express';

const router = Router();

router.get('/health', (req: Request, res: Response) => {
  res.type('text/plain').send('OK');
});

export { router as healthRoutes };
