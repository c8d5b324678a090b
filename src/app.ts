/**
 * Express application factory.
 *
 * The generator, and with it the process start time, is built once by the
 * caller and shared by every route.
 */

import express, { Express } from 'express';
import { rootRoutes } from './api/root-routes';
import { healthRoutes } from './api/health-routes';
import { createMetricsRoutes } from './api/metrics-routes';
import { createProbeRoutes } from './api/probe-routes';
import { createDebugRoutes } from './api/debug-routes';
import { errorHandler, notFoundHandler } from './api/error-handler';
import { MetricsGenerator } from './services/metrics-generator';
import type { MetricsGeneratorOptions } from './services/metrics-generator';

export function createApp(options: MetricsGeneratorOptions): Express {
  const generator = new MetricsGenerator(options);
  const app = express();

  // Repeated keys become arrays; bracket syntax is never expanded into objects
  app.set('query parser', 'simple');
  app.disable('x-powered-by');

  // Routes
  app.use(rootRoutes);
  app.use(healthRoutes);
  app.use(createMetricsRoutes(generator));
  app.use(createProbeRoutes(generator));
  app.use(createDebugRoutes(generator));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
