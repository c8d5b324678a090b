/**
 * Azure Metrics Mock Exporter
 *
 * Main entry point.
 *
 * Responsibilities:
 *   - Capture the process start time once
 *   - Serve the synthetic metrics endpoints
 *   - Graceful shutdown
 */

import { config } from './config';
import { logger } from './config/logger';
import { createApp } from './app';

const startTime = Math.floor(Date.now() / 1000);
const app = createApp({ startTime });

const server = app.listen(config.port, config.host, () => {
  logger.info(`Azure Metrics Mock Exporter: Server started on http://${config.host}:${config.port}`, {
    startTime,
    endpoints: ['/', '/health', '/metrics', '/probe/metrics/resource', '/debug/params'],
  });
});

server.on('error', (error: Error) => {
  logger.error('Azure Metrics Mock Exporter: Server failed to start', {
    error: error.message,
    stack: error.stack,
  });
  process.exit(1);
});

function shutdown(signal: NodeJS.Signals) {
  logger.info(`Azure Metrics Mock Exporter: ${signal} received, shutting down gracefully`);
  server.close(() => {
    logger.info('Azure Metrics Mock Exporter: Server closed');
    process.exit(0);
  });
}

process.on('SIGTERM', shutdown);
process.on('SIGINT', shutdown);

export { app };
