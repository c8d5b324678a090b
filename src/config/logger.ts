/**
 * Winston Logger Configuration
 *
 * Structured JSON logging to stdout, tagged with the service name and version.
 * Silent under the test runner.
 */

import winston from 'winston';
import { config } from './index';

export const logger = winston.createLogger({
  level: config.logLevel,
  silent: config.nodeEnv === 'test',
  defaultMeta: {
    service: config.service.name,
    version: config.service.version,
  },
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json()
  ),
  transports: [new winston.transports.Console()],
});
