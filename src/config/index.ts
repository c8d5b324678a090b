/**
 * Configuration Loader
 *
 * Loads environment variables and provides typed configuration for the service.
 * Uses dotenv for local development.
 *
 * All config is externalized via environment variables; nothing is read from
 * a config file.
 */

import dotenv from 'dotenv';

dotenv.config();

export interface Config {
  // Server
  host: string;
  port: number;
  nodeEnv: string;
  logLevel: string;

  // Probe route defaults, applied only when the query parameter is absent
  probe: {
    defaultInterval: string;
    defaultAggregation: string;
  };

  // Service
  service: {
    name: string;
    version: string;
  };
}

const nodeEnv = process.env.NODE_ENV || 'development';

export const config: Config = {
  host: process.env.HOST || '0.0.0.0',
  port: parseInt(process.env.PORT || '9090', 10),
  nodeEnv,
  logLevel: process.env.LOG_LEVEL || (nodeEnv === 'production' ? 'info' : 'debug'),

  probe: {
    defaultInterval: 'PT1M',
    defaultAggregation: 'average',
  },

  service: {
    name: process.env.SERVICE_NAME || 'azure-metrics-mock-exporter',
    version: process.env.npm_package_version || '1.0.0',
  },
};
