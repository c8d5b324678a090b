/**
 * Metrics Routes Unit Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import express from 'express';
import request from 'supertest';
import { createMetricsRoutes } from '../../../src/api/metrics-routes';
import { MetricsGenerator } from '../../../src/services/metrics-generator';
import { BASELINE_TEXT, NOW, START_TIME, testGeneratorOptions } from '../../helpers/fixtures';

describe('Metrics Routes', () => {
  let app: express.Application;

  beforeEach(() => {
    app = express();
    app.use(createMetricsRoutes(new MetricsGenerator(testGeneratorOptions())));
  });

  it('should return baseline metrics in Prometheus text format', async () => {
    const response = await request(app).get('/metrics');

    expect(response.status).toBe(200);
    expect(response.headers['content-type']).toContain('text/plain');
    expect(response.headers['content-type']).toContain('version=0.0.4');
    expect(response.text).toBe(BASELINE_TEXT);
  });

  it('should report up and the fixed start time, never azure metrics', async () => {
    const response = await request(app).get(
      '/metrics?subscription=S&target=Microsoft.Sql/managedInstances/x&metric=avg_cpu_percent'
    );

    const lines = response.text.split('\n');
    expect(lines).toContain(`up 1 ${NOW}`);
    expect(lines).toContain(`server_start_time ${START_TIME} ${NOW}`);
    expect(lines.filter((line) => line.startsWith('azure_'))).toEqual([]);
  });
});
