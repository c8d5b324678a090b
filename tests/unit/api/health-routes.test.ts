/**
 * Health Routes Unit Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import express from 'express';
import request from 'supertest';
import { healthRoutes } from '../../../src/api/health-routes';

describe('Health Routes', () => {
  let app: express.Application;

  beforeEach(() => {
    app = express();
    app.use(healthRoutes);
  });

  it('should return plain text OK', async () => {
    const response = await request(app).get('/health');

    expect(response.status).toBe(200);
    expect(response.headers['content-type']).toContain('text/plain');
    expect(response.text).toBe('OK');
  });

  it('should ignore query parameters', async () => {
    const response = await request(app).get('/health?subscription=S');

    expect(response.text).toBe('OK');
  });
});
