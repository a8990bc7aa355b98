import { describe, it, expect, beforeAll, afterAll, vi } from 'vitest';
import { testDb } from '../mocks/database.js';
import { createTestApp } from '../helpers/test-app.js';
import type { AppInstance } from '../../src/shared/types/fastify.js';

describe('Health Check', () => {
  let app: AppInstance;

  beforeAll(async () => {
    app = await createTestApp();
  });

  afterAll(async () => {
    await app.close();
  });

  it('GET /health reports a connected database', async () => {
    const response = await app.inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(200);
    const body = response.json();
    expect(body.status).toBe('ok');
    expect(body.checks).toEqual({ database: 'connected' });
    expect(new Date(body.timestamp).getTime()).toBeGreaterThan(0);
  });

  it('GET /health reports degraded when the database is unreachable', async () => {
    const execute = vi.spyOn(testDb, 'execute').mockRejectedValueOnce(new Error('connection refused'));

    const response = await app.inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(503);
    expect(response.json()).toMatchObject({ status: 'degraded', checks: { database: 'disconnected' } });
    execute.mockRestore();
  });

  it('echoes a well-formed request id and replaces a malformed one', async () => {
    const kept = await app.inject({
      method: 'GET',
      url: '/health',
      headers: { 'x-request-id': 'req-123' },
    });
    const replaced = await app.inject({
      method: 'GET',
      url: '/health',
      headers: { 'x-request-id': 'not a valid id!' },
    });

    expect(kept.headers['x-request-id']).toBe('req-123');
    expect(replaced.headers['x-request-id']).not.toBe('not a valid id!');
  });
});
