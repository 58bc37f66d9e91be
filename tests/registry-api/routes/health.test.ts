import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import healthRouter, { makeHealth } from '../../../src/registry-api/routes/health';
import type { HealthRecord } from '@shared/types';
import { makeRegistry } from '../../helpers/fixtures';
import { requestJson, startServer } from '../../helpers/http';
import type { TestServer } from '../../helpers/http';

describe('health router', () => {
  it('exports a router', () => {
    expect(healthRouter).toBeDefined();
    expect(healthRouter.stack).toBeDefined();
  });

  it('builds a health record', () => {
    const health = makeHealth('hi', null);
    expect(health.status).toBe(200);
    expect(health.status_message).toBe('OK');
    expect(health.echo).toBe('hi');
    expect(health.path_echo).toBeNull();
    expect(health.ip_address).toMatch(/^\d+\.\d+\.\d+\.\d+$/);
  });
});

describe('GET /health', () => {
  let server: TestServer;

  beforeEach(async () => {
    server = await startServer(makeRegistry().registry);
  });

  afterEach(async () => {
    await server.close();
  });

  it('echoes the query string', async () => {
    const { status, body } = await requestJson<HealthRecord>(server.baseUrl, 'GET', '/health?echo=hello');
    expect(status).toBe(200);
    expect(body.data?.echo).toBe('hello');
    expect(body.data?.path_echo).toBeNull();
  });

  it('echoes the path segment', async () => {
    const { body } = await requestJson<HealthRecord>(server.baseUrl, 'GET', '/health/ping');
    expect(body.data?.path_echo).toBe('ping');
    expect(body.data?.echo).toBeNull();
  });

  it('lists the endpoints at the root', async () => {
    const { status, body } = await requestJson<{ endpoints: Record<string, string> }>(
      server.baseUrl,
      'GET',
      '/',
    );
    expect(status).toBe(200);
    expect(body.data?.endpoints).toEqual({
      health: '/health',
      persons: '/persons',
      addresses: '/addresses',
      organizations: '/organizations',
      courses: '/courses',
    });
  });

  it('answers unknown routes with 404', async () => {
    const { status, body } = await requestJson(server.baseUrl, 'GET', '/teachers');
    expect(status).toBe(404);
    expect(body).toEqual({ success: false, error: 'No route for GET /teachers' });
  });
});
