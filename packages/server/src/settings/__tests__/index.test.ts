/**
 * Settings routes unit tests
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Fastify, { type FastifyInstance } from 'fastify';
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { BillingClient, DEFAULT_SETTINGS } from '@stockbill/core';
import { registerSettingsRoutes } from '../index.js';
import { registerErrorHandler } from '../../errors/index.js';

describe('Settings routes', () => {
  let fastify: FastifyInstance;
  let client: BillingClient;
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'stockbill-settings-routes-'));
    client = new BillingClient({ dataDir: dir });
    await client.init();

    fastify = Fastify();
    registerErrorHandler(fastify);
    await fastify.register(registerSettingsRoutes, { prefix: '/api/settings', client });
    await fastify.ready();
  });

  afterEach(async () => {
    await fastify.close();
    await client.destroy();
    await rm(dir, { recursive: true, force: true });
  });

  it('should return the defaults', async () => {
    const response = await fastify.inject({ method: 'GET', url: '/api/settings' });

    expect(response.statusCode).toBe(200);
    expect(JSON.parse(response.body)).toEqual(DEFAULT_SETTINGS);
  });

  it('should apply a partial update', async () => {
    const response = await fastify.inject({
      method: 'PATCH',
      url: '/api/settings',
      payload: { currency: 'EUR', default_tax_rate: 5 },
    });

    expect(response.statusCode).toBe(200);
    expect(JSON.parse(response.body)).toEqual({ ...DEFAULT_SETTINGS, currency: 'EUR', default_tax_rate: 5 });
    expect((await client.getSettings()).currency).toBe('EUR');
  });

  it('should switch the storage mode', async () => {
    const response = await fastify.inject({
      method: 'PATCH',
      url: '/api/settings',
      payload: { storage_mode: 'json' },
    });

    expect(JSON.parse(response.body).storage_mode).toBe('json');
  });

  it('should reject unknown keys', async () => {
    const response = await fastify.inject({
      method: 'PATCH',
      url: '/api/settings',
      payload: { theme: 'dark' },
    });

    expect(response.statusCode).toBe(400);
    const body = JSON.parse(response.body);
    expect(body.error).toBe('VALIDATION_ERROR');
    expect(body.issues.map((issue: { field: string }) => issue.field)).toEqual(['(root)']);
  });
});
