/**
 * Invoice routes unit tests
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Fastify, { type FastifyInstance } from 'fastify';
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { BillingClient } from '@stockbill/core';
import { registerInvoiceRoutes } from '../index.js';
import { registerErrorHandler } from '../../errors/index.js';

const draft = {
  customer_name: 'Test Customer',
  date: '2024-03-05',
  line_items: [
    { item_id: 'svc', sku: 'SVC', name: 'Fitting Work', quantity: 3, rate: 50, discount_rate: 10, tax_rate: 5 },
  ],
};

describe('Invoice routes', () => {
  let fastify: FastifyInstance;
  let client: BillingClient;
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'stockbill-invoices-'));
    client = new BillingClient({ dataDir: dir });
    await client.init();

    fastify = Fastify();
    registerErrorHandler(fastify);
    await fastify.register(registerInvoiceRoutes, { prefix: '/api/invoices', client });
    await fastify.ready();
  });

  afterEach(async () => {
    await fastify.close();
    await client.destroy();
    await rm(dir, { recursive: true, force: true });
  });

  describe('POST /api/invoices/totals', () => {
    it('should compute totals without saving', async () => {
      const response = await fastify.inject({
        method: 'POST',
        url: '/api/invoices/totals',
        payload: { line_items: [{ quantity: 3, rate: 50, discount_rate: 10, tax_rate: 5 }] },
      });

      expect(response.statusCode).toBe(200);
      const body = JSON.parse(response.body);
      expect(body.subtotal).toBe('150.00');
      expect(body.global_discount_amount).toBe('0.00');
      expect(body.total_tax).toBe('6.75');
      expect(body.grand_total).toBe('141.75');
      expect(await client.listInvoices()).toEqual([]);
    });

    it('should reject a negative quantity', async () => {
      const response = await fastify.inject({
        method: 'POST',
        url: '/api/invoices/totals',
        payload: { line_items: [{ quantity: -3, rate: 50, discount_rate: 0, tax_rate: 0 }] },
      });

      expect(response.statusCode).toBe(400);
      expect(JSON.parse(response.body).issues).toEqual([
        { field: 'line_items.0.quantity', message: 'must not be negative' },
      ]);
    });

    it('should require lines', async () => {
      const response = await fastify.inject({
        method: 'POST',
        url: '/api/invoices/totals',
        payload: { global_tax_rate: 5 },
      });

      expect(response.statusCode).toBe(400);
      expect(JSON.parse(response.body).issues).toEqual([{ field: 'line_items', message: 'is required' }]);
    });
  });

  describe('POST /api/invoices', () => {
    it('should save an invoice with the next number', async () => {
      const response = await fastify.inject({ method: 'POST', url: '/api/invoices', payload: draft });

      expect(response.statusCode).toBe(201);
      const body = JSON.parse(response.body);
      expect(body.invoice_number).toBe('INV-0001');
      expect(body.date).toBe('2024-03-05');
      expect(body.line_items[0].amount).toBe('141.75');
      expect(body.grand_total).toBe('141.75');
    });

    it('should reject a draft without lines', async () => {
      const response = await fastify.inject({
        method: 'POST',
        url: '/api/invoices',
        payload: { customer_name: 'Test Customer', line_items: [] },
      });

      expect(response.statusCode).toBe(400);
      expect(JSON.parse(response.body).issues).toEqual([
        { field: 'line_items', message: 'must contain at least one line' },
      ]);
    });

    it('should return 404 for a missing inventory reference', async () => {
      const response = await fastify.inject({
        method: 'POST',
        url: '/api/invoices',
        payload: { customer_name: 'Test Customer', line_items: [{ item_id: 'missing' }] },
      });

      expect(response.statusCode).toBe(404);
      expect(JSON.parse(response.body).error).toBe('NOT_FOUND');
    });
  });

  describe('lookup and delete', () => {
    it('should list, fetch and delete invoices', async () => {
      const saved = JSON.parse((await fastify.inject({ method: 'POST', url: '/api/invoices', payload: draft })).body);

      const list = JSON.parse((await fastify.inject({ method: 'GET', url: '/api/invoices' })).body);
      expect(list.count).toBe(1);
      expect(list.invoices[0].invoice_id).toBe(saved.invoice_id);

      const fetched = await fastify.inject({ method: 'GET', url: `/api/invoices/${saved.invoice_id}` });
      expect(JSON.parse(fetched.body)).toEqual(saved);

      const deleted = await fastify.inject({ method: 'DELETE', url: `/api/invoices/${saved.invoice_id}` });
      expect(deleted.statusCode).toBe(204);

      const missing = await fastify.inject({ method: 'GET', url: `/api/invoices/${saved.invoice_id}` });
      expect(missing.statusCode).toBe(404);
    });
  });
});
