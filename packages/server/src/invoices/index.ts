/**
 * Invoice routes - totals preview, save and lookup
 * @module invoices
 */

import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { ValidationError, calculationLineSchema, percentageSchema } from '@stockbill/core';
import type { BillingRouteOptions } from '../types.js';

const totalsRequestSchema = z.object({
  line_items: z.array(calculationLineSchema, { required_error: 'is required' }),
  global_discount_rate: percentageSchema.default(0),
  global_tax_rate: percentageSchema.default(0),
});

interface IdParams {
  id: string;
}

/**
 * Register invoice routes
 */
export async function registerInvoiceRoutes(fastify: FastifyInstance, options: BillingRouteOptions) {
  const { client } = options;

  /**
   * POST /api/invoices/totals - Compute totals without saving
   */
  fastify.post('/totals', async (request) => {
    const parsed = totalsRequestSchema.safeParse(request.body);
    if (!parsed.success) {
      throw ValidationError.fromZod('compute invoice totals', parsed.error);
    }

    const { line_items, global_discount_rate, global_tax_rate } = parsed.data;
    return client.computeInvoiceTotals(line_items, global_discount_rate, global_tax_rate);
  });

  /**
   * POST /api/invoices - Save a draft as an invoice
   */
  fastify.post('/', async (request, reply) => {
    const invoice = await client.saveInvoice(request.body);
    return reply.code(201).send(invoice);
  });

  /**
   * GET /api/invoices - All invoices, newest first
   */
  fastify.get('/', async () => {
    const invoices = await client.listInvoices();
    return { invoices, count: invoices.length };
  });

  /**
   * GET /api/invoices/:id
   */
  fastify.get<{ Params: IdParams }>('/:id', async (request) => {
    return client.getInvoice(request.params.id);
  });

  /**
   * DELETE /api/invoices/:id
   */
  fastify.delete<{ Params: IdParams }>('/:id', async (request, reply) => {
    await client.deleteInvoice(request.params.id);
    return reply.code(204).send();
  });
}
