/**
 * Item routes - inventory CRUD and search
 * @module items
 */

import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { ValidationError, isPlainRecord } from '@stockbill/core';
import type { BillingRouteOptions } from '../types.js';

export const DEFAULT_SEARCH_LIMIT = 10;
export const MAX_SEARCH_LIMIT = 50;

const searchQuerySchema = z.object({
  q: z.string().default(''),
  limit: z.coerce
    .number({ invalid_type_error: 'must be a number' })
    .int('must be a whole number')
    .min(1, 'must be at least 1')
    .max(MAX_SEARCH_LIMIT, `must not exceed ${MAX_SEARCH_LIMIT}`)
    .default(DEFAULT_SEARCH_LIMIT),
});

interface IdParams {
  id: string;
}

/**
 * Register item routes
 */
export async function registerItemRoutes(fastify: FastifyInstance, options: BillingRouteOptions) {
  const { client } = options;

  /**
   * GET /api/items - All items, sorted by name
   */
  fastify.get('/', async () => {
    const items = await client.listItems();
    return { items, count: items.length };
  });

  /**
   * GET /api/items/search?q=&limit= - Ranked matches
   */
  fastify.get('/search', async (request) => {
    const parsed = searchQuerySchema.safeParse(request.query);
    if (!parsed.success) {
      throw ValidationError.fromZod('search items', parsed.error);
    }

    const { q, limit } = parsed.data;
    const results = await client.searchItems(q, limit);
    return { query: q, results };
  });

  /**
   * GET /api/items/:id
   */
  fastify.get<{ Params: IdParams }>('/:id', async (request) => {
    return client.getItem(request.params.id);
  });

  /**
   * POST /api/items - Create an item
   */
  fastify.post('/', async (request, reply) => {
    const item = await client.upsertItem(request.body);
    return reply.code(201).send(item);
  });

  /**
   * PUT /api/items/:id - Update fields of an existing item
   */
  fastify.put<{ Params: IdParams }>('/:id', async (request) => {
    const { id } = request.params;
    if (!isPlainRecord(request.body)) {
      throw new ValidationError('upsert inventory', [{ field: '(root)', message: 'must be an object' }]);
    }

    await client.getItem(id);
    return client.upsertItem({ ...request.body, item_id: id });
  });

  /**
   * DELETE /api/items/:id
   */
  fastify.delete<{ Params: IdParams }>('/:id', async (request, reply) => {
    await client.deleteItem(request.params.id);
    return reply.code(204).send();
  });
}
