/**
 * Settings routes
 * @module settings
 */

import type { FastifyInstance } from 'fastify';
import type { BillingRouteOptions } from '../types.js';

/**
 * Register settings routes
 */
export async function registerSettingsRoutes(fastify: FastifyInstance, options: BillingRouteOptions) {
  const { client } = options;

  fastify.get('/', async () => client.getSettings());

  /**
   * PATCH /api/settings - Partial update; a new storage mode migrates data
   */
  fastify.patch('/', async (request) => client.updateSettings(request.body));
}
