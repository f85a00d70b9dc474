import type { FastifyPluginOptions } from 'fastify';
import type { BillingClient } from '@stockbill/core';

/**
 * Options shared by the route plugins
 */
export interface BillingRouteOptions extends FastifyPluginOptions {
  client: BillingClient;
}
