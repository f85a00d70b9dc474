/**
 * Stockbill Server
 * HTTP adapter exposing the billing engine to a presentation layer
 */

import Fastify from 'fastify';
import cors from '@fastify/cors';
import { pathToFileURL } from 'node:url';
import { BillingClient, VERSION, type ClientConfig } from '@stockbill/core';
import { registerErrorHandler } from './errors/index.js';
import { registerItemRoutes } from './items/index.js';
import { registerInvoiceRoutes } from './invoices/index.js';
import { registerSettingsRoutes } from './settings/index.js';

export interface ServerConfig {
  port?: number;
  host?: string;
  corsOrigin?: string | string[] | boolean;
  logLevel?: string;
  /**
   * Client to serve; when omitted one is created from `billing` and closed
   * with the server
   */
  client?: BillingClient;
  billing?: ClientConfig;
}

function defaultLogLevel(): string {
  if (process.env.LOG_LEVEL) {
    return process.env.LOG_LEVEL;
  }
  return process.env.NODE_ENV === 'test' || process.env.VITEST ? 'silent' : 'info';
}

export async function createServer(config: ServerConfig = {}) {
  const {
    corsOrigin = process.env.CORS_ORIGIN || '*',
    logLevel = defaultLogLevel(),
  } = config;

  // Comma-separated list of origins
  const parsedOrigin = typeof corsOrigin === 'string' && corsOrigin.includes(',')
    ? corsOrigin.split(',').map((origin) => origin.trim())
    : corsOrigin;

  const ownsClient = !config.client;
  const client = config.client ?? new BillingClient(config.billing);
  await client.init();

  const server = Fastify({
    logger: {
      level: logLevel,
    },
  });

  await server.register(cors, {
    origin: parsedOrigin,
    methods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'X-Request-Id'],
  });

  registerErrorHandler(server);

  server.get('/health', async () => {
    return {
      status: 'ok',
      version: VERSION,
      timestamp: Date.now(),
    };
  });

  await server.register(registerItemRoutes, { prefix: '/api/items', client });
  await server.register(registerInvoiceRoutes, { prefix: '/api/invoices', client });
  await server.register(registerSettingsRoutes, { prefix: '/api/settings', client });

  if (ownsClient) {
    server.addHook('onClose', async () => {
      await client.destroy();
    });
  }

  return server;
}

export async function startServer(config: ServerConfig = {}) {
  const { port = 3000, host = '0.0.0.0' } = config;

  const server = await createServer(config);

  try {
    await server.listen({ port, host });
  } catch (err) {
    server.log.error(err);
    process.exit(1);
  }

  return server;
}

function parsePort(value: string | undefined): number {
  const port = Number(value);
  return Number.isInteger(port) && port > 0 ? port : 3000;
}

// Start server if run directly
if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  startServer({
    port: parsePort(process.env.PORT),
    host: process.env.HOST ?? '0.0.0.0',
  }).catch((error: unknown) => {
    console.error('Failed to start server:', error);
    process.exit(1);
  });
}
