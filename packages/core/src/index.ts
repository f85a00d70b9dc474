/**
 * Stockbill core
 *
 * Inventory records, fuzzy item search and decimal invoice totals over a
 * local data directory with backup-before-write persistence.
 *
 * @packageDocumentation
 */

// Errors
export * from './errors/index.js';

// Logging
export * from './logger/index.js';

// Configuration and settings
export * from './config/index.js';

// Storage
export * from './storage/index.js';

// Search
export * from './search/index.js';

// Invoices
export * from './invoice/index.js';

// Client
export * from './client/index.js';

// Version
export const VERSION = '0.1.0' as const;
