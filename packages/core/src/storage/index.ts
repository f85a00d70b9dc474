/**
 * Storage module - record store, snapshot files and storage formats
 * @module storage
 */

export * from './schema.js';
export * from './formats.js';
export * from './compression.js';
export * from './file-store.js';
export * from './lock.js';
export * from './record-store.js';
