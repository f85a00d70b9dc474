/**
 * Search module - index builder, similarity functions and ranking
 * @module search
 */

export * from './indexing.js';
export * from './fuzzy.js';
export * from './engine.js';
