/**
 * Invoice module - decimal arithmetic, totals and cart state
 * @module invoice
 */

export * from './decimal.js';
export * from './calculator.js';
export * from './cart.js';
export * from './draft.js';
