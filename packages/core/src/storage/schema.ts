/**
 * Collection definitions for the record store
 * @module storage/schema
 */

import type { z } from 'zod';
import {
  buildInventoryItem,
  inventoryItemSchema,
  type InventoryItem,
} from './schemas/inventory-item.js';
import { buildInvoice, invoiceSchema, type Invoice } from './schemas/invoice.js';

export {
  inventoryItemSchema,
  inventoryItemInputSchema,
  percentageSchema,
  type InventoryItem,
  type InventoryItemInput,
} from './schemas/inventory-item.js';
export {
  invoiceSchema,
  invoiceInputSchema,
  lineItemSchema,
  moneySchema,
  type Invoice,
  type InvoiceInput,
  type LineItemSnapshot,
} from './schemas/invoice.js';

/**
 * Names of the persisted collections
 */
export const COLLECTION_NAMES = ['inventory', 'invoices'] as const;

export type CollectionName = (typeof COLLECTION_NAMES)[number];

/**
 * Stored record type per collection
 */
export interface CollectionRecordMap {
  inventory: InventoryItem;
  invoices: Invoice;
}

/**
 * Values the store hands to a collection when building a record
 */
export interface BuildContext<R> {
  id: string;
  now: string;
  existing?: R;
  defaults: {
    tax_rate: number;
    discount_rate: number;
  };
}

/**
 * How the store validates, identifies and builds records of one collection
 */
export interface CollectionDefinition<R> {
  name: CollectionName;
  idField: keyof R & string;
  schema: z.ZodType<R, z.ZodTypeDef, unknown>;
  getId(record: R): string;
  /** key that must not repeat across records */
  unique?: {
    field: keyof R & string;
    key(record: R): string;
  };
  build(input: Record<string, unknown>, context: BuildContext<R>): R;
}

/**
 * Collection definitions
 */
export const collections: {
  [C in CollectionName]: CollectionDefinition<CollectionRecordMap[C]>;
} = {
  inventory: {
    name: 'inventory',
    idField: 'item_id',
    schema: inventoryItemSchema,
    getId: (record) => record.item_id,
    unique: {
      field: 'sku',
      key: (record) => record.sku.trim().toLowerCase(),
    },
    build: (input, context) => buildInventoryItem(input, context),
  },
  invoices: {
    name: 'invoices',
    idField: 'invoice_id',
    schema: invoiceSchema,
    getId: (record) => record.invoice_id,
    unique: {
      field: 'invoice_number',
      key: (record) => record.invoice_number,
    },
    build: (input, context) => buildInvoice(input, context),
  },
};
