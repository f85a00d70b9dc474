/**
 * Inventory item schema definition
 * @module storage/schemas/inventory-item
 */

import { z } from 'zod';
import { ValidationError } from '../../errors/index.js';
import { buildSearchIndex } from '../../search/indexing.js';

/**
 * Percentage in [0, 100]
 */
export const percentageSchema = z
  .number({ invalid_type_error: 'must be a number' })
  .finite()
  .min(0, 'must not be negative')
  .max(100, 'must not exceed 100');

const measureSchema = z
  .number({ invalid_type_error: 'must be a number' })
  .finite()
  .nonnegative('must not be negative');

const optionalText = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value === '' ? undefined : value));

const requiredText = z
  .string({ required_error: 'is required', invalid_type_error: 'must be a string' })
  .trim()
  .min(1, 'is required');

/**
 * Caller-supplied item fields. Ids, timestamps and the search index are
 * never taken from the caller.
 */
export const inventoryItemInputSchema = z.object({
  item_id: z.string().trim().min(1).optional(),
  sku: requiredText,
  name: requiredText,
  company: optionalText,
  size_mm: measureSchema.optional(),
  size_inch: measureSchema.optional(),
  base_price: measureSchema.default(0),
  tax_rate: percentageSchema.optional(),
  discount_rate: percentageSchema.optional(),
});

export type InventoryItemInput = z.input<typeof inventoryItemInputSchema>;

/**
 * Inventory item as stored
 */
export const inventoryItemSchema = z.object({
  item_id: z.string().min(1),
  sku: z.string().min(1),
  name: z.string().min(1),
  company: z.string().optional(),
  size_mm: measureSchema.optional(),
  size_inch: measureSchema.optional(),
  base_price: measureSchema,
  tax_rate: percentageSchema,
  discount_rate: percentageSchema,
  search_blob: z.string(),
  search_fields: z.object({
    sku: z.string(),
    name: z.string(),
    company: z.string(),
    size_mm: z.string(),
    size_inch: z.string(),
    base_price: z.string(),
  }),
  created_at: z.string(),
  updated_at: z.string(),
});

export type InventoryItem = z.infer<typeof inventoryItemSchema>;

/**
 * Values the store supplies when building an item
 */
export interface InventoryBuildContext {
  id: string;
  now: string;
  existing?: InventoryItem;
  defaults: {
    tax_rate: number;
    discount_rate: number;
  };
}

/**
 * Fields a caller may set, taken from a stored item
 */
function editableFields(item: InventoryItem): InventoryItemInput {
  return {
    sku: item.sku,
    name: item.name,
    company: item.company,
    size_mm: item.size_mm,
    size_inch: item.size_inch,
    base_price: item.base_price,
    tax_rate: item.tax_rate,
    discount_rate: item.discount_rate,
  };
}

/**
 * Validate caller input and build the stored item, search index included.
 * With an existing item the input is merged over its editable fields.
 */
export function buildInventoryItem(
  input: Record<string, unknown>,
  context: InventoryBuildContext
): InventoryItem {
  const merged = context.existing ? { ...editableFields(context.existing), ...input } : input;
  const parsed = inventoryItemInputSchema.safeParse(merged);

  if (!parsed.success) {
    throw ValidationError.fromZod('upsert inventory', parsed.error);
  }

  const fields = parsed.data;
  const item: InventoryItem = {
    item_id: context.id,
    sku: fields.sku,
    name: fields.name,
    base_price: fields.base_price,
    tax_rate: fields.tax_rate ?? context.defaults.tax_rate,
    discount_rate: fields.discount_rate ?? context.defaults.discount_rate,
    ...buildSearchIndex(fields),
    created_at: context.existing?.created_at ?? context.now,
    updated_at: context.now,
  };

  if (fields.company !== undefined) item.company = fields.company;
  if (fields.size_mm !== undefined) item.size_mm = fields.size_mm;
  if (fields.size_inch !== undefined) item.size_inch = fields.size_inch;

  return item;
}
