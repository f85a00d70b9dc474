/**
 * Invoice drafts - what a caller submits to save an invoice
 * @module invoice/draft
 */

import { z } from 'zod';
import { ValidationError } from '../errors/index.js';
import { percentageSchema } from '../storage/schemas/inventory-item.js';
import { lineItemSchema } from '../storage/schemas/invoice.js';

const nonNegativeNumber = z
  .number({ invalid_type_error: 'must be a number' })
  .finite()
  .nonnegative('must not be negative');

/**
 * A line given as a full snapshot; a submitted `amount` is ignored
 */
export const draftSnapshotLineSchema = lineItemSchema.omit({ amount: true });

/**
 * A line given as an inventory reference, resolved at save time
 */
export const draftReferenceLineSchema = z
  .object({
    item_id: z.string().trim().min(1, 'is required'),
    quantity: nonNegativeNumber.optional(),
    rate: nonNegativeNumber.optional(),
    discount_rate: percentageSchema.optional(),
    tax_rate: percentageSchema.optional(),
  })
  .strict();

const optionalText = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value === '' ? undefined : value));

export const invoiceDraftSchema = z.object({
  customer_name: z
    .string({ required_error: 'is required', invalid_type_error: 'must be a string' })
    .trim()
    .min(1, 'is required'),
  customer_address: optionalText,
  customer_email: optionalText,
  notes: optionalText,
  date: z
    .string()
    .regex(/^\d{4}-\d{2}-\d{2}$/, 'must be a YYYY-MM-DD date')
    .optional(),
  global_discount_rate: percentageSchema.optional(),
  global_tax_rate: percentageSchema.optional(),
  line_items: z
    .array(z.union([draftSnapshotLineSchema, draftReferenceLineSchema]), {
      required_error: 'is required',
    })
    .min(1, 'must contain at least one line'),
});

export type InvoiceDraft = z.input<typeof invoiceDraftSchema>;
export type ParsedInvoiceDraft = z.output<typeof invoiceDraftSchema>;
export type DraftReferenceLine = z.output<typeof draftReferenceLineSchema>;
export type DraftLine = ParsedInvoiceDraft['line_items'][number];

/**
 * @throws ValidationError when a required field is missing or a line is invalid
 */
export function parseInvoiceDraft(draft: unknown): ParsedInvoiceDraft {
  const parsed = invoiceDraftSchema.safeParse(draft);
  if (!parsed.success) {
    throw ValidationError.fromZod('save invoice', parsed.error);
  }
  return parsed.data;
}

/**
 * True for a line that still has to be resolved against inventory
 */
export function isReferenceLine(line: DraftLine): line is DraftReferenceLine {
  return !('sku' in line);
}
