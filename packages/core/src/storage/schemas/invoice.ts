/**
 * Invoice schema definition
 * @module storage/schemas/invoice
 */

import { z } from 'zod';
import { ValidationError } from '../../errors/index.js';
import { percentageSchema } from './inventory-item.js';

/**
 * Exact money amount with at least two decimals, e.g. `141.75` or `49.975`
 */
export const moneySchema = z.string().regex(/^\d+\.\d{2,}$/, 'must be an amount with at least two decimals');

const nonNegativeNumber = z
  .number({ invalid_type_error: 'must be a number' })
  .finite()
  .nonnegative('must not be negative');

const optionalText = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value === '' ? undefined : value));

/**
 * Frozen copy of a cart line inside a saved invoice
 */
export const lineItemSchema = z.object({
  item_id: z.string().min(1),
  sku: z.string(),
  name: z.string(),
  company: z.string().optional(),
  quantity: nonNegativeNumber,
  rate: nonNegativeNumber,
  discount_rate: percentageSchema,
  tax_rate: percentageSchema,
  amount: moneySchema,
});

export type LineItemSnapshot = z.infer<typeof lineItemSchema>;

/**
 * Fields accepted by the store for an invoice
 */
export const invoiceInputSchema = z.object({
  invoice_number: z.string({ required_error: 'is required' }).min(1, 'is required'),
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'must be a YYYY-MM-DD date'),
  customer_name: z
    .string({ required_error: 'is required', invalid_type_error: 'must be a string' })
    .trim()
    .min(1, 'is required'),
  customer_address: optionalText,
  customer_email: optionalText,
  notes: optionalText,
  global_discount_rate: percentageSchema,
  global_tax_rate: percentageSchema,
  line_items: z.array(lineItemSchema).min(1, 'must contain at least one line'),
  subtotal: moneySchema,
  total_discount: moneySchema,
  total_tax: moneySchema,
  grand_total: moneySchema,
});

export type InvoiceInput = z.input<typeof invoiceInputSchema>;

/**
 * Invoice as stored
 */
export const invoiceSchema = invoiceInputSchema.extend({
  invoice_id: z.string().min(1),
  customer_address: z.string().optional(),
  customer_email: z.string().optional(),
  notes: z.string().optional(),
  created_at: z.string(),
  updated_at: z.string(),
});

export type Invoice = z.infer<typeof invoiceSchema>;

/**
 * Values the store supplies when building an invoice
 */
export interface InvoiceBuildContext {
  id: string;
  now: string;
  existing?: Invoice;
}

/**
 * Validate and build the stored invoice. The invoice number of an existing
 * invoice can never change.
 */
export function buildInvoice(
  input: Record<string, unknown>,
  context: InvoiceBuildContext
): Invoice {
  const { existing } = context;
  const merged = existing ? { ...existing, ...input } : input;
  const parsed = invoiceInputSchema.safeParse(merged);

  if (!parsed.success) {
    throw ValidationError.fromZod('upsert invoices', parsed.error);
  }

  if (existing && parsed.data.invoice_number !== existing.invoice_number) {
    throw new ValidationError('upsert invoices', [
      { field: 'invoice_number', message: 'cannot change once assigned' },
    ]);
  }

  const { customer_address, customer_email, notes, ...rest } = parsed.data;
  const invoice: Invoice = {
    invoice_id: context.id,
    ...rest,
    created_at: existing?.created_at ?? context.now,
    updated_at: context.now,
  };

  if (customer_address !== undefined) invoice.customer_address = customer_address;
  if (customer_email !== undefined) invoice.customer_email = customer_email;
  if (notes !== undefined) invoice.notes = notes;

  return invoice;
}
