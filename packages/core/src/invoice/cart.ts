/**
 * Cart helpers - explicit, immutable cart state
 * @module invoice/cart
 */

import { ValidationError } from '../errors/index.js';
import type { InventoryItem } from '../storage/schemas/inventory-item.js';
import { lineItemSchema, type LineItemSnapshot } from '../storage/schemas/invoice.js';

/**
 * A line in the cart; `amount` is only fixed when the invoice is saved
 */
export type CartLine = Omit<LineItemSnapshot, 'amount'>;

/**
 * Caller-editable values of a line
 */
export type LineOverrides = Partial<Pick<CartLine, 'quantity' | 'rate' | 'discount_rate' | 'tax_rate'>>;

const cartLineSchema = lineItemSchema.omit({ amount: true });

function validateLine(operation: string, line: unknown): CartLine {
  const parsed = cartLineSchema.safeParse(line);
  if (!parsed.success) {
    throw ValidationError.fromZod(operation, parsed.error);
  }
  return parsed.data;
}

function checkIndex(operation: string, cart: readonly CartLine[], index: number): void {
  if (!Number.isInteger(index) || index < 0 || index >= cart.length) {
    throw new ValidationError(operation, [
      { field: 'index', message: `must be between 0 and ${cart.length - 1}` },
    ]);
  }
}

/**
 * Snapshot an inventory item into a cart line. Quantity defaults to 1, the
 * rate to the base price, and discount and tax to the item's rates.
 */
export function createLineItem(
  item: Pick<InventoryItem, 'item_id' | 'sku' | 'name' | 'company' | 'base_price' | 'tax_rate' | 'discount_rate'>,
  overrides: LineOverrides = {}
): CartLine {
  const line: Record<string, unknown> = {
    item_id: item.item_id,
    sku: item.sku,
    name: item.name,
    quantity: overrides.quantity ?? 1,
    rate: overrides.rate ?? item.base_price,
    discount_rate: overrides.discount_rate ?? item.discount_rate,
    tax_rate: overrides.tax_rate ?? item.tax_rate,
  };
  if (item.company !== undefined) {
    line.company = item.company;
  }
  return validateLine('create line item', line);
}

export function addLine(cart: readonly CartLine[], line: CartLine): CartLine[] {
  return [...cart, validateLine('add line', line)];
}

/**
 * Replace editable values of the line at `index`
 */
export function updateLine(cart: readonly CartLine[], index: number, patch: LineOverrides): CartLine[] {
  checkIndex('update line', cart, index);
  const next = [...cart];
  next[index] = validateLine('update line', { ...cart[index], ...patch });
  return next;
}

export function removeLine(cart: readonly CartLine[], index: number): CartLine[] {
  checkIndex('remove line', cart, index);
  return cart.filter((_, position) => position !== index);
}

export function clearCart(): CartLine[] {
  return [];
}
