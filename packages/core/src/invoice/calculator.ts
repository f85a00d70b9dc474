/**
 * Invoice calculation engine
 * @module invoice/calculator
 *
 * Per line:
 *   gross    = quantity * rate
 *   discount = round(gross * discount_rate / 100)
 *   taxable  = gross - discount
 *   tax      = round(taxable * tax_rate / 100)
 *   amount   = taxable + tax
 *
 * The global discount applies to the subtotal after line discounts, the
 * global tax to the amount after every discount. Only discounts and taxes
 * are rounded, half-up to cents; `gross` and every sum stay exact, so a line
 * without discount or tax costs exactly `quantity * rate`.
 */

import { z } from 'zod';
import { ValidationError } from '../errors/index.js';
import { percentageSchema } from '../storage/schemas/inventory-item.js';
import { Decimal } from './decimal.js';

const CENTS = 2;

const nonNegativeNumber = z
  .number({ required_error: 'is required', invalid_type_error: 'must be a number' })
  .finite()
  .nonnegative('must not be negative');

/**
 * Price inputs of one line
 */
export const calculationLineSchema = z.object({
  quantity: nonNegativeNumber,
  rate: nonNegativeNumber,
  discount_rate: percentageSchema,
  tax_rate: percentageSchema,
});

export type CalculationLine = z.infer<typeof calculationLineSchema>;

const calculationInputSchema = z.object({
  line_items: z.array(calculationLineSchema),
  global_discount_rate: percentageSchema,
  global_tax_rate: percentageSchema,
});

/**
 * Money results of one line, as decimal strings with at least two places
 */
export interface LineTotals {
  line_gross: string;
  line_discount: string;
  line_taxable: string;
  line_tax: string;
  line_amount: string;
}

/**
 * Money results of an invoice, as decimal strings with at least two places
 */
export interface InvoiceTotals {
  lines: LineTotals[];
  subtotal: string;
  line_discount_total: string;
  global_discount_amount: string;
  total_discount: string;
  taxable_base: string;
  line_tax_total: string;
  global_tax_amount: string;
  total_tax: string;
  grand_total: string;
}

interface LineAmounts {
  gross: Decimal;
  discount: Decimal;
  taxable: Decimal;
  tax: Decimal;
  amount: Decimal;
}

function money(value: Decimal): Decimal {
  return value.round(CENTS);
}

function text(value: Decimal): string {
  return value.toExact(CENTS);
}

function calculateLine(line: CalculationLine): LineAmounts {
  const gross = Decimal.from(line.quantity).times(Decimal.from(line.rate));
  const discount = money(gross.percent(Decimal.from(line.discount_rate)));
  const taxable = gross.minus(discount);
  const tax = money(taxable.percent(Decimal.from(line.tax_rate)));

  return { gross, discount, taxable, tax, amount: taxable.plus(tax) };
}

function toLineTotals(amounts: LineAmounts): LineTotals {
  return {
    line_gross: text(amounts.gross),
    line_discount: text(amounts.discount),
    line_taxable: text(amounts.taxable),
    line_tax: text(amounts.tax),
    line_amount: text(amounts.amount),
  };
}

/**
 * Totals of a single line
 *
 * @throws ValidationError on a negative quantity or rate, or a rate above 100
 */
export function computeLineTotals(line: CalculationLine): LineTotals {
  const parsed = calculationLineSchema.safeParse(line);
  if (!parsed.success) {
    throw ValidationError.fromZod('compute line totals', parsed.error);
  }
  return toLineTotals(calculateLine(parsed.data));
}

/**
 * Totals of an invoice. Pure: the same inputs always give the same strings.
 *
 * @throws ValidationError on a negative quantity or rate, or a rate above 100
 */
export function computeInvoiceTotals(
  lines: readonly CalculationLine[],
  globalDiscountRate: number,
  globalTaxRate: number
): InvoiceTotals {
  const parsed = calculationInputSchema.safeParse({
    line_items: lines,
    global_discount_rate: globalDiscountRate,
    global_tax_rate: globalTaxRate,
  });
  if (!parsed.success) {
    throw ValidationError.fromZod('compute invoice totals', parsed.error);
  }

  const input = parsed.data;
  const amounts = input.line_items.map(calculateLine);

  const subtotal = amounts.reduce((sum, line) => sum.plus(line.gross), Decimal.ZERO);
  const lineDiscountTotal = amounts.reduce((sum, line) => sum.plus(line.discount), Decimal.ZERO);
  const lineTaxTotal = amounts.reduce((sum, line) => sum.plus(line.tax), Decimal.ZERO);

  const globalDiscount = money(
    subtotal.minus(lineDiscountTotal).percent(Decimal.from(input.global_discount_rate))
  );
  const totalDiscount = lineDiscountTotal.plus(globalDiscount);

  const taxableBase = subtotal.minus(totalDiscount);
  const globalTax = money(taxableBase.percent(Decimal.from(input.global_tax_rate)));
  const totalTax = lineTaxTotal.plus(globalTax);

  const grandTotal = subtotal.minus(totalDiscount).plus(totalTax);

  return {
    lines: amounts.map(toLineTotals),
    subtotal: text(subtotal),
    line_discount_total: text(lineDiscountTotal),
    global_discount_amount: text(globalDiscount),
    total_discount: text(totalDiscount),
    taxable_base: text(taxableBase),
    line_tax_total: text(lineTaxTotal),
    global_tax_amount: text(globalTax),
    total_tax: text(totalTax),
    grand_total: text(grandTotal),
  };
}
