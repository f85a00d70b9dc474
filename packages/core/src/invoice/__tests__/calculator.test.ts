/**
 * Invoice calculation unit tests
 */
import { describe, it, expect } from 'vitest';
import { computeInvoiceTotals, computeLineTotals } from '../calculator.js';
import { ValidationError } from '../../errors/index.js';

describe('computeLineTotals', () => {
  it('should apply the discount before the tax', () => {
    expect(computeLineTotals({ quantity: 3, rate: 50, discount_rate: 10, tax_rate: 5 })).toEqual({
      line_gross: '150.00',
      line_discount: '15.00',
      line_taxable: '135.00',
      line_tax: '6.75',
      line_amount: '141.75',
    });
  });

  it('should equal quantity times rate without discount or tax', () => {
    expect(computeLineTotals({ quantity: 4, rate: 12.5, discount_rate: 0, tax_rate: 0 }).line_amount).toBe('50.00');
  });

  it('should keep fractional quantities exact without discount or tax', () => {
    expect(computeLineTotals({ quantity: 2.5, rate: 19.99, discount_rate: 0, tax_rate: 0 })).toEqual({
      line_gross: '49.975',
      line_discount: '0.00',
      line_taxable: '49.975',
      line_tax: '0.00',
      line_amount: '49.975',
    });
    expect(computeLineTotals({ quantity: 1, rate: 1.005, discount_rate: 0, tax_rate: 0 }).line_amount).toBe('1.005');
  });

  it('should round only the tax on a fractional gross', () => {
    expect(computeLineTotals({ quantity: 0.5, rate: 19.99, discount_rate: 0, tax_rate: 5 })).toEqual({
      line_gross: '9.995',
      line_discount: '0.00',
      line_taxable: '9.995',
      line_tax: '0.50',
      line_amount: '10.495',
    });
  });

  it('should accept a zero quantity', () => {
    expect(computeLineTotals({ quantity: 0, rate: 10, discount_rate: 0, tax_rate: 18 }).line_amount).toBe('0.00');
  });

  it('should reject a negative rate', () => {
    expect(() => computeLineTotals({ quantity: 1, rate: -1, discount_rate: 0, tax_rate: 0 })).toThrow(
      'compute line totals failed: invalid input (rate: must not be negative)'
    );
  });
});

describe('computeInvoiceTotals', () => {
  it('should total a single line', () => {
    expect(computeInvoiceTotals([{ quantity: 3, rate: 50, discount_rate: 10, tax_rate: 5 }], 0, 0)).toEqual({
      lines: [
        {
          line_gross: '150.00',
          line_discount: '15.00',
          line_taxable: '135.00',
          line_tax: '6.75',
          line_amount: '141.75',
        },
      ],
      subtotal: '150.00',
      line_discount_total: '15.00',
      global_discount_amount: '0.00',
      total_discount: '15.00',
      taxable_base: '135.00',
      line_tax_total: '6.75',
      global_tax_amount: '0.00',
      total_tax: '6.75',
      grand_total: '141.75',
    });
  });

  it('should apply global rates after line discounts', () => {
    const totals = computeInvoiceTotals(
      [
        { quantity: 2, rate: 100, discount_rate: 0, tax_rate: 0 },
        { quantity: 1, rate: 50, discount_rate: 10, tax_rate: 18 },
      ],
      10,
      5
    );

    expect(totals.lines.map((line) => line.line_amount)).toEqual(['200.00', '53.10']);
    expect(totals.subtotal).toBe('250.00');
    expect(totals.line_discount_total).toBe('5.00');
    expect(totals.global_discount_amount).toBe('24.50');
    expect(totals.total_discount).toBe('29.50');
    expect(totals.taxable_base).toBe('220.50');
    expect(totals.line_tax_total).toBe('8.10');
    expect(totals.global_tax_amount).toBe('11.03');
    expect(totals.total_tax).toBe('19.13');
    expect(totals.grand_total).toBe('239.63');
  });

  it('should sum exact line amounts into the subtotal', () => {
    const line = { quantity: 1.5, rate: 0.33, discount_rate: 0, tax_rate: 0 };
    const totals = computeInvoiceTotals([line, line], 0, 0);

    expect(totals.lines.map((entry) => entry.line_amount)).toEqual(['0.495', '0.495']);
    expect(totals.subtotal).toBe('0.99');
    expect(totals.grand_total).toBe('0.99');
  });

  it('should return zeros for no lines', () => {
    const totals = computeInvoiceTotals([], 10, 10);

    expect(totals.lines).toEqual([]);
    expect(totals.grand_total).toBe('0.00');
    expect(totals.total_tax).toBe('0.00');
  });

  it('should be deterministic', () => {
    const lines = [{ quantity: 7, rate: 3.33, discount_rate: 2.5, tax_rate: 12 }];

    expect(computeInvoiceTotals(lines, 1, 1)).toEqual(computeInvoiceTotals(lines, 1, 1));
  });

  it('should report every invalid field', () => {
    const error = (() => {
      try {
        computeInvoiceTotals([{ quantity: -1, rate: 10, discount_rate: 101, tax_rate: 0 }], 0, 120);
      } catch (e) {
        return e;
      }
      return undefined;
    })();

    expect(error).toBeInstanceOf(ValidationError);
    if (error instanceof ValidationError) {
      expect(error.operation).toBe('compute invoice totals');
      expect(error.issues).toEqual([
        { field: 'line_items.0.quantity', message: 'must not be negative' },
        { field: 'line_items.0.discount_rate', message: 'must not exceed 100' },
        { field: 'global_tax_rate', message: 'must not exceed 100' },
      ]);
    }
  });
});
