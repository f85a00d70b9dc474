/**
 * Decimal arithmetic unit tests
 */
import { describe, it, expect } from 'vitest';
import { Decimal } from '../decimal.js';

describe('Decimal', () => {
  describe('from', () => {
    it('should parse numbers through their shortest text', () => {
      expect(Decimal.from(0.1).plus(Decimal.from(0.2)).toString()).toBe('0.3');
      expect(Decimal.from(1.005).toFixed(2)).toBe('1.01');
    });

    it('should parse exponents', () => {
      expect(Decimal.from('1.5e2').toString()).toBe('150');
      expect(Decimal.from('2.5e-3').toString()).toBe('0.0025');
      expect(Decimal.from(1e21).toFixed(0)).toBe('1000000000000000000000');
    });

    it('should reject values that are not decimals', () => {
      expect(() => Decimal.from('abc')).toThrow(RangeError);
      expect(() => Decimal.from('')).toThrow(RangeError);
      expect(() => Decimal.from('.')).toThrow(RangeError);
      expect(() => Decimal.from(Number.NaN)).toThrow(RangeError);
      expect(() => Decimal.from(Number.POSITIVE_INFINITY)).toThrow(RangeError);
    });

    it('should return the same instance for a decimal', () => {
      const value = Decimal.from('4.20');
      expect(Decimal.from(value)).toBe(value);
    });
  });

  describe('arithmetic', () => {
    it('should multiply exactly', () => {
      expect(Decimal.from('1.1').times(Decimal.from('1.1')).toString()).toBe('1.21');
    });

    it('should take a percentage exactly', () => {
      expect(Decimal.from(150).percent(Decimal.from(10)).toFixed(2)).toBe('15.00');
      expect(Decimal.from('135').percent(Decimal.from(5)).toString()).toBe('6.75');
    });

    it('should subtract below zero', () => {
      const result = Decimal.from('1.5').minus(Decimal.from(2));
      expect(result.isNegative()).toBe(true);
      expect(result.toString()).toBe('-0.5');
    });

    it('should compare across scales', () => {
      expect(Decimal.from('1.50').equals(Decimal.from(1.5))).toBe(true);
      expect(Decimal.from('1.51').equals(Decimal.from(1.5))).toBe(false);
    });
  });

  describe('round', () => {
    it('should round half away from zero', () => {
      expect(Decimal.from('2.345').round(2).toString()).toBe('2.35');
      expect(Decimal.from('2.344').round(2).toString()).toBe('2.34');
      expect(Decimal.from('-1.005').round(2).toString()).toBe('-1.01');
      expect(Decimal.from('2.5').toFixed(0)).toBe('3');
    });

    it('should pad when there are fewer places', () => {
      expect(Decimal.from(7).toFixed(2)).toBe('7.00');
      expect(Decimal.from('0.05').toFixed(2)).toBe('0.05');
    });
  });

  describe('toExact', () => {
    it('should keep every significant digit', () => {
      expect(Decimal.from('49.975').toExact(2)).toBe('49.975');
      expect(Decimal.from('1.25').times(Decimal.from('0.8')).toExact(2)).toBe('1.00');
      expect(Decimal.from('0.990').toExact(2)).toBe('0.99');
      expect(Decimal.from(150).toExact(2)).toBe('150.00');
    });
  });
});
