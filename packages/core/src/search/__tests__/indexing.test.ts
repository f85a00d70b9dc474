/**
 * Search index builder unit tests
 */
import { describe, it, expect } from 'vitest';
import { buildSearchIndex, normalizeText } from '../indexing.js';

describe('normalizeText', () => {
  it('should lower-case and collapse whitespace', () => {
    expect(normalizeText('  Steel\t\tPIPE \n 1/2"  ')).toBe('steel pipe 1/2"');
  });
});

describe('buildSearchIndex', () => {
  it('should join fields in a fixed order', () => {
    const entry = buildSearchIndex({
      sku: 'A100',
      name: 'Steel Pipe',
      company: 'Acme  Metals',
      size_mm: 25,
      size_inch: 1,
      base_price: 12.5,
    });

    expect(entry.search_blob).toBe('a100 steel pipe acme metals 25 1 12.5');
    expect(entry.search_fields).toEqual({
      sku: 'a100',
      name: 'steel pipe',
      company: 'acme metals',
      size_mm: '25',
      size_inch: '1',
      base_price: '12.5',
    });
  });

  it('should skip empty fields in the blob', () => {
    const entry = buildSearchIndex({ sku: 'B200', name: 'Elbow', base_price: 0 });

    expect(entry.search_blob).toBe('b200 elbow 0');
    expect(entry.search_fields.company).toBe('');
  });
});
