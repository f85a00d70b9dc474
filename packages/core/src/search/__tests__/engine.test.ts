/**
 * Search engine unit tests
 */
import { describe, it, expect } from 'vitest';
import {
  DEFAULT_SEARCH_WEIGHTS,
  SearchEngine,
  parseNumericQuery,
  search,
  type SearchableItem,
} from '../engine.js';
import { buildSearchIndex, normalizeText, type IndexableItem } from '../indexing.js';

function makeItem(item_id: string, fields: IndexableItem): SearchableItem {
  return { item_id, ...fields, ...buildSearchIndex(fields) };
}

const pipe = makeItem('i-1', { sku: 'A100', name: 'Steel Pipe', base_price: 100 });
const elbow = makeItem('i-2', { sku: 'B200', name: 'Copper Elbow', company: 'Acme', base_price: 4.5 });
const washer = makeItem('i-3', { sku: 'W25', name: 'Flat Washer', size_mm: 25, size_inch: 0.5, base_price: 0.2 });
const hexBolt = makeItem('i-4', { sku: 'X1', name: 'Hex Bolt', base_price: 1 });
const hexAnchor = makeItem('i-5', { sku: 'X2', name: 'Hex Anchor', base_price: 2 });

const catalog = [pipe, elbow, washer, hexBolt, hexAnchor];

const summary = (results: { item: SearchableItem; score: number }[]) =>
  results.map(({ item, score }) => [item.item_id, score]);

describe('parseNumericQuery', () => {
  it('should accept plain decimals only', () => {
    expect(parseNumericQuery('100')).toBe(100);
    expect(parseNumericQuery(' 0.5 ')).toBe(0.5);
    expect(parseNumericQuery('.5')).toBe(0.5);
    expect(parseNumericQuery('a100')).toBeNull();
    expect(parseNumericQuery('1e3')).toBeNull();
    expect(parseNumericQuery('-4')).toBeNull();
  });
});

describe('SearchEngine', () => {
  const engine = new SearchEngine();

  describe('empty input', () => {
    it('should return nothing for an empty query', () => {
      expect(engine.search('', catalog, 10)).toEqual([]);
      expect(engine.search('   ', catalog, 10)).toEqual([]);
    });

    it('should return nothing for an empty catalog', () => {
      expect(engine.search('pipe', [], 10)).toEqual([]);
    });

    it('should return nothing for a non-positive limit', () => {
      expect(engine.search('pipe', catalog, 0)).toEqual([]);
    });
  });

  describe('scoring', () => {
    it('should add the name prefix boost to a name word match', () => {
      expect(summary(engine.search('steel', catalog, 10))).toEqual([['i-1', 112]]);
    });

    it('should rank an exact SKU above a name match', () => {
      const bySku = engine.search('A100', catalog, 10);
      const byName = engine.search('steel', catalog, 10);

      expect(summary(bySku)).toEqual([['i-1', 140]]);
      expect(bySku[0].score).toBeGreaterThan(byName[0].score);
    });

    it('should add the SKU prefix boost', () => {
      const [first] = engine.search('w2', catalog, 1);

      expect(first.item.item_id).toBe('i-3');
      expect(first.score).toBe(100 + DEFAULT_SEARCH_WEIGHTS.skuPrefixBoost);
    });

    it('should add the exact name boost', () => {
      const [first] = engine.search('Copper Elbow', catalog, 1);

      expect(first.item.item_id).toBe('i-2');
      expect(first.score).toBe(100 + DEFAULT_SEARCH_WEIGHTS.nameExactBoost);
    });

    it('should tolerate typos', () => {
      expect(summary(engine.search('steal', catalog, 10))).toEqual([['i-1', 80]]);
    });

    it('should drop items below the threshold', () => {
      expect(engine.search('xyz', catalog, 10)).toEqual([]);
    });
  });

  describe('numeric queries', () => {
    it('should match the price', () => {
      expect(engine.search('100', catalog, 1)).toEqual([{ item: pipe, score: 150 }]);
    });

    it('should match a price written with extra decimals', () => {
      expect(engine.search('100.0', catalog, 1)).toEqual([{ item: pipe, score: 125 }]);
    });

    it('should match sizes', () => {
      expect(engine.search('0.5', catalog, 1)[0]).toEqual({ item: washer, score: 150 });
      expect(engine.search('25', catalog, 1)[0]).toEqual({ item: washer, score: 150 });
    });
  });

  describe('ordering', () => {
    it('should break score ties by name', () => {
      expect(summary(engine.search('hex', catalog, 10))).toEqual([
        ['i-5', 112],
        ['i-4', 112],
      ]);
    });

    it('should break name ties by id', () => {
      const twin = makeItem('i-0', { sku: 'X3', name: 'Hex Bolt', base_price: 1 });

      expect(engine.search('hex bolt', [hexBolt, twin], 10).map(({ item }) => item.item_id)).toEqual([
        'i-0',
        'i-4',
      ]);
    });

    it('should not depend on catalog order', () => {
      const expected = engine.search('hex', catalog, 10);
      const reversed = engine.search('hex', [...catalog].reverse(), 10);
      const rotated = engine.search('hex', [...catalog.slice(2), ...catalog.slice(0, 2)], 10);

      expect(reversed).toEqual(expected);
      expect(rotated).toEqual(expected);
    });

    it('should truncate to the limit', () => {
      expect(engine.search('hex', catalog, 1).map(({ item }) => item.item_id)).toEqual(['i-5']);
    });
  });

  describe('candidate skipping', () => {
    const queries = ['steel', 'steal', 'hex', 'hex bolt', 'a100', 'w2', '100', '0.5', 'coper elbw', 'xyz'];

    it('should return what scoring every item would', () => {
      for (const query of queries) {
        const normalized = normalizeText(query);
        const numeric = parseNumericQuery(normalized);
        const expected = catalog
          .map((item) => ({ item, score: engine.score(normalized, numeric, item) }))
          .filter(({ score }) => score >= DEFAULT_SEARCH_WEIGHTS.minScore)
          .sort((a, b) => b.score - a.score || (a.item.name < b.item.name ? -1 : 1));

        expect(engine.search(query, catalog, 10)).toEqual(expected);
      }
    });

    it('should keep items that only reach the threshold through boosts', () => {
      const lowered = new SearchEngine({ minScore: 130 });

      expect(summary(lowered.search('a100', catalog, 10))).toEqual([['i-1', 140]]);
    });
  });

  describe('large catalogs', () => {
    const materials = ['Steel', 'Copper', 'Brass', 'Nylon', 'Zinc', 'Iron', 'Alloy'];
    const parts = ['Pipe', 'Elbow', 'Washer', 'Bolt', 'Anchor', 'Valve', 'Flange', 'Bracket', 'Coupling'];
    const large = Array.from({ length: 50_000 }, (_, i) =>
      makeItem(`i-${i}`, {
        sku: `P${i}`,
        name: `${materials[i % materials.length]} ${parts[Math.floor(i / materials.length) % parts.length]}`,
        company: i % 2 === 0 ? 'Acme' : 'Globex',
        size_mm: (i % 40) + 1,
        base_price: (i % 500) / 4,
      })
    );

    const timed = (query: string) => {
      const started = performance.now();
      const results = engine.search(query, large, 10);
      return { results, elapsed: performance.now() - started };
    };

    it('should find a SKU among 50,000 items within a second', () => {
      const { results, elapsed } = timed('P12345');

      expect(results[0]).toEqual({ item: large[12345], score: 140 });
      expect(elapsed).toBeLessThan(1000);
    });

    it('should rank a misspelled name among 50,000 items within a second', () => {
      const { results, elapsed } = timed('coper elbw');

      expect(results).toHaveLength(10);
      expect(results.every(({ item }) => item.name === 'Copper Elbow')).toBe(true);
      expect(elapsed).toBeLessThan(1000);
    });
  });

  describe('weights', () => {
    it('should clamp to the maximum score', () => {
      const capped = new SearchEngine({ maxScore: 120 });

      expect(capped.search('A100', catalog, 1)[0].score).toBe(120);
    });

    it('should honor a custom threshold', () => {
      expect(search('steal', catalog, 10, { minScore: 81 })).toEqual([]);
    });

    it('should merge overrides over the defaults', () => {
      expect(new SearchEngine({ skuExactBoost: 5 }).weights).toEqual({
        ...DEFAULT_SEARCH_WEIGHTS,
        skuExactBoost: 5,
      });
    });
  });
});
