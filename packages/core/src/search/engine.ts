/**
 * Fuzzy search engine - ranks inventory items against a free-text query
 * @module search/engine
 */

import { SimilarityBound, partialRatio, tokenSetRatio } from './fuzzy.js';
import { normalizeText, type SearchFields } from './indexing.js';

/**
 * Scoring weights. Blob similarity is on a 0-100 scale; boosts and the
 * numeric bonus are added on top.
 */
export interface SearchWeights {
  /** query equals the SKU */
  skuExactBoost: number;
  /** SKU starts with the query */
  skuPrefixBoost: number;
  /** query equals the name */
  nameExactBoost: number;
  /** name, or one of its words, starts with the query */
  namePrefixBoost: number;
  /** numeric query equals price or a size */
  numericBonus: number;
  /** relative tolerance when matching a numeric query */
  numericTolerance: number;
  /** results scoring below this are dropped */
  minScore: number;
  /** upper clamp of the final score */
  maxScore: number;
}

export const DEFAULT_SEARCH_WEIGHTS: Readonly<SearchWeights> = {
  skuExactBoost: 40,
  skuPrefixBoost: 25,
  nameExactBoost: 20,
  namePrefixBoost: 12,
  numericBonus: 50,
  numericTolerance: 1e-6,
  minScore: 70,
  maxScore: 200,
};

/**
 * What the engine reads from an item
 */
export interface SearchableItem {
  item_id: string;
  name: string;
  base_price: number;
  size_mm?: number;
  size_inch?: number;
  search_blob: string;
  search_fields: SearchFields;
}

export interface SearchResult<T> {
  item: T;
  score: number;
}

const NUMERIC_QUERY = /^\d+(\.\d+)?$|^\.\d+$/;

/**
 * The query as a number when it is one, otherwise null
 */
export function parseNumericQuery(query: string): number | null {
  const trimmed = query.trim();
  return NUMERIC_QUERY.test(trimmed) ? Number(trimmed) : null;
}

function nearlyEqual(a: number, b: number, tolerance: number): boolean {
  return Math.abs(a - b) <= tolerance * Math.max(1, Math.abs(a), Math.abs(b));
}

function blobScore(query: string, blob: string): number {
  return Math.max(partialRatio(query, blob), tokenSetRatio(query, blob));
}

// Room for the final two-decimal rounding when comparing a bound to the threshold
const ROUNDING_SLACK = 0.01;

function compareText(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * Stateless scorer; every call recomputes from the items it is given
 */
export class SearchEngine {
  readonly weights: SearchWeights;

  constructor(weights: Partial<SearchWeights> = {}) {
    this.weights = { ...DEFAULT_SEARCH_WEIGHTS, ...weights };
  }

  /**
   * Rank items against a query, best first
   */
  search<T extends SearchableItem>(
    query: string,
    items: readonly T[],
    limit: number
  ): SearchResult<T>[] {
    const normalized = normalizeText(query);
    const max = Math.floor(limit);
    if (normalized === '' || items.length === 0 || !(max > 0)) {
      return [];
    }

    const numeric = parseNumericQuery(normalized);
    const similarity = new SimilarityBound(normalized);
    const floor = this.weights.minScore - ROUNDING_SLACK;
    const results: SearchResult<T>[] = [];

    for (const item of items) {
      const boost = this.boost(normalized, numeric, item);
      if (floor > 0 && similarity.bound(item.search_blob) + boost < floor) {
        continue;
      }
      const score = this.finish(blobScore(normalized, item.search_blob) + boost);
      if (score >= this.weights.minScore) {
        results.push({ item, score });
      }
    }

    results.sort(
      (a, b) =>
        b.score - a.score ||
        compareText(a.item.name, b.item.name) ||
        compareText(a.item.item_id, b.item.item_id)
    );

    return results.slice(0, max);
  }

  /**
   * Final score of one item for an already normalized query
   */
  score(query: string, numeric: number | null, item: SearchableItem): number {
    return this.finish(blobScore(query, item.search_blob) + this.boost(query, numeric, item));
  }

  private boost(query: string, numeric: number | null, item: SearchableItem): number {
    const { weights } = this;
    const { sku, name } = item.search_fields;
    let score = 0;

    if (sku === query) {
      score += weights.skuExactBoost;
    } else if (sku.startsWith(query)) {
      score += weights.skuPrefixBoost;
    }

    if (name === query) {
      score += weights.nameExactBoost;
    } else if (name.startsWith(query) || name.includes(` ${query}`)) {
      score += weights.namePrefixBoost;
    }

    if (numeric !== null && this.matchesNumber(numeric, item)) {
      score += weights.numericBonus;
    }

    return score;
  }

  private finish(score: number): number {
    const clamped = Math.min(this.weights.maxScore, Math.max(0, score));
    return Math.round(clamped * 100) / 100;
  }

  private matchesNumber(target: number, item: SearchableItem): boolean {
    return [item.base_price, item.size_mm, item.size_inch].some(
      (value) => value !== undefined && nearlyEqual(value, target, this.weights.numericTolerance)
    );
  }
}

/**
 * Rank items with the default weights
 */
export function search<T extends SearchableItem>(
  query: string,
  items: readonly T[],
  limit: number,
  weights?: Partial<SearchWeights>
): SearchResult<T>[] {
  return new SearchEngine(weights).search(query, items, limit);
}
