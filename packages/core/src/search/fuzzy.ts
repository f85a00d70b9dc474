/**
 * String similarity on a 0-100 scale
 * @module search/fuzzy
 *
 * `ratio` is the normalized insert/delete similarity
 * `200 * lcs(a, b) / (|a| + |b|)`. `partialRatio` scores the shorter string
 * against its best-aligned window in the longer one; `tokenSetRatio`
 * compares the shared and the leftover whitespace tokens.
 */

const WORD_BITS = 32;

/**
 * Per-character position masks of a pattern of at most 32 characters
 */
interface BitPattern {
  size: number;
  full: number;
  ascii: Uint32Array;
  other: Map<number, number>;
}

function bitPattern(pattern: string): BitPattern {
  const ascii = new Uint32Array(0x80);
  const other = new Map<number, number>();
  for (let i = 0; i < pattern.length; i++) {
    const code = pattern.charCodeAt(i);
    if (code < 0x80) {
      ascii[code] |= 2 ** i;
    } else {
      other.set(code, ((other.get(code) ?? 0) | (2 ** i)) >>> 0);
    }
  }
  return { size: pattern.length, full: 2 ** pattern.length - 1, ascii, other };
}

function maskOf(pattern: BitPattern, code: number): number {
  return code < 0x80 ? pattern.ascii[code] : (pattern.other.get(code) ?? 0);
}

function popcount(value: number): number {
  let n = value - ((value >>> 1) & 0x55555555);
  n = (n & 0x33333333) + ((n >>> 2) & 0x33333333);
  return Math.imul((n + (n >>> 4)) & 0x0f0f0f0f, 0x01010101) >>> 24;
}

/**
 * Bit-parallel LCS of a pattern against `text[start, end)`: each zero bit
 * left in `v` is one matched pattern position.
 */
function bitLcs(pattern: BitPattern, text: string, start: number, end: number): number {
  let v = pattern.full;
  for (let j = start; j < end; j++) {
    const u = (v & maskOf(pattern, text.charCodeAt(j))) >>> 0;
    v = (((v + u) | (v - u)) & pattern.full) >>> 0;
  }
  return pattern.size - popcount(v);
}

function tableLcs(a: string, b: string): number {
  let previous = new Uint32Array(b.length + 1);
  let current = new Uint32Array(b.length + 1);

  for (let i = 1; i <= a.length; i++) {
    const code = a.charCodeAt(i - 1);
    for (let j = 1; j <= b.length; j++) {
      current[j] =
        code === b.charCodeAt(j - 1)
          ? previous[j - 1] + 1
          : Math.max(previous[j], current[j - 1]);
    }
    [previous, current] = [current, previous];
  }

  return previous[b.length];
}

/**
 * Length of the longest common subsequence
 */
export function lcsLength(a: string, b: string): number {
  const [short, long] = a.length <= b.length ? [a, b] : [b, a];
  if (short.length === 0) {
    return 0;
  }
  if (short.length <= WORD_BITS) {
    return bitLcs(bitPattern(short), long, 0, long.length);
  }
  return tableLcs(long, short);
}

/**
 * Normalized insert/delete similarity
 */
export function ratio(a: string, b: string): number {
  const total = a.length + b.length;
  if (total === 0) {
    return 100;
  }
  return (200 * lcsLength(a, b)) / total;
}

/**
 * Best `ratio` of the shorter string against any equally long window of the
 * longer one, or against a shorter window touching either end.
 *
 * Only windows starting on a character the shorter string contains are
 * tried; any other window scores no better than the next such window or the
 * matching end window.
 */
export function partialRatio(a: string, b: string): number {
  const [needle, haystack] = a.length <= b.length ? [a, b] : [b, a];

  if (needle.length === 0) {
    return haystack.length === 0 ? 100 : 0;
  }
  if (haystack.includes(needle)) {
    return 100;
  }

  const alphabet = new Set(needle);
  const size = needle.length;
  const pattern = size <= WORD_BITS ? bitPattern(needle) : null;
  let best = 0;

  const consider = (start: number, end: number): boolean => {
    const common = pattern
      ? bitLcs(pattern, haystack, start, end)
      : lcsLength(needle, haystack.slice(start, end));
    const score = (200 * common) / (size + end - start);
    if (score > best) {
      best = score;
    }
    return best === 100;
  };

  for (let length = 1; length < size; length++) {
    if (alphabet.has(haystack[length - 1]) && consider(0, length)) {
      return best;
    }
    const tailStart = haystack.length - length;
    if (alphabet.has(haystack[tailStart]) && consider(tailStart, haystack.length)) {
      return best;
    }
  }

  for (let start = 0; start + size <= haystack.length; start++) {
    if (alphabet.has(haystack[start]) && consider(start, start + size)) {
      return best;
    }
  }

  return best;
}

function tokenize(value: string): Set<string> {
  return new Set(value.split(/\s+/).filter((token) => token.length > 0));
}

function joinSorted(tokens: Iterable<string>): string {
  return Array.from(tokens).sort().join(' ');
}

/**
 * Similarity of the token sets: 100 when every token of one side appears on
 * the other, otherwise the best ratio between the shared tokens and each
 * side's shared-plus-leftover tokens.
 */
export function tokenSetRatio(a: string, b: string): number {
  const left = tokenize(a);
  const right = tokenize(b);

  if (left.size === 0 || right.size === 0) {
    return left.size === right.size ? 100 : 0;
  }

  const shared = [...left].filter((token) => right.has(token));
  const onlyLeft = [...left].filter((token) => !right.has(token));
  const onlyRight = [...right].filter((token) => !left.has(token));

  if (shared.length > 0 && (onlyLeft.length === 0 || onlyRight.length === 0)) {
    return 100;
  }

  const sharedText = joinSorted(shared);
  const leftText = [sharedText, joinSorted(onlyLeft)].filter(Boolean).join(' ');
  const rightText = [sharedText, joinSorted(onlyRight)].filter(Boolean).join(' ');

  if (shared.length === 0) {
    return ratio(leftText, rightText);
  }

  return Math.max(
    ratio(sharedText, leftText),
    ratio(sharedText, rightText),
    ratio(leftText, rightText)
  );
}

/**
 * Upper bound of `max(partialRatio(query, text), tokenSetRatio(query, text))`
 * from the characters the two share. Built once per query so that texts
 * which cannot reach a threshold are skipped without aligning them.
 *
 * No alignment matches more characters than the multiset overlap `c`, and a
 * window of the shorter side scores at most `200c / (size + c)`. Token
 * similarity is taken as 100 when a query token occurs in the text, else it
 * is bounded the same way against the joined query tokens.
 */
export class SimilarityBound {
  private readonly counts = new Int32Array(0x10000);
  private readonly remaining = new Int32Array(0x10000);
  private readonly codes: number[] = [];
  private readonly tokens: string[];
  private readonly tokenLength: number;

  constructor(private readonly query: string) {
    for (let i = 0; i < query.length; i++) {
      const code = query.charCodeAt(i);
      if (this.counts[code] === 0) {
        this.codes.push(code);
      }
      this.counts[code] += 1;
    }
    this.remaining.set(this.counts);
    this.tokens = [...tokenize(query)];
    this.tokenLength = joinSorted(this.tokens).length;
  }

  /**
   * Highest blob similarity `text` could score against the query
   */
  bound(text: string): number {
    const size = Math.min(this.query.length, text.length);
    if (size === 0) {
      return 100;
    }

    const shared = this.sharedCount(text);
    const partial = (200 * shared) / (size + shared);
    if (this.tokens.some((token) => text.includes(token))) {
      return 100;
    }

    const common = Math.min(shared, this.tokenLength);
    const tokens = common === 0 ? 0 : (200 * common) / (this.tokenLength + common);
    return Math.max(partial, tokens);
  }

  private sharedCount(text: string): number {
    const { remaining } = this;
    let shared = 0;
    for (let i = 0; i < text.length && shared < this.query.length; i++) {
      const code = text.charCodeAt(i);
      if (remaining[code] > 0) {
        remaining[code] -= 1;
        shared += 1;
      }
    }
    for (const code of this.codes) {
      remaining[code] = this.counts[code];
    }
    return shared;
  }
}
