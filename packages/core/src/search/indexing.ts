/**
 * Search index builder - derives the searchable text of an inventory item
 * @module search/indexing
 */

/**
 * Per-field normalized text kept next to the blob so scoring can weight
 * fields without re-parsing it
 */
export interface SearchFields {
  sku: string;
  name: string;
  company: string;
  size_mm: string;
  size_inch: string;
  base_price: string;
}

/**
 * Fields of an item that feed the index
 */
export interface IndexableItem {
  sku: string;
  name: string;
  company?: string;
  size_mm?: number;
  size_inch?: number;
  base_price: number;
}

/**
 * Output of the builder
 */
export interface SearchIndexEntry {
  search_blob: string;
  search_fields: SearchFields;
}

/**
 * Order in which fields are joined into the blob
 */
export const SEARCH_FIELD_ORDER: ReadonlyArray<keyof SearchFields> = [
  'sku',
  'name',
  'company',
  'size_mm',
  'size_inch',
  'base_price',
];

/**
 * Lower-case and collapse runs of whitespace
 */
export function normalizeText(value: string): string {
  return value.toLowerCase().replace(/\s+/g, ' ').trim();
}

function stringifyMeasure(value: number | undefined): string {
  return value === undefined ? '' : String(value);
}

/**
 * Build the normalized field map for an item
 */
export function buildSearchFields(item: IndexableItem): SearchFields {
  return {
    sku: normalizeText(item.sku),
    name: normalizeText(item.name),
    company: normalizeText(item.company ?? ''),
    size_mm: stringifyMeasure(item.size_mm),
    size_inch: stringifyMeasure(item.size_inch),
    base_price: stringifyMeasure(item.base_price),
  };
}

/**
 * Build blob and field map. Runs inside every inventory upsert.
 */
export function buildSearchIndex(item: IndexableItem): SearchIndexEntry {
  const search_fields = buildSearchFields(item);
  const search_blob = SEARCH_FIELD_ORDER.map((field) => search_fields[field])
    .filter((value) => value.length > 0)
    .join(' ');

  return { search_blob, search_fields };
}
