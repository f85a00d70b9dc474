/**
 * Storage formats - interchangeable encodings of a record table
 * @module storage/formats
 */

import { StorageFormatError } from '../errors/index.js';
import { CompressionService } from './compression.js';

/**
 * Storage mode as chosen in settings
 */
export type StorageMode = 'columnar' | 'json';

/**
 * A persisted record before collection-level validation
 */
export type StoredRecord = Record<string, unknown>;

/**
 * Strategy for turning a record table into bytes and back
 */
export interface StorageFormat {
  readonly mode: StorageMode;
  readonly extension: string;
  encode(records: readonly StoredRecord[]): Uint8Array;
  decode(bytes: Uint8Array): StoredRecord[];
}

/**
 * Check for a non-array object
 */
export function isPlainRecord(value: unknown): value is StoredRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Flat structured file: a pretty-printed JSON array
 */
export class JsonFormat implements StorageFormat {
  readonly mode = 'json' as const;
  readonly extension = '.json';

  encode(records: readonly StoredRecord[]): Uint8Array {
    return new TextEncoder().encode(`${JSON.stringify(records, null, 2)}\n`);
  }

  decode(bytes: Uint8Array): StoredRecord[] {
    let parsed: unknown;
    try {
      parsed = JSON.parse(new TextDecoder('utf-8', { fatal: true }).decode(bytes));
    } catch (error) {
      throw new StorageFormatError('file is not valid JSON', { cause: error });
    }

    if (!Array.isArray(parsed)) {
      throw new StorageFormatError('file does not hold a record array');
    }

    return parsed.map((entry, row) => {
      if (!isPlainRecord(entry)) {
        throw new StorageFormatError(`row ${row} is not a record`);
      }
      return entry;
    });
  }
}

const COLUMNAR_TAG = 'stockbill-columnar';
const COLUMNAR_VERSION = 1;

/**
 * Column-oriented table layout
 */
interface ColumnTable {
  format: typeof COLUMNAR_TAG;
  version: typeof COLUMNAR_VERSION;
  columns: string[];
  rowCount: number;
  data: Record<string, unknown[]>;
}

/**
 * Columnar table, MessagePack-encoded and DEFLATE-compressed.
 *
 * Absent fields are stored as null cells and dropped again on decode.
 */
export class ColumnarFormat implements StorageFormat {
  readonly mode = 'columnar' as const;
  readonly extension = '.colpack';
  private codec: CompressionService;

  constructor(codec: CompressionService = new CompressionService({ compressionLevel: 6 })) {
    this.codec = codec;
  }

  encode(records: readonly StoredRecord[]): Uint8Array {
    const columns: string[] = [];
    const seen = new Set<string>();

    for (const record of records) {
      for (const key of Object.keys(record)) {
        if (!seen.has(key) && record[key] !== undefined) {
          seen.add(key);
          columns.push(key);
        }
      }
    }

    const data: Record<string, unknown[]> = {};
    for (const column of columns) {
      data[column] = records.map((record) => record[column] ?? null);
    }

    const table: ColumnTable = {
      format: COLUMNAR_TAG,
      version: COLUMNAR_VERSION,
      columns,
      rowCount: records.length,
      data,
    };

    return this.codec.encode(table);
  }

  decode(bytes: Uint8Array): StoredRecord[] {
    const table = this.codec.decode(bytes);

    if (!isPlainRecord(table) || table.format !== COLUMNAR_TAG) {
      throw new StorageFormatError('file is not a columnar table');
    }
    if (table.version !== COLUMNAR_VERSION) {
      throw new StorageFormatError(`unsupported columnar version ${String(table.version)}`);
    }

    const { columns, rowCount, data } = table;
    if (
      !Array.isArray(columns) ||
      !columns.every((column): column is string => typeof column === 'string') ||
      typeof rowCount !== 'number' ||
      !Number.isInteger(rowCount) ||
      rowCount < 0 ||
      !isPlainRecord(data)
    ) {
      throw new StorageFormatError('columnar table header is damaged');
    }

    const records: StoredRecord[] = Array.from({ length: rowCount }, () => ({}));

    for (const column of columns) {
      const cells = data[column];
      if (!Array.isArray(cells) || cells.length !== rowCount) {
        throw new StorageFormatError(`column "${column}" is damaged`);
      }
      cells.forEach((cell: unknown, row) => {
        if (cell !== null && cell !== undefined) {
          records[row][column] = cell;
        }
      });
    }

    return records;
  }
}

const formats: Record<StorageMode, StorageFormat> = {
  columnar: new ColumnarFormat(),
  json: new JsonFormat(),
};

/**
 * Format for a storage mode
 */
export function getStorageFormat(mode: StorageMode): StorageFormat {
  return formats[mode];
}

/**
 * Format owning a file extension, if any
 */
export function formatForExtension(extension: string): StorageFormat | undefined {
  return Object.values(formats).find((format) => format.extension === extension);
}
