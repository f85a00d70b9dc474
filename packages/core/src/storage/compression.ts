/**
 * Compression service - MessagePack encoding with DEFLATE compression
 * @module storage/compression
 */

import { encode, decode } from '@msgpack/msgpack';
import { deflate, inflate } from 'pako';
import { StorageFormatError } from '../errors/index.js';

/**
 * Compression options
 */
export interface CompressionOptions {
  /**
   * Compression level (0-9)
   * @default 6
   */
  compressionLevel?: 0 | 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9;
}

/**
 * Default compression options
 */
const DEFAULT_OPTIONS: Required<CompressionOptions> = {
  compressionLevel: 6,
};

/**
 * Codec behind the columnar storage format
 */
export class CompressionService {
  private options: Required<CompressionOptions>;

  constructor(options: CompressionOptions = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  /**
   * Encode and compress data
   */
  encode<T = unknown>(data: T): Uint8Array {
    return deflate(encode(data, { ignoreUndefined: true }), { level: this.options.compressionLevel });
  }

  /**
   * Decompress and decode data. Throws StorageFormatError on bytes this
   * service did not produce.
   */
  decode(data: Uint8Array): unknown {
    let inflated: Uint8Array;
    try {
      inflated = inflate(data);
    } catch (error) {
      throw new StorageFormatError('compressed payload is damaged', { cause: error });
    }

    try {
      return decode(inflated);
    } catch (error) {
      throw new StorageFormatError('encoded payload is damaged', { cause: error });
    }
  }
}
