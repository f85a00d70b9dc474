/**
 * Runtime configuration and persisted settings
 * @module config
 */

import { join, resolve } from 'node:path';
import { DEFAULT_SEARCH_WEIGHTS, type SearchWeights } from '../search/engine.js';

export * from './settings.js';

/**
 * Engine configuration supplied by the embedding application
 */
export interface BillingConfig {
  /**
   * Directory holding collections and settings
   * @default process.env.STOCKBILL_DATA_DIR || './data'
   */
  dataDir?: string;

  /**
   * Directory holding backups
   * @default `<dataDir>/backups`
   */
  backupsDir?: string;

  /**
   * Backups kept per collection; 0 keeps all
   * @default 50
   */
  maxBackupsPerCollection?: number;

  /**
   * Reject an item whose SKU (case-insensitive) belongs to another item
   * @default true
   */
  enforceUniqueSku?: boolean;

  /**
   * Overrides for search scoring weights
   */
  search?: Partial<SearchWeights>;
}

/**
 * Configuration with every default applied
 */
export interface ResolvedBillingConfig {
  dataDir: string;
  backupsDir: string;
  maxBackupsPerCollection: number;
  enforceUniqueSku: boolean;
  search: SearchWeights;
}

/**
 * Merge caller configuration over environment-derived defaults
 */
export function resolveConfig(
  config: BillingConfig = {},
  env: NodeJS.ProcessEnv = process.env
): ResolvedBillingConfig {
  const dataDir = resolve(config.dataDir ?? env.STOCKBILL_DATA_DIR ?? './data');
  const envMaxBackups = env.STOCKBILL_MAX_BACKUPS ? Number(env.STOCKBILL_MAX_BACKUPS) : Number.NaN;

  return {
    dataDir,
    backupsDir: config.backupsDir ? resolve(config.backupsDir) : join(dataDir, 'backups'),
    maxBackupsPerCollection:
      config.maxBackupsPerCollection ??
      (Number.isInteger(envMaxBackups) && envMaxBackups >= 0 ? envMaxBackups : 50),
    enforceUniqueSku: config.enforceUniqueSku ?? true,
    search: { ...DEFAULT_SEARCH_WEIGHTS, ...config.search },
  };
}
