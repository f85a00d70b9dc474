/**
 * Snapshot files - primary files, timestamped backups and recovery
 * @module storage/file-store
 */

import { mkdir, readFile, readdir, rename, unlink, writeFile } from 'node:fs/promises';
import { extname, join } from 'node:path';
import {
  StorageCorruptionError,
  describeFailure,
  type RecoveryAttempt,
} from '../errors/index.js';
import { createLogger, type Logger } from '../logger/index.js';

/**
 * Snapshot file configuration
 */
export interface SnapshotFilesOptions {
  dataDir: string;
  backupsDir: string;
  /**
   * Backups kept per snapshot name, oldest pruned first. 0 keeps all.
   * @default 50
   */
  maxBackups?: number;
  logger?: Logger;
  clock?: () => Date;
}

/**
 * A backup file read back from disk
 */
export interface BackupFile {
  fileName: string;
  extension: string;
  bytes: Uint8Array;
}

/**
 * Where a loaded snapshot came from
 */
export type SnapshotSource = 'primary' | 'backup' | 'none';

/**
 * Result of a load with fallback
 */
export interface LoadResult<T> {
  value: T | null;
  source: SnapshotSource;
  backupName?: string;
}

/**
 * Decoder for one file extension
 */
export type SnapshotDecoder<T> = (bytes: Uint8Array, extension: string) => T;

function isMissingFile(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === 'ENOENT'
  );
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * `yyyyMMdd_HHmmss_SSS` in UTC, sortable as text
 */
export function formatBackupStamp(date: Date): string {
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `_${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}` +
    `_${pad(date.getUTCMilliseconds(), 3)}`
  );
}

let writeSequence = 0;

/**
 * Reads and writes snapshot files. Every write goes to a temp file that is
 * renamed over the target, so a target is either the old or the new bytes.
 */
export class SnapshotFiles {
  private dataDir: string;
  private backupsDir: string;
  private maxBackups: number;
  private logger: Logger;
  private clock: () => Date;
  private dirsReady = false;

  constructor(options: SnapshotFilesOptions) {
    this.dataDir = options.dataDir;
    this.backupsDir = options.backupsDir;
    this.maxBackups = options.maxBackups ?? 50;
    this.logger = options.logger ?? createLogger('snapshot-files');
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Path of a primary file
   */
  primaryPath(name: string, extension: string): string {
    return join(this.dataDir, `${name}${extension}`);
  }

  /**
   * Read a primary file, or null when it does not exist
   */
  async readPrimary(name: string, extension: string): Promise<Uint8Array | null> {
    try {
      return await readFile(this.primaryPath(name, extension));
    } catch (error) {
      if (isMissingFile(error)) {
        return null;
      }
      throw error;
    }
  }

  /**
   * Replace a primary file
   */
  async writePrimary(name: string, extension: string, bytes: Uint8Array): Promise<void> {
    await this.ensureDirs();
    const target = this.primaryPath(name, extension);
    await this.writeAtomic(target, bytes);
    this.logger.debug({ file: target, bytes: bytes.length }, 'primary written');
  }

  /**
   * Remove a primary file; a missing file is not an error
   */
  async removePrimary(name: string, extension: string): Promise<void> {
    try {
      await unlink(this.primaryPath(name, extension));
    } catch (error) {
      if (!isMissingFile(error)) {
        throw error;
      }
    }
  }

  /**
   * Write a timestamped backup and prune old ones. Returns the file name.
   */
  async writeBackup(name: string, extension: string, bytes: Uint8Array): Promise<string> {
    await this.ensureDirs();
    writeSequence += 1;
    const fileName = `${name}_${formatBackupStamp(this.clock())}_${pad(writeSequence % 10000, 4)}${extension}`;
    const target = join(this.backupsDir, fileName);

    await this.writeAtomic(target, bytes);
    this.logger.debug({ file: target }, 'backup written');

    await this.pruneBackups(name);
    return fileName;
  }

  /**
   * Backup file names for a snapshot, oldest first
   */
  async listBackups(name: string): Promise<string[]> {
    let entries: string[];
    try {
      entries = await readdir(this.backupsDir);
    } catch (error) {
      if (isMissingFile(error)) {
        return [];
      }
      throw error;
    }

    const prefix = `${name}_`;
    return entries
      .filter((entry) => entry.startsWith(prefix) && !entry.endsWith('.tmp'))
      .sort();
  }

  /**
   * Most recent backup, or null when there is none
   */
  async latestBackup(name: string): Promise<BackupFile | null> {
    const backups = await this.listBackups(name);
    const fileName = backups[backups.length - 1];
    if (fileName === undefined) {
      return null;
    }

    const bytes = await readFile(join(this.backupsDir, fileName));
    return { fileName, extension: extname(fileName), bytes };
  }

  /**
   * Load a snapshot from its primary file, falling back once to the latest
   * backup when the primary cannot be read or decoded.
   *
   * @throws StorageCorruptionError when both fail
   */
  async loadWithFallback<T>(
    name: string,
    extension: string,
    decode: SnapshotDecoder<T>
  ): Promise<LoadResult<T>> {
    const attempts: RecoveryAttempt[] = [];

    try {
      const bytes = await this.readPrimary(name, extension);
      if (bytes === null) {
        return { value: null, source: 'none' };
      }
      return { value: decode(bytes, extension), source: 'primary' };
    } catch (error) {
      attempts.push({ source: 'primary', reason: describeFailure(error) });
      this.logger.warn(
        { file: this.primaryPath(name, extension), err: error },
        'primary snapshot unreadable, trying latest backup'
      );
    }

    let backup: BackupFile | null = null;
    try {
      backup = await this.latestBackup(name);
      if (backup) {
        const value = decode(backup.bytes, backup.extension);
        this.logger.warn({ snapshot: name, backup: backup.fileName }, 'recovered from backup');
        return { value, source: 'backup', backupName: backup.fileName };
      }
      attempts.push({ source: 'backups', reason: 'no backup available' });
    } catch (error) {
      attempts.push({ source: backup?.fileName ?? 'backups', reason: describeFailure(error) });
    }

    this.logger.error({ snapshot: name, attempts }, 'snapshot and backup both unusable');
    throw new StorageCorruptionError(`load ${name}`, name, attempts);
  }

  private async pruneBackups(name: string): Promise<void> {
    if (this.maxBackups <= 0) {
      return;
    }

    const backups = await this.listBackups(name);
    const excess = backups.slice(0, Math.max(0, backups.length - this.maxBackups));

    for (const fileName of excess) {
      await unlink(join(this.backupsDir, fileName));
      this.logger.debug({ backup: fileName }, 'old backup pruned');
    }
  }

  private async writeAtomic(target: string, bytes: Uint8Array): Promise<void> {
    writeSequence += 1;
    const temp = `${target}.${process.pid}.${writeSequence}.tmp`;

    try {
      await writeFile(temp, bytes);
      await rename(temp, target);
    } catch (error) {
      await unlink(temp).catch((cleanupError: unknown) => {
        this.logger.debug({ file: temp, err: cleanupError }, 'temp file cleanup failed');
      });
      throw error;
    }
  }

  private async ensureDirs(): Promise<void> {
    if (this.dirsReady) {
      return;
    }
    await mkdir(this.dataDir, { recursive: true });
    await mkdir(this.backupsDir, { recursive: true });
    this.dirsReady = true;
  }
}
