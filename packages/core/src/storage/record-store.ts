/**
 * Record store - canonical collections with backup-before-write persistence
 * @module storage/record-store
 */

import { randomUUID } from 'node:crypto';
import { Subject, type Observable } from 'rxjs';
import type { SettingsStore } from '../config/settings.js';
import {
  NotFoundError,
  StorageFormatError,
  ValidationError,
} from '../errors/index.js';
import { createLogger, type Logger } from '../logger/index.js';
import type { SnapshotFiles } from './file-store.js';
import {
  formatForExtension,
  getStorageFormat,
  isPlainRecord,
  type StorageFormat,
  type StorageMode,
  type StoredRecord,
} from './formats.js';
import { KeyedLock } from './lock.js';
import {
  COLLECTION_NAMES,
  collections,
  type CollectionDefinition,
  type CollectionName,
  type CollectionRecordMap,
} from './schema.js';

/**
 * Change notification emitted after a mutation is durable
 */
export interface StoreChange {
  collection: CollectionName;
  type: 'upsert' | 'delete';
  id: string;
}

/**
 * Record store configuration
 */
export interface RecordStoreOptions {
  files: SnapshotFiles;
  settings: SettingsStore;
  storageMode: StorageMode;
  /**
   * Reject an inventory item whose SKU belongs to another item
   * @default true
   */
  enforceUniqueSku?: boolean;
  logger?: Logger;
  clock?: () => Date;
  generateId?: () => string;
}

/**
 * Shared services handed to each collection
 */
interface StoreServices {
  files: SnapshotFiles;
  settings: SettingsStore;
  lock: KeyedLock;
  logger: Logger;
  clock: () => Date;
  generateId: () => string;
  enforceUnique: boolean;
  emit(change: StoreChange): void;
}

interface CollectionState<R> {
  records: Map<string, R>;
  persisted: boolean;
  /** extension of a primary file left in another format, removed on next write */
  legacyExtension?: string;
}

/**
 * One collection: in-memory copy plus its snapshot file
 */
class CollectionStore<R extends StoredRecord> {
  private definition: CollectionDefinition<R>;
  private services: StoreServices;
  private format: StorageFormat;
  private state: CollectionState<R> | null = null;
  private loading: Promise<CollectionState<R>> | null = null;

  constructor(definition: CollectionDefinition<R>, services: StoreServices, format: StorageFormat) {
    this.definition = definition;
    this.services = services;
    this.format = format;
  }

  get name(): CollectionName {
    return this.definition.name;
  }

  async upsert(input: unknown): Promise<R> {
    const operation = `upsert ${this.name}`;
    if (!isPlainRecord(input)) {
      throw new ValidationError(operation, [{ field: '(root)', message: 'must be an object' }]);
    }

    return this.services.lock.run(this.name, async () => {
      const state = await this.load();
      const requestedId = input[this.definition.idField];
      const id = typeof requestedId === 'string' && requestedId.trim() !== ''
        ? requestedId.trim()
        : this.services.generateId();
      const settings = await this.services.settings.get();

      const record = this.definition.build(input, {
        id,
        now: this.services.clock().toISOString(),
        existing: state.records.get(id),
        defaults: {
          tax_rate: settings.default_tax_rate,
          discount_rate: settings.default_discount_rate,
        },
      });

      this.checkUnique(operation, record, state.records);

      const next = new Map(state.records);
      next.set(id, record);
      await this.commit(state, next);

      this.services.emit({ collection: this.name, type: 'upsert', id });
      return structuredClone(record);
    });
  }

  async get(id: string): Promise<R> {
    const state = await this.load();
    const record = state.records.get(id);
    if (!record) {
      throw new NotFoundError(`get ${this.name}`, this.name, id);
    }
    return structuredClone(record);
  }

  async list(): Promise<R[]> {
    const state = await this.load();
    return Array.from(state.records.values(), (record) => structuredClone(record));
  }

  async delete(id: string): Promise<void> {
    await this.services.lock.run(this.name, async () => {
      const state = await this.load();
      if (!state.records.has(id)) {
        throw new NotFoundError(`delete ${this.name}`, this.name, id);
      }

      const next = new Map(state.records);
      next.delete(id);
      await this.commit(state, next);

      this.services.emit({ collection: this.name, type: 'delete', id });
    });
  }

  /**
   * Rewrite the collection in another format and drop the old primary
   */
  async migrate(target: StorageFormat): Promise<void> {
    await this.services.lock.run(this.name, async () => {
      if (target.extension === this.format.extension) {
        return;
      }

      const state = await this.load();
      const source = this.format;
      this.format = target;

      if (!state.persisted) {
        return;
      }

      state.legacyExtension = state.legacyExtension ?? source.extension;
      await this.commit(state, state.records, source);
      this.services.logger.info(
        { collection: this.name, from: source.mode, to: target.mode },
        'collection migrated'
      );
    });
  }

  /**
   * Drop the in-memory copy; the next access reloads from disk
   */
  reset(): void {
    this.state = null;
    this.loading = null;
  }

  private checkUnique(operation: string, record: R, records: Map<string, R>): void {
    const unique = this.definition.unique;
    if (!unique || (this.name === 'inventory' && !this.services.enforceUnique)) {
      return;
    }

    const id = this.definition.getId(record);
    const key = unique.key(record);
    for (const other of records.values()) {
      if (this.definition.getId(other) !== id && unique.key(other) === key) {
        throw new ValidationError(operation, [
          { field: unique.field, message: `already used by ${this.definition.getId(other)}` },
        ]);
      }
    }
  }

  /**
   * Backup the previous state, then replace the primary. The in-memory copy
   * only advances once both writes succeeded.
   */
  private async commit(
    state: CollectionState<R>,
    next: Map<string, R>,
    previousFormat: StorageFormat = this.format
  ): Promise<void> {
    const { files, logger } = this.services;

    if (state.persisted) {
      const backupName = await files.writeBackup(
        this.name,
        previousFormat.extension,
        previousFormat.encode(Array.from(state.records.values()))
      );
      logger.debug({ collection: this.name, backup: backupName }, 'previous state backed up');
    }

    await files.writePrimary(this.name, this.format.extension, this.format.encode(Array.from(next.values())));

    if (state.legacyExtension && state.legacyExtension !== this.format.extension) {
      await files.removePrimary(this.name, state.legacyExtension);
    }

    state.records = next;
    state.persisted = true;
    state.legacyExtension = undefined;
  }

  private load(): Promise<CollectionState<R>> {
    if (this.state) {
      return Promise.resolve(this.state);
    }
    if (!this.loading) {
      this.loading = this.readState().then(
        (state) => {
          this.state = state;
          this.loading = null;
          return state;
        },
        (error: unknown) => {
          this.loading = null;
          throw error;
        }
      );
    }
    return this.loading;
  }

  private async readState(): Promise<CollectionState<R>> {
    const { files, logger } = this.services;
    const decode = (bytes: Uint8Array, extension: string) => this.decode(bytes, extension);

    const result = await files.loadWithFallback(this.name, this.format.extension, decode);
    if (result.value) {
      return { records: result.value, persisted: true };
    }

    for (const mode of ['columnar', 'json'] as const) {
      const other = getStorageFormat(mode);
      if (other.extension === this.format.extension) {
        continue;
      }
      const legacy = await files.loadWithFallback(this.name, other.extension, decode);
      if (legacy.value) {
        logger.info({ collection: this.name, format: other.mode }, 'loaded primary stored in another format');
        return { records: legacy.value, persisted: true, legacyExtension: other.extension };
      }
    }

    return { records: new Map(), persisted: false };
  }

  private decode(bytes: Uint8Array, extension: string): Map<string, R> {
    const format = formatForExtension(extension);
    if (!format) {
      throw new StorageFormatError(`unknown file type "${extension}"`);
    }

    const records = new Map<string, R>();
    format.decode(bytes).forEach((raw, row) => {
      const parsed = this.definition.schema.safeParse(raw);
      if (!parsed.success) {
        throw new StorageFormatError(`row ${row} is not a valid ${this.name} record`);
      }
      const id = this.definition.getId(parsed.data);
      if (records.has(id)) {
        throw new StorageFormatError(`row ${row} repeats id "${id}"`);
      }
      records.set(id, parsed.data);
    });

    return records;
  }
}

type CollectionStores = {
  [C in CollectionName]: CollectionStore<CollectionRecordMap[C]>;
};

/**
 * Owns the persisted collections.
 *
 * Every mutation runs under a per-collection lock and writes a timestamped
 * backup of the previous state before replacing the primary file. Reads fall
 * back once to the latest backup when the primary is unreadable.
 */
export class RecordStore {
  readonly changes$: Observable<StoreChange>;

  private settings: SettingsStore;
  private stores: CollectionStores;
  private changes = new Subject<StoreChange>();
  private logger: Logger;

  constructor(options: RecordStoreOptions) {
    this.settings = options.settings;
    this.logger = options.logger ?? createLogger('record-store');
    this.changes$ = this.changes.asObservable();

    const services: StoreServices = {
      files: options.files,
      settings: options.settings,
      lock: new KeyedLock(),
      logger: this.logger,
      clock: options.clock ?? (() => new Date()),
      generateId: options.generateId ?? randomUUID,
      enforceUnique: options.enforceUniqueSku ?? true,
      emit: (change) => this.changes.next(change),
    };
    const format = getStorageFormat(options.storageMode);

    this.stores = {
      inventory: new CollectionStore(collections.inventory, services, format),
      invoices: new CollectionStore(collections.invoices, services, format),
    };
  }

  /**
   * Create or update a record. Ids and timestamps are assigned here.
   *
   * @throws ValidationError when required fields are missing or invalid
   */
  upsert<C extends CollectionName>(collection: C, record: unknown): Promise<CollectionRecordMap[C]> {
    return this.stores[collection].upsert(record);
  }

  /**
   * @throws NotFoundError when no record has the id
   */
  get<C extends CollectionName>(collection: C, id: string): Promise<CollectionRecordMap[C]> {
    return this.stores[collection].get(id);
  }

  /**
   * All records of a collection, in no particular order
   */
  list<C extends CollectionName>(collection: C): Promise<CollectionRecordMap[C][]> {
    return this.stores[collection].list();
  }

  /**
   * @throws NotFoundError when no record has the id
   */
  delete(collection: CollectionName, id: string): Promise<void> {
    return this.stores[collection].delete(id);
  }

  /**
   * Reserve the next invoice number; persisted before it is returned
   */
  nextInvoiceNumber(): Promise<string> {
    return this.settings.allocateInvoiceNumber();
  }

  /**
   * Move every collection to another storage format
   */
  async setStorageMode(mode: StorageMode): Promise<void> {
    const format = getStorageFormat(mode);
    for (const name of COLLECTION_NAMES) {
      await this.stores[name].migrate(format);
    }
  }

  /**
   * Forget cached collections so the next read goes to disk
   */
  reload(): void {
    for (const name of COLLECTION_NAMES) {
      this.stores[name].reset();
    }
  }

  /**
   * Complete the change stream
   */
  close(): void {
    this.changes.complete();
  }
}
