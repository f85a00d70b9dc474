/**
 * Client module - the request/response facade used by presentation layers
 * @module client
 */

import type { Subscription } from 'rxjs';
import { resolveConfig, type BillingConfig, type ResolvedBillingConfig, type Settings } from '../config/index.js';
import { SettingsStore, settingsUpdateSchema } from '../config/settings.js';
import { ValidationError } from '../errors/index.js';
import {
  computeInvoiceTotals,
  type CalculationLine,
  type InvoiceTotals,
} from '../invoice/calculator.js';
import { createLineItem, type CartLine } from '../invoice/cart.js';
import { isReferenceLine, parseInvoiceDraft } from '../invoice/draft.js';
import { createLogger, type Logger } from '../logger/index.js';
import { SearchEngine, type SearchResult } from '../search/engine.js';
import { SnapshotFiles } from '../storage/file-store.js';
import { RecordStore } from '../storage/record-store.js';
import type { InventoryItem } from '../storage/schemas/inventory-item.js';
import type { Invoice } from '../storage/schemas/invoice.js';

/**
 * Client configuration
 */
export interface ClientConfig extends BillingConfig {
  logger?: Logger;
  clock?: () => Date;
  generateId?: () => string;
}

function compareText(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

function isoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * Billing client - inventory, search, invoices and settings over one data
 * directory
 */
export class BillingClient {
  readonly config: ResolvedBillingConfig;

  private logger: Logger;
  private clock: () => Date;
  private generateId?: () => string;
  private engine: SearchEngine;
  private settings: SettingsStore | null = null;
  private store: RecordStore | null = null;
  private itemCache: InventoryItem[] | null = null;
  private subscription: Subscription | null = null;
  private initialized = false;

  constructor(config: ClientConfig = {}) {
    this.config = resolveConfig(config);
    this.logger = config.logger ?? createLogger('client');
    this.clock = config.clock ?? (() => new Date());
    this.generateId = config.generateId;
    this.engine = new SearchEngine(this.config.search);
  }

  /**
   * Open the data directory and read settings
   */
  async init(): Promise<void> {
    if (this.initialized) {
      return;
    }

    const files = new SnapshotFiles({
      dataDir: this.config.dataDir,
      backupsDir: this.config.backupsDir,
      maxBackups: this.config.maxBackupsPerCollection,
      logger: this.logger,
      clock: this.clock,
    });
    const settings = new SettingsStore({ files, logger: this.logger });
    const { storage_mode } = await settings.get();

    this.settings = settings;
    this.store = new RecordStore({
      files,
      settings,
      storageMode: storage_mode,
      enforceUniqueSku: this.config.enforceUniqueSku,
      logger: this.logger,
      clock: this.clock,
      generateId: this.generateId,
    });
    this.subscription = this.store.changes$.subscribe((change) => {
      if (change.collection === 'inventory') {
        this.itemCache = null;
      }
    });

    this.initialized = true;
    this.logger.info({ dataDir: this.config.dataDir, storageMode: storage_mode }, 'client initialized');
  }

  /**
   * Get the record store
   */
  getStore(): RecordStore {
    if (!this.store) {
      throw new Error('Client not initialized. Call init() first.');
    }
    return this.store;
  }

  private getSettingsStore(): SettingsStore {
    if (!this.settings) {
      throw new Error('Client not initialized. Call init() first.');
    }
    return this.settings;
  }

  // Inventory

  /**
   * Ranked matches for a free-text query
   */
  async searchItems(query: string, limit = 10): Promise<SearchResult<InventoryItem>[]> {
    const results = this.engine.search(query, await this.cachedItems(), limit);
    return results.map(({ item, score }) => ({ item: structuredClone(item), score }));
  }

  /**
   * Create an item, or merge fields onto the item with the given `item_id`
   *
   * @throws ValidationError when sku or name is missing, or the SKU is taken
   */
  upsertItem(fields: unknown): Promise<InventoryItem> {
    return this.getStore().upsert('inventory', fields);
  }

  getItem(id: string): Promise<InventoryItem> {
    return this.getStore().get('inventory', id);
  }

  /**
   * Items sorted by name
   */
  async listItems(): Promise<InventoryItem[]> {
    const items = await this.getStore().list('inventory');
    return items.sort((a, b) => compareText(a.name, b.name) || compareText(a.item_id, b.item_id));
  }

  /**
   * @throws NotFoundError when no item has the id
   */
  deleteItem(id: string): Promise<void> {
    return this.getStore().delete('inventory', id);
  }

  // Invoices

  computeInvoiceTotals(
    lines: readonly CalculationLine[],
    globalDiscountRate: number,
    globalTaxRate: number
  ): InvoiceTotals {
    return computeInvoiceTotals(lines, globalDiscountRate, globalTaxRate);
  }

  /**
   * Validate a draft, freeze its lines, compute totals and persist it under
   * a freshly reserved invoice number.
   *
   * Lines are snapshots or `{ item_id, ...overrides }` references to
   * inventory. Global tax defaults to the configured default tax rate.
   *
   * @throws ValidationError on missing customer name, no lines or invalid values
   * @throws NotFoundError when a referenced item does not exist
   */
  async saveInvoice(draft: unknown): Promise<Invoice> {
    const store = this.getStore();
    const parsed = parseInvoiceDraft(draft);
    const settings = await this.getSettingsStore().get();

    const lines: CartLine[] = [];
    for (const line of parsed.line_items) {
      if (isReferenceLine(line)) {
        const { item_id, ...overrides } = line;
        lines.push(createLineItem(await store.get('inventory', item_id), overrides));
      } else {
        lines.push(line);
      }
    }

    const globalDiscountRate = parsed.global_discount_rate ?? 0;
    const globalTaxRate = parsed.global_tax_rate ?? settings.default_tax_rate;
    const totals = computeInvoiceTotals(lines, globalDiscountRate, globalTaxRate);

    const invoiceNumber = await store.nextInvoiceNumber();
    const invoice = await store.upsert('invoices', {
      invoice_number: invoiceNumber,
      date: parsed.date ?? isoDate(this.clock()),
      customer_name: parsed.customer_name,
      customer_address: parsed.customer_address,
      customer_email: parsed.customer_email,
      notes: parsed.notes,
      global_discount_rate: globalDiscountRate,
      global_tax_rate: globalTaxRate,
      line_items: lines.map((line, index) => ({ ...line, amount: totals.lines[index].line_amount })),
      subtotal: totals.subtotal,
      total_discount: totals.total_discount,
      total_tax: totals.total_tax,
      grand_total: totals.grand_total,
    });

    this.logger.info(
      { invoiceId: invoice.invoice_id, invoiceNumber, grandTotal: invoice.grand_total },
      'invoice saved'
    );
    return invoice;
  }

  /**
   * Invoices, newest first
   */
  async listInvoices(): Promise<Invoice[]> {
    const invoices = await this.getStore().list('invoices');
    return invoices.sort(
      (a, b) => compareText(b.created_at, a.created_at) || compareText(b.invoice_number, a.invoice_number)
    );
  }

  getInvoice(id: string): Promise<Invoice> {
    return this.getStore().get('invoices', id);
  }

  /**
   * Remove an invoice. Its number is not handed out again.
   */
  deleteInvoice(id: string): Promise<void> {
    return this.getStore().delete('invoices', id);
  }

  /**
   * Totals recomputed from an invoice's stored lines and global rates
   */
  recomputeInvoiceTotals(invoice: Pick<Invoice, 'line_items' | 'global_discount_rate' | 'global_tax_rate'>): InvoiceTotals {
    return computeInvoiceTotals(invoice.line_items, invoice.global_discount_rate, invoice.global_tax_rate);
  }

  /**
   * Next invoice number, reserved and persisted
   */
  nextInvoiceNumber(): Promise<string> {
    return this.getStore().nextInvoiceNumber();
  }

  // Settings

  getSettings(): Promise<Settings> {
    return this.getSettingsStore().get();
  }

  /**
   * Apply a partial settings update. A new storage mode migrates every
   * collection before the setting itself is saved.
   *
   * @throws ValidationError on invalid values
   */
  async updateSettings(patch: unknown): Promise<Settings> {
    const parsed = settingsUpdateSchema.safeParse(patch);
    if (!parsed.success) {
      throw ValidationError.fromZod('update settings', parsed.error);
    }

    const settings = this.getSettingsStore();
    const current = await settings.get();
    const mode = parsed.data.storage_mode;

    if (mode !== undefined && mode !== current.storage_mode) {
      await this.getStore().setStorageMode(mode);
      this.logger.info({ from: current.storage_mode, to: mode }, 'storage mode changed');
    }

    return settings.update(parsed.data);
  }

  /**
   * Release the change subscription and cached state
   */
  async destroy(): Promise<void> {
    this.subscription?.unsubscribe();
    this.subscription = null;
    this.store?.close();
    this.store = null;
    this.settings = null;
    this.itemCache = null;
    this.initialized = false;
  }

  private async cachedItems(): Promise<InventoryItem[]> {
    if (!this.itemCache) {
      this.itemCache = await this.getStore().list('inventory');
    }
    return this.itemCache;
  }
}

/**
 * Global client instance
 */
let globalClient: BillingClient | null = null;

/**
 * Get or create the global client instance
 */
export async function getClient(config?: ClientConfig): Promise<BillingClient> {
  if (!globalClient) {
    globalClient = new BillingClient(config);
    await globalClient.init();
  }
  return globalClient;
}

/**
 * Reset the global client instance
 */
export async function resetClient(): Promise<void> {
  if (globalClient) {
    await globalClient.destroy();
    globalClient = null;
  }
}
