/**
 * Persisted application settings and the invoice-number counter
 * @module config/settings
 */

import { z } from 'zod';
import { StorageFormatError, ValidationError } from '../errors/index.js';
import { createLogger, type Logger } from '../logger/index.js';
import type { SnapshotFiles } from '../storage/file-store.js';
import { isPlainRecord } from '../storage/formats.js';
import { KeyedLock } from '../storage/lock.js';
import { percentageSchema } from '../storage/schemas/inventory-item.js';

const SETTINGS_NAME = 'settings';
const SETTINGS_EXTENSION = '.json';

const businessInfoSchema = z.object({
  name: z.string(),
  address: z.string(),
  phone: z.string(),
  email: z.string(),
});

export type BusinessInfo = z.infer<typeof businessInfoSchema>;

/**
 * Default settings
 */
export const DEFAULT_SETTINGS: {
  storage_mode: 'columnar' | 'json';
  default_tax_rate: number;
  default_discount_rate: number;
  currency: string;
  currency_symbol: string;
  invoice_number_prefix: string;
  invoice_counters: Record<string, number>;
  business_info: BusinessInfo;
} = {
  storage_mode: 'columnar',
  default_tax_rate: 0,
  default_discount_rate: 0,
  currency: 'USD',
  currency_symbol: '$',
  invoice_number_prefix: 'INV',
  invoice_counters: {},
  business_info: {
    name: 'Your Business Name',
    address: '123 Business St\nCity, State 12345',
    phone: '(555) 123-4567',
    email: 'contact@business.com',
  },
};

const counterSchema = z.number().int().positive();

/**
 * Settings as read from disk; any invalid key falls back to its default
 */
export const settingsSchema = z.object({
  storage_mode: z.enum(['columnar', 'json']).catch(DEFAULT_SETTINGS.storage_mode),
  default_tax_rate: percentageSchema.catch(DEFAULT_SETTINGS.default_tax_rate),
  default_discount_rate: percentageSchema.catch(DEFAULT_SETTINGS.default_discount_rate),
  currency: z.string().min(1).catch(DEFAULT_SETTINGS.currency),
  currency_symbol: z.string().catch(DEFAULT_SETTINGS.currency_symbol),
  invoice_number_prefix: z.string().min(1).catch(DEFAULT_SETTINGS.invoice_number_prefix),
  invoice_counters: z.record(z.string(), counterSchema).catch({}),
  business_info: businessInfoSchema.catch(DEFAULT_SETTINGS.business_info),
});

export type Settings = z.infer<typeof settingsSchema>;

/**
 * Fields a caller may change. `invoice_counter` sets the next counter of the
 * (possibly new) prefix and may only move forward.
 */
export const settingsUpdateSchema = z
  .object({
    storage_mode: z.enum(['columnar', 'json']),
    default_tax_rate: percentageSchema,
    default_discount_rate: percentageSchema,
    currency: z.string().trim().min(1, 'is required'),
    currency_symbol: z.string().trim(),
    invoice_number_prefix: z
      .string()
      .trim()
      .min(1, 'is required')
      .regex(/^[A-Za-z0-9_-]+$/, 'may only contain letters, digits, "-" and "_"'),
    invoice_counter: counterSchema,
    business_info: businessInfoSchema.partial(),
  })
  .partial()
  .strict();

export type SettingsUpdate = z.input<typeof settingsUpdateSchema>;

/**
 * `<prefix>-<counter padded to 4 digits>`
 */
export function formatInvoiceNumber(prefix: string, counter: number): string {
  return `${prefix}-${String(counter).padStart(4, '0')}`;
}

/**
 * Next counter for a prefix (counters start at 1)
 */
export function nextCounter(settings: Settings, prefix: string = settings.invoice_number_prefix): number {
  return settings.invoice_counters[prefix] ?? 1;
}

function cloneSettings(settings: Settings): Settings {
  return {
    ...settings,
    invoice_counters: { ...settings.invoice_counters },
    business_info: { ...settings.business_info },
  };
}

function decodeSettings(bytes: Uint8Array): Settings {
  let parsed: unknown;
  try {
    parsed = JSON.parse(new TextDecoder('utf-8', { fatal: true }).decode(bytes));
  } catch (error) {
    throw new StorageFormatError('settings file is not valid JSON', { cause: error });
  }
  if (!isPlainRecord(parsed)) {
    throw new StorageFormatError('settings file does not hold an object');
  }
  return settingsSchema.parse(parsed);
}

function encodeSettings(settings: Settings): Uint8Array {
  return new TextEncoder().encode(`${JSON.stringify(settings, null, 2)}\n`);
}

/**
 * Settings store configuration
 */
export interface SettingsStoreOptions {
  files: SnapshotFiles;
  logger?: Logger;
}

/**
 * Owns `settings.json`. Writes follow backup-before-write, and the invoice
 * counter is read, incremented and persisted under one lock so numbers stay
 * unique across restarts.
 */
export class SettingsStore {
  private files: SnapshotFiles;
  private logger: Logger;
  private lock = new KeyedLock();
  private current: Settings | null = null;
  private persisted = false;

  constructor(options: SettingsStoreOptions) {
    this.files = options.files;
    this.logger = options.logger ?? createLogger('settings');
  }

  /**
   * Current settings (a copy)
   */
  async get(): Promise<Settings> {
    return cloneSettings(await this.load());
  }

  /**
   * Apply a validated partial update
   *
   * @throws ValidationError on invalid fields or a counter moving backwards
   */
  async update(patch: unknown): Promise<Settings> {
    const parsed = settingsUpdateSchema.safeParse(patch);
    if (!parsed.success) {
      throw ValidationError.fromZod('update settings', parsed.error);
    }
    const { invoice_counter, business_info, ...fields } = parsed.data;

    return this.lock.run(SETTINGS_NAME, async () => {
      const previous = await this.load();
      const next = cloneSettings({ ...previous, ...fields });

      if (business_info) {
        next.business_info = { ...previous.business_info, ...business_info };
      }

      if (invoice_counter !== undefined) {
        const prefix = next.invoice_number_prefix;
        const floor = nextCounter(previous, prefix);
        if (invoice_counter < floor) {
          throw new ValidationError('update settings', [
            {
              field: 'invoice_counter',
              message: `must not be lower than the next number already reserved (${floor})`,
            },
          ]);
        }
        next.invoice_counters[prefix] = invoice_counter;
      }

      await this.persist(previous, next);
      return cloneSettings(next);
    });
  }

  /**
   * Reserve the next invoice number for the configured prefix
   */
  async allocateInvoiceNumber(): Promise<string> {
    return this.lock.run(SETTINGS_NAME, async () => {
      const previous = await this.load();
      const prefix = previous.invoice_number_prefix;
      const counter = nextCounter(previous, prefix);
      const next = cloneSettings(previous);
      next.invoice_counters[prefix] = counter + 1;

      await this.persist(previous, next);

      const invoiceNumber = formatInvoiceNumber(prefix, counter);
      this.logger.info({ invoiceNumber }, 'invoice number allocated');
      return invoiceNumber;
    });
  }

  private async load(): Promise<Settings> {
    if (this.current) {
      return this.current;
    }

    const result = await this.files.loadWithFallback(SETTINGS_NAME, SETTINGS_EXTENSION, decodeSettings);
    this.persisted = result.source !== 'none';
    this.current = result.value ?? cloneSettings(DEFAULT_SETTINGS);
    return this.current;
  }

  private async persist(previous: Settings, next: Settings): Promise<void> {
    if (this.persisted) {
      await this.files.writeBackup(SETTINGS_NAME, SETTINGS_EXTENSION, encodeSettings(previous));
    }
    await this.files.writePrimary(SETTINGS_NAME, SETTINGS_EXTENSION, encodeSettings(next));
    this.persisted = true;
    this.current = next;
  }
}
