/**
 * SnapshotBuilder.ts
 * Assembles a fresh SyncSnapshot from the authoritative store
 *
 * Each section is read independently; a section whose read fails is sent
 * empty rather than failing the whole snapshot.
 */

import { addDays, differenceInDays } from 'date-fns';
import { Logger, createLogger } from '../logging';
import { Errors, toErrorReport } from '../network/NetworkErrors';
import { PantryStore, ShoppingListEntry, InventoryEntry } from './PantryStore';
import {
  ShoppingItem,
  ExpiringItem,
  QuickAddPreset,
  SyncSnapshot,
  Timestamp,
  createSyncSnapshot,
} from './SyncTypes';
import { sortExpiringItems } from './ItemOrdering';

// ============================================================================
// Configuration
// ============================================================================

export interface SnapshotBuilderConfig {
  readonly expiringWindowDays: number;
  readonly clock: () => Timestamp;
  readonly logger: Logger;
}

export const DEFAULT_BUILDER_CONFIG: SnapshotBuilderConfig = {
  expiringWindowDays: 7,
  clock: () => Date.now(),
  logger: createLogger('SnapshotBuilder'),
};

export const UNKNOWN_PRODUCT_NAME = 'Unknown';

/** Days reported for inventory without an expiration date */
export const NO_EXPIRATION_DAYS = 999;

// ============================================================================
// Entry Mapping
// ============================================================================

export function toShoppingItem(entry: ShoppingListEntry): ShoppingItem {
  return {
    id: entry.id,
    name: entry.productName ?? UNKNOWN_PRODUCT_NAME,
    quantity: entry.quantityNeeded,
    unit: entry.unit,
    isChecked: entry.isChecked,
    aisle: entry.aisle,
    priority: entry.priority,
    estimatedPrice: entry.estimatedPrice,
  };
}

/**
 * Whole days from now until expiration, truncated toward zero.
 */
export function toExpiringItem(entry: InventoryEntry, now: Timestamp): ExpiringItem {
  const daysUntilExpiration = entry.expirationDate === null
    ? NO_EXPIRATION_DAYS
    : differenceInDays(entry.expirationDate, now);

  return {
    id: entry.id,
    name: entry.productName ?? UNKNOWN_PRODUCT_NAME,
    expirationDate: entry.expirationDate ?? 0,
    quantity: entry.quantityOnHand,
    unit: entry.unit,
    location: entry.location,
    daysUntilExpiration,
  };
}

// ============================================================================
// SnapshotBuilder Class
// ============================================================================

export class SnapshotBuilder {
  private readonly store: PantryStore;
  private readonly config: SnapshotBuilderConfig;

  constructor(store: PantryStore, config: Partial<SnapshotBuilderConfig> = {}) {
    this.store = store;
    this.config = { ...DEFAULT_BUILDER_CONFIG, ...config };
  }

  async build(): Promise<SyncSnapshot> {
    const now = this.config.clock();
    const windowEnd = addDays(now, this.config.expiringWindowDays).getTime();

    const [shoppingItems, expiringItems, quickAddPresets, shoppingListName] = await Promise.all([
      this.readSection<ShoppingItem[]>('shopping items', [], async () =>
        (await this.store.getActiveShoppingItems()).map(toShoppingItem)
      ),
      this.readSection<ExpiringItem[]>('expiring items', [], async () =>
        sortExpiringItems(
          (await this.store.getExpiringItemsBetween(now, windowEnd)).map(e => toExpiringItem(e, now))
        )
      ),
      this.readSection<readonly QuickAddPreset[]>('quick add presets', [], () =>
        this.store.getQuickAddPresets()
      ),
      this.readSection<string | null>('list name', null, () =>
        this.store.getActiveShoppingListName()
      ),
    ]);

    return createSyncSnapshot({
      shoppingItems,
      expiringItems,
      quickAddPresets,
      shoppingListName,
      lastSyncDate: this.config.clock(),
    });
  }

  private async readSection<T>(section: string, fallback: T, read: () => Promise<T>): Promise<T> {
    try {
      return await read();
    } catch (error) {
      this.config.logger.error('Store read failed', {
        error: toErrorReport(Errors.storeReadFailed(section, error)),
      });
      return fallback;
    }
  }
}

export function createSnapshotBuilder(
  store: PantryStore,
  config?: Partial<SnapshotBuilderConfig>
): SnapshotBuilder {
  return new SnapshotBuilder(store, config);
}
