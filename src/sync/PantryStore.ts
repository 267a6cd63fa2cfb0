/**
 * PantryStore.ts
 * Authoritative pantry data as the phone responder sees it
 *
 * The phone app's database sits behind this interface. MemoryPantryStore is
 * the in-process implementation used by tests and demos.
 */

import { ItemId, Timestamp, QuickAddPreset, DEFAULT_PRIORITY } from './SyncTypes';

// ============================================================================
// Records
// ============================================================================

export interface ShoppingListEntry {
  readonly id: ItemId;
  readonly productName: string | null;
  readonly quantityNeeded: number;
  readonly unit: string;
  readonly isChecked: boolean;
  readonly priority: number;
  readonly aisle: string | null;
  readonly estimatedPrice: number | null;
}

export interface InventoryEntry {
  readonly id: ItemId;
  readonly productName: string | null;
  readonly expirationDate: Timestamp | null;
  readonly quantityOnHand: number;
  readonly unit: string;
  readonly location: string;
}

export interface NewShoppingEntry {
  readonly name: string;
  readonly quantity: number;
  readonly unit: string;
}

// ============================================================================
// Store Interface
// ============================================================================

export interface PantryStore {
  getActiveShoppingListName(): Promise<string | null>;
  getActiveShoppingItems(): Promise<readonly ShoppingListEntry[]>;

  /** Inventory entries whose expiration falls within [from, to] */
  getExpiringItemsBetween(from: Timestamp, to: Timestamp): Promise<readonly InventoryEntry[]>;

  getQuickAddPresets(): Promise<readonly QuickAddPreset[]>;

  /** Resolves false when no entry has the id */
  setItemChecked(itemId: ItemId, checked: boolean): Promise<boolean>;

  addShoppingItem(entry: NewShoppingEntry): Promise<ShoppingListEntry>;
}

// ============================================================================
// MemoryPantryStore Implementation
// ============================================================================

export interface MemoryPantryStoreSeed {
  readonly listName?: string | null;
  readonly shoppingItems?: readonly ShoppingListEntry[];
  readonly inventory?: readonly InventoryEntry[];
  readonly quickAddPresets?: readonly QuickAddPreset[];
}

export class MemoryPantryStore implements PantryStore {
  private listName: string | null;
  private readonly shoppingItems: Map<ItemId, ShoppingListEntry>;
  private readonly inventory: Map<ItemId, InventoryEntry>;
  private quickAddPresets: readonly QuickAddPreset[];
  private idCounter: number;

  constructor(seed: MemoryPantryStoreSeed = {}) {
    this.listName = seed.listName ?? null;
    this.shoppingItems = new Map(
      (seed.shoppingItems ?? []).map((e): [ItemId, ShoppingListEntry] => [e.id, e])
    );
    this.inventory = new Map(
      (seed.inventory ?? []).map((e): [ItemId, InventoryEntry] => [e.id, e])
    );
    this.quickAddPresets = seed.quickAddPresets ?? [];
    this.idCounter = 0;
  }

  async getActiveShoppingListName(): Promise<string | null> {
    return this.listName;
  }

  async getActiveShoppingItems(): Promise<readonly ShoppingListEntry[]> {
    return Array.from(this.shoppingItems.values());
  }

  async getExpiringItemsBetween(from: Timestamp, to: Timestamp): Promise<readonly InventoryEntry[]> {
    return Array.from(this.inventory.values()).filter(
      e => e.expirationDate !== null && e.expirationDate >= from && e.expirationDate <= to
    );
  }

  async getQuickAddPresets(): Promise<readonly QuickAddPreset[]> {
    return this.quickAddPresets;
  }

  async setItemChecked(itemId: ItemId, checked: boolean): Promise<boolean> {
    const entry = this.shoppingItems.get(itemId);
    if (!entry) return false;
    this.shoppingItems.set(itemId, { ...entry, isChecked: checked });
    return true;
  }

  async addShoppingItem(entry: NewShoppingEntry): Promise<ShoppingListEntry> {
    let id = `item_${++this.idCounter}`;
    while (this.shoppingItems.has(id)) {
      id = `item_${++this.idCounter}`;
    }
    const created: ShoppingListEntry = {
      id,
      productName: entry.name,
      quantityNeeded: entry.quantity,
      unit: entry.unit,
      isChecked: false,
      priority: DEFAULT_PRIORITY,
      aisle: null,
      estimatedPrice: null,
    };
    this.shoppingItems.set(created.id, created);
    return created;
  }

  // ==========================================================================
  // Direct Access (phone-side edits outside the sync layer)
  // ==========================================================================

  setListName(name: string | null): void {
    this.listName = name;
  }

  putShoppingItem(entry: ShoppingListEntry): void {
    this.shoppingItems.set(entry.id, entry);
  }

  putInventoryItem(entry: InventoryEntry): void {
    this.inventory.set(entry.id, entry);
  }

  setQuickAddPresets(presets: readonly QuickAddPreset[]): void {
    this.quickAddPresets = presets;
  }

  getShoppingItem(itemId: ItemId): ShoppingListEntry | null {
    return this.shoppingItems.get(itemId) ?? null;
  }
}

export function createMemoryPantryStore(seed?: MemoryPantryStoreSeed): MemoryPantryStore {
  return new MemoryPantryStore(seed);
}
