/**
 * SyncTypes.ts
 * Data carried from the phone to the watch
 *
 * A SyncSnapshot is the only unit of transfer phone -> watch. Once built it is
 * frozen; the watch replaces it wholesale on each successful sync.
 */

// ============================================================================
// Identifiers
// ============================================================================

export type ItemId = string;
export type Timestamp = number;

// ============================================================================
// Items
// ============================================================================

export interface ShoppingItem {
  readonly id: ItemId;
  readonly name: string;
  readonly quantity: number;
  readonly unit: string;
  readonly isChecked: boolean;
  readonly aisle: string | null;
  readonly priority: number; // higher sorts first among unchecked items
  readonly estimatedPrice: number | null;
}

export interface ExpiringItem {
  readonly id: ItemId;
  readonly name: string;
  readonly expirationDate: Timestamp;
  readonly quantity: number;
  readonly unit: string;
  readonly location: string;
  readonly daysUntilExpiration: number;
}

export interface QuickAddPreset {
  readonly id: string;
  readonly name: string;
  readonly category: string;
  readonly defaultQuantity: number;
  readonly defaultUnit: string;
  readonly icon: string;
}

export interface SyncSnapshot {
  readonly shoppingItems: readonly ShoppingItem[];
  readonly expiringItems: readonly ExpiringItem[];
  readonly quickAddPresets: readonly QuickAddPreset[];
  readonly lastSyncDate: Timestamp;
  readonly shoppingListName: string | null;
}

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_QUANTITY = 1;
export const DEFAULT_UNIT = 'each';
export const DEFAULT_PRIORITY = 5;
export const DEFAULT_LOCATION = 'Pantry';
export const DEFAULT_CATEGORY = 'Grocery';
export const DEFAULT_ICON = 'cart';

/** Items with days <= this count as expiring on the home summary */
export const EXPIRING_SOON_DAYS = 3;

export const DEFAULT_QUICK_ADD_PRESETS: readonly QuickAddPreset[] = Object.freeze([
  { id: '1', name: 'Milk', category: 'Dairy', defaultQuantity: 1, defaultUnit: 'each', icon: 'drop' },
  { id: '2', name: 'Bread', category: 'Bakery', defaultQuantity: 1, defaultUnit: 'each', icon: 'rectangle' },
  { id: '3', name: 'Eggs', category: 'Dairy', defaultQuantity: 12, defaultUnit: 'each', icon: 'oval' },
  { id: '4', name: 'Bananas', category: 'Produce', defaultQuantity: 1, defaultUnit: 'each', icon: 'leaf' },
  { id: '5', name: 'Apples', category: 'Produce', defaultQuantity: 1, defaultUnit: 'each', icon: 'apple' },
  { id: '6', name: 'Chicken', category: 'Meat', defaultQuantity: 1, defaultUnit: 'each', icon: 'fork_knife' },
  { id: '7', name: 'Rice', category: 'Pantry', defaultQuantity: 1, defaultUnit: 'each', icon: 'square' },
  { id: '8', name: 'Pasta', category: 'Pantry', defaultQuantity: 1, defaultUnit: 'each', icon: 'square' },
  { id: '9', name: 'Butter', category: 'Dairy', defaultQuantity: 1, defaultUnit: 'each', icon: 'rectangle' },
  { id: '10', name: 'Cheese', category: 'Dairy', defaultQuantity: 1, defaultUnit: 'each', icon: 'square' },
  { id: '11', name: 'Onions', category: 'Produce', defaultQuantity: 1, defaultUnit: 'each', icon: 'circle' },
  { id: '12', name: 'Tomatoes', category: 'Produce', defaultQuantity: 1, defaultUnit: 'each', icon: 'circle' },
].map(preset => Object.freeze(preset)));

// ============================================================================
// Factory Functions
// ============================================================================

export function createShoppingItem(
  fields: Pick<ShoppingItem, 'id' | 'name'> & Partial<ShoppingItem>
): ShoppingItem {
  return {
    quantity: DEFAULT_QUANTITY,
    unit: DEFAULT_UNIT,
    isChecked: false,
    aisle: null,
    priority: DEFAULT_PRIORITY,
    estimatedPrice: null,
    ...fields,
  };
}

export function createExpiringItem(
  fields: Pick<ExpiringItem, 'id' | 'name' | 'expirationDate'> & Partial<ExpiringItem>
): ExpiringItem {
  return {
    quantity: DEFAULT_QUANTITY,
    unit: DEFAULT_UNIT,
    location: DEFAULT_LOCATION,
    daysUntilExpiration: 0,
    ...fields,
  };
}

export function createQuickAddPreset(
  fields: Pick<QuickAddPreset, 'id' | 'name'> & Partial<QuickAddPreset>
): QuickAddPreset {
  return {
    category: DEFAULT_CATEGORY,
    defaultQuantity: DEFAULT_QUANTITY,
    defaultUnit: DEFAULT_UNIT,
    icon: DEFAULT_ICON,
    ...fields,
  };
}

/**
 * Build a frozen snapshot. Lists and their items are frozen too.
 */
export function createSyncSnapshot(
  fields: Partial<SyncSnapshot> = {},
  now: Timestamp = Date.now()
): SyncSnapshot {
  return Object.freeze({
    shoppingItems: Object.freeze((fields.shoppingItems ?? []).map(i => Object.freeze({ ...i }))),
    expiringItems: Object.freeze((fields.expiringItems ?? []).map(i => Object.freeze({ ...i }))),
    quickAddPresets: Object.freeze(
      (fields.quickAddPresets ?? DEFAULT_QUICK_ADD_PRESETS).map(p => Object.freeze({ ...p }))
    ),
    lastSyncDate: fields.lastSyncDate ?? now,
    shoppingListName: fields.shoppingListName ?? null,
  });
}

/**
 * Same snapshot with one shopping item's checked flag set. Returns the input
 * unchanged when the id is absent or the flag already matches.
 */
export function withItemChecked(snapshot: SyncSnapshot, itemId: ItemId, checked: boolean): SyncSnapshot {
  const target = snapshot.shoppingItems.find(i => i.id === itemId);
  if (!target || target.isChecked === checked) return snapshot;

  return createSyncSnapshot({
    ...snapshot,
    shoppingItems: snapshot.shoppingItems.map(i => (i.id === itemId ? { ...i, isChecked: checked } : i)),
  });
}

// ============================================================================
// Derived Values: Shopping
// ============================================================================

export function displayQuantity(item: Pick<ShoppingItem, 'quantity' | 'unit'>): string {
  if (Number.isInteger(item.quantity)) {
    return `${item.quantity} ${item.unit}`;
  }
  return `${item.quantity.toFixed(1)} ${item.unit}`;
}

export function formattedPrice(item: Pick<ShoppingItem, 'estimatedPrice'>): string | null {
  return item.estimatedPrice === null ? null : `$${item.estimatedPrice.toFixed(2)}`;
}

// ============================================================================
// Derived Values: Expiring
// ============================================================================

export type UrgencyLevel = 'EXPIRED' | 'URGENT' | 'WARNING' | 'NORMAL';

export function isExpired(item: Pick<ExpiringItem, 'daysUntilExpiration'>): boolean {
  return item.daysUntilExpiration < 0;
}

export function isExpiringSoon(item: Pick<ExpiringItem, 'daysUntilExpiration'>): boolean {
  return item.daysUntilExpiration >= 0 && item.daysUntilExpiration <= EXPIRING_SOON_DAYS;
}

export function urgencyLevel(item: Pick<ExpiringItem, 'daysUntilExpiration'>): UrgencyLevel {
  const days = item.daysUntilExpiration;
  if (days < 0) return 'EXPIRED';
  if (days <= 1) return 'URGENT';
  if (days <= EXPIRING_SOON_DAYS) return 'WARNING';
  return 'NORMAL';
}

export function countdownText(item: Pick<ExpiringItem, 'daysUntilExpiration'>): string {
  const days = item.daysUntilExpiration;
  if (days < 0) return `Expired ${-days}d ago`;
  if (days === 0) return 'Expires today';
  if (days === 1) return 'Expires tomorrow';
  return `${days} days left`;
}

export function shortCountdown(item: Pick<ExpiringItem, 'daysUntilExpiration'>): string {
  const days = item.daysUntilExpiration;
  if (days < 0) return `-${-days}d`;
  if (days === 0) return 'Today';
  return `${days}d`;
}

// ============================================================================
// Derived Values: Snapshot
// ============================================================================

export function uncheckedShoppingCount(snapshot: SyncSnapshot): number {
  return snapshot.shoppingItems.filter(i => !i.isChecked).length;
}

export function expiringItemCount(snapshot: SyncSnapshot): number {
  return snapshot.expiringItems.filter(i => i.daysUntilExpiration <= EXPIRING_SOON_DAYS).length;
}
