/**
 * ItemOrdering.ts
 * Display order for watch lists
 */

import { ShoppingItem, ExpiringItem } from './SyncTypes';

/**
 * Unchecked before checked, then higher priority first. Stable for ties.
 */
export function compareShoppingItems(a: ShoppingItem, b: ShoppingItem): number {
  if (a.isChecked !== b.isChecked) {
    return a.isChecked ? 1 : -1;
  }
  return b.priority - a.priority;
}

export function sortShoppingItemsForDisplay(items: readonly ShoppingItem[]): ShoppingItem[] {
  return [...items].sort(compareShoppingItems);
}

/**
 * Soonest expiration first. Stable for ties.
 */
export function sortExpiringItems(items: readonly ExpiringItem[]): ExpiringItem[] {
  return [...items].sort((a, b) => a.daysUntilExpiration - b.daysUntilExpiration);
}
