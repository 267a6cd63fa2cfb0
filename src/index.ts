/**
 * Pantry Watch Sync
 * Phone/watch synchronization for the pantry shopping list
 */

export * from './logging';
export * from './network';
export * from './sync';
export {
  NEVER_SYNCED_TEXT,
  ADDED_MESSAGE_DURATION_MS,
  formatLastSync,
  useWatchSyncState,
  HomeViewModel,
  useHomeState,
  ShoppingListViewModel,
  useShoppingList,
  ExpiringItemsViewModel,
  useExpiringItems,
  QuickAddViewModel,
  useQuickAdd,
} from './hooks/useWatchSync';
