/**
 * Sync Module
 * Snapshot model and the phone/watch endpoints that exchange it
 */

// Data model
export {
  ItemId,
  Timestamp,
  ShoppingItem,
  ExpiringItem,
  QuickAddPreset,
  SyncSnapshot,
  UrgencyLevel,
  DEFAULT_QUANTITY,
  DEFAULT_UNIT,
  DEFAULT_PRIORITY,
  DEFAULT_LOCATION,
  DEFAULT_CATEGORY,
  DEFAULT_ICON,
  EXPIRING_SOON_DAYS,
  DEFAULT_QUICK_ADD_PRESETS,
  createShoppingItem,
  createExpiringItem,
  createQuickAddPreset,
  createSyncSnapshot,
  withItemChecked,
  displayQuantity,
  formattedPrice,
  isExpired,
  isExpiringSoon,
  urgencyLevel,
  countdownText,
  shortCountdown,
  uncheckedShoppingCount,
  expiringItemCount,
} from './SyncTypes';

// Codec
export {
  encodeSnapshot,
  decodeSnapshot,
  DecodeResult,
  tryDecodeSnapshot,
} from './SnapshotCodec';

// Ordering
export {
  compareShoppingItems,
  sortShoppingItemsForDisplay,
  sortExpiringItems,
} from './ItemOrdering';

// Phone side
export {
  ShoppingListEntry,
  InventoryEntry,
  NewShoppingEntry,
  PantryStore,
  MemoryPantryStoreSeed,
  MemoryPantryStore,
  createMemoryPantryStore,
} from './PantryStore';

export {
  SnapshotBuilderConfig,
  DEFAULT_BUILDER_CONFIG,
  UNKNOWN_PRODUCT_NAME,
  NO_EXPIRATION_DAYS,
  toShoppingItem,
  toExpiringItem,
  SnapshotBuilder,
  createSnapshotBuilder,
} from './SnapshotBuilder';

export {
  PhoneResponderConfig,
  DEFAULT_RESPONDER_CONFIG,
  PhoneSyncResponder,
  createPhoneSyncResponder,
} from './PhoneSyncResponder';

// Watch side
export {
  WatchRepositoryConfig,
  DEFAULT_WATCH_CONFIG,
  WatchSyncState,
  WatchStateListener,
  RefreshRequiredCallback,
  createInitialWatchState,
  WatchDataRepository,
  createWatchDataRepository,
} from './WatchDataRepository';
