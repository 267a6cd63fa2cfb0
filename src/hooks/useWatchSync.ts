/**
 * useWatchSync.ts
 * View-model hooks for the watch screens
 *
 * Each hook reads WatchDataRepository state through useSyncExternalStore and
 * exposes what one screen needs. Rendering stays in the components.
 *
 * Usage:
 * - Create one repository per app and call start() on it
 * - Pass it to the hook of each screen
 */

import { useCallback, useEffect, useMemo, useRef, useState, useSyncExternalStore } from 'react';
import { format } from 'date-fns';
import { WatchDataRepository, WatchSyncState } from '../sync/WatchDataRepository';
import { sortShoppingItemsForDisplay } from '../sync/ItemOrdering';
import {
  ExpiringItem,
  QuickAddPreset,
  ShoppingItem,
  Timestamp,
  DEFAULT_QUICK_ADD_PRESETS,
  expiringItemCount,
  uncheckedShoppingCount,
} from '../sync/SyncTypes';

// ============================================================================
// Constants
// ============================================================================

export const NEVER_SYNCED_TEXT = 'Tap to sync';

/** How long the "added" confirmation stays up */
export const ADDED_MESSAGE_DURATION_MS = 2000;

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * "Last synced: 3:05 PM", or the tap hint when nothing has arrived yet.
 */
export function formatLastSync(lastSyncTime: Timestamp | null): string {
  if (lastSyncTime === null) return NEVER_SYNCED_TEXT;
  return `Last synced: ${format(lastSyncTime, 'h:mm a')}`;
}

// ============================================================================
// Shared State
// ============================================================================

export function useWatchSyncState(repository: WatchDataRepository): WatchSyncState {
  const subscribe = useCallback(
    (onChange: () => void) => repository.subscribe(() => onChange()),
    [repository]
  );
  const getState = useCallback(() => repository.getState(), [repository]);
  return useSyncExternalStore(subscribe, getState, getState);
}

function useRequestSync(repository: WatchDataRepository): () => void {
  return useCallback(() => {
    void repository.requestSync();
  }, [repository]);
}

// ============================================================================
// Home
// ============================================================================

export interface HomeViewModel {
  readonly shoppingCount: number;
  readonly expiringCount: number;
  readonly listName: string | null;
  readonly isSyncing: boolean;
  readonly lastSyncText: string;
  readonly requestSync: () => void;
}

export function useHomeState(repository: WatchDataRepository): HomeViewModel {
  const { snapshot, isSyncing, lastSyncTime } = useWatchSyncState(repository);
  const requestSync = useRequestSync(repository);

  return {
    shoppingCount: uncheckedShoppingCount(snapshot),
    expiringCount: expiringItemCount(snapshot),
    listName: snapshot.shoppingListName,
    isSyncing,
    lastSyncText: formatLastSync(lastSyncTime),
    requestSync,
  };
}

// ============================================================================
// Shopping List
// ============================================================================

export interface ShoppingListViewModel {
  /** Unchecked first, then by priority */
  readonly items: readonly ShoppingItem[];
  readonly listName: string | null;
  readonly isSyncing: boolean;
  readonly toggleItem: (item: ShoppingItem) => void;
  readonly refresh: () => void;
}

export function useShoppingList(repository: WatchDataRepository): ShoppingListViewModel {
  const { snapshot, isSyncing } = useWatchSyncState(repository);
  const refresh = useRequestSync(repository);

  const items = useMemo(
    () => sortShoppingItemsForDisplay(snapshot.shoppingItems),
    [snapshot.shoppingItems]
  );

  const toggleItem = useCallback((item: ShoppingItem) => {
    void repository.toggleItemChecked(item.id, !item.isChecked);
  }, [repository]);

  return {
    items,
    listName: snapshot.shoppingListName,
    isSyncing,
    toggleItem,
    refresh,
  };
}

// ============================================================================
// Expiring Items
// ============================================================================

export interface ExpiringItemsViewModel {
  readonly items: readonly ExpiringItem[];
  readonly isSyncing: boolean;
  readonly refresh: () => void;
}

export function useExpiringItems(repository: WatchDataRepository): ExpiringItemsViewModel {
  const { snapshot, isSyncing } = useWatchSyncState(repository);
  const refresh = useRequestSync(repository);

  return {
    items: snapshot.expiringItems,
    isSyncing,
    refresh,
  };
}

// ============================================================================
// Quick Add
// ============================================================================

export interface QuickAddViewModel {
  readonly presets: readonly QuickAddPreset[];
  readonly isAdding: boolean;
  /** Name of the item just added, while the confirmation is showing */
  readonly addedItemName: string | null;
  readonly addPreset: (preset: QuickAddPreset) => Promise<boolean>;
}

export function useQuickAdd(
  repository: WatchDataRepository,
  messageDurationMs: number = ADDED_MESSAGE_DURATION_MS
): QuickAddViewModel {
  const { snapshot } = useWatchSyncState(repository);
  const [isAdding, setIsAdding] = useState(false);
  const [addedItemName, setAddedItemName] = useState<string | null>(null);
  const timerRef = useRef<ReturnType<typeof setTimeout> | null>(null);
  const mountedRef = useRef(true);

  useEffect(() => {
    mountedRef.current = true;
    return () => {
      mountedRef.current = false;
      if (timerRef.current !== null) {
        clearTimeout(timerRef.current);
        timerRef.current = null;
      }
    };
  }, []);

  const presets = snapshot.quickAddPresets.length > 0
    ? snapshot.quickAddPresets
    : DEFAULT_QUICK_ADD_PRESETS;

  const addPreset = useCallback(async (preset: QuickAddPreset): Promise<boolean> => {
    setIsAdding(true);
    const added = await repository.addItem(preset.name, preset.defaultQuantity, preset.defaultUnit);
    if (!mountedRef.current) return added;

    setIsAdding(false);
    if (added) {
      setAddedItemName(preset.name);
      if (timerRef.current !== null) {
        clearTimeout(timerRef.current);
      }
      timerRef.current = setTimeout(() => {
        timerRef.current = null;
        setAddedItemName(null);
      }, messageDurationMs);
    }
    return added;
  }, [repository, messageDurationMs]);

  return {
    presets,
    isAdding,
    addedItemName,
    addPreset,
  };
}
