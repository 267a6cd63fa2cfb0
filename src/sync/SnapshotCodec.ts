/**
 * SnapshotCodec.ts
 * JSON encoding of SyncSnapshot
 *
 * Numbers travel as JSON numbers. Decoding ignores unknown keys, fills
 * documented defaults for absent keys, and rejects wrong types, explicit nulls
 * on non-nullable fields, and repeated ids within a list.
 */

import { Errors } from '../network/NetworkErrors';
import {
  ShoppingItem,
  ExpiringItem,
  QuickAddPreset,
  SyncSnapshot,
  Timestamp,
  DEFAULT_QUANTITY,
  DEFAULT_UNIT,
  DEFAULT_PRIORITY,
  DEFAULT_LOCATION,
  DEFAULT_CATEGORY,
  DEFAULT_ICON,
  DEFAULT_QUICK_ADD_PRESETS,
  createSyncSnapshot,
} from './SyncTypes';

// ============================================================================
// Encoding
// ============================================================================

export function encodeSnapshot(snapshot: SyncSnapshot): string {
  return JSON.stringify({
    shoppingItems: snapshot.shoppingItems.map(i => ({
      id: i.id,
      name: i.name,
      quantity: i.quantity,
      unit: i.unit,
      isChecked: i.isChecked,
      aisle: i.aisle,
      priority: i.priority,
      estimatedPrice: i.estimatedPrice,
    })),
    expiringItems: snapshot.expiringItems.map(i => ({
      id: i.id,
      name: i.name,
      expirationDate: i.expirationDate,
      quantity: i.quantity,
      unit: i.unit,
      location: i.location,
      daysUntilExpiration: i.daysUntilExpiration,
    })),
    quickAddPresets: snapshot.quickAddPresets.map(p => ({
      id: p.id,
      name: p.name,
      category: p.category,
      defaultQuantity: p.defaultQuantity,
      defaultUnit: p.defaultUnit,
      icon: p.icon,
    })),
    lastSyncDate: snapshot.lastSyncDate,
    shoppingListName: snapshot.shoppingListName,
  });
}

// ============================================================================
// Field Readers
// ============================================================================

type JsonObject = Record<string, unknown>;

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireObject(value: unknown, field: string): JsonObject {
  if (!isJsonObject(value)) {
    throw Errors.invalidSnapshot(field, 'expected an object');
  }
  return value;
}

function readString(obj: JsonObject, key: string, field: string, fallback?: string): string {
  const value = obj[key];
  if (value === undefined && fallback !== undefined) return fallback;
  if (typeof value !== 'string') {
    throw Errors.invalidSnapshot(`${field}.${key}`, 'expected a string');
  }
  return value;
}

function readNullableString(obj: JsonObject, key: string, field: string): string | null {
  const value = obj[key];
  if (value === undefined || value === null) return null;
  if (typeof value !== 'string') {
    throw Errors.invalidSnapshot(`${field}.${key}`, 'expected a string or null');
  }
  return value;
}

function readNumber(obj: JsonObject, key: string, field: string, fallback?: number): number {
  const value = obj[key];
  if (value === undefined && fallback !== undefined) return fallback;
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw Errors.invalidSnapshot(`${field}.${key}`, 'expected a number');
  }
  return value;
}

function readInteger(obj: JsonObject, key: string, field: string, fallback?: number): number {
  const value = readNumber(obj, key, field, fallback);
  if (!Number.isInteger(value)) {
    throw Errors.invalidSnapshot(`${field}.${key}`, 'expected an integer');
  }
  return value;
}

function readNullableNumber(obj: JsonObject, key: string, field: string): number | null {
  const value = obj[key];
  if (value === undefined || value === null) return null;
  return readNumber(obj, key, field);
}

function readBoolean(obj: JsonObject, key: string, field: string, fallback: boolean): boolean {
  const value = obj[key];
  if (value === undefined) return fallback;
  if (typeof value !== 'boolean') {
    throw Errors.invalidSnapshot(`${field}.${key}`, 'expected a boolean');
  }
  return value;
}

function readList<T extends { readonly id: string }>(
  obj: JsonObject,
  key: string,
  decodeEntry: (value: unknown, field: string) => T
): T[] | undefined {
  const value = obj[key];
  if (value === undefined) return undefined;
  if (!Array.isArray(value)) {
    throw Errors.invalidSnapshot(key, 'expected an array');
  }

  const seen = new Set<string>();
  return value.map((entry: unknown, index) => {
    const decoded = decodeEntry(entry, `${key}[${index}]`);
    if (seen.has(decoded.id)) {
      throw Errors.invalidSnapshot(`${key}[${index}].id`, `duplicate id "${decoded.id}"`);
    }
    seen.add(decoded.id);
    return decoded;
  });
}

// ============================================================================
// Entry Decoders
// ============================================================================

function decodeShoppingItem(value: unknown, field: string): ShoppingItem {
  const obj = requireObject(value, field);
  return {
    id: readString(obj, 'id', field),
    name: readString(obj, 'name', field),
    quantity: readNumber(obj, 'quantity', field, DEFAULT_QUANTITY),
    unit: readString(obj, 'unit', field, DEFAULT_UNIT),
    isChecked: readBoolean(obj, 'isChecked', field, false),
    aisle: readNullableString(obj, 'aisle', field),
    priority: readInteger(obj, 'priority', field, DEFAULT_PRIORITY),
    estimatedPrice: readNullableNumber(obj, 'estimatedPrice', field),
  };
}

function decodeExpiringItem(value: unknown, field: string): ExpiringItem {
  const obj = requireObject(value, field);
  return {
    id: readString(obj, 'id', field),
    name: readString(obj, 'name', field),
    expirationDate: readInteger(obj, 'expirationDate', field),
    quantity: readNumber(obj, 'quantity', field, DEFAULT_QUANTITY),
    unit: readString(obj, 'unit', field, DEFAULT_UNIT),
    location: readString(obj, 'location', field, DEFAULT_LOCATION),
    daysUntilExpiration: readInteger(obj, 'daysUntilExpiration', field, 0),
  };
}

function decodeQuickAddPreset(value: unknown, field: string): QuickAddPreset {
  const obj = requireObject(value, field);
  return {
    id: readString(obj, 'id', field),
    name: readString(obj, 'name', field),
    category: readString(obj, 'category', field, DEFAULT_CATEGORY),
    defaultQuantity: readNumber(obj, 'defaultQuantity', field, DEFAULT_QUANTITY),
    defaultUnit: readString(obj, 'defaultUnit', field, DEFAULT_UNIT),
    icon: readString(obj, 'icon', field, DEFAULT_ICON),
  };
}

// ============================================================================
// Decoding
// ============================================================================

/**
 * Decode a snapshot. Throws DecodeError; `now` stands in for an absent lastSyncDate.
 */
export function decodeSnapshot(json: string, now: Timestamp = Date.now()): SyncSnapshot {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    throw Errors.malformedJson(error);
  }

  const root = requireObject(parsed, '$');
  return createSyncSnapshot({
    shoppingItems: readList(root, 'shoppingItems', decodeShoppingItem) ?? [],
    expiringItems: readList(root, 'expiringItems', decodeExpiringItem) ?? [],
    quickAddPresets: readList(root, 'quickAddPresets', decodeQuickAddPreset) ?? DEFAULT_QUICK_ADD_PRESETS,
    lastSyncDate: readInteger(root, 'lastSyncDate', '$', now),
    shoppingListName: readNullableString(root, 'shoppingListName', '$'),
  });
}

export type DecodeResult =
  | { readonly ok: true; readonly snapshot: SyncSnapshot }
  | { readonly ok: false; readonly error: unknown };

/**
 * Non-throwing variant of decodeSnapshot
 */
export function tryDecodeSnapshot(json: string, now?: Timestamp): DecodeResult {
  try {
    return { ok: true, snapshot: decodeSnapshot(json, now) };
  } catch (error) {
    return { ok: false, error };
  }
}
