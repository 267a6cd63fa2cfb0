/**
 * Protocol.ts
 * Message catalogue for phone/watch communication
 *
 * | name             | direction    | channel   | payload                         |
 * |------------------|--------------|-----------|---------------------------------|
 * | sync_request     | watch->phone | message   | empty                           |
 * | sync_response    | phone->watch | data item | { data: <snapshot json>, timestamp } |
 * | item_checked     | watch->phone | message   | { id, checked: "true" }         |
 * | item_unchecked   | watch->phone | message   | { id, checked: "false" }        |
 * | item_added       | watch->phone | message   | { name, quantity: "1.0", unit } |
 * | refresh_required | phone->watch | message   | empty                           |
 *
 * Action payloads are JSON objects whose values are all strings.
 */

import { Errors } from './NetworkErrors';
import { EMPTY_PAYLOAD, bytesToText, textToBytes } from './DataLayer';

// ============================================================================
// Paths
// ============================================================================

export type MessageName =
  | 'sync_request'
  | 'sync_response'
  | 'item_checked'
  | 'item_unchecked'
  | 'item_added'
  | 'refresh_required';

export const MESSAGE_NAMES: readonly MessageName[] = [
  'sync_request',
  'sync_response',
  'item_checked',
  'item_unchecked',
  'item_added',
  'refresh_required',
];

export const DEFAULT_PATH_PREFIX = '/pantry';

/** Keys of the data map published on sync_response */
export const SNAPSHOT_DATA_KEY = 'data';
export const SNAPSHOT_TIMESTAMP_KEY = 'timestamp';

export function messagePath(name: MessageName, prefix: string = DEFAULT_PATH_PREFIX): string {
  return `${prefix}/${name}`;
}

/**
 * Map a full path back to its message name, or null when it is not ours.
 */
export function parseMessagePath(path: string, prefix: string = DEFAULT_PATH_PREFIX): MessageName | null {
  const head = `${prefix}/`;
  if (!path.startsWith(head)) return null;
  const name = path.slice(head.length);
  return MESSAGE_NAMES.find(n => n === name) ?? null;
}

// ============================================================================
// Messages
// ============================================================================

export interface SyncRequestMessage {
  readonly kind: 'sync_request';
}

export interface ItemCheckedMessage {
  readonly kind: 'item_checked';
  readonly itemId: string;
}

export interface ItemUncheckedMessage {
  readonly kind: 'item_unchecked';
  readonly itemId: string;
}

export interface ItemAddedMessage {
  readonly kind: 'item_added';
  readonly name: string;
  readonly quantity: number;
  readonly unit: string;
}

export interface RefreshRequiredMessage {
  readonly kind: 'refresh_required';
}

export type WatchToPhoneMessage =
  | SyncRequestMessage
  | ItemCheckedMessage
  | ItemUncheckedMessage
  | ItemAddedMessage;

export type PhoneToWatchMessage = RefreshRequiredMessage;

/**
 * Everything that travels on the transient message channel.
 * sync_response goes through the data-item channel instead.
 */
export type WatchMessage = WatchToPhoneMessage | PhoneToWatchMessage;

export interface EncodedMessage {
  readonly path: string;
  readonly data: Uint8Array;
}

// ============================================================================
// Factory Functions
// ============================================================================

export const DEFAULT_ADD_QUANTITY = 1;
export const DEFAULT_ADD_UNIT = 'each';

export function createSyncRequest(): SyncRequestMessage {
  return { kind: 'sync_request' };
}

export function createToggleMessage(itemId: string, checked: boolean): ItemCheckedMessage | ItemUncheckedMessage {
  return checked
    ? { kind: 'item_checked', itemId }
    : { kind: 'item_unchecked', itemId };
}

export function createItemAdded(
  name: string,
  quantity: number = DEFAULT_ADD_QUANTITY,
  unit: string = DEFAULT_ADD_UNIT
): ItemAddedMessage {
  return { kind: 'item_added', name, quantity, unit };
}

export function createRefreshRequired(): RefreshRequiredMessage {
  return { kind: 'refresh_required' };
}

// ============================================================================
// Decimal Strings
// ============================================================================

const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Whole numbers keep one fractional digit: 2 -> "2.0", 1.25 -> "1.25".
 */
export function formatDecimal(value: number): string {
  if (!Number.isFinite(value)) {
    throw Errors.invalidActionPayload('quantity', `not a finite number: ${value}`);
  }
  return Number.isInteger(value) ? value.toFixed(1) : String(value);
}

/**
 * Strict decimal parse; null for anything that is not a plain decimal literal.
 */
export function parseDecimal(text: string): number | null {
  const trimmed = text.trim();
  if (!DECIMAL_PATTERN.test(trimmed)) return null;
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : null;
}

// ============================================================================
// Action Payloads
// ============================================================================

export type ActionPayload = Readonly<Record<string, string>>;

export function encodeActionPayload(payload: ActionPayload): Uint8Array {
  return textToBytes(JSON.stringify(payload));
}

/**
 * Decode a string map. Unknown keys are kept for the caller to ignore;
 * non-string values make the payload invalid.
 */
export function decodeActionPayload(path: string, data: Uint8Array): ActionPayload {
  let parsed: unknown;
  try {
    parsed = JSON.parse(bytesToText(data));
  } catch (error) {
    throw Errors.malformedJson(error);
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw Errors.invalidActionPayload(path, 'expected a JSON object');
  }

  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (typeof value !== 'string') {
      throw Errors.invalidActionPayload(path, `value of "${key}" is not a string`);
    }
    result[key] = value;
  }
  return result;
}

// ============================================================================
// Message Encoding
// ============================================================================

export function encodeMessage(message: WatchMessage, prefix: string = DEFAULT_PATH_PREFIX): EncodedMessage {
  switch (message.kind) {
    case 'sync_request':
    case 'refresh_required':
      return { path: messagePath(message.kind, prefix), data: EMPTY_PAYLOAD };
    case 'item_checked':
      return {
        path: messagePath(message.kind, prefix),
        data: encodeActionPayload({ id: message.itemId, checked: 'true' }),
      };
    case 'item_unchecked':
      return {
        path: messagePath(message.kind, prefix),
        data: encodeActionPayload({ id: message.itemId, checked: 'false' }),
      };
    case 'item_added':
      return {
        path: messagePath(message.kind, prefix),
        data: encodeActionPayload({
          name: message.name,
          quantity: formatDecimal(message.quantity),
          unit: message.unit,
        }),
      };
  }
}

/**
 * Decode a transient message. Throws DecodeError for foreign paths, for
 * sync_response (data-item only) and for invalid payloads.
 */
export function decodeMessage(
  path: string,
  data: Uint8Array,
  prefix: string = DEFAULT_PATH_PREFIX
): WatchMessage {
  const name = parseMessagePath(path, prefix);
  switch (name) {
    case 'sync_request':
      return createSyncRequest();
    case 'refresh_required':
      return createRefreshRequired();
    case 'item_checked':
    case 'item_unchecked': {
      const payload = decodeActionPayload(path, data);
      const itemId = payload.id;
      if (!itemId) {
        throw Errors.invalidActionPayload(path, 'missing id');
      }
      return createToggleMessage(itemId, name === 'item_checked');
    }
    case 'item_added': {
      const payload = decodeActionPayload(path, data);
      const itemName = payload.name;
      if (!itemName) {
        throw Errors.invalidActionPayload(path, 'missing name');
      }
      const quantity = payload.quantity !== undefined ? parseDecimal(payload.quantity) : null;
      return createItemAdded(
        itemName,
        quantity ?? DEFAULT_ADD_QUANTITY,
        payload.unit ?? DEFAULT_ADD_UNIT
      );
    }
    case 'sync_response':
    case null:
      throw Errors.unknownPath(path);
  }
}

// ============================================================================
// Type Guards
// ============================================================================

export function isWatchToPhoneMessage(message: WatchMessage): message is WatchToPhoneMessage {
  return message.kind !== 'refresh_required';
}

export function isToggleMessage(
  message: WatchMessage
): message is ItemCheckedMessage | ItemUncheckedMessage {
  return message.kind === 'item_checked' || message.kind === 'item_unchecked';
}
