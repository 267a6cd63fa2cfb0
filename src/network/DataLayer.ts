/**
 * DataLayer.ts
 * Transport contract between the phone and the watch
 *
 * Two channels share one client:
 * - transient messages: addressed to one node, at most once, unordered
 * - data items: a path-keyed map replicated to every other node
 */

import { TextDecoder, TextEncoder } from 'util';

// ============================================================================
// Identifiers
// ============================================================================

export type NodeId = string;

export interface PeerNode {
  readonly id: NodeId;
  readonly displayName: string;
  readonly isNearby: boolean;
}

// ============================================================================
// Events
// ============================================================================

export interface MessageEvent {
  readonly sourceNodeId: NodeId;
  readonly path: string;
  readonly data: Uint8Array;
}

export type DataMapValue = string | number | boolean;
export type DataMap = Readonly<Record<string, DataMapValue>>;

export interface DataItem {
  readonly path: string;
  readonly dataMap: DataMap;
  readonly urgent?: boolean;
}

export type DataEventType = 'changed' | 'deleted';

export interface DataEvent {
  readonly type: DataEventType;
  readonly sourceNodeId: NodeId;
  readonly item: DataItem;
}

/** A returned promise lets the transport know when handling has finished */
export type MessageListener = (event: MessageEvent) => void | Promise<void>;
export type DataListener = (events: readonly DataEvent[]) => void | Promise<void>;
export type Unsubscribe = () => void;

// ============================================================================
// Client
// ============================================================================

/**
 * One device's handle on the proximity transport.
 */
export interface DataLayerClient {
  readonly localNodeId: NodeId;

  /** Peers currently reachable from this device, excluding itself */
  getConnectedNodes(): Promise<readonly PeerNode[]>;

  /** Rejects when the peer cannot take the message */
  sendMessage(nodeId: NodeId, path: string, data: Uint8Array): Promise<void>;

  putDataItem(item: DataItem): Promise<void>;

  addMessageListener(listener: MessageListener): Unsubscribe;

  addDataListener(listener: DataListener): Unsubscribe;
}

// ============================================================================
// Payload Bytes
// ============================================================================

const encoder = new TextEncoder();
const decoder = new TextDecoder('utf-8', { fatal: true });

export function textToBytes(text: string): Uint8Array {
  return encoder.encode(text);
}

/**
 * Throws TypeError on invalid UTF-8.
 */
export function bytesToText(bytes: Uint8Array): string {
  return decoder.decode(bytes);
}

export const EMPTY_PAYLOAD: Uint8Array = new Uint8Array(0);
