/**
 * WatchDataRepository.ts
 * Watch endpoint of the sync protocol
 *
 * Holds the last snapshot received from the phone and mediates all
 * watch -> phone traffic. Toggles are applied locally before they are sent and
 * reverted if any peer cannot take them. No operation rejects; failures are
 * logged and reported as `false`.
 */

import { Logger, createLogger } from '../logging';
import { Errors, toErrorReport } from '../network/NetworkErrors';
import {
  DataEvent,
  DataLayerClient,
  MessageEvent,
  PeerNode,
  Unsubscribe,
} from '../network/DataLayer';
import {
  DEFAULT_ADD_QUANTITY,
  DEFAULT_ADD_UNIT,
  DEFAULT_PATH_PREFIX,
  EncodedMessage,
  SNAPSHOT_DATA_KEY,
  WatchToPhoneMessage,
  createItemAdded,
  createSyncRequest,
  createToggleMessage,
  encodeMessage,
  parseMessagePath,
} from '../network/Protocol';
import { decodeSnapshot } from './SnapshotCodec';
import {
  ItemId,
  SyncSnapshot,
  Timestamp,
  createSyncSnapshot,
  withItemChecked,
} from './SyncTypes';

// ============================================================================
// Configuration
// ============================================================================

export interface WatchRepositoryConfig {
  readonly pathPrefix: string;
  /** Clears isSyncing when no response arrives in time. 0 disables. */
  readonly syncTimeoutMs: number;
  readonly clock: () => Timestamp;
  readonly logger: Logger;
}

export const DEFAULT_WATCH_CONFIG: WatchRepositoryConfig = {
  pathPrefix: DEFAULT_PATH_PREFIX,
  syncTimeoutMs: 30000,
  clock: () => Date.now(),
  logger: createLogger('WatchDataRepository'),
};

// ============================================================================
// State
// ============================================================================

export interface WatchSyncState {
  readonly snapshot: SyncSnapshot;
  readonly isSyncing: boolean;
  readonly lastSyncTime: Timestamp | null;
}

/** Toggles of one item still awaiting their sends */
interface PendingToggle {
  /** Value the phone is known to hold: last snapshot or last accepted toggle */
  confirmed: boolean;
  inFlight: number;
  failed: boolean;
}

export type WatchStateListener = (state: WatchSyncState) => void;
export type RefreshRequiredCallback = (sourceNodeId: string) => void | Promise<void>;

export function createInitialWatchState(): WatchSyncState {
  return Object.freeze({
    snapshot: createSyncSnapshot({ lastSyncDate: 0 }),
    isSyncing: false,
    lastSyncTime: null,
  });
}

// ============================================================================
// WatchDataRepository Class
// ============================================================================

export class WatchDataRepository {
  private readonly client: DataLayerClient;
  private readonly config: WatchRepositoryConfig;
  private readonly logger: Logger;
  private state: WatchSyncState;
  private readonly listeners: Set<WatchStateListener>;
  private readonly subscriptions: Unsubscribe[];
  private syncTimer: ReturnType<typeof setTimeout> | null;
  private onRefreshRequired: RefreshRequiredCallback | null;
  private readonly pendingToggles: Map<ItemId, PendingToggle>;

  constructor(client: DataLayerClient, config: Partial<WatchRepositoryConfig> = {}) {
    this.client = client;
    this.config = { ...DEFAULT_WATCH_CONFIG, ...config };
    this.logger = this.config.logger;
    this.state = createInitialWatchState();
    this.listeners = new Set();
    this.subscriptions = [];
    this.syncTimer = null;
    this.onRefreshRequired = null;
    this.pendingToggles = new Map();
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  /**
   * Attach to both transport channels
   */
  start(): void {
    if (this.subscriptions.length > 0) return;
    this.subscriptions.push(
      this.client.addDataListener(events => this.handleDataChanged(events)),
      this.client.addMessageListener(event => this.handleMessage(event))
    );
  }

  dispose(): void {
    for (const unsubscribe of this.subscriptions.splice(0)) {
      unsubscribe();
    }
    this.clearSyncTimer();
  }

  setOnRefreshRequired(callback: RefreshRequiredCallback | null): void {
    this.onRefreshRequired = callback;
  }

  // ==========================================================================
  // State Access
  // ==========================================================================

  getState(): WatchSyncState {
    return this.state;
  }

  getSnapshot(): SyncSnapshot {
    return this.state.snapshot;
  }

  /**
   * Listen for state replacements. The listener is not called on subscribe.
   */
  subscribe(listener: WatchStateListener): Unsubscribe {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // ==========================================================================
  // Sync
  // ==========================================================================

  /**
   * Ask every reachable phone for a snapshot. Resolves true once all requests
   * were handed to the transport; the reply arrives on the data channel.
   */
  async requestSync(): Promise<boolean> {
    this.setState({ isSyncing: true });
    this.armSyncTimer();

    const sent = await this.broadcast(createSyncRequest());
    if (!sent) {
      this.clearSyncTimer();
      this.setState({ isSyncing: false });
    }
    return sent;
  }

  /**
   * Replace the held snapshot with a decoded payload. A payload that does not
   * decode leaves the snapshot as it was.
   */
  onSyncResponseReceived(payload: string): boolean {
    this.clearSyncTimer();

    let snapshot: SyncSnapshot;
    try {
      snapshot = decodeSnapshot(payload, this.config.clock());
    } catch (error) {
      this.logger.error('Discarding sync response', { error: toErrorReport(error) });
      this.setState({ isSyncing: false });
      return false;
    }

    for (const [itemId, pending] of this.pendingToggles) {
      const item = snapshot.shoppingItems.find(i => i.id === itemId);
      if (item) pending.confirmed = item.isChecked;
    }
    this.setState({ snapshot, isSyncing: false, lastSyncTime: snapshot.lastSyncDate });
    this.logger.info('Snapshot received', {
      shoppingItems: snapshot.shoppingItems.length,
      expiringItems: snapshot.expiringItems.length,
    });
    return true;
  }

  /**
   * Data-item channel entry point
   */
  handleDataChanged(events: readonly DataEvent[]): void {
    for (const event of events) {
      if (event.type !== 'changed') continue;
      if (parseMessagePath(event.item.path, this.config.pathPrefix) !== 'sync_response') continue;

      const data = event.item.dataMap[SNAPSHOT_DATA_KEY];
      if (typeof data !== 'string') {
        this.clearSyncTimer();
        this.logger.error('Discarding sync response', {
          error: toErrorReport(Errors.missingDataEntry(event.item.path)),
        });
        this.setState({ isSyncing: false });
        continue;
      }
      this.onSyncResponseReceived(data);
    }
  }

  /**
   * Transient channel entry point
   */
  async handleMessage(event: MessageEvent): Promise<void> {
    if (parseMessagePath(event.path, this.config.pathPrefix) !== 'refresh_required') return;

    this.logger.info('Phone reported a refresh', { from: event.sourceNodeId });
    if (!this.onRefreshRequired) return;

    try {
      await this.onRefreshRequired(event.sourceNodeId);
    } catch (error) {
      this.logger.error('Refresh callback failed', { error: toErrorReport(error) });
    }
  }

  // ==========================================================================
  // Actions
  // ==========================================================================

  /**
   * Apply locally, then tell every phone. When the last overlapping toggle of
   * an item settles and any of them failed, the item goes back to the value
   * the phone is known to hold.
   */
  async toggleItemChecked(itemId: ItemId, checked: boolean): Promise<boolean> {
    const held = this.state.snapshot.shoppingItems.find(i => i.id === itemId);
    let pending = this.pendingToggles.get(itemId);
    if (!pending && held) {
      pending = { confirmed: held.isChecked, inFlight: 0, failed: false };
      this.pendingToggles.set(itemId, pending);
    }
    if (!held) {
      this.logger.debug(`Toggling item ${itemId} not held locally`);
    }
    if (pending) pending.inFlight += 1;
    this.setState({ snapshot: withItemChecked(this.state.snapshot, itemId, checked) });

    const sent = await this.broadcast(createToggleMessage(itemId, checked));
    if (pending) {
      this.settleToggle(itemId, pending, checked, sent);
    }
    return sent;
  }

  /**
   * Send a new item to the phone. Nothing is inserted locally; the item shows
   * up with the next snapshot, which a successful send requests.
   */
  async addItem(
    name: string,
    quantity: number = DEFAULT_ADD_QUANTITY,
    unit: string = DEFAULT_ADD_UNIT
  ): Promise<boolean> {
    const sent = await this.broadcast(createItemAdded(name, quantity, unit));
    if (!sent) return false;

    await this.requestSync();
    return true;
  }

  // ==========================================================================
  // Internal
  // ==========================================================================

  private settleToggle(itemId: ItemId, pending: PendingToggle, attempted: boolean, sent: boolean): void {
    pending.inFlight -= 1;
    if (sent) {
      pending.confirmed = attempted;
    } else {
      pending.failed = true;
    }
    if (pending.inFlight > 0) return;
    this.pendingToggles.delete(itemId);
    if (!pending.failed) return;

    const current = this.state.snapshot.shoppingItems.find(i => i.id === itemId);
    if (!current || current.isChecked === pending.confirmed) return;

    this.setState({ snapshot: withItemChecked(this.state.snapshot, itemId, pending.confirmed) });
    this.logger.warning(`Reverted item ${itemId} to ${pending.confirmed ? 'checked' : 'unchecked'}`);
  }

  /**
   * Send one message to every reachable peer. True only when there was at
   * least one peer and every send succeeded.
   */
  private async broadcast(message: WatchToPhoneMessage): Promise<boolean> {
    let encoded: EncodedMessage;
    try {
      encoded = encodeMessage(message, this.config.pathPrefix);
    } catch (error) {
      this.logger.error(`Cannot encode ${message.kind}`, { error: toErrorReport(error) });
      return false;
    }
    const { path, data } = encoded;

    let nodes: readonly PeerNode[];
    try {
      nodes = await this.client.getConnectedNodes();
    } catch (error) {
      this.logger.error('Peer lookup failed', {
        error: toErrorReport(Errors.peerLookupFailed(error)),
      });
      return false;
    }

    if (nodes.length === 0) {
      this.logger.warning('No phone reachable', {
        error: toErrorReport(Errors.noPeerReachable(path)),
      });
      return false;
    }

    const results = await Promise.allSettled(
      nodes.map(node => this.client.sendMessage(node.id, path, data))
    );

    let allSent = true;
    results.forEach((result, index) => {
      if (result.status === 'rejected') {
        allSent = false;
        this.logger.error('Send failed', {
          error: toErrorReport(Errors.peerSendFailed(nodes[index].id, path, result.reason)),
        });
      }
    });
    return allSent;
  }

  private armSyncTimer(): void {
    this.clearSyncTimer();
    if (this.config.syncTimeoutMs <= 0) return;

    this.syncTimer = setTimeout(() => {
      this.syncTimer = null;
      if (!this.state.isSyncing) return;
      this.logger.warning('Sync response did not arrive', {
        error: toErrorReport(Errors.syncTimeout(this.config.syncTimeoutMs)),
      });
      this.setState({ isSyncing: false });
    }, this.config.syncTimeoutMs);
  }

  private clearSyncTimer(): void {
    if (this.syncTimer !== null) {
      clearTimeout(this.syncTimer);
      this.syncTimer = null;
    }
  }

  private setState(patch: Partial<WatchSyncState>): void {
    const next: WatchSyncState = Object.freeze({ ...this.state, ...patch });
    if (
      next.snapshot === this.state.snapshot &&
      next.isSyncing === this.state.isSyncing &&
      next.lastSyncTime === this.state.lastSyncTime
    ) {
      return;
    }
    this.state = next;
    for (const listener of Array.from(this.listeners)) {
      listener(next);
    }
  }
}

// ============================================================================
// Factory
// ============================================================================

export function createWatchDataRepository(
  client: DataLayerClient,
  config?: Partial<WatchRepositoryConfig>
): WatchDataRepository {
  return new WatchDataRepository(client, config);
}
