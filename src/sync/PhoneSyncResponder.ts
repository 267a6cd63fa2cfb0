/**
 * PhoneSyncResponder.ts
 * Phone endpoint of the watch sync protocol
 *
 * Answers sync requests with a fresh snapshot on the data-item channel and
 * applies watch actions to the authoritative store. After an action it pushes
 * a follow-up snapshot so every watch converges.
 */

import { Logger, createLogger } from '../logging';
import { Errors, toErrorReport } from '../network/NetworkErrors';
import { DataLayerClient, MessageEvent, PeerNode, Unsubscribe } from '../network/DataLayer';
import {
  DEFAULT_PATH_PREFIX,
  ItemAddedMessage,
  SNAPSHOT_DATA_KEY,
  SNAPSHOT_TIMESTAMP_KEY,
  WatchMessage,
  createRefreshRequired,
  decodeMessage,
  encodeMessage,
  messagePath,
  parseMessagePath,
} from '../network/Protocol';
import { PantryStore } from './PantryStore';
import { SnapshotBuilder } from './SnapshotBuilder';
import { encodeSnapshot } from './SnapshotCodec';
import { ItemId, Timestamp } from './SyncTypes';

// ============================================================================
// Configuration
// ============================================================================

export interface PhoneResponderConfig {
  readonly pathPrefix: string;
  readonly pushAfterAction: boolean;
  readonly expiringWindowDays: number;
  readonly clock: () => Timestamp;
  readonly logger: Logger;
}

export const DEFAULT_RESPONDER_CONFIG: PhoneResponderConfig = {
  pathPrefix: DEFAULT_PATH_PREFIX,
  pushAfterAction: true,
  expiringWindowDays: 7,
  clock: () => Date.now(),
  logger: createLogger('PhoneSyncResponder'),
};

// ============================================================================
// PhoneSyncResponder Class
// ============================================================================

export class PhoneSyncResponder {
  private readonly client: DataLayerClient;
  private readonly store: PantryStore;
  private readonly builder: SnapshotBuilder;
  private readonly config: PhoneResponderConfig;
  private readonly logger: Logger;
  private unsubscribe: Unsubscribe | null;

  constructor(
    client: DataLayerClient,
    store: PantryStore,
    config: Partial<PhoneResponderConfig> = {}
  ) {
    this.client = client;
    this.store = store;
    this.config = { ...DEFAULT_RESPONDER_CONFIG, ...config };
    this.logger = this.config.logger;
    this.builder = new SnapshotBuilder(store, {
      expiringWindowDays: this.config.expiringWindowDays,
      clock: this.config.clock,
      logger: this.logger,
    });
    this.unsubscribe = null;
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  /**
   * Begin listening for watch messages
   */
  start(): void {
    if (this.unsubscribe) return;
    this.unsubscribe = this.client.addMessageListener(event => this.handleMessage(event));
  }

  stop(): void {
    if (this.unsubscribe) {
      this.unsubscribe();
      this.unsubscribe = null;
    }
  }

  isListening(): boolean {
    return this.unsubscribe !== null;
  }

  // ==========================================================================
  // Inbound
  // ==========================================================================

  /**
   * Process one transient message. Never rejects.
   */
  async handleMessage(event: MessageEvent): Promise<void> {
    if (parseMessagePath(event.path, this.config.pathPrefix) === null) {
      return;
    }

    this.logger.debug(`Message received: ${event.path}`, { from: event.sourceNodeId });

    let message: WatchMessage;
    try {
      message = decodeMessage(event.path, event.data, this.config.pathPrefix);
    } catch (error) {
      this.logger.warning('Dropping undecodable message', { error: toErrorReport(error) });
      return;
    }

    switch (message.kind) {
      case 'sync_request':
        await this.pushSnapshot();
        return;
      case 'item_checked':
        await this.applyToggle(message.itemId, true);
        return;
      case 'item_unchecked':
        await this.applyToggle(message.itemId, false);
        return;
      case 'item_added':
        await this.applyAdd(message);
        return;
      case 'refresh_required':
        this.logger.debug('Ignoring refresh_required on the phone side');
        return;
    }
  }

  // ==========================================================================
  // Outbound
  // ==========================================================================

  /**
   * Build a snapshot and publish it on sync_response. Resolves false on failure.
   */
  async pushSnapshot(): Promise<boolean> {
    try {
      const snapshot = await this.builder.build();
      await this.client.putDataItem({
        path: messagePath('sync_response', this.config.pathPrefix),
        dataMap: {
          [SNAPSHOT_DATA_KEY]: encodeSnapshot(snapshot),
          [SNAPSHOT_TIMESTAMP_KEY]: this.config.clock(),
        },
        urgent: true,
      });
      this.logger.info('Snapshot published', {
        shoppingItems: snapshot.shoppingItems.length,
        expiringItems: snapshot.expiringItems.length,
      });
      return true;
    } catch (error) {
      this.logger.error('Publishing snapshot failed', { error: toErrorReport(error) });
      return false;
    }
  }

  /**
   * Tell every connected watch to refresh. Resolves with the number of peers reached.
   */
  async notifyRefreshRequired(): Promise<number> {
    const { path, data } = encodeMessage(createRefreshRequired(), this.config.pathPrefix);

    let nodes: readonly PeerNode[];
    try {
      nodes = await this.client.getConnectedNodes();
    } catch (error) {
      this.logger.error('Peer lookup failed', { error: toErrorReport(Errors.peerLookupFailed(error)) });
      return 0;
    }

    const results = await Promise.allSettled(
      nodes.map(node => this.client.sendMessage(node.id, path, data))
    );

    let reached = 0;
    results.forEach((result, index) => {
      if (result.status === 'fulfilled') {
        reached++;
      } else {
        this.logger.warning('Refresh notice not delivered', {
          error: toErrorReport(Errors.peerSendFailed(nodes[index].id, path, result.reason)),
        });
      }
    });
    return reached;
  }

  // ==========================================================================
  // Actions
  // ==========================================================================

  private async applyToggle(itemId: ItemId, checked: boolean): Promise<void> {
    try {
      const found = await this.store.setItemChecked(itemId, checked);
      if (!found) {
        this.logger.info(`Ignoring toggle for unknown item ${itemId}`);
        return;
      }
      this.logger.debug(`Item ${itemId} ${checked ? 'checked' : 'unchecked'}`);
    } catch (error) {
      this.logger.error('Applying toggle failed', {
        error: toErrorReport(Errors.storeWriteFailed('setItemChecked', error)),
      });
      return;
    }

    await this.afterAction();
  }

  private async applyAdd(message: ItemAddedMessage): Promise<void> {
    try {
      const created = await this.store.addShoppingItem({
        name: message.name,
        quantity: message.quantity,
        unit: message.unit,
      });
      this.logger.debug(`Item added from watch: ${message.name} (${message.quantity} ${message.unit})`, {
        itemId: created.id,
      });
    } catch (error) {
      this.logger.error('Adding item failed', {
        error: toErrorReport(Errors.storeWriteFailed('addShoppingItem', error)),
      });
      return;
    }

    await this.afterAction();
  }

  private async afterAction(): Promise<void> {
    if (this.config.pushAfterAction) {
      await this.pushSnapshot();
    }
  }
}

// ============================================================================
// Factory
// ============================================================================

export function createPhoneSyncResponder(
  client: DataLayerClient,
  store: PantryStore,
  config?: Partial<PhoneResponderConfig>
): PhoneSyncResponder {
  return new PhoneSyncResponder(client, store, config);
}
