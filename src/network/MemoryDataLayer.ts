/**
 * MemoryDataLayer.ts
 * In-process implementation of DataLayerClient
 *
 * Links any number of devices inside one process. Listeners run on a later
 * microtask, never inside the sending call; flush() waits until every
 * delivery, and the work it triggered, has settled.
 * Faults can be injected per node for sends and peer lookups.
 */

import {
  NodeId,
  PeerNode,
  MessageEvent,
  MessageListener,
  DataItem,
  DataEvent,
  DataListener,
  DataLayerClient,
  Unsubscribe,
} from './DataLayer';
import { Logger, createLogger } from '../logging';
import { toErrorReport } from './NetworkErrors';

// ============================================================================
// Types
// ============================================================================

interface MemoryNodeState {
  readonly nodeId: NodeId;
  readonly displayName: string;
  connected: boolean;
  sendFailure: Error | null;
  lookupFailure: Error | null;
  readonly messageListeners: Set<MessageListener>;
  readonly dataListeners: Set<DataListener>;
}

export interface SentMessageRecord {
  readonly from: NodeId;
  readonly to: NodeId;
  readonly path: string;
  readonly data: Uint8Array;
  readonly delivered: boolean;
}

// ============================================================================
// MemoryDataLayerNetwork Class
// ============================================================================

export class MemoryDataLayerNetwork {
  private readonly nodes: Map<NodeId, MemoryNodeState>;
  private readonly dataItems: Map<string, DataItem>;
  private readonly sent: SentMessageRecord[];
  private readonly pending: Set<Promise<void>>;
  private readonly logger: Logger;

  constructor(logger: Logger = createLogger('MemoryDataLayer')) {
    this.nodes = new Map();
    this.dataItems = new Map();
    this.sent = [];
    this.pending = new Set();
    this.logger = logger;
  }

  // ==========================================================================
  // Topology
  // ==========================================================================

  /**
   * Register a device and return its client
   */
  attach(nodeId: NodeId, displayName: string = nodeId): DataLayerClient {
    if (this.nodes.has(nodeId)) {
      throw new Error(`Node already attached: ${nodeId}`);
    }

    this.nodes.set(nodeId, {
      nodeId,
      displayName,
      connected: true,
      sendFailure: null,
      lookupFailure: null,
      messageListeners: new Set(),
      dataListeners: new Set(),
    });

    return new MemoryDataLayerClient(this, nodeId);
  }

  detach(nodeId: NodeId): void {
    this.nodes.delete(nodeId);
  }

  setConnected(nodeId: NodeId, connected: boolean): void {
    this.requireNode(nodeId).connected = connected;
  }

  /**
   * Make every send addressed to nodeId reject with error (null clears)
   */
  failSendsTo(nodeId: NodeId, error: Error | null = new Error(`Delivery to ${nodeId} failed`)): void {
    this.requireNode(nodeId).sendFailure = error;
  }

  /**
   * Make getConnectedNodes() reject for nodeId (null clears)
   */
  failPeerLookup(nodeId: NodeId, error: Error | null = new Error('Node lookup failed')): void {
    this.requireNode(nodeId).lookupFailure = error;
  }

  // ==========================================================================
  // Inspection
  // ==========================================================================

  getSentMessages(): readonly SentMessageRecord[] {
    return [...this.sent];
  }

  getDataItem(path: string): DataItem | null {
    return this.dataItems.get(path) ?? null;
  }

  clearSentMessages(): void {
    this.sent.length = 0;
  }

  /**
   * Wait for all in-flight deliveries, including the ones they cause
   */
  async flush(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all(Array.from(this.pending));
    }
  }

  // ==========================================================================
  // Client Operations
  // ==========================================================================

  connectedPeersOf(nodeId: NodeId): readonly PeerNode[] {
    const self = this.requireNode(nodeId);
    if (self.lookupFailure) {
      throw self.lookupFailure;
    }
    if (!self.connected) return [];

    return Array.from(this.nodes.values())
      .filter(n => n.nodeId !== nodeId && n.connected)
      .map(n => ({ id: n.nodeId, displayName: n.displayName, isNearby: true }));
  }

  send(from: NodeId, to: NodeId, path: string, data: Uint8Array): void {
    const sender = this.requireNode(from);
    const target = this.nodes.get(to);

    if (!sender.connected || !target || !target.connected) {
      this.sent.push({ from, to, path, data, delivered: false });
      throw new Error(`Node ${to} is not reachable`);
    }
    if (target.sendFailure) {
      this.sent.push({ from, to, path, data, delivered: false });
      throw target.sendFailure;
    }

    this.sent.push({ from, to, path, data, delivered: true });
    const event: MessageEvent = { sourceNodeId: from, path, data };
    this.schedule(Array.from(target.messageListeners), listener => listener(event), path);
  }

  put(from: NodeId, item: DataItem): void {
    this.requireNode(from);
    this.dataItems.set(item.path, item);

    const events: readonly DataEvent[] = [{ type: 'changed', sourceNodeId: from, item }];
    for (const node of this.nodes.values()) {
      if (node.nodeId === from || !node.connected) continue;
      this.schedule(Array.from(node.dataListeners), listener => listener(events), item.path);
    }
  }

  addMessageListener(nodeId: NodeId, listener: MessageListener): Unsubscribe {
    const node = this.requireNode(nodeId);
    node.messageListeners.add(listener);
    return () => {
      node.messageListeners.delete(listener);
    };
  }

  addDataListener(nodeId: NodeId, listener: DataListener): Unsubscribe {
    const node = this.requireNode(nodeId);
    node.dataListeners.add(listener);
    return () => {
      node.dataListeners.delete(listener);
    };
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private schedule<L>(
    listeners: readonly L[],
    invoke: (listener: L) => void | Promise<void>,
    path: string
  ): void {
    for (const listener of listeners) {
      const delivery: Promise<void> = Promise.resolve()
        .then(() => invoke(listener))
        .catch((error: unknown) => {
          this.logger.error(`Listener failed on ${path}`, { error: toErrorReport(error) });
        })
        .finally(() => {
          this.pending.delete(delivery);
        });
      this.pending.add(delivery);
    }
  }

  private requireNode(nodeId: NodeId): MemoryNodeState {
    const node = this.nodes.get(nodeId);
    if (!node) {
      throw new Error(`Unknown node: ${nodeId}`);
    }
    return node;
  }
}

// ============================================================================
// MemoryDataLayerClient Class
// ============================================================================

class MemoryDataLayerClient implements DataLayerClient {
  readonly localNodeId: NodeId;
  private readonly network: MemoryDataLayerNetwork;

  constructor(network: MemoryDataLayerNetwork, nodeId: NodeId) {
    this.network = network;
    this.localNodeId = nodeId;
  }

  async getConnectedNodes(): Promise<readonly PeerNode[]> {
    return this.network.connectedPeersOf(this.localNodeId);
  }

  async sendMessage(nodeId: NodeId, path: string, data: Uint8Array): Promise<void> {
    this.network.send(this.localNodeId, nodeId, path, data);
  }

  async putDataItem(item: DataItem): Promise<void> {
    this.network.put(this.localNodeId, item);
  }

  addMessageListener(listener: MessageListener): Unsubscribe {
    return this.network.addMessageListener(this.localNodeId, listener);
  }

  addDataListener(listener: DataListener): Unsubscribe {
    return this.network.addDataListener(this.localNodeId, listener);
  }
}

// ============================================================================
// Factory
// ============================================================================

export function createMemoryDataLayerNetwork(logger?: Logger): MemoryDataLayerNetwork {
  return new MemoryDataLayerNetwork(logger);
}
