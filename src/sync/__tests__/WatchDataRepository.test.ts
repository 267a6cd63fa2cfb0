/**
 * WatchDataRepository.test.ts
 * Tests for the watch-side snapshot holder and its outbound actions
 */

import { WatchDataRepository, WatchSyncState } from '../WatchDataRepository';
import { encodeSnapshot } from '../SnapshotCodec';
import { createShoppingItem, createSyncSnapshot, SyncSnapshot } from '../SyncTypes';
import { MemoryDataLayerNetwork } from '../../network/MemoryDataLayer';
import { DataLayerClient, EMPTY_PAYLOAD, MessageEvent, bytesToText } from '../../network/DataLayer';
import { LoggingManager, LogLevel, MemoryLogSink, Logger, createLogger } from '../../logging';

// ============================================================================
// Test Helpers
// ============================================================================

const NOW = Date.UTC(2026, 0, 15, 12, 0, 0);

function memoryLogger(sink: MemoryLogSink): Logger {
  return createLogger('Test', new LoggingManager(LogLevel.Debug, [sink]));
}

function listSnapshot(): SyncSnapshot {
  return createSyncSnapshot({
    shoppingItems: [
      createShoppingItem({ id: 'a', name: 'Milk' }),
      createShoppingItem({ id: 'b', name: 'Bread', isChecked: true }),
    ],
    lastSyncDate: NOW,
    shoppingListName: 'Weekly',
  });
}

function checkedFlags(repository: WatchDataRepository): boolean[] {
  return repository.getSnapshot().shoppingItems.map(i => i.isChecked);
}

interface PhoneInbox {
  readonly client: DataLayerClient;
  readonly messages: MessageEvent[];
}

function attachPhone(network: MemoryDataLayerNetwork, nodeId: string): PhoneInbox {
  const client = network.attach(nodeId);
  const messages: MessageEvent[] = [];
  client.addMessageListener(event => {
    messages.push(event);
  });
  return { client, messages };
}

// ============================================================================
// WatchDataRepository Tests
// ============================================================================

describe('WatchDataRepository', () => {
  let network: MemoryDataLayerNetwork;
  let sink: MemoryLogSink;
  let repository: WatchDataRepository;

  beforeEach(() => {
    sink = new MemoryLogSink();
    network = new MemoryDataLayerNetwork(memoryLogger(sink));
    repository = new WatchDataRepository(network.attach('watch'), {
      clock: () => NOW,
      logger: memoryLogger(sink),
    });
  });

  afterEach(() => {
    repository.dispose();
  });

  describe('Initial state', () => {
    it('should start empty and idle', () => {
      const state = repository.getState();
      expect(state.snapshot.shoppingItems).toEqual([]);
      expect(state.snapshot.expiringItems).toEqual([]);
      expect(state.isSyncing).toBe(false);
      expect(state.lastSyncTime).toBeNull();
    });
  });

  describe('requestSync', () => {
    it('should clear isSyncing when no phone is reachable', async () => {
      const seen: boolean[] = [];
      repository.subscribe(state => seen.push(state.isSyncing));

      expect(await repository.requestSync()).toBe(false);

      expect(seen).toEqual([true, false]);
      expect(repository.getState().isSyncing).toBe(false);
      expect(sink.getMessages()).toContain('No phone reachable');
    });

    it('should send an empty request to every phone and stay syncing', async () => {
      const first = attachPhone(network, 'phone-1');
      const second = attachPhone(network, 'phone-2');

      expect(await repository.requestSync()).toBe(true);
      await network.flush();

      expect(repository.getState().isSyncing).toBe(true);
      for (const phone of [first, second]) {
        expect(phone.messages).toHaveLength(1);
        expect(phone.messages[0].path).toBe('/pantry/sync_request');
        expect(phone.messages[0].data).toEqual(EMPTY_PAYLOAD);
      }
    });

    it('should clear isSyncing when a send fails', async () => {
      attachPhone(network, 'phone');
      network.failSendsTo('phone');

      expect(await repository.requestSync()).toBe(false);
      expect(repository.getState().isSyncing).toBe(false);
    });

    it('should clear isSyncing when the peer lookup fails', async () => {
      network.failPeerLookup('watch');

      expect(await repository.requestSync()).toBe(false);
      expect(repository.getState().isSyncing).toBe(false);
      expect(sink.getMessages()).toContain('Peer lookup failed');
    });

    it('should use the configured path prefix', async () => {
      const phone = attachPhone(network, 'phone');
      const custom = new WatchDataRepository(network.attach('watch-2'), {
        pathPrefix: '/groceries',
        logger: memoryLogger(sink),
      });

      await custom.requestSync();
      await network.flush();
      custom.dispose();

      expect(phone.messages.map(m => m.path)).toEqual(['/groceries/sync_request']);
    });
  });

  describe('onSyncResponseReceived', () => {
    it('should replace the snapshot and record the sync time', () => {
      expect(repository.onSyncResponseReceived(encodeSnapshot(listSnapshot()))).toBe(true);

      const state = repository.getState();
      expect(state.snapshot).toEqual(listSnapshot());
      expect(state.lastSyncTime).toBe(NOW);
      expect(state.isSyncing).toBe(false);
    });

    it('should leave the snapshot untouched on a malformed payload', () => {
      repository.onSyncResponseReceived(encodeSnapshot(listSnapshot()));
      const before = repository.getSnapshot();

      expect(repository.onSyncResponseReceived('{"shoppingItems": [')).toBe(false);

      expect(repository.getSnapshot()).toBe(before);
      expect(repository.getState().lastSyncTime).toBe(NOW);
      expect(sink.getMessages()).toContain('Discarding sync response');
    });

    it('should clear isSyncing after a failed decode', async () => {
      attachPhone(network, 'phone');
      await repository.requestSync();

      repository.onSyncResponseReceived('not json');

      expect(repository.getState().isSyncing).toBe(false);
    });
  });

  describe('handleDataChanged', () => {
    it('should take the data entry of sync_response', () => {
      repository.handleDataChanged([{
        type: 'changed',
        sourceNodeId: 'phone',
        item: { path: '/pantry/sync_response', dataMap: { data: encodeSnapshot(listSnapshot()), timestamp: NOW } },
      }]);

      expect(repository.getSnapshot().shoppingListName).toBe('Weekly');
    });

    it('should treat a missing data entry as a decode failure', async () => {
      attachPhone(network, 'phone');
      await repository.requestSync();

      repository.handleDataChanged([{
        type: 'changed',
        sourceNodeId: 'phone',
        item: { path: '/pantry/sync_response', dataMap: { timestamp: NOW } },
      }]);

      expect(repository.getState().isSyncing).toBe(false);
      expect(repository.getSnapshot().shoppingItems).toEqual([]);
    });

    it('should ignore deletions and other paths', () => {
      const data = encodeSnapshot(listSnapshot());
      repository.handleDataChanged([
        { type: 'deleted', sourceNodeId: 'phone', item: { path: '/pantry/sync_response', dataMap: { data } } },
        { type: 'changed', sourceNodeId: 'phone', item: { path: '/pantry/settings', dataMap: { data } } },
      ]);

      expect(repository.getState().lastSyncTime).toBeNull();
    });

    it('should receive data items once started', async () => {
      const phone = network.attach('phone');
      repository.start();

      await phone.putDataItem({ path: '/pantry/sync_response', dataMap: { data: encodeSnapshot(listSnapshot()) } });
      await network.flush();

      expect(repository.getSnapshot().shoppingItems).toHaveLength(2);
    });

    it('should stop receiving after dispose', async () => {
      const phone = network.attach('phone');
      repository.start();
      repository.dispose();

      await phone.putDataItem({ path: '/pantry/sync_response', dataMap: { data: encodeSnapshot(listSnapshot()) } });
      await network.flush();

      expect(repository.getSnapshot().shoppingItems).toEqual([]);
    });
  });

  describe('toggleItemChecked', () => {
    beforeEach(() => {
      repository.onSyncResponseReceived(encodeSnapshot(listSnapshot()));
    });

    it('should apply the change before the send completes', async () => {
      attachPhone(network, 'phone');

      const pending = repository.toggleItemChecked('a', true);
      expect(checkedFlags(repository)).toEqual([true, true]);

      expect(await pending).toBe(true);
      expect(checkedFlags(repository)).toEqual([true, true]);
    });

    it('should send the toggle with a string flag', async () => {
      const phone = attachPhone(network, 'phone');

      await repository.toggleItemChecked('b', false);
      await network.flush();

      expect(phone.messages.map(m => m.path)).toEqual(['/pantry/item_unchecked']);
      expect(JSON.parse(bytesToText(phone.messages[0].data))).toEqual({ id: 'b', checked: 'false' });
    });

    it('should revert when no phone is reachable', async () => {
      expect(await repository.toggleItemChecked('a', true)).toBe(false);
      expect(checkedFlags(repository)).toEqual([false, true]);
    });

    it('should revert when the only phone rejects the send', async () => {
      attachPhone(network, 'phone');
      network.failSendsTo('phone');

      expect(await repository.toggleItemChecked('b', false)).toBe(false);
      expect(checkedFlags(repository)).toEqual([false, true]);
    });

    it('should revert when any of several phones rejects the send', async () => {
      attachPhone(network, 'phone-1');
      attachPhone(network, 'phone-2');
      network.failSendsTo('phone-2');

      expect(await repository.toggleItemChecked('a', true)).toBe(false);

      expect(checkedFlags(repository)).toEqual([false, true]);
      expect(network.getSentMessages().map(m => [m.to, m.delivered])).toEqual([
        ['phone-1', true],
        ['phone-2', false],
      ]);
    });

    it('should revert when the peer lookup fails', async () => {
      network.failPeerLookup('watch');

      expect(await repository.toggleItemChecked('a', true)).toBe(false);
      expect(checkedFlags(repository)).toEqual([false, true]);
    });

    it('should restore the prior value when toggling to the current value', async () => {
      expect(await repository.toggleItemChecked('b', true)).toBe(false);
      expect(checkedFlags(repository)).toEqual([false, true]);
    });

    it('should still send toggles for ids it does not hold', async () => {
      const phone = attachPhone(network, 'phone');
      const before = repository.getSnapshot();

      expect(await repository.toggleItemChecked('ghost', true)).toBe(true);
      await network.flush();

      expect(repository.getSnapshot()).toBe(before);
      expect(phone.messages.map(m => m.path)).toEqual(['/pantry/item_checked']);
    });

    it('should keep a snapshot that arrived during the send', async () => {
      attachPhone(network, 'phone');
      network.failSendsTo('phone');

      const pending = repository.toggleItemChecked('a', true);
      repository.onSyncResponseReceived(encodeSnapshot(createSyncSnapshot({
        shoppingItems: [createShoppingItem({ id: 'c', name: 'Eggs' })],
        lastSyncDate: NOW + 1000,
      })));
      await pending;

      expect(repository.getSnapshot().shoppingItems.map(i => i.id)).toEqual(['c']);
    });

    it('should restore the phone value after overlapping toggles all fail', async () => {
      attachPhone(network, 'phone');
      network.failSendsTo('phone');

      const results = await Promise.all([
        repository.toggleItemChecked('a', true),
        repository.toggleItemChecked('a', false),
      ]);

      expect(results).toEqual([false, false]);
      expect(checkedFlags(repository)).toEqual([false, true]);
    });

    it('should hold the optimistic value until the last overlapping toggle settles', async () => {
      attachPhone(network, 'phone');
      network.failSendsTo('phone');

      const first = repository.toggleItemChecked('b', false);
      const second = repository.toggleItemChecked('b', true);
      const third = repository.toggleItemChecked('b', false);
      expect(checkedFlags(repository)).toEqual([false, false]);

      expect(await Promise.all([first, second, third])).toEqual([false, false, false]);
      expect(checkedFlags(repository)).toEqual([false, true]);
    });

    it('should revert to the last accepted toggle', async () => {
      attachPhone(network, 'phone');

      expect(await repository.toggleItemChecked('a', true)).toBe(true);
      network.failSendsTo('phone');
      expect(await repository.toggleItemChecked('a', false)).toBe(false);

      expect(checkedFlags(repository)).toEqual([true, true]);
    });

    it('should revert to the value of a snapshot that arrived during failed toggles', async () => {
      attachPhone(network, 'phone');
      network.failSendsTo('phone');

      const pending = repository.toggleItemChecked('a', true);
      repository.onSyncResponseReceived(encodeSnapshot(createSyncSnapshot({
        ...listSnapshot(),
        shoppingItems: [
          createShoppingItem({ id: 'a', name: 'Milk', isChecked: true }),
          createShoppingItem({ id: 'b', name: 'Bread', isChecked: true }),
        ],
      })));
      const later = repository.toggleItemChecked('a', false);
      await Promise.all([pending, later]);

      expect(checkedFlags(repository)).toEqual([true, true]);
    });

    it('should change only the checked flag of the toggled item', async () => {
      attachPhone(network, 'phone');
      repository.onSyncResponseReceived(encodeSnapshot(createSyncSnapshot({
        shoppingItems: [
          createShoppingItem({ id: 'a', name: 'Milk', quantity: 2, aisle: 'Dairy', priority: 8, estimatedPrice: 3.49 }),
          createShoppingItem({ id: 'b', name: 'Flour', quantity: 2.5, unit: 'kg', isChecked: true }),
          createShoppingItem({ id: 'c', name: 'Eggs', quantity: 12 }),
        ],
        lastSyncDate: NOW,
        shoppingListName: 'Weekly',
      })));
      const before = repository.getSnapshot();

      expect(await repository.toggleItemChecked('c', true)).toBe(true);

      const after = repository.getSnapshot();
      expect(after.shoppingItems).toHaveLength(3);
      expect(after.shoppingItems[0]).toEqual(before.shoppingItems[0]);
      expect(after.shoppingItems[1]).toEqual(before.shoppingItems[1]);
      expect(after.shoppingItems[2]).toEqual({ ...before.shoppingItems[2], isChecked: true });
      expect(after.expiringItems).toEqual(before.expiringItems);
      expect(after.quickAddPresets).toEqual(before.quickAddPresets);
      expect(after.shoppingListName).toBe('Weekly');
      expect(after.lastSyncDate).toBe(NOW);
    });

    it('should leave the whole snapshot as it was after a failed toggle', async () => {
      const before = repository.getSnapshot();

      expect(await repository.toggleItemChecked('b', false)).toBe(false);

      expect(repository.getSnapshot()).toEqual(before);
    });
  });

  describe('addItem', () => {
    it('should send the literal values and then request a sync', async () => {
      const phone = attachPhone(network, 'phone');

      expect(await repository.addItem('Flour', 2.5, 'kg')).toBe(true);
      await network.flush();

      expect(phone.messages.map(m => m.path)).toEqual(['/pantry/item_added', '/pantry/sync_request']);
      expect(JSON.parse(bytesToText(phone.messages[0].data))).toEqual({
        name: 'Flour',
        quantity: '2.5',
        unit: 'kg',
      });
      expect(repository.getState().isSyncing).toBe(true);
    });

    it('should default quantity and unit', async () => {
      const phone = attachPhone(network, 'phone');

      await repository.addItem('Milk');
      await network.flush();

      expect(JSON.parse(bytesToText(phone.messages[0].data))).toEqual({
        name: 'Milk',
        quantity: '1.0',
        unit: 'each',
      });
    });

    it('should not insert anything locally', async () => {
      attachPhone(network, 'phone');

      await repository.addItem('Milk');

      expect(repository.getSnapshot().shoppingItems).toEqual([]);
    });

    it('should only log when no phone is reachable', async () => {
      const states: WatchSyncState[] = [];
      repository.subscribe(state => states.push(state));

      expect(await repository.addItem('Milk')).toBe(false);

      expect(states).toEqual([]);
      expect(sink.getMessages()).toContain('No phone reachable');
    });
  });

  describe('Sync timeout', () => {
    beforeEach(() => {
      jest.useFakeTimers({ doNotFake: ['nextTick', 'queueMicrotask'] });
    });

    afterEach(() => {
      jest.useRealTimers();
    });

    function timedRepository(syncTimeoutMs: number): WatchDataRepository {
      return new WatchDataRepository(network.attach('timed-watch'), {
        syncTimeoutMs,
        clock: () => NOW,
        logger: memoryLogger(sink),
      });
    }

    it('should clear isSyncing when no response arrives', async () => {
      attachPhone(network, 'phone');
      const timed = timedRepository(1000);

      await timed.requestSync();
      jest.advanceTimersByTime(999);
      expect(timed.getState().isSyncing).toBe(true);

      jest.advanceTimersByTime(1);
      expect(timed.getState().isSyncing).toBe(false);
      expect(sink.getMessages()).toContain('Sync response did not arrive');
      timed.dispose();
    });

    it('should not fire once a response arrived', async () => {
      attachPhone(network, 'phone');
      const timed = timedRepository(1000);

      await timed.requestSync();
      timed.onSyncResponseReceived(encodeSnapshot(listSnapshot()));
      jest.advanceTimersByTime(5000);

      expect(sink.getMessages()).not.toContain('Sync response did not arrive');
      timed.dispose();
    });

    it('should stay syncing when the timeout is disabled', async () => {
      attachPhone(network, 'phone');
      const timed = timedRepository(0);

      await timed.requestSync();
      jest.advanceTimersByTime(60000);

      expect(timed.getState().isSyncing).toBe(true);
      timed.dispose();
    });
  });

  describe('refresh_required', () => {
    it('should report the notice to the callback', async () => {
      const phone = network.attach('phone');
      const callback = jest.fn();
      repository.setOnRefreshRequired(callback);
      repository.start();

      await phone.sendMessage('watch', '/pantry/refresh_required', EMPTY_PAYLOAD);
      await network.flush();

      expect(callback).toHaveBeenCalledWith('phone');
    });

    it('should log a failing callback', async () => {
      repository.setOnRefreshRequired(() => {
        throw new Error('screen gone');
      });

      await repository.handleMessage({ sourceNodeId: 'phone', path: '/pantry/refresh_required', data: EMPTY_PAYLOAD });

      expect(sink.getMessages()).toContain('Refresh callback failed');
    });

    it('should ignore other messages', async () => {
      const callback = jest.fn();
      repository.setOnRefreshRequired(callback);

      await repository.handleMessage({ sourceNodeId: 'phone', path: '/pantry/sync_request', data: EMPTY_PAYLOAD });

      expect(callback).not.toHaveBeenCalled();
    });
  });

  describe('subscribe', () => {
    it('should stop notifying after unsubscribe', () => {
      const listener = jest.fn();
      const unsubscribe = repository.subscribe(listener);

      repository.onSyncResponseReceived(encodeSnapshot(listSnapshot()));
      unsubscribe();
      repository.onSyncResponseReceived(encodeSnapshot(createSyncSnapshot({ lastSyncDate: NOW + 1 })));

      expect(listener).toHaveBeenCalledTimes(1);
    });
  });
});
