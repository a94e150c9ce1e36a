import { describe, it, expect, vi, beforeEach } from 'vitest';
import { FeedCollector } from './FeedCollector';
import { FeedConnectionManager } from './FeedConnectionManager';
import { StreamType, type Collector, type FeedEvent } from './types';
import { SubscriptionError } from '../utils/errors';
import {
  TEST_API_KEY,
  createFakeConnector,
  createMockAddress,
  createMockBlock,
  createMockTransaction,
  take,
  toFeedTransaction,
  type FakeFeedSession,
} from '../test-utils';

describe('FeedCollector', () => {
  let connector: ReturnType<typeof createFakeConnector>['connector'];
  let sessions: FakeFeedSession[];

  beforeEach(() => {
    ({ connector, sessions } = createFakeConnector());
  });

  describe('create', () => {
    it('connects and keeps the stream type', async () => {
      const collector = await FeedCollector.create(TEST_API_KEY, StreamType.TRANSACTIONS, {
        connector,
        endpoint: 'localhost:8546',
      });

      expect(collector.streamType).toBe(StreamType.TRANSACTIONS);
      expect(collector.getConnection().getEndpoint()).toBe('localhost:8546');
      expect(sessions).toHaveLength(1);
    });

    it('fails with an invalid credential and opens no stream', async () => {
      const rejecting = createFakeConnector({ rejectedApiKeys: ['bad-key'] });

      await expect(
        FeedCollector.create('bad-key', StreamType.TRANSACTIONS, { connector: rejecting.connector }),
      ).rejects.toMatchObject({ code: 'CONNECTION_UNAUTHORIZED' });
      expect(rejecting.sessions).toHaveLength(0);
    });
  });

  describe('transaction stream', () => {
    it('emits Transaction events for [A, B, C] in order', async () => {
      const collector = await FeedCollector.create(TEST_API_KEY, StreamType.TRANSACTIONS, {
        connector,
      });
      const [a, b, c] = [1, 2, 3].map(createMockTransaction);

      const stream = await collector.openEventStream();
      sessions[0].emitTransaction(toFeedTransaction(a));
      sessions[0].emitTransaction(toFeedTransaction(b));
      sessions[0].emitTransaction(toFeedTransaction(c));

      const events = await take(stream, 3);
      expect(events).toEqual([
        { kind: 'Transaction', transaction: a },
        { kind: 'Transaction', transaction: b },
        { kind: 'Transaction', transaction: c },
      ]);
    });

    it('unwraps the exact transaction object', async () => {
      const collector = await FeedCollector.create(TEST_API_KEY, StreamType.TRANSACTIONS, {
        connector,
      });
      const tx = createMockTransaction(7);

      const stream = await collector.openEventStream();
      sessions[0].emitTransaction(toFeedTransaction(tx));

      const [event] = await take(stream, 1);
      expect(event.kind).toBe('Transaction');
      if (event.kind === 'Transaction') {
        expect(event.transaction).toBe(tx);
      }
    });

    it('idles after the last delivered item', async () => {
      const collector = await FeedCollector.create(TEST_API_KEY, StreamType.TRANSACTIONS, {
        connector,
      });
      const stream = await collector.openEventStream();
      sessions[0].emitTransaction(toFeedTransaction(createMockTransaction(1)));
      await take(stream, 1);

      const next = vi.fn();
      void stream.next().then(next);
      await new Promise((resolve) => setTimeout(resolve, 10));

      expect(next).not.toHaveBeenCalled();
      sessions[0].emitTransaction(toFeedTransaction(createMockTransaction(2)));
      await vi.waitFor(() => expect(next).toHaveBeenCalledOnce());
    });

    it('passes the configured filter to the subscription', async () => {
      const filter = { to: [createMockAddress(2)] };
      const collector = await FeedCollector.create(TEST_API_KEY, StreamType.TRANSACTIONS, {
        connector,
        filter,
      });

      await collector.openEventStream();

      expect(sessions[0].transactionFilters).toEqual([filter]);
    });
  });

  describe('execution payload stream', () => {
    it('emits ExecutionPayload events for [B1, B2] in order', async () => {
      const collector = await FeedCollector.create(TEST_API_KEY, StreamType.EXECUTION_PAYLOADS, {
        connector,
      });
      const b1 = createMockBlock(1, [createMockTransaction(1)]);
      const b2 = createMockBlock(2);

      const stream = await collector.openEventStream();
      sessions[0].emitPayload(b1);
      sessions[0].emitPayload(b2);

      const events = await take(stream, 2);
      expect(events).toHaveLength(2);
      expect(events[0]).toEqual({ kind: 'ExecutionPayload', block: b1 });
      expect(events[1]).toEqual({ kind: 'ExecutionPayload', block: b2 });
      if (events[0].kind === 'ExecutionPayload') {
        expect(events[0].block).toBe(b1);
      }
    });

    it('ignores the transaction filter', async () => {
      const collector = await FeedCollector.create(TEST_API_KEY, StreamType.EXECUTION_PAYLOADS, {
        connector,
        filter: { from: [createMockAddress(1)] },
      });

      await collector.openEventStream();

      expect(sessions[0].transactionFilters).toEqual([]);
      expect(sessions[0].subscriptionCount).toBe(1);
    });
  });

  describe('single variant', () => {
    it.each([
      [StreamType.TRANSACTIONS, 'Transaction'],
      [StreamType.EXECUTION_PAYLOADS, 'ExecutionPayload'],
    ] as const)('%s streams only emit %s events', async (streamType, kind) => {
      const collector = await FeedCollector.create(TEST_API_KEY, streamType, { connector });
      const first = await collector.openEventStream();
      const second = await collector.openEventStream();

      for (let i = 1; i <= 3; i++) {
        sessions[0].emitTransaction(toFeedTransaction(createMockTransaction(i)));
        sessions[0].emitPayload(createMockBlock(i));
      }

      const events = [...(await take(first, 3)), ...(await take(second, 3))];
      expect(events.map((event) => event.kind)).toEqual(Array(6).fill(kind));
    });
  });

  describe('stream lifecycle', () => {
    it('opens a new subscription on every call', async () => {
      const collector = await FeedCollector.create(TEST_API_KEY, StreamType.TRANSACTIONS, {
        connector,
      });

      await collector.openEventStream();
      await collector.openEventStream();

      expect(sessions[0].subscriptionCount).toBe(2);
    });

    it('ends quietly when the feed stops delivering', async () => {
      const collector = await FeedCollector.create(TEST_API_KEY, StreamType.TRANSACTIONS, {
        connector,
      });
      const stream = await collector.openEventStream();
      sessions[0].emitTransaction(toFeedTransaction(createMockTransaction(1)));
      sessions[0].endStreams();

      expect(await take(stream, 5)).toHaveLength(1);
      expect(await stream.next()).toEqual({ done: true, value: undefined });
    });

    it('ends quietly on a delivery failure by default', async () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
      const collector = await FeedCollector.create(TEST_API_KEY, StreamType.EXECUTION_PAYLOADS, {
        connector,
      });
      const stream = await collector.openEventStream();
      sessions[0].failStreams(new Error('socket has been closed'));

      expect(await stream.next()).toEqual({ done: true, value: undefined });
      expect(warn).toHaveBeenCalledWith(
        'Feed stream ended after delivery failure:',
        expect.objectContaining({ code: 'SUBSCRIPTION_FAILED' }),
      );
      warn.mockRestore();
    });

    it('rejects with SubscriptionError when propagation is enabled', async () => {
      const collector = await FeedCollector.create(TEST_API_KEY, StreamType.EXECUTION_PAYLOADS, {
        connector,
        propagateStreamErrors: true,
      });
      const stream = await collector.openEventStream();
      sessions[0].failStreams(new Error('socket has been closed'));

      const failure = await stream.next().catch((error: unknown) => error);
      expect(failure).toBeInstanceOf(SubscriptionError);
      expect(failure).toMatchObject({
        streamType: StreamType.EXECUTION_PAYLOADS,
        retriable: true,
        message: 'Feed subscription for EXECUTION_PAYLOADS terminated: socket has been closed',
      });
      expect(await stream.next()).toEqual({ done: true, value: undefined });
    });

    it('cancels the subscription when the consumer stops pulling', async () => {
      const collector = await FeedCollector.create(TEST_API_KEY, StreamType.TRANSACTIONS, {
        connector,
      });
      const stream = await collector.openEventStream();
      sessions[0].emitTransaction(toFeedTransaction(createMockTransaction(1)));
      sessions[0].emitTransaction(toFeedTransaction(createMockTransaction(2)));

      const seen: FeedEvent[] = [];
      for await (const event of stream) {
        seen.push(event);
        break;
      }

      expect(seen).toHaveLength(1);
      expect(sessions[0].releasedSubscriptions).toBe(1);
      expect(await stream.next()).toEqual({ done: true, value: undefined });
    });

    it('releases the subscription when returned before the first pull', async () => {
      const collector = await FeedCollector.create(TEST_API_KEY, StreamType.EXECUTION_PAYLOADS, {
        connector,
      });
      const stream = await collector.openEventStream();

      await expect(stream.return?.()).resolves.toEqual({ done: true, value: undefined });

      expect(sessions[0].releasedSubscriptions).toBe(1);
      sessions[0].emitPayload(createMockBlock(1));
      expect(await stream.next()).toEqual({ done: true, value: undefined });
    });

    it('releases only the returned stream', async () => {
      const collector = await FeedCollector.create(TEST_API_KEY, StreamType.TRANSACTIONS, {
        connector,
      });
      const kept = await collector.openEventStream();
      const dropped = await collector.openEventStream();

      await dropped.return?.();
      sessions[0].emitTransaction(toFeedTransaction(createMockTransaction(1)));

      expect(sessions[0].releasedSubscriptions).toBe(1);
      expect(await take(kept, 1)).toHaveLength(1);
    });
  });

  describe('setEndpoint', () => {
    it('routes later subscriptions to the new endpoint', async () => {
      const collector = await FeedCollector.create(TEST_API_KEY, StreamType.TRANSACTIONS, {
        connector,
      });

      await collector.setEndpoint('localhost:9000');
      await collector.openEventStream();

      expect(sessions[0].subscriptionCount).toBe(0);
      expect(sessions[1].endpoint).toBe('localhost:9000');
      expect(sessions[1].subscriptionCount).toBe(1);
    });

    it('ends streams opened against the old session', async () => {
      const collector = await FeedCollector.create(TEST_API_KEY, StreamType.TRANSACTIONS, {
        connector,
      });
      const stream = await collector.openEventStream();

      await collector.setEndpoint('localhost:9000');

      expect(await stream.next()).toEqual({ done: true, value: undefined });
    });
  });

  describe('Collector capability', () => {
    it('forwards getEventStream to openEventStream', async () => {
      const manager = await FeedConnectionManager.connect(TEST_API_KEY, { connector });
      const collector: Collector<FeedEvent> = new FeedCollector(manager, StreamType.TRANSACTIONS);
      const tx = createMockTransaction(1);

      const stream = await collector.getEventStream();
      sessions[0].emitTransaction(toFeedTransaction(tx));

      expect(await take(stream, 1)).toEqual([{ kind: 'Transaction', transaction: tx }]);
    });
  });
});
