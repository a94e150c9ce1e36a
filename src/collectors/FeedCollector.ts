/**
 * Feed collector
 *
 * Adapts the feed's pending-transaction or execution-payload subscription
 * into a stream of FeedEvent values for the engine. Each item is mapped
 * one-to-one, in delivery order, without buffering.
 *
 * @module collectors/FeedCollector
 */

import { unwrapTransaction } from '../feed/types';
import type { FeedSubscription } from '../feed/types';
import { ErrorUtils, SubscriptionError } from '../utils/errors';
import { FeedConnectionManager } from './FeedConnectionManager';
import {
  StreamType,
  type Collector,
  type CollectorStream,
  type FeedCollectorOptions,
  type FeedConnectionOptions,
  type FeedEvent,
} from './types';

/**
 * Collector over one feed stream type.
 *
 * A stream that stops without `propagateStreamErrors` looks the same to the
 * consumer whether the feed hung up or delivery failed; the failure is only
 * logged. Enable the option to receive a SubscriptionError (with its
 * `retriable` flag) instead.
 */
export class FeedCollector implements Collector<FeedEvent> {
  readonly streamType: StreamType;
  private readonly connection: FeedConnectionManager;
  private readonly options: Required<Pick<FeedCollectorOptions, 'propagateStreamErrors'>> &
    FeedCollectorOptions;

  constructor(
    connection: FeedConnectionManager,
    streamType: StreamType,
    options: FeedCollectorOptions = {},
  ) {
    this.connection = connection;
    this.streamType = streamType;
    this.options = {
      ...options,
      propagateStreamErrors: options.propagateStreamErrors ?? false,
    };
  }

  /**
   * Connects to the feed and builds a collector for one stream type.
   *
   * @param apiKey - Feed API key
   * @param streamType - Subscription to open on each stream request
   * @throws ValidationError | ConnectionError; no collector is returned
   */
  static async create(
    apiKey: string,
    streamType: StreamType,
    options: FeedCollectorOptions & FeedConnectionOptions = {},
  ): Promise<FeedCollector> {
    const { endpoint, connectionTimeoutMs, connector, ...collectorOptions } = options;
    const connection = await FeedConnectionManager.connect(apiKey, {
      endpoint,
      connectionTimeoutMs,
      connector,
    });
    return new FeedCollector(connection, streamType, collectorOptions);
  }

  /**
   * Points the collector at another feed endpoint.
   * Streams already open end; new streams use the new endpoint.
   */
  async setEndpoint(endpoint: string): Promise<void> {
    await this.connection.repoint(endpoint);
  }

  getConnection(): FeedConnectionManager {
    return this.connection;
  }

  /**
   * Opens a new feed subscription and returns its event stream.
   */
  async openEventStream(): Promise<CollectorStream<FeedEvent>> {
    const session = await this.connection.acquireSession();

    switch (this.streamType) {
      case StreamType.TRANSACTIONS: {
        const subscription = await session.subscribeTransactions(this.options.filter);
        return this.adapt(subscription, (record) => ({
          kind: 'Transaction',
          transaction: unwrapTransaction(record),
        }));
      }
      case StreamType.EXECUTION_PAYLOADS: {
        const subscription = await session.subscribeExecutionPayloads();
        return this.adapt(subscription, (block) => ({
          kind: 'ExecutionPayload',
          block,
        }));
      }
    }
  }

  async getEventStream(): Promise<CollectorStream<FeedEvent>> {
    return this.openEventStream();
  }

  /**
   * Maps a vendor subscription into FeedEvents. Returning the stream
   * returns the subscription, even before the first pull.
   */
  private adapt<T>(
    subscription: FeedSubscription<T>,
    map: (item: T) => FeedEvent,
  ): CollectorStream<FeedEvent> {
    const { streamType } = this;
    const { propagateStreamErrors } = this.options;
    let finished = false;

    const stream: CollectorStream<FeedEvent> = {
      async next(): Promise<IteratorResult<FeedEvent>> {
        if (finished) return { done: true, value: undefined };
        try {
          const result = await subscription.next();
          if (result.done) {
            finished = true;
            return { done: true, value: undefined };
          }
          return { done: false, value: map(result.value) };
        } catch (error) {
          finished = true;
          const failure = new SubscriptionError(streamType, ErrorUtils.toError(error));
          if (propagateStreamErrors) {
            throw failure;
          }
          console.warn('Feed stream ended after delivery failure:', failure.toJSON());
          return { done: true, value: undefined };
        }
      },
      async return(): Promise<IteratorResult<FeedEvent>> {
        finished = true;
        await subscription.return?.();
        return { done: true, value: undefined };
      },
      [Symbol.asyncIterator]() {
        return stream;
      },
    };

    return stream;
  }
}
