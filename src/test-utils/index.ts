/**
 * Test utilities for feed collector testing
 */

import { vi } from 'vitest';
import { formatBlock, formatTransaction, type Address, type Hash, type Transaction } from 'viem';
import { AsyncQueue } from '../feed/AsyncQueue';
import type {
  ExecutionPayload,
  FeedSession,
  FeedSubscription,
  FeedTransaction,
  TransactionFilter,
} from '../feed/types';
import { ConnectionError } from '../utils/errors';

export const TEST_API_KEY = 'test-api-key';

/**
 * Creates a deterministic 32-byte hash from a number
 */
export function createMockHash(seed: number): Hash {
  return `0x${seed.toString(16).padStart(64, '0')}`;
}

/**
 * Creates a deterministic address from a number
 */
export function createMockAddress(seed: number): Address {
  return `0x${seed.toString(16).padStart(40, '0')}`;
}

/**
 * Creates a decoded EIP-1559 transaction
 */
export function createMockTransaction(seed: number): Transaction {
  return formatTransaction({
    hash: createMockHash(seed),
    from: createMockAddress(1),
    to: createMockAddress(2),
    input: '0x',
    nonce: `0x${seed.toString(16)}`,
    value: '0xde0b6b3a7640000',
    gas: '0x5208',
    type: '0x2',
    blockHash: null,
    blockNumber: null,
    transactionIndex: null,
  });
}

/**
 * Creates a block carrying full transaction objects
 */
export function createMockBlock(number: number, transactions: Transaction[] = []): ExecutionPayload {
  return {
    ...formatBlock({
      hash: createMockHash(0x1000 + number),
      parentHash: createMockHash(0x1000 + number - 1),
      number: `0x${number.toString(16)}`,
      timestamp: '0x6553f100',
    }),
    transactions,
  };
}

/**
 * In-process stand-in for a feed session.
 * Items are pushed by the test through the emit helpers.
 */
export class FakeFeedSession implements FeedSession {
  readonly endpoint: string;
  readonly apiKey: string;
  closed = false;
  transactionFilters: Array<TransactionFilter | undefined> = [];
  /** Subscriptions whose consumer returned or that were ended */
  releasedSubscriptions = 0;
  private transactionQueues: AsyncQueue<FeedTransaction>[] = [];
  private payloadQueues: AsyncQueue<ExecutionPayload>[] = [];

  constructor(endpoint: string, apiKey: string) {
    this.endpoint = endpoint;
    this.apiKey = apiKey;
  }

  async subscribeTransactions(filter?: TransactionFilter): Promise<FeedSubscription<FeedTransaction>> {
    this.assertOpen();
    this.transactionFilters.push(filter);
    const queue = new AsyncQueue<FeedTransaction>(() => this.releasedSubscriptions++);
    this.transactionQueues.push(queue);
    return queue;
  }

  async subscribeExecutionPayloads(): Promise<FeedSubscription<ExecutionPayload>> {
    this.assertOpen();
    const queue = new AsyncQueue<ExecutionPayload>(() => this.releasedSubscriptions++);
    this.payloadQueues.push(queue);
    return queue;
  }

  get subscriptionCount(): number {
    return this.transactionQueues.length + this.payloadQueues.length;
  }

  emitTransaction(record: FeedTransaction): void {
    this.transactionQueues.forEach((queue) => queue.push(record));
  }

  emitPayload(block: ExecutionPayload): void {
    this.payloadQueues.forEach((queue) => queue.push(block));
  }

  /** Ends every open subscription as if the feed hung up */
  endStreams(): void {
    [...this.transactionQueues, ...this.payloadQueues].forEach((queue) => queue.end());
  }

  failStreams(error: Error): void {
    [...this.transactionQueues, ...this.payloadQueues].forEach((queue) => queue.fail(error));
  }

  close(): void {
    this.closed = true;
    this.endStreams();
  }

  private assertOpen(): void {
    if (this.closed) {
      throw ConnectionError.refused(this.endpoint, new Error('Session is closed'));
    }
  }
}

export interface FakeConnectorOptions {
  /** API keys the fake feed refuses */
  rejectedApiKeys?: string[];
  /** Endpoints that cannot be reached */
  unreachableEndpoints?: string[];
}

/**
 * Creates a connector that opens FakeFeedSessions and records them
 */
export function createFakeConnector(options: FakeConnectorOptions = {}) {
  const sessions: FakeFeedSession[] = [];

  const connector = vi.fn(async (endpoint: string, apiKey: string): Promise<FeedSession> => {
    if (options.unreachableEndpoints?.includes(endpoint)) {
      throw ConnectionError.refused(endpoint, new Error('ECONNREFUSED'));
    }
    if (options.rejectedApiKeys?.includes(apiKey)) {
      throw ConnectionError.unauthorized(endpoint, new Error('401 Unauthorized'));
    }
    const session = new FakeFeedSession(endpoint, apiKey);
    sessions.push(session);
    return session;
  });

  return { connector, sessions };
}

/**
 * Wraps a transaction in a feed record
 */
export function toFeedTransaction(transaction: Transaction): FeedTransaction {
  return { transaction, receivedAt: new Date(1_700_000_000_000) };
}

/**
 * Pulls `count` items from an iterator
 */
export async function take<T>(iterator: AsyncIterator<T>, count: number): Promise<T[]> {
  const items: T[] = [];
  for (let i = 0; i < count; i++) {
    const result = await iterator.next();
    if (result.done) break;
    items.push(result.value);
  }
  return items;
}
