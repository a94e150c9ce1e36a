/**
 * Feed vendor types
 *
 * The narrow surface the collector needs from a real-time data vendor:
 * open a session, subscribe to one of two streams, close the session.
 *
 * @module feed/types
 */

import type { Address, Block, Hex, Transaction } from 'viem';

// ============================================================================
// VENDOR ITEMS
// ============================================================================

/**
 * A pending transaction as delivered by the feed
 */
export interface FeedTransaction {
  /** Decoded transaction carried by the record */
  readonly transaction: Transaction;
  /** When the feed handed the record to us */
  readonly receivedAt: Date;
}

/**
 * A block with full transaction objects
 */
export type ExecutionPayload = Block<bigint, true>;

/**
 * Returns the decoded transaction inside a feed record, as-is.
 */
export function unwrapTransaction(record: FeedTransaction): Transaction {
  return record.transaction;
}

// ============================================================================
// FILTERING
// ============================================================================

/**
 * Server-side filter for the pending transaction stream.
 *
 * Lists are AND-ed together; values inside one list are OR-ed.
 * An empty or absent filter matches everything.
 */
export interface TransactionFilter {
  from?: Address[];
  to?: Address[];
  /** 4-byte function selectors matched against the calldata prefix */
  methodIds?: Hex[];
}

// ============================================================================
// SESSION
// ============================================================================

/**
 * Pull-based subscription over vendor items. Calling `return()` cancels it.
 */
export type FeedSubscription<T> = AsyncIterableIterator<T>;

/**
 * An open, authenticated connection to the feed
 */
export interface FeedSession {
  /** Endpoint this session was opened against */
  readonly endpoint: string;

  subscribeTransactions(filter?: TransactionFilter): Promise<FeedSubscription<FeedTransaction>>;

  subscribeExecutionPayloads(): Promise<FeedSubscription<ExecutionPayload>>;

  /**
   * Releases the connection. Open subscriptions end.
   */
  close(): void;
}

export interface FeedConnectOptions {
  /** Connection establishment timeout (ms) @default 10000 */
  connectionTimeoutMs?: number;
}

/**
 * Opens a session against an endpoint with the given API key.
 * Rejects if the endpoint is unreachable or the key is refused.
 */
export type FeedConnector = (
  endpoint: string,
  apiKey: string,
  options?: FeedConnectOptions,
) => Promise<FeedSession>;
