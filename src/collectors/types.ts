/**
 * Collector types
 *
 * @module collectors/types
 */

import type { Transaction } from 'viem';
import type { ExecutionPayload, FeedConnector, TransactionFilter } from '../feed/types';

/**
 * Lazily-evaluated event sequence handed to the engine.
 * Single-use: once it ends, open a new one.
 */
export type CollectorStream<E> = AsyncIterableIterator<E>;

/**
 * An event source the engine can schedule
 */
export interface Collector<E> {
  getEventStream(): Promise<CollectorStream<E>>;
}

/**
 * Which feed subscription a collector opens
 */
export enum StreamType {
  /** New pending transactions as seen by the feed */
  TRANSACTIONS = 'TRANSACTIONS',
  /** New execution payloads (blocks with full transaction data) */
  EXECUTION_PAYLOADS = 'EXECUTION_PAYLOADS',
}

export interface TransactionEvent {
  kind: 'Transaction';
  transaction: Transaction;
}

export interface ExecutionPayloadEvent {
  kind: 'ExecutionPayload';
  block: ExecutionPayload;
}

/**
 * Events emitted by the feed collector
 */
export type FeedEvent = TransactionEvent | ExecutionPayloadEvent;

// ============================================================================
// CONNECTION
// ============================================================================

export type FeedConnectionStatus = 'connected' | 'repointing' | 'closed';

export interface FeedConnectionInfo {
  endpoint: string;
  status: FeedConnectionStatus;
  connectedAt: Date;
  /** Message of the last failed repoint, cleared on success */
  lastError?: string;
  repointCount: number;
}

export type FeedConnectionStatusListener = (info: FeedConnectionInfo) => void;

export interface FeedConnectionOptions {
  /** Endpoint override (`host:port` or ws(s) URL) @default DEFAULT_FEED_ENDPOINT */
  endpoint?: string;
  /** Connection establishment timeout (ms) @default 10000 */
  connectionTimeoutMs?: number;
  /** Session factory @default connectJsonRpcFeed */
  connector?: FeedConnector;
}

export interface FeedCollectorOptions {
  /** Passed to the pending transaction subscription */
  filter?: TransactionFilter;
  /**
   * Reject the stream with a SubscriptionError when delivery fails mid-stream,
   * instead of ending it quietly.
   * @default false
   */
  propagateStreamErrors?: boolean;
}
