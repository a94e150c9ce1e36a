/**
 * JSON-RPC feed session
 *
 * Feed session over a WebSocket JSON-RPC endpoint using viem.
 * Pending transactions come from eth_subscribe('newPendingTransactions')
 * followed by eth_getTransactionByHash; execution payloads come from
 * eth_subscribe('newHeads') with full transaction bodies.
 *
 * The API key is appended to the endpoint path, the way hosted node
 * providers authenticate WebSocket clients.
 *
 * @module feed/JsonRpcFeedConnector
 */

import { createPublicClient, webSocket, type Hash, type Transaction } from 'viem';
import { AsyncQueue } from './AsyncQueue';
import type {
  ExecutionPayload,
  FeedConnectOptions,
  FeedConnector,
  FeedSession,
  FeedSubscription,
  FeedTransaction,
  TransactionFilter,
} from './types';
import { ConnectionError, ErrorUtils, type IntegrationError } from '../utils/errors';

export const DEFAULT_CONNECTION_TIMEOUT_MS = 10_000;

function createFeedClient(url: string, timeoutMs: number) {
  return createPublicClient({
    transport: webSocket(url, {
      timeout: timeoutMs,
      reconnect: false, // reconnection belongs to the host engine
    }),
  });
}

export type FeedRpcClient = ReturnType<typeof createFeedClient>;

// viem shares one socket per URL; it is closed when its last session closes
const socketUsers = new Map<string, number>();

async function closeSocket(endpoint: string, client: FeedRpcClient): Promise<void> {
  try {
    const rpcClient = await client.transport.getRpcClient();
    rpcClient.close();
  } catch (error) {
    console.warn(`Failed to close feed socket for ${endpoint}:`, ErrorUtils.toError(error).message);
  }
}

/**
 * Builds the WebSocket URL for an endpoint.
 * `host:port` endpoints are upgraded to wss://; the API key becomes the last path segment.
 */
export function buildFeedUrl(endpoint: string, apiKey: string): string {
  const base = /^wss?:\/\//i.test(endpoint) ? endpoint : `wss://${endpoint}`;
  return `${base.replace(/\/+$/, '')}/${encodeURIComponent(apiKey)}`;
}

/**
 * Checks a transaction against a filter.
 */
export function matchesFilter(transaction: Transaction, filter?: TransactionFilter): boolean {
  if (!filter) return true;

  const { from, to, methodIds } = filter;

  if (from && from.length > 0) {
    const sender = transaction.from.toLowerCase();
    if (!from.some((address) => address.toLowerCase() === sender)) return false;
  }

  if (to && to.length > 0) {
    const recipient = transaction.to?.toLowerCase();
    if (!recipient || !to.some((address) => address.toLowerCase() === recipient)) return false;
  }

  if (methodIds && methodIds.length > 0) {
    const selector = transaction.input.slice(0, 10).toLowerCase();
    if (!methodIds.some((id) => id.toLowerCase() === selector)) return false;
  }

  return true;
}

export class JsonRpcFeedSession implements FeedSession {
  readonly endpoint: string;
  private url: string;
  private client: FeedRpcClient;
  private queues = new Set<{ end(): void }>();
  private closed = false;

  /**
   * @param url - Socket URL the client was created for; used to share the socket
   */
  constructor(endpoint: string, url: string, client: FeedRpcClient) {
    this.endpoint = endpoint;
    this.url = url;
    this.client = client;
    socketUsers.set(url, (socketUsers.get(url) ?? 0) + 1);
  }

  async subscribeTransactions(filter?: TransactionFilter): Promise<FeedSubscription<FeedTransaction>> {
    this.assertOpen();

    let unwatch: (() => void) | undefined;
    const queue: AsyncQueue<FeedTransaction> = new AsyncQueue(() => {
      unwatch?.();
      this.queues.delete(queue);
    });
    this.queues.add(queue);

    // Lookups run concurrently; pushes are chained in announcement order
    let delivery: Promise<void> = Promise.resolve();

    const lookup = (hash: Hash): Promise<Transaction | undefined> =>
      this.client.getTransaction({ hash }).then(
        (transaction) => transaction,
        (error: unknown) => {
          // Dropped or replaced before we could fetch it
          console.warn(`Skipping pending transaction ${hash}:`, ErrorUtils.toError(error).message);
          return undefined;
        },
      );

    unwatch = this.client.watchPendingTransactions({
      onTransactions: (hashes) => {
        for (const hash of hashes) {
          const pending = lookup(hash);
          delivery = delivery.then(async () => {
            const transaction = await pending;
            if (transaction && !queue.isEnded && matchesFilter(transaction, filter)) {
              queue.push({ transaction, receivedAt: new Date() });
            }
          });
        }
      },
      onError: (error) => {
        queue.fail(toTransportError(error));
      },
    });
    if (queue.isEnded) unwatch();

    return queue;
  }

  async subscribeExecutionPayloads(): Promise<FeedSubscription<ExecutionPayload>> {
    this.assertOpen();

    let unwatch: (() => void) | undefined;
    const queue: AsyncQueue<ExecutionPayload> = new AsyncQueue(() => {
      unwatch?.();
      this.queues.delete(queue);
    });
    this.queues.add(queue);

    unwatch = this.client.watchBlocks({
      includeTransactions: true,
      onBlock: (block) => {
        queue.push(block);
      },
      onError: (error) => {
        queue.fail(toTransportError(error));
      },
    });
    if (queue.isEnded) unwatch();

    return queue;
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const queue of Array.from(this.queues)) {
      queue.end();
    }

    const users = (socketUsers.get(this.url) ?? 1) - 1;
    if (users > 0) {
      socketUsers.set(this.url, users);
      return;
    }
    socketUsers.delete(this.url);
    void closeSocket(this.endpoint, this.client);
  }

  get activeSubscriptions(): number {
    return this.queues.size;
  }

  private assertOpen(): void {
    if (this.closed) {
      throw ConnectionError.refused(this.endpoint, new Error('Session is closed'));
    }
  }
}

function toTransportError(error: unknown): IntegrationError {
  return ErrorUtils.toIntegrationError(ErrorUtils.toError(error), 'FEED_TRANSPORT_ERROR');
}

function classifyConnectError(endpoint: string, error: Error, timeoutMs: number): ConnectionError {
  const message = error.message.toLowerCase();
  if (message.includes('401') || message.includes('403') || message.includes('unauthorized')) {
    return ConnectionError.unauthorized(endpoint, error);
  }
  if (
    ErrorUtils.getErrorCode(error) === 'ETIMEDOUT' ||
    message.includes('timeout') ||
    message.includes('timed out')
  ) {
    return ConnectionError.timeout(endpoint, timeoutMs, error);
  }
  return ConnectionError.refused(endpoint, error);
}

/**
 * Opens a JSON-RPC feed session and verifies it with an eth_chainId round trip.
 */
export const connectJsonRpcFeed: FeedConnector = async (
  endpoint: string,
  apiKey: string,
  options: FeedConnectOptions = {},
): Promise<FeedSession> => {
  const timeoutMs = options.connectionTimeoutMs ?? DEFAULT_CONNECTION_TIMEOUT_MS;
  const url = buildFeedUrl(endpoint, apiKey);
  const client = createFeedClient(url, timeoutMs);

  let timer: ReturnType<typeof setTimeout> | undefined;
  try {
    await Promise.race([
      client.getChainId(),
      new Promise<never>((_, reject) => {
        timer = setTimeout(
          () => reject(new Error('WS connection timeout')),
          timeoutMs,
        );
      }),
    ]);
  } catch (error) {
    if (!socketUsers.has(url)) {
      void closeSocket(endpoint, client);
    }
    throw classifyConnectError(endpoint, ErrorUtils.toError(error), timeoutMs);
  } finally {
    clearTimeout(timer);
  }

  return new JsonRpcFeedSession(endpoint, url, client);
};
