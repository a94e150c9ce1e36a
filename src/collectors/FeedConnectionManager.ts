import type { FeedConnector, FeedSession } from '../feed/types';
import { connectJsonRpcFeed, DEFAULT_CONNECTION_TIMEOUT_MS } from '../feed/JsonRpcFeedConnector';
import { ConnectionError, ErrorUtils, IntegrationError, ValidationError } from '../utils/errors';
import type {
  FeedConnectionInfo,
  FeedConnectionOptions,
  FeedConnectionStatus,
  FeedConnectionStatusListener,
} from './types';

export const DEFAULT_FEED_ENDPOINT = 'beta.fiberapi.io:8080';

const ENDPOINT_PATTERN = /^(wss?:\/\/[^\s/]+(\/\S*)?|[^\s:/]+:\d{1,5})$/i;

/**
 * Validates a feed endpoint (`host:port` or a ws(s) URL).
 */
export function validateEndpoint(endpoint: string): void {
  if (!ENDPOINT_PATTERN.test(endpoint)) {
    throw ValidationError.invalidParameter('endpoint', 'host:port or ws(s):// URL', endpoint);
  }
}

/**
 * Owns the single live feed session.
 *
 * Sessions are never patched in place: repointing opens a complete new
 * session first and only then retires the old one, so a failed repoint
 * leaves the current session untouched.
 */
export class FeedConnectionManager {
  private session: FeedSession;
  private readonly apiKey: string;
  private readonly connector: FeedConnector;
  private readonly connectionTimeoutMs: number;
  private status: FeedConnectionStatus = 'connected';
  private connectedAt = new Date();
  private lastError?: string;
  private repointCount = 0;
  private pendingRepoint: Promise<void> = Promise.resolve();
  private statusListeners: Set<FeedConnectionStatusListener> = new Set();

  private constructor(
    apiKey: string,
    session: FeedSession,
    connector: FeedConnector,
    connectionTimeoutMs: number,
  ) {
    this.apiKey = apiKey;
    this.session = session;
    this.connector = connector;
    this.connectionTimeoutMs = connectionTimeoutMs;
  }

  /**
   * Opens a session to the default (or overridden) endpoint.
   *
   * @throws ValidationError if the API key or endpoint is malformed
   * @throws ConnectionError if the session cannot be established
   */
  static async connect(
    apiKey: string,
    options: FeedConnectionOptions = {},
  ): Promise<FeedConnectionManager> {
    if (!apiKey || apiKey.trim() === '') {
      throw ValidationError.missingApiKey();
    }

    const endpoint = options.endpoint ?? DEFAULT_FEED_ENDPOINT;
    validateEndpoint(endpoint);

    const connector = options.connector ?? connectJsonRpcFeed;
    const connectionTimeoutMs = options.connectionTimeoutMs ?? DEFAULT_CONNECTION_TIMEOUT_MS;

    const session = await FeedConnectionManager.open(connector, endpoint, apiKey, connectionTimeoutMs);
    return new FeedConnectionManager(apiKey, session, connector, connectionTimeoutMs);
  }

  /**
   * Replaces the session with one opened against `endpoint`.
   * Streams on the old session end once the new one is in place.
   *
   * @throws ConnectionError if the new session cannot be established; the old one stays current
   */
  repoint(endpoint: string): Promise<void> {
    const run = this.pendingRepoint.then(() => this.replaceSession(endpoint));
    // Keep the chain alive for later callers whatever this one's outcome
    this.pendingRepoint = run.catch(() => undefined);
    return run;
  }

  /**
   * Returns the current session once no repoint is in flight.
   */
  async acquireSession(): Promise<FeedSession> {
    await this.pendingRepoint;
    this.assertOpen();
    return this.session;
  }

  getEndpoint(): string {
    return this.session.endpoint;
  }

  isConnected(): boolean {
    return this.status !== 'closed';
  }

  getConnectionInfo(): FeedConnectionInfo {
    return {
      endpoint: this.session.endpoint,
      status: this.status,
      connectedAt: this.connectedAt,
      lastError: this.lastError,
      repointCount: this.repointCount,
    };
  }

  onStatusChange(listener: FeedConnectionStatusListener): () => void {
    this.statusListeners.add(listener);
    return () => this.statusListeners.delete(listener);
  }

  close(): void {
    if (this.status === 'closed') return;
    this.session.close();
    this.updateStatus('closed');
    this.statusListeners.clear();
  }

  private async replaceSession(endpoint: string): Promise<void> {
    this.assertOpen();
    validateEndpoint(endpoint);

    this.updateStatus('repointing');

    let next: FeedSession;
    try {
      next = await FeedConnectionManager.open(
        this.connector,
        endpoint,
        this.apiKey,
        this.connectionTimeoutMs,
      );
    } catch (error) {
      this.lastError = ErrorUtils.toError(error).message;
      this.updateStatus(this.status === 'closed' ? 'closed' : 'connected');
      throw error;
    }

    if (this.status === 'closed') {
      // Closed while the handshake was in flight
      next.close();
      throw FeedConnectionManager.closedError();
    }

    const previous = this.session;
    this.session = next;
    this.connectedAt = new Date();
    this.lastError = undefined;
    this.repointCount++;
    previous.close();
    this.updateStatus('connected');
  }

  private static async open(
    connector: FeedConnector,
    endpoint: string,
    apiKey: string,
    connectionTimeoutMs: number,
  ): Promise<FeedSession> {
    try {
      return await connector(endpoint, apiKey, { connectionTimeoutMs });
    } catch (error) {
      if (error instanceof IntegrationError) throw error;
      throw ConnectionError.refused(endpoint, ErrorUtils.toError(error));
    }
  }

  private updateStatus(status: FeedConnectionStatus): void {
    this.status = status;
    const info = this.getConnectionInfo();
    this.statusListeners.forEach((listener) => {
      try {
        listener(info);
      } catch (error) {
        console.error('Error in feed connection status listener:', error);
      }
    });
  }

  private assertOpen(): void {
    if (this.status === 'closed') {
      throw FeedConnectionManager.closedError();
    }
  }

  private static closedError(): IntegrationError {
    return new IntegrationError('Feed connection has been closed', 'CONNECTION_CLOSED', false);
  }
}
