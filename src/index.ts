// Collector
export { FeedCollector } from './collectors/FeedCollector';
export {
  FeedConnectionManager,
  DEFAULT_FEED_ENDPOINT,
  validateEndpoint,
} from './collectors/FeedConnectionManager';
export { StreamType } from './collectors/types';
export type {
  Collector,
  CollectorStream,
  FeedEvent,
  TransactionEvent,
  ExecutionPayloadEvent,
  FeedCollectorOptions,
  FeedConnectionOptions,
  FeedConnectionInfo,
  FeedConnectionStatus,
  FeedConnectionStatusListener,
} from './collectors/types';

// Feed vendor port
export { unwrapTransaction } from './feed/types';
export type {
  FeedSession,
  FeedConnector,
  FeedConnectOptions,
  FeedSubscription,
  FeedTransaction,
  ExecutionPayload,
  TransactionFilter,
} from './feed/types';
export {
  connectJsonRpcFeed,
  JsonRpcFeedSession,
  buildFeedUrl,
  matchesFilter,
  DEFAULT_CONNECTION_TIMEOUT_MS,
} from './feed/JsonRpcFeedConnector';
export { AsyncQueue } from './feed/AsyncQueue';

// Configuration
export { FeedConfigurationService } from './config/FeedConfigurationService';
export type { FeedConfig, Environment } from './config/FeedConfigurationService';
export { createFeedCollector } from './createFeedCollector';
export type { CreateFeedCollectorOptions } from './createFeedCollector';

// Errors
export {
  IntegrationError,
  ConnectionError,
  ValidationError,
  SubscriptionError,
  ErrorUtils,
} from './utils/errors';
export type { ConnectionErrorType } from './utils/errors';
