import { FeedCollector } from './collectors/FeedCollector';
import type { StreamType } from './collectors/types';
import type { FeedConnector, TransactionFilter } from './feed/types';
import { FeedConfigurationService, type FeedConfig } from './config/FeedConfigurationService';

/**
 * Options for creating a collector from configuration
 */
export interface CreateFeedCollectorOptions {
  /** Explicit settings; take precedence over the environment */
  config?: Partial<FeedConfig>;
  /** Pending transaction filter */
  filter?: TransactionFilter;
  /** Session factory override */
  connector?: FeedConnector;
  /** Configuration source @default new FeedConfigurationService(options.config) */
  configService?: FeedConfigurationService;
}

/**
 * Creates a connected FeedCollector from environment and explicit settings.
 *
 * @throws ValidationError if no API key is configured
 * @throws ConnectionError if the feed cannot be reached
 */
export async function createFeedCollector(
  streamType: StreamType,
  options: CreateFeedCollectorOptions = {},
): Promise<FeedCollector> {
  const configService = options.configService ?? new FeedConfigurationService(options.config);
  const config = configService.getConfig();

  return FeedCollector.create(configService.getApiKey(), streamType, {
    endpoint: config.endpoint,
    connectionTimeoutMs: config.connectionTimeoutMs,
    propagateStreamErrors: config.propagateStreamErrors,
    filter: options.filter,
    connector: options.connector,
  });
}
