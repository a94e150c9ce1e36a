import { DEFAULT_FEED_ENDPOINT } from '../collectors/FeedConnectionManager';
import { DEFAULT_CONNECTION_TIMEOUT_MS } from '../feed/JsonRpcFeedConnector';
import { ValidationError } from '../utils/errors';

export interface FeedConfig {
  apiKey?: string;
  endpoint: string;
  connectionTimeoutMs: number;
  propagateStreamErrors: boolean;
}

export type Environment = Record<string, string | undefined>;

/**
 * Configuration service for the feed collector
 * Merges defaults, environment variables and explicit overrides, in that order
 */
export class FeedConfigurationService {
  private config: FeedConfig;

  constructor(overrides?: Partial<FeedConfig>, env: Environment = process.env) {
    this.config = this.loadConfiguration(env, overrides);
  }

  private loadConfiguration(env: Environment, overrides?: Partial<FeedConfig>): FeedConfig {
    const defaultConfig: FeedConfig = {
      endpoint: DEFAULT_FEED_ENDPOINT,
      connectionTimeoutMs: DEFAULT_CONNECTION_TIMEOUT_MS,
      propagateStreamErrors: false,
    };

    return {
      ...defaultConfig,
      ...this.loadFromEnvironment(env),
      ...overrides,
    };
  }

  private loadFromEnvironment(env: Environment): Partial<FeedConfig> {
    const config: Partial<FeedConfig> = {};

    if (env.FEED_API_KEY) {
      config.apiKey = env.FEED_API_KEY;
    }

    if (env.FEED_ENDPOINT) {
      config.endpoint = env.FEED_ENDPOINT;
    }

    if (env.FEED_CONNECTION_TIMEOUT) {
      const timeout = parseInt(env.FEED_CONNECTION_TIMEOUT, 10);
      if (Number.isNaN(timeout) || timeout <= 0) {
        throw ValidationError.invalidParameter(
          'FEED_CONNECTION_TIMEOUT',
          'positive integer (ms)',
          env.FEED_CONNECTION_TIMEOUT,
        );
      }
      config.connectionTimeoutMs = timeout;
    }

    if (env.FEED_PROPAGATE_STREAM_ERRORS) {
      config.propagateStreamErrors = env.FEED_PROPAGATE_STREAM_ERRORS.toLowerCase() === 'true';
    }

    return config;
  }

  getConfig(): FeedConfig {
    return { ...this.config };
  }

  /**
   * @throws ValidationError if no API key is configured
   */
  getApiKey(): string {
    if (!this.config.apiKey) {
      throw ValidationError.missingApiKey();
    }
    return this.config.apiKey;
  }

  updateConfig(updates: Partial<FeedConfig>): void {
    this.config = { ...this.config, ...updates };
  }
}
