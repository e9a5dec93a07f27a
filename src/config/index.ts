/**
 * Configuration module for the BatchRouter client.
 */

import { z } from 'zod';
import { AuthenticationError, ConfigurationError } from '../errors';

/** Default base URL for the BatchRouter API. */
export const DEFAULT_BASE_URL = 'https://api.batchrouter.ai';

/** Default request timeout in milliseconds. */
export const DEFAULT_TIMEOUT_MS = 60000;

/** Prefix every BatchRouter API key starts with. */
export const API_KEY_PREFIX = 'br_';

/** Environment variable consulted when no API key is passed. */
export const API_KEY_ENV_VAR = 'BATCHROUTER_API_KEY';

/** Environment variable overriding the base URL in {@link BatchRouterConfig.fromEnv}. */
export const BASE_URL_ENV_VAR = 'BATCHROUTER_BASE_URL';

/** Environment variable overriding the timeout (ms) in {@link BatchRouterConfig.fromEnv}. */
export const TIMEOUT_ENV_VAR = 'BATCHROUTER_TIMEOUT';

/**
 * Source of environment variables.
 */
export type Environment = Record<string, string | undefined>;

/**
 * Configuration options for the BatchRouter client.
 */
export interface BatchRouterConfigOptions {
  /** API key (starts with `br_`). Falls back to `BATCHROUTER_API_KEY`. */
  apiKey?: string;
  /** Base URL for API requests. */
  baseUrl?: string;
  /** Request timeout in milliseconds. */
  timeout?: number;
  /** Extra headers sent with every request. */
  customHeaders?: Record<string, string>;
}

const configSchema = z.object({
  baseUrl: z.string().url(),
  timeout: z.number().int().positive(),
});

/**
 * Resolved, validated configuration for the BatchRouter client.
 */
export class BatchRouterConfig {
  /** API key for authentication. */
  readonly apiKey: string;
  /** Base URL without trailing slashes. */
  readonly baseUrl: string;
  /** Request timeout in milliseconds. */
  readonly timeout: number;
  /** Custom headers. */
  readonly customHeaders: Readonly<Record<string, string>>;

  private constructor(
    apiKey: string,
    baseUrl: string,
    timeout: number,
    customHeaders: Record<string, string>
  ) {
    this.apiKey = apiKey;
    this.baseUrl = baseUrl;
    this.timeout = timeout;
    this.customHeaders = Object.freeze({ ...customHeaders });
  }

  /**
   * Creates a new configuration builder.
   */
  static builder(): BatchRouterConfigBuilder {
    return new BatchRouterConfigBuilder();
  }

  /**
   * Resolves options into a configuration.
   *
   * The API key comes from `options.apiKey`, or from `BATCHROUTER_API_KEY` in
   * `env` when the option is missing or empty. This is the only place the
   * environment is read.
   *
   * @throws AuthenticationError if no key is found or it lacks the `br_` prefix
   * @throws ConfigurationError if the base URL or timeout is invalid
   */
  static resolve(
    options: BatchRouterConfigOptions = {},
    env: Environment = process.env
  ): BatchRouterConfig {
    const apiKey = options.apiKey || env[API_KEY_ENV_VAR];
    if (!apiKey) {
      throw new AuthenticationError(
        `API key is required. Pass the apiKey option or set the ${API_KEY_ENV_VAR} environment variable.`
      );
    }

    if (!apiKey.startsWith(API_KEY_PREFIX)) {
      throw new AuthenticationError(
        `Invalid API key format. API keys should start with '${API_KEY_PREFIX}'.`
      );
    }

    const baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
    const timeout = options.timeout ?? DEFAULT_TIMEOUT_MS;

    const result = configSchema.safeParse({ baseUrl, timeout });
    if (!result.success) {
      const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
      throw new ConfigurationError(`Invalid configuration: ${issues.join(', ')}`);
    }

    return new BatchRouterConfig(apiKey, baseUrl, timeout, options.customHeaders ?? {});
  }

  /**
   * Creates a configuration from environment variables alone.
   */
  static fromEnv(env: Environment = process.env): BatchRouterConfig {
    const options: BatchRouterConfigOptions = {};

    const baseUrl = env[BASE_URL_ENV_VAR];
    if (baseUrl) {
      options.baseUrl = baseUrl;
    }

    const timeout = env[TIMEOUT_ENV_VAR];
    if (timeout) {
      const ms = parseInt(timeout, 10);
      if (isNaN(ms)) {
        throw new ConfigurationError(`${TIMEOUT_ENV_VAR} must be an integer, got '${timeout}'`);
      }
      options.timeout = ms;
    }

    return BatchRouterConfig.resolve(options, env);
  }
}

/**
 * Builder for BatchRouterConfig.
 */
export class BatchRouterConfigBuilder {
  private readonly options: BatchRouterConfigOptions = {};
  private env: Environment = process.env;

  /**
   * Sets the API key.
   */
  apiKey(key: string): this {
    this.options.apiKey = key;
    return this;
  }

  /**
   * Sets the base URL.
   */
  baseUrl(url: string): this {
    this.options.baseUrl = url;
    return this;
  }

  /**
   * Sets the request timeout in milliseconds.
   */
  timeout(ms: number): this {
    this.options.timeout = ms;
    return this;
  }

  /**
   * Sets the timeout in seconds.
   */
  timeoutSecs(secs: number): this {
    this.options.timeout = secs * 1000;
    return this;
  }

  /**
   * Adds a custom header.
   */
  header(name: string, value: string): this {
    this.options.customHeaders = { ...this.options.customHeaders, [name]: value };
    return this;
  }

  /**
   * Sets the environment used for the API key fallback.
   */
  environment(env: Environment): this {
    this.env = env;
    return this;
  }

  /**
   * Builds the configuration.
   */
  build(): BatchRouterConfig {
    return BatchRouterConfig.resolve(this.options, this.env);
  }
}
