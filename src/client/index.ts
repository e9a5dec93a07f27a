/**
 * Main BatchRouter client implementation.
 */

import type { AuthProvider } from '../auth';
import { BearerAuthProvider } from '../auth';
import type { Environment } from '../config';
import { BatchRouterConfig } from '../config';
import type { Logger } from '../observability/logging';
import { createLogger, LogLevel, NoopLogger } from '../observability/logging';
import type { RetryConfig } from '../resilience';
import { createRetryPolicy, RetryingRequester, RetryPolicy } from '../resilience';
import type { BatchesService, DatasetsService, ModelsService } from '../services';
import { createBatchesService, createDatasetsService, createModelsService } from '../services';
import type { ApiRequester, HttpTransport } from '../transport';
import { createTransport, RequestMediator } from '../transport';

/**
 * Options for creating a BatchRouter client.
 */
export interface BatchRouterClientOptions {
  /** API key (starts with `br_`). Falls back to `BATCHROUTER_API_KEY`. */
  apiKey?: string;
  /** Base URL for API requests. */
  baseUrl?: string;
  /** Request timeout in milliseconds. */
  timeout?: number;
  /** Extra headers sent with every request. */
  customHeaders?: Record<string, string>;
  /** Environment the API key falls back to. Defaults to `process.env`. */
  env?: Environment;
  /** Custom transport (for testing). */
  transport?: HttpTransport;
  /** Logger instance. */
  logger?: Logger;
  /** Custom auth provider. */
  authProvider?: AuthProvider;
  /** Retry GET requests on transient failures. Off unless set. */
  retry?: RetryPolicy | Partial<RetryConfig>;
}

/**
 * Client for the BatchRouter batch inference API.
 *
 * One instance owns one connection pool; call {@link close} when done, or use
 * {@link BatchRouter.withClient}.
 */
export class BatchRouter {
  /** Dataset upload and management. */
  readonly datasets: DatasetsService;
  /** Batch job creation, monitoring and downloads. */
  readonly batches: BatchesService;
  /** Model and provider discovery. */
  readonly models: ModelsService;

  private readonly config: BatchRouterConfig;
  private readonly mediator: RequestMediator;
  private readonly logger: Logger;
  private closed = false;

  /**
   * @throws AuthenticationError if no API key is found or it lacks the `br_` prefix
   * @throws ConfigurationError if the base URL or timeout is invalid
   */
  constructor(options: BatchRouterClientOptions = {}) {
    this.config = BatchRouterConfig.resolve(
      {
        apiKey: options.apiKey,
        baseUrl: options.baseUrl,
        timeout: options.timeout,
        customHeaders: options.customHeaders,
      },
      options.env
    );

    this.logger = options.logger ?? new NoopLogger();

    const auth = options.authProvider ?? new BearerAuthProvider(this.config.apiKey);
    const transport = options.transport ?? createTransport({ timeout: this.config.timeout });
    this.mediator = new RequestMediator(this.config, transport, auth, this.logger);

    let requester: ApiRequester = this.mediator;
    if (options.retry !== undefined) {
      const policy =
        options.retry instanceof RetryPolicy ? options.retry : createRetryPolicy(options.retry);
      requester = new RetryingRequester(this.mediator, policy, this.logger);
    }

    this.datasets = createDatasetsService(requester);
    this.batches = createBatchesService(requester);
    this.models = createModelsService(requester);

    this.logger.debug('Client created', {
      baseUrl: this.config.baseUrl,
      timeout: this.config.timeout,
      key: auth.getKeyHint(),
    });
  }

  /**
   * Gets the configuration.
   */
  getConfig(): BatchRouterConfig {
    return this.config;
  }

  /**
   * Whether {@link close} has been called.
   */
  isClosed(): boolean {
    return this.closed;
  }

  /**
   * Releases the connection pool. Calling it again does nothing.
   */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    await this.mediator.close();
    this.logger.debug('Client closed');
  }

  /**
   * Creates a client, runs `fn` with it, and closes it whatever the outcome.
   */
  static async withClient<T>(
    options: BatchRouterClientOptions,
    fn: (client: BatchRouter) => Promise<T>
  ): Promise<T> {
    const client = new BatchRouter(options);
    try {
      return await fn(client);
    } finally {
      await client.close();
    }
  }

  /**
   * Creates a new client builder.
   */
  static builder(): BatchRouterClientBuilder {
    return new BatchRouterClientBuilder();
  }
}

/**
 * Builder for creating BatchRouter instances.
 */
export class BatchRouterClientBuilder {
  private readonly options: BatchRouterClientOptions = {};

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
   * Sets the environment the API key falls back to.
   */
  environment(env: Environment): this {
    this.options.env = env;
    return this;
  }

  /**
   * Sets the logger.
   */
  logger(logger: Logger): this {
    this.options.logger = logger;
    return this;
  }

  /**
   * Enables console logging at the specified level.
   */
  withConsoleLogging(level: LogLevel = LogLevel.Info): this {
    this.options.logger = createLogger({ level });
    return this;
  }

  /**
   * Enables retries of GET requests.
   */
  retry(config: RetryPolicy | Partial<RetryConfig> = {}): this {
    this.options.retry = config;
    return this;
  }

  /**
   * Sets a custom transport.
   */
  transport(transport: HttpTransport): this {
    this.options.transport = transport;
    return this;
  }

  /**
   * Sets a custom auth provider.
   */
  authProvider(provider: AuthProvider): this {
    this.options.authProvider = provider;
    return this;
  }

  /**
   * Builds the client.
   */
  build(): BatchRouter {
    return new BatchRouter(this.options);
  }
}
