/**
 * BatchRouter client library
 *
 * A TypeScript client for the BatchRouter batch LLM inference API. Upload a
 * JSONL dataset, start a batch job against a model (or let the router pick
 * the cheapest provider with `auto`), poll it, and download its results.
 *
 * @example
 * ```typescript
 * import { BatchRouter } from 'batchrouter';
 *
 * await BatchRouter.withClient({ apiKey: 'br_your_api_key' }, async (client) => {
 *   await client.datasets.upload('./prompts.jsonl', { name: 'prompts' });
 *   const job = await client.batches.create({ dataset_name: 'prompts' });
 *   console.log(job.id, job.status);
 * });
 * ```
 */

// Client
export { BatchRouter, BatchRouterClientBuilder } from './client';
export type { BatchRouterClientOptions } from './client';

// Config
export {
  BatchRouterConfig,
  BatchRouterConfigBuilder,
  DEFAULT_BASE_URL,
  DEFAULT_TIMEOUT_MS,
  API_KEY_ENV_VAR,
} from './config';
export type { BatchRouterConfigOptions, Environment } from './config';

// Errors
export {
  BatchRouterError,
  AuthenticationError,
  NotFoundError,
  ValidationError,
  ServerError,
  NetworkError,
  TimeoutError,
  ConfigurationError,
  InvalidArgumentError,
  ResponseDecodeError,
  isBatchRouterError,
  isRetryableError,
} from './errors';

// Types
export type {
  Dataset,
  DatasetUploadResponse,
  DatasetSource,
  DatasetUploadOptions,
  BatchJob,
  BatchCreateRequest,
  BatchCreateResponse,
  Model,
  ModelProvider,
  ListParams,
  Page,
} from './types';
export {
  DatasetSchema,
  DatasetUploadResponseSchema,
  BatchJobSchema,
  BatchCreateResponseSchema,
  ModelSchema,
  ModelProviderSchema,
  AUTO_MODEL,
  cheapestProvider,
} from './types';

// Services
export type { DatasetsService, BatchesService, ModelsService } from './services';

// Transport
export type { HttpTransport, TransportRequest, TransportResponse } from './transport';
export { AxiosTransport, USER_AGENT } from './transport';

// Auth
export type { AuthProvider } from './auth';
export { BearerAuthProvider, createBearerAuth } from './auth';

// Resilience
export type { RetryConfig } from './resilience';
export { RetryPolicy, DEFAULT_RETRY_CONFIG } from './resilience';

// Observability
export type { LogConfig, Logger } from './observability';
export { LogLevel, ConsoleLogger, NoopLogger } from './observability';

// Mocks
export {
  MockTransport,
  createMockTransport,
  jsonResponse,
  textResponse,
  errorResponse,
  emptyResponse,
  mockDataset,
  mockBatchJob,
  mockModel,
} from './mocks';
export type { MockResponse, RecordedRequest } from './mocks';
