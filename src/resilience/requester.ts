/**
 * Retrying decorator for the request primitives.
 */

import type { Logger } from '../observability/logging';
import { NoopLogger } from '../observability/logging';
import type { ApiRequest, ApiRequester, HttpMethod } from '../transport';
import type { RetryPolicy } from './retry';

/**
 * Wraps an {@link ApiRequester} so idempotent reads are retried on transient
 * failures. Writes (POST, PUT, PATCH, DELETE) are sent exactly once.
 */
export class RetryingRequester implements ApiRequester {
  private readonly inner: ApiRequester;
  private readonly policy: RetryPolicy;
  private readonly logger: Logger;

  constructor(inner: ApiRequester, policy: RetryPolicy, logger?: Logger) {
    this.inner = inner;
    this.policy = policy;
    this.logger = logger ?? new NoopLogger();
  }

  async request(request: ApiRequest): Promise<unknown> {
    if (request.method !== 'GET') {
      return this.inner.request(request);
    }
    return this.policy.execute(
      () => this.inner.request(request),
      (attempt, error, delayMs) => this.logRetry(request.method, request.path, attempt, error, delayMs)
    );
  }

  async requestRaw(method: HttpMethod, path: string): Promise<Buffer> {
    if (method !== 'GET') {
      return this.inner.requestRaw(method, path);
    }
    return this.policy.execute(
      () => this.inner.requestRaw(method, path),
      (attempt, error, delayMs) => this.logRetry(method, path, attempt, error, delayMs)
    );
  }

  private logRetry(
    method: HttpMethod,
    path: string,
    attempt: number,
    error: unknown,
    delayMs: number
  ): void {
    this.logger.warn('Retrying request', {
      method,
      path,
      attempt: attempt + 1,
      delayMs: Math.round(delayMs),
      error: error instanceof Error ? error.message : String(error),
    });
  }
}
