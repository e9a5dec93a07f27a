/**
 * Resilience layer exports.
 */

export type { RetryConfig, RetryHooks, RetryListener } from './retry';
export { RetryPolicy, DEFAULT_RETRY_CONFIG, createRetryPolicy } from './retry';
export { RetryingRequester } from './requester';
