/**
 * Mock infrastructure for testing.
 */

import { Readable } from 'stream';
import { NetworkError } from '../errors';
import type {
  FilePart,
  HttpMethod,
  HttpTransport,
  RequestBody,
  TransportRequest,
  TransportResponse,
} from '../transport';

/**
 * Recorded request for verification. Streamed file parts are drained into
 * buffers before recording.
 */
export interface RecordedRequest {
  /** The request that was made. */
  request: TransportRequest;
  /** Timestamp of the request. */
  timestamp: Date;
}

/**
 * Mock response configuration.
 */
export interface MockResponse {
  /** HTTP status code. */
  status: number;
  /** Response headers. */
  headers?: Record<string, string>;
  /** Response body. */
  body?: Buffer | string;
  /** Optional delay in milliseconds. */
  delay?: number;
  /** Optional error to throw instead of responding. */
  error?: Error;
}

/**
 * Mock transport for testing.
 *
 * Responses are matched on the URL path (e.g. `/api/v1/batches`), optionally
 * with a method. When several are queued for a key they are served in order;
 * the last one keeps being served.
 */
export class MockTransport implements HttpTransport {
  private readonly responses: Map<string, MockResponse[]> = new Map();
  private readonly defaultResponse: MockResponse;
  private readonly recordedRequests: RecordedRequest[] = [];
  private closeCount = 0;

  constructor(defaultResponse?: MockResponse) {
    this.defaultResponse = defaultResponse ?? jsonResponse({});
  }

  /**
   * Configures a response for a path, whatever the method.
   */
  onPath(path: string, response: MockResponse): this {
    return this.enqueue(path, response);
  }

  /**
   * Configures a response for a method and path.
   */
  on(method: HttpMethod, path: string, response: MockResponse): this {
    return this.enqueue(`${method} ${path}`, response);
  }

  /**
   * Clears all configured responses.
   */
  clearResponses(): this {
    this.responses.clear();
    return this;
  }

  /**
   * Gets recorded requests.
   */
  getRecordedRequests(): RecordedRequest[] {
    return [...this.recordedRequests];
  }

  /**
   * The most recent request, if any.
   */
  lastRequest(): TransportRequest | undefined {
    return this.recordedRequests[this.recordedRequests.length - 1]?.request;
  }

  /**
   * Clears recorded requests.
   */
  clearRecordedRequests(): this {
    this.recordedRequests.length = 0;
    return this;
  }

  /**
   * Number of times {@link close} was called.
   */
  getCloseCount(): number {
    return this.closeCount;
  }

  async send(request: TransportRequest): Promise<TransportResponse> {
    if (this.closeCount > 0) {
      throw new NetworkError('Transport has been closed');
    }

    const recorded: TransportRequest = { ...request, body: await drainBody(request.body) };
    this.recordedRequests.push({ request: recorded, timestamp: new Date() });

    const response = this.getNextResponse(request.method, new URL(request.url).pathname);

    if (response.delay) {
      await this.sleep(response.delay);
    }

    if (response.error) {
      throw response.error;
    }

    const body = response.body ?? Buffer.alloc(0);
    return {
      status: response.status,
      headers: response.headers ?? {},
      body: Buffer.isBuffer(body) ? body : Buffer.from(body, 'utf-8'),
    };
  }

  async close(): Promise<void> {
    this.closeCount++;
  }

  private enqueue(key: string, response: MockResponse): this {
    const existing = this.responses.get(key) ?? [];
    existing.push(response);
    this.responses.set(key, existing);
    return this;
  }

  private getNextResponse(method: HttpMethod, path: string): MockResponse {
    const responses = this.responses.get(`${method} ${path}`) ?? this.responses.get(path);
    if (!responses || responses.length === 0) {
      return this.defaultResponse;
    }

    if (responses.length > 1) {
      return responses.shift() ?? this.defaultResponse;
    }
    return responses[0] ?? this.defaultResponse;
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}

async function drainBody(body: RequestBody | undefined): Promise<RequestBody | undefined> {
  if (body?.type !== 'multipart') {
    return body;
  }

  const files: FilePart[] = [];
  for (const file of body.files) {
    files.push({ ...file, content: await drainContent(file.content) });
  }
  return { ...body, files };
}

async function drainContent(content: Buffer | Readable): Promise<Buffer> {
  if (Buffer.isBuffer(content)) {
    return content;
  }

  const chunks: Buffer[] = [];
  for await (const chunk of content) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks);
}

/**
 * Creates a mock transport.
 */
export function createMockTransport(defaultResponse?: MockResponse): MockTransport {
  return new MockTransport(defaultResponse);
}

/**
 * Creates a JSON response mock.
 */
export function jsonResponse(data: unknown, status = 200): MockResponse {
  return {
    status,
    headers: { 'content-type': 'application/json' },
    body: JSON.stringify(data),
  };
}

/**
 * Creates a plain body response mock.
 */
export function textResponse(text: string | Buffer, status = 200): MockResponse {
  return { status, body: text };
}

/**
 * Creates an error response mock in the API's `{"detail": ...}` shape.
 */
export function errorResponse(status: number, detail: unknown): MockResponse {
  return jsonResponse({ detail }, status);
}

/**
 * Creates an empty response mock.
 */
export function emptyResponse(status = 204): MockResponse {
  return { status };
}

// ============================================================================
// Mock Fixtures
// ============================================================================

/**
 * Creates a dataset as the API returns it.
 */
export function mockDataset(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    id: 'ds_123',
    name: 'test-dataset',
    description: null,
    file_size: 2048,
    record_count: 10,
    status: 'validated',
    validation_error: null,
    created_at: '2024-01-15T10:30:00Z',
    updated_at: null,
    ...overrides,
  };
}

/**
 * Creates a batch job as the API returns it.
 */
export function mockBatchJob(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    id: 'batch_123',
    dataset_id: 'ds_123',
    dataset_name: 'test-dataset',
    model: 'gpt-4o-mini',
    provider_id: 'prov_openai',
    provider_name: 'openai',
    status: 'processing',
    description: null,
    error_message: null,
    request_count: 10,
    completed_count: 4,
    failed_count: 0,
    input_tokens: 1200,
    output_tokens: 800,
    estimated_cost: 0.05,
    actual_cost: null,
    has_results: false,
    has_errors: false,
    created_at: '2024-01-15T10:30:00Z',
    submitted_at: '2024-01-15T10:31:00Z',
    completed_at: null,
    ...overrides,
  };
}

/**
 * Creates a model as the API returns it.
 */
export function mockModel(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    name: 'gpt-4o-mini',
    display_name: 'GPT-4o mini',
    description: null,
    context_window: 128000,
    max_output_tokens: 16384,
    capabilities: ['chat'],
    is_deprecated: false,
    release_date: '2024-07-18',
    providers: [
      {
        id: 'prov_openai',
        name: 'openai',
        batch_input_price_per_1m: 0.075,
        batch_output_price_per_1m: 0.3,
        is_batch_supported: true,
      },
    ],
    ...overrides,
  };
}
