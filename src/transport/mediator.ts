/**
 * Request mediation: every API call passes through here.
 */

import type { AuthProvider } from '../auth';
import { BearerAuthProvider } from '../auth';
import type { BatchRouterConfig } from '../config';
import { fromResponse, ResponseDecodeError } from '../errors';
import type { Logger } from '../observability/logging';
import { NoopLogger } from '../observability/logging';
import type {
  FilePart,
  HttpMethod,
  HttpTransport,
  QueryParams,
  RequestBody,
  TransportResponse,
} from './types';

/** Client version reported in the User-Agent header. */
export const CLIENT_VERSION = '0.1.0';

/** User-Agent sent with every request. */
export const USER_AGENT = `batchrouter-typescript/${CLIENT_VERSION}`;

/** Prefix joined between the base URL and every logical path. */
export const API_PATH_PREFIX = '/api';

/**
 * A logical API call.
 *
 * Endpoints take either `json` or `multipart`, never both.
 */
export interface ApiRequest {
  method: HttpMethod;
  /** Path below `/api`, e.g. `/v1/batches`. */
  path: string;
  query?: QueryParams;
  json?: unknown;
  multipart?: {
    fields: Record<string, string>;
    files: FilePart[];
  };
}

/**
 * The two primitives resource services are built on.
 */
export interface ApiRequester {
  /**
   * Sends a request and returns the decoded JSON body, or `undefined` for an
   * empty (204 or zero-length) response.
   */
  request(request: ApiRequest): Promise<unknown>;

  /**
   * Sends a request and returns the raw response body.
   */
  requestRaw(method: HttpMethod, path: string): Promise<Buffer>;
}

/**
 * Authenticates, dispatches and decodes API calls, translating non-success
 * statuses into errors.
 */
export class RequestMediator implements ApiRequester {
  private readonly config: BatchRouterConfig;
  private readonly transport: HttpTransport;
  private readonly auth: AuthProvider;
  private readonly logger: Logger;

  constructor(
    config: BatchRouterConfig,
    transport: HttpTransport,
    auth?: AuthProvider,
    logger?: Logger
  ) {
    this.config = config;
    this.transport = transport;
    this.auth = auth ?? new BearerAuthProvider(config.apiKey);
    this.logger = logger ?? new NoopLogger();
  }

  /**
   * Absolute URL for a logical path.
   */
  buildUrl(path: string): string {
    return `${this.config.baseUrl}${API_PATH_PREFIX}${path}`;
  }

  /**
   * Headers for a request. Multipart bodies carry no Content-Type here; the
   * transport sets it together with the boundary.
   */
  buildHeaders(multipart = false): Record<string, string> {
    const headers: Record<string, string> = {
      ...this.config.customHeaders,
      ...this.auth.getAuthHeaders(),
      'User-Agent': USER_AGENT,
    };

    if (!multipart) {
      headers['Content-Type'] = 'application/json';
    }

    return headers;
  }

  async request(request: ApiRequest): Promise<unknown> {
    const response = await this.dispatch(request);

    if (response.status === 204 || response.body.length === 0) {
      return undefined;
    }

    return decodeJson(response.body);
  }

  async requestRaw(method: HttpMethod, path: string): Promise<Buffer> {
    const response = await this.dispatch({ method, path });
    return response.body;
  }

  /**
   * Releases the transport's connections.
   */
  async close(): Promise<void> {
    await this.transport.close();
  }

  private async dispatch(request: ApiRequest): Promise<TransportResponse> {
    const url = this.buildUrl(request.path);
    const body = toBody(request);
    const started = Date.now();

    this.logger.debug('Sending request', {
      method: request.method,
      url,
      key: this.auth.getKeyHint(),
    });

    const response = await this.transport.send({
      method: request.method,
      url,
      headers: this.buildHeaders(body?.type === 'multipart'),
      query: request.query,
      body,
    });

    this.logger.debug('Received response', {
      method: request.method,
      url,
      status: response.status,
      durationMs: Date.now() - started,
    });

    if (response.status < 200 || response.status >= 300) {
      throw fromResponse(response.status, response.body);
    }

    return response;
  }
}

function toBody(request: ApiRequest): RequestBody | undefined {
  if (request.multipart) {
    return { type: 'multipart', ...request.multipart };
  }
  if (request.json !== undefined) {
    return { type: 'json', data: request.json };
  }
  return undefined;
}

function decodeJson(body: Buffer): unknown {
  try {
    return JSON.parse(body.toString('utf-8'));
  } catch (error) {
    throw new ResponseDecodeError(
      `Response body is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}
