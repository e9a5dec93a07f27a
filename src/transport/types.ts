/**
 * Transport contract for the BatchRouter client.
 */

import type { Readable } from 'stream';

/**
 * HTTP methods used by the API.
 */
export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

/**
 * Query string values.
 */
export type QueryParams = Record<string, string | number | boolean>;

/**
 * A file sent as one part of a multipart body.
 */
export interface FilePart {
  /** Form field name. */
  field: string;
  /** File name reported to the server. */
  filename: string;
  /** MIME type of the part. */
  contentType: string;
  /** File bytes, or a stream that yields them. */
  content: Buffer | Readable;
}

/**
 * Request body: JSON, or multipart form fields plus files.
 */
export type RequestBody =
  | { type: 'json'; data: unknown }
  | { type: 'multipart'; fields: Record<string, string>; files: FilePart[] };

/**
 * A fully built request, ready for the wire.
 */
export interface TransportRequest {
  method: HttpMethod;
  /** Absolute URL without query string. */
  url: string;
  headers: Record<string, string>;
  query?: QueryParams;
  body?: RequestBody;
}

/**
 * A response of any status. Bodies are always buffered.
 */
export interface TransportResponse {
  status: number;
  /** Lower-cased header names. */
  headers: Record<string, string>;
  body: Buffer;
}

/**
 * Sends requests over the network.
 *
 * Implementations report every status as a response; only failures to get a
 * response at all are thrown (as `NetworkError` or `TimeoutError`).
 */
export interface HttpTransport {
  send(request: TransportRequest): Promise<TransportResponse>;

  /** Releases pooled connections. The transport is unusable afterwards. */
  close(): Promise<void>;
}
