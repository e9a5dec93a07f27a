/**
 * Default HTTP transport, built on axios.
 */

import http from 'http';
import https from 'https';
import axios, { type AxiosAdapter, type AxiosInstance, type AxiosRequestConfig } from 'axios';
import FormData from 'form-data';
import { NetworkError, TimeoutError } from '../errors';
import type { HttpTransport, RequestBody, TransportRequest, TransportResponse } from './types';

/**
 * Options for {@link AxiosTransport}.
 */
export interface AxiosTransportOptions {
  /** Request timeout in milliseconds, applied to every request. */
  timeout: number;
  /** Replaces the axios network adapter. */
  adapter?: AxiosAdapter;
}

/**
 * Transport using one axios instance over keep-alive agents.
 */
export class AxiosTransport implements HttpTransport {
  private readonly client: AxiosInstance;
  private readonly httpAgent: http.Agent;
  private readonly httpsAgent: https.Agent;
  private readonly timeout: number;
  private closed = false;

  constructor(options: AxiosTransportOptions) {
    this.timeout = options.timeout;
    this.httpAgent = new http.Agent({ keepAlive: true });
    this.httpsAgent = new https.Agent({ keepAlive: true });
    this.client = axios.create({
      timeout: options.timeout,
      httpAgent: this.httpAgent,
      httpsAgent: this.httpsAgent,
      adapter: options.adapter,
      responseType: 'arraybuffer',
      maxBodyLength: Infinity,
      maxContentLength: Infinity,
      validateStatus: () => true, // Handle all status codes
    });
  }

  async send(request: TransportRequest): Promise<TransportResponse> {
    if (this.closed) {
      throw new NetworkError('Transport has been closed');
    }

    const config: AxiosRequestConfig = {
      method: request.method,
      url: request.url,
      headers: { ...request.headers },
      params: request.query,
    };

    if (request.body) {
      this.applyBody(config, request.headers, request.body);
    }

    try {
      const response = await this.client.request<unknown>(config);

      return {
        status: response.status,
        headers: this.normalizeHeaders(response.headers),
        body: toBuffer(response.data),
      };
    } catch (error) {
      if (axios.isAxiosError(error)) {
        if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
          throw new TimeoutError(`Request timed out after ${this.timeout}ms`, error);
        }
        throw new NetworkError(`Network error: ${error.message}`, error);
      }
      if (error instanceof Error) {
        throw new NetworkError(error.message, error);
      }
      throw new NetworkError('Unknown network error');
    }
  }

  async close(): Promise<void> {
    this.closed = true;
    this.httpAgent.destroy();
    this.httpsAgent.destroy();
  }

  private applyBody(
    config: AxiosRequestConfig,
    headers: Record<string, string>,
    body: RequestBody
  ): void {
    if (body.type === 'json') {
      config.data = body.data;
      return;
    }

    const form = new FormData();
    for (const [name, value] of Object.entries(body.fields)) {
      form.append(name, value);
    }
    for (const file of body.files) {
      form.append(file.field, file.content, {
        filename: file.filename,
        contentType: file.contentType,
      });
    }

    config.data = form;
    config.headers = { ...headers, ...form.getHeaders() };
  }

  private normalizeHeaders(headers: object): Record<string, string> {
    const result: Record<string, string> = {};
    for (const [key, value] of Object.entries(headers)) {
      if (typeof value === 'string') {
        result[key.toLowerCase()] = value;
      } else if (Array.isArray(value)) {
        result[key.toLowerCase()] = value.join(', ');
      }
    }
    return result;
  }
}

function toBuffer(data: unknown): Buffer {
  if (Buffer.isBuffer(data)) {
    return data;
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data);
  }
  if (typeof data === 'string') {
    return Buffer.from(data, 'utf-8');
  }
  return Buffer.alloc(0);
}

/**
 * Creates the default transport.
 */
export function createTransport(options: AxiosTransportOptions): HttpTransport {
  return new AxiosTransport(options);
}
