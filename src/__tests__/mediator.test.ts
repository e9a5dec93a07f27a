/**
 * Tests for request mediation.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { BatchRouterConfig } from '../config';
import {
  AuthenticationError,
  NetworkError,
  NotFoundError,
  ResponseDecodeError,
  ServerError,
} from '../errors';
import { emptyResponse, errorResponse, jsonResponse, MockTransport, textResponse } from '../mocks';
import { ConsoleLogger, LogLevel } from '../observability/logging';
import { RequestMediator, USER_AGENT } from '../transport';

const API_KEY = 'br_test_key_123';

describe('RequestMediator', () => {
  let transport: MockTransport;
  let mediator: RequestMediator;

  beforeEach(() => {
    transport = new MockTransport();
    const config = BatchRouterConfig.resolve(
      { apiKey: API_KEY, baseUrl: 'http://localhost:8000/', customHeaders: { 'X-Team': 'research' } },
      {}
    );
    mediator = new RequestMediator(config, transport);
  });

  describe('buildUrl', () => {
    it('should join base URL, /api and the path', () => {
      expect(mediator.buildUrl('/v1/batches')).toBe('http://localhost:8000/api/v1/batches');
    });
  });

  describe('buildHeaders', () => {
    it('should send auth, user agent and JSON content type', () => {
      expect(mediator.buildHeaders()).toEqual({
        'X-Team': 'research',
        Authorization: `Bearer ${API_KEY}`,
        'User-Agent': 'batchrouter-typescript/0.1.0',
        'Content-Type': 'application/json',
      });
    });

    it('should leave out Content-Type for multipart bodies', () => {
      expect(mediator.buildHeaders(true)).not.toHaveProperty('Content-Type');
    });

    it('should not let custom headers replace Authorization', () => {
      const config = BatchRouterConfig.resolve(
        { apiKey: API_KEY, customHeaders: { Authorization: 'Bearer other' } },
        {}
      );
      const headers = new RequestMediator(config, transport).buildHeaders();

      expect(headers['Authorization']).toBe(`Bearer ${API_KEY}`);
      expect(USER_AGENT).toBe('batchrouter-typescript/0.1.0');
    });
  });

  describe('request', () => {
    it('should send query and JSON body and decode the response', async () => {
      transport.on('POST', '/api/v1/batches', jsonResponse({ id: 'batch_1' }));

      const result = await mediator.request({
        method: 'POST',
        path: '/v1/batches',
        query: { page: 1 },
        json: { dataset_name: 'prompts' },
      });

      expect(result).toEqual({ id: 'batch_1' });
      const request = transport.lastRequest();
      expect(request?.method).toBe('POST');
      expect(request?.url).toBe('http://localhost:8000/api/v1/batches');
      expect(request?.query).toEqual({ page: 1 });
      expect(request?.body).toEqual({ type: 'json', data: { dataset_name: 'prompts' } });
    });

    it('should send no body when none is given', async () => {
      await mediator.request({ method: 'POST', path: '/v1/batches/b1/cancel' });

      expect(transport.lastRequest()?.body).toBeUndefined();
    });

    it('should return undefined for 204', async () => {
      transport.onPath('/api/v1/datasets/ds_1', emptyResponse(204));

      await expect(mediator.request({ method: 'DELETE', path: '/v1/datasets/ds_1' })).resolves.toBeUndefined();
    });

    it('should return undefined for an empty 200 body', async () => {
      transport.onPath('/api/v1/datasets/ds_1', emptyResponse(200));

      await expect(mediator.request({ method: 'GET', path: '/v1/datasets/ds_1' })).resolves.toBeUndefined();
    });

    it('should reject a body that is not JSON', async () => {
      transport.onPath('/api/v1/datasets', textResponse('<html>'));

      await expect(mediator.request({ method: 'GET', path: '/v1/datasets' })).rejects.toBeInstanceOf(
        ResponseDecodeError
      );
    });

    it('should map error statuses with the detail message', async () => {
      transport.onPath('/api/v1/datasets/missing', errorResponse(404, 'Dataset not found'));

      const error: unknown = await mediator
        .request({ method: 'GET', path: '/v1/datasets/missing' })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(NotFoundError);
      expect(error).toMatchObject({ message: 'Dataset not found', statusCode: 404 });
    });

    it('should map 401 to AuthenticationError', async () => {
      transport.onPath('/api/v1/batches', errorResponse(401, 'Invalid API key'));

      await expect(mediator.request({ method: 'GET', path: '/v1/batches' })).rejects.toBeInstanceOf(
        AuthenticationError
      );
    });

    it('should map a plain text 502 to ServerError', async () => {
      transport.onPath('/api/v1/batches', textResponse('Bad Gateway', 502));

      await expect(mediator.request({ method: 'GET', path: '/v1/batches' })).rejects.toMatchObject({
        name: 'ServerError',
        message: 'Bad Gateway',
        statusCode: 502,
      });
    });

    it('should propagate transport failures', async () => {
      transport.onPath('/api/v1/batches', { status: 0, error: new NetworkError('Network error: reset') });

      await expect(mediator.request({ method: 'GET', path: '/v1/batches' })).rejects.toBeInstanceOf(
        NetworkError
      );
    });
  });

  describe('requestRaw', () => {
    it('should return the body bytes unchanged', async () => {
      const bytes = Buffer.from('{"custom_id":"1"}\n{"custom_id":"2"}\n');
      transport.onPath('/api/v1/batches/b1/results', textResponse(bytes));

      const body = await mediator.requestRaw('GET', '/v1/batches/b1/results');

      expect(body.equals(bytes)).toBe(true);
    });

    it('should map error statuses', async () => {
      transport.onPath('/api/v1/batches/b1/results', errorResponse(500, 'Storage unavailable'));

      await expect(mediator.requestRaw('GET', '/v1/batches/b1/results')).rejects.toBeInstanceOf(
        ServerError
      );
    });
  });

  describe('logging', () => {
    it('should log requests with a key hint only', async () => {
      const lines: string[] = [];
      const logger = new ConsoleLogger({
        level: LogLevel.Debug,
        timestamps: false,
        sink: (_level, line) => lines.push(line),
      });
      const config = BatchRouterConfig.resolve({ apiKey: API_KEY, baseUrl: 'http://localhost:8000' }, {});
      const logged = new RequestMediator(config, transport, undefined, logger);

      await logged.request({ method: 'GET', path: '/v1/batches' });

      expect(lines[0]).toBe(
        '[DEBUG] Sending request {"method":"GET","url":"http://localhost:8000/api/v1/batches","key":"br_..._123"}'
      );
      expect(lines[1]).toMatch(/^\[DEBUG\] Received response \{.*"status":200,/);
      expect(lines.some((line) => line.includes(API_KEY))).toBe(false);
    });
  });

  describe('close', () => {
    it('should close the transport', async () => {
      await mediator.close();

      expect(transport.getCloseCount()).toBe(1);
    });
  });
});
