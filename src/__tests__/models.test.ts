/**
 * Tests for the Models service and provider selection.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { BatchRouterConfig } from '../config';
import { NotFoundError, ResponseDecodeError } from '../errors';
import { emptyResponse, errorResponse, jsonResponse, mockModel, MockTransport } from '../mocks';
import { DefaultModelsService } from '../services/models';
import { RequestMediator } from '../transport';
import { cheapestProvider, ModelSchema } from '../types';

describe('ModelsService', () => {
  let transport: MockTransport;
  let service: DefaultModelsService;

  beforeEach(() => {
    transport = new MockTransport();
    const config = BatchRouterConfig.resolve({ apiKey: 'br_test_key_123' }, {});
    service = new DefaultModelsService(new RequestMediator(config, transport));
  });

  describe('list', () => {
    it('should parse a bare array of models', async () => {
      transport.onPath(
        '/api/v1/routing/models',
        jsonResponse([mockModel(), { name: 'claude-3-haiku' }])
      );

      const models = await service.list();

      expect(transport.lastRequest()?.url).toBe('https://api.batchrouter.ai/api/v1/routing/models');
      expect(models).toHaveLength(2);
      expect(models[0]?.providers[0]?.batch_input_price_per_1m).toBe(0.075);
      expect(models[1]).toMatchObject({
        name: 'claude-3-haiku',
        capabilities: [],
        providers: [],
        is_deprecated: false,
      });
    });

    it('should reject an envelope instead of an array', async () => {
      transport.onPath('/api/v1/routing/models', jsonResponse({ data: [] }));

      await expect(service.list()).rejects.toBeInstanceOf(ResponseDecodeError);
    });
  });

  describe('get', () => {
    it('should fetch a model by name', async () => {
      transport.onPath('/api/v1/routing/models/gpt-4o-mini', jsonResponse(mockModel()));

      const model = await service.get('gpt-4o-mini');

      expect(model?.display_name).toBe('GPT-4o mini');
      expect(model?.context_window).toBe(128000);
      expect(Object.isFrozen(model)).toBe(true);
      expect(Object.isFrozen(model?.providers)).toBe(true);
      expect(Object.isFrozen(model?.capabilities)).toBe(true);
    });

    it('should send a slash in the name as written', async () => {
      transport.onPath('/api/v1/routing/models/openai/gpt-4o', jsonResponse(mockModel()));

      const model = await service.get('openai/gpt-4o');

      expect(model?.name).toBe('gpt-4o-mini');
      expect(transport.lastRequest()?.url).toBe(
        'https://api.batchrouter.ai/api/v1/routing/models/openai/gpt-4o'
      );
    });

    it('should encode characters unsafe in a path', async () => {
      await service.get('my model?v=1#x').catch(() => undefined);

      expect(transport.lastRequest()?.url).toBe(
        'https://api.batchrouter.ai/api/v1/routing/models/my%20model%3Fv%3D1%23x'
      );
    });

    it('should return undefined for an empty array', async () => {
      transport.onPath('/api/v1/routing/models/unknown', jsonResponse([]));

      await expect(service.get('unknown')).resolves.toBeUndefined();
    });

    it('should return undefined for an empty object', async () => {
      transport.onPath('/api/v1/routing/models/unknown', jsonResponse({}));

      await expect(service.get('unknown')).resolves.toBeUndefined();
    });

    it('should return undefined for null or an empty body', async () => {
      transport.onPath('/api/v1/routing/models/a', jsonResponse(null));
      transport.onPath('/api/v1/routing/models/b', emptyResponse(200));

      await expect(service.get('a')).resolves.toBeUndefined();
      await expect(service.get('b')).resolves.toBeUndefined();
    });

    it('should raise NotFoundError on 404', async () => {
      transport.onPath('/api/v1/routing/models/unknown', errorResponse(404, 'Model not found'));

      await expect(service.get('unknown')).rejects.toBeInstanceOf(NotFoundError);
    });
  });
});

describe('cheapestProvider', () => {
  it('should pick the lowest combined batch price', () => {
    const model = ModelSchema.parse({
      name: 'llama-3.1-70b',
      providers: [
        { id: 'p1', name: 'alpha', batch_input_price_per_1m: 0.5, batch_output_price_per_1m: 0.5 },
        { id: 'p2', name: 'beta', batch_input_price_per_1m: 0.2, batch_output_price_per_1m: 0.6 },
        { id: 'p3', name: 'gamma', batch_input_price_per_1m: 0.3, batch_output_price_per_1m: 0.9 },
      ],
    });

    expect(cheapestProvider(model)?.name).toBe('beta');
  });

  it('should skip unpriced and unsupported providers', () => {
    const model = ModelSchema.parse({
      name: 'llama-3.1-70b',
      providers: [
        { id: 'p1', name: 'alpha', batch_input_price_per_1m: 0.01, batch_output_price_per_1m: null },
        {
          id: 'p2',
          name: 'beta',
          batch_input_price_per_1m: 0.01,
          batch_output_price_per_1m: 0.01,
          is_batch_supported: false,
        },
        { id: 'p3', name: 'gamma', batch_input_price_per_1m: 1, batch_output_price_per_1m: 2 },
      ],
    });

    expect(cheapestProvider(model)?.name).toBe('gamma');
  });

  it('should return undefined without providers', () => {
    expect(cheapestProvider(ModelSchema.parse({ name: 'empty' }))).toBeUndefined();
  });
});
