/**
 * Tests for the Batches service.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { BatchRouterConfig } from '../config';
import { NotFoundError, ServerError, ValidationError } from '../errors';
import {
  errorResponse,
  jsonResponse,
  mockBatchJob,
  MockTransport,
  textResponse,
} from '../mocks';
import { DefaultBatchesService } from '../services/batches';
import { RequestMediator } from '../transport';

const CREATED = {
  id: 'batch_123',
  status: 'pending',
  model: 'gpt-4o-mini',
  provider_id: 'prov_openai',
  provider_name: 'openai',
  estimated_cost: 0.05,
};

describe('BatchesService', () => {
  let transport: MockTransport;
  let service: DefaultBatchesService;

  beforeEach(() => {
    transport = new MockTransport();
    const config = BatchRouterConfig.resolve({ apiKey: 'br_test_key_123' }, {});
    service = new DefaultBatchesService(new RequestMediator(config, transport));
  });

  describe('create', () => {
    beforeEach(() => {
      transport.on('POST', '/api/v1/batches', jsonResponse(CREATED));
    });

    it('should default the model to auto', async () => {
      const result = await service.create({ dataset_name: 'prompts' });

      expect(transport.lastRequest()?.body).toEqual({
        type: 'json',
        data: { dataset_name: 'prompts', model: 'auto' },
      });
      expect(result.id).toBe('batch_123');
      expect(result.provider_name).toBe('openai');
      expect(result.estimated_cost).toBe(0.05);
    });

    it('should treat an empty model as auto', async () => {
      await service.create({ dataset_name: 'prompts', model: '' });

      expect(transport.lastRequest()?.body).toEqual({
        type: 'json',
        data: { dataset_name: 'prompts', model: 'auto' },
      });
    });

    it('should send model, provider and description when given', async () => {
      await service.create({
        dataset_name: 'prompts',
        model: 'gpt-4o-mini',
        provider: 'openai',
        description: 'nightly run',
      });

      expect(transport.lastRequest()?.body).toEqual({
        type: 'json',
        data: {
          dataset_name: 'prompts',
          model: 'gpt-4o-mini',
          provider: 'openai',
          description: 'nightly run',
        },
      });
    });

    it('should leave out empty provider and description', async () => {
      await service.create({ dataset_name: 'prompts', provider: '', description: '' });

      expect(transport.lastRequest()?.body).toEqual({
        type: 'json',
        data: { dataset_name: 'prompts', model: 'auto' },
      });
    });

    it('should accept a response without optional fields', async () => {
      transport.clearResponses();
      transport.onPath(
        '/api/v1/batches',
        jsonResponse({ id: 'batch_9', status: 'pending', model: 'auto', provider_id: null })
      );

      const result = await service.create({ dataset_name: 'prompts' });

      expect(result.provider_id).toBeUndefined();
      expect(result.estimated_cost).toBeUndefined();
    });

    it('should raise ValidationError on 422', async () => {
      transport.clearResponses();
      transport.onPath('/api/v1/batches', errorResponse(422, 'Dataset is not validated'));

      await expect(service.create({ dataset_name: 'prompts' })).rejects.toBeInstanceOf(
        ValidationError
      );
    });
  });

  describe('list', () => {
    it('should pass pagination and parse jobs', async () => {
      transport.onPath('/api/v1/batches', jsonResponse({ data: [mockBatchJob()] }));

      const jobs = await service.list({ page: 2, page_size: 5 });

      expect(transport.lastRequest()?.method).toBe('GET');
      expect(transport.lastRequest()?.query).toEqual({ page: 2, page_size: 5 });
      expect(jobs).toHaveLength(1);
      expect(jobs[0]?.status).toBe('processing');
    });

    it('should return the envelope from listPage', async () => {
      transport.onPath(
        '/api/v1/batches',
        jsonResponse({ data: [], total: 0, page: 1, page_size: 20, has_more: false })
      );

      const page = await service.listPage();

      expect(page).toEqual({ data: [], total: 0, page: 1, page_size: 20, has_more: false });
    });
  });

  describe('get', () => {
    it('should parse a job with progress and timestamps', async () => {
      transport.onPath('/api/v1/batches/batch_123', jsonResponse(mockBatchJob()));

      const job = await service.get('batch_123');

      expect(job.completed_count).toBe(4);
      expect(job.request_count).toBe(10);
      expect(job.created_at).toEqual(new Date('2024-01-15T10:30:00Z'));
      expect(job.submitted_at).toEqual(new Date('2024-01-15T10:31:00Z'));
      expect(job.completed_at).toBeUndefined();
      expect(job.actual_cost).toBeUndefined();
    });

    it('should default the result flags to false', async () => {
      const wire = mockBatchJob();
      delete wire['has_results'];
      delete wire['has_errors'];
      transport.onPath('/api/v1/batches/batch_123', jsonResponse(wire));

      const job = await service.get('batch_123');

      expect(job.has_results).toBe(false);
      expect(job.has_errors).toBe(false);
    });

    it('should parse a job with only the required fields', async () => {
      transport.onPath(
        '/api/v1/batches/batch_min',
        jsonResponse({
          id: 'batch_min',
          dataset_id: 'ds_1',
          model: 'auto',
          status: 'pending',
          created_at: '2024-02-01T00:00:00+00:00',
        })
      );

      const job = await service.get('batch_min');

      expect(job.id).toBe('batch_min');
      expect(job.dataset_id).toBe('ds_1');
      expect(job.created_at).toEqual(new Date('2024-02-01T00:00:00Z'));
      expect(job.request_count).toBeUndefined();
      expect(job.completed_count).toBeUndefined();
      expect(job.failed_count).toBeUndefined();
      expect(job.input_tokens).toBeUndefined();
    });

    it('should raise NotFoundError for an unknown job', async () => {
      transport.onPath('/api/v1/batches/missing', errorResponse(404, 'Batch not found'));

      await expect(service.get('missing')).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('cancel', () => {
    it('should POST to the cancel endpoint without a body', async () => {
      transport.on(
        'POST',
        '/api/v1/batches/batch_123/cancel',
        jsonResponse(mockBatchJob({ status: 'cancelled' }))
      );

      const job = await service.cancel('batch_123');

      const request = transport.lastRequest();
      expect(request?.method).toBe('POST');
      expect(request?.url).toBe('https://api.batchrouter.ai/api/v1/batches/batch_123/cancel');
      expect(request?.body).toBeUndefined();
      expect(job.status).toBe('cancelled');
    });
  });

  describe('downloads', () => {
    it('should return result bytes unchanged', async () => {
      const bytes = Buffer.from('{"custom_id":"1","response":{"status_code":200}}\n');
      transport.on('GET', '/api/v1/batches/batch_123/results', textResponse(bytes));

      const results = await service.downloadResults('batch_123');

      expect(results.equals(bytes)).toBe(true);
      expect(transport.lastRequest()?.method).toBe('GET');
    });

    it('should return empty errors as an empty buffer', async () => {
      transport.on('GET', '/api/v1/batches/batch_123/errors', textResponse(''));

      const errors = await service.downloadErrors('batch_123');

      expect(errors.length).toBe(0);
    });

    it('should raise ServerError when results are unavailable', async () => {
      transport.onPath('/api/v1/batches/batch_123/results', errorResponse(503, 'Try again later'));

      await expect(service.downloadResults('batch_123')).rejects.toBeInstanceOf(ServerError);
    });
  });
});
