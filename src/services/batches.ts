/**
 * Batches service: create, monitor and cancel batch jobs, and download their output.
 */

import type { ApiRequester } from '../transport';
import {
  AUTO_MODEL,
  BatchCreateResponseSchema,
  BatchJobSchema,
  type BatchCreateRequest,
  type BatchCreateResponse,
  type BatchJob,
} from '../types/batches';
import { listDataSchema, pageSchema, parseResponse, type ListParams, type Page } from '../types/common';
import { listQuery } from './list-query';
import { pathParam } from './paths';

const BatchListSchema = listDataSchema(BatchJobSchema);
const BatchPageSchema = pageSchema(BatchJobSchema);

/**
 * Batches service interface.
 */
export interface BatchesService {
  /**
   * Creates a batch job over a dataset.
   */
  create(request: BatchCreateRequest): Promise<BatchCreateResponse>;

  /**
   * Lists one page of batch jobs.
   */
  list(params?: ListParams): Promise<BatchJob[]>;

  /**
   * Lists one page of batch jobs along with the pagination envelope.
   */
  listPage(params?: ListParams): Promise<Page<BatchJob>>;

  /**
   * Gets a batch job with its current status and progress.
   *
   * @throws NotFoundError if no job has this ID
   */
  get(batchId: string): Promise<BatchJob>;

  /**
   * Cancels a batch job and returns its updated state.
   */
  cancel(batchId: string): Promise<BatchJob>;

  /**
   * Downloads the JSONL results of a job.
   */
  downloadResults(batchId: string): Promise<Buffer>;

  /**
   * Downloads the JSONL errors of a job. Empty when no request failed.
   */
  downloadErrors(batchId: string): Promise<Buffer>;
}

/**
 * Default batches service implementation.
 */
export class DefaultBatchesService implements BatchesService {
  private readonly requester: ApiRequester;

  constructor(requester: ApiRequester) {
    this.requester = requester;
  }

  async create(request: BatchCreateRequest): Promise<BatchCreateResponse> {
    const payload: Record<string, string> = {
      dataset_name: request.dataset_name,
      model: request.model || AUTO_MODEL,
    };

    if (request.provider) {
      payload['provider'] = request.provider;
    }
    if (request.description) {
      payload['description'] = request.description;
    }

    const data = await this.requester.request({
      method: 'POST',
      path: '/v1/batches',
      json: payload,
    });

    return parseResponse(BatchCreateResponseSchema, data, 'batch create response');
  }

  async list(params?: ListParams): Promise<BatchJob[]> {
    const data = await this.requester.request({
      method: 'GET',
      path: '/v1/batches',
      query: listQuery(params),
    });

    return parseResponse(BatchListSchema, data, 'batch list').data;
  }

  async listPage(params?: ListParams): Promise<Page<BatchJob>> {
    const data = await this.requester.request({
      method: 'GET',
      path: '/v1/batches',
      query: listQuery(params),
    });

    return parseResponse(BatchPageSchema, data, 'batch page');
  }

  async get(batchId: string): Promise<BatchJob> {
    const data = await this.requester.request({
      method: 'GET',
      path: this.jobPath(batchId),
    });

    return parseResponse(BatchJobSchema, data, 'batch job');
  }

  async cancel(batchId: string): Promise<BatchJob> {
    const data = await this.requester.request({
      method: 'POST',
      path: `${this.jobPath(batchId)}/cancel`,
    });

    return parseResponse(BatchJobSchema, data, 'batch job');
  }

  async downloadResults(batchId: string): Promise<Buffer> {
    return this.requester.requestRaw('GET', `${this.jobPath(batchId)}/results`);
  }

  async downloadErrors(batchId: string): Promise<Buffer> {
    return this.requester.requestRaw('GET', `${this.jobPath(batchId)}/errors`);
  }

  private jobPath(batchId: string): string {
    return `/v1/batches/${pathParam(batchId)}`;
  }
}

/**
 * Creates a batches service.
 */
export function createBatchesService(requester: ApiRequester): BatchesService {
  return new DefaultBatchesService(requester);
}
