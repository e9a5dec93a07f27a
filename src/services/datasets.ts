/**
 * Datasets service: upload, list, look up and delete datasets.
 */

import { createReadStream } from 'fs';
import { access } from 'fs/promises';
import { basename } from 'path';
import type { Readable } from 'stream';
import { InvalidArgumentError } from '../errors';
import type { ApiRequester } from '../transport';
import { listDataSchema, pageSchema, parseResponse, type ListParams, type Page } from '../types/common';
import {
  DATASET_CONTENT_TYPE,
  DatasetSchema,
  DatasetUploadResponseSchema,
  type Dataset,
  type DatasetSource,
  type DatasetUploadOptions,
  type DatasetUploadResponse,
} from '../types/datasets';
import { listQuery } from './list-query';
import { pathParam } from './paths';

/** Page size used by {@link DatasetsService.getByName}. */
export const GET_BY_NAME_PAGE_SIZE = 100;

const DatasetListSchema = listDataSchema(DatasetSchema);
const DatasetPageSchema = pageSchema(DatasetSchema);

/**
 * Datasets service interface.
 */
export interface DatasetsService {
  /**
   * Uploads a JSONL dataset.
   *
   * From a path, `name` defaults to the file name. From a stream or buffer,
   * `name` is required.
   *
   * @throws InvalidArgumentError if `name` is missing for a stream or buffer
   */
  upload(source: DatasetSource, options?: DatasetUploadOptions): Promise<DatasetUploadResponse>;

  /**
   * Lists one page of datasets.
   */
  list(params?: ListParams): Promise<Dataset[]>;

  /**
   * Lists one page of datasets along with the pagination envelope.
   */
  listPage(params?: ListParams): Promise<Page<Dataset>>;

  /**
   * Gets a dataset by ID.
   *
   * @throws NotFoundError if no dataset has this ID
   */
  get(datasetId: string): Promise<Dataset>;

  /**
   * Finds a dataset by exact name among the first 100 datasets.
   *
   * Resolves `undefined` when none matches; later pages are not searched.
   */
  getByName(name: string): Promise<Dataset | undefined>;

  /**
   * Deletes a dataset.
   */
  delete(datasetId: string): Promise<void>;
}

/**
 * Default datasets service implementation.
 */
export class DefaultDatasetsService implements DatasetsService {
  private readonly requester: ApiRequester;

  constructor(requester: ApiRequester) {
    this.requester = requester;
  }

  async upload(
    source: DatasetSource,
    options: DatasetUploadOptions = {}
  ): Promise<DatasetUploadResponse> {
    if (typeof source !== 'string') {
      if (options.name === undefined) {
        throw new InvalidArgumentError(
          'name is required when uploading from a stream or buffer',
          'name'
        );
      }
      return this.uploadContent(source, options.name, options.description);
    }

    await access(source);
    const stream = createReadStream(source);
    try {
      return await this.uploadContent(stream, options.name ?? basename(source), options.description);
    } finally {
      stream.destroy();
    }
  }

  async list(params?: ListParams): Promise<Dataset[]> {
    const data = await this.requester.request({
      method: 'GET',
      path: '/v1/datasets',
      query: listQuery(params),
    });

    return parseResponse(DatasetListSchema, data, 'dataset list').data;
  }

  async listPage(params?: ListParams): Promise<Page<Dataset>> {
    const data = await this.requester.request({
      method: 'GET',
      path: '/v1/datasets',
      query: listQuery(params),
    });

    return parseResponse(DatasetPageSchema, data, 'dataset page');
  }

  async get(datasetId: string): Promise<Dataset> {
    const data = await this.requester.request({
      method: 'GET',
      path: `/v1/datasets/${pathParam(datasetId)}`,
    });

    return parseResponse(DatasetSchema, data, 'dataset');
  }

  async getByName(name: string): Promise<Dataset | undefined> {
    const datasets = await this.list({ page_size: GET_BY_NAME_PAGE_SIZE });
    return datasets.find((dataset) => dataset.name === name);
  }

  async delete(datasetId: string): Promise<void> {
    await this.requester.request({
      method: 'DELETE',
      path: `/v1/datasets/${pathParam(datasetId)}`,
    });
  }

  private async uploadContent(
    content: Readable | Buffer,
    name: string,
    description?: string
  ): Promise<DatasetUploadResponse> {
    const fields: Record<string, string> = { name };
    if (description) {
      fields['description'] = description;
    }

    const data = await this.requester.request({
      method: 'POST',
      path: '/v1/datasets',
      multipart: {
        fields,
        files: [{ field: 'file', filename: name, contentType: DATASET_CONTENT_TYPE, content }],
      },
    });

    return parseResponse(DatasetUploadResponseSchema, data, 'dataset upload response');
  }
}

/**
 * Creates a datasets service.
 */
export function createDatasetsService(requester: ApiRequester): DatasetsService {
  return new DefaultDatasetsService(requester);
}
