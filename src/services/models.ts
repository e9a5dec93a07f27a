/**
 * Models service for listing models and their providers.
 */

import { z } from 'zod';
import type { ApiRequester } from '../transport';
import { parseResponse } from '../types/common';
import { ModelSchema, type Model } from '../types/models';
import { pathParam } from './paths';

const ModelListSchema = z.array(ModelSchema);

/**
 * Models service interface.
 */
export interface ModelsService {
  /**
   * Lists all models available for batch processing.
   */
  list(): Promise<Model[]>;

  /**
   * Gets a model by name.
   *
   * Resolves `undefined` when the server answers with an empty body, `null`,
   * `{}` or `[]`; an unknown name answered with 404 rejects with NotFoundError.
   */
  get(name: string): Promise<Model | undefined>;
}

/**
 * Default models service implementation.
 */
export class DefaultModelsService implements ModelsService {
  private readonly requester: ApiRequester;

  constructor(requester: ApiRequester) {
    this.requester = requester;
  }

  async list(): Promise<Model[]> {
    const data = await this.requester.request({
      method: 'GET',
      path: '/v1/routing/models',
    });

    return parseResponse(ModelListSchema, data, 'model list');
  }

  async get(name: string): Promise<Model | undefined> {
    const data = await this.requester.request({
      method: 'GET',
      path: `/v1/routing/models/${pathParam(name)}`,
    });

    if (isEmpty(data)) {
      return undefined;
    }

    return parseResponse(ModelSchema, data, 'model');
  }
}

function isEmpty(data: unknown): boolean {
  if (data === undefined || data === null) {
    return true;
  }
  if (Array.isArray(data)) {
    return data.length === 0;
  }
  return typeof data === 'object' && Object.keys(data).length === 0;
}

/**
 * Creates a models service.
 */
export function createModelsService(requester: ApiRequester): ModelsService {
  return new DefaultModelsService(requester);
}
