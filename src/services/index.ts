/**
 * Service exports.
 */

export type { DatasetsService } from './datasets';
export { DefaultDatasetsService, createDatasetsService, GET_BY_NAME_PAGE_SIZE } from './datasets';

export type { BatchesService } from './batches';
export { DefaultBatchesService, createBatchesService } from './batches';

export type { ModelsService } from './models';
export { DefaultModelsService, createModelsService } from './models';
