import type { QueryParams } from '../transport';
import { DEFAULT_PAGE, DEFAULT_PAGE_SIZE, type ListParams } from '../types/common';

/**
 * Query parameters for a paginated list call, with defaults filled in.
 */
export function listQuery(params: ListParams = {}): QueryParams {
  return {
    page: params.page ?? DEFAULT_PAGE,
    page_size: params.page_size ?? DEFAULT_PAGE_SIZE,
  };
}
