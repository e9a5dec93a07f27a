/**
 * Shared schema helpers and the paginated list envelope.
 */

import { z } from 'zod';
import { ResponseDecodeError } from '../errors';

/**
 * Optional field: absent or `null` on the wire, `undefined` on the record.
 */
export function optional<T extends z.ZodTypeAny>(schema: T) {
  return schema.nullish().transform((value) => value ?? undefined);
}

/**
 * Timestamp sent as an ISO-8601 string, with or without offset, surfaced as a `Date`.
 */
export const TimestampSchema = z
  .string()
  .datetime({ offset: true, local: true })
  .transform((value) => new Date(value));

/**
 * Pagination parameters for list endpoints.
 */
export interface ListParams {
  /** Page number, 1-indexed. Defaults to 1. */
  page?: number;
  /** Items per page. Defaults to 20. */
  page_size?: number;
}

/** Default page number for list endpoints. */
export const DEFAULT_PAGE = 1;

/** Default page size for list endpoints. */
export const DEFAULT_PAGE_SIZE = 20;

/**
 * Paginated list envelope.
 */
export interface Page<T> {
  readonly data: T[];
  readonly total: number;
  readonly page: number;
  readonly page_size: number;
  readonly has_more: boolean;
}

/**
 * Schema for the full paginated envelope around `item`.
 */
export function pageSchema<T extends z.ZodTypeAny>(item: T) {
  return z
    .object({
      data: z.array(item),
      total: z.number().int(),
      page: z.number().int(),
      page_size: z.number().int(),
      has_more: z.boolean(),
    })
    .readonly();
}

/**
 * Schema reading only the `data` array of an envelope; a missing array is empty.
 */
export function listDataSchema<T extends z.ZodTypeAny>(item: T) {
  return z.object({ data: z.array(item).default([]) });
}

/**
 * Validates a decoded response body against `schema`.
 *
 * @throws ResponseDecodeError listing every mismatch
 */
export function parseResponse<T extends z.ZodTypeAny>(
  schema: T,
  data: unknown,
  entity: string
): z.output<T> {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new ResponseDecodeError(
      `Invalid ${entity} in response`,
      result.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
    );
  }
  return result.data;
}
