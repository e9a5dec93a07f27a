/**
 * Dataset types for the BatchRouter API.
 */

import type { Readable } from 'stream';
import { z } from 'zod';
import { optional, TimestampSchema } from './common';

/**
 * A dataset of JSONL records uploaded for batch processing.
 *
 * `status` is whatever the server reports (e.g. `pending`, `validated`,
 * `failed`); the set is not closed on the client.
 */
export const DatasetSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    description: optional(z.string()),
    file_size: optional(z.number().int()),
    record_count: optional(z.number().int()),
    status: z.string(),
    validation_error: optional(z.string()),
    created_at: TimestampSchema,
    updated_at: optional(TimestampSchema),
  })
  .readonly();

export type Dataset = z.infer<typeof DatasetSchema>;

/**
 * Response to a dataset upload.
 */
export const DatasetUploadResponseSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    status: z.string(),
  })
  .readonly();

export type DatasetUploadResponse = z.infer<typeof DatasetUploadResponseSchema>;

/**
 * What to upload: a file path, an open byte stream, or the bytes themselves.
 */
export type DatasetSource = string | Readable | Buffer;

/**
 * Options for a dataset upload.
 */
export interface DatasetUploadOptions {
  /** Dataset name. Defaults to the file name when uploading from a path; required otherwise. */
  name?: string;
  /** Free-form description. */
  description?: string;
}

/** Content type sent for the uploaded file part. */
export const DATASET_CONTENT_TYPE = 'application/jsonl';
