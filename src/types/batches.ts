/**
 * Batch job types for the BatchRouter API.
 */

import { z } from 'zod';
import { optional, TimestampSchema } from './common';

/** Model value that lets the router pick the cheapest option. */
export const AUTO_MODEL = 'auto';

/**
 * A batch job running every record of one dataset against one model.
 */
export const BatchJobSchema = z
  .object({
    id: z.string(),
    dataset_id: z.string(),
    dataset_name: optional(z.string()),
    model: z.string(),
    provider_id: optional(z.string()),
    provider_name: optional(z.string()),
    status: z.string(),
    description: optional(z.string()),
    error_message: optional(z.string()),
    request_count: optional(z.number().int()),
    completed_count: optional(z.number().int()),
    failed_count: optional(z.number().int()),
    input_tokens: optional(z.number().int()),
    output_tokens: optional(z.number().int()),
    estimated_cost: optional(z.number()),
    actual_cost: optional(z.number()),
    has_results: z.boolean().default(false),
    has_errors: z.boolean().default(false),
    created_at: TimestampSchema,
    submitted_at: optional(TimestampSchema),
    completed_at: optional(TimestampSchema),
  })
  .readonly();

export type BatchJob = z.infer<typeof BatchJobSchema>;

/**
 * Response to a batch creation; narrower than {@link BatchJob}.
 */
export const BatchCreateResponseSchema = z
  .object({
    id: z.string(),
    status: z.string(),
    model: z.string(),
    provider_id: optional(z.string()),
    provider_name: optional(z.string()),
    estimated_cost: optional(z.number()),
  })
  .readonly();

export type BatchCreateResponse = z.infer<typeof BatchCreateResponseSchema>;

/**
 * Request to create a batch job.
 */
export interface BatchCreateRequest {
  /** Name of the dataset to process. */
  dataset_name: string;
  /** Model to run. Defaults to `auto`. */
  model?: string;
  /** Pin a provider (e.g. `openai`). Empty means unpinned. */
  provider?: string;
  /** Job description. Empty means none. */
  description?: string;
}
