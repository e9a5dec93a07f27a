/**
 * Model types for the BatchRouter routing API.
 */

import { z } from 'zod';
import { optional } from './common';

/**
 * A provider serving a model, with its batch pricing.
 */
export const ModelProviderSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    batch_input_price_per_1m: optional(z.number()),
    batch_output_price_per_1m: optional(z.number()),
    is_batch_supported: z.boolean().default(true),
  })
  .readonly();

export type ModelProvider = z.infer<typeof ModelProviderSchema>;

/**
 * A model available for batch processing. `providers` keeps server order.
 */
export const ModelSchema = z
  .object({
    name: z.string(),
    display_name: optional(z.string()),
    description: optional(z.string()),
    context_window: optional(z.number().int()),
    max_output_tokens: optional(z.number().int()),
    capabilities: z.array(z.string()).readonly().default([]),
    is_deprecated: z.boolean().default(false),
    release_date: optional(z.string()),
    providers: z.array(ModelProviderSchema).readonly().default([]),
  })
  .readonly();

export type Model = z.infer<typeof ModelSchema>;

/**
 * Returns the provider with the lowest combined batch price, if any is priced.
 */
export function cheapestProvider(model: Model): ModelProvider | undefined {
  let best: ModelProvider | undefined;
  let bestPrice = Infinity;

  for (const provider of model.providers) {
    if (!provider.is_batch_supported) continue;
    if (
      provider.batch_input_price_per_1m === undefined ||
      provider.batch_output_price_per_1m === undefined
    ) {
      continue;
    }

    const price = provider.batch_input_price_per_1m + provider.batch_output_price_per_1m;
    if (price < bestPrice) {
      best = provider;
      bestPrice = price;
    }
  }

  return best;
}
