/**
 * Type exports.
 */

export * from './common';
export * from './datasets';
export * from './batches';
export * from './models';
