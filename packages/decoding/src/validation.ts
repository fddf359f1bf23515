// ---------------------------------------------------------------------------
// Input and option validation
// ---------------------------------------------------------------------------

import { z } from 'zod';
import { formatShape, type Tensor } from '@slicewise/tensor';
import { ConfigurationError, ShapeError } from './errors.js';

const jobCountSchema = z
  .number({ invalid_type_error: 'nJobs must be an integer' })
  .int('nJobs must be an integer')
  .refine((n) => n !== 0, 'nJobs must be non-zero');

/** Validate a user-supplied job count: a non-zero integer. */
export function parseJobCount(nJobs: unknown): number {
  const result = jobCountSchema.safeParse(nJobs);
  if (!result.success) {
    const message = result.error.issues[0]?.message ?? 'nJobs is invalid';
    throw new ConfigurationError(`${message}, got ${String(nJobs)}`, { cause: result.error });
  }
  return result.data;
}

/**
 * Check a sample tensor, and its targets when given: X must be
 * `(n_samples, n_features, n_slices)` with at least one sample and one slice;
 * y must be a vector of `n_samples` targets.
 */
export function checkSamples(X: Tensor, y?: Tensor): void {
  if (X.ndim !== 3) {
    throw new ShapeError(
      `X must have 3 dimensions (samples, features, slices), got shape ${formatShape(X.shape)}`,
    );
  }
  if (y !== undefined) {
    if (y.ndim !== 1) {
      throw new ShapeError(`y must be 1-dimensional, got shape ${formatShape(y.shape)}`);
    }
    if (y.size < 1 || y.size !== X.shape[0]) {
      throw new ShapeError(
        `X and y must have the same non-zero number of samples, got ${X.shape[0]} and ${y.size}`,
      );
    }
  }
  if (X.shape[0] === 0 || X.shape[2] === 0) {
    throw new ShapeError(`X must hold at least one sample and one slice, got shape ${formatShape(X.shape)}`);
  }
}

/** `[n_samples, n_features, n_slices]` of a tensor that passed `checkSamples`. */
export function sampleDims(X: Tensor): [number, number, number] {
  return [X.shape[0] ?? 0, X.shape[1] ?? 0, X.shape[2] ?? 0];
}
