// ---------------------------------------------------------------------------
// Sliced ensemble fitting
// ---------------------------------------------------------------------------
// Fitting is partitioned across slices, not samples: each chunk holds only
// its own slices of the data and trains that many models.
// ---------------------------------------------------------------------------

import type { Tensor } from '@slicewise/tensor';
import { dispatchChunks, type DispatchContext } from './coordinator.js';
import type { Estimator } from './types.js';
import { sampleDims } from './validation.js';

/** Clone `prototype` once per slice of `X` and fit each clone on its own slice. */
async function fitChunk(prototype: Estimator, X: Tensor, y: Tensor): Promise<Estimator[]> {
  const estimators: Estimator[] = [];
  for (let i = 0; i < sampleDims(X)[2]; i++) {
    const estimator = prototype.clone();
    await estimator.fit(X.take(2, i), y);
    estimators.push(estimator);
  }
  return estimators;
}

/**
 * Train one estimator per slice of `X (n_samples, n_features, n_slices)`.
 * Element `i` of the result was fitted on `X[:, :, i]` only.
 */
export async function fitSlices(
  prototype: Estimator,
  X: Tensor,
  y: Tensor,
  context: DispatchContext,
): Promise<Estimator[]> {
  const chunks = await dispatchChunks(context, 'fit', 'slices', sampleDims(X)[2], (range) =>
    fitChunk(prototype, X.slice(2, range.start, range.end), y),
  );
  return chunks.flat();
}
