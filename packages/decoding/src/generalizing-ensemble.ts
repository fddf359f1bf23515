// ---------------------------------------------------------------------------
// Generalizing ensemble: every model applied to every slice
// ---------------------------------------------------------------------------

import type { Tensor } from '@slicewise/tensor';
import { dispatchChunks, mergeChunks, type DispatchContext } from './coordinator.js';
import { applyCrossSlice, scoreCrossSlice } from './cross-slice.js';
import { SlicedEnsemble } from './sliced-ensemble.js';
import type { ApplyMethod, Estimator } from './types.js';
import { sampleDims } from './validation.js';

/**
 * Fits exactly like `SlicedEnsemble`, but applies every fitted estimator to
 * every slice of the test tensor, which may hold any number of slices.
 *
 * Apply results are `(n_samples, n_estimators, n_test_slices, ...)`;
 * scores are `(n_estimators, n_test_slices, ...)`.
 */
export class GeneralizingEnsemble<E extends Estimator = Estimator> extends SlicedEnsemble<E> {
  protected override checkSliceCount(): void {
    // every estimator meets every test slice, whatever their count
  }

  protected override async applySlices(
    estimators: readonly Estimator[],
    X: Tensor,
    method: ApplyMethod,
    context: DispatchContext,
  ): Promise<Tensor> {
    const chunks = await dispatchChunks(context, method, 'samples', sampleDims(X)[0], (range) =>
      applyCrossSlice(estimators, X.slice(0, range.start, range.end), method),
    );
    return mergeChunks(chunks, 0);
  }

  protected override async scoreSlices(
    estimators: readonly Estimator[],
    X: Tensor,
    y: Tensor,
    context: DispatchContext,
  ): Promise<Tensor> {
    const chunks = await dispatchChunks(context, 'score', 'slices', sampleDims(X)[2], (range) =>
      scoreCrossSlice(estimators, X.slice(2, range.start, range.end), y),
    );
    return mergeChunks(chunks, 1);
  }
}
