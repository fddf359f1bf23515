// ---------------------------------------------------------------------------
// Cross-slice (generalization) application
// ---------------------------------------------------------------------------

import { formatShape, type Tensor } from '@slicewise/tensor';
import { applyOperation, scoreOperation } from './capability.js';
import { ShapeError } from './errors.js';
import { LazyOutput } from './output.js';
import type { ApplyMethod, Estimator } from './types.js';
import { sampleDims } from './validation.js';

/**
 * Merge the sample and slice axes of `X (n, f, s)` into `(n·s, f)`.
 * Row `i·s + j` holds sample `i` of slice `j`.
 */
export function stackSlices(X: Tensor): Tensor {
  const [nSamples, nFeatures, nSlices] = sampleDims(X);
  return X.transpose([1, 0, 2]).reshape([nFeatures, nSamples * nSlices]).transpose();
}

/** Inverse of `stackSlices` for a result: `(n·s, ...)` → `(n, s, ...)`. */
export function unstackSlices(result: Tensor, nSamples: number, nSlices: number): Tensor {
  if (result.ndim < 1 || result.shape[0] !== nSamples * nSlices) {
    throw new ShapeError(
      `Expected a result with ${nSamples * nSlices} rows, got shape ${formatShape(result.shape)}`,
    );
  }
  return result.reshape([nSamples, nSlices, ...result.shape.slice(1)]);
}

/**
 * Apply every estimator to every slice of `X (n, f, s)`.
 * Returns `(n, n_estimators, s, ...)`.
 *
 * Each estimator is called once on the stacked `(n·s, f)` matrix rather than
 * once per slice; inference is row-wise, so this equals the per-slice loop.
 */
export async function applyCrossSlice(
  estimators: readonly Estimator[],
  X: Tensor,
  method: ApplyMethod,
): Promise<Tensor> {
  const [nSamples, , nSlices] = sampleDims(X);
  const stacked = stackSlices(X);

  const output = new LazyOutput([nSamples, estimators.length, nSlices], 2);
  for (let i = 0; i < estimators.length; i++) {
    const operation = applyOperation(estimators[i]!, method);
    const result = await operation(stacked);
    output.write([null, i], unstackSlices(result, nSamples, nSlices));
  }
  return output.result();
}

/**
 * Score every estimator on every slice of `X`. Returns `(n_estimators, s, ...)`.
 *
 * Scores reduce over samples, so slices cannot be stacked here: this is a
 * plain loop over every (estimator, slice) pair.
 */
export async function scoreCrossSlice(
  estimators: readonly Estimator[],
  X: Tensor,
  y: Tensor,
): Promise<Tensor> {
  const nSlices = sampleDims(X)[2];
  const slices = Array.from({ length: nSlices }, (_, j) => X.take(2, j));

  const output = new LazyOutput([estimators.length, nSlices], 0);
  for (let i = 0; i < estimators.length; i++) {
    const score = scoreOperation(estimators[i]!);
    for (let j = 0; j < nSlices; j++) {
      output.write([i, j], await score(slices[j]!, y));
    }
  }
  return output.result();
}
