// ---------------------------------------------------------------------------
// Same-slice (search-light) application
// ---------------------------------------------------------------------------

import type { Tensor } from '@slicewise/tensor';
import { applyOperation, scoreOperation } from './capability.js';
import { ShapeError } from './errors.js';
import { LazyOutput } from './output.js';
import type { ApplyMethod, Estimator } from './types.js';
import { sampleDims } from './validation.js';

function checkPairing(estimators: readonly Estimator[], nSlices: number): void {
  if (estimators.length !== nSlices) {
    throw new ShapeError(
      `The number of estimators (${estimators.length}) does not match X.shape[2] (${nSlices})`,
    );
  }
}

/**
 * Apply estimator `i` to slice `i` of `X (n, f, s)`.
 * Returns `(n, s, ...)`, trailing axes taken from the first result.
 */
export async function applySameSlice(
  estimators: readonly Estimator[],
  X: Tensor,
  method: ApplyMethod,
): Promise<Tensor> {
  const [nSamples, , nSlices] = sampleDims(X);
  checkPairing(estimators, nSlices);

  const output = new LazyOutput([nSamples, nSlices], 1);
  for (let i = 0; i < nSlices; i++) {
    const operation = applyOperation(estimators[i]!, method);
    output.write([null, i], await operation(X.take(2, i)));
  }
  return output.result();
}

/**
 * Score estimator `i` on slice `i` of `X` against `y`.
 * Returns `(s, ...)`, trailing axes taken from the first score.
 */
export async function scoreSameSlice(
  estimators: readonly Estimator[],
  X: Tensor,
  y: Tensor,
): Promise<Tensor> {
  const nSlices = sampleDims(X)[2];
  checkPairing(estimators, nSlices);

  const output = new LazyOutput([nSlices], 0);
  for (let i = 0; i < nSlices; i++) {
    const score = scoreOperation(estimators[i]!);
    output.write([i], await score(X.take(2, i), y));
  }
  return output.result();
}
