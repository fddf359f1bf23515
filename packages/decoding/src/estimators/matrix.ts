import { formatShape, type Tensor } from '@slicewise/tensor';

/** `[n_samples, n_features]` of a design matrix, or throw naming the model. */
export function matrixDims(model: string, X: Tensor, nFeatures?: number): [number, number] {
  if (X.ndim !== 2) {
    throw new Error(`${model} expects a 2-dimensional X, got shape ${formatShape(X.shape)}`);
  }
  const n = X.shape[0] ?? 0;
  const f = X.shape[1] ?? 0;
  if (nFeatures !== undefined && f !== nFeatures) {
    throw new Error(`${model} was fitted with ${nFeatures} features, got ${f}`);
  }
  return [n, f];
}

export function checkTargets(model: string, y: Tensor, nSamples: number): void {
  if (y.ndim !== 1 || y.size !== nSamples) {
    throw new Error(`${model} expects ${nSamples} targets, got shape ${formatShape(y.shape)}`);
  }
}
