// ---------------------------------------------------------------------------
// Capability queries and operation handles
// ---------------------------------------------------------------------------

import { Tensor } from '@slicewise/tensor';
import { CapabilityError, ShapeError } from './errors.js';
import type {
  ApplyMethod,
  ApplyOperation,
  Capability,
  Estimator,
  ModelOutput,
  ScoreOperation,
} from './types.js';

/** True when the model exposes `kind` as a callable operation. */
export function hasCapability(estimator: Estimator, kind: Capability): boolean {
  return typeof estimator[kind] === 'function';
}

/** Throw `CapabilityError` unless the model exposes `kind`. */
export function requireCapability(estimator: Estimator, kind: Capability): void {
  if (!hasCapability(estimator, kind)) {
    throw new CapabilityError(kind);
  }
}

/**
 * Pick the operation actually called for `method`. A model without
 * `transform` is transformed through `predict`; nothing else falls back.
 */
export function resolveApplyMethod(estimator: Estimator, method: ApplyMethod): ApplyMethod {
  const resolved = method === 'transform' && !hasCapability(estimator, 'transform') ? 'predict' : method;
  requireCapability(estimator, resolved);
  return resolved;
}

/** Normalise a model result to a tensor; bare numbers become rank-0. */
export function toTensor(output: ModelOutput): Tensor {
  if (typeof output === 'number') return Tensor.scalar(output);
  if (output instanceof Tensor) return output;
  throw new ShapeError('Model operations must return a Tensor or a number');
}

export function applyOperation(estimator: Estimator, method: ApplyMethod): ApplyOperation {
  const operation = estimator[method];
  if (operation === undefined) {
    throw new CapabilityError(method);
  }
  return async (X) => toTensor(await operation.call(estimator, X));
}

export function scoreOperation(estimator: Estimator): ScoreOperation {
  const operation = estimator.score;
  if (operation === undefined) {
    throw new CapabilityError('score');
  }
  return async (X, y) => toTensor(await operation.call(estimator, X, y));
}
