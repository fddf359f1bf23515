// ---------------------------------------------------------------------------
// @slicewise/decoding: Core Types
// ---------------------------------------------------------------------------

import type { Tensor } from '@slicewise/tensor';

export type MaybePromise<T> = T | Promise<T>;

/** What a model operation may hand back: a tensor, or a bare scalar. */
export type ModelOutput = Tensor | number;

/** Per-sample inference operations an ensemble can apply slice by slice. */
export type ApplyMethod = 'transform' | 'predict' | 'predictProba' | 'decisionFunction';

/** Every operation a model may expose. */
export type Capability = 'fit' | ApplyMethod | 'score';

/**
 * Model contract. Only `fit` and `clone` are required; the engine queries
 * the optional operations through `hasCapability` before calling them.
 *
 * Inference operations take a `(n_samples, n_features)` matrix and return
 * a result whose leading dimension is `n_samples`. Operations may be
 * synchronous or return promises.
 */
export interface Estimator {
  /** Fresh, unfitted copy with the same hyper-parameters. */
  clone(): Estimator;
  fit(X: Tensor, y: Tensor): MaybePromise<unknown>;
  transform?(X: Tensor): MaybePromise<ModelOutput>;
  predict?(X: Tensor): MaybePromise<ModelOutput>;
  predictProba?(X: Tensor): MaybePromise<ModelOutput>;
  decisionFunction?(X: Tensor): MaybePromise<ModelOutput>;
  score?(X: Tensor, y: Tensor): MaybePromise<ModelOutput>;
}

/** Typed handle on a resolved inference operation. */
export type ApplyOperation = (X: Tensor) => Promise<Tensor>;

/** Typed handle on a resolved scoring operation. */
export type ScoreOperation = (X: Tensor, y: Tensor) => Promise<Tensor>;
