// ---------------------------------------------------------------------------
// Sliced ensemble: one model per slice, applied slice by slice
// ---------------------------------------------------------------------------

import { createLogger, getConfig, type Logger } from '@slicewise/config';
import { ConcurrentRunner, type TaskRunner } from '@slicewise/parallel';
import type { Tensor } from '@slicewise/tensor';
import { requireCapability, resolveApplyMethod } from './capability.js';
import { dispatchChunks, mergeChunks, type DispatchContext } from './coordinator.js';
import { NotFittedError, ShapeError } from './errors.js';
import { fitSlices } from './fitter.js';
import { applySameSlice, scoreSameSlice } from './same-slice.js';
import type { ApplyMethod, Estimator } from './types.js';
import { checkSamples, parseJobCount, sampleDims } from './validation.js';

export interface EnsembleOptions {
  /**
   * Worker count for fit, apply and score. Negative values count back from
   * the available cores (-1: all of them). Defaults to `SLICEWISE_N_JOBS`.
   */
  nJobs?: number;
  /** Execution substrate. Defaults to a `ConcurrentRunner`. */
  runner?: TaskRunner;
  logger?: Logger;
}

function elapsedMs(started: number): number {
  return Number((performance.now() - started).toFixed(1));
}

/**
 * Fits a clone of `baseEstimator` on every slice of a
 * `(n_samples, n_features, n_slices)` tensor, then applies estimator `i`
 * to slice `i` of new data.
 *
 * Fitting is partitioned across slices; inference across samples, so each
 * worker holds a sample chunk rather than a copy of the whole job. Scoring
 * reduces over samples and is partitioned across slices instead.
 *
 * @example
 * const ensemble = await new SlicedEnsemble(new LogisticRegression(), { nJobs: 2 }).fit(X, y);
 * const proba = await ensemble.predictProba(X); // (n_samples, n_slices, 2)
 */
export class SlicedEnsemble<E extends Estimator = Estimator> {
  readonly baseEstimator: E;
  readonly nJobs: number;
  protected readonly runner: TaskRunner;
  protected readonly logger: Logger;
  private fitted: Estimator[] | null = null;

  constructor(baseEstimator: E, options: EnsembleOptions = {}) {
    this.baseEstimator = baseEstimator;
    this.nJobs = options.nJobs === undefined ? getConfig().nJobs : parseJobCount(options.nJobs);
    this.runner = options.runner ?? new ConcurrentRunner();
    this.logger = options.logger ?? createLogger('slicewise:ensemble');
  }

  /** Fitted estimators in slice order; empty before `fit`. */
  get estimators(): readonly Estimator[] {
    return this.fitted ?? [];
  }

  get isFitted(): boolean {
    return this.fitted !== null;
  }

  /** Fit one clone per slice, replacing any previous fit. */
  async fit(X: Tensor, y: Tensor): Promise<this> {
    checkSamples(X, y);
    requireCapability(this.baseEstimator, 'fit');
    this.fitted = null;

    const context = this.context();
    const started = performance.now();
    const estimators = await fitSlices(this.baseEstimator, X, y, context);
    this.fitted = estimators;
    this.logger.debug('fit complete', {
      estimators: estimators.length,
      workers: context.workers,
      ms: elapsedMs(started),
    });
    return this;
  }

  async fitTransform(X: Tensor, y: Tensor): Promise<Tensor> {
    await this.fit(X, y);
    return this.transform(X);
  }

  /** Transform each slice with its estimator, through `predict` when the model has no `transform`. */
  transform(X: Tensor): Promise<Tensor> {
    return this.apply(X, 'transform');
  }

  predict(X: Tensor): Promise<Tensor> {
    return this.apply(X, 'predict');
  }

  predictProba(X: Tensor): Promise<Tensor> {
    return this.apply(X, 'predictProba');
  }

  decisionFunction(X: Tensor): Promise<Tensor> {
    return this.apply(X, 'decisionFunction');
  }

  /** Score of each estimator on its own slice against `y`. */
  async score(X: Tensor, y: Tensor): Promise<Tensor> {
    checkSamples(X, y);
    const estimators = this.requireFitted('score');
    requireCapability(this.baseEstimator, 'score');
    this.checkSliceCount(X, estimators);

    const started = performance.now();
    const out = await this.scoreSlices(estimators, X, y, this.context());
    this.logger.debug('score complete', { shape: out.shape, ms: elapsedMs(started) });
    return out;
  }

  protected async apply(X: Tensor, method: ApplyMethod): Promise<Tensor> {
    checkSamples(X);
    const estimators = this.requireFitted(method);
    const resolved = resolveApplyMethod(this.baseEstimator, method);
    this.checkSliceCount(X, estimators);

    const started = performance.now();
    const out = await this.applySlices(estimators, X, resolved, this.context());
    this.logger.debug(`${method} complete`, {
      method: resolved,
      shape: out.shape,
      ms: elapsedMs(started),
    });
    return out;
  }

  protected checkSliceCount(X: Tensor, estimators: readonly Estimator[]): void {
    const nSlices = sampleDims(X)[2];
    if (nSlices !== estimators.length) {
      throw new ShapeError(
        `The number of estimators (${estimators.length}) does not match X.shape[2] (${nSlices})`,
      );
    }
  }

  protected async applySlices(
    estimators: readonly Estimator[],
    X: Tensor,
    method: ApplyMethod,
    context: DispatchContext,
  ): Promise<Tensor> {
    const chunks = await dispatchChunks(context, method, 'samples', sampleDims(X)[0], (range) =>
      applySameSlice(estimators, X.slice(0, range.start, range.end), method),
    );
    return mergeChunks(chunks, 0);
  }

  protected async scoreSlices(
    estimators: readonly Estimator[],
    X: Tensor,
    y: Tensor,
    context: DispatchContext,
  ): Promise<Tensor> {
    const chunks = await dispatchChunks(context, 'score', 'slices', sampleDims(X)[2], (range) =>
      scoreSameSlice(
        estimators.slice(range.start, range.end),
        X.slice(2, range.start, range.end),
        y,
      ),
    );
    return mergeChunks(chunks, 0);
  }

  private requireFitted(operation: string): readonly Estimator[] {
    if (this.fitted === null) {
      throw new NotFittedError(operation);
    }
    return this.fitted;
  }

  private context(): DispatchContext {
    return {
      runner: this.runner,
      workers: this.runner.resolveWorkers(this.nJobs),
      logger: this.logger,
    };
  }
}
