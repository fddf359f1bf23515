// ---------------------------------------------------------------------------
// Binary logistic regression
// P(y = positive | x) = σ(w·x + b), fitted by batch gradient descent on the
// mean log-loss with an optional L2 penalty on w.
// ---------------------------------------------------------------------------

import { Tensor, type DType } from '@slicewise/tensor';
import type { Estimator } from '../types.js';
import { checkTargets, matrixDims } from './matrix.js';

export interface LogisticRegressionOptions {
  learningRate?: number;
  maxIter?: number;
  /** L2 penalty weight on the coefficients (not the intercept). */
  l2?: number;
}

interface FittedState {
  weights: Float64Array;
  bias: number;
  /** `[negative, positive]` labels, ascending. */
  classes: [number, number];
  labelDtype: DType;
}

/** σ(x) = 1 / (1 + exp(-x)), stable for large |x|. */
function sigmoid(x: number): number {
  if (x >= 0) {
    return 1 / (1 + Math.exp(-x));
  }
  const ex = Math.exp(x);
  return ex / (1 + ex);
}

export class LogisticRegression implements Estimator {
  readonly learningRate: number;
  readonly maxIter: number;
  readonly l2: number;
  private state: FittedState | null = null;

  constructor(options: LogisticRegressionOptions = {}) {
    this.learningRate = options.learningRate ?? 0.1;
    this.maxIter = options.maxIter ?? 200;
    this.l2 = options.l2 ?? 0;
  }

  clone(): LogisticRegression {
    return new LogisticRegression({
      learningRate: this.learningRate,
      maxIter: this.maxIter,
      l2: this.l2,
    });
  }

  fit(X: Tensor, y: Tensor): this {
    const [n, f] = matrixDims('LogisticRegression', X);
    checkTargets('LogisticRegression', y, n);

    const classes = [...new Set(y.toArray())].sort((a, b) => a - b);
    if (classes.length !== 2) {
      throw new Error(`LogisticRegression needs exactly two classes, got ${classes.length}`);
    }
    const positive = classes[1]!;
    const targets = new Float64Array(n);
    for (let i = 0; i < n; i++) {
      targets[i] = y.data[i] === positive ? 1 : 0;
    }

    const weights = new Float64Array(f);
    const gradW = new Float64Array(f);
    let bias = 0;

    for (let iter = 0; iter < this.maxIter; iter++) {
      gradW.fill(0);
      let gradB = 0;

      for (let i = 0; i < n; i++) {
        let z = bias;
        for (let j = 0; j < f; j++) z += weights[j]! * X.data[i * f + j]!;
        // d(log-loss)/dz = σ(z) - t
        const diff = sigmoid(z) - targets[i]!;
        for (let j = 0; j < f; j++) gradW[j]! += diff * X.data[i * f + j]!;
        gradB += diff;
      }

      for (let j = 0; j < f; j++) {
        weights[j]! -= this.learningRate * (gradW[j]! / n + this.l2 * weights[j]!);
      }
      bias -= (this.learningRate * gradB) / n;
    }

    this.state = {
      weights,
      bias,
      classes: [classes[0]!, positive],
      labelDtype: y.dtype,
    };
    return this;
  }

  /** Signed distance `w·x + b`, shape `(n,)`. */
  decisionFunction(X: Tensor): Tensor {
    const { weights, bias } = this.fittedState();
    const [n, f] = matrixDims('LogisticRegression', X, weights.length);
    const out = new Float64Array(n);
    for (let i = 0; i < n; i++) {
      let z = bias;
      for (let j = 0; j < f; j++) z += weights[j]! * X.data[i * f + j]!;
      out[i] = z;
    }
    return new Tensor(out, [n]);
  }

  /** Class probabilities, shape `(n, 2)`, columns in ascending label order. */
  predictProba(X: Tensor): Tensor {
    const scores = this.decisionFunction(X);
    const n = scores.size;
    const out = new Float64Array(n * 2);
    for (let i = 0; i < n; i++) {
      const p = sigmoid(scores.data[i]!);
      out[2 * i] = 1 - p;
      out[2 * i + 1] = p;
    }
    return new Tensor(out, [n, 2]);
  }

  /** Predicted labels, shape `(n,)`, in the dtype of the training targets. */
  predict(X: Tensor): Tensor {
    const { classes, labelDtype } = this.fittedState();
    const scores = this.decisionFunction(X);
    const labels = scores.toArray().map((z) => (z >= 0 ? classes[1] : classes[0]));
    return Tensor.fromArray(labels, [labels.length], labelDtype);
  }

  /** Mean accuracy of `predict(X)` against `y`. */
  score(X: Tensor, y: Tensor): number {
    const predicted = this.predict(X);
    checkTargets('LogisticRegression', y, predicted.size);
    let correct = 0;
    for (let i = 0; i < predicted.size; i++) {
      if (predicted.data[i] === y.data[i]) correct++;
    }
    return correct / predicted.size;
  }

  private fittedState(): FittedState {
    if (this.state === null) {
      throw new Error('LogisticRegression is not fitted');
    }
    return this.state;
  }
}
