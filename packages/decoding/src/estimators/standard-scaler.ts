// ---------------------------------------------------------------------------
// Per-feature standardisation: (x - mean) / std
// ---------------------------------------------------------------------------

import { Tensor } from '@slicewise/tensor';
import type { Estimator } from '../types.js';
import { matrixDims } from './matrix.js';

/**
 * Learns per-feature mean and population standard deviation. Constant
 * features keep a unit scale. Transform-only: there is no `predict`.
 */
export class StandardScaler implements Estimator {
  private mean: Float64Array | null = null;
  private scale: Float64Array | null = null;

  clone(): StandardScaler {
    return new StandardScaler();
  }

  fit(X: Tensor): this {
    const [n, f] = matrixDims('StandardScaler', X);
    const mean = new Float64Array(f);
    const scale = new Float64Array(f);

    for (let i = 0; i < n; i++) {
      for (let j = 0; j < f; j++) mean[j]! += X.data[i * f + j]! / n;
    }
    for (let i = 0; i < n; i++) {
      for (let j = 0; j < f; j++) {
        const d = X.data[i * f + j]! - mean[j]!;
        scale[j]! += (d * d) / n;
      }
    }
    for (let j = 0; j < f; j++) {
      const std = Math.sqrt(scale[j]!);
      scale[j] = std > 0 ? std : 1;
    }

    this.mean = mean;
    this.scale = scale;
    return this;
  }

  /** Standardised copy of `X`, shape `(n, f)`. */
  transform(X: Tensor): Tensor {
    if (this.mean === null || this.scale === null) {
      throw new Error('StandardScaler is not fitted');
    }
    const [n, f] = matrixDims('StandardScaler', X, this.mean.length);
    const out = new Float64Array(n * f);
    for (let i = 0; i < n; i++) {
      for (let j = 0; j < f; j++) {
        out[i * f + j] = (X.data[i * f + j]! - this.mean[j]!) / this.scale[j]!;
      }
    }
    return new Tensor(out, [n, f]);
  }
}
