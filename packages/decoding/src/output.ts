// ---------------------------------------------------------------------------
// Output shape inference
// ---------------------------------------------------------------------------
// A model's inference output may be a scalar, a vector or a higher-rank
// array, and nothing says which until the model has run once. Outputs are
// therefore allocated from the first unit result and every later unit must
// fit the allocation exactly.
// ---------------------------------------------------------------------------

import {
  Tensor,
  formatShape,
  shapesEqual,
  type AxisSelector,
  type Shape,
} from '@slicewise/tensor';
import { ShapeError } from './errors.js';

/**
 * Zeros of shape `[...leading, ...trailing]`, where `trailing` is the first
 * result's shape minus its `consumed` leading axes. The dtype follows the
 * first result.
 */
export function allocateOutput(first: Tensor, leading: Shape, consumed: number): Tensor {
  if (first.ndim < consumed) {
    throw new ShapeError(
      `Expected a result of rank ${consumed} or more, got shape ${formatShape(first.shape)}`,
    );
  }
  return Tensor.zeros([...leading, ...first.shape.slice(consumed)], first.dtype);
}

/**
 * Write one unit result at its offset. Its shape must match the allocation
 * and its dtype the output's.
 */
export function writeUnit(out: Tensor, selector: AxisSelector, value: Tensor): void {
  if (value.dtype !== out.dtype) {
    throw new ShapeError(
      `Result of dtype ${value.dtype} does not match ${out.dtype} allocated from the first result`,
    );
  }
  const region = out.shape.filter((_, d) => selector[d] === null || selector[d] === undefined);
  if (!shapesEqual(region, value.shape)) {
    throw new ShapeError(
      `Result of shape ${formatShape(value.shape)} does not match ${formatShape(region)} ` +
        'allocated from the first result',
    );
  }
  out.assign(selector, value);
}

/** Output tensor allocated on its first write. */
export class LazyOutput {
  private out: Tensor | null = null;

  constructor(
    private readonly leading: Shape,
    private readonly consumed: number,
  ) {}

  write(selector: AxisSelector, value: Tensor): void {
    this.out ??= allocateOutput(value, this.leading, this.consumed);
    writeUnit(this.out, selector, value);
  }

  result(): Tensor {
    if (this.out === null) {
      throw new ShapeError('No unit produced a result');
    }
    return this.out;
  }
}
