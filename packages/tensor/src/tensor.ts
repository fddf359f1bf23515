// ---------------------------------------------------------------------------
// @slicewise/tensor: Dense N-dimensional tensor
// Row-major typed-array storage. Every shape operation returns a fresh copy;
// `assign` and `set` are the only in-place writes.
// ---------------------------------------------------------------------------

import {
  advanceIndex,
  assertValidShape,
  formatShape,
  normalizeAxis,
  resolveReshape,
  shapesEqual,
  sizeOf,
  stridesOf,
} from './shape.js';
import {
  createData,
  dtypeOf,
  TensorShapeError,
  type AxisSelector,
  type DataArray,
  type DType,
  type NestedArray,
  type Shape,
} from './types.js';

export class Tensor {
  readonly data: DataArray;
  readonly shape: Shape;
  readonly strides: readonly number[];
  readonly dtype: DType;

  constructor(data: DataArray, shape: Shape) {
    assertValidShape(shape);
    if (sizeOf(shape) !== data.length) {
      throw new TensorShapeError(
        `Shape ${formatShape(shape)} needs ${sizeOf(shape)} elements, got ${data.length}`,
      );
    }
    this.data = data;
    this.shape = Object.freeze([...shape]);
    this.strides = Object.freeze(stridesOf(shape));
    this.dtype = dtypeOf(data);
  }

  static zeros(shape: Shape, dtype: DType = 'float64'): Tensor {
    assertValidShape(shape);
    return new Tensor(createData(dtype, sizeOf(shape)), shape);
  }

  static fromArray(values: ArrayLike<number>, shape: Shape, dtype: DType = 'float64'): Tensor {
    assertValidShape(shape);
    const data = createData(dtype, values.length);
    data.set(values);
    return new Tensor(data, shape);
  }

  /** Rank-0 tensor holding a single value. */
  static scalar(value: number, dtype: DType = 'float64'): Tensor {
    return Tensor.fromArray([value], [], dtype);
  }

  get ndim(): number {
    return this.shape.length;
  }

  get size(): number {
    return this.data.length;
  }

  get(...index: number[]): number {
    return this.data[this.offsetOf(index)]!;
  }

  set(index: readonly number[], value: number): void {
    this.data[this.offsetOf(index)] = value;
  }

  /** Reshape to `shape`; one dimension may be -1. */
  reshape(shape: Shape): Tensor {
    return new Tensor(this.data.slice(), resolveReshape(shape, this.size));
  }

  /** Permute axes. Without `axes`, reverses them (matrix transpose for rank 2). */
  transpose(axes?: readonly number[]): Tensor {
    const ndim = this.ndim;
    const perm = axes
      ? axes.map((axis) => normalizeAxis(axis, ndim))
      : Array.from({ length: ndim }, (_, d) => ndim - 1 - d);
    if (perm.length !== ndim || new Set(perm).size !== ndim) {
      throw new TensorShapeError(
        `Axes [${perm.join(', ')}] are not a permutation of rank ${ndim}`,
      );
    }

    const shape = perm.map((axis) => this.shape[axis]!);
    const sourceStrides = perm.map((axis) => this.strides[axis]!);
    const out = createData(this.dtype, this.size);
    if (this.size === 0) return new Tensor(out, shape);

    const index = new Array<number>(ndim).fill(0);
    let o = 0;
    do {
      let src = 0;
      for (let d = 0; d < ndim; d++) src += index[d]! * sourceStrides[d]!;
      out[o++] = this.data[src]!;
    } while (advanceIndex(index, shape));
    return new Tensor(out, shape);
  }

  /** Copy of the half-open range `[start, end)` along `axis`. */
  slice(axis: number, start: number, end: number): Tensor {
    const ax = normalizeAxis(axis, this.ndim);
    const length = this.shape[ax]!;
    if (!Number.isInteger(start) || !Number.isInteger(end) || start < 0 || end > length || start > end) {
      throw new TensorShapeError(
        `Range [${start}, ${end}) is out of bounds for axis ${ax} of length ${length}`,
      );
    }

    const outer = sizeOf(this.shape.slice(0, ax));
    const inner = sizeOf(this.shape.slice(ax + 1));
    const block = (end - start) * inner;
    const out = createData(this.dtype, outer * block);
    for (let o = 0; o < outer; o++) {
      const from = (o * length + start) * inner;
      out.set(this.data.subarray(from, from + block), o * block);
    }

    const shape = [...this.shape];
    shape[ax] = end - start;
    return new Tensor(out, shape);
  }

  /** Copy of one index along `axis`, with that axis dropped (`X[..., i]`). */
  take(axis: number, index: number): Tensor {
    const ax = normalizeAxis(axis, this.ndim);
    const length = this.shape[ax]!;
    if (!Number.isInteger(index) || index < 0 || index >= length) {
      throw new TensorShapeError(`Index ${index} is out of bounds for axis ${ax} of length ${length}`);
    }
    const picked = this.slice(ax, index, index + 1);
    return new Tensor(picked.data, this.shape.filter((_, d) => d !== ax));
  }

  /**
   * Write `value` into the region picked by `selector`. The value's shape
   * must equal the shape of the kept axes, in order.
   */
  assign(selector: AxisSelector, value: Tensor): void {
    if (selector.length > this.ndim) {
      throw new TensorShapeError(
        `Selector of length ${selector.length} is too long for rank ${this.ndim}`,
      );
    }

    const freeAxes: number[] = [];
    let base = 0;
    for (let d = 0; d < this.ndim; d++) {
      const pick = selector[d];
      if (pick === null || pick === undefined) {
        freeAxes.push(d);
        continue;
      }
      const length = this.shape[d]!;
      if (!Number.isInteger(pick) || pick < 0 || pick >= length) {
        throw new TensorShapeError(`Index ${pick} is out of bounds for axis ${d} of length ${length}`);
      }
      base += pick * this.strides[d]!;
    }

    const region = freeAxes.map((d) => this.shape[d]!);
    if (!shapesEqual(region, value.shape)) {
      throw new TensorShapeError(
        `Cannot assign shape ${formatShape(value.shape)} into a region of shape ${formatShape(region)}`,
      );
    }
    if (value.size === 0) return;

    const freeStrides = freeAxes.map((d) => this.strides[d]!);
    const index = new Array<number>(region.length).fill(0);
    let i = 0;
    do {
      let dest = base;
      for (let k = 0; k < index.length; k++) dest += index[k]! * freeStrides[k]!;
      this.data[dest] = value.data[i++]!;
    } while (advanceIndex(index, region));
  }

  /** Flat row-major copy of the values. */
  toArray(): number[] {
    return Array.from(this.data);
  }

  toNested(): NestedArray {
    const build = (axis: number, offset: number): NestedArray => {
      if (axis === this.ndim) return this.data[offset]!;
      const rows: NestedArray[] = [];
      for (let i = 0; i < this.shape[axis]!; i++) {
        rows.push(build(axis + 1, offset + i * this.strides[axis]!));
      }
      return rows;
    };
    return build(0, 0);
  }

  private offsetOf(index: readonly number[]): number {
    if (index.length !== this.ndim) {
      throw new TensorShapeError(`Expected ${this.ndim} indices, got ${index.length}`);
    }
    let offset = 0;
    for (let d = 0; d < index.length; d++) {
      const i = index[d]!;
      if (!Number.isInteger(i) || i < 0 || i >= this.shape[d]!) {
        throw new TensorShapeError(`Index ${i} is out of bounds for axis ${d} of length ${this.shape[d]}`);
      }
      offset += i * this.strides[d]!;
    }
    return offset;
  }
}

/** Build a tensor from (possibly nested) number arrays. */
export function tensor(values: NestedArray, dtype: DType = 'float64'): Tensor {
  const shape: number[] = [];
  let probe: NestedArray = values;
  while (Array.isArray(probe)) {
    shape.push(probe.length);
    if (probe.length === 0) break;
    probe = probe[0]!;
  }

  const flat: number[] = [];
  const visit = (node: NestedArray, depth: number): void => {
    if (depth === shape.length) {
      if (Array.isArray(node)) {
        throw new TensorShapeError('Ragged nested array cannot form a tensor');
      }
      flat.push(node);
      return;
    }
    if (!Array.isArray(node) || node.length !== shape[depth]) {
      throw new TensorShapeError('Ragged nested array cannot form a tensor');
    }
    for (const child of node) visit(child, depth + 1);
  };
  visit(values, 0);

  return Tensor.fromArray(flat, shape, dtype);
}

/**
 * Join tensors along `axis`. All inputs must agree on every other
 * dimension; the result takes the first tensor's dtype.
 */
export function concatenate(tensors: readonly Tensor[], axis = 0): Tensor {
  const first = tensors[0];
  if (first === undefined) {
    throw new TensorShapeError('Need at least one tensor to concatenate');
  }
  const ax = normalizeAxis(axis, first.ndim);

  let total = 0;
  for (const t of tensors) {
    if (t.ndim !== first.ndim) {
      throw new TensorShapeError(
        `Cannot concatenate rank ${t.ndim} with rank ${first.ndim}`,
      );
    }
    for (let d = 0; d < first.ndim; d++) {
      if (d !== ax && t.shape[d] !== first.shape[d]) {
        throw new TensorShapeError(
          `Cannot concatenate ${formatShape(t.shape)} with ${formatShape(first.shape)} along axis ${ax}`,
        );
      }
    }
    total += t.shape[ax]!;
  }

  const shape = [...first.shape];
  shape[ax] = total;
  const outer = sizeOf(first.shape.slice(0, ax));
  const inner = sizeOf(first.shape.slice(ax + 1));
  const out = createData(first.dtype, sizeOf(shape));

  let offset = 0;
  for (let o = 0; o < outer; o++) {
    for (const t of tensors) {
      const block = t.shape[ax]! * inner;
      out.set(t.data.subarray(o * block, (o + 1) * block), offset);
      offset += block;
    }
  }
  return new Tensor(out, shape);
}
