// ---------------------------------------------------------------------------
// @slicewise/tensor: Type Definitions
// ---------------------------------------------------------------------------

/** Element type of a tensor's backing store. */
export type DType = 'float64' | 'float32' | 'int32';

/** Typed array backing a tensor, row-major. */
export type DataArray = Float64Array | Float32Array | Int32Array;

export type Shape = readonly number[];

/** Arbitrarily nested number arrays, as produced by `Tensor.toNested()`. */
export type NestedArray = number | NestedArray[];

/**
 * Selector for `Tensor.assign`: one entry per leading axis. A number pins
 * the axis to that index; `null` keeps the whole axis (a bare `:` in slice notation).
 * Axes past the end of the selector are kept whole.
 */
export type AxisSelector = ReadonlyArray<number | null>;

/** Error for any shape or index violation raised by tensor operations. */
export class TensorShapeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TensorShapeError';
  }
}

/** Allocate a zero-filled backing store of the given dtype. */
export function createData(dtype: DType, size: number): DataArray {
  switch (dtype) {
    case 'float64':
      return new Float64Array(size);
    case 'float32':
      return new Float32Array(size);
    case 'int32':
      return new Int32Array(size);
  }
}

/** Recover the dtype of a backing store. */
export function dtypeOf(data: DataArray): DType {
  if (data instanceof Float32Array) return 'float32';
  if (data instanceof Int32Array) return 'int32';
  return 'float64';
}
