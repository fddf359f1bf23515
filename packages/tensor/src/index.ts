// ---------------------------------------------------------------------------
// @slicewise/tensor: Dense N-dimensional tensors
// ---------------------------------------------------------------------------

export type { AxisSelector, DataArray, DType, NestedArray, Shape } from './types.js';
export { TensorShapeError, createData, dtypeOf } from './types.js';

export {
  advanceIndex,
  formatShape,
  normalizeAxis,
  resolveReshape,
  shapesEqual,
  sizeOf,
  stridesOf,
} from './shape.js';

export { Tensor, tensor, concatenate } from './tensor.js';
