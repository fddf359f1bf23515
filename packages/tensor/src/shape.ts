// ---------------------------------------------------------------------------
// Shape arithmetic (row-major)
// ---------------------------------------------------------------------------

import { TensorShapeError, type Shape } from './types.js';

/** Number of elements described by a shape. The empty shape holds one. */
export function sizeOf(shape: Shape): number {
  let size = 1;
  for (const dim of shape) size *= dim;
  return size;
}

/** Row-major strides, in elements. */
export function stridesOf(shape: Shape): number[] {
  const strides = new Array<number>(shape.length);
  let acc = 1;
  for (let d = shape.length - 1; d >= 0; d--) {
    strides[d] = acc;
    acc *= shape[d]!;
  }
  return strides;
}

export function shapesEqual(a: Shape, b: Shape): boolean {
  if (a.length !== b.length) return false;
  for (let d = 0; d < a.length; d++) {
    if (a[d] !== b[d]) return false;
  }
  return true;
}

export function formatShape(shape: Shape): string {
  return `(${shape.join(', ')})`;
}

/** Throw unless every dimension is a non-negative integer. */
export function assertValidShape(shape: Shape): void {
  for (const dim of shape) {
    if (!Number.isInteger(dim) || dim < 0) {
      throw new TensorShapeError(`Invalid shape ${formatShape(shape)}`);
    }
  }
}

/** Normalise a possibly negative axis against `ndim`. */
export function normalizeAxis(axis: number, ndim: number): number {
  const resolved = axis < 0 ? axis + ndim : axis;
  if (!Number.isInteger(resolved) || resolved < 0 || resolved >= ndim) {
    throw new TensorShapeError(`Axis ${axis} is out of bounds for rank ${ndim}`);
  }
  return resolved;
}

/**
 * Resolve a reshape target against a total size. At most one dimension may
 * be -1; it is inferred from the others.
 */
export function resolveReshape(target: Shape, size: number): number[] {
  const resolved = [...target];
  let inferred = -1;
  let known = 1;
  for (let d = 0; d < resolved.length; d++) {
    const dim = resolved[d]!;
    if (dim === -1) {
      if (inferred !== -1) {
        throw new TensorShapeError('Only one dimension can be inferred in reshape');
      }
      inferred = d;
    } else {
      known *= dim;
    }
  }
  if (inferred !== -1) {
    if (known === 0 || size % known !== 0) {
      throw new TensorShapeError(
        `Cannot reshape ${size} elements into ${formatShape(target)}`,
      );
    }
    resolved[inferred] = size / known;
  }
  assertValidShape(resolved);
  if (sizeOf(resolved) !== size) {
    throw new TensorShapeError(
      `Cannot reshape ${size} elements into ${formatShape(target)}`,
    );
  }
  return resolved;
}

/**
 * Advance a multi-index in row-major order over `shape`.
 * Returns false once the index wraps past the last element.
 */
export function advanceIndex(index: number[], shape: Shape): boolean {
  for (let d = shape.length - 1; d >= 0; d--) {
    const next = index[d]! + 1;
    if (next < shape[d]!) {
      index[d] = next;
      return true;
    }
    index[d] = 0;
  }
  return false;
}
