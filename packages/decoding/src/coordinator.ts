// ---------------------------------------------------------------------------
// Parallel split coordination
// ---------------------------------------------------------------------------

import type { Logger } from '@slicewise/config';
import { splitRanges, type ChunkRange, type TaskRunner } from '@slicewise/parallel';
import { concatenate, formatShape, type Tensor } from '@slicewise/tensor';
import { ShapeError } from './errors.js';
import type { MaybePromise } from './types.js';

/** Which axis of the sample tensor a dispatch cuts into chunks. */
export type PartitionAxis = 'samples' | 'slices';

export interface DispatchContext {
  runner: TaskRunner;
  /** Resolved worker count; also the maximum number of chunks. */
  workers: number;
  logger: Logger;
}

/**
 * Cut `[0, length)` into contiguous chunks, run `work` once per chunk
 * through the runner and resolve with the chunk results in partition order.
 */
export async function dispatchChunks<T>(
  context: DispatchContext,
  operation: string,
  axis: PartitionAxis,
  length: number,
  work: (range: ChunkRange) => MaybePromise<T>,
): Promise<T[]> {
  const ranges = splitRanges(length, context.workers);
  context.logger.debug('dispatch', {
    operation,
    axis,
    length,
    workers: context.workers,
    chunks: ranges.length,
  });
  return context.runner.run(
    ranges.map((range) => () => work(range)),
    context.workers,
  );
}

/**
 * Concatenate chunk results along `axis`. A single chunk is returned as is.
 * Chunks must agree on every other dimension.
 */
export function mergeChunks(chunks: readonly Tensor[], axis: number): Tensor {
  const first = chunks[0];
  if (first === undefined) {
    throw new ShapeError('No chunk produced a result');
  }
  if (chunks.length === 1) return first;

  for (const chunk of chunks) {
    const agrees =
      chunk.ndim === first.ndim &&
      chunk.shape.every((dim, d) => d === axis || dim === first.shape[d]);
    if (!agrees) {
      throw new ShapeError(
        `Chunk result of shape ${formatShape(chunk.shape)} cannot be merged with ` +
          `${formatShape(first.shape)} along axis ${axis}`,
      );
    }
  }
  return concatenate(chunks, axis);
}
