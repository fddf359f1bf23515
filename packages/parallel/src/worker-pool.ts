// ---------------------------------------------------------------------------
// Worker pool bookkeeping and work partitioning
// ---------------------------------------------------------------------------
// Pure state management: which worker slots are busy, and how a contiguous
// axis is cut into ordered chunks. The runners in ./runner.ts drive it.
// ---------------------------------------------------------------------------

/** State of the worker pool. */
export type PoolState = {
  workers: Array<{ id: number; busy: boolean }>;
  idleCount: number;
};

/** Half-open index range `[start, end)` along a partitioned axis. */
export type ChunkRange = {
  index: number;
  start: number;
  end: number;
};

/**
 * Create a pool state with `size` workers, all initially idle.
 */
export function createPoolState(size: number): PoolState {
  if (size < 1) {
    throw new RangeError('Pool size must be at least 1');
  }
  const workers: Array<{ id: number; busy: boolean }> = [];
  for (let i = 0; i < size; i++) {
    workers.push({ id: i, busy: false });
  }
  return { workers, idleCount: size };
}

/**
 * Acquire an idle worker from the pool.
 * Returns the worker index, or null if all workers are busy.
 */
export function acquireWorker(pool: PoolState): number | null {
  for (const worker of pool.workers) {
    if (!worker.busy) {
      worker.busy = true;
      pool.idleCount--;
      return worker.id;
    }
  }
  return null;
}

/**
 * Release a worker back to the idle pool.
 */
export function releaseWorker(pool: PoolState, workerId: number): void {
  const worker = pool.workers[workerId];
  if (worker === undefined) {
    throw new RangeError(`Worker ${workerId} does not exist in pool`);
  }
  if (!worker.busy) {
    return; // already idle
  }
  worker.busy = false;
  pool.idleCount++;
}

/**
 * Cut `[0, length)` into at most `numChunks` ordered, contiguous,
 * non-overlapping ranges. Every range but the last has
 * `floor(length / chunks)` elements; the last absorbs the remainder.
 * Never produces an empty range; returns `[]` for an empty axis.
 */
export function splitRanges(length: number, numChunks: number): ChunkRange[] {
  if (!Number.isInteger(numChunks) || numChunks < 1) {
    throw new RangeError('numChunks must be a positive integer');
  }
  if (length <= 0) {
    return [];
  }

  const chunks = Math.min(numChunks, length);
  const baseSize = Math.floor(length / chunks);
  const ranges: ChunkRange[] = [];
  for (let i = 0; i < chunks; i++) {
    const start = i * baseSize;
    const end = i === chunks - 1 ? length : start + baseSize;
    ranges.push({ index: i, start, end });
  }
  return ranges;
}
