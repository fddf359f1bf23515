// ---------------------------------------------------------------------------
// @slicewise/parallel: ordered task execution and axis partitioning
// ---------------------------------------------------------------------------

export type { ChunkRange, PoolState } from './worker-pool.js';
export {
  createPoolState,
  acquireWorker,
  releaseWorker,
  splitRanges,
} from './worker-pool.js';

export type { Task, TaskRunner, ConcurrentRunnerOptions } from './runner.js';
export {
  ConcurrentRunner,
  SequentialRunner,
  resolveWorkerCount,
} from './runner.js';
