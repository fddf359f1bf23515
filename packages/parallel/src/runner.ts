// ---------------------------------------------------------------------------
// Task runners: ordered execution of deferred calls
// ---------------------------------------------------------------------------

import { availableParallelism } from 'node:os';
import { acquireWorker, createPoolState, releaseWorker } from './worker-pool.js';

/** A zero-argument deferred call. */
export type Task<T> = () => T | Promise<T>;

/**
 * Work-distribution primitive: runs a list of deferred calls and resolves
 * with their results in input order, whatever order they finish in.
 */
export interface TaskRunner {
  /**
   * Map a configured job count to a concrete worker count. Negative counts
   * are relative to the available cores (-1 is all of them, -2 all but one).
   */
  resolveWorkers(nJobs: number): number;
  run<T>(tasks: ReadonlyArray<Task<T>>, workers: number): Promise<T[]>;
}

/** Shared job-count resolution. `0` is not a worker count. */
export function resolveWorkerCount(nJobs: number, available: number): number {
  if (!Number.isInteger(nJobs) || nJobs === 0) {
    throw new RangeError(`nJobs must be a non-zero integer, got ${nJobs}`);
  }
  if (nJobs > 0) return nJobs;
  return Math.max(1, available + 1 + nJobs);
}

async function runSequentially<T>(tasks: ReadonlyArray<Task<T>>): Promise<T[]> {
  const results: T[] = [];
  for (const task of tasks) {
    results.push(await task());
  }
  return results;
}

/** Runs every call in order on the caller's turn; ignores the worker count. */
export class SequentialRunner implements TaskRunner {
  resolveWorkers(nJobs: number): number {
    resolveWorkerCount(nJobs, 1);
    return 1;
  }

  run<T>(tasks: ReadonlyArray<Task<T>>): Promise<T[]> {
    return runSequentially(tasks);
  }
}

export interface ConcurrentRunnerOptions {
  /** Core count used to resolve negative job counts. Defaults to the host's. */
  available?: number;
}

/**
 * Keeps up to `workers` calls in flight. Results are stored by input index.
 *
 * When a call fails, no further calls are started; the runner waits for the
 * ones already in flight and then rejects with the first failure.
 */
export class ConcurrentRunner implements TaskRunner {
  private readonly available: number;

  constructor(options: ConcurrentRunnerOptions = {}) {
    this.available = options.available ?? availableParallelism();
  }

  resolveWorkers(nJobs: number): number {
    return resolveWorkerCount(nJobs, this.available);
  }

  async run<T>(tasks: ReadonlyArray<Task<T>>, workers: number): Promise<T[]> {
    if (workers <= 1 || tasks.length <= 1) {
      return runSequentially(tasks);
    }

    const pool = createPoolState(Math.min(workers, tasks.length));
    const results = new Array<T>(tasks.length);
    const inFlight = new Set<Promise<void>>();
    let failed = false;
    let firstError: unknown;

    for (let index = 0; index < tasks.length && !failed; index++) {
      let workerId = acquireWorker(pool);
      while (workerId === null) {
        await Promise.race(inFlight);
        workerId = acquireWorker(pool);
      }
      if (failed) {
        releaseWorker(pool, workerId);
        break;
      }

      const task = tasks[index]!;
      const slot = workerId;
      const settled: Promise<void> = Promise.resolve()
        .then(task)
        .then(
          (value) => {
            results[index] = value;
          },
          (error: unknown) => {
            if (!failed) {
              failed = true;
              firstError = error;
            }
          },
        )
        .finally(() => {
          releaseWorker(pool, slot);
          inFlight.delete(settled);
        });
      inFlight.add(settled);
    }

    await Promise.all(inFlight);
    if (failed) {
      throw firstError;
    }
    return results;
  }
}
