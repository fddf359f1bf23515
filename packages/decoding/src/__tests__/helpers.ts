// ---------------------------------------------------------------------------
// Test fixtures: deterministic probe models and datasets
// ---------------------------------------------------------------------------

import { createLogger, type Logger } from '@slicewise/config';
import type { Task, TaskRunner } from '@slicewise/parallel';
import { Tensor } from '@slicewise/tensor';
import type { SlicedEnsemble } from '../sliced-ensemble.js';
import type { Estimator } from '../types.js';

/** Seeded mulberry32 PRNG. */
export function createPRNG(seed: number): () => number {
  let s = seed | 0;
  return () => {
    s = (s + 0x6d2b79f5) | 0;
    let t = Math.imul(s ^ (s >>> 15), 1 | s);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** `(n, f, s)` tensor whose value at (i, j, k) is `100i + 10j + k`. */
export function gridTensor(n: number, f: number, s: number): Tensor {
  const out = Tensor.zeros([n, f, s]);
  for (let i = 0; i < n; i++) {
    for (let j = 0; j < f; j++) {
      for (let k = 0; k < s; k++) out.set([i, j, k], 100 * i + 10 * j + k);
    }
  }
  return out;
}

/** Alternating 0/1 targets of length `n`. */
export function alternatingTargets(n: number): Tensor {
  return Tensor.fromArray(
    Array.from({ length: n }, (_, i) => i % 2),
    [n],
    'int32',
  );
}

function rowSums(X: Tensor): number[] {
  const [n = 0, f = 0] = X.shape;
  const sums: number[] = [];
  for (let i = 0; i < n; i++) {
    let total = 0;
    for (let j = 0; j < f; j++) total += X.get(i, j);
    sums.push(total);
  }
  return sums;
}

export interface CallLog {
  fit: number;
  apply: number;
  score: number;
}

export function newCallLog(): CallLog {
  return { fit: 0, apply: 0, score: 0 };
}

/**
 * Deterministic model that remembers its training slice. `offset` is the
 * training slice's value at (0, 0), i.e. the slice index on a `gridTensor`.
 *
 * - predict:          rowSum + offset            `(n,)`
 * - predictProba:     [rowSum, offset]           `(n, 2)`
 * - decisionFunction: rowSum - offset            `(n,)`
 * - score:            mean(rowSum) + offset      scalar
 */
export class SliceProbe implements Estimator {
  fittedOn: Tensor | null = null;
  offset = 0;

  constructor(readonly calls: CallLog = newCallLog()) {}

  clone(): SliceProbe {
    return new SliceProbe(this.calls);
  }

  fit(X: Tensor): void {
    this.calls.fit++;
    this.fittedOn = X;
    this.offset = X.get(0, 0);
  }

  predict(X: Tensor): Tensor {
    this.calls.apply++;
    const sums = rowSums(X).map((v) => v + this.offset);
    return Tensor.fromArray(sums, [sums.length]);
  }

  predictProba(X: Tensor): Tensor {
    this.calls.apply++;
    const sums = rowSums(X);
    return Tensor.fromArray(
      sums.flatMap((v) => [v, this.offset]),
      [sums.length, 2],
    );
  }

  decisionFunction(X: Tensor): Tensor {
    this.calls.apply++;
    const sums = rowSums(X).map((v) => v - this.offset);
    return Tensor.fromArray(sums, [sums.length]);
  }

  score(X: Tensor): number {
    this.calls.score++;
    const sums = rowSums(X);
    return sums.reduce((a, b) => a + b, 0) / sums.length + this.offset;
  }
}

/** Probe whose `predictProba` width grows with its slice: `(n, offset + 1)`. */
export class WidthProbe extends SliceProbe {
  override clone(): WidthProbe {
    return new WidthProbe(this.calls);
  }

  override predictProba(X: Tensor): Tensor {
    const n = X.shape[0] ?? 0;
    return Tensor.zeros([n, this.offset + 1]);
  }
}

/** Probe exposing only `fit` and `predict`, both asynchronous. */
export class AsyncPredictor implements Estimator {
  private offset = 0;

  clone(): AsyncPredictor {
    return new AsyncPredictor();
  }

  async fit(X: Tensor): Promise<void> {
    await Promise.resolve();
    this.offset = X.get(0, 0);
  }

  async predict(X: Tensor): Promise<Tensor> {
    await Promise.resolve();
    const sums = rowSums(X).map((v) => v + this.offset);
    return Tensor.fromArray(sums, [sums.length]);
  }
}

/** Probe whose `fit` throws `error` on the slice whose offset is `failOn`. */
export class FailingProbe extends SliceProbe {
  constructor(
    private readonly error: Error,
    private readonly failOn: number,
  ) {
    super();
  }

  override clone(): FailingProbe {
    return new FailingProbe(this.error, this.failOn);
  }

  override fit(X: Tensor): void {
    if (X.get(0, 0) === this.failOn) throw this.error;
    super.fit(X);
  }
}

/** Runs tasks last-to-first, storing results by index. */
export class ReversingRunner implements TaskRunner {
  readonly batches: number[] = [];

  resolveWorkers(nJobs: number): number {
    return Math.abs(nJobs);
  }

  async run<T>(tasks: ReadonlyArray<Task<T>>): Promise<T[]> {
    this.batches.push(tasks.length);
    const results = new Array<T>(tasks.length);
    for (let i = tasks.length - 1; i >= 0; i--) {
      results[i] = await tasks[i]!();
    }
    return results;
  }
}

export function silentLogger(): Logger {
  return createLogger('test', { level: 'silent' });
}

/** Debug-level logger whose records are collected as parsed objects. */
export function recordingLogger(): { logger: Logger; records: Array<Record<string, unknown>> } {
  const records: Array<Record<string, unknown>> = [];
  const logger = createLogger('test', {
    level: 'debug',
    write: (line) => {
      const parsed: unknown = JSON.parse(line);
      if (typeof parsed === 'object' && parsed !== null) {
        records.push({ ...parsed });
      }
    },
  });
  return { logger, records };
}

export interface OperationOutput {
  shape: readonly number[];
  values: number[];
}

/** Fit, then run every apply operation and `score` on the same data. */
export async function collectOutputs(
  ensemble: SlicedEnsemble,
  train: Tensor,
  test: Tensor,
  y: Tensor,
): Promise<Record<string, OperationOutput>> {
  await ensemble.fit(train, y);
  const results: Record<string, Tensor> = {
    transform: await ensemble.transform(test),
    predict: await ensemble.predict(test),
    predictProba: await ensemble.predictProba(test),
    decisionFunction: await ensemble.decisionFunction(test),
    score: await ensemble.score(test, y),
  };
  const outputs: Record<string, OperationOutput> = {};
  for (const [operation, out] of Object.entries(results)) {
    outputs[operation] = { shape: out.shape, values: out.toArray() };
  }
  return outputs;
}
