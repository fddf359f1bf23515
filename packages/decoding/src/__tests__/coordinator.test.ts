import { describe, it, expect } from 'vitest';
import { SequentialRunner } from '@slicewise/parallel';
import { Tensor, tensor } from '@slicewise/tensor';
import { dispatchChunks, mergeChunks } from '../coordinator.js';
import { ShapeError } from '../errors.js';
import { recordingLogger, ReversingRunner, silentLogger } from './helpers.js';

describe('dispatchChunks', () => {
  it('runs one call per contiguous chunk, in partition order', async () => {
    const context = { runner: new ReversingRunner(), workers: 3, logger: silentLogger() };
    const ranges = await dispatchChunks(context, 'predict', 'samples', 10, (range) => [
      range.start,
      range.end,
    ]);
    expect(ranges).toEqual([
      [0, 3],
      [3, 6],
      [6, 10],
    ]);
  });

  it('never creates more chunks than the axis has elements', async () => {
    const runner = new ReversingRunner();
    await dispatchChunks({ runner, workers: 8, logger: silentLogger() }, 'fit', 'slices', 3, () => 0);
    expect(runner.batches).toEqual([3]);
  });

  it('logs the partitioning', async () => {
    const { logger, records } = recordingLogger();
    await dispatchChunks({ runner: new SequentialRunner(), workers: 2, logger }, 'score', 'slices', 5, () => 0);
    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({
      level: 'debug',
      msg: 'dispatch',
      operation: 'score',
      axis: 'slices',
      length: 5,
      workers: 2,
      chunks: 2,
    });
  });
});

describe('mergeChunks', () => {
  it('returns a single chunk without copying it', () => {
    const only = Tensor.zeros([2, 2]);
    expect(mergeChunks([only], 0)).toBe(only);
  });

  it('concatenates along the partition axis', () => {
    const merged = mergeChunks([tensor([[1, 2]]), tensor([[3, 4]])], 1);
    expect(merged.toNested()).toEqual([[1, 2, 3, 4]]);
  });

  it('rejects chunks that disagree off the partition axis', () => {
    expect(() => mergeChunks([Tensor.zeros([1, 2]), Tensor.zeros([1, 3])], 0)).toThrow(ShapeError);
  });

  it('rejects an empty chunk list', () => {
    expect(() => mergeChunks([], 0)).toThrow(ShapeError);
  });
});
