import { describe, it, expect } from 'vitest';
import { PartitionLock } from '../src/utils/partition-lock.js';
import { withTimeout, TimeoutError } from '../src/utils/timeout.js';
import { attempt, ok, unavailable, unwrapOr } from '../src/utils/result.js';
import { boundedCosineDistance, clamp01, jaccard } from '../src/utils/math.js';
import { computeHash } from '../src/utils/hash.js';

const delay = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

describe('PartitionLock', () => {
  it('runs tasks sharing a key one after another', async () => {
    const lock = new PartitionLock();
    const events: string[] = [];
    const task = (name: string, ms: number) => async () => {
      events.push(`${name}:start`);
      await delay(ms);
      events.push(`${name}:end`);
      return name;
    };

    const results = await Promise.all([lock.run('owner-a', task('first', 20)), lock.run('owner-a', task('second', 1))]);

    expect(results).toEqual(['first', 'second']);
    expect(events).toEqual(['first:start', 'first:end', 'second:start', 'second:end']);
    expect(lock.activePartitions).toBe(0);
  });

  it('does not hold back other keys', async () => {
    const lock = new PartitionLock();
    const events: string[] = [];
    const slow = lock.run('owner-a', async () => { await delay(20); events.push('a'); });
    const fast = lock.run('owner-b', async () => { events.push('b'); });

    await Promise.all([slow, fast]);
    expect(events).toEqual(['b', 'a']);
  });

  it('keeps the queue moving after a failure', async () => {
    const lock = new PartitionLock();
    const failed = lock.run('owner-a', async () => { throw new Error('write failed'); });
    const next = lock.run('owner-a', async () => 'written');

    await expect(failed).rejects.toThrow('write failed');
    await expect(next).resolves.toBe('written');
  });
});

describe('withTimeout', () => {
  it('rejects with a TimeoutError past the deadline', async () => {
    const slow = withTimeout('evaluation', 5, () => delay(50).then(() => 'late'));
    await expect(slow).rejects.toBeInstanceOf(TimeoutError);
    await expect(slow).rejects.toThrow('evaluation timed out after 5ms');
  });

  it('runs without a deadline when the timeout is zero', async () => {
    await expect(withTimeout('evaluation', 0, async () => 'done')).resolves.toBe('done');
  });
});

describe('result helpers', () => {
  it('captures failures as unavailable', async () => {
    const result = await attempt('embedding-model', async () => { throw new Error('offline'); });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.source).toBe('embedding-model');
      expect(result.error.reason).toBe('offline');
    }
  });

  it('unwraps with a fallback', () => {
    expect(unwrapOr(ok(3), 0)).toBe(3);
    expect(unwrapOr(unavailable('reranker', 'no model'), 0)).toBe(0);
    expect(unavailable('reranker', 'no model')).toEqual({ ok: false, error: { source: 'reranker', reason: 'no model' } });
  });
});

describe('math helpers', () => {
  it('bounds cosine distance to [0,1]', () => {
    expect(boundedCosineDistance([1, 0], [1, 0])).toBe(0);
    expect(boundedCosineDistance([1, 0], [0, 1])).toBe(1);
    expect(boundedCosineDistance([1, 0], [-1, 0])).toBe(1);
    expect(boundedCosineDistance([0, 0], [1, 0])).toBe(1);
    expect(() => boundedCosineDistance([1], [1, 0])).toThrow(RangeError);
  });

  it('clamps to the unit interval', () => {
    expect([clamp01(-0.5), clamp01(0.4), clamp01(2), clamp01(NaN)]).toEqual([0, 0.4, 1, 0]);
  });

  it('computes jaccard overlap', () => {
    expect(jaccard(new Set(['a', 'b']), new Set(['b', 'c']))).toBeCloseTo(1 / 3, 10);
    expect(jaccard(new Set<string>(), new Set(['a']))).toBe(0);
  });

  it('prefixes content hashes with the algorithm', () => {
    expect(computeHash('abc')).toBe('sha256:ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad');
  });
});
