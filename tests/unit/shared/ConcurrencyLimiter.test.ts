import { describe, it, expect } from 'vitest';
import { mapWithConcurrency } from '../../../src/shared/ConcurrencyLimiter.js';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => { resolve = r; });
  return { promise, resolve };
}

describe('mapWithConcurrency', () => {
  it('should return results in input order regardless of completion order', async () => {
    const delays = [30, 5, 15, 0];
    const results = await mapWithConcurrency(delays, 4, async (ms, i) => {
      await new Promise((r) => setTimeout(r, ms));
      return `item-${i}`;
    });
    expect(results).toEqual(['item-0', 'item-1', 'item-2', 'item-3']);
  });

  it('should never run more than limit workers at once', async () => {
    let inFlight = 0;
    let peak = 0;

    await mapWithConcurrency(Array.from({ length: 10 }, (_, i) => i), 3, async () => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await new Promise((r) => setTimeout(r, 2));
      inFlight--;
    });

    expect(peak).toBe(3);
  });

  it('should start the next item as soon as a lane frees up', async () => {
    const gates = [deferred(), deferred(), deferred()];
    const started: number[] = [];

    const run = mapWithConcurrency([0, 1, 2], 2, async (i) => {
      started.push(i);
      await gates[i].promise;
      return i;
    });

    await Promise.resolve();
    expect(started).toEqual([0, 1]);

    gates[1].resolve();
    await new Promise((r) => setTimeout(r, 0));
    expect(started).toEqual([0, 1, 2]);

    gates[0].resolve();
    gates[2].resolve();
    expect(await run).toEqual([0, 1, 2]);
  });

  it('should return an empty array for no items', async () => {
    expect(await mapWithConcurrency([], 5, async () => 1)).toEqual([]);
  });

  it('should reject a non-positive limit', async () => {
    await expect(mapWithConcurrency([1], 0, async (x) => x)).rejects.toThrow(RangeError);
  });
});
