import { describe, it, expect } from 'vitest';
import { runBatch, summarizeBatch, type BatchItemResult } from '../src/batch.js';
import { ValidationError } from '../src/errors.js';

interface Counted {
  count: number;
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function countEntities(result: BatchItemResult<Counted>): number {
  return result.status === 'completed' ? result.count : 0;
}

describe('runBatch', () => {
  it('records a failed item without affecting the others', async () => {
    const results = await runBatch<unknown, Counted>(
      ['a', 42, 'c'],
      async (item) => {
        if (typeof item !== 'string') {
          throw new ValidationError('Text must be a string');
        }
        return { count: 1 };
      },
      { concurrency: 2 }
    );

    expect(results).toEqual([
      { index: 0, status: 'completed', count: 1 },
      { index: 1, status: 'failed', error: { code: 'VALIDATION', message: 'Text must be a string' } },
      { index: 2, status: 'completed', count: 1 }
    ]);
    expect(summarizeBatch(results, countEntities)).toEqual({
      total_items: 3,
      total_entities: 2,
      successful: 2,
      failed: 1
    });
  });

  it('keeps results in input order when items finish out of order', async () => {
    const results = await runBatch(
      [30, 5, 15],
      async (ms) => {
        await delay(ms);
        return { count: ms };
      },
      { concurrency: 3 }
    );

    expect(results.map((r) => r.index)).toEqual([0, 1, 2]);
    expect(results.map(countEntities)).toEqual([30, 5, 15]);
  });

  it('never runs more than the concurrency limit at once', async () => {
    let inFlight = 0;
    let maxInFlight = 0;

    await runBatch(
      Array.from({ length: 10 }, (_, i) => i),
      async () => {
        inFlight++;
        maxInFlight = Math.max(maxInFlight, inFlight);
        await delay(1);
        inFlight--;
        return { count: 0 };
      },
      { concurrency: 3 }
    );

    expect(maxInFlight).toBe(3);
  });

  it('runs sequentially when concurrency is below 1', async () => {
    let inFlight = 0;
    let maxInFlight = 0;

    await runBatch(
      [1, 2, 3],
      async () => {
        inFlight++;
        maxInFlight = Math.max(maxInFlight, inFlight);
        await delay(1);
        inFlight--;
        return { count: 0 };
      },
      { concurrency: 0 }
    );

    expect(maxInFlight).toBe(1);
  });

  it('maps non-library errors to INTERNAL', async () => {
    const results = await runBatch(
      ['x'],
      async (): Promise<Counted> => {
        throw new Error('disk on fire');
      },
      { concurrency: 1 }
    );

    expect(results).toEqual([{ index: 0, status: 'failed', error: { code: 'INTERNAL', message: 'disk on fire' } }]);
  });

  it('handles an empty batch', async () => {
    const results = await runBatch<string, Counted>([], async () => ({ count: 1 }), { concurrency: 4 });

    expect(results).toEqual([]);
    expect(summarizeBatch(results, countEntities)).toEqual({
      total_items: 0,
      total_entities: 0,
      successful: 0,
      failed: 0
    });
  });
});
