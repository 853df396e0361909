import type { ErrorRecord } from "./types/pii.js";
import { toErrorRecord } from "./errors.js";

export type BatchItemResult<T> =
  | ({ index: number; status: "completed" } & T)
  | { index: number; status: "failed"; error: ErrorRecord };

export interface BatchSummary {
  total_items: number;
  total_entities: number;
  successful: number;
  failed: number;
}

export interface BatchOptions {
  /** Maximum number of items processed at the same time (at least 1) */
  concurrency: number;
}

/**
 * Runs `processItem` over every item with bounded concurrency
 *
 * - A thrown error or rejection becomes that item's failed record; the rest keep going
 * - Results are index-stable: results[i] belongs to items[i] whatever order work finishes in
 *
 * @param items - Batch inputs, possibly malformed (processItem decides what is acceptable)
 * @param processItem - Full pipeline for one item
 */
export async function runBatch<I, T extends object>(
  items: readonly I[],
  processItem: (item: I, index: number) => Promise<T>,
  options: BatchOptions
): Promise<BatchItemResult<T>[]> {
  const results: BatchItemResult<T>[] = new Array(items.length);
  const workerCount = Math.min(Math.max(1, Math.floor(options.concurrency)), items.length);
  let next = 0;

  async function worker(): Promise<void> {
    while (next < items.length) {
      const index = next++;
      try {
        const value = await processItem(items[index], index);
        results[index] = { ...value, index, status: "completed" as const };
      } catch (error) {
        results[index] = { index, status: "failed", error: toErrorRecord(error) };
      }
    }
  }

  await Promise.all(Array.from({ length: workerCount }, () => worker()));
  return results;
}

export function summarizeBatch<T>(
  results: readonly BatchItemResult<T>[],
  countEntities: (result: BatchItemResult<T>) => number
): BatchSummary {
  let totalEntities = 0;
  let successful = 0;

  for (const result of results) {
    if (result.status === "completed") {
      successful++;
    }
    totalEntities += countEntities(result);
  }

  return {
    total_items: results.length,
    total_entities: totalEntities,
    successful,
    failed: results.length - successful
  };
}
