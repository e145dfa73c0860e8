import { throwIfAborted } from "../lib/abort";
import { chunk } from "../lib/chunk";
import { isPropagating } from "../lib/errors";
import { describeError, warn } from "../lib/logger";

/** Spotify accepts at most 50 ids per /artists call. */
export const DEFAULT_BATCH_SIZE = 50;

export type BatchFetcher<T> = (
  ids: string[],
  signal?: AbortSignal
) => Promise<Map<string, T>>;

export type BatchLookupOptions<T> = {
  fetchBatch: BatchFetcher<T>;
  batchSize?: number | undefined;
  label?: string | undefined;
};

export interface BatchLookup<T> {
  resolveMany(ids: Iterable<string>, signal?: AbortSignal): Promise<Map<string, T>>;
}

/**
 * Resolves ids in provider-sized chunks, one request per chunk, in order.
 * A failing chunk ends the lookup with whatever earlier chunks returned;
 * cancellation and re-authentication errors propagate.
 */
export function createBatchLookup<T>(options: BatchLookupOptions<T>): BatchLookup<T> {
  const batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
  const label = options.label ?? "batch";

  return {
    async resolveMany(ids, signal) {
      const unique = [...new Set(ids)].filter((id) => id.length > 0);
      const merged = new Map<string, T>();
      if (unique.length === 0) return merged;

      const batches = chunk(unique, batchSize);
      for (const [index, batch] of batches.entries()) {
        throwIfAborted(signal);

        try {
          const result = await options.fetchBatch(batch, signal);
          for (const [id, value] of result) {
            merged.set(id, value);
          }
        } catch (err) {
          if (isPropagating(err, signal)) throw err;
          warn(
            `[${label}] Batch ${index + 1}/${batches.length} failed (${describeError(err)}), returning ${merged.size} partial results`
          );
          break;
        }
      }

      return merged;
    },
  };
}
