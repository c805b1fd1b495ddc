import { logger } from './logger';

export const chunkArray = <T>(items: T[], size: number): T[][] => {
  const step = Math.max(1, Math.floor(size));
  const chunks: T[][] = [];
  for (let index = 0; index < items.length; index += step) {
    chunks.push(items.slice(index, index + step));
  }
  return chunks;
};

/**
 * Runs `worker` over consecutive chunks, one request at a time, and
 * concatenates what each chunk returns.
 */
export const runInChunks = async <T, R>(
  items: T[],
  size: number,
  worker: (chunk: T[]) => Promise<R[]>,
  label = 'items',
): Promise<R[]> => {
  const chunks = chunkArray(items, size);
  const results: R[] = [];
  let processed = 0;
  for (const chunk of chunks) {
    if (chunks.length > 1) {
      logger.debug(`${label}: ${processed}-${processed + chunk.length - 1} of ${items.length}`);
    }
    results.push(...(await worker(chunk)));
    processed += chunk.length;
  }
  return results;
};

/** Record-merging variant of `runInChunks`; later chunks win on duplicate keys. */
export const mergeChunks = async <T, V>(
  items: T[],
  size: number,
  worker: (chunk: T[]) => Promise<Record<string, V>>,
  label = 'items',
): Promise<Record<string, V>> => {
  const parts = await runInChunks(items, size, async (chunk) => [await worker(chunk)], label);
  const merged: Record<string, V> = {};
  for (const part of parts) Object.assign(merged, part);
  return merged;
};
