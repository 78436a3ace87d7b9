/**
 * RepoPulse — Chunked Task Group
 *
 * Runs one task per item, a fixed-size chunk at a time. Tasks inside a chunk
 * run concurrently; chunk k+1 starts only after every task in chunk k settled.
 * A thrown error becomes a `failed` outcome and never cancels siblings.
 */

export type TaskOutcome<T> =
  | { status: 'success'; value: T }
  | { status: 'skipped'; reason: string }
  | { status: 'failed'; error: unknown };

export interface TaskResult<I, T> {
  item: I;
  index: number;
  outcome: TaskOutcome<T>;
}

export interface ChunkReport {
  chunkIndex: number;
  size: number;
  succeeded: number;
  skipped: number;
  failed: number;
}

export interface TaskGroupOptions {
  chunkSize: number;
  onChunkSettled?: (report: ChunkReport) => void;
}

/** Signals that a task chose not to produce a value. */
export class SkipTask extends Error {
  constructor(reason: string) {
    super(reason);
    this.name = 'SkipTask';
  }
}

export function chunk<T>(items: readonly T[], size: number): T[][] {
  if (!Number.isInteger(size) || size < 1) {
    throw new RangeError(`chunk size must be a positive integer, got ${size}`);
  }
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

function settle<T>(result: PromiseSettledResult<T>): TaskOutcome<T> {
  if (result.status === 'fulfilled') {
    return { status: 'success', value: result.value };
  }
  if (result.reason instanceof SkipTask) {
    return { status: 'skipped', reason: result.reason.message };
  }
  return { status: 'failed', error: result.reason };
}

export async function runInChunks<I, T>(
  items: readonly I[],
  task: (item: I, index: number) => Promise<T>,
  options: TaskGroupOptions
): Promise<TaskResult<I, T>[]> {
  const results: TaskResult<I, T>[] = [];
  const chunks = chunk(items, options.chunkSize);

  for (const [chunkIndex, members] of chunks.entries()) {
    const offset = chunkIndex * options.chunkSize;
    const settled = await Promise.allSettled(
      members.map((item, i) => task(item, offset + i))
    );

    const report: ChunkReport = { chunkIndex, size: members.length, succeeded: 0, skipped: 0, failed: 0 };

    settled.forEach((result, i) => {
      const outcome = settle(result);
      if (outcome.status === 'success') report.succeeded++;
      else if (outcome.status === 'skipped') report.skipped++;
      else report.failed++;
      results.push({ item: members[i], index: offset + i, outcome });
    });

    options.onChunkSettled?.(report);
  }

  return results;
}

export function successes<I, T>(results: TaskResult<I, T>[]): T[] {
  const values: T[] = [];
  for (const result of results) {
    if (result.outcome.status === 'success') values.push(result.outcome.value);
  }
  return values;
}
