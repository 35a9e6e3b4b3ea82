import type { RepoResult } from './types.js';
import { silentLogger, type Logger } from '../utils/logger.js';

/**
 * Append-only result store. A key can be written once; a second write is a
 * bug in the caller and throws instead of overwriting.
 */
export class ResultCollection {
  private readonly results = new Map<string, RepoResult>();

  add(key: string, result: RepoResult): void {
    if (this.results.has(key)) {
      throw new Error(`result for ${key} already recorded`);
    }
    this.results.set(key, result);
  }

  has(key: string): boolean {
    return this.results.has(key);
  }

  get size(): number {
    return this.results.size;
  }

  /** Results sorted by path for deterministic reporting. */
  sorted(): RepoResult[] {
    return [...this.results.values()].sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
  }
}

export interface SchedulerOptions {
  /** Maximum number of tasks in flight. */
  concurrency: number;
  /** Run-level cancellation; stops dispatch of new tasks when aborted. */
  signal?: AbortSignal;
  logger?: Logger;
}

export interface TaskHooks<T> {
  /** Unique identity of an item. */
  key(item: T): string;
  /** Result for a task that threw instead of returning one. */
  onError(item: T, err: unknown): RepoResult;
  /** Result for an item never dispatched because the run was cancelled. */
  onCancelled(item: T): RepoResult;
  onResult?(result: RepoResult): void;
}

/**
 * Runs one task per item on a bounded pool of workers. Every item yields
 * exactly one result, whatever its siblings do: task failures are isolated
 * and converted by `onError`, and after cancellation undispatched items of
 * an array input are reported through `onCancelled`. A repeated key is
 * skipped with a warning.
 *
 * Items may come from an async iterable (paged provider listings); workers
 * pull from it as they free up, so only `concurrency` items are held at once.
 */
export class ExecutionScheduler {
  private readonly concurrency: number;
  private readonly signal?: AbortSignal;
  private readonly logger: Logger;

  constructor(options: SchedulerOptions) {
    if (!Number.isInteger(options.concurrency) || options.concurrency < 1) {
      throw new RangeError(`concurrency must be a positive integer, got ${options.concurrency}`);
    }
    this.concurrency = options.concurrency;
    this.signal = options.signal;
    this.logger = options.logger ?? silentLogger;
  }

  async run<T>(
    items: Iterable<T> | AsyncIterable<T>,
    task: (item: T, signal?: AbortSignal) => Promise<RepoResult>,
    hooks: TaskHooks<T>,
    collection: ResultCollection = new ResultCollection(),
  ): Promise<RepoResult[]> {
    const iterator = toAsyncIterator(items);
    const dispatched = new Set<string>();

    const record = (key: string, result: RepoResult): void => {
      collection.add(key, result);
      hooks.onResult?.(result);
    };

    const worker = async (): Promise<void> => {
      for (;;) {
        if (this.signal?.aborted) return;
        const next = await iterator.next();
        if (next.done) return;

        const item = next.value;
        const key = hooks.key(item);
        if (dispatched.has(key) || collection.has(key)) {
          this.logger.warn(`${key}: duplicate item skipped`);
          continue;
        }
        dispatched.add(key);
        if (this.signal?.aborted) {
          record(key, hooks.onCancelled(item));
          return;
        }

        let result: RepoResult;
        try {
          result = await task(item, this.signal);
        } catch (err) {
          this.logger.debug(`${key}: task failed: ${err instanceof Error ? err.message : String(err)}`);
          result = hooks.onError(item, err);
        }
        record(key, result);
      }
    };

    await Promise.all(Array.from({ length: this.concurrency }, worker));

    if (this.signal?.aborted && isIterable(items)) {
      for (const item of items) {
        const key = hooks.key(item);
        if (!collection.has(key)) record(key, hooks.onCancelled(item));
      }
    }

    return collection.sorted();
  }
}

function isIterable<T>(items: Iterable<T> | AsyncIterable<T>): items is Iterable<T> {
  return Symbol.iterator in items;
}

function toAsyncIterator<T>(items: Iterable<T> | AsyncIterable<T>): AsyncIterator<T> {
  if (isIterable(items)) {
    const it = items[Symbol.iterator]();
    return { next: async () => it.next() };
  }
  return items[Symbol.asyncIterator]();
}
