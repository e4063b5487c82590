import { performance } from 'perf_hooks';

/**
 * Outcome for one target. Exactly one of `data` / `error` is present.
 */
export type ItemResult<T, K extends string = string> =
  | { target: K; success: true; data: T }
  | { target: K; success: false; error: string };

export interface AggregateSummary {
  total: number;
  successful: number;
  failed: number;
  durationMs: number;
}

export interface AggregateResult<T, K extends string = string> {
  results: ItemResult<T, K>[];
  summary: AggregateSummary;
}

/**
 * Turns one target into a payload. Called concurrently; must not share
 * mutable state between calls and should stop early once `signal` aborts.
 */
export type ItemResolver<T, K extends string = string> = (target: K, signal: AbortSignal) => Promise<T>;

export interface AggregateOptions {
  /** Maximum number of resolver calls in flight at once. */
  concurrency: number;
  signal?: AbortSignal;
}

export class AggregateInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AggregateInputError';
  }
}

/**
 * Counting semaphore. Waiters are admitted in FIFO order.
 */
export class Semaphore {
  private available: number;
  private readonly waiters: Array<() => void> = [];

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new AggregateInputError(`Semaphore capacity must be a positive integer, got ${capacity}`);
    }
    this.available = capacity;
  }

  get inUse(): number {
    return this.capacity - this.available;
  }

  acquire(): Promise<void> {
    if (this.available > 0) {
      this.available--;
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => this.waiters.push(resolve));
  }

  release(): void {
    const next = this.waiters.shift();
    if (next) {
      // permit passes straight to the next waiter
      next();
    } else {
      this.available++;
    }
  }

  /**
   * Run `fn` holding one permit; the permit is released however `fn` settles.
   */
  async use<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }
}

function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message || error.name;
  return String(error);
}

/**
 * Resolve every target with at most `concurrency` calls in flight and
 * collect one outcome per target. Individual failures are recorded in the
 * result, never thrown; the call itself only rejects for invalid input.
 *
 * Results keep submission order.
 */
export async function aggregate<T, K extends string = string>(
  targets: readonly K[],
  resolve: ItemResolver<T, K>,
  options: AggregateOptions,
): Promise<AggregateResult<T, K>> {
  if (targets.length === 0) {
    throw new AggregateInputError('At least one target is required');
  }
  const semaphore = new Semaphore(options.concurrency);
  const signal = options.signal ?? new AbortController().signal;

  const start = performance.now();

  const runOne = (target: K): Promise<ItemResult<T, K>> =>
    semaphore
      // then() so a resolver that throws synchronously still becomes a rejection
      .use(() => Promise.resolve().then(() => resolve(target, signal)))
      .then(
        (data): ItemResult<T, K> => ({ target, success: true, data }),
        (error: unknown): ItemResult<T, K> => ({ target, success: false, error: errorMessage(error) }),
      );

  const results = await Promise.all(targets.map(runOne));

  const successful = results.filter((result) => result.success).length;
  return {
    results,
    summary: {
      total: results.length,
      successful,
      failed: results.length - successful,
      durationMs: performance.now() - start,
    },
  };
}
