import { setTimeout as sleep } from "node:timers/promises";

import { toError, withTimeout } from "./timeout.js";

export type CallSchedulerRetryPolicy = {
  readonly maxAttempts: number;
  /**
   * Return `null` to stop retrying and surface the original error.
   * `attempt` is 1-based and indicates the attempt that just failed.
   */
  readonly getDelayMs: (attempt: number, error: unknown) => number | null;
};

export type CallSchedulerRetryEvent = {
  readonly attempt: number;
  readonly delayMs: number;
  readonly error: Error;
};

export type CallSchedulerOptions = {
  /**
   * Hard upper bound for in-flight requests.
   */
  readonly maxParallelRequests?: number;
  /**
   * Wall-clock budget for a single attempt. Exceeding it counts as a failed
   * attempt and goes through the retry policy like any other error.
   */
  readonly attemptTimeoutMs?: number;
  readonly retry?: CallSchedulerRetryPolicy;
  readonly onRetry?: (event: CallSchedulerRetryEvent) => void;
};

export type CallSchedulerRunMetrics = {
  readonly enqueuedAtMs: number;
  readonly startedAtMs: number;
  readonly completedAtMs: number;
  readonly queueWaitMs: number;
  readonly retryDelayMs: number;
  readonly attempts: number;
};

export type CallSchedulerRunOptions = {
  readonly signal?: AbortSignal;
  readonly onRetry?: (event: CallSchedulerRetryEvent) => void;
  readonly onSettled?: (metrics: CallSchedulerRunMetrics) => void;
};

export type CallScheduler = {
  run: <T>(
    fn: (signal: AbortSignal) => Promise<T>,
    options?: CallSchedulerRunOptions,
  ) => Promise<T>;
  readonly activeCount: () => number;
  readonly queuedCount: () => number;
};

/**
 * Exponential backoff: `baseDelayMs * 2^(attempt - 1)`, clamped to
 * `[baseDelayMs, maxDelayMs]`.
 */
export function createExponentialBackoff({
  maxAttempts,
  baseDelayMs,
  maxDelayMs,
}: {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}): CallSchedulerRetryPolicy {
  const base = Math.max(0, baseDelayMs);
  const cap = Math.max(base, maxDelayMs);
  return {
    maxAttempts: Math.max(1, Math.floor(maxAttempts)),
    getDelayMs: (attempt) => Math.min(cap, Math.max(base, base * 2 ** (attempt - 1))),
  };
}

function abortReason(signal: AbortSignal): Error {
  return signal.reason instanceof Error ? signal.reason : new Error("Call aborted");
}

export function createCallScheduler(options: CallSchedulerOptions = {}): CallScheduler {
  const maxParallelRequests = Math.max(1, Math.floor(options.maxParallelRequests ?? 5));
  const retryPolicy = options.retry;

  let activeCount = 0;

  type QueueJob = () => Promise<void>;
  const queue: QueueJob[] = [];

  type RunState = {
    readonly enqueuedAtMs: number;
    startedAtMs?: number;
    retryDelayMs: number;
    attempts: number;
  };

  async function attemptWithRetries<T>(
    fn: (signal: AbortSignal) => Promise<T>,
    attempt: number,
    state: RunState,
    runOptions: CallSchedulerRunOptions,
  ): Promise<T> {
    const { signal } = runOptions;
    if (signal?.aborted) {
      throw abortReason(signal);
    }
    try {
      state.startedAtMs ??= Date.now();
      state.attempts = attempt;
      return await withTimeout(fn, options.attemptTimeoutMs, signal);
    } catch (error: unknown) {
      const err = toError(error);
      if (signal?.aborted || !retryPolicy || attempt >= retryPolicy.maxAttempts) {
        throw err;
      }
      let delay = retryPolicy.getDelayMs(attempt, error);
      if (delay === null) {
        throw err;
      }
      if (!Number.isFinite(delay)) {
        delay = 0;
      }
      const normalizedDelay = Math.max(0, delay);
      const event: CallSchedulerRetryEvent = { attempt, delayMs: normalizedDelay, error: err };
      options.onRetry?.(event);
      runOptions.onRetry?.(event);
      if (normalizedDelay > 0) {
        state.retryDelayMs += normalizedDelay;
        await sleep(normalizedDelay, undefined, signal ? { signal } : undefined);
      }
      return attemptWithRetries(fn, attempt + 1, state, runOptions);
    }
  }

  function drainQueue(): void {
    while (activeCount < maxParallelRequests && queue.length > 0) {
      const task = queue.shift();
      if (!task) {
        continue;
      }
      activeCount += 1;
      void task();
    }
  }

  function run<T>(
    fn: (signal: AbortSignal) => Promise<T>,
    runOptions: CallSchedulerRunOptions = {},
  ): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const state: RunState = {
        enqueuedAtMs: Date.now(),
        retryDelayMs: 0,
        attempts: 0,
      };
      const job: QueueJob = async () => {
        const dequeuedAtMs = Date.now();
        try {
          resolve(await attemptWithRetries(fn, 1, state, runOptions));
        } catch (error: unknown) {
          reject(toError(error));
        } finally {
          const completedAtMs = Date.now();
          const metrics: CallSchedulerRunMetrics = {
            enqueuedAtMs: state.enqueuedAtMs,
            startedAtMs: state.startedAtMs ?? dequeuedAtMs,
            completedAtMs,
            queueWaitMs: Math.max(0, dequeuedAtMs - state.enqueuedAtMs),
            retryDelayMs: state.retryDelayMs,
            attempts: state.attempts,
          };
          try {
            runOptions.onSettled?.(metrics);
          } catch {
            // Metrics hooks must not interfere with scheduling behavior.
          }
          activeCount -= 1;
          queueMicrotask(drainQueue);
        }
      };
      queue.push(job);
      drainQueue();
    });
  }

  return {
    run,
    activeCount: () => activeCount,
    queuedCount: () => queue.length,
  };
}
