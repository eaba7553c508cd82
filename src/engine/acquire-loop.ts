import { disabledLogger, type Logger } from "../logger.js";
import type { SemaphoreStore } from "../semaphore/store.js";
import { SemaphoreError } from "./errors.js";
import type { ReleaseGuard } from "./release-guard.js";

export interface AcquireOpts {
  store: SemaphoreStore;
  max: number;
  retryIntervalMs: number; // fixed delay between BUSY attempts
  timeoutMs?: number; // default: wait forever
  signal?: AbortSignal;
  logger?: Logger;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>; // injectable for testing
}

export interface AcquireResult {
  attempts: number;
  waited_ms: number;
  count: number; // counter value right after our increment
}

/**
 * Poll the store until a slot is free, then mark the guard as holding it.
 *
 * The store's lock is held only inside each tryAcquire call, never across
 * the sleep. There is no backoff and no queue: whoever gets the lock first
 * after a release takes the slot, so a waiter can starve under contention.
 *
 * An abort that lands while tryAcquire is in flight does not cancel it. If
 * that attempt wins, the slot is recorded on the guard before returning so
 * the caller's release covers it.
 */
export async function acquireSlot(
  opts: AcquireOpts,
  guard: ReleaseGuard,
): Promise<AcquireResult> {
  const { store, max, retryIntervalMs, timeoutMs, signal } = opts;
  const logger = opts.logger ?? disabledLogger;
  const wait = opts.sleep ?? sleep;
  const startedAt = Date.now();
  let attempts = 0;

  for (;;) {
    throwIfAborted(signal, attempts, startedAt);

    attempts++;
    const result = await store.tryAcquire(max);
    if (result.status === "ACQUIRED") {
      guard.markAcquired();
      const waited_ms = Date.now() - startedAt;
      logger.info(
        { attempts, waited_ms, count: result.count, max },
        "Semaphore slot acquired",
      );
      return { attempts, waited_ms, count: result.count };
    }

    let delay = retryIntervalMs;
    if (timeoutMs !== undefined) {
      const remaining = timeoutMs - (Date.now() - startedAt);
      if (remaining <= 0) {
        throw new SemaphoreError(
          "ACQUIRE_TIMEOUT",
          `No semaphore slot freed up within ${timeoutMs}ms (${store.location})`,
          { path: store.location, attempts, waited_ms: Date.now() - startedAt },
        );
      }
      delay = Math.min(delay, remaining);
    }

    logger.info(
      { count: result.count, max, retry_in_s: retryIntervalMs / 1000 },
      "Max concurrent jobs running, retrying",
    );
    await wait(delay, signal);
  }
}

function throwIfAborted(
  signal: AbortSignal | undefined,
  attempts: number,
  startedAt: number,
): void {
  if (!signal?.aborted) return;
  throw new SemaphoreError("ACQUIRE_ABORTED", "Semaphore acquire aborted", {
    attempts,
    waited_ms: Date.now() - startedAt,
    reason: signal.reason,
  });
}

/** setTimeout fires after 1ms for anything longer. */
export const MAX_TIMER_MS = 2_147_483_647;

/**
 * Resolve after `ms`, or reject with ACQUIRE_ABORTED as soon as `signal`
 * fires. Waits past MAX_TIMER_MS are split into several timers.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    const aborted = () =>
      new SemaphoreError("ACQUIRE_ABORTED", "Semaphore acquire aborted", {
        reason: signal?.reason,
      });
    if (signal?.aborted) {
      reject(aborted());
      return;
    }
    let remaining = ms;
    let timer: NodeJS.Timeout | undefined;
    const onAbort = () => {
      clearTimeout(timer);
      reject(aborted());
    };
    const arm = () => {
      const chunk = Math.min(remaining, MAX_TIMER_MS);
      remaining -= chunk;
      timer = setTimeout(() => {
        if (remaining > 0) {
          arm();
          return;
        }
        signal?.removeEventListener("abort", onAbort);
        resolve();
      }, chunk);
    };
    arm();
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
