import os from "node:os";
import { ulid } from "ulid";
import { disabledLogger, type Logger } from "../logger.js";
import type { SemaphoreStore } from "../semaphore/store.js";
import { type AcquireResult, acquireSlot } from "./acquire-loop.js";
import { SemaphoreError } from "./errors.js";
import { type ProcessLike, ReleaseGuard } from "./release-guard.js";

/** Signals that end a run. Each one releases a held slot before exiting. */
export const TERMINATING_SIGNALS: readonly NodeJS.Signals[] = [
  "SIGINT",
  "SIGTERM",
  "SIGHUP",
];

export interface SlotOpts {
  store: SemaphoreStore;
  max: number;
  retryIntervalMs: number;
  timeoutMs?: number;
  logger?: Logger;
}

export interface RunOpts extends SlotOpts {
  proc?: ProcessLike; // default: process
}

export interface WorkloadContext {
  /** Aborted with the signal name when this process is interrupted. */
  signal: AbortSignal;
  /** Aborted when a second signal arrives: stop the work by force. */
  forceStop: AbortSignal;
  logger: Logger;
  acquired: AcquireResult;
}

/** Runs the protected work and resolves with its exit code. */
export type Workload = (ctx: WorkloadContext) => Promise<number>;

/** Shell convention: a run ended by signal N exits with 128 + N. */
export function signalExitCode(signal: NodeJS.Signals): number {
  return 128 + (os.constants.signals[signal] ?? 0);
}

/**
 * Acquire a slot, run the workload, release the slot.
 *
 * The guard and signal handlers are in place before the first attempt:
 * - interrupted while polling: nothing was incremented, exit 128+signo
 * - interrupted while holding: the workload sees the abort, the slot is
 *   released, exit 128+signo; a second signal aborts `forceStop`
 * - workload finished or failed: its exit code is returned unchanged
 * - process exits some other way: the "exit" hook releases synchronously
 */
export async function runWithSemaphore(
  opts: RunOpts,
  workload: Workload,
): Promise<number> {
  const proc: ProcessLike = opts.proc ?? process;
  const logger = (opts.logger ?? disabledLogger).child({ holder: ulid() });
  const guard = new ReleaseGuard(opts.store, logger);
  const controller = new AbortController();
  const force = new AbortController();
  const interruption: { signal: NodeJS.Signals | null } = { signal: null };

  const onSignal = (signal: NodeJS.Signals) => {
    logger.warn({ signal, state: guard.state }, "Interrupted");
    if (interruption.signal) {
      force.abort(signal);
      return;
    }
    interruption.signal = signal;
    controller.abort(signal);
  };

  const detachExit = guard.attach(proc);
  for (const signal of TERMINATING_SIGNALS) proc.on(signal, onSignal);

  try {
    let acquired: AcquireResult;
    try {
      acquired = await acquireSlot(
        {
          store: opts.store,
          max: opts.max,
          retryIntervalMs: opts.retryIntervalMs,
          timeoutMs: opts.timeoutMs,
          signal: controller.signal,
          logger,
        },
        guard,
      );
    } catch (err) {
      if (
        interruption.signal &&
        err instanceof SemaphoreError &&
        err.code === "ACQUIRE_ABORTED"
      ) {
        return signalExitCode(interruption.signal);
      }
      throw err;
    }

    // Interrupted during the winning attempt: give the slot straight back.
    if (interruption.signal) return signalExitCode(interruption.signal);

    const exitCode = await workload({
      signal: controller.signal,
      forceStop: force.signal,
      logger,
      acquired,
    });
    logger.debug({ exitCode }, "Workload finished");
    return interruption.signal
      ? signalExitCode(interruption.signal)
      : exitCode;
  } finally {
    try {
      // Throws leave the exit hook attached so it can retry on the way out.
      await guard.release();
      detachExit();
    } finally {
      for (const signal of TERMINATING_SIGNALS) proc.off(signal, onSignal);
    }
  }
}

/**
 * Scoped slot for in-process callers: acquire, run `fn`, release however
 * `fn` ends. No signal wiring; pass `signal` to stop waiting.
 */
export async function withSlot<T>(
  opts: SlotOpts & { signal?: AbortSignal },
  fn: (acquired: AcquireResult) => Promise<T>,
): Promise<T> {
  const logger = opts.logger ?? disabledLogger;
  const guard = new ReleaseGuard(opts.store, logger);
  try {
    const acquired = await acquireSlot(
      {
        store: opts.store,
        max: opts.max,
        retryIntervalMs: opts.retryIntervalMs,
        timeoutMs: opts.timeoutMs,
        signal: opts.signal,
        logger,
      },
      guard,
    );
    return await fn(acquired);
  } finally {
    await guard.release();
  }
}
