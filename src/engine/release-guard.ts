import { disabledLogger, type Logger } from "../logger.js";
import type { SemaphoreStore } from "../semaphore/store.js";

/**
 * Whether this process currently owns one unit of the shared counter.
 * "Releasing" and "Released" latch the guard so the decrement happens at
 * most once.
 */
export type ProcessState = "NotAcquired" | "Acquired" | "Releasing" | "Released";

/** The parts of `process` the guard and runner hook into. */
export interface ProcessLike {
  on(event: string, listener: (signal: NodeJS.Signals) => void): unknown;
  off(event: string, listener: (signal: NodeJS.Signals) => void): unknown;
}

/**
 * Exactly-once release of a held slot.
 *
 * Arm it before polling starts: until markAcquired() is called every
 * release is a no-op, so an interrupt while waiting never touches the
 * counter. Once acquired, the first release (async, or sync from the
 * process "exit" hook) decrements and every later one does nothing.
 * The workload's own outcome is never consulted.
 */
export class ReleaseGuard {
  private _state: ProcessState = "NotAcquired";
  private inFlight: Promise<boolean> | null = null;
  private readonly store: SemaphoreStore;
  private readonly logger: Logger;

  constructor(store: SemaphoreStore, logger: Logger = disabledLogger) {
    this.store = store;
    this.logger = logger;
  }

  get state(): ProcessState {
    return this._state;
  }

  /** Called by the acquire loop right after a successful increment. */
  markAcquired(): void {
    if (this._state !== "NotAcquired") {
      throw new Error(`ReleaseGuard already used (state: ${this._state})`);
    }
    this._state = "Acquired";
  }

  /**
   * Release the slot if this process holds it.
   * Resolves true when the slot was given back, false when there was
   * nothing to give back. Concurrent callers share one in-flight release.
   * On failure the guard goes back to Acquired so the exit hook can try
   * again.
   */
  release(): Promise<boolean> {
    if (this._state === "Releasing" && this.inFlight) return this.inFlight;
    if (this._state !== "Acquired") return Promise.resolve(false);

    this._state = "Releasing";
    this.inFlight = this.store
      .release()
      .then((count) => {
        this._state = "Released";
        this.logger.info({ count }, "Semaphore slot released");
        return true;
      })
      .catch((err: unknown) => {
        this._state = "Acquired";
        this.logger.error({ err }, "Semaphore release failed");
        throw err;
      })
      .finally(() => {
        this.inFlight = null;
      });
    return this.inFlight;
  }

  /**
   * Synchronous variant for the "exit" event. An async release still in
   * flight is left alone: its write may already have landed, and a second
   * decrement would free a slot someone else holds.
   */
  releaseSync(): boolean {
    if (this._state !== "Acquired") return false;
    this._state = "Releasing";
    try {
      const count = this.store.releaseSync();
      this._state = "Released";
      this.logger.info({ count }, "Semaphore slot released on exit");
      return true;
    } catch (err) {
      this._state = "Acquired";
      this.logger.error({ err }, "Semaphore release on exit failed");
      return false;
    }
  }

  /**
   * Hook releaseSync() on the emitter's "exit" event. Returns a detach
   * function.
   */
  attach(proc: ProcessLike): () => void {
    const onExit = () => {
      this.releaseSync();
    };
    proc.on("exit", onExit);
    return () => {
      proc.off("exit", onExit);
    };
  }
}
