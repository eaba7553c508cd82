import type { TryAcquireResult } from "./types.js";

/**
 * Shared counter guarded by a cross-process lock.
 * Implementations: FileSemaphoreStore, MemorySemaphoreStore (single
 * process, tests)
 *
 * Every method takes the lock for exactly one read-modify-write and
 * drops it before returning.
 */
export interface SemaphoreStore {
  /** Human-readable location, used in logs and errors. */
  readonly location: string;

  /**
   * Increment the counter if it is below `max`.
   * Leaves it untouched and reports BUSY otherwise.
   */
  tryAcquire(max: number): Promise<TryAcquireResult>;

  /**
   * Decrement the counter, never below zero.
   * Returns the value after the decrement.
   */
  release(): Promise<number>;

  /**
   * Synchronous release for the process "exit" hook, where the event loop
   * no longer runs.
   */
  releaseSync(): number;

  /** Current counter value, read under the lock. */
  read(): Promise<number>;

  close(): void;
}
