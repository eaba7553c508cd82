import type { SemaphoreStore } from "./store.js";
import type { TryAcquireResult } from "./types.js";

/**
 * Single-process store. Calls never overlap inside one event loop turn, so
 * the counter needs no lock. Shared between participants by passing the
 * same instance around.
 */
export class MemorySemaphoreStore implements SemaphoreStore {
  readonly location = "memory";
  private count: number;

  constructor(initial = 0) {
    this.count = initial;
  }

  async tryAcquire(max: number): Promise<TryAcquireResult> {
    if (this.count >= max) return { status: "BUSY", count: this.count };
    this.count++;
    return { status: "ACQUIRED", count: this.count };
  }

  async release(): Promise<number> {
    return this.releaseSync();
  }

  releaseSync(): number {
    if (this.count > 0) this.count--;
    return this.count;
  }

  async read(): Promise<number> {
    return this.count;
  }

  close(): void {}
}
