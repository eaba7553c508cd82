import fs from "node:fs";
import path from "node:path";
import lockfile from "proper-lockfile";
import { disabledLogger, type Logger } from "../logger.js";
import { formatCounter, parseCounter } from "./counter.js";
import type { SemaphoreStore } from "./store.js";
import type { TryAcquireResult } from "./types.js";

export const DEFAULT_LOCK_STALE_MS = 10_000;
const DEFAULT_LOCK_RETRY_MS = 25;
const SYNC_SPIN_MS = 10;

export interface FileSemaphoreStoreOptions {
  path: string;
  staleMs?: number; // lock older than this is reclaimed (min 2000)
  lockRetryMs?: number; // delay between lock attempts while another process holds it
  logger?: Logger;
}

/**
 * Counter kept as plain text in a single file, guarded by a proper-lockfile
 * lock (`<path>.lock` directory) so only one process read-modify-writes it
 * at a time. A holder that dies inside the critical section leaves a lock
 * that goes stale after `staleMs` and is taken over.
 */
export class FileSemaphoreStore implements SemaphoreStore {
  readonly location: string;
  private readonly staleMs: number;
  private readonly lockRetryMs: number;
  private readonly logger: Logger;

  constructor(opts: FileSemaphoreStoreOptions) {
    this.location = path.resolve(opts.path);
    this.staleMs = opts.staleMs ?? DEFAULT_LOCK_STALE_MS;
    this.lockRetryMs = opts.lockRetryMs ?? DEFAULT_LOCK_RETRY_MS;
    this.logger = opts.logger ?? disabledLogger;
    this.ensureFile();
  }

  async tryAcquire(max: number): Promise<TryAcquireResult> {
    return this.withLock((): TryAcquireResult => {
      const current = this.readCounter();
      if (current >= max) {
        return { status: "BUSY", count: current };
      }
      this.writeCounter(current + 1);
      return { status: "ACQUIRED", count: current + 1 };
    });
  }

  async release(): Promise<number> {
    return this.withLock(() => this.decrement());
  }

  releaseSync(): number {
    const unlock = this.lockSync();
    try {
      return this.decrement();
    } finally {
      unlock();
    }
  }

  async read(): Promise<number> {
    return this.withLock(() => this.readCounter());
  }

  close(): void {
    // nothing held between calls
  }

  private decrement(): number {
    const current = this.readCounter();
    if (current <= 0) return 0;
    this.writeCounter(current - 1);
    return current - 1;
  }

  private ensureFile(): void {
    fs.mkdirSync(path.dirname(this.location), { recursive: true });
    // "a" creates the file when absent and never truncates it
    fs.closeSync(fs.openSync(this.location, "a"));
  }

  private async withLock<T>(fn: () => T): Promise<T> {
    const unlock = await lockfile.lock(this.location, {
      ...this.lockOptions(),
      retries: {
        forever: true,
        factor: 1,
        minTimeout: this.lockRetryMs,
        maxTimeout: this.lockRetryMs,
        randomize: true,
      },
    });
    try {
      return fn();
    } finally {
      await unlock();
    }
  }

  /**
   * The sync API can't retry, so spin on it for up to one stale period.
   * After that an abandoned lock has been reclaimable for a while and the
   * next attempt takes it over.
   */
  private lockSync(): () => void {
    const deadline = Date.now() + this.staleMs + SYNC_SPIN_MS;
    for (;;) {
      try {
        return lockfile.lockSync(this.location, this.lockOptions());
      } catch (err) {
        if (!isLockedError(err) || Date.now() > deadline) throw err;
        sleepSync(SYNC_SPIN_MS);
      }
    }
  }

  private lockOptions() {
    return {
      stale: this.staleMs,
      realpath: false,
      onCompromised: (err: Error) => {
        this.logger.error(
          { err, path: this.location },
          "Semaphore lock compromised while held",
        );
      },
    };
  }

  private readCounter(): number {
    let content: string;
    try {
      content = fs.readFileSync(this.location, "utf8");
    } catch (err) {
      this.logger.warn(
        { err, path: this.location },
        "Semaphore file unreadable, treating count as 0",
      );
      return 0;
    }
    const parsed = parseCounter(content);
    if (!parsed.valid) {
      this.logger.warn(
        { path: this.location, content: content.slice(0, 64) },
        "Semaphore file corrupt, treating count as 0",
      );
    }
    return parsed.value;
  }

  private writeCounter(value: number): void {
    fs.writeFileSync(this.location, formatCounter(value), "utf8");
  }
}

function isLockedError(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ELOCKED";
}

function sleepSync(ms: number): void {
  Atomics.wait(new Int32Array(new SharedArrayBuffer(4)), 0, 0, ms);
}

