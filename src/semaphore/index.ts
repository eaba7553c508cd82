// Types
export type { AcquireStatus, TryAcquireResult } from "./types.js";

// Interface
export type { SemaphoreStore } from "./store.js";

// Implementations
export {
  DEFAULT_LOCK_STALE_MS,
  FileSemaphoreStore,
  type FileSemaphoreStoreOptions,
} from "./file.js";
export { MemorySemaphoreStore } from "./memory.js";

// Utilities
export { formatCounter, parseCounter } from "./counter.js";
