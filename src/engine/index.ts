// Acquire loop
export type { AcquireOpts, AcquireResult } from "./acquire-loop.js";
export { acquireSlot, sleep } from "./acquire-loop.js";

// Errors
export type { SemaphoreErrorCode } from "./errors.js";
export { SemaphoreError } from "./errors.js";

// Release guard
export type { ProcessLike, ProcessState } from "./release-guard.js";
export { ReleaseGuard } from "./release-guard.js";

// Runner
export type { RunOpts, SlotOpts, Workload, WorkloadContext } from "./runner.js";
export {
  runWithSemaphore,
  signalExitCode,
  TERMINATING_SIGNALS,
  withSlot,
} from "./runner.js";
