/** Outcome of a single lock-protected acquire attempt. */
export type AcquireStatus = "ACQUIRED" | "BUSY";

export interface TryAcquireResult {
  status: AcquireStatus;
  count: number; // counter value after the attempt
}
