export type SemaphoreErrorCode =
  | "ACQUIRE_TIMEOUT" // no slot freed up within acquire timeout
  | "ACQUIRE_ABORTED" // abort signal fired while polling
  | "INVALID_CONFIG"; // configuration failed schema validation

export class SemaphoreError extends Error {
  constructor(
    public readonly code: SemaphoreErrorCode,
    message: string,
    public readonly details?: {
      path?: string;
      attempts?: number;
      waited_ms?: number;
      reason?: unknown;
      issues?: string[];
    },
  ) {
    super(message);
    this.name = "SemaphoreError";
  }
}
