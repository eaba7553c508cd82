import pino, { type Logger } from "pino";

export type { Logger } from "pino";

export const LOG_LEVELS = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * JSON logs go to stderr, synchronously, so the workload owns stdout and
 * nothing is lost when the process exits right after a release.
 */
export function createLogger(level: LogLevel = "info"): Logger {
  return pino(
    { name: "fsem", level },
    pino.destination({ dest: 2, sync: true }),
  );
}

/** Default for library callers that don't pass a logger. */
export const disabledLogger: Logger = pino({ enabled: false });
