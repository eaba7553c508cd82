import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { type Logger, pino } from "pino";

export interface CapturedLogger {
  logger: Logger;
  lines: Array<Record<string, unknown>>;
}

/** Logger whose JSON lines land in `lines` instead of stderr. */
export function captureLogger(level = "info"): CapturedLogger {
  const lines: Array<Record<string, unknown>> = [];
  const logger = pino(
    { level },
    {
      write(msg: string) {
        lines.push(JSON.parse(msg));
      },
    },
  );
  return { logger, lines };
}

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "fsem-test-"));
}

export function removeTempDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
}

export function deferred<T = void>(): Deferred<T> {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}
