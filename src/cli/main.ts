import { loadConfig } from "../config.js";
import { SemaphoreError } from "../engine/errors.js";
import type { ProcessLike } from "../engine/release-guard.js";
import { runWithSemaphore } from "../engine/runner.js";
import { createLogger } from "../logger.js";
import { FileSemaphoreStore } from "../semaphore/file.js";
import type { SemaphoreStore } from "../semaphore/store.js";
import { parseCliArgs } from "./args.js";
import { CliUsageError } from "./errors.js";
import { usage } from "./usage.js";
import { spawnWorkload } from "./workload.js";

export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export interface CliDeps {
  env?: NodeJS.ProcessEnv;
  proc?: ProcessLike;
  stdout?: (text: string) => void;
  stderr?: (text: string) => void;
}

/**
 * Parse argv, hold a slot for the duration of the command and resolve with
 * the status the process should exit with.
 */
export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  const stdout = deps.stdout ?? ((text) => process.stdout.write(`${text}\n`));
  const stderr = deps.stderr ?? ((text) => process.stderr.write(`${text}\n`));

  let args: ReturnType<typeof parseCliArgs>;
  let config: ReturnType<typeof loadConfig>;
  try {
    args = parseCliArgs(argv);
    if (args.help) {
      stdout(usage());
      return 0;
    }
    config = loadConfig(deps.env ?? process.env, args.overrides);
  } catch (err) {
    if (err instanceof CliUsageError || isConfigError(err)) {
      stderr(`fsem: ${err.message}`);
      stderr(usage());
      return EXIT_USAGE;
    }
    throw err;
  }

  const [command, ...commandArgs] = args.command;
  if (command === undefined) {
    stderr(usage());
    return EXIT_USAGE;
  }

  const logger = createLogger(config.log_level);
  let store: SemaphoreStore | undefined;
  try {
    store = new FileSemaphoreStore({
      path: config.semaphore_file,
      staleMs: config.lock_stale_ms,
      logger,
    });
    return await runWithSemaphore(
      {
        store,
        max: config.max_concurrent_jobs,
        retryIntervalMs: config.retry_interval * 1000,
        timeoutMs:
          config.acquire_timeout === undefined
            ? undefined
            : config.acquire_timeout * 1000,
        proc: deps.proc,
        logger,
      },
      spawnWorkload(command, commandArgs),
    );
  } catch (err) {
    if (err instanceof SemaphoreError && err.code === "ACQUIRE_TIMEOUT") {
      logger.error({ details: err.details }, err.message);
      return EXIT_FAILURE;
    }
    logger.fatal({ err }, "fsem failed");
    return EXIT_FAILURE;
  } finally {
    store?.close();
  }
}

function isConfigError(err: unknown): err is SemaphoreError {
  return err instanceof SemaphoreError && err.code === "INVALID_CONFIG";
}
