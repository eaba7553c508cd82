import { type ParseArgsConfig, parseArgs } from "node:util";
import type { ConfigOverrides } from "../config.js";
import { CliUsageError } from "./errors.js";

const OPTIONS = {
  "max-jobs": { type: "string", short: "j" },
  "retry-interval": { type: "string", short: "i" },
  file: { type: "string", short: "f" },
  timeout: { type: "string", short: "t" },
  "log-level": { type: "string" },
  help: { type: "boolean", short: "h" },
} as const satisfies ParseArgsConfig["options"];

export interface CliArgs {
  help: boolean;
  overrides: ConfigOverrides;
  command: string[];
}

/** Flags that consume the following argument as their value. */
const VALUE_FLAGS: ReadonlySet<string> = new Set(
  Object.entries(OPTIONS).flatMap(([name, spec]) => {
    if (spec.type !== "string") return [];
    return "short" in spec ? [`--${name}`, `-${spec.short}`] : [`--${name}`];
  }),
);

/**
 * Split argv into fsem's own flags and the workload command.
 * The command starts after "--" or at the first bare argument.
 */
export function splitArgv(argv: string[]): { flags: string[]; command: string[] } {
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? "";
    if (arg === "--") {
      return { flags: argv.slice(0, i), command: argv.slice(i + 1) };
    }
    if (!arg.startsWith("-") || arg === "-") {
      return { flags: argv.slice(0, i), command: argv.slice(i) };
    }
    if (VALUE_FLAGS.has(arg)) i++;
  }
  return { flags: argv, command: [] };
}

export function parseCliArgs(argv: string[]): CliArgs {
  const { flags, command } = splitArgv(argv);

  let values: ReturnType<typeof parseFlags>;
  try {
    values = parseFlags(flags);
  } catch (err) {
    throw new CliUsageError(err instanceof Error ? err.message : String(err));
  }

  const overrides: ConfigOverrides = {};
  if (values["max-jobs"] !== undefined) overrides.max_concurrent_jobs = values["max-jobs"];
  if (values["retry-interval"] !== undefined) overrides.retry_interval = values["retry-interval"];
  if (values.file !== undefined) overrides.semaphore_file = values.file;
  if (values.timeout !== undefined) overrides.acquire_timeout = values.timeout;
  if (values["log-level"] !== undefined) overrides.log_level = values["log-level"];

  const help = values.help ?? false;
  if (!help && command.length === 0) {
    throw new CliUsageError("Missing command to run");
  }

  return { help, overrides, command };
}

function parseFlags(flags: string[]) {
  return parseArgs({
    args: flags,
    options: OPTIONS,
    strict: true,
    allowPositionals: false,
  }).values;
}
