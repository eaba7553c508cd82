import { spawn } from "node:child_process";
import tty from "node:tty";
import type { Workload } from "../engine/runner.js";
import { signalExitCode } from "../engine/runner.js";

const COMMAND_NOT_FOUND = 127;
const COMMAND_NOT_EXECUTABLE = 126;

/**
 * Map how a child ended to a shell-style exit status.
 * The semaphore layer only passes this through; it never inspects it.
 */
export function childExitCode(
  code: number | null,
  signal: NodeJS.Signals | null,
): number {
  if (code !== null) return code;
  if (signal !== null) return signalExitCode(signal);
  return 1;
}

/** Exit status for a command that could not be started. */
export function spawnErrorExitCode(err: Error): number {
  const code = "code" in err ? err.code : undefined;
  if (code === "ENOENT") return COMMAND_NOT_FOUND;
  if (code === "EACCES") return COMMAND_NOT_EXECUTABLE;
  return 1;
}

function isSignalName(value: unknown): value is NodeJS.Signals {
  return typeof value === "string" && value.startsWith("SIG");
}

export interface SpawnWorkloadOpts {
  /**
   * The child shares fsem's terminal, so a Ctrl-C there already reached
   * it through the foreground process group. Default: stdin is a TTY.
   */
  sharesTerminal?: boolean;
}

/**
 * Workload that runs `command` once with inherited stdio. When the run is
 * interrupted the same signal is forwarded to the child (except a SIGINT
 * the terminal already delivered), a repeat signal kills it outright, and
 * the run finishes when the child does.
 */
export function spawnWorkload(
  command: string,
  args: string[],
  opts: SpawnWorkloadOpts = {},
): Workload {
  const sharesTerminal = opts.sharesTerminal ?? tty.isatty(0);

  return ({ signal, forceStop, logger }) =>
    new Promise((resolve) => {
      logger.debug({ command, args }, "Starting workload");
      const child = spawn(command, args, { stdio: "inherit" });

      const forward = () => {
        const name = isSignalName(signal.reason) ? signal.reason : "SIGTERM";
        if (name === "SIGINT" && sharesTerminal) return;
        logger.debug({ signal: name, pid: child.pid }, "Forwarding signal to workload");
        child.kill(name);
      };
      const kill = () => {
        logger.warn({ pid: child.pid }, "Killing workload");
        child.kill("SIGKILL");
      };
      const detach = () => {
        signal.removeEventListener("abort", forward);
        forceStop.removeEventListener("abort", kill);
      };
      signal.addEventListener("abort", forward, { once: true });
      forceStop.addEventListener("abort", kill, { once: true });

      child.on("error", (err) => {
        detach();
        logger.error({ err, command }, "Workload spawn error");
        resolve(spawnErrorExitCode(err));
      });

      child.on("close", (code, childSignal) => {
        detach();
        resolve(childExitCode(code, childSignal));
      });
    });
}
