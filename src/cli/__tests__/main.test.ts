import { EventEmitter } from "node:events";
import fs from "node:fs";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { makeTempDir, removeTempDir } from "../../__tests__/helpers.js";
import { EXIT_FAILURE, EXIT_USAGE, runCli } from "../main.js";
import { usage } from "../usage.js";

function capture() {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    deps: {
      env: {},
      stdout: (text: string) => {
        out.push(text);
      },
      stderr: (text: string) => {
        err.push(text);
      },
    },
  };
}

describe("runCli", () => {
  test("--help prints usage and succeeds", async () => {
    const { out, err, deps } = capture();

    expect(await runCli(["--help"], deps)).toBe(0);
    expect(out).toEqual([usage()]);
    expect(err).toEqual([]);
  });

  test("unknown flag exits with the usage status", async () => {
    const { err, deps } = capture();

    expect(await runCli(["--nope", "--", "true"], deps)).toBe(EXIT_USAGE);
    expect(err[0]).toMatch(/^fsem: /);
    expect(err[1]).toBe(usage());
  });

  test("missing command exits with the usage status", async () => {
    const { err, deps } = capture();

    expect(await runCli([], deps)).toBe(EXIT_USAGE);
    expect(err[0]).toBe("fsem: Missing command to run");
  });

  test("invalid configuration exits with the usage status", async () => {
    const { err, deps } = capture();

    const code = await runCli(["true"], {
      ...deps,
      env: { MAX_CONCURRENT_JOBS: "0" },
    });

    expect(code).toBe(EXIT_USAGE);
    expect(err[0]).toMatch(/^fsem: Invalid configuration: max_concurrent_jobs: /);
  });
});

describe("runCli with a real command", () => {
  let dir: string;
  let file: string;

  beforeEach(() => {
    dir = makeTempDir();
    file = path.join(dir, "locks", "sem.lock");
  });

  afterEach(() => {
    removeTempDir(dir);
  });

  function run(argv: string[], proc = new EventEmitter()): Promise<number> {
    const { deps } = capture();
    return runCli(["-f", file, "--log-level", "silent", ...argv], { ...deps, proc });
  }

  function count(): string {
    return fs.readFileSync(file, "utf8");
  }

  test("returns the command's exit code and gives the slot back", async () => {
    const code = await run(["--", process.execPath, "-e", "process.exit(3)"]);

    expect(code).toBe(3);
    expect(count()).toBe("0\n");
  });

  test("terminated while holding the slot: child stopped, slot released", async () => {
    const proc = new EventEmitter();
    const pending = run(["--", process.execPath, "-e", "setInterval(() => {}, 1000)"], proc);

    await vi.waitFor(() => expect(count()).toBe("1\n"));
    proc.emit("SIGTERM", "SIGTERM");

    expect(await pending).toBe(143);
    expect(count()).toBe("0\n");
  });

  test("terminated while waiting: the other holder's slot is untouched", async () => {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, "1\n");
    const proc = new EventEmitter();
    const pending = run(["-i", "60", "--", process.execPath, "-e", "process.exit(0)"], proc);

    setTimeout(() => proc.emit("SIGHUP", "SIGHUP"), 50);

    expect(await pending).toBe(129);
    expect(count()).toBe("1\n");
  });

  test("a semaphore path that can't be opened is a logged failure", async () => {
    const code = await runCli(
      ["-f", dir, "--log-level", "silent", "--", process.execPath, "-e", "0"],
      { ...capture().deps, proc: new EventEmitter() },
    );

    expect(code).toBe(EXIT_FAILURE);
  });
});
