export function usage(): string {
  return `
fsem - cap how many copies of a command run at once, across processes

Usage:
  fsem [options] [--] <command> [args...]

Options:
  -j, --max-jobs <n>          Max simultaneous holders (env MAX_CONCURRENT_JOBS, default 1)
  -i, --retry-interval <sec>  Wait between attempts while full (env RETRY_INTERVAL, default 5)
  -f, --file <path>           Semaphore file (env SEMAPHORE_FILE, default ./tmp/locks/semaphore.lock)
  -t, --timeout <sec>         Give up waiting after this long (env ACQUIRE_TIMEOUT, default never)
      --log-level <level>     fatal|error|warn|info|debug|trace|silent (env LOG_LEVEL, default info)
  -h, --help                  Show this help

Put "--" before the command when it takes options of its own.

Exit status is the command's. Interrupted runs exit with 128 + signal
number; usage errors exit with 2.

Examples:
  # At most one deploy at a time
  fsem -- ./deploy.sh --prod

  # Two concurrent test shards sharing a counter
  MAX_CONCURRENT_JOBS=2 fsem -f /var/tmp/ci/tests.lock -- npm test
`.trim();
}
