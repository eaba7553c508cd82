import { SemaphoreError } from "./engine/errors.js";
import { type Config, ConfigSchema } from "./schemas/config.js";

/** Environment variable → config key. */
export const ENV_KEYS = {
  MAX_CONCURRENT_JOBS: "max_concurrent_jobs",
  RETRY_INTERVAL: "retry_interval",
  SEMAPHORE_FILE: "semaphore_file",
  ACQUIRE_TIMEOUT: "acquire_timeout",
  LOCK_STALE_MS: "lock_stale_ms",
  LOG_LEVEL: "log_level",
} as const satisfies Record<string, keyof Config>;

export type ConfigOverrides = Partial<Record<keyof Config, string | number>>;

/**
 * Resolve configuration: defaults < environment < overrides (CLI flags).
 * Blank environment values count as unset.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ConfigOverrides = {},
): Config {
  const raw: Record<string, string | number> = {};
  for (const [name, key] of Object.entries(ENV_KEYS)) {
    const value = env[name]?.trim();
    if (value) raw[key] = value;
  }
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) raw[key] = value;
  }

  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join(".") || "config"}: ${issue.message}`,
    );
    throw new SemaphoreError(
      "INVALID_CONFIG",
      `Invalid configuration: ${issues.join("; ")}`,
      { issues },
    );
  }
  return parsed.data;
}
