import { z } from "zod";
import { LOG_LEVELS } from "../logger.js";

export const LogLevelSchema = z.enum(LOG_LEVELS);

/** Longest delay setTimeout holds, in whole seconds. */
const MAX_WAIT_S = 2_147_483;

/**
 * Runtime configuration. Values arrive as strings from the environment or
 * the command line, so numbers are coerced.
 */
export const ConfigSchema = z
  .object({
    /** Upper bound on simultaneous slot holders */
    max_concurrent_jobs: z.coerce.number().int().min(1).default(1),

    /** Seconds between failed acquire attempts (fixed, no backoff) */
    retry_interval: z.coerce.number().positive().max(MAX_WAIT_S).default(5),

    /** Counter location; created with its parent directories if absent */
    semaphore_file: z.string().trim().min(1).default("./tmp/locks/semaphore.lock"),

    /** Seconds to wait for a slot before giving up. Unset waits forever. */
    acquire_timeout: z.coerce.number().positive().max(MAX_WAIT_S).optional(),

    /** Age after which an abandoned counter lock is taken over */
    lock_stale_ms: z.coerce.number().int().min(2000).default(10_000),

    log_level: LogLevelSchema.default("info"),
  })
  .strict();

export type Config = z.infer<typeof ConfigSchema>;
export type ConfigInput = z.input<typeof ConfigSchema>;
