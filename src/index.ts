export * from "./engine/index.js";
export * from "./semaphore/index.js";
export * from "./schemas/index.js";
export { type ConfigOverrides, ENV_KEYS, loadConfig } from "./config.js";
export { createLogger, disabledLogger, type Logger, type LogLevel } from "./logger.js";
