export {
  type Config,
  type ConfigInput,
  ConfigSchema,
  LogLevelSchema,
} from "./config.js";
