export { createLogger } from "./logger/index.js";
export type { Logger, LogLevel, LogContext, LogSink } from "./logger/index.js";

export { validateInput, formatZodError, parseConfig } from "./utils/validation.js";
export type { ValidationResult } from "./utils/validation.js";

export {
  ParserConfigSchema,
  ProcessConfigSchema,
  TraceLevelSchema,
} from "./utils/config-schema.js";
export type {
  ParserConfigInput,
  ValidatedParserConfig,
  ProcessConfig,
  TraceLevel,
} from "./utils/config-schema.js";

export {
  loadProcessConfig,
  parseSwitch,
  logLevelForTrace,
  PROCESS_ENV_KEYS,
} from "./utils/process-config.js";
