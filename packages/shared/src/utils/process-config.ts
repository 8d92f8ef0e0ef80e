/**
 * Process-wide configuration from environment variables.
 *
 * Only the entry boundary calls loadProcessConfig; everything below it
 * receives the resulting struct explicitly.
 */

import type { LogLevel } from "../logger/index.js";
import { ProcessConfigSchema } from "./config-schema.js";
import type { ProcessConfig, TraceLevel } from "./config-schema.js";
import { parseConfig } from "./validation.js";

export const PROCESS_ENV_KEYS = {
  useSimplifiedAtFiles: "ARGLOOM_USE_SIMPLIFIED_AT_FILES",
  trimQuotes: "ARGLOOM_TRIM_QUOTES",
  traceLevel: "ARGLOOM_TRACE",
  atFileLabel: "ARGLOOM_AT_FILE_LABEL",
  atFileDescription: "ARGLOOM_AT_FILE_DESCRIPTION",
} as const;

/**
 * Interpret a boolean switch: unset stays undefined, the empty string means
 * true, anything else is true only when it reads "true" in any case.
 */
export function parseSwitch(raw: string | undefined): boolean | undefined {
  if (raw === undefined) return undefined;
  const trimmed = raw.trim();
  return trimmed === "" || trimmed.toLowerCase() === "true";
}

export function loadProcessConfig(
  env: Record<string, string | undefined> = process.env,
): ProcessConfig {
  const trace = env[PROCESS_ENV_KEYS.traceLevel];
  return parseConfig(
    ProcessConfigSchema,
    {
      useSimplifiedAtFiles: parseSwitch(env[PROCESS_ENV_KEYS.useSimplifiedAtFiles]),
      trimQuotes: parseSwitch(env[PROCESS_ENV_KEYS.trimQuotes]),
      traceLevel: trace === undefined || trace.trim() === "" ? undefined : trace.trim().toUpperCase(),
      atFileLabel: env[PROCESS_ENV_KEYS.atFileLabel],
      atFileDescription: env[PROCESS_ENV_KEYS.atFileDescription],
    },
    "process configuration",
  );
}

const TRACE_TO_LOG_LEVEL: Record<TraceLevel, LogLevel> = {
  OFF: "silent",
  WARN: "warn",
  INFO: "info",
  DEBUG: "debug",
};

/** Logger level for a trace setting; unset traces at WARN. */
export function logLevelForTrace(trace: TraceLevel | undefined): LogLevel {
  return TRACE_TO_LOG_LEVEL[trace ?? "WARN"];
}
