import { describe, it, expect } from "vitest";
import { InitializationError, ErrorCode } from "@argloom/sdk";
import { ParserConfigSchema, ProcessConfigSchema } from "./config-schema.js";
import { loadProcessConfig, logLevelForTrace, parseSwitch } from "./process-config.js";
import { parseConfig, validateInput } from "./validation.js";

describe("ParserConfigSchema", () => {
  it("applies defaults to an empty object", () => {
    const config = ParserConfigSchema.parse({});
    expect(config.separator).toBe("=");
    expect(config.endOfOptionsDelimiter).toBe("--");
    expect(config.expandAtFiles).toBe(true);
    expect(config.atFileCommentChar).toBe("#");
    expect(config.posixClusteredShortOptionsAllowed).toBe(true);
    expect(config.collectErrors).toBe(false);
    expect(config.trimQuotes).toBeUndefined();
  });

  it("accepts a null comment char", () => {
    expect(ParserConfigSchema.parse({ atFileCommentChar: null }).atFileCommentChar).toBeNull();
  });

  it("rejects unknown keys", () => {
    const result = validateInput(ParserConfigSchema, { seperator: ":" });
    expect(result.success).toBe(false);
  });

  it("rejects a multi-character comment char", () => {
    const result = validateInput(ParserConfigSchema, { atFileCommentChar: "//" });
    expect(result).toEqual({
      success: false,
      error: "atFileCommentChar: Comment char must be a single character",
    });
  });
});

describe("parseConfig", () => {
  it("returns parsed data", () => {
    expect(parseConfig(ParserConfigSchema, { separator: ":" }, "parser configuration").separator).toBe(":");
  });

  it("throws InitializationError with every issue", () => {
    try {
      parseConfig(ParserConfigSchema, { separator: "" }, "parser configuration");
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InitializationError);
      if (err instanceof InitializationError) {
        expect(err.code).toBe(ErrorCode.CONFIG_VALIDATION_ERROR);
        expect(err.message).toBe("Invalid parser configuration: separator: Separator must not be empty");
      }
    }
  });
});

describe("parseSwitch", () => {
  it("keeps unset as undefined", () => {
    expect(parseSwitch(undefined)).toBeUndefined();
  });

  it("treats empty and true as on", () => {
    expect(parseSwitch("")).toBe(true);
    expect(parseSwitch("TRUE")).toBe(true);
    expect(parseSwitch(" true ")).toBe(true);
  });

  it("treats anything else as off", () => {
    expect(parseSwitch("false")).toBe(false);
    expect(parseSwitch("1")).toBe(false);
  });
});

describe("loadProcessConfig", () => {
  it("reads nothing from an empty environment", () => {
    expect(loadProcessConfig({})).toEqual({
      useSimplifiedAtFiles: undefined,
      trimQuotes: undefined,
      traceLevel: undefined,
      atFileLabel: undefined,
      atFileDescription: undefined,
    });
  });

  it("reads every variable", () => {
    const config = loadProcessConfig({
      ARGLOOM_USE_SIMPLIFIED_AT_FILES: "",
      ARGLOOM_TRIM_QUOTES: "false",
      ARGLOOM_TRACE: "debug",
      ARGLOOM_AT_FILE_LABEL: "@<argfile>",
      ARGLOOM_AT_FILE_DESCRIPTION: "Read arguments from a file.",
    });
    expect(config.useSimplifiedAtFiles).toBe(true);
    expect(config.trimQuotes).toBe(false);
    expect(config.traceLevel).toBe("DEBUG");
    expect(config.atFileLabel).toBe("@<argfile>");
    expect(config.atFileDescription).toBe("Read arguments from a file.");
  });

  it("rejects an unknown trace level", () => {
    expect(() => loadProcessConfig({ ARGLOOM_TRACE: "loud" })).toThrow(InitializationError);
  });

  it("validates directly through the schema", () => {
    expect(ProcessConfigSchema.safeParse({ traceLevel: "INFO" }).success).toBe(true);
  });
});

describe("logLevelForTrace", () => {
  it("maps each trace level", () => {
    expect(logLevelForTrace("OFF")).toBe("silent");
    expect(logLevelForTrace("WARN")).toBe("warn");
    expect(logLevelForTrace("INFO")).toBe("info");
    expect(logLevelForTrace("DEBUG")).toBe("debug");
  });

  it("defaults to warn", () => {
    expect(logLevelForTrace(undefined)).toBe("warn");
  });
});
