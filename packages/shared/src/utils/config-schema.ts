/**
 * Zod schemas for parser and process-wide configuration.
 *
 * Parser configuration belongs to one command specification and is fixed when
 * the command specification is built. Process configuration is read once at the
 * entry boundary and handed to each interpreter at construction.
 */

import { z } from "zod";

export const ParserConfigSchema = z
  .object({
    separator: z.string().min(1, "Separator must not be empty").default("="),
    endOfOptionsDelimiter: z.string().min(1, "End-of-options delimiter must not be empty").default("--"),
    expandAtFiles: z.boolean().default(true),
    atFileCommentChar: z
      .string()
      .length(1, "Comment char must be a single character")
      .nullable()
      .default("#"),
    useSimplifiedAtFiles: z.boolean().default(false),
    posixClusteredShortOptionsAllowed: z.boolean().default(true),
    unmatchedArgumentsAllowed: z.boolean().default(false),
    unmatchedOptionsArePositionalParams: z.boolean().default(false),
    stopAtUnmatched: z.boolean().default(false),
    stopAtPositional: z.boolean().default(false),
    overwrittenOptionsAllowed: z.boolean().default(false),
    toggleBooleanFlags: z.boolean().default(false),
    optionsCaseInsensitive: z.boolean().default(false),
    subcommandsCaseInsensitive: z.boolean().default(false),
    caseInsensitiveEnumValuesAllowed: z.boolean().default(false),
    collectErrors: z.boolean().default(false),
    trimQuotes: z.boolean().optional(),
  })
  .strict();

export type ParserConfigInput = z.input<typeof ParserConfigSchema>;
export type ValidatedParserConfig = z.infer<typeof ParserConfigSchema>;

export const TraceLevelSchema = z.enum(["OFF", "WARN", "INFO", "DEBUG"]);
export type TraceLevel = z.infer<typeof TraceLevelSchema>;

export const ProcessConfigSchema = z
  .object({
    /** Overrides the parser's own at-file mode when present. */
    useSimplifiedAtFiles: z.boolean().optional(),
    /** Default for parsers that leave trimQuotes unset. */
    trimQuotes: z.boolean().optional(),
    traceLevel: TraceLevelSchema.optional(),
    atFileLabel: z.string().min(1, "At-file label must not be empty").optional(),
    atFileDescription: z.string().optional(),
  })
  .strict();

export type ProcessConfig = z.infer<typeof ProcessConfigSchema>;
