// Model
export { Range } from "./model/range.js";
export { OptionSpec, PositionalParamSpec, OptionSpecBuilder, PositionalParamSpecBuilder } from "./model/arg-spec.js";
export { ValueBinding, valueBinding, propertyBinding } from "./model/binding.js";
export { builtInConverter, resolveConverter } from "./model/converters.js";
export type { BuiltInConverterOptions } from "./model/converters.js";

// Command specification
export { CommandSpec, CommandSpecBuilder } from "./command/command-spec.js";

// Argument files
export {
  createAtFileExpander,
  atFileUsageEntry,
  DEFAULT_AT_FILE_LABEL,
  DEFAULT_AT_FILE_DESCRIPTION,
} from "./atfile/preprocessor.js";
export type { AtFileExpander, AtFileExpanderOptions, AtFileUsageEntry } from "./atfile/preprocessor.js";
export { tokenizeClassic, tokenizeSimplified } from "./atfile/tokenizer.js";
export { createNodeFileSystem } from "./atfile/node-file-system.js";

// Interpreter
export { createInterpreter } from "./interpreter/interpreter.js";
export type { Interpreter, InterpreterOptions } from "./interpreter/interpreter.js";
export { ParseResult } from "./interpreter/parse-result.js";

// Dispatch
export { createSubcommandDispatcher } from "./dispatch/dispatcher.js";
export type { SubcommandDispatcher, SubcommandParser } from "./dispatch/dispatcher.js";
export { CommandLine } from "./dispatch/command-line.js";
export type { FromEnvironmentOptions } from "./dispatch/command-line.js";
