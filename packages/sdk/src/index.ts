// Types
export type {
  ValueType,
  ContainerKind,
  MultiValuePolicy,
  ArgKind,
  TypeConverter,
  Binding,
  IRange,
  IArgSpec,
  IOptionSpec,
  IPositionalParamSpec,
} from "./types/arg.js";

export type {
  ParserConfig,
  UsageAttributes,
  ICommandSpec,
} from "./types/command.js";

export type { IParseResult } from "./types/parse-result.js";

// Interfaces
export type { FileSystemReader } from "./interfaces/file-system.js";

// Errors
export {
  ArgloomError,
  InitializationError,
  DuplicateNameError,
  ParameterIndexGapError,
  ParameterError,
  MissingParameterError,
  TypeConversionError,
  MalformedMapEntryError,
  OverwrittenOptionError,
  UnmatchedArgumentError,
} from "./errors/base.js";
export type { ParameterErrorDetails } from "./errors/base.js";

export { ErrorCode } from "./errors/codes.js";
export type { ErrorCodeValue } from "./errors/codes.js";
