/**
 * Error hierarchy for the argument parser.
 *
 * Initialization errors describe a broken specification and are raised while
 * building it. Parameter errors describe bad user input and are raised (or
 * collected) while parsing.
 */

import type { IArgSpec } from "../types/arg.js";
import { ErrorCode } from "./codes.js";

export class ArgloomError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    options?: { cause?: Error },
  ) {
    super(message, options);
    this.name = "ArgloomError";
  }
}

export class InitializationError extends ArgloomError {
  constructor(
    message: string,
    options?: { cause?: Error; code?: string },
  ) {
    super(message, options?.code ?? ErrorCode.INITIALIZATION_ERROR, options);
    this.name = "InitializationError";
  }
}

/**
 * Thrown when two options (or two subcommands) claim the same name under the
 * active case rule.
 */
export class DuplicateNameError extends InitializationError {
  constructor(
    public readonly duplicateName: string,
    message: string,
  ) {
    super(message, { code: ErrorCode.DUPLICATE_NAME });
    this.name = "DuplicateNameError";
  }
}

/**
 * Thrown when the declared positional index ranges leave a position
 * that no positional parameter can ever reach.
 */
export class ParameterIndexGapError extends InitializationError {
  constructor(
    public readonly missingIndex: number,
    message: string,
  ) {
    super(message, { code: ErrorCode.PARAMETER_INDEX_GAP });
    this.name = "ParameterIndexGapError";
  }
}

export interface ParameterErrorDetails {
  /** The argument the error is about, when there is one. */
  argSpec?: IArgSpec;
  /** The raw token or value that triggered the error. */
  value?: string;
  /** Name of the command level being parsed. */
  commandName?: string;
  cause?: Error;
  code?: string;
}

export class ParameterError extends ArgloomError {
  public readonly argSpec: IArgSpec | undefined;
  public readonly value: string | undefined;
  public readonly commandName: string | undefined;

  constructor(message: string, details: ParameterErrorDetails = {}) {
    super(message, details.code ?? ErrorCode.PARAMETER_ERROR, { cause: details.cause });
    this.name = "ParameterError";
    this.argSpec = details.argSpec;
    this.value = details.value;
    this.commandName = details.commandName;
  }
}

export class MissingParameterError extends ParameterError {
  constructor(
    message: string,
    public readonly missing: readonly IArgSpec[],
    details: Omit<ParameterErrorDetails, "code"> = {},
  ) {
    super(message, { ...details, argSpec: details.argSpec ?? missing[0], code: ErrorCode.MISSING_PARAMETER });
    this.name = "MissingParameterError";
  }
}

export class TypeConversionError extends ParameterError {
  constructor(message: string, details: Omit<ParameterErrorDetails, "code"> = {}) {
    super(message, { ...details, code: ErrorCode.TYPE_CONVERSION });
    this.name = "TypeConversionError";
  }
}

export class MalformedMapEntryError extends ParameterError {
  constructor(message: string, details: Omit<ParameterErrorDetails, "code"> = {}) {
    super(message, { ...details, code: ErrorCode.MALFORMED_MAP_ENTRY });
    this.name = "MalformedMapEntryError";
  }
}

export class OverwrittenOptionError extends ParameterError {
  constructor(message: string, details: Omit<ParameterErrorDetails, "code"> = {}) {
    super(message, { ...details, code: ErrorCode.OVERWRITTEN_OPTION });
    this.name = "OverwrittenOptionError";
  }
}

/**
 * Thrown for an unknown option or an unexpected positional token.
 */
export class UnmatchedArgumentError extends ParameterError {
  constructor(
    message: string,
    public readonly unmatched: readonly string[],
    details: Omit<ParameterErrorDetails, "code"> = {},
  ) {
    super(message, { ...details, value: details.value ?? unmatched[0], code: ErrorCode.UNMATCHED_ARGUMENT });
    this.name = "UnmatchedArgumentError";
  }
}
