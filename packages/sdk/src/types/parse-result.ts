/**
 * Parse result contract: what one command level matched.
 */

import type { IArgSpec, IOptionSpec, IPositionalParamSpec } from "./arg.js";
import type { ICommandSpec } from "./command.js";
import type { ParameterError } from "../errors/base.js";

export interface IParseResult {
  readonly commandSpec: ICommandSpec;
  /** Tokens as given to this level, before at-file expansion. */
  readonly originalArgs: readonly string[];
  /** Tokens after at-file expansion. */
  readonly expandedArgs: readonly string[];
  /** Each matched argument once, in first-match order. */
  readonly matchedArgs: readonly IArgSpec[];
  readonly matchedOptions: readonly IOptionSpec[];
  readonly matchedPositionals: readonly IPositionalParamSpec[];
  readonly unmatched: readonly string[];
  /** Populated only in collect-errors mode. */
  readonly errors: readonly ParameterError[];
  readonly subcommand: IParseResult | undefined;
  readonly isUsageHelpRequested: boolean;
  readonly isVersionHelpRequested: boolean;

  hasMatchedOption(name: string): boolean;
  matchedOption(name: string): IOptionSpec | undefined;
  /** Bound value of a matched option, or the fallback when it did not match. */
  matchedOptionValue(name: string, fallback?: unknown): unknown;
  hasMatchedPositional(index: number): boolean;
  matchedPositional(index: number): IPositionalParamSpec | undefined;
  matchedPositionalValue(index: number, fallback?: unknown): unknown;
  /** Raw strings consumed by an argument across all of its matches. */
  rawValues(arg: IArgSpec): readonly string[];
  /** Converted values produced by an argument across all of its matches. */
  typedValues(arg: IArgSpec): readonly unknown[];
  /** This level followed by every nested subcommand level. */
  asList(): readonly IParseResult[];
}
