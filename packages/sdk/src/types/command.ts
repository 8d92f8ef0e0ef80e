/**
 * Command specification contracts.
 */

import type { IArgSpec, IOptionSpec, IPositionalParamSpec, TypeConverter, ValueType } from "./arg.js";

/**
 * Parser behaviour switches of one command level, with defaults applied.
 */
export interface ParserConfig {
  /** Separates an option name from an attached value, as in `--file=out.txt`. */
  readonly separator: string;
  readonly endOfOptionsDelimiter: string;
  readonly expandAtFiles: boolean;
  /** Single character that starts a comment in an argument file; null disables comments. */
  readonly atFileCommentChar: string | null;
  readonly useSimplifiedAtFiles: boolean;
  readonly posixClusteredShortOptionsAllowed: boolean;
  readonly unmatchedArgumentsAllowed: boolean;
  readonly unmatchedOptionsArePositionalParams: boolean;
  readonly stopAtUnmatched: boolean;
  readonly stopAtPositional: boolean;
  readonly overwrittenOptionsAllowed: boolean;
  readonly toggleBooleanFlags: boolean;
  readonly optionsCaseInsensitive: boolean;
  readonly subcommandsCaseInsensitive: boolean;
  readonly caseInsensitiveEnumValuesAllowed: boolean;
  readonly collectErrors: boolean;
  /** Undefined defers to the process-wide setting. */
  readonly trimQuotes?: boolean;
}

/** Usage attributes a help layer renders; mixins fill the ones left unset. */
export interface UsageAttributes {
  readonly version: string | undefined;
  readonly description: readonly string[];
  readonly header: readonly string[];
  readonly footer: readonly string[];
}

export interface ICommandSpec {
  readonly name: string;
  readonly aliases: readonly string[];
  readonly usage: UsageAttributes;
  readonly options: readonly IOptionSpec[];
  /** Sorted by index range. */
  readonly positionals: readonly IPositionalParamSpec[];
  /** Options followed by positionals. */
  readonly args: readonly IArgSpec[];
  /** Keyed by primary name; aliases resolve through findSubcommand. */
  readonly subcommands: ReadonlyMap<string, ICommandSpec>;
  readonly mixins: ReadonlyMap<string, ICommandSpec>;
  readonly parser: ParserConfig;

  /** Option lookup honouring the case rule. */
  findOption(name: string): IOptionSpec | undefined;
  /** Subcommand lookup by name or alias, honouring the case rule. */
  findSubcommand(name: string): ICommandSpec | undefined;
  /** Converter registered on this command for a value type. */
  converterFor(type: ValueType): TypeConverter | undefined;
}
