/**
 * Interpreter — walks the tokens of one command level, matches them to the
 * command's options and positionals, converts and binds their values, and
 * hands the tail of the stream to a subcommand when one is named.
 *
 * Per token, in order:
 * 1. after "--" (or once stop-at-positional fired) everything is positional
 * 2. the end-of-options delimiter is consumed and ends option processing
 * 3. a subcommand name dispatches the rest of the stream
 * 4. an exact option name
 * 5. "name<separator>value", split at the first separator
 * 6. a cluster of single-character options
 * 7. something that resembles an option is an unknown option
 * 8. anything else is offered to the positionals
 */

import type { FileSystemReader, IArgSpec, ICommandSpec, IOptionSpec } from "@argloom/sdk";
import {
  InitializationError,
  MissingParameterError,
  OverwrittenOptionError,
  ParameterError,
  UnmatchedArgumentError,
} from "@argloom/sdk";
import { createLogger, logLevelForTrace } from "@argloom/shared";
import type { LogSink, Logger, ProcessConfig } from "@argloom/shared";
import { createAtFileExpander } from "../atfile/preprocessor.js";
import type { AtFileExpander } from "../atfile/preprocessor.js";
import { cloneValue } from "../model/binding.js";
import { isBooleanLiteral, isNumeric } from "../model/converters.js";
import { createSubcommandDispatcher } from "../dispatch/dispatcher.js";
import type { SubcommandDispatcher } from "../dispatch/dispatcher.js";
import { describeArg, missingRequiredMessage, unmatchedMessage } from "./descriptions.js";
import { ParseResult, ParseResultBuilder } from "./parse-result.js";
import { TokenStream } from "./token-stream.js";
import { convertValue, typedOf, valueWith } from "./values.js";
import type { ConversionContext, ConvertedValue } from "./values.js";

export interface InterpreterOptions {
  /** Process-wide settings, read once here and never again. */
  processConfig?: ProcessConfig;
  fileSystem?: FileSystemReader;
  /** Directory relative at-file paths resolve against. */
  cwd?: string;
  logger?: Logger;
  /** Where diagnostics go when no logger is given; defaults to stderr. */
  logSink?: LogSink;
}

export interface Interpreter {
  readonly spec: ICommandSpec;
  /** Expand at-files, then parse. Resets every bound value first. */
  parse(tokens: readonly string[]): ParseResult;
  /** Parse tokens a parent level has already expanded. */
  parseExpanded(tokens: readonly string[]): ParseResult;
}

interface InterpreterContext {
  spec: ICommandSpec;
  logger: Logger;
  conversion: ConversionContext;
  dispatcher: SubcommandDispatcher;
  /** Whether this level expands at-files before parsing. */
  expands: boolean;
}

export function createInterpreter(spec: ICommandSpec, options: InterpreterOptions = {}): Interpreter {
  const processConfig = options.processConfig ?? {};
  const logger =
    options.logger ??
    createLogger("Interpreter", logLevelForTrace(processConfig.traceLevel), { command: spec.name }, options.logSink);

  let expander: AtFileExpander | undefined;
  if (spec.parser.expandAtFiles) {
    expander = createAtFileExpander({
      fileSystem: options.fileSystem,
      cwd: options.cwd,
      commentChar: spec.parser.atFileCommentChar,
      simplified: processConfig.useSimplifiedAtFiles ?? spec.parser.useSimplifiedAtFiles,
      logger: logger.child("AtFile"),
    });
  }

  const dispatcher = createSubcommandDispatcher((name, subcommand) => {
    const childLogger = logger.child(name);
    childLogger.setContext({ command: name });
    return createInterpreter(subcommand, { ...options, logger: childLogger });
  }, logger);

  const context: InterpreterContext = {
    spec,
    logger,
    conversion: {
      command: spec,
      trimQuotes: spec.parser.trimQuotes ?? processConfig.trimQuotes ?? false,
    },
    dispatcher,
    expands: expander !== undefined,
  };

  return {
    spec,

    parse(tokens: readonly string[]): ParseResult {
      const expanded = expander ? expander.expand(tokens) : [...tokens];
      if (expander) logger.debug("Expanded arguments", { original: [...tokens], expanded });
      return new ParseRun(context, tokens, expanded).execute();
    },

    parseExpanded(tokens: readonly string[]): ParseResult {
      return new ParseRun(context, tokens, tokens).execute();
    },
  };
}

const NO_TOKENS = new TokenStream([]);

/** State of one parse of one command level. */
class ParseRun {
  private readonly spec: ICommandSpec;
  private readonly logger: Logger;
  private readonly stream: TokenStream;
  private readonly result: ParseResultBuilder;
  private readonly matchCount = new Map<IArgSpec, number>();
  private endOfOptions = false;
  private positionalCursor = 0;
  private levelValidated = false;

  constructor(
    private readonly context: InterpreterContext,
    originalArgs: readonly string[],
    expandedArgs: readonly string[],
  ) {
    this.spec = context.spec;
    this.logger = context.logger;
    this.stream = new TokenStream(expandedArgs);
    this.result = new ParseResultBuilder(context.spec, originalArgs, expandedArgs);
  }

  execute(): ParseResult {
    this.resetArgs();
    while (this.stream.hasNext()) {
      const start = this.stream.index;
      try {
        this.processNext();
      } catch (err) {
        if (!(err instanceof ParameterError) || !this.spec.parser.collectErrors) throw err;
        this.logger.debug(`Collected error: ${err.message}`);
        this.result.addError(err);
        if (this.stream.index === start) this.stream.skip(1);
      }
    }
    this.validateLevel();
    return this.result.build();
  }

  /** Every bound value starts from its default (or its initial value). */
  private resetArgs(): void {
    for (const arg of this.spec.args) {
      if (arg.defaultValue === undefined) {
        arg.binding.set(cloneValue(arg.initialValue));
        continue;
      }
      try {
        const converted = convertValue(arg, arg.defaultValue, 0, this.context.conversion);
        arg.binding.set(valueWith(arg, undefined, [converted]));
      } catch (err) {
        if (err instanceof ParameterError) {
          throw new InitializationError(
            `Default value '${arg.defaultValue}' of ${describeArg(arg, -1)} is invalid: ${err.message}`,
            { cause: err },
          );
        }
        throw err;
      }
    }
  }

  private processNext(): void {
    const token = this.stream.peek();
    if (token === undefined) return;
    const parser = this.spec.parser;

    if (this.endOfOptions) {
      this.processPositional(token);
      return;
    }

    if (token === parser.endOfOptionsDelimiter) {
      this.stream.next();
      this.endOfOptions = true;
      this.logger.debug(`Found end-of-options delimiter '${token}'; remaining args are positional`);
      return;
    }

    const subcommand = this.spec.findSubcommand(token);
    if (subcommand) {
      this.stream.next();
      this.validateLevel();
      const tail = this.stream.drain();
      this.logger.debug(`Found subcommand '${token}'`);
      this.result.setSubcommand(this.context.dispatcher.dispatch(token, subcommand, tail, this.context.expands));
      return;
    }

    const option = this.spec.findOption(token);
    if (option) {
      this.stream.next();
      this.warnIfAmbiguous(token, option);
      this.logger.debug(`Found option '${token}'`);
      this.applyArg(option, this.stream, undefined);
      return;
    }

    const separatorAt = token.indexOf(parser.separator);
    if (separatorAt > 0) {
      const name = token.slice(0, separatorAt);
      const splitOption = this.spec.findOption(name);
      if (splitOption) {
        this.stream.next();
        this.logger.debug(`Found option '${name}' with attached value`);
        this.applyArg(splitOption, this.stream, token.slice(separatorAt + parser.separator.length));
        return;
      }
    }

    if (parser.posixClusteredShortOptionsAllowed && this.isClusterStart(token)) {
      this.stream.next();
      this.processCluster(token);
      return;
    }

    if (!parser.unmatchedOptionsArePositionalParams && this.resemblesOption(token)) {
      const index = this.stream.index;
      this.stream.next();
      this.logger.debug(`'${token}' looks like an unknown option`);
      this.handleUnmatched(token, index, true);
      return;
    }

    this.processPositional(token);
  }

  /** "--a=b" named exactly while "--a" also exists: the exact name wins. */
  private warnIfAmbiguous(token: string, option: IOptionSpec): void {
    const separatorAt = token.indexOf(this.spec.parser.separator);
    if (separatorAt <= 0) return;
    const prefix = token.slice(0, separatorAt);
    const other = this.spec.findOption(prefix);
    if (other && other !== option) {
      this.logger.warn(`Both '${token}' and '${prefix}' are options; treating '${token}' as ${describeArg(option, -1)}`);
    }
  }

  private isClusterStart(token: string): boolean {
    return token.length > 2 && this.spec.findOption(token.slice(0, 2)) !== undefined;
  }

  private processCluster(token: string): void {
    const index = this.stream.index - 1;
    const separator = this.spec.parser.separator;
    const prefix = token.charAt(0);
    let rest = token.slice(1);
    this.logger.debug(`Splitting '${token}' into single-character options`);

    while (rest.length > 0) {
      const option = this.spec.findOption(prefix + rest.charAt(0));
      if (!option) {
        this.handleUnmatched(prefix + rest, index, true);
        return;
      }
      rest = rest.slice(1);
      if (rest === "") {
        this.applyArg(option, this.stream, undefined);
        return;
      }
      if (rest.startsWith(separator)) {
        this.applyArg(option, this.stream, rest.slice(separator.length));
        return;
      }
      if (option.arity.max === 0 || (isFlag(option) && !isBooleanLiteral(rest))) {
        this.applyArg(option, NO_TOKENS.fork(), undefined);
        continue;
      }
      this.applyArg(option, this.stream, rest);
      return;
    }
  }

  /**
   * Single characters and numbers never resemble options. Otherwise count the
   * leading characters the token shares with each option name; it resembles
   * an option when the count reaches nine tenths of the number of names.
   */
  private resemblesOption(token: string): boolean {
    if (token.length === 1 || isNumeric(token)) return false;
    const names = this.spec.options.flatMap((option) => option.names);
    if (names.length === 0) return token.startsWith("-");
    let count = 0;
    for (const name of names) {
      for (let i = 0; i < token.length && i < name.length && token[i] === name[i]; i++) {
        count++;
      }
    }
    return count > 0 && count * 10 >= names.length * 9;
  }

  /** Tokens that end a run of values: options, clusters and the delimiter. */
  private isOptionLike(token: string): boolean {
    const parser = this.spec.parser;
    if (token === parser.endOfOptionsDelimiter) return true;
    if (this.spec.findOption(token)) return true;
    const separatorAt = token.indexOf(parser.separator);
    if (separatorAt > 0 && this.spec.findOption(token.slice(0, separatorAt))) return true;
    return parser.posixClusteredShortOptionsAllowed && this.isClusterStart(token);
  }

  private processPositional(token: string): void {
    const index = this.stream.index;
    const candidates = this.spec.positionals.filter((positional) => positional.index.contains(this.positionalCursor));
    let consumed = 0;
    for (const positional of candidates) {
      consumed = Math.max(consumed, this.applyArg(positional, this.stream.fork(), undefined));
    }

    if (consumed === 0) {
      this.stream.next();
      this.handleUnmatched(token, index, false);
    } else {
      this.stream.skip(consumed);
      this.positionalCursor += consumed;
    }

    if (this.spec.parser.stopAtPositional && !this.endOfOptions) {
      this.endOfOptions = true;
      this.logger.debug(`Positional '${token}' ends option processing`);
    }
  }

  /** The token at `index` has been consumed already. */
  private handleUnmatched(token: string, index: number, unknownOption: boolean): void {
    const tokens = [token];
    if (this.spec.parser.stopAtUnmatched) {
      tokens.push(...this.stream.drain());
    }
    this.logger.debug(`Unmatched: ${tokens.join(" ")}`);
    this.result.recordUnmatched(tokens, index, unknownOption);
  }

  /**
   * Consume and bind values for one match of an argument.
   *
   * @returns how many tokens were taken from `tokens`
   */
  private applyArg(arg: IArgSpec, tokens: TokenStream, attached: string | undefined): number {
    if (arg.kind === "option" && isFlag(arg)) {
      return this.applyFlag(arg, tokens, attached);
    }

    const { raws, converted, consumed } = this.consumeValues(arg, tokens, attached);
    if (converted.length === 0) {
      if (arg.kind === "positional") return 0;
      const fallback = arg.fallbackValue;
      if (arg.auxiliaryTypes[0] === "boolean" && fallback === "") {
        this.commit(arg, [], [{ raw: "", items: [true], entries: [] }]);
      } else {
        this.commit(arg, [], [convertValue(arg, fallback, 0, this.context.conversion)]);
      }
      return consumed;
    }
    this.commit(arg, raws, converted);
    return consumed;
  }

  private applyFlag(option: IOptionSpec, tokens: TokenStream, attached: string | undefined): number {
    const conversion = this.context.conversion;
    if (attached !== undefined) {
      this.commit(option, [attached], [convertValue(option, attached, 0, conversion)]);
      return 0;
    }
    const next = tokens.peek();
    if (option.arity.max >= 1 && next !== undefined && isBooleanLiteral(next)) {
      tokens.next();
      this.commit(option, [next], [convertValue(option, next, 0, conversion)]);
      return 1;
    }
    if (option.arity.max >= 1 && option.fallbackValue !== "") {
      this.commit(option, [], [convertValue(option, option.fallbackValue, 0, conversion)]);
      return 0;
    }
    const current = option.binding.get();
    const value = this.spec.parser.toggleBooleanFlags && typeof current === "boolean" ? !current : true;
    this.commit(option, [], [{ raw: "", items: [value], entries: [] }]);
    return 0;
  }

  /**
   * Take the arity minimum (failing when it is not there), then optional
   * values up to the maximum. Optional values stop at option-like tokens,
   * subcommand names and the first value that does not convert.
   */
  private consumeValues(
    arg: IArgSpec,
    tokens: TokenStream,
    attached: string | undefined,
  ): { raws: string[]; converted: ConvertedValue[]; consumed: number } {
    const arity = arg.arity;
    const conversion = this.context.conversion;
    const raws: string[] = [];
    const converted: ConvertedValue[] = [];
    let consumed = 0;

    if (attached !== undefined && arity.max === 0) {
      throw new ParameterError(`${describeArg(arg, -1)} should not have a value but was given '${attached}'`, {
        argSpec: arg,
        value: attached,
        commandName: this.spec.name,
      });
    }

    const available = attached === undefined ? tokens.rest() : [attached, ...tokens.rest()];
    if (arity.min > available.length) {
      throw this.missingValues(arg, available);
    }

    for (let i = 0; i < arity.min; i++) {
      let raw: string;
      if (i === 0 && attached !== undefined) {
        raw = attached;
      } else {
        raw = available[raws.length];
        if (!this.endOfOptions && this.isOptionLike(raw)) {
          throw this.expectedParameter(arg, i, raw);
        }
        tokens.next();
        consumed++;
      }
      converted.push(convertValue(arg, raw, i, conversion));
      raws.push(raw);
    }

    let pendingAttached = arity.min === 0 ? attached : undefined;
    while (raws.length < arity.max) {
      if (pendingAttached !== undefined) {
        converted.push(convertValue(arg, pendingAttached, raws.length, conversion));
        raws.push(pendingAttached);
        pendingAttached = undefined;
        continue;
      }
      const token = tokens.peek();
      if (token === undefined) break;
      if (!this.endOfOptions && (this.isOptionLike(token) || this.spec.findSubcommand(token))) break;
      let value: ConvertedValue;
      try {
        value = convertValue(arg, token, raws.length, conversion);
      } catch (err) {
        if (!(err instanceof ParameterError)) throw err;
        this.logger.debug(`${describeArg(arg, raws.length)} stops before '${token}': ${err.message}`);
        break;
      }
      converted.push(value);
      raws.push(token);
      tokens.next();
      consumed++;
    }
    return { raws, converted, consumed };
  }

  private missingValues(arg: IArgSpec, available: readonly string[]): MissingParameterError {
    const min = arg.arity.min;
    let message: string;
    if (min === 1 && arg.kind === "option") {
      message = `Missing required parameter for ${describeArg(arg, 0)}`;
    } else if (available.length === 0) {
      message = `${describeArg(arg, 0)} requires at least ${min} values, but none were specified.`;
    } else {
      message =
        `${describeArg(arg, 0)} requires at least ${min} values, ` +
        `but only ${available.length} were specified: [${available.join(", ")}]`;
    }
    return new MissingParameterError(message, [arg], { commandName: this.spec.name });
  }

  private expectedParameter(arg: IArgSpec, valueIndex: number, found: string): MissingParameterError {
    const min = arg.arity.min;
    const which = min === 1 ? "parameter" : `parameter ${valueIndex + 1} (of ${min} mandatory parameters)`;
    return new MissingParameterError(`Expected ${which} for ${describeArg(arg, -1)} but found '${found}'`, [arg], {
      value: found,
      commandName: this.spec.name,
    });
  }

  /**
   * Write converted values to the argument's binding. A repeated
   * single-valued argument is an error unless overwriting is allowed; the
   * first match of a multi-valued one replaces its default.
   */
  private commit(arg: IArgSpec, raws: readonly string[], converted: readonly ConvertedValue[]): void {
    const count = this.matchCount.get(arg) ?? 0;
    const previous = arg.binding.get();
    let base: unknown = previous;

    if (!arg.isMultiValue && count > 0) {
      if (!this.spec.parser.overwrittenOptionsAllowed) {
        throw new OverwrittenOptionError(`${describeArg(arg, 0)} should be specified only once`, {
          argSpec: arg,
          value: raws[0],
          commandName: this.spec.name,
        });
      }
    } else if (arg.isMultiValue && (count === 0 || arg.multiValuePolicy === "replace")) {
      base = undefined;
    }

    const next = valueWith(arg, base, converted);
    if (!arg.isMultiValue && count > 0) {
      this.logger.warn(`Overwriting ${describeArg(arg, 0)} value '${String(previous)}' with '${String(next)}'`);
    }
    arg.binding.set(next);
    this.matchCount.set(arg, count + 1);
    this.result.recordMatch(arg, raws, typedOf(converted));
  }

  /**
   * Required arguments, then unmatched tokens. Runs once per level: before
   * dispatching to a subcommand, or after the last token.
   */
  private validateLevel(): void {
    if (this.levelValidated) return;
    this.levelValidated = true;

    if (!this.result.isHelpRequested) {
      const missing = this.spec.args.filter((arg) => arg.required && !this.result.isMatched(arg));
      if (missing.length > 0) {
        this.fail(
          new MissingParameterError(missingRequiredMessage(missing, this.spec.parser.separator), missing, {
            commandName: this.spec.name,
          }),
        );
      }
    }

    const unmatched = this.result.unmatched;
    if (unmatched.length === 0) return;
    if (this.spec.parser.unmatchedArgumentsAllowed) {
      this.logger.debug(`Unmatched arguments allowed: ${unmatched.join(", ")}`);
      return;
    }
    const index = this.result.firstUnmatchedIndex;
    this.fail(
      new UnmatchedArgumentError(unmatchedMessage(unmatched, index, this.result.startsWithUnknownOption), unmatched, {
        commandName: this.spec.name,
      }),
    );
  }

  private fail(error: ParameterError): void {
    if (!this.spec.parser.collectErrors) throw error;
    this.logger.debug(`Collected error: ${error.message}`);
    this.result.addError(error);
  }
}

/** Single-valued boolean option whose value is optional. */
function isFlag(option: IOptionSpec): boolean {
  return !option.isMultiValue && option.auxiliaryTypes[0] === "boolean" && option.arity.min === 0;
}
