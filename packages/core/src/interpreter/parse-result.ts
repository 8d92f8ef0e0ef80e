/**
 * ParseResult — what one command level matched, plus the nested
 * subcommand level when one was dispatched.
 */

import type { IArgSpec, ICommandSpec, IOptionSpec, IParseResult, IPositionalParamSpec, ParameterError } from "@argloom/sdk";

interface ParseResultFields {
  commandSpec: ICommandSpec;
  originalArgs: readonly string[];
  expandedArgs: readonly string[];
  matchedArgs: readonly IArgSpec[];
  rawValues: ReadonlyMap<IArgSpec, readonly string[]>;
  typedValues: ReadonlyMap<IArgSpec, readonly unknown[]>;
  unmatched: readonly string[];
  errors: readonly ParameterError[];
  subcommand: IParseResult | undefined;
  isUsageHelpRequested: boolean;
  isVersionHelpRequested: boolean;
}

export class ParseResult implements IParseResult {
  readonly commandSpec: ICommandSpec;
  readonly originalArgs: readonly string[];
  readonly expandedArgs: readonly string[];
  readonly matchedArgs: readonly IArgSpec[];
  readonly unmatched: readonly string[];
  readonly errors: readonly ParameterError[];
  readonly subcommand: IParseResult | undefined;
  readonly isUsageHelpRequested: boolean;
  readonly isVersionHelpRequested: boolean;
  private readonly raw: ReadonlyMap<IArgSpec, readonly string[]>;
  private readonly typed: ReadonlyMap<IArgSpec, readonly unknown[]>;

  constructor(fields: ParseResultFields) {
    this.commandSpec = fields.commandSpec;
    this.originalArgs = fields.originalArgs;
    this.expandedArgs = fields.expandedArgs;
    this.matchedArgs = fields.matchedArgs;
    this.unmatched = fields.unmatched;
    this.errors = fields.errors;
    this.subcommand = fields.subcommand;
    this.isUsageHelpRequested = fields.isUsageHelpRequested;
    this.isVersionHelpRequested = fields.isVersionHelpRequested;
    this.raw = fields.rawValues;
    this.typed = fields.typedValues;
  }

  get matchedOptions(): IOptionSpec[] {
    return this.matchedArgs.filter((arg): arg is IOptionSpec => arg.kind === "option");
  }

  get matchedPositionals(): IPositionalParamSpec[] {
    return this.matchedArgs.filter((arg): arg is IPositionalParamSpec => arg.kind === "positional");
  }

  hasMatchedOption(name: string): boolean {
    return this.matchedOption(name) !== undefined;
  }

  /** Looks the name up with the command's case rule, then checks it matched. */
  matchedOption(name: string): IOptionSpec | undefined {
    const option = this.commandSpec.findOption(name);
    return option && this.matchedArgs.includes(option) ? option : undefined;
  }

  matchedOptionValue(name: string, fallback?: unknown): unknown {
    const option = this.matchedOption(name);
    return option ? option.binding.get() : fallback;
  }

  hasMatchedPositional(index: number): boolean {
    return this.matchedPositional(index) !== undefined;
  }

  matchedPositional(index: number): IPositionalParamSpec | undefined {
    return this.matchedPositionals.find((positional) => positional.index.contains(index));
  }

  matchedPositionalValue(index: number, fallback?: unknown): unknown {
    const positional = this.matchedPositional(index);
    return positional ? positional.binding.get() : fallback;
  }

  rawValues(arg: IArgSpec): readonly string[] {
    return this.raw.get(arg) ?? [];
  }

  typedValues(arg: IArgSpec): readonly unknown[] {
    return this.typed.get(arg) ?? [];
  }

  asList(): IParseResult[] {
    const levels: IParseResult[] = [];
    let level: IParseResult | undefined = this;
    while (level) {
      levels.push(level);
      level = level.subcommand;
    }
    return levels;
  }
}

/** Accumulates one level's matches while the interpreter walks the tokens. */
export class ParseResultBuilder {
  private readonly matched: IArgSpec[] = [];
  private readonly raw = new Map<IArgSpec, string[]>();
  private readonly typed = new Map<IArgSpec, unknown[]>();
  private readonly unmatchedTokens: string[] = [];
  private readonly errorList: ParameterError[] = [];
  private firstUnmatched = -1;
  private unknownOption = false;
  private subcommandResult: IParseResult | undefined;
  private usageHelp = false;
  private versionHelp = false;

  constructor(
    private readonly commandSpec: ICommandSpec,
    private readonly originalArgs: readonly string[],
    private readonly expandedArgs: readonly string[],
  ) {}

  recordMatch(arg: IArgSpec, raw: readonly string[], typed: readonly unknown[]): void {
    if (!this.matched.includes(arg)) {
      this.matched.push(arg);
      this.raw.set(arg, []);
      this.typed.set(arg, []);
    }
    this.raw.get(arg)?.push(...raw);
    this.typed.get(arg)?.push(...typed);
    if (arg.kind === "option") {
      this.usageHelp ||= arg.usageHelp;
      this.versionHelp ||= arg.versionHelp;
    }
  }

  isMatched(arg: IArgSpec): boolean {
    return this.matched.includes(arg);
  }

  /** `index` is the token's position among the expanded args. */
  recordUnmatched(tokens: readonly string[], index: number, unknownOption: boolean): void {
    if (tokens.length === 0) return;
    if (this.firstUnmatched < 0) {
      this.firstUnmatched = index;
      this.unknownOption = unknownOption;
    }
    this.unmatchedTokens.push(...tokens);
  }

  get unmatched(): readonly string[] {
    return this.unmatchedTokens;
  }

  get firstUnmatchedIndex(): number {
    return this.firstUnmatched;
  }

  /** True when the first unmatched token was an unknown option. */
  get startsWithUnknownOption(): boolean {
    return this.unknownOption;
  }

  get isHelpRequested(): boolean {
    return this.usageHelp || this.versionHelp;
  }

  addError(error: ParameterError): void {
    this.errorList.push(error);
  }

  setSubcommand(result: IParseResult): void {
    this.subcommandResult = result;
  }

  build(): ParseResult {
    return new ParseResult({
      commandSpec: this.commandSpec,
      originalArgs: [...this.originalArgs],
      expandedArgs: [...this.expandedArgs],
      matchedArgs: [...this.matched],
      rawValues: new Map(this.raw),
      typedValues: new Map(this.typed),
      unmatched: [...this.unmatchedTokens],
      errors: [...this.errorList],
      subcommand: this.subcommandResult,
      isUsageHelpRequested: this.usageHelp,
      isVersionHelpRequested: this.versionHelp,
    });
  }
}
