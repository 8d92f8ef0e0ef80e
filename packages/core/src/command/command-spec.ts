/**
 * CommandSpec — one command level: its options, positionals, mixins,
 * subcommands, parser configuration and converter registry.
 *
 * Built through CommandSpec.builder(). Mixins are merged at build time:
 * their arguments follow the owner's in mixin declaration order, their usage
 * attributes fill only what the owner left unset (first mixin wins) and
 * their subcommands are registered on the owner. Subcommand specs are built
 * before their parent, so the command tree cannot contain cycles.
 */

import type { ICommandSpec, ParserConfig, TypeConverter, UsageAttributes, ValueType } from "@argloom/sdk";
import { DuplicateNameError, ParameterIndexGapError } from "@argloom/sdk";
import { ParserConfigSchema, parseConfig } from "@argloom/shared";
import type { ParserConfigInput } from "@argloom/shared";
import type { OptionSpec, PositionalParamSpec } from "../model/arg-spec.js";
import { createNameLookup } from "./name-lookup.js";
import type { NameLookup } from "./name-lookup.js";

interface CommandSpecFields {
  name: string;
  aliases: readonly string[];
  usage: UsageAttributes;
  options: readonly OptionSpec[];
  positionals: readonly PositionalParamSpec[];
  subcommands: ReadonlyMap<string, CommandSpec>;
  mixins: ReadonlyMap<string, CommandSpec>;
  parser: ParserConfig;
  converters: ReadonlyMap<ValueType, TypeConverter>;
}

export class CommandSpec implements ICommandSpec {
  readonly name: string;
  readonly aliases: readonly string[];
  readonly usage: UsageAttributes;
  readonly options: readonly OptionSpec[];
  readonly positionals: readonly PositionalParamSpec[];
  readonly subcommands: ReadonlyMap<string, CommandSpec>;
  readonly mixins: ReadonlyMap<string, CommandSpec>;
  readonly parser: ParserConfig;
  private readonly converters: ReadonlyMap<ValueType, TypeConverter>;
  private readonly optionLookup: NameLookup<OptionSpec>;
  private readonly subcommandLookup: NameLookup<CommandSpec>;

  private constructor(fields: CommandSpecFields) {
    this.name = fields.name;
    this.aliases = fields.aliases;
    this.usage = fields.usage;
    this.options = fields.options;
    this.positionals = fields.positionals;
    this.subcommands = fields.subcommands;
    this.mixins = fields.mixins;
    this.parser = fields.parser;
    this.converters = fields.converters;

    this.optionLookup = createNameLookup("option", this.parser.optionsCaseInsensitive);
    for (const option of this.options) {
      for (const optionName of option.names) {
        this.optionLookup.add(optionName, option);
      }
    }

    this.subcommandLookup = createNameLookup("subcommand", this.parser.subcommandsCaseInsensitive);
    for (const [subName, sub] of this.subcommands) {
      this.subcommandLookup.add(subName, sub);
      for (const alias of sub.aliases) {
        if (alias !== subName) this.subcommandLookup.add(alias, sub);
      }
    }

    validatePositionalCoverage(this.positionals);
  }

  static builder(name: string): CommandSpecBuilder {
    return new CommandSpecBuilder(name, (fields) => new CommandSpec(fields));
  }

  get args(): ReadonlyArray<OptionSpec | PositionalParamSpec> {
    return [...this.options, ...this.positionals];
  }

  /** Every declared option name, in declaration order. */
  get optionNames(): string[] {
    return this.optionLookup.names();
  }

  findOption(name: string): OptionSpec | undefined {
    return this.optionLookup.get(name);
  }

  findSubcommand(name: string): CommandSpec | undefined {
    return this.subcommandLookup.get(name);
  }

  converterFor(type: ValueType): TypeConverter | undefined {
    return this.converters.get(type);
  }
}

/**
 * Positional index ranges must leave no position unreachable, starting at 0.
 *
 * @throws ParameterIndexGapError naming the first unreachable index
 */
function validatePositionalCoverage(positionals: readonly PositionalParamSpec[]): void {
  let next = 0;
  for (const positional of positionals) {
    if (positional.index.min > next) {
      throw new ParameterIndexGapError(
        next,
        `Command definition should have a positional parameter with index=${next}. ` +
          `Nearest positional parameter '${positional.paramLabel}' has index=${positional.index.min}`,
      );
    }
    next = Math.max(next, positional.index.max + 1);
  }
}

function byIndex(a: PositionalParamSpec, b: PositionalParamSpec): number {
  return a.index.min - b.index.min || a.index.max - b.index.max;
}

export class CommandSpecBuilder {
  private aliasList: string[] = [];
  private versionValue: string | undefined;
  private descriptionLines: string[] = [];
  private headerLines: string[] = [];
  private footerLines: string[] = [];
  private readonly options: OptionSpec[] = [];
  private readonly positionals: PositionalParamSpec[] = [];
  private readonly subcommands = new Map<string, CommandSpec>();
  private readonly mixins = new Map<string, CommandSpec>();
  private readonly converters = new Map<ValueType, TypeConverter>();
  private parserInput: ParserConfigInput = {};

  constructor(
    private readonly name: string,
    private readonly create: (fields: CommandSpecFields) => CommandSpec,
  ) {}

  aliases(...aliases: string[]): this {
    this.aliasList = aliases;
    return this;
  }

  version(version: string): this {
    this.versionValue = version;
    return this;
  }

  description(...lines: string[]): this {
    this.descriptionLines = lines;
    return this;
  }

  header(...lines: string[]): this {
    this.headerLines = lines;
    return this;
  }

  footer(...lines: string[]): this {
    this.footerLines = lines;
    return this;
  }

  addOption(option: OptionSpec): this {
    this.options.push(option);
    return this;
  }

  addPositional(positional: PositionalParamSpec): this {
    this.positionals.push(positional);
    return this;
  }

  addMixin(name: string, mixin: CommandSpec): this {
    this.mixins.set(name, mixin);
    return this;
  }

  addSubcommand(name: string, subcommand: CommandSpec): this {
    this.subcommands.set(name, subcommand);
    return this;
  }

  /** Parser settings; repeated calls merge. */
  parser(input: ParserConfigInput): this {
    this.parserInput = { ...this.parserInput, ...input };
    return this;
  }

  converter(type: ValueType, converter: TypeConverter): this {
    this.converters.set(type, converter);
    return this;
  }

  /**
   * @throws InitializationError for invalid parser settings
   * @throws DuplicateNameError when option or subcommand names collide
   * @throws ParameterIndexGapError when positional indices leave a gap
   */
  build(): CommandSpec {
    const parser = parseConfig(ParserConfigSchema, this.parserInput, "parser configuration");
    const mixins = [...this.mixins.values()];

    const options = [...this.options, ...mixins.flatMap((mixin) => mixin.options)];
    const positionals = [...this.positionals, ...mixins.flatMap((mixin) => mixin.positionals)].sort(byIndex);

    const subcommands = new Map(this.subcommands);
    const converters = new Map(this.converters);
    for (const mixin of mixins) {
      for (const [subName, sub] of mixin.subcommands) {
        const existing = subcommands.get(subName);
        if (existing && existing !== sub) {
          throw new DuplicateNameError(subName, `Duplicate subcommand name '${subName}'`);
        }
        subcommands.set(subName, sub);
      }
      for (const type of CONVERTIBLE_TYPES) {
        const converter = mixin.converterFor(type);
        if (converter && !converters.has(type)) converters.set(type, converter);
      }
    }

    return this.create({
      name: this.name,
      aliases: [...this.aliasList],
      usage: {
        version: this.versionValue ?? mixins.find((mixin) => mixin.usage.version !== undefined)?.usage.version,
        description: firstNonEmpty(this.descriptionLines, mixins.map((mixin) => mixin.usage.description)),
        header: firstNonEmpty(this.headerLines, mixins.map((mixin) => mixin.usage.header)),
        footer: firstNonEmpty(this.footerLines, mixins.map((mixin) => mixin.usage.footer)),
      },
      options,
      positionals,
      subcommands,
      mixins: new Map(this.mixins),
      parser,
      converters,
    });
  }
}

const CONVERTIBLE_TYPES: readonly ValueType[] = [
  "string",
  "boolean",
  "integer",
  "number",
  "bigint",
  "char",
  "url",
  "date",
  "regexp",
  "enum",
];

function firstNonEmpty(own: readonly string[], candidates: ReadonlyArray<readonly string[]>): readonly string[] {
  if (own.length > 0) return [...own];
  return candidates.find((lines) => lines.length > 0) ?? [];
}
