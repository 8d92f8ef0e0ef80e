/**
 * Argument specifications: options and positional parameters.
 *
 * Specs are immutable once built. The builders derive the defaults that
 * depend on the declared type and container:
 * - an untyped option is a boolean flag with arity 0
 * - a single-valued boolean option has arity 0
 * - any other option has arity 1
 * - a single-valued positional has arity 1, a multi-valued one 0..1
 * - a positional is required when its arity minimum is above zero
 */

import type {
  Binding,
  ContainerKind,
  IOptionSpec,
  IPositionalParamSpec,
  IRange,
  MultiValuePolicy,
  TypeConverter,
  ValueType,
} from "@argloom/sdk";
import { InitializationError } from "@argloom/sdk";
import { Range } from "./range.js";
import { cloneValue, valueBinding } from "./binding.js";

interface ArgSpecFields {
  container: ContainerKind;
  auxiliaryTypes: readonly ValueType[];
  arity: Range;
  splitRegex: string;
  required: boolean;
  defaultValue: string | undefined;
  initialValue: unknown;
  converters: readonly (TypeConverter | undefined)[];
  enumValues: readonly string[];
  paramLabel: string;
  description: readonly string[];
  hidden: boolean;
  multiValuePolicy: MultiValuePolicy;
  binding: Binding;
}

abstract class ArgSpec {
  readonly container: ContainerKind;
  readonly auxiliaryTypes: readonly ValueType[];
  readonly arity: Range;
  readonly splitRegex: string;
  readonly required: boolean;
  readonly defaultValue: string | undefined;
  readonly initialValue: unknown;
  readonly converters: readonly (TypeConverter | undefined)[];
  readonly enumValues: readonly string[];
  readonly paramLabel: string;
  readonly description: readonly string[];
  readonly hidden: boolean;
  readonly multiValuePolicy: MultiValuePolicy;
  readonly binding: Binding;

  protected constructor(fields: ArgSpecFields) {
    this.container = fields.container;
    this.auxiliaryTypes = fields.auxiliaryTypes;
    this.arity = fields.arity;
    this.splitRegex = fields.splitRegex;
    this.required = fields.required;
    this.defaultValue = fields.defaultValue;
    this.initialValue = fields.initialValue;
    this.converters = fields.converters;
    this.enumValues = fields.enumValues;
    this.paramLabel = fields.paramLabel;
    this.description = fields.description;
    this.hidden = fields.hidden;
    this.multiValuePolicy = fields.multiValuePolicy;
    this.binding = fields.binding;
  }

  get isMultiValue(): boolean {
    return this.container !== "single";
  }
}

export class OptionSpec extends ArgSpec implements IOptionSpec {
  readonly kind = "option" as const;
  readonly names: readonly string[];
  readonly usageHelp: boolean;
  readonly versionHelp: boolean;
  readonly fallbackValue: string;

  private constructor(
    fields: ArgSpecFields & { names: readonly string[]; usageHelp: boolean; versionHelp: boolean; fallbackValue: string },
  ) {
    super(fields);
    this.names = fields.names;
    this.usageHelp = fields.usageHelp;
    this.versionHelp = fields.versionHelp;
    this.fallbackValue = fields.fallbackValue;
  }

  static builder(...names: string[]): OptionSpecBuilder {
    return new OptionSpecBuilder(names, (fields) => new OptionSpec(fields));
  }

  get longestName(): string {
    return this.names.reduce((longest, name) => (name.length > longest.length ? name : longest));
  }

  get shortestName(): string {
    return this.names.reduce((shortest, name) => (name.length < shortest.length ? name : shortest));
  }

  toString(): string {
    return `option '${this.longestName}'`;
  }
}

export class PositionalParamSpec extends ArgSpec implements IPositionalParamSpec {
  readonly kind = "positional" as const;
  readonly index: Range;

  private constructor(fields: ArgSpecFields & { index: Range }) {
    super(fields);
    this.index = fields.index;
  }

  static builder(): PositionalParamSpecBuilder {
    return new PositionalParamSpecBuilder((fields) => new PositionalParamSpec(fields));
  }

  toString(): string {
    return `positional parameter at index ${this.index.toString()} (${this.paramLabel})`;
  }
}

abstract class ArgSpecBuilder {
  protected containerKind: ContainerKind = "single";
  /** Empty until a type is declared. */
  protected types: ValueType[] = [];
  protected arityValue: Range | undefined;
  protected requiredValue: boolean | undefined;
  protected splitRegexValue = "";
  protected defaultRaw: string | undefined;
  protected converterList: (TypeConverter | undefined)[] = [];
  protected enumList: string[] = [];
  protected label: string | undefined;
  protected descriptionLines: string[] = [];
  protected hiddenValue = false;
  protected policy: MultiValuePolicy = "append";
  protected bindingValue: Binding | undefined;

  /** Single value of the given type. */
  type(type: ValueType): this {
    this.containerKind = "single";
    this.types = [type];
    return this;
  }

  list(elementType: ValueType = "string"): this {
    this.containerKind = "list";
    this.types = [elementType];
    return this;
  }

  set(elementType: ValueType = "string"): this {
    this.containerKind = "set";
    this.types = [elementType];
    return this;
  }

  map(keyType: ValueType = "string", valueType: ValueType = "string"): this {
    this.containerKind = "map";
    this.types = [keyType, valueType];
    return this;
  }

  arity(value: string | IRange): this {
    this.arityValue = Range.from(value);
    return this;
  }

  required(value = true): this {
    this.requiredValue = value;
    return this;
  }

  splitRegex(regex: string): this {
    this.splitRegexValue = regex;
    return this;
  }

  defaultValue(raw: string): this {
    this.defaultRaw = raw;
    return this;
  }

  /** One converter per auxiliary-type position; undefined leaves a position to the registry. */
  converters(...converters: (TypeConverter | undefined)[]): this {
    this.converterList = converters;
    return this;
  }

  enumValues(...values: string[]): this {
    this.enumList = values;
    return this;
  }

  paramLabel(label: string): this {
    this.label = label;
    return this;
  }

  description(...lines: string[]): this {
    this.descriptionLines = lines;
    return this;
  }

  hidden(value = true): this {
    this.hiddenValue = value;
    return this;
  }

  multiValuePolicy(policy: MultiValuePolicy): this {
    this.policy = policy;
    return this;
  }

  binding(binding: Binding): this {
    this.bindingValue = binding;
    return this;
  }

  protected resolveFields(what: string, types: readonly ValueType[], arity: Range, required: boolean, label: string, initial: unknown): ArgSpecFields {
    if (this.containerKind === "map" && types.length !== 2) {
      throw new InitializationError(`${what} is a map and needs a key type and a value type`);
    }
    if (types.includes("enum") && this.enumList.length === 0) {
      throw new InitializationError(`${what} has type enum but declares no enum values`);
    }
    if (this.splitRegexValue !== "") {
      try {
        new RegExp(this.splitRegexValue);
      } catch (err) {
        throw new InitializationError(`${what} has an invalid split regex '${this.splitRegexValue}'`, {
          cause: err instanceof Error ? err : undefined,
        });
      }
    }
    const binding = this.bindingValue ?? valueBinding(initial);
    return {
      container: this.containerKind,
      auxiliaryTypes: types,
      arity,
      splitRegex: this.splitRegexValue,
      required,
      defaultValue: this.defaultRaw,
      initialValue: cloneValue(binding.get()),
      converters: [...this.converterList],
      enumValues: [...this.enumList],
      paramLabel: label,
      description: [...this.descriptionLines],
      hidden: this.hiddenValue,
      multiValuePolicy: this.policy,
      binding,
    };
  }
}

export class OptionSpecBuilder extends ArgSpecBuilder {
  private usageHelpValue = false;
  private versionHelpValue = false;
  private fallback = "";

  constructor(
    private readonly names: string[],
    private readonly create: (
      fields: ArgSpecFields & { names: readonly string[]; usageHelp: boolean; versionHelp: boolean; fallbackValue: string },
    ) => OptionSpec,
  ) {
    super();
  }

  /** Matching this option exempts the parse from required-argument checks. */
  usageHelp(value = true): this {
    this.usageHelpValue = value;
    return this;
  }

  versionHelp(value = true): this {
    this.versionHelpValue = value;
    return this;
  }

  fallbackValue(raw: string): this {
    this.fallback = raw;
    return this;
  }

  build(): OptionSpec {
    if (this.names.length === 0) {
      throw new InitializationError("An option must have at least one name");
    }
    for (const name of this.names) {
      if (name.trim() === "" || /\s/.test(name)) {
        throw new InitializationError(`Invalid option name '${name}': names must be non-blank and contain no whitespace`);
      }
    }
    const longest = this.names.reduce((a, b) => (b.length > a.length ? b : a));
    const types: ValueType[] = this.types.length > 0 ? this.types : ["boolean"];
    const flag = this.containerKind === "single" && types[0] === "boolean";
    const arity = this.arityValue ?? Range.of(flag ? 0 : 1);
    const label = this.label ?? `<${longest.replace(/^[-+/]+/, "")}>`;
    const fields = this.resolveFields(`option '${longest}'`, types, arity, this.requiredValue ?? false, label, flag ? false : undefined);
    return this.create({
      ...fields,
      names: [...this.names],
      usageHelp: this.usageHelpValue,
      versionHelp: this.versionHelpValue,
      fallbackValue: this.fallback,
    });
  }
}

export class PositionalParamSpecBuilder extends ArgSpecBuilder {
  private indexValue: Range = Range.valueOf("*");

  constructor(private readonly create: (fields: ArgSpecFields & { index: Range }) => PositionalParamSpec) {
    super();
  }

  index(value: string | IRange): this {
    this.indexValue = Range.from(value);
    return this;
  }

  build(): PositionalParamSpec {
    const types: ValueType[] = this.types.length > 0 ? this.types : ["string"];
    const arity = this.arityValue ?? (this.containerKind === "single" ? Range.of(1) : Range.of(0, 1));
    const label = this.label ?? "<param>";
    const what = `positional parameter at index ${this.indexValue.toString()} (${label})`;
    const fields = this.resolveFields(what, types, arity, this.requiredValue ?? arity.min > 0, label, undefined);
    return this.create({ ...fields, index: this.indexValue });
  }
}
