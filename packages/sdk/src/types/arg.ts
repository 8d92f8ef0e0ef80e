/**
 * Argument specification contracts: options and positional parameters.
 */

/** Scalar value types understood by the built-in converters. */
export type ValueType =
  | "string"
  | "boolean"
  | "integer"
  | "number"
  | "bigint"
  | "char"
  | "url"
  | "date"
  | "regexp"
  | "enum";

/** Shape of the bound value. Everything except "single" is multi-valued. */
export type ContainerKind = "single" | "list" | "set" | "map";

/** What a repeated match does to an already-filled multi-value target. */
export type MultiValuePolicy = "append" | "replace";

export type ArgKind = "option" | "positional";

/**
 * Converts one raw string into a typed value. Throwing signals that the
 * value is not convertible.
 */
export type TypeConverter<T = unknown> = (raw: string) => T;

/**
 * Get/set capability through which the interpreter reads and writes the
 * value of one argument on the target model.
 */
export interface Binding<T = unknown> {
  get(): T;
  set(value: T): void;
}

/** An inclusive range of counts with an optionally unbounded maximum. */
export interface IRange {
  readonly min: number;
  /** Number.POSITIVE_INFINITY when unbounded. */
  readonly max: number;
  readonly isUnbounded: boolean;
  /** True when max differs from min. */
  readonly isVariable: boolean;
  contains(value: number): boolean;
  toString(): string;
}

interface IArgSpecBase {
  readonly kind: ArgKind;
  readonly container: ContainerKind;
  /**
   * Element type for single/list/set (one entry), key and value types for
   * maps (two entries).
   */
  readonly auxiliaryTypes: readonly ValueType[];
  readonly arity: IRange;
  /** Regular expression source used to split raw values; empty means no splitting. */
  readonly splitRegex: string;
  readonly required: boolean;
  /** Raw default, converted at the start of every parse. */
  readonly defaultValue: string | undefined;
  /** Value read from the binding at build time, restored when there is no raw default. */
  readonly initialValue: unknown;
  /** Per auxiliary-type position; missing entries fall back to the registry. */
  readonly converters: readonly (TypeConverter | undefined)[];
  readonly enumValues: readonly string[];
  readonly paramLabel: string;
  readonly description: readonly string[];
  readonly hidden: boolean;
  readonly multiValuePolicy: MultiValuePolicy;
  readonly binding: Binding;
  readonly isMultiValue: boolean;
}

export interface IOptionSpec extends IArgSpecBase {
  readonly kind: "option";
  readonly names: readonly string[];
  readonly longestName: string;
  readonly shortestName: string;
  /** A matched usage-help option exempts the parse from required-argument checks. */
  readonly usageHelp: boolean;
  readonly versionHelp: boolean;
  /** Used when an option with an optional value is matched without one. */
  readonly fallbackValue: string;
}

export interface IPositionalParamSpec extends IArgSpecBase {
  readonly kind: "positional";
  readonly index: IRange;
}

export type IArgSpec = IOptionSpec | IPositionalParamSpec;
