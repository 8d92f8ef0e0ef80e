/**
 * Built-in type converters and the per-argument converter chain.
 *
 * A converter turns one raw string into a typed value and signals failure by
 * throwing. The chain for each auxiliary-type position is: the argument's own
 * converter, then the command's registry entry for the type, then the
 * built-in converter.
 */

import type { IArgSpec, ICommandSpec, TypeConverter, ValueType } from "@argloom/sdk";

const INTEGER_PATTERN = /^[+-]?(?:0[xX][0-9a-fA-F]+|0[oO]?[0-7]+|0|[1-9]\d*)$/;
const NUMBER_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const BIGINT_PATTERN = /^[+-]?\d+$/;
const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const BOOLEAN_PATTERN = /^(?:true|false)$/i;

/** True for the literals accepted by the boolean converter. */
export function isBooleanLiteral(raw: string): boolean {
  return BOOLEAN_PATTERN.test(raw);
}

/** True when the text reads as an integer or a decimal number. */
export function isNumeric(raw: string): boolean {
  return INTEGER_PATTERN.test(raw) || NUMBER_PATTERN.test(raw);
}

export function parseInteger(raw: string): number {
  if (!INTEGER_PATTERN.test(raw)) {
    throw new Error(`'${raw}' is not an integer`);
  }
  const negative = raw.startsWith("-");
  const digits = raw.replace(/^[+-]/, "");
  let magnitude: number;
  if (/^0[xX]/.test(digits)) {
    magnitude = Number.parseInt(digits.slice(2), 16);
  } else if (/^0[oO]/.test(digits)) {
    magnitude = Number.parseInt(digits.slice(2), 8);
  } else if (digits.length > 1 && digits.startsWith("0")) {
    magnitude = Number.parseInt(digits.slice(1), 8);
  } else {
    magnitude = Number.parseInt(digits, 10);
  }
  if (!Number.isSafeInteger(magnitude)) {
    throw new Error(`'${raw}' is out of range for an integer`);
  }
  return negative && magnitude !== 0 ? -magnitude : magnitude;
}

function parseNumber(raw: string): number {
  if (!NUMBER_PATTERN.test(raw)) {
    throw new Error(`'${raw}' is not a number`);
  }
  return Number(raw);
}

function parseBigInt(raw: string): bigint {
  if (!BIGINT_PATTERN.test(raw)) {
    throw new Error(`'${raw}' is not a big integer`);
  }
  return BigInt(raw);
}

function parseBoolean(raw: string): boolean {
  if (!isBooleanLiteral(raw)) {
    throw new Error(`'${raw}' is not a boolean`);
  }
  return raw.toLowerCase() === "true";
}

function parseChar(raw: string): string {
  if ([...raw].length !== 1) {
    throw new Error(`'${raw}' is not a single character`);
  }
  return raw;
}

function parseUrl(raw: string): URL {
  try {
    return new URL(raw);
  } catch (err) {
    throw new Error(`'${raw}' is not a valid URL`, { cause: err });
  }
}

function parseDate(raw: string): Date {
  const date = new Date(`${raw}T00:00:00.000Z`);
  if (!DATE_PATTERN.test(raw) || Number.isNaN(date.getTime()) || date.toISOString().slice(0, 10) !== raw) {
    throw new Error(`'${raw}' is not a yyyy-MM-dd date`);
  }
  return date;
}

function parseRegExp(raw: string): RegExp {
  try {
    return new RegExp(raw);
  } catch (err) {
    throw new Error(`'${raw}' is not a valid regular expression`, { cause: err });
  }
}

function enumConverter(values: readonly string[], caseInsensitive: boolean): TypeConverter<string> {
  return (raw) => {
    const exact = values.find((value) => value === raw);
    if (exact !== undefined) return exact;
    if (caseInsensitive) {
      const lowered = raw.toLowerCase();
      const loose = values.find((value) => value.toLowerCase() === lowered);
      if (loose !== undefined) return loose;
    }
    const mode = caseInsensitive ? "case-insensitive" : "case-sensitive";
    throw new Error(`expected one of [${values.join(", ")}] (${mode}) but was '${raw}'`);
  };
}

export interface BuiltInConverterOptions {
  enumValues?: readonly string[];
  caseInsensitiveEnumValues?: boolean;
}

export function builtInConverter(type: ValueType, options: BuiltInConverterOptions = {}): TypeConverter {
  switch (type) {
    case "string":
      return (raw) => raw;
    case "boolean":
      return parseBoolean;
    case "integer":
      return parseInteger;
    case "number":
      return parseNumber;
    case "bigint":
      return parseBigInt;
    case "char":
      return parseChar;
    case "url":
      return parseUrl;
    case "date":
      return parseDate;
    case "regexp":
      return parseRegExp;
    case "enum":
      return enumConverter(options.enumValues ?? [], options.caseInsensitiveEnumValues ?? false);
  }
}

/**
 * Resolve the converter for one auxiliary-type position of an argument
 * (0 for single values and elements, 0 and 1 for map keys and values).
 */
export function resolveConverter(arg: IArgSpec, position: number, command: ICommandSpec): TypeConverter {
  const own = arg.converters[position];
  if (own) return own;
  const type = arg.auxiliaryTypes[position] ?? "string";
  return (
    command.converterFor(type) ??
    builtInConverter(type, {
      enumValues: arg.enumValues,
      caseInsensitiveEnumValues: command.parser.caseInsensitiveEnumValuesAllowed,
    })
  );
}
