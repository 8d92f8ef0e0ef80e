/**
 * Raw value handling: quote trimming, splitting, conversion and writing
 * converted values into single, list, set and map targets.
 */

import type { IArgSpec, ICommandSpec } from "@argloom/sdk";
import { MalformedMapEntryError, TypeConversionError } from "@argloom/sdk";
import { resolveConverter } from "../model/converters.js";
import { describeArg } from "./descriptions.js";

export interface ConvertedValue {
  raw: string;
  /** Converted elements; empty for maps. */
  items: unknown[];
  /** Converted key/value pairs; empty for everything but maps. */
  entries: Array<[unknown, unknown]>;
}

export interface ConversionContext {
  command: ICommandSpec;
  trimQuotes: boolean;
}

/**
 * Strip one pair of enclosing double quotes. Values with an escaped closing
 * quote or further unescaped quotes inside are returned unchanged.
 */
export function trimQuotes(raw: string): string {
  if (raw.length < 2 || !raw.startsWith('"') || !raw.endsWith('"')) return raw;
  const inner = raw.slice(1, -1);
  for (let i = 0; i < inner.length; i++) {
    if (inner[i] === "\\") {
      if (i === inner.length - 1) return raw;
      i++;
    } else if (inner[i] === '"') {
      return raw;
    }
  }
  return inner;
}

/**
 * Convert one raw value for an argument.
 *
 * @throws TypeConversionError when a converter rejects the value
 * @throws MalformedMapEntryError when a map value has no '='
 */
export function convertValue(arg: IArgSpec, raw: string, valueIndex: number, ctx: ConversionContext): ConvertedValue {
  const value = ctx.trimQuotes ? trimQuotes(raw) : raw;
  const parts = arg.isMultiValue && arg.splitRegex !== "" ? value.split(new RegExp(arg.splitRegex)) : [value];

  const convert = (position: number, text: string): unknown => {
    try {
      return resolveConverter(arg, position, ctx.command)(text);
    } catch (err) {
      const reason = err instanceof Error ? err.message : `cannot convert '${text}' to ${arg.auxiliaryTypes[position]}`;
      throw new TypeConversionError(`Invalid value for ${describeArg(arg, valueIndex)}: ${reason}`, {
        argSpec: arg,
        value: text,
        commandName: ctx.command.name,
        cause: err instanceof Error ? err : undefined,
      });
    }
  };

  if (arg.container === "map") {
    const entries = parts.map((part): [unknown, unknown] => {
      const separator = part.indexOf("=");
      if (separator < 0) {
        throw new MalformedMapEntryError(
          `Value for ${describeArg(arg, valueIndex)} should be in KEY=VALUE format but was ${part}`,
          { argSpec: arg, value: raw, commandName: ctx.command.name },
        );
      }
      return [convert(0, part.slice(0, separator)), convert(1, part.slice(separator + 1))];
    });
    return { raw, items: [], entries };
  }
  return { raw, items: parts.map((part) => convert(0, part)), entries: [] };
}

/**
 * The value an argument holds after adding converted values to `base`.
 * Single-valued arguments take the last value; containers copy `base`
 * (when it has the right shape) and add to the copy.
 */
export function valueWith(arg: IArgSpec, base: unknown, values: readonly ConvertedValue[]): unknown {
  switch (arg.container) {
    case "single": {
      const items = values.flatMap((value) => value.items);
      return items.length > 0 ? items[items.length - 1] : base;
    }
    case "list":
      return [...(Array.isArray(base) ? base : []), ...values.flatMap((value) => value.items)];
    case "set":
      return new Set([...(base instanceof Set ? base : []), ...values.flatMap((value) => value.items)]);
    case "map":
      return new Map([...(base instanceof Map ? base : []), ...values.flatMap((value) => value.entries)]);
  }
}

/** Typed values recorded in the parse result: elements, or pairs for maps. */
export function typedOf(values: readonly ConvertedValue[]): unknown[] {
  return values.flatMap((value): unknown[] => (value.entries.length > 0 ? value.entries : value.items));
}
