/**
 * Wording shared by parameter error messages.
 */

import type { IArgSpec } from "@argloom/sdk";

/**
 * "option '--file' (<file>)" or "positional parameter at index 0..* (<files>)".
 * A negative valueIndex leaves out the label of an option; options taking
 * more than one value also name the index of the value concerned.
 */
export function describeArg(arg: IArgSpec, valueIndex = 0): string {
  if (arg.kind === "positional") {
    return `positional parameter at index ${arg.index.toString()} (${arg.paramLabel})`;
  }
  let description = `option '${arg.longestName}'`;
  if (valueIndex >= 0) {
    if (arg.arity.max > 1) description += ` at index ${valueIndex}`;
    description += ` (${arg.paramLabel})`;
  }
  return description;
}

/** How a missing required argument is named: "--file=<file>", "--verbose" or "<file>". */
export function describeRequired(arg: IArgSpec, separator: string): string {
  if (arg.kind === "positional") return arg.paramLabel;
  if (arg.arity.max === 0) return arg.longestName;
  return `${arg.longestName}${separator}${arg.paramLabel}`;
}

export function quoteList(values: readonly string[]): string {
  return values.map((value) => `'${value}'`).join(", ");
}

export function missingRequiredMessage(missing: readonly IArgSpec[], separator: string): string {
  const names = quoteList(missing.map((arg) => describeRequired(arg, separator)));
  const hasOptions = missing.some((arg) => arg.kind === "option");
  const hasPositionals = missing.some((arg) => arg.kind === "positional");
  const plural = missing.length > 1 ? "s" : "";
  if (hasOptions && hasPositionals) return `Missing required options and parameters: ${names}`;
  if (hasOptions) return `Missing required option${plural}: ${names}`;
  return `Missing required parameter${plural}: ${names}`;
}

export function unmatchedMessage(unmatched: readonly string[], firstIndex: number, unknownOption: boolean): string {
  const plural = unmatched.length > 1 ? "s" : "";
  if (unknownOption) return `Unknown option${plural}: ${quoteList(unmatched)}`;
  const at = unmatched.length > 1 ? "from" : "at";
  return `Unmatched argument${plural} ${at} index ${firstIndex}: ${quoteList(unmatched)}`;
}
