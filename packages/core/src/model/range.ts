/**
 * Range — an inclusive count range with an optionally unbounded maximum.
 *
 * Used both for value arity (how many values an argument consumes) and for
 * the index range of positional parameters. Literal forms: "N", "N..M",
 * "N..*" and "*" (same as "0..*").
 */

import type { IRange } from "@argloom/sdk";
import { InitializationError } from "@argloom/sdk";

const RANGE_PATTERN = /^(\d+)(?:\.\.(\d+|\*))?$/;

export class Range implements IRange {
  private constructor(
    readonly min: number,
    readonly max: number,
  ) {}

  /**
   * Parse a range literal.
   *
   * @throws InitializationError for empty, negative, non-numeric or inverted ranges
   */
  static valueOf(text: string): Range {
    const trimmed = text.trim();
    if (trimmed === "*") {
      return new Range(0, Number.POSITIVE_INFINITY);
    }
    const match = RANGE_PATTERN.exec(trimmed);
    if (!match) {
      throw new InitializationError(`Invalid range '${text}': expected N, N..M, N..* or *`);
    }
    const min = Number.parseInt(match[1], 10);
    const upper = match[2];
    if (upper === undefined) {
      return new Range(min, min);
    }
    if (upper === "*") {
      return new Range(min, Number.POSITIVE_INFINITY);
    }
    const max = Number.parseInt(upper, 10);
    if (max < min) {
      throw new InitializationError(`Invalid range '${text}': max ${max} is less than min ${min}`);
    }
    return new Range(min, max);
  }

  /** Build a range from bounds; pass Infinity for an unbounded max. */
  static of(min: number, max: number = min): Range {
    if (!Number.isInteger(min) || min < 0) {
      throw new InitializationError(`Invalid range minimum ${min}`);
    }
    if (max !== Number.POSITIVE_INFINITY && (!Number.isInteger(max) || max < min)) {
      throw new InitializationError(`Invalid range maximum ${max} for minimum ${min}`);
    }
    return new Range(min, max);
  }

  /** Accepts a literal or an existing range. */
  static from(value: string | IRange): Range {
    if (typeof value === "string") return Range.valueOf(value);
    if (value instanceof Range) return value;
    return Range.of(value.min, value.max);
  }

  get isUnbounded(): boolean {
    return this.max === Number.POSITIVE_INFINITY;
  }

  get isVariable(): boolean {
    return this.max !== this.min;
  }

  contains(value: number): boolean {
    return value >= this.min && value <= this.max;
  }

  /** Copy with a new minimum; the maximum grows to stay valid. */
  withMin(min: number): Range {
    return Range.of(min, Math.max(min, this.max));
  }

  equals(other: IRange): boolean {
    return this.min === other.min && this.max === other.max;
  }

  toString(): string {
    if (this.isUnbounded) return `${this.min}..*`;
    if (this.min === this.max) return String(this.min);
    return `${this.min}..${this.max}`;
  }
}
