/**
 * Zod validation helpers.
 */

import type { ZodType, ZodTypeDef, ZodError } from "zod";
import { InitializationError, ErrorCode } from "@argloom/sdk";

export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; error: string };

/** Validate input against a Zod schema, returning a structured result. */
export function validateInput<T, I = T>(schema: ZodType<T, ZodTypeDef, I>, input: unknown): ValidationResult<T> {
  const result = schema.safeParse(input);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return {
    success: false,
    error: formatZodError(result.error),
  };
}

/** Format a ZodError into a human-readable string. */
export function formatZodError(error: ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
      return `${path}${issue.message}`;
    })
    .join("; ");
}

/**
 * Parse configuration input, applying schema defaults.
 *
 * @throws InitializationError with code CONFIG_VALIDATION_ERROR listing every issue
 */
export function parseConfig<T, I = T>(schema: ZodType<T, ZodTypeDef, I>, input: unknown, what: string): T {
  const result = validateInput(schema, input);
  if (!result.success) {
    throw new InitializationError(`Invalid ${what}: ${result.error}`, {
      code: ErrorCode.CONFIG_VALIDATION_ERROR,
    });
  }
  return result.data;
}
