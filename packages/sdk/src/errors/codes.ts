/**
 * Stable error codes carried by every ArgloomError.
 */
export const ErrorCode = {
  INITIALIZATION_ERROR: "INITIALIZATION_ERROR",
  DUPLICATE_NAME: "DUPLICATE_NAME",
  PARAMETER_INDEX_GAP: "PARAMETER_INDEX_GAP",
  CONFIG_VALIDATION_ERROR: "CONFIG_VALIDATION_ERROR",
  PARAMETER_ERROR: "PARAMETER_ERROR",
  MISSING_PARAMETER: "MISSING_PARAMETER",
  TYPE_CONVERSION: "TYPE_CONVERSION",
  MALFORMED_MAP_ENTRY: "MALFORMED_MAP_ENTRY",
  OVERWRITTEN_OPTION: "OVERWRITTEN_OPTION",
  UNMATCHED_ARGUMENT: "UNMATCHED_ARGUMENT",
} as const;

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];
