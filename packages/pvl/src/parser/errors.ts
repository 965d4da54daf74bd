/**
 * Parser-specific errors and error codes
 */

import { PvlError } from "#errors";
import type { SourceLocation } from "#ast";

export enum ErrorCode {
  PARSE_ERROR = "PARSE_ERROR",
  // structured bodies that cannot be lowered to blocks
  LOWERING_BREAK_OUTSIDE_LOOP = "LOWERING_BREAK_OUTSIDE_LOOP",
  LOWERING_BREAK_LABEL = "LOWERING_BREAK_LABEL",
  LOWERING_UNKNOWN_LABEL = "LOWERING_UNKNOWN_LABEL",
  LOWERING_DUPLICATE_LABEL = "LOWERING_DUPLICATE_LABEL",
}

export const ErrorMessages = {
  BREAK_OUTSIDE_LOOP: () => "break statement is not inside a loop",
  BREAK_LABEL: (label: string) =>
    `break label ${label} does not denote an enclosing statement`,
  UNKNOWN_LABEL: (label: string) => `goto to unknown label: ${label}`,
  DUPLICATE_LABEL: (label: string) =>
    `more than one declaration of block name: ${label}`,
};

/**
 * Parse errors
 */
export class Error extends PvlError {
  constructor(
    message: string,
    location: SourceLocation,
    code: ErrorCode = ErrorCode.PARSE_ERROR,
  ) {
    super(message, code, location);
  }
}
