/**
 * Errors of the control-flow transformations
 */

import { PvlError } from "#errors";
import type { SourceLocation } from "#ast";
import { Severity } from "#result";

export enum ErrorCode {
  LOOP_NAME_CLASH = "CFG001",
  LABEL_CLASH = "CFG002",
}

export const ErrorMessages = {
  LOOP_NAME_CLASH: (name: string) =>
    `cannot extract loop into ${name}: the name is already declared`,
  LABEL_CLASH: (label: string, implementation: string) =>
    `cannot extract loops of ${implementation}: block label ${label} is reserved`,
};

export class Error extends PvlError {
  constructor(
    message: string,
    location?: SourceLocation,
    code: ErrorCode = ErrorCode.LOOP_NAME_CLASH,
    severity: Severity = Severity.Error,
  ) {
    super(message, code, location, severity);
  }
}
