/**
 * Name resolution errors and error codes
 */

import { PvlError } from "#errors";
import type { SourceLocation } from "#ast";
import { Severity } from "#result";

export enum ErrorCode {
  DUPLICATE_TYPE = "RES001",
  DUPLICATE_PROCEDURE = "RES002",
  DUPLICATE_VARIABLE = "RES003",
  DUPLICATE_BLOCK = "RES004",
  UNDECLARED_IDENTIFIER = "RES005",
  UNDECLARED_FUNCTION = "RES006",
  UNDECLARED_PROCEDURE = "RES007",
  UNKNOWN_LABEL = "RES008",
  NOT_A_FUNCTION = "RES009",
  NOT_A_PROCEDURE = "RES010",
  GLOBAL_IN_STATELESS_CONTEXT = "RES011",
  OLD_OUTSIDE_TWO_STATE = "RES012",
  SYNONYM_CYCLE = "RES013",
  PARENT_NOT_CONSTANT = "RES014",
  CONSTANT_OWN_PARENT = "RES015",
  DUPLICATE_PARENT = "RES016",
  IMPLEMENTATION_UNDECLARED = "RES017",
  IMPLEMENTATION_FOR_FUNCTION = "RES018",
  IMPLEMENTATION_IGNORED = "RES019",
  TYPE_RESOLUTION = "RES020",
}

export const ErrorMessages = {
  DUPLICATE_TYPE: (name: string) =>
    `more than one declaration of type name: ${name}`,
  DUPLICATE_PROCEDURE: (name: string) =>
    `more than one declaration of function/procedure name: ${name}`,
  DUPLICATE_VARIABLE: (name: string) =>
    `more than one declaration of variable name: ${name}`,
  DUPLICATE_BLOCK: (label: string) =>
    `more than one declaration of block name: ${label}`,
  UNDECLARED_IDENTIFIER: (name: string) => `undeclared identifier: ${name}`,
  UNDECLARED_FUNCTION: (name: string) => `use of undeclared function: ${name}`,
  UNDECLARED_PROCEDURE: (name: string) =>
    `call to undeclared procedure: ${name}`,
  UNKNOWN_LABEL: (label: string) => `goto to unknown label: ${label}`,
  NOT_A_FUNCTION: (name: string) => `${name} is a procedure, not a function`,
  NOT_A_PROCEDURE: (name: string) =>
    `call to a function, not a procedure: ${name}`,
  GLOBAL_IN_STATELESS_CONTEXT: (name: string) =>
    `cannot refer to a global variable in this context: ${name}`,
  OLD_OUTSIDE_TWO_STATE: () =>
    "old expressions allowed only in two-state contexts",
  SYNONYM_CYCLE: (name: string) =>
    `type synonym could not be resolved because of cycles: ${name} (replacing body with "bool" to continue resolving)`,
  PARENT_NOT_CONSTANT: () => "the parent of a constant has to be a constant",
  CONSTANT_OWN_PARENT: () => "constant cannot be its own parent",
  DUPLICATE_PARENT: (name: string) =>
    `${name} occurs more than once as parent`,
  IMPLEMENTATION_UNDECLARED: (name: string) =>
    `implementation given for undeclared procedure: ${name}`,
  IMPLEMENTATION_FOR_FUNCTION: (name: string) =>
    `implementations given for function, not procedure: ${name}`,
  IMPLEMENTATION_IGNORED: (name: string) =>
    `Ignoring implementation ${name} because of translation resolution errors`,
};

/**
 * Name resolution errors
 */
export class Error extends PvlError {
  constructor(
    message: string,
    location?: SourceLocation,
    code: ErrorCode = ErrorCode.TYPE_RESOLUTION,
    severity: Severity = Severity.Error,
  ) {
    super(message, code, location, severity);
  }
}
