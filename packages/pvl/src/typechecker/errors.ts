/**
 * Type checking errors and error codes
 */

import { PvlError } from "#errors";
import type { SourceLocation } from "#ast";
import { Severity } from "#result";

export enum ErrorCode {
  AXIOM_NOT_BOOL = "TYP001",
  WHERE_NOT_BOOL = "TYP002",
  PARENT_TYPE_MISMATCH = "TYP003",
  FUNCTION_BODY_TYPE = "TYP004",
  MODIFIES_CONSTANT = "TYP005",
  PRECONDITION_NOT_BOOL = "TYP006",
  POSTCONDITION_NOT_BOOL = "TYP007",
  TYPE_PARAMETER_COUNT = "TYP008",
  PARAMETER_COUNT = "TYP009",
  PARAMETER_TYPE = "TYP010",
  ASSERTION_NOT_BOOL = "TYP011",
  ASSUMPTION_NOT_BOOL = "TYP012",
  IMMUTABLE_ASSIGNMENT = "TYP013",
  GLOBAL_NOT_IN_FRAME = "TYP014",
  CALLEE_MODIFIES_NOT_IN_FRAME = "TYP015",
  ASSIGNMENT_COUNT = "TYP016",
  ASSIGNMENT_TYPE = "TYP017",
  ARGUMENT_TYPE = "TYP018",
  UNARY_OPERATOR = "TYP019",
  BINARY_OPERATOR = "TYP020",
  NOT_A_MAP = "TYP021",
  MAP_ARITY = "TYP022",
  STORE_VALUE_TYPE = "TYP023",
  QUANTIFIER_BODY_NOT_BOOL = "TYP024",
  CONDITION_NOT_BOOL = "TYP025",
  BRANCH_TYPES = "TYP026",
  COERCION = "TYP027",
  EXTRACT_NOT_BITVECTOR = "TYP028",
  EXTRACT_RANGE = "TYP029",
  AMBIGUOUS_TYPE = "TYP030",
}

export const ErrorMessages = {
  AXIOM_NOT_BOOL: () => "axioms must be of type bool",
  WHERE_NOT_BOOL: () => "where clauses must be of type bool",
  PARENT_TYPE_MISMATCH: (parent: string, constant: string) =>
    `parent of constant has incompatible type (${parent} instead of ${constant})`,
  FUNCTION_BODY_TYPE: (actual: string, expected: string) =>
    `function body with invalid type: ${actual} (expected: ${expected})`,
  MODIFIES_CONSTANT: (name: string) =>
    `modifies list contains constant: ${name}`,
  PRECONDITION_NOT_BOOL: () => "preconditions must be of type bool",
  POSTCONDITION_NOT_BOOL: () => "postconditions must be of type bool",
  TYPE_PARAMETER_COUNT: (name: string) =>
    `mismatched number of type parameters in procedure implementation: ${name}`,
  PARAMETER_COUNT: (direction: "in" | "out", name: string) =>
    `mismatched number of ${direction}-parameters in procedure implementation: ${name}`,
  PARAMETER_TYPE: (direction: "in" | "out", name: string, formal: string) =>
    `mismatched type of ${direction}-parameter in implementation ${name}: ${formal}`,
  ASSERTION_NOT_BOOL: () => "assertions must be of type bool",
  ASSUMPTION_NOT_BOOL: () => "assumptions must be of type bool",
  IMMUTABLE_ASSIGNMENT: (name: string) =>
    `command assigns to an immutable variable: ${name}`,
  GLOBAL_NOT_IN_FRAME: (name: string) =>
    `command assigns to a global variable that is not in the enclosing procedure's modifies clause: ${name}`,
  CALLEE_MODIFIES_NOT_IN_FRAME: (callee: string, name: string) =>
    `call to ${callee} modifies a global variable that is not in the enclosing procedure's modifies clause: ${name}`,
  ASSIGNMENT_COUNT: (targets: number, values: number) =>
    `number of left-hand sides (${targets}) does not match number of right-hand sides (${values})`,
  ASSIGNMENT_TYPE: (value: string, target: string) =>
    `mismatched types in assignment command (cannot assign ${value} to ${target})`,
  UNARY_OPERATOR: (operand: string, operator: string) =>
    `invalid argument type (${operand}) to unary operator ${operator}`,
  BINARY_OPERATOR: (left: string, right: string, operator: string) =>
    `invalid argument types (${left} and ${right}) to binary operator ${operator}`,
  NOT_A_MAP: (type: string) => `non-map type used as a map: ${type}`,
  MAP_ARITY: (operation: string, count: number) =>
    `wrong number of arguments in ${operation}: ${count}`,
  STORE_VALUE_TYPE: (value: string, expected: string) =>
    `invalid type for stored value in map store: ${value} (expected: ${expected})`,
  QUANTIFIER_BODY_NOT_BOOL: () => "quantifier body must be of type bool",
  CONDITION_NOT_BOOL: (type: string) =>
    `the condition of if-then-else must be of type bool, not ${type}`,
  BRANCH_TYPES: (consequent: string, alternative: string) =>
    `branches of if-then-else have incompatible types ${consequent} and ${alternative}`,
  COERCION: (actual: string, target: string) =>
    `incompatible types in coercion: ${actual} to ${target}`,
  EXTRACT_NOT_BITVECTOR: (type: string) =>
    `bitvector extract applied to a non-bitvector: ${type}`,
  EXTRACT_RANGE: (high: number, low: number, type: string) =>
    `bitvector extract [${high}:${low}] is out of range for ${type}`,
  AMBIGUOUS_TYPE: (type: string) => `type could not be inferred: ${type}`,
};

/**
 * Type checking errors
 */
export class Error extends PvlError {
  constructor(
    message: string,
    location?: SourceLocation,
    code: ErrorCode | string = ErrorCode.ARGUMENT_TYPE,
    severity: Severity = Severity.Error,
  ) {
    super(message, code, location, severity);
  }
}
