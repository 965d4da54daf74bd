/**
 * Console output of the command-line tool
 */

import { formatError, type PvlError } from "#errors";
import { Error as ParseError } from "../parser/errors.js";
import { Error as ResolveError } from "../resolver/errors.js";
import { Error as TypeError } from "../typechecker/errors.js";

export function displayErrors(
  errors: readonly PvlError[],
  source: string,
  file: string,
): void {
  for (const error of errors) {
    console.error(formatError(error, source, file));
  }
}

export function displayWarnings(
  warnings: readonly PvlError[],
  source: string,
  file: string,
): void {
  for (const warning of warnings) {
    console.error(formatError(warning, source, file));
  }
}

/**
 * `N name resolution errors detected in file`, naming the first gate
 * that failed
 */
export function errorSummary(errors: readonly PvlError[], file: string): string {
  return `${errors.length} ${gateOf(errors)} errors detected in ${file}`;
}

function gateOf(errors: readonly PvlError[]): string {
  if (errors.some((error) => error instanceof ParseError)) {
    return "parse";
  }
  if (errors.some((error) => error instanceof ResolveError)) {
    return "name resolution";
  }
  if (errors.some((error) => error instanceof TypeError)) {
    return "type checking";
  }
  return "loop extraction";
}

export function writeOutput(text: string): void {
  console.log(text);
}
