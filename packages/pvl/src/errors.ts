/**
 * Error base classes shared by all passes
 */

import type { SourceLocation } from "#ast";
import { Severity } from "#result";

/**
 * Base class for every diagnostic a pass can report
 */
export class PvlError extends Error {
  public readonly code: string;
  public readonly location?: SourceLocation;
  public readonly severity: Severity;

  constructor(
    message: string,
    code: string,
    location?: SourceLocation,
    severity: Severity = Severity.Error,
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.location = location;
    this.severity = severity;
  }
}

/**
 * Raised (never reported) when the core itself is misused or reaches a
 * state it cannot be in, e.g. typechecking an unresolved program
 */
export class InvariantError extends PvlError {
  constructor(message: string, location?: SourceLocation) {
    super(message, "INVARIANT", location);
  }
}

export function invariant(
  condition: unknown,
  message: string,
  location?: SourceLocation,
): asserts condition {
  if (!condition) {
    throw new InvariantError(message, location);
  }
}

export interface Position {
  line: number;
  column: number;
}

/**
 * One-based line and column of an offset into `source`
 */
export function positionOf(source: string, offset: number): Position {
  let line = 1;
  let lineStart = 0;
  const end = Math.min(offset, source.length);
  for (let i = 0; i < end; i++) {
    if (source[i] === "\n") {
      line++;
      lineStart = i + 1;
    }
  }
  return { line, column: end - lineStart + 1 };
}

/**
 * Render an error as `file(line,col): message`. Without a source text the
 * raw offset is shown instead.
 */
export function formatError(
  error: PvlError,
  source?: string,
  file = "<input>",
): string {
  if (!error.location) {
    return `${file}: ${error.message}`;
  }
  if (source === undefined) {
    return `${file}@${error.location.offset}: ${error.message}`;
  }
  const { line, column } = positionOf(source, error.location.offset);
  return `${file}(${line},${column}): ${error.message}`;
}
