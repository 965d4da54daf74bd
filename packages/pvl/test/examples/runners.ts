/**
 * Test Runner
 *
 * Checks a compilation result against the expectations of a test block:
 * the messages reported at source lines and the procedures that result.
 */

import type { Compiled } from "#compiler";
import { positionOf, type PvlError } from "#errors";
import { Result } from "#result";

import type { ExpectedMessage, OutcomeTest } from "./annotations.js";

export interface TestResult {
  passed: boolean;
  message?: string;
  expected?: unknown;
  actual?: unknown;
}

/**
 * Compare the outcome of a compilation with the expectations of `test`
 */
export function runOutcomeTest(
  result: Result<Compiled, PvlError>,
  source: string,
  test: OutcomeTest,
): TestResult {
  if (test.errors) {
    const check = checkMessages(
      "errors",
      Result.errors(result),
      test.errors,
      source,
    );
    if (!check.passed) {
      return check;
    }
  }

  if (test.warnings) {
    const check = checkMessages(
      "warnings",
      Result.warnings(result),
      test.warnings,
      source,
    );
    if (!check.passed) {
      return check;
    }
  }

  if (test.procedures) {
    if (!result.success) {
      return {
        passed: false,
        message: "Compilation failed - no procedures to compare",
      };
    }

    const actual = result.value.ast.declarations.flatMap((declaration) =>
      declaration.kind === "procedure" ? [declaration.name] : [],
    );
    if (!sameList(actual, test.procedures)) {
      return {
        passed: false,
        message:
          `Procedures mismatch\n` +
          `  expected: ${test.procedures.join(", ")}\n` +
          `  actual:   ${actual.join(", ")}`,
        expected: test.procedures,
        actual,
      };
    }
  }

  return { passed: true };
}

/**
 * Messages are compared in the order they were reported. An expectation
 * without a line matches the message wherever it was reported.
 */
function checkMessages(
  kind: string,
  messages: readonly PvlError[],
  expected: readonly ExpectedMessage[],
  source: string,
): TestResult {
  const actual = messages.map((message) => ({
    line: message.location
      ? positionOf(source, message.location.offset).line
      : undefined,
    message: message.message,
  }));

  const render = (entries: readonly { line?: number; message: string }[]) =>
    entries
      .map(({ line, message }) =>
        line === undefined ? message : `${line}: ${message}`,
      )
      .join("\n    ");

  const matches =
    actual.length === expected.length &&
    expected.every(
      (entry, i) =>
        entry.message === actual[i].message &&
        (entry.line === undefined || entry.line === actual[i].line),
    );

  if (!matches) {
    return {
      passed: false,
      message:
        `Reported ${kind} differ\n` +
        `  expected:\n    ${render(expected)}\n` +
        `  actual:\n    ${render(actual)}`,
      expected,
      actual,
    };
  }

  return { passed: true };
}

function sameList(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((value, i) => value === b[i]);
}
