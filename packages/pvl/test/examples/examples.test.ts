/**
 * Example Files Test Suite
 *
 * Automatically discovers and tests all .pvl example files.
 *
 * Supports annotations for test behavior:
 *   // @wip                      - Skip test (work in progress)
 *   // @skip Reason              - Skip with reason
 *   // @expect-parse-error       - Expected to fail parsing
 *   // @expect-resolve-error     - Expected to fail name resolution
 *   // @expect-typecheck-error   - Expected to fail typechecking
 *   // @expect-extraction-error  - Expected to fail loop extraction
 *   // @extract-loops            - Compile with loop extraction
 *
 * Supports fenced YAML test blocks (see annotations.ts for format).
 */

import { describe, it, expect } from "vitest";
import { promises as fs } from "fs";
import path from "path";
import { fileURLToPath } from "url";
import { glob } from "glob";

import { compile, type Compiled } from "#compiler";
import type { PvlError } from "#errors";
import { emit } from "#printer";
import { Result } from "#result";

import { Error as CfgError } from "../../src/cfg/errors.js";
import { Error as ParseError } from "../../src/parser/errors.js";
import { Error as ResolveError } from "../../src/resolver/errors.js";
import { Error as TypeError } from "../../src/typechecker/errors.js";

import { parseTestBlocks, type TestBlock } from "./annotations.js";
import { runOutcomeTest } from "./runners.js";

const EXAMPLES_DIR = path.resolve(
  path.dirname(fileURLToPath(import.meta.url)),
  "../../../../examples",
);

interface ExampleAnnotations {
  wip: boolean;
  skip: string | false;
  expectParseError: boolean;
  expectResolveError: boolean;
  expectTypecheckError: boolean;
  expectExtractionError: boolean;
  extractLoops: boolean;
}

interface ExampleInfo {
  relativePath: string;
  source: string;
  annotations: ExampleAnnotations;
  testBlocks: TestBlock[];
}

function parseAnnotations(source: string): ExampleAnnotations {
  return {
    wip: source.includes("// @wip"),
    skip: source.match(/\/\/ @skip\s*(.*)/)?.[1] || false,
    expectParseError: source.includes("// @expect-parse-error"),
    expectResolveError: source.includes("// @expect-resolve-error"),
    expectTypecheckError: source.includes("// @expect-typecheck-error"),
    expectExtractionError: source.includes("// @expect-extraction-error"),
    extractLoops: source.includes("// @extract-loops"),
  };
}

async function loadExamples(): Promise<ExampleInfo[]> {
  const files = await glob("**/*.pvl", { cwd: EXAMPLES_DIR });
  const examples: ExampleInfo[] = [];

  for (const relativePath of files.sort()) {
    const source = await fs.readFile(
      path.join(EXAMPLES_DIR, relativePath),
      "utf-8",
    );

    examples.push({
      relativePath,
      source,
      annotations: parseAnnotations(source),
      testBlocks: parseTestBlocks(source),
    });
  }

  return examples;
}

function shouldSkip(annotations: ExampleAnnotations): boolean {
  return annotations.wip || !!annotations.skip;
}

function skipSuffix(annotations: ExampleAnnotations): string {
  if (annotations.skip) return ` (skip: ${annotations.skip})`;
  if (annotations.wip) return " (wip)";
  return "";
}

/**
 * The error class reports of the expected failing gate must have
 */
function expectedGate(
  annotations: ExampleAnnotations,
): (new (...args: never[]) => PvlError) | undefined {
  if (annotations.expectParseError) return ParseError;
  if (annotations.expectResolveError) return ResolveError;
  if (annotations.expectTypecheckError) return TypeError;
  if (annotations.expectExtractionError) return CfgError;
  return undefined;
}

function describeErrors(result: Result<Compiled, PvlError>): string {
  return Result.errors(result)
    .map((e) => `${e.code || "ERROR"}: ${e.message || "Unknown error"}`)
    .join("\n");
}

/**
 * Handle test result with expected failure support.
 */
function handleTestResult(
  result: { passed: boolean; message?: string },
  expectFail?: string,
): void {
  if (expectFail) {
    if (result.passed) {
      expect.fail(`Expected to fail (${expectFail}) but passed`);
    }
    return;
  }

  if (!result.passed) {
    expect.fail(result.message);
  }
}

describe("Example Files", async () => {
  const examples = await loadExamples();

  // === Compilation Tests ===
  describe("Compilation", () => {
    for (const example of examples) {
      const { relativePath, source, annotations } = example;
      const itFn = shouldSkip(annotations) ? it.skip : it;

      itFn(`${relativePath}${skipSuffix(annotations)}`, async () => {
        const result = await compile({
          source,
          extractLoops: annotations.extractLoops,
        });

        const gate = expectedGate(annotations);
        if (gate) {
          expect(result.success).toBe(false);
          const errors = Result.errors(result);
          expect(errors.length).toBeGreaterThan(0);
          expect(errors.every((error) => error instanceof gate)).toBe(true);
          return;
        }

        if (!result.success) {
          throw new Error(
            `Expected compilation to succeed but got errors:\n${describeErrors(result)}`,
          );
        }

        // Printed programs compile again to the same text
        const printed = emit(result.value.ast);
        const again = await compile({ source: printed });
        if (!again.success) {
          throw new Error(
            `Printed program does not compile:\n${describeErrors(again)}\n\n${printed}`,
          );
        }
        expect(emit(again.value.ast)).toBe(printed);
      });
    }
  });

  // === Outcome Tests ===
  const outcomeTests = examples.filter(
    ({ testBlocks }) => testBlocks.length > 0,
  );

  if (outcomeTests.length > 0) {
    describe("Outcomes", () => {
      for (const example of outcomeTests) {
        const { relativePath, annotations, source } = example;
        const describeFn = shouldSkip(annotations) ? describe.skip : describe;

        describeFn(`${relativePath}${skipSuffix(annotations)}`, () => {
          example.testBlocks.forEach((block, index) => {
            const baseName = block.name || `block ${index + 1}`;
            const testName = block.expectFail
              ? `${baseName} (expected: ${block.expectFail})`
              : baseName;

            it(testName, async () => {
              const test = block.parsed;
              const result = await compile({
                source,
                extractLoops: test.extractLoops || annotations.extractLoops,
                overlookResolutionErrors: test.overlookErrors,
              });

              handleTestResult(
                runOutcomeTest(result, source, test),
                block.expectFail,
              );
            });
          });
        });
      }
    });
  }
});
