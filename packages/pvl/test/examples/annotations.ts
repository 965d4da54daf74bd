/**
 * Test Block Parser
 *
 * Parses fenced YAML test blocks from .pvl source files.
 * Format: multi-line comment starting with @test, containing YAML.
 *
 *   /*@test undeclared
 *   errors:
 *     - at: here
 *       message: "undeclared identifier: y"
 *   *\/
 */

import YAML from "yaml";

export interface ExpectedMessage {
  line?: number;
  message: string;
}

export interface OutcomeTest {
  extractLoops: boolean;
  overlookErrors: boolean;
  errors?: ExpectedMessage[];
  warnings?: ExpectedMessage[];
  procedures?: string[];
}

export interface TestBlock {
  name?: string;
  raw: string;
  parsed: OutcomeTest;
  expectFail?: string; // If set, test is expected to fail with this reason
}

/**
 * Find the last non-empty, non-comment line before a given offset.
 * This is used for "at: here" to find the code line above the test block.
 */
function findPrecedingCodeLine(source: string, offset: number): number {
  // Blank out block comments, keeping their newlines
  const withoutBlockComments = source
    .slice(0, offset)
    .replace(/\/\*[\s\S]*?\*\//g, (match) => match.replace(/[^\n]/g, " "));

  const lines = withoutBlockComments.split("\n");

  for (let i = lines.length - 1; i >= 0; i--) {
    const line = lines[i].trim();
    if (line && !line.startsWith("//")) {
      return i + 1;
    }
  }

  return Math.max(1, lines.length);
}

/**
 * Remove common leading indentation from a multi-line string.
 */
function dedent(text: string): string {
  const lines = text.split("\n");

  let minIndent = Infinity;
  for (const line of lines) {
    if (line.trim()) {
      const indent = line.match(/^(\s*)/)?.[1].length ?? 0;
      minIndent = Math.min(minIndent, indent);
    }
  }

  if (minIndent === Infinity || minIndent === 0) {
    return text;
  }

  return lines.map((line) => line.slice(minIndent)).join("\n");
}

/**
 * Parse all test blocks from a source file. Blocks that are not valid YAML
 * or do not state any expectation raise, so a typo never silently drops a
 * test.
 */
export function parseTestBlocks(source: string): TestBlock[] {
  const blocks: TestBlock[] = [];

  // Match /*@test <name>\n<yaml>\n*/
  const regex = /\/\*@test[ \t]*(\S*)?\n([\s\S]*?)\*\//g;

  let match;
  while ((match = regex.exec(source)) !== null) {
    const name = match[1] || undefined;
    const yamlContent = dedent(match[2]).trim();
    const here = findPrecedingCodeLine(source, match.index);

    const parsed: unknown = YAML.parse(yamlContent);
    if (!isRecord(parsed)) {
      throw new Error(`Test block ${name ?? "at line " + here} is not a map`);
    }

    blocks.push({
      name,
      raw: yamlContent,
      parsed: normalizeTest(parsed, here),
      expectFail: extractExpectFail(parsed),
    });
  }

  return blocks;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function extractExpectFail(
  parsed: Record<string, unknown>,
): string | undefined {
  if ("fails" in parsed) {
    return typeof parsed.fails === "string"
      ? parsed.fails
      : "expected failure";
  }
  return undefined;
}

function normalizeTest(
  parsed: Record<string, unknown>,
  here: number,
): OutcomeTest {
  const test: OutcomeTest = {
    extractLoops: parsed["extract-loops"] === true,
    overlookErrors: parsed["overlook-errors"] === true,
  };

  if ("errors" in parsed) {
    test.errors = normalizeMessages(parsed.errors, here);
  }
  if ("warnings" in parsed) {
    test.warnings = normalizeMessages(parsed.warnings, here);
  }
  if ("procedures" in parsed) {
    const { procedures } = parsed;
    if (
      !Array.isArray(procedures) ||
      !procedures.every((name): name is string => typeof name === "string")
    ) {
      throw new Error("procedures must be a list of names");
    }
    test.procedures = procedures;
  }

  if (!test.errors && !test.warnings && !test.procedures) {
    throw new Error(
      `Test block before line ${here + 1} has no errors, warnings or procedures`,
    );
  }
  return test;
}

// Each entry is a message, or a map with `message` and either `line: N`
// or `at: here` (the code line immediately before the test block)
function normalizeMessages(entries: unknown, here: number): ExpectedMessage[] {
  if (!Array.isArray(entries)) {
    throw new Error("expected a list of messages");
  }

  return entries.map((entry: unknown): ExpectedMessage => {
    if (typeof entry === "string") {
      return { message: entry };
    }
    if (!isRecord(entry) || typeof entry.message !== "string") {
      throw new Error(`invalid message entry: ${JSON.stringify(entry)}`);
    }
    if (entry.at === "here") {
      return { line: here, message: entry.message };
    }
    if (typeof entry.line === "number") {
      return { line: entry.line, message: entry.message };
    }
    return { message: entry.message };
  });
}
