/**
 * The `pvl` command
 */

import { readFile } from "node:fs/promises";

import { compile } from "#compiler";
import { emit } from "#printer";
import { Result } from "#result";

import { formatJson } from "./formatters.js";
import { parseOptions, usage } from "./options.js";
import {
  displayErrors,
  displayWarnings,
  errorSummary,
  writeOutput,
} from "./output.js";

/**
 * Run the command on `args` (without the node and script paths) and
 * return the exit code
 */
export async function handleCompileCommand(args: string[]): Promise<number> {
  const options = parseOptions(args);
  if (!options) {
    writeOutput(usage);
    return 0;
  }

  const { file } = options;
  const source = await readFile(file, "utf-8");
  const result = await compile({
    source,
    overlookResolutionErrors: options.overlookResolutionErrors,
    extractLoops: options.extractLoops,
  });

  const errors = Result.errors(result);
  const warnings = Result.warnings(result);

  if (options.format === "json") {
    writeOutput(formatJson([...errors, ...warnings], source, file));
  } else {
    displayErrors(errors, source, file);
    displayWarnings(warnings, source, file);
    if (errors.length > 0) {
      console.error(errorSummary(errors, file));
    }
  }

  if (!result.success) {
    return 1;
  }
  if (options.print) {
    writeOutput(emit(result.value.ast));
  }
  return 0;
}
