/**
 * CLI module exports
 */

export { handleCompileCommand } from "./compile.js";
export { formatJson, type JsonMessage } from "./formatters.js";
export {
  commonOptions,
  parseFormat,
  parseOptions,
  usage,
  type CliOptions,
  type OutputFormat,
} from "./options.js";
export {
  displayErrors,
  displayWarnings,
  errorSummary,
  writeOutput,
} from "./output.js";
