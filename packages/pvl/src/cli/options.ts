/**
 * Command-line options
 */

import { parseArgs, type ParseArgsConfig } from "node:util";

export type OutputFormat = "text" | "json";

export interface CliOptions {
  file: string;
  overlookResolutionErrors: boolean;
  extractLoops: boolean;
  print: boolean;
  format: OutputFormat;
}

export const commonOptions = {
  "overlook-errors": {
    type: "boolean",
    default: false,
  },
  "extract-loops": {
    type: "boolean",
    default: false,
  },
  print: {
    type: "boolean",
    default: false,
  },
  format: {
    type: "string",
    default: "text",
  },
  help: {
    type: "boolean",
    short: "h",
    default: false,
  },
} satisfies ParseArgsConfig["options"];

export const usage = `Usage: pvl [options] <file.pvl>

Parse, resolve and typecheck a PVL program.

Options:
  -h, --help             Show this help message
      --overlook-errors  Drop implementations that fail to resolve
      --extract-loops    Turn loops into recursive procedures
      --print            Print the checked program
      --format <format>  Diagnostics as text or json (default: text)`;

export function parseFormat(format: string): OutputFormat {
  if (format === "text" || format === "json") {
    return format;
  }
  throw new Error(`Unknown format: ${format}. Expected text or json`);
}

/**
 * Options from the arguments, or null when help was asked for
 */
export function parseOptions(args: string[]): CliOptions | null {
  const { values, positionals } = parseArgs({
    args,
    options: commonOptions,
    allowPositionals: true,
  });

  if (values.help) {
    return null;
  }

  const [file, ...rest] = positionals;
  if (!file || rest.length > 0) {
    throw new Error("Expected exactly one input file");
  }

  return {
    file,
    overlookResolutionErrors: values["overlook-errors"] ?? false,
    extractLoops: values["extract-loops"] ?? false,
    print: values.print ?? false,
    format: parseFormat(values.format ?? "text"),
  };
}
