import type { Program } from "#ast";
import type { PvlError } from "#errors";
import type { Resolution } from "#resolver";
import type { Result } from "#result";
import type { Typing } from "#typechecker";

import { checkSequence, extractionSequence } from "./sequences.js";

export interface CompileOptions {
  source: string;
  // implementations that fail to resolve are dropped with a warning
  overlookResolutionErrors?: boolean;
  extractLoops?: boolean;
}

export interface Compiled {
  ast: Program;
  resolution: Resolution;
  typing: Typing;
}

/**
 * Parse, resolve and typecheck `source`, extracting loops into procedures
 * when asked to
 */
export async function compile(
  options: CompileOptions,
): Promise<Result<Compiled, PvlError>> {
  const input = {
    source: options.source,
    overlookResolutionErrors: options.overlookResolutionErrors ?? false,
  };
  return options.extractLoops
    ? extractionSequence.run(input)
    : checkSequence.run(input);
}
