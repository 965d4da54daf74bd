import type { Program } from "#ast";
import type { Pass } from "#compiler";
import { Result } from "#result";

import type { Error as ResolveError } from "./errors.js";
import type { Resolution } from "./resolution.js";
import { resolveProgram } from "./resolver.js";

/**
 * Name resolution pass - binds identifiers and resolves types
 */
export const pass: Pass<{
  needs: {
    ast: Program;
    overlookResolutionErrors?: boolean;
  };
  adds: {
    ast: Program;
    resolution: Resolution;
  };
  error: ResolveError;
}> = {
  async run({ ast, overlookResolutionErrors }) {
    const result = resolveProgram(ast, { overlookResolutionErrors });
    return Result.map(result, ({ program, resolution }) => ({
      ast: program,
      resolution,
    }));
  },
};
