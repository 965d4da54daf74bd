import type { Program } from "#ast";
import type { Pass } from "#compiler";
import type { Resolution } from "#resolver";
import { Result } from "#result";

import type { Error as CfgError } from "./errors.js";
import { extractLoops } from "./extract.js";

/**
 * Loop extraction pass - replaces every loop by a call to a recursive
 * procedure. The program it produces has to be resolved again.
 */
export const pass: Pass<{
  needs: {
    ast: Program;
    resolution: Resolution;
  };
  adds: {
    ast: Program;
  };
  error: CfgError;
}> = {
  async run({ ast, resolution }) {
    return Result.map(extractLoops(ast, resolution), (program) => ({
      ast: program,
    }));
  },
};
