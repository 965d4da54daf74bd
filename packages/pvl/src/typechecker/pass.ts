import type { Program } from "#ast";
import type { Pass } from "#compiler";
import type { Resolution } from "#resolver";
import { Result } from "#result";

import { checkProgram } from "./checker.js";
import type { Typing } from "./context.js";
import type { Error as TypeError } from "./errors.js";

/**
 * Type checking pass - computes the type of every expression
 */
export const pass: Pass<{
  needs: {
    ast: Program;
    resolution: Resolution;
  };
  adds: {
    typing: Typing;
  };
  error: TypeError;
}> = {
  async run({ ast, resolution }) {
    return Result.map(checkProgram(ast, resolution), (typing) => ({
      typing,
    }));
  },
};
