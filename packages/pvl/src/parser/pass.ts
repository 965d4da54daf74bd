import type { Program } from "#ast";
import type { Pass } from "#compiler";
import { Result } from "#result";

import type { Error as ParseError } from "./errors.js";
import { parse } from "./parser.js";

/**
 * Parsing pass - converts source text to an AST with lowered blocks
 */
export const pass: Pass<{
  needs: {
    source: string;
  };
  adds: {
    ast: Program;
  };
  error: ParseError;
}> = {
  async run({ source }) {
    return Result.map(parse(source), (ast) => ({ ast }));
  },
};
