/**
 * Parser for PVL source text
 */

export { parse, parser } from "./parser.js";
export { grammar, grammarSource } from "./grammar.js";
export { lowerProgram, type Lowered } from "./lowering.js";
export {
  Error as ParseError,
  ErrorCode as ParseErrorCode,
  ErrorMessages as ParseErrorMessages,
} from "./errors.js";
export { pass } from "./pass.js";
