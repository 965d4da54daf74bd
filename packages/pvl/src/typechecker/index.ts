/**
 * Type checking for PVL
 */

export { checkProgram, TypeChecker } from "./checker.js";
export { TypecheckingContext, Typing } from "./context.js";
export { seekAmbiguities, normalizeTyping } from "./ambiguity.js";
export {
  Error as TypeError,
  ErrorCode as TypeErrorCode,
  ErrorMessages as TypeErrorMessages,
} from "./errors.js";
export { pass } from "./pass.js";
