/**
 * Name resolution for PVL
 */

export { resolveProgram, Resolver } from "./resolver.js";
export type { ResolveOptions, Resolved } from "./resolver.js";
export { ResolutionContext, StateMode, type Callable } from "./context.js";
export { Resolution } from "./resolution.js";
export { resolveTypeSynonyms, findDependencies } from "./synonyms.js";
export {
  Error as ResolveError,
  ErrorCode as ResolveErrorCode,
  ErrorMessages as ResolveErrorMessages,
} from "./errors.js";
export { pass } from "./pass.js";
