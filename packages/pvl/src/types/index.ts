/**
 * Type system for PVL
 *
 * Types are independent of the passes that produce them, so that the
 * resolver, typechecker and printer can share them.
 */

export { Type } from "./definitions.js";
export {
  matchArgumentTypes,
  checkArgumentTypes,
  checkMapArguments,
  type Actual,
  type ArgumentCheck,
  type ArgumentCheckRequest,
  type ErrorSink,
} from "./arguments.js";

// Types of AST nodes, keyed by node id
import type { Type } from "./definitions.js";
export type TypeMap = Map<string, Type>;
