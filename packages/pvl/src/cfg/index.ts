/**
 * Control-flow analyses and transformations over implementation blocks
 */

export {
  buildGraph,
  computePredecessors,
  ImplementationGraph,
  type Graph,
} from "./graph.js";
export {
  stronglyConnectedComponents,
  callGraph,
  recursiveProcedures,
} from "./scc.js";
export { computeDominators, dominates } from "./dominance.js";
export { computeLoops, naturalLoop, loopBlocks, type Loops } from "./loops.js";
export { pruneUnreachableBlocks } from "./prune.js";
export { extractLoops, loopProcedureName } from "./extract.js";
export {
  Error as CfgError,
  ErrorCode as CfgErrorCode,
  ErrorMessages as CfgErrorMessages,
} from "./errors.js";
export { pass } from "./pass.js";
