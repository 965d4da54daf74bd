/**
 * Compiler pass system for composing compilation passes
 */

export type { Pass, PassConfig, Needs, Adds, PassError, Run } from "./pass.js";
export { Sequence, buildSequence, andThen } from "./sequence.js";
export {
  astSequence,
  checkSequence,
  extractionSequence,
  type SequenceInput,
} from "./sequences.js";
export { compile, type CompileOptions, type Compiled } from "./compile.js";
