export const VERSION = "0.1.0";

export * as Ast from "#ast";

// Re-export parser functionality
export { parse, parser } from "#parser";

// Re-export name resolution
export { resolveProgram, Resolution, Resolver } from "#resolver";

// Re-export type checker functionality
export { checkProgram, TypeChecker, Typing } from "#typechecker";

// Re-export type system
export { Type } from "#types";

// Re-export control-flow transformations
export { extractLoops, pruneUnreachableBlocks } from "#cfg";

// Re-export the emitter
export { emit, emitDeclaration, emitExpression } from "#printer";

// Re-export error handling utilities
export * from "#errors";

// Re-export result type
export * from "#result";

// Re-export compiler interfaces
export { compile, type CompileOptions, type Compiled } from "#compiler";

// CLI utilities are not exported; import them from ./cli in Node.js
