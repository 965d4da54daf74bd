/**
 * PVL text output
 */

export { emit, emitDeclaration, emitExpression } from "./emit.js";
