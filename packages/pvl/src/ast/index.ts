/**
 * PVL abstract syntax tree
 */

export * from "./spec.js";
export * from "./visitor.js";
export * from "./attributes.js";
