import type * as Ast from "./spec.js";

export interface Visitor<T, C = never> {
  program(node: Ast.Program, context: C): T;
  declaration(node: Ast.Declaration, context: C): T;
  contract(node: Ast.Contract, context: C): T;
  block(node: Ast.Block, context: C): T;
  transfer(node: Ast.Transfer, context: C): T;
  command(node: Ast.Command, context: C): T;
  target(node: Ast.Target, context: C): T;
  statement(node: Ast.Statement, context: C): T;
  identifierExpression(node: Ast.Expression.Identifier, context: C): T;
  literalExpression(node: Ast.Expression.Literal, context: C): T;
  oldExpression(node: Ast.Expression.Old, context: C): T;
  unaryExpression(node: Ast.Expression.Unary, context: C): T;
  binaryExpression(node: Ast.Expression.Binary, context: C): T;
  callExpression(node: Ast.Expression.Call, context: C): T;
  selectExpression(node: Ast.Expression.Select, context: C): T;
  storeExpression(node: Ast.Expression.Store, context: C): T;
  quantifierExpression(node: Ast.Expression.Quantifier, context: C): T;
  conditionalExpression(node: Ast.Expression.Conditional, context: C): T;
  coercionExpression(node: Ast.Expression.Coercion, context: C): T;
  extractExpression(node: Ast.Expression.Extract, context: C): T;
}

// Base visitor implementation
export function visit<T, C = never>(
  visitor: Visitor<T, C>,
  node: Ast.Node,
  context: C,
): T {
  switch (node.type) {
    case "Program":
      return visitor.program(node, context);
    case "Declaration":
      return visitor.declaration(node, context);
    case "Contract":
      return visitor.contract(node, context);
    case "Block":
      return visitor.block(node, context);
    case "Transfer":
      return visitor.transfer(node, context);
    case "Command":
      return visitor.command(node, context);
    case "Target":
      return visitor.target(node, context);
    case "Statement":
      return visitor.statement(node, context);
    case "IdentifierExpression":
      return visitor.identifierExpression(node, context);
    case "LiteralExpression":
      return visitor.literalExpression(node, context);
    case "OldExpression":
      return visitor.oldExpression(node, context);
    case "UnaryExpression":
      return visitor.unaryExpression(node, context);
    case "BinaryExpression":
      return visitor.binaryExpression(node, context);
    case "CallExpression":
      return visitor.callExpression(node, context);
    case "SelectExpression":
      return visitor.selectExpression(node, context);
    case "StoreExpression":
      return visitor.storeExpression(node, context);
    case "QuantifierExpression":
      return visitor.quantifierExpression(node, context);
    case "ConditionalExpression":
      return visitor.conditionalExpression(node, context);
    case "CoercionExpression":
      return visitor.coercionExpression(node, context);
    case "ExtractExpression":
      return visitor.extractExpression(node, context);
    default: {
      const unknown: never = node;
      throw new Error(`Unknown node type: ${JSON.stringify(unknown)}`);
    }
  }
}

/**
 * Direct child nodes, in source order. Attribute parameters are included;
 * a structured implementation body is included, its lowered blocks are not
 * unless the body is absent.
 */
export function children(node: Ast.Node): Ast.Node[] {
  switch (node.type) {
    case "Program":
      return node.declarations;
    case "Declaration":
      return [...declarationChildren(node), ...attributeNodes(node.attributes)];
    case "Contract":
      return [node.condition, ...attributeNodes(node.attributes)];
    case "Block":
      return [...node.commands, node.transfer];
    case "Transfer":
      return [];
    case "Command":
      return commandChildren(node);
    case "Target":
      return node.kind === "simple"
        ? [node.variable]
        : [node.map, ...node.indexes];
    case "Statement":
      return statementChildren(node);
    case "IdentifierExpression":
    case "LiteralExpression":
      return [];
    case "OldExpression":
    case "CoercionExpression":
    case "ExtractExpression":
      return [node.expression];
    case "UnaryExpression":
      return [node.operand];
    case "BinaryExpression":
      return [node.left, node.right];
    case "CallExpression":
      return node.arguments;
    case "SelectExpression":
      return [node.map, ...node.indexes];
    case "StoreExpression":
      return [node.map, ...node.indexes, node.value];
    case "QuantifierExpression":
      return [
        ...node.variables,
        ...node.triggers.flat(),
        ...attributeNodes(node.attributes),
        node.body,
      ];
    case "ConditionalExpression":
      return [node.condition, node.consequent, node.alternative];
  }
}

function commandChildren(node: Ast.Command): Ast.Node[] {
  switch (node.kind) {
    case "assert":
    case "assume":
      return [node.expression, ...attributeNodes(node.attributes)];
    case "assign":
      return [...node.targets, ...node.values];
    case "havoc":
      return node.variables;
    case "call":
      return [
        ...node.arguments,
        ...node.outputs,
        ...attributeNodes(node.attributes),
      ];
  }
}

function statementChildren(node: Ast.Statement): Ast.Node[] {
  switch (node.kind) {
    case "command":
      return [node.command];
    case "if":
      return [
        ...(node.guard ? [node.guard] : []),
        ...node.consequent,
        ...(node.alternative ?? []),
      ];
    case "while":
      return [
        ...(node.guard ? [node.guard] : []),
        ...node.invariants.flatMap((invariant) => [
          invariant.condition,
          ...attributeNodes(invariant.attributes),
        ]),
        ...node.body,
      ];
    case "label":
    case "break":
    case "goto":
    case "return":
      return [];
  }
}

function declarationChildren(node: Ast.Declaration): Ast.Node[] {
  switch (node.kind) {
    case "axiom":
      return [node.expression];
    case "type-constructor":
    case "type-synonym":
      return [];
    case "constant":
      return [
        ...(node.parents ?? []).map(({ parent }) => parent),
        ...(node.where ? [node.where] : []),
      ];
    case "global":
    case "formal":
    case "local":
    case "bound":
      return node.where ? [node.where] : [];
    case "function":
      return [
        ...node.parameters,
        node.result,
        ...(node.body ? [node.body] : []),
      ];
    case "procedure":
      return [
        ...node.parameters,
        ...node.returns,
        ...node.requires,
        ...node.modifies,
        ...node.ensures,
      ];
    case "implementation":
      return [
        ...node.parameters,
        ...node.returns,
        ...node.locals,
        ...(node.body ?? node.blocks),
      ];
  }
}

function attributeNodes(attributes: Ast.Attributes): Ast.Expression[] {
  const nodes: Ast.Expression[] = [];
  for (const occurrences of attributes.values()) {
    for (const parameters of occurrences) {
      for (const parameter of parameters) {
        if (typeof parameter !== "string") {
          nodes.push(parameter);
        }
      }
    }
  }
  return nodes;
}
