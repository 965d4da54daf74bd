/**
 * AST node types for PVL programs
 *
 * Key principles:
 * 1. Every node is a plain object with a unique `id`, a `type` discriminant
 *    and a nullable source location
 * 2. Variants of one node family share a `type` and are told apart by `kind`
 * 3. Types are values of the `Type` model, not nodes; what resolution and
 *    typechecking learn about a node is kept in side tables keyed by id
 */

import type { Type } from "#types";

export interface SourceLocation {
  offset: number;
  length: number;
}

export const isSourceLocation = (loc: unknown): loc is SourceLocation =>
  typeof loc === "object" &&
  !!loc &&
  "offset" in loc &&
  typeof loc.offset === "number" &&
  loc.offset >= 0 &&
  "length" in loc &&
  typeof loc.length === "number" &&
  loc.length >= 0;

// ID type for AST nodes - using string type with numeric identifiers
export type Id = string;

let idCounter = 0;

/**
 * Next id from the process-wide counter. Ids are never reused, so nodes
 * created by cloning or by transformations stay distinct from the originals.
 */
export function nextId(): Id {
  idCounter += 1;
  return `${idCounter}`;
}

export type Node =
  | Program
  | Declaration
  | Contract
  | Block
  | Transfer
  | Command
  | Target
  | Statement
  | Expression;

export namespace Node {
  export interface Base {
    id: Id;
    type: string;
    loc: SourceLocation | null;
  }

  export const isBase = (node: unknown): node is Node.Base =>
    typeof node === "object" &&
    !!node &&
    "id" in node &&
    typeof node.id === "string" &&
    "type" in node &&
    typeof node.type === "string" &&
    !!node.type &&
    "loc" in node &&
    (node.loc === null || isSourceLocation(node.loc));

  /**
   * Deep copy of a node. Every copied node gets a fresh id; type values and
   * type variables are shared with the original.
   *
   * `replace` is offered every descendant of the original first; what it
   * returns is used in place of a copy of that descendant.
   */
  export function clone<T extends Node>(
    node: T,
    replace: (original: Node) => Node | undefined = () => undefined,
  ): T {
    const copy: T = { ...node, id: nextId() };
    for (const [key, value] of Object.entries(copy)) {
      (copy as unknown as Record<string, unknown>)[key] = cloneValue(
        value,
        replace,
      );
    }
    return copy;
  }

  function cloneValue(
    value: unknown,
    replace: (original: Node) => Node | undefined,
  ): unknown {
    if (Array.isArray(value)) {
      return value.map((element) => cloneValue(element, replace));
    }
    if (value instanceof Map) {
      return new Map(
        [...value.entries()].map(([key, entry]) => [
          key,
          cloneValue(entry, replace),
        ]),
      );
    }
    if (isNode(value)) {
      return replace(value) ?? clone(value, replace);
    }
    return value;
  }

  export function update<T extends Node>(node: T, updates: Partial<T>): T {
    return { ...node, ...updates };
  }
}

const nodeTypes = new Set([
  "Program",
  "Declaration",
  "Contract",
  "Block",
  "Transfer",
  "Command",
  "Target",
  "Statement",
  "IdentifierExpression",
  "LiteralExpression",
  "OldExpression",
  "UnaryExpression",
  "BinaryExpression",
  "CallExpression",
  "SelectExpression",
  "StoreExpression",
  "QuantifierExpression",
  "ConditionalExpression",
  "CoercionExpression",
  "ExtractExpression",
]);

export const isNode = (node: unknown): node is Node =>
  Node.isBase(node) && nodeTypes.has(node.type);

/**
 * Attributes are an ordered multimap: each key maps to the parameter lists
 * of its occurrences, in source order.
 */
export type Attributes = Map<string, Attribute.Parameter[][]>;

export namespace Attribute {
  export type Parameter = Expression | string;
}

// Program structure

export interface Program extends Node.Base {
  type: "Program";
  declarations: Declaration[];
}

export function program(
  id: Id,
  declarations: Declaration[],
  loc?: SourceLocation,
): Program {
  return { id, type: "Program", declarations, loc: loc ?? null };
}

export const isProgram = (program: unknown): program is Program =>
  Node.isBase(program) &&
  program.type === "Program" &&
  "declarations" in program &&
  Array.isArray(program.declarations);

// Declarations

export type Declaration =
  | Declaration.Axiom
  | Declaration.TypeConstructor
  | Declaration.TypeSynonym
  | Declaration.Variable
  | Declaration.Function
  | Declaration.Procedure
  | Declaration.Implementation;

export const isDeclaration = (node: unknown): node is Declaration =>
  Node.isBase(node) && node.type === "Declaration";

export namespace Declaration {
  export interface Base extends Node.Base {
    type: "Declaration";
    attributes: Attributes;
  }

  export interface Axiom extends Declaration.Base {
    kind: "axiom";
    expression: Expression;
    comment: string | null;
  }

  export function axiom(
    id: Id,
    expression: Expression,
    options: { attributes?: Attributes; comment?: string | null } = {},
    loc?: SourceLocation,
  ): Declaration.Axiom {
    return {
      id,
      type: "Declaration",
      kind: "axiom",
      expression,
      comment: options.comment ?? null,
      attributes: options.attributes ?? new Map(),
      loc: loc ?? null,
    };
  }

  export interface TypeConstructor extends Declaration.Base {
    kind: "type-constructor";
    name: string;
    arity: number;
  }

  export function typeConstructor(
    id: Id,
    name: string,
    arity: number,
    attributes: Attributes = new Map(),
    loc?: SourceLocation,
  ): Declaration.TypeConstructor {
    return {
      id,
      type: "Declaration",
      kind: "type-constructor",
      name,
      arity,
      attributes,
      loc: loc ?? null,
    };
  }

  export interface TypeSynonym extends Declaration.Base {
    kind: "type-synonym";
    name: string;
    typeParameters: Type.Variable[];
    body: Type;
  }

  export function typeSynonym(
    id: Id,
    name: string,
    typeParameters: Type.Variable[],
    body: Type,
    attributes: Attributes = new Map(),
    loc?: SourceLocation,
  ): Declaration.TypeSynonym {
    return {
      id,
      type: "Declaration",
      kind: "type-synonym",
      name,
      typeParameters,
      body,
      attributes,
      loc: loc ?? null,
    };
  }

  export type Variable =
    | Declaration.Constant
    | Declaration.Global
    | Declaration.Formal
    | Declaration.Local
    | Declaration.Bound;

  export const isVariable = (
    declaration: Declaration,
  ): declaration is Declaration.Variable =>
    declaration.kind === "constant" ||
    declaration.kind === "global" ||
    declaration.kind === "formal" ||
    declaration.kind === "local" ||
    declaration.kind === "bound";

  /**
   * Whether commands may assign to the variable: globals, locals and
   * out-parameters
   */
  export function isMutable(variable: Declaration.Variable): boolean {
    switch (variable.kind) {
      case "global":
      case "local":
        return true;
      case "formal":
        return !variable.incoming;
      case "constant":
      case "bound":
        return false;
    }
  }

  export namespace Variable {
    export interface Base extends Declaration.Base {
      name: string;
      declaredType: Type;
      where: Expression | null;
    }

    export interface Options {
      where?: Expression | null;
      attributes?: Attributes;
    }
  }

  export interface Constant extends Declaration.Variable.Base {
    kind: "constant";
    unique: boolean;
    // null when no `extends` clause was given
    parents: Constant.Parent[] | null;
    childrenComplete: boolean;
  }

  export namespace Constant {
    export interface Parent {
      parent: Expression.Identifier;
      unique: boolean;
    }
  }

  export function constant(
    id: Id,
    name: string,
    declaredType: Type,
    options: Declaration.Variable.Options & {
      unique?: boolean;
      parents?: Constant.Parent[] | null;
      childrenComplete?: boolean;
    } = {},
    loc?: SourceLocation,
  ): Declaration.Constant {
    return {
      id,
      type: "Declaration",
      kind: "constant",
      name,
      declaredType,
      where: options.where ?? null,
      unique: options.unique ?? false,
      parents: options.parents ?? null,
      childrenComplete: options.childrenComplete ?? false,
      attributes: options.attributes ?? new Map(),
      loc: loc ?? null,
    };
  }

  export interface Global extends Declaration.Variable.Base {
    kind: "global";
  }

  export function global(
    id: Id,
    name: string,
    declaredType: Type,
    options: Declaration.Variable.Options = {},
    loc?: SourceLocation,
  ): Declaration.Global {
    return {
      id,
      type: "Declaration",
      kind: "global",
      name,
      declaredType,
      where: options.where ?? null,
      attributes: options.attributes ?? new Map(),
      loc: loc ?? null,
    };
  }

  export interface Formal extends Declaration.Variable.Base {
    kind: "formal";
    incoming: boolean;
  }

  export function formal(
    id: Id,
    name: string,
    declaredType: Type,
    incoming: boolean,
    options: Declaration.Variable.Options = {},
    loc?: SourceLocation,
  ): Declaration.Formal {
    return {
      id,
      type: "Declaration",
      kind: "formal",
      name,
      declaredType,
      incoming,
      where: options.where ?? null,
      attributes: options.attributes ?? new Map(),
      loc: loc ?? null,
    };
  }

  export interface Local extends Declaration.Variable.Base {
    kind: "local";
  }

  export function local(
    id: Id,
    name: string,
    declaredType: Type,
    options: Declaration.Variable.Options = {},
    loc?: SourceLocation,
  ): Declaration.Local {
    return {
      id,
      type: "Declaration",
      kind: "local",
      name,
      declaredType,
      where: options.where ?? null,
      attributes: options.attributes ?? new Map(),
      loc: loc ?? null,
    };
  }

  export interface Bound extends Declaration.Variable.Base {
    kind: "bound";
  }

  export function bound(
    id: Id,
    name: string,
    declaredType: Type,
    options: Declaration.Variable.Options = {},
    loc?: SourceLocation,
  ): Declaration.Bound {
    return {
      id,
      type: "Declaration",
      kind: "bound",
      name,
      declaredType,
      where: options.where ?? null,
      attributes: options.attributes ?? new Map(),
      loc: loc ?? null,
    };
  }

  export interface Function extends Declaration.Base {
    kind: "function";
    name: string;
    typeParameters: Type.Variable[];
    parameters: Declaration.Formal[];
    result: Declaration.Formal;
    // present only for functions defined by an expression
    body: Expression | null;
    comment: string | null;
  }

  export function function_(
    id: Id,
    name: string,
    signature: {
      typeParameters?: Type.Variable[];
      parameters: Declaration.Formal[];
      result: Declaration.Formal;
    },
    options: {
      body?: Expression | null;
      comment?: string | null;
      attributes?: Attributes;
    } = {},
    loc?: SourceLocation,
  ): Declaration.Function {
    return {
      id,
      type: "Declaration",
      kind: "function",
      name,
      typeParameters: signature.typeParameters ?? [],
      parameters: signature.parameters,
      result: signature.result,
      body: options.body ?? null,
      comment: options.comment ?? null,
      attributes: options.attributes ?? new Map(),
      loc: loc ?? null,
    };
  }

  export interface Signature {
    typeParameters: Type.Variable[];
    parameters: Declaration.Formal[];
    returns: Declaration.Formal[];
  }

  export interface Procedure extends Declaration.Base, Declaration.Signature {
    kind: "procedure";
    name: string;
    requires: Contract[];
    modifies: Expression.Identifier[];
    ensures: Contract[];
  }

  export function procedure(
    id: Id,
    name: string,
    signature: Partial<Declaration.Signature>,
    specification: {
      requires?: Contract[];
      modifies?: Expression.Identifier[];
      ensures?: Contract[];
    } = {},
    attributes: Attributes = new Map(),
    loc?: SourceLocation,
  ): Declaration.Procedure {
    return {
      id,
      type: "Declaration",
      kind: "procedure",
      name,
      typeParameters: signature.typeParameters ?? [],
      parameters: signature.parameters ?? [],
      returns: signature.returns ?? [],
      requires: specification.requires ?? [],
      modifies: specification.modifies ?? [],
      ensures: specification.ensures ?? [],
      attributes,
      loc: loc ?? null,
    };
  }

  export interface Implementation
    extends Declaration.Base,
      Declaration.Signature {
    kind: "implementation";
    name: string;
    locals: Declaration.Local[];
    // structured body as written, null once the blocks have been rewritten
    body: Statement[] | null;
    blocks: Block[];
  }

  export function implementation(
    id: Id,
    name: string,
    signature: Partial<Declaration.Signature>,
    body: {
      locals?: Declaration.Local[];
      statements?: Statement[] | null;
      blocks: Block[];
    },
    attributes: Attributes = new Map(),
    loc?: SourceLocation,
  ): Declaration.Implementation {
    return {
      id,
      type: "Declaration",
      kind: "implementation",
      name,
      typeParameters: signature.typeParameters ?? [],
      parameters: signature.parameters ?? [],
      returns: signature.returns ?? [],
      locals: body.locals ?? [],
      body: body.statements ?? null,
      blocks: body.blocks,
      attributes,
      loc: loc ?? null,
    };
  }

  export const isNamed = (
    declaration: Declaration,
  ): declaration is Exclude<Declaration, Declaration.Axiom> =>
    declaration.kind !== "axiom";
}

// Contracts

export interface Contract extends Node.Base {
  type: "Contract";
  kind: "requires" | "ensures";
  free: boolean;
  condition: Expression;
  comment: string | null;
  attributes: Attributes;
}

export function contract(
  id: Id,
  kind: Contract["kind"],
  condition: Expression,
  options: {
    free?: boolean;
    comment?: string | null;
    attributes?: Attributes;
  } = {},
  loc?: SourceLocation,
): Contract {
  return {
    id,
    type: "Contract",
    kind,
    free: options.free ?? false,
    condition,
    comment: options.comment ?? null,
    attributes: options.attributes ?? new Map(),
    loc: loc ?? null,
  };
}

// Unstructured control flow

export interface Block extends Node.Base {
  type: "Block";
  label: string;
  commands: Command[];
  transfer: Transfer;
}

export function block(
  id: Id,
  label: string,
  commands: Command[],
  transfer: Transfer,
  loc?: SourceLocation,
): Block {
  return { id, type: "Block", label, commands, transfer, loc: loc ?? null };
}

export type Transfer = Transfer.Goto | Transfer.Return;

export namespace Transfer {
  export interface Goto extends Node.Base {
    type: "Transfer";
    kind: "goto";
    labels: string[];
  }

  export function goto(
    id: Id,
    labels: string[],
    loc?: SourceLocation,
  ): Transfer.Goto {
    return { id, type: "Transfer", kind: "goto", labels, loc: loc ?? null };
  }

  export interface Return extends Node.Base {
    type: "Transfer";
    kind: "return";
  }

  export function return_(id: Id, loc?: SourceLocation): Transfer.Return {
    return { id, type: "Transfer", kind: "return", loc: loc ?? null };
  }
}

// Commands

export type Command =
  | Command.Assert
  | Command.Assume
  | Command.Assign
  | Command.Havoc
  | Command.Call;

export namespace Command {
  export interface Assert extends Node.Base {
    type: "Command";
    kind: "assert";
    expression: Expression;
    attributes: Attributes;
  }

  export function assert(
    id: Id,
    expression: Expression,
    attributes: Attributes = new Map(),
    loc?: SourceLocation,
  ): Command.Assert {
    return {
      id,
      type: "Command",
      kind: "assert",
      expression,
      attributes,
      loc: loc ?? null,
    };
  }

  export interface Assume extends Node.Base {
    type: "Command";
    kind: "assume";
    expression: Expression;
    attributes: Attributes;
  }

  export function assume(
    id: Id,
    expression: Expression,
    attributes: Attributes = new Map(),
    loc?: SourceLocation,
  ): Command.Assume {
    return {
      id,
      type: "Command",
      kind: "assume",
      expression,
      attributes,
      loc: loc ?? null,
    };
  }

  export interface Assign extends Node.Base {
    type: "Command";
    kind: "assign";
    targets: Target[];
    values: Expression[];
  }

  export function assign(
    id: Id,
    targets: Target[],
    values: Expression[],
    loc?: SourceLocation,
  ): Command.Assign {
    return {
      id,
      type: "Command",
      kind: "assign",
      targets,
      values,
      loc: loc ?? null,
    };
  }

  export interface Havoc extends Node.Base {
    type: "Command";
    kind: "havoc";
    variables: Expression.Identifier[];
  }

  export function havoc(
    id: Id,
    variables: Expression.Identifier[],
    loc?: SourceLocation,
  ): Command.Havoc {
    return { id, type: "Command", kind: "havoc", variables, loc: loc ?? null };
  }

  export interface Call extends Node.Base {
    type: "Command";
    kind: "call";
    callee: string;
    arguments: Expression[];
    outputs: Expression.Identifier[];
    attributes: Attributes;
  }

  export function call(
    id: Id,
    callee: string,
    arguments_: Expression[],
    outputs: Expression.Identifier[],
    attributes: Attributes = new Map(),
    loc?: SourceLocation,
  ): Command.Call {
    return {
      id,
      type: "Command",
      kind: "call",
      callee,
      arguments: arguments_,
      outputs,
      attributes,
      loc: loc ?? null,
    };
  }
}

// Assignment targets: `x` or `m[i][j]`

export type Target = Target.Simple | Target.Map;

export namespace Target {
  export interface Simple extends Node.Base {
    type: "Target";
    kind: "simple";
    variable: Expression.Identifier;
  }

  export function simple(
    id: Id,
    variable: Expression.Identifier,
    loc?: SourceLocation,
  ): Target.Simple {
    return { id, type: "Target", kind: "simple", variable, loc: loc ?? null };
  }

  export interface Map extends Node.Base {
    type: "Target";
    kind: "map";
    map: Target;
    indexes: Expression[];
  }

  export function map(
    id: Id,
    map: Target,
    indexes: Expression[],
    loc?: SourceLocation,
  ): Target.Map {
    return { id, type: "Target", kind: "map", map, indexes, loc: loc ?? null };
  }

  /**
   * The variable a (possibly nested) target ultimately assigns to
   */
  export function variableOf(target: Target): Expression.Identifier {
    return target.kind === "simple" ? target.variable : variableOf(target.map);
  }
}

// Structured statements, lowered to blocks by the parser

export type Statement =
  | Statement.Simple
  | Statement.Label
  | Statement.If
  | Statement.While
  | Statement.Break
  | Statement.Goto
  | Statement.Return;

export namespace Statement {
  export interface Simple extends Node.Base {
    type: "Statement";
    kind: "command";
    command: Command;
  }

  export function simple(
    id: Id,
    command: Command,
    loc?: SourceLocation,
  ): Statement.Simple {
    return { id, type: "Statement", kind: "command", command, loc: loc ?? null };
  }

  export interface Label extends Node.Base {
    type: "Statement";
    kind: "label";
    label: string;
  }

  export function label(
    id: Id,
    label: string,
    loc?: SourceLocation,
  ): Statement.Label {
    return { id, type: "Statement", kind: "label", label, loc: loc ?? null };
  }

  export interface If extends Node.Base {
    type: "Statement";
    kind: "if";
    // null for the nondeterministic guard `*`
    guard: Expression | null;
    consequent: Statement[];
    // an `else if` is an alternative holding a single if statement
    alternative: Statement[] | null;
  }

  export function if_(
    id: Id,
    guard: Expression | null,
    consequent: Statement[],
    alternative: Statement[] | null,
    loc?: SourceLocation,
  ): Statement.If {
    return {
      id,
      type: "Statement",
      kind: "if",
      guard,
      consequent,
      alternative,
      loc: loc ?? null,
    };
  }

  export interface Invariant {
    free: boolean;
    condition: Expression;
    attributes: Attributes;
  }

  export interface While extends Node.Base {
    type: "Statement";
    kind: "while";
    guard: Expression | null;
    invariants: Invariant[];
    body: Statement[];
  }

  export function while_(
    id: Id,
    guard: Expression | null,
    invariants: Invariant[],
    body: Statement[],
    loc?: SourceLocation,
  ): Statement.While {
    return {
      id,
      type: "Statement",
      kind: "while",
      guard,
      invariants,
      body,
      loc: loc ?? null,
    };
  }

  export interface Break extends Node.Base {
    type: "Statement";
    kind: "break";
    label: string | null;
  }

  export function break_(
    id: Id,
    label: string | null,
    loc?: SourceLocation,
  ): Statement.Break {
    return { id, type: "Statement", kind: "break", label, loc: loc ?? null };
  }

  export interface Goto extends Node.Base {
    type: "Statement";
    kind: "goto";
    labels: string[];
  }

  export function goto(
    id: Id,
    labels: string[],
    loc?: SourceLocation,
  ): Statement.Goto {
    return { id, type: "Statement", kind: "goto", labels, loc: loc ?? null };
  }

  export interface Return extends Node.Base {
    type: "Statement";
    kind: "return";
  }

  export function return_(id: Id, loc?: SourceLocation): Statement.Return {
    return { id, type: "Statement", kind: "return", loc: loc ?? null };
  }
}

// Expressions

export type Expression =
  | Expression.Identifier
  | Expression.Literal
  | Expression.Old
  | Expression.Unary
  | Expression.Binary
  | Expression.Call
  | Expression.Select
  | Expression.Store
  | Expression.Quantifier
  | Expression.Conditional
  | Expression.Coercion
  | Expression.Extract;

const expressionTypes = new Set([
  "IdentifierExpression",
  "LiteralExpression",
  "OldExpression",
  "UnaryExpression",
  "BinaryExpression",
  "CallExpression",
  "SelectExpression",
  "StoreExpression",
  "QuantifierExpression",
  "ConditionalExpression",
  "CoercionExpression",
  "ExtractExpression",
]);

export const isExpression = (node: unknown): node is Expression =>
  Node.isBase(node) && expressionTypes.has(node.type);

export namespace Expression {
  export interface Identifier extends Node.Base {
    type: "IdentifierExpression";
    name: string;
  }

  export function identifier(
    id: Id,
    name: string,
    loc?: SourceLocation,
  ): Expression.Identifier {
    return { id, type: "IdentifierExpression", name, loc: loc ?? null };
  }

  export type Literal =
    | Expression.Literal.Boolean
    | Expression.Literal.Integer
    | Expression.Literal.Bitvector;

  export namespace Literal {
    export interface Boolean extends Node.Base {
      type: "LiteralExpression";
      kind: "boolean";
      value: boolean;
    }

    export interface Integer extends Node.Base {
      type: "LiteralExpression";
      kind: "integer";
      value: bigint;
    }

    export interface Bitvector extends Node.Base {
      type: "LiteralExpression";
      kind: "bitvector";
      value: bigint;
      bits: number;
    }
  }

  export function boolean(
    id: Id,
    value: boolean,
    loc?: SourceLocation,
  ): Expression.Literal.Boolean {
    return {
      id,
      type: "LiteralExpression",
      kind: "boolean",
      value,
      loc: loc ?? null,
    };
  }

  export function integer(
    id: Id,
    value: bigint,
    loc?: SourceLocation,
  ): Expression.Literal.Integer {
    return {
      id,
      type: "LiteralExpression",
      kind: "integer",
      value,
      loc: loc ?? null,
    };
  }

  export function bitvector(
    id: Id,
    value: bigint,
    bits: number,
    loc?: SourceLocation,
  ): Expression.Literal.Bitvector {
    return {
      id,
      type: "LiteralExpression",
      kind: "bitvector",
      value,
      bits,
      loc: loc ?? null,
    };
  }

  export const isLiteral = (
    expression: Expression,
  ): expression is Expression.Literal =>
    expression.type === "LiteralExpression";

  export interface Old extends Node.Base {
    type: "OldExpression";
    expression: Expression;
  }

  export function old(
    id: Id,
    expression: Expression,
    loc?: SourceLocation,
  ): Expression.Old {
    return { id, type: "OldExpression", expression, loc: loc ?? null };
  }

  export type UnaryOperator = "!" | "-";

  export interface Unary extends Node.Base {
    type: "UnaryExpression";
    operator: UnaryOperator;
    operand: Expression;
  }

  export function unary(
    id: Id,
    operator: UnaryOperator,
    operand: Expression,
    loc?: SourceLocation,
  ): Expression.Unary {
    return { id, type: "UnaryExpression", operator, operand, loc: loc ?? null };
  }

  export type BinaryOperator =
    | "<==>"
    | "==>"
    | "||"
    | "&&"
    | "=="
    | "!="
    | "<"
    | "<="
    | ">"
    | ">="
    | "<:"
    | "++"
    | "+"
    | "-"
    | "*"
    | "div"
    | "mod";

  export interface Binary extends Node.Base {
    type: "BinaryExpression";
    operator: BinaryOperator;
    left: Expression;
    right: Expression;
  }

  export function binary(
    id: Id,
    operator: BinaryOperator,
    left: Expression,
    right: Expression,
    loc?: SourceLocation,
  ): Expression.Binary {
    return {
      id,
      type: "BinaryExpression",
      operator,
      left,
      right,
      loc: loc ?? null,
    };
  }

  // Application of a declared function
  export interface Call extends Node.Base {
    type: "CallExpression";
    callee: string;
    arguments: Expression[];
  }

  export function call(
    id: Id,
    callee: string,
    arguments_: Expression[],
    loc?: SourceLocation,
  ): Expression.Call {
    return {
      id,
      type: "CallExpression",
      callee,
      arguments: arguments_,
      loc: loc ?? null,
    };
  }

  export interface Select extends Node.Base {
    type: "SelectExpression";
    map: Expression;
    indexes: Expression[];
  }

  export function select(
    id: Id,
    map: Expression,
    indexes: Expression[],
    loc?: SourceLocation,
  ): Expression.Select {
    return { id, type: "SelectExpression", map, indexes, loc: loc ?? null };
  }

  export interface Store extends Node.Base {
    type: "StoreExpression";
    map: Expression;
    indexes: Expression[];
    value: Expression;
  }

  export function store(
    id: Id,
    map: Expression,
    indexes: Expression[],
    value: Expression,
    loc?: SourceLocation,
  ): Expression.Store {
    return {
      id,
      type: "StoreExpression",
      map,
      indexes,
      value,
      loc: loc ?? null,
    };
  }

  export interface Quantifier extends Node.Base {
    type: "QuantifierExpression";
    kind: "forall" | "exists";
    typeParameters: Type.Variable[];
    variables: Declaration.Bound[];
    triggers: Expression[][];
    attributes: Attributes;
    body: Expression;
  }

  export function quantifier(
    id: Id,
    kind: Expression.Quantifier["kind"],
    binders: {
      typeParameters?: Type.Variable[];
      variables: Declaration.Bound[];
    },
    body: Expression,
    options: { triggers?: Expression[][]; attributes?: Attributes } = {},
    loc?: SourceLocation,
  ): Expression.Quantifier {
    return {
      id,
      type: "QuantifierExpression",
      kind,
      typeParameters: binders.typeParameters ?? [],
      variables: binders.variables,
      triggers: options.triggers ?? [],
      attributes: options.attributes ?? new Map(),
      body,
      loc: loc ?? null,
    };
  }

  export interface Conditional extends Node.Base {
    type: "ConditionalExpression";
    condition: Expression;
    consequent: Expression;
    alternative: Expression;
  }

  export function conditional(
    id: Id,
    condition: Expression,
    consequent: Expression,
    alternative: Expression,
    loc?: SourceLocation,
  ): Expression.Conditional {
    return {
      id,
      type: "ConditionalExpression",
      condition,
      consequent,
      alternative,
      loc: loc ?? null,
    };
  }

  // `e : T`
  export interface Coercion extends Node.Base {
    type: "CoercionExpression";
    expression: Expression;
    targetType: Type;
  }

  export function coercion(
    id: Id,
    expression: Expression,
    targetType: Type,
    loc?: SourceLocation,
  ): Expression.Coercion {
    return {
      id,
      type: "CoercionExpression",
      expression,
      targetType,
      loc: loc ?? null,
    };
  }

  // `e[high:low]`, bits low (inclusive) to high (exclusive)
  export interface Extract extends Node.Base {
    type: "ExtractExpression";
    expression: Expression;
    high: number;
    low: number;
  }

  export function extract(
    id: Id,
    expression: Expression,
    high: number,
    low: number,
    loc?: SourceLocation,
  ): Expression.Extract {
    return {
      id,
      type: "ExtractExpression",
      expression,
      high,
      low,
      loc: loc ?? null,
    };
  }
}
