/**
 * Name resolution for PVL programs
 *
 * Binds every identifier to its declaration and resolves every type
 * occurring in the program. Errors are collected, never thrown; resolution
 * always walks the whole program.
 */

import * as Ast from "#ast";
import { Type } from "#types";
import { Result } from "#result";

import { ResolutionContext, StateMode } from "./context.js";
import { Error as ResolveError, ErrorCode, ErrorMessages } from "./errors.js";
import { Resolution } from "./resolution.js";
import { resolveTypeSynonyms } from "./synonyms.js";

export interface ResolveOptions {
  /**
   * Drop implementations whose resolution fails, with a warning, instead
   * of failing the whole program
   */
  overlookResolutionErrors?: boolean;
}

export interface Resolved {
  // the program, without the implementations dropped in overlook mode
  program: Ast.Program;
  resolution: Resolution;
}

export function resolveProgram(
  program: Ast.Program,
  options: ResolveOptions = {},
): Result<Resolved, ResolveError> {
  const context = new ResolutionContext();
  const resolver = new Resolver(context, Resolution.create());
  const resolved = resolver.resolveProgram(program, options);
  const { errors, warnings } = context.diagnostics;
  return Result.fromMessages(resolved, [...errors, ...warnings]);
}

export class Resolver implements Ast.Visitor<void, ResolutionContext> {
  constructor(
    private readonly context: ResolutionContext,
    private readonly resolution: Resolution,
  ) {}

  resolveProgram(program: Ast.Program, options: ResolveOptions): Resolved {
    const { context } = this;

    for (const declaration of program.declarations) {
      this.register(declaration);
    }

    this.resolveTypes(program);

    const kept: Ast.Declaration[] = [];
    for (const declaration of program.declarations) {
      if (
        declaration.kind === "type-constructor" ||
        declaration.kind === "type-synonym"
      ) {
        kept.push(declaration);
        continue;
      }

      const previousErrorCount = context.errorCount;
      this.declaration(declaration, context);
      if (
        options.overlookResolutionErrors &&
        declaration.kind === "implementation" &&
        context.errorCount !== previousErrorCount
      ) {
        context.warning(
          declaration.loc,
          ErrorMessages.IMPLEMENTATION_IGNORED(declaration.name),
          ErrorCode.IMPLEMENTATION_IGNORED,
        );
        context.errorCount = previousErrorCount;
        continue;
      }
      kept.push(declaration);
    }

    // where clauses may mention any global, so they come last
    for (const declaration of kept) {
      if (declaration.kind === "global" || declaration.kind === "constant") {
        this.resolveWhere(declaration);
      }
    }

    return {
      program:
        kept.length === program.declarations.length
          ? program
          : Ast.Node.update(program, { declarations: kept }),
      resolution: this.resolution,
    };
  }

  /**
   * Install a top-level declaration in its namespace
   */
  register(declaration: Ast.Declaration): void {
    switch (declaration.kind) {
      case "type-constructor":
      case "type-synonym":
        this.context.addType(declaration);
        return;
      case "function":
      case "procedure":
        this.context.addCallable(declaration);
        return;
      case "constant":
      case "global":
        this.context.addVariable(declaration, true);
        return;
      case "formal":
      case "local":
      case "bound":
        this.context.addVariable(declaration);
        return;
      case "axiom":
      case "implementation":
        // implementations find their procedure during resolution
        return;
    }
  }

  private resolveTypes(program: Ast.Program): void {
    for (const declaration of program.declarations) {
      if (declaration.kind === "type-constructor") {
        this.attributes(declaration.attributes);
      }
    }

    const synonyms = program.declarations.filter(
      (declaration): declaration is Ast.Declaration.TypeSynonym =>
        declaration.kind === "type-synonym",
    );
    for (const synonym of synonyms) {
      this.attributes(synonym.attributes);
    }
    for (const [id, body] of resolveTypeSynonyms(synonyms, this.context)) {
      this.resolution.types.set(id, body);
    }
  }

  // Declarations

  declaration(node: Ast.Declaration, context: ResolutionContext): void {
    switch (node.kind) {
      case "axiom":
        this.attributes(node.attributes);
        this.withStateMode(StateMode.Stateless, () =>
          Ast.visit(this, node.expression, context),
        );
        return;
      case "type-constructor":
      case "type-synonym":
        // resolved ahead of everything else
        return;
      case "constant":
        this.variableType(node);
        this.constantParents(node);
        return;
      case "global":
      case "formal":
      case "local":
      case "bound":
        this.variableType(node);
        return;
      case "function":
        this.function_(node);
        return;
      case "procedure":
        this.procedure(node);
        return;
      case "implementation":
        this.implementation(node);
        return;
    }
  }

  private variableType(variable: Ast.Declaration.Variable): void {
    this.resolution.types.set(
      variable.id,
      variable.declaredType.resolveType(this.context),
    );
  }

  private resolveWhere(variable: Ast.Declaration.Variable): void {
    if (variable.where) {
      Ast.visit(this, variable.where, this.context);
    }
    this.attributes(variable.attributes);
  }

  private constantParents(constant: Ast.Declaration.Constant): void {
    if (!constant.parents) {
      return;
    }

    const parents: (Ast.Declaration | undefined)[] = [];
    for (const { parent } of constant.parents) {
      Ast.visit(this, parent, this.context);
      const declaration = this.resolution.bindings.get(parent.id);
      parents.push(declaration);
      if (declaration && declaration.kind !== "constant") {
        this.context.error(
          parent.loc,
          ErrorMessages.PARENT_NOT_CONSTANT(),
          ErrorCode.PARENT_NOT_CONSTANT,
        );
      }
      if (declaration === constant) {
        this.context.error(
          parent.loc,
          ErrorMessages.CONSTANT_OWN_PARENT(),
          ErrorCode.CONSTANT_OWN_PARENT,
        );
      }
    }

    parents.forEach((declaration, i) => {
      if (!declaration) {
        return;
      }
      for (let j = i + 1; j < parents.length; j++) {
        if (parents[j] === declaration && constant.parents) {
          const { parent } = constant.parents[j];
          this.context.error(
            parent.loc,
            ErrorMessages.DUPLICATE_PARENT(parent.name),
            ErrorCode.DUPLICATE_PARENT,
          );
        }
      }
    });
  }

  /**
   * Add formals to the current scope and resolve their types, but not
   * their where clauses
   */
  private registerFormals(formals: readonly Ast.Declaration.Formal[]): void {
    for (const formal of formals) {
      this.context.addVariable(formal);
      this.variableType(formal);
    }
  }

  private registerTypeParameters(typeParameters: readonly Type.Variable[]) {
    for (const parameter of typeParameters) {
      this.context.addTypeBinder(parameter);
    }
  }

  private sortTypeParameters(
    declaration:
      | Ast.Declaration.Function
      | Ast.Declaration.Procedure
      | Ast.Declaration.Implementation,
    parameters: readonly Ast.Declaration.Formal[],
  ): void {
    const types = parameters.map((formal) =>
      Resolution.typeOf(this.resolution, formal),
    );
    this.resolution.typeParameters.set(
      declaration.id,
      Type.sortTypeParameters(declaration.typeParameters, types, null),
    );
  }

  private checkTypeParameterOccurrences(
    declaration:
      | Ast.Declaration.Function
      | Ast.Declaration.Procedure
      | Ast.Declaration.Implementation,
    ins: readonly Ast.Declaration.Formal[],
    outs: readonly Ast.Declaration.Formal[],
    subject: string,
  ): void {
    const typesOf = (formals: readonly Ast.Declaration.Formal[]) =>
      formals.map((formal) => Resolution.typeOf(this.resolution, formal));
    Type.checkBoundVariableOccurrences(
      declaration.typeParameters,
      typesOf(ins),
      typesOf(outs),
      subject,
      this.context,
      declaration.loc,
    );
  }

  private function_(node: Ast.Declaration.Function): void {
    const { context } = this;
    const previousState = context.typeBinderState;
    try {
      this.registerTypeParameters(node.typeParameters);
      context.pushVarContext();
      this.registerFormals(node.parameters);
      this.registerFormals([node.result]);
      this.attributes(node.attributes);
      const body = node.body;
      if (body) {
        this.withStateMode(StateMode.Stateless, () =>
          Ast.visit(this, body, context),
        );
      }
      context.popVarContext();
      this.checkTypeParameterOccurrences(
        node,
        node.parameters,
        [node.result],
        "function arguments",
      );
    } finally {
      context.typeBinderState = previousState;
    }
    this.sortTypeParameters(node, [...node.parameters, node.result]);
  }

  private procedure(node: Ast.Declaration.Procedure): void {
    const { context } = this;
    context.pushVarContext();

    for (const identifier of node.modifies) {
      Ast.visit(this, identifier, context);
    }

    const previousState = context.typeBinderState;
    try {
      this.registerTypeParameters(node.typeParameters);

      // where clauses of in-parameters cannot see the out-parameters
      this.registerFormals(node.parameters);
      for (const formal of node.parameters) {
        this.resolveWhere(formal);
      }
      for (const requires of node.requires) {
        Ast.visit(this, requires, context);
      }
      this.registerFormals(node.returns);
      for (const formal of node.returns) {
        this.resolveWhere(formal);
      }

      this.withStateMode(StateMode.Two, () => {
        for (const ensures of node.ensures) {
          Ast.visit(this, ensures, context);
        }
      });
      this.attributes(node.attributes);

      this.checkTypeParameterOccurrences(
        node,
        node.parameters,
        node.returns,
        "procedure arguments",
      );
    } finally {
      context.typeBinderState = previousState;
    }

    context.popVarContext();
    this.sortTypeParameters(node, [...node.parameters, ...node.returns]);
  }

  private implementation(node: Ast.Declaration.Implementation): void {
    const { context } = this;

    const callable = context.lookUpProcedure(node.name);
    if (!callable) {
      context.error(
        node.loc,
        ErrorMessages.IMPLEMENTATION_UNDECLARED(node.name),
        ErrorCode.IMPLEMENTATION_UNDECLARED,
      );
    } else if (callable.kind !== "procedure") {
      context.error(
        node.loc,
        ErrorMessages.IMPLEMENTATION_FOR_FUNCTION(node.name),
        ErrorCode.IMPLEMENTATION_FOR_FUNCTION,
      );
    } else {
      this.resolution.bindings.set(node.id, callable);
    }

    const previousState = context.typeBinderState;
    try {
      this.registerTypeParameters(node.typeParameters);

      context.pushVarContext();
      this.registerFormals(node.parameters);
      this.registerFormals(node.returns);
      for (const local of node.locals) {
        context.addVariable(local);
        this.variableType(local);
      }
      for (const local of node.locals) {
        this.resolveWhere(local);
      }

      context.pushProcedureContext();
      for (const block of node.blocks) {
        context.addBlock(block);
      }
      this.attributes(node.attributes);

      this.withStateMode(StateMode.Two, () => {
        for (const block of node.blocks) {
          Ast.visit(this, block, context);
        }
      });

      context.popProcedureContext();
      context.popVarContext();

      this.checkTypeParameterOccurrences(
        node,
        node.parameters,
        node.returns,
        "implementation arguments",
      );
    } finally {
      context.typeBinderState = previousState;
    }
    this.sortTypeParameters(node, [...node.parameters, ...node.returns]);
  }

  // Everything else

  program(node: Ast.Program, context: ResolutionContext): void {
    for (const declaration of node.declarations) {
      this.declaration(declaration, context);
    }
  }

  contract(node: Ast.Contract, context: ResolutionContext): void {
    Ast.visit(this, node.condition, context);
    this.attributes(node.attributes);
  }

  block(node: Ast.Block, context: ResolutionContext): void {
    for (const command of node.commands) {
      Ast.visit(this, command, context);
    }
    Ast.visit(this, node.transfer, context);
  }

  transfer(node: Ast.Transfer, context: ResolutionContext): void {
    if (node.kind === "return") {
      return;
    }
    const targets: Ast.Block[] = [];
    for (const label of node.labels) {
      const target = context.lookUpBlock(label);
      if (target) {
        targets.push(target);
      } else {
        context.error(
          node.loc,
          ErrorMessages.UNKNOWN_LABEL(label),
          ErrorCode.UNKNOWN_LABEL,
        );
      }
    }
    this.resolution.targets.set(node.id, targets);
  }

  command(node: Ast.Command, context: ResolutionContext): void {
    switch (node.kind) {
      case "assert":
      case "assume":
        Ast.visit(this, node.expression, context);
        this.attributes(node.attributes);
        return;
      case "assign":
        for (const target of node.targets) {
          Ast.visit(this, target, context);
        }
        for (const value of node.values) {
          Ast.visit(this, value, context);
        }
        return;
      case "havoc":
        for (const variable of node.variables) {
          Ast.visit(this, variable, context);
        }
        return;
      case "call": {
        const callee = context.lookUpProcedure(node.callee);
        if (!callee) {
          context.error(
            node.loc,
            ErrorMessages.UNDECLARED_PROCEDURE(node.callee),
            ErrorCode.UNDECLARED_PROCEDURE,
          );
        } else if (callee.kind !== "procedure") {
          context.error(
            node.loc,
            ErrorMessages.NOT_A_PROCEDURE(node.callee),
            ErrorCode.NOT_A_PROCEDURE,
          );
        } else {
          this.resolution.bindings.set(node.id, callee);
        }
        for (const argument of node.arguments) {
          Ast.visit(this, argument, context);
        }
        for (const output of node.outputs) {
          Ast.visit(this, output, context);
        }
        this.attributes(node.attributes);
        return;
      }
    }
  }

  target(node: Ast.Target, context: ResolutionContext): void {
    if (node.kind === "simple") {
      Ast.visit(this, node.variable, context);
      return;
    }
    Ast.visit(this, node.map, context);
    for (const index of node.indexes) {
      Ast.visit(this, index, context);
    }
  }

  statement(node: Ast.Statement, context: ResolutionContext): void {
    // structured bodies are resolved through their blocks
    for (const child of Ast.children(node)) {
      Ast.visit(this, child, context);
    }
  }

  identifierExpression(
    node: Ast.Expression.Identifier,
    context: ResolutionContext,
  ): void {
    const declaration = context.lookUpVariable(node.name);
    if (!declaration) {
      context.error(
        node.loc,
        ErrorMessages.UNDECLARED_IDENTIFIER(node.name),
        ErrorCode.UNDECLARED_IDENTIFIER,
      );
      return;
    }
    if (
      declaration.kind === "global" &&
      context.stateMode === StateMode.Stateless
    ) {
      context.error(
        node.loc,
        ErrorMessages.GLOBAL_IN_STATELESS_CONTEXT(node.name),
        ErrorCode.GLOBAL_IN_STATELESS_CONTEXT,
      );
    }
    this.resolution.bindings.set(node.id, declaration);
  }

  literalExpression(): void {}

  oldExpression(node: Ast.Expression.Old, context: ResolutionContext): void {
    if (context.stateMode !== StateMode.Two) {
      context.error(
        node.loc,
        ErrorMessages.OLD_OUTSIDE_TWO_STATE(),
        ErrorCode.OLD_OUTSIDE_TWO_STATE,
      );
    }
    Ast.visit(this, node.expression, context);
  }

  unaryExpression(
    node: Ast.Expression.Unary,
    context: ResolutionContext,
  ): void {
    Ast.visit(this, node.operand, context);
  }

  binaryExpression(
    node: Ast.Expression.Binary,
    context: ResolutionContext,
  ): void {
    Ast.visit(this, node.left, context);
    Ast.visit(this, node.right, context);
  }

  callExpression(node: Ast.Expression.Call, context: ResolutionContext): void {
    const callee = context.lookUpProcedure(node.callee);
    if (!callee) {
      context.error(
        node.loc,
        ErrorMessages.UNDECLARED_FUNCTION(node.callee),
        ErrorCode.UNDECLARED_FUNCTION,
      );
    } else if (callee.kind !== "function") {
      context.error(
        node.loc,
        ErrorMessages.NOT_A_FUNCTION(node.callee),
        ErrorCode.NOT_A_FUNCTION,
      );
    } else {
      this.resolution.bindings.set(node.id, callee);
    }
    for (const argument of node.arguments) {
      Ast.visit(this, argument, context);
    }
  }

  selectExpression(
    node: Ast.Expression.Select,
    context: ResolutionContext,
  ): void {
    Ast.visit(this, node.map, context);
    for (const index of node.indexes) {
      Ast.visit(this, index, context);
    }
  }

  storeExpression(
    node: Ast.Expression.Store,
    context: ResolutionContext,
  ): void {
    Ast.visit(this, node.map, context);
    for (const index of node.indexes) {
      Ast.visit(this, index, context);
    }
    Ast.visit(this, node.value, context);
  }

  quantifierExpression(
    node: Ast.Expression.Quantifier,
    context: ResolutionContext,
  ): void {
    context.pushVarContext();
    const previousState = context.typeBinderState;
    try {
      this.registerTypeParameters(node.typeParameters);
      for (const variable of node.variables) {
        context.addVariable(variable);
        this.variableType(variable);
      }
      for (const variable of node.variables) {
        this.resolveWhere(variable);
      }
      for (const trigger of node.triggers) {
        for (const expression of trigger) {
          Ast.visit(this, expression, context);
        }
      }
      this.attributes(node.attributes);
      Ast.visit(this, node.body, context);

      const boundTypes = node.variables.map((variable) =>
        Resolution.typeOf(this.resolution, variable),
      );
      Type.checkBoundVariableOccurrences(
        node.typeParameters,
        boundTypes,
        null,
        "types of given bound variables",
        context,
        node.loc,
      );
      this.resolution.typeParameters.set(
        node.id,
        Type.sortTypeParameters(node.typeParameters, boundTypes, null),
      );
    } finally {
      context.typeBinderState = previousState;
      context.popVarContext();
    }
  }

  conditionalExpression(
    node: Ast.Expression.Conditional,
    context: ResolutionContext,
  ): void {
    Ast.visit(this, node.condition, context);
    Ast.visit(this, node.consequent, context);
    Ast.visit(this, node.alternative, context);
  }

  coercionExpression(
    node: Ast.Expression.Coercion,
    context: ResolutionContext,
  ): void {
    Ast.visit(this, node.expression, context);
    this.resolution.types.set(node.id, node.targetType.resolveType(context));
  }

  extractExpression(
    node: Ast.Expression.Extract,
    context: ResolutionContext,
  ): void {
    Ast.visit(this, node.expression, context);
  }

  // Helpers

  private attributes(attributes: Ast.Attributes): void {
    for (const occurrences of attributes.values()) {
      for (const parameters of occurrences) {
        for (const parameter of parameters) {
          if (typeof parameter !== "string") {
            Ast.visit(this, parameter, this.context);
          }
        }
      }
    }
  }

  private withStateMode(mode: StateMode, resolve: () => void): void {
    const previous = this.context.stateMode;
    this.context.stateMode = mode;
    try {
      resolve();
    } finally {
      this.context.stateMode = previous;
    }
  }
}
