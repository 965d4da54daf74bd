/**
 * Type checker for resolved PVL programs
 *
 * Computes the type of every expression and checks declarations against
 * their signatures. Errors are reported to the context and checking goes
 * on with a best-effort type, so that one run finds as many errors as
 * possible.
 */

import * as Ast from "#ast";
import { invariant } from "#errors";
import { Result } from "#result";
import { Resolution } from "#resolver";
import {
  Type,
  checkArgumentTypes,
  checkMapArguments,
  type Actual,
} from "#types";

import { seekAmbiguities, normalizeTyping } from "./ambiguity.js";
import { TypecheckingContext, type Typing } from "./context.js";
import { Error as TypeError, ErrorCode, ErrorMessages } from "./errors.js";

export function checkProgram(
  program: Ast.Program,
  resolution: Resolution,
): Result<Typing, TypeError> {
  const context = new TypecheckingContext(resolution);
  new TypeChecker(context).check(program);
  return Result.fromMessages(context.typing, context.diagnostics);
}

export class TypeChecker
  implements Ast.Visitor<Type | null, TypecheckingContext>
{
  constructor(private readonly context: TypecheckingContext) {}

  private get resolution(): Resolution {
    return this.context.resolution;
  }

  check(program: Ast.Program): void {
    Ast.visit(this, program, this.context);
    if (this.context.errorCount === 0) {
      seekAmbiguities(program, this.context);
    }
    normalizeTyping(this.context.typing);
  }

  program(node: Ast.Program): null {
    for (const declaration of node.declarations) {
      Ast.visit(this, declaration, this.context);
    }
    return null;
  }

  // Declarations

  declaration(node: Ast.Declaration): null {
    switch (node.kind) {
      case "axiom": {
        const type = this.typeOf(node.expression);
        if (!type.unify(Type.bool)) {
          this.context.error(
            node.expression.loc,
            ErrorMessages.AXIOM_NOT_BOOL(),
            ErrorCode.AXIOM_NOT_BOOL,
          );
        }
        break;
      }
      case "type-constructor":
      case "type-synonym":
        break;
      case "constant":
        this.constantParents(node);
        this.where(node);
        break;
      case "global":
      case "formal":
      case "local":
      case "bound":
        this.where(node);
        break;
      case "function":
        this.function_(node);
        break;
      case "procedure":
        this.procedure(node);
        break;
      case "implementation":
        this.implementation(node);
        break;
    }
    this.attributes(node.attributes);
    return null;
  }

  private where(variable: Ast.Declaration.Variable): void {
    if (!variable.where) {
      return;
    }
    if (!this.typeOf(variable.where).unify(Type.bool)) {
      this.context.error(
        variable.where.loc,
        ErrorMessages.WHERE_NOT_BOOL(),
        ErrorCode.WHERE_NOT_BOOL,
      );
    }
  }

  private constantParents(constant: Ast.Declaration.Constant): void {
    const type = Resolution.typeOf(this.resolution, constant);
    for (const { parent } of constant.parents ?? []) {
      const parentType = this.typeOf(parent);
      if (!parentType.unify(type)) {
        this.context.error(
          parent.loc,
          ErrorMessages.PARENT_TYPE_MISMATCH(`${parentType}`, `${type}`),
          ErrorCode.PARENT_TYPE_MISMATCH,
        );
      }
    }
  }

  private formals(formals: readonly Ast.Declaration.Formal[]): void {
    for (const formal of formals) {
      Ast.visit(this, formal, this.context);
    }
  }

  private function_(node: Ast.Declaration.Function): void {
    this.formals([...node.parameters, node.result]);
    if (!node.body) {
      return;
    }
    const bodyType = this.typeOf(node.body);
    const resultType = Resolution.typeOf(this.resolution, node.result);
    if (!bodyType.unify(resultType)) {
      this.context.error(
        node.body.loc,
        ErrorMessages.FUNCTION_BODY_TYPE(`${bodyType}`, `${resultType}`),
        ErrorCode.FUNCTION_BODY_TYPE,
      );
    }
  }

  private procedure(node: Ast.Declaration.Procedure): void {
    this.formals([...node.parameters, ...node.returns]);
    for (const requires of node.requires) {
      Ast.visit(this, requires, this.context);
    }
    for (const identifier of node.modifies) {
      this.typeOf(identifier);
      const variable = Resolution.variableOf(this.resolution, identifier);
      if (!Ast.Declaration.isMutable(variable)) {
        this.context.error(
          identifier.loc,
          ErrorMessages.MODIFIES_CONSTANT(identifier.name),
          ErrorCode.MODIFIES_CONSTANT,
        );
      }
    }
    for (const ensures of node.ensures) {
      Ast.visit(this, ensures, this.context);
    }
  }

  private implementation(node: Ast.Declaration.Implementation): void {
    const procedure = Resolution.procedureOf(this.resolution, node);

    if (node.typeParameters.length !== procedure.typeParameters.length) {
      this.context.error(
        node.loc,
        ErrorMessages.TYPE_PARAMETER_COUNT(node.name),
        ErrorCode.TYPE_PARAMETER_COUNT,
      );
    } else {
      this.matchFormals(node, procedure, "in");
      this.matchFormals(node, procedure, "out");
    }

    this.formals([...node.parameters, ...node.returns]);
    for (const local of node.locals) {
      Ast.visit(this, local, this.context);
    }

    this.context.withFrame(procedure, () => {
      for (const block of node.blocks) {
        Ast.visit(this, block, this.context);
      }
    });
  }

  /**
   * Compare the formals of an implementation with those of its procedure,
   * with the type parameters of both renamed to the same fresh variables
   */
  private matchFormals(
    implementation: Ast.Declaration.Implementation,
    procedure: Ast.Declaration.Procedure,
    direction: "in" | "out",
  ): void {
    const [implementationFormals, procedureFormals] =
      direction === "in"
        ? [implementation.parameters, procedure.parameters]
        : [implementation.returns, procedure.returns];

    if (implementationFormals.length !== procedureFormals.length) {
      this.context.error(
        implementation.loc,
        ErrorMessages.PARAMETER_COUNT(direction, implementation.name),
        ErrorCode.PARAMETER_COUNT,
      );
      return;
    }

    // binders are paired up in the order they first occur in the formals
    const procedureParameters = Resolution.typeParametersOf(
      this.resolution,
      procedure,
    );
    const shared = procedureParameters.map(
      (parameter) => new Type.Variable(parameter.name),
    );
    const renaming = (parameters: readonly Type.Variable[]) =>
      new Map(
        parameters.map((parameter, i): [Type.Variable, Type] => [
          parameter,
          shared[i],
        ]),
      );
    const implementationRenaming = renaming(
      Resolution.typeParametersOf(this.resolution, implementation),
    );
    const procedureRenaming = renaming(procedureParameters);

    implementationFormals.forEach((formal, i) => {
      const expected = procedureFormals[i];
      const actualType = Resolution.typeOf(this.resolution, formal).substitute(
        implementationRenaming,
      );
      const expectedType = Resolution.typeOf(
        this.resolution,
        expected,
      ).substitute(procedureRenaming);
      if (actualType.equals(expectedType)) {
        return;
      }
      const name =
        formal.name === expected.name
          ? formal.name
          : `${expected.name} (named ${formal.name} in implementation)`;
      this.context.error(
        formal.loc,
        ErrorMessages.PARAMETER_TYPE(direction, implementation.name, name),
        ErrorCode.PARAMETER_TYPE,
      );
    });
  }

  contract(node: Ast.Contract): null {
    if (!this.typeOf(node.condition).unify(Type.bool)) {
      if (node.kind === "requires") {
        this.context.error(
          node.condition.loc,
          ErrorMessages.PRECONDITION_NOT_BOOL(),
          ErrorCode.PRECONDITION_NOT_BOOL,
        );
      } else {
        this.context.error(
          node.condition.loc,
          ErrorMessages.POSTCONDITION_NOT_BOOL(),
          ErrorCode.POSTCONDITION_NOT_BOOL,
        );
      }
    }
    this.attributes(node.attributes);
    return null;
  }

  // Commands

  block(node: Ast.Block): null {
    for (const command of node.commands) {
      Ast.visit(this, command, this.context);
    }
    return null;
  }

  transfer(): null {
    return null;
  }

  // structured bodies are checked through the blocks they were lowered to
  statement(): null {
    return null;
  }

  command(node: Ast.Command): null {
    switch (node.kind) {
      case "assert":
      case "assume": {
        if (!this.typeOf(node.expression).unify(Type.bool)) {
          if (node.kind === "assert") {
            this.context.error(
              node.expression.loc,
              ErrorMessages.ASSERTION_NOT_BOOL(),
              ErrorCode.ASSERTION_NOT_BOOL,
            );
          } else {
            this.context.error(
              node.expression.loc,
              ErrorMessages.ASSUMPTION_NOT_BOOL(),
              ErrorCode.ASSUMPTION_NOT_BOOL,
            );
          }
        }
        this.attributes(node.attributes);
        return null;
      }
      case "assign":
        this.assignment(node);
        return null;
      case "havoc":
        for (const variable of node.variables) {
          this.typeOf(variable);
          this.checkModifiable(variable);
        }
        return null;
      case "call":
        this.call(node);
        return null;
    }
  }

  private assignment(node: Ast.Command.Assign): void {
    if (node.targets.length !== node.values.length) {
      this.context.error(
        node.loc,
        ErrorMessages.ASSIGNMENT_COUNT(node.targets.length, node.values.length),
        ErrorCode.ASSIGNMENT_COUNT,
      );
    }

    const targetTypes = node.targets.map((target) => {
      const type = Ast.visit(this, target, this.context);
      invariant(type, "assignment target has no type", target.loc ?? undefined);
      this.checkModifiable(Ast.Target.variableOf(target));
      return type;
    });

    node.values.forEach((value, i) => {
      const valueType = this.typeOf(value);
      if (i >= targetTypes.length) {
        return;
      }
      if (!valueType.unify(targetTypes[i])) {
        this.context.error(
          value.loc,
          ErrorMessages.ASSIGNMENT_TYPE(`${valueType}`, `${targetTypes[i]}`),
          ErrorCode.ASSIGNMENT_TYPE,
        );
      }
    });
  }

  private call(node: Ast.Command.Call): void {
    const procedure = Resolution.procedureOf(this.resolution, node);
    const check = checkArgumentTypes(
      {
        typeParameters: Resolution.typeParametersOf(this.resolution, procedure),
        formalIns: this.formalTypes(procedure.parameters),
        actualIns: this.actuals(node.arguments),
        formalOuts: this.formalTypes(procedure.returns),
        actualOuts: this.actuals(node.outputs),
        subject: node.loc,
        operation: `call to ${procedure.name}`,
      },
      this.context,
    );
    this.context.typing.instantiations.set(node.id, check.instantiation);

    for (const output of node.outputs) {
      this.checkModifiable(output);
    }
    for (const identifier of procedure.modifies) {
      const variable = Resolution.variableOf(this.resolution, identifier);
      if (!this.context.inFrame(variable)) {
        this.context.error(
          node.loc,
          ErrorMessages.CALLEE_MODIFIES_NOT_IN_FRAME(
            procedure.name,
            variable.name,
          ),
          ErrorCode.CALLEE_MODIFIES_NOT_IN_FRAME,
        );
      }
    }
    this.attributes(node.attributes);
  }

  private checkModifiable(identifier: Ast.Expression.Identifier): void {
    const variable = Resolution.variableOf(this.resolution, identifier);
    if (!Ast.Declaration.isMutable(variable)) {
      this.context.error(
        identifier.loc,
        ErrorMessages.IMMUTABLE_ASSIGNMENT(identifier.name),
        ErrorCode.IMMUTABLE_ASSIGNMENT,
      );
    } else if (!this.context.inFrame(variable)) {
      this.context.error(
        identifier.loc,
        ErrorMessages.GLOBAL_NOT_IN_FRAME(identifier.name),
        ErrorCode.GLOBAL_NOT_IN_FRAME,
      );
    }
  }

  target(node: Ast.Target): Type {
    if (node.kind === "simple") {
      return this.record(node, this.typeOf(node.variable));
    }
    const mapType = Ast.visit(this, node.map, this.context);
    invariant(mapType, "map target has no type", node.loc ?? undefined);
    return this.record(
      node,
      this.select(node, mapType, node.indexes, "map assignment"),
    );
  }

  // Expressions

  identifierExpression(node: Ast.Expression.Identifier): Type {
    const variable = Resolution.variableOf(this.resolution, node);
    return this.record(node, Resolution.typeOf(this.resolution, variable));
  }

  literalExpression(node: Ast.Expression.Literal): Type {
    switch (node.kind) {
      case "boolean":
        return this.record(node, Type.bool);
      case "integer":
        return this.record(node, Type.int);
      case "bitvector":
        return this.record(node, Type.bv(node.bits));
    }
  }

  oldExpression(node: Ast.Expression.Old): Type {
    return this.record(node, this.typeOf(node.expression));
  }

  unaryExpression(node: Ast.Expression.Unary): Type {
    const operandType = this.typeOf(node.operand);
    const type = node.operator === "!" ? Type.bool : Type.int;
    if (!operandType.unify(type)) {
      this.context.error(
        node.loc,
        ErrorMessages.UNARY_OPERATOR(`${operandType}`, node.operator),
        ErrorCode.UNARY_OPERATOR,
      );
    }
    return this.record(node, type);
  }

  binaryExpression(node: Ast.Expression.Binary): Type {
    const left = this.typeOf(node.left);
    const right = this.typeOf(node.right);
    const reportUnless = (ok: boolean) => {
      if (!ok) {
        this.context.error(
          node.loc,
          ErrorMessages.BINARY_OPERATOR(`${left}`, `${right}`, node.operator),
          ErrorCode.BINARY_OPERATOR,
        );
      }
    };

    switch (node.operator) {
      case "<==>":
      case "==>":
      case "||":
      case "&&":
        reportUnless(left.unify(Type.bool) && right.unify(Type.bool));
        return this.record(node, Type.bool);
      case "==":
      case "!=":
      case "<:":
        reportUnless(left.unify(right));
        return this.record(node, Type.bool);
      case "<":
      case "<=":
      case ">":
      case ">=":
        reportUnless(left.unify(Type.int) && right.unify(Type.int));
        return this.record(node, Type.bool);
      case "+":
      case "-":
      case "*":
      case "div":
      case "mod":
        reportUnless(left.unify(Type.int) && right.unify(Type.int));
        return this.record(node, Type.int);
      case "++":
        return this.record(node, this.concatenation(left, right, reportUnless));
    }
  }

  private concatenation(
    left: Type,
    right: Type,
    reportUnless: (ok: boolean) => void,
  ): Type {
    if (!Type.isBv(left) || !Type.isBv(right)) {
      reportUnless(false);
      return new Type.Proxy("concat");
    }
    const first = Type.head(left);
    const second = Type.head(right);
    if (first instanceof Type.Bv && second instanceof Type.Bv) {
      return Type.bv(first.bits + second.bits);
    }
    return Type.BvProxy.concatenation("concat", first, second);
  }

  callExpression(node: Ast.Expression.Call): Type {
    const callee = Resolution.callableOf(this.resolution, node);
    invariant(
      callee.kind === "function",
      `${node.callee} is not a function`,
      node.loc ?? undefined,
    );
    const check = checkArgumentTypes(
      {
        typeParameters: Resolution.typeParametersOf(this.resolution, callee),
        formalIns: this.formalTypes(callee.parameters),
        actualIns: this.actuals(node.arguments),
        formalOuts: this.formalTypes([callee.result]),
        actualOuts: null,
        subject: node.loc,
        operation: `application of ${callee.name}`,
      },
      this.context,
    );
    this.context.typing.instantiations.set(node.id, check.instantiation);
    return this.record(node, check.results?.[0] ?? new Type.Proxy(callee.name));
  }

  selectExpression(node: Ast.Expression.Select): Type {
    const mapType = this.typeOf(node.map);
    return this.record(
      node,
      this.select(node, mapType, node.indexes, "map select"),
    );
  }

  storeExpression(node: Ast.Expression.Store): Type {
    const mapType = this.typeOf(node.map);
    const elementType = this.select(node, mapType, node.indexes, "map store");
    const valueType = this.typeOf(node.value);
    if (!valueType.unify(elementType)) {
      this.context.error(
        node.value.loc,
        ErrorMessages.STORE_VALUE_TYPE(`${valueType}`, `${elementType}`),
        ErrorCode.STORE_VALUE_TYPE,
      );
    }
    return this.record(node, mapType);
  }

  /**
   * Element type of `map[indexes]`. An unconstrained proxy used as a map
   * becomes a map proxy of the right arity.
   */
  private select(
    node: Ast.Node,
    mapType: Type,
    indexes: readonly Ast.Expression[],
    operation: string,
  ): Type {
    const actuals = this.actuals(indexes);

    let map = Type.head(mapType);
    if (map instanceof Type.Proxy && !map.isConstrained) {
      const proxy = new Type.MapProxy("map", indexes.length);
      map.unify(proxy);
      map = proxy;
    }

    if (!Type.isMap(map)) {
      this.context.error(
        node.loc,
        ErrorMessages.NOT_A_MAP(`${mapType}`),
        ErrorCode.NOT_A_MAP,
      );
      return new Type.Proxy("element");
    }
    if (Type.mapArity(map) !== indexes.length) {
      this.context.error(
        node.loc,
        ErrorMessages.MAP_ARITY(operation, indexes.length),
        ErrorCode.MAP_ARITY,
      );
      return new Type.Proxy("element");
    }

    const check = checkMapArguments(
      map,
      actuals,
      node.loc,
      operation,
      this.context,
    );
    this.context.typing.instantiations.set(node.id, check.instantiation);
    return check.result ?? new Type.Proxy("element");
  }

  quantifierExpression(node: Ast.Expression.Quantifier): Type {
    for (const variable of node.variables) {
      Ast.visit(this, variable, this.context);
    }
    for (const trigger of node.triggers) {
      for (const expression of trigger) {
        this.typeOf(expression);
      }
    }
    this.attributes(node.attributes);
    if (!this.typeOf(node.body).unify(Type.bool)) {
      this.context.error(
        node.body.loc,
        ErrorMessages.QUANTIFIER_BODY_NOT_BOOL(),
        ErrorCode.QUANTIFIER_BODY_NOT_BOOL,
      );
    }
    return this.record(node, Type.bool);
  }

  conditionalExpression(node: Ast.Expression.Conditional): Type {
    const condition = this.typeOf(node.condition);
    if (!condition.unify(Type.bool)) {
      this.context.error(
        node.condition.loc,
        ErrorMessages.CONDITION_NOT_BOOL(`${condition}`),
        ErrorCode.CONDITION_NOT_BOOL,
      );
    }
    const consequent = this.typeOf(node.consequent);
    const alternative = this.typeOf(node.alternative);
    if (!consequent.unify(alternative)) {
      this.context.error(
        node.loc,
        ErrorMessages.BRANCH_TYPES(`${consequent}`, `${alternative}`),
        ErrorCode.BRANCH_TYPES,
      );
    }
    return this.record(node, consequent);
  }

  coercionExpression(node: Ast.Expression.Coercion): Type {
    const type = this.typeOf(node.expression);
    const target = Resolution.typeOf(this.resolution, node);
    if (!type.unify(target)) {
      this.context.error(
        node.loc,
        ErrorMessages.COERCION(`${type}`, `${target}`),
        ErrorCode.COERCION,
      );
    }
    return this.record(node, target);
  }

  extractExpression(node: Ast.Expression.Extract): Type {
    const type = this.typeOf(node.expression);
    const { high, low } = node;
    const result = Type.bv(Math.max(high - low, 0));

    let operand = Type.head(type);
    if (operand instanceof Type.Proxy && !operand.isConstrained) {
      const proxy = new Type.BvProxy("extract", high);
      operand.unify(proxy);
      operand = proxy;
    }

    if (!Type.isBv(operand)) {
      this.context.error(
        node.loc,
        ErrorMessages.EXTRACT_NOT_BITVECTOR(`${type}`),
        ErrorCode.EXTRACT_NOT_BITVECTOR,
      );
      return this.record(node, result);
    }

    // an open width grows to cover the extracted bits
    if (operand instanceof Type.BvProxy && operand.minBits < high) {
      operand.unify(new Type.BvProxy("extract", high));
    }
    if (low < 0 || low >= high || high > Type.bvBits(operand)) {
      this.context.error(
        node.loc,
        ErrorMessages.EXTRACT_RANGE(high, low, `${type}`),
        ErrorCode.EXTRACT_RANGE,
      );
    }
    return this.record(node, result);
  }

  // Helpers

  private typeOf(expression: Ast.Expression): Type {
    const type = Ast.visit(this, expression, this.context);
    invariant(type, "expression has no type", expression.loc ?? undefined);
    return type;
  }

  private record(node: Ast.Node, type: Type): Type {
    this.context.typing.types.set(node.id, type);
    return type;
  }

  private actuals(expressions: readonly Ast.Expression[]): Actual[] {
    return expressions.map((expression) => ({
      type: this.typeOf(expression),
      loc: expression.loc,
    }));
  }

  private formalTypes(formals: readonly Ast.Declaration.Formal[]): Type[] {
    return formals.map((formal) => Resolution.typeOf(this.resolution, formal));
  }

  private attributes(attributes: Ast.Attributes): void {
    for (const occurrences of attributes.values()) {
      for (const parameters of occurrences) {
        for (const parameter of parameters) {
          if (typeof parameter !== "string") {
            this.typeOf(parameter);
          }
        }
      }
    }
  }
}
