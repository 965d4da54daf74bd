/**
 * Emitter producing PVL text from the AST
 *
 * The output parses back to the same AST, up to ids and locations.
 * Implementations are emitted from their structured body while they still
 * have one, and from their blocks otherwise.
 */

import * as Ast from "#ast";
import type { Type } from "#types";

/**
 * Binding strength of each expression form, loosest first. An operand is
 * parenthesized when its own level is below the level its position asks
 * for.
 */
const Level = {
  conditional: 0,
  equiv: 1,
  implies: 2,
  logical: 3,
  relational: 4,
  concat: 5,
  additive: 6,
  multiplicative: 7,
  unary: 8,
  coercion: 9,
  postfix: 10,
  atom: 11,
} as const;

interface OperatorLevels {
  level: number;
  left: number;
  right: number;
}

function operatorLevels(operator: Ast.Expression.BinaryOperator): OperatorLevels {
  switch (operator) {
    case "<==>":
      return { level: Level.equiv, left: Level.equiv, right: Level.implies };
    case "==>":
      return { level: Level.implies, left: Level.logical, right: Level.implies };
    case "&&":
    case "||":
      return {
        level: Level.logical,
        left: Level.relational,
        right: Level.relational,
      };
    case "==":
    case "!=":
    case "<":
    case "<=":
    case ">":
    case ">=":
    case "<:":
      return {
        level: Level.relational,
        left: Level.concat,
        right: Level.concat,
      };
    case "++":
      return { level: Level.concat, left: Level.concat, right: Level.additive };
    case "+":
    case "-":
      return {
        level: Level.additive,
        left: Level.additive,
        right: Level.multiplicative,
      };
    case "*":
    case "div":
    case "mod":
      return {
        level: Level.multiplicative,
        left: Level.multiplicative,
        right: Level.unary,
      };
  }
}

function levelOf(expression: Ast.Expression): number {
  switch (expression.type) {
    case "ConditionalExpression":
      return Level.conditional;
    case "BinaryExpression":
      return operatorLevels(expression.operator).level;
    case "UnaryExpression":
      return Level.unary;
    case "CoercionExpression":
      return Level.coercion;
    case "SelectExpression":
    case "StoreExpression":
    case "ExtractExpression":
      return Level.postfix;
    default:
      return Level.atom;
  }
}

export function emitExpression(
  expression: Ast.Expression,
  context: number = Level.conditional,
): string {
  const text = emitUnparenthesized(expression);
  return levelOf(expression) < context ? `(${text})` : text;
}

function emitUnparenthesized(expression: Ast.Expression): string {
  switch (expression.type) {
    case "IdentifierExpression":
      return expression.name;
    case "LiteralExpression":
      return emitLiteral(expression);
    case "OldExpression":
      return `old(${emitExpression(expression.expression)})`;
    case "UnaryExpression":
      return `${expression.operator}${emitExpression(
        expression.operand,
        Level.unary,
      )}`;
    case "BinaryExpression": {
      const { operator, left, right } = expression;
      const levels = operatorLevels(operator);
      // `a && b && c` chains only when the operator repeats
      const leftLevel =
        levels.level === Level.logical &&
        left.type === "BinaryExpression" &&
        left.operator === operator
          ? Level.logical
          : levels.left;
      return `${emitExpression(left, leftLevel)} ${operator} ${emitExpression(
        right,
        levels.right,
      )}`;
    }
    case "CallExpression":
      return `${expression.callee}(${emitExpressions(expression.arguments)})`;
    case "SelectExpression":
      return `${emitExpression(expression.map, Level.postfix)}[${emitExpressions(
        expression.indexes,
      )}]`;
    case "StoreExpression":
      return `${emitExpression(expression.map, Level.postfix)}[${emitExpressions(
        expression.indexes,
      )} := ${emitExpression(expression.value)}]`;
    case "ExtractExpression":
      return `${emitExpression(expression.expression, Level.postfix)}[${
        expression.high
      }:${expression.low}]`;
    case "CoercionExpression":
      return `${emitExpression(
        expression.expression,
        Level.coercion,
      )} : ${emitType(expression.targetType)}`;
    case "ConditionalExpression":
      return `if ${emitExpression(expression.condition)} then ${emitExpression(
        expression.consequent,
      )} else ${emitExpression(expression.alternative)}`;
    case "QuantifierExpression":
      return `(${emitQuantifier(expression)})`;
  }
}

function emitLiteral(literal: Ast.Expression.Literal): string {
  switch (literal.kind) {
    case "boolean":
      return literal.value ? "true" : "false";
    case "integer":
      return `${literal.value}`;
    case "bitvector":
      return `${literal.value}bv${literal.bits}`;
  }
}

function emitQuantifier(quantifier: Ast.Expression.Quantifier): string {
  const annotations = [
    ...emitAttributes(quantifier.attributes),
    ...quantifier.triggers.map((trigger) => `{ ${emitExpressions(trigger)} }`),
  ];
  return [
    `${quantifier.kind}${emitTypeParameters(quantifier.typeParameters)}`,
    `${quantifier.variables.map(emitTypedIdentifier).join(", ")} ::`,
    ...annotations,
    emitExpression(quantifier.body),
  ].join(" ");
}

function emitExpressions(expressions: readonly Ast.Expression[]): string {
  return expressions.map((expression) => emitExpression(expression)).join(", ");
}

function emitType(type: Type): string {
  return type.emit(0);
}

function emitTypeParameters(parameters: readonly Type.Variable[]): string {
  return parameters.length > 0
    ? `<${parameters.map((parameter) => parameter.emit()).join(", ")}>`
    : "";
}

function emitTypedIdentifier(variable: Ast.Declaration.Variable): string {
  const where = variable.where
    ? ` where ${emitExpression(variable.where)}`
    : "";
  return `${variable.name}: ${emitType(variable.declaredType)}${where}`;
}

function emitAttributes(attributes: Ast.Attributes): string[] {
  return Ast.attributeEntries(attributes).map(([key, parameters]) => {
    const rendered = parameters.map((parameter) =>
      typeof parameter === "string" ? `"${parameter}"` : emitExpression(parameter),
    );
    return rendered.length > 0
      ? `{:${key} ${rendered.join(", ")}}`
      : `{:${key}}`;
  });
}

/**
 * Keyword followed by attributes, as in `axiom {:a} ...`
 */
function withAttributes(keyword: string, attributes: Ast.Attributes): string {
  return [keyword, ...emitAttributes(attributes)].join(" ");
}

function emitTarget(target: Ast.Target): string {
  return target.kind === "simple"
    ? target.variable.name
    : `${emitTarget(target.map)}[${emitExpressions(target.indexes)}]`;
}

function emitCommand(command: Ast.Command): string {
  switch (command.kind) {
    case "assert":
    case "assume":
      return `${withAttributes(command.kind, command.attributes)} ${emitExpression(
        command.expression,
      )};`;
    case "havoc":
      return `havoc ${command.variables.map(({ name }) => name).join(", ")};`;
    case "assign":
      return `${command.targets.map(emitTarget).join(", ")} := ${emitExpressions(
        command.values,
      )};`;
    case "call": {
      const outputs = command.outputs.length
        ? ` ${command.outputs.map(({ name }) => name).join(", ")} :=`
        : "";
      return `${withAttributes("call", command.attributes)}${outputs} ${
        command.callee
      }(${emitExpressions(command.arguments)});`;
    }
  }
}

function emitTransfer(transfer: Ast.Transfer): string {
  return transfer.kind === "goto"
    ? `goto ${transfer.labels.join(", ")};`
    : "return;";
}

class Emitter {
  private indent = 0;
  private output: string[] = [];

  constructor(indent: number) {
    this.indent = indent;
  }

  get text(): string {
    return this.output.join("\n");
  }

  declaration(declaration: Ast.Declaration): void {
    switch (declaration.kind) {
      case "type-constructor": {
        const parameters = Array.from({ length: declaration.arity }, () => " _");
        this.line(
          `${withAttributes("type", declaration.attributes)} ${
            declaration.name
          }${parameters.join("")};`,
        );
        return;
      }
      case "type-synonym": {
        const parameters = declaration.typeParameters
          .map((parameter) => ` ${parameter.emit()}`)
          .join("");
        this.line(
          `${withAttributes("type", declaration.attributes)} ${
            declaration.name
          }${parameters} = ${emitType(declaration.body)};`,
        );
        return;
      }
      case "constant":
        this.constant(declaration);
        return;
      case "global":
        this.line(
          `${withAttributes("var", declaration.attributes)} ${emitTypedIdentifier(
            declaration,
          )};`,
        );
        return;
      case "formal":
      case "local":
      case "bound":
        this.line(`var ${emitTypedIdentifier(declaration)};`);
        return;
      case "function":
        this.function_(declaration);
        return;
      case "axiom":
        this.line(
          `${withAttributes("axiom", declaration.attributes)} ${emitExpression(
            declaration.expression,
          )};`,
        );
        return;
      case "procedure":
        this.procedure(declaration);
        return;
      case "implementation":
        this.implementation(declaration);
        return;
    }
  }

  private constant(constant: Ast.Declaration.Constant): void {
    const head = withAttributes("const", constant.attributes);
    const unique = constant.unique ? " unique" : "";
    let parents = "";
    if (constant.parents) {
      const list = constant.parents
        .map(({ parent, unique }) => (unique ? `unique ${parent.name}` : parent.name))
        .join(", ");
      parents = ` extends${list ? ` ${list}` : ""}${
        constant.childrenComplete ? " complete" : ""
      }`;
    }
    this.line(
      `${head}${unique} ${constant.name}: ${emitType(
        constant.declaredType,
      )}${parents};`,
    );
  }

  private function_(function_: Ast.Declaration.Function): void {
    const parameters = function_.parameters
      .map(({ name, declaredType }) => `${name}: ${emitType(declaredType)}`)
      .join(", ");
    const { name, declaredType } = function_.result;
    const result = name
      ? `returns (${name}: ${emitType(declaredType)})`
      : `returns (${emitType(declaredType)})`;
    const head = `${withAttributes("function", function_.attributes)} ${
      function_.name
    }${emitTypeParameters(function_.typeParameters)}(${parameters}) ${result}`;

    if (!function_.body) {
      this.line(`${head};`);
      return;
    }
    this.line(`${head} {`);
    this.indent++;
    this.line(emitExpression(function_.body));
    this.indent--;
    this.line("}");
  }

  private signature(declaration: Ast.Declaration.Signature): string {
    const returns = declaration.returns.length
      ? ` returns (${declaration.returns.map(emitTypedIdentifier).join(", ")})`
      : "";
    return `${emitTypeParameters(declaration.typeParameters)}(${declaration.parameters
      .map(emitTypedIdentifier)
      .join(", ")})${returns}`;
  }

  private procedure(procedure: Ast.Declaration.Procedure): void {
    this.line(
      `${withAttributes("procedure", procedure.attributes)} ${
        procedure.name
      }${this.signature(procedure)};`,
    );
    this.indent++;
    for (const contract of procedure.requires) {
      this.contract(contract);
    }
    if (procedure.modifies.length > 0) {
      this.line(
        `modifies ${procedure.modifies.map(({ name }) => name).join(", ")};`,
      );
    }
    for (const contract of procedure.ensures) {
      this.contract(contract);
    }
    this.indent--;
  }

  private contract(contract: Ast.Contract): void {
    const keyword = contract.free ? `free ${contract.kind}` : contract.kind;
    this.line(
      `${withAttributes(keyword, contract.attributes)} ${emitExpression(
        contract.condition,
      )};`,
    );
  }

  private implementation(implementation: Ast.Declaration.Implementation): void {
    this.line(
      `${withAttributes("implementation", implementation.attributes)} ${
        implementation.name
      }${this.signature(implementation)}`,
    );
    this.line("{");
    this.indent++;
    for (const local of implementation.locals) {
      this.line(
        `${withAttributes("var", local.attributes)} ${emitTypedIdentifier(local)};`,
      );
    }
    if (implementation.locals.length > 0) {
      this.line("");
    }

    if (implementation.body) {
      this.statements(implementation.body);
    } else {
      this.blocks(implementation.blocks);
    }
    this.indent--;
    this.line("}");
  }

  private blocks(blocks: readonly Ast.Block[]): void {
    blocks.forEach((block, i) => {
      if (i > 0) {
        this.line("");
      }
      this.line(`${block.label}:`);
      this.indent++;
      for (const command of block.commands) {
        this.line(emitCommand(command));
      }
      this.line(emitTransfer(block.transfer));
      this.indent--;
    });
  }

  /**
   * Statements after a label are indented under it, the way `blocks` lays
   * out commands, so that printed blocks parse back to statements that
   * print the same
   */
  private statements(statements: readonly Ast.Statement[]): void {
    let labelled = false;
    statements.forEach((statement, i) => {
      if (statement.kind !== "label") {
        this.statement(statement);
        return;
      }
      if (labelled) {
        this.indent--;
      }
      if (i > 0) {
        this.line("");
      }
      this.line(`${statement.label}:`);
      this.indent++;
      labelled = true;
    });
    if (labelled) {
      this.indent--;
    }
  }

  private statement(statement: Ast.Statement): void {
    switch (statement.kind) {
      case "command":
        this.line(emitCommand(statement.command));
        return;
      case "label":
        // laid out by `statements`
        return;
      case "if":
        this.if_(statement, "if");
        return;
      case "while":
        this.while_(statement);
        return;
      case "break":
        this.line(statement.label ? `break ${statement.label};` : "break;");
        return;
      case "goto":
        this.line(`goto ${statement.labels.join(", ")};`);
        return;
      case "return":
        this.line("return;");
        return;
    }
  }

  private if_(statement: Ast.Statement.If, keyword: string): void {
    this.line(`${keyword} (${emitGuard(statement.guard)}) {`);
    this.block(statement.consequent);

    const { alternative } = statement;
    if (!alternative) {
      this.line("}");
      return;
    }
    const [only] = alternative;
    if (alternative.length === 1 && only.kind === "if") {
      this.if_(only, "} else if");
      return;
    }
    this.line("} else {");
    this.block(alternative);
    this.line("}");
  }

  private while_(statement: Ast.Statement.While): void {
    this.line(`while (${emitGuard(statement.guard)})`);
    this.indent++;
    for (const { free, condition, attributes } of statement.invariants) {
      this.line(
        `${withAttributes(free ? "free invariant" : "invariant", attributes)} ${emitExpression(
          condition,
        )};`,
      );
    }
    this.indent--;
    this.line("{");
    this.block(statement.body);
    this.line("}");
  }

  private block(statements: readonly Ast.Statement[]): void {
    this.indent++;
    this.statements(statements);
    this.indent--;
  }

  private line(text: string): void {
    this.output.push(text ? "  ".repeat(this.indent) + text : "");
  }
}

function emitGuard(guard: Ast.Expression | null): string {
  return guard ? emitExpression(guard) : "*";
}

export function emitDeclaration(
  declaration: Ast.Declaration,
  indent: number = 0,
): string {
  const emitter = new Emitter(indent);
  emitter.declaration(declaration);
  return emitter.text;
}

export function emit(program: Ast.Program): string {
  return program.declarations
    .map((declaration) => emitDeclaration(declaration))
    .join("\n\n")
    .concat("\n");
}
