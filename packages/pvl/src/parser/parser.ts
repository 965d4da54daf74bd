/**
 * PVL parser
 *
 * The ohm grammar recognizes the text; the semantic operations below build
 * the AST. Structured implementation bodies are lowered to blocks
 * afterwards.
 */

import type * as ohm from "ohm-js";

import * as Ast from "#ast";
import { invariant } from "#errors";
import { Type } from "#types";
import { Result } from "#result";

import { Error as ParseError } from "./errors.js";
import { grammar } from "./grammar.js";
import { lowerProgram } from "./lowering.js";

export function parse(source: string): Result<Ast.Program, ParseError> {
  const match = grammar.match(source);
  if (match.failed()) {
    const message = (match.shortMessage ?? "parse error").replace(
      /^Line \d+, col \d+: /,
      "",
    );
    return Result.err(
      new ParseError(message, {
        offset: match.getRightmostFailurePosition(),
        length: 0,
      }),
    );
  }

  const { program, errors } = lowerProgram(semantics(match).program());
  return errors.length > 0 ? Result.err(errors) : Result.ok(program);
}

export const parser = { grammar, parse };

const semantics = grammar.createSemantics();

// Typed entry points into the semantic operations

function declarationsOf(node: ohm.Node): Ast.Declaration[] {
  return node.declarations();
}

function statementOf(node: ohm.Node): Ast.Statement {
  return node.statement();
}

function expressionOf(node: ohm.Node): Ast.Expression {
  return node.expression();
}

function typeOf(node: ohm.Node): Type {
  return node.type();
}

function loc(node: ohm.Node): Ast.SourceLocation {
  const { startIdx, endIdx } = node.source;
  return { offset: startIdx, length: endIdx - startIdx };
}

function span(first: ohm.Node, last: ohm.Node): Ast.SourceLocation {
  const offset = first.source.startIdx;
  return { offset, length: last.source.endIdx - offset };
}

function optional(node: ohm.Node): ohm.Node | null {
  return node.numChildren > 0 ? node.children[0] : null;
}

function listOf(node: ohm.Node): ohm.Node[] {
  return node.asIteration().children;
}

function identifier(node: ohm.Node): Ast.Expression.Identifier {
  return Ast.Expression.identifier(Ast.nextId(), node.sourceString, loc(node));
}

// Pieces shared by several declarations

function attributeEntry(node: ohm.Node): [string, Ast.Attribute.Parameter[]] {
  const [, key, parameters] = node.children;
  return [
    key.sourceString,
    listOf(parameters).map((parameter) => {
      const [form] = parameter.children;
      return form.ctorName === "AttributeParam_string"
        ? form.sourceString.slice(1, -1)
        : expressionOf(form);
    }),
  ];
}

function attributes(iteration: ohm.Node): Ast.Attributes {
  return Ast.attributesOf(iteration.children.map(attributeEntry));
}

function typeParameters(optionalParameters: ohm.Node): Type.Variable[] {
  const parameters = optional(optionalParameters);
  if (!parameters) {
    return [];
  }
  const [, names] = parameters.children;
  return listOf(names).map((name) => new Type.Variable(name.sourceString));
}

/**
 * `x, y: T where e`: one variable per name, each with its own copy of the
 * type and the where clause
 */
function typedIdentifiers<T>(
  node: ohm.Node,
  make: (
    name: string,
    type: Type,
    where: Ast.Expression | null,
    loc: Ast.SourceLocation,
  ) => T,
): T[] {
  const withWhere = node.ctorName === "IdsTypeWhere";
  const idsType = withWhere ? node.children[0] : node;
  const where = withWhere ? optional(node.children[1]) : null;
  const [names, , type] = idsType.children;
  return listOf(names).map((name) =>
    make(
      name.sourceString,
      typeOf(type),
      where ? expressionOf(where.children[1]) : null,
      loc(name),
    ),
  );
}

function formals(list: ohm.Node, incoming: boolean): Ast.Declaration.Formal[] {
  return listOf(list).flatMap((node) =>
    typedIdentifiers(node, (name, type, where, loc) =>
      Ast.Declaration.formal(
        Ast.nextId(),
        name,
        type,
        incoming,
        { where },
        loc,
      ),
    ),
  );
}

function signature(node: ohm.Node): Ast.Declaration.Signature {
  const [parameters, , ins, , optionalReturns] = node.children;
  const returns = optional(optionalReturns);
  return {
    typeParameters: typeParameters(parameters),
    parameters: formals(ins, true),
    returns: returns ? formals(returns.children[2], false) : [],
  };
}

/**
 * `returns (r: T)`, `returns (T)` or `: T`; an unnamed result gets the
 * empty name
 */
function functionResult(node: ohm.Node): Ast.Declaration.Formal {
  const [form] = node.children;
  const formal = (name: string, type: ohm.Node, location: ohm.Node) =>
    Ast.Declaration.formal(
      Ast.nextId(),
      name,
      typeOf(type),
      false,
      {},
      loc(location),
    );

  switch (form.ctorName) {
    case "FunctionResult_named": {
      const [name, , type] = form.children[2].children;
      return formal(name.sourceString, type, name);
    }
    case "FunctionResult_anonymous":
      return formal("", form.children[2], form.children[2]);
    default:
      return formal("", form.children[1], form.children[1]);
  }
}

function statements(iteration: ohm.Node): Ast.Statement[] {
  return iteration.children.map(statementOf);
}

function guard(node: ohm.Node): Ast.Expression | null {
  const [alternative] = node.children;
  return alternative.ctorName === "Guard_star"
    ? null
    : expressionOf(alternative);
}

function target(node: ohm.Node): Ast.Target {
  const [name, indexes] = node.children;
  let result: Ast.Target = Ast.Target.simple(
    Ast.nextId(),
    identifier(name),
    loc(name),
  );
  for (const index of indexes.children) {
    result = Ast.Target.map(
      Ast.nextId(),
      result,
      listOf(index.children[1]).map(expressionOf),
      span(node, index),
    );
  }
  return result;
}

const binaryOperators: ReadonlySet<string> = new Set<Ast.Expression.BinaryOperator>([
  "<==>",
  "==>",
  "||",
  "&&",
  "==",
  "!=",
  "<",
  "<=",
  ">",
  ">=",
  "<:",
  "++",
  "+",
  "-",
  "*",
  "div",
  "mod",
]);

function isBinaryOperator(
  operator: string,
): operator is Ast.Expression.BinaryOperator {
  return binaryOperators.has(operator);
}

function binary(
  operator: ohm.Node,
  left: Ast.Expression,
  right: Ast.Expression,
  location: Ast.SourceLocation,
): Ast.Expression.Binary {
  const text = operator.sourceString;
  invariant(isBinaryOperator(text), `unknown binary operator ${text}`);
  return Ast.Expression.binary(Ast.nextId(), text, left, right, location);
}

/**
 * `a op b op c` as `(a op b) op c`
 */
function foldLeft(
  first: ohm.Node,
  operators: ohm.Node,
  operands: ohm.Node,
): Ast.Expression {
  let result = expressionOf(first);
  operands.children.forEach((operand, i) => {
    result = binary(
      operators.children[i],
      result,
      expressionOf(operand),
      span(first, operand),
    );
  });
  return result;
}

semantics.addOperation<Ast.Program>("program", {
  Program(declarations) {
    return Ast.program(
      Ast.nextId(),
      declarations.children.flatMap(declarationsOf),
      loc(this),
    );
  },
});

semantics.addOperation<Ast.Declaration[]>("declarations", {
  TypeDecl(_type, attrs, name, parameters, body, _semi) {
    const synonymBody = optional(body);
    const names = parameters.children.map(({ sourceString }) => sourceString);
    if (!synonymBody) {
      return [
        Ast.Declaration.typeConstructor(
          Ast.nextId(),
          name.sourceString,
          names.length,
          attributes(attrs),
          loc(this),
        ),
      ];
    }
    return [
      Ast.Declaration.typeSynonym(
        Ast.nextId(),
        name.sourceString,
        names.map((parameter) => new Type.Variable(parameter)),
        typeOf(synonymBody.children[1]),
        attributes(attrs),
        loc(this),
      ),
    ];
  },

  ConstDecl(_const, attrs, unique, idsType, parents, _semi) {
    const extendsClause = optional(parents);
    return typedIdentifiers(idsType, (name, type, _where, location) =>
      Ast.Declaration.constant(
        Ast.nextId(),
        name,
        type,
        {
          unique: unique.numChildren > 0,
          parents: extendsClause
            ? listOf(extendsClause.children[1]).map((parent) => {
                const [parentUnique, parentName] = parent.children;
                return {
                  parent: identifier(parentName),
                  unique: parentUnique.numChildren > 0,
                };
              })
            : null,
          childrenComplete: extendsClause
            ? extendsClause.children[2].numChildren > 0
            : false,
          attributes: attributes(attrs),
        },
        location,
      ),
    );
  },

  VarDecl(_var, attrs, variables, _semi) {
    return listOf(variables).flatMap((node) =>
      typedIdentifiers(node, (name, type, where, location) =>
        Ast.Declaration.global(
          Ast.nextId(),
          name,
          type,
          { where, attributes: attributes(attrs) },
          location,
        ),
      ),
    );
  },

  FunctionDecl(_function, attrs, name, parameters, _lp, ins, _rp, result, body) {
    const [bodyForm] = body.children;
    return [
      Ast.Declaration.function_(
        Ast.nextId(),
        name.sourceString,
        {
          typeParameters: typeParameters(parameters),
          parameters: listOf(ins).map((parameter) => {
            const [parameterName, , parameterType] = parameter.children;
            return Ast.Declaration.formal(
              Ast.nextId(),
              parameterName.sourceString,
              typeOf(parameterType),
              true,
              {},
              loc(parameterName),
            );
          }),
          result: functionResult(result),
        },
        {
          body:
            bodyForm.ctorName === "FunctionBody_defined"
              ? expressionOf(bodyForm.children[1])
              : null,
          attributes: attributes(attrs),
        },
        loc(this),
      ),
    ];
  },

  AxiomDecl(_axiom, attrs, expression, _semi) {
    return [
      Ast.Declaration.axiom(
        Ast.nextId(),
        expressionOf(expression),
        { attributes: attributes(attrs) },
        loc(this),
      ),
    ];
  },

  ProcedureDecl(_procedure, attrs, name, sig, _semi, specs) {
    const requires: Ast.Contract[] = [];
    const modifies: Ast.Expression.Identifier[] = [];
    const ensures: Ast.Contract[] = [];

    for (const spec of specs.children) {
      const [clause] = spec.children;
      if (clause.ctorName === "Spec_modifies") {
        modifies.push(...listOf(clause.children[1]).map(identifier));
        continue;
      }
      const [free, keyword, clauseAttributes, condition] = clause.children;
      const kind = keyword.sourceString === "requires" ? "requires" : "ensures";
      const contract = Ast.contract(
        Ast.nextId(),
        kind,
        expressionOf(condition),
        {
          free: free.numChildren > 0,
          attributes: attributes(clauseAttributes),
        },
        loc(clause),
      );
      (kind === "requires" ? requires : ensures).push(contract);
    }

    return [
      Ast.Declaration.procedure(
        Ast.nextId(),
        name.sourceString,
        signature(sig),
        { requires, modifies, ensures },
        attributes(attrs),
        loc(this),
      ),
    ];
  },

  ImplementationDecl(_impl, attrs, name, sig, _lb, localDecls, body, _rb) {
    const locals = localDecls.children.flatMap((declaration) => {
      const [, localAttributes, variables] = declaration.children;
      return listOf(variables).flatMap((node) =>
        typedIdentifiers(node, (localName, type, where, location) =>
          Ast.Declaration.local(
            Ast.nextId(),
            localName,
            type,
            { where, attributes: attributes(localAttributes) },
            location,
          ),
        ),
      );
    });

    return [
      Ast.Declaration.implementation(
        Ast.nextId(),
        name.sourceString,
        signature(sig),
        { locals, statements: statements(body), blocks: [] },
        attributes(attrs),
        loc(this),
      ),
    ];
  },
});

function command(
  node: ohm.Node,
  make: (location: Ast.SourceLocation) => Ast.Command,
): Ast.Statement.Simple {
  const location = loc(node);
  return Ast.Statement.simple(Ast.nextId(), make(location), location);
}

semantics.addOperation<Ast.Statement>("statement", {
  Statement_label(name, _colon) {
    return Ast.Statement.label(Ast.nextId(), name.sourceString, loc(this));
  },

  Statement_assert(_assert, attrs, expression, _semi) {
    return command(this, (location) =>
      Ast.Command.assert(
        Ast.nextId(),
        expressionOf(expression),
        attributes(attrs),
        location,
      ),
    );
  },

  Statement_assume(_assume, attrs, expression, _semi) {
    return command(this, (location) =>
      Ast.Command.assume(
        Ast.nextId(),
        expressionOf(expression),
        attributes(attrs),
        location,
      ),
    );
  },

  Statement_havoc(_havoc, names, _semi) {
    return command(this, (location) =>
      Ast.Command.havoc(Ast.nextId(), listOf(names).map(identifier), location),
    );
  },

  Statement_call(_call, attrs, outputs, callee, _lp, args, _rp, _semi) {
    const assigned = optional(outputs);
    return command(this, (location) =>
      Ast.Command.call(
        Ast.nextId(),
        callee.sourceString,
        listOf(args).map(expressionOf),
        assigned ? listOf(assigned.children[0]).map(identifier) : [],
        attributes(attrs),
        location,
      ),
    );
  },

  IfStatement(_if, _lp, condition, _rp, _lb, consequent, _rb, elseClause) {
    const clause = optional(elseClause);
    let alternative: Ast.Statement[] | null = null;
    if (clause) {
      const [form] = clause.children;
      alternative =
        form.ctorName === "ElseClause_if"
          ? [statementOf(form.children[1])]
          : statements(form.children[2]);
    }
    return Ast.Statement.if_(
      Ast.nextId(),
      guard(condition),
      statements(consequent),
      alternative,
      loc(this),
    );
  },

  Statement_while(_while, _lp, condition, _rp, invariants, _lb, body, _rb) {
    return Ast.Statement.while_(
      Ast.nextId(),
      guard(condition),
      invariants.children.map((invariant) => {
        const [free, , invariantAttributes, invariantCondition] =
          invariant.children;
        return {
          free: free.numChildren > 0,
          condition: expressionOf(invariantCondition),
          attributes: attributes(invariantAttributes),
        };
      }),
      statements(body),
      loc(this),
    );
  },

  Statement_break(_break, label, _semi) {
    const name = optional(label);
    return Ast.Statement.break_(
      Ast.nextId(),
      name ? name.sourceString : null,
      loc(this),
    );
  },

  Statement_goto(_goto, labels, _semi) {
    return Ast.Statement.goto(
      Ast.nextId(),
      listOf(labels).map(({ sourceString }) => sourceString),
      loc(this),
    );
  },

  Statement_return(_return, _semi) {
    return Ast.Statement.return_(Ast.nextId(), loc(this));
  },

  Statement_assign(targets, _assign, values, _semi) {
    return command(this, (location) =>
      Ast.Command.assign(
        Ast.nextId(),
        listOf(targets).map(target),
        listOf(values).map(expressionOf),
        location,
      ),
    );
  },
});

semantics.addOperation<Ast.Expression>("expression", {
  Expr_conditional(_if, condition, _then, consequent, _else, alternative) {
    return Ast.Expression.conditional(
      Ast.nextId(),
      expressionOf(condition),
      expressionOf(consequent),
      expressionOf(alternative),
      loc(this),
    );
  },

  EquivExpr(first, operators, operands) {
    return foldLeft(first, operators, operands);
  },

  ImpliesExpr_implies(left, operator, right) {
    return binary(
      operator,
      expressionOf(left),
      expressionOf(right),
      loc(this),
    );
  },

  LogicalExpr_and(first, operators, operands) {
    return foldLeft(first, operators, operands);
  },

  LogicalExpr_or(first, operators, operands) {
    return foldLeft(first, operators, operands);
  },

  RelExpr_binary(left, operator, right) {
    return binary(
      operator,
      expressionOf(left),
      expressionOf(right),
      loc(this),
    );
  },

  ConcatExpr(first, operators, operands) {
    return foldLeft(first, operators, operands);
  },

  AddExpr(first, operators, operands) {
    return foldLeft(first, operators, operands);
  },

  MulExpr(first, operators, operands) {
    return foldLeft(first, operators, operands);
  },

  UnaryExpr_not(_not, operand) {
    return Ast.Expression.unary(
      Ast.nextId(),
      "!",
      expressionOf(operand),
      loc(this),
    );
  },

  UnaryExpr_neg(_minus, operand) {
    return Ast.Expression.unary(
      Ast.nextId(),
      "-",
      expressionOf(operand),
      loc(this),
    );
  },

  CoercionExpr(expression, _colons, types) {
    let result = expressionOf(expression);
    for (const type of types.children) {
      result = Ast.Expression.coercion(
        Ast.nextId(),
        result,
        typeOf(type),
        span(expression, type),
      );
    }
    return result;
  },

  PostfixExpr_extract(expression, _lb, high, _colon, low, _rb) {
    return Ast.Expression.extract(
      Ast.nextId(),
      expressionOf(expression),
      Number(high.sourceString),
      Number(low.sourceString),
      loc(this),
    );
  },

  PostfixExpr_store(map, _lb, indexes, _assign, value, _rb) {
    return Ast.Expression.store(
      Ast.nextId(),
      expressionOf(map),
      listOf(indexes).map(expressionOf),
      expressionOf(value),
      loc(this),
    );
  },

  PostfixExpr_select(map, _lb, indexes, _rb) {
    return Ast.Expression.select(
      Ast.nextId(),
      expressionOf(map),
      listOf(indexes).map(expressionOf),
      loc(this),
    );
  },

  AtomExpr_quantifier(_lp, quantifier, _rp) {
    return expressionOf(quantifier);
  },

  AtomExpr_paren(_lp, expression, _rp) {
    return expressionOf(expression);
  },

  AtomExpr_old(_old, _lp, expression, _rp) {
    return Ast.Expression.old(
      Ast.nextId(),
      expressionOf(expression),
      loc(this),
    );
  },

  AtomExpr_true(_true) {
    return Ast.Expression.boolean(Ast.nextId(), true, loc(this));
  },

  AtomExpr_false(_false) {
    return Ast.Expression.boolean(Ast.nextId(), false, loc(this));
  },

  AtomExpr_bitvector(literal) {
    const [value, bits] = literal.sourceString.split("bv");
    return Ast.Expression.bitvector(
      Ast.nextId(),
      BigInt(value),
      Number(bits),
      loc(this),
    );
  },

  AtomExpr_integer(literal) {
    return Ast.Expression.integer(
      Ast.nextId(),
      BigInt(literal.sourceString),
      loc(this),
    );
  },

  AtomExpr_call(callee, _lp, args, _rp) {
    return Ast.Expression.call(
      Ast.nextId(),
      callee.sourceString,
      listOf(args).map(expressionOf),
      loc(this),
    );
  },

  AtomExpr_variable(name) {
    return identifier(name);
  },

  Quantifier(kind, parameters, variables, _sep, annotations, body) {
    const triggers: Ast.Expression[][] = [];
    const attributeNodes: ohm.Node[] = [];
    for (const annotation of annotations.children) {
      const [form] = annotation.children;
      if (form.ctorName === "QuantifierAnnotation_trigger") {
        triggers.push(listOf(form.children[1]).map(expressionOf));
      } else {
        attributeNodes.push(form);
      }
    }

    return Ast.Expression.quantifier(
      Ast.nextId(),
      kind.sourceString === "forall" ? "forall" : "exists",
      {
        typeParameters: typeParameters(parameters),
        variables: listOf(variables).flatMap((node) =>
          typedIdentifiers(node, (name, type, _where, location) =>
            Ast.Declaration.bound(Ast.nextId(), name, type, {}, location),
          ),
        ),
      },
      expressionOf(body),
      {
        triggers,
        attributes: Ast.attributesOf(attributeNodes.map(attributeEntry)),
      },
      loc(this),
    );
  },
});

semantics.addOperation<Type>("type", {
  Type_application(name, args) {
    return new Type.Unresolved(
      name.sourceString,
      args.children.map(typeOf),
      loc(this),
    );
  },

  TypeArgument_name(name) {
    return new Type.Unresolved(name.sourceString, [], loc(this));
  },

  TypeAtom_int(_int) {
    return Type.int;
  },

  TypeAtom_bool(_bool) {
    return Type.bool;
  },

  TypeAtom_bitvector(type) {
    return Type.bv(Number(type.sourceString.slice(2)));
  },

  TypeAtom_paren(_lp, type, _rp) {
    return typeOf(type);
  },

  MapType(parameters, _lb, args, _rb, result) {
    return new Type.Map(
      typeParameters(parameters),
      listOf(args).map(typeOf),
      typeOf(result),
      loc(this),
    );
  },
});
