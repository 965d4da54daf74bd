import { describe, expect, it } from "vitest";

import type * as Ast from "#ast";
import { checkIntAttribute, findStringAttribute } from "#ast";
import { Result } from "#result";

import { ErrorCode } from "./errors.js";
import { parse } from "./parser.js";

function parseOk(source: string): Ast.Program {
  const result = parse(source);
  if (!result.success) {
    throw new Error(
      `Parse failed: ${Result.errors(result).map(({ message }) => message)}`,
    );
  }
  return result.value;
}

function errorsOf(source: string) {
  return Result.errors(parse(source));
}

function implementation(program: Ast.Program): Ast.Declaration.Implementation {
  const found = program.declarations.find(
    (declaration): declaration is Ast.Declaration.Implementation =>
      declaration.kind === "implementation",
  );
  if (!found) {
    throw new Error("no implementation");
  }
  return found;
}

function axiomExpression(source: string): Ast.Expression {
  const [axiom] = parseOk(source).declarations;
  if (axiom.kind !== "axiom") {
    throw new Error("expected an axiom");
  }
  return axiom.expression;
}

describe("parse", () => {
  describe("declarations", () => {
    it("parses each kind of top-level declaration", () => {
      const program = parseOk(`
        type Set a = [a]bool;
        const unique c: int;
        var g: int where g > 0;
        function f(x: int) returns (int) { x + 1 }
        axiom f(1) == 2;
        procedure P(x: int) returns (y: int);
          requires x > 0;
          ensures y > x;
      `);

      expect(program.declarations.map(({ kind }) => kind)).toEqual([
        "type-synonym",
        "constant",
        "global",
        "function",
        "axiom",
        "procedure",
      ]);

      const [set, c, g, f, , p] = program.declarations;
      if (set.kind !== "type-synonym") throw new Error("expected a synonym");
      expect(set.typeParameters.map(({ name }) => name)).toEqual(["a"]);

      if (c.kind !== "constant") throw new Error("expected a constant");
      expect(c.unique).toBe(true);

      if (g.kind !== "global") throw new Error("expected a global");
      expect(g.where?.type).toBe("BinaryExpression");

      if (f.kind !== "function") throw new Error("expected a function");
      expect(f.parameters.map(({ name }) => name)).toEqual(["x"]);
      expect(f.body?.type).toBe("BinaryExpression");

      if (p.kind !== "procedure") throw new Error("expected a procedure");
      expect(p.requires.map(({ kind }) => kind)).toEqual(["requires"]);
      expect(p.ensures.map(({ kind }) => kind)).toEqual(["ensures"]);
    });

    it("declares one variable per name", () => {
      const program = parseOk("var x, y: int;");
      expect(program.declarations.map((declaration) =>
        declaration.kind === "global" ? declaration.name : null,
      )).toEqual(["x", "y"]);
    });

    it("collects attributes by key", () => {
      const [axiom] = parseOk(
        'axiom {:weight 3} {:note "checked"} true;',
      ).declarations;
      expect(checkIntAttribute(axiom.attributes, "weight")).toEqual({
        valid: true,
        value: 3,
      });
      expect(findStringAttribute(axiom.attributes, "note")).toBe("checked");
    });
  });

  describe("expressions", () => {
    it("binds multiplication tighter than addition", () => {
      const expression = axiomExpression("axiom 1 + 2 * 3 == 7;");
      if (
        expression.type !== "BinaryExpression" ||
        expression.left.type !== "BinaryExpression"
      ) {
        throw new Error("expected a comparison of a sum");
      }
      expect(expression.operator).toBe("==");
      expect(expression.left.operator).toBe("+");
      expect(expression.left.right.type).toBe("BinaryExpression");
    });

    it("associates implication to the right", () => {
      const expression = axiomExpression("axiom true ==> false ==> true;");
      if (expression.type !== "BinaryExpression") {
        throw new Error("expected an implication");
      }
      expect(expression.operator).toBe("==>");
      expect(expression.left.type).toBe("LiteralExpression");
      expect(expression.right.type).toBe("BinaryExpression");
    });

    it("parses bitvector literals and extraction", () => {
      const expression = axiomExpression("axiom 5bv8[4:0] == 5bv4;");
      if (
        expression.type !== "BinaryExpression" ||
        expression.left.type !== "ExtractExpression" ||
        expression.right.type !== "LiteralExpression" ||
        expression.right.kind !== "bitvector"
      ) {
        throw new Error("expected an extract comparison");
      }
      expect(expression.left.high).toBe(4);
      expect(expression.left.low).toBe(0);
      expect(expression.right.value).toBe(5n);
      expect(expression.right.bits).toBe(4);
    });

    it("parses quantifiers with type parameters and triggers", () => {
      const expression = axiomExpression(
        "axiom (forall<a> x: a, y: a :: { x == y } x == y ==> true);",
      );
      if (expression.type !== "QuantifierExpression") {
        throw new Error("expected a quantifier");
      }
      expect(expression.kind).toBe("forall");
      expect(expression.typeParameters.map(({ name }) => name)).toEqual(["a"]);
      expect(expression.variables.map(({ name }) => name)).toEqual(["x", "y"]);
      expect(expression.triggers).toHaveLength(1);
    });
  });

  describe("syntax errors", () => {
    it("reports the failure with its position", () => {
      const errors = errorsOf("var x int;");
      expect(errors).toHaveLength(1);
      expect(errors[0].code).toBe(ErrorCode.PARSE_ERROR);
      expect(errors[0].message).toMatch(/^expected /);
      expect(errors[0].location?.length).toBe(0);
    });
  });

  describe("lowering", () => {
    it("lowers conditionals to guarded branches", () => {
      const { blocks } = implementation(
        parseOk(`
          procedure P(x: int);
          implementation P(x: int) {
            if (x > 0) { assert x > 0; } else { assert x <= 0; }
          }
        `),
      );

      expect(blocks.map(({ label }) => label)).toEqual([
        "anon2",
        "anon0_Then",
        "anon0_Else",
        "anon1",
      ]);

      const [entry, then, otherwise, join] = blocks;
      expect(entry.transfer).toMatchObject({
        kind: "goto",
        labels: ["anon0_Then", "anon0_Else"],
      });
      expect(then.commands.map(({ kind }) => kind)).toEqual([
        "assume",
        "assert",
      ]);
      const [negated] = otherwise.commands;
      if (negated.kind !== "assume") throw new Error("expected an assume");
      expect(negated.expression).toMatchObject({
        type: "UnaryExpression",
        operator: "!",
      });
      expect(join.transfer.kind).toBe("return");
    });

    it("lowers loops to head, body and exit blocks", () => {
      const { blocks } = implementation(
        parseOk(`
          procedure P();
          implementation P() {
            var i: int;
            while (i < 10)
              invariant i <= 10;
            {
              i := i + 1;
            }
          }
        `),
      );

      expect(blocks.map(({ label }) => label)).toEqual([
        "anon2",
        "anon0_LoopHead",
        "anon0_LoopBody",
        "anon0_LoopDone",
        "anon1",
      ]);
      const [, head, body] = blocks;
      expect(head.commands.map(({ kind }) => kind)).toEqual(["assert"]);
      expect(head.transfer).toMatchObject({
        labels: ["anon0_LoopDone", "anon0_LoopBody"],
      });
      expect(body.transfer).toMatchObject({ labels: ["anon0_LoopHead"] });
    });

    it("sends break to the end of the loop", () => {
      const { blocks } = implementation(
        parseOk(`
          procedure P();
          implementation P() {
            while (*) {
              break;
            }
          }
        `),
      );
      const body = blocks.find(({ label }) => label === "anon0_LoopBody");
      expect(body?.transfer).toMatchObject({ labels: ["anon1"] });
    });

    it("rejects break outside of loops", () => {
      const errors = errorsOf(`
        procedure P();
        implementation P() {
          break;
        }
      `);
      expect(errors.map(({ message }) => message)).toEqual([
        "break statement is not inside a loop",
      ]);
      expect(errors[0].code).toBe(ErrorCode.LOWERING_BREAK_OUTSIDE_LOOP);
    });

    it("rejects gotos to unknown labels", () => {
      expect(
        errorsOf(`
          procedure P();
          implementation P() {
            goto L;
          }
        `).map(({ message }) => message),
      ).toEqual(["goto to unknown label: L"]);
    });

    it("rejects duplicate labels", () => {
      expect(
        errorsOf(`
          procedure P();
          implementation P() {
            L: assume true;
            L: return;
          }
        `).map(({ message }) => message),
      ).toEqual(["more than one declaration of block name: L"]);
    });
  });
});
