import { describe, expect, it } from "vitest";

import type * as Ast from "#ast";
import { pruneUnreachableBlocks } from "#cfg";
import { parse } from "#parser";

import { emit, emitDeclaration } from "./emit.js";

function parseOk(source: string): Ast.Program {
  const result = parse(source);
  if (!result.success) {
    throw new Error("Parse failed");
  }
  return result.value;
}

function reemit(source: string): string {
  const [declaration] = parseOk(source).declarations;
  return emitDeclaration(declaration);
}

describe("emit", () => {
  describe("expressions", () => {
    it.each([
      "axiom a ==> b ==> c;",
      "axiom (a ==> b) ==> c;",
      "axiom a && b && c;",
      "axiom (a || b) && c;",
      "axiom !(a && b);",
      "axiom (1 + 2) * 3 == 9;",
      "axiom 1 - (2 - 3) == 2;",
      "axiom -x + 1 == 0;",
      "axiom (if a then 1 else 2) == 1;",
      "axiom m[1 := true][2];",
      "axiom old(x) == x;",
      "axiom 5bv8[4:0] ++ 1bv4 == 0bv8;",
      "axiom f(1, g(2)) > 0;",
      "axiom (forall<a> x: a :: {:weight 1} { f(x) } f(x) == f(x));",
      "axiom (exists x: int, y: int :: x < y);",
    ])("prints %s as written", (source) => {
      expect(reemit(source)).toBe(source);
    });

    it("drops redundant parentheses", () => {
      expect(reemit("axiom ((1 * 2)) + (3) == 5;")).toBe(
        "axiom 1 * 2 + 3 == 5;",
      );
    });
  });

  describe("declarations", () => {
    it.each([
      "type C _ _;",
      "type Set a = [a]bool;",
      "const unique c: int extends a, unique b complete;",
      "var g: int where g > 0;",
      "function {:inline} f(x: int) returns (int);",
      'axiom {:note "base case"} f(0) == 0;',
    ])("prints %s as written", (source) => {
      expect(reemit(source)).toBe(source);
    });

    it("prints function bodies on their own line", () => {
      expect(reemit("function f(x: int) returns (int) { x + 1 }")).toBe(
        ["function f(x: int) returns (int) {", "  x + 1", "}"].join("\n"),
      );
    });

    it("indents procedure contracts", () => {
      const source = [
        "procedure P<a>(x: a) returns (y: a);",
        "  requires true;",
        "  modifies g;",
        "  free ensures y == x;",
      ].join("\n");
      expect(reemit(source)).toBe(source);
    });

    it("prints structured implementation bodies", () => {
      const source = [
        "implementation P(x: int)",
        "{",
        "  var i: int;",
        "",
        "  if (x > 0) {",
        "    i := 1;",
        "  } else if (*) {",
        "    i := 2;",
        "  } else {",
        "    havoc i;",
        "  }",
        "  while (i < 10)",
        "    invariant i <= 10;",
        "  {",
        "    call i := Q(i);",
        "  }",
        "}",
      ].join("\n");
      expect(reemit(source)).toBe(source);
    });

    it("prints blocks once the structured body is gone", () => {
      const program = parseOk(`
        procedure P();
        implementation P() {
          goto A, B;
          A: assume false; goto C;
          B: return;
          C: return;
        }
      `);
      const implementation = program.declarations[1];
      if (implementation.kind !== "implementation") {
        throw new Error("expected an implementation");
      }

      expect(emitDeclaration(pruneUnreachableBlocks(implementation))).toBe(
        [
          "implementation P()",
          "{",
          "  anon0:",
          "    goto A, B;",
          "",
          "  B:",
          "    return;",
          "",
          "  A:",
          "    assume false;",
          "    return;",
          "}",
        ].join("\n"),
      );
    });

    it("indents statements under their labels", () => {
      const source = [
        "implementation P()",
        "{",
        "  goto A;",
        "",
        "  A:",
        "    assume true;",
        "    goto B;",
        "",
        "  B:",
        "    return;",
        "}",
      ].join("\n");
      expect(reemit(source)).toBe(source);
    });

    it("prints blocks that parse back to the same text", () => {
      const program = parseOk(`
        procedure P();
        implementation P() {
          var i: int;
          i := 0;
          while (i < 3) {
            i := i + 1;
          }
        }
      `);
      const [procedure, implementation] = program.declarations;
      if (implementation.kind !== "implementation") {
        throw new Error("expected an implementation");
      }
      const blockForm: Ast.Program = {
        ...program,
        declarations: [procedure, { ...implementation, body: null }],
      };

      const once = emit(blockForm);
      expect(once).toContain(
        "  anon1_LoopHead:\n    goto anon1_LoopDone, anon1_LoopBody;\n",
      );
      expect(emit(parseOk(once))).toBe(once);
    });
  });

  describe("programs", () => {
    const source = `
      type Key;
      const k: Key;
      var store: [Key]int;
      function twice(x: int) returns (int) { x + x }
      axiom twice(2) == 4;
      procedure Put(v: int);
        modifies store;
        ensures store == old(store)[k := v];
      implementation Put(v: int) {
        store[k] := v;
      }
    `;

    it("separates declarations by blank lines", () => {
      const text = emit(parseOk(source));
      expect(text.split("\n\n")).toHaveLength(7);
      expect(text.endsWith(";\n") || text.endsWith("}\n")).toBe(true);
    });

    it("prints text that parses back to the same text", () => {
      const once = emit(parseOk(source));
      expect(emit(parseOk(once))).toBe(once);
    });

    it("round-trips polymorphic map types", () => {
      const once = emit(
        parseOk(`
          var m: <a>[a]a;
          var n: [int]<b>[b, int]b;
          axiom m[1] == 1;
        `),
      );
      expect(once.split("\n").slice(0, 3)).toEqual([
        "var m: <a>[a]a;",
        "",
        "var n: [int]<b>[b, int]b;",
      ]);
      expect(emit(parseOk(once))).toBe(once);
    });
  });
});
