import { describe, expect, it } from "vitest";

import type * as Ast from "#ast";
import { compile } from "#compiler";
import { Result } from "#result";

import { ErrorCode } from "./errors.js";

const counting = `
  procedure P(n: int) returns (r: int);
  implementation P(n: int) returns (r: int) {
    var i: int;
    i := 0;
    while (i < n) {
      i := i + 1;
    }
    r := i;
  }
`;

const labels = (implementation: Ast.Declaration) =>
  implementation.kind === "implementation"
    ? implementation.blocks.map(({ label }) => label)
    : [];

describe("extractLoops", () => {
  it("turns a loop into a recursive procedure that checks again", async () => {
    const result = await compile({ source: counting, extractLoops: true });
    expect(Result.errors(result)).toEqual([]);
    if (!result.success) throw new Error("Compilation failed");

    const { declarations } = result.value.ast;
    expect(declarations.map(({ kind }) => kind)).toEqual([
      "procedure",
      "implementation",
      "procedure",
      "implementation",
    ]);

    const [, implementation, loop, loopImplementation] = declarations;
    if (loop.kind !== "procedure") throw new Error("expected a procedure");
    expect(loop.name).toBe("loop_anon1_LoopHead");
    expect(loop.parameters.map(({ name }) => name)).toEqual([
      "in_n",
      "in_r",
      "in_i",
    ]);
    expect(loop.returns.map(({ name }) => name)).toEqual(["out_r", "out_i"]);
    expect(loop.modifies).toEqual([]);

    expect(labels(implementation)).toEqual([
      "anon0",
      "anon1_LoopHead",
      "anon1_LoopBody",
      "anon1_LoopDone",
      "anon2",
      "anon1_LoopBody_dummy",
    ]);
    expect(labels(loopImplementation)).toEqual([
      "entry",
      "anon1_LoopHead",
      "anon1_LoopBody",
      "anon1_LoopBody_dummy",
      "exit",
    ]);
  });

  it("calls the loop procedure on entering the header", async () => {
    const result = await compile({ source: counting, extractLoops: true });
    if (!result.success) throw new Error("Compilation failed");

    const implementation = result.value.ast.declarations[1];
    if (implementation.kind !== "implementation") {
      throw new Error("expected an implementation");
    }
    const [call] = implementation.blocks[1].commands;
    if (call.kind !== "call") throw new Error("expected a call");
    expect(call.callee).toBe("loop_anon1_LoopHead");
    expect(call.arguments.map((argument) =>
      argument.type === "IdentifierExpression" ? argument.name : null,
    )).toEqual(["n", "r", "i"]);
    expect(call.outputs.map(({ name }) => name)).toEqual(["r", "i"]);
  });

  it("extracts loops of polymorphic implementations", async () => {
    const result = await compile({
      source: `
        procedure P<t>(n: int, z: t) returns (r: int);
        implementation P<t>(n: int, z: t) returns (r: int) {
          var i: int;
          var w: t;
          i := 0;
          while (i < n) {
            w := z;
            i := i + 1;
          }
          r := i;
        }
      `,
      extractLoops: true,
    });
    expect(Result.errors(result)).toEqual([]);
    if (!result.success) throw new Error("Compilation failed");

    const [, implementation, loop, loopImplementation] =
      result.value.ast.declarations;
    if (
      implementation.kind !== "implementation" ||
      loop.kind !== "procedure" ||
      loopImplementation.kind !== "implementation"
    ) {
      throw new Error("expected a loop procedure and its implementation");
    }
    expect(loop.parameters.map(({ name }) => name)).toEqual([
      "in_n",
      "in_z",
      "in_r",
      "in_i",
      "in_w",
    ]);

    const [original] = implementation.typeParameters;
    const [procedureBinder] = loop.typeParameters;
    const [implementationBinder] = loopImplementation.typeParameters;
    expect([procedureBinder.name, implementationBinder.name]).toEqual([
      "t",
      "t",
    ]);
    expect(procedureBinder).not.toBe(original);
    expect(implementationBinder).not.toBe(procedureBinder);
  });

  it("refuses to reuse a declared procedure name", async () => {
    const result = await compile({
      source: `procedure loop_anon1_LoopHead();\n${counting}`,
      extractLoops: true,
    });
    expect(result.success).toBe(false);

    const errors = Result.errors(result);
    expect(errors.map(({ message }) => message)).toEqual([
      "cannot extract loop into loop_anon1_LoopHead: the name is already declared",
    ]);
    expect(errors[0].code).toBe(ErrorCode.LOOP_NAME_CLASH);
  });

  it("leaves loops alone unless asked to", async () => {
    const result = await compile({ source: counting });
    if (!result.success) throw new Error("Compilation failed");
    expect(result.value.ast.declarations).toHaveLength(2);
  });
});
