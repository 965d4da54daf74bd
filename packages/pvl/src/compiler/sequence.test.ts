import { describe, expect, it, vi } from "vitest";

import { PvlError } from "#errors";
import { Result, Severity } from "#result";

import type { Pass } from "./pass.js";
import { buildSequence } from "./sequence.js";
import { compile } from "./compile.js";

const double: Pass<{
  needs: { n: number };
  adds: { doubled: number };
  error: PvlError;
}> = {
  async run({ n }) {
    return Result.okWith({ doubled: n * 2 }, [
      new PvlError("doubling", "W1", undefined, Severity.Warning),
    ]);
  },
};

const refuseOdd: Pass<{
  needs: { doubled: number; n: number };
  adds: { half: number };
  error: PvlError;
}> = {
  async run({ n, doubled }) {
    if (n % 2 !== 0) {
      return Result.err<{ half: number }, PvlError>(
        new PvlError(`odd: ${n}`, "E1"),
      );
    }
    return Result.ok({ half: doubled / 4 });
  },
};

describe("Sequence", () => {
  it("threads what each pass adds into the next", async () => {
    const result = await buildSequence<{ n: number }>()
      .then(double)
      .then(refuseOdd)
      .run({ n: 4 });

    expect(result.success).toBe(true);
    if (!result.success) throw new Error("Sequence failed");
    expect(result.value).toEqual({ n: 4, doubled: 8, half: 2 });
    expect(Result.warnings(result).map(({ message }) => message)).toEqual([
      "doubling",
    ]);
  });

  it("stops at the first failure and keeps earlier messages", async () => {
    const after = vi.fn(async () => Result.ok({}));
    const result = await buildSequence<{ n: number }>()
      .then(double)
      .then(refuseOdd)
      .then({ run: after })
      .run({ n: 3 });

    expect(result.success).toBe(false);
    expect(after).not.toHaveBeenCalled();
    expect(Result.allMessages(result).map(({ code }) => code)).toEqual([
      "E1",
      "W1",
    ]);
  });
});

describe("compile", () => {
  it("stops before typechecking when resolution fails", async () => {
    const result = await compile({ source: "axiom 1 + y;" });
    expect(Result.errors(result).map(({ message }) => message)).toEqual([
      "undeclared identifier: y",
    ]);
  });

  it("typechecks resolved programs", async () => {
    const result = await compile({ source: "axiom 1 + 2;" });
    expect(Result.errors(result).map(({ message }) => message)).toEqual([
      "axioms must be of type bool",
    ]);
  });

  it("adds the typing of every expression", async () => {
    const result = await compile({ source: "axiom 1 + 2 == 3;" });
    if (!result.success) throw new Error("Compilation failed");
    const { ast, typing } = result.value;
    const [axiom] = ast.declarations;
    if (axiom.kind !== "axiom") throw new Error("expected an axiom");
    expect(typing.types.get(axiom.expression.id)?.toString()).toBe("bool");
  });
});
