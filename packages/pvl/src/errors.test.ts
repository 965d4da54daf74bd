import { describe, expect, it } from "vitest";

import { formatError, InvariantError, invariant, positionOf, PvlError } from "./errors.js";

describe("positionOf", () => {
  it("counts lines and columns from one", () => {
    const source = "ab\ncd\n\nef";
    expect(positionOf(source, 0)).toEqual({ line: 1, column: 1 });
    expect(positionOf(source, 4)).toEqual({ line: 2, column: 2 });
    expect(positionOf(source, 7)).toEqual({ line: 4, column: 1 });
  });

  it("stops at the end of the source", () => {
    expect(positionOf("ab", 10)).toEqual({ line: 1, column: 3 });
  });
});

describe("formatError", () => {
  const located = new PvlError("bad thing", "X1", { offset: 4, length: 1 });

  it("prints line and column when the source is known", () => {
    expect(formatError(located, "ab\ncd", "a.pvl")).toBe(
      "a.pvl(2,2): bad thing",
    );
  });

  it("falls back to the offset without a source", () => {
    expect(formatError(located)).toBe("<input>@4: bad thing");
  });

  it("prints the file alone without a location", () => {
    expect(formatError(new PvlError("bad thing", "X1"), "", "a.pvl")).toBe(
      "a.pvl: bad thing",
    );
  });
});

describe("invariant", () => {
  it("throws an InvariantError when the condition fails", () => {
    expect(() => invariant(false, "broken")).toThrow(InvariantError);
    expect(() => invariant(1, "fine")).not.toThrow();
  });
});
