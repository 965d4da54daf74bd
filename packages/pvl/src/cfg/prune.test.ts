import { describe, expect, it } from "vitest";

import { parse } from "#parser";

import { pruneUnreachableBlocks } from "./prune.js";

describe("pruneUnreachableBlocks", () => {
  it("drops unreachable blocks and cuts blocks that assume false", () => {
    const parsed = parse(`
      procedure P();
      implementation P() {
        goto A, B;
        A: assume false; goto C;
        B: return;
        C: return;
        D: return;
      }
    `);
    if (!parsed.success) throw new Error("Parse failed");
    const implementation = parsed.value.declarations[1];
    if (implementation.kind !== "implementation") {
      throw new Error("expected an implementation");
    }

    const pruned = pruneUnreachableBlocks(implementation);
    expect(pruned.blocks.map(({ label }) => label)).toEqual([
      "anon0",
      "B",
      "A",
    ]);

    const [, , cut] = pruned.blocks;
    expect(cut.transfer.kind).toBe("return");
    expect(cut.commands).toHaveLength(1);
    expect(pruned.body).toBeNull();
  });
});
