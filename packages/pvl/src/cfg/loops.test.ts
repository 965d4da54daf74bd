import { describe, expect, it } from "vitest";

import * as Ast from "#ast";
import { parse } from "#parser";
import { resolveProgram } from "#resolver";

import { computeDominators, dominates } from "./dominance.js";
import { buildGraph, ImplementationGraph } from "./graph.js";
import { computeLoops, loopBlocks, naturalLoop } from "./loops.js";
import { recursiveProcedures, stronglyConnectedComponents } from "./scc.js";

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

function implementationOf(source: string): Ast.Declaration.Implementation {
  const parsed = parse(source);
  if (!parsed.success) {
    throw new Error("Parse failed");
  }
  const implementation = parsed.value.declarations.find(
    (declaration): declaration is Ast.Declaration.Implementation =>
      declaration.kind === "implementation",
  );
  if (!implementation) {
    throw new Error("no implementation");
  }
  return implementation;
}

const labels = (blocks: readonly Ast.Block[]) => blocks.map(({ label }) => label);

function blockNamed(blocks: readonly Ast.Block[], label: string): Ast.Block {
  const block = blocks.find((candidate) => candidate.label === label);
  if (!block) {
    throw new Error(`no block ${label}`);
  }
  return block;
}

describe("control-flow graphs", () => {
  const { blocks } = implementationOf(counting);
  const graph = buildGraph(blocks);
  const head = blockNamed(blocks, "anon1_LoopHead");
  const body = blockNamed(blocks, "anon1_LoopBody");
  const done = blockNamed(blocks, "anon1_LoopDone");

  it("orders blocks in reverse post-order", () => {
    expect(labels(graph.order)).toEqual([
      "anon0",
      "anon1_LoopHead",
      "anon1_LoopBody",
      "anon1_LoopDone",
      "anon2",
    ]);
  });

  it("orders long chains of blocks", () => {
    const length = 50000;
    const chain = Array.from({ length }, (_, i) =>
      Ast.block(
        Ast.nextId(),
        `B${i}`,
        [],
        i + 1 < length
          ? Ast.Transfer.goto(Ast.nextId(), [`B${i + 1}`])
          : Ast.Transfer.return_(Ast.nextId()),
      ),
    );
    const { order } = buildGraph(chain);
    expect(order).toHaveLength(length);
    expect(order[0]).toBe(chain[0]);
    expect(order[length - 1]).toBe(chain[length - 1]);
  });

  it("computes predecessors", () => {
    expect(labels(graph.predecessors.get(head) ?? [])).toEqual([
      "anon0",
      "anon1_LoopBody",
    ]);
  });

  it("computes immediate dominators", () => {
    const idom = computeDominators(graph);
    expect(idom.get(body)).toBe(head);
    expect(idom.get(done)).toBe(head);
    expect(idom.get(blockNamed(blocks, "anon2"))).toBe(done);
    expect(dominates(idom, head, body)).toBe(true);
    expect(dominates(idom, body, done)).toBe(false);
  });

  it("finds loops through back edges", () => {
    const loops = computeLoops(graph);
    expect(loops.reducible).toBe(true);
    expect(loops.headers).toEqual([head]);
    expect(loops.backEdges.get(head)).toEqual([body]);
    expect(labels(naturalLoop(graph, head, body))).toEqual([
      "anon1_LoopHead",
      "anon1_LoopBody",
    ]);
    expect(labels(loopBlocks(graph, loops, head))).toEqual([
      "anon1_LoopHead",
      "anon1_LoopBody",
    ]);
  });

  it("recognizes irreducible graphs", () => {
    const irreducible = implementationOf(`
      procedure P();
      implementation P() {
        goto A, B;
        A: goto B;
        B: goto A;
      }
    `);
    const loops = computeLoops(buildGraph(irreducible.blocks));
    expect(loops.headers).toEqual([]);
    expect(loops.reducible).toBe(false);
  });
});

describe("ImplementationGraph", () => {
  it("keeps predecessors and components until invalidated", () => {
    const implementation = implementationOf(counting);
    const graph = new ImplementationGraph(implementation);
    const head = blockNamed(implementation.blocks, "anon1_LoopHead");

    expect(labels(graph.predecessors(head))).toEqual([
      "anon0",
      "anon1_LoopBody",
    ]);
    expect(labels(graph.connectedComponent(head)).sort()).toEqual([
      "anon1_LoopBody",
      "anon1_LoopHead",
    ]);

    // the loop body no longer jumps back
    const unrolled = Ast.Node.update(implementation, {
      blocks: implementation.blocks.map((block) =>
        block.label === "anon1_LoopBody"
          ? Ast.Node.update(block, {
              transfer: Ast.Transfer.return_(Ast.nextId()),
            })
          : block,
      ),
    });
    expect(labels(graph.predecessors(head))).toEqual([
      "anon0",
      "anon1_LoopBody",
    ]);

    graph.invalidate(unrolled);
    expect(labels(graph.predecessors(head))).toEqual(["anon0"]);
    expect(labels(graph.connectedComponent(head))).toEqual([
      "anon1_LoopHead",
    ]);
    expect(graph.stronglyConnectedComponents).toHaveLength(5);
  });
});

describe("strongly connected components", () => {
  it("lists components in reverse topological order", () => {
    const edges = new Map<number, number[]>([
      [1, [2]],
      [2, [1, 3]],
      [3, []],
      [4, []],
    ]);
    expect(
      stronglyConnectedComponents([1, 2, 3, 4], (node) => edges.get(node) ?? []),
    ).toEqual([[3], [2, 1], [4]]);
  });

  it("finds mutually recursive procedures", () => {
    const parsed = parse(`
      procedure A();
      procedure B();
      procedure C();
      implementation A() { call B(); }
      implementation B() { call A(); }
      implementation C() { call B(); }
    `);
    if (!parsed.success) throw new Error("Parse failed");
    const resolved = resolveProgram(parsed.value);
    if (!resolved.success) throw new Error("Resolution failed");

    const { program, resolution } = resolved.value;
    const recursive = recursiveProcedures(program, resolution);
    expect([...recursive].map(({ name }) => name).sort()).toEqual(["A", "B"]);
  });
});
