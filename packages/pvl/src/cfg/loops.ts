import type * as Ast from "#ast";

import { computeDominators, dominates } from "./dominance.js";
import type { Graph } from "./graph.js";
import { stronglyConnectedComponents } from "./scc.js";

export interface Loops {
  /** Targets of back edges, in reverse post-order */
  headers: Ast.Block[];
  /** Sources of the back edges into each header */
  backEdges: Map<Ast.Block, Ast.Block[]>;
  /**
   * Whether every cycle passes through a header, i.e. whether removing the
   * back edges leaves the reachable graph acyclic
   */
  reducible: boolean;
}

/**
 * Find the loops of a graph. An edge is a back edge when its target
 * dominates its source.
 */
export function computeLoops(graph: Graph): Loops {
  const idom = computeDominators(graph);
  const backEdges = new Map<Ast.Block, Ast.Block[]>();
  const forward = new Map<Ast.Block, Ast.Block[]>();

  for (const block of graph.order) {
    const targets: Ast.Block[] = [];
    for (const successor of graph.successors.get(block) ?? []) {
      if (dominates(idom, successor, block)) {
        const sources = backEdges.get(successor) ?? [];
        if (!sources.includes(block)) {
          sources.push(block);
        }
        backEdges.set(successor, sources);
      } else {
        targets.push(successor);
      }
    }
    forward.set(block, targets);
  }

  const reducible = stronglyConnectedComponents(
    graph.order,
    (block) => forward.get(block) ?? [],
  ).every((component) => component.length === 1);

  return {
    headers: graph.order.filter((block) => backEdges.has(block)),
    backEdges,
    reducible,
  };
}

/**
 * Blocks of the natural loop of the back edge `source -> header`: the
 * header and every block that reaches `source` without passing through the
 * header. Returned in program order.
 */
export function naturalLoop(
  graph: Graph,
  header: Ast.Block,
  source: Ast.Block,
): Ast.Block[] {
  const reachable = new Set(graph.order);
  const loop = new Set<Ast.Block>([header]);
  const stack: Ast.Block[] = [];
  if (!loop.has(source)) {
    loop.add(source);
    stack.push(source);
  }
  for (let block = stack.pop(); block; block = stack.pop()) {
    for (const predecessor of graph.predecessors.get(block) ?? []) {
      if (reachable.has(predecessor) && !loop.has(predecessor)) {
        loop.add(predecessor);
        stack.push(predecessor);
      }
    }
  }
  return graph.blocks.filter((block) => loop.has(block));
}

/**
 * Union of the natural loops of all back edges into `header`
 */
export function loopBlocks(
  graph: Graph,
  loops: Loops,
  header: Ast.Block,
): Ast.Block[] {
  const blocks = new Set<Ast.Block>();
  for (const source of loops.backEdges.get(header) ?? []) {
    for (const block of naturalLoop(graph, header, source)) {
      blocks.add(block);
    }
  }
  return graph.blocks.filter((block) => blocks.has(block));
}
