/**
 * Dominance computation with the Cooper-Harvey-Kennedy iterative
 * algorithm
 */

import type * as Ast from "#ast";
import { invariant } from "#errors";

import type { Graph } from "./graph.js";

/**
 * Compute immediate dominators. The entry dominates itself; blocks not
 * reachable from the entry have no entry in the map.
 */
export function computeDominators(graph: Graph): Map<Ast.Block, Ast.Block> {
  const { order, predecessors } = graph;
  const entry = order[0];

  // lower index = earlier in RPO
  const rpoIndex = new Map<Ast.Block, number>();
  order.forEach((block, i) => rpoIndex.set(block, i));

  const idom = new Map<Ast.Block, Ast.Block>();
  idom.set(entry, entry);

  const indexOf = (block: Ast.Block): number => {
    const index = rpoIndex.get(block);
    invariant(index !== undefined, `block ${block.label} is unreachable`);
    return index;
  };
  const parentIndex = (index: number): number => {
    const parent = idom.get(order[index]);
    invariant(parent, `block ${order[index].label} has no dominator yet`);
    return indexOf(parent);
  };

  function intersect(b1: Ast.Block, b2: Ast.Block): Ast.Block {
    let index1 = indexOf(b1);
    let index2 = indexOf(b2);
    while (index1 !== index2) {
      while (index1 > index2) {
        index1 = parentIndex(index1);
      }
      while (index2 > index1) {
        index2 = parentIndex(index2);
      }
    }
    return order[index1];
  }

  let changed = true;
  while (changed) {
    changed = false;
    for (const block of order.slice(1)) {
      const processed = (predecessors.get(block) ?? []).filter((predecessor) =>
        idom.has(predecessor),
      );
      if (processed.length === 0) continue;

      let newIdom = processed[0];
      for (const predecessor of processed.slice(1)) {
        newIdom = intersect(predecessor, newIdom);
      }

      if (idom.get(block) !== newIdom) {
        idom.set(block, newIdom);
        changed = true;
      }
    }
  }

  return idom;
}

/**
 * Whether `a` dominates `b`
 */
export function dominates(
  idom: Map<Ast.Block, Ast.Block>,
  a: Ast.Block,
  b: Ast.Block,
): boolean {
  let runner: Ast.Block | undefined = b;
  while (runner) {
    if (runner === a) {
      return true;
    }
    const parent = idom.get(runner);
    if (parent === runner) {
      return false;
    }
    runner = parent;
  }
  return false;
}
