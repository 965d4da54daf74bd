/**
 * Control-flow graphs of implementations
 *
 * Nodes are the blocks of one implementation, edges follow the labels of
 * their goto transfers. The entry is the first block.
 */

import type * as Ast from "#ast";
import { invariant } from "#errors";

import { stronglyConnectedComponents } from "./scc.js";

export interface Graph {
  entry: Ast.Block;
  blocks: Ast.Block[];
  successors: Map<Ast.Block, Ast.Block[]>;
  predecessors: Map<Ast.Block, Ast.Block[]>;
  /** Blocks in reverse post-order (reachable from entry only). */
  order: Ast.Block[];
}

export function buildGraph(blocks: readonly Ast.Block[]): Graph {
  invariant(
    blocks.length > 0,
    "control-flow graph of an implementation without blocks",
  );

  const byLabel = new Map<string, Ast.Block>();
  for (const block of blocks) {
    if (!byLabel.has(block.label)) {
      byLabel.set(block.label, block);
    }
  }

  const successors = new Map<Ast.Block, Ast.Block[]>();
  for (const block of blocks) {
    successors.set(
      block,
      block.transfer.kind === "goto"
        ? block.transfer.labels.flatMap((label) => {
            const target = byLabel.get(label);
            return target ? [target] : [];
          })
        : [],
    );
  }

  const predecessors = computePredecessors(blocks, successors);

  // post-order by an explicit stack of (block, next successor index)
  const visited = new Set<Ast.Block>([blocks[0]]);
  const order: Ast.Block[] = [];
  const stack: [Ast.Block, number][] = [[blocks[0], 0]];

  while (stack.length > 0) {
    const top = stack[stack.length - 1];
    const [block, next] = top;
    const targets = successors.get(block) ?? [];
    if (next === targets.length) {
      stack.pop();
      order.push(block);
      continue;
    }
    top[1] = next + 1;
    const successor = targets[next];
    if (!visited.has(successor)) {
      visited.add(successor);
      stack.push([successor, 0]);
    }
  }
  order.reverse();

  return {
    entry: blocks[0],
    blocks: [...blocks],
    successors,
    predecessors,
    order,
  };
}

export function computePredecessors(
  blocks: readonly Ast.Block[],
  successors: Map<Ast.Block, Ast.Block[]>,
): Map<Ast.Block, Ast.Block[]> {
  const predecessors = new Map<Ast.Block, Ast.Block[]>();
  for (const block of blocks) {
    predecessors.set(block, []);
  }
  for (const block of blocks) {
    for (const successor of successors.get(block) ?? []) {
      predecessors.get(successor)?.push(block);
    }
  }
  return predecessors;
}

/**
 * The derived graph data of one implementation. Predecessors and strongly
 * connected components are computed on first use and dropped together by
 * `invalidate`, which callers must invoke after changing the blocks.
 */
export class ImplementationGraph {
  private graph: Graph | null = null;
  private components: Ast.Block[][] | null = null;

  constructor(private implementation: Ast.Declaration.Implementation) {}

  get blocks(): readonly Ast.Block[] {
    return this.implementation.blocks;
  }

  get current(): Graph {
    if (!this.graph) {
      this.graph = buildGraph(this.implementation.blocks);
    }
    return this.graph;
  }

  predecessors(block: Ast.Block): Ast.Block[] {
    const predecessors = this.current.predecessors.get(block);
    invariant(
      predecessors,
      `block ${block.label} is not in this implementation`,
    );
    return predecessors;
  }

  successors(block: Ast.Block): Ast.Block[] {
    const successors = this.current.successors.get(block);
    invariant(successors, `block ${block.label} is not in this implementation`);
    return successors;
  }

  get stronglyConnectedComponents(): Ast.Block[][] {
    if (!this.components) {
      const { successors } = this.current;
      this.components = stronglyConnectedComponents(
        this.implementation.blocks,
        (block) => successors.get(block) ?? [],
      );
    }
    return this.components;
  }

  /**
   * The strongly connected component that contains `block`
   */
  connectedComponent(block: Ast.Block): Ast.Block[] {
    const component = this.stronglyConnectedComponents.find((candidate) =>
      candidate.includes(block),
    );
    invariant(component, `block ${block.label} is not in this implementation`);
    return component;
  }

  /**
   * Start over with `implementation`, e.g. after its blocks were rewritten
   */
  invalidate(
    implementation: Ast.Declaration.Implementation = this.implementation,
  ): void {
    this.implementation = implementation;
    this.graph = null;
    this.components = null;
  }
}
