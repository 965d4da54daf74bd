import type * as Ast from "#ast";
import { Resolution } from "#resolver";

/**
 * Compute strongly connected components using Tarjan's algorithm.
 * Components come out in reverse topological order: a component is listed
 * before every component that can reach it.
 */
export function stronglyConnectedComponents<T>(
  nodes: readonly T[],
  successors: (node: T) => readonly T[],
): T[][] {
  const index = new Map<T, number>();
  const lowlink = new Map<T, number>();
  const onStack = new Set<T>();
  const stack: T[] = [];
  const components: T[][] = [];
  let currentIndex = 0;

  function strongConnect(v: T): number {
    const vIndex = currentIndex;
    let vLow = vIndex;
    index.set(v, vIndex);
    currentIndex++;
    stack.push(v);
    onStack.add(v);

    for (const w of successors(v)) {
      const wIndex = index.get(w);
      if (wIndex === undefined) {
        vLow = Math.min(vLow, strongConnect(w));
      } else if (onStack.has(w)) {
        vLow = Math.min(vLow, wIndex);
      }
    }
    lowlink.set(v, vLow);

    if (vLow === vIndex) {
      const component: T[] = [];
      let w: T | undefined;
      do {
        w = stack.pop();
        if (w === undefined) break;
        onStack.delete(w);
        component.push(w);
      } while (w !== v);
      components.push(component);
    }
    return vLow;
  }

  for (const node of nodes) {
    if (!index.has(node)) {
      strongConnect(node);
    }
  }

  return components;
}

/**
 * The procedure call graph: each procedure points to the procedures called
 * from its implementations
 */
export function callGraph(
  program: Ast.Program,
  resolution: Resolution,
): Map<Ast.Declaration.Procedure, Ast.Declaration.Procedure[]> {
  const graph = new Map<
    Ast.Declaration.Procedure,
    Ast.Declaration.Procedure[]
  >();
  for (const declaration of program.declarations) {
    if (declaration.kind === "procedure") {
      graph.set(declaration, []);
    }
  }

  for (const declaration of program.declarations) {
    if (declaration.kind !== "implementation") {
      continue;
    }
    const caller = Resolution.procedureOf(resolution, declaration);
    const callees = graph.get(caller) ?? [];
    for (const block of declaration.blocks) {
      for (const command of block.commands) {
        if (command.kind !== "call") {
          continue;
        }
        const callee = Resolution.procedureOf(resolution, command);
        if (!callees.includes(callee)) {
          callees.push(callee);
        }
      }
    }
    graph.set(caller, callees);
  }
  return graph;
}

/**
 * Procedures that can call themselves, directly or through others
 */
export function recursiveProcedures(
  program: Ast.Program,
  resolution: Resolution,
): Set<Ast.Declaration.Procedure> {
  const graph = callGraph(program, resolution);
  const recursive = new Set<Ast.Declaration.Procedure>();
  for (const component of stronglyConnectedComponents(
    [...graph.keys()],
    (procedure) => graph.get(procedure) ?? [],
  )) {
    const [first] = component;
    if (component.length > 1 || (graph.get(first) ?? []).includes(first)) {
      for (const procedure of component) {
        recursive.add(procedure);
      }
    }
  }
  return recursive;
}
