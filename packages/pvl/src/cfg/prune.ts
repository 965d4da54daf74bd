import * as Ast from "#ast";

/**
 * Drop the blocks not reachable from the entry. A block containing
 * `assert false` or `assume false` never gets to its transfer, so it ends
 * in a return instead and its successors are not reached through it.
 *
 * Reachable blocks keep their discovery order, entry first.
 */
export function pruneUnreachableBlocks(
  implementation: Ast.Declaration.Implementation,
): Ast.Declaration.Implementation {
  const { blocks } = implementation;
  if (blocks.length === 0) {
    return implementation;
  }

  const byLabel = new Map<string, Ast.Block>();
  for (const block of blocks) {
    if (!byLabel.has(block.label)) {
      byLabel.set(block.label, block);
    }
  }

  const reachable: Ast.Block[] = [];
  const visited = new Set<Ast.Block>();
  const visitNext: Ast.Block[] = [blocks[0]];

  for (let block = visitNext.pop(); block; block = visitNext.pop()) {
    if (visited.has(block)) {
      continue;
    }
    visited.add(block);

    const { transfer } = block;
    if (transfer.kind !== "goto") {
      reachable.push(block);
      continue;
    }
    if (block.commands.some(isFalsePredicate)) {
      reachable.push(
        Ast.Node.update(block, {
          transfer: Ast.Transfer.return_(
            Ast.nextId(),
            transfer.loc ?? undefined,
          ),
        }),
      );
      continue;
    }

    reachable.push(block);
    for (const label of transfer.labels) {
      const successor = byLabel.get(label);
      if (successor) {
        visitNext.push(successor);
      }
    }
  }

  return Ast.Node.update(implementation, { body: null, blocks: reachable });
}

function isFalsePredicate(command: Ast.Command): boolean {
  return (
    (command.kind === "assert" || command.kind === "assume") &&
    command.expression.type === "LiteralExpression" &&
    command.expression.kind === "boolean" &&
    !command.expression.value
  );
}
