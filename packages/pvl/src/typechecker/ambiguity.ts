import * as Ast from "#ast";
import { Type } from "#types";

import type { TypecheckingContext, Typing } from "./context.js";
import { ErrorCode, ErrorMessages } from "./errors.js";

/**
 * Report every expression type and type argument that still contains a
 * proxy, i.e. that nothing in the program determines
 */
export function seekAmbiguities(
  program: Ast.Program,
  context: TypecheckingContext,
): void {
  const { types, instantiations } = context.typing;

  const check = (node: Ast.Node, type: Type) => {
    if (type.freeProxies.length > 0) {
      context.error(
        node.loc,
        ErrorMessages.AMBIGUOUS_TYPE(`${type}`),
        ErrorCode.AMBIGUOUS_TYPE,
      );
    }
  };

  const sweep = (node: Ast.Node): void => {
    const type = types.get(node.id);
    if (type) {
      check(node, type);
    }
    for (const argument of instantiations.get(node.id) ?? []) {
      check(node, argument);
    }
    for (const child of typedChildren(node)) {
      sweep(child);
    }
  };

  sweep(program);
}

// implementations were checked through their blocks
function typedChildren(node: Ast.Node): Ast.Node[] {
  if (node.type === "Declaration" && node.kind === "implementation") {
    return Ast.children(Ast.Node.update(node, { body: null }));
  }
  return Ast.children(node);
}

/**
 * Replace resolved proxies in the typing by what they stand for
 */
export function normalizeTyping(typing: Typing): void {
  for (const [id, type] of typing.types) {
    typing.types.set(id, Type.normalize(type));
  }
  for (const [id, types] of typing.instantiations) {
    typing.instantiations.set(id, types.map(Type.normalize));
  }
}
