import * as Ast from "#ast";
import { invariant } from "#errors";
import type { Type } from "#types";

import type { Callable } from "./context.js";

/**
 * What name resolution learns about a program, in side tables keyed by
 * node id
 */
export interface Resolution {
  /**
   * Identifier expressions, function calls, procedure calls and
   * implementations, mapped to the declarations they denote
   */
  bindings: Map<Ast.Id, Ast.Declaration>;
  /**
   * Resolved types of variable declarations, coercions and synonyms
   */
  types: Map<Ast.Id, Type>;
  /**
   * Type parameters of functions, procedures, implementations and
   * quantifiers, in first-occurrence order
   */
  typeParameters: Map<Ast.Id, Type.Variable[]>;
  /**
   * Target blocks of goto transfers
   */
  targets: Map<Ast.Id, Ast.Block[]>;
}

export namespace Resolution {
  export function create(): Resolution {
    return {
      bindings: new Map(),
      types: new Map(),
      typeParameters: new Map(),
      targets: new Map(),
    };
  }

  export function variableOf(
    resolution: Resolution,
    identifier: Ast.Expression.Identifier,
  ): Ast.Declaration.Variable {
    const declaration = resolution.bindings.get(identifier.id);
    invariant(
      declaration && Ast.Declaration.isVariable(declaration),
      `identifier ${identifier.name} is not resolved to a variable`,
      identifier.loc ?? undefined,
    );
    return declaration;
  }

  export function callableOf(
    resolution: Resolution,
    node: Ast.Expression.Call | Ast.Command.Call | Ast.Declaration.Implementation,
  ): Callable {
    const declaration = resolution.bindings.get(node.id);
    invariant(
      declaration &&
        (declaration.kind === "function" || declaration.kind === "procedure"),
      `${describe(node)} is not resolved`,
      node.loc ?? undefined,
    );
    return declaration;
  }

  export function procedureOf(
    resolution: Resolution,
    node: Ast.Command.Call | Ast.Declaration.Implementation,
  ): Ast.Declaration.Procedure {
    const callable = callableOf(resolution, node);
    invariant(
      callable.kind === "procedure",
      `${describe(node)} is not resolved to a procedure`,
      node.loc ?? undefined,
    );
    return callable;
  }

  export function typeOf(resolution: Resolution, node: Ast.Node): Type {
    const type = resolution.types.get(node.id);
    invariant(type, `no resolved type for node ${node.id}`, node.loc ?? undefined);
    return type;
  }

  export function typeParametersOf(
    resolution: Resolution,
    node: Ast.Node,
  ): Type.Variable[] {
    return resolution.typeParameters.get(node.id) ?? [];
  }

  function describe(
    node: Ast.Expression.Call | Ast.Command.Call | Ast.Declaration.Implementation,
  ): string {
    return node.type === "Declaration"
      ? `implementation ${node.name}`
      : `call to ${node.callee}`;
  }
}
