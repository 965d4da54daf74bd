import type * as Ast from "#ast";
import { Type } from "#types";

import type { ResolutionContext } from "./context.js";
import { ErrorCode, ErrorMessages } from "./errors.js";

/**
 * Synonyms referenced by unresolved type syntax
 */
export function findDependencies(
  type: Type,
  context: ResolutionContext,
  dependencies: Ast.Declaration.TypeSynonym[] = [],
): Ast.Declaration.TypeSynonym[] {
  if (type instanceof Type.Unresolved) {
    const dependency = context.lookUpTypeSynonymDeclaration(type.name);
    if (dependency && !dependencies.includes(dependency)) {
      dependencies.push(dependency);
    }
    for (const arg of type.args) {
      findDependencies(arg, context, dependencies);
    }
  } else if (type instanceof Type.Map) {
    for (const arg of type.args) {
      findDependencies(arg, context, dependencies);
    }
    findDependencies(type.result, context, dependencies);
  } else if (type instanceof Type.Ctor) {
    for (const arg of type.args) {
      findDependencies(arg, context, dependencies);
    }
  }
  return dependencies;
}

/**
 * Resolve the bodies of all synonyms, each after the synonyms it refers
 * to. Synonyms left over when no more progress can be made are part of (or
 * depend on) a cycle: they are reported and given the body `bool`.
 *
 * Returns the resolved body of every synonym, by declaration id.
 */
export function resolveTypeSynonyms(
  synonyms: readonly Ast.Declaration.TypeSynonym[],
  context: ResolutionContext,
): Map<Ast.Id, Type> {
  const bodies = new Map<Ast.Id, Type>();
  const dependencies = new Map<
    Ast.Declaration.TypeSynonym,
    Ast.Declaration.TypeSynonym[]
  >();
  for (const synonym of synonyms) {
    dependencies.set(synonym, findDependencies(synonym.body, context));
  }

  const resolve = (synonym: Ast.Declaration.TypeSynonym, body: Type) => {
    const previousState = context.typeBinderState;
    try {
      for (const parameter of synonym.typeParameters) {
        context.addTypeBinder(parameter);
      }
      const resolved = body.resolveType(context);
      context.defineTypeSynonym(synonym, resolved);
      bodies.set(synonym.id, resolved);
    } finally {
      context.typeBinderState = previousState;
    }
  };

  let unresolved = synonyms.length;
  while (unresolved > 0) {
    for (const synonym of synonyms) {
      if (
        !bodies.has(synonym.id) &&
        (dependencies.get(synonym) ?? []).every((dependency) =>
          bodies.has(dependency.id),
        )
      ) {
        resolve(synonym, synonym.body);
      }
    }

    const remaining = synonyms.length - bodies.size;
    if (remaining < unresolved) {
      unresolved = remaining;
      continue;
    }

    for (const synonym of synonyms) {
      if (!bodies.has(synonym.id)) {
        context.error(
          synonym.loc,
          ErrorMessages.SYNONYM_CYCLE(synonym.name),
          ErrorCode.SYNONYM_CYCLE,
        );
        resolve(synonym, Type.bool);
      }
    }
    unresolved = 0;
  }

  return bodies;
}
