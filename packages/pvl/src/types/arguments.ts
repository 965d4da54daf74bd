/**
 * Matching formal argument types of functions, procedures and maps against
 * the types of actual arguments
 */

import type { SourceLocation } from "#ast";
import { invariant } from "#errors";
import { Type } from "./definitions.js";

/**
 * Where argument mismatches are reported
 */
export interface ErrorSink {
  error(location: SourceLocation | null, message: string): void;
  readonly errorCount: number;
}

/**
 * An actual argument or result variable, as far as matching is concerned
 */
export interface Actual {
  type: Type;
  loc: SourceLocation | null;
}

export interface ArgumentCheck {
  /**
   * Result types with type parameters instantiated, or null when matching
   * failed so badly that they are meaningless
   */
  results: Type[] | null;
  /**
   * Instantiation of each type parameter, in declaration order
   */
  instantiation: Type[];
}

/**
 * Instantiate `typeParameters` with fresh proxies and unify the formal
 * argument (and out-parameter) types with the actual ones
 */
export function matchArgumentTypes(
  typeParameters: readonly Type.Variable[],
  formalIns: readonly Type[],
  actualIns: readonly Actual[],
  formalOuts: readonly Type[] | null,
  actualOuts: readonly Actual[] | null,
  operation: string,
  sink: ErrorSink,
): Type.Substitution {
  invariant(
    formalIns.length === actualIns.length,
    "argument counts must agree before matching",
  );
  const substitution = freshInstantiation(typeParameters);

  formalIns.forEach((formal, i) => {
    const actual = actualIns[i];
    if (!formal.substitute(substitution).unify(actual.type)) {
      sink.error(
        actual.loc,
        `invalid type for argument ${i} in ${operation}: ${actual.type} (expected: ${formal})`,
      );
    }
  });

  if (formalOuts && actualOuts) {
    formalOuts.forEach((formalOut, i) => {
      const actual = actualOuts[i];
      const formal = formalOut.substitute(substitution);
      if (!formal.unify(actual.type)) {
        sink.error(
          actual.loc,
          `invalid type for out-parameter ${i} in ${operation}: ${actual.type} (expected: ${formal})`,
        );
      }
    });
  }

  return substitution;
}

export interface ArgumentCheckRequest {
  typeParameters: readonly Type.Variable[];
  formalIns: readonly Type[];
  actualIns: readonly Actual[];
  formalOuts: readonly Type[];
  actualOuts: readonly Actual[] | null;
  subject: SourceLocation | null;
  operation: string;
}

/**
 * Check the arguments of an application and compute its result types
 */
export function checkArgumentTypes(
  request: ArgumentCheckRequest,
  sink: ErrorSink,
): ArgumentCheck {
  const {
    typeParameters,
    formalIns,
    actualIns,
    formalOuts,
    actualOuts,
    subject,
    operation,
  } = request;

  if (formalIns.length !== actualIns.length) {
    sink.error(
      subject,
      `wrong number of arguments in ${operation}: ${actualIns.length}`,
    );
    // without type parameters the declared results are still usable
    return {
      results: typeParameters.length === 0 ? [...formalOuts] : null,
      instantiation: [],
    };
  }
  if (actualOuts && formalOuts.length !== actualOuts.length) {
    sink.error(
      subject,
      `wrong number of result variables in ${operation}: ${actualOuts.length}`,
    );
    return {
      results: typeParameters.length === 0 ? [...formalOuts] : null,
      instantiation: [],
    };
  }

  const previousErrorCount = sink.errorCount;
  const substitution = matchArgumentTypes(
    typeParameters,
    formalIns,
    actualIns,
    actualOuts ? formalOuts : null,
    actualOuts,
    operation,
    sink,
  );

  const instantiation = typeParameters.map((parameter) => {
    const type = substitution.get(parameter);
    invariant(type, `type parameter ${parameter.name} was not instantiated`);
    return type;
  });

  const results = formalOuts.map((type) => type.substitute(substitution));
  if (previousErrorCount === sink.errorCount) {
    return { results, instantiation };
  }

  // After a mismatch, results mentioning a type parameter that nothing
  // pinned down are meaningless
  const resultParameters = Type.freeVariablesIn(formalOuts);
  const allInstantiated = typeParameters.every(
    (parameter, i) =>
      !resultParameters.includes(parameter) ||
      !isUnconstrained(instantiation[i]),
  );
  return { results: allInstantiated ? results : null, instantiation };
}

function isUnconstrained(type: Type): boolean {
  const head = Type.head(type);
  return (
    head instanceof Type.Proxy &&
    !(head instanceof Type.BvProxy) &&
    !(head instanceof Type.MapProxy)
  );
}

/**
 * Type of `m[actuals]`. Map proxies record the selection as a constraint
 * and yield a fresh result proxy.
 */
export function checkMapArguments(
  mapType: Type,
  actuals: readonly Actual[],
  subject: SourceLocation | null,
  operation: string,
  sink: ErrorSink,
): ArgumentCheck & { result: Type | null } {
  const map = Type.head(mapType);

  if (map instanceof Type.Map) {
    const check = checkArgumentTypes(
      {
        typeParameters: map.typeParameters,
        formalIns: map.args,
        actualIns: actuals,
        formalOuts: [map.result],
        actualOuts: null,
        subject,
        operation,
      },
      sink,
    );
    return { ...check, result: check.results?.[0] ?? null };
  }

  invariant(map instanceof Type.MapProxy, `${mapType} is not a map type`);
  const result = new Type.Proxy("result");
  map.addConstraint({
    args: actuals.map(({ type }) => type),
    result,
  });
  return {
    results: [result],
    instantiation: [...actuals.map(({ type }) => type), result],
    result,
  };
}

function freshInstantiation(
  typeParameters: readonly Type.Variable[],
): Type.Substitution {
  return new Map(
    typeParameters.map((parameter): [Type.Variable, Type] => [
      parameter,
      new Type.Proxy(parameter.name),
    ]),
  );
}
