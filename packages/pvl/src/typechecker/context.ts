import type * as Ast from "#ast";
import type { ErrorSink, Type, TypeMap } from "#types";
import { Resolution } from "#resolver";

import { Error as TypeError, ErrorCode } from "./errors.js";

/**
 * What typechecking learns about a program, keyed by node id
 */
export interface Typing {
  /**
   * Type of every expression
   */
  types: TypeMap;
  /**
   * Type arguments chosen for each application of a polymorphic function,
   * procedure or map, in type parameter order
   */
  instantiations: Map<Ast.Id, Type[]>;
}

export namespace Typing {
  export function create(): Typing {
    return { types: new Map(), instantiations: new Map() };
  }
}

/**
 * State of one typechecking run: the resolution it reads, the typing it
 * fills in, the errors found so far and the modifies frame of the
 * implementation being checked
 */
export class TypecheckingContext implements ErrorSink {
  private readonly errors: TypeError[] = [];

  // globals the enclosing procedure may modify; null outside of bodies
  private frameVariables: Set<Ast.Declaration.Variable> | null = null;

  constructor(
    readonly resolution: Resolution,
    readonly typing: Typing = Typing.create(),
  ) {}

  get errorCount(): number {
    return this.errors.length;
  }

  error(
    location: Ast.SourceLocation | null,
    message: string,
    code: ErrorCode = ErrorCode.ARGUMENT_TYPE,
  ): void {
    this.errors.push(new TypeError(message, location ?? undefined, code));
  }

  get diagnostics(): TypeError[] {
    return [...this.errors];
  }

  /**
   * Check `check` with the modifies list of `procedure` as frame
   */
  withFrame(procedure: Ast.Declaration.Procedure, check: () => void): void {
    const previous = this.frameVariables;
    this.frameVariables = new Set(
      procedure.modifies.map((identifier) =>
        Resolution.variableOf(this.resolution, identifier),
      ),
    );
    try {
      check();
    } finally {
      this.frameVariables = previous;
    }
  }

  /**
   * Whether commands in the current body may modify `variable`. Only
   * globals are restricted.
   */
  inFrame(variable: Ast.Declaration.Variable): boolean {
    if (variable.kind !== "global" || this.frameVariables === null) {
      return true;
    }
    return this.frameVariables.has(variable);
  }
}
