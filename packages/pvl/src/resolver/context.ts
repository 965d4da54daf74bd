import type * as Ast from "#ast";
import { Type } from "#types";
import { Severity } from "#result";

import { Error as ResolveError, ErrorCode, ErrorMessages } from "./errors.js";
import { ScopeStack } from "./scopes.js";

/**
 * Which program states an expression may refer to
 */
export enum StateMode {
  // axioms and function bodies: no variables with state at all
  Stateless = "stateless",
  // preconditions, where clauses
  Single = "single",
  // postconditions and implementation bodies, where `old` is allowed
  Two = "two",
}

type TypeEntry =
  | { kind: "constructor"; declaration: Ast.Declaration.TypeConstructor }
  | {
      kind: "synonym";
      declaration: Ast.Declaration.TypeSynonym;
      definition: Type.SynonymDefinition | null;
    };

export type Callable = Ast.Declaration.Function | Ast.Declaration.Procedure;

/**
 * Environment for name resolution.
 *
 * Types and callables live in flat program-wide namespaces. Variables live
 * in a stack of scopes whose bottom scope holds the globals; type binders
 * in a list that callers truncate back to a saved `typeBinderState`; block
 * labels in a scope per implementation.
 *
 * A second declaration of a name within one scope is reported and then
 * replaces the first; inner scopes shadow outer ones silently.
 */
export class ResolutionContext implements Type.Scope {
  private readonly types = new Map<string, TypeEntry>();
  private readonly callables = new Map<string, Callable>();
  private readonly variables = new ScopeStack<Ast.Declaration.Variable>();
  private readonly labels = new ScopeStack<Ast.Block>(false);
  private typeBinders: Type.Variable[] = [];

  private errors: ResolveError[] = [];
  private warnings: ResolveError[] = [];

  stateMode: StateMode = StateMode.Single;

  // Diagnostics

  get errorCount(): number {
    return this.errors.length;
  }

  /**
   * Roll back to an earlier error count, forgetting later errors
   */
  set errorCount(count: number) {
    this.errors.length = Math.min(count, this.errors.length);
  }

  error(
    location: Ast.SourceLocation | null,
    message: string,
    code: ErrorCode = ErrorCode.TYPE_RESOLUTION,
  ): void {
    this.errors.push(new ResolveError(message, location ?? undefined, code));
  }

  warning(
    location: Ast.SourceLocation | null,
    message: string,
    code: ErrorCode,
  ): void {
    this.warnings.push(
      new ResolveError(message, location ?? undefined, code, Severity.Warning),
    );
  }

  get diagnostics(): { errors: ResolveError[]; warnings: ResolveError[] } {
    return { errors: [...this.errors], warnings: [...this.warnings] };
  }

  // Types

  addType(
    declaration: Ast.Declaration.TypeConstructor | Ast.Declaration.TypeSynonym,
  ): void {
    if (this.types.has(declaration.name)) {
      this.error(
        declaration.loc,
        ErrorMessages.DUPLICATE_TYPE(declaration.name),
        ErrorCode.DUPLICATE_TYPE,
      );
    }
    this.types.set(
      declaration.name,
      declaration.kind === "type-constructor"
        ? { kind: "constructor", declaration }
        : { kind: "synonym", declaration, definition: null },
    );
  }

  lookUpType(name: string): Ast.Declaration.TypeConstructor | null {
    const entry = this.types.get(name);
    return entry?.kind === "constructor" ? entry.declaration : null;
  }

  lookUpTypeSynonymDeclaration(
    name: string,
  ): Ast.Declaration.TypeSynonym | null {
    const entry = this.types.get(name);
    return entry?.kind === "synonym" ? entry.declaration : null;
  }

  lookUpTypeSynonym(name: string): Type.SynonymDefinition | null {
    const entry = this.types.get(name);
    return entry?.kind === "synonym" ? entry.definition : null;
  }

  /**
   * Record the resolved body of a synonym; later uses expand to it
   */
  defineTypeSynonym(
    declaration: Ast.Declaration.TypeSynonym,
    body: Type,
  ): Type.SynonymDefinition {
    const definition: Type.SynonymDefinition = {
      name: declaration.name,
      typeParameters: declaration.typeParameters,
      body,
    };
    const entry = this.types.get(declaration.name);
    if (entry?.kind === "synonym" && entry.declaration === declaration) {
      entry.definition = definition;
    }
    return definition;
  }

  // Functions and procedures

  addCallable(declaration: Callable): void {
    if (this.callables.has(declaration.name)) {
      this.error(
        declaration.loc,
        ErrorMessages.DUPLICATE_PROCEDURE(declaration.name),
        ErrorCode.DUPLICATE_PROCEDURE,
      );
    }
    this.callables.set(declaration.name, declaration);
  }

  lookUpProcedure(name: string): Callable | null {
    return this.callables.get(name) ?? null;
  }

  // Variables

  pushVarContext(): void {
    this.variables.enterScope();
  }

  popVarContext(): void {
    this.variables.exitScope();
  }

  addVariable(variable: Ast.Declaration.Variable, global = false): void {
    if (this.variables.define(variable.name, variable, global)) {
      this.error(
        variable.loc,
        ErrorMessages.DUPLICATE_VARIABLE(variable.name),
        ErrorCode.DUPLICATE_VARIABLE,
      );
    }
  }

  lookUpVariable(name: string): Ast.Declaration.Variable | null {
    return this.variables.lookup(name) ?? null;
  }

  // Type binders

  get typeBinderState(): number {
    return this.typeBinders.length;
  }

  set typeBinderState(state: number) {
    this.typeBinders = this.typeBinders.slice(0, state);
  }

  addTypeBinder(variable: Type.Variable): void {
    this.typeBinders.push(variable);
  }

  lookUpTypeBinder(name: string): Type.Variable | null {
    for (let i = this.typeBinders.length - 1; i >= 0; i--) {
      if (this.typeBinders[i].name === name) {
        return this.typeBinders[i];
      }
    }
    return null;
  }

  // Block labels

  pushProcedureContext(): void {
    this.labels.enterScope();
  }

  popProcedureContext(): void {
    this.labels.exitScope();
  }

  addBlock(block: Ast.Block): void {
    if (this.labels.define(block.label, block)) {
      this.error(
        block.loc,
        ErrorMessages.DUPLICATE_BLOCK(block.label),
        ErrorCode.DUPLICATE_BLOCK,
      );
    }
  }

  lookUpBlock(label: string): Ast.Block | null {
    return this.labels.lookup(label) ?? null;
  }
}
