/**
 * Type model for PVL
 *
 * Types are immutable values, except for proxies: placeholders introduced
 * during inference that are defined at most once by unification. Proxies
 * form a union-find forest; `Type.follow` finds the representative of a
 * proxy's class (compressing paths on the way) and returns what the class is
 * bound to, if anything.
 */

import type { SourceLocation } from "#ast";
import { invariant } from "#errors";

export interface Type {
  readonly kind: Type.Kind;

  toString(): string;

  /**
   * Textual form; parenthesised when the type binds weaker than
   * `contextBindingStrength` requires
   */
  emit(contextBindingStrength: number): string;

  /**
   * Structural equality up to renaming of bound type variables
   */
  equals(other: Type): boolean;
  equalsUnder(
    other: Type,
    thisBound: Type.Variable[],
    otherBound: Type.Variable[],
  ): boolean;

  /**
   * Make this type and `other` equal by defining proxies and, for the
   * variables in `unifiable`, extending the idempotent substitution
   * `unifier`. Returns false when impossible; partial constraints may have
   * been added in that case.
   */
  unify(
    other: Type,
    unifiable?: readonly Type.Variable[],
    unifier?: Type.Substitution,
  ): boolean;

  substitute(substitution: Type.Substitution): Type;

  /**
   * Free type variables, in order of first occurrence
   */
  readonly freeVariables: Type.Variable[];
  readonly freeProxies: Type.Proxy[];

  /**
   * The type with synonym annotations removed at the top
   */
  readonly expanded: Type;

  resolveType(scope: Type.Scope): Type;
}

export namespace Type {
  export type Kind =
    | "basic"
    | "bv"
    | "variable"
    | "ctor"
    | "map"
    | "synonym"
    | "unresolved"
    | Type.Proxy.Kind;

  export type Substitution = globalThis.Map<Type.Variable, Type>;

  /**
   * What a type needs from name resolution
   */
  export interface Scope {
    lookUpTypeBinder(name: string): Type.Variable | null;
    lookUpType(name: string): Type.ConstructorDeclaration | null;
    lookUpTypeSynonym(name: string): Type.SynonymDefinition | null;
    typeBinderState: number;
    addTypeBinder(variable: Type.Variable): void;
    error(location: SourceLocation | null, message: string): void;
  }

  export interface ConstructorDeclaration {
    readonly id: string;
    readonly name: string;
    readonly arity: number;
  }

  /**
   * A type synonym together with its resolved body
   */
  export interface SynonymDefinition {
    readonly name: string;
    readonly typeParameters: Type.Variable[];
    readonly body: Type;
  }

  abstract class Base {
    abstract readonly kind: Type.Kind;

    abstract emit(contextBindingStrength: number): string;

    abstract equalsUnder(
      other: Type,
      thisBound: Type.Variable[],
      otherBound: Type.Variable[],
    ): boolean;

    toString(): string {
      return this.emit(0);
    }

    equals(this: Type, other: Type): boolean {
      return this === other || this.equalsUnder(other, [], []);
    }

    get expanded(): Type {
      return this.self();
    }

    protected abstract self(): Type;
  }

  // Basic types

  export class Basic extends Base implements Type {
    readonly kind = "basic";

    constructor(public readonly name: "int" | "bool") {
      super();
    }

    protected self(): Type {
      return this;
    }

    emit(): string {
      return this.name;
    }

    equalsUnder(other: Type): boolean {
      const that = follow(other.expanded);
      return that instanceof Basic && that.name === this.name;
    }

    unify(
      other: Type,
      unifiable: readonly Type.Variable[] = [],
      unifier: Type.Substitution = new globalThis.Map(),
    ): boolean {
      const that = other.expanded;
      if (that instanceof Proxy || that instanceof Variable) {
        return that.unify(this, unifiable, unifier);
      }
      return this.equals(that);
    }

    substitute(): Type {
      return this;
    }

    get freeVariables(): Type.Variable[] {
      return [];
    }

    get freeProxies(): Type.Proxy[] {
      return [];
    }

    resolveType(): Type {
      return this;
    }
  }

  export const int = new Basic("int");
  export const bool = new Basic("bool");

  // Bitvectors

  export class Bv extends Base implements Type {
    readonly kind = "bv";

    constructor(public readonly bits: number) {
      super();
    }

    protected self(): Type {
      return this;
    }

    emit(): string {
      return `bv${this.bits}`;
    }

    equalsUnder(other: Type): boolean {
      const that = follow(other.expanded);
      return that instanceof Bv && that.bits === this.bits;
    }

    unify(
      other: Type,
      unifiable: readonly Type.Variable[] = [],
      unifier: Type.Substitution = new globalThis.Map(),
    ): boolean {
      const that = other.expanded;
      if (that instanceof Proxy || that instanceof Variable) {
        return that.unify(this, unifiable, unifier);
      }
      return this.equals(that);
    }

    substitute(): Type {
      return this;
    }

    get freeVariables(): Type.Variable[] {
      return [];
    }

    get freeProxies(): Type.Proxy[] {
      return [];
    }

    resolveType(): Type {
      return this;
    }
  }

  const bvCache: Bv[] = [];

  /**
   * Bitvector type of the given width; narrow widths are interned
   */
  export function bv(bits: number): Bv {
    if (bits >= 128) {
      return new Bv(bits);
    }
    const cached = bvCache[bits];
    if (cached) {
      return cached;
    }
    const created = new Bv(bits);
    bvCache[bits] = created;
    return created;
  }

  // Type variables

  export class Variable extends Base implements Type {
    readonly kind = "variable";

    constructor(public readonly name: string) {
      super();
    }

    protected self(): Type {
      return this;
    }

    emit(): string {
      return this.name;
    }

    equalsUnder(
      other: Type,
      thisBound: Type.Variable[],
      otherBound: Type.Variable[],
    ): boolean {
      const that = follow(other.expanded);
      if (!(that instanceof Variable)) {
        return false;
      }
      const thisIndex = thisBound.lastIndexOf(this);
      const thatIndex = otherBound.lastIndexOf(that);
      return (
        (thisIndex >= 0 && thisIndex === thatIndex) ||
        (thisIndex === -1 && thatIndex === -1 && this === that)
      );
    }

    unify(
      other: Type,
      unifiable: readonly Type.Variable[] = [],
      unifier: Type.Substitution = new globalThis.Map(),
    ): boolean {
      const that = other.expanded;
      if (that instanceof Proxy && !that.isConstrained) {
        return that.unify(this, unifiable, unifier);
      }

      if (this.equals(that)) {
        return true;
      }

      if (unifiable.includes(this)) {
        const previous = unifier.get(this);
        if (previous === undefined) {
          return this.addSubstitution(unifier, that);
        }
        // the old instantiation has to agree with the new one
        return previous.unify(that, unifiable, unifier);
      }

      // this cannot be instantiated, but that possibly can
      return (
        that instanceof Variable &&
        unifiable.includes(that) &&
        that.unify(this, unifiable, unifier)
      );
    }

    private addSubstitution(
      unifier: Type.Substitution,
      instance: Type,
    ): boolean {
      const substituted = instance.substitute(unifier);
      // occurs check
      if (substituted.freeVariables.includes(this)) {
        return false;
      }

      // keep the substitution idempotent
      const mapping: Type.Substitution = new globalThis.Map([
        [this, substituted],
      ]);
      for (const [variable, type] of unifier) {
        unifier.set(variable, type.substitute(mapping));
      }
      unifier.set(this, substituted);
      return true;
    }

    substitute(substitution: Type.Substitution): Type {
      return substitution.get(this) ?? this;
    }

    get freeVariables(): Type.Variable[] {
      return [this];
    }

    get freeProxies(): Type.Proxy[] {
      return [];
    }

    resolveType(): Type {
      return this;
    }
  }

  // Unresolved type names, as produced by the parser

  export class Unresolved extends Base implements Type {
    readonly kind = "unresolved";

    constructor(
      public readonly name: string,
      public readonly args: Type[] = [],
      public readonly loc: SourceLocation | null = null,
    ) {
      super();
    }

    protected self(): Type {
      return this;
    }

    emit(contextBindingStrength: number): string {
      return emitConstructorApplication(
        this.name,
        this.args,
        contextBindingStrength,
      );
    }

    // unresolved names are never equal to anything, not even themselves
    equalsUnder(): boolean {
      return false;
    }

    unify(
      _other: Type,
      _unifiable?: readonly Type.Variable[],
      _unifier?: Type.Substitution,
    ): boolean {
      return false;
    }

    substitute(): Type {
      return this;
    }

    get freeVariables(): Type.Variable[] {
      return [];
    }

    get freeProxies(): Type.Proxy[] {
      return [];
    }

    resolveType(scope: Type.Scope): Type {
      const bits = /^bv(\d+)$/.exec(this.name);
      if (bits) {
        if (this.args.length > 0) {
          scope.error(
            this.loc,
            `bitvector types must not be applied to arguments: ${this.name}`,
          );
        }
        return bv(Number(bits[1]));
      }

      const binder = scope.lookUpTypeBinder(this.name);
      if (binder) {
        if (this.args.length > 0) {
          scope.error(
            this.loc,
            `type variables must not be applied to arguments: ${binder.name}`,
          );
        }
        return binder;
      }

      const constructor = scope.lookUpType(this.name);
      if (constructor) {
        if (this.args.length !== constructor.arity) {
          scope.error(
            this.loc,
            `type constructor received wrong number of arguments: ${constructor.name}`,
          );
          return this;
        }
        return new Ctor(
          constructor,
          this.args.map((arg) => arg.resolveType(scope)),
        );
      }

      const synonym = scope.lookUpTypeSynonym(this.name);
      if (synonym) {
        if (this.args.length !== synonym.typeParameters.length) {
          scope.error(
            this.loc,
            `type synonym received wrong number of arguments: ${synonym.name}`,
          );
          return this;
        }
        return new Synonym(
          synonym,
          this.args.map((arg) => arg.resolveType(scope)),
        );
      }

      scope.error(this.loc, `undeclared type: ${this.name}`);
      return this;
    }
  }

  // Applied type constructors

  export class Ctor extends Base implements Type {
    readonly kind = "ctor";

    constructor(
      public readonly declaration: Type.ConstructorDeclaration,
      public readonly args: Type[],
    ) {
      super();
      invariant(
        args.length === declaration.arity,
        `type constructor ${declaration.name} expects ${declaration.arity} arguments`,
      );
    }

    protected self(): Type {
      return this;
    }

    emit(contextBindingStrength: number): string {
      return emitConstructorApplication(
        this.declaration.name,
        this.args,
        contextBindingStrength,
      );
    }

    equalsUnder(
      other: Type,
      thisBound: Type.Variable[],
      otherBound: Type.Variable[],
    ): boolean {
      const that = follow(other.expanded);
      return (
        that instanceof Ctor &&
        that.declaration === this.declaration &&
        this.args.every((arg, i) =>
          arg.equalsUnder(that.args[i], thisBound, otherBound),
        )
      );
    }

    unify(
      other: Type,
      unifiable: readonly Type.Variable[] = [],
      unifier: Type.Substitution = new globalThis.Map(),
    ): boolean {
      const that = other.expanded;
      if (that instanceof Proxy || that instanceof Variable) {
        return that.unify(this, unifiable, unifier);
      }
      if (!(that instanceof Ctor) || that.declaration !== this.declaration) {
        return false;
      }
      // unify every argument even after a failure, to collect constraints
      let good = true;
      this.args.forEach((arg, i) => {
        good = arg.unify(that.args[i], unifiable, unifier) && good;
      });
      return good;
    }

    substitute(substitution: Type.Substitution): Type {
      if (substitution.size === 0) {
        return this;
      }
      return new Ctor(
        this.declaration,
        this.args.map((arg) => arg.substitute(substitution)),
      );
    }

    get freeVariables(): Type.Variable[] {
      return freeVariablesIn(this.args);
    }

    get freeProxies(): Type.Proxy[] {
      return freeProxiesIn(this.args);
    }

    resolveType(scope: Type.Scope): Type {
      return new Ctor(
        this.declaration,
        this.args.map((arg) => arg.resolveType(scope)),
      );
    }
  }

  // Polymorphic maps: <a>[a, int]bool

  export class Map extends Base implements Type {
    readonly kind = "map";

    constructor(
      public readonly typeParameters: Type.Variable[],
      public readonly args: Type[],
      public readonly result: Type,
      public readonly loc: SourceLocation | null = null,
    ) {
      super();
    }

    get arity(): number {
      return this.args.length;
    }

    protected self(): Type {
      return this;
    }

    emit(contextBindingStrength: number): string {
      const opBindingStrength = 1;
      const typeParameters = this.typeParameters.length
        ? `<${this.typeParameters.map((v) => v.emit()).join(", ")}>`
        : "";
      const text = `${typeParameters}[${this.args
        .map((arg) => arg.emit(0))
        .join(", ")}]${this.result.emit(0)}`;
      return opBindingStrength < contextBindingStrength ? `(${text})` : text;
    }

    equalsUnder(
      other: Type,
      thisBound: Type.Variable[],
      otherBound: Type.Variable[],
    ): boolean {
      const that = follow(other.expanded);
      if (
        !(that instanceof Map) ||
        this.typeParameters.length !== that.typeParameters.length ||
        this.args.length !== that.args.length
      ) {
        return false;
      }

      thisBound.push(...this.typeParameters);
      otherBound.push(...that.typeParameters);
      try {
        return (
          this.args.every((arg, i) =>
            arg.equalsUnder(that.args[i], thisBound, otherBound),
          ) && this.result.equalsUnder(that.result, thisBound, otherBound)
        );
      } finally {
        thisBound.length -= this.typeParameters.length;
        otherBound.length -= that.typeParameters.length;
      }
    }

    unify(
      other: Type,
      unifiable: readonly Type.Variable[] = [],
      unifier: Type.Substitution = new globalThis.Map(),
    ): boolean {
      const that = other.expanded;
      if (that instanceof Proxy || that instanceof Variable) {
        return that.unify(this, unifiable, unifier);
      }
      if (
        !(that instanceof Map) ||
        this.typeParameters.length !== that.typeParameters.length ||
        this.args.length !== that.args.length
      ) {
        return false;
      }

      // rename the binders of both sides to shared fresh variables
      const thisRenaming: Type.Substitution = new globalThis.Map();
      const thatRenaming: Type.Substitution = new globalThis.Map();
      const fresh: Type.Variable[] = this.typeParameters.map((parameter, i) => {
        const variable = new Variable(parameter.name);
        thisRenaming.set(parameter, variable);
        thatRenaming.set(that.typeParameters[i], variable);
        return variable;
      });

      let good = true;
      this.args.forEach((arg, i) => {
        const left = arg.substitute(thisRenaming);
        const right = that.args[i].substitute(thatRenaming);
        good = left.unify(right, unifiable, unifier) && good;
      });
      const left = this.result.substitute(thisRenaming);
      const right = that.result.substitute(thatRenaming);
      good = left.unify(right, unifiable, unifier) && good;

      if (good && fresh.length > 0) {
        const escaped = (type: Type) =>
          type.freeVariables.some((variable) => fresh.includes(variable));
        if (escaped(this) || escaped(that)) {
          return false;
        }
        for (const type of unifier.values()) {
          if (escaped(type)) {
            return false;
          }
        }
      }

      return good;
    }

    private collisionsPossible(substitution: Type.Substitution): boolean {
      return this.typeParameters.some(
        (parameter) =>
          substitution.has(parameter) ||
          [...substitution.values()].some((type) =>
            type.freeVariables.includes(parameter),
          ),
      );
    }

    /**
     * Alpha-renamed copy with fresh binders
     */
    private withFreshBinders(): Map {
      const renaming: Type.Substitution = new globalThis.Map();
      const typeParameters = this.typeParameters.map((parameter) => {
        const variable = new Variable(parameter.name);
        renaming.set(parameter, variable);
        return variable;
      });
      return new Map(
        typeParameters,
        this.args.map((arg) => arg.substitute(renaming)),
        this.result.substitute(renaming),
        this.loc,
      );
    }

    substitute(substitution: Type.Substitution): Type {
      if (substitution.size === 0) {
        return this;
      }
      if (this.collisionsPossible(substitution)) {
        return this.withFreshBinders().substitute(substitution);
      }
      return new Map(
        this.typeParameters,
        this.args.map((arg) => arg.substitute(substitution)),
        this.result.substitute(substitution),
        this.loc,
      );
    }

    get freeVariables(): Type.Variable[] {
      return freeVariablesIn([...this.args, this.result]).filter(
        (variable) => !this.typeParameters.includes(variable),
      );
    }

    get freeProxies(): Type.Proxy[] {
      return freeProxiesIn([...this.args, this.result]);
    }

    resolveType(scope: Type.Scope): Type {
      const previousState = scope.typeBinderState;
      try {
        for (const parameter of this.typeParameters) {
          scope.addTypeBinder(parameter);
        }
        const args = this.args.map((arg) => arg.resolveType(scope));
        const result = this.result.resolveType(scope);

        checkBoundVariableOccurrences(
          this.typeParameters,
          args,
          [result],
          "map arguments",
          scope,
          this.loc,
        );

        return new Map(
          sortTypeParameters(this.typeParameters, args, result),
          args,
          result,
          this.loc,
        );
      } finally {
        scope.typeBinderState = previousState;
      }
    }
  }

  // Uses of type synonyms, kept to print the synonym name

  export class Synonym extends Base implements Type {
    readonly kind = "synonym";
    readonly expansion: Type;

    constructor(
      public readonly definition: Type.SynonymDefinition,
      public readonly args: Type[],
      expansion?: Type,
    ) {
      super();
      this.expansion =
        expansion ??
        definition.body.substitute(
          new globalThis.Map(
            definition.typeParameters.map(
              (parameter, i): [Type.Variable, Type] => [parameter, args[i]],
            ),
          ),
        );
    }

    protected self(): Type {
      return this.expansion.expanded;
    }

    emit(contextBindingStrength: number): string {
      return emitConstructorApplication(
        this.definition.name,
        this.args,
        contextBindingStrength,
      );
    }

    equalsUnder(
      other: Type,
      thisBound: Type.Variable[],
      otherBound: Type.Variable[],
    ): boolean {
      return this.expansion.equalsUnder(other, thisBound, otherBound);
    }

    unify(
      other: Type,
      unifiable: readonly Type.Variable[] = [],
      unifier: Type.Substitution = new globalThis.Map(),
    ): boolean {
      return this.expansion.unify(other, unifiable, unifier);
    }

    substitute(substitution: Type.Substitution): Type {
      if (substitution.size === 0) {
        return this;
      }
      return new Synonym(
        this.definition,
        this.args.map((arg) => arg.substitute(substitution)),
        this.expansion.substitute(substitution),
      );
    }

    get freeVariables(): Type.Variable[] {
      return this.expansion.freeVariables;
    }

    get freeProxies(): Type.Proxy[] {
      return this.expansion.freeProxies;
    }

    resolveType(scope: Type.Scope): Type {
      return new Synonym(
        this.definition,
        this.args.map((arg) => arg.resolveType(scope)),
      );
    }
  }

  // Proxies

  let proxyCount = 0;

  export class Proxy extends Base implements Type {
    readonly kind: Type.Proxy.Kind;
    readonly name: string;

    // union-find parent; null at the representative of a class
    private parent: Proxy | null = null;
    // what the class is bound to; only set on representatives
    private binding: Type | null = null;

    constructor(givenName: string, kind: Type.Proxy.Kind = "proxy") {
      super();
      this.kind = kind;
      this.name = `${givenName}$${kind}#${proxyCount}`;
      proxyCount += 1;
    }

    get isConstrained(): boolean {
      return false;
    }

    private representative(): Proxy {
      let root: Proxy = this;
      while (root.parent) {
        root = root.parent;
      }
      let node: Proxy = this;
      while (node.parent) {
        const next: Proxy = node.parent;
        node.parent = root;
        node = next;
      }
      return root;
    }

    /**
     * The type this proxy currently stands for: a bound non-proxy type, the
     * unbound representative of its class, or null when it is itself the
     * unbound representative
     */
    get target(): Type | null {
      const root = this.representative();
      if (root.binding) {
        return root.binding;
      }
      return root === this ? null : root;
    }

    protected self(): Type {
      return this;
    }

    protected define(type: Type): void {
      invariant(this.target === null, `proxy ${this.name} is already defined`);
      const leaf = follow(type);
      if (leaf instanceof Proxy) {
        if (leaf !== this) {
          this.parent = leaf;
        }
        return;
      }
      this.binding = leaf;
    }

    /**
     * Whether binding this proxy to `type` would build a cyclic type
     */
    protected reallyOccursIn(type: Type): boolean {
      const that = follow(type.expanded);
      return (
        that.freeProxies.includes(this) &&
        (that instanceof Ctor ||
          (that instanceof Map && this.target !== that))
      );
    }

    emit(contextBindingStrength: number): string {
      const target = this.target;
      return target ? target.emit(contextBindingStrength) : this.name;
    }

    equalsUnder(
      other: Type,
      thisBound: Type.Variable[],
      otherBound: Type.Variable[],
    ): boolean {
      if (this === other) {
        return true;
      }
      const target = this.target;
      // an unbound proxy could be made equal to anything
      return target ? target.equalsUnder(other, thisBound, otherBound) : false;
    }

    unify(
      other: Type,
      unifiable: readonly Type.Variable[] = [],
      unifier: Type.Substitution = new globalThis.Map(),
    ): boolean {
      const target = this.target;
      if (target) {
        return target.unify(other, unifiable, unifier);
      }
      if (this.reallyOccursIn(other)) {
        return false;
      }
      this.define(other.expanded);
      return true;
    }

    substitute(substitution: Type.Substitution): Type {
      const target = this.target;
      return target ? target.substitute(substitution) : this;
    }

    get freeVariables(): Type.Variable[] {
      const target = this.target;
      return target ? target.freeVariables : [];
    }

    get freeProxies(): Type.Proxy[] {
      const target = this.target;
      return target ? target.freeProxies : [this];
    }

    resolveType(scope: Type.Scope): Type {
      const target = this.target;
      return target ? target.resolveType(scope) : this;
    }
  }

  export namespace Proxy {
    export type Kind = "proxy" | "bv-proxy" | "map-proxy";
  }

  interface BvConstraint {
    readonly first: Type;
    readonly second: Type;
  }

  /**
   * A bitvector of unknown width. The width is at least `minBits`, and for
   * every constraint the widths of `first` and `second` add up to it.
   */
  export class BvProxy extends Proxy {
    readonly minBits: number;
    private readonly constraints: readonly BvConstraint[];

    constructor(
      givenName: string,
      minBits: number,
      constraints: readonly BvConstraint[] = [],
    ) {
      super(givenName, "bv-proxy");
      this.minBits = minBits;
      this.constraints = constraints;
    }

    /**
     * Type of the concatenation of two bitvectors
     */
    static concatenation(
      givenName: string,
      first: Type,
      second: Type,
    ): BvProxy {
      const left = follow(first);
      const right = follow(second);
      return new BvProxy(givenName, minBitsFor(left) + minBitsFor(right), [
        { first: left, second: right },
      ]);
    }

    override get isConstrained(): boolean {
      return true;
    }

    get bits(): number {
      const target = this.target;
      return target ? bvBits(target) : this.minBits;
    }

    override unify(
      other: Type,
      unifiable: readonly Type.Variable[] = [],
      unifier: Type.Substitution = new globalThis.Map(),
    ): boolean {
      const target = this.target;
      if (target) {
        return target.unify(other, unifiable, unifier);
      }

      const that = follow(other.expanded);
      if (this.reallyOccursIn(that)) {
        return false;
      }
      if (that instanceof Variable && unifiable.includes(that)) {
        return that.unify(this, unifiable, unifier);
      }

      if (that === this) {
        return true;
      }
      if (that instanceof Bv) {
        if (this.minBits > that.bits) {
          return false;
        }
        for (const { first, second } of this.constraints) {
          const minSecond = minBitsFor(second);
          let left = increaseBits(first, that.bits - minSecond);
          left = increaseBits(second, minSecond + left);
          invariant(left === 0, "bitvector width constraint is unsatisfiable");
        }
        this.define(that);
        return true;
      }
      if (that instanceof BvProxy) {
        if (this.constraints.length > 0 || that.constraints.length > 0) {
          // both collapse into a proxy carrying all constraints
          const merged = new BvProxy(
            this.name,
            Math.max(this.minBits, that.minBits),
            [...this.constraints, ...that.constraints],
          );
          this.define(merged);
          that.define(merged);
        } else if (this.minBits <= that.minBits) {
          this.define(that);
        } else {
          that.define(this);
        }
        return true;
      }
      if (that instanceof Proxy) {
        // only bitvector proxies unify with a bitvector proxy
        return that.isConstrained ? false : that.unify(this, unifiable, unifier);
      }
      return false;
    }

    /**
     * Constrain this open proxy to at least `minBits` bits
     */
    widen(minBits: number): void {
      this.define(new BvProxy(this.name, minBits, this.constraints));
    }
  }

  function minBitsFor(type: Type): number {
    const leaf = follow(type);
    if (leaf instanceof Bv) {
      return leaf.bits;
    }
    invariant(leaf instanceof BvProxy, `${leaf} is not a bitvector type`);
    return leaf.minBits;
  }

  /**
   * Raise the width of `type` to `to` bits if it is still open. Returns the
   * bits that could not be absorbed.
   */
  function increaseBits(type: Type, to: number): number {
    const leaf = follow(type);
    if (leaf instanceof Bv) {
      return to - leaf.bits;
    }
    invariant(leaf instanceof BvProxy, `${leaf} is not a bitvector type`);
    invariant(leaf.minBits <= to, "bitvector proxy cannot shrink");
    if (leaf.minBits < to) {
      leaf.widen(to);
    }
    return 0;
  }

  /**
   * A use of a map as `m[args]` with the given result type
   */
  export interface MapConstraint {
    readonly args: Type[];
    readonly result: Type;
  }

  function unifyConstraint(
    constraint: MapConstraint,
    map: Type.Map,
    unifiable: readonly Type.Variable[],
    unifier: Type.Substitution,
  ): boolean {
    const instantiation: Type.Substitution = new globalThis.Map(
      map.typeParameters.map((parameter): [Type.Variable, Type] => [
        parameter,
        new Proxy(parameter.name),
      ]),
    );
    let good = true;
    map.args.forEach((arg, i) => {
      good =
        arg
          .substitute(instantiation)
          .unify(constraint.args[i], unifiable, unifier) && good;
    });
    good =
      map.result
        .substitute(instantiation)
        .unify(constraint.result, unifiable, unifier) && good;
    return good;
  }

  /**
   * A map type of known arity whose shape is only known through the
   * selections and updates applied to it
   */
  export class MapProxy extends Proxy {
    private readonly constraints: MapConstraint[] = [];

    constructor(
      givenName: string,
      public readonly arity: number,
    ) {
      super(givenName, "map-proxy");
    }

    override get isConstrained(): boolean {
      return true;
    }

    addConstraint(constraint: MapConstraint): void {
      invariant(
        constraint.args.length === this.arity,
        "map constraint has the wrong arity",
      );
      const target = this.target;
      if (target instanceof Map) {
        const success = unifyConstraint(
          constraint,
          target,
          [],
          new globalThis.Map(),
        );
        invariant(success, `map constraint does not fit ${target}`);
        return;
      }
      if (target instanceof MapProxy) {
        target.addConstraint(constraint);
        return;
      }
      invariant(target === null, `map proxy resolved to ${target}`);
      this.constraints.push(constraint);
    }

    override emit(contextBindingStrength: number): string {
      const target = this.target;
      if (target) {
        return target.emit(contextBindingStrength);
      }
      return `[${Array.from({ length: this.arity }, () => "?").join(", ")}]?`;
    }

    override unify(
      other: Type,
      unifiable: readonly Type.Variable[] = [],
      unifier: Type.Substitution = new globalThis.Map(),
    ): boolean {
      const target = this.target;
      if (target) {
        return target.unify(other, unifiable, unifier);
      }

      const that = follow(other.expanded);
      if (this.reallyOccursIn(that)) {
        return false;
      }
      if (that instanceof Variable && unifiable.includes(that)) {
        return that.unify(this, unifiable, unifier);
      }

      if (that === this) {
        return true;
      }
      if (that instanceof Map) {
        if (that.arity !== this.arity) {
          return false;
        }
        let good = true;
        for (const constraint of this.constraints) {
          good = unifyConstraint(constraint, that, unifiable, unifier) && good;
        }
        if (good) {
          this.define(that);
        }
        return good;
      }
      if (that instanceof MapProxy) {
        if (that.arity !== this.arity) {
          return false;
        }
        // the surviving proxy inherits our constraints
        for (const constraint of this.constraints) {
          that.addConstraint(constraint);
        }
        this.define(that);
        return true;
      }
      if (that instanceof Proxy) {
        // only map proxies unify with a map proxy
        return that.isConstrained ? false : that.unify(this, unifiable, unifier);
      }
      return false;
    }
  }

  // Queries that look through synonyms and defined proxies

  /**
   * Follow a proxy to what it stands for; other types are returned as is
   */
  export function follow(type: Type): Type {
    if (type instanceof Proxy) {
      return type.target ?? type;
    }
    return type;
  }

  export function head(type: Type): Type {
    return follow(type.expanded);
  }

  export const isBool = (type: Type): boolean => head(type) === bool;
  export const isVariable = (type: Type): boolean =>
    head(type) instanceof Variable;

  export function isBv(type: Type): boolean {
    const h = head(type);
    return h instanceof Bv || h instanceof BvProxy;
  }

  export function bvBits(type: Type): number {
    const h = head(type);
    if (h instanceof Bv) {
      return h.bits;
    }
    invariant(h instanceof BvProxy, `${type} is not a bitvector type`);
    return h.minBits;
  }

  export function isMap(type: Type): boolean {
    const h = head(type);
    return h instanceof Map || h instanceof MapProxy;
  }

  export function mapArity(type: Type): number {
    const h = head(type);
    if (h instanceof Map) {
      return h.arity;
    }
    invariant(h instanceof MapProxy, `${type} is not a map type`);
    return h.arity;
  }

  /**
   * Copy of `type` in which every defined proxy is replaced by what it
   * stands for; unbound proxies are kept
   */
  export function normalize(type: Type): Type {
    if (type instanceof Proxy) {
      const target = type.target;
      return target ? normalize(target) : type;
    }
    if (type instanceof Ctor) {
      return new Ctor(type.declaration, type.args.map(normalize));
    }
    if (type instanceof Map) {
      return new Map(
        type.typeParameters,
        type.args.map(normalize),
        normalize(type.result),
        type.loc,
      );
    }
    if (type instanceof Synonym) {
      return new Synonym(
        type.definition,
        type.args.map(normalize),
        normalize(type.expansion),
      );
    }
    return type;
  }

  // Helpers over type lists

  export function freeVariablesIn(types: readonly Type[]): Type.Variable[] {
    const variables: Type.Variable[] = [];
    for (const type of types) {
      for (const variable of type.freeVariables) {
        if (!variables.includes(variable)) {
          variables.push(variable);
        }
      }
    }
    return variables;
  }

  export function freeProxiesIn(types: readonly Type[]): Type.Proxy[] {
    const proxies: Type.Proxy[] = [];
    for (const type of types) {
      for (const proxy of type.freeProxies) {
        if (!proxies.includes(proxy)) {
          proxies.push(proxy);
        }
      }
    }
    return proxies;
  }

  /**
   * Order type parameters by first occurrence in the argument types, then
   * the result type; parameters occurring in neither come last
   */
  export function sortTypeParameters(
    typeParameters: readonly Type.Variable[],
    argumentTypes: readonly Type[],
    resultType: Type | null,
  ): Type.Variable[] {
    if (typeParameters.length === 0) {
      return [];
    }
    const inUse = freeVariablesIn(
      resultType ? [...argumentTypes, resultType] : argumentTypes,
    );
    const sorted = inUse.filter((variable) =>
      typeParameters.includes(variable),
    );
    for (const parameter of typeParameters) {
      if (!sorted.includes(parameter)) {
        sorted.push(parameter);
      }
    }
    return sorted;
  }

  /**
   * Report every type parameter that occurs in neither `argumentTypes` nor
   * `moreArgumentTypes`. Returns whether some parameters occur only in
   * `moreArgumentTypes`.
   */
  export function checkBoundVariableOccurrences(
    typeParameters: readonly Type.Variable[],
    argumentTypes: readonly Type[],
    moreArgumentTypes: readonly Type[] | null,
    subject: string,
    scope: Pick<Type.Scope, "lookUpTypeBinder" | "error">,
    location: SourceLocation | null,
  ): boolean {
    const inArguments = freeVariablesIn(argumentTypes);
    const inMore = moreArgumentTypes
      ? freeVariablesIn(moreArgumentTypes)
      : null;
    let onlyInMore = false;
    for (const variable of typeParameters) {
      // a variable bound twice is reported once, at its last binding
      if (scope.lookUpTypeBinder(variable.name) !== variable) {
        continue;
      }
      if (inArguments.includes(variable)) {
        continue;
      }
      if (inMore?.includes(variable)) {
        onlyInMore = true;
        continue;
      }
      scope.error(
        location,
        `type variable must occur in ${subject}: ${variable.name}`,
      );
    }
    return onlyInMore;
  }

  /**
   * `name a1 a2 ...`; the last argument may be a map, earlier ones must be
   * atomic
   */
  export function emitConstructorApplication(
    name: string,
    args: readonly Type[],
    contextBindingStrength: number,
  ): string {
    const opBindingStrength = args.length > 0 ? 0 : 2;
    const text = [
      name,
      ...args.map((arg, i) => arg.emit(i === args.length - 1 ? 1 : 2)),
    ].join(" ");
    return opBindingStrength < contextBindingStrength ? `(${text})` : text;
  }
}
