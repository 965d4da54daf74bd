/**
 * Stack of name scopes
 */

export class ScopeStack<T> {
  private scopes: Map<string, T>[];

  constructor(private readonly keepBottom = true) {
    this.scopes = keepBottom ? [new Map()] : [];
  }

  enterScope(): void {
    this.scopes.push(new Map());
  }

  exitScope(): void {
    if (this.scopes.length > (this.keepBottom ? 1 : 0)) {
      this.scopes.pop();
    }
  }

  /**
   * Bind `name` in the innermost scope, or in the bottom scope when
   * `bottom` is set. Returns whether the name was already bound there; the
   * new binding replaces the old one either way.
   */
  define(name: string, value: T, bottom = false): boolean {
    const scope = bottom ? this.scopes[0] : this.scopes[this.scopes.length - 1];
    if (!scope) {
      return false;
    }
    const existed = scope.has(name);
    scope.set(name, value);
    return existed;
  }

  lookup(name: string): T | undefined {
    // Search from innermost to outermost scope
    for (let i = this.scopes.length - 1; i >= 0; i--) {
      const value = this.scopes[i].get(name);
      if (value !== undefined) {
        return value;
      }
    }
    return undefined;
  }
}
