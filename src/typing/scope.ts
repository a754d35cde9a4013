/**
 * Scope
 * Immutable layered bindings from names to types.
 */

import type { Type } from './types.js';

export class Scope {
  private constructor(
    private readonly bindings: ReadonlyMap<string, Type>,
    private readonly parent: Scope | null
  ) {}

  static root(globals: Iterable<readonly [string, Type]> = []): Scope {
    return new Scope(new Map(globals), null);
  }

  /** New layer on top of this one; inner names shadow outer ones */
  extend(bindings: Iterable<readonly [string, Type]>): Scope {
    return new Scope(new Map(bindings), this);
  }

  lookup(name: string): Type | undefined {
    let scope: Scope | null = this;
    while (scope !== null) {
      const type = scope.bindings.get(name);
      if (type !== undefined) return type;
      scope = scope.parent;
    }
    return undefined;
  }

  has(name: string): boolean {
    return this.lookup(name) !== undefined;
  }
}
