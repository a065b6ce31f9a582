/**
 * Type environment for tracking type bindings during type checking.
 *
 * Environments form a chain via the `parent` pointer, enabling lexical scoping.
 * `lookup` walks up the chain; `define` only writes to the current scope.
 */

import { BUILTINS } from '@sprig/interpreter';
import type { SprigType } from './types';

export class TypeEnvironment {
  private bindings = new Map<string, SprigType>();
  private parent: TypeEnvironment | null;

  constructor(parent?: TypeEnvironment) {
    this.parent = parent ?? null;
  }

  /** A root environment holding the signature of every built-in. */
  static withBuiltins(): TypeEnvironment {
    const env = new TypeEnvironment();
    for (const builtin of BUILTINS) {
      env.define(builtin.name, builtin.signature);
    }
    return env;
  }

  /** Bind a name to a type in the current scope. */
  define(name: string, type: SprigType): void {
    this.bindings.set(name, type);
  }

  /** Look up a name, walking the parent chain. */
  lookup(name: string): SprigType | null {
    const local = this.bindings.get(name);
    if (local !== undefined) return local;
    if (this.parent) return this.parent.lookup(name);
    return null;
  }

  /** Bindings made directly in this scope, in definition order. */
  localBindings(): Array<[string, SprigType]> {
    return Array.from(this.bindings.entries());
  }

  /** Create a child scope whose parent is this environment. */
  child(): TypeEnvironment {
    return new TypeEnvironment(this);
  }
}
