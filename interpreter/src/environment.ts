/**
 * Lexical scoping environment for the Sprig interpreter.
 *
 * Each environment holds a map of bindings and a reference to its parent
 * scope. Creating a child is O(1). Closures capture a `snapshot()`: the
 * snapshot shares the binding maps of the whole chain, and a frame whose
 * map has been shared copies it before its next write, so definitions made
 * after the capture are not visible through the snapshot.
 */

import type { SprigValue } from './values';
import { SprigNameError } from './errors';

export class Environment {
  private vars: Map<string, SprigValue>;
  private shared: boolean;
  private readonly parent: Environment | null;

  constructor(parent: Environment | null = null, vars?: Map<string, SprigValue>) {
    this.parent = parent;
    this.vars = vars ?? new Map();
    this.shared = vars !== undefined;
  }

  /**
   * Look up a variable by name, traversing the parent chain.
   */
  get(name: string): SprigValue {
    const value = this.lookup(name);
    if (value === undefined) {
      throw new SprigNameError(name);
    }
    return value;
  }

  /**
   * Like `get`, but returns undefined for an unbound name.
   */
  lookup(name: string): SprigValue | undefined {
    const local = this.vars.get(name);
    if (local !== undefined) return local;
    return this.parent?.lookup(name);
  }

  /**
   * Check if a variable is defined in this environment or any parent.
   */
  has(name: string): boolean {
    return this.lookup(name) !== undefined;
  }

  /**
   * Bind a name in this scope, replacing any earlier binding of the same name here.
   */
  define(name: string, value: SprigValue): void {
    if (this.shared) {
      this.vars = new Map(this.vars);
      this.shared = false;
    }
    this.vars.set(name, value);
  }

  /**
   * Create a child scope.
   */
  child(): Environment {
    return new Environment(this);
  }

  /**
   * Capture the current bindings of the whole chain.
   */
  snapshot(): Environment {
    this.shared = true;
    return new Environment(this.parent?.snapshot() ?? null, this.vars);
  }

  /**
   * Bindings made directly in this scope, in definition order.
   */
  localBindings(): Array<[string, SprigValue]> {
    return Array.from(this.vars.entries());
  }
}
