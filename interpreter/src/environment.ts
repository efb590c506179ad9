/**
 * Lexical scoping environment for the Sprig interpreter.
 *
 * Each environment holds a map of integer bindings and a reference to its
 * parent scope. Definitions only ever touch the local map, so a child scope
 * can shadow a name without disturbing its ancestors.
 */

import { SprigNameError } from './errors';

export class Environment {
  private vars: Map<string, number>;
  private parent: Environment | null;

  constructor(parent: Environment | null = null) {
    this.vars = new Map();
    this.parent = parent;
  }

  /**
   * Look up a variable by name, traversing the parent chain.
   */
  lookup(name: string): number {
    const value = this.vars.get(name);
    if (value !== undefined) {
      return value;
    }
    if (this.parent !== null) {
      return this.parent.lookup(name);
    }
    throw new SprigNameError(name);
  }

  /**
   * Define or overwrite a variable in the current scope.
   */
  define(name: string, value: number): void {
    this.vars.set(name, value);
  }

  /**
   * Create a child scope.
   */
  child(): Environment {
    return new Environment(this);
  }
}
