/**
 * Base Module class for the scalar network layers.
 * Similar to PyTorch's nn.Module, minus buffers and train/eval modes.
 */

import type { Rng } from "../core/rng";
import { defaultArena } from "../default-arena";
import type { Arena } from "../engine/arena";
import type { Value } from "../frontend-value";

export interface ModuleOptions {
  arena?: Arena;
  rng?: Rng;
  /**
   * Reuse existing parameter handles instead of drawing fresh ones, in the
   * order `parameters()` returns them.
   */
  parameters?: Value[];
}

export abstract class Module<In, Out> {
  protected readonly arena: Arena;
  private readonly _modules = new Map<string, Module<unknown, unknown>>();
  private readonly _parameters: Value[] = [];

  constructor(arena: Arena = defaultArena()) {
    this.arena = arena;
  }

  /** Register a parameter owned directly by this module. */
  protected registerParameter(param: Value): Value {
    if (!param.arena.sameStore(this.arena)) {
      throw new Error(`Parameter ${param.id} belongs to a different arena than its module`);
    }
    this._parameters.push(param);
    return param;
  }

  /**
   * Register a child module; its parameters follow this module's own in
   * `parameters()`.
   */
  registerModule<M extends Module<unknown, unknown>>(name: string, module: M): M {
    this._modules.set(name, module);
    return module;
  }

  modules(): Module<unknown, unknown>[] {
    return [...this._modules.values()];
  }

  parameters(): Value[] {
    const result = this._parameters.slice();
    for (const child of this._modules.values()) {
      result.push(...child.parameters());
    }
    return result;
  }

  zeroGrad(): void {
    for (const param of this.parameters()) {
      param.zeroGrad();
    }
  }

  abstract forward(input: In): Out;
}

/** Pops `count` handles off the front of a supplied parameter list. */
export class ParameterSource {
  private offset = 0;

  constructor(private readonly supplied: Value[] | undefined) {}

  get active(): boolean {
    return this.supplied !== undefined;
  }

  take(count: number): Value[] {
    if (!this.supplied) {
      throw new Error("No parameters were supplied");
    }
    if (this.offset + count > this.supplied.length) {
      throw new Error(
        `Expected at least ${this.offset + count} parameters, got ${this.supplied.length}`,
      );
    }
    const slice = this.supplied.slice(this.offset, this.offset + count);
    this.offset += count;
    return slice;
  }

  /** Throws if supplied handles were left over. */
  finish(): void {
    if (this.supplied && this.offset !== this.supplied.length) {
      throw new Error(
        `Expected ${this.offset} parameters, got ${this.supplied.length}`,
      );
    }
  }
}
