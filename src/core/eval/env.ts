// src/core/eval/env.ts
// Immutable-on-write environments. Children receive a frozen snapshot;
// every write returns a new Env, so sibling branches never see each other's
// bindings.

import type { Val } from "./values";
import { valKey } from "./values";

export type Bindings = ReadonlyMap<string, Val>;

export class Env {
  private readonly cells: ReadonlyMap<string, Val>;

  private constructor(cells: ReadonlyMap<string, Val>) {
    this.cells = cells;
    Object.freeze(this);
  }

  static empty(): Env {
    return EMPTY;
  }

  static from(entries: Iterable<[string, Val]>): Env {
    return new Env(new Map(entries));
  }

  get size(): number {
    return this.cells.size;
  }

  get(name: string): Val | undefined {
    return this.cells.get(name);
  }

  has(name: string): boolean {
    return this.cells.has(name);
  }

  set(name: string, v: Val): Env {
    const next = new Map(this.cells);
    next.set(name, v);
    return new Env(next);
  }

  extend(binds: Bindings | Iterable<[string, Val]>): Env {
    const next = new Map(this.cells);
    for (const [k, v] of binds) next.set(k, v);
    return new Env(next);
  }

  remove(name: string): Env {
    if (!this.cells.has(name)) return this;
    const next = new Map(this.cells);
    next.delete(name);
    return new Env(next);
  }

  names(): string[] {
    return Array.from(this.cells.keys());
  }

  entries(): Array<[string, Val]> {
    return Array.from(this.cells.entries());
  }

  /** Stable digest for determinism checks. */
  digest(): string {
    return this.entries()
      .sort((a, b) => (a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0))
      .map(([k, v]) => `${k}=${valKey(v)}`)
      .join(";");
  }
}

const EMPTY = Env.from([]);
