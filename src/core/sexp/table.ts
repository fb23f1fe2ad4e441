// src/core/sexp/table.ts
// Ordered lookup tables stored as node structures

import type { LocalNode, Node } from "../env/localNode";
import type { Sexp } from "./sexp";

function compareKeys<K extends string | number>(a: K, b: K): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export class Table<K extends string | number, V> {
  protected readonly map: Map<K, V>;

  constructor(entries?: Iterable<readonly [K, V]>) {
    this.map = new Map();
    if (entries) {
      for (const [k, v] of entries) this.map.set(k, v);
    }
  }

  get size(): number {
    return this.map.size;
  }

  lookup(key: K): V | undefined {
    return this.map.get(key);
  }

  has(key: K): boolean {
    return this.map.has(key);
  }

  /** Insert, returning the previous value if any. */
  insert(key: K, value: V): V | undefined {
    const prev = this.map.get(key);
    this.map.set(key, value);
    return prev;
  }

  /** Entries in ascending key order. */
  entries(): Array<[K, V]> {
    return [...this.map.entries()].sort((a, b) => compareKeys(a[0], b[0]));
  }

  equals(other: Table<K, V>, eq: (a: V, b: V) => boolean): boolean {
    if (other.size !== this.size) return false;
    for (const [k, v] of this.map) {
      const o = other.map.get(k);
      if (o === undefined || !eq(v, o)) return false;
    }
    return true;
  }
}

/** symbol → Node; used for interpreter frames. */
export class SymNodeTable extends Table<string, Node> {
  clone(): SymNodeTable {
    return new SymNodeTable(this.map);
  }
}

/** symbol → Sexp */
export class SymSexpTable extends Table<string, Sexp> {
  clone(): SymSexpTable {
    return new SymSexpTable(this.map);
  }
}

/** LocalNode of `env` → LocalNode of the env holding the table; used for import tables. */
export class LocalNodeTable extends Table<LocalNode, LocalNode> {
  constructor(readonly env: LocalNode, entries?: Iterable<readonly [LocalNode, LocalNode]>) {
    super(entries);
  }

  clone(): LocalNodeTable {
    return new LocalNodeTable(this.env, this.map);
  }
}
