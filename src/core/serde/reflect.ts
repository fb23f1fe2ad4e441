// src/core/serde/reflect.ts
// Reflection: reading host values back out of reified s-expressions

import { deserializeError } from "../error/errors";
import { node, type LocalNode, type Node } from "../env/localNode";
import {
  isCons,
  isNil,
  isSymbol,
  listItems,
  listToArray,
  sexpEq,
  sexpToString,
  type Sexp,
} from "../sexp/sexp";
import { parseAdminSymbol, sigilToLocal } from "../sexp/symbol";
import { SymSexpTable } from "../sexp/table";

export type ReflectOptions = {
  trueValue?: Sexp;
  falseValue?: Sexp;
  /** Env that local sigils (`^N`) refer to. */
  env?: LocalNode;
};

export type Variant = {
  name: string;
  /** Payload items for newtype/tuple variants; empty for unit variants. */
  items: Sexp[];
  /** Fields for struct variants. */
  fields: StructFields | null;
};

/**
 * Named fields read from `(Name (field . value) ...)`. Fields not consumed can
 * be listed with `rest`.
 */
export class StructFields {
  private readonly read = new Set<string>();

  constructor(readonly name: string, private readonly table: SymSexpTable) {}

  required(key: string): Sexp {
    const v = this.table.lookup(key);
    if (v === undefined) {
      throw deserializeError("MissingData", `${this.name} is missing field "${key}"`);
    }
    this.read.add(key);
    return v;
  }

  optional(key: string): Sexp | undefined {
    const v = this.table.lookup(key);
    if (v !== undefined) this.read.add(key);
    return v;
  }

  rest(): Array<[string, Sexp]> {
    return this.table.entries().filter(([k]) => !this.read.has(k));
  }

  /** Fail on any field not consumed. */
  finish(): void {
    const extra = this.rest();
    const first = extra[0];
    if (first) {
      throw deserializeError("ExtraneousData", `${this.name} has unexpected field "${first[0]}"`, first[1]);
    }
  }
}

function mismatch(expected: string, given: Sexp | null): never {
  throw deserializeError("TypeMismatch", `expected ${expected}, got ${sexpToString(given)}`, given);
}

export class Reflector {
  private readonly trueValue: Sexp | null;
  private readonly falseValue: Sexp | null;
  private readonly env: LocalNode | null;

  constructor(options: ReflectOptions = {}) {
    this.trueValue = options.trueValue ?? null;
    this.falseValue = options.falseValue ?? null;
    this.env = options.env ?? null;
  }

  bool(s: Sexp): boolean {
    if (this.trueValue && sexpEq(s, this.trueValue)) return true;
    if (this.falseValue && sexpEq(s, this.falseValue)) return false;
    if (isSymbol(s, "true")) return true;
    if (isSymbol(s, "false")) return false;
    return mismatch("boolean", s);
  }

  int(s: Sexp): number {
    if (s.tag === "Int") return s.n;
    return mismatch("integer", s);
  }

  float(s: Sexp): number {
    if (s.tag === "Float" || s.tag === "Int") return s.n;
    return mismatch("number", s);
  }

  /** Strings and identifier symbols both read as text. */
  str(s: Sexp): string {
    if (s.tag === "String") return s.s;
    if (s.tag === "Symbol") return s.name;
    return mismatch("string", s);
  }

  symbol(s: Sexp | null): string {
    if (s !== null && s.tag === "Symbol") return s.name;
    throw deserializeError("ExpectedSymbol", `expected symbol, got ${sexpToString(s)}`, s);
  }

  option<T>(s: Sexp, inner: (s: Sexp) => T): T | null {
    return isNil(s) ? null : inner(s);
  }

  seq<T>(s: Sexp, inner: (s: Sexp) => T): T[] {
    const items = listToArray(s);
    if (items === null) return mismatch("proper list", s);
    return items.map(inner);
  }

  map<K, V>(s: Sexp, key: (s: Sexp) => K, value: (s: Sexp) => V): Array<[K, V]> {
    return this.seq(s, (entry): [K, V] => {
      if (!isCons(entry) || entry.car === null || entry.cdr === null) {
        return mismatch("(key . value)", entry);
      }
      return [key(entry.car), value(entry.cdr)];
    });
  }

  /** Read `(name (field . value) ...)`. */
  struct(s: Sexp, name: string): StructFields {
    if (!isCons(s) || !isSymbol(s.car, name)) return mismatch(`(${name} ...)`, s);
    return this.fields(name, s.cdr);
  }

  /** Read a unit, newtype, tuple or struct variant. */
  variant(s: Sexp): Variant {
    if (s.tag === "Symbol") return { name: s.name, items: [], fields: null };
    if (!isCons(s) || s.car === null) return mismatch("variant", s);
    const head = s.car;
    if (isCons(head) && head.cdr !== null) {
      const variantName = this.symbol(head.cdr);
      return { name: variantName, items: [], fields: this.fields(variantName, s.cdr) };
    }
    const name = this.symbol(head);
    const items = listToArray(s.cdr);
    if (items === null) return mismatch(`(${name} ...)`, s);
    return { name, items, fields: null };
  }

  /**
   * A Node from a Node value, a sigil symbol, or `(Node (env . e) (local . l))`.
   */
  node(s: Sexp): Node {
    if (s.tag === "Node") return s.node;
    if (s.tag === "Symbol") {
      const info = parseAdminSymbol(s.name);
      if (info.tag === "InvalidIdentifier" || info.tag === "DunderPrefix" || info.tag === "Identifier") {
        return mismatch("node sigil", s);
      }
      if (this.env === null && (info.tag === "LocalNode" || info.tag === "LocalTriple")) {
        return mismatch("global node sigil", s);
      }
      const resolved = sigilToLocal(info, this.env ?? 0);
      if (resolved === null) return mismatch("node sigil", s);
      return node(resolved.env, resolved.local);
    }
    const fields = this.struct(s, "Node");
    const result = node(this.int(fields.required("env")), this.int(fields.required("local")));
    fields.finish();
    return result;
  }

  /** Exactly `n` items of a proper list. */
  tuple(s: Sexp | null, n: number, what: string): Sexp[] {
    const items = listToArray(s);
    if (items === null) return mismatch(what, s);
    if (items.length < n) {
      throw deserializeError("MissingData", `${what}: expected ${n} items, got ${items.length}`, s);
    }
    if (items.length > n) {
      throw deserializeError("ExtraneousData", `${what}: expected ${n} items, got ${items.length}`, s);
    }
    return items;
  }

  private fields(name: string, body: Sexp | null): StructFields {
    const table = new SymSexpTable();
    for (const item of listItems(body)) {
      const entry = item.value;
      if (!item.proper || !isCons(entry) || entry.cdr === null) {
        return mismatch(`(field . value) in ${name}`, entry);
      }
      const key = this.symbol(entry.car);
      if (table.insert(key, entry.cdr) !== undefined) {
        throw deserializeError("ExtraneousData", `${name} repeats field "${key}"`, entry);
      }
    }
    return new StructFields(name, table);
  }
}
