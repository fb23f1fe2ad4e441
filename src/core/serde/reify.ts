// src/core/serde/reify.ts
// Reification: turning host values into s-expressions through one visitor

import { cons, float, int, list, nil, str, sym, type Sexp } from "../sexp/sexp";

export type ReifyOptions = {
  /** Value emitted for `true`; defaults to the symbol `true`. */
  trueValue?: Sexp;
  /** Value emitted for `false`; defaults to the symbol `false`. */
  falseValue?: Sexp;
};

type PartialKind = "Seq" | "Map" | "Struct" | "TupleVariant" | "StructVariant";

type PartialList = { kind: PartialKind; items: Sexp[] };

/**
 * Shapes map to lists as follows:
 *
 *   unit variant     → Variant
 *   newtype variant  → (Variant value)
 *   tuple variant    → (Variant v1 v2 ...)
 *   struct variant   → ((Name . Variant) (field . value) ...)
 *   struct           → (Name (field . value) ...)
 *   seq              → (v1 v2 ...)
 *   map              → ((k . v) ...)
 *
 * Compound values are built on a stack of partial lists, so nested
 * begin/end pairs compose.
 */
export class Reifier {
  private readonly stack: PartialList[] = [];
  private readonly trueValue: Sexp;
  private readonly falseValue: Sexp;

  constructor(options: ReifyOptions = {}) {
    this.trueValue = options.trueValue ?? sym("true");
    this.falseValue = options.falseValue ?? sym("false");
  }

  // ----- scalars -----

  bool(v: boolean): Sexp { return v ? this.trueValue : this.falseValue; }
  int(n: number): Sexp { return int(n); }
  float(n: number): Sexp { return float(n); }
  str(s: string): Sexp { return str(s); }
  symbol(name: string): Sexp { return sym(name); }
  none(): Sexp { return nil(); }
  unit(): Sexp { return nil(); }
  unitVariant(variant: string): Sexp { return sym(variant); }

  newtypeVariant(variant: string, value: Sexp): Sexp {
    return list([sym(variant), value]);
  }

  option(value: Sexp | null): Sexp {
    return value ?? this.none();
  }

  // ----- compounds -----

  beginSeq(): this {
    this.stack.push({ kind: "Seq", items: [] });
    return this;
  }

  beginMap(): this {
    this.stack.push({ kind: "Map", items: [] });
    return this;
  }

  beginStruct(name: string): this {
    this.stack.push({ kind: "Struct", items: [sym(name)] });
    return this;
  }

  beginTupleVariant(variant: string): this {
    this.stack.push({ kind: "TupleVariant", items: [sym(variant)] });
    return this;
  }

  beginStructVariant(name: string, variant: string): this {
    this.stack.push({ kind: "StructVariant", items: [cons(sym(name), sym(variant))] });
    return this;
  }

  element(value: Sexp): this {
    this.top("element", "Seq", "TupleVariant").items.push(value);
    return this;
  }

  entry(key: Sexp, value: Sexp): this {
    this.top("entry", "Map").items.push(cons(key, value));
    return this;
  }

  field(key: string, value: Sexp): this {
    this.top("field", "Struct", "StructVariant").items.push(cons(sym(key), value));
    return this;
  }

  end(): Sexp {
    const partial = this.stack.pop();
    if (!partial) throw new Error("Reifier.end: nothing to close");
    return list(partial.items);
  }

  // ----- one-shot helpers -----

  seq(items: readonly Sexp[]): Sexp {
    this.beginSeq();
    for (const item of items) this.element(item);
    return this.end();
  }

  map(entries: ReadonlyArray<readonly [Sexp, Sexp]>): Sexp {
    this.beginMap();
    for (const [k, v] of entries) this.entry(k, v);
    return this.end();
  }

  struct(name: string, fields: ReadonlyArray<readonly [string, Sexp]>): Sexp {
    this.beginStruct(name);
    for (const [k, v] of fields) this.field(k, v);
    return this.end();
  }

  tupleVariant(variant: string, items: readonly Sexp[]): Sexp {
    this.beginTupleVariant(variant);
    for (const item of items) this.element(item);
    return this.end();
  }

  structVariant(name: string, variant: string, fields: ReadonlyArray<readonly [string, Sexp]>): Sexp {
    this.beginStructVariant(name, variant);
    for (const [k, v] of fields) this.field(k, v);
    return this.end();
  }

  get depth(): number {
    return this.stack.length;
  }

  private top(op: string, ...kinds: PartialKind[]): PartialList {
    const partial = this.stack[this.stack.length - 1];
    if (!partial || !kinds.includes(partial.kind)) {
      throw new Error(`Reifier.${op}: not inside ${kinds.join(" or ")}`);
    }
    return partial;
  }
}
