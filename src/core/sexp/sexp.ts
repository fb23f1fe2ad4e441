// src/core/sexp/sexp.ts
// S-expression model: primitives, cons cells, list iteration, structural equality, printing

import type { Environment } from "../env/environment";
import { formatNode, nodeEq, type Node } from "../env/localNode";
import type { BuiltIn } from "./builtin";
import { formatNumber } from "./number";
import { procedureEq, type Procedure } from "./procedure";
import { escapeString } from "./string";
import type { LocalNodeTable, SymNodeTable, SymSexpTable } from "./table";

export type Primitive =
  | { tag: "Int"; n: number }
  | { tag: "Float"; n: number }
  | { tag: "Symbol"; name: string }
  | { tag: "String"; s: string }
  | { tag: "Path"; path: string }
  | { tag: "BuiltIn"; builtin: BuiltIn }
  | { tag: "Node"; node: Node }
  | { tag: "SymNodeTable"; table: SymNodeTable }
  | { tag: "SymSexpTable"; table: SymSexpTable }
  | { tag: "LocalNodeTable"; table: LocalNodeTable }
  | { tag: "Vector"; items: Sexp[] }
  | { tag: "Procedure"; proc: Procedure }
  | { tag: "Env"; env: Environment };

/** A cons cell; the empty list is the cell with both slots absent. */
export type Cons = { tag: "Cons"; car: Sexp | null; cdr: Sexp | null };

export type Sexp = Primitive | Cons;

export type PrimitiveTag = Primitive["tag"];

// ----- Constructors -----

export function int(n: number): Sexp { return { tag: "Int", n: Math.trunc(n) }; }
export function float(n: number): Sexp { return { tag: "Float", n }; }
export function sym(name: string): Sexp { return { tag: "Symbol", name }; }
export function str(s: string): Sexp { return { tag: "String", s }; }
export function path(p: string): Sexp { return { tag: "Path", path: p }; }
export function nodeSexp(n: Node): Sexp { return { tag: "Node", node: n }; }
export function procSexp(proc: Procedure): Sexp { return { tag: "Procedure", proc }; }
export function vector(items: Sexp[]): Sexp { return { tag: "Vector", items }; }

export function nil(): Cons { return { tag: "Cons", car: null, cdr: null }; }

export function cons(car: Sexp | null, cdr: Sexp | null): Cons {
  return { tag: "Cons", car, cdr };
}

/** Build a proper list, or an improper one when `tail` is given. */
export function list(items: readonly Sexp[], tail: Sexp | null = null): Sexp {
  let out: Sexp = tail ?? nil();
  for (let i = items.length - 1; i >= 0; i--) {
    out = cons(items[i] ?? null, out);
  }
  return out;
}

export function isNil(s: Sexp | null): boolean {
  return s === null || (s.tag === "Cons" && s.car === null && s.cdr === null);
}

export function isCons(s: Sexp | null): s is Cons {
  return s !== null && s.tag === "Cons";
}

// ----- Iteration -----

export type ListItem = { value: Sexp; proper: boolean };

/**
 * Walk a list. Each element is yielded with `proper = true`; a non-list tail is
 * yielded once more with `proper = false`. A non-list value yields itself as an
 * improper tail.
 */
export function* listItems(s: Sexp | null): Generator<ListItem> {
  let curr: Sexp | null = s;
  while (curr !== null) {
    if (curr.tag !== "Cons") {
      yield { value: curr, proper: false };
      return;
    }
    if (curr.car === null && curr.cdr === null) return;
    yield { value: curr.car ?? nil(), proper: true };
    curr = curr.cdr;
  }
}

/** Elements of a proper list, or null if the list is improper. */
export function listToArray(s: Sexp | null): Sexp[] | null {
  const out: Sexp[] = [];
  for (const item of listItems(s)) {
    if (!item.proper) return null;
    out.push(item.value);
  }
  return out;
}

export function isSymbol(s: Sexp | null, name?: string): s is { tag: "Symbol"; name: string } {
  return s !== null && s.tag === "Symbol" && (name === undefined || s.name === name);
}

export function asNode(s: Sexp | null): Node | null {
  return s !== null && s.tag === "Node" ? s.node : null;
}

// ----- Equality -----

function optEq(a: Sexp | null, b: Sexp | null): boolean {
  if (a === null || b === null) return a === b;
  return sexpEq(a, b);
}

export function sexpEq(a: Sexp, b: Sexp): boolean {
  switch (a.tag) {
    case "Cons":
      return b.tag === "Cons" && optEq(a.car, b.car) && optEq(a.cdr, b.cdr);
    case "Int":
    case "Float":
      return (b.tag === "Int" || b.tag === "Float") && b.tag === a.tag && b.n === a.n;
    case "Symbol":
      return b.tag === "Symbol" && b.name === a.name;
    case "String":
      return b.tag === "String" && b.s === a.s;
    case "Path":
      return b.tag === "Path" && b.path === a.path;
    case "BuiltIn":
      return b.tag === "BuiltIn" && b.builtin.name === a.builtin.name;
    case "Node":
      return b.tag === "Node" && nodeEq(a.node, b.node);
    case "SymNodeTable":
      return b.tag === "SymNodeTable" && a.table.equals(b.table, nodeEq);
    case "SymSexpTable":
      return b.tag === "SymSexpTable" && a.table.equals(b.table, sexpEq);
    case "LocalNodeTable":
      return b.tag === "LocalNodeTable" && a.table.env === b.table.env &&
        a.table.equals(b.table, (x, y) => x === y);
    case "Vector":
      return b.tag === "Vector" && a.items.length === b.items.length &&
        a.items.every((item, i) => {
          const other = b.items[i];
          return other !== undefined && sexpEq(item, other);
        });
    case "Procedure":
      return b.tag === "Procedure" && procedureEq(a.proc, b.proc);
    case "Env":
      return b.tag === "Env" && a.env === b.env;
  }
}

// ----- Printing -----

export const MAX_PRINT_DEPTH = 16;
export const MAX_PRINT_LENGTH = 64;

export type PrintOptions = {
  maxDepth: number;
  maxLength: number;
  /** Custom rendering for primitives; return null for the default. */
  primitive?: (p: Primitive, depth: number) => string | null;
};

const DEFAULT_PRINT: PrintOptions = { maxDepth: MAX_PRINT_DEPTH, maxLength: MAX_PRINT_LENGTH };

export function primitiveToString(p: Primitive): string {
  switch (p.tag) {
    case "Int":
    case "Float":
      return formatNumber(p);
    case "Symbol":
      return p.name;
    case "String":
      return `"${escapeString(p.s)}"`;
    case "Path":
      return `#path"${escapeString(p.path)}"`;
    case "BuiltIn":
      return `[BuiltIn_${p.builtin.name}]`;
    case "Node":
      return formatNode(p.node);
    case "SymNodeTable":
      return `[SymNodeTable_${p.table.size}]`;
    case "SymSexpTable":
      return `[SymSexpTable_${p.table.size}]`;
    case "LocalNodeTable":
      return `[LocalNodeTable_${p.table.env}_${p.table.size}]`;
    case "Vector":
      return `[Vector_${p.items.length}]`;
    case "Procedure":
      return `[Procedure_${p.proc.tag}]`;
    case "Env":
      return "[Env]";
  }
}

export function writeSexp(s: Sexp | null, options: PrintOptions = DEFAULT_PRINT, depth = 0): string {
  if (s === null || isNil(s)) return "()";
  if (s.tag !== "Cons") {
    return options.primitive?.(s, depth) ?? primitiveToString(s);
  }
  if (depth >= options.maxDepth) return "(..)";

  // quote sugar
  if (isSymbol(s.car, "quote") && isCons(s.cdr) && s.cdr.car !== null && isNil(s.cdr.cdr)) {
    return `'${writeSexp(s.cdr.car, options, depth + 1)}`;
  }

  const parts: string[] = [];
  let tail: string | null = null;
  let count = 0;
  for (const item of listItems(s)) {
    if (!item.proper) {
      tail = writeSexp(item.value, options, depth + 1);
      break;
    }
    if (count >= options.maxLength) {
      parts.push("...");
      break;
    }
    parts.push(writeSexp(item.value, options, depth + 1));
    count++;
  }
  return tail === null ? `(${parts.join(" ")})` : `(${parts.join(" ")} . ${tail})`;
}

export function sexpToString(s: Sexp | null): string {
  return writeSexp(s);
}
