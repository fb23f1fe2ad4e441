// src/core/serde/models.ts
// Models for the structured primitives: procedures and tables

import { deserializeError } from "../error/errors";
import { nodeSexp, type Sexp } from "../sexp/sexp";
import type { Procedure } from "../sexp/procedure";
import { LocalNodeTable, SymNodeTable, SymSexpTable } from "../sexp/table";
import type { Model } from "./model";
import type { Reflector } from "./reflect";

const PROCEDURE_VARIANTS = new Set([
  "Application",
  "Abstraction",
  "InterpreterAbstraction",
  "Sequence",
  "Branch",
]);

export function isProcedureHead(name: string): boolean {
  return PROCEDURE_VARIANTS.has(name);
}

function nodes(d: Reflector, s: Sexp | undefined, what: string) {
  if (s === undefined) throw deserializeError("MissingData", `${what} is missing`);
  return d.seq(s, (x) => d.node(x));
}

function one(d: Reflector, s: Sexp | undefined, what: string) {
  if (s === undefined) throw deserializeError("MissingData", `${what} is missing`);
  return d.node(s);
}

/**
 *   (Application proc (args...))
 *   (Abstraction (params...) body)
 *   (InterpreterAbstraction (params...) body)
 *   (Sequence (nodes...))
 *   (Branch pred consequent alternative)
 */
export const procedureModel: Model<Procedure> = {
  reify(proc, r) {
    const ns = (xs: readonly { env: number; local: number }[]) => r.seq(xs.map(nodeSexp));
    switch (proc.tag) {
      case "Application":
        return r.tupleVariant(proc.tag, [nodeSexp(proc.proc), ns(proc.args)]);
      case "Abstraction":
      case "InterpreterAbstraction":
        return r.tupleVariant(proc.tag, [ns(proc.params), nodeSexp(proc.body)]);
      case "Sequence":
        return r.newtypeVariant(proc.tag, ns(proc.body));
      case "Branch":
        return r.tupleVariant(proc.tag, [
          nodeSexp(proc.pred),
          nodeSexp(proc.consequent),
          nodeSexp(proc.alternative),
        ]);
    }
  },

  reflect(s, d) {
    const v = d.variant(s);
    const [a, b, c] = v.items;
    const arity = (n: number) => d.tuple(s, n + 1, v.name);
    switch (v.name) {
      case "Application":
        arity(2);
        return { tag: "Application", proc: one(d, a, "application procedure"), args: nodes(d, b, "application arguments") };
      case "Abstraction":
        arity(2);
        return { tag: "Abstraction", params: nodes(d, a, "parameters"), body: one(d, b, "body") };
      case "InterpreterAbstraction":
        arity(2);
        return { tag: "InterpreterAbstraction", params: nodes(d, a, "parameters"), body: one(d, b, "body") };
      case "Sequence":
        arity(1);
        return { tag: "Sequence", body: nodes(d, a, "sequence") };
      case "Branch":
        arity(3);
        return {
          tag: "Branch",
          pred: one(d, a, "predicate"),
          consequent: one(d, b, "consequent"),
          alternative: one(d, c, "alternative"),
        };
      default:
        throw deserializeError("UnexpectedCommand", `unknown procedure variant "${v.name}"`, s);
    }
  },
};

/** (SymNodeTable (sym . node) ...) */
export const symNodeTableModel: Model<SymNodeTable> = {
  reify(table, r) {
    return r.struct("SymNodeTable", table.entries().map(([k, n]) => [k, nodeSexp(n)] as const));
  },
  reflect(s, d) {
    const fields = d.struct(s, "SymNodeTable");
    return new SymNodeTable(fields.rest().map(([k, v]) => [k, d.node(v)] as const));
  },
};

/** (SymSexpTable (sym . value) ...) */
export const symSexpTableModel: Model<SymSexpTable> = {
  reify(table, r) {
    return r.struct("SymSexpTable", table.entries());
  },
  reflect(s, d) {
    return new SymSexpTable(d.struct(s, "SymSexpTable").rest());
  },
};

/** (LocalNodeTable (env . E) (entries (from . to) ...)) */
export const localNodeTableModel: Model<LocalNodeTable> = {
  reify(table, r) {
    return r.struct("LocalNodeTable", [
      ["env", r.int(table.env)],
      ["entries", r.map(table.entries().map(([k, v]) => [r.int(k), r.int(v)] as const))],
    ]);
  },
  reflect(s, d) {
    const fields = d.struct(s, "LocalNodeTable");
    const env = d.int(fields.required("env"));
    const entries = d.map(fields.required("entries"), (k) => d.int(k), (v) => d.int(v));
    fields.finish();
    return new LocalNodeTable(env, entries);
  },
};

export const TABLE_HEADS = ["SymNodeTable", "SymSexpTable", "LocalNodeTable"] as const;
