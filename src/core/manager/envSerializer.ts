// src/core/manager/envSerializer.ts
// Writes an Environment as header, nodes, triples and designations sections

import type { Environment } from "../env/environment";
import { formatLocal, type LocalNode, type Node } from "../env/localNode";
import { LangError } from "../error/errors";
import { envHeaderModel, newHeader, type EnvHeader } from "../serde/header";
import {
  localNodeTableModel,
  procedureModel,
  symNodeTableModel,
  symSexpTableModel,
} from "../serde/models";
import { Reifier } from "../serde/reify";
import { SymSexpTable } from "../sexp/table";
import {
  cons,
  list,
  listItems,
  str,
  sym,
  writeSexp,
  type PrintOptions,
  type Sexp,
} from "../sexp/sexp";

// =========================================================================
// Sigils
// =========================================================================

/** `^N` for nodes of `env`, `^E^N` otherwise; triples use `tIDX` for N. */
export function nodeSigil(n: Node, env: LocalNode): string {
  const local = formatLocal(n.local);
  return n.env === env ? `^${local}` : `^${n.env}^${local}`;
}

function fileOptions(env: LocalNode): PrintOptions {
  return {
    maxDepth: Number.POSITIVE_INFINITY,
    maxLength: Number.POSITIVE_INFINITY,
    primitive: (p) => (p.tag === "Node" ? nodeSigil(p.node, env) : null),
  };
}

// =========================================================================
// Structures
// =========================================================================

/**
 * File form of a node structure. Nodes are left as Node values; the writer
 * renders them as sigils relative to the env being written.
 */
export function encodeStructure(s: Sexp): Sexp {
  const r = new Reifier();
  switch (s.tag) {
    case "Int":
    case "Float":
    case "String":
    case "Node":
      return s;
    case "Symbol":
    case "Cons":
      return list([sym("quote"), encodeData(s)]);
    case "Path":
      return list([sym("__path"), str(s.path)]);
    case "BuiltIn":
      return list([sym("__builtin"), sym(s.builtin.name)]);
    case "Procedure":
      return procedureModel.reify(s.proc, r);
    case "SymNodeTable":
      return symNodeTableModel.reify(s.table, r);
    case "SymSexpTable": {
      const encoded = new SymSexpTable(s.table.entries().map(([k, v]) => [k, encodeData(v)] as const));
      return symSexpTableModel.reify(encoded, r);
    }
    case "LocalNodeTable":
      return localNodeTableModel.reify(s.table, r);
    case "Vector":
      return list([sym("Vector"), ...s.items.map(encodeData)]);
    case "Env":
      throw new LangError({ tag: "Unsupported", message: "Env structures are written as bare node entries" });
  }
}

/** Quoted data: plain atoms stay as they are, typed primitives become `(__typed FORM)`. */
export function encodeData(s: Sexp): Sexp {
  switch (s.tag) {
    case "Cons":
      return cons(s.car === null ? null : encodeData(s.car), s.cdr === null ? null : encodeData(s.cdr));
    case "Int":
    case "Float":
    case "String":
    case "Symbol":
    case "Node":
      return s;
    case "Env":
      throw new LangError({ tag: "Unsupported", message: "Env inside data cannot be serialized" });
    default:
      return list([sym("__typed"), encodeStructure(s)]);
  }
}

// =========================================================================
// Sections
// =========================================================================

function section(head: string, items: readonly string[]): string {
  if (items.length === 0) return `(${head})`;
  return `(${head}\n  ${items.join("\n  ")})`;
}

function headerSection(header: EnvHeader, options: PrintOptions): string {
  const reified = envHeaderModel.reify(header, new Reifier());
  const fields: string[] = [];
  let first = true;
  for (const { value } of listItems(reified)) {
    if (first) {
      first = false;
      continue;
    }
    fields.push(writeSexp(value, options));
  }
  return section("header", fields);
}

/**
 * Full text of `env`, whose node in the meta-env is `envLocal`. `extra` header
 * fields are written back unchanged.
 */
export function serializeEnv(env: Environment, envLocal: LocalNode, extra: Array<[string, Sexp]> = []): string {
  const options = fileOptions(envLocal);
  const write = (s: Sexp) => writeSexp(s, options);
  const sigil = (local: LocalNode) => nodeSigil({ env: envLocal, local }, envLocal);

  const nodes = env.allNodes().map((local) => {
    const structure = env.entry(local);
    if (structure === null || structure.tag === "Env") return sigil(local);
    return `(${sigil(local)} ${write(encodeStructure(structure))})`;
  });

  const triples = env.matchAll().map((t) => {
    const parts = [env.tripleSubject(t), env.triplePredicate(t), env.tripleObject(t)];
    return `(${parts.map(sigil).join(" ")})`;
  });

  const designations: string[] = [];
  for (const context of env.designationContexts()) {
    for (const [symbol, local] of env.designationPairs(context)) {
      designations.push(`(${sigil(context)} ${sigil(local)} ${symbol})`);
    }
  }

  const header = newHeader(nodes.length, triples.length, extra);
  return [
    headerSection(header, options),
    section("nodes", nodes),
    section("triples", triples),
    section("designations", designations),
  ].join("\n\n") + "\n";
}
