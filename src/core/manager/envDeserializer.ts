// src/core/manager/envDeserializer.ts
// Reads env files written by envSerializer back into an Environment

import * as fs from "fs";
import type { Environment } from "../env/environment";
import { type LocalNode, type Node } from "../env/localNode";
import { EnvPrelude, PRELUDE_SIZE } from "../env/prelude";
import { deserializeError, LangError, type DeserializeErrorReason } from "../error/errors";
import { getLogger } from "../log/logger";
import { readFileSexps, readSexps } from "../reader/read";
import { envHeaderModel, type EnvHeader } from "../serde/header";
import {
  isProcedureHead,
  localNodeTableModel,
  procedureModel,
  symNodeTableModel,
  symSexpTableModel,
} from "../serde/models";
import { Reflector } from "../serde/reflect";
import type { BuiltIn } from "../sexp/builtin";
import {
  cons,
  isCons,
  listToArray,
  nodeSexp,
  path,
  procSexp,
  sexpToString,
  vector,
  type Sexp,
} from "../sexp/sexp";
import { parseAdminSymbol, policyEnvSerde } from "../sexp/symbol";
import { SymSexpTable } from "../sexp/table";

const log = getLogger("manager:deserialize");

export type DecodeContext = {
  /** Meta node of the env being read; local sigils resolve against it. */
  env: LocalNode;
  builtins: ReadonlyMap<string, BuiltIn>;
};

// =========================================================================
// Structures
// =========================================================================

function isSigil(name: string): boolean {
  const info = parseAdminSymbol(name);
  return info.tag !== "Identifier" && info.tag !== "InvalidIdentifier" && info.tag !== "DunderPrefix";
}

/** Evaluate one node structure from its file form. */
export function evalStructure(s: Sexp, ctx: DecodeContext): Sexp {
  const d = new Reflector({ env: ctx.env });
  switch (s.tag) {
    case "Int":
    case "Float":
    case "String":
      return s;
    case "Symbol":
      return nodeSexp(d.node(s));
    case "Cons":
      break;
    default:
      throw deserializeError("TypeMismatch", `unexpected structure ${sexpToString(s)}`, s);
  }

  const head = d.symbol(s.car);
  switch (head) {
    case "quote": {
      const [, quoted] = d.tuple(s, 2, "quote");
      return quoted === undefined ? s : decodeData(quoted, ctx);
    }
    case "__builtin": {
      const [, nameSexp] = d.tuple(s, 2, "__builtin");
      const name = d.symbol(nameSexp ?? null);
      const builtin = ctx.builtins.get(name);
      if (!builtin) throw deserializeError("UnrecognizedBuiltIn", `unknown built-in "${name}"`, s);
      return { tag: "BuiltIn", builtin };
    }
    case "__path": {
      const [, p] = d.tuple(s, 2, "__path");
      return path(p === undefined ? "" : d.str(p));
    }
    case "SymNodeTable":
      return { tag: "SymNodeTable", table: symNodeTableModel.reflect(s, d) };
    case "SymSexpTable": {
      const raw = symSexpTableModel.reflect(s, d);
      const table = new SymSexpTable(raw.entries().map(([k, v]) => [k, decodeData(v, ctx)] as const));
      return { tag: "SymSexpTable", table };
    }
    case "LocalNodeTable":
      return { tag: "LocalNodeTable", table: localNodeTableModel.reflect(s, d) };
    case "Vector": {
      const elems = listToArray(s.cdr);
      if (elems === null) throw deserializeError("TypeMismatch", "improper Vector", s);
      return vector(elems.map((e) => decodeData(e, ctx)));
    }
    default:
      if (isProcedureHead(head)) return procSexp(procedureModel.reflect(s, d));
      throw deserializeError("UnexpectedCommand", `unknown structure head "${head}"`, s);
  }
}

/** Quoted data: sigils become Nodes and `(__typed FORM)` is evaluated. */
export function decodeData(s: Sexp, ctx: DecodeContext): Sexp {
  if (s.tag === "Symbol") {
    return isSigil(s.name) ? nodeSexp(new Reflector({ env: ctx.env }).node(s)) : s;
  }
  if (s.tag !== "Cons") return s;
  if (s.car !== null && s.car.tag === "Symbol" && s.car.name === "__typed") {
    const [, form] = new Reflector({ env: ctx.env }).tuple(s, 2, "__typed");
    return form === undefined ? s : evalStructure(form, ctx);
  }
  return cons(s.car === null ? null : decodeData(s.car, ctx), s.cdr === null ? null : decodeData(s.cdr, ctx));
}

// =========================================================================
// Sections
// =========================================================================

const SECTIONS = ["header", "nodes", "triples", "designations"] as const;
type SectionName = (typeof SECTIONS)[number];

const MISSING: Record<SectionName, DeserializeErrorReason> = {
  header: "MissingHeaderSection",
  nodes: "MissingNodeSection",
  triples: "MissingTripleSection",
  designations: "MissingDesignationSection",
};

function isSectionName(name: string): name is SectionName {
  return SECTIONS.some((s) => s === name);
}

function checkSections(top: readonly Sexp[]): Record<SectionName, Sexp> {
  const found: Partial<Record<SectionName, Sexp>> = {};
  SECTIONS.forEach((name, i) => {
    const s = top[i];
    if (s === undefined || !isCons(s)) throw deserializeError(MISSING[name], `missing ${name} section`, s ?? null);
    const head = s.car;
    if (head === null || head.tag !== "Symbol") {
      throw deserializeError("ExpectedSymbol", `section at position ${i} has no name`, s);
    }
    if (head.name !== name) {
      if (isSectionName(head.name)) throw deserializeError(MISSING[name], `missing ${name} section`, s);
      throw deserializeError("UnexpectedCommand", `unknown section "${head.name}"`, s);
    }
    found[name] = s;
  });
  if (top.length > SECTIONS.length) {
    throw deserializeError("ExtraneousSection", `${top.length - SECTIONS.length} unexpected sections`, top[SECTIONS.length] ?? null);
  }
  const { header, nodes, triples, designations } = found;
  if (!header || !nodes || !triples || !designations) {
    throw deserializeError("MissingHeaderSection", "incomplete env file");
  }
  return { header, nodes, triples, designations };
}

/** Entries of a `(name entry...)` section. */
function entries(section: Sexp, what: string): Sexp[] {
  const out = isCons(section) ? listToArray(section.cdr) : null;
  if (out === null) throw deserializeError("TypeMismatch", `improper ${what} section`, section);
  return out;
}

function checkCount(what: string, actual: number, expected: number): void {
  if (actual < expected) {
    throw deserializeError("MissingData", `${what}: header declares ${expected}, found ${actual}`);
  }
  if (actual > expected) {
    throw deserializeError("ExtraneousData", `${what}: header declares ${expected}, found ${actual}`);
  }
}

// =========================================================================
// Entry points
// =========================================================================

export type DeserializeResult = {
  header: EnvHeader;
};

/**
 * Load file text into `env`, which must hold only its prelude. Nodes are
 * allocated and triples inserted before any structure is patched in, so
 * structures may refer forward.
 */
export function deserializeEnvText(env: Environment, text: string, ctx: DecodeContext): DeserializeResult {
  return loadSections(env, readSexps(text, { policy: policyEnvSerde }), ctx);
}

/** As deserializeEnvText; a missing file logs a warning and returns null. */
export function deserializeEnvFile(env: Environment, filePath: string, ctx: DecodeContext): DeserializeResult | null {
  if (!fs.existsSync(filePath)) {
    log.warn(`Env file ${filePath} not found; leaving env unchanged`);
    return null;
  }
  return loadSections(env, readFileSexps(filePath, { policy: policyEnvSerde }), ctx);
}

function loadSections(env: Environment, top: readonly Sexp[], ctx: DecodeContext): DeserializeResult {
  if (env.nodeCount() !== PRELUDE_SIZE || env.tripleCount() !== 0) {
    throw new LangError({
      tag: "InvalidState",
      actual: `env holds ${env.nodeCount()} nodes and ${env.tripleCount()} triples`,
      expected: "env holding only its prelude",
    });
  }
  const sections = checkSections(top);
  const d = new Reflector({ env: ctx.env });

  const header = envHeaderModel.reflect(sections.header, d);

  // Nodes
  const nodeEntries = entries(sections.nodes, "nodes");
  checkCount("nodes", nodeEntries.length, header.nodeCount);
  const pending: Array<[LocalNode, Sexp]> = [];
  nodeEntries.forEach((entry, i) => {
    const [sigil, structure] = isCons(entry) ? d.tuple(entry, 2, "node entry") : [entry, undefined];
    const n = localSigil(d, sigil, ctx.env, "node");
    if (n.local !== i) {
      throw deserializeError("InvalidNodeEntry", `expected node ^${i}, found ${sexpToString(sigil ?? null)}`, entry);
    }
    if (i >= PRELUDE_SIZE) {
      const local = env.insertNode(null);
      if (local !== i) {
        throw deserializeError("InvalidNodeEntry", `allocated ^${local} for entry ^${i}`, entry);
      }
    }
    if (structure !== undefined && i !== EnvPrelude.SelfEnv) {
      pending.push([i, evalStructure(structure, ctx)]);
    }
  });

  // Triples
  const tripleEntries = entries(sections.triples, "triples");
  checkCount("triples", tripleEntries.length, header.tripleCount);
  for (const entry of tripleEntries) {
    const [s, p, o] = d.tuple(entry, 3, "triple").map((x) => localSigil(d, x, ctx.env, "triple").local);
    if (s === undefined || p === undefined || o === undefined) continue;
    for (const local of [s, p, o]) {
      if (!env.hasNode(local)) {
        throw deserializeError("InvalidNodeEntry", `triple refers to unknown node`, entry);
      }
    }
    if (env.matchTriple(s, p, o) !== null) {
      throw deserializeError("InvalidNodeEntry", "duplicate triple", entry);
    }
    env.insertTriple(s, p, o);
  }

  // Structures
  for (const [local, structure] of pending) env.entryUpdate(local, structure);

  // Designations
  for (const entry of entries(sections.designations, "designations")) {
    const [c, n, symbol] = d.tuple(entry, 3, "designation");
    if (c === undefined || n === undefined || symbol === undefined) continue;
    const context = localSigil(d, c, ctx.env, "designation").local;
    const local = localSigil(d, n, ctx.env, "designation").local;
    if (!env.hasNode(context) || !env.hasNode(local)) {
      throw deserializeError("InvalidNodeEntry", "designation refers to unknown node", entry);
    }
    env.insertDesignation(local, d.symbol(symbol), context);
  }

  log.debug(`loaded ${header.nodeCount} nodes, ${header.tripleCount} triples`);
  return { header };
}

function localSigil(d: Reflector, s: Sexp | undefined, env: LocalNode, what: string): Node {
  if (s === undefined || s.tag !== "Symbol") {
    throw deserializeError("ExpectedSymbol", `${what} entry needs a node sigil`, s ?? null);
  }
  const n = d.node(s);
  if (n.env !== env) {
    throw deserializeError("InvalidNodeEntry", `${what} entry ${s.name} is not local`, s);
  }
  return n;
}
