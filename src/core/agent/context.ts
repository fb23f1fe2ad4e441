// src/core/agent/context.ts
// Well-known nodes of the meta-env and of the lang env, resolved by designation

import type { Environment } from "../env/environment";
import { META_ENV, node, type LocalNode, type Node } from "../env/localNode";
import { EnvPrelude } from "../env/prelude";
import { LangError } from "../error/errors";

// =========================================================================
// Meta-env context
// =========================================================================

export type MetaEnvContext = {
  /** Predicate of `(importer imports exporter)` meta triples. */
  readonly imports: LocalNode;
  /** Predicate from an imports triple to its LocalNodeTable node. */
  readonly importTable: LocalNode;
  /** Predicate from an env node to its Path node. */
  readonly serializePath: LocalNode;
};

export const META_SYMBOLS: { readonly [K in keyof MetaEnvContext]: string } = {
  imports: "imports",
  importTable: "import_table",
  serializePath: "serialize_path",
};

// =========================================================================
// Lang context
// =========================================================================

export const LANG_SYMBOLS = {
  quote: "quote",
  lambda: "lambda",
  fexpr: "fexpr",
  def: "def",
  node: "node",
  set: "set!",
  letBasic: "let",
  letRec: "letrec",
  branch: "if",
  progn: "progn",
  tell: "tell",
  ask: "ask",
  curr: "curr",
  jump: "jump",
  import: "import",
  envFind: "env_find",
  apply: "apply",
  eval: "eval",
  exec: "exec",
  t: "true",
  f: "false",
  placeholder: "_",
  anon: "anon",
  label: "label",
} as const;

export type LangContextKey = keyof typeof LANG_SYMBOLS;

export type LangContext = {
  /** Meta node of the lang env; every other field is local to it. */
  readonly langEnv: LocalNode;
} & { readonly [K in LangContextKey]: LocalNode };

export function langNode(ctx: LangContext, key: LangContextKey): Node {
  return node(ctx.langEnv, ctx[key]);
}

/** Context key of a lang-env local, if it is a well-known node. */
export function langKeyOf(ctx: LangContext, local: LocalNode): LangContextKey | null {
  for (const key of LANG_KEYS) {
    if (ctx[key] === local) return key;
  }
  return null;
}

export const LANG_KEYS: readonly LangContextKey[] = [
  "quote", "lambda", "fexpr", "def", "node", "set", "letBasic", "letRec", "branch",
  "progn", "tell", "ask", "curr", "jump", "import", "envFind", "apply", "eval", "exec",
  "t", "f", "placeholder", "anon", "label",
];

// =========================================================================
// Loading
// =========================================================================

export type LoadMode = {
  /** Create and designate missing nodes instead of failing. */
  bootstrap: boolean;
};

function lookupOrCreate(env: Environment, name: string, mode: LoadMode, where: string): LocalNode {
  const found = env.matchDesignation(name, EnvPrelude.Designation);
  if (found !== null) return found;
  if (!mode.bootstrap) {
    throw new LangError({
      tag: "InvalidState",
      actual: `"${name}" is not designated in the ${where}`,
      expected: `well-known node "${name}"`,
    });
  }
  const local = env.insertNode(null);
  env.insertDesignation(local, name, EnvPrelude.Designation);
  return local;
}

export function loadMetaContext(meta: Environment, mode: LoadMode): MetaEnvContext {
  return {
    imports: lookupOrCreate(meta, META_SYMBOLS.imports, mode, "meta env"),
    importTable: lookupOrCreate(meta, META_SYMBOLS.importTable, mode, "meta env"),
    serializePath: lookupOrCreate(meta, META_SYMBOLS.serializePath, mode, "meta env"),
  };
}

/** The Environment held as the structure of an env node in the meta-env. */
export function envFromMeta(meta: Environment, envNode: LocalNode): Environment {
  if (envNode === META_ENV) return meta;
  const structure = meta.hasNode(envNode) ? meta.entry(envNode) : null;
  if (structure === null || structure.tag !== "Env") {
    throw new LangError({
      tag: "InvalidState",
      actual: `meta node ${envNode} holds no environment`,
      expected: "environment node",
    });
  }
  return structure.env;
}

export function loadLangContext(meta: Environment, langEnv: LocalNode, mode: LoadMode): LangContext {
  const env = envFromMeta(meta, langEnv);
  const get = (key: LangContextKey) => lookupOrCreate(env, LANG_SYMBOLS[key], mode, "lang env");
  return {
    langEnv,
    quote: get("quote"),
    lambda: get("lambda"),
    fexpr: get("fexpr"),
    def: get("def"),
    node: get("node"),
    set: get("set"),
    letBasic: get("letBasic"),
    letRec: get("letRec"),
    branch: get("branch"),
    progn: get("progn"),
    tell: get("tell"),
    ask: get("ask"),
    curr: get("curr"),
    jump: get("jump"),
    import: get("import"),
    envFind: get("envFind"),
    apply: get("apply"),
    eval: get("eval"),
    exec: get("exec"),
    t: get("t"),
    f: get("f"),
    placeholder: get("placeholder"),
    anon: get("anon"),
    label: get("label"),
  };
}
