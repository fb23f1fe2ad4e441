// src/core/sexp/symbol.ts
// Symbol validation policies and node-reference sigils

import { tripleIdFromIndex, type LocalNode } from "../env/localNode";

export type SymbolError =
  | { tag: "InvalidIdentifier"; text: string }
  | { tag: "DunderPrefix"; text: string };

/**
 * A policy decides whether text can become a Symbol. It returns null when the
 * text is accepted.
 */
export type SymbolPolicy = (text: string) => SymbolError | null;

const IDENTIFIER_RE = /^[\p{Alphabetic}_\-*!]+$/u;
const OPERATORS = new Set(["+", "-", "*", "/"]);

export function isIdentifier(text: string): boolean {
  return OPERATORS.has(text) || IDENTIFIER_RE.test(text);
}

export function isDunder(text: string): boolean {
  return text.startsWith("__");
}

/** Identifiers, excluding the `__` prefix reserved for internal forms. */
export const policyBase: SymbolPolicy = (text) => {
  if (!isIdentifier(text)) return { tag: "InvalidIdentifier", text };
  if (isDunder(text)) return { tag: "DunderPrefix", text };
  return null;
};

/** Identifiers including the internal `__` forms. */
export const policyAdmin: SymbolPolicy = (text) =>
  isIdentifier(text) ? null : { tag: "InvalidIdentifier", text };

// =========================================================================
// Node-reference sigils: ^N, ^tN, ^E^N, ^E^tN
// =========================================================================

export type AdminSymbolInfo =
  | { tag: "Identifier" }
  | { tag: "LocalNode"; local: LocalNode }
  | { tag: "LocalTriple"; index: number }
  | { tag: "GlobalNode"; env: LocalNode; local: LocalNode }
  | { tag: "GlobalTriple"; env: LocalNode; index: number };

const LOCAL_NODE_RE = /^\^(\d+)$/;
const LOCAL_TRIPLE_RE = /^\^t(\d+)$/;
const GLOBAL_NODE_RE = /^\^(\d+)\^(\d+)$/;
const GLOBAL_TRIPLE_RE = /^\^(\d+)\^t(\d+)$/;

function toInt(digits: string | undefined): number | null {
  if (digits === undefined) return null;
  const n = Number(digits);
  return Number.isSafeInteger(n) ? n : null;
}

export function parseAdminSymbol(text: string): AdminSymbolInfo | SymbolError {
  let m = LOCAL_NODE_RE.exec(text);
  if (m) {
    const local = toInt(m[1]);
    if (local !== null) return { tag: "LocalNode", local };
  }
  m = LOCAL_TRIPLE_RE.exec(text);
  if (m) {
    const index = toInt(m[1]);
    if (index !== null) return { tag: "LocalTriple", index };
  }
  m = GLOBAL_NODE_RE.exec(text);
  if (m) {
    const env = toInt(m[1]);
    const local = toInt(m[2]);
    if (env !== null && local !== null) return { tag: "GlobalNode", env, local };
  }
  m = GLOBAL_TRIPLE_RE.exec(text);
  if (m) {
    const env = toInt(m[1]);
    const index = toInt(m[2]);
    if (env !== null && index !== null) return { tag: "GlobalTriple", env, index };
  }
  return isIdentifier(text) ? { tag: "Identifier" } : { tag: "InvalidIdentifier", text };
}

/** Identifiers plus node-reference sigils; used for env files. */
export const policyEnvSerde: SymbolPolicy = (text) => {
  const info = parseAdminSymbol(text);
  return info.tag === "InvalidIdentifier" || info.tag === "DunderPrefix" ? info : null;
};

/** Resolve a sigil to (env, local) given the env it is read in. */
export function sigilToLocal(
  info: AdminSymbolInfo,
  currentEnv: LocalNode,
): { env: LocalNode; local: LocalNode } | null {
  switch (info.tag) {
    case "Identifier":
      return null;
    case "LocalNode":
      return { env: currentEnv, local: info.local };
    case "LocalTriple":
      return { env: currentEnv, local: tripleIdFromIndex(info.index) };
    case "GlobalNode":
      return { env: info.env, local: info.local };
    case "GlobalTriple":
      return { env: info.env, local: tripleIdFromIndex(info.index) };
  }
}

export function describeSymbolError(err: SymbolError): string {
  switch (err.tag) {
    case "InvalidIdentifier":
      return `invalid symbol "${err.text}"`;
    case "DunderPrefix":
      return `symbol "${err.text}" uses the reserved __ prefix`;
  }
}
