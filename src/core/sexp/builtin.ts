// src/core/sexp/builtin.ts
// Host functions callable from the language

import type { Agent } from "../agent/agent";
import type { Sexp } from "./sexp";

/** Receives already-executed arguments. */
export type BuiltInFn = (args: Sexp[], agent: Agent) => Sexp;

export type BuiltIn = {
  readonly name: string;
  readonly fn: BuiltInFn;
};

export function builtinSexp(builtin: BuiltIn): Sexp {
  return { tag: "BuiltIn", builtin };
}
