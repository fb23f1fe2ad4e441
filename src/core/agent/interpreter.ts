// src/core/agent/interpreter.ts
// Seams between the agent and the interpreters it drives

import type { Node } from "../env/localNode";
import type { Sexp } from "../sexp/sexp";
import type { SymNodeTable } from "../sexp/table";

/** Lowers surface s-expressions into meanings (Nodes and Procedures). */
export interface Interpreter {
  internalize(structure: Sexp): Sexp;
}

/** Executes meanings. */
export interface Executor {
  /** Execute a meaning; non-Node meanings are recorded first. */
  contemplate(meaning: Sexp): Sexp;
  /** Apply `proc` to `args` inside a fresh exec frame. */
  call(proc: Node, args: Node[]): Sexp;
}

/** Builds a syntactic interpreter, optionally seeded with one lexical frame. */
export type InterpreterFactory = (frame: SymNodeTable | null) => Interpreter;
