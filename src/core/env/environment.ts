// src/core/env/environment.ts
// Environment: a triple store of nodes with optional structures and designations

import type { Sexp } from "../sexp/sexp";
import type { LocalNode } from "./localNode";

export type Triple = {
  readonly subject: LocalNode;
  readonly predicate: LocalNode;
  readonly object: LocalNode;
};

/**
 * An Environment owns nodes (each with an optional structure), triples over
 * those nodes (each triple is itself addressable), and per-context
 * designations mapping symbols to nodes.
 *
 * Ids handed out by an environment are never reused; triple ids and node ids
 * are disjoint.
 */
export interface Environment {
  /** All node ids (not triples), ascending. */
  allNodes(): LocalNode[];
  nodeCount(): number;
  tripleCount(): number;
  /** True for an issued node or triple id. */
  hasNode(local: LocalNode): boolean;

  insertNode(structure: Sexp | null): LocalNode;
  /** Insert a triple and return its id. Callers check for duplicates. */
  insertTriple(subject: LocalNode, predicate: LocalNode, object: LocalNode): LocalNode;

  /** Triples with `local` as subject, ascending. */
  matchSubject(local: LocalNode): LocalNode[];
  matchPredicate(local: LocalNode): LocalNode[];
  matchObject(local: LocalNode): LocalNode[];
  matchButSubject(predicate: LocalNode, object: LocalNode): LocalNode[];
  matchButPredicate(subject: LocalNode, object: LocalNode): LocalNode[];
  matchButObject(subject: LocalNode, predicate: LocalNode): LocalNode[];
  matchTriple(subject: LocalNode, predicate: LocalNode, object: LocalNode): LocalNode | null;
  matchAll(): LocalNode[];
  /** Triples mentioning `local` in any role. */
  matchAny(local: LocalNode): LocalNode[];

  /** Structure of a node; null for atomic nodes and triples. */
  entry(local: LocalNode): Sexp | null;
  /**
   * Scoped mutable access: the store is updated with the callback's result
   * when the callback returns.
   */
  entryMut(local: LocalNode, update: (structure: Sexp | null) => Sexp | null): void;
  entryUpdate(local: LocalNode, structure: Sexp | null): void;

  nodeAsTriple(local: LocalNode): Triple | null;
  tripleSubject(triple: LocalNode): LocalNode;
  triplePredicate(triple: LocalNode): LocalNode;
  tripleObject(triple: LocalNode): LocalNode;
  /** Dense position of a triple, usable for external indexing. */
  tripleIndex(triple: LocalNode): number;
  tripleFromIndex(index: number): LocalNode;

  /** Bind `symbol` ↔ `local` in `context`, displacing any previous pairing of either. */
  insertDesignation(local: LocalNode, symbol: string, context: LocalNode): void;
  matchDesignation(symbol: string, context: LocalNode): LocalNode | null;
  findDesignation(local: LocalNode, context: LocalNode): string | null;
  /** (symbol, node) pairs of a context, ordered by node. */
  designationPairs(context: LocalNode): Array<[string, LocalNode]>;
  designationContexts(): LocalNode[];
}
