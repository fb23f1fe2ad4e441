// src/core/env/memEnv.ts
// In-memory Environment backend

import type { Sexp } from "../sexp/sexp";
import type { Environment, Triple } from "./environment";
import {
  isTripleId,
  nodeIdFromIndex,
  tripleIdFromIndex,
  tripleIndexFromId,
  type LocalNode,
} from "./localNode";

type Edges = {
  asSubject: LocalNode[];
  asPredicate: LocalNode[];
  asObject: LocalNode[];
};

type NodeRecord = { structure: Sexp | null; edges: Edges };
type TripleRecord = { triple: Triple; edges: Edges };

type Designations = {
  bySymbol: Map<string, LocalNode>;
  byNode: Map<LocalNode, string>;
};

function emptyEdges(): Edges {
  return { asSubject: [], asPredicate: [], asObject: [] };
}

/** Intersection of two ascending arrays. */
function intersectSorted(a: readonly LocalNode[], b: readonly LocalNode[]): LocalNode[] {
  const out: LocalNode[] = [];
  let i = 0;
  let j = 0;
  while (i < a.length && j < b.length) {
    const x = a[i] ?? 0;
    const y = b[j] ?? 0;
    if (x === y) {
      out.push(x);
      i++;
      j++;
    } else if (x < y) {
      i++;
    } else {
      j++;
    }
  }
  return out;
}

/** Union of ascending arrays, deduplicated. */
function unionSorted(...lists: ReadonlyArray<readonly LocalNode[]>): LocalNode[] {
  const all = new Set<LocalNode>();
  for (const l of lists) for (const x of l) all.add(x);
  return [...all].sort((a, b) => a - b);
}

/**
 * Nodes and triples live in two dense arrays indexed by their id (node) or
 * index (triple). Edge lists stay ascending because new triples always get the
 * largest id so far.
 */
export class MemEnv implements Environment {
  private readonly nodes: NodeRecord[] = [];
  private readonly triples: TripleRecord[] = [];
  private readonly tripleKeys = new Map<string, LocalNode>();
  private readonly designations = new Map<LocalNode, Designations>();

  allNodes(): LocalNode[] {
    return this.nodes.map((_, i) => i);
  }

  nodeCount(): number {
    return this.nodes.length;
  }

  tripleCount(): number {
    return this.triples.length;
  }

  hasNode(local: LocalNode): boolean {
    if (isTripleId(local)) return tripleIndexFromId(local) < this.triples.length;
    return Number.isInteger(local) && local >= 0 && local < this.nodes.length;
  }

  insertNode(structure: Sexp | null): LocalNode {
    const id = nodeIdFromIndex(this.nodes.length);
    this.nodes.push({ structure, edges: emptyEdges() });
    return id;
  }

  insertTriple(subject: LocalNode, predicate: LocalNode, object: LocalNode): LocalNode {
    const s = this.edges(subject);
    const p = this.edges(predicate);
    const o = this.edges(object);
    const id = tripleIdFromIndex(this.triples.length);
    this.triples.push({ triple: { subject, predicate, object }, edges: emptyEdges() });
    this.tripleKeys.set(`${subject} ${predicate} ${object}`, id);
    s.asSubject.push(id);
    p.asPredicate.push(id);
    o.asObject.push(id);
    return id;
  }

  matchSubject(local: LocalNode): LocalNode[] {
    return [...this.edges(local).asSubject];
  }

  matchPredicate(local: LocalNode): LocalNode[] {
    return [...this.edges(local).asPredicate];
  }

  matchObject(local: LocalNode): LocalNode[] {
    return [...this.edges(local).asObject];
  }

  matchButSubject(predicate: LocalNode, object: LocalNode): LocalNode[] {
    return intersectSorted(this.edges(predicate).asPredicate, this.edges(object).asObject);
  }

  matchButPredicate(subject: LocalNode, object: LocalNode): LocalNode[] {
    return intersectSorted(this.edges(subject).asSubject, this.edges(object).asObject);
  }

  matchButObject(subject: LocalNode, predicate: LocalNode): LocalNode[] {
    return intersectSorted(this.edges(subject).asSubject, this.edges(predicate).asPredicate);
  }

  matchTriple(subject: LocalNode, predicate: LocalNode, object: LocalNode): LocalNode | null {
    return this.tripleKeys.get(`${subject} ${predicate} ${object}`) ?? null;
  }

  matchAll(): LocalNode[] {
    return this.triples.map((_, i) => tripleIdFromIndex(i));
  }

  matchAny(local: LocalNode): LocalNode[] {
    const e = this.edges(local);
    return unionSorted(e.asSubject, e.asPredicate, e.asObject);
  }

  entry(local: LocalNode): Sexp | null {
    if (isTripleId(local)) {
      this.tripleRecord(local);
      return null;
    }
    return this.nodeRecord(local).structure;
  }

  entryMut(local: LocalNode, update: (structure: Sexp | null) => Sexp | null): void {
    const record = this.nodeRecord(local);
    record.structure = update(record.structure);
  }

  entryUpdate(local: LocalNode, structure: Sexp | null): void {
    this.nodeRecord(local).structure = structure;
  }

  nodeAsTriple(local: LocalNode): Triple | null {
    if (!isTripleId(local)) return null;
    return this.tripleRecord(local).triple;
  }

  tripleSubject(triple: LocalNode): LocalNode {
    return this.tripleRecord(triple).triple.subject;
  }

  triplePredicate(triple: LocalNode): LocalNode {
    return this.tripleRecord(triple).triple.predicate;
  }

  tripleObject(triple: LocalNode): LocalNode {
    return this.tripleRecord(triple).triple.object;
  }

  tripleIndex(triple: LocalNode): number {
    this.tripleRecord(triple);
    return tripleIndexFromId(triple);
  }

  tripleFromIndex(index: number): LocalNode {
    if (index < 0 || index >= this.triples.length) {
      throw new Error(`MemEnv.tripleFromIndex: invalid index ${index}`);
    }
    return tripleIdFromIndex(index);
  }

  insertDesignation(local: LocalNode, symbol: string, context: LocalNode): void {
    this.edges(local);
    let d = this.designations.get(context);
    if (!d) {
      d = { bySymbol: new Map(), byNode: new Map() };
      this.designations.set(context, d);
    }
    const prevNode = d.bySymbol.get(symbol);
    if (prevNode !== undefined) d.byNode.delete(prevNode);
    const prevSymbol = d.byNode.get(local);
    if (prevSymbol !== undefined) d.bySymbol.delete(prevSymbol);
    d.bySymbol.set(symbol, local);
    d.byNode.set(local, symbol);
  }

  matchDesignation(symbol: string, context: LocalNode): LocalNode | null {
    return this.designations.get(context)?.bySymbol.get(symbol) ?? null;
  }

  findDesignation(local: LocalNode, context: LocalNode): string | null {
    return this.designations.get(context)?.byNode.get(local) ?? null;
  }

  designationPairs(context: LocalNode): Array<[string, LocalNode]> {
    const d = this.designations.get(context);
    if (!d) return [];
    return [...d.byNode.entries()]
      .sort((a, b) => a[0] - b[0])
      .map(([local, symbol]): [string, LocalNode] => [symbol, local]);
  }

  designationContexts(): LocalNode[] {
    return [...this.designations.keys()].sort((a, b) => a - b);
  }

  // ----- internals -----

  private nodeRecord(local: LocalNode): NodeRecord {
    const record = isTripleId(local) ? undefined : this.nodes[local];
    if (!record) {
      throw new Error(`MemEnv: invalid node ${local}`);
    }
    return record;
  }

  private tripleRecord(local: LocalNode): TripleRecord {
    const record = isTripleId(local) ? this.triples[tripleIndexFromId(local)] : undefined;
    if (!record) {
      throw new Error(`MemEnv: invalid triple ${local}`);
    }
    return record;
  }

  private edges(local: LocalNode): Edges {
    return isTripleId(local) ? this.tripleRecord(local).edges : this.nodeRecord(local).edges;
  }
}
