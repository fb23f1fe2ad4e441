// src/core/env/overlay.ts
// Environment overlays and the policy that creates stored environments

import type { Sexp } from "../sexp/sexp";
import type { Environment, Triple } from "./environment";
import type { LocalNode } from "./localNode";
import { MemEnv } from "./memEnv";

/** Single shared cell through which every holder reaches the same env. */
export type EnvCell = { env: Environment };

/**
 * Delegates every operation to the environment in its cell. Replacing the
 * cell's env redirects all holders at once.
 */
export class SharedOverlay implements Environment {
  constructor(private readonly cell: EnvCell) {}

  get base(): Environment {
    return this.cell.env;
  }

  allNodes(): LocalNode[] { return this.cell.env.allNodes(); }
  nodeCount(): number { return this.cell.env.nodeCount(); }
  tripleCount(): number { return this.cell.env.tripleCount(); }
  hasNode(local: LocalNode): boolean { return this.cell.env.hasNode(local); }

  insertNode(structure: Sexp | null): LocalNode {
    return this.cell.env.insertNode(structure);
  }

  insertTriple(subject: LocalNode, predicate: LocalNode, object: LocalNode): LocalNode {
    return this.cell.env.insertTriple(subject, predicate, object);
  }

  matchSubject(local: LocalNode): LocalNode[] { return this.cell.env.matchSubject(local); }
  matchPredicate(local: LocalNode): LocalNode[] { return this.cell.env.matchPredicate(local); }
  matchObject(local: LocalNode): LocalNode[] { return this.cell.env.matchObject(local); }

  matchButSubject(predicate: LocalNode, object: LocalNode): LocalNode[] {
    return this.cell.env.matchButSubject(predicate, object);
  }

  matchButPredicate(subject: LocalNode, object: LocalNode): LocalNode[] {
    return this.cell.env.matchButPredicate(subject, object);
  }

  matchButObject(subject: LocalNode, predicate: LocalNode): LocalNode[] {
    return this.cell.env.matchButObject(subject, predicate);
  }

  matchTriple(subject: LocalNode, predicate: LocalNode, object: LocalNode): LocalNode | null {
    return this.cell.env.matchTriple(subject, predicate, object);
  }

  matchAll(): LocalNode[] { return this.cell.env.matchAll(); }
  matchAny(local: LocalNode): LocalNode[] { return this.cell.env.matchAny(local); }

  entry(local: LocalNode): Sexp | null { return this.cell.env.entry(local); }

  entryMut(local: LocalNode, update: (structure: Sexp | null) => Sexp | null): void {
    this.cell.env.entryMut(local, update);
  }

  entryUpdate(local: LocalNode, structure: Sexp | null): void {
    this.cell.env.entryUpdate(local, structure);
  }

  nodeAsTriple(local: LocalNode): Triple | null { return this.cell.env.nodeAsTriple(local); }
  tripleSubject(triple: LocalNode): LocalNode { return this.cell.env.tripleSubject(triple); }
  triplePredicate(triple: LocalNode): LocalNode { return this.cell.env.triplePredicate(triple); }
  tripleObject(triple: LocalNode): LocalNode { return this.cell.env.tripleObject(triple); }
  tripleIndex(triple: LocalNode): number { return this.cell.env.tripleIndex(triple); }
  tripleFromIndex(index: number): LocalNode { return this.cell.env.tripleFromIndex(index); }

  insertDesignation(local: LocalNode, symbol: string, context: LocalNode): void {
    this.cell.env.insertDesignation(local, symbol, context);
  }

  matchDesignation(symbol: string, context: LocalNode): LocalNode | null {
    return this.cell.env.matchDesignation(symbol, context);
  }

  findDesignation(local: LocalNode, context: LocalNode): string | null {
    return this.cell.env.findDesignation(local, context);
  }

  designationPairs(context: LocalNode): Array<[string, LocalNode]> {
    return this.cell.env.designationPairs(context);
  }

  designationContexts(): LocalNode[] {
    return this.cell.env.designationContexts();
  }
}

/** Decides which backend new environments get. */
export interface EnvPolicy {
  createEnv(): Environment;
}

export class SimplePolicy implements EnvPolicy {
  createEnv(): Environment {
    return new SharedOverlay({ env: new MemEnv() });
  }
}
