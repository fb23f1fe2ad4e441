// src/core/env/localNode.ts
// Local ids and globally addressed Nodes

/**
 * A LocalNode identifies either a node or a triple inside one environment.
 * Triple ids live above TRIPLE_FLAG; node ids live below it.
 */
export type LocalNode = number;

export const TRIPLE_FLAG = 2 ** 52;
export const MAX_LOCAL_INDEX = TRIPLE_FLAG - 1;

export function isTripleId(id: LocalNode): boolean {
  return id >= TRIPLE_FLAG;
}

export function nodeIdFromIndex(index: number): LocalNode {
  if (!Number.isSafeInteger(index) || index < 0 || index > MAX_LOCAL_INDEX) {
    throw new Error(`LocalNode: node index ${index} out of range`);
  }
  return index;
}

export function tripleIdFromIndex(index: number): LocalNode {
  if (!Number.isSafeInteger(index) || index < 0 || index > MAX_LOCAL_INDEX) {
    throw new Error(`LocalNode: triple index ${index} out of range`);
  }
  return TRIPLE_FLAG + index;
}

export function tripleIndexFromId(id: LocalNode): number {
  if (!isTripleId(id)) {
    throw new Error(`LocalNode: ${id} is not a triple id`);
  }
  return id - TRIPLE_FLAG;
}

// =========================================================================
// Node
// =========================================================================

/** A (env, local) pair; `env` is the env's node id inside the meta-env. */
export type Node = {
  readonly env: LocalNode;
  readonly local: LocalNode;
};

/** Env id of the meta-env itself. */
export const META_ENV: LocalNode = 0;

export function node(env: LocalNode, local: LocalNode): Node {
  return { env, local };
}

export function nodeEq(a: Node, b: Node): boolean {
  return a.env === b.env && a.local === b.local;
}

/** String key for Maps and Sets keyed by Node. */
export function nodeKey(n: Node): string {
  return `${n.env}/${n.local}`;
}

/** Debug label used when no designation is available. */
export function formatLocal(id: LocalNode): string {
  return isTripleId(id) ? `t${tripleIndexFromId(id)}` : String(id);
}

export function formatNode(n: Node): string {
  return `[Node_${n.env}_${formatLocal(n.local)}]`;
}
