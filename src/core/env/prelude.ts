// src/core/env/prelude.ts
// Reserved nodes present at the start of every environment

import { nodeSexp } from "../sexp/sexp";
import type { Environment } from "./environment";
import { META_ENV, node, type LocalNode } from "./localNode";

export const EnvPrelude = {
  /** Structure: this env's own Node in the meta-env. */
  SelfEnv: 0,
  /** Designation context node. */
  Designation: 1,
  /** Structure, when present: a procedure vetting every new triple. */
  TellHandler: 2,
} as const;

export const PRELUDE_SIZE = 10;

export const PRELUDE_NAMES: ReadonlyArray<readonly [string, LocalNode]> = [
  ["self_env", EnvPrelude.SelfEnv],
  ["self_des", EnvPrelude.Designation],
  ["tell_handler", EnvPrelude.TellHandler],
];

export function preludeFromName(name: string): LocalNode | null {
  for (const [n, local] of PRELUDE_NAMES) {
    if (n === name) return local;
  }
  return null;
}

export function isPrelude(local: LocalNode): boolean {
  return local < PRELUDE_SIZE;
}

/**
 * Populate the reserved nodes of a freshly created env. `envNode` is the env's
 * node in the meta-env (0 for the meta-env itself).
 */
export function populatePrelude(env: Environment, envNode: LocalNode): void {
  if (env.nodeCount() !== 0) {
    throw new Error("populatePrelude: environment is not empty");
  }
  env.insertNode(nodeSexp(node(META_ENV, envNode)));
  for (let i = 1; i < PRELUDE_SIZE; i++) {
    env.insertNode(null);
  }
  for (const [name, local] of PRELUDE_NAMES) {
    env.insertDesignation(local, name, EnvPrelude.Designation);
  }
}
