// src/core/env/index.ts
// Environment exports

export {
  type LocalNode,
  type Node,
  TRIPLE_FLAG,
  MAX_LOCAL_INDEX,
  META_ENV,
  isTripleId,
  nodeIdFromIndex,
  tripleIdFromIndex,
  tripleIndexFromId,
  node,
  nodeEq,
  nodeKey,
  formatLocal,
  formatNode,
} from "./localNode";
export { type Environment, type Triple } from "./environment";
export { MemEnv } from "./memEnv";
export { type EnvCell, type EnvPolicy, SharedOverlay, SimplePolicy } from "./overlay";
export {
  EnvPrelude,
  PRELUDE_SIZE,
  PRELUDE_NAMES,
  preludeFromName,
  isPrelude,
  populatePrelude,
} from "./prelude";
