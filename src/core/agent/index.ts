// src/core/agent/index.ts
// Agent exports

export { type AgentOptions, Agent } from "./agent";
export {
  type MetaEnvContext,
  type LangContext,
  type LangContextKey,
  type LoadMode,
  META_SYMBOLS,
  LANG_SYMBOLS,
  LANG_KEYS,
  langNode,
  langKeyOf,
  loadMetaContext,
  loadLangContext,
  envFromMeta,
} from "./context";
export { type EnvFrame, type ExecSnapshot, Continuation, ExecFrame } from "./frames";
export { type Interpreter, type Executor, type InterpreterFactory } from "./interpreter";
