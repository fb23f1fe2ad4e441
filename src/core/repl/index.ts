// src/core/repl/index.ts
export { type ReplResult, type ReplOptions, PROMPT, CONTINUATION_PROMPT, Repl } from "./repl";
