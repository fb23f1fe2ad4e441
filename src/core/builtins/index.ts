// src/core/builtins/index.ts
export { generateBuiltinMap } from "./builtins";
