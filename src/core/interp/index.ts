// src/core/interp/index.ts
// Interpreter exports

export { SyntacticInterpreter } from "./syntactic";
export { type ExecEnvs, ExecInterpreter } from "./exec";
export {
  type LambdaParts,
  type LetParts,
  expectCount,
  properArgs,
  quoteWrapper,
  lambdaWrapper,
  letWrapper,
  tellWrapper,
  defWrapper,
  anonDefWrapper,
  applyWrapper,
  singleWrapper,
} from "./wrappers";
