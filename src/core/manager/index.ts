// src/core/manager/index.ts
// Env manager exports

export {
  type EnvManagerOptions,
  DEFAULT_META_FILE,
  STANDARD_ENVS,
  EnvManager,
} from "./envManager";
export { createSession } from "./session";
export { nodeSigil, encodeStructure, encodeData, serializeEnv } from "./envSerializer";
export {
  type DecodeContext,
  type DeserializeResult,
  evalStructure,
  decodeData,
  deserializeEnvText,
  deserializeEnvFile,
} from "./envDeserializer";
