// src/core/serde/index.ts
// Reification protocol exports

export { type ReifyOptions, Reifier } from "./reify";
export { type ReflectOptions, type Variant, StructFields, Reflector } from "./reflect";
export { type Model } from "./model";
export {
  type Version,
  ENV_FORMAT_VERSION,
  parseVersion,
  formatVersion,
  compareVersions,
  versionModel,
} from "./version";
export {
  isProcedureHead,
  procedureModel,
  symNodeTableModel,
  symSexpTableModel,
  localNodeTableModel,
  TABLE_HEADS,
} from "./models";
export { type EnvHeader, newHeader, envHeaderModel } from "./header";
