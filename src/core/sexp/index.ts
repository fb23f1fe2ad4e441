// src/core/sexp/index.ts
// S-expression model exports

export {
  type Sexp,
  type Primitive,
  type PrimitiveTag,
  type Cons,
  type ListItem,
  type PrintOptions,
  int,
  float,
  sym,
  str,
  path,
  nodeSexp,
  procSexp,
  vector,
  nil,
  cons,
  list,
  isNil,
  isCons,
  isSymbol,
  asNode,
  listItems,
  listToArray,
  sexpEq,
  primitiveToString,
  writeSexp,
  sexpToString,
  MAX_PRINT_DEPTH,
  MAX_PRINT_LENGTH,
} from "./sexp";

export { type LangNumber, type ArithOp, NumberError, parseNumber, formatNumber, arith } from "./number";
export { escapeString, unescapeString, unescapeChar } from "./string";
export {
  type SymbolError,
  type SymbolPolicy,
  type AdminSymbolInfo,
  isIdentifier,
  isDunder,
  policyBase,
  policyAdmin,
  policyEnvSerde,
  parseAdminSymbol,
  sigilToLocal,
  describeSymbolError,
} from "./symbol";
export { Table, SymNodeTable, SymSexpTable, LocalNodeTable } from "./table";
export {
  type Procedure,
  application,
  abstraction,
  interpreterAbstraction,
  sequence,
  branch,
  procedureEq,
} from "./procedure";
export { type BuiltIn, type BuiltInFn, builtinSexp } from "./builtin";
