// src/core/error/index.ts
// Error model exports

export {
  type ExpectedCount,
  type LangErrorKind,
  type ParseErrorReason,
  type TokenizeErrorReason,
  type DeserializeErrorReason,
  type ErrorKind,
  type ErrorTag,
  exactly,
  atLeast,
  atMost,
  formatExpectedCount,
  describeKind,
  LangError,
  isLangError,
  reifyKind,
  deserializeError,
  ioError,
} from "./errors";
