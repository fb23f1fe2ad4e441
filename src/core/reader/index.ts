// src/core/reader/index.ts
// Reader exports

export { type Token, type TokenInfo, Tokenizer, TokenizeTransform } from "./tokenize";
export { MAX_PARSE_DEPTH, Parser } from "./parse";
export {
  type Transform,
  type Strategy,
  TransformStream,
  pipe,
  stringLines,
  fileLines,
} from "./stream";
export { type ReadOptions, sexpStream, readSexps, readFileSexps, parseSexp } from "./read";
