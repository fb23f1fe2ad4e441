// src/core/reader/read.ts
// Convenience readers over strings and files

import { LangError } from "../error/errors";
import type { Sexp } from "../sexp/sexp";
import { policyBase, type SymbolPolicy } from "../sexp/symbol";
import { MAX_PARSE_DEPTH, Parser } from "./parse";
import { fileLines, pipe, stringLines, type Strategy } from "./stream";
import { TokenizeTransform } from "./tokenize";

export type ReadOptions = {
  policy?: SymbolPolicy;
  maxDepth?: number;
  strategy?: Strategy;
};

/** Lazily parse s-expressions from a source of lines. */
export function sexpStream(lines: Iterable<string>, options: ReadOptions = {}): IterableIterator<Sexp> {
  const tokens = pipe(lines, new TokenizeTransform(options.policy ?? policyBase), options.strategy);
  return pipe(tokens, new Parser(options.maxDepth ?? MAX_PARSE_DEPTH), options.strategy);
}

export function readSexps(text: string, options: ReadOptions = {}): Sexp[] {
  return [...sexpStream(stringLines(text), options)];
}

export function readFileSexps(filePath: string, options: ReadOptions = {}): Sexp[] {
  return [...sexpStream(fileLines(filePath), options)];
}

/** Parse text holding exactly one datum. */
export function parseSexp(text: string, options: ReadOptions = {}): Sexp {
  const all = readSexps(text, options);
  const only = all[0];
  if (all.length !== 1 || only === undefined) {
    throw new LangError({
      tag: "InvalidState",
      actual: `${all.length} expressions`,
      expected: "exactly one expression",
    });
  }
  return only;
}
