// src/core/reader/parse.ts
// Token stream → s-expressions (quote sugar, dotted pairs, depth limit)

import { LangError, type ParseErrorReason } from "../error/errors";
import { list, sym, type Sexp } from "../sexp/sexp";
import type { Transform } from "./stream";
import type { TokenInfo } from "./tokenize";

export const MAX_PARSE_DEPTH = 128;

type ListFrame = {
  kind: "List";
  open: TokenInfo;
  items: Sexp[];
  /** Set once a period has been read. */
  period: TokenInfo | null;
  tail: Sexp | null;
};

type QuoteFrame = { kind: "Quote"; token: TokenInfo };

type Frame = ListFrame | QuoteFrame;

function parseError(reason: ParseErrorReason, at: TokenInfo): LangError {
  return new LangError({ tag: "ParseError", reason, line: at.line, token: at.text });
}

export class Parser implements Transform<TokenInfo, Sexp> {
  private stack: Frame[] = [];
  private ready: Sexp[] = [];

  constructor(private readonly maxDepth: number = MAX_PARSE_DEPTH) {}

  input(info: TokenInfo): boolean {
    const token = info.token;
    switch (token.tag) {
      case "Comment":
        break;
      case "LeftParen":
        this.checkDepth(info);
        this.stack.push({ kind: "List", open: info, items: [], period: null, tail: null });
        break;
      case "Quote":
        this.checkDepth(info);
        this.stack.push({ kind: "Quote", token: info });
        break;
      case "Period": {
        const top = this.stack[this.stack.length - 1];
        if (!top || top.kind !== "List" || top.items.length === 0) {
          throw parseError("IsolatedPeriod", info);
        }
        if (top.period) throw parseError("NotPenultimatePeriod", info);
        top.period = info;
        break;
      }
      case "RightParen": {
        const top = this.stack[this.stack.length - 1];
        if (!top) throw parseError("UnmatchedClose", info);
        if (top.kind === "Quote") throw parseError("TrailingQuote", top.token);
        if (top.period && top.tail === null) throw parseError("NotPenultimatePeriod", top.period);
        this.stack.pop();
        this.emit(list(top.items, top.tail), info);
        break;
      }
      case "Primitive":
        this.emit(token.value, info);
        break;
    }
    return this.ready.length > 0;
  }

  output(): Sexp | undefined {
    return this.ready.shift();
  }

  /** Raise on any unfinished list or quote. */
  finish(): void {
    const outermost = this.stack[0];
    if (!outermost) return;
    this.reset();
    if (outermost.kind === "List") throw parseError("UnmatchedOpen", outermost.open);
    throw parseError("TrailingQuote", outermost.token);
  }

  /** True while a datum is partially read. */
  get pending(): boolean {
    return this.stack.length > 0;
  }

  reset(): void {
    this.stack = [];
    this.ready = [];
  }

  private checkDepth(info: TokenInfo): void {
    if (this.stack.length >= this.maxDepth) throw parseError("DepthOverflow", info);
  }

  private emit(datum: Sexp, at: TokenInfo): void {
    let value = datum;
    for (;;) {
      const top = this.stack[this.stack.length - 1];
      if (!top) {
        this.ready.push(value);
        return;
      }
      if (top.kind === "Quote") {
        this.stack.pop();
        value = list([sym("quote"), value]);
        continue;
      }
      if (top.period) {
        if (top.tail !== null) throw parseError("NotPenultimatePeriod", at);
        top.tail = value;
      } else {
        top.items.push(value);
      }
      return;
    }
  }
}
