// src/core/reader/tokenize.ts
// Push-driven, line-at-a-time tokenizer

import { LangError } from "../error/errors";
import { NumberError, parseNumber, type LangNumber } from "../sexp/number";
import type { Primitive } from "../sexp/sexp";
import { unescapeChar } from "../sexp/string";
import { describeSymbolError, policyBase, type SymbolPolicy } from "../sexp/symbol";
import type { Transform } from "./stream";

export type Token =
  | { tag: "LeftParen" }
  | { tag: "RightParen" }
  | { tag: "Quote" }
  | { tag: "Period" }
  | { tag: "Comment"; text: string }
  | { tag: "Primitive"; value: Primitive };

export type TokenInfo = {
  token: Token;
  /** 1-based line the token ended on. */
  line: number;
  /** Source text of the token. */
  text: string;
};

type TokenizerState =
  | { tag: "Base" }
  | { tag: "InString"; buf: string; startLine: number }
  | { tag: "InStringEscaped"; buf: string; startLine: number };

function isWhitespace(c: string): boolean {
  return c === " " || c === "\t" || c === "\r" || c === "\n" || c === "\f" || c === "\v";
}

/**
 * Feed lines with `tokenizeLine`; tokens completed on each line are returned.
 * Strings may span lines. Call `finish` at end of input.
 */
export class Tokenizer {
  private state: TokenizerState = { tag: "Base" };
  private line = 0;
  private parenDepth = 0;
  private quotePending = false;

  constructor(private readonly policy: SymbolPolicy = policyBase) {}

  /**
   * Nesting depth of unfinished input: open parens, plus one for an open string
   * or a quote still waiting for its datum.
   */
  depth(): number {
    const inString = this.state.tag !== "Base" ? 1 : 0;
    return this.parenDepth + Math.max(inString, this.quotePending ? 1 : 0);
  }

  get currentLine(): number {
    return this.line;
  }

  /** Drop all partial input. */
  clear(): void {
    this.state = { tag: "Base" };
    this.parenDepth = 0;
    this.quotePending = false;
  }

  tokenizeLine(text: string): TokenInfo[] {
    this.line++;
    const out: TokenInfo[] = [];
    let atom = "";

    const flush = () => {
      if (atom.length > 0) {
        out.push(this.atomToken(atom));
        atom = "";
      }
    };

    for (let i = 0; i < text.length; i++) {
      const c = text.charAt(i);
      const state = this.state;

      if (state.tag === "InString") {
        if (c === "\"") {
          this.state = { tag: "Base" };
          this.push(out, { tag: "Primitive", value: { tag: "String", s: state.buf } }, `"${state.buf}"`);
        } else if (c === "\\") {
          this.state = { tag: "InStringEscaped", buf: state.buf, startLine: state.startLine };
        } else {
          state.buf += c;
        }
        continue;
      }
      if (state.tag === "InStringEscaped") {
        this.state = { tag: "InString", buf: state.buf + unescapeChar(c), startLine: state.startLine };
        continue;
      }

      if (isWhitespace(c)) {
        flush();
      } else if (c === ";") {
        flush();
        this.push(out, { tag: "Comment", text: text.slice(i + 1) }, text.slice(i));
        break;
      } else if (c === "(") {
        flush();
        this.parenDepth++;
        this.push(out, { tag: "LeftParen" }, c);
      } else if (c === ")") {
        flush();
        this.parenDepth = Math.max(0, this.parenDepth - 1);
        this.push(out, { tag: "RightParen" }, c);
      } else if (c === "'") {
        flush();
        this.push(out, { tag: "Quote" }, c);
      } else if (c === "\"") {
        flush();
        this.state = { tag: "InString", buf: "", startLine: this.line };
      } else {
        atom += c;
      }
    }

    const end = this.state;
    if (end.tag === "Base") {
      flush();
    } else if (end.tag === "InString") {
      end.buf += "\n";
    } else {
      // backslash at end of line joins the next line
      this.state = { tag: "InString", buf: end.buf, startLine: end.startLine };
    }
    return out;
  }

  /** Signal end of input. */
  finish(): void {
    if (this.state.tag !== "Base") {
      const startLine = this.state.startLine;
      this.state = { tag: "Base" };
      throw new LangError({
        tag: "TokenizeError",
        reason: "UnterminatedString",
        line: startLine,
        text: "unterminated string literal",
      });
    }
  }

  private push(out: TokenInfo[], token: Token, text: string): void {
    if (token.tag !== "Comment") {
      this.quotePending = token.tag === "Quote";
    }
    out.push({ token, line: this.line, text });
  }

  private atomToken(text: string): TokenInfo {
    if (text === ".") {
      return this.tokenInfo({ tag: "Period" }, text);
    }
    const num = this.number(text);
    if (num) {
      return this.tokenInfo({ tag: "Primitive", value: num }, text);
    }
    const err = this.policy(text);
    if (err) {
      throw new LangError({
        tag: "TokenizeError",
        reason: "InvalidSymbol",
        line: this.line,
        text: describeSymbolError(err),
      });
    }
    return this.tokenInfo({ tag: "Primitive", value: { tag: "Symbol", name: text } }, text);
  }

  private number(text: string): LangNumber | null {
    try {
      return parseNumber(text);
    } catch (e) {
      if (!(e instanceof NumberError)) throw e;
      throw new LangError({ tag: "TokenizeError", reason: "InvalidNumber", line: this.line, text: e.message });
    }
  }

  private tokenInfo(token: Token, text: string): TokenInfo {
    this.quotePending = token.tag === "Quote";
    return { token, line: this.line, text };
  }
}

/** Stream adapter: lines in, tokens out. */
export class TokenizeTransform implements Transform<string, TokenInfo> {
  private readonly ready: TokenInfo[] = [];
  readonly tokenizer: Tokenizer;

  constructor(policy: SymbolPolicy = policyBase) {
    this.tokenizer = new Tokenizer(policy);
  }

  input(line: string): boolean {
    this.ready.push(...this.tokenizer.tokenizeLine(line));
    return this.ready.length > 0;
  }

  output(): TokenInfo | undefined {
    return this.ready.shift();
  }

  finish(): void {
    this.tokenizer.finish();
  }
}
