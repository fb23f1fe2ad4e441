// src/core/repl/repl.ts
// Line-driven read-interpret-print over a session agent

import type { Agent } from "../agent/agent";
import { isLangError, type LangError } from "../error/errors";
import { getLogger } from "../log/logger";
import { MAX_PARSE_DEPTH, Parser } from "../reader/parse";
import { Tokenizer } from "../reader/tokenize";
import type { Sexp } from "../sexp/sexp";
import { policyBase, type SymbolPolicy } from "../sexp/symbol";

const log = getLogger("repl");

export const PROMPT = ">> ";
export const CONTINUATION_PROMPT = ".. ";

export type ReplResult =
  | { tag: "Value"; value: Sexp; lines: string[] }
  | { tag: "Error"; error: LangError; lines: string[] };

export type ReplOptions = {
  policy?: SymbolPolicy;
  maxParseDepth?: number;
};

export class Repl {
  private readonly tokenizer: Tokenizer;
  private readonly parser: Parser;

  constructor(
    readonly agent: Agent,
    options: ReplOptions = {},
  ) {
    this.tokenizer = new Tokenizer(options.policy ?? policyBase);
    this.parser = new Parser(options.maxParseDepth ?? MAX_PARSE_DEPTH);
  }

  /** True while an expression is partially entered. */
  get pending(): boolean {
    return this.parser.pending || this.tokenizer.depth() > 0;
  }

  get prompt(): string {
    return this.pending ? CONTINUATION_PROMPT : PROMPT;
  }

  /** Drop partially entered input. */
  clear(): void {
    this.tokenizer.clear();
    this.parser.reset();
  }

  /**
   * Feed one line. Every expression it completes is interpreted in order; a
   * read error discards the rest of the pending input and is reported after
   * the expressions completed before it.
   */
  feedLine(line: string): ReplResult[] {
    const ready: Sexp[] = [];
    let readError: LangError | null = null;
    try {
      for (const info of this.tokenizer.tokenizeLine(line)) {
        if (!this.parser.input(info)) continue;
        for (let s = this.parser.output(); s !== undefined; s = this.parser.output()) ready.push(s);
      }
    } catch (e) {
      this.clear();
      if (!isLangError(e)) throw e;
      readError = e;
    }

    const results = ready.map((sexp) => this.evaluate(sexp));
    if (readError) results.push(this.errorResult(readError));
    return results;
  }

  evaluate(sexp: Sexp): ReplResult {
    try {
      const value = this.agent.interpret(sexp);
      return { tag: "Value", value, lines: [`-> ${this.agent.formatSexp(value)}`] };
    } catch (e) {
      if (!isLangError(e)) throw e;
      return this.errorResult(e);
    }
  }

  private errorResult(error: LangError): ReplResult {
    log.debug(error.message);
    const lines = [`!! ${this.agent.formatSexp(error.reify())}`];
    if (error.state !== null) lines.push(...this.agent.traceError(error));
    return { tag: "Error", error, lines };
  }
}
