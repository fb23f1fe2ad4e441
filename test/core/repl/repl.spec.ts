// test/core/repl/repl.spec.ts
// Line feeding, continuation prompts and error output

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { int } from "../../../src/core/sexp/sexp";
import { CONTINUATION_PROMPT, PROMPT, Repl } from "../../../src/core/repl/repl";
import { openSession, type TestSession } from "../../helpers/session";

let s: TestSession;
let repl: Repl;

beforeEach(() => {
  s = openSession();
  repl = new Repl(s.agent);
});

afterEach(() => {
  s.cleanup();
});

describe("Repl", () => {
  it("prints values", () => {
    const results = repl.feedLine("(+ 1 2)");
    expect(results.map((r) => r.lines)).toEqual([["-> 3"]]);
    expect(repl.prompt).toBe(PROMPT);
  });

  it("interprets every expression on a line", () => {
    const results = repl.feedLine("(def x 4) (* x x)");
    expect(results.map((r) => r.lines[0])).toEqual(["-> x", "-> 16"]);
  });

  it("continues an expression across lines", () => {
    expect(repl.feedLine("(+ 1")).toEqual([]);
    expect(repl.pending).toBe(true);
    expect(repl.prompt).toBe(CONTINUATION_PROMPT);
    const [result] = repl.feedLine("  2)");
    expect(result?.lines).toEqual(["-> 3"]);
    expect(repl.pending).toBe(false);
  });

  it("continues an open string", () => {
    repl.feedLine("\"ab");
    expect(repl.prompt).toBe(CONTINUATION_PROMPT);
    const [result] = repl.feedLine("cd\"");
    expect(result?.lines).toEqual(["-> \"ab\\ncd\""]);
  });

  it("reports interpreter errors", () => {
    const [result] = repl.feedLine("zzz");
    expect(result?.tag).toBe("Error");
    expect(result?.lines[0]).toBe("!! (UnboundSymbol (symbol . zzz))");
  });

  it("discards pending input after a read error", () => {
    repl.feedLine("(+ 1");
    const results = repl.feedLine("2)) 1");
    expect(results.map((r) => (r.tag === "Error" ? r.error.kind.tag : r.lines[0]))).toEqual(["-> 3", "ParseError"]);
    expect(repl.pending).toBe(false);
    expect(repl.feedLine("7").map((r) => r.lines)).toEqual([["-> 7"]]);
  });

  it("interprets forms completed before a read error", () => {
    const results = repl.feedLine("(def y 2) (+ y 1) )");
    expect(results.map((r) => r.tag)).toEqual(["Value", "Value", "Error"]);
    expect(results[1]?.lines).toEqual(["-> 3"]);
    expect(s.run("y")).toEqual(int(2));
  });

  it("drops partial input on clear", () => {
    repl.feedLine("(+ 1");
    repl.clear();
    expect(repl.prompt).toBe(PROMPT);
  });
});
