// test/core/error/errors.spec.ts
// Error kinds: descriptions, reified form and snapshots

import { describe, it, expect } from "vitest";
import {
  atLeast,
  atMost,
  describeKind,
  deserializeError,
  exactly,
  formatExpectedCount,
  ioError,
  isLangError,
  LangError,
} from "../../../src/core/error/errors";
import { int, list, sexpToString, sym } from "../../../src/core/sexp/sexp";

describe("describeKind", () => {
  it("formats argument errors", () => {
    expect(describeKind({ tag: "InvalidArgument", given: int(1), expected: "Cons" }))
      .toBe("Invalid argument: given 1, expected Cons");
    expect(describeKind({ tag: "WrongArgumentCount", given: 3, expected: exactly(2) }))
      .toBe("Wrong argument count: given 3, expected 2");
  });

  it("formats reader errors with their line", () => {
    expect(describeKind({ tag: "ParseError", reason: "UnmatchedClose", line: 4, token: ")" }))
      .toBe("Parse error (UnmatchedClose) at line 4: )");
  });

  it("formats expected counts", () => {
    expect(formatExpectedCount(atLeast(2))).toBe("AtLeast 2");
    expect(formatExpectedCount(atMost(1))).toBe("AtMost 1");
    expect(formatExpectedCount(exactly(0))).toBe("0");
  });
});

describe("LangError", () => {
  it("uses the description as its message", () => {
    const e = new LangError({ tag: "UnboundSymbol", symbol: "x" });
    expect(e.message).toBe("Unbound symbol: x");
    expect(e.name).toBe("LangError");
    expect(isLangError(e)).toBe(true);
    expect(isLangError(new Error("x"))).toBe(false);
  });

  it("reifies to a tagged struct", () => {
    const wrong = new LangError({ tag: "WrongArgumentCount", given: 1, expected: atLeast(2) });
    expect(sexpToString(wrong.reify())).toBe("(WrongArgumentCount (given . 1) (expected . \"AtLeast 2\"))");
    const rejected = new LangError({ tag: "RejectedTriple", triple: list([sym("a"), sym("b"), sym("c")]), reason: sym("false") });
    expect(sexpToString(rejected.reify())).toBe("(RejectedTriple (triple a b c) (reason . false))");
  });

  it("keeps the first attached state", () => {
    const first: never[] = [];
    const e = new LangError({ tag: "Unsupported", message: "x" });
    expect(e.state).toBeNull();
    e.withState(first).withState([]);
    expect(e.state).toBe(first);
  });
});

describe("constructors", () => {
  it("builds deserialize errors", () => {
    const e = deserializeError("MissingData", "nodes: header declares 2, found 1");
    expect(e.kind).toEqual({
      tag: "DeserializeError",
      reason: "MissingData",
      detail: null,
      message: "nodes: header declares 2, found 1",
    });
    expect(sexpToString(e.reify()))
      .toBe("(DeserializeError (reason . MissingData) (detail) (message . \"nodes: header declares 2, found 1\"))");
  });

  it("wraps I/O failures", () => {
    const e = ioError("/tmp/x.env", new Error("boom"));
    expect(e.kind).toEqual({ tag: "IoError", path: "/tmp/x.env", message: "boom" });
    expect(e.message).toBe("I/O error on /tmp/x.env: boom");
    expect(ioError("p", "plain").kind).toEqual({ tag: "IoError", path: "p", message: "plain" });
  });
});
