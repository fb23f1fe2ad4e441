// test/core/interp/interp.spec.ts
// Syntactic lowering and execution through a session agent

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { exactly, atLeast } from "../../../src/core/error/errors";
import { float, int, list, sym } from "../../../src/core/sexp/sexp";
import { SyntacticInterpreter } from "../../../src/core/interp/syntactic";
import { STANDARD_ENVS } from "../../../src/core/manager";
import { parseSexp } from "../../../src/core/reader/read";
import { openSession, type TestSession } from "../../helpers/session";

let s: TestSession;

beforeEach(() => {
  s = openSession();
});

afterEach(() => {
  s.cleanup();
});

describe("atoms and quoting", () => {
  it("evaluates numbers and strings to themselves", () => {
    expect(s.run("42")).toEqual(int(42));
    expect(s.show("\"hi\"")).toBe("\"hi\"");
  });

  it("returns quoted data unevaluated", () => {
    expect(s.run("'(a b)")).toEqual(list([sym("a"), sym("b")]));
    expect(s.show("'()")).toBe("()");
  });

  it("prints booleans through the lang env", () => {
    expect(s.show("true")).toBe("true");
    expect(s.show("(eq 1 1)")).toBe("true");
    expect(s.show("(eq 1 2)")).toBe("false");
  });

  it("reports unbound symbols", () => {
    expect(s.fails("zzz")).toEqual({ tag: "UnboundSymbol", symbol: "zzz" });
  });
});

describe("built-ins", () => {
  it("does arithmetic", () => {
    expect(s.run("(+ 1 2)")).toEqual(int(3));
    expect(s.run("(- 10 3 2)")).toEqual(int(5));
    expect(s.run("(* 2.5 2.0)")).toEqual(float(5));
    expect(s.run("(/ (- 1 1) 2)")).toEqual(int(0));
    expect(s.run("(/ 7 2)")).toEqual(int(3));
  });

  it("turns number errors into argument errors", () => {
    expect(s.fails("(+ 1 2.5)")).toEqual({
      tag: "InvalidArgument",
      given: list([int(1), float(2.5)]),
      expected: "Mismatched number kinds: Int + Float",
    });
    expect(s.fails("(/ 4 0)")).toEqual({
      tag: "InvalidArgument",
      given: list([int(4), int(0)]),
      expected: "Division by zero",
    });
  });

  it("rejects float results that overflow", () => {
    expect(s.fails("(* 1.0e200 1.0e200)")).toEqual({
      tag: "InvalidArgument",
      given: list([float(1e200), float(1e200)]),
      expected: "Float overflow: 1e+200 * 1e+200",
    });
  });

  it("rejects non-numbers and empty folds", () => {
    expect(s.fails("(+ 1 \"x\")")).toEqual({ tag: "InvalidArgument", given: { tag: "String", s: "x" }, expected: "number" });
    expect(s.fails("(+)")).toEqual({ tag: "WrongArgumentCount", given: 0, expected: atLeast(1) });
  });

  it("takes lists apart", () => {
    expect(s.run("(car '(1 2))")).toEqual(int(1));
    expect(s.show("(cdr '(1 2))")).toBe("(2)");
    expect(s.show("(cons 1 2)")).toBe("(1 . 2)");
    expect(s.show("(cons 1 '())")).toBe("(1)");
    expect(s.run("(list-len '(1 2 3))")).toEqual(int(3));
    expect(s.fails("(car 1)")).toEqual({ tag: "InvalidArgument", given: int(1), expected: "Cons" });
    expect(s.fails("(list-len '(1 . 2))").tag).toBe("InvalidArgument");
  });

  it("prints through the agent output", () => {
    expect(s.show("(println '(a \"s\"))")).toBe("()");
    expect(s.output).toEqual(["(a \"s\")"]);
  });
});

describe("definitions", () => {
  it("names a value in the working env", () => {
    expect(s.show("(def x 5)")).toBe("x");
    expect(s.run("x")).toEqual(int(5));
    expect(s.run("(+ x 1)")).toEqual(int(6));
  });

  it("updates a value with set!", () => {
    s.run("(def x 5)");
    expect(s.show("(set! x 7)")).toBe("x");
    expect(s.run("x")).toEqual(int(7));
  });

  it("refuses to rebind a name", () => {
    s.run("(def x 1)");
    expect(s.fails("(def x 2)")).toEqual({ tag: "AlreadyBoundSymbol", symbol: "x" });
  });

  it("checks the name before running the initializer", () => {
    s.run("(def a) (def b) (def c) (def x 1)");
    expect(s.fails("(def x (tell a b c))")).toEqual({ tag: "AlreadyBoundSymbol", symbol: "x" });
    expect(s.show("(ask a b c)")).toBe("()");
  });

  it("defines anonymous nodes", () => {
    expect(s.show("(node 5)")).toMatch(/^\[Node_19_\d+\]->5$/);
  });

  it("lets a definition refer to itself", () => {
    s.run("(def fact (lambda (n) (if (eq n 0) 1 (* n (fact (- n 1))))))");
    expect(s.run("(fact 5)")).toEqual(int(120));
  });
});

describe("procedures", () => {
  it("applies lambdas", () => {
    expect(s.run("((lambda (x y) (- x y)) 5 3)")).toEqual(int(2));
  });

  it("runs a multi-form body in order", () => {
    expect(s.run("((lambda (x) (println x) (+ x 1)) 1)")).toEqual(int(2));
    expect(s.output).toEqual(["1"]);
  });

  it("shadows definitions with parameters", () => {
    s.run("(def a 5)");
    expect(s.run("((lambda (a) a) 4)")).toEqual(int(4));
    expect(s.run("a")).toEqual(int(5));
  });

  it("checks arity", () => {
    expect(s.fails("((lambda (x) x))")).toEqual({ tag: "WrongArgumentCount", given: 0, expected: exactly(1) });
  });

  it("validates lambda syntax", () => {
    expect(s.fails("(lambda)")).toEqual({ tag: "WrongArgumentCount", given: 0, expected: atLeast(2) });
    expect(s.fails("(lambda (x))")).toEqual({ tag: "WrongArgumentCount", given: 1, expected: atLeast(2) });
    expect(s.fails("(lambda (x x) x)")).toEqual({
      tag: "InvalidArgument",
      given: sym("x"),
      expected: "unique name within argument list",
    });
    expect(s.fails("(lambda (1) 1)")).toEqual({ tag: "InvalidArgument", given: int(1), expected: "symbol" });
  });

  it("passes fexpr arguments unevaluated", () => {
    s.run("(def q (fexpr (x) x))");
    expect(s.show("(q (+ 1 2))")).toBe("(+ 1 2)");
  });

  it("rejects non-procedure heads", () => {
    expect(s.fails("(1 2)")).toEqual({
      tag: "InvalidArgument",
      given: list([int(1), int(2)]),
      expected: "special form or Procedure application",
    });
  });
});

describe("special forms", () => {
  it("branches on true and false", () => {
    expect(s.run("(if true 1 2)")).toEqual(int(1));
    expect(s.run("(if (eq 1 2) 1 2)")).toEqual(int(2));
    expect(s.fails("(if 1 2 3)")).toEqual({ tag: "InvalidArgument", given: int(1), expected: "true or false Node" });
    expect(s.fails("(if true 1)")).toEqual({ tag: "WrongArgumentCount", given: 2, expected: exactly(3) });
  });

  it("sequences with progn", () => {
    expect(s.run("(progn 1 2 3)")).toEqual(int(3));
    expect(s.show("(progn)")).toBe("()");
  });

  it("binds with let and letrec", () => {
    expect(s.run("(let ((a 1) (b 2)) (+ a b))")).toEqual(int(3));
    expect(s.run("(letrec ((f (lambda (n) (if (eq n 0) 0 (f (- n 1)))))) (f 3))")).toEqual(int(0));
  });

  it("supports mutual recursion in letrec", () => {
    const text = `
      (letrec ((even (lambda (n) (if (eq n 0) true (odd (- n 1)))))
               (odd (lambda (n) (if (eq n 0) false (even (- n 1))))))
        (cons (even 3) (odd 3)))`;
    expect(s.show(text)).toBe("(false . true)");
  });

  it("checks quote arity", () => {
    expect(s.fails("(quote a b)")).toEqual({ tag: "WrongArgumentCount", given: 2, expected: exactly(1) });
  });

  it("evaluates and executes quoted code", () => {
    expect(s.run("(eval '(+ 1 2))")).toEqual(int(3));
    expect(s.show("(exec '(+ 1 2))")).toBe("(+ 1 2)");
  });

  it("applies a procedure to a quoted argument list", () => {
    expect(s.run("(apply + '(1 2 3))")).toEqual(int(6));
    expect(s.run("(apply (lambda (x) (* x x)) '(4))")).toEqual(int(16));
  });
});

describe("triples", () => {
  beforeEach(() => {
    s.run("(def a) (def b) (def c)");
  });

  it("tells and asks", () => {
    expect(s.show("(tell a b c)")).toBe("(a b c)");
    expect(s.show("(ask _ b c)")).toBe("((a b c))");
    expect(s.show("(ask _ _ a)")).toBe("()");
  });

  it("rejects duplicate triples", () => {
    s.run("(tell a b c)");
    expect(s.fails("(tell a b c)").tag).toBe("DuplicateTriple");
  });

  it("vets triples with the env's tell handler", () => {
    s.run("(set! tell_handler (lambda (s p o) (eq s o)))");
    const kind = s.fails("(tell a b c)");
    expect(kind.tag === "RejectedTriple" ? kind.reason : null).toEqual(s.run("false"));
    expect(s.show("(ask a b c)")).toBe("()");
    expect(s.show("(tell a b a)")).toBe("(a b a)");
  });

  it("keeps def working under a tell handler", () => {
    s.run("(set! tell_handler (lambda (s p o) (eq s o)))");
    expect(s.show("(def d 3)")).toBe("d");
    expect(s.run("d")).toEqual(int(3));
    expect(s.show("(tell d b d)")).toBe("(d b d)");
  });

  it("reports and moves the position", () => {
    expect(s.show("(curr)")).toBe("self_env");
    expect(s.output).toEqual([]);
    s.run("(tell a b c)");
    expect(s.show("(jump a)")).toBe("a");
    expect(s.output).toHaveLength(2);
    expect(s.output[1]).toBe("    (a b c)");
  });
});

describe("envs", () => {
  it("finds envs by path", () => {
    expect(s.show("(env_find \"history.env\")")).toBe("[Node_0_15]");
    expect(s.show("(env_find \"missing.env\")")).toBe("()");
    expect(s.fails("(env_find 1)")).toEqual({ tag: "InvalidArgument", given: int(1), expected: "Node containing string" });
  });

  it("imports a node once per env", () => {
    expect(s.show("(import true)")).toMatch(/^\[Node_19_\d+\]->true$/);
    expect(s.show("(eq (import false) (import false))")).toBe("true");
  });

  it("jumps to an imported node", () => {
    s.run("(jump (import lambda))");
    expect(s.show("(eq (curr) (import lambda))")).toBe("true");
  });

  it("keeps an imported node distinct from its original", () => {
    expect(s.show("(eq (import true) true)")).toBe("false");
  });
});

describe("lowering", () => {
  it("adds nodes to the impl env only", () => {
    const agent = s.agent;
    const envs = Object.values(STANDARD_ENVS).map((p) => {
      const local = agent.findEnv(p);
      if (local === null) throw new Error(`no env ${p}`);
      return local;
    });
    const counts = () => envs.map((local) => agent.accessEnv(local).nodeCount());
    const [lang, history, impl, working] = counts();
    const implEnv = envs[2];
    if (implEnv === undefined) throw new Error("no impl env");

    const meaning = new SyntacticInterpreter(agent, implEnv).internalize(parseSexp("(lambda (x) (+ x 1))"));
    expect(meaning.tag).toBe("Procedure");
    const after = counts();
    expect([after[0], after[1], after[3]]).toEqual([lang, history, working]);
    expect(after[2]).toBeGreaterThan(impl ?? 0);
  });
});
