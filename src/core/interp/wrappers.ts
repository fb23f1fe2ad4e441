// src/core/interp/wrappers.ts
// Argument destructuring for special forms

import type { Agent } from "../agent/agent";
import type { Node } from "../env/localNode";
import { atLeast, atMost, exactly, type ExpectedCount } from "../error/errors";
import { cons, isCons, listItems, nil, type Sexp } from "../sexp/sexp";

function countMatches(given: number, expected: ExpectedCount): boolean {
  switch (expected.tag) {
    case "Exactly": return given === expected.n;
    case "AtLeast": return given >= expected.n;
    case "AtMost": return given <= expected.n;
  }
}

/** Throws WrongArgumentCount unless `given` satisfies `expected`. */
export function expectCount(agent: Agent, given: number, expected: ExpectedCount): void {
  if (!countMatches(given, expected)) {
    throw agent.error({ tag: "WrongArgumentCount", given, expected });
  }
}

/** Elements of a proper argument list; an improper tail is InvalidSexp. */
export function properArgs(agent: Agent, args: Sexp | null): Sexp[] {
  const out: Sexp[] = [];
  for (const { value, proper } of listItems(args)) {
    if (!proper) throw agent.error({ tag: "InvalidSexp", sexp: value });
    out.push(value);
  }
  return out;
}

function expectSymbol(agent: Agent, s: Sexp): string {
  if (s.tag !== "Symbol") {
    throw agent.error({ tag: "InvalidArgument", given: s, expected: "symbol" });
  }
  return s.name;
}

// ----- Syntactic forms -----

export function quoteWrapper(agent: Agent, args: Sexp | null): Sexp {
  const items = properArgs(agent, args);
  expectCount(agent, items.length, exactly(1));
  const [quoted] = items;
  if (quoted === undefined) throw agent.error({ tag: "InvalidSexp", sexp: nil() });
  return quoted;
}

export type LambdaParts = { params: string[]; body: Sexp };

/** `(params body...)`: a proper list of symbols and at least one body form. */
export function lambdaWrapper(agent: Agent, args: Sexp | null): LambdaParts {
  if (!isCons(args) || args.car === null) {
    throw agent.error({ tag: "WrongArgumentCount", given: 0, expected: atLeast(2) });
  }
  const params = properArgs(agent, args.car).map((p) => expectSymbol(agent, p));
  const body = args.cdr;
  if (body === null || (body.tag === "Cons" && body.car === null && body.cdr === null)) {
    throw agent.error({ tag: "WrongArgumentCount", given: 1, expected: atLeast(2) });
  }
  if (body.tag !== "Cons") {
    throw agent.error({ tag: "InvalidArgument", given: body, expected: "procedure body" });
  }
  return { params, body };
}

export type LetParts = LambdaParts & { exprs: Sexp[] };

/** `(((name expr)...) body...)` */
export function letWrapper(agent: Agent, args: Sexp | null): LetParts {
  if (!isCons(args) || args.car === null) {
    throw agent.error({ tag: "WrongArgumentCount", given: 0, expected: atLeast(2) });
  }
  const params: string[] = [];
  const exprs: Sexp[] = [];
  for (const binding of properArgs(agent, args.car)) {
    if (binding.tag !== "Cons") {
      throw agent.error({ tag: "InvalidArgument", given: binding, expected: "(symbol value) binding" });
    }
    const pair = properArgs(agent, binding);
    expectCount(agent, pair.length, exactly(2));
    const [name, expr] = pair;
    if (name === undefined || expr === undefined) continue;
    params.push(expectSymbol(agent, name));
    exprs.push(expr);
  }
  const { body } = lambdaWrapper(agent, cons(nil(), args.cdr));
  return { params, exprs, body };
}

// ----- Exec forms -----

export function tellWrapper(agent: Agent, args: readonly Node[]): [Node, Node, Node] {
  expectCount(agent, args.length, exactly(3));
  const [s, p, o] = args;
  if (s === undefined || p === undefined || o === undefined) throw agent.error({ tag: "WrongArgumentCount", given: args.length, expected: exactly(3) });
  return [s, p, o];
}

/** `(name [value])` */
export function defWrapper(agent: Agent, args: readonly Node[]): [Node, Node | null] {
  expectCount(agent, args.length, atLeast(1));
  expectCount(agent, args.length, atMost(2));
  const [name, value] = args;
  if (name === undefined) throw agent.error({ tag: "WrongArgumentCount", given: 0, expected: atLeast(1) });
  return [name, value ?? null];
}

/** `([value])` */
export function anonDefWrapper(agent: Agent, args: readonly Node[]): Node | null {
  expectCount(agent, args.length, atMost(1));
  return args[0] ?? null;
}

export function applyWrapper(agent: Agent, args: readonly Node[]): [Node, Node] {
  expectCount(agent, args.length, exactly(2));
  const [proc, list] = args;
  if (proc === undefined || list === undefined) throw agent.error({ tag: "WrongArgumentCount", given: args.length, expected: exactly(2) });
  return [proc, list];
}

export function singleWrapper(agent: Agent, args: readonly Node[]): Node {
  expectCount(agent, args.length, exactly(1));
  const [only] = args;
  if (only === undefined) throw agent.error({ tag: "WrongArgumentCount", given: 0, expected: exactly(1) });
  return only;
}
