// src/core/builtins/builtins.ts
// Host functions installed into the lang env

import type { Agent } from "../agent/agent";
import { atLeast, exactly } from "../error/errors";
import { expectCount } from "../interp/wrappers";
import type { BuiltIn, BuiltInFn } from "../sexp/builtin";
import { arith, type ArithOp, type LangNumber } from "../sexp/number";
import { cons, int, isNil, listItems, nil, nodeSexp, sexpEq, type Sexp } from "../sexp/sexp";

function expectNumber(agent: Agent, s: Sexp): LangNumber {
  if (s.tag === "Int" || s.tag === "Float") return s;
  throw agent.error({ tag: "InvalidArgument", given: s, expected: "number" });
}

/** Left fold of `op` over one or more numbers of the same kind. */
function fold(op: ArithOp): BuiltInFn {
  return (args, agent) => {
    expectCount(agent, args.length, atLeast(1));
    const [first, ...rest] = args.map((a) => expectNumber(agent, a));
    if (first === undefined) return nil();
    let acc = first;
    for (const n of rest) acc = arith(op, acc, n);
    return acc;
  };
}

function unary(fn: (arg: Sexp, agent: Agent) => Sexp): BuiltInFn {
  return (args, agent) => {
    expectCount(agent, args.length, exactly(1));
    const [arg] = args;
    return arg === undefined ? nil() : fn(arg, agent);
  };
}

function binary(fn: (a: Sexp, b: Sexp, agent: Agent) => Sexp): BuiltInFn {
  return (args, agent) => {
    expectCount(agent, args.length, exactly(2));
    const [a, b] = args;
    return a === undefined || b === undefined ? nil() : fn(a, b, agent);
  };
}

// ----- List ops -----

const car = unary((arg, agent) => {
  if (arg.tag !== "Cons") throw agent.error({ tag: "InvalidArgument", given: arg, expected: "Cons" });
  return arg.car ?? nil();
});

const cdr = unary((arg, agent) => {
  if (arg.tag !== "Cons") throw agent.error({ tag: "InvalidArgument", given: arg, expected: "Cons" });
  return arg.cdr ?? nil();
});

// An empty list argument is stored as an absent slot.
const consFn = binary((a, b) => cons(isNil(a) ? null : a, isNil(b) ? null : b));

const listLen = unary((arg, agent) => {
  let count = 0;
  for (const { proper } of listItems(arg)) {
    if (!proper) throw agent.error({ tag: "InvalidArgument", given: arg, expected: "Proper list" });
    count++;
  }
  return int(count);
});

// ----- Misc -----

const println = unary((arg, agent) => {
  agent.print(agent.formatSexp(arg));
  return nil();
});

const eq = binary((a, b, agent) => nodeSexp(agent.langNode(sexpEq(a, b) ? "t" : "f")));

const TABLE: ReadonlyArray<readonly [string, BuiltInFn]> = [
  ["+", fold("+")],
  ["-", fold("-")],
  ["*", fold("*")],
  ["/", fold("/")],
  ["car", car],
  ["cdr", cdr],
  ["cons", consFn],
  ["list-len", listLen],
  ["println", println],
  ["eq", eq],
];

/** Every registered built-in, keyed by the symbol it is designated by. */
export function generateBuiltinMap(): Map<string, BuiltIn> {
  return new Map(TABLE.map(([name, fn]) => [name, { name, fn }]));
}
