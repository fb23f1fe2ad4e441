// src/core/sexp/procedure.ts
// Procedure IR produced by the syntactic interpreter

import { nodeEq, type Node } from "../env/localNode";

export type Procedure =
  | { tag: "Application"; proc: Node; args: Node[] }
  | { tag: "Abstraction"; params: Node[]; body: Node }
  | { tag: "InterpreterAbstraction"; params: Node[]; body: Node }
  | { tag: "Sequence"; body: Node[] }
  | { tag: "Branch"; pred: Node; consequent: Node; alternative: Node };

export function application(proc: Node, args: Node[]): Procedure {
  return { tag: "Application", proc, args };
}

export function abstraction(params: Node[], body: Node): Procedure {
  return { tag: "Abstraction", params, body };
}

export function interpreterAbstraction(params: Node[], body: Node): Procedure {
  return { tag: "InterpreterAbstraction", params, body };
}

export function sequence(body: Node[]): Procedure {
  return { tag: "Sequence", body };
}

export function branch(pred: Node, consequent: Node, alternative: Node): Procedure {
  return { tag: "Branch", pred, consequent, alternative };
}

function nodesEq(a: readonly Node[], b: readonly Node[]): boolean {
  return a.length === b.length && a.every((n, i) => {
    const o = b[i];
    return o !== undefined && nodeEq(n, o);
  });
}

export function procedureEq(a: Procedure, b: Procedure): boolean {
  switch (a.tag) {
    case "Application":
      return b.tag === "Application" && nodeEq(a.proc, b.proc) && nodesEq(a.args, b.args);
    case "Abstraction":
      return b.tag === "Abstraction" && nodesEq(a.params, b.params) && nodeEq(a.body, b.body);
    case "InterpreterAbstraction":
      return b.tag === "InterpreterAbstraction" && nodesEq(a.params, b.params) && nodeEq(a.body, b.body);
    case "Sequence":
      return b.tag === "Sequence" && nodesEq(a.body, b.body);
    case "Branch":
      return b.tag === "Branch" && nodeEq(a.pred, b.pred) &&
        nodeEq(a.consequent, b.consequent) && nodeEq(a.alternative, b.alternative);
  }
}
