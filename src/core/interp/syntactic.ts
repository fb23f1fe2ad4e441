// src/core/interp/syntactic.ts
// Lowers surface s-expressions into Procedure meanings stored in the impl env

import type { Agent } from "../agent/agent";
import type { LangContextKey } from "../agent/context";
import type { Interpreter } from "../agent/interpreter";
import { nodeEq, type LocalNode, type Node } from "../env/localNode";
import { exactly } from "../error/errors";
import { getLogger } from "../log/logger";
import {
  abstraction,
  application,
  branch,
  interpreterAbstraction,
  sequence,
  type Procedure,
} from "../sexp/procedure";
import { cons, listItems, nodeSexp, procSexp, sym, type Sexp } from "../sexp/sexp";
import { SymNodeTable } from "../sexp/table";
import { expectCount, lambdaWrapper, letWrapper, quoteWrapper } from "./wrappers";

const log = getLogger("syntactic");

/**
 * Syntactic interpreter.
 *
 * Special forms (quote, lambda, fexpr, let, letrec, if, progn) are recognised
 * by the lang node their head resolves to, not by symbol name, so a rebound
 * symbol cannot shadow them. Every intermediate meaning is defined in the
 * impl env; lambda parameters are bound lexically through `evalState`.
 */
export class SyntacticInterpreter implements Interpreter {
  private readonly evalState: SymNodeTable[] = [];

  constructor(
    private readonly agent: Agent,
    private readonly implEnv: LocalNode,
    frame: SymNodeTable | null = null,
  ) {
    if (frame) this.evalState.push(frame);
  }

  internalize(structure: Sexp): Sexp {
    if (structure.tag !== "Cons") {
      if (structure.tag === "Symbol") {
        const bound = this.lookupFrame(structure.name);
        if (bound) return nodeSexp(bound);
      }
      return this.agent.designate(structure);
    }

    const { car, cdr } = structure;
    if (car === null) {
      throw this.agent.error({ tag: "InvalidSexp", sexp: structure });
    }

    const evalCar = this.internalize(car);
    if (evalCar.tag !== "Procedure" && evalCar.tag !== "Node") {
      throw this.agent.error({
        tag: "InvalidArgument",
        given: cons(evalCar, cdr),
        expected: "special form or Procedure application",
      });
    }
    const head = this.nodeOrInsert(evalCar);
    const is = (key: LangContextKey) => nodeEq(head, this.agent.langNode(key));

    if (is("quote")) {
      return quoteWrapper(this.agent, cdr);
    }
    if (is("lambda") || is("fexpr")) {
      const { params, body } = lambdaWrapper(this.agent, cdr);
      const [proc] = this.makeLambda(params, body, is("fexpr"));
      return procSexp(proc);
    }
    if (is("letBasic") || is("letRec")) {
      const { params, exprs, body } = letWrapper(this.agent, cdr);
      const [proc, frame] = this.makeLambda(params, body, false);
      const procNode = this.nodeOrInsert(procSexp(proc));
      let args: Node[];
      if (is("letRec")) {
        this.evalState.push(frame);
        try {
          args = this.evlisArray(exprs, true);
        } finally {
          this.evalState.pop();
        }
      } else {
        args = this.evlisArray(exprs, true);
      }
      return procSexp(application(procNode, args));
    }
    if (is("branch")) {
      const args = this.evlis(cdr, true);
      expectCount(this.agent, args.length, exactly(3));
      const [pred, consequent, alternative] = args;
      if (pred === undefined || consequent === undefined || alternative === undefined) {
        throw this.agent.error({ tag: "WrongArgumentCount", given: args.length, expected: exactly(3) });
      }
      return procSexp(branch(pred, consequent, alternative));
    }
    if (is("progn")) {
      return procSexp(sequence(this.evlis(cdr, true)));
    }

    // Reflective abstractions and def/node receive their arguments unevaluated.
    const designated = this.agent.designate(nodeSexp(head));
    const reflective = designated.tag === "Procedure" && designated.proc.tag === "InterpreterAbstraction";
    const shouldInternalize = !reflective && !is("def") && !is("node");
    return procSexp(application(head, this.evlis(cdr, shouldInternalize)));
  }

  private lookupFrame(name: string): Node | null {
    for (let i = this.evalState.length - 1; i >= 0; i--) {
      const found = this.evalState[i]?.lookup(name);
      if (found !== undefined) return found;
    }
    return null;
  }

  private makeLambda(params: string[], body: Sexp, reflect: boolean): [Procedure, SymNodeTable] {
    const agent = this.agent;
    const surface: Node[] = [];
    const frame = new SymNodeTable();
    const label = agent.importTo(this.implEnv, agent.langNode("label"));

    for (const name of params) {
      const param = agent.defineTo(this.implEnv, null);
      if (frame.has(name)) {
        throw agent.error({ tag: "InvalidArgument", given: sym(name), expected: "unique name within argument list" });
      }
      frame.insert(name, param);
      surface.push(param);
      const nameNode = agent.defineTo(this.implEnv, sym(name));
      agent.tellTo(this.implEnv, param, label, nameNode);
    }

    this.evalState.push(frame);
    let bodyNodes: Node[];
    try {
      bodyNodes = [];
      for (const { value, proper } of listItems(body)) {
        if (!proper) throw agent.error({ tag: "InvalidSexp", sexp: value });
        bodyNodes.push(this.nodeOrInsert(this.internalize(value)));
      }
    } finally {
      this.evalState.pop();
    }

    const [only] = bodyNodes;
    const bodyNode = bodyNodes.length === 1 && only !== undefined
      ? only
      : agent.defineTo(this.implEnv, procSexp(sequence(bodyNodes)));
    const proc = reflect ? interpreterAbstraction(surface, bodyNode) : abstraction(surface, bodyNode);
    log.debug(`lambda (${params.join(" ")}) reflect=${reflect}`);
    return [proc, frame];
  }

  private evlis(structures: Sexp | null, shouldInternalize: boolean): Node[] {
    const items: Sexp[] = [];
    for (const { value, proper } of listItems(structures)) {
      if (!proper) throw this.agent.error({ tag: "InvalidSexp", sexp: value });
      items.push(value);
    }
    return this.evlisArray(items, shouldInternalize);
  }

  private evlisArray(items: readonly Sexp[], shouldInternalize: boolean): Node[] {
    return items.map((item) =>
      shouldInternalize
        ? this.nodeOrInsert(this.internalize(item))
        : this.agent.defineTo(this.implEnv, item),
    );
  }

  private nodeOrInsert(s: Sexp): Node {
    return s.tag === "Node" ? s.node : this.agent.defineTo(this.implEnv, s);
  }
}
