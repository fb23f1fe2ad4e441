// src/core/interp/exec.ts
// Executes Procedure meanings against the agent's exec stack

import type { Agent } from "../agent/agent";
import type { LangContextKey } from "../agent/context";
import type { Executor } from "../agent/interpreter";
import { ExecFrame } from "../agent/frames";
import { formatNode, META_ENV, node, nodeEq, type LocalNode, type Node } from "../env/localNode";
import { exactly } from "../error/errors";
import { getLogger } from "../log/logger";
import { NumberError } from "../sexp/number";
import { list, listItems, nil, nodeSexp, sexpEq, type Sexp } from "../sexp/sexp";
import { SymNodeTable } from "../sexp/table";
import {
  anonDefWrapper,
  applyWrapper,
  defWrapper,
  expectCount,
  singleWrapper,
  tellWrapper,
} from "./wrappers";

const log = getLogger("exec");

export type ExecEnvs = {
  /** Receives every contemplated meaning that is not already a Node. */
  historyEnv: LocalNode;
};

export class ExecInterpreter implements Executor {
  constructor(
    private readonly agent: Agent,
    private readonly envs: ExecEnvs,
  ) {}

  contemplate(meaning: Sexp): Sexp {
    const target = meaning.tag === "Node" ? meaning.node : this.agent.defineTo(this.envs.historyEnv, meaning);
    return this.exec(target);
  }

  call(proc: Node, args: Node[]): Sexp {
    return this.withFrame(proc, () => this.apply(proc, args));
  }

  // =========================================================================
  // Core loop
  // =========================================================================

  exec(meaningNode: Node): Sexp {
    const meaning = this.agent.concretize(meaningNode);
    if (meaning.tag !== "Procedure") return meaning;

    const proc = meaning.proc;
    switch (proc.tag) {
      case "Application":
        return this.withFrame(meaningNode, () => this.apply(proc.proc, proc.args));
      case "Branch": {
        const cond = this.exec(proc.pred);
        if (sexpEq(cond, nodeSexp(this.agent.langNode("t")))) return this.exec(proc.consequent);
        if (sexpEq(cond, nodeSexp(this.agent.langNode("f")))) return this.exec(proc.alternative);
        throw this.agent.error({ tag: "InvalidArgument", given: cond, expected: "true or false Node" });
      }
      case "Sequence": {
        let result: Sexp = nil();
        for (const step of proc.body) result = this.exec(step);
        return result;
      }
      case "Abstraction":
      case "InterpreterAbstraction":
        return meaning;
    }
  }

  private withFrame(context: Node, run: () => Sexp): Sexp {
    log.debug(`exec_state push: ${formatNode(context)}`);
    this.agent.execState.push(new ExecFrame(context));
    try {
      return run();
    } finally {
      log.debug(`exec_state pop: ${formatNode(context)}`);
      this.agent.execState.pop();
    }
  }

  private apply(procNode: Node, argNodes: readonly Node[]): Sexp {
    const agent = this.agent;
    const proc = agent.concretize(procNode);
    switch (proc.tag) {
      case "Node":
        if (proc.node.env === agent.context().langEnv) {
          return this.applySpecial(proc.node, argNodes);
        }
        throw agent.error({ tag: "InvalidArgument", given: proc, expected: "Procedure or special lang Node" });

      case "BuiltIn": {
        const args = argNodes.map((n) => this.exec(n));
        try {
          return proc.builtin.fn(args, agent);
        } catch (e) {
          if (e instanceof NumberError) {
            throw agent.error({ tag: "InvalidArgument", given: list(args), expected: e.message });
          }
          throw e;
        }
      }

      case "Procedure": {
        const lambda = proc.proc;
        if (lambda.tag === "Abstraction") {
          expectCount(agent, argNodes.length, exactly(lambda.params.length));
          const values = argNodes.map((n) => this.exec(n));
          this.bind(lambda.params, values);
          return this.exec(lambda.body);
        }
        if (lambda.tag === "InterpreterAbstraction") {
          expectCount(agent, argNodes.length, exactly(lambda.params.length));
          this.bind(lambda.params, argNodes.map((n) => agent.designate(nodeSexp(n))));
          return this.exec(lambda.body);
        }
        break;
      }

      default:
        break;
    }
    throw agent.error({ tag: "InvalidArgument", given: proc, expected: "Procedure" });
  }

  private bind(params: readonly Node[], values: readonly Sexp[]): void {
    const frame = this.agent.execState.top();
    params.forEach((param, i) => {
      const value = values[i] ?? nil();
      if (!frame.insert(param, value)) {
        throw this.agent.error({
          tag: "InvalidState",
          actual: `${formatNode(param)} already bound in frame`,
          expected: "fresh parameter binding",
        });
      }
      log.debug(`exec_state insert: ${formatNode(param)}`);
    });
  }

  /** Exec `n`; a Node result replaces it, anything else keeps `n`. */
  private execToNode(n: Node): Node {
    const result = this.exec(n);
    return result.tag === "Node" ? result.node : n;
  }

  private nodeOrInsert(s: Sexp): Node {
    return s.tag === "Node" ? s.node : this.agent.defineTo(this.envs.historyEnv, s);
  }

  // =========================================================================
  // Special forms
  // =========================================================================

  private applySpecial(special: Node, args: readonly Node[]): Sexp {
    const agent = this.agent;
    const is = (key: LangContextKey) => nodeEq(special, agent.langNode(key));

    if (is("tell") || is("ask")) {
      const [ss, pp, oo] = tellWrapper(agent, args);
      const s = this.execToNode(ss);
      const p = this.execToNode(pp);
      const o = this.execToNode(oo);
      if (is("tell")) {
        log.debug(`(tell ${formatNode(s)} ${formatNode(p)} ${formatNode(o)})`);
        return nodeSexp(agent.tell(s, p, o));
      }
      const placeholder = agent.langNode("placeholder");
      const wild = (n: Node) => (nodeEq(n, placeholder) ? null : n);
      return list(agent.ask(wild(s), wild(p), wild(o)).map(nodeSexp));
    }

    if (is("def") || is("node")) {
      const named = is("def");
      let name: Node | null = null;
      let value: Node | null;
      if (named) {
        [name, value] = defWrapper(agent, args);
      } else {
        value = anonDefWrapper(agent, args);
      }
      if (name !== null) agent.unboundSymbol(name);
      let target = value === null ? agent.define(null) : this.defineValue(name, value);
      if (name !== null) target = agent.nameNode(name, target);
      return nodeSexp(target);
    }

    if (is("set")) {
      const [target, value] = defWrapper(agent, args);
      if (value === null) {
        agent.set(target, null);
      } else {
        const meaning = agent.subInterpret(nodeSexp(value), null);
        agent.set(target, this.contemplate(meaning));
      }
      return nodeSexp(target);
    }

    if (is("curr")) {
      expectCount(agent, args.length, exactly(0));
      agent.printCurr();
      return nodeSexp(agent.pos());
    }

    if (is("jump")) {
      const dest = this.execToNode(singleWrapper(agent, args));
      agent.jump(dest);
      agent.printCurr();
      return nodeSexp(agent.pos());
    }

    if (is("import")) {
      return nodeSexp(agent.import(this.execToNode(singleWrapper(agent, args))));
    }

    if (is("envFind")) {
      const des = agent.designate(nodeSexp(singleWrapper(agent, args)));
      if (des.tag !== "String") {
        throw agent.error({ tag: "InvalidArgument", given: des, expected: "Node containing string" });
      }
      const found = agent.findEnv(des.s);
      return found === null ? nil() : nodeSexp(node(META_ENV, found));
    }

    if (is("apply")) {
      const [procArg, argsArg] = applyWrapper(agent, args);
      const procSexp = agent.designate(nodeSexp(procArg));
      const argsSexp = agent.designate(nodeSexp(argsArg));
      log.debug(`(apply ${agent.formatSexp(procSexp)} '${agent.formatSexp(argsSexp)})`);

      const proc = this.nodeOrInsert(procSexp);
      const argNodes: Node[] = [];
      for (const { value, proper } of listItems(argsSexp)) {
        if (!proper) throw agent.error({ tag: "InvalidSexp", sexp: value });
        argNodes.push(this.nodeOrInsert(value));
      }
      return this.apply(proc, argNodes);
    }

    if (is("eval") || is("exec")) {
      const arg = agent.designate(nodeSexp(singleWrapper(agent, args)));
      if (is("exec")) {
        log.debug(`(exec ${agent.formatSexp(arg)})`);
        return this.contemplate(arg);
      }
      log.debug(`(eval ${agent.formatSexp(arg)})`);
      const inner = this.contemplate(arg);
      return this.contemplate(agent.subInterpret(inner, null));
    }

    throw agent.error({ tag: "InvalidArgument", given: nodeSexp(special), expected: "special lang Node" });
  }

  /**
   * Interpret the raw value of a def so that its own name, when it has one,
   * resolves to the node being defined. A Node result is used as is.
   */
  private defineValue(name: Node | null, value: Node): Node {
    const agent = this.agent;
    const slot = agent.define(null);
    const frame = new SymNodeTable();
    if (name !== null) {
      const designated = agent.designate(nodeSexp(name));
      if (designated.tag === "Symbol") frame.insert(designated.name, slot);
    }

    const original = agent.designate(nodeSexp(value));
    const result = this.contemplate(agent.subInterpret(original, frame));
    if (result.tag === "Node") return result.node;
    agent.set(slot, result);
    return slot;
  }
}
