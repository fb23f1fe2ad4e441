// src/core/agent/agent.ts
// Agent: position, designation chain, exec stack, and the env operations built on them

import type { Environment } from "../env/environment";
import {
  formatNode,
  isTripleId,
  META_ENV,
  node,
  nodeEq,
  type LocalNode,
  type Node,
} from "../env/localNode";
import { EnvPrelude, preludeFromName } from "../env/prelude";
import { LangError, type ErrorKind } from "../error/errors";
import { getLogger } from "../log/logger";
import {
  list,
  MAX_PRINT_DEPTH,
  MAX_PRINT_LENGTH,
  nodeSexp,
  sexpEq,
  sym,
  writeSexp,
  type PrintOptions,
  type Sexp,
} from "../sexp/sexp";
import type { Procedure } from "../sexp/procedure";
import { LocalNodeTable, type SymNodeTable } from "../sexp/table";
import {
  envFromMeta,
  langNode,
  type LangContext,
  type LangContextKey,
  type MetaEnvContext,
} from "./context";
import { Continuation, ExecFrame, type EnvFrame, type ExecSnapshot } from "./frames";
import type { Executor, Interpreter, InterpreterFactory } from "./interpreter";

const log = getLogger("agent");

export type AgentOptions = {
  /** Line writer for println/curr/jump; defaults to console.log. */
  output?: (line: string) => void;
  maxPrintDepth?: number;
  maxPrintLength?: number;
};

const CROSS_ENV = "Cross-env triples are not currently supported";

function pathMatches(stored: string, suffix: string): boolean {
  return stored === suffix || stored.endsWith(`/${suffix}`);
}

export class Agent {
  private readonly envState: Continuation<EnvFrame>;
  readonly execState: Continuation<ExecFrame>;
  /** Symbol lookup order; each entry is an (env, designation-context) Node. */
  readonly designationChain: Node[] = [];

  private readonly interpreterState: Interpreter[] = [];
  private interpreterFactory: InterpreterFactory | null = null;
  private executor: Executor | null = null;
  private langContext: LangContext | null = null;

  private readonly output: (line: string) => void;
  private readonly printOptions: PrintOptions;

  constructor(
    pos: Node,
    readonly metaEnv: Environment,
    readonly metaContext: MetaEnvContext,
    private readonly options: AgentOptions = {},
  ) {
    this.envState = new Continuation<EnvFrame>({ pos });
    this.execState = new Continuation(new ExecFrame(pos));
    this.output = options.output ?? ((line) => console.log(line));
    this.printOptions = {
      maxDepth: options.maxPrintDepth ?? MAX_PRINT_DEPTH,
      maxLength: options.maxPrintLength ?? MAX_PRINT_LENGTH,
      primitive: (p, depth) => (p.tag === "Node" ? this.formatNode(p.node, depth) : null),
    };
  }

  /** A new agent at the same position sharing the meta-env and contexts. */
  fork(options: AgentOptions = this.options): Agent {
    const agent = new Agent(this.pos(), this.metaEnv, this.metaContext, options);
    agent.designationChain.push(...this.designationChain);
    agent.langContext = this.langContext;
    return agent;
  }

  // =========================================================================
  // Interpreters
  // =========================================================================

  setInterpreters(executor: Executor, factory: InterpreterFactory): void {
    this.executor = executor;
    this.interpreterFactory = factory;
    this.interpreterState.length = 0;
    this.interpreterState.push(factory(null));
  }

  /** Lower `sexp` with the current interpreter, then execute the meaning. */
  interpret(sexp: Sexp): Sexp {
    const interpreter = this.interpreterState[this.interpreterState.length - 1];
    if (!interpreter) {
      throw this.error({ tag: "InvalidState", actual: "no interpreter installed", expected: "interpreter" });
    }
    return this.executorOrThrow().contemplate(interpreter.internalize(sexp));
  }

  /** Lower `sexp` with a fresh interpreter seeded with `frame`. */
  subInterpret(sexp: Sexp, frame: SymNodeTable | null): Sexp {
    if (!this.interpreterFactory) {
      throw this.error({ tag: "InvalidState", actual: "no interpreter installed", expected: "interpreter" });
    }
    const interpreter = this.interpreterFactory(frame);
    this.interpreterState.push(interpreter);
    try {
      return interpreter.internalize(sexp);
    } finally {
      this.interpreterState.pop();
    }
  }

  get interpreterDepth(): number {
    return this.interpreterState.length;
  }

  executorOrThrow(): Executor {
    if (!this.executor) {
      throw this.error({ tag: "InvalidState", actual: "no executor installed", expected: "executor" });
    }
    return this.executor;
  }

  // =========================================================================
  // Contexts
  // =========================================================================

  setContext(ctx: LangContext): void {
    this.langContext = ctx;
  }

  context(): LangContext {
    if (!this.langContext) {
      throw this.error({ tag: "InvalidState", actual: "lang context not loaded", expected: "lang context" });
    }
    return this.langContext;
  }

  hasContext(): boolean {
    return this.langContext !== null;
  }

  langNode(key: LangContextKey): Node {
    return langNode(this.context(), key);
  }

  // =========================================================================
  // Position
  // =========================================================================

  pos(): Node {
    return this.envState.top().pos;
  }

  globalize(local: LocalNode): Node {
    return node(this.pos().env, local);
  }

  jump(n: Node): void {
    this.envState.top().pos = n;
  }

  jumpEnv(envLocal: LocalNode): void {
    this.accessEnv(envLocal);
    this.jump(node(envLocal, EnvPrelude.SelfEnv));
  }

  /** Env by its meta node; 0 is the meta-env itself. */
  accessEnv(envLocal: LocalNode): Environment {
    try {
      return envFromMeta(this.metaEnv, envLocal);
    } catch (e) {
      if (e instanceof LangError) throw e.withState(this.snapshot());
      throw e;
    }
  }

  env(): Environment {
    return this.accessEnv(this.pos().env);
  }

  // =========================================================================
  // Errors
  // =========================================================================

  snapshot(): ExecSnapshot {
    return [...this.execState.iter()].map((f) => f.clone());
  }

  /** An error carrying the current exec stack. */
  error(kind: ErrorKind): LangError {
    return new LangError(kind, this.snapshot());
  }

  // =========================================================================
  // Meaning
  // =========================================================================

  /** Innermost frame binding for `n`, else its designation. */
  concretize(n: Node): Sexp {
    for (const frame of this.execState.iter()) {
      const v = frame.lookup(n);
      if (v !== undefined) return v;
    }
    return this.designate(nodeSexp(n));
  }

  /**
   * Symbols resolve to Nodes; Nodes yield their structure, or their triple as
   * `(s p o)`, or themselves; Procedures yield their source form.
   */
  designate(s: Sexp): Sexp {
    switch (s.tag) {
      case "Symbol":
        return nodeSexp(this.resolve(s.name));
      case "Node": {
        const env = this.accessEnv(s.node.env);
        if (!env.hasNode(s.node.local)) {
          throw this.error({ tag: "InvalidArgument", given: s, expected: "existing node" });
        }
        const structure = env.entry(s.node.local);
        if (structure !== null) return structure;
        const triple = env.nodeAsTriple(s.node.local);
        if (triple) {
          const e = s.node.env;
          return list([triple.subject, triple.predicate, triple.object].map((l) => nodeSexp(node(e, l))));
        }
        return s;
      }
      case "Procedure":
        return this.reifyProcedure(s.proc);
      default:
        return s;
    }
  }

  /** Source form of a procedure, headed by lang nodes. */
  reifyProcedure(proc: Procedure): Sexp {
    const head = (key: LangContextKey, name: string) =>
      this.langContext ? nodeSexp(langNode(this.langContext, key)) : sym(name);
    const ns = (xs: readonly Node[]) => list(xs.map(nodeSexp));
    switch (proc.tag) {
      case "Application":
        return list([head("apply", "apply"), nodeSexp(proc.proc), ns(proc.args)]);
      case "Abstraction":
        return list([head("lambda", "lambda"), ns(proc.params), nodeSexp(proc.body)]);
      case "InterpreterAbstraction":
        return list([head("fexpr", "fexpr"), ns(proc.params), nodeSexp(proc.body)]);
      case "Sequence":
        return list([head("progn", "progn"), ...proc.body.map(nodeSexp)]);
      case "Branch":
        return list([
          head("branch", "if"),
          nodeSexp(proc.pred),
          nodeSexp(proc.consequent),
          nodeSexp(proc.alternative),
        ]);
    }
  }

  // =========================================================================
  // Designation
  // =========================================================================

  tryResolve(name: string): Node | null {
    const prelude = preludeFromName(name);
    if (prelude !== null) return this.globalize(prelude);
    for (const des of this.designationChain) {
      const local = this.accessEnv(des.env).matchDesignation(name, des.local);
      if (local !== null) return node(des.env, local);
    }
    return null;
  }

  resolve(name: string): Node {
    const found = this.tryResolve(name);
    if (!found) throw this.error({ tag: "UnboundSymbol", symbol: name });
    return found;
  }

  /** Symbol naming `n` in the designation chain or the current env, if any. */
  lookupDesignation(n: Node): string | null {
    for (const des of this.designationChain) {
      if (des.env !== n.env) continue;
      const found = this.accessEnv(des.env).findDesignation(n.local, des.local);
      if (found !== null) return found;
    }
    if (n.env === this.pos().env) {
      return this.env().findDesignation(n.local, EnvPrelude.Designation);
    }
    return null;
  }

  /**
   * Bind the symbol designated by `name` to `target` in the current env and
   * record `(target self_des name)`.
   */
  nameNode(name: Node, target: Node): Node {
    const symbol = this.unboundSymbol(name);
    const local = this.import(target);
    const proxy = this.import(name);
    const env = this.env();
    // bookkeeping triple: bypasses the tell handler
    if (env.matchTriple(local.local, EnvPrelude.Designation, proxy.local) === null) {
      env.insertTriple(local.local, EnvPrelude.Designation, proxy.local);
    }
    env.insertDesignation(local.local, symbol, EnvPrelude.Designation);
    log.debug(`named ${formatNode(local)} ${symbol}`);
    return local;
  }

  /** The symbol `name` abstracts, provided nothing resolves it yet. */
  unboundSymbol(name: Node): string {
    const symbol = this.designate(nodeSexp(name));
    if (symbol.tag !== "Symbol") {
      throw this.error({ tag: "InvalidArgument", given: symbol, expected: "Node abstracting Symbol" });
    }
    if (this.tryResolve(symbol.name) !== null) {
      throw this.error({ tag: "AlreadyBoundSymbol", symbol: symbol.name });
    }
    return symbol.name;
  }

  // =========================================================================
  // Definition
  // =========================================================================

  define(structure: Sexp | null): Node {
    return this.defineTo(this.pos().env, structure);
  }

  defineTo(envLocal: LocalNode, structure: Sexp | null): Node {
    return node(envLocal, this.accessEnv(envLocal).insertNode(structure));
  }

  /** Replace the structure of `n`; null clears it. */
  set(n: Node, structure: Sexp | null): void {
    if (isTripleId(n.local)) {
      throw this.error({ tag: "InvalidArgument", given: nodeSexp(n), expected: "non-triple Node" });
    }
    const env = this.accessEnv(n.env);
    if (!env.hasNode(n.local)) {
      throw this.error({ tag: "InvalidArgument", given: nodeSexp(n), expected: "existing node" });
    }
    env.entryUpdate(n.local, structure);
  }

  // =========================================================================
  // Triples
  // =========================================================================

  tell(subject: Node, predicate: Node, object: Node): Node {
    return this.tellTo(this.pos().env, subject, predicate, object);
  }

  /**
   * Insert a triple into `envLocal`. The env's tell handler, when set, is
   * applied to (s p o) first; a false result rejects the triple.
   */
  tellTo(envLocal: LocalNode, subject: Node, predicate: Node, object: Node): Node {
    this.checkLocal(envLocal, [subject, predicate, object]);
    const env = this.accessEnv(envLocal);
    const triple = list([subject, predicate, object].map(nodeSexp));
    if (env.matchTriple(subject.local, predicate.local, object.local) !== null) {
      throw this.error({ tag: "DuplicateTriple", triple });
    }

    if (env.entry(EnvPrelude.TellHandler) !== null) {
      const original = this.pos();
      let verdict: Sexp;
      try {
        verdict = this.executorOrThrow().call(node(envLocal, EnvPrelude.TellHandler), [subject, predicate, object]);
      } finally {
        this.jump(original);
      }
      if (this.langContext && sexpEq(verdict, nodeSexp(langNode(this.langContext, "f")))) {
        throw this.error({ tag: "RejectedTriple", triple, reason: verdict });
      }
    }

    return node(envLocal, env.insertTriple(subject.local, predicate.local, object.local));
  }

  /** Triples matching the given roles; null is a wildcard. */
  ask(subject: Node | null, predicate: Node | null, object: Node | null): Node[] {
    return this.askFrom(this.pos().env, subject, predicate, object);
  }

  askFrom(envLocal: LocalNode, subject: Node | null, predicate: Node | null, object: Node | null): Node[] {
    const given = [subject, predicate, object].filter((n): n is Node => n !== null);
    this.checkLocal(envLocal, given);
    const env = this.accessEnv(envLocal);
    const s = subject?.local ?? null;
    const p = predicate?.local ?? null;
    const o = object?.local ?? null;

    let found: LocalNode[];
    if (s !== null && p !== null && o !== null) {
      const t = env.matchTriple(s, p, o);
      found = t === null ? [] : [t];
    } else if (s !== null && p !== null) {
      found = env.matchButObject(s, p);
    } else if (s !== null && o !== null) {
      found = env.matchButPredicate(s, o);
    } else if (p !== null && o !== null) {
      found = env.matchButSubject(p, o);
    } else if (s !== null) {
      found = env.matchSubject(s);
    } else if (p !== null) {
      found = env.matchPredicate(p);
    } else if (o !== null) {
      found = env.matchObject(o);
    } else {
      found = env.matchAll();
    }
    return found.map((t) => node(envLocal, t));
  }

  /** Triples mentioning `n` in any role. */
  askAny(n: Node): Node[] {
    return this.accessEnv(n.env).matchAny(n.local).map((t) => node(n.env, t));
  }

  private checkLocal(envLocal: LocalNode, nodes: readonly Node[]): void {
    for (const n of nodes) {
      if (n.env !== envLocal) {
        throw this.error({ tag: "Unsupported", message: CROSS_ENV });
      }
    }
  }

  // =========================================================================
  // Import
  // =========================================================================

  import(original: Node): Node {
    return this.importTo(this.pos().env, original);
  }

  /**
   * Proxy node in `envLocal` whose structure is `original`. Repeated imports
   * of the same node return the same proxy.
   */
  importTo(envLocal: LocalNode, original: Node): Node {
    if (original.env === envLocal) return original;
    const tableNode = this.importTable(envLocal, original.env, true);
    if (tableNode === null) {
      throw this.error({ tag: "InvalidState", actual: "import table missing", expected: "import table" });
    }
    const hit = this.importTableOf(tableNode).lookup(original.local);
    if (hit !== undefined) return node(envLocal, hit);

    const imported = this.defineTo(envLocal, nodeSexp(original));
    this.metaEnv.entryMut(tableNode, () => {
      const table = this.importTableOf(tableNode).clone();
      table.insert(original.local, imported.local);
      return { tag: "LocalNodeTable", table };
    });
    return imported;
  }

  getImported(original: Node, envLocal: LocalNode): Node | null {
    if (original.env === envLocal) return original;
    const tableNode = this.importTable(envLocal, original.env, false);
    if (tableNode === null) return null;
    const hit = this.importTableOf(tableNode).lookup(original.local);
    return hit === undefined ? null : node(envLocal, hit);
  }

  private importTable(targetEnv: LocalNode, fromEnv: LocalNode, create: boolean): LocalNode | null {
    const meta = this.metaEnv;
    const ctx = this.metaContext;
    let importTriple = meta.matchTriple(targetEnv, ctx.imports, fromEnv);
    if (importTriple === null) {
      if (!create) return null;
      importTriple = meta.insertTriple(targetEnv, ctx.imports, fromEnv);
    }
    const tables = meta.matchButObject(importTriple, ctx.importTable);
    if (tables.length > 1) {
      throw this.error({
        tag: "InvalidState",
        actual: `${tables.length} import tables for one imports triple`,
        expected: "a single import table",
      });
    }
    const existing = tables[0];
    if (existing !== undefined) return meta.tripleObject(existing);
    if (!create) return null;
    const table = meta.insertNode({ tag: "LocalNodeTable", table: new LocalNodeTable(fromEnv) });
    meta.insertTriple(importTriple, ctx.importTable, table);
    return table;
  }

  private importTableOf(tableNode: LocalNode): LocalNodeTable {
    const s = this.metaEnv.entry(tableNode);
    if (s === null || s.tag !== "LocalNodeTable") {
      throw this.error({
        tag: "InvalidState",
        actual: "import table triple object has no table",
        expected: "LocalNodeTable structure",
      });
    }
    return s.table;
  }

  /** Meta node of the env whose serialize path ends with `suffix`. */
  findEnv(suffix: string): LocalNode | null {
    const meta = this.metaEnv;
    for (const t of meta.matchPredicate(this.metaContext.serializePath)) {
      const p = meta.entry(meta.tripleObject(t));
      if (p !== null && p.tag === "Path" && pathMatches(p.path, suffix)) {
        return meta.tripleSubject(t);
      }
    }
    return null;
  }

  /** (env node, path) for every env with a serialize path. */
  envPaths(): Array<[LocalNode, string]> {
    const meta = this.metaEnv;
    const out: Array<[LocalNode, string]> = [];
    for (const t of meta.matchPredicate(this.metaContext.serializePath)) {
      const p = meta.entry(meta.tripleObject(t));
      if (p !== null && p.tag === "Path") out.push([meta.tripleSubject(t), p.path]);
    }
    return out;
  }

  // =========================================================================
  // Printing
  // =========================================================================

  formatSexp(s: Sexp | null): string {
    return writeSexp(s, this.printOptions);
  }

  /** Designation, else triple as (s p o), else [Node_e_l] with its structure. */
  formatNode(n: Node, depth = 0): string {
    const name = this.lookupDesignation(n);
    if (name !== null) return name;
    if (n.env !== META_ENV && (!this.metaEnv.hasNode(n.env) || this.metaEnv.entry(n.env)?.tag !== "Env")) {
      return formatNode(n);
    }
    const env = this.accessEnv(n.env);
    if (!env.hasNode(n.local) || depth >= this.printOptions.maxDepth) return formatNode(n);

    const triple = env.nodeAsTriple(n.local);
    if (triple) {
      const parts = [triple.subject, triple.predicate, triple.object]
        .map((l) => this.formatNode(node(n.env, l), depth + 1));
      return `(${parts.join(" ")})`;
    }
    const structure = env.entry(n.local);
    if (structure === null || structure.tag === "Env" || (structure.tag === "Node" && nodeEq(structure.node, n))) {
      return formatNode(n);
    }
    return `${formatNode(n)}->${writeSexp(structure, this.printOptions, depth + 1)}`;
  }

  print(line: string): void {
    this.output(line);
  }

  /** Lines describing the exec stack captured in `err`. */
  traceError(err: LangError): string[] {
    const lines = ["  --TRACE--"];
    const state = err.state ?? [];
    state.forEach((frame, i) => {
      lines.push(`   ${i})  ${this.formatSexp(nodeSexp(frame.context))}`);
    });
    return lines;
  }

  /** Print the triples touching the current position. */
  printCurr(): void {
    for (const t of this.askAny(this.pos())) {
      this.print(`    ${this.formatSexp(nodeSexp(t))}`);
    }
  }
}
