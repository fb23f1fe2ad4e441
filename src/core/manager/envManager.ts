// src/core/manager/envManager.ts
// Owns the meta-env and its federation of envs: bootstrap, load, save

import * as fs from "fs";
import * as nodePath from "path";
import { Agent, type AgentOptions } from "../agent/agent";
import {
  loadLangContext,
  loadMetaContext,
  type LangContext,
} from "../agent/context";
import { generateBuiltinMap } from "../builtins/builtins";
import type { Environment } from "../env/environment";
import { META_ENV, node, type LocalNode } from "../env/localNode";
import { SimplePolicy, type EnvPolicy } from "../env/overlay";
import { EnvPrelude, populatePrelude } from "../env/prelude";
import { ioError, LangError } from "../error/errors";
import { getLogger } from "../log/logger";
import { builtinSexp, type BuiltIn } from "../sexp/builtin";
import { path, type Sexp } from "../sexp/sexp";
import { deserializeEnvFile } from "./envDeserializer";
import { serializeEnv } from "./envSerializer";

const log = getLogger("manager");

export const DEFAULT_META_FILE = "meta.env";

/** Envs every federation carries; lang.env is loaded before the others. */
export const STANDARD_ENVS = {
  lang: "lang.env",
  history: "history.env",
  impl: "impl.env",
  working: "working.env",
} as const;

export type EnvManagerOptions = {
  /** Directory holding meta.env; env paths are relative to it. */
  baseDir: string;
  metaFile?: string;
  policy?: EnvPolicy;
  builtins?: ReadonlyMap<string, BuiltIn>;
  agent?: AgentOptions;
};

export class EnvManager {
  /** Header fields read from each env's file, written back on save. */
  private readonly headerExtras = new Map<LocalNode, Array<[string, Sexp]>>();

  private constructor(
    readonly baseDir: string,
    readonly metaFile: string,
    private readonly policy: EnvPolicy,
    readonly builtins: ReadonlyMap<string, BuiltIn>,
    private readonly metaAgent: Agent,
  ) {}

  /**
   * Load the federation from `baseDir`, or create a fresh one there when no
   * meta file exists. Nothing is written until a serialize call.
   */
  static bootstrap(options: EnvManagerOptions): EnvManager {
    const policy = options.policy ?? new SimplePolicy();
    const builtins = options.builtins ?? generateBuiltinMap();
    const metaFile = options.metaFile ?? DEFAULT_META_FILE;
    const baseDir = options.baseDir;

    const meta = policy.createEnv();
    populatePrelude(meta, META_ENV);

    const metaPath = nodePath.join(baseDir, metaFile);
    const existing = fs.existsSync(metaPath);
    const metaHeader = existing ? deserializeEnvFile(meta, metaPath, { env: META_ENV, builtins }) : null;
    const metaContext = loadMetaContext(meta, { bootstrap: !existing });
    const agent = new Agent(node(META_ENV, EnvPrelude.SelfEnv), meta, metaContext, options.agent);

    const manager = new EnvManager(baseDir, metaFile, policy, builtins, agent);
    if (metaHeader) manager.headerExtras.set(META_ENV, metaHeader.header.extra);

    if (existing) {
      manager.loadAll();
      log.info(`Loaded env federation from ${baseDir}`);
    } else {
      for (const p of Object.values(STANDARD_ENVS)) manager.insertNewEnv(p);
      log.info(`Created env federation for ${baseDir}`);
    }

    const langEnv = agent.findEnv(STANDARD_ENVS.lang);
    if (langEnv === null) {
      throw new LangError({
        tag: "InvalidState",
        actual: `no env with path ${STANDARD_ENVS.lang}`,
        expected: "lang env",
      });
    }
    const context = loadLangContext(meta, langEnv, { bootstrap: true });
    manager.installBuiltins(agent.accessEnv(langEnv));
    agent.setContext(context);
    agent.jumpEnv(langEnv);
    return manager;
  }

  agent(): Agent {
    return this.metaAgent;
  }

  context(): LangContext {
    return this.metaAgent.context();
  }

  /** Env node for `envPath`, creating an empty env on first use. */
  insertNewEnv(envPath: string): LocalNode {
    const agent = this.metaAgent;
    const known = agent.envPaths().find(([, p]) => p === envPath);
    if (known) return known[0];

    const meta = agent.metaEnv;
    const env = this.policy.createEnv();
    const envNode = meta.insertNode({ tag: "Env", env });
    populatePrelude(env, envNode);
    const pathNode = meta.insertNode(path(envPath));
    meta.insertTriple(envNode, agent.metaContext.serializePath, pathNode);
    log.debug(`new env ${envPath} at meta node ${envNode}`);
    return envNode;
  }

  // =========================================================================
  // Serialization
  // =========================================================================

  /** Write meta.env and every env whose path is not in `blacklist`. */
  serializeFull(outDir: string = this.baseDir, blacklist: readonly string[] = []): void {
    try {
      fs.mkdirSync(outDir, { recursive: true });
    } catch (e) {
      throw ioError(outDir, e);
    }
    this.serializeEnv(META_ENV, nodePath.join(outDir, this.metaFile));
    for (const [envNode, envPath] of this.metaAgent.envPaths()) {
      if (blacklist.includes(envPath)) continue;
      this.serializeEnv(envNode, nodePath.join(outDir, envPath));
    }
  }

  serializeEnv(envNode: LocalNode, filePath: string): void {
    const env = this.metaAgent.accessEnv(envNode);
    const text = serializeEnv(env, envNode, this.headerExtras.get(envNode));
    try {
      fs.writeFileSync(filePath, text, "utf8");
    } catch (e) {
      throw ioError(filePath, e);
    }
    log.info(`Wrote ${filePath} (${env.nodeCount()} nodes, ${env.tripleCount()} triples)`);
  }

  /** Load `filePath` into the (prelude-only) env at `envNode`. */
  deserializeEnv(envNode: LocalNode, filePath: string): void {
    const env = this.metaAgent.accessEnv(envNode);
    const result = deserializeEnvFile(env, filePath, { env: envNode, builtins: this.builtins });
    if (result === null) return;
    this.headerExtras.set(envNode, result.header.extra);
    log.info(`Loaded ${filePath} (${result.header.nodeCount} nodes, ${result.header.tripleCount} triples)`);
  }

  // ----- internals -----

  private loadAll(): void {
    const meta = this.metaAgent.metaEnv;
    const paths = this.metaAgent.envPaths();
    for (const [envNode] of paths) {
      const env = this.policy.createEnv();
      meta.entryUpdate(envNode, { tag: "Env", env });
      populatePrelude(env, envNode);
    }

    const isLang = (p: string) => p === STANDARD_ENVS.lang;
    const ordered = [...paths.filter(([, p]) => isLang(p)), ...paths.filter(([, p]) => !isLang(p))];
    for (const [envNode, envPath] of ordered) {
      this.deserializeEnv(envNode, nodePath.join(this.baseDir, envPath));
    }
  }

  /** Give every registered built-in a designated node in the lang env. */
  private installBuiltins(langEnv: Environment): void {
    for (const [name, builtin] of this.builtins) {
      if (langEnv.matchDesignation(name, EnvPrelude.Designation) !== null) continue;
      const local = langEnv.insertNode(builtinSexp(builtin));
      langEnv.insertDesignation(local, name, EnvPrelude.Designation);
    }
  }
}
