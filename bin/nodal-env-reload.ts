#!/usr/bin/env tsx
// bin/nodal-env-reload.ts
// Load the env federation and write it back out, rewriting every env file in
// the current format.
//
// Run:  tsx bin/nodal-env-reload.ts [--dir ./envs] [--out ./envs-new]

import { loadConfig } from "../src/core/config";
import { isLangError } from "../src/core/error";
import { configureLogging, getLogger } from "../src/core/log";
import { EnvManager } from "../src/core/manager";

const log = getLogger("env-reload");

function parseArgs(): { dir?: string; out?: string; config?: string } {
  const args = process.argv.slice(2);
  const result: { dir?: string; out?: string; config?: string } = {};
  for (let i = 0; i < args.length; i++) {
    const next = args[i + 1];
    if ((args[i] === "--dir" || args[i] === "-d") && next) {
      result.dir = next;
      i++;
    } else if ((args[i] === "--out" || args[i] === "-o") && next) {
      result.out = next;
      i++;
    } else if ((args[i] === "--config" || args[i] === "-c") && next) {
      result.config = next;
      i++;
    }
  }
  return result;
}

function main(): number {
  const args = parseArgs();
  const config = loadConfig({
    configFile: args.config,
    overrides: args.dir ? { envs: { baseDir: args.dir } } : undefined,
  });
  configureLogging({ level: config.log.level === "warn" ? "info" : config.log.level });

  try {
    const manager = EnvManager.bootstrap({ baseDir: config.envs.baseDir, metaFile: config.envs.metaFile });
    manager.serializeFull(args.out ?? config.envs.baseDir, config.envs.serializeBlacklist);
  } catch (e) {
    if (!isLangError(e)) throw e;
    log.error(e.message);
    return 1;
  }
  return 0;
}

process.exitCode = main();
