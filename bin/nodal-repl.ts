#!/usr/bin/env tsx
// bin/nodal-repl.ts
// Interactive REPL over the env federation in the configured directory
//
// Run:  tsx bin/nodal-repl.ts
//       tsx bin/nodal-repl.ts --dir ./envs --config nodal.config.json
//       tsx bin/nodal-repl.ts --file script.nd    (run a file, save, exit)

import * as fs from "fs";
import * as readline from "readline";
import { loadConfig, validateConfig, type NodalConfig } from "../src/core/config";
import { isLangError } from "../src/core/error";
import { configureLogging, getLogger } from "../src/core/log";
import { createSession, EnvManager } from "../src/core/manager";
import { Repl } from "../src/core/repl";

const log = getLogger("repl");

type Args = { config?: string; dir?: string; file?: string };

function parseArgs(): Args {
  const args = process.argv.slice(2);
  const result: Args = {};

  for (let i = 0; i < args.length; i++) {
    const next = args[i + 1];
    if ((args[i] === "--config" || args[i] === "-c") && next) {
      result.config = next;
      i++;
    } else if ((args[i] === "--dir" || args[i] === "-d") && next) {
      result.dir = next;
      i++;
    } else if ((args[i] === "--file" || args[i] === "-f") && next) {
      result.file = next;
      i++;
    }
  }

  return result;
}

function setup(args: Args): { config: NodalConfig; manager: EnvManager; repl: Repl } {
  const config = loadConfig({
    configFile: args.config,
    overrides: args.dir ? { envs: { baseDir: args.dir } } : undefined,
  });
  const validation = validateConfig(config);
  for (const w of validation.warnings) log.warn(w);
  if (!validation.valid) {
    throw new Error(`Invalid configuration:\n  ${validation.errors.join("\n  ")}`);
  }
  configureLogging({ level: config.log.level });

  const manager = EnvManager.bootstrap({
    baseDir: config.envs.baseDir,
    metaFile: config.envs.metaFile,
  });
  const agent = createSession(manager, {
    maxPrintDepth: config.runtime.maxPrintDepth,
    maxPrintLength: config.runtime.maxPrintLength,
  });
  const repl = new Repl(agent, { maxParseDepth: config.runtime.maxParseDepth });
  return { config, manager, repl };
}

function save(config: NodalConfig, manager: EnvManager): boolean {
  try {
    manager.serializeFull(config.envs.baseDir, config.envs.serializeBlacklist);
    return true;
  } catch (e) {
    if (!isLangError(e)) throw e;
    console.error(`Failed to save envs: ${e.message}`);
    return false;
  }
}

function feed(repl: Repl, line: string): void {
  for (const result of repl.feedLine(line)) {
    for (const out of result.lines) console.log(out);
  }
}

async function main() {
  const args = parseArgs();
  const { config, manager, repl } = setup(args);

  // ─────────────────────────────────────────────────────────────────
  // Batch mode: run a file, save, exit
  // ─────────────────────────────────────────────────────────────────
  if (args.file) {
    const text = fs.readFileSync(args.file, "utf8");
    for (const line of text.split(/\r?\n/)) feed(repl, line);
    if (repl.pending) console.error("Incomplete expression at end of file");
    process.exitCode = save(config, manager) ? 0 : 1;
    return;
  }

  // Piped input: read line by line without prompts
  if (!process.stdin.isTTY) {
    const rl = readline.createInterface({ input: process.stdin });
    try {
      for await (const line of rl) feed(repl, line);
    } finally {
      rl.close();
    }
    process.exitCode = save(config, manager) ? 0 : 1;
    return;
  }

  // ─────────────────────────────────────────────────────────────────
  // Interactive mode
  // ─────────────────────────────────────────────────────────────────
  console.log(`nodal: envs in ${config.envs.baseDir} (Ctrl-D saves and exits, Ctrl-C clears input)`);

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: repl.prompt,
  });
  rl.prompt();

  rl.on("line", (line) => {
    feed(repl, line);
    rl.setPrompt(repl.prompt);
    rl.prompt();
  });

  rl.on("SIGINT", () => {
    repl.clear();
    console.log("");
    rl.setPrompt(repl.prompt);
    rl.prompt();
  });

  rl.on("close", () => {
    console.log("");
    process.exit(save(config, manager) ? 0 : 1);
  });
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
