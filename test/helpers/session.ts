// test/helpers/session.ts
// Fresh in-memory federation plus an interpreting agent, for language tests

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import type { Agent } from "../../src/core/agent/agent";
import { LangError, type ErrorKind } from "../../src/core/error/errors";
import { createSession, EnvManager } from "../../src/core/manager";
import { readSexps } from "../../src/core/reader/read";
import type { Sexp } from "../../src/core/sexp/sexp";

export type TestSession = {
  dir: string;
  manager: EnvManager;
  agent: Agent;
  /** Lines written through println, curr and jump. */
  output: string[];
  /** Interpret every expression in `text`; returns the last value. */
  run(text: string): Sexp;
  /** As `run`, printed the way the REPL prints values. */
  show(text: string): string;
  /** Kind of the LangError raised by `text`. */
  fails(text: string): ErrorKind;
  cleanup(): void;
};

export function tempDir(prefix = "nodal-test-"): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function openSession(dir: string = tempDir()): TestSession {
  const manager = EnvManager.bootstrap({ baseDir: dir });
  const output: string[] = [];
  const agent = createSession(manager, { output: (line) => output.push(line) });

  const run = (text: string): Sexp => {
    let last: Sexp | null = null;
    for (const sexp of readSexps(text)) last = agent.interpret(sexp);
    if (last === null) throw new Error(`no expression in ${JSON.stringify(text)}`);
    return last;
  };

  return {
    dir,
    manager,
    agent,
    output,
    run,
    show: (text) => agent.formatSexp(run(text)),
    fails(text) {
      try {
        run(text);
      } catch (e) {
        if (e instanceof LangError) return e.kind;
        throw e;
      }
      throw new Error(`expected ${text} to fail`);
    },
    cleanup: () => fs.rmSync(dir, { recursive: true, force: true }),
  };
}
