// src/core/manager/session.ts
// A ready-to-interpret agent over a bootstrapped federation

import type { Agent, AgentOptions } from "../agent/agent";
import { node, type LocalNode } from "../env/localNode";
import { EnvPrelude } from "../env/prelude";
import { LangError } from "../error/errors";
import { ExecInterpreter } from "../interp/exec";
import { SyntacticInterpreter } from "../interp/syntactic";
import { STANDARD_ENVS, type EnvManager } from "./envManager";

function requireEnv(agent: Agent, envPath: string): LocalNode {
  const found = agent.findEnv(envPath);
  if (found === null) {
    throw new LangError({ tag: "InvalidState", actual: `no env with path ${envPath}`, expected: "standard env" });
  }
  return found;
}

/**
 * Fork the manager's agent into a session positioned at working.env, resolving
 * symbols through the lang env and then working.env.
 */
export function createSession(manager: EnvManager, options?: AgentOptions): Agent {
  const agent = manager.agent().fork(options);
  const langEnv = requireEnv(agent, STANDARD_ENVS.lang);
  const historyEnv = requireEnv(agent, STANDARD_ENVS.history);
  const implEnv = requireEnv(agent, STANDARD_ENVS.impl);
  const workingEnv = requireEnv(agent, STANDARD_ENVS.working);

  agent.setInterpreters(
    new ExecInterpreter(agent, { historyEnv }),
    (frame) => new SyntacticInterpreter(agent, implEnv, frame),
  );
  agent.designationChain.length = 0;
  agent.designationChain.push(node(langEnv, EnvPrelude.Designation), node(workingEnv, EnvPrelude.Designation));
  agent.jumpEnv(workingEnv);
  return agent;
}
