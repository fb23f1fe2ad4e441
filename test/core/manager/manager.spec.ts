// test/core/manager/manager.spec.ts
// Env files: writing, reading back, and rejecting malformed input

import * as fs from "fs";
import * as path from "path";
import { describe, it, expect, afterEach } from "vitest";
import { MemEnv } from "../../../src/core/env/memEnv";
import { populatePrelude } from "../../../src/core/env/prelude";
import { LangError, type DeserializeErrorReason } from "../../../src/core/error/errors";
import { generateBuiltinMap } from "../../../src/core/builtins/builtins";
import {
  createSession,
  deserializeEnvText,
  EnvManager,
  serializeEnv,
  STANDARD_ENVS,
} from "../../../src/core/manager";
import { float, int } from "../../../src/core/sexp/sexp";
import { openSession, tempDir } from "../../helpers/session";

const dirs: string[] = [];
function dir(): string {
  const d = tempDir("nodal-manager-");
  dirs.push(d);
  return d;
}

afterEach(() => {
  for (const d of dirs.splice(0)) fs.rmSync(d, { recursive: true, force: true });
});

const PRELUDE_TEXT = [
  "(header",
  "  (version . \"0.1.0\")",
  "  (node-count . 10)",
  "  (triple-count . 0))",
  "",
  "(nodes",
  "  (^0 ^0^5)",
  "  ^1",
  "  ^2",
  "  ^3",
  "  ^4",
  "  ^5",
  "  ^6",
  "  ^7",
  "  ^8",
  "  ^9)",
  "",
  "(triples)",
  "",
  "(designations",
  "  (^1 ^0 self_env)",
  "  (^1 ^1 self_des)",
  "  (^1 ^2 tell_handler))",
  "",
].join("\n");

function preludeEnv(): MemEnv {
  const env = new MemEnv();
  populatePrelude(env, 5);
  return env;
}

const ctx = { env: 5, builtins: generateBuiltinMap() };

function reasonOf(text: string): DeserializeErrorReason | string {
  try {
    deserializeEnvText(preludeEnv(), text, ctx);
  } catch (e) {
    if (e instanceof LangError) return e.kind.tag === "DeserializeError" ? e.kind.reason : e.kind.tag;
    throw e;
  }
  return "ok";
}

function withNodes(count: number, extraNodes: string[], triples: string[] = []): string {
  const nodes = ["(^0 ^0^5)", ...Array.from({ length: 9 }, (_, i) => `^${i + 1}`), ...extraNodes];
  return [
    `(header (version . "0.1.0") (node-count . ${count}) (triple-count . ${triples.length}))`,
    `(nodes ${nodes.join(" ")})`,
    `(triples ${triples.join(" ")})`,
    "(designations)",
  ].join("\n");
}

describe("serializeEnv", () => {
  it("writes a prelude-only env", () => {
    expect(serializeEnv(preludeEnv(), 5)).toBe(PRELUDE_TEXT);
  });

  it("reads back what it writes", () => {
    const env = preludeEnv();
    const result = deserializeEnvText(env, PRELUDE_TEXT, ctx);
    expect(result.header.nodeCount).toBe(10);
    expect(env.nodeCount()).toBe(10);
    expect(serializeEnv(env, 5)).toBe(PRELUDE_TEXT);
  });

  it("keeps unknown header fields", () => {
    const text = PRELUDE_TEXT.replace("(triple-count . 0))", "(triple-count . 0)\n  (origin . \"lab\"))");
    const env = preludeEnv();
    const { header } = deserializeEnvText(env, text, ctx);
    expect(serializeEnv(env, 5, header.extra)).toBe(text);
  });
});

describe("deserializeEnvText", () => {
  it("accepts extra nodes and triples", () => {
    const text = withNodes(12, ["(^10 42)", "(^11 '(a ^10))"], ["(^10 ^1 ^11)"]);
    const env = preludeEnv();
    deserializeEnvText(env, text, ctx);
    expect(env.entry(10)).toEqual(int(42));
    expect(env.tripleCount()).toBe(1);
    expect(env.matchSubject(10)).toHaveLength(1);
  });

  it("rejects missing and misordered sections", () => {
    const [header] = PRELUDE_TEXT.split("\n\n");
    expect(reasonOf(header ?? "")).toBe("MissingNodeSection");
    expect(reasonOf(PRELUDE_TEXT.replace("(triples)", "(stuff)"))).toBe("UnexpectedCommand");
    const swapped = PRELUDE_TEXT.replace("(triples)", "(designations)");
    expect(reasonOf(swapped)).toBe("MissingTripleSection");
    expect(reasonOf(`${PRELUDE_TEXT}\n(triples)`)).toBe("ExtraneousSection");
    expect(reasonOf("")).toBe("MissingHeaderSection");
  });

  it("checks counts against the header", () => {
    expect(reasonOf(withNodes(11, []))).toBe("MissingData");
    expect(reasonOf(withNodes(10, ["^10"]))).toBe("ExtraneousData");
  });

  it("rejects bad node entries", () => {
    expect(reasonOf(withNodes(11, ["^12"]))).toBe("InvalidNodeEntry");
    expect(reasonOf(withNodes(11, ["(^10 (__builtin nope))"]))).toBe("UnrecognizedBuiltIn");
    expect(reasonOf(withNodes(11, ["(^10 (Mystery 1))"]))).toBe("UnexpectedCommand");
    expect(reasonOf(withNodes(10, [], ["(^1 ^2 ^50)"]))).toBe("InvalidNodeEntry");
    expect(reasonOf(withNodes(10, [], ["(^1 ^2 ^3)", "(^1 ^2 ^3)"]))).toBe("InvalidNodeEntry");
  });

  it("resolves built-ins by name", () => {
    const env = preludeEnv();
    deserializeEnvText(env, withNodes(11, ["(^10 (__builtin car))"]), ctx);
    const s = env.entry(10);
    expect(s?.tag === "BuiltIn" ? s.builtin.name : null).toBe("car");
  });

  it("only loads into an env holding just its prelude", () => {
    const env = preludeEnv();
    env.insertNode(null);
    expect(() => deserializeEnvText(env, PRELUDE_TEXT, ctx)).toThrow(/env holding only its prelude/);
  });
});

describe("EnvManager", () => {
  it("creates the standard envs on first use", () => {
    const manager = EnvManager.bootstrap({ baseDir: dir() });
    const paths = manager.agent().envPaths().map(([, p]) => p);
    expect(paths).toEqual(Object.values(STANDARD_ENVS));
    expect(manager.insertNewEnv("lang.env")).toBe(13);
  });

  it("writes every env and the meta file", () => {
    const base = dir();
    const s = openSession(base);
    s.manager.serializeFull();
    expect(fs.readdirSync(base).sort()).toEqual(["history.env", "impl.env", "lang.env", "meta.env", "working.env"]);
  });

  it("skips blacklisted envs", () => {
    const base = dir();
    EnvManager.bootstrap({ baseDir: base }).serializeFull(base, ["lang.env", "impl.env"]);
    expect(fs.readdirSync(base).sort()).toEqual(["history.env", "meta.env", "working.env"]);
  });

  it("round-trips a session through its files", () => {
    const base = dir();
    const first = openSession(base);
    first.run(`
      (def x 5)
      (def greeting "hi there")
      (def sq (lambda (n) (* n n)))
      (def a) (def b)
      (tell a b a)
      (apply + '(1 2))
      (import true)`);
    first.manager.serializeFull();

    const again = openSession(base);
    expect(again.run("(sq x)")).toEqual(int(25));
    expect(again.show("greeting")).toBe("\"hi there\"");
    expect(again.show("(ask a _ a)")).toBe("((a b a))");

    const copy = dir();
    EnvManager.bootstrap({ baseDir: base }).serializeFull(copy);
    for (const name of ["meta.env", ...Object.values(STANDARD_ENVS)]) {
      expect(fs.readFileSync(path.join(copy, name), "utf8")).toBe(fs.readFileSync(path.join(base, name), "utf8"));
    }
  });

  it("reloads floats at the edges of their range", () => {
    const base = dir();
    const first = openSession(base);
    first.run("(def z (* -1.0 0.0)) (def big (* 1.0e200 1.0e100))");
    expect(first.fails("(def huge (* 1.0e200 1.0e200))").tag).toBe("InvalidArgument");
    first.manager.serializeFull();

    const again = openSession(base);
    expect(again.show("z")).toBe("-0.0");
    expect(again.run("big")).toEqual(float(1e200 * 1e100));
    expect(again.fails("huge")).toEqual({ tag: "UnboundSymbol", symbol: "huge" });
  });

  it("leaves an env empty when its file is missing", () => {
    const base = dir();
    EnvManager.bootstrap({ baseDir: base }).serializeFull();
    fs.rmSync(path.join(base, "working.env"));
    const agent = createSession(EnvManager.bootstrap({ baseDir: base }), { output: () => undefined });
    expect(agent.env().nodeCount()).toBe(10);
  });

  it("fails on a corrupt env file", () => {
    const base = dir();
    EnvManager.bootstrap({ baseDir: base }).serializeFull();
    fs.writeFileSync(path.join(base, "impl.env"), "(header)");
    expect(() => EnvManager.bootstrap({ baseDir: base })).toThrow(LangError);
  });
});
