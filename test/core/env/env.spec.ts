// test/core/env/env.spec.ts
// In-memory env store, overlay and prelude

import { describe, it, expect } from "vitest";
import { MemEnv } from "../../../src/core/env/memEnv";
import { SharedOverlay, SimplePolicy } from "../../../src/core/env/overlay";
import { EnvPrelude, PRELUDE_SIZE, populatePrelude, preludeFromName } from "../../../src/core/env/prelude";
import {
  formatNode,
  isTripleId,
  node,
  TRIPLE_FLAG,
  tripleIdFromIndex,
  tripleIndexFromId,
} from "../../../src/core/env/localNode";
import { int, nodeSexp } from "../../../src/core/sexp/sexp";

describe("LocalNode ids", () => {
  it("keeps triple ids above the flag", () => {
    expect(TRIPLE_FLAG).toBe(2 ** 52);
    expect(isTripleId(tripleIdFromIndex(0))).toBe(true);
    expect(isTripleId(5)).toBe(false);
    expect(tripleIndexFromId(tripleIdFromIndex(7))).toBe(7);
  });

  it("rejects out-of-range indices", () => {
    expect(() => tripleIdFromIndex(-1)).toThrow(/out of range/);
    expect(() => tripleIndexFromId(3)).toThrow(/not a triple id/);
  });

  it("formats triple nodes with a t prefix", () => {
    expect(formatNode(node(3, tripleIdFromIndex(2)))).toBe("[Node_3_t2]");
  });
});

describe("MemEnv", () => {
  function abc() {
    const env = new MemEnv();
    const a = env.insertNode(null);
    const b = env.insertNode(int(1));
    const c = env.insertNode(null);
    return { env, a, b, c };
  }

  it("issues dense node ids and keeps structures", () => {
    const { env, a, b, c } = abc();
    expect([a, b, c]).toEqual([0, 1, 2]);
    expect(env.entry(b)).toEqual(int(1));
    expect(env.entry(a)).toBeNull();
    expect(env.allNodes()).toEqual([0, 1, 2]);
  });

  it("indexes triples by every role", () => {
    const { env, a, b, c } = abc();
    const t0 = env.insertTriple(a, b, c);
    const t1 = env.insertTriple(a, b, a);
    expect(env.matchSubject(a)).toEqual([t0, t1]);
    expect(env.matchObject(a)).toEqual([t1]);
    expect(env.matchButObject(a, b)).toEqual([t0, t1]);
    expect(env.matchButSubject(b, c)).toEqual([t0]);
    expect(env.matchButPredicate(a, c)).toEqual([t0]);
    expect(env.matchTriple(a, b, c)).toBe(t0);
    expect(env.matchTriple(c, b, a)).toBeNull();
    expect(env.matchAny(a)).toEqual([t0, t1]);
    expect(env.matchAll()).toEqual([t0, t1]);
  });

  it("lets triples take part in triples", () => {
    const { env, a, b } = abc();
    const t0 = env.insertTriple(a, b, a);
    const t1 = env.insertTriple(t0, b, a);
    expect(env.nodeAsTriple(t1)).toEqual({ subject: t0, predicate: b, object: a });
    expect(env.matchSubject(t0)).toEqual([t1]);
    expect(env.entry(t0)).toBeNull();
    expect(env.tripleIndex(t1)).toBe(1);
    expect(env.tripleFromIndex(1)).toBe(t1);
  });

  it("updates structures in place", () => {
    const { env, a } = abc();
    env.entryUpdate(a, int(5));
    env.entryMut(a, (s) => (s !== null && s.tag === "Int" ? int(s.n + 1) : s));
    expect(env.entry(a)).toEqual(int(6));
  });

  it("fails on unknown ids", () => {
    const env = new MemEnv();
    expect(env.hasNode(0)).toBe(false);
    expect(() => env.entry(0)).toThrow(/invalid node/);
    expect(() => env.insertTriple(0, 0, 0)).toThrow(/invalid node/);
  });

  it("keeps designations one-to-one per context", () => {
    const { env, a, b, c } = abc();
    env.insertDesignation(a, "x", c);
    env.insertDesignation(b, "x", c);
    expect(env.matchDesignation("x", c)).toBe(b);
    expect(env.findDesignation(a, c)).toBeNull();
    env.insertDesignation(b, "y", c);
    expect(env.matchDesignation("x", c)).toBeNull();
    expect(env.designationPairs(c)).toEqual([["y", b]]);
    expect(env.matchDesignation("y", a)).toBeNull();
    expect(env.designationContexts()).toEqual([c]);
  });
});

describe("SharedOverlay", () => {
  it("redirects every holder when the cell changes", () => {
    const cell = { env: new MemEnv() };
    const overlay = new SharedOverlay(cell);
    overlay.insertNode(null);
    expect(overlay.nodeCount()).toBe(1);
    cell.env = new MemEnv();
    expect(overlay.nodeCount()).toBe(0);
  });

  it("is what SimplePolicy creates", () => {
    expect(new SimplePolicy().createEnv()).toBeInstanceOf(SharedOverlay);
  });
});

describe("prelude", () => {
  it("reserves the first nodes and names them", () => {
    const env = new MemEnv();
    populatePrelude(env, 4);
    expect(env.nodeCount()).toBe(PRELUDE_SIZE);
    expect(env.entry(EnvPrelude.SelfEnv)).toEqual(nodeSexp(node(0, 4)));
    expect(env.matchDesignation("tell_handler", EnvPrelude.Designation)).toBe(EnvPrelude.TellHandler);
    expect(env.designationPairs(EnvPrelude.Designation)).toEqual([
      ["self_env", 0],
      ["self_des", 1],
      ["tell_handler", 2],
    ]);
  });

  it("refuses a non-empty env", () => {
    const env = new MemEnv();
    env.insertNode(null);
    expect(() => populatePrelude(env, 1)).toThrow(/not empty/);
  });

  it("maps names to prelude locals", () => {
    expect(preludeFromName("self_des")).toBe(1);
    expect(preludeFromName("other")).toBeNull();
  });
});
