// test/core/serde/serde.spec.ts
// Reification protocol, versions, headers and procedure models

import { describe, it, expect } from "vitest";
import { LangError } from "../../../src/core/error/errors";
import { node } from "../../../src/core/env/localNode";
import { envHeaderModel, newHeader } from "../../../src/core/serde/header";
import { procedureModel, symNodeTableModel } from "../../../src/core/serde/models";
import { Reflector } from "../../../src/core/serde/reflect";
import { Reifier } from "../../../src/core/serde/reify";
import { compareVersions, parseVersion, versionModel } from "../../../src/core/serde/version";
import { readSexps } from "../../../src/core/reader/read";
import { cons, int, list, nil, nodeSexp, sexpToString, str, sym, type Sexp } from "../../../src/core/sexp/sexp";
import { policyEnvSerde } from "../../../src/core/sexp/symbol";
import { SymNodeTable } from "../../../src/core/sexp/table";

function read(text: string): Sexp {
  const [s] = readSexps(text, { policy: policyEnvSerde });
  if (s === undefined) throw new Error("nothing read");
  return s;
}

describe("Reifier", () => {
  it("shapes structs and variants", () => {
    const r = new Reifier();
    expect(sexpToString(r.struct("Point", [["x", int(1)], ["y", int(2)]]))).toBe("(Point (x . 1) (y . 2))");
    expect(sexpToString(r.unitVariant("Empty"))).toBe("Empty");
    expect(sexpToString(r.newtypeVariant("Some", int(3)))).toBe("(Some 3)");
    expect(sexpToString(r.tupleVariant("Pair", [int(1), int(2)]))).toBe("(Pair 1 2)");
    expect(sexpToString(r.structVariant("Shape", "Circle", [["r", int(5)]]))).toBe("((Shape . Circle) (r . 5))");
    expect(sexpToString(r.map([[sym("k"), str("v")]]))).toBe("((k . \"v\"))");
    expect(r.option(null)).toEqual(nil());
  });

  it("nests compounds on its stack", () => {
    const r = new Reifier();
    r.beginSeq().element(int(1));
    r.beginSeq().element(int(2));
    const inner = r.end();
    r.element(inner);
    expect(sexpToString(r.end())).toBe("(1 (2))");
    expect(r.depth).toBe(0);
  });

  it("refuses elements outside a sequence", () => {
    const r = new Reifier();
    r.beginStruct("S");
    expect(() => r.element(int(1))).toThrow("Reifier.element: not inside Seq or TupleVariant");
  });

  it("uses configured booleans", () => {
    expect(new Reifier({ trueValue: int(1) }).bool(true)).toEqual(int(1));
    expect(new Reifier().bool(false)).toEqual(sym("false"));
  });
});

describe("Reflector", () => {
  it("reads struct fields and reports leftovers", () => {
    const d = new Reflector();
    const fields = d.struct(read("(Point (x . 1) (y . 2) (z . 3))"), "Point");
    expect(d.int(fields.required("x"))).toBe(1);
    expect(fields.optional("y")).toEqual(int(2));
    expect(fields.rest()).toEqual([["z", int(3)]]);
    expect(() => fields.finish()).toThrow(LangError);
  });

  it("reads every variant shape", () => {
    const d = new Reflector();
    expect(d.variant(sym("Empty"))).toEqual({ name: "Empty", items: [], fields: null });
    expect(d.variant(read("(Pair 1 2)")).items).toEqual([int(1), int(2)]);
    const sv = d.variant(read("((Shape . Circle) (r . 5))"));
    expect(sv.name).toBe("Circle");
    expect(sv.fields?.required("r")).toEqual(int(5));
  });

  it("resolves sigils against its env", () => {
    const d = new Reflector({ env: 3 });
    expect(d.node(sym("^12"))).toEqual(node(3, 12));
    expect(d.node(sym("^1^4"))).toEqual(node(1, 4));
    expect(d.node(read("(Node (env . 2) (local . 5))"))).toEqual(node(2, 5));
    expect(() => new Reflector().node(sym("^12"))).toThrow(/global node sigil/);
  });

  it("checks tuple length", () => {
    const d = new Reflector();
    const kind = (s: Sexp) => {
      try {
        d.tuple(s, 2, "pair");
      } catch (e) {
        if (e instanceof LangError && e.kind.tag === "DeserializeError") return e.kind.reason;
      }
      return "ok";
    };
    expect(kind(read("(a)"))).toBe("MissingData");
    expect(kind(read("(a b c)"))).toBe("ExtraneousData");
    expect(kind(read("(a b)"))).toBe("ok");
  });

  it("reads maps and options", () => {
    const d = new Reflector();
    expect(d.map(read("((a . 1) (b . 2))"), (k) => d.symbol(k), (v) => d.int(v))).toEqual([["a", 1], ["b", 2]]);
    expect(d.option(nil(), (s) => d.int(s))).toBeNull();
    expect(d.bool(sym("true"))).toBe(true);
  });
});

describe("versions", () => {
  it("parses and compares", () => {
    expect(parseVersion("1.2.3")).toEqual({ major: 1, minor: 2, patch: 3 });
    expect(parseVersion("1.2")).toBeNull();
    const a = { major: 0, minor: 1, patch: 0 };
    expect(compareVersions(a, { major: 0, minor: 2, patch: 0 })).toBeLessThan(0);
    expect(compareVersions(a, a)).toBe(0);
  });

  it("reifies as a string", () => {
    expect(versionModel.reify({ major: 0, minor: 1, patch: 0 }, new Reifier())).toEqual(str("0.1.0"));
    expect(() => versionModel.reflect(str("x"), new Reflector())).toThrow(/invalid version "x"/);
  });
});

describe("envHeaderModel", () => {
  it("writes version and counts", () => {
    const s = envHeaderModel.reify(newHeader(12, 3), new Reifier());
    expect(sexpToString(s)).toBe("(header (version . \"0.1.0\") (node-count . 12) (triple-count . 3))");
  });

  it("reads dotted and list fields and keeps unknown ones", () => {
    const header = envHeaderModel.reflect(
      read("(header (version \"0.1.0\") (node-count . 10) (triple-count 0) (origin . \"x\"))"),
      new Reflector(),
    );
    expect(header.nodeCount).toBe(10);
    expect(header.tripleCount).toBe(0);
    expect(header.version).toEqual({ major: 0, minor: 1, patch: 0 });
    expect(header.extra).toEqual([["origin", str("x")]]);
  });

  it("requires the counts", () => {
    expect(() => envHeaderModel.reflect(read("(header (version . \"0.1.0\"))"), new Reflector()))
      .toThrow(/missing field "node-count"/);
  });
});

describe("procedureModel", () => {
  const r = new Reifier();
  const d = new Reflector({ env: 2 });

  it("reifies applications with node args", () => {
    const s = procedureModel.reify({ tag: "Application", proc: node(1, 11), args: [node(2, 12)] }, r);
    expect(s).toEqual(list([sym("Application"), nodeSexp(node(1, 11)), list([nodeSexp(node(2, 12))])]));
  });

  it("reflects each procedure form from sigils", () => {
    expect(procedureModel.reflect(read("(Branch ^10 ^11 ^12)"), d)).toEqual({
      tag: "Branch",
      pred: node(2, 10),
      consequent: node(2, 11),
      alternative: node(2, 12),
    });
    expect(procedureModel.reflect(read("(Sequence (^10 ^1^11))"), d)).toEqual({
      tag: "Sequence",
      body: [node(2, 10), node(1, 11)],
    });
    expect(procedureModel.reflect(read("(Abstraction (^10) ^11)"), d)).toEqual({
      tag: "Abstraction",
      params: [node(2, 10)],
      body: node(2, 11),
    });
  });

  it("rejects wrong arity", () => {
    expect(() => procedureModel.reflect(read("(Branch ^10 ^11)"), d)).toThrow(LangError);
  });
});

describe("symNodeTableModel", () => {
  it("reflects what it reifies", () => {
    const table = new SymNodeTable([["b", node(1, 12)], ["a", node(2, 10)]]);
    const s = symNodeTableModel.reify(table, new Reifier());
    const back = symNodeTableModel.reflect(s, new Reflector());
    expect(back.entries()).toEqual([["a", node(2, 10)], ["b", node(1, 12)]]);
  });

  it("keeps entries as dotted pairs", () => {
    const s = symNodeTableModel.reify(new SymNodeTable([["a", node(2, 10)]]), new Reifier());
    expect(s).toEqual(list([sym("SymNodeTable"), cons(sym("a"), nodeSexp(node(2, 10)))]));
  });
});
