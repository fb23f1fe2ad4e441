// src/core/serde/header.ts
// Env file header: version, counts, and preserved unknown fields

import { isCons, isNil, type Sexp } from "../sexp/sexp";
import { getLogger } from "../log/logger";
import type { Model } from "./model";
import { ENV_FORMAT_VERSION, versionModel, type Version } from "./version";

const log = getLogger("serde:header");

export type EnvHeader = {
  version: Version;
  nodeCount: number;
  tripleCount: number;
  /** Fields this version does not interpret, kept for the next save. */
  extra: Array<[string, Sexp]>;
};

export function newHeader(nodeCount: number, tripleCount: number, extra: Array<[string, Sexp]> = []): EnvHeader {
  return { version: ENV_FORMAT_VERSION, nodeCount, tripleCount, extra };
}

/** Accept both `(key . value)` and `(key value)`. */
function fieldValue(v: Sexp): Sexp {
  if (isCons(v) && v.car !== null && isNil(v.cdr)) return v.car;
  return v;
}

export const envHeaderModel: Model<EnvHeader> = {
  reify(header, r) {
    return r.struct("header", [
      ["version", versionModel.reify(header.version, r)],
      ["node-count", r.int(header.nodeCount)],
      ["triple-count", r.int(header.tripleCount)],
      ...header.extra,
    ]);
  },

  reflect(s, d) {
    const fields = d.struct(s, "header");
    const version = versionModel.reflect(fieldValue(fields.required("version")), d);
    const nodeCount = d.int(fieldValue(fields.required("node-count")));
    const tripleCount = d.int(fieldValue(fields.required("triple-count")));
    const extra = fields.rest();
    for (const [key] of extra) {
      log.warn(`Unrecognized header field "${key}" preserved`);
    }
    if (version.major !== ENV_FORMAT_VERSION.major) {
      log.warn(`Env file version ${version.major}.${version.minor}.${version.patch} differs from supported major ${ENV_FORMAT_VERSION.major}`);
    }
    return { version, nodeCount, tripleCount, extra };
  },
};
