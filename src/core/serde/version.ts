// src/core/serde/version.ts
// MAJOR.MINOR.PATCH versions for env file headers

import { deserializeError } from "../error/errors";
import type { Sexp } from "../sexp/sexp";
import type { Model } from "./model";

export type Version = {
  readonly major: number;
  readonly minor: number;
  readonly patch: number;
};

export const ENV_FORMAT_VERSION: Version = { major: 0, minor: 1, patch: 0 };

const VERSION_RE = /^(\d+)\.(\d+)\.(\d+)$/;

export function parseVersion(text: string): Version | null {
  const m = VERSION_RE.exec(text);
  if (!m) return null;
  const [major, minor, patch] = [Number(m[1]), Number(m[2]), Number(m[3])];
  if (![major, minor, patch].every(Number.isSafeInteger)) return null;
  return { major, minor, patch };
}

export function formatVersion(v: Version): string {
  return `${v.major}.${v.minor}.${v.patch}`;
}

export function compareVersions(a: Version, b: Version): number {
  return a.major - b.major || a.minor - b.minor || a.patch - b.patch;
}

export const versionModel: Model<Version> = {
  reify(value, r): Sexp {
    return r.str(formatVersion(value));
  },
  reflect(s, d): Version {
    const text = d.str(s);
    const v = parseVersion(text);
    if (!v) {
      throw deserializeError("TypeMismatch", `invalid version "${text}"`, s);
    }
    return v;
  },
};
