// src/core/serde/model.ts
// Paired reify/reflect for a host type

import type { Sexp } from "../sexp/sexp";
import type { Reflector } from "./reflect";
import type { Reifier } from "./reify";

export interface Model<T> {
  reify(value: T, r: Reifier): Sexp;
  reflect(s: Sexp, d: Reflector): T;
}
