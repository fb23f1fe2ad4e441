// src/core/error/errors.ts
// Error taxonomy and the LangError carrier

import type { ExecSnapshot } from "../agent/frames";
import { Reifier } from "../serde/reify";
import { sexpToString, type Sexp } from "../sexp/sexp";

// =========================================================================
// Kinds
// =========================================================================

export type ExpectedCount =
  | { tag: "Exactly"; n: number }
  | { tag: "AtLeast"; n: number }
  | { tag: "AtMost"; n: number };

export function exactly(n: number): ExpectedCount { return { tag: "Exactly", n }; }
export function atLeast(n: number): ExpectedCount { return { tag: "AtLeast", n }; }
export function atMost(n: number): ExpectedCount { return { tag: "AtMost", n }; }

export function formatExpectedCount(c: ExpectedCount): string {
  return c.tag === "Exactly" ? String(c.n) : `${c.tag} ${c.n}`;
}

export type LangErrorKind =
  | { tag: "InvalidArgument"; given: Sexp; expected: string }
  | { tag: "InvalidState"; actual: string; expected: string }
  | { tag: "InvalidSexp"; sexp: Sexp }
  | { tag: "WrongArgumentCount"; given: number; expected: ExpectedCount }
  | { tag: "UnboundSymbol"; symbol: string }
  | { tag: "AlreadyBoundSymbol"; symbol: string }
  | { tag: "DuplicateTriple"; triple: Sexp }
  | { tag: "RejectedTriple"; triple: Sexp; reason: Sexp }
  | { tag: "Unsupported"; message: string };

export type ParseErrorReason =
  | "DepthOverflow"
  | "UnmatchedOpen"
  | "UnmatchedClose"
  | "IsolatedPeriod"
  | "NotPenultimatePeriod"
  | "TrailingQuote";

export type TokenizeErrorReason = "InvalidSymbol" | "InvalidNumber" | "UnterminatedString";

export type DeserializeErrorReason =
  | "MissingHeaderSection"
  | "MissingNodeSection"
  | "MissingTripleSection"
  | "MissingDesignationSection"
  | "ExtraneousSection"
  | "UnexpectedCommand"
  | "ExpectedSymbol"
  | "UnrecognizedBuiltIn"
  | "InvalidNodeEntry"
  | "ExtraneousData"
  | "MissingData"
  | "TypeMismatch";

export type ErrorKind =
  | LangErrorKind
  | { tag: "ParseError"; reason: ParseErrorReason; line: number; token: string }
  | { tag: "TokenizeError"; reason: TokenizeErrorReason; line: number; text: string }
  | { tag: "DeserializeError"; reason: DeserializeErrorReason; detail: Sexp | null; message: string }
  | { tag: "IoError"; path: string; message: string };

export type ErrorTag = ErrorKind["tag"];

// =========================================================================
// Descriptions
// =========================================================================

export function describeKind(kind: ErrorKind): string {
  switch (kind.tag) {
    case "InvalidArgument":
      return `Invalid argument: given ${sexpToString(kind.given)}, expected ${kind.expected}`;
    case "InvalidState":
      return `Invalid state: ${kind.actual}, expected ${kind.expected}`;
    case "InvalidSexp":
      return `Invalid sexp: ${sexpToString(kind.sexp)}`;
    case "WrongArgumentCount":
      return `Wrong argument count: given ${kind.given}, expected ${formatExpectedCount(kind.expected)}`;
    case "UnboundSymbol":
      return `Unbound symbol: ${kind.symbol}`;
    case "AlreadyBoundSymbol":
      return `Already bound symbol: ${kind.symbol}`;
    case "DuplicateTriple":
      return `Duplicate triple: ${sexpToString(kind.triple)}`;
    case "RejectedTriple":
      return `Rejected triple: ${sexpToString(kind.triple)} (handler returned ${sexpToString(kind.reason)})`;
    case "Unsupported":
      return `Unsupported: ${kind.message}`;
    case "ParseError":
      return `Parse error (${kind.reason}) at line ${kind.line}: ${kind.token}`;
    case "TokenizeError":
      return `Tokenize error (${kind.reason}) at line ${kind.line}: ${kind.text}`;
    case "DeserializeError":
      return `Deserialize error (${kind.reason}): ${kind.message}`;
    case "IoError":
      return `I/O error on ${kind.path}: ${kind.message}`;
  }
}

// =========================================================================
// LangError
// =========================================================================

/**
 * The single error type raised by the engine. `state` holds the execution
 * stack at the failure point when the raiser had an agent at hand.
 */
export class LangError extends Error {
  readonly kind: ErrorKind;
  private snapshot: ExecSnapshot | null;

  constructor(kind: ErrorKind, state: ExecSnapshot | null = null) {
    super(describeKind(kind));
    this.name = "LangError";
    this.kind = kind;
    this.snapshot = state;
  }

  get state(): ExecSnapshot | null {
    return this.snapshot;
  }

  /** Attach a snapshot unless one is already present. */
  withState(state: ExecSnapshot): this {
    if (this.snapshot === null) this.snapshot = state;
    return this;
  }

  /** `(Kind (field . value) ...)` */
  reify(): Sexp {
    return reifyKind(this.kind, new Reifier());
  }
}

export function isLangError(e: unknown): e is LangError {
  return e instanceof LangError;
}

export function reifyKind(kind: ErrorKind, r: Reifier): Sexp {
  switch (kind.tag) {
    case "InvalidArgument":
      return r.struct(kind.tag, [["given", kind.given], ["expected", r.str(kind.expected)]]);
    case "InvalidState":
      return r.struct(kind.tag, [["actual", r.str(kind.actual)], ["expected", r.str(kind.expected)]]);
    case "InvalidSexp":
      return r.struct(kind.tag, [["sexp", kind.sexp]]);
    case "WrongArgumentCount":
      return r.struct(kind.tag, [
        ["given", r.int(kind.given)],
        ["expected", r.str(formatExpectedCount(kind.expected))],
      ]);
    case "UnboundSymbol":
    case "AlreadyBoundSymbol":
      return r.struct(kind.tag, [["symbol", r.symbol(kind.symbol)]]);
    case "DuplicateTriple":
      return r.struct(kind.tag, [["triple", kind.triple]]);
    case "RejectedTriple":
      return r.struct(kind.tag, [["triple", kind.triple], ["reason", kind.reason]]);
    case "Unsupported":
      return r.struct(kind.tag, [["message", r.str(kind.message)]]);
    case "ParseError":
      return r.struct(kind.tag, [
        ["reason", r.unitVariant(kind.reason)],
        ["line", r.int(kind.line)],
        ["token", r.str(kind.token)],
      ]);
    case "TokenizeError":
      return r.struct(kind.tag, [
        ["reason", r.unitVariant(kind.reason)],
        ["line", r.int(kind.line)],
        ["text", r.str(kind.text)],
      ]);
    case "DeserializeError":
      return r.struct(kind.tag, [
        ["reason", r.unitVariant(kind.reason)],
        ["detail", r.option(kind.detail)],
        ["message", r.str(kind.message)],
      ]);
    case "IoError":
      return r.struct(kind.tag, [["path", r.str(kind.path)], ["message", r.str(kind.message)]]);
  }
}

// ----- constructors for stateless raisers -----

export function deserializeError(
  reason: DeserializeErrorReason,
  message: string,
  detail: Sexp | null = null,
): LangError {
  return new LangError({ tag: "DeserializeError", reason, detail, message });
}

export function ioError(path: string, cause: unknown): LangError {
  const message = cause instanceof Error ? cause.message : String(cause);
  return new LangError({ tag: "IoError", path, message });
}
