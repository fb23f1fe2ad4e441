// src/core/sexp/number.ts
// Integer and floating-point numbers: parsing, printing, arithmetic

export type LangNumber =
  | { tag: "Int"; n: number }
  | { tag: "Float"; n: number };

export type ArithOp = "+" | "-" | "*" | "/";

const INT_RE = /^[+-]?\d+$/;
const FLOAT_RE = /^[+-]?(\d+\.\d*|\.\d+|\d+)([eE][+-]?\d+)?$/;

/**
 * Parse a token as a number, or return null if it is not numeric. Integer
 * literals that cannot be held exactly, and float literals that overflow,
 * raise NumberError.
 */
export function parseNumber(text: string): LangNumber | null {
  if (INT_RE.test(text)) {
    const n = Number(text);
    if (!Number.isSafeInteger(n)) throw new NumberError(`Integer literal out of range: ${text}`);
    return { tag: "Int", n: n + 0 };
  }
  if (FLOAT_RE.test(text)) {
    const n = Number(text);
    if (!Number.isFinite(n)) throw new NumberError(`Float literal out of range: ${text}`);
    return { tag: "Float", n };
  }
  return null;
}

export function formatNumber(num: LangNumber): string {
  if (num.tag === "Int") return String(num.n);
  if (Object.is(num.n, -0)) return "-0.0";
  return Number.isInteger(num.n) && Math.abs(num.n) < 1e21 ? num.n.toFixed(1) : String(num.n);
}

export class NumberError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "NumberError";
  }
}

/**
 * Apply a binary operator. Both operands must be of the same kind; integer
 * division truncates toward zero.
 */
export function arith(op: ArithOp, a: LangNumber, b: LangNumber): LangNumber {
  if (a.tag !== b.tag) {
    throw new NumberError(`Mismatched number kinds: ${a.tag} ${op} ${b.tag}`);
  }
  if (op === "/" && b.n === 0) {
    throw new NumberError("Division by zero");
  }
  const n = apply(op, a.n, b.n, a.tag === "Int");
  if (a.tag === "Int") {
    if (!Number.isSafeInteger(n)) throw new NumberError(`Integer overflow: ${a.n} ${op} ${b.n}`);
    return { tag: "Int", n: n + 0 };
  }
  if (!Number.isFinite(n)) {
    throw new NumberError(`Float overflow: ${formatNumber(a)} ${op} ${formatNumber(b)}`);
  }
  return { tag: "Float", n };
}

function apply(op: ArithOp, x: number, y: number, integral: boolean): number {
  switch (op) {
    case "+": return x + y;
    case "-": return x - y;
    case "*": return x * y;
    case "/": return integral ? Math.trunc(x / y) : x / y;
  }
}
