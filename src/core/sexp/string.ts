// src/core/sexp/string.ts
// String literal escaping

const ESCAPES: Record<string, string> = {
  "\t": "\\t",
  "\r": "\\r",
  "\n": "\\n",
  "\\": "\\\\",
  "\"": "\\\"",
};

export function escapeString(s: string): string {
  return s.replace(/[\t\r\n\\"]/g, (c) => ESCAPES[c] ?? c);
}

/** Decode the character following a backslash. */
export function unescapeChar(c: string): string {
  switch (c) {
    case "t": return "\t";
    case "r": return "\r";
    case "n": return "\n";
    default: return c;
  }
}

export function unescapeString(s: string): string {
  let out = "";
  for (let i = 0; i < s.length; i++) {
    const c = s.charAt(i);
    if (c === "\\" && i + 1 < s.length) {
      out += unescapeChar(s.charAt(i + 1));
      i++;
    } else {
      out += c;
    }
  }
  return out;
}
