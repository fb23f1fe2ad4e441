// src/index.ts
// Nodal - Public API
//
// Persistent triple-store environments, the agent that walks them, and the
// interpreters that lower s-expressions into stored meanings.

// ═══════════════════════════════════════════════════════════════════════════════
// S-EXPRESSIONS & READER
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./core/sexp";
export * from "./core/reader";

// ═══════════════════════════════════════════════════════════════════════════════
// ENVIRONMENTS
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./core/env";
export * from "./core/serde";

// ═══════════════════════════════════════════════════════════════════════════════
// AGENT & INTERPRETERS
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./core/agent";
export * from "./core/interp";
export { generateBuiltinMap } from "./core/builtins";

// ═══════════════════════════════════════════════════════════════════════════════
// PERSISTENCE
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./core/manager";
export * from "./core/repl";

// ═══════════════════════════════════════════════════════════════════════════════
// AMBIENT
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./core/error";
export * from "./core/log";
export * from "./core/config";
