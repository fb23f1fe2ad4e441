// src/core/agent/frames.ts
// Agent stacks: env position frames and execution frames

import { nodeKey, type Node } from "../env/localNode";
import type { Sexp } from "../sexp/sexp";

/**
 * Stack with a base frame that can never be popped.
 */
export class Continuation<T> {
  private readonly frames: T[];

  constructor(base: T) {
    this.frames = [base];
  }

  top(): T {
    const t = this.frames[this.frames.length - 1];
    if (t === undefined) throw new Error("Continuation: empty stack");
    return t;
  }

  push(frame: T): void {
    this.frames.push(frame);
  }

  pop(): T {
    if (this.frames.length <= 1) {
      throw new Error("Continuation: cannot pop base frame");
    }
    const t = this.frames.pop();
    if (t === undefined) throw new Error("Continuation: empty stack");
    return t;
  }

  get depth(): number {
    return this.frames.length;
  }

  /** Frames from newest to oldest. */
  *iter(): Generator<T> {
    for (let i = this.frames.length - 1; i >= 0; i--) {
      const f = this.frames[i];
      if (f !== undefined) yield f;
    }
  }
}

export type EnvFrame = { pos: Node };

/**
 * One execution frame: the node whose meaning is running plus the values
 * bound while running it.
 */
export class ExecFrame {
  private readonly map = new Map<string, readonly [Node, Sexp]>();

  constructor(readonly context: Node) {}

  lookup(n: Node): Sexp | undefined {
    return this.map.get(nodeKey(n))?.[1];
  }

  /** Bind `n`; returns false if it is already bound in this frame. */
  insert(n: Node, value: Sexp): boolean {
    const key = nodeKey(n);
    if (this.map.has(key)) return false;
    this.map.set(key, [n, value]);
    return true;
  }

  entries(): Array<readonly [Node, Sexp]> {
    return [...this.map.values()];
  }

  clone(): ExecFrame {
    const copy = new ExecFrame(this.context);
    for (const [n, v] of this.map.values()) copy.insert(n, v);
    return copy;
  }
}

/** Frames from newest to oldest, as captured when an error is raised. */
export type ExecSnapshot = readonly ExecFrame[];
