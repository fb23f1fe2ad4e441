// src/core/reader/stream.ts
// Pull-based stream transforms and line sources

import * as fs from "fs";
import { ioError } from "../error/errors";

/**
 * A stage of a pipeline. Items are pushed in with `input`, which reports whether
 * output is ready; ready values are taken with `output`. `finish` is called once
 * after the last input and may raise errors about unfinished state.
 */
export interface Transform<I, O> {
  input(item: I): boolean;
  output(): O | undefined;
  finish?(): void;
}

export type Strategy = "lazy" | "eager";

/**
 * Iterates a transform's outputs while pulling from `source`. Lazy streams pull
 * only as far as needed for the next output; eager streams drain the source on
 * construction.
 */
export class TransformStream<I, O> implements IterableIterator<O> {
  private readonly source: Iterator<I>;
  private readonly buffer: O[] = [];
  private done = false;

  constructor(
    source: Iterable<I>,
    private readonly transform: Transform<I, O>,
    readonly strategy: Strategy = "lazy",
  ) {
    this.source = source[Symbol.iterator]();
    if (strategy === "eager") {
      while (this.pull()) {
        // drain
      }
    }
  }

  [Symbol.iterator](): IterableIterator<O> {
    return this;
  }

  next(): IteratorResult<O> {
    for (;;) {
      const ready = this.buffer.shift();
      if (ready !== undefined) return { done: false, value: ready };
      if (!this.pull()) return { done: true, value: undefined };
    }
  }

  /** Feed one more input (or finish); returns false once the source is exhausted. */
  private pull(): boolean {
    if (this.done) return false;
    const item = this.source.next();
    if (item.done) {
      this.done = true;
      this.transform.finish?.();
      this.drain();
      return this.buffer.length > 0;
    }
    if (this.transform.input(item.value)) this.drain();
    return true;
  }

  private drain(): void {
    for (let out = this.transform.output(); out !== undefined; out = this.transform.output()) {
      this.buffer.push(out);
    }
  }
}

export function pipe<I, O>(source: Iterable<I>, transform: Transform<I, O>, strategy: Strategy = "lazy"): TransformStream<I, O> {
  return new TransformStream(source, transform, strategy);
}

// =========================================================================
// Sources
// =========================================================================

export function* stringLines(text: string): Generator<string> {
  if (text.length === 0) return;
  for (const line of text.split(/\r?\n/)) yield line;
}

/** Lines of a file, read synchronously. */
export function fileLines(filePath: string): Generator<string> {
  let content: string;
  try {
    content = fs.readFileSync(filePath, "utf8");
  } catch (e) {
    throw ioError(filePath, e);
  }
  return stringLines(content);
}
