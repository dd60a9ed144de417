// src/core/eval/env.ts
// Lexical environment frames.

import type { Outcome } from "../../outcome";
import { done, notFound } from "../../outcome";
import type { Value } from "./values";

/**
 * A frame of bindings with an optional parent. Closures keep a reference to
 * the frame they were created in; frames are ordinary objects and are
 * reclaimed by the garbage collector once nothing reaches them.
 */
export class Environment {
  private readonly frame = new Map<string, Value>();

  constructor(readonly parent?: Environment) {}

  /** Bind in this frame only; outer frames are never touched. */
  define(name: string, value: Value): void {
    this.frame.set(name, value);
  }

  lookup(name: string): Outcome<Value> {
    const v = this.tryLookup(name);
    return v === undefined ? notFound(name) : done(v);
  }

  tryLookup(name: string): Value | undefined {
    for (let env: Environment | undefined = this; env; env = env.parent) {
      const v = env.frame.get(name);
      if (v !== undefined) return v;
    }
    return undefined;
  }

  has(name: string): boolean {
    return this.tryLookup(name) !== undefined;
  }

  hasOwn(name: string): boolean {
    return this.frame.has(name);
  }

  extend(bindings: Iterable<[string, Value]> = []): Environment {
    const child = new Environment(this);
    for (const [k, v] of bindings) child.define(k, v);
    return child;
  }

  /** Names bound in this frame. */
  names(): string[] {
    return Array.from(this.frame.keys());
  }
}
