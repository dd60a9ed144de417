// src/outcome/outcome.ts
// Result type returned by every fallible operation in the core.

import type { TaskError } from "./failure";

export interface OutcomeMeta {
  durationMs?: number;
  /** Call-site offset in the source text, when known. */
  offset?: number;
}

export interface Done<A> {
  readonly tag: "Done";
  readonly value: A;
  readonly meta: OutcomeMeta;
}

export interface Fail {
  readonly tag: "Fail";
  readonly failure: TaskError;
  readonly meta: OutcomeMeta;
}

export type Outcome<A> = Done<A> | Fail;

export function isDone<A>(o: Outcome<A>): o is Done<A> {
  return o.tag === "Done";
}

export function isFail<A>(o: Outcome<A>): o is Fail {
  return o.tag === "Fail";
}
