// test/helpers/errors.ts

import { isFail, type Outcome, type TaskError } from "../../src/outcome";

export function failureOf<A>(o: Outcome<A>): TaskError {
  if (!isFail(o)) throw new Error("expected a failure");
  return o.failure;
}

/** Follow `details.subtaskError` to the failure that started the chain. */
export function innermost(e: TaskError): TaskError {
  const next = e.type === "TASK_FAILURE" ? e.details?.subtaskError : undefined;
  return next === undefined ? e : innermost(next);
}

export function reasonOf(e: TaskError): string | undefined {
  return e.type === "TASK_FAILURE" ? e.reason : undefined;
}

export function detailsOf(e: TaskError): Record<string, unknown> {
  return e.type === "TASK_FAILURE" || e.type === "RESOURCE_EXHAUSTION" ? { ...e.details } : {};
}
