// src/outcome/constructors.ts

import type { Done, Fail, OutcomeMeta } from "./outcome";
import type { ErrorCode, FailureDetails, FailureReason, TaskError } from "./failure";
import type { ResourceMetrics, ResourceName } from "../core/governance/metrics";

export function done<A>(value: A, meta: OutcomeMeta = {}): Done<A> {
  return { tag: "Done", value, meta };
}

export const ok = done;

export function fail(f: TaskError, meta: OutcomeMeta = {}): Fail {
  return { tag: "Fail", failure: f, meta };
}

export function taskFailure(
  reason: FailureReason,
  message: string,
  opts: { details?: FailureDetails; content?: string } = {},
  meta: OutcomeMeta = {}
): Fail {
  return fail({ type: "TASK_FAILURE", reason, message, details: opts.details, content: opts.content }, meta);
}

/** Structural evaluator error: aborts the current branch as a task failure. */
export function structural(
  code: ErrorCode,
  message: string,
  details: FailureDetails = {},
  reason: FailureReason = "unexpected_error"
): Fail {
  return taskFailure(reason, message, { details: { ...details, code } });
}

export function notFound(name: string): Fail {
  return structural("NOT_FOUND", `Unbound symbol: ${name}`, { symbol: name });
}

export function arityError(name: string, expected: number | string, got: number): Fail {
  return structural("ARITY", `${name}: expected ${expected} argument(s), got ${got}`, {
    expected,
    got,
  });
}

export function typeError(message: string, details: FailureDetails = {}): Fail {
  return structural("TYPE", message, details);
}

export function parameterError(message: string, details: FailureDetails = {}): Fail {
  return structural("PARAMETER", message, details, "input_validation_failure");
}

export function syntaxError(message: string, offset: number): Fail {
  return structural("SYNTAX", message, { offset }, "input_validation_failure");
}

export function resourceExhausted(
  resource: ResourceName,
  metrics: ResourceMetrics,
  message = `Resource limit reached: ${resource}`
): Fail {
  return fail({ type: "RESOURCE_EXHAUSTION", resource, metrics, message });
}

export function invalidOutput(message: string, violations: string[], content?: string): Fail {
  return fail({ type: "INVALID_OUTPUT", message, violations, content });
}

export function validationError(message: string, path?: string): Fail {
  return fail({ type: "VALIDATION_ERROR", message, path });
}
