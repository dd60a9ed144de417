// src/outcome/failure.ts
// Error taxonomy shared by the evaluator, executors and controllers.

import type { ResourceMetrics, ResourceName } from "../core/governance/metrics";

export type FailureReason =
  | "context_retrieval_failure"
  | "context_matching_failure"
  | "xml_validation_failure"
  | "output_format_failure"
  | "execution_timeout"
  | "execution_halted"
  | "subtask_failure"
  | "input_validation_failure"
  | "template_not_found"
  | "tool_execution_error"
  | "llm_error"
  | "unexpected_error";

/** Structural error codes raised by the evaluator and the spawning controller. */
export type ErrorCode =
  | "SYNTAX"
  | "NOT_FOUND"
  | "ARITY"
  | "PARAMETER"
  | "NOT_CALLABLE"
  | "TYPE"
  | "CYCLE"
  | "DEPTH";

export interface FailureDetails {
  code?: ErrorCode;
  offset?: number;
  failingIndex?: number;
  subtaskRequest?: unknown;
  subtaskError?: TaskError;
  nestingDepth?: number;
  iteration?: number;
  step?: string;
  cause?: TaskError;
  [key: string]: unknown;
}

interface ErrorBase {
  message: string;
  /** Partial output produced before the failure. */
  content?: string;
}

export interface ResourceExhaustion extends ErrorBase {
  type: "RESOURCE_EXHAUSTION";
  resource: ResourceName;
  metrics: ResourceMetrics;
  details?: FailureDetails;
}

export interface TaskFailure extends ErrorBase {
  type: "TASK_FAILURE";
  reason: FailureReason;
  details?: FailureDetails;
}

export interface InvalidOutput extends ErrorBase {
  type: "INVALID_OUTPUT";
  violations: string[];
}

export interface ValidationError extends ErrorBase {
  type: "VALIDATION_ERROR";
  path?: string;
}

export type TaskError = ResourceExhaustion | TaskFailure | InvalidOutput | ValidationError;

export function isTaskFailure(e: TaskError, reason?: FailureReason): e is TaskFailure {
  return e.type === "TASK_FAILURE" && (reason === undefined || e.reason === reason);
}

export function errorCode(e: TaskError): ErrorCode | undefined {
  if (e.type === "TASK_FAILURE" || e.type === "RESOURCE_EXHAUSTION") {
    return e.details?.code;
  }
  return undefined;
}

/**
 * Wrap a child's failure as a subtask failure of the caller. Resource
 * exhaustion passes through unchanged so callers can still see which limit
 * was hit.
 */
export function wrapFailure(
  inner: TaskError,
  message: string,
  details: FailureDetails = {}
): TaskError {
  if (inner.type === "RESOURCE_EXHAUSTION") {
    return { ...inner, details: { ...inner.details, ...details } };
  }
  return {
    type: "TASK_FAILURE",
    reason: "subtask_failure",
    message,
    content: inner.content,
    details: { ...details, subtaskError: inner },
  };
}

export function describeError(e: TaskError): string {
  switch (e.type) {
    case "RESOURCE_EXHAUSTION":
      return `RESOURCE_EXHAUSTION(${e.resource}): ${e.message}`;
    case "TASK_FAILURE":
      return `TASK_FAILURE(${e.reason}): ${e.message}`;
    case "INVALID_OUTPUT":
      return `INVALID_OUTPUT: ${e.message}`;
    case "VALIDATION_ERROR":
      return `VALIDATION_ERROR${e.path ? `(${e.path})` : ""}: ${e.message}`;
  }
}
