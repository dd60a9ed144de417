// src/index.ts
// Public API

// ═══════════════════════════════════════════════════════════════════════════════
// RUNTIME
// ═══════════════════════════════════════════════════════════════════════════════

export { TaskRuntime, createRuntime, toTaskResult, errorNote, type RuntimeOptions } from "./runtime";

// ═══════════════════════════════════════════════════════════════════════════════
// OUTCOMES & ERRORS
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./outcome";

// ═══════════════════════════════════════════════════════════════════════════════
// PORTS (handler, retrieval, scripts)
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./ports";
export { createLogger, silentLogger, moduleLogger, type Logger, type LoggerConfig, type LogLevel } from "./adapters/logging";

// ═══════════════════════════════════════════════════════════════════════════════
// LANGUAGE
// ═══════════════════════════════════════════════════════════════════════════════

export { parse } from "./core/reader/parse";
export type { Node } from "./core/reader/ast";
export { Environment } from "./core/eval/env";
export { Evaluator, type TaskDispatcher, type EvaluatorOptions } from "./core/eval/evaluator";
export { makeBaseEnv } from "./core/eval/prims";
export { HaltSignal, rootContext, type EvalContext } from "./core/eval/context";
export {
  display,
  show,
  toPlain,
  fromPlain,
  isTruthy,
  type Value,
  type Closure,
  type RecordVal,
  type ResultVal,
} from "./core/eval/values";

// ═══════════════════════════════════════════════════════════════════════════════
// TASKS
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./core/tasks/types";
export { TemplateRegistry, validateTemplate } from "./core/tasks/registry";
export { AtomicTaskExecutor, type ExecuteOptions } from "./core/tasks/atomicExecutor";
export {
  ContextAssembler,
  OPERATOR_DEFAULTS,
  resolveContextManagement,
  type ContextSegment,
  type StepRecord,
} from "./core/tasks/contextAssembler";
export { substitute } from "./core/tasks/substitute";
export { ToolRegistry, executeTool, type DirectTool, type ToolCall, type SubtaskToolSpec } from "./core/tools/registry";

// ═══════════════════════════════════════════════════════════════════════════════
// ORCHESTRATION & GOVERNANCE
// ═══════════════════════════════════════════════════════════════════════════════

export { SubtaskController, type LoopRunner } from "./core/orchestration/subtaskController";
export { LoopController, type TerminationReason } from "./core/orchestration/loopController";
export { ResourceTracker, DEFAULT_RESOURCE_LIMITS, estimateTokens, type ResourceWarning } from "./core/governance/resourceTracker";
export type { ResourceMetrics, ResourceLimits, ResourceName } from "./core/governance/metrics";

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

export {
  loadConfig,
  mergeConfigs,
  validateConfig,
  configFromEnv,
  configFromFile,
  ConfigError,
  DEFAULT_CONFIG,
  type TaskweaveConfig,
  type PartialConfig,
} from "./core/config/config";
