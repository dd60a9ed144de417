// src/runtime.ts
// TaskRuntime - one session of the task language.
//
// Usage:
//   const rt = createRuntime({ handler: myHandler });
//   rt.registerTemplate({ name: "summarize", type: "atomic", instructions: "Summarize {{text}}", params: ["text"] });
//   const result = await rt.run('(summarize "...")');
//   rt.endSession();

import type { Logger } from "pino";
import type { Outcome, TaskError } from "./outcome";
import { isFail, match } from "./outcome";
import {
  createLogger,
  loggingHandler,
  loggingRetrieval,
  loggingScriptRunner,
  moduleLogger,
} from "./adapters/logging";
import type { Handler } from "./ports/handler";
import type { ContextRetrievalPort } from "./ports/retrieval";
import type { ScriptRunnerPort } from "./ports/script";
import { mergeConfigs, type PartialConfig, type TaskweaveConfig } from "./core/config/config";
import { rootContext } from "./core/eval/context";
import type { Environment } from "./core/eval/env";
import { Evaluator } from "./core/eval/evaluator";
import { makeBaseEnv } from "./core/eval/prims";
import { display, isResult, type Value } from "./core/eval/values";
import type { ResourceMetrics } from "./core/governance/metrics";
import { ResourceTracker, type ResourceWarning } from "./core/governance/resourceTracker";
import { LoopController } from "./core/orchestration/loopController";
import { SubtaskController } from "./core/orchestration/subtaskController";
import { AtomicTaskExecutor } from "./core/tasks/atomicExecutor";
import { ContextAssembler, type ContextSegment } from "./core/tasks/contextAssembler";
import { TemplateRegistry } from "./core/tasks/registry";
import type { TaskResult, TaskTemplate } from "./core/tasks/types";
import type { DirectTool } from "./core/tools/registry";

/**
 * Options for TaskRuntime
 */
export type RuntimeOptions = {
  /** LLM handler; also owns the direct and subtask tool tables */
  handler: Handler;

  /** Needed for `get_context` and fresh-context templates */
  retrieval?: ContextRetrievalPort;

  /** Needed for loop templates with a script step */
  script?: ScriptRunnerPort;

  /** Fully resolved configuration (see loadConfig) or a partial one merged over the defaults */
  config?: TaskweaveConfig | PartialConfig;

  /** Defaults to a pino logger built from `config.logging` */
  logger?: Logger;

  onResourceWarning?: (w: ResourceWarning) => void;
};

export class TaskRuntime {
  readonly config: TaskweaveConfig;
  readonly logger: Logger;
  readonly registry: TemplateRegistry;
  readonly tracker: ResourceTracker;
  readonly evaluator: Evaluator;
  readonly controller: SubtaskController;
  readonly handler: Handler;

  /** Top-level definitions persist across evaluate() calls within the session. */
  private sessionEnv: Environment;
  private readonly baseEnv: Environment;

  constructor(opts: RuntimeOptions) {
    this.config = mergeConfigs(opts.config ?? {});
    this.logger = opts.logger ?? createLogger({ level: this.config.logging.level, pretty: this.config.logging.pretty });
    const log = (module: string) => moduleLogger(this.logger, module);

    this.handler = loggingHandler(opts.handler, this.logger);
    const retrieval = opts.retrieval && loggingRetrieval(opts.retrieval, this.logger);
    const script = opts.script && loggingScriptRunner(opts.script, this.logger);

    this.registry = new TemplateRegistry({ logger: log("registry") });
    this.tracker = new ResourceTracker(
      {
        maxTurns: this.config.limits.maxTurns,
        maxContextWindow: this.config.limits.maxContextWindow,
        warningThreshold: this.config.limits.warningThreshold,
      },
      { logger: log("resources"), onWarning: opts.onResourceWarning }
    );
    const assembler = new ContextAssembler({
      retrieval,
      maxAccumulatedChars: this.config.context.maxAccumulatedChars,
      logger: log("context"),
    });
    const executor = new AtomicTaskExecutor({
      tracker: this.tracker,
      defaultModel: this.config.llm.defaultModel,
      logger: log("executor"),
    });

    this.evaluator = new Evaluator({
      registry: this.registry,
      handler: this.handler,
      retrieval,
      mapConcurrency: this.config.map.concurrency,
      logger: log("evaluator"),
    });
    this.controller = new SubtaskController({
      registry: this.registry,
      assembler,
      executor,
      handler: this.handler,
      defaultMaxDepth: this.config.subtasks.maxDepth,
      logger: log("subtasks"),
    });
    this.baseEnv = makeBaseEnv();
    const loop = new LoopController({
      registry: this.registry,
      dispatcher: this.controller,
      evaluator: this.evaluator,
      baseEnv: this.baseEnv,
      script,
      defaultMaxIterations: this.config.loop.maxIterations,
      defaultScriptTimeoutMs: this.config.loop.scriptTimeoutMs,
      logger: log("loop"),
    });
    this.controller.attachLoopRunner(loop);
    this.evaluator.attachDispatcher(this.controller);
    this.sessionEnv = this.baseEnv.extend();
  }

  registerTemplate(template: unknown): Outcome<TaskTemplate> {
    return this.registry.register(template);
  }

  registerDirectTool(name: string, fn: DirectTool): void {
    this.handler.registerDirectTool(name, fn);
  }

  registerSubtaskTool(name: string, hints: string[]): void {
    this.handler.registerSubtaskTool(name, hints);
  }

  /**
   * Evaluate every form in `source`; the value of the last one is returned.
   * `context` seeds the segments that top-level tasks inherit.
   */
  async evaluate(source: string, opts: { context?: ContextSegment[] } = {}): Promise<Outcome<Value>> {
    const ctx = rootContext(opts.context ?? []);
    const r = await this.evaluator.evaluateSource(source, this.sessionEnv, ctx);
    if (isFail(r)) {
      this.logger.warn({ error: r.failure.message, type: r.failure.type }, "evaluation failed");
    }
    return r;
  }

  /** Evaluate and return the wire-shaped result; failures become FAILED results. */
  async run(source: string, opts: { context?: ContextSegment[] } = {}): Promise<TaskResult> {
    return toTaskResult(await this.evaluate(source, opts));
  }

  /** Spawn a task directly from a request, as a handler-driven caller would. */
  async spawn(request: unknown): Promise<Outcome<TaskResult>> {
    return this.controller.spawn(request, rootContext());
  }

  metrics(): ResourceMetrics {
    return this.tracker.metrics();
  }

  /** Tear down the session: counters reset and top-level definitions dropped. */
  endSession(): ResourceMetrics {
    const final = this.tracker.metrics();
    this.logger.info({ metrics: final }, "session ended");
    this.tracker.reset();
    this.sessionEnv = this.baseEnv.extend();
    return final;
  }
}

export function createRuntime(opts: RuntimeOptions): TaskRuntime {
  return new TaskRuntime(opts);
}

/** Error detail for notes, with partial output removed at every level. */
export function errorNote(e: TaskError): Record<string, unknown> {
  const { content: _content, ...rest } = e;
  const note: Record<string, unknown> = { ...rest };
  if ((e.type === "TASK_FAILURE" || e.type === "RESOURCE_EXHAUSTION") && e.details) {
    const details: Record<string, unknown> = { ...e.details };
    if (e.details.subtaskError) details.subtaskError = errorNote(e.details.subtaskError);
    if (e.details.cause) details.cause = errorNote(e.details.cause);
    note.details = details;
  }
  return note;
}

export function toTaskResult(outcome: Outcome<Value>): TaskResult {
  return match<Value, TaskResult>(outcome, {
    done: ({ value }) => (isResult(value) ? value.result : { content: display(value), status: "COMPLETE", notes: {} }),
    fail: ({ failure }) => ({
      content: failure.content ?? "",
      status: "FAILED",
      notes: { error: errorNote(failure) },
    }),
  });
}
