// src/core/orchestration/subtaskController.ts
// Depth- and cycle-bounded task invocation.

import type { Logger } from "pino";
import type { Outcome } from "../../outcome";
import { done, isFail, taskFailure, wrapFailure, fail } from "../../outcome";
import { silentLogger } from "../../adapters/logging";
import type { Handler } from "../../ports/handler";
import type { EvalContext } from "../eval/context";
import type { TaskDispatcher } from "../eval/evaluator";
import type { AtomicTaskExecutor } from "../tasks/atomicExecutor";
import type { ContextAssembler } from "../tasks/contextAssembler";
import { callKey } from "../tasks/hash";
import type { TemplateRegistry } from "../tasks/registry";
import {
  DEFAULT_MAX_DEPTH,
  SubtaskRequestSchema,
  type ContextManagement,
  type SubtaskRequest,
  type TaskResult,
  type TaskTemplate,
} from "../tasks/types";
import { executeTool } from "../tools/registry";

/** Runs `director_evaluator_loop` templates on behalf of the controller. */
export interface LoopRunner {
  run(
    template: TaskTemplate,
    inputs: Record<string, unknown>,
    contextManagement: ContextManagement,
    ctx: EvalContext
  ): Promise<Outcome<TaskResult>>;
}

/** A request may tighten the bound it inherits but never loosen it. */
function boundDepth(requested: number | undefined, inherited: number | undefined): number | undefined {
  if (requested === undefined) return inherited;
  return inherited === undefined ? requested : Math.min(requested, inherited);
}

export interface SubtaskControllerOptions {
  registry: TemplateRegistry;
  assembler: ContextAssembler;
  executor: AtomicTaskExecutor;
  handler: Handler;
  /** Used when a request carries no `max_depth`. */
  defaultMaxDepth?: number;
  logger?: Logger;
}

export class SubtaskController implements TaskDispatcher {
  private readonly registry: TemplateRegistry;
  private readonly assembler: ContextAssembler;
  private readonly executor: AtomicTaskExecutor;
  private readonly handler: Handler;
  private readonly defaultMaxDepth: number;
  private readonly logger: Logger;
  private loop?: LoopRunner;

  constructor(opts: SubtaskControllerOptions) {
    this.registry = opts.registry;
    this.assembler = opts.assembler;
    this.executor = opts.executor;
    this.handler = opts.handler;
    this.defaultMaxDepth = opts.defaultMaxDepth ?? DEFAULT_MAX_DEPTH;
    this.logger = opts.logger ?? silentLogger();
  }

  attachLoopRunner(loop: LoopRunner): void {
    this.loop = loop;
  }

  /**
   * Guards run in order (shape, halt, depth, cycle) and all of them fire
   * before any external call is made.
   */
  async spawn(request: unknown, ctx: EvalContext): Promise<Outcome<TaskResult>> {
    const shape = SubtaskRequestSchema.safeParse(request);
    if (!shape.success) {
      return taskFailure("input_validation_failure", `Malformed subtask request: ${shape.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ")}`, {
        details: { subtaskRequest: request },
      });
    }
    const req = shape.data;

    if (ctx.halt.isHalted) {
      return taskFailure("execution_halted", `Not starting ${req.name}: ${ctx.halt.haltReason ?? "halted"}`, {
        details: { subtaskRequest: req },
      });
    }

    const declared = boundDepth(req.max_depth, ctx.maxDepth);
    const maxDepth = declared ?? this.defaultMaxDepth;
    const depth = ctx.depth + 1;
    if (depth > maxDepth) {
      this.logger.warn({ task: req.name, depth, maxDepth }, "subtask depth limit reached");
      return taskFailure("subtask_failure", `Maximum subtask depth ${maxDepth} exceeded by ${req.name}`, {
        details: { code: "DEPTH", subtaskRequest: req, nestingDepth: depth, maxDepth },
      });
    }

    const key = callKey(req.name, req.inputs);
    if (ctx.chain.includes(key)) {
      this.logger.warn({ task: req.name, depth }, "subtask cycle detected");
      return taskFailure("subtask_failure", `Cycle detected: ${req.name} is already running with the same inputs`, {
        details: { code: "CYCLE", subtaskRequest: req, nestingDepth: depth },
      });
    }

    const template = this.registry.find(req.name);
    if (!template) {
      const tool = this.handler.findDirectTool(req.name);
      if (tool) return executeTool(req.name, tool, { args: [], named: req.inputs });
      return taskFailure("template_not_found", `No template or tool named ${req.name}`, {
        details: { subtaskRequest: req },
      });
    }

    const inputs = this.checkInputs(template, req);
    if (isFail(inputs)) return inputs;

    const cm = this.assembler.resolve(template.type, template.contextManagement, req.context_management);
    if (isFail(cm)) return cm;

    const child: EvalContext = {
      depth,
      maxDepth: declared,
      chain: [...ctx.chain, key],
      segments: ctx.segments,
      history: [],
      halt: ctx.halt,
    };

    this.logger.debug({ task: req.name, type: template.type, depth }, "spawning task");
    const result = template.type === "director_evaluator_loop"
      ? await this.runLoop(template, inputs.value, cm.value, child)
      : await this.runAtomic(template, inputs.value, cm.value, req, ctx, child);
    if (isFail(result)) return result;

    ctx.history.push({
      task: req.name,
      status: result.value.status,
      content: result.value.content,
      notes: result.value.notes,
    });
    return result;
  }

  private checkInputs(template: TaskTemplate, req: SubtaskRequest): Outcome<Record<string, unknown>> {
    const missing = template.params.filter((p) => !Object.prototype.hasOwnProperty.call(req.inputs, p));
    const extra = Object.keys(req.inputs).filter((k) => !template.params.includes(k));
    if (missing.length > 0 || extra.length > 0) {
      const parts = [
        missing.length > 0 ? `missing ${missing.join(", ")}` : "",
        extra.length > 0 ? `unexpected ${extra.join(", ")}` : "",
      ].filter(Boolean);
      return taskFailure("input_validation_failure", `${template.name}: ${parts.join("; ")}`, {
        details: { code: "PARAMETER", missing, extra },
      });
    }
    return done(req.inputs);
  }

  private async runLoop(
    template: TaskTemplate,
    inputs: Record<string, unknown>,
    cm: ContextManagement,
    child: EvalContext
  ): Promise<Outcome<TaskResult>> {
    if (!this.loop) {
      return taskFailure("unexpected_error", `No loop controller attached; cannot run ${template.name}`);
    }
    return this.loop.run(template, inputs, cm, child);
  }

  private async runAtomic(
    template: TaskTemplate,
    inputs: Record<string, unknown>,
    cm: ContextManagement,
    req: SubtaskRequest,
    parent: EvalContext,
    child: EvalContext
  ): Promise<Outcome<TaskResult>> {
    const assembled = await this.assembler.assemble({
      template,
      contextManagement: cm,
      inputs,
      filePaths: req.file_paths,
      parentSegments: parent.segments,
      history: parent.history,
    });
    if (isFail(assembled)) return assembled;

    const result = await this.executor.execute(template, inputs, this.handler, {
      context: assembled.value.text,
      filePaths: req.file_paths,
      contextNotes: assembled.value.notes,
    });
    if (isFail(result)) return result;

    const next = result.value.status === "CONTINUATION" ? result.value.notes.subtaskRequest : undefined;
    if (next === undefined) return result;

    // the handler asked for a subtask; its result stands in for this one
    const nested = await this.spawn(next, { ...child, segments: assembled.value.segments });
    if (isFail(nested)) {
      return fail(
        wrapFailure(nested.failure, `Subtask requested by ${template.name} failed: ${nested.failure.message}`, {
          subtaskRequest: next,
          nestingDepth: child.depth + 1,
        }),
        nested.meta
      );
    }
    return done({
      ...nested.value,
      notes: { ...nested.value.notes, parentTask: template.name },
    });
  }
}
