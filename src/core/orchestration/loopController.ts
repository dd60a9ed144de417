// src/core/orchestration/loopController.ts
// Director-Evaluator refinement loop.
//
//   INIT -> DIRECTOR -> [SCRIPT] -> EVALUATOR -> CONTINUE | SUCCESS | MAX_ITER | CONDITION

import type { Logger } from "pino";
import type { Outcome, TaskError } from "../../outcome";
import { done, fail, isFail, taskFailure, wrapFailure, describeError } from "../../outcome";
import { silentLogger } from "../../adapters/logging";
import type { ScriptRunnerPort, ScriptResult } from "../../ports/script";
import type { EvalContext } from "../eval/context";
import type { Environment } from "../eval/env";
import { toInput, type Evaluator, type TaskDispatcher } from "../eval/evaluator";
import { fromPlain, isTruthy, resultVal, type Value } from "../eval/values";
import type { TemplateRegistry } from "../tasks/registry";
import { placeholders, renderInput, substitute } from "../tasks/substitute";
import type { ContextManagement, LoopSpec, TaskResult, TaskTemplate } from "../tasks/types";
import type { LoopRunner } from "./subtaskController";

export const DEFAULT_MAX_ITERATIONS = 5;
export const DEFAULT_SCRIPT_TIMEOUT_MS = 30_000;

export type TerminationReason = "success" | "max_iterations" | "condition";

type LoopStep = "director" | "script" | "evaluator";

export interface LoopControllerOptions {
  registry: TemplateRegistry;
  dispatcher: TaskDispatcher;
  /** Evaluates termination conditions. */
  evaluator: Evaluator;
  /** Parent of every iteration environment. */
  baseEnv: Environment;
  script?: ScriptRunnerPort;
  defaultMaxIterations?: number;
  defaultScriptTimeoutMs?: number;
  logger?: Logger;
}

class StepFailure {
  constructor(
    readonly step: LoopStep,
    readonly error: TaskError,
    /** Director output of the failing iteration, when it got that far. */
    readonly director?: TaskResult
  ) {}
}

export class LoopController implements LoopRunner {
  private readonly opts: LoopControllerOptions;
  private readonly logger: Logger;

  constructor(opts: LoopControllerOptions) {
    this.opts = opts;
    this.logger = opts.logger ?? silentLogger();
  }

  async run(
    template: TaskTemplate,
    inputs: Record<string, unknown>,
    contextManagement: ContextManagement,
    ctx: EvalContext
  ): Promise<Outcome<TaskResult>> {
    const loop = template.loop;
    if (!loop) {
      return taskFailure("input_validation_failure", `${template.name} has no loop spec`);
    }
    const maxIterations = loop.maxIterations ?? this.opts.defaultMaxIterations ?? DEFAULT_MAX_ITERATIONS;
    let feedback: string | null = null;
    let director: TaskResult | undefined;

    for (let iteration = 1; iteration <= maxIterations; iteration++) {
      const env = this.opts.baseEnv.extend(
        Object.entries(inputs).map(([k, v]): [string, Value] => [k, fromPlain(v)])
      );
      env.define("iteration", iteration);
      env.define("feedback", feedback);
      this.logger.debug({ loop: template.name, iteration }, "loop iteration");

      const outcome = await this.iterate(template, loop, env, contextManagement, ctx);
      if (outcome instanceof StepFailure) {
        return this.abort(template, outcome, iteration, director);
      }
      director = outcome.director;

      if (outcome.success) {
        return done(this.finish(director, iteration, "success", outcome.feedback));
      }
      if (loop.terminationCondition !== undefined &&
          (await this.conditionMet(template, loop.terminationCondition, env, outcome, ctx))) {
        return done(this.finish(director, iteration, "condition", outcome.feedback));
      }
      feedback = outcome.feedback;
    }

    this.logger.info({ loop: template.name, maxIterations }, "loop reached max iterations");
    return done(this.finish(director, maxIterations, "max_iterations", feedback));
  }

  private async iterate(
    template: TaskTemplate,
    loop: LoopSpec,
    env: Environment,
    cm: ContextManagement,
    ctx: EvalContext
  ): Promise<StepFailure | { director: TaskResult; evaluation: TaskResult; success: boolean; feedback: string }> {
    if (ctx.halt.isHalted) {
      return new StepFailure("director", {
        type: "TASK_FAILURE",
        reason: "execution_halted",
        message: `${template.name} halted: ${ctx.halt.haltReason ?? "halted"}`,
      });
    }

    const director = await this.step("director", loop.director, env, cm, ctx);
    if (director instanceof StepFailure) return director;
    env.define("director_result", resultVal(director));

    if (loop.script) {
      const script = await this.runScript(loop.script.command, loop.script.timeoutMs, env);
      if (script instanceof StepFailure) return new StepFailure(script.step, script.error, director);
      env.define("script_stdout", script.stdout);
      env.define("script_stderr", script.stderr);
      env.define("script_exit_code", script.exitCode);
    }

    const evaluation = await this.step("evaluator", loop.evaluator, env, cm, ctx);
    if (evaluation instanceof StepFailure) return new StepFailure(evaluation.step, evaluation.error, director);

    const success = evaluation.notes.success === true;
    const fb = evaluation.notes.feedback;
    const feedback = typeof fb === "string" ? fb : success ? "" : "No feedback provided by evaluator";
    return { director, evaluation, success, feedback };
  }

  /** Step templates read their declared params from the iteration environment. */
  private async step(
    step: LoopStep,
    name: string,
    env: Environment,
    cm: ContextManagement,
    ctx: EvalContext
  ): Promise<TaskResult | StepFailure> {
    const template = this.opts.registry.find(name);
    if (!template) {
      return new StepFailure(step, {
        type: "TASK_FAILURE",
        reason: "template_not_found",
        message: `${step} template ${name} is not registered`,
      });
    }
    const inputs: Record<string, unknown> = {};
    for (const p of template.params) {
      const v = env.tryLookup(p);
      if (v === undefined) {
        return new StepFailure(step, {
          type: "TASK_FAILURE",
          reason: "input_validation_failure",
          message: `${step} template ${name} needs ${p}, which the loop does not bind`,
          details: { code: "PARAMETER", parameter: p },
        });
      }
      inputs[p] = toInput(v);
    }
    const r = await this.opts.dispatcher.spawn(
      { type: template.type, name, inputs, context_management: cm },
      ctx
    );
    return isFail(r) ? new StepFailure(step, r.failure) : r.value;
  }

  private async runScript(
    command: string,
    timeoutMs: number | undefined,
    env: Environment
  ): Promise<ScriptResult | StepFailure> {
    if (!this.opts.script) {
      return new StepFailure("script", {
        type: "TASK_FAILURE",
        reason: "tool_execution_error",
        message: "loop has a script step but no script runner is configured",
      });
    }
    const params: Record<string, unknown> = {};
    const scriptInputs: Record<string, string> = {};
    for (const name of placeholders(command)) {
      const v = env.tryLookup(name);
      if (v !== undefined) {
        params[name] = toInput(v);
        scriptInputs[name] = renderInput(params[name]);
      }
    }
    const cmd = substitute(command, params);
    if (isFail(cmd)) return new StepFailure("script", cmd.failure);

    try {
      return await this.opts.script.run(
        cmd.value,
        timeoutMs ?? this.opts.defaultScriptTimeoutMs ?? DEFAULT_SCRIPT_TIMEOUT_MS,
        scriptInputs
      );
    } catch (e) {
      return new StepFailure("script", {
        type: "TASK_FAILURE",
        reason: "tool_execution_error",
        message: `script failed to run: ${e instanceof Error ? e.message : String(e)}`,
      });
    }
  }

  /** Evaluation errors count as "not met". */
  private async conditionMet(
    template: TaskTemplate,
    condition: string,
    env: Environment,
    outcome: { evaluation: TaskResult; success: boolean; feedback: string },
    ctx: EvalContext
  ): Promise<boolean> {
    const condEnv = env.extend([
      ["evaluation_success", outcome.success],
      ["evaluation_feedback", outcome.feedback],
      ["evaluation_result", resultVal(outcome.evaluation)],
    ]);
    const r = await this.opts.evaluator.evaluateSource(condition, condEnv, ctx);
    if (isFail(r)) {
      this.logger.warn(
        { loop: template.name, error: describeError(r.failure) },
        "termination condition failed; treating as not met"
      );
      return false;
    }
    return isTruthy(r.value);
  }

  private finish(
    director: TaskResult | undefined,
    iterations: number,
    reason: TerminationReason,
    lastFeedback: string | null
  ): TaskResult {
    return {
      content: director?.content ?? "",
      status: "COMPLETE",
      parsedContent: director?.parsedContent,
      notes: { iterations, terminationReason: reason, lastFeedback },
    };
  }

  private abort(
    template: TaskTemplate,
    failure: StepFailure,
    iteration: number,
    director: TaskResult | undefined
  ): Outcome<TaskResult> {
    this.logger.warn(
      { loop: template.name, step: failure.step, iteration, error: describeError(failure.error) },
      "loop step failed"
    );
    const wrapped = wrapFailure(failure.error, `${template.name}: ${failure.step} step failed in iteration ${iteration}: ${failure.error.message}`, {
      step: failure.step,
      iteration,
    });
    const latest = failure.director ?? director;
    return fail({ ...wrapped, content: latest?.content ?? wrapped.content });
  }
}
