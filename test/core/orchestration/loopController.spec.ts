// test/core/orchestration/loopController.spec.ts
// Tests for the director-evaluator refinement loop

import { describe, it, expect } from "vitest";
import { rootContext } from "../../../src/core/eval/context";
import type { PromptPayload } from "../../../src/ports/handler";
import type { ScriptRunnerPort } from "../../../src/ports/script";
import type { LoopSpec, TaskResult } from "../../../src/core/tasks/types";
import type { ResourceLimits } from "../../../src/core/governance/metrics";
import { unwrap } from "../../../src/outcome";
import { detailsOf, failureOf, innermost, reasonOf } from "../../helpers/errors";
import { FakeScriptRunner, ScriptedHandler } from "../../helpers/fakes";
import { makeHarness } from "../../helpers/harness";

type Verdict = { success?: boolean; feedback?: string } | "fail";

/**
 * Director answers "draft N"; the evaluator answers from `verdicts` in order,
 * repeating the last one.
 */
function loopHarness(
  loop: Partial<LoopSpec>,
  verdicts: Verdict[],
  opts: { script?: ScriptRunnerPort; limits?: Partial<ResourceLimits>; judgeParams?: string[] } = {}
) {
  let drafts = 0;
  let judged = 0;
  const handler = new ScriptedHandler((p: PromptPayload): TaskResult | string => {
    if (p.prompt.startsWith("Draft")) return `draft ${++drafts}`;
    const v = verdicts[Math.min(judged++, verdicts.length - 1)];
    if (v === "fail") return { content: "", status: "FAILED", notes: { error: "judge crashed" } };
    return { content: "verdict", status: "COMPLETE", notes: { ...v } };
  });
  const h = makeHarness({ handler, script: opts.script, limits: opts.limits });
  h.registry.register({
    name: "draft",
    type: "atomic",
    instructions: "Draft {{task}} feedback={{feedback}}",
    params: ["task", "feedback"],
  });
  const judgeParams = opts.judgeParams ?? ["director_result"];
  h.registry.register({
    name: "judge",
    type: "atomic",
    instructions: `Judge ${judgeParams.map((p) => `{{${p}}}`).join(" / ")}`,
    params: judgeParams,
  });
  h.registry.register({
    name: "refine",
    type: "director_evaluator_loop",
    instructions: "Refine {{task}}",
    params: ["task"],
    loop: { director: "draft", evaluator: "judge", maxIterations: 3, ...loop },
  });
  const run = () =>
    h.controller.spawn({ type: "director_evaluator_loop", name: "refine", inputs: { task: "essay" } }, rootContext());
  return { h, handler, run };
}

describe("LoopController", () => {
  it("stops after exactly maxIterations when the evaluator never succeeds", async () => {
    const { handler, run } = loopHarness({}, [{ success: false, feedback: "more detail" }]);
    const r = unwrap(await run());
    expect(handler.calls.length).toBe(6);
    expect(r.content).toBe("draft 3");
    expect(r.notes).toEqual({ iterations: 3, terminationReason: "max_iterations", lastFeedback: "more detail" });
  });

  it("passes evaluator feedback to the next director step", async () => {
    const { handler, run } = loopHarness({ maxIterations: 2 }, [{ success: false, feedback: "tighten" }]);
    await run();
    expect(handler.prompts().filter((p) => p.startsWith("Draft"))).toEqual([
      "Draft essay feedback=",
      "Draft essay feedback=tighten",
    ]);
  });

  it("hands the director output to the evaluator", async () => {
    const { handler, run } = loopHarness({ maxIterations: 1 }, [{ success: true }]);
    await run();
    expect(handler.prompts()).toEqual(["Draft essay feedback=", "Judge draft 1"]);
    expect(handler.calls[1].context).toContain("[draft] COMPLETE");
  });

  it("ends early when the evaluator reports success", async () => {
    const { handler, run } = loopHarness({}, [{ success: false, feedback: "tighten" }, { success: true }]);
    const r = unwrap(await run());
    expect(handler.calls.length).toBe(4);
    expect(r.content).toBe("draft 2");
    expect(r.notes).toEqual({ iterations: 2, terminationReason: "success", lastFeedback: "" });
  });

  it("uses a default message when a failing evaluation gives no feedback", async () => {
    const { run } = loopHarness({ maxIterations: 1 }, [{ success: false }]);
    expect(unwrap(await run()).notes.lastFeedback).toBe("No feedback provided by evaluator");
  });

  it("ends when the termination condition holds", async () => {
    const { handler, run } = loopHarness(
      { maxIterations: 5, terminationCondition: "(>= iteration 2)" },
      [{ success: false, feedback: "more" }]
    );
    const r = unwrap(await run());
    expect(handler.calls.length).toBe(4);
    expect(r.notes).toEqual({ iterations: 2, terminationReason: "condition", lastFeedback: "more" });
  });

  it("binds evaluation results for the termination condition", async () => {
    const { run } = loopHarness(
      { maxIterations: 5, terminationCondition: '(string-contains? evaluation_feedback "close")' },
      [{ success: false, feedback: "far" }, { success: false, feedback: "close enough" }]
    );
    expect(unwrap(await run()).notes.iterations).toBe(2);
  });

  it("treats a failing termination condition as not met", async () => {
    const { run } = loopHarness({ maxIterations: 2, terminationCondition: "(undefined-fn)" }, [{ success: false }]);
    expect(unwrap(await run()).notes.terminationReason).toBe("max_iterations");
  });

  it("runs the script step between director and evaluator", async () => {
    const script = new FakeScriptRunner({ stdout: "2 failed", stderr: "", exitCode: 1 });
    const { handler, run } = loopHarness(
      { maxIterations: 1, script: { command: "run-tests {{task}}" } },
      [{ success: true }],
      { script, judgeParams: ["director_result", "script_stdout", "script_exit_code"] }
    );
    unwrap(await run());
    expect(script.commands).toEqual([{ command: "run-tests essay", timeoutMs: 30_000, inputs: { task: "essay" } }]);
    expect(handler.prompts()[1]).toBe("Judge draft 1 / 2 failed / 1");
  });

  it("fails when a step template is missing", async () => {
    const { run } = loopHarness({ director: "missing_director" }, [{ success: true }]);
    const f = failureOf(await run());
    expect(reasonOf(f)).toBe("subtask_failure");
    expect(detailsOf(f).step).toBe("director");
    expect(detailsOf(f).iteration).toBe(1);
    expect(reasonOf(innermost(f))).toBe("template_not_found");
    expect(f.message).toBe(
      "refine: director step failed in iteration 1: director template missing_director is not registered"
    );
  });

  it("keeps the latest draft when the evaluator fails", async () => {
    const { run } = loopHarness({}, ["fail"]);
    const f = failureOf(await run());
    expect(detailsOf(f).step).toBe("evaluator");
    expect(f.content).toBe("draft 1");
    expect(innermost(f).message).toBe("judge crashed");
  });

  it("passes resource exhaustion through unchanged", async () => {
    const { run } = loopHarness({ maxIterations: 5 }, [{ success: false }], { limits: { maxTurns: 3 } });
    const f = failureOf(await run());
    expect(f.type).toBe("RESOURCE_EXHAUSTION");
    expect(f.type === "RESOURCE_EXHAUSTION" && f.resource).toBe("turns");
    expect(detailsOf(f)).toEqual({ step: "evaluator", iteration: 2 });
    expect(f.content).toBe("draft 2");
  });

  it("rejects a script step without a script runner", async () => {
    const { run } = loopHarness({ script: { command: "make" } }, [{ success: true }]);
    const f = failureOf(await run());
    expect(detailsOf(f).step).toBe("script");
    expect(reasonOf(innermost(f))).toBe("tool_execution_error");
  });
});
