// test/helpers/fakes.ts
// In-process stand-ins for the handler, retrieval and script ports.

import { BaseHandler, type PromptPayload } from "../../src/ports/handler";
import type { ContextRetrievalPort } from "../../src/ports/retrieval";
import type { ScriptResult, ScriptRunnerPort } from "../../src/ports/script";
import type { ContextGenerationInput, RetrievalResult, TaskResult } from "../../src/core/tasks/types";

export type Reply = TaskResult | string | ((p: PromptPayload) => TaskResult | string | Promise<TaskResult | string>);

export function complete(content: string, notes: Record<string, unknown> = {}): TaskResult {
  return { content, status: "COMPLETE", notes };
}

/**
 * Handler that answers from a queue of replies (or a fallback) and records
 * every payload it receives.
 */
export class ScriptedHandler extends BaseHandler {
  readonly calls: PromptPayload[] = [];
  private queue: Reply[] = [];

  constructor(private fallback: Reply = (p) => `echo: ${p.prompt}`) {
    super();
  }

  reply(...replies: Reply[]): this {
    this.queue.push(...replies);
    return this;
  }

  async executePrompt(payload: PromptPayload): Promise<TaskResult> {
    this.calls.push(payload);
    const next = this.queue.shift() ?? this.fallback;
    const r = typeof next === "function" ? await next(payload) : next;
    return typeof r === "string" ? complete(r) : r;
  }

  prompts(): string[] {
    return this.calls.map((c) => c.prompt);
  }
}

export class FakeRetrieval implements ContextRetrievalPort {
  readonly requests: ContextGenerationInput[] = [];

  constructor(private result: RetrievalResult | (() => Promise<RetrievalResult>)) {}

  async getRelevantContextFor(input: ContextGenerationInput): Promise<RetrievalResult> {
    this.requests.push(input);
    return typeof this.result === "function" ? this.result() : this.result;
  }
}

export class FakeScriptRunner implements ScriptRunnerPort {
  readonly commands: { command: string; timeoutMs: number; inputs: Record<string, string> }[] = [];

  constructor(private result: ScriptResult = { stdout: "", stderr: "", exitCode: 0 }) {}

  async run(command: string, timeoutMs: number, inputs: Record<string, string>): Promise<ScriptResult> {
    this.commands.push({ command, timeoutMs, inputs });
    return this.result;
  }
}
