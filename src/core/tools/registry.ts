// src/core/tools/registry.ts
// Registry of direct tools (plain functions) and subtask tools (template hints).

import type { Outcome } from "../../outcome";
import { done, taskFailure } from "../../outcome";
import { TaskResultSchema, completeResult, type TaskResult } from "../tasks/types";

/**
 * Arguments handed to a direct tool: positional values in call order plus
 * any `:keyword` arguments.
 */
export type ToolCall = {
  args: unknown[];
  named: Record<string, unknown>;
};

export type DirectTool = (call: ToolCall) => Promise<TaskResult | string> | TaskResult | string;

export type SubtaskToolSpec = {
  name: string;
  hints: string[];
};

export class ToolRegistry {
  private direct = new Map<string, DirectTool>();
  private subtask = new Map<string, SubtaskToolSpec>();

  registerDirect(name: string, fn: DirectTool): void {
    this.direct.set(name, fn);
  }

  unregisterDirect(name: string): boolean {
    return this.direct.delete(name);
  }

  hasDirect(name: string): boolean {
    return this.direct.has(name);
  }

  getDirect(name: string): DirectTool | undefined {
    return this.direct.get(name);
  }

  listDirect(): string[] {
    return Array.from(this.direct.keys());
  }

  registerSubtask(spec: SubtaskToolSpec): void {
    this.subtask.set(spec.name, { name: spec.name, hints: spec.hints.slice() });
  }

  listSubtask(): SubtaskToolSpec[] {
    return Array.from(this.subtask.values());
  }

  /**
   * Execute a direct tool. Thrown errors, malformed results and FAILED
   * results all become tool_execution_error failures.
   */
  async execute(name: string, call: ToolCall): Promise<Outcome<TaskResult>> {
    const tool = this.direct.get(name);
    if (!tool) {
      return taskFailure("template_not_found", `unknown tool: ${name}`);
    }
    return executeTool(name, tool, call);
  }
}

export async function executeTool(
  name: string,
  tool: DirectTool,
  call: ToolCall
): Promise<Outcome<TaskResult>> {
  const t0 = Date.now();
  let raw: TaskResult | string;
  try {
    raw = await tool(call);
  } catch (e) {
    return taskFailure("tool_execution_error", `Tool ${name} failed: ${e instanceof Error ? e.message : String(e)}`);
  }
  const durationMs = Date.now() - t0;
  if (typeof raw === "string") {
    return done(completeResult(raw), { durationMs });
  }
  const parsed = TaskResultSchema.safeParse(raw);
  if (!parsed.success) {
    return taskFailure("tool_execution_error", `Tool ${name} returned a malformed result: ${parsed.error.message}`);
  }
  if (parsed.data.status === "FAILED") {
    return taskFailure("tool_execution_error", `Tool ${name} reported failure`, {
      content: parsed.data.content,
      details: { notes: parsed.data.notes },
    });
  }
  return done(parsed.data, { durationMs });
}
