// src/ports/handler.ts
// LLM handler contract: one prompt per call plus tool bookkeeping.

import type { OutputFormat, TaskResult } from "../core/tasks/types";
import { ToolRegistry, type DirectTool, type SubtaskToolSpec } from "../core/tools/registry";

/**
 * Outbound payload for a single LLM invocation.
 */
export interface PromptPayload {
  /** Template the prompt was rendered from */
  taskName: string;

  /** Instructions after placeholder substitution */
  prompt: string;

  systemPrompt?: string;

  /** Assembled context string (may be empty) */
  context: string;

  model?: string;
  outputFormat?: OutputFormat;

  /** Explicit file paths attached to the request */
  filePaths: string[];

  /** Names of subtask tools the model may request */
  tools: string[];
}

export interface Handler {
  executePrompt(payload: PromptPayload): Promise<TaskResult>;
  registerDirectTool(name: string, fn: DirectTool): void;
  registerSubtaskTool(name: string, hints: string[]): void;
  findDirectTool(name: string): DirectTool | undefined;
  subtaskTools(): SubtaskToolSpec[];
}

/**
 * Tool bookkeeping shared by concrete handlers; subclasses provide the
 * provider call.
 */
export abstract class BaseHandler implements Handler {
  protected readonly tools: ToolRegistry;

  constructor(tools: ToolRegistry = new ToolRegistry()) {
    this.tools = tools;
  }

  abstract executePrompt(payload: PromptPayload): Promise<TaskResult>;

  registerDirectTool(name: string, fn: DirectTool): void {
    this.tools.registerDirect(name, fn);
  }

  registerSubtaskTool(name: string, hints: string[]): void {
    this.tools.registerSubtask({ name, hints });
  }

  findDirectTool(name: string): DirectTool | undefined {
    return this.tools.getDirect(name);
  }

  subtaskTools(): SubtaskToolSpec[] {
    return this.tools.listSubtask();
  }
}
