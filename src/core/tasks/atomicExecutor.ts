// src/core/tasks/atomicExecutor.ts
// One template, one external call. Parameters are substituted, never evaluated.

import type { Logger } from "pino";
import { z } from "zod";
import type { Outcome } from "../../outcome";
import { done, invalidOutput, isFail, taskFailure, type FailureReason } from "../../outcome";
import { silentLogger } from "../../adapters/logging";
import type { Handler, PromptPayload } from "../../ports/handler";
import { estimateTokens, type ResourceTracker } from "../governance/resourceTracker";
import { substitute } from "./substitute";
import { stripContentNotes, TaskResultSchema, type TaskResult, type TaskTemplate } from "./types";

const FAILURE_REASONS: ReadonlySet<string> = new Set<FailureReason>([
  "context_retrieval_failure",
  "context_matching_failure",
  "xml_validation_failure",
  "output_format_failure",
  "execution_timeout",
  "execution_halted",
  "subtask_failure",
  "input_validation_failure",
  "template_not_found",
  "tool_execution_error",
  "llm_error",
  "unexpected_error",
]);

function isFailureReason(x: unknown): x is FailureReason {
  return typeof x === "string" && FAILURE_REASONS.has(x);
}

const HINT_SCHEMAS: Record<string, z.ZodTypeAny> = {
  object: z.record(z.unknown()),
  array: z.array(z.unknown()),
  string: z.string(),
  number: z.number(),
  boolean: z.boolean(),
};

/** zod schema for an output-format hint; undefined for hints it does not know. */
export function schemaForHint(hint: string): z.ZodTypeAny | undefined {
  const h = hint.trim();
  if (h.endsWith("[]")) {
    const inner = schemaForHint(h.slice(0, -2));
    return inner && z.array(inner);
  }
  return HINT_SCHEMAS[h];
}

export interface ExecuteOptions {
  /** Assembled context string */
  context?: string;
  filePaths?: readonly string[];
  /** Metadata from context assembly, merged into the result notes */
  contextNotes?: Record<string, unknown>;
}

export class AtomicTaskExecutor {
  private readonly tracker: ResourceTracker;
  private readonly defaultModel?: string;
  private readonly logger: Logger;

  constructor(opts: { tracker: ResourceTracker; defaultModel?: string; logger?: Logger }) {
    this.tracker = opts.tracker;
    this.defaultModel = opts.defaultModel;
    this.logger = opts.logger ?? silentLogger();
  }

  async execute(
    template: TaskTemplate,
    params: Readonly<Record<string, unknown>>,
    handler: Handler,
    options: ExecuteOptions = {}
  ): Promise<Outcome<TaskResult>> {
    const prompt = substitute(template.instructions, params);
    if (isFail(prompt)) return prompt;
    const system = template.systemPrompt === undefined ? undefined : substitute(template.systemPrompt, params);
    if (system && isFail(system)) return system;

    const payload: PromptPayload = {
      taskName: template.name,
      prompt: prompt.value,
      systemPrompt: system?.value,
      context: options.context ?? "",
      model: template.model ?? this.defaultModel,
      outputFormat: template.outputFormat,
      filePaths: [...(options.filePaths ?? [])],
      tools: handler.subtaskTools().map((t) => t.name),
    };

    const charged = this.tracker.chargeCall(
      estimateTokens(payload.prompt + (payload.systemPrompt ?? "") + payload.context)
    );
    if (isFail(charged)) return charged;

    const started = Date.now();
    let raw: TaskResult;
    try {
      raw = await handler.executePrompt(payload);
    } catch (e) {
      this.logger.error({ task: template.name, err: e }, "handler call failed");
      return taskFailure("llm_error", `${template.name}: ${e instanceof Error ? e.message : String(e)}`);
    }
    const checked = TaskResultSchema.safeParse(raw);
    if (!checked.success) {
      return taskFailure("llm_error", `${template.name}: handler returned a malformed result`, {
        details: { issues: checked.error.issues.map((i) => i.message) },
      });
    }

    const result: TaskResult = { ...checked.data };
    const notes: Record<string, unknown> = {
      ...stripContentNotes(result.notes),
      ...options.contextNotes,
      resourceUsage: this.tracker.metrics(),
      durationMs: Date.now() - started,
    };

    if (result.status === "FAILED") {
      const reason = isFailureReason(notes.reason) ? notes.reason : "llm_error";
      const message = typeof notes.error === "string" ? notes.error : `${template.name} reported failure`;
      return taskFailure(reason, message, { content: result.content, details: { notes } });
    }

    if (template.outputFormat?.type === "json" && result.status === "COMPLETE") {
      let parsed: unknown;
      try {
        parsed = JSON.parse(result.content);
      } catch (e) {
        notes.parseError = e instanceof Error ? e.message : String(e);
        this.logger.debug({ task: template.name, parseError: notes.parseError }, "JSON output did not parse");
        return done({ ...result, notes });
      }
      const hint = template.outputFormat.schema;
      const schema = hint === undefined ? undefined : schemaForHint(hint);
      if (schema) {
        const ok = schema.safeParse(parsed);
        if (!ok.success) {
          return invalidOutput(
            `${template.name}: output does not match schema ${hint}`,
            ok.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`),
            result.content
          );
        }
      }
      return done({ ...result, parsedContent: parsed, notes });
    }

    return done({ ...result, notes });
  }
}
