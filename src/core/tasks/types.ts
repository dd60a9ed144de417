// src/core/tasks/types.ts
// Wire shapes for templates, subtask requests and task results.

import { z } from "zod";

export const TASK_TYPES = ["atomic", "sequential", "reduce", "script", "director_evaluator_loop"] as const;
export const TaskTypeSchema = z.enum(TASK_TYPES);
export type TaskType = z.infer<typeof TaskTypeSchema>;

export const IDENTIFIER = /^[A-Za-z_]\w*$/;

// ─────────────────────────────────────────────────────────────────
// Context management
// ─────────────────────────────────────────────────────────────────

export const InheritContextSchema = z.enum(["full", "none", "subset"]);
export const AccumulationFormatSchema = z.enum(["notes_only", "full_output"]);
export const FreshContextSchema = z.enum(["enabled", "disabled"]);

export const ContextManagementSchema = z.object({
  inheritContext: InheritContextSchema,
  accumulateData: z.boolean(),
  accumulationFormat: AccumulationFormatSchema,
  freshContext: FreshContextSchema,
});
export type ContextManagement = z.infer<typeof ContextManagementSchema>;

export const ContextManagementOverrideSchema = ContextManagementSchema.partial().strict();
export type ContextManagementOverride = z.infer<typeof ContextManagementOverrideSchema>;

// ─────────────────────────────────────────────────────────────────
// Templates
// ─────────────────────────────────────────────────────────────────

export const OutputFormatSchema = z.object({
  type: z.enum(["text", "json"]),
  /** Shape hint for JSON output: object, array, string, number, boolean or `<type>[]`. */
  schema: z.string().optional(),
});
export type OutputFormat = z.infer<typeof OutputFormatSchema>;

export const ScriptStepSchema = z.object({
  command: z.string().min(1),
  timeoutMs: z.number().int().positive().optional(),
});

export const LoopSpecSchema = z.object({
  director: z.string().min(1),
  evaluator: z.string().min(1),
  script: ScriptStepSchema.optional(),
  maxIterations: z.number().int().positive().optional(),
  /** DSL expression; a truthy value ends the loop. */
  terminationCondition: z.string().optional(),
});
export type LoopSpec = z.infer<typeof LoopSpecSchema>;

export const TaskTemplateSchema = z.object({
  name: z.string().min(1),
  type: TaskTypeSchema,
  subtype: z.string().optional(),
  description: z.string().optional(),
  instructions: z.string(),
  systemPrompt: z.string().optional(),
  params: z.array(z.string().regex(IDENTIFIER, "parameter names must be identifiers")),
  model: z.string().optional(),
  outputFormat: OutputFormatSchema.optional(),
  contextManagement: ContextManagementOverrideSchema.optional(),
  loop: LoopSpecSchema.optional(),
});
export type TaskTemplate = z.infer<typeof TaskTemplateSchema>;

// ─────────────────────────────────────────────────────────────────
// Results and requests
// ─────────────────────────────────────────────────────────────────

export const TaskStatusSchema = z.enum(["COMPLETE", "CONTINUATION", "FAILED"]);
export type TaskStatus = z.infer<typeof TaskStatusSchema>;

export const TaskResultSchema = z.object({
  content: z.string(),
  status: TaskStatusSchema,
  criteria: z.string().optional(),
  parsedContent: z.unknown().optional(),
  notes: z.record(z.unknown()),
});
export type TaskResult = z.infer<typeof TaskResultSchema>;

export const DEFAULT_MAX_DEPTH = 5;

export const SubtaskRequestSchema = z.object({
  type: TaskTypeSchema,
  name: z.string().min(1),
  description: z.string().optional(),
  inputs: z.record(z.unknown()),
  template_hints: z.array(z.string()).optional(),
  context_management: ContextManagementOverrideSchema.optional(),
  max_depth: z.number().int().positive().optional(),
  file_paths: z.array(z.string()).optional(),
});
export type SubtaskRequest = z.infer<typeof SubtaskRequestSchema>;

// ─────────────────────────────────────────────────────────────────
// Context retrieval
// ─────────────────────────────────────────────────────────────────

export const ContextGenerationInputSchema = z.object({
  templateDescription: z.string().optional(),
  templateType: z.string().optional(),
  templateSubtype: z.string().optional(),
  query: z.string().optional(),
  inputs: z.record(z.unknown()).optional(),
  inheritedContext: z.string().optional(),
  previousOutputs: z.array(z.string()).optional(),
});
export type ContextGenerationInput = z.infer<typeof ContextGenerationInputSchema>;

export interface ContextMatch {
  path: string;
  relevance: number;
  excerpt?: string;
}

export interface RetrievalResult {
  context_summary: string;
  matches: ContextMatch[];
  error?: string;
}

/** Keys that carry output and so never belong in `notes`. */
export const CONTENT_NOTE_KEYS = ["content", "output"] as const;

export function stripContentNotes(notes: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(notes)) {
    if (!(CONTENT_NOTE_KEYS as readonly string[]).includes(k)) out[k] = v;
  }
  return out;
}

export function completeResult(content: string, notes: Record<string, unknown> = {}): TaskResult {
  return { content, status: "COMPLETE", notes };
}
