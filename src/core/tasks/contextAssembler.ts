// src/core/tasks/contextAssembler.ts
// Three-dimensional context model: inheritance, accumulation, fresh retrieval.

import type { Logger } from "pino";
import type { Outcome } from "../../outcome";
import { done, taskFailure, validationError } from "../../outcome";
import { silentLogger } from "../../adapters/logging";
import type { ContextRetrievalPort } from "../../ports/retrieval";
import type {
  ContextManagement,
  ContextManagementOverride,
  RetrievalResult,
  TaskStatus,
  TaskTemplate,
  TaskType,
} from "./types";

export type ContextSegment = {
  /** File path, or a label such as `context_summary` */
  source: string;
  text: string;
  origin: "inherited" | "fresh";
};

export type StepRecord = {
  task: string;
  status: TaskStatus;
  content: string;
  notes: Record<string, unknown>;
};

export const OPERATOR_DEFAULTS: Readonly<Record<TaskType, ContextManagement>> = {
  atomic: { inheritContext: "full", accumulateData: false, accumulationFormat: "notes_only", freshContext: "disabled" },
  sequential: { inheritContext: "full", accumulateData: true, accumulationFormat: "notes_only", freshContext: "disabled" },
  reduce: { inheritContext: "none", accumulateData: true, accumulationFormat: "notes_only", freshContext: "disabled" },
  script: { inheritContext: "full", accumulateData: false, accumulationFormat: "notes_only", freshContext: "disabled" },
  director_evaluator_loop: { inheritContext: "none", accumulateData: true, accumulationFormat: "notes_only", freshContext: "disabled" },
};

export const DEFAULT_MAX_ACCUMULATED_CHARS = 8000;

/** Fresh retrieval may only be combined with `inheritContext: none`. */
export function checkContextManagement(cm: ContextManagement): Outcome<ContextManagement> {
  if (cm.freshContext === "enabled" && cm.inheritContext !== "none") {
    return validationError(
      `freshContext "enabled" cannot be combined with inheritContext "${cm.inheritContext}"`,
      "contextManagement"
    );
  }
  return done(cm);
}

/**
 * Operator defaults, then each override in turn, field by field. The merged
 * settings are validated again.
 */
export function resolveContextManagement(
  type: TaskType,
  ...overrides: (ContextManagementOverride | undefined)[]
): Outcome<ContextManagement> {
  let cm: ContextManagement = { ...OPERATOR_DEFAULTS[type] };
  for (const o of overrides) {
    if (!o) continue;
    cm = {
      inheritContext: o.inheritContext ?? cm.inheritContext,
      accumulateData: o.accumulateData ?? cm.accumulateData,
      accumulationFormat: o.accumulationFormat ?? cm.accumulationFormat,
      freshContext: o.freshContext ?? cm.freshContext,
    };
  }
  return checkContextManagement(cm);
}

export interface AssembleRequest {
  template: TaskTemplate;
  contextManagement: ContextManagement;
  inputs: Record<string, unknown>;
  filePaths?: readonly string[];
  parentSegments: readonly ContextSegment[];
  history: readonly StepRecord[];
}

export interface AssembledContext {
  text: string;
  /** Inherited and fresh segments, handed on to child tasks. */
  segments: ContextSegment[];
  notes: Record<string, unknown>;
}

function renderSegments(segments: readonly ContextSegment[]): string {
  return segments.map((s) => (s.text ? `### ${s.source}\n${s.text}` : `### ${s.source}`)).join("\n\n");
}

export function renderStep(step: StepRecord, format: ContextManagement["accumulationFormat"]): string {
  if (format === "full_output") {
    return `[${step.task}] ${step.status}\n${step.content}`;
  }
  return `[${step.task}] ${step.status} ${JSON.stringify(step.notes)}`;
}

/**
 * Newest steps win: entries are taken from the end of `history` until the
 * next one would exceed `maxChars`.
 */
export function accumulate(
  history: readonly StepRecord[],
  format: ContextManagement["accumulationFormat"],
  maxChars: number
): { text: string; droppedSteps: number; truncated: boolean } {
  const kept: string[] = [];
  let used = 0;
  let i = history.length - 1;
  for (; i >= 0; i--) {
    const entry = renderStep(history[i], format);
    const cost = entry.length + (kept.length > 0 ? 1 : 0);
    if (used + cost > maxChars) break;
    kept.unshift(entry);
    used += cost;
  }
  let droppedSteps = i + 1;
  if (kept.length === 0 && droppedSteps > 0 && maxChars > 0) {
    // newest step alone is over the cap: keep its head
    kept.push(renderStep(history[history.length - 1], format).slice(0, maxChars));
    droppedSteps -= 1;
    return { text: kept.join("\n"), droppedSteps, truncated: true };
  }
  return { text: kept.join("\n"), droppedSteps, truncated: droppedSteps > 0 };
}

export class ContextAssembler {
  private readonly retrieval?: ContextRetrievalPort;
  private readonly maxAccumulatedChars: number;
  private readonly logger: Logger;

  constructor(opts: { retrieval?: ContextRetrievalPort; maxAccumulatedChars?: number; logger?: Logger } = {}) {
    this.retrieval = opts.retrieval;
    this.maxAccumulatedChars = opts.maxAccumulatedChars ?? DEFAULT_MAX_ACCUMULATED_CHARS;
    this.logger = opts.logger ?? silentLogger();
  }

  resolve(type: TaskType, ...overrides: (ContextManagementOverride | undefined)[]): Outcome<ContextManagement> {
    return resolveContextManagement(type, ...overrides);
  }

  async assemble(req: AssembleRequest): Promise<Outcome<AssembledContext>> {
    const cm = req.contextManagement;
    const notes: Record<string, unknown> = {};
    const segments: ContextSegment[] = [];

    if (cm.inheritContext === "full") {
      segments.push(...req.parentSegments);
    } else if (cm.inheritContext === "subset") {
      const wanted = new Set(req.filePaths ?? []);
      segments.push(...req.parentSegments.filter((s) => wanted.has(s.source)));
    }

    if (cm.freshContext === "enabled") {
      const fresh = await this.retrieve(req);
      if (fresh.tag === "Fail") return fresh;
      if (fresh.value.context_summary) {
        segments.push({ source: "context_summary", text: fresh.value.context_summary, origin: "fresh" });
      }
      for (const m of fresh.value.matches) {
        segments.push({ source: m.path, text: m.excerpt ?? "", origin: "fresh" });
      }
      notes.freshMatches = fresh.value.matches.length;
    }

    const parts: string[] = [];
    if (segments.length > 0) parts.push(renderSegments(segments));

    if (cm.accumulateData && req.history.length > 0) {
      const acc = accumulate(req.history, cm.accumulationFormat, this.maxAccumulatedChars);
      if (acc.text) parts.push(`## Prior steps\n${acc.text}`);
      if (acc.truncated) {
        notes.accumulationTruncated = true;
        notes.droppedSteps = acc.droppedSteps;
        this.logger.debug(
          { task: req.template.name, droppedSteps: acc.droppedSteps, maxChars: this.maxAccumulatedChars },
          "accumulated context truncated"
        );
      }
    }

    return done({ text: parts.join("\n\n"), segments, notes });
  }

  private async retrieve(req: AssembleRequest): Promise<Outcome<RetrievalResult>> {
    if (!this.retrieval) {
      return taskFailure("context_retrieval_failure", `No context retrieval service for ${req.template.name}`);
    }
    let res: RetrievalResult;
    try {
      res = await this.retrieval.getRelevantContextFor({
        templateDescription: req.template.description,
        templateType: req.template.type,
        templateSubtype: req.template.subtype,
        query: req.template.description ?? req.template.name,
        inputs: req.inputs,
        previousOutputs: req.history.map((s) => s.content),
      });
    } catch (e) {
      return taskFailure("context_retrieval_failure", `Context retrieval failed: ${e instanceof Error ? e.message : String(e)}`);
    }
    if (res.error) {
      return taskFailure("context_retrieval_failure", `Context retrieval failed: ${res.error}`);
    }
    return done(res);
  }
}
