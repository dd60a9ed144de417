// src/core/tasks/registry.ts
// Template registry. Constructed and injected; there is no global instance.

import type { Logger } from "pino";
import type { Outcome } from "../../outcome";
import { done, isFail, validationError } from "../../outcome";
import { silentLogger } from "../../adapters/logging";
import { parse } from "../reader/parse";
import { resolveContextManagement } from "./contextAssembler";
import { placeholders } from "./substitute";
import { IDENTIFIER, TaskTemplateSchema, type TaskTemplate, type TaskType } from "./types";

/**
 * Check everything that can be checked without running the template.
 * Context-management conflicts are caught here, never at execution time.
 */
export function validateTemplate(input: unknown): Outcome<TaskTemplate> {
  const parsed = TaskTemplateSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return validationError(`Invalid template: ${issue.message}`, issue.path.join("."));
  }
  const t = parsed.data;

  const seen = new Set<string>();
  for (const p of t.params) {
    if (seen.has(p)) return validationError(`Duplicate parameter ${p} in ${t.name}`, "params");
    seen.add(p);
  }

  for (const [field, text] of [["instructions", t.instructions], ["systemPrompt", t.systemPrompt ?? ""]] as const) {
    for (const name of placeholders(text)) {
      if (!IDENTIFIER.test(name)) {
        return validationError(`Placeholder {{${name}}} in ${t.name} is not a parameter name`, field);
      }
      if (!seen.has(name)) {
        return validationError(`Placeholder {{${name}}} in ${t.name} is not a declared parameter`, field);
      }
    }
  }

  const isLoop = t.type === "director_evaluator_loop";
  if (isLoop && !t.loop) {
    return validationError(`${t.name}: director_evaluator_loop templates need a loop spec`, "loop");
  }
  if (!isLoop && t.loop) {
    return validationError(`${t.name}: only director_evaluator_loop templates take a loop spec`, "loop");
  }
  if (t.loop?.terminationCondition !== undefined) {
    const cond = parse(t.loop.terminationCondition);
    if (isFail(cond)) {
      return validationError(`${t.name}: termination condition does not parse: ${cond.failure.message}`, "loop.terminationCondition");
    }
  }

  const cm = resolveContextManagement(t.type, t.contextManagement);
  if (isFail(cm)) {
    return validationError(`${t.name}: ${cm.failure.message}`, "contextManagement");
  }
  return done(t);
}

export class TemplateRegistry {
  private templates = new Map<string, TaskTemplate>();
  private byType = new Map<string, string[]>();
  private readonly logger: Logger;

  constructor(opts: { logger?: Logger } = {}) {
    this.logger = opts.logger ?? silentLogger();
  }

  /** Validate and store. A name collision overwrites the old template with a warning. */
  register(template: unknown): Outcome<TaskTemplate> {
    const v = validateTemplate(template);
    if (isFail(v)) {
      this.logger.warn({ error: v.failure.message }, "template rejected");
      return v;
    }
    const t = v.value;
    if (this.templates.has(t.name)) {
      this.logger.warn({ template: t.name }, `overwriting template ${t.name}`);
      this.unregister(t.name);
    }
    this.templates.set(t.name, t);
    const key = typeKey(t.type, t.subtype);
    this.byType.set(key, [...(this.byType.get(key) ?? []), t.name]);
    this.logger.debug({ template: t.name, type: t.type }, "template registered");
    return done(t);
  }

  find(name: string): TaskTemplate | undefined {
    return this.templates.get(name);
  }

  has(name: string): boolean {
    return this.templates.has(name);
  }

  /** Most recently registered template of a type (and subtype, when given). */
  findByType(type: TaskType, subtype?: string): TaskTemplate | undefined {
    const names = this.byType.get(typeKey(type, subtype));
    const last = names?.[names.length - 1];
    return last === undefined ? undefined : this.templates.get(last);
  }

  unregister(name: string): boolean {
    const t = this.templates.get(name);
    if (!t) return false;
    this.templates.delete(name);
    const key = typeKey(t.type, t.subtype);
    const rest = (this.byType.get(key) ?? []).filter((n) => n !== name);
    if (rest.length > 0) this.byType.set(key, rest);
    else this.byType.delete(key);
    return true;
  }

  list(): string[] {
    return Array.from(this.templates.keys());
  }
}

function typeKey(type: TaskType, subtype?: string): string {
  return subtype ? `${type}:${subtype}` : type;
}
