// src/core/tasks/substitute.ts
// Literal {{name}} substitution. Nothing inside a placeholder is evaluated.

import type { Outcome } from "../../outcome";
import { done, parameterError } from "../../outcome";
import { IDENTIFIER } from "./types";

const PLACEHOLDER = /\{\{([^{}]*)\}\}/g;

/** Raw placeholder bodies in order of appearance, trimmed. */
export function placeholders(text: string): string[] {
  return Array.from(text.matchAll(PLACEHOLDER), (m) => m[1].trim());
}

export function renderInput(v: unknown): string {
  if (v === null || v === undefined) return "";
  if (typeof v === "string") return v;
  if (typeof v === "number" || typeof v === "boolean") return String(v);
  return JSON.stringify(v);
}

/**
 * Replace every `{{name}}` with `params[name]`. A placeholder that is not a
 * plain identifier (dotted paths, expressions) or names a key absent from
 * `params` is a PARAMETER error.
 */
export function substitute(text: string, params: Readonly<Record<string, unknown>>): Outcome<string> {
  for (const name of placeholders(text)) {
    if (!IDENTIFIER.test(name)) {
      return parameterError(`Placeholder {{${name}}} is not a parameter name`, { placeholder: name });
    }
    if (!Object.prototype.hasOwnProperty.call(params, name)) {
      return parameterError(`No value for placeholder {{${name}}}`, { placeholder: name });
    }
  }
  return done(text.replace(PLACEHOLDER, (_m, inner: string) => renderInput(params[inner.trim()])));
}
