// src/core/eval/values.ts
// Runtime values of the task language.

import type { Outcome } from "../../outcome";
import type { Node } from "../reader/ast";
import type { TaskResult, TaskTemplate } from "../tasks/types";
import type { DirectTool } from "../tools/registry";
import type { Environment } from "./env";

export type SymbolVal = { tag: "Symbol"; name: string };
export type RecordVal = { tag: "Record"; entries: Map<string, Value> };

export type Closure = {
  tag: "Closure";
  params: string[];
  body: Node[];
  env: Environment;
  name?: string;
};

export type Prim = {
  tag: "Prim";
  name: string;
  /** Exact arity, or minimum arity for variadic primitives. */
  arity: number;
  variadic?: boolean;
  fn: (args: Value[]) => Outcome<Value>;
};

export type TemplateRef = { tag: "TemplateRef"; name: string; template: TaskTemplate };
export type ToolRef = { tag: "ToolRef"; name: string; tool: DirectTool };
export type ResultVal = { tag: "Result"; result: TaskResult };

export type Value =
  | number
  | string
  | boolean
  | null
  | Value[]
  | SymbolVal
  | RecordVal
  | Closure
  | Prim
  | TemplateRef
  | ToolRef
  | ResultVal;

/** Callable targets, resolved once when the head of an application is evaluated. */
export type ResolvedTarget = Closure | Prim | TemplateRef | ToolRef;

type Tagged = Exclude<Value, number | string | boolean | null | Value[]>;

function isTagged(v: Value): v is Tagged {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

export const isList = (v: Value): v is Value[] => Array.isArray(v);
export const isRecord = (v: Value): v is RecordVal => isTagged(v) && v.tag === "Record";
export const isResult = (v: Value): v is ResultVal => isTagged(v) && v.tag === "Result";
export const isCallable = (v: Value): v is ResolvedTarget =>
  isTagged(v) && (v.tag === "Closure" || v.tag === "Prim" || v.tag === "TemplateRef" || v.tag === "ToolRef");

export const symbolVal = (name: string): SymbolVal => ({ tag: "Symbol", name });
export const recordVal = (entries: Iterable<[string, Value]> = []): RecordVal => ({
  tag: "Record",
  entries: new Map(entries),
});
export const resultVal = (result: TaskResult): ResultVal => ({ tag: "Result", result });

/** `#f`, nil and the empty list are false; everything else is true. */
export function isTruthy(v: Value): boolean {
  if (v === false || v === null) return false;
  if (Array.isArray(v) && v.length === 0) return false;
  return true;
}

export function display(v: Value): string {
  if (v === null) return "nil";
  if (typeof v === "boolean") return v ? "#t" : "#f";
  if (typeof v === "number") return String(v);
  if (typeof v === "string") return v;
  if (Array.isArray(v)) return `(${v.map(show).join(" ")})`;
  switch (v.tag) {
    case "Symbol":
      return v.name;
    case "Record":
      return `{${Array.from(v.entries, ([k, x]) => `${k}: ${show(x)}`).join(", ")}}`;
    case "Closure":
      return v.name ? `#<closure ${v.name}>` : "#<closure>";
    case "Prim":
      return `#<primitive ${v.name}>`;
    case "TemplateRef":
      return `#<template ${v.name}>`;
    case "ToolRef":
      return `#<tool ${v.name}>`;
    case "Result":
      return v.result.content;
  }
}

/** Like `display`, but strings are quoted. */
export function show(v: Value): string {
  return typeof v === "string" ? JSON.stringify(v) : display(v);
}

/**
 * Plain data view of a value for collaborators outside the evaluator
 * (tool arguments, subtask inputs, hashing).
 */
export function toPlain(v: Value): unknown {
  if (v === null || typeof v !== "object") return v;
  if (Array.isArray(v)) return v.map(toPlain);
  switch (v.tag) {
    case "Record": {
      const out: Record<string, unknown> = {};
      for (const [k, x] of v.entries) out[k] = toPlain(x);
      return out;
    }
    case "Result":
      return { ...v.result };
    default:
      return display(v);
  }
}

/** Inverse of `toPlain` for JSON-shaped data. */
export function fromPlain(x: unknown): Value {
  if (x === null || x === undefined) return null;
  if (typeof x === "number" || typeof x === "string" || typeof x === "boolean") return x;
  if (Array.isArray(x)) return x.map(fromPlain);
  if (typeof x === "object") {
    return recordVal(Object.entries(x).map(([k, y]): [string, Value] => [k, fromPlain(y)]));
  }
  return String(x);
}

export function valueEquals(a: Value, b: Value): boolean {
  if (a === b) return true;
  if (Array.isArray(a) && Array.isArray(b)) {
    return a.length === b.length && a.every((x, i) => valueEquals(x, b[i]));
  }
  if (isTagged(a) && isTagged(b)) {
    if (a.tag === "Symbol" && b.tag === "Symbol") return a.name === b.name;
    if (a.tag === "Record" && b.tag === "Record") {
      if (a.entries.size !== b.entries.size) return false;
      for (const [k, x] of a.entries) {
        const y = b.entries.get(k);
        if (y === undefined || !valueEquals(x, y)) return false;
      }
      return true;
    }
  }
  return false;
}
