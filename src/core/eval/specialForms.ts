// src/core/eval/specialForms.ts
// Forms whose arguments are interpreted structurally rather than evaluated eagerly.

import type { Outcome } from "../../outcome";
import { done, isFail, structural, syntaxError, taskFailure, wrapFailure, type TaskError } from "../../outcome";
import { isKeyword, isSym, keywordName, showNode, type List, type Node } from "../reader/ast";
import { ContextGenerationInputSchema, type RetrievalResult, type TaskTemplate } from "../tasks/types";
import { withHalt, type EvalContext } from "./context";
import type { Environment } from "./env";
import type { Evaluator } from "./evaluator";
import { runPool } from "./mapPool";
import {
  display,
  isCallable,
  isList,
  isTruthy,
  symbolVal,
  toPlain,
  type Closure,
  type ResolvedTarget,
  type Value,
} from "./values";

export type SpecialForm = (
  ev: Evaluator,
  args: Node[],
  env: Environment,
  ctx: EvalContext,
  whole: List
) => Promise<Outcome<Value>>;

function malformed(whole: List, expected: string): Outcome<never> {
  return syntaxError(`malformed ${showNode(whole.items[0])}: expected ${expected}, got ${showNode(whole)}`, whole.offset ?? 0);
}

/** Quoted data: symbols stay symbols, lists become lists. */
export function nodeToValue(n: Node): Value {
  switch (n.tag) {
    case "Lit":
      return n.value;
    case "Sym":
      return symbolVal(n.name);
    case "List":
      return n.items.map(nodeToValue);
  }
}

function paramNames(n: Node): string[] | undefined {
  if (n.tag !== "List") return undefined;
  const names: string[] = [];
  for (const p of n.items) {
    if (p.tag !== "Sym" || isKeyword(p) || names.includes(p.name)) return undefined;
    names.push(p.name);
  }
  return names;
}

// ─────────────────────────────────────────────────────────────────
// Binding forms
// ─────────────────────────────────────────────────────────────────

const lambdaForm: SpecialForm = async (_ev, args, env, _ctx, whole) => {
  const [params, ...body] = args;
  const names = params === undefined ? undefined : paramNames(params);
  if (names === undefined || body.length === 0) {
    return malformed(whole, "(lambda (params...) body...)");
  }
  const closure: Closure = { tag: "Closure", params: names, body, env };
  return done(closure);
};

const defineForm: SpecialForm = async (ev, args, env, ctx, whole) => {
  const [target, ...rest] = args;
  if (target === undefined) return malformed(whole, "(define name expr)");

  // (define (f a b) body...)
  if (target.tag === "List") {
    const [fname, ...params] = target.items;
    const names = paramNames({ tag: "List", items: params });
    if (fname === undefined || fname.tag !== "Sym" || names === undefined || rest.length === 0) {
      return malformed(whole, "(define (name params...) body...)");
    }
    const closure: Closure = { tag: "Closure", params: names, body: rest, env, name: fname.name };
    env.define(fname.name, closure);
    return done(closure);
  }

  if (target.tag !== "Sym" || rest.length !== 1) {
    return malformed(whole, "(define name expr)");
  }
  const v = await ev.eval(rest[0], env, ctx);
  if (isFail(v)) return v;
  const value = v.value;
  if (typeof value === "object" && value !== null && !Array.isArray(value) && value.tag === "Closure" && !value.name) {
    value.name = target.name;
  }
  env.define(target.name, value);
  return done(value);
};

const letForm: SpecialForm = async (ev, args, env, ctx, whole) => {
  const [bindings, ...body] = args;
  if (bindings === undefined || bindings.tag !== "List" || body.length === 0) {
    return malformed(whole, "(let ((name expr)...) body...)");
  }
  const values: [string, Value][] = [];
  for (const b of bindings.items) {
    const [name, expr] = b.tag === "List" && b.items.length === 2 ? b.items : [];
    if (name === undefined || name.tag !== "Sym" || expr === undefined) {
      return malformed(whole, "(let ((name expr)...) body...)");
    }
    // evaluated in the outer environment
    const v = await ev.eval(expr, env, ctx);
    if (isFail(v)) return v;
    values.push([name.name, v.value]);
  }
  return ev.evalSequence(body, env.extend(values), ctx);
};

// ─────────────────────────────────────────────────────────────────
// Control
// ─────────────────────────────────────────────────────────────────

const ifForm: SpecialForm = async (ev, args, env, ctx, whole) => {
  if (args.length < 2 || args.length > 3) return malformed(whole, "(if test then [else])");
  const test = await ev.eval(args[0], env, ctx);
  if (isFail(test)) return test;
  if (isTruthy(test.value)) return ev.eval(args[1], env, ctx);
  return args[2] === undefined ? done(null) : ev.eval(args[2], env, ctx);
};

const condForm: SpecialForm = async (ev, args, env, ctx, whole) => {
  for (const clause of args) {
    if (clause.tag !== "List" || clause.items.length === 0) {
      return malformed(whole, "(cond (test expr...)... [(else expr...)])");
    }
    const [test, ...body] = clause.items;
    let taken: boolean;
    let testValue: Value = true;
    if (isSym(test, "else")) {
      taken = true;
    } else {
      const t = await ev.eval(test, env, ctx);
      if (isFail(t)) return t;
      testValue = t.value;
      taken = isTruthy(t.value);
    }
    if (taken) {
      return body.length === 0 ? done(testValue) : ev.evalSequence(body, env, ctx);
    }
  }
  return done(null);
};

const andForm: SpecialForm = async (ev, args, env, ctx) => {
  let last: Value = true;
  for (const a of args) {
    const v = await ev.eval(a, env, ctx);
    if (isFail(v)) return v;
    last = v.value;
    if (!isTruthy(last)) return done(last);
  }
  return done(last);
};

const orForm: SpecialForm = async (ev, args, env, ctx) => {
  let last: Value = false;
  for (const a of args) {
    const v = await ev.eval(a, env, ctx);
    if (isFail(v)) return v;
    last = v.value;
    if (isTruthy(last)) return done(last);
  }
  return done(last);
};

const prognForm: SpecialForm = (ev, args, env, ctx) => ev.evalSequence(args, env, ctx);

// ─────────────────────────────────────────────────────────────────
// Data
// ─────────────────────────────────────────────────────────────────

const quoteForm: SpecialForm = async (_ev, args, _env, _ctx, whole) => {
  if (args.length !== 1) return malformed(whole, "(quote datum)");
  return done(nodeToValue(args[0]));
};

const listForm: SpecialForm = async (ev, args, env, ctx) => {
  const out: Value[] = [];
  for (const a of args) {
    const v = await ev.eval(a, env, ctx);
    if (isFail(v)) return v;
    out.push(v.value);
  }
  return done(out);
};

// ─────────────────────────────────────────────────────────────────
// map
// ─────────────────────────────────────────────────────────────────

function mapItemFailure(inner: TaskError, index: number): TaskError {
  switch (inner.type) {
    case "RESOURCE_EXHAUSTION":
      return { ...inner, details: { ...inner.details, failingIndex: index } };
    case "TASK_FAILURE":
      return {
        ...inner,
        message: `map item ${index} failed: ${inner.message}`,
        details: { ...inner.details, failingIndex: index },
      };
    default:
      return wrapFailure(inner, `map item ${index} failed: ${inner.message}`, { failingIndex: index });
  }
}

/** A named function or a `lambda` form; anything else is an expression over `item`. */
function isFunctionExpr(n: Node): boolean {
  if (n.tag === "Sym") return n.name !== "item" && !isKeyword(n);
  return n.tag === "List" && n.items[0] !== undefined && isSym(n.items[0], "lambda");
}

const mapForm: SpecialForm = async (ev, args, env, ctx, whole) => {
  if (args.length !== 2) return malformed(whole, "(map expr list)");
  const [expr, listExpr] = args;
  const xs = await ev.eval(listExpr, env, ctx);
  if (isFail(xs)) return xs;
  if (!isList(xs.value)) {
    return structural("TYPE", `map: expected a list, got ${display(xs.value)}`, { offset: whole.offset });
  }

  let callee: ResolvedTarget | undefined;
  if (isFunctionExpr(expr)) {
    const f = await ev.eval(expr, env, ctx);
    if (isFail(f)) return f;
    if (isCallable(f.value)) callee = f.value;
  }

  const halt = ctx.halt.child();
  const itemCtx = withHalt(ctx, halt);
  const result = await runPool(
    xs.value,
    ev.mapConcurrency,
    async (item) =>
      callee
        ? ev.apply(callee, { positional: [item], named: new Map(), ordered: [item] }, itemCtx)
        : ev.eval(expr, env.extend([["item", item]]), itemCtx),
    halt
  );
  if (!result.ok) {
    ev.logger.debug({ failingIndex: result.index }, "map aborted");
    return { ...result.failure, failure: mapItemFailure(result.failure.failure, result.index) };
  }
  return done(result.values);
};

// ─────────────────────────────────────────────────────────────────
// get_context
// ─────────────────────────────────────────────────────────────────

const CONTEXT_KEYS: Record<string, string> = {
  query: "query",
  inputs: "inputs",
  template_description: "templateDescription",
  templateDescription: "templateDescription",
  template_type: "templateType",
  templateType: "templateType",
  template_subtype: "templateSubtype",
  templateSubtype: "templateSubtype",
  inherited_context: "inheritedContext",
  inheritedContext: "inheritedContext",
  previous_outputs: "previousOutputs",
  previousOutputs: "previousOutputs",
};

/** Accepts `:key expr` pairs or `(key expr)` lists. */
const getContextForm: SpecialForm = async (ev, args, env, ctx, whole) => {
  const pairs: [string, Node][] = [];
  for (let i = 0; i < args.length; i++) {
    const a = args[i];
    const [key, expr] = a.tag === "List" && a.items.length === 2 ? a.items : [];
    if (isKeyword(a) && args[i + 1] !== undefined) {
      pairs.push([keywordName(a), args[i + 1]]);
      i++;
    } else if (key !== undefined && key.tag === "Sym" && expr !== undefined) {
      pairs.push([key.name, expr]);
    } else {
      return malformed(whole, "(get_context :key expr ...) or (get_context (key expr) ...)");
    }
  }

  const fields: Record<string, unknown> = {};
  for (const [key, node] of pairs) {
    const field = CONTEXT_KEYS[key];
    if (field === undefined) {
      return taskFailure("input_validation_failure", `get_context: unknown field ${key}`, {
        details: { code: "PARAMETER", field: key },
      });
    }
    const v = await ev.eval(node, env, ctx);
    if (isFail(v)) return v;
    fields[field] = toPlain(v.value);
  }

  const input = ContextGenerationInputSchema.safeParse(fields);
  if (!input.success) {
    return taskFailure("input_validation_failure", `get_context: ${input.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ")}`);
  }
  if (!ev.retrieval) {
    return taskFailure("context_retrieval_failure", "get_context: no context retrieval service configured");
  }

  let res: RetrievalResult;
  try {
    res = await ev.retrieval.getRelevantContextFor(input.data);
  } catch (e) {
    return taskFailure("context_retrieval_failure", `get_context: ${e instanceof Error ? e.message : String(e)}`);
  }
  if (res.error) {
    return taskFailure("context_retrieval_failure", `get_context: ${res.error}`);
  }
  return done(res.matches.map((m) => m.path));
};

// ─────────────────────────────────────────────────────────────────
// defatom
// ─────────────────────────────────────────────────────────────────

const DEFATOM_OPTIONS: Record<string, keyof TaskTemplate> = {
  subtype: "subtype",
  description: "description",
  model: "model",
  system: "systemPrompt",
};

/**
 * (defatom name (params (p)...) (instructions "...") [(description "...")]
 *   [(subtype "...")] [(model "...")] [(system "...")] [(output_format "json")])
 */
const defatomForm: SpecialForm = async (ev, args, _env, _ctx, whole) => {
  const [nameNode, paramsNode, instrNode, ...opts] = args;
  const usage = "(defatom name (params (p)...) (instructions \"...\") options...)";
  if (
    nameNode === undefined || nameNode.tag !== "Sym" ||
    paramsNode === undefined || paramsNode.tag !== "List" ||
    paramsNode.items[0] === undefined || !isSym(paramsNode.items[0], "params") ||
    instrNode === undefined || instrNode.tag !== "List" || instrNode.items.length !== 2 ||
    !isSym(instrNode.items[0], "instructions")
  ) {
    return malformed(whole, usage);
  }
  const instructions = instrNode.items[1];
  if (instructions.tag !== "Lit" || typeof instructions.value !== "string") {
    return malformed(whole, usage);
  }

  const params: string[] = [];
  for (const p of paramsNode.items.slice(1)) {
    const name = p.tag === "List" ? p.items[0] : p;
    if (name === undefined || name.tag !== "Sym") return malformed(whole, usage);
    params.push(name.name);
  }

  const template: TaskTemplate = {
    name: nameNode.name,
    type: "atomic",
    instructions: instructions.value,
    params,
  };
  for (const opt of opts) {
    const [key, valueNode] = opt.tag === "List" && opt.items.length === 2 ? opt.items : [];
    if (
      key === undefined || key.tag !== "Sym" ||
      valueNode === undefined || valueNode.tag !== "Lit" || typeof valueNode.value !== "string"
    ) {
      return malformed(whole, usage);
    }
    if (key.name === "output_format") {
      if (valueNode.value !== "json" && valueNode.value !== "text") return malformed(whole, usage);
      template.outputFormat = { type: valueNode.value };
      continue;
    }
    const field = DEFATOM_OPTIONS[key.name];
    if (field === undefined) {
      return taskFailure("input_validation_failure", `defatom: unknown option ${key.name}`, {
        details: { code: "PARAMETER" },
      });
    }
    if (field === "subtype") template.subtype = valueNode.value;
    else if (field === "description") template.description = valueNode.value;
    else if (field === "model") template.model = valueNode.value;
    else template.systemPrompt = valueNode.value;
  }

  const registered = ev.registry.register(template);
  if (isFail(registered)) return registered;
  return done(symbolVal(template.name));
};

export const SPECIAL_FORMS: ReadonlyMap<string, SpecialForm> = new Map<string, SpecialForm>([
  ["lambda", lambdaForm],
  ["define", defineForm],
  ["if", ifForm],
  ["cond", condForm],
  ["let", letForm],
  ["quote", quoteForm],
  ["map", mapForm],
  ["get_context", getContextForm],
  ["list", listForm],
  ["and", andForm],
  ["or", orForm],
  ["progn", prognForm],
  ["begin", prognForm],
  ["defatom", defatomForm],
]);
