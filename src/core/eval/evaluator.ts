// src/core/eval/evaluator.ts
// Recursive interpreter: special-form dispatch, argument evaluation, application.

import type { Logger } from "pino";
import type { Outcome } from "../../outcome";
import {
  arityError,
  done,
  isFail,
  mapOutcome,
  parameterError,
  structural,
  syntaxError,
  taskFailure,
} from "../../outcome";
import { silentLogger } from "../../adapters/logging";
import type { Handler } from "../../ports/handler";
import type { ContextRetrievalPort } from "../../ports/retrieval";
import { isKeyword, keywordName, showNode, type List, type Node } from "../reader/ast";
import { parse } from "../reader/parse";
import type { TemplateRegistry } from "../tasks/registry";
import {
  ContextManagementOverrideSchema,
  type SubtaskRequest,
  type TaskResult,
} from "../tasks/types";
import { executeTool } from "../tools/registry";
import type { EvalContext } from "./context";
import type { Environment } from "./env";
import { SPECIAL_FORMS } from "./specialForms";
import {
  display,
  isCallable,
  isList,
  isRecord,
  resultVal,
  symbolVal,
  toPlain,
  type Closure,
  type ResolvedTarget,
  type TemplateRef,
  type ToolRef,
  type Value,
} from "./values";

/**
 * Receives template applications. Implemented by the subtask controller,
 * attached after construction because the controller itself evaluates DSL
 * (loop termination conditions).
 */
export interface TaskDispatcher {
  spawn(request: SubtaskRequest, ctx: EvalContext): Promise<Outcome<TaskResult>>;
}

export interface EvaluatorOptions {
  registry: TemplateRegistry;
  handler: Handler;
  retrieval?: ContextRetrievalPort;
  /** Maximum `map` items in flight; 1 evaluates items strictly in order. */
  mapConcurrency?: number;
  logger?: Logger;
}

/** Keyword arguments with a fixed meaning in template calls. */
const RESERVED_KEYWORDS = new Set(["files", "context", "max_depth", "description"]);

/**
 * Evaluated arguments. `ordered` keeps call order with keywords as symbol
 * values; primitives receive that view.
 */
export type Args = { positional: Value[]; named: Map<string, Value>; ordered: Value[] };

/** Value handed to a template as an input: task results contribute their content. */
export function toInput(v: Value): unknown {
  if (typeof v === "object" && v !== null && !Array.isArray(v) && v.tag === "Result") {
    return v.result.content;
  }
  return toPlain(v);
}

export class Evaluator {
  readonly registry: TemplateRegistry;
  readonly handler: Handler;
  readonly retrieval?: ContextRetrievalPort;
  readonly mapConcurrency: number;
  readonly logger: Logger;
  private dispatcher?: TaskDispatcher;

  constructor(opts: EvaluatorOptions) {
    this.registry = opts.registry;
    this.handler = opts.handler;
    this.retrieval = opts.retrieval;
    this.mapConcurrency = Math.max(1, opts.mapConcurrency ?? 4);
    this.logger = opts.logger ?? silentLogger();
  }

  attachDispatcher(dispatcher: TaskDispatcher): void {
    this.dispatcher = dispatcher;
  }

  /** Parse and evaluate every top-level form; the last value is the result. */
  async evaluateSource(src: string, env: Environment, ctx: EvalContext): Promise<Outcome<Value>> {
    const nodes = parse(src);
    if (isFail(nodes)) return nodes;
    return this.evalSequence(nodes.value, env, ctx);
  }

  async evalSequence(nodes: readonly Node[], env: Environment, ctx: EvalContext): Promise<Outcome<Value>> {
    let last: Value = null;
    for (const node of nodes) {
      const r = await this.eval(node, env, ctx);
      if (isFail(r)) return r;
      last = r.value;
    }
    return done(last);
  }

  async eval(node: Node, env: Environment, ctx: EvalContext): Promise<Outcome<Value>> {
    switch (node.tag) {
      case "Lit":
        return done(node.value);
      case "Sym":
        if (isKeyword(node)) return done(symbolVal(node.name));
        return this.resolveSymbol(node.name, env);
      case "List":
        return this.evalList(node, env, ctx);
    }
  }

  /**
   * Environment first, then registered templates, then direct tools. Names
   * resolve once to a tagged reference.
   */
  resolveSymbol(name: string, env: Environment): Outcome<Value> {
    const bound = env.tryLookup(name);
    if (bound !== undefined) return done(bound);
    const template = this.registry.find(name);
    if (template) return done<TemplateRef>({ tag: "TemplateRef", name, template });
    const tool = this.handler.findDirectTool(name);
    if (tool) return done<ToolRef>({ tag: "ToolRef", name, tool });
    return env.lookup(name);
  }

  private async evalList(node: List, env: Environment, ctx: EvalContext): Promise<Outcome<Value>> {
    const [head, ...rest] = node.items;
    if (head === undefined) return done([]);

    if (head.tag === "Sym") {
      const form = SPECIAL_FORMS.get(head.name);
      if (form && env.tryLookup(head.name) === undefined) {
        return form(this, rest, env, ctx, node);
      }
    }

    const target = await this.eval(head, env, ctx);
    if (isFail(target)) return target;
    if (!isCallable(target.value)) {
      return structural("NOT_CALLABLE", `Not callable: ${display(target.value)} in ${showNode(node)}`, {
        offset: node.offset,
      });
    }

    const args = await this.evalArgs(rest, env, ctx);
    if (isFail(args)) return args;
    return this.apply(target.value, args.value, ctx);
  }

  /** Left to right, in the caller's environment. `:name expr` pairs become named arguments. */
  async evalArgs(nodes: readonly Node[], env: Environment, ctx: EvalContext): Promise<Outcome<Args>> {
    const positional: Value[] = [];
    const named = new Map<string, Value>();
    const ordered: Value[] = [];
    for (let i = 0; i < nodes.length; i++) {
      const n = nodes[i];
      if (isKeyword(n)) {
        const valueNode = nodes[i + 1];
        if (valueNode === undefined) {
          return syntaxError(`keyword ${n.name} has no value`, n.offset ?? 0);
        }
        const v = await this.eval(valueNode, env, ctx);
        if (isFail(v)) return v;
        named.set(keywordName(n), v.value);
        ordered.push(symbolVal(n.name), v.value);
        i++;
        continue;
      }
      const v = await this.eval(n, env, ctx);
      if (isFail(v)) return v;
      positional.push(v.value);
      ordered.push(v.value);
    }
    return done({ positional, named, ordered });
  }

  async apply(target: ResolvedTarget, args: Args, ctx: EvalContext): Promise<Outcome<Value>> {
    switch (target.tag) {
      case "Closure":
        return this.applyClosure(target, args, ctx);
      case "Prim": {
        const n = args.ordered.length;
        if (target.variadic ? n < target.arity : n !== target.arity) {
          return arityError(target.name, target.variadic ? `at least ${target.arity}` : target.arity, n);
        }
        return target.fn(args.ordered);
      }
      case "TemplateRef":
        return this.applyTemplate(target, args, ctx);
      case "ToolRef": {
        const named: Record<string, unknown> = {};
        for (const [k, v] of args.named) named[k] = toPlain(v);
        const r = await executeTool(target.name, target.tool, {
          args: args.positional.map(toPlain),
          named,
        });
        return mapOutcome(r, resultVal);
      }
    }
  }

  private async applyClosure(c: Closure, args: Args, ctx: EvalContext): Promise<Outcome<Value>> {
    const name = c.name ?? "lambda";
    if (args.named.size > 0) {
      return parameterError(`${name} does not take named arguments`);
    }
    if (args.positional.length !== c.params.length) {
      return arityError(name, c.params.length, args.positional.length);
    }
    const frame = c.env.extend(c.params.map((p, i): [string, Value] => [p, args.positional[i]]));
    return this.evalSequence(c.body, frame, ctx);
  }

  private async applyTemplate(ref: TemplateRef, args: Args, ctx: EvalContext): Promise<Outcome<Value>> {
    const request = this.buildRequest(ref, args);
    if (isFail(request)) return request;
    if (!this.dispatcher) {
      return taskFailure("unexpected_error", `No task dispatcher attached; cannot run ${ref.name}`);
    }
    const r = await this.dispatcher.spawn(request.value, ctx);
    return mapOutcome(r, resultVal);
  }

  /** Positional arguments fill declared params in order; keywords bind by name. */
  buildRequest(ref: TemplateRef, args: Args): Outcome<SubtaskRequest> {
    const { template } = ref;
    if (args.positional.length > template.params.length) {
      return arityError(ref.name, template.params.length, args.positional.length);
    }
    const inputs: Record<string, unknown> = {};
    args.positional.forEach((v, i) => {
      inputs[template.params[i]] = toInput(v);
    });

    const request: SubtaskRequest = { type: template.type, name: ref.name, inputs };
    for (const [key, v] of args.named) {
      if (!RESERVED_KEYWORDS.has(key)) {
        if (!template.params.includes(key)) {
          return parameterError(`${ref.name} has no parameter named ${key}`, { parameter: key });
        }
        if (key in inputs) {
          return parameterError(`${ref.name}: parameter ${key} given twice`, { parameter: key });
        }
        inputs[key] = toInput(v);
        continue;
      }
      switch (key) {
        case "files": {
          if (!isList(v) || !v.every((p): p is string => typeof p === "string")) {
            return parameterError(`${ref.name}: :files must be a list of strings`);
          }
          request.file_paths = v;
          break;
        }
        case "context": {
          if (!isRecord(v)) {
            return parameterError(`${ref.name}: :context must be a record built with dict`);
          }
          const parsed = ContextManagementOverrideSchema.safeParse(toPlain(v));
          if (!parsed.success) {
            return parameterError(`${ref.name}: invalid :context: ${parsed.error.issues.map((i) => i.message).join("; ")}`);
          }
          request.context_management = parsed.data;
          break;
        }
        case "max_depth": {
          if (typeof v !== "number" || !Number.isInteger(v) || v < 1) {
            return parameterError(`${ref.name}: :max_depth must be a positive integer`);
          }
          request.max_depth = v;
          break;
        }
        case "description":
          request.description = display(v);
          break;
      }
    }
    return done(request);
  }
}
