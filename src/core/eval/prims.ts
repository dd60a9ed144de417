// src/core/eval/prims.ts
// Standard library bound in the base environment.

import type { Outcome } from "../../outcome";
import { done, isFail, mapOutcome, typeError, taskFailure } from "../../outcome";
import { Environment } from "./env";
import {
  display,
  fromPlain,
  isList,
  isRecord,
  isResult,
  isTruthy,
  recordVal,
  valueEquals,
  type Prim,
  type RecordVal,
  type ResultVal,
  type Value,
} from "./values";

function makePrim(
  name: string,
  arity: number,
  fn: (args: Value[]) => Outcome<Value>,
  variadic = false
): Prim {
  return { tag: "Prim", name, arity, variadic, fn };
}

// ─────────────────────────────────────────────────────────────────
// Argument coercion
// ─────────────────────────────────────────────────────────────────

function numbers(name: string, args: Value[]): Outcome<number[]> {
  const out: number[] = [];
  for (const [i, a] of args.entries()) {
    if (typeof a !== "number") {
      return typeError(`${name}: argument ${i + 1} is not a number: ${display(a)}`);
    }
    out.push(a);
  }
  return done(out);
}

function listArg(name: string, v: Value): Outcome<Value[]> {
  if (v === null) return done([]);
  return isList(v) ? done(v) : typeError(`${name}: expected a list, got ${display(v)}`);
}

function stringArg(name: string, v: Value): Outcome<string> {
  return typeof v === "string" ? done(v) : typeError(`${name}: expected a string, got ${display(v)}`);
}

function recordArg(name: string, v: Value): Outcome<RecordVal> {
  return isRecord(v) ? done(v) : typeError(`${name}: expected a record, got ${display(v)}`);
}

function resultArg(name: string, v: Value): Outcome<ResultVal> {
  return isResult(v) ? done(v) : typeError(`${name}: expected a task result, got ${display(v)}`);
}

function keyArg(name: string, v: Value): Outcome<string> {
  if (typeof v === "string") return done(v);
  if (typeof v === "object" && v !== null && !Array.isArray(v) && v.tag === "Symbol") {
    return done(v.name.startsWith(":") ? v.name.slice(1) : v.name);
  }
  return typeError(`${name}: keys must be strings or symbols, got ${display(v)}`);
}

/** Own properties only; inherited names such as `constructor` read as nil. */
function ownField(fields: Record<string, unknown>, key: string): Value {
  return Object.prototype.hasOwnProperty.call(fields, key) ? fromPlain(fields[key]) : null;
}

// ─────────────────────────────────────────────────────────────────
// Arithmetic and comparison
// ─────────────────────────────────────────────────────────────────

function arith(name: string, unit: number, op: (a: number, b: number) => number, unary?: (a: number) => number): Prim {
  return makePrim(
    name,
    unary ? 1 : 0,
    (args) => {
      const ns = numbers(name, args);
      if (isFail(ns)) return ns;
      const [first, ...rest] = ns.value;
      if (first === undefined) return done(unit);
      if (rest.length === 0 && unary) return done(unary(first));
      return done(rest.reduce(op, first));
    },
    true
  );
}

const primDiv = makePrim(
  "/",
  2,
  (args) => {
    const ns = numbers("/", args);
    if (isFail(ns)) return ns;
    const [first, ...rest] = ns.value;
    if (rest.some((x) => x === 0)) {
      return taskFailure("unexpected_error", "/: division by zero", { details: { code: "TYPE" } });
    }
    return done(rest.reduce((a, b) => a / b, first));
  },
  true
);

function compare(name: string, ok: (a: number, b: number) => boolean): Prim {
  return makePrim(
    name,
    2,
    (args) => {
      const ns = numbers(name, args);
      if (isFail(ns)) return ns;
      for (let i = 0; i < ns.value.length - 1; i++) {
        if (!ok(ns.value[i], ns.value[i + 1])) return done(false);
      }
      return done(true);
    },
    true
  );
}

// ─────────────────────────────────────────────────────────────────
// Table
// ─────────────────────────────────────────────────────────────────

const PRIMS: Prim[] = [
  arith("+", 0, (a, b) => a + b),
  arith("-", 0, (a, b) => a - b, (a) => -a),
  arith("*", 1, (a, b) => a * b),
  primDiv,
  makePrim("mod", 2, ([a, b]) => {
    const ns = numbers("mod", [a, b]);
    if (isFail(ns)) return ns;
    return ns.value[1] === 0
      ? taskFailure("unexpected_error", "mod: division by zero", { details: { code: "TYPE" } })
      : done(ns.value[0] % ns.value[1]);
  }),
  compare("=", (a, b) => a === b),
  compare("<", (a, b) => a < b),
  compare(">", (a, b) => a > b),
  compare("<=", (a, b) => a <= b),
  compare(">=", (a, b) => a >= b),
  makePrim("not", 1, ([a]) => done(!isTruthy(a))),
  makePrim("eq?", 2, ([a, b]) => done(a === b || (!isList(a) && !isRecord(a) && valueEquals(a, b)))),
  makePrim("equal?", 2, ([a, b]) => done(valueEquals(a, b))),

  // lists
  makePrim("first", 1, ([xs]) => {
    const l = listArg("first", xs);
    if (isFail(l)) return l;
    return done(l.value[0] ?? null);
  }),
  makePrim("rest", 1, ([xs]) => {
    const l = listArg("rest", xs);
    if (isFail(l)) return l;
    return done(l.value.slice(1));
  }),
  makePrim("cons", 2, ([x, xs]) => {
    const l = listArg("cons", xs);
    if (isFail(l)) return l;
    return done([x, ...l.value]);
  }),
  makePrim("nth", 2, ([xs, n]) => {
    const l = listArg("nth", xs);
    if (isFail(l)) return l;
    if (typeof n !== "number" || !Number.isInteger(n)) return typeError(`nth: index must be an integer, got ${display(n)}`);
    return done(l.value[n] ?? null);
  }),
  makePrim("length", 1, ([xs]) => {
    if (typeof xs === "string") return done(xs.length);
    const l = listArg("length", xs);
    if (isFail(l)) return l;
    return done(l.value.length);
  }),
  makePrim(
    "append",
    0,
    (args) => {
      const out: Value[] = [];
      for (const a of args) {
        const l = listArg("append", a);
        if (isFail(l)) return l;
        out.push(...l.value);
      }
      return done(out);
    },
    true
  ),
  makePrim("reverse", 1, ([xs]) => {
    const l = listArg("reverse", xs);
    if (isFail(l)) return l;
    return done(l.value.slice().reverse());
  }),
  makePrim("null?", 1, ([x]) => done(x === null || (isList(x) && x.length === 0))),
  makePrim("list?", 1, ([x]) => done(isList(x))),

  // strings
  makePrim("concat", 0, (args) => done(args.map(display).join("")), true),
  makePrim("to-string", 1, ([x]) => done(display(x))),
  makePrim("string-length", 1, ([s]) => {
    const str = stringArg("string-length", s);
    return mapOutcome(str, (x) => x.length);
  }),
  makePrim("upper", 1, ([s]) => {
    const str = stringArg("upper", s);
    return mapOutcome(str, (x) => x.toUpperCase());
  }),
  makePrim("lower", 1, ([s]) => {
    const str = stringArg("lower", s);
    return mapOutcome(str, (x) => x.toLowerCase());
  }),
  makePrim("string-contains?", 2, ([s, part]) => {
    const str = stringArg("string-contains?", s);
    if (isFail(str)) return str;
    const p = stringArg("string-contains?", part);
    return mapOutcome(p, (needle) => str.value.includes(needle));
  }),

  // records
  makePrim(
    "dict",
    0,
    (args) => {
      if (args.length % 2 !== 0) return typeError("dict: expected key/value pairs");
      const entries: [string, Value][] = [];
      for (let i = 0; i < args.length; i += 2) {
        const k = keyArg("dict", args[i]);
        if (isFail(k)) return k;
        entries.push([k.value, args[i + 1]]);
      }
      return done(recordVal(entries));
    },
    true
  ),
  makePrim("get", 2, ([r, key]) => {
    if (isResult(r)) {
      const k = keyArg("get", key);
      if (isFail(k)) return k;
      const fields: Record<string, unknown> = { ...r.result };
      return done(ownField(fields, k.value));
    }
    const rec = recordArg("get", r);
    if (isFail(rec)) return rec;
    const k = keyArg("get", key);
    if (isFail(k)) return k;
    return done(rec.value.entries.get(k.value) ?? null);
  }),
  makePrim("keys", 1, ([r]) => {
    const rec = recordArg("keys", r);
    return mapOutcome(rec, (record) => Array.from(record.entries.keys()));
  }),
  makePrim("has?", 2, ([r, key]) => {
    const rec = recordArg("has?", r);
    if (isFail(rec)) return rec;
    const k = keyArg("has?", key);
    return mapOutcome(k, (name) => rec.value.entries.has(name));
  }),

  // task results
  makePrim("result-content", 1, ([r]) => {
    const res = resultArg("result-content", r);
    return mapOutcome(res, (x) => x.result.content);
  }),
  makePrim("result-status", 1, ([r]) => {
    const res = resultArg("result-status", r);
    return mapOutcome(res, (x) => x.result.status);
  }),
  makePrim("result-parsed", 1, ([r]) => {
    const res = resultArg("result-parsed", r);
    return mapOutcome(res, (x) => fromPlain(x.result.parsedContent));
  }),
  makePrim("result-note", 2, ([r, key]) => {
    const res = resultArg("result-note", r);
    if (isFail(res)) return res;
    const k = keyArg("result-note", key);
    return mapOutcome(k, (name) => ownField(res.value.result.notes, name));
  }),
  makePrim("result-ok?", 1, ([r]) => {
    const res = resultArg("result-ok?", r);
    return mapOutcome(res, (x) => x.result.status === "COMPLETE");
  }),
];

export function primitives(): Prim[] {
  return PRIMS.slice();
}

/** Fresh base environment holding the standard library. */
export function makeBaseEnv(): Environment {
  const env = new Environment();
  for (const p of PRIMS) env.define(p.name, p);
  return env;
}
