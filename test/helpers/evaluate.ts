// test/helpers/evaluate.ts

import { rootContext, type EvalContext } from "../../src/core/eval/context";
import type { Value } from "../../src/core/eval/values";
import type { Outcome } from "../../src/outcome";
import { makeHarness } from "./harness";

type Harness = ReturnType<typeof makeHarness>;

/** Evaluate in a fresh child of the harness base environment. */
export function evaluator(h: Harness = makeHarness()) {
  const env = h.baseEnv.extend();
  return (src: string, ctx: EvalContext = rootContext()): Promise<Outcome<Value>> =>
    h.evaluator.evaluateSource(src, env, ctx);
}
