// test/core/eval/mapPool.spec.ts
// Tests for the bounded map worker pool

import { describe, it, expect } from "vitest";
import { HaltSignal } from "../../../src/core/eval/context";
import { runPool } from "../../../src/core/eval/mapPool";
import { done, taskFailure } from "../../../src/outcome";

const tick = () => new Promise<void>((resolve) => setTimeout(resolve, 1));

describe("runPool", () => {
  it("never runs more than `width` calls at once", async () => {
    let inFlight = 0;
    let peak = 0;
    const r = await runPool([1, 2, 3, 4, 5, 6], 2, async (n) => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await tick();
      inFlight--;
      return done(n * 2);
    });
    expect(r).toEqual({ ok: true, values: [2, 4, 6, 8, 10, 12] });
    expect(peak).toBe(2);
  });

  it("runs strictly in order with width 1", async () => {
    const order: number[] = [];
    await runPool([3, 1, 2], 1, async (n) => {
      order.push(n);
      return done(n);
    });
    expect(order).toEqual([3, 1, 2]);
  });

  it("stops scheduling after a failure and halts the signal", async () => {
    const started: number[] = [];
    const halt = new HaltSignal();
    const r = await runPool(
      ["a", "b", "c", "d"],
      1,
      async (s, i) => {
        started.push(i);
        return s === "b" ? taskFailure("llm_error", "no") : done(s);
      },
      halt
    );
    expect(r.ok).toBe(false);
    expect(!r.ok && r.index).toBe(1);
    expect(!r.ok && r.failure.failure.message).toBe("no");
    expect(started).toEqual([0, 1]);
    expect(halt.isHalted).toBe(true);
    expect(halt.haltReason).toBe("map item 1 failed");
  });

  it("returns an empty result for an empty list", async () => {
    expect(await runPool([], 4, async () => done(1))).toEqual({ ok: true, values: [] });
  });
});

describe("HaltSignal", () => {
  it("propagates from parent to child but not back", () => {
    const parent = new HaltSignal();
    const child = parent.child();
    child.halt("child stop");
    expect(parent.isHalted).toBe(false);
    parent.halt("parent stop");
    const other = parent.child();
    expect(other.isHalted).toBe(true);
    expect(other.haltReason).toBe("parent stop");
    expect(child.haltReason).toBe("child stop");
  });
});
