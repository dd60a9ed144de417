// test/core/governance/resourceTracker.spec.ts
// Tests for turn and context accounting

import { describe, it, expect } from "vitest";
import { estimateTokens, ResourceTracker, type ResourceWarning } from "../../../src/core/governance/resourceTracker";
import { isDone, isFail } from "../../../src/outcome";

describe("ResourceTracker", () => {
  it("allows exactly maxTurns turns and rejects the next", () => {
    const tracker = new ResourceTracker({ maxTurns: 3 });
    for (let i = 0; i < 3; i++) expect(isDone(tracker.incrementTurn())).toBe(true);
    const r = tracker.incrementTurn();
    expect(isFail(r) && r.failure.type).toBe("RESOURCE_EXHAUSTION");
    expect(isFail(r) && r.failure.type === "RESOURCE_EXHAUSTION" && r.failure.resource).toBe("turns");
    expect(isFail(r) && r.failure.type === "RESOURCE_EXHAUSTION" && r.failure.metrics.turns).toEqual({
      used: 3,
      limit: 3,
    });
    expect(tracker.metrics().turns.used).toBe(3);
    expect(tracker.isExhausted("turns")).toBe(true);
  });

  it("warns once when usage reaches the threshold", () => {
    const warnings: ResourceWarning[] = [];
    const tracker = new ResourceTracker({ maxTurns: 5, warningThreshold: 0.8 }, { onWarning: (w) => warnings.push(w) });
    for (let i = 0; i < 5; i++) tracker.incrementTurn();
    expect(warnings).toEqual([{ resource: "turns", used: 4, limit: 5 }]);
  });

  it("rejects context usage past the window and leaves counters unchanged", () => {
    const tracker = new ResourceTracker({ maxContextWindow: 150 });
    expect(isDone(tracker.addContextUsage(100))).toBe(true);
    const r = tracker.addContextUsage(60);
    expect(isFail(r) && r.failure.type === "RESOURCE_EXHAUSTION" && r.failure.resource).toBe("context");
    expect(tracker.metrics().context).toEqual({ used: 100, limit: 150, peak: 100 });
    expect(tracker.remaining()).toEqual({ turns: 50, context: 50 });
  });

  it("charges a call's turn and context together, or neither", () => {
    const tracker = new ResourceTracker({ maxTurns: 5, maxContextWindow: 100 });
    expect(isDone(tracker.chargeCall(40))).toBe(true);
    const r = tracker.chargeCall(70);
    expect(isFail(r) && r.failure.type === "RESOURCE_EXHAUSTION" && r.failure.resource).toBe("context");
    expect(tracker.metrics()).toEqual({
      turns: { used: 1, limit: 5 },
      context: { used: 40, limit: 100, peak: 40 },
    });
  });

  it("tracks the largest single addition as the peak", () => {
    const tracker = new ResourceTracker();
    tracker.addContextUsage(30);
    tracker.addContextUsage(70);
    tracker.addContextUsage(10);
    expect(tracker.metrics().context).toEqual({ used: 110, limit: 200_000, peak: 70 });
  });

  it("rejects negative or non-finite usage", () => {
    const tracker = new ResourceTracker();
    expect(isFail(tracker.addContextUsage(-1)) && tracker.metrics().context.used).toBe(0);
    const r = tracker.addContextUsage(Number.NaN);
    expect(isFail(r) && r.failure.type).toBe("VALIDATION_ERROR");
  });

  it("reset clears counters and re-arms warnings", () => {
    const warnings: ResourceWarning[] = [];
    const tracker = new ResourceTracker({ maxTurns: 1 }, { onWarning: (w) => warnings.push(w) });
    tracker.incrementTurn();
    tracker.reset();
    expect(tracker.metrics().turns.used).toBe(0);
    tracker.incrementTurn();
    expect(warnings.length).toBe(2);
  });
});

describe("estimateTokens", () => {
  it("rounds four characters per token up", () => {
    expect(estimateTokens("")).toBe(0);
    expect(estimateTokens("abcd")).toBe(1);
    expect(estimateTokens("abcde")).toBe(2);
  });
});
