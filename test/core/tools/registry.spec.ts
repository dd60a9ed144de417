// test/core/tools/registry.spec.ts
// Tests for direct and subtask tool bookkeeping

import { describe, it, expect } from "vitest";
import { ToolRegistry } from "../../../src/core/tools/registry";
import { isFail, unwrap } from "../../../src/outcome";

describe("ToolRegistry", () => {
  it("wraps string results as complete results", async () => {
    const reg = new ToolRegistry();
    reg.registerDirect("read", ({ args }) => `contents of ${String(args[0])}`);
    const r = await reg.execute("read", { args: ["a.txt"], named: {} });
    expect(unwrap(r)).toEqual({ content: "contents of a.txt", status: "COMPLETE", notes: {} });
    expect(typeof r.meta.durationMs).toBe("number");
  });

  it("passes structured results through", async () => {
    const reg = new ToolRegistry();
    reg.registerDirect("stat", async () => ({ content: "ok", status: "COMPLETE", notes: { size: 3 } }));
    expect(unwrap(await reg.execute("stat", { args: [], named: {} })).notes).toEqual({ size: 3 });
  });

  it("converts failures into tool_execution_error", async () => {
    const reg = new ToolRegistry();
    reg.registerDirect("bad", () => ({ content: "half", status: "FAILED", notes: {} }));
    const r = await reg.execute("bad", { args: [], named: {} });
    expect(isFail(r) && r.failure.type === "TASK_FAILURE" && r.failure.reason).toBe("tool_execution_error");
    expect(isFail(r) && r.failure.content).toBe("half");
  });

  it("reports unknown tools", async () => {
    const r = await new ToolRegistry().execute("nope", { args: [], named: {} });
    expect(isFail(r) && r.failure.message).toBe("unknown tool: nope");
  });

  it("lists and removes tools", () => {
    const reg = new ToolRegistry();
    reg.registerDirect("a", () => "");
    reg.registerSubtask({ name: "search", hints: ["find"] });
    expect(reg.listDirect()).toEqual(["a"]);
    expect(reg.listSubtask()).toEqual([{ name: "search", hints: ["find"] }]);
    expect(reg.unregisterDirect("a")).toBe(true);
    expect(reg.hasDirect("a")).toBe(false);
  });
});
