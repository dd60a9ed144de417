// test/core/tasks/registry.spec.ts
// Tests for template validation and lookup

import { describe, it, expect } from "vitest";
import { TemplateRegistry, validateTemplate } from "../../../src/core/tasks/registry";
import { isDone, isFail, type Outcome } from "../../../src/outcome";

const base = { name: "t", type: "atomic", instructions: "Do {{x}}", params: ["x"] };

function rejection(o: Outcome<unknown>): { message: string; path?: string } {
  if (!isFail(o) || o.failure.type !== "VALIDATION_ERROR") throw new Error("expected a validation error");
  return { message: o.failure.message, path: o.failure.path };
}

describe("validateTemplate", () => {
  it("accepts a well-formed template", () => {
    expect(isDone(validateTemplate(base))).toBe(true);
  });

  it("rejects a missing field with its path", () => {
    const { path } = rejection(validateTemplate({ name: "t", type: "atomic", params: [] }));
    expect(path).toBe("instructions");
  });

  it("rejects an unknown task type", () => {
    expect(rejection(validateTemplate({ ...base, type: "parallel" })).path).toBe("type");
  });

  it("rejects duplicate parameters", () => {
    expect(rejection(validateTemplate({ ...base, params: ["x", "x"] }))).toEqual({
      message: "Duplicate parameter x in t",
      path: "params",
    });
  });

  it("rejects undeclared and expression placeholders", () => {
    expect(rejection(validateTemplate({ ...base, instructions: "{{y}}" })).message).toBe(
      "Placeholder {{y}} in t is not a declared parameter"
    );
    expect(rejection(validateTemplate({ ...base, systemPrompt: "{{x.y}}" })).path).toBe("systemPrompt");
  });

  it("rejects fresh context combined with inherited context", () => {
    const r = validateTemplate({ ...base, contextManagement: { freshContext: "enabled" } });
    expect(rejection(r).path).toBe("contextManagement");
    const ok = validateTemplate({ ...base, contextManagement: { freshContext: "enabled", inheritContext: "none" } });
    expect(isDone(ok)).toBe(true);
  });

  it("requires a loop spec exactly for loop templates", () => {
    expect(rejection(validateTemplate({ ...base, type: "director_evaluator_loop" })).path).toBe("loop");
    expect(
      rejection(validateTemplate({ ...base, loop: { director: "d", evaluator: "e" } })).path
    ).toBe("loop");
  });

  it("checks that the termination condition parses", () => {
    const r = validateTemplate({
      ...base,
      type: "director_evaluator_loop",
      loop: { director: "d", evaluator: "e", terminationCondition: "(> iteration" },
    });
    expect(rejection(r).path).toBe("loop.terminationCondition");
  });
});

describe("TemplateRegistry", () => {
  it("stores, finds and overwrites by name", () => {
    const reg = new TemplateRegistry();
    reg.register(base);
    reg.register({ ...base, instructions: "Redo {{x}}" });
    expect(reg.list()).toEqual(["t"]);
    expect(reg.find("t")?.instructions).toBe("Redo {{x}}");
  });

  it("does not store rejected templates", () => {
    const reg = new TemplateRegistry();
    reg.register({ ...base, params: ["1bad"] });
    expect(reg.has("t")).toBe(false);
  });

  it("finds the most recent template of a type and subtype", () => {
    const reg = new TemplateRegistry();
    reg.register({ ...base, name: "a", subtype: "review" });
    reg.register({ ...base, name: "b", subtype: "review" });
    reg.register({ ...base, name: "c" });
    expect(reg.findByType("atomic", "review")?.name).toBe("b");
    expect(reg.findByType("atomic")?.name).toBe("c");
    reg.unregister("b");
    expect(reg.findByType("atomic", "review")?.name).toBe("a");
    expect(reg.findByType("reduce")).toBeUndefined();
  });
});
