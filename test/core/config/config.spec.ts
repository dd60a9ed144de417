// test/core/config/config.spec.ts
// Tests for layered configuration loading

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import {
  ConfigError,
  configFromEnv,
  configFromFile,
  DEFAULT_CONFIG,
  loadConfig,
  mergeConfigs,
  validateConfig,
} from "../../../src/core/config/config";

describe("mergeConfigs", () => {
  it("returns the defaults when given nothing", () => {
    expect(mergeConfigs()).toEqual(DEFAULT_CONFIG);
  });

  it("merges field by field and ignores undefined values", () => {
    const c = mergeConfigs({ limits: { maxTurns: 10 } }, { limits: { maxTurns: undefined, warningThreshold: 0.5 } });
    expect(c.limits).toEqual({ maxTurns: 10, maxContextWindow: 200_000, warningThreshold: 0.5 });
  });

  it("rejects invalid values", () => {
    expect(() => mergeConfigs({ limits: { maxTurns: -1 } })).toThrow(ConfigError);
    expect(() => mergeConfigs({ limits: { maxTurns: -1 } })).toThrow(
      "Invalid configuration: limits.maxTurns: Number must be greater than 0"
    );
  });
});

describe("configFromEnv", () => {
  it("reads prefixed variables", () => {
    const c = mergeConfigs(
      configFromEnv({
        TASKWEAVE_MAX_TURNS: "10",
        TASKWEAVE_MAX_DEPTH: "3",
        TASKWEAVE_WARNING_THRESHOLD: "0.9",
        TASKWEAVE_LOG_LEVEL: "debug",
        TASKWEAVE_LOG_PRETTY: "true",
        TASKWEAVE_MODEL: "small-model",
      })
    );
    expect(c.limits.maxTurns).toBe(10);
    expect(c.limits.warningThreshold).toBe(0.9);
    expect(c.subtasks.maxDepth).toBe(3);
    expect(c.logging).toEqual({ level: "debug", pretty: true });
    expect(c.llm.defaultModel).toBe("small-model");
  });

  it("ignores unparsable values", () => {
    const c = mergeConfigs(configFromEnv({ TASKWEAVE_MAX_TURNS: "many", TASKWEAVE_LOG_LEVEL: "loud" }));
    expect(c.limits.maxTurns).toBe(50);
    expect(c.logging.level).toBe("info");
  });

  it("supports a custom prefix", () => {
    expect(mergeConfigs(configFromEnv({ APP_MAP_CONCURRENCY: "2" }, "APP")).map.concurrency).toBe(2);
  });
});

describe("files", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "taskweave-config-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("reads YAML and JSON", () => {
    const yamlPath = path.join(dir, "settings.yaml");
    fs.writeFileSync(yamlPath, "limits:\n  maxTurns: 20\nloop:\n  maxIterations: 3\n");
    expect(configFromFile(yamlPath)).toEqual({ limits: { maxTurns: 20 }, loop: { maxIterations: 3 } });

    const jsonPath = path.join(dir, "settings.json");
    fs.writeFileSync(jsonPath, JSON.stringify({ map: { concurrency: 8 } }));
    expect(configFromFile(jsonPath)).toEqual({ map: { concurrency: 8 } });
  });

  it("rejects unknown formats and missing files", () => {
    const tomlPath = path.join(dir, "settings.toml");
    fs.writeFileSync(tomlPath, "x = 1");
    expect(() => configFromFile(tomlPath)).toThrow("Unsupported config file format: .toml");
    expect(() => configFromFile(path.join(dir, "nope.json"))).toThrow(ConfigError);
  });

  it("layers environment, file and overrides", () => {
    const file = path.join(dir, "c.yml");
    fs.writeFileSync(file, "limits:\n  maxTurns: 20\n");
    const env = { TASKWEAVE_MAX_TURNS: "10", TASKWEAVE_MAX_DEPTH: "4" };

    const fromFile = loadConfig({ configFile: file, env });
    expect(fromFile.limits.maxTurns).toBe(20);
    expect(fromFile.subtasks.maxDepth).toBe(4);

    const overridden = loadConfig({ configFile: file, env, overrides: { limits: { maxTurns: 30 } } });
    expect(overridden.limits.maxTurns).toBe(30);
  });

  it("finds a default config file in the working directory", () => {
    fs.writeFileSync(path.join(dir, "taskweave.config.json"), JSON.stringify({ context: { maxAccumulatedChars: 100 } }));
    expect(loadConfig({ cwd: dir, env: {} }).context.maxAccumulatedChars).toBe(100);
  });
});

describe("validateConfig", () => {
  it("reports schema errors", () => {
    const r = validateConfig({ ...DEFAULT_CONFIG, map: { concurrency: 0 } });
    expect(r.valid).toBe(false);
    expect(r.errors).toEqual(["map.concurrency: Number must be greater than 0"]);
  });

  it("warns about risky combinations", () => {
    const r = validateConfig({
      ...DEFAULT_CONFIG,
      limits: { ...DEFAULT_CONFIG.limits, maxTurns: 5 },
      subtasks: { maxDepth: 12 },
    });
    expect(r.valid).toBe(true);
    expect(r.warnings).toEqual([
      "maxTurns is below two turns per loop iteration; director-evaluator loops may exhaust it",
      "maxDepth above 10 allows very deep subtask chains",
    ]);
  });
});
