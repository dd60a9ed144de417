// src/core/config/config.ts
// Configuration: defaults < environment < config file < explicit overrides.

import * as fs from "fs";
import * as path from "path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";

// =========================================================================
// Configuration Types
// =========================================================================

export const LogLevelSchema = z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]);

export const ConfigSchema = z.object({
  limits: z.object({
    /** Maximum LLM turns per session */
    maxTurns: z.number().int().positive(),
    /** Context window budget in estimated tokens */
    maxContextWindow: z.number().int().positive(),
    /** Fraction of a limit at which a warning is logged */
    warningThreshold: z.number().gt(0).lte(1),
  }),
  subtasks: z.object({
    maxDepth: z.number().int().positive(),
  }),
  loop: z.object({
    maxIterations: z.number().int().positive(),
    scriptTimeoutMs: z.number().int().positive(),
  }),
  context: z.object({
    maxAccumulatedChars: z.number().int().nonnegative(),
  }),
  map: z.object({
    concurrency: z.number().int().positive(),
  }),
  logging: z.object({
    level: LogLevelSchema,
    pretty: z.boolean(),
  }),
  llm: z.object({
    /** Model used when a template names none */
    defaultModel: z.string().optional(),
  }),
});

export type TaskweaveConfig = z.infer<typeof ConfigSchema>;

export const PartialConfigSchema = ConfigSchema.deepPartial();
export type PartialConfig = z.infer<typeof PartialConfigSchema>;

export class ConfigError extends Error {
  constructor(message: string, readonly issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.name = "ConfigError";
  }
}

// =========================================================================
// Default Configuration
// =========================================================================

export const DEFAULT_CONFIG: TaskweaveConfig = {
  limits: { maxTurns: 50, maxContextWindow: 200_000, warningThreshold: 0.8 },
  subtasks: { maxDepth: 5 },
  loop: { maxIterations: 5, scriptTimeoutMs: 30_000 },
  context: { maxAccumulatedChars: 8000 },
  map: { concurrency: 4 },
  logging: { level: "info", pretty: false },
  llm: {},
};

export const DEFAULT_CONFIG_FILES = ["taskweave.config.json", "taskweave.config.yaml", "taskweave.config.yml"];

function issuesOf(error: z.ZodError): string[] {
  return error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
}

// =========================================================================
// Configuration Loading
// =========================================================================

/**
 * Read `${prefix}_*` variables. Unset or unparsable numbers are left out so
 * that lower layers keep their values.
 */
export function configFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  prefix = "TASKWEAVE"
): PartialConfig {
  const int = (name: string): number | undefined => {
    const n = parseInt(env[`${prefix}_${name}`] ?? "", 10);
    return Number.isNaN(n) ? undefined : n;
  };
  const float = (name: string): number | undefined => {
    const n = parseFloat(env[`${prefix}_${name}`] ?? "");
    return Number.isNaN(n) ? undefined : n;
  };
  const level = LogLevelSchema.safeParse(env[`${prefix}_LOG_LEVEL`]);
  const pretty = env[`${prefix}_LOG_PRETTY`];

  return {
    limits: {
      maxTurns: int("MAX_TURNS"),
      maxContextWindow: int("MAX_CONTEXT_WINDOW"),
      warningThreshold: float("WARNING_THRESHOLD"),
    },
    subtasks: { maxDepth: int("MAX_DEPTH") },
    loop: { maxIterations: int("MAX_ITERATIONS"), scriptTimeoutMs: int("SCRIPT_TIMEOUT_MS") },
    context: { maxAccumulatedChars: int("MAX_ACCUMULATED_CHARS") },
    map: { concurrency: int("MAP_CONCURRENCY") },
    logging: {
      level: level.success ? level.data : undefined,
      pretty: pretty === undefined ? undefined : pretty === "1" || pretty.toLowerCase() === "true",
    },
    llm: { defaultModel: env[`${prefix}_MODEL`] || undefined },
  };
}

/**
 * Validate a plain object (parsed JSON or YAML) as a partial configuration.
 */
export function configFromObject(data: unknown): PartialConfig {
  const parsed = PartialConfigSchema.safeParse(data ?? {});
  if (!parsed.success) {
    throw new ConfigError("Invalid configuration", issuesOf(parsed.error));
  }
  return parsed.data;
}

/**
 * Load configuration from a JSON or YAML file.
 */
export function configFromFile(filePath: string): PartialConfig {
  if (!fs.existsSync(filePath)) {
    throw new ConfigError(`Config file not found: ${filePath}`);
  }

  const content = fs.readFileSync(filePath, "utf8");
  const ext = path.extname(filePath).toLowerCase();

  let data: unknown;
  try {
    if (ext === ".json") {
      data = JSON.parse(content);
    } else if (ext === ".yaml" || ext === ".yml") {
      data = parseYaml(content);
    } else {
      throw new ConfigError(`Unsupported config file format: ${ext}`);
    }
  } catch (e) {
    if (e instanceof ConfigError) throw e;
    throw new ConfigError(`Could not parse ${filePath}: ${e instanceof Error ? e.message : String(e)}`);
  }

  return configFromObject(data);
}

/** Drop keys whose value is undefined so they never shadow a lower layer. */
function compact(cfg: PartialConfig): PartialConfig {
  const parsed = PartialConfigSchema.safeParse(JSON.parse(JSON.stringify(cfg)));
  if (!parsed.success) {
    throw new ConfigError("Invalid configuration", issuesOf(parsed.error));
  }
  return parsed.data;
}

/**
 * Merge configs over the defaults, later ones winning field by field.
 * Undefined fields never override.
 */
export function mergeConfigs(...configs: PartialConfig[]): TaskweaveConfig {
  const result: TaskweaveConfig = {
    limits: { ...DEFAULT_CONFIG.limits },
    subtasks: { ...DEFAULT_CONFIG.subtasks },
    loop: { ...DEFAULT_CONFIG.loop },
    context: { ...DEFAULT_CONFIG.context },
    map: { ...DEFAULT_CONFIG.map },
    logging: { ...DEFAULT_CONFIG.logging },
    llm: { ...DEFAULT_CONFIG.llm },
  };

  for (const raw of configs) {
    const cfg = compact(raw);
    result.limits = { ...result.limits, ...cfg.limits };
    result.subtasks = { ...result.subtasks, ...cfg.subtasks };
    result.loop = { ...result.loop, ...cfg.loop };
    result.context = { ...result.context, ...cfg.context };
    result.map = { ...result.map, ...cfg.map };
    result.logging = { ...result.logging, ...cfg.logging };
    result.llm = { ...result.llm, ...cfg.llm };
  }

  const checked = ConfigSchema.safeParse(result);
  if (!checked.success) {
    throw new ConfigError("Invalid configuration", issuesOf(checked.error));
  }
  return checked.data;
}

/**
 * Auto-detect and load configuration.
 * Priority: overrides > config file > environment > defaults
 */
export function loadConfig(options?: {
  configFile?: string;
  overrides?: PartialConfig;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}): TaskweaveConfig {
  const layers: PartialConfig[] = [configFromEnv(options?.env)];

  if (options?.configFile) {
    layers.push(configFromFile(options.configFile));
  } else {
    const cwd = options?.cwd ?? process.cwd();
    for (const name of DEFAULT_CONFIG_FILES) {
      const p = path.join(cwd, name);
      if (fs.existsSync(p)) {
        layers.push(configFromFile(p));
        break;
      }
    }
  }

  if (options?.overrides) {
    layers.push(options.overrides);
  }

  return mergeConfigs(...layers);
}

// =========================================================================
// Config Validation
// =========================================================================

export type ConfigValidation = {
  valid: boolean;
  errors: string[];
  warnings: string[];
};

export function validateConfig(config: unknown): ConfigValidation {
  const parsed = ConfigSchema.safeParse(config);
  if (!parsed.success) {
    return { valid: false, errors: issuesOf(parsed.error), warnings: [] };
  }
  const c = parsed.data;
  const warnings: string[] = [];

  if (c.limits.maxTurns < c.loop.maxIterations * 2) {
    warnings.push("maxTurns is below two turns per loop iteration; director-evaluator loops may exhaust it");
  }
  if (c.subtasks.maxDepth > 10) {
    warnings.push("maxDepth above 10 allows very deep subtask chains");
  }
  if (c.context.maxAccumulatedChars === 0) {
    warnings.push("maxAccumulatedChars is 0; accumulated step data will always be dropped");
  }

  return { valid: true, errors: [], warnings };
}
