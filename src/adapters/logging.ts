// src/adapters/logging.ts
// pino logger factory plus logging wrappers for the external ports.

import pino, { type Logger, type LoggerOptions } from "pino";
import type { Handler, PromptPayload } from "../ports/handler";
import type { ContextRetrievalPort } from "../ports/retrieval";
import type { ScriptRunnerPort } from "../ports/script";

export type { Logger } from "pino";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export interface LoggerConfig {
  level?: LogLevel;
  /** Route output through pino-pretty (development only). */
  pretty?: boolean;
  base?: Record<string, unknown>;
}

export function createLogger(config: LoggerConfig = {}): Logger {
  const options: LoggerOptions = {
    level: config.level ?? "info",
    base: config.base ?? { service: "taskweave" },
  };
  if (config.pretty) {
    options.transport = {
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "SYS:standard",
        ignore: "pid,hostname",
      },
    };
  }
  return pino(options);
}

/** Logger that drops everything; default for components built without one. */
export function silentLogger(): Logger {
  return pino({ level: "silent" });
}

export function moduleLogger(parent: Logger, module: string): Logger {
  return parent.child({ module });
}

/**
 * Wrap a handler so every prompt is timed and logged. Tool registration is
 * forwarded to the inner handler.
 */
export function loggingHandler(inner: Handler, logger: Logger): Handler {
  const log = moduleLogger(logger, "handler");
  return {
    async executePrompt(payload: PromptPayload) {
      const start = Date.now();
      try {
        const res = await inner.executePrompt(payload);
        log.debug({ task: payload.taskName, status: res.status, durationMs: Date.now() - start }, "prompt executed");
        return res;
      } catch (error) {
        log.error({ task: payload.taskName, durationMs: Date.now() - start, err: error }, "prompt failed");
        throw error;
      }
    },
    registerDirectTool: (name, fn) => inner.registerDirectTool(name, fn),
    registerSubtaskTool: (name, hints) => inner.registerSubtaskTool(name, hints),
    findDirectTool: (name) => inner.findDirectTool(name),
    subtaskTools: () => inner.subtaskTools(),
  };
}

export function loggingRetrieval(inner: ContextRetrievalPort, logger: Logger): ContextRetrievalPort {
  const log = moduleLogger(logger, "retrieval");
  return {
    async getRelevantContextFor(input) {
      const start = Date.now();
      const res = await inner.getRelevantContextFor(input);
      log.debug(
        { matches: res.matches.length, error: res.error, durationMs: Date.now() - start },
        "context retrieved"
      );
      return res;
    },
  };
}

export function loggingScriptRunner(inner: ScriptRunnerPort, logger: Logger): ScriptRunnerPort {
  const log = moduleLogger(logger, "script");
  return {
    async run(command, timeoutMs, inputs) {
      const start = Date.now();
      const res = await inner.run(command, timeoutMs, inputs);
      log.debug({ command, exitCode: res.exitCode, durationMs: Date.now() - start }, "script finished");
      return res;
    },
  };
}
