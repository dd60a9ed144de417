// src/ports/script.ts

export interface ScriptResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

/**
 * External command execution. A non-zero exit code is a normal result; a
 * rejected promise means the command could not be run at all.
 */
export interface ScriptRunnerPort {
  run(command: string, timeoutMs: number, inputs: Record<string, string>): Promise<ScriptResult>;
}
