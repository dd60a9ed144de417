// src/core/eval/context.ts
// Per-branch evaluation state threaded through nested task calls.

import type { ContextSegment, StepRecord } from "../tasks/contextAssembler";

/**
 * Cooperative cancellation flag. A child signal reports halted when any
 * ancestor has halted; halting a child leaves its parent running.
 */
export class HaltSignal {
  private reason?: string;

  constructor(private readonly parent?: HaltSignal) {}

  halt(reason: string): void {
    this.reason ??= reason;
  }

  get isHalted(): boolean {
    return this.reason !== undefined || (this.parent?.isHalted ?? false);
  }

  get haltReason(): string | undefined {
    return this.reason ?? this.parent?.haltReason;
  }

  child(): HaltSignal {
    return new HaltSignal(this);
  }
}

export interface EvalContext {
  /** Subtask nesting depth; 0 at the top level. */
  readonly depth: number;
  /** Tightest `max_depth` declared by an enclosing request, if any. */
  readonly maxDepth?: number;
  /** Call keys (`name:inputsHash`) of the active task chain, outermost first. */
  readonly chain: readonly string[];
  /** Context visible to tasks spawned from this branch. */
  readonly segments: readonly ContextSegment[];
  /** Completed steps in this branch, oldest first. */
  readonly history: StepRecord[];
  readonly halt: HaltSignal;
}

export function rootContext(segments: readonly ContextSegment[] = []): EvalContext {
  return { depth: 0, chain: [], segments, history: [], halt: new HaltSignal() };
}

export function withHalt(ctx: EvalContext, halt: HaltSignal): EvalContext {
  return { ...ctx, halt };
}
