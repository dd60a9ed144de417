// src/core/governance/resourceTracker.ts
// Per-session turn and context-window accounting.

import type { Logger } from "pino";
import type { Fail, Outcome } from "../../outcome";
import { done, resourceExhausted, validationError } from "../../outcome";
import { silentLogger } from "../../adapters/logging";
import type { ResourceLimits, ResourceMetrics, ResourceName } from "./metrics";

export const DEFAULT_RESOURCE_LIMITS: ResourceLimits = {
  maxTurns: 50,
  maxContextWindow: 200_000,
  warningThreshold: 0.8,
};

export type ResourceWarning = {
  resource: ResourceName;
  used: number;
  limit: number;
};

/**
 * Mutable tracker shared by every task in a session. `incrementTurn`,
 * `addContextUsage` and `chargeCall` are the only mutators; all are
 * synchronous, so calls from concurrent `map` branches never interleave.
 *
 * A call that would push usage past a limit is rejected and leaves the
 * counters where they were.
 */
export class ResourceTracker {
  private readonly limits: ResourceLimits;
  private readonly logger: Logger;
  private readonly onWarning?: (w: ResourceWarning) => void;
  private turnsUsed = 0;
  private contextUsed = 0;
  private contextPeak = 0;
  private warned = new Set<ResourceName>();

  constructor(
    limits: Partial<ResourceLimits> = {},
    opts: { logger?: Logger; onWarning?: (w: ResourceWarning) => void } = {}
  ) {
    this.limits = { ...DEFAULT_RESOURCE_LIMITS, ...limits };
    this.logger = opts.logger ?? silentLogger();
    this.onWarning = opts.onWarning;
  }

  incrementTurn(): Outcome<ResourceMetrics> {
    const rejected = this.checkTurn();
    if (rejected) return rejected;
    this.commitTurn();
    return done(this.metrics());
  }

  addContextUsage(tokens: number): Outcome<ResourceMetrics> {
    const rejected = this.checkContext(tokens);
    if (rejected) return rejected;
    this.commitContext(tokens);
    return done(this.metrics());
  }

  /**
   * One external call: a turn plus `tokens` of context. Both limits are
   * checked before either counter moves.
   */
  chargeCall(tokens: number): Outcome<ResourceMetrics> {
    const rejected = this.checkTurn() ?? this.checkContext(tokens);
    if (rejected) return rejected;
    this.commitTurn();
    this.commitContext(tokens);
    return done(this.metrics());
  }

  /** Snapshot; later mutations do not affect it. */
  metrics(): ResourceMetrics {
    return {
      turns: { used: this.turnsUsed, limit: this.limits.maxTurns },
      context: { used: this.contextUsed, limit: this.limits.maxContextWindow, peak: this.contextPeak },
    };
  }

  remaining(): Record<ResourceName, number> {
    return {
      turns: this.limits.maxTurns - this.turnsUsed,
      context: this.limits.maxContextWindow - this.contextUsed,
    };
  }

  isExhausted(resource: ResourceName): boolean {
    return this.remaining()[resource] <= 0;
  }

  /** Session teardown only. */
  reset(): void {
    this.turnsUsed = 0;
    this.contextUsed = 0;
    this.contextPeak = 0;
    this.warned.clear();
  }

  private checkTurn(): Fail | undefined {
    if (this.turnsUsed + 1 <= this.limits.maxTurns) return undefined;
    this.logger.error({ used: this.turnsUsed, limit: this.limits.maxTurns }, "turn limit reached");
    return resourceExhausted("turns", this.metrics(), `Turn limit of ${this.limits.maxTurns} reached`);
  }

  private checkContext(tokens: number): Fail | undefined {
    if (!Number.isFinite(tokens) || tokens < 0) {
      return validationError(`context usage must be a non-negative number, got ${tokens}`, "tokens");
    }
    if (this.contextUsed + tokens <= this.limits.maxContextWindow) return undefined;
    this.logger.error(
      { used: this.contextUsed, requested: tokens, limit: this.limits.maxContextWindow },
      "context window limit reached"
    );
    return resourceExhausted(
      "context",
      this.metrics(),
      `Context window of ${this.limits.maxContextWindow} tokens exceeded (${this.contextUsed} + ${tokens})`
    );
  }

  private commitTurn(): void {
    this.turnsUsed += 1;
    this.checkWarning("turns", this.turnsUsed, this.limits.maxTurns);
  }

  private commitContext(tokens: number): void {
    this.contextUsed += tokens;
    this.contextPeak = Math.max(this.contextPeak, tokens);
    this.checkWarning("context", this.contextUsed, this.limits.maxContextWindow);
  }

  private checkWarning(resource: ResourceName, used: number, limit: number): void {
    if (this.warned.has(resource) || used < limit * this.limits.warningThreshold) return;
    this.warned.add(resource);
    this.logger.warn({ resource, used, limit }, `${resource} usage at ${Math.round((used / limit) * 100)}% of limit`);
    this.onWarning?.({ resource, used, limit });
  }
}

/** Rough token estimate used for context accounting. */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}
