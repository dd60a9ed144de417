// src/core/governance/metrics.ts

export type ResourceName = "turns" | "context";

export type ResourceMetrics = {
  turns: { used: number; limit: number };
  context: { used: number; limit: number; peak: number };
};

export type ResourceLimits = {
  maxTurns: number;
  maxContextWindow: number;
  /** Fraction of a limit at which a one-time warning fires. */
  warningThreshold: number;
};
