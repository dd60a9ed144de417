// src/ports/retrieval.ts

import type { ContextGenerationInput, RetrievalResult } from "../core/tasks/types";

/**
 * Context retrieval collaborator (repository index, search service, ...).
 * Failures are reported through `error` rather than thrown.
 */
export interface ContextRetrievalPort {
  getRelevantContextFor(input: ContextGenerationInput): Promise<RetrievalResult>;
}
