// src/core/eval/mapPool.ts
// Bounded worker pool for `map`: index-ordered results, fail-fast scheduling.

import type { Fail, Outcome } from "../../outcome";
import { isFail } from "../../outcome";
import type { HaltSignal } from "./context";

export type PoolResult<R> =
  | { ok: true; values: R[] }
  | { ok: false; index: number; failure: Fail };

/**
 * Run `fn` over `items` with at most `width` calls in flight. After the
 * first failure no further items start; calls already running are awaited.
 * `halt` is raised on failure so in-flight siblings stop spawning work.
 */
export async function runPool<T, R>(
  items: readonly T[],
  width: number,
  fn: (item: T, index: number) => Promise<Outcome<R>>,
  halt?: HaltSignal
): Promise<PoolResult<R>> {
  const values: R[] = new Array<R>(items.length);
  let next = 0;
  const state: { first?: { index: number; failure: Fail } } = {};

  const worker = async (): Promise<void> => {
    while (state.first === undefined && next < items.length) {
      const index = next++;
      const r = await fn(items[index], index);
      if (isFail(r)) {
        if (state.first === undefined) {
          state.first = { index, failure: r };
          halt?.halt(`map item ${index} failed`);
        }
        return;
      }
      values[index] = r.value;
    }
  };

  const n = Math.max(1, Math.min(width, items.length));
  await Promise.all(Array.from({ length: n }, worker));

  return state.first === undefined ? { ok: true, values } : { ok: false, ...state.first };
}
