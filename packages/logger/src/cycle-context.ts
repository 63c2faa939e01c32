/**
 * @fileoverview Per-cycle logging context using AsyncLocalStorage.
 *
 * Every tracker cycle runs inside {@link withCycleContext}; log lines written
 * while the cycle is in flight, retry waits included, carry its `cycle_id`.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';

export interface CycleContext {
  /** Unique cycle identifier (UUID v4) */
  cycle_id: string;

  /** Optional additional context fields */
  [key: string]: unknown;
}

const cycleContextStorage = new AsyncLocalStorage<CycleContext>();

export function generateCycleId(): string {
  return randomUUID();
}

/**
 * @returns The current cycle ID, or undefined outside a cycle
 */
export function getCycleId(): string | undefined {
  return cycleContextStorage.getStore()?.cycle_id;
}

/**
 * Runs `fn` with a fresh cycle context.
 *
 * @example
 * ```typescript
 * await withCycleContext(() => loop.runCycle(), undefined, { cycle: 12 });
 * ```
 */
export async function withCycleContext<T>(
  fn: () => Promise<T> | T,
  cycleId?: string,
  additionalContext?: Record<string, unknown>
): Promise<T> {
  const context: CycleContext = {
    ...additionalContext,
    cycle_id: cycleId ?? generateCycleId(),
  };

  return cycleContextStorage.run(context, fn);
}
