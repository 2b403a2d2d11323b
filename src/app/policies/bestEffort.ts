import { logger } from '../../lib/logger';

export type BestEffort<T = void> =
  | { ok: true; step: string; value: T }
  | { ok: false; step: string; error: unknown };

/**
 * Runs a step whose failure must not fail the surrounding request. The error
 * is logged and handed back so callers and tests can tell fatal and
 * best-effort paths apart; dropping the result is allowed.
 */
export async function attempt<T>(
  step: string,
  work: () => Promise<T>,
  context: Record<string, unknown> = {},
): Promise<BestEffort<T>> {
  try {
    const value = await work();
    return { ok: true, step, value };
  } catch (error) {
    logger.warn({ feature: 'best_effort', step, error, ...context }, 'Best-effort step failed');
    return { ok: false, step, error };
  }
}

export function failedSteps(results: ReadonlyArray<BestEffort<unknown>>): string[] {
  return results.filter((result) => !result.ok).map((result) => result.step);
}
