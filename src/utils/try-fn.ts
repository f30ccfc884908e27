import type { Result } from '../types/index.js';
import { toError } from '../core/errors.js';

/**
 * Runs a sync or async function and captures its outcome as a Result
 * instead of throwing.
 *
 * @example
 * ```typescript
 * const adapted = await tryFn(() => adapter.adapt(request, session));
 * if (!adapted.success) return fail(new RequestAdaptationError(adapted.error));
 * ```
 */
export async function tryFn<T>(fn: () => T | Promise<T>): Promise<Result<T>> {
  try {
    return { success: true, value: await fn() };
  } catch (error) {
    return { success: false, error: toError(error) };
  }
}

/**
 * Synchronous variant of {@link tryFn}.
 */
export function tryFnSync<T>(fn: () => T): Result<T> {
  try {
    return { success: true, value: fn() };
  } catch (error) {
    return { success: false, error: toError(error) };
  }
}
