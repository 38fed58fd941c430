/**
 * Result Type Helpers
 *
 * Explicit success/failure values for code paths where an error is an
 * expected outcome rather than an exception: prompt normalisation and
 * per-entry dynamic batch results.
 *
 * Usage:
 * ```typescript
 * const normalized = preprocessPrompts(text, { returnList: true });
 * if (normalized.err) {
 *   return errorResponse(normalized.val);
 * }
 * const prompts = normalized.val; // Type-safe access
 * ```
 */

import { Ok, Err, type Result } from 'ts-results';

/**
 * Helper to convert Promise<T> to Promise<Result<T, Error>>
 *
 * Wraps predictor calls so that one failing batch group cannot reject the
 * whole window.
 *
 * @example
 * ```typescript
 * const outcome = await resultify(predictor.generateAsync(prompts, config));
 * if (outcome.ok) {
 *   console.log(outcome.val.length);
 * }
 * ```
 */
export async function resultify<T>(promise: Promise<T>): Promise<Result<T, Error>> {
  try {
    const value = await promise;
    return Ok(value);
  } catch (error) {
    return Err(error instanceof Error ? error : new Error(String(error)));
  }
}

// Re-export Result types for convenience
export { Ok, Err };
export type { Result };
