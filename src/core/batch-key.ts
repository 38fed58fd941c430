/**
 * BatchKey: canonical identity of a generation config.
 *
 * Requests may share one predictor call only when their keys are equal.
 * The key is an opaque map key; it is never parsed back into a config.
 */

import type { GenerationConfig } from '../types/index.js';

export type BatchKey = string;

function canonicalize(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(canonicalize);
  }

  if (value !== null && typeof value === 'object') {
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      const entry: unknown = Reflect.get(value, key);
      if (entry !== undefined) {
        sorted[key] = canonicalize(entry);
      }
    }
    return sorted;
  }

  return value;
}

/**
 * Serialise a config with object keys sorted at every depth.
 *
 * `{ top_p: 1, temperature: 0.7 }` and `{ temperature: 0.7, top_p: 1 }`
 * produce the same key; array order is significant.
 */
export function computeBatchKey(config: GenerationConfig | undefined): BatchKey {
  return JSON.stringify(canonicalize(config ?? {}));
}
