/**
 * Response Envelope Builder
 *
 * Wraps predictor output into the ModelResponse unit shared by the plain and
 * OpenAI-compatible call paths.
 */

import type { GenerationResult, ModelResponse } from '../types/index.js';

/**
 * Envelope for a whole (non-streamed) result.
 */
export function toModelResponse(result: GenerationResult): ModelResponse {
  return {
    generated_text: result.text,
    num_input_tokens: result.inputLength,
    num_input_tokens_batch: result.inputLength,
    num_generated_tokens: result.generateLength,
    preprocessing_time: 0,
  };
}

/**
 * Envelope for one streamed token.
 */
export function tokenResponse(token: string, inputLength: number): ModelResponse {
  return {
    generated_text: token,
    num_input_tokens: inputLength,
    num_input_tokens_batch: inputLength,
    num_generated_tokens: 1,
    preprocessing_time: 0,
  };
}

/**
 * Wrap a token stream into per-token envelopes.
 *
 * The prompt length is often unknown when the stream opens (the predictor
 * only learns it once tokenisation ran), so it is re-read on each token
 * until it is non-zero, then cached for the rest of the stream.
 */
export async function* envelopeStream(
  tokens: AsyncIterable<string>,
  readInputLength: () => number
): AsyncGenerator<ModelResponse, void, undefined> {
  let inputLength = readInputLength();

  for await (const token of tokens) {
    if (!inputLength) {
      inputLength = readInputLength();
    }
    yield tokenResponse(token, inputLength);
  }
}
