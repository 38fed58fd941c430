/**
 * Stream Multiplexer
 *
 * Turns a predictor's incremental output into one ordered, lazy, finite
 * async sequence of tokens that the transport can flush chunk by chunk
 * without ever blocking the event loop.
 *
 * - Synchronous predictors push into a TokenStreamer from a deferred task;
 *   the consumer polls it and yields to the scheduler between attempts.
 * - The continuous-batching predictor already produces an async iterable;
 *   its tokens are forwarded as they arrive.
 *
 * Sequences end when the source completes and never resume. When the
 * consumer stops early (`return()` or abort signal) the source is cancelled.
 */

import type { Logger } from 'pino';
import { GatewayError, toGatewayError } from '../api/errors.js';
import type {
  GenerationConfig,
  PollableTokenSource,
  Predictor,
  SinkStreamingPredictor,
  TokenStreamerHandle,
} from '../types/index.js';
import { TokenNotReadyError } from './token-streamer.js';

export const DEFAULT_POLL_INTERVAL_MS = 1;

export interface StreamOptions {
  /** Delay between polls of a synchronous source that has no token ready */
  pollIntervalMs?: number;
  signal?: AbortSignal;
}

export interface OpenStreamOptions extends StreamOptions {
  /** Image references for the multimodal predictor */
  images?: string[];
  logger?: Logger;
}

function delay(ms: number): Promise<void> {
  return new Promise<void>((resolve) => {
    setTimeout(resolve, ms);
  });
}

function waitForToken(source: PollableTokenSource, pollIntervalMs: number): Promise<void> {
  return source.whenReady ? source.whenReady(pollIntervalMs) : delay(pollIntervalMs);
}

/**
 * Drain a synchronous, pollable token source.
 *
 * A `TokenNotReadyError` from the source means "try again shortly": the
 * generator waits up to `pollIntervalMs` (or until the source reports it is
 * ready) and polls again. Any other error ends the sequence by propagating.
 */
export async function* pollTokens(
  source: PollableTokenSource,
  options: StreamOptions = {}
): AsyncGenerator<string, void, undefined> {
  const pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
  let completed = false;

  try {
    while (!options.signal?.aborted) {
      let step: IteratorResult<string, void>;
      try {
        step = source.next();
      } catch (error) {
        if (error instanceof TokenNotReadyError) {
          await waitForToken(source, pollIntervalMs);
          continue;
        }
        completed = true;
        throw error;
      }

      if (step.done) {
        completed = true;
        return;
      }
      yield step.value;
    }
  } finally {
    if (!completed) {
      source.cancel?.();
    }
  }
}

/**
 * Forward tokens from an asynchronous source as they arrive.
 */
export async function* forwardTokens(
  tokens: AsyncIterable<string>,
  options: StreamOptions = {}
): AsyncGenerator<string, void, undefined> {
  const iterator = tokens[Symbol.asyncIterator]();
  let completed = false;

  try {
    while (!options.signal?.aborted) {
      const step = await iterator.next();
      if (step.done) {
        completed = true;
        return;
      }
      yield step.value;
    }
  } catch (error) {
    completed = true;
    throw error;
  } finally {
    if (!completed) {
      await iterator.return?.();
    }
  }
}

/**
 * Run a synchronous predictor's streaming call off the serving path.
 *
 * The task is deferred with `setImmediate` so the caller can return its
 * response headers first. Whatever happens, the streamer is terminated:
 * ended on success, failed with a `BackendGenerationFailure` otherwise.
 */
export function launchStreamingGeneration(
  run: () => void | Promise<void>,
  streamer: TokenStreamerHandle,
  logger?: Logger
): void {
  setImmediate(() => {
    void Promise.resolve()
      .then(run)
      .then(
        () => {
          streamer.end();
        },
        (error: unknown) => {
          const failure = toGatewayError(error, 'BackendGenerationFailure');
          logger?.error({ error: failure.message }, 'Streaming generation failed');
          streamer.fail(failure);
        }
      );
  });
}

function startSinkStreaming(
  predictor: SinkStreamingPredictor,
  prompt: string,
  config: GenerationConfig,
  options: OpenStreamOptions
): AsyncGenerator<string, void, undefined> {
  const streamer = predictor.getStreamer();

  launchStreamingGeneration(
    () =>
      predictor.kind === 'multimodal'
        ? predictor.streamingGenerate(prompt, streamer, config, options.images)
        : predictor.streamingGenerate(prompt, streamer, config),
    streamer,
    options.logger
  );

  return pollTokens(streamer, options);
}

/**
 * Open the token stream for one prompt on any predictor kind.
 *
 * @throws {GatewayError} `StreamingWithMultiplePromptsUnsupported` for more than one prompt
 */
export async function openTokenStream(
  predictor: Predictor,
  prompt: string | string[],
  config: GenerationConfig,
  options: OpenStreamOptions = {}
): Promise<AsyncGenerator<string, void, undefined>> {
  const single = singlePrompt(prompt);

  if (predictor.kind === 'continuous') {
    const tokens = await predictor.streamingGenerateAsync(single, config);
    return forwardTokens(tokens, options);
  }

  return startSinkStreaming(predictor, single, config, options);
}

/**
 * Extract the only prompt of a streaming request.
 *
 * @throws {GatewayError} `StreamingWithMultiplePromptsUnsupported` for more than one prompt
 */
export function singlePrompt(prompt: string | string[]): string {
  if (typeof prompt === 'string') {
    return prompt;
  }
  const [first] = prompt;
  if (prompt.length !== 1 || first === undefined) {
    throw new GatewayError(
      'StreamingWithMultiplePromptsUnsupported',
      'Streaming response is not supported when multiple prompts are provided.',
      { promptCount: prompt.length }
    );
  }
  return first;
}
