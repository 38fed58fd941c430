/**
 * In-process predictor doubles that record every call.
 */

import { SyncPredictorBase } from '../../src/adapters/base-predictor.js';
import { echoResult, echoTokens } from '../../src/adapters/echo-predictor.js';
import { TokenNotReadyError, TokenStreamer } from '../../src/core/token-streamer.js';
import type {
  ContinuousBatchPredictor,
  GenerationConfig,
  GenerationResult,
  PollableTokenSource,
  SingleProcessPredictor,
  TokenSink,
  TokenStreamerHandle,
} from '../../src/types/index.js';

export interface GenerateCall {
  prompts: string[];
  config: GenerationConfig;
}

export interface RecordingPredictorOptions {
  /** Throw from `generate` when this returns true */
  failWhen?: (prompts: string[], config: GenerationConfig) => boolean;
  /** Throw from `streamingGenerate` after this many tokens */
  streamFailAfter?: number;
}

export class RecordingPredictor extends SyncPredictorBase implements SingleProcessPredictor {
  public readonly kind = 'single';
  public readonly generateCalls: GenerateCall[] = [];
  public readonly streamCalls: Array<{ prompt: string | string[]; config: GenerationConfig }> = [];
  private readonly options: RecordingPredictorOptions;

  constructor(options: RecordingPredictorOptions = {}) {
    super();
    this.options = options;
  }

  public generate(prompts: string[], config: GenerationConfig): GenerationResult[] {
    this.generateCalls.push({ prompts: [...prompts], config });
    if (this.options.failWhen?.(prompts, config)) {
      throw new Error('backend exploded');
    }
    return prompts.map((prompt) => echoResult(prompt, config));
  }

  public streamingGenerate(
    prompt: string | string[],
    streamer: TokenSink,
    config: GenerationConfig
  ): void {
    this.streamCalls.push({ prompt, config });
    const tokens = echoTokens(typeof prompt === 'string' ? prompt : prompt.join(' '));
    this.inputLength = tokens.length;

    tokens.forEach((token, index) => {
      if (this.options.streamFailAfter !== undefined && index >= this.options.streamFailAfter) {
        throw new Error('stream broke');
      }
      streamer.put(token);
    });
  }
}

export class RecordingContinuousPredictor implements ContinuousBatchPredictor {
  public readonly kind = 'continuous';
  public inputLength = 0;
  public readonly generateCalls: GenerateCall[] = [];
  public readonly streamCalls: Array<{ prompt: string; config: GenerationConfig }> = [];

  public async generateAsync(prompts: string[], config: GenerationConfig): Promise<GenerationResult[]> {
    this.generateCalls.push({ prompts: [...prompts], config });
    return prompts.map((prompt) => echoResult(prompt, config));
  }

  public async streamingGenerateAsync(
    prompt: string,
    config: GenerationConfig
  ): Promise<AsyncIterable<string>> {
    this.streamCalls.push({ prompt, config });
    const tokens = echoTokens(prompt);
    this.inputLength = tokens.length;

    async function* emit(): AsyncGenerator<string, void, undefined> {
      for (const token of tokens) {
        yield token;
      }
    }
    return emit();
  }

  public getStreamer(): TokenStreamerHandle {
    return new TokenStreamer();
  }
}

/**
 * Pollable source that reports "not ready" a fixed number of times before
 * each token.
 */
export class ScriptedTokenSource implements PollableTokenSource {
  public polls = 0;
  public cancelled = false;
  private readonly tokens: string[];
  private notReadyRemaining: number;
  private readonly notReadyBeforeEach: number;

  constructor(tokens: string[], notReadyBeforeEach: number) {
    this.tokens = [...tokens];
    this.notReadyBeforeEach = notReadyBeforeEach;
    this.notReadyRemaining = notReadyBeforeEach;
  }

  public next(): IteratorResult<string, void> {
    this.polls += 1;
    if (this.tokens.length === 0) {
      return { done: true, value: undefined };
    }
    if (this.notReadyRemaining > 0) {
      this.notReadyRemaining -= 1;
      throw new TokenNotReadyError();
    }
    this.notReadyRemaining = this.notReadyBeforeEach;
    const token = this.tokens.shift();
    return token === undefined ? { done: true, value: undefined } : { done: false, value: token };
  }

  public cancel(): void {
    this.cancelled = true;
  }
}

export async function collect<T>(items: AsyncIterable<T>): Promise<T[]> {
  const out: T[] = [];
  for await (const item of items) {
    out.push(item);
  }
  return out;
}
