/**
 * Echo predictors
 *
 * In-process predictors of every kind that "generate" by echoing the prompt
 * back word by word. One word is one token: the first token is the word
 * itself, every later token is the word with a leading space, so the
 * concatenated stream equals the whole-response text.
 *
 * Used by the demo server and by tests; no model is involved.
 */

import type {
  ContinuousBatchPredictor,
  GenerationConfig,
  GenerationResult,
  MultimodalPredictor,
  Predictor,
  PredictorKind,
  ShardedPredictor,
  SingleProcessPredictor,
  TokenSink,
  TokenStreamerHandle,
} from '../types/index.js';
import { TokenStreamer } from '../core/token-streamer.js';
import { SyncPredictorBase } from './base-predictor.js';

export interface EchoPredictorOptions {
  /** Delay before each streamed token; 0 pushes every token in one task */
  tokenDelayMs?: number;
}

function sleep(ms: number): Promise<void> {
  return new Promise<void>((resolve) => {
    setTimeout(resolve, ms);
  });
}

/**
 * Split a prompt into echo tokens.
 */
export function echoTokens(prompt: string): string[] {
  return prompt
    .split(/\s+/)
    .filter((word) => word.length > 0)
    .map((word, index) => (index === 0 ? word : ` ${word}`));
}

/**
 * `config.max_new_tokens`, when it is a non-negative integer.
 */
function maxNewTokens(config: GenerationConfig): number | undefined {
  const value = config.max_new_tokens;
  return typeof value === 'number' && Number.isInteger(value) && value >= 0 ? value : undefined;
}

function limitTokens(tokens: string[], config: GenerationConfig): string[] {
  const limit = maxNewTokens(config);
  return limit === undefined ? tokens : tokens.slice(0, limit);
}

export function echoResult(prompt: string, config: GenerationConfig): GenerationResult {
  const inputTokens = echoTokens(prompt);
  const generated = limitTokens(inputTokens, config);
  return {
    text: generated.join(''),
    inputLength: inputTokens.length,
    generateLength: generated.length,
  };
}

function joinPrompt(prompt: string | string[]): string {
  return typeof prompt === 'string' ? prompt : prompt.join(' ');
}

abstract class EchoSyncPredictor extends SyncPredictorBase {
  protected readonly tokenDelayMs: number;

  constructor(options: EchoPredictorOptions = {}) {
    super();
    this.tokenDelayMs = options.tokenDelayMs ?? 0;
  }

  public generate(prompts: string[], config: GenerationConfig): GenerationResult[] {
    const results = prompts.map((prompt) => echoResult(prompt, config));
    this.inputLength = results.reduce((max, result) => Math.max(max, result.inputLength), 0);
    return results;
  }

  public async streamingGenerate(
    prompt: string | string[],
    streamer: TokenSink,
    config: GenerationConfig
  ): Promise<void> {
    const text = joinPrompt(prompt);
    const inputTokens = echoTokens(text);
    this.inputLength = inputTokens.length;

    for (const token of limitTokens(inputTokens, config)) {
      if (this.tokenDelayMs > 0) {
        await sleep(this.tokenDelayMs);
      }
      streamer.put(token);
    }
  }
}

export class EchoPredictor extends EchoSyncPredictor implements SingleProcessPredictor {
  public readonly kind = 'single';
}

export class ShardedEchoPredictor extends EchoSyncPredictor implements ShardedPredictor {
  public readonly kind = 'sharded';
}

export class MultimodalEchoPredictor extends EchoSyncPredictor implements MultimodalPredictor {
  public readonly kind = 'multimodal';
  /** Images received by the most recent call */
  public lastImages: string[] = [];

  public override generate(
    prompts: string[],
    config: GenerationConfig,
    images: string[] = []
  ): GenerationResult[] {
    this.lastImages = images;
    return super.generate(prompts, config);
  }

  public override streamingGenerate(
    prompt: string | string[],
    streamer: TokenSink,
    config: GenerationConfig,
    images: string[] = []
  ): Promise<void> {
    this.lastImages = images;
    return super.streamingGenerate(prompt, streamer, config);
  }
}

export class ContinuousEchoPredictor implements ContinuousBatchPredictor {
  public readonly kind = 'continuous';
  public inputLength = 0;
  private readonly tokenDelayMs: number;

  constructor(options: EchoPredictorOptions = {}) {
    this.tokenDelayMs = options.tokenDelayMs ?? 0;
  }

  public async generateAsync(
    prompts: string[],
    config: GenerationConfig
  ): Promise<GenerationResult[]> {
    if (this.tokenDelayMs > 0) {
      await sleep(this.tokenDelayMs);
    }
    return prompts.map((prompt) => echoResult(prompt, config));
  }

  public async streamingGenerateAsync(
    prompt: string,
    config: GenerationConfig
  ): Promise<AsyncIterable<string>> {
    const inputTokens = echoTokens(prompt);
    this.inputLength = inputTokens.length;
    const tokens = limitTokens(inputTokens, config);
    const tokenDelayMs = this.tokenDelayMs;

    async function* emit(): AsyncGenerator<string, void, undefined> {
      for (const token of tokens) {
        if (tokenDelayMs > 0) {
          await sleep(tokenDelayMs);
        }
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
 * Echo predictor of the configured kind.
 */
export function createEchoPredictor(
  kind: PredictorKind,
  options: EchoPredictorOptions = {}
): Predictor {
  switch (kind) {
    case 'sharded':
      return new ShardedEchoPredictor(options);
    case 'continuous':
      return new ContinuousEchoPredictor(options);
    case 'single':
      return new EchoPredictor(options);
    case 'multimodal':
      return new MultimodalEchoPredictor(options);
  }
}
