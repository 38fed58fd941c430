/**
 * Base class for predictors that generate synchronously
 *
 * Sharded, single-process and multimodal backends expose a whole-batch
 * `generate` and push streamed tokens into a caller-provided sink. This base
 * derives the async batch entry point and the per-request streamer from
 * those two methods.
 */

import { TokenStreamer } from '../core/token-streamer.js';
import type {
  GenerationConfig,
  GenerationResult,
  TokenSink,
  TokenStreamerHandle,
} from '../types/index.js';

export abstract class SyncPredictorBase {
  /** Prompt token count of the request currently being generated */
  public inputLength = 0;

  public abstract generate(
    prompts: string[],
    config: GenerationConfig
  ): GenerationResult[] | Promise<GenerationResult[]>;

  public abstract streamingGenerate(
    prompt: string | string[],
    streamer: TokenSink,
    config: GenerationConfig
  ): void | Promise<void>;

  public async generateAsync(
    prompts: string[],
    config: GenerationConfig
  ): Promise<GenerationResult[]> {
    return this.generate(prompts, config);
  }

  /**
   * A fresh channel per streaming request.
   */
  public getStreamer(): TokenStreamerHandle {
    return new TokenStreamer();
  }
}
