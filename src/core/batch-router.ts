/**
 * BatchRouter
 *
 * Picks one execution strategy per non-streaming request and drives it:
 *
 * - `continuous`: the continuous-batching predictor batches across requests
 *   itself, so prompts go straight to `generateAsync` with no local queuing.
 * - `static`: a caller sent a list of prompts; they form one predictor call
 *   and are never mixed with other callers' prompts.
 * - `dynamic`: a caller sent one prompt; it waits in the dynamic batch window
 *   to share a call with concurrent requests that use the same config.
 */

import type { Logger } from 'pino';
import { toGatewayError } from '../api/errors.js';
import type {
  GenerationConfig,
  GenerationResult,
  Predictor,
  PredictorKind,
  SinkStreamingPredictor,
} from '../types/index.js';
import type { DynamicBatchAccumulator } from './dynamic-batch-accumulator.js';
import type { NormalizedPrompt } from './prompt-normalizer.js';

export type BatchStrategy = 'continuous' | 'static' | 'dynamic';

export interface RouteOptions {
  /** Image references for the multimodal predictor */
  images?: string[];
}

/**
 * Strategy selection depends only on the predictor kind and the prompt shape.
 * `BatchRouter.route` follows the same rules, narrowing the predictor and
 * prompt types as it goes.
 */
export function selectStrategy(kind: PredictorKind, prompts: NormalizedPrompt): BatchStrategy {
  if (kind === 'continuous') {
    return 'continuous';
  }
  return Array.isArray(prompts) ? 'static' : 'dynamic';
}

export class BatchRouter {
  private readonly predictor: Predictor;
  private readonly accumulator: DynamicBatchAccumulator;
  private readonly logger?: Logger;

  constructor(predictor: Predictor, accumulator: DynamicBatchAccumulator, logger?: Logger) {
    this.predictor = predictor;
    this.accumulator = accumulator;
    this.logger = logger;
  }

  /**
   * Generate `prompts` with the strategy chosen for them.
   *
   * List input (and any input on the continuous predictor) yields a list of
   * results in prompt order; a single prompt yields a single result.
   *
   * @throws {GatewayError} `BackendGenerationFailure` when the predictor fails
   */
  public route(prompts: string, config: GenerationConfig, options?: RouteOptions): Promise<GenerationResult | GenerationResult[]>;
  public route(prompts: string[], config: GenerationConfig, options?: RouteOptions): Promise<GenerationResult[]>;
  public route(prompts: NormalizedPrompt, config: GenerationConfig, options?: RouteOptions): Promise<GenerationResult | GenerationResult[]>;
  public async route(
    prompts: NormalizedPrompt,
    config: GenerationConfig,
    options: RouteOptions = {}
  ): Promise<GenerationResult | GenerationResult[]> {
    const predictor = this.predictor;
    this.logger?.debug({ strategy: selectStrategy(predictor.kind, prompts) }, 'Routing request');

    try {
      if (predictor.kind === 'continuous') {
        return await predictor.generateAsync(typeof prompts === 'string' ? [prompts] : prompts, config);
      }
      if (typeof prompts === 'string') {
        return await this.accumulator.submit(prompts, config);
      }
      return await this.handleStaticBatch(predictor, prompts, config, options);
    } catch (error) {
      throw toGatewayError(error, 'BackendGenerationFailure');
    }
  }

  private async handleStaticBatch(
    predictor: SinkStreamingPredictor,
    prompts: string[],
    config: GenerationConfig,
    options: RouteOptions
  ): Promise<GenerationResult[]> {
    this.logger?.info({ batchSize: prompts.length }, 'Handling static batch');

    switch (predictor.kind) {
      case 'multimodal':
        return predictor.generate(prompts, config, options.images);
      case 'sharded':
      case 'single':
        return predictor.generate(prompts, config);
    }
  }
}
