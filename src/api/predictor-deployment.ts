/**
 * PredictorDeployment
 *
 * Per-worker facade in front of exactly one predictor. It validates the
 * request envelope, normalizes prompts, routes non-streaming work through
 * the BatchRouter and streaming work through the Stream Multiplexer, and
 * answers with transport-neutral responses.
 *
 * Events:
 * - 'batch:dispatched' - Emitted after each dynamic batch window
 * - 'stream:truncated' - Emitted when a backend failure ends a stream early
 * - 'request:rejected' - Emitted when a request is answered with an error
 */

import { EventEmitter } from 'eventemitter3';
import type { Logger } from 'pino';
import { createChatProcessor, type ChatProcessor } from '../chat/chat-processors.js';
import { BatchRouter } from '../core/batch-router.js';
import {
  DynamicBatchAccumulator,
  type DynamicBatchStats,
} from '../core/dynamic-batch-accumulator.js';
import {
  getPromptFormat,
  preprocessChatWithImages,
  preprocessPrompts,
  PromptFormat,
  type NormalizedPrompt,
} from '../core/prompt-normalizer.js';
import { envelopeStream, toModelResponse } from '../core/response-envelope.js';
import { DEFAULT_POLL_INTERVAL_MS, openTokenStream, singlePrompt } from '../core/stream-multiplexer.js';
import { GatewayRequestSchema } from '../types/schemas/request.js';
import type {
  ChatMessage,
  DeploymentConfig,
  DeploymentResponse,
  ErrorBody,
  GenerationConfig,
  ModelResponse,
  Predictor,
  PredictorKind,
  PromptConfig,
} from '../types/index.js';
import { GatewayError, toGatewayError, zodErrorToGatewayError } from './errors.js';
import type { DeploymentEvents } from './events.js';

const EMPTY_PROMPT_CONFIG: PromptConfig = {
  intro: '',
  human_id: '',
  bot_id: '',
};

export interface DynamicBatchingOptions {
  enabled?: boolean;
  maxBatchSize?: number;
  batchWaitTimeoutMs?: number;
}

export interface PredictorDeploymentOptions {
  predictor: Predictor;
  /** Deployment name used in logs, events and startup errors */
  name?: string;
  /** Model served by the predictor; reported in logs and stats */
  modelId?: string;
  /** Chat processor name; `null` disables chat formatting */
  chatProcessor?: string | null;
  prompt?: PromptConfig;
  dynamicBatching?: DynamicBatchingOptions;
  pollIntervalMs?: number;
  logger?: Logger;
}

export interface CallOptions {
  /** Aborts an open stream when the client goes away */
  signal?: AbortSignal;
}

/**
 * Prompt accepted by the OpenAI-compatible call path.
 */
export type OpenAiPrompt = string | string[] | ChatMessage[];

export interface DeploymentStats {
  name: string;
  modelId: string | null;
  kind: PredictorKind;
  chatProcessor: string | null;
  dynamicBatching: DynamicBatchStats;
}

export class PredictorDeployment extends EventEmitter<DeploymentEvents> {
  public readonly name: string;
  public readonly modelId: string | null;
  private readonly predictor: Predictor;
  private readonly chatProcessor: ChatProcessor | null;
  private readonly accumulator: DynamicBatchAccumulator;
  private readonly router: BatchRouter;
  private readonly pollIntervalMs: number;
  private readonly logger?: Logger;

  /**
   * @throws {GatewayError} `ChatProcessorNotFound` when the configured processor is unknown
   */
  constructor(options: PredictorDeploymentOptions) {
    super();
    this.name = options.name ?? 'predictor';
    this.modelId = options.modelId ?? null;
    this.predictor = options.predictor;
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.logger = options.logger?.child({
      component: 'PredictorDeployment',
      deployment: this.name,
      modelId: this.modelId,
    });

    this.chatProcessor = options.chatProcessor
      ? createChatProcessor(options.chatProcessor, options.prompt ?? EMPTY_PROMPT_CONFIG, this.name)
      : null;

    this.accumulator = new DynamicBatchAccumulator(this.predictor, {
      enabled: options.dynamicBatching?.enabled,
      maxBatchSize: options.dynamicBatching?.maxBatchSize,
      batchWaitTimeoutMs: options.dynamicBatching?.batchWaitTimeoutMs,
      logger: this.logger,
      onBatchDispatched: (event) => {
        this.emit('batch:dispatched', { ...event, deployment: this.name, timestamp: Date.now() });
      },
    });
    this.router = new BatchRouter(this.predictor, this.accumulator, this.logger);

    this.logger?.info(
      {
        kind: this.predictor.kind,
        chatProcessor: this.chatProcessor?.name ?? null,
        dynamicBatching: options.dynamicBatching,
      },
      'Predictor deployment ready'
    );
  }

  /**
   * Build a deployment from validated configuration.
   */
  public static fromConfig(
    config: DeploymentConfig,
    predictor: Predictor,
    logger?: Logger
  ): PredictorDeployment {
    if (predictor.kind !== config.predictor.kind) {
      logger?.warn(
        { configured: config.predictor.kind, actual: predictor.kind },
        'Predictor kind differs from configuration'
      );
    }

    return new PredictorDeployment({
      predictor,
      name: config.name,
      modelId: config.predictor.model_id,
      chatProcessor: config.chat_processor,
      prompt: config.prompt,
      dynamicBatching: {
        enabled: config.dynamic_batching.enabled,
        maxBatchSize: config.dynamic_batching.max_batch_size,
        batchWaitTimeoutMs: config.dynamic_batching.batch_wait_timeout_ms,
      },
      pollIntervalMs: config.streaming.poll_interval_ms,
      logger,
    });
  }

  public get kind(): PredictorKind {
    return this.predictor.kind;
  }

  /**
   * Handle one plain-protocol request body (`{ text, stream?, config? }`).
   *
   * Never throws: every failure is answered as a JSON error response, and a
   * backend failure after a stream has started truncates the stream.
   */
  public async call(rawBody: string, options: CallOptions = {}): Promise<DeploymentResponse> {
    let parsed: unknown;
    try {
      parsed = JSON.parse(rawBody);
    } catch {
      return this.reject(
        new GatewayError('InvalidJson', 'Invalid JSON format from http request.')
      );
    }

    const request = GatewayRequestSchema.safeParse(parsed);
    if (!request.success) {
      return this.reject(zodErrorToGatewayError(request.error));
    }

    const { text, stream = false, config = {} } = request.data;

    if (text === undefined || text === null || text === '' || (Array.isArray(text) && text.length === 0)) {
      return this.reject(new GatewayError('EmptyPrompt', 'Empty prompt is not supported.'));
    }
    if (typeof text !== 'string' && !Array.isArray(text)) {
      return this.reject(
        new GatewayError('InvalidPromptFormat', 'Invalid prompt format from the request.')
      );
    }

    const normalized = preprocessPrompts(text, {
      returnList: this.predictor.kind === 'continuous' || this.chatProcessor !== null,
      chatProcessor: this.chatProcessor,
    });
    if (normalized.err) {
      return this.reject(normalized.val);
    }

    try {
      if (stream) {
        return await this.streamResponse(normalized.val, config, options);
      }
      return await this.jsonResponse(normalized.val, config);
    } catch (error) {
      return this.reject(toGatewayError(error, 'BackendGenerationFailure'));
    }
  }

  /**
   * OpenAI-compatible call path: yields one whole envelope when not
   * streaming, or one envelope per token when streaming.
   *
   * @throws {GatewayError} `InvalidPromptFormat` for a list of flat prompts
   */
  public async *openaiCall(
    prompt: OpenAiPrompt,
    config: GenerationConfig = {},
    stream = false,
    options: CallOptions = {}
  ): AsyncGenerator<ModelResponse, void, undefined> {
    let prompts: string[];
    let images: string[] | undefined;

    if (Array.isArray(prompt) && getPromptFormat(prompt) === PromptFormat.PROMPTS_FORMAT) {
      throw new GatewayError(
        'InvalidPromptFormat',
        'Multiple prompts are not supported when using openai compatible api.'
      );
    }

    if (this.predictor.kind === 'multimodal' && Array.isArray(prompt)) {
      const items: ReadonlyArray<string | ChatMessage> = prompt;
      const messages = items.filter((item): item is ChatMessage => typeof item !== 'string');
      const prepared = preprocessChatWithImages(messages, this.chatProcessor);
      prompts = prepared.prompts;
      images = prepared.images;
    } else {
      const normalized = preprocessPrompts(prompt, {
        returnList: true,
        chatProcessor: this.chatProcessor,
      });
      if (normalized.err) {
        throw normalized.val;
      }
      prompts = typeof normalized.val === 'string' ? [normalized.val] : normalized.val;
    }

    if (!stream) {
      const results = await this.router.route(prompts, config, { images });
      const [first] = results;
      if (!first) {
        throw new GatewayError('BackendGenerationFailure', 'Predictor returned no result');
      }
      yield toModelResponse(first);
      return;
    }

    const tokens = await openTokenStream(this.predictor, prompts, config, {
      images,
      signal: options.signal,
      pollIntervalMs: this.pollIntervalMs,
      logger: this.logger,
    });
    yield* this.guardStream(envelopeStream(tokens, () => this.predictor.inputLength));
  }

  public getStats(): DeploymentStats {
    return {
      name: this.name,
      modelId: this.modelId,
      kind: this.predictor.kind,
      chatProcessor: this.chatProcessor?.name ?? null,
      dynamicBatching: this.accumulator.getStats(),
    };
  }

  /**
   * Dispatch whatever is waiting in the dynamic batch window.
   */
  public flush(): Promise<void> {
    return this.accumulator.flush();
  }

  public close(): void {
    this.accumulator.close();
    this.removeAllListeners();
  }

  private async jsonResponse(
    prompts: NormalizedPrompt,
    config: GenerationConfig
  ): Promise<DeploymentResponse> {
    const results = await this.router.route(prompts, config);
    const body = Array.isArray(results) ? results.map(toModelResponse) : toModelResponse(results);
    return { type: 'json', status: 200, body };
  }

  private async streamResponse(
    prompts: NormalizedPrompt,
    config: GenerationConfig,
    options: CallOptions
  ): Promise<DeploymentResponse> {
    const prompt = singlePrompt(prompts);
    const tokens = await openTokenStream(this.predictor, prompt, config, {
      signal: options.signal,
      pollIntervalMs: this.pollIntervalMs,
      logger: this.logger,
    });

    return {
      type: 'stream',
      status: 200,
      contentType: 'text/plain',
      body: this.guardStream(tokens),
    };
  }

  /**
   * Forward a started stream; a failure ends it after the items already sent.
   */
  private async *guardStream<T>(items: AsyncIterable<T>): AsyncGenerator<T, void, undefined> {
    let sent = 0;
    try {
      for await (const item of items) {
        sent += 1;
        yield item;
      }
    } catch (error) {
      const failure = toGatewayError(error, 'BackendGenerationFailure');
      this.logger?.error({ tokensSent: sent, error: failure.message }, 'Stream truncated');
      this.emit('stream:truncated', {
        deployment: this.name,
        tokensSent: sent,
        error: failure.toObject(),
        timestamp: Date.now(),
      });
    }
  }

  private reject(error: GatewayError): DeploymentResponse {
    const status = error.httpStatus;
    if (error.isRequestError) {
      this.logger?.warn({ code: error.code, status }, error.message);
    } else {
      this.logger?.error({ code: error.code, status }, error.message);
    }

    this.emit('request:rejected', {
      deployment: this.name,
      status,
      error: error.toObject(),
      timestamp: Date.now(),
    });

    const body: ErrorBody = { error: error.code, message: error.message };
    return { type: 'json', status, body };
  }
}
