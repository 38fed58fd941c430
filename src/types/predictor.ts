/**
 * Predictor (backend adapter) contracts
 *
 * The gateway never performs inference itself. Each deployment owns exactly
 * one predictor, selected once from configuration, and talks to it through
 * the capability set declared here.
 */

/**
 * Closed set of backend kinds.
 *
 * - `sharded`: multi-GPU sharded engine
 * - `continuous`: continuous-batching engine (batches across requests itself)
 * - `single`: plain single-process model runner
 * - `multimodal`: single-process runner that also accepts images
 */
export type PredictorKind = 'sharded' | 'continuous' | 'single' | 'multimodal';

export const PREDICTOR_KINDS: readonly PredictorKind[] = [
  'sharded',
  'continuous',
  'single',
  'multimodal',
] as const;

/**
 * Generation parameters forwarded verbatim to the backend.
 */
export type GenerationConfig = Record<string, unknown>;

/**
 * Whole-response output of one prompt.
 */
export interface GenerationResult {
  text: string;
  /** Prompt length in tokens */
  inputLength: number;
  /** Number of generated tokens */
  generateLength: number;
}

/**
 * Producer side of a token stream. Synchronous backends push tokens here.
 */
export interface TokenSink {
  put(token: string): void;
  end(): void;
  fail(error: Error): void;
}

/**
 * Consumer side of a token stream that never blocks.
 *
 * `next()` throws `TokenNotReadyError` when the next token has not been
 * produced yet.
 */
export interface PollableTokenSource {
  next(): IteratorResult<string, void>;
  /** Resolves once a token or completion is available, or after `timeoutMs`. */
  whenReady?(timeoutMs: number): Promise<void>;
  /** Stop accepting tokens; called when the consumer terminates early. */
  cancel?(): void;
}

/**
 * Handle returned by `getStreamer()`: a fresh channel per streaming request.
 */
export interface TokenStreamerHandle extends TokenSink, PollableTokenSource {}

interface PredictorBase {
  readonly kind: PredictorKind;
  /** Prompt token count of the request currently being generated (0 when unknown). */
  readonly inputLength: number;
  generateAsync(prompts: string[], config: GenerationConfig): Promise<GenerationResult[]>;
  getStreamer(): TokenStreamerHandle;
}

export interface ShardedPredictor extends PredictorBase {
  readonly kind: 'sharded';
  generate(
    prompts: string[],
    config: GenerationConfig
  ): GenerationResult[] | Promise<GenerationResult[]>;
  streamingGenerate(
    prompt: string | string[],
    streamer: TokenSink,
    config: GenerationConfig
  ): void | Promise<void>;
}

export interface SingleProcessPredictor extends PredictorBase {
  readonly kind: 'single';
  generate(
    prompts: string[],
    config: GenerationConfig
  ): GenerationResult[] | Promise<GenerationResult[]>;
  streamingGenerate(
    prompt: string | string[],
    streamer: TokenSink,
    config: GenerationConfig
  ): void | Promise<void>;
}

export interface MultimodalPredictor extends PredictorBase {
  readonly kind: 'multimodal';
  generate(
    prompts: string[],
    config: GenerationConfig,
    images?: string[]
  ): GenerationResult[] | Promise<GenerationResult[]>;
  streamingGenerate(
    prompt: string | string[],
    streamer: TokenSink,
    config: GenerationConfig,
    images?: string[]
  ): void | Promise<void>;
}

export interface ContinuousBatchPredictor extends PredictorBase {
  readonly kind: 'continuous';
  streamingGenerateAsync(prompt: string, config: GenerationConfig): Promise<AsyncIterable<string>>;
}

export type Predictor =
  | ShardedPredictor
  | ContinuousBatchPredictor
  | SingleProcessPredictor
  | MultimodalPredictor;

/**
 * Predictors whose streaming path pushes into a caller-provided sink.
 */
export type SinkStreamingPredictor = ShardedPredictor | SingleProcessPredictor | MultimodalPredictor;
