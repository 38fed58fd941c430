export { PredictorDeployment } from './api/predictor-deployment.js';
export type {
  PredictorDeploymentOptions,
  DynamicBatchingOptions,
  CallOptions,
  OpenAiPrompt,
  DeploymentStats,
} from './api/predictor-deployment.js';
export {
  GatewayError,
  toGatewayError,
  zodErrorToGatewayError,
  type GatewayErrorCode,
  type GatewayErrorShape,
} from './api/errors.js';
export type * from './api/events.js';

export * from './chat/chat-processors.js';

export {
  PromptFormat,
  getPromptFormat,
  preprocessPrompts,
  preprocessChatWithImages,
  type NormalizedPrompt,
} from './core/prompt-normalizer.js';
export { BatchRouter, selectStrategy, type BatchStrategy } from './core/batch-router.js';
export { computeBatchKey, type BatchKey } from './core/batch-key.js';
export { BatchWindow, type BatchWindowConfig, type BatchWindowStats } from './core/batch-window.js';
export {
  DynamicBatchAccumulator,
  groupByBatchKey,
  type DynamicBatchAccumulatorOptions,
  type DynamicBatchStats,
} from './core/dynamic-batch-accumulator.js';
export { TokenStreamer, TokenNotReadyError } from './core/token-streamer.js';
export {
  pollTokens,
  forwardTokens,
  openTokenStream,
  DEFAULT_POLL_INTERVAL_MS,
} from './core/stream-multiplexer.js';
export { toModelResponse, tokenResponse, envelopeStream } from './core/response-envelope.js';

export { SyncPredictorBase } from './adapters/base-predictor.js';
export * from './adapters/echo-predictor.js';

export { initializeConfig, getConfig, resetConfig, loadConfig, validateConfig } from './config/loader.js';
export { GatewayHttpServer, joinRoute, type HttpServerOptions } from './transport/http-server.js';
export { createLogger } from './utils/logger.js';

export * from './types/index.js';
export {
  GatewayRequestSchema,
  OpenAiRequestSchema,
  ChatMessageSchema,
  ContentPartSchema,
  GenerationConfigSchema,
  DeploymentConfigSchema,
  PromptConfigSchema,
} from './types/schemas/index.js';
