/**
 * Deployment Configuration Schemas
 *
 * Zod schemas for validating runtime.yaml. Defaults are applied here so the
 * loader only has to merge environment overrides.
 *
 * @module schemas/config
 */

import { z } from 'zod';
import { LogLevelSchema, NonEmptyString, PositiveInteger, PredictorKindSchema } from './common.js';

/**
 * Prompt template settings handed to the chat processor
 */
export const PromptConfigSchema = z.object({
  intro: z.string().default(''),
  human_id: z.string().default(''),
  bot_id: z.string().default(''),
});

/**
 * Predictor selection
 */
export const PredictorConfigSchema = z.object({
  kind: PredictorKindSchema,
  model_id: NonEmptyString,
});

/**
 * Dynamic batching window
 */
export const DynamicBatchingConfigSchema = z.object({
  enabled: z.boolean().default(true),
  max_batch_size: PositiveInteger.max(256, 'must be <= 256').default(4),
  batch_wait_timeout_ms: z.number().min(0, 'must be >= 0').default(10),
});

/**
 * Streaming multiplexer
 */
export const StreamingConfigSchema = z.object({
  poll_interval_ms: z.number().positive('must be positive').max(1000, 'must be <= 1000ms').default(1),
});

/**
 * HTTP transport
 */
export const ServerConfigSchema = z.object({
  host: NonEmptyString.default('127.0.0.1'),
  port: z.number().int().min(0).max(65535, 'must be a valid port').default(8000),
  route_prefix: z
    .string()
    .regex(/^\/[A-Za-z0-9_\-/]*$/, 'must start with "/"')
    .default('/'),
  cors_origin: z.string().default('*'),
  body_limit: z.string().default('1mb'),
});

export const LoggingConfigSchema = z.object({
  level: LogLevelSchema.default('info'),
});

/**
 * Complete deployment configuration
 */
export const DeploymentConfigSchema = z.object({
  name: NonEmptyString,
  predictor: PredictorConfigSchema,
  chat_processor: z.string().min(1).nullable().default(null),
  prompt: PromptConfigSchema.default({}),
  dynamic_batching: DynamicBatchingConfigSchema.default({}),
  streaming: StreamingConfigSchema.default({}),
  server: ServerConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

export type DeploymentConfig = z.infer<typeof DeploymentConfigSchema>;
export type DeploymentConfigInput = z.input<typeof DeploymentConfigSchema>;
export type PromptConfig = z.infer<typeof PromptConfigSchema>;
