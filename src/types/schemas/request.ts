/**
 * Inbound request schemas
 *
 * Validation for the plain generation protocol (`{ text, stream, config }`)
 * and the OpenAI-compatible call path.
 */

import { z } from 'zod';
import { NonEmptyString } from './common.js';

/**
 * Multimodal chat content part
 */
export const ContentPartSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('text'),
    text: z.string(),
  }),
  z.object({
    type: z.literal('image_url'),
    image_url: z.object({
      url: NonEmptyString,
    }),
  }),
]);

export type ContentPart = z.infer<typeof ContentPartSchema>;

/**
 * One chat turn
 */
export const ChatMessageSchema = z.object({
  role: NonEmptyString,
  content: z.union([z.string(), z.array(ContentPartSchema)]),
});

export type ChatMessage = z.infer<typeof ChatMessageSchema>;

/**
 * Generation parameters: any plain object, forwarded to the predictor.
 */
export const GenerationConfigSchema = z.record(z.string(), z.unknown(), {
  errorMap: () => ({ message: 'config must be an object' }),
});

/**
 * Plain protocol request envelope.
 *
 * `text` is left untyped here: its shape errors map to dedicated error codes
 * (`EmptyPrompt`, `InvalidPromptFormat`) rather than a generic validation
 * failure.
 */
export const GatewayRequestSchema = z.object({
  text: z.unknown().optional(),
  stream: z.boolean({ invalid_type_error: 'stream must be a boolean' }).optional(),
  config: GenerationConfigSchema.optional(),
});

export type GatewayRequestBody = z.infer<typeof GatewayRequestSchema>;

/**
 * Request text after shape checks
 */
export type RequestText = string | Array<string | ChatMessage>;

/**
 * OpenAI-compatible request. Either `messages` or `prompt` must be set.
 */
export const OpenAiRequestSchema = z
  .object({
    messages: z.array(ChatMessageSchema).min(1, 'messages cannot be empty').optional(),
    prompt: z.union([NonEmptyString, z.array(NonEmptyString).min(1)]).optional(),
    stream: z.boolean().optional(),
    config: GenerationConfigSchema.optional(),
  })
  .refine((data) => data.messages !== undefined || data.prompt !== undefined, {
    message: 'Either messages or prompt is required',
    path: ['messages'],
  });

export type OpenAiRequestBody = z.infer<typeof OpenAiRequestSchema>;
