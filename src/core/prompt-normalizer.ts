/**
 * Prompt Normalizer
 *
 * Converts a request's `text` (one prompt, a list of prompts, or a list of
 * chat turns) into the prompt shape predictors take. Shape problems are
 * returned as `Err` values so callers can answer 400 without exceptions.
 */

import { GatewayError } from '../api/errors.js';
import type { ChatProcessor } from '../chat/chat-processors.js';
import { isImageChatProcessor, messageText } from '../chat/chat-processors.js';
import { ChatMessageSchema } from '../types/schemas/request.js';
import type { ChatMessage } from '../types/index.js';
import { Err, Ok, type Result } from '../utils/result-helpers.js';

export enum PromptFormat {
  CHAT_FORMAT = 'chat',
  PROMPTS_FORMAT = 'prompts',
  INVALID_FORMAT = 'invalid',
}

/**
 * One prompt or an ordered list of prompts. Order is preserved end to end.
 */
export type NormalizedPrompt = string | string[];

export interface PreprocessOptions {
  /** Return a list even when the input is a single prompt */
  returnList: boolean;
  chatProcessor?: ChatProcessor | null;
}

export function isChatMessage(value: unknown): value is ChatMessage {
  return ChatMessageSchema.safeParse(value).success;
}

/**
 * Classify a list of request items.
 *
 * Every item a chat turn → CHAT_FORMAT; every item a string →
 * PROMPTS_FORMAT; empty or mixed → INVALID_FORMAT.
 */
export function getPromptFormat(items: readonly unknown[]): PromptFormat {
  if (items.length === 0) {
    return PromptFormat.INVALID_FORMAT;
  }
  if (items.every((item) => typeof item === 'string')) {
    return PromptFormat.PROMPTS_FORMAT;
  }
  if (items.every(isChatMessage)) {
    return PromptFormat.CHAT_FORMAT;
  }
  return PromptFormat.INVALID_FORMAT;
}

function invalidFormat(message = 'Invalid prompt format.'): GatewayError {
  return new GatewayError('InvalidPromptFormat', message);
}

/**
 * Preprocess request text into predictor prompts.
 *
 * - list of chat turns with a processor → one formatted prompt
 *   (`[prompt]` when `returnList`)
 * - list of chat turns without a processor → `[conversation]`, the turns'
 *   text joined with newlines in order; a conversation is never split
 * - list of prompt strings → the same prompts, in order
 * - single string → `[text]` when `returnList`, else `text`
 */
export function preprocessPrompts(
  text: string | readonly unknown[],
  options: PreprocessOptions
): Result<NormalizedPrompt, GatewayError> {
  if (typeof text === 'string') {
    return Ok(options.returnList ? [text] : text);
  }

  const format = getPromptFormat(text);

  if (format === PromptFormat.PROMPTS_FORMAT) {
    return Ok(text.filter((item): item is string => typeof item === 'string'));
  }

  if (format === PromptFormat.CHAT_FORMAT) {
    const messages = text.filter(isChatMessage);
    if (options.chatProcessor) {
      const prompt = options.chatProcessor.getPrompt(messages);
      return Ok(options.returnList ? [prompt] : prompt);
    }
    return Ok([joinTurns(messages)]);
  }

  return Err(invalidFormat());
}

export interface ChatPromptsWithImages {
  prompts: string[];
  images: string[];
}

/**
 * Preprocess chat turns for a multimodal predictor: the formatted prompt
 * plus every referenced image, in message order.
 */
export function preprocessChatWithImages(
  messages: ChatMessage[],
  chatProcessor: ChatProcessor | null | undefined
): ChatPromptsWithImages {
  if (chatProcessor && isImageChatProcessor(chatProcessor)) {
    const { prompt, images } = chatProcessor.getPromptWithImages(messages);
    return { prompts: [prompt], images };
  }
  if (chatProcessor) {
    return { prompts: [chatProcessor.getPrompt(messages)], images: [] };
  }
  return { prompts: [joinTurns(messages)], images: [] };
}

/**
 * One prompt holding every turn's text, in order.
 */
export function joinTurns(messages: ChatMessage[]): string {
  return messages.map(messageText).join('\n');
}
