/**
 * Chat processors
 *
 * Turn a list of chat turns into the single prompt string a completion-style
 * predictor expects. A deployment names its processor in configuration;
 * naming one that does not exist is fatal at startup.
 */

import { GatewayError } from '../api/errors.js';
import type { ChatMessage, PromptConfig } from '../types/index.js';

/**
 * Formats chat turns into one prompt.
 */
export interface ChatProcessor {
  readonly name: string;
  getPrompt(messages: ChatMessage[]): string;
}

/**
 * Chat processor that also extracts image references for multimodal predictors.
 */
export interface ImageChatProcessor extends ChatProcessor {
  getPromptWithImages(messages: ChatMessage[]): { prompt: string; images: string[] };
}

export function isImageChatProcessor(processor: ChatProcessor): processor is ImageChatProcessor {
  return 'getPromptWithImages' in processor;
}

/**
 * Text content of a chat turn; image parts are skipped.
 */
export function messageText(message: ChatMessage): string {
  if (typeof message.content === 'string') {
    return message.content;
  }
  return message.content
    .map((part) => (part.type === 'text' ? part.text : ''))
    .filter((text) => text.length > 0)
    .join('\n');
}

/**
 * Role-prefixed turns: `intro`, then `human_id`/`bot_id` lines, ending with
 * `bot_id` so the model continues as the assistant.
 */
export class ChatModelGptJ implements ChatProcessor {
  public readonly name: string = 'ChatModelGptJ';

  constructor(protected readonly prompt: PromptConfig) {}

  public getPrompt(messages: ChatMessage[]): string {
    let formatted = this.prompt.intro;

    for (const message of messages) {
      const text = messageText(message);
      if (message.role === 'system') {
        formatted = `${text}\n${formatted}`;
      } else if (message.role === 'assistant') {
        formatted += `${this.prompt.bot_id}${text}\n`;
      } else {
        formatted += `${this.prompt.human_id}${text}\n`;
      }
    }

    return `${formatted}${this.prompt.bot_id}`;
  }
}

/**
 * Llama-2 chat template: `[INST]` blocks with an optional `<<SYS>>` header.
 */
export class ChatModelLLama implements ChatProcessor {
  public readonly name = 'ChatModelLLama';

  constructor(private readonly prompt: PromptConfig) {}

  public getPrompt(messages: ChatMessage[]): string {
    const system = messages
      .filter((message) => message.role === 'system')
      .map(messageText)
      .join('\n');
    const intro = system.length > 0 ? system : this.prompt.intro;

    let formatted = '';
    let pendingSystem = intro.length > 0 ? `<<SYS>>\n${intro}\n<</SYS>>\n\n` : '';

    for (const message of messages) {
      if (message.role === 'system') {
        continue;
      }
      const text = messageText(message);
      if (message.role === 'assistant') {
        formatted += ` ${text} </s>`;
      } else {
        formatted += `<s>[INST] ${pendingSystem}${text} [/INST]`;
        pendingSystem = '';
      }
    }

    return formatted;
  }
}

/**
 * GPT-J style formatting that also collects `image_url` parts in order.
 */
export class ChatModelwithImage extends ChatModelGptJ implements ImageChatProcessor {
  public override readonly name = 'ChatModelwithImage';

  public getPromptWithImages(messages: ChatMessage[]): { prompt: string; images: string[] } {
    const images: string[] = [];
    for (const message of messages) {
      if (typeof message.content === 'string') {
        continue;
      }
      for (const part of message.content) {
        if (part.type === 'image_url') {
          images.push(part.image_url.url);
        }
      }
    }

    return { prompt: this.getPrompt(messages), images };
  }
}

const CHAT_PROCESSORS: Readonly<Record<string, (prompt: PromptConfig) => ChatProcessor>> = {
  ChatModelGptJ: (prompt) => new ChatModelGptJ(prompt),
  ChatModelLLama: (prompt) => new ChatModelLLama(prompt),
  ChatModelwithImage: (prompt) => new ChatModelwithImage(prompt),
};

export function listChatProcessors(): string[] {
  return Object.keys(CHAT_PROCESSORS);
}

/**
 * Resolve a chat processor by name.
 *
 * @throws {GatewayError} `ChatProcessorNotFound` when the name is unknown.
 */
export function createChatProcessor(
  name: string,
  prompt: PromptConfig,
  deploymentName = 'predictor'
): ChatProcessor {
  const factory = Object.prototype.hasOwnProperty.call(CHAT_PROCESSORS, name)
    ? CHAT_PROCESSORS[name]
    : undefined;

  if (!factory) {
    throw new GatewayError(
      'ChatProcessorNotFound',
      `${deploymentName} deployment failed. chat_processor(${name}) does not exist.`,
      { chatProcessor: name, available: listChatProcessors() }
    );
  }

  return factory(prompt);
}
