import { describe, it, expect } from 'vitest';
import { ChatModelGptJ, ChatModelwithImage } from '../../../src/chat/chat-processors.js';
import {
  PromptFormat,
  getPromptFormat,
  preprocessChatWithImages,
  preprocessPrompts,
} from '../../../src/core/prompt-normalizer.js';
import type { ChatMessage, PromptConfig } from '../../../src/types/index.js';

const promptConfig: PromptConfig = {
  intro: 'Intro\n',
  human_id: 'H: ',
  bot_id: 'B: ',
};

describe('getPromptFormat', () => {
  it('classifies a list of strings as prompts', () => {
    expect(getPromptFormat(['a', 'b'])).toBe(PromptFormat.PROMPTS_FORMAT);
  });

  it('classifies a list of chat turns as chat', () => {
    expect(getPromptFormat([{ role: 'user', content: 'hi' }])).toBe(PromptFormat.CHAT_FORMAT);
  });

  it('rejects empty, mixed and unknown lists', () => {
    expect(getPromptFormat([])).toBe(PromptFormat.INVALID_FORMAT);
    expect(getPromptFormat(['a', { role: 'user', content: 'x' }])).toBe(PromptFormat.INVALID_FORMAT);
    expect(getPromptFormat([1, 2])).toBe(PromptFormat.INVALID_FORMAT);
  });
});

describe('preprocessPrompts', () => {
  it('keeps a single string as is unless a list is requested', () => {
    const single = preprocessPrompts('hi', { returnList: false });
    const listed = preprocessPrompts('hi', { returnList: true });

    expect(single.ok && single.val).toBe('hi');
    expect(listed.ok && listed.val).toEqual(['hi']);
  });

  it('returns a flat prompt list unchanged and is idempotent', () => {
    const input = ['first', 'second', 'third'];
    const once = preprocessPrompts(input, { returnList: false });
    expect(once.ok).toBe(true);
    if (!once.ok) return;

    expect(once.val).toEqual(input);
    expect(once.val).not.toBe(input);

    const twice = preprocessPrompts(once.val, { returnList: false });
    expect(twice.ok && twice.val).toEqual(input);
  });

  it('formats chat turns with the chat processor', () => {
    const messages: ChatMessage[] = [{ role: 'user', content: 'hello' }];

    const single = preprocessPrompts(messages, {
      returnList: false,
      chatProcessor: new ChatModelGptJ(promptConfig),
    });
    const listed = preprocessPrompts(messages, {
      returnList: true,
      chatProcessor: new ChatModelGptJ(promptConfig),
    });

    expect(single.ok && single.val).toBe('Intro\nH: hello\nB: ');
    expect(listed.ok && listed.val).toEqual(['Intro\nH: hello\nB: ']);
  });

  it('keeps a conversation as one prompt when no processor is configured', () => {
    const result = preprocessPrompts(
      [
        { role: 'system', content: 'be terse' },
        { role: 'user', content: 'a' },
        { role: 'assistant', content: 'b' },
      ],
      { returnList: false }
    );

    expect(result.ok && result.val).toEqual(['be terse\na\nb']);
  });

  it('returns InvalidPromptFormat for an unsupported shape', () => {
    const result = preprocessPrompts([1], { returnList: false });

    expect(result.err).toBe(true);
    if (result.ok) return;
    expect(result.val.code).toBe('InvalidPromptFormat');
    expect(result.val.httpStatus).toBe(400);
  });
});

describe('preprocessChatWithImages', () => {
  const messages: ChatMessage[] = [
    {
      role: 'user',
      content: [
        { type: 'text', text: 'look' },
        { type: 'image_url', image_url: { url: 'img://1' } },
      ],
    },
  ];

  it('returns the formatted prompt and the image references', () => {
    expect(preprocessChatWithImages(messages, new ChatModelwithImage(promptConfig))).toEqual({
      prompts: ['Intro\nH: look\nB: '],
      images: ['img://1'],
    });
  });

  it('returns no images for a text-only processor', () => {
    expect(preprocessChatWithImages(messages, new ChatModelGptJ(promptConfig))).toEqual({
      prompts: ['Intro\nH: look\nB: '],
      images: [],
    });
  });

  it('falls back to the turn text without a processor', () => {
    expect(preprocessChatWithImages(messages, null)).toEqual({ prompts: ['look'], images: [] });
  });

  it('joins several turns into one prompt without a processor', () => {
    expect(
      preprocessChatWithImages(
        [{ role: 'system', content: 'be terse' }, ...messages],
        null
      )
    ).toEqual({ prompts: ['be terse\nlook'], images: [] });
  });
});
