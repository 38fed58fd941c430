/**
 * TokenStreamer
 *
 * Per-request token channel between a synchronous predictor (producer,
 * running off the serving path) and the stream multiplexer (consumer).
 * Consumers never block: `next()` throws `TokenNotReadyError` when the
 * buffer is empty, and `whenReady()` wakes them as soon as the producer
 * pushes, finishes or fails.
 */

import { EventEmitter } from 'eventemitter3';
import type { TokenStreamerHandle } from '../types/index.js';

/**
 * Signal raised by a pollable source whose next token is not produced yet.
 */
export class TokenNotReadyError extends Error {
  constructor(message = 'Next token is not available yet') {
    super(message);
    this.name = 'TokenNotReadyError';
  }
}

interface TokenStreamerEvents {
  ready: () => void;
}

export class TokenStreamer extends EventEmitter<TokenStreamerEvents> implements TokenStreamerHandle {
  private readonly tokens: string[] = [];
  private finished = false;
  private cancelled = false;
  private failure: Error | null = null;

  public get isFinished(): boolean {
    return this.finished;
  }

  public get isCancelled(): boolean {
    return this.cancelled;
  }

  public put(token: string): void {
    if (this.finished) {
      return;
    }
    this.tokens.push(token);
    this.emit('ready');
  }

  public end(): void {
    if (this.finished) {
      return;
    }
    this.finished = true;
    this.emit('ready');
  }

  public fail(error: Error): void {
    if (this.finished) {
      return;
    }
    this.failure = error;
    this.finished = true;
    this.emit('ready');
  }

  /**
   * Drop buffered tokens and ignore anything the producer pushes later.
   */
  public cancel(): void {
    this.cancelled = true;
    this.tokens.length = 0;
    this.finished = true;
    this.emit('ready');
    this.removeAllListeners();
  }

  /**
   * Pull the next token without waiting.
   *
   * Buffered tokens are always delivered before a failure is rethrown.
   *
   * @throws {TokenNotReadyError} when the producer has not pushed the next token yet
   */
  public next(): IteratorResult<string, void> {
    const token = this.tokens.shift();
    if (token !== undefined) {
      return { done: false, value: token };
    }
    if (this.failure && !this.cancelled) {
      throw this.failure;
    }
    if (this.finished) {
      return { done: true, value: undefined };
    }
    throw new TokenNotReadyError();
  }

  /**
   * Resolve when a token, completion or failure is available, or after
   * `timeoutMs`, whichever comes first.
   */
  public whenReady(timeoutMs: number): Promise<void> {
    if (this.tokens.length > 0 || this.finished) {
      return Promise.resolve();
    }

    return new Promise<void>((resolve) => {
      const onReady = (): void => {
        clearTimeout(timer);
        resolve();
      };
      const timer = setTimeout(() => {
        this.off('ready', onReady);
        resolve();
      }, timeoutMs);
      this.once('ready', onReady);
    });
  }
}
