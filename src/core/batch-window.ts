/**
 * BatchWindow
 *
 * Groups independently arriving calls into bounded windows and hands each
 * window to a handler exactly once. A window closes when `maxBatchSize`
 * entries are pending or `batchWaitTimeoutMs` has elapsed since its first
 * entry, whichever comes first. Only one window is in flight at a time;
 * entries that arrive meanwhile form the next window.
 *
 * The handler returns one Result per entry, in entry order, and each caller
 * settles with its own Result.
 */

import type { Logger } from 'pino';
import type { Result } from '../utils/result-helpers.js';
import { lazyLog } from '../utils/logger-helpers.js';

export type BatchHandler<TEntry, TResult> = (
  entries: TEntry[]
) => Promise<Array<Result<TResult, Error>>>;

/**
 * Telemetry payload emitted when a window is dispatched.
 */
export interface BatchWindowDispatchEvent {
  windowSize: number;
  durationMs: number;
  queueWaitMaxMs: number;
  failed: boolean;
}

export interface BatchWindowConfig {
  enabled?: boolean;
  maxBatchSize?: number;
  batchWaitTimeoutMs?: number;
  logger?: Logger;
  onWindowDispatched?: (event: BatchWindowDispatchEvent) => void;
}

export interface BatchWindowStats {
  enabled: boolean;
  pending: number;
  inFlight: boolean;
  totalWindows: number;
  totalEntries: number;
  failedWindows: number;
  lastWindowSize?: number;
}

interface QueueEntry<TEntry, TResult> {
  payload: TEntry;
  resolve: (value: TResult) => void;
  reject: (error: Error) => void;
  enqueuedAt: number;
}

const DEFAULT_CONFIG = {
  enabled: true,
  maxBatchSize: 4,
  batchWaitTimeoutMs: 10,
};

const CLOSED_ERROR_MESSAGE = 'Batch window closed';

export class BatchWindow<TEntry, TResult> {
  private readonly handler: BatchHandler<TEntry, TResult>;
  private readonly logger?: Logger;
  private readonly onWindowDispatched?: (event: BatchWindowDispatchEvent) => void;
  private readonly enabled: boolean;
  private readonly maxBatchSize: number;
  private readonly batchWaitTimeoutMs: number;

  private queue: Array<QueueEntry<TEntry, TResult>> = [];
  private timer?: NodeJS.Timeout;
  private pendingDispatch = false;
  private flushing = false;
  private closed = false;

  private stats: {
    totalWindows: number;
    totalEntries: number;
    failedWindows: number;
    lastWindowSize?: number;
  } = {
    totalWindows: 0,
    totalEntries: 0,
    failedWindows: 0,
  };

  constructor(handler: BatchHandler<TEntry, TResult>, options: BatchWindowConfig = {}) {
    this.handler = handler;
    this.logger = options.logger;
    this.onWindowDispatched = options.onWindowDispatched;
    this.enabled = options.enabled ?? DEFAULT_CONFIG.enabled;
    this.maxBatchSize = this.enabled
      ? Math.max(1, Math.floor(options.maxBatchSize ?? DEFAULT_CONFIG.maxBatchSize))
      : 1;
    this.batchWaitTimeoutMs = Math.max(0, options.batchWaitTimeoutMs ?? DEFAULT_CONFIG.batchWaitTimeoutMs);

    this.logger?.debug(
      {
        enabled: this.enabled,
        maxBatchSize: this.maxBatchSize,
        batchWaitTimeoutMs: this.batchWaitTimeoutMs,
      },
      'BatchWindow initialized'
    );
  }

  /**
   * Admit one entry into the current window.
   */
  public enqueue(payload: TEntry): Promise<TResult> {
    if (this.closed) {
      return Promise.reject(new Error(CLOSED_ERROR_MESSAGE));
    }

    return new Promise<TResult>((resolve, reject) => {
      this.queue.push({ payload, resolve, reject, enqueuedAt: Date.now() });

      lazyLog(
        this.logger,
        'trace',
        () => ({ pending: this.queue.length, maxBatchSize: this.maxBatchSize }),
        'Entry admitted to batch window'
      );

      this.scheduleDispatch();
    });
  }

  /**
   * Dispatch pending entries now, without waiting for the window timer.
   * Resolves once the window in flight (if any) and the flushed ones complete.
   */
  public async flush(): Promise<void> {
    this.clearTimer();
    while (this.queue.length > 0 || this.flushing) {
      if (this.flushing) {
        await new Promise<void>((resolve) => {
          setImmediate(resolve);
        });
        continue;
      }
      await this.dispatchWindow();
    }
  }

  /**
   * Reject pending entries and stop admitting new ones.
   */
  public close(): void {
    this.closed = true;
    this.clearTimer();

    const pending = this.queue.splice(0);
    for (const entry of pending) {
      entry.reject(new Error(CLOSED_ERROR_MESSAGE));
    }
  }

  public getStats(): BatchWindowStats {
    return {
      enabled: this.enabled,
      pending: this.queue.length,
      inFlight: this.flushing,
      totalWindows: this.stats.totalWindows,
      totalEntries: this.stats.totalEntries,
      failedWindows: this.stats.failedWindows,
      lastWindowSize: this.stats.lastWindowSize,
    };
  }

  /**
   * Decide whether the current window should close now or wait.
   */
  private scheduleDispatch(): void {
    if (this.pendingDispatch || this.flushing || this.queue.length === 0) {
      return;
    }

    const oldest = this.queue[0];
    const elapsed = oldest ? Date.now() - oldest.enqueuedAt : 0;

    if (this.queue.length >= this.maxBatchSize || elapsed >= this.batchWaitTimeoutMs) {
      this.clearTimer();
      this.pendingDispatch = true;
      queueMicrotask(() => {
        void this.dispatchWindow();
      });
      return;
    }

    if (this.timer) {
      return;
    }

    this.timer = setTimeout(() => {
      this.timer = undefined;
      this.scheduleDispatch();
    }, Math.max(0, Math.ceil(this.batchWaitTimeoutMs - elapsed)));
  }

  /**
   * Hand one window to the handler and settle every caller in it.
   */
  private async dispatchWindow(): Promise<void> {
    this.pendingDispatch = false;
    if (this.flushing || this.queue.length === 0) {
      return;
    }

    const entries = this.queue.splice(0, this.maxBatchSize);
    this.flushing = true;

    const startedAt = Date.now();
    const queueWaitMaxMs = entries.reduce(
      (max, entry) => Math.max(max, startedAt - entry.enqueuedAt),
      0
    );
    let failed = false;

    try {
      const results = await this.handler(entries.map((entry) => entry.payload));

      if (results.length !== entries.length) {
        throw new Error(
          `Batch result length mismatch: expected ${entries.length}, received ${results.length}`
        );
      }

      entries.forEach((entry, index) => {
        const result = results[index];
        if (result === undefined) {
          entry.reject(new Error(`Missing batch result at index ${index}`));
        } else if (result.ok) {
          entry.resolve(result.val);
        } else {
          entry.reject(result.val);
        }
      });
    } catch (err) {
      failed = true;
      const error = err instanceof Error ? err : new Error(String(err));
      this.stats.failedWindows += 1;

      this.logger?.error(
        { windowSize: entries.length, error: error.message },
        'Batch window dispatch failed'
      );

      for (const entry of entries) {
        entry.reject(error);
      }
    } finally {
      const durationMs = Date.now() - startedAt;
      this.stats.totalWindows += 1;
      this.stats.totalEntries += entries.length;
      this.stats.lastWindowSize = entries.length;
      this.flushing = false;

      this.onWindowDispatched?.({
        windowSize: entries.length,
        durationMs,
        queueWaitMaxMs,
        failed,
      });

      if (!this.closed && this.queue.length > 0) {
        this.scheduleDispatch();
      }
    }
  }

  private clearTimer(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
  }
}
