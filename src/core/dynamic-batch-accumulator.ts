/**
 * DynamicBatchAccumulator
 *
 * Combines single-prompt requests from independent callers into shared
 * predictor calls. Each window admitted by the BatchWindow is partitioned by
 * BatchKey (entries with different generation configs never share a call),
 * every group is generated with one `generateAsync` call, and results are
 * scattered back by window position.
 *
 * Failure policy: a group whose predictor call fails marks only its own
 * entries with an explicit `BackendGenerationFailure`; other groups in the
 * same window still succeed.
 */

import type { Logger } from 'pino';
import { GatewayError, toGatewayError } from '../api/errors.js';
import type { GenerationConfig, GenerationResult, Predictor } from '../types/index.js';
import { Err, Ok, resultify, type Result } from '../utils/result-helpers.js';
import { computeBatchKey, type BatchKey } from './batch-key.js';
import { BatchWindow, type BatchWindowDispatchEvent, type BatchWindowStats } from './batch-window.js';

/**
 * What a caller submits: its prompt and the config it must be generated with.
 */
export interface BatchSubmission {
  prompt: string;
  config: GenerationConfig;
  batchKey: BatchKey;
}

/**
 * A submission placed in a window; `requestIndex` is its window position.
 */
export interface PendingBatchEntry extends BatchSubmission {
  requestIndex: number;
}

/**
 * Telemetry payload emitted after each window.
 */
export interface DynamicBatchDispatchEvent extends BatchWindowDispatchEvent {
  groups: number;
  failedGroups: number;
}

export interface DynamicBatchAccumulatorOptions {
  enabled?: boolean;
  maxBatchSize?: number;
  batchWaitTimeoutMs?: number;
  logger?: Logger;
  onBatchDispatched?: (event: DynamicBatchDispatchEvent) => void;
}

export interface DynamicBatchStats extends BatchWindowStats {
  backendCalls: number;
  failedGroups: number;
}

type EntryResult = Result<GenerationResult, GatewayError>;

/**
 * Partition window entries by BatchKey, keeping first-appearance order of
 * keys and entry order within each group.
 */
export function groupByBatchKey(entries: PendingBatchEntry[]): Map<BatchKey, PendingBatchEntry[]> {
  const groups = new Map<BatchKey, PendingBatchEntry[]>();
  for (const entry of entries) {
    const group = groups.get(entry.batchKey);
    if (group) {
      group.push(entry);
    } else {
      groups.set(entry.batchKey, [entry]);
    }
  }
  return groups;
}

export class DynamicBatchAccumulator {
  private readonly generator: Pick<Predictor, 'generateAsync'>;
  private readonly window: BatchWindow<BatchSubmission, GenerationResult>;
  private readonly logger?: Logger;
  private readonly onBatchDispatched?: (event: DynamicBatchDispatchEvent) => void;

  private backendCalls = 0;
  private failedGroups = 0;
  private lastWindowGroups = { groups: 0, failedGroups: 0 };

  constructor(
    generator: Pick<Predictor, 'generateAsync'>,
    options: DynamicBatchAccumulatorOptions = {}
  ) {
    this.generator = generator;
    this.logger = options.logger;
    this.onBatchDispatched = options.onBatchDispatched;

    this.window = new BatchWindow<BatchSubmission, GenerationResult>(
      (submissions) => this.handleWindow(submissions),
      {
        enabled: options.enabled,
        maxBatchSize: options.maxBatchSize,
        batchWaitTimeoutMs: options.batchWaitTimeoutMs,
        logger: options.logger,
        onWindowDispatched: (event) => {
          this.onBatchDispatched?.({ ...event, ...this.lastWindowGroups });
        },
      }
    );
  }

  /**
   * Submit one prompt; resolves with exactly this caller's result.
   *
   * @throws {GatewayError} `BackendGenerationFailure` when this caller's group failed
   */
  public submit(prompt: string, config: GenerationConfig = {}): Promise<GenerationResult> {
    return this.window.enqueue({ prompt, config, batchKey: computeBatchKey(config) });
  }

  public flush(): Promise<void> {
    return this.window.flush();
  }

  public close(): void {
    this.window.close();
  }

  public getStats(): DynamicBatchStats {
    return {
      ...this.window.getStats(),
      backendCalls: this.backendCalls,
      failedGroups: this.failedGroups,
    };
  }

  /**
   * Generate one window: one predictor call per BatchKey group, results
   * scattered into a window-sized array by `requestIndex`.
   */
  public async handleWindow(submissions: BatchSubmission[]): Promise<EntryResult[]> {
    const entries: PendingBatchEntry[] = submissions.map((submission, requestIndex) => ({
      ...submission,
      requestIndex,
    }));
    const groups = groupByBatchKey(entries);
    const results = new Array<EntryResult | undefined>(entries.length).fill(undefined);
    let failedGroups = 0;

    this.logger?.info(
      { batchSize: entries.length, groups: groups.size },
      'Handling dynamic batch'
    );

    await Promise.all(
      Array.from(groups.values()).map(async (group) => {
        const outcome = await this.generateGroup(group);
        if (outcome.err) {
          failedGroups += 1;
        }
        group.forEach((entry, position) => {
          if (outcome.err) {
            results[entry.requestIndex] = Err(outcome.val);
            return;
          }
          const value = outcome.val[position];
          results[entry.requestIndex] = value
            ? Ok(value)
            : Err(
                new GatewayError(
                  'BackendGenerationFailure',
                  `No result produced for batch entry ${entry.requestIndex}`
                )
              );
        });
      })
    );

    this.failedGroups += failedGroups;
    this.lastWindowGroups = { groups: groups.size, failedGroups };

    return results.map(
      (result, index) =>
        result ??
        Err(
          new GatewayError('BackendGenerationFailure', `No result produced for batch entry ${index}`)
        )
    );
  }

  private async generateGroup(
    group: PendingBatchEntry[]
  ): Promise<Result<GenerationResult[], GatewayError>> {
    const [head] = group;
    const config = head?.config ?? {};
    const prompts = group.map((entry) => entry.prompt);

    this.backendCalls += 1;
    const outcome = await resultify(
      Promise.resolve().then(() => this.generator.generateAsync(prompts, config))
    );

    if (outcome.err) {
      const failure = toGatewayError(outcome.val, 'BackendGenerationFailure');
      this.logger?.error(
        { groupSize: group.length, batchKey: head?.batchKey, error: failure.message },
        'Dynamic batch group failed'
      );
      return Err(failure);
    }

    if (outcome.val.length !== group.length) {
      const failure = new GatewayError(
        'BackendGenerationFailure',
        `Predictor returned ${outcome.val.length} results for ${group.length} prompts`,
        { expected: group.length, received: outcome.val.length }
      );
      this.logger?.error({ batchKey: head?.batchKey }, failure.message);
      return Err(failure);
    }

    return Ok(outcome.val);
  }
}
