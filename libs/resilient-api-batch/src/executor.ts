import {
  CancelledError,
  TimeoutError,
  errorMessage,
  noopLogger,
  type Clock,
  type Logger,
} from '@resilient-api/core';
import { dispatchOperation, type ResourceRegistry } from './registry';
import { Semaphore } from './semaphore';
import type { BatchOperation, BatchResult } from './types';

export const DEFAULT_BATCH_CONCURRENCY = 5;
export const DEFAULT_BATCH_TIMEOUT_MS = 30_000;

export interface BatchExecutorOptions {
  /** Operations in flight at once; values below 1 fall back to the default. */
  concurrency?: number;
  /** Deadline for each operation, counted from the moment it starts. */
  timeoutMs?: number;
  logger?: Logger;
  clock?: Clock;
}

/**
 * Runs batches of operations through a {@link ResourceRegistry} with bounded
 * parallelism.
 *
 * `execute` always resolves with one result per operation, in input order; a
 * failed, timed-out or unsupported operation is reported in its own result and
 * never fails the batch.
 *
 * @example
 * ```typescript
 * const registry = createDefaultResourceRegistry(client.http);
 * const executor = new BatchExecutor(registry, { concurrency: 3 });
 * const results = await executor.execute(
 *   new BatchBuilder()
 *     .addGetApp('a', appGuid)
 *     .addDeleteSpace('b', spaceGuid)
 *     .build()
 * );
 * ```
 */
export class BatchExecutor {
  readonly concurrency: number;
  private timeoutMs: number;
  private readonly logger: Logger;
  private readonly now: Clock;

  constructor(
    readonly registry: ResourceRegistry,
    options: BatchExecutorOptions = {}
  ) {
    const concurrency = Math.floor(
      options.concurrency ?? DEFAULT_BATCH_CONCURRENCY
    );
    this.concurrency =
      concurrency > 0 ? concurrency : DEFAULT_BATCH_CONCURRENCY;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_BATCH_TIMEOUT_MS;
    this.logger = options.logger ?? noopLogger;
    this.now = options.clock ?? Date.now;
  }

  get timeout(): number {
    return this.timeoutMs;
  }

  setTimeout(timeoutMs: number): void {
    this.timeoutMs = timeoutMs;
  }

  async execute(
    operations: readonly BatchOperation[],
    signal?: AbortSignal
  ): Promise<BatchResult[]> {
    const semaphore = new Semaphore(this.concurrency);
    const results = new Array<BatchResult>(operations.length);
    const startedAt = this.now();

    this.logger.debug('batch.started', {
      operations: operations.length,
      concurrency: this.concurrency,
    });

    await Promise.all(
      operations.map((operation, index) =>
        semaphore.run(async () => {
          const result = await this.runOperation(operation, signal);
          results[index] = result;
          this.notify(operation, result);
        })
      )
    );

    const failed = results.filter((result) => !result.success).length;
    this.logger.info('batch.completed', {
      operations: operations.length,
      failed,
      durationMs: this.now() - startedAt,
    });
    return results;
  }

  private async runOperation(
    operation: BatchOperation,
    signal?: AbortSignal
  ): Promise<BatchResult> {
    const started = performance.now();
    let data: unknown;
    let error: unknown;

    try {
      data = await this.withDeadline(
        (opSignal) => dispatchOperation(this.registry, operation, opSignal),
        signal
      );
    } catch (err) {
      error = err;
    }

    const durationMs = performance.now() - started;
    const id = operation.id;
    if (error === undefined) {
      this.logger.debug('batch.operation.completed', { id, durationMs });
      return { id, success: true, data, durationMs };
    }
    this.logger.warn('batch.operation.failed', {
      id,
      error: errorMessage(error),
      durationMs,
    });
    return { id, success: false, error, durationMs };
  }

  /**
   * Runs `task` with a signal that aborts after the batch timeout or when the
   * caller's signal aborts, and stops waiting for the task at that point.
   */
  private withDeadline<T>(
    task: (signal: AbortSignal) => Promise<T>,
    parent?: AbortSignal
  ): Promise<T> {
    if (parent?.aborted) {
      return Promise.reject(new CancelledError(parent.reason));
    }

    const controller = new AbortController();
    return new Promise<T>((resolve, reject) => {
      const settle = () => {
        clearTimeout(timer);
        parent?.removeEventListener('abort', onParentAbort);
      };
      const fail = (error: unknown) => {
        settle();
        controller.abort(error);
        reject(error);
      };
      const onParentAbort = () => fail(new CancelledError(parent?.reason));
      const timer = setTimeout(
        () => fail(new TimeoutError(this.timeoutMs)),
        this.timeoutMs
      );
      parent?.addEventListener('abort', onParentAbort, { once: true });

      task(controller.signal).then(
        (value) => {
          settle();
          resolve(value);
        },
        (error: unknown) => {
          settle();
          reject(error);
        }
      );
    });
  }

  private notify(operation: BatchOperation, result: BatchResult): void {
    if (!operation.callback) return;
    try {
      operation.callback(result);
    } catch (error) {
      this.logger.warn('batch.callback.failed', {
        id: operation.id,
        error: errorMessage(error),
      });
    }
  }
}
