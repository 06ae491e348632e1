import {
  ErrorKind,
  PipelineError,
  noopLogger,
  type Logger,
} from '@resilient-api/core';
import type { BatchExecutor } from './executor';
import type { BatchOperation, BatchResult } from './types';

export const ROLLBACK_ID_PREFIX = 'rollback_';

export interface RollbackOutcome {
  /** Results of the compensating deletes, in the order they were issued. */
  attempted: BatchResult[];
  /**
   * Successful operations that were left in place: updates, deletes and
   * creates whose resource cannot be deleted again or whose guid is unknown.
   */
  notReversed: string[];
}

export class TransactionFailedError extends PipelineError {
  readonly failedIds: string[];
  readonly results: BatchResult[];
  readonly rollback?: RollbackOutcome;

  constructor(
    failedIds: string[],
    results: BatchResult[],
    rollback?: RollbackOutcome
  ) {
    const ids = failedIds.join(', ');
    const count = failedIds.length;
    super(ErrorKind.TransactionFailed, {
      detail: ids,
      message: `transaction failed, ${count} operations failed: [${ids}]`,
    });
    this.name = 'TransactionFailedError';
    this.failedIds = failedIds;
    this.results = results;
    this.rollback = rollback;
  }
}

/**
 * Batch that is undone on a best-effort basis when any operation fails: every
 * successful create of a reversible resource is deleted again. Updates and
 * deletes cannot be reverted and are reported in
 * {@link RollbackOutcome.notReversed}.
 *
 * With rollback disabled, `execute` resolves with the results even when some
 * operations failed.
 */
export class BatchTransaction {
  private readonly operations: BatchOperation[] = [];
  private rollback = true;

  constructor(
    private readonly executor: BatchExecutor,
    private readonly logger: Logger = noopLogger
  ) {}

  add(operation: BatchOperation): this {
    this.operations.push(operation);
    return this;
  }

  setRollback(enabled: boolean): this {
    this.rollback = enabled;
    return this;
  }

  async execute(signal?: AbortSignal): Promise<BatchResult[]> {
    const results = await this.executor.execute(this.operations, signal);
    const failedIds = results
      .filter((result) => !result.success)
      .map((result) => result.id);

    if (failedIds.length === 0 || !this.rollback) {
      return results;
    }

    const outcome = await this.performRollback(results, signal);
    this.logger.warn('batch.transaction.rolled_back', {
      failed: failedIds,
      reversed: outcome.attempted
        .filter((result) => result.success)
        .map((result) => result.id),
      notReversed: outcome.notReversed,
    });
    throw new TransactionFailedError(failedIds, results, outcome);
  }

  private async performRollback(
    results: BatchResult[],
    signal?: AbortSignal
  ): Promise<RollbackOutcome> {
    const compensations: BatchOperation[] = [];
    const notReversed: string[] = [];

    results.forEach((result, index) => {
      const original = this.operations[index];
      if (!result.success || original.type === 'get') return;
      const handler = this.executor.registry.get(original.resource);
      const guid =
        original.type === 'create'
          ? handler?.extractId(result.data)
          : undefined;

      if (!handler?.reversibleCreate || guid === undefined) {
        notReversed.push(original.id);
        return;
      }
      compensations.push({
        id: `${ROLLBACK_ID_PREFIX}${original.id}`,
        type: 'delete',
        resource: original.resource,
        data: guid,
      });
    });

    const attempted =
      compensations.length > 0
        ? await this.executor.execute(compensations, signal)
        : [];
    return { attempted, notReversed };
  }
}
