import { BatchOutcome, TransferResult } from '../types/transfer.js';
import { createTaskDescriptor } from './TaskEnumerator.js';

/**
 * Reduces per-task results into a batch outcome for reporting and caller-driven retry
 */
export class ResultAggregator {
  static aggregate(results: TransferResult[]): BatchOutcome {
    const failures = results.filter((result) => !result.success);

    const retryableTasks = failures
      .filter((result) => result.failureDetail?.retryable === true)
      .map((result) =>
        createTaskDescriptor(result.container, result.objectName, result.localPath, result.direction)
      );

    return {
      results,
      total: results.length,
      successCount: results.length - failures.length,
      failureCount: failures.length,
      failures,
      retryableTasks,
    };
  }

  /**
   * One-line summary for logs
   */
  static summarize(outcome: BatchOutcome): string {
    const retryableNote = outcome.retryableTasks.length > 0 ? ` (${outcome.retryableTasks.length} retryable)` : '';
    return `${outcome.total} tasks: ${outcome.successCount} succeeded, ${outcome.failureCount} failed${retryableNote}`;
  }
}
