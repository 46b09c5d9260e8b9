import {
  BatchProgressCallback,
  TaskDescriptor,
  TaskOperation,
  TransferResult,
} from '../types/transfer.js';
import { normalizeConcurrency } from '../utils/concurrency.js';
import { ErrorHandler } from '../utils/errorHandler.js';

export function createSuccessResult(task: TaskDescriptor, durationMs: number): TransferResult {
  return Object.freeze({
    container: task.container,
    objectName: task.objectName,
    localPath: task.localPath,
    direction: task.direction,
    success: true,
    durationMs,
  });
}

export function createFailureResult(task: TaskDescriptor, error: unknown, durationMs: number): TransferResult {
  return Object.freeze({
    container: task.container,
    objectName: task.objectName,
    localPath: task.localPath,
    direction: task.direction,
    success: false,
    failureDetail: Object.freeze(ErrorHandler.toFailureDetail(error)),
    durationMs,
  });
}

/**
 * Runs one task and captures its outcome. Never rejects.
 */
export async function executeTask(task: TaskDescriptor, operation: TaskOperation): Promise<TransferResult> {
  const startTime = Date.now();
  try {
    await operation(task);
    return createSuccessResult(task, Date.now() - startTime);
  } catch (error) {
    const result = createFailureResult(task, error, Date.now() - startTime);
    console.error(
      `Failed to ${task.direction} ${task.container}/${task.objectName}: ${result.failureDetail?.message}`
    );
    return result;
  }
}

/**
 * Executes every task through `operation` with at most `concurrency` in flight.
 *
 * Workers pull from one shared cursor, so each task is handed out exactly once.
 * A task failure becomes a failed TransferResult and never cancels siblings.
 * Results are returned in input order.
 */
export async function runBatch(
  tasks: Iterable<TaskDescriptor>,
  concurrency: number,
  operation: TaskOperation,
  onProgress?: BatchProgressCallback
): Promise<TransferResult[]> {
  const queue = Array.from(tasks);
  if (queue.length === 0) {
    return [];
  }

  const effectiveConcurrency = normalizeConcurrency(concurrency);
  const results = new Array<TransferResult>(queue.length);

  const workerCount = Math.min(effectiveConcurrency, queue.length);
  console.log(`Dispatching ${queue.length} tasks across ${workerCount} workers`);

  const startTime = Date.now();
  let cursor = 0;
  let completed = 0;

  const worker = async (): Promise<void> => {
    while (cursor < queue.length) {
      const index = cursor++;
      const result = await executeTask(queue[index], operation);
      results[index] = result;
      completed++;

      if (onProgress) {
        try {
          onProgress(result, completed, queue.length);
        } catch (error) {
          console.warn(`Progress callback failed: ${ErrorHandler.formatErrorMessage(error)}`);
        }
      }
    }
  };

  await Promise.all(Array.from({ length: workerCount }, () => worker()));

  const failureCount = results.filter((result) => !result.success).length;
  console.log(
    `Batch finished in ${Date.now() - startTime}ms: ${queue.length - failureCount} succeeded, ${failureCount} failed`
  );

  return results;
}
