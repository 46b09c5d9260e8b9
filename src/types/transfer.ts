export type TransferDirection = 'upload' | 'download';

export interface TaskDescriptor {
  readonly container: string;
  readonly objectName: string;
  readonly localPath: string;
  readonly direction: TransferDirection;
}

/**
 * Serializable capture of a single task's failure
 */
export interface FailureDetail {
  readonly kind: string;
  readonly message: string;
  readonly retryable: boolean;
}

export interface TransferResult {
  readonly container: string;
  readonly objectName: string;
  readonly localPath: string;
  readonly direction: TransferDirection;
  readonly success: boolean;
  readonly failureDetail?: FailureDetail;
  readonly durationMs: number;
}

export interface BatchOutcome {
  results: TransferResult[];
  total: number;
  successCount: number;
  failureCount: number;
  failures: TransferResult[];
  retryableTasks: TaskDescriptor[];
}

/**
 * Single-object operation run by the dispatcher; rejects on failure
 */
export type TaskOperation = (task: TaskDescriptor) => Promise<void>;

export type BatchProgressCallback = (result: TransferResult, completed: number, total: number) => void;

export interface BatchTransferOptions {
  keyPrefix?: string;
  onProgress?: BatchProgressCallback;
}
