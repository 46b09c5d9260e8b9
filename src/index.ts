export { BatchTransferService } from './services/BatchTransferService.js';
export { runBatch, executeTask, createSuccessResult, createFailureResult } from './services/BatchDispatcher.js';
export {
  enumerateLocalDirectory,
  enumerateRemoteContainer,
  createTaskDescriptor,
  constructKey,
  normalizePrefix,
  findLocalPathCollisions,
} from './services/TaskEnumerator.js';
export { ResultAggregator } from './services/ResultAggregator.js';
export { S3Service } from './services/S3Service.js';
export { ValidationService } from './services/ValidationService.js';
export {
  hardwareDefaultConcurrency,
  resolveDefaultConcurrency,
  normalizeConcurrency,
} from './utils/concurrency.js';
export {
  EnumerationError,
  InvalidConfigurationError,
  StorageError,
  ValidationError,
  ErrorHandler,
} from './utils/errorHandler.js';
export type {
  TransferDirection,
  TaskDescriptor,
  TransferResult,
  FailureDetail,
  BatchOutcome,
  TaskOperation,
  BatchProgressCallback,
  BatchTransferOptions,
} from './types/transfer.js';
export type { StorageClient, S3ServiceOptions } from './types/storage.js';
export type { ValidationResult } from './types/validation.js';
