import { StorageClient } from '../types/storage.js';
import {
  BatchOutcome,
  BatchTransferOptions,
  TaskDescriptor,
  TransferResult,
} from '../types/transfer.js';
import { resolveDefaultConcurrency } from '../utils/concurrency.js';
import { InvalidConfigurationError, ValidationError } from '../utils/errorHandler.js';
import { runBatch } from './BatchDispatcher.js';
import { ResultAggregator } from './ResultAggregator.js';
import { enumerateLocalDirectory, enumerateRemoteContainer, findLocalPathCollisions } from './TaskEnumerator.js';
import { ValidationService } from './ValidationService.js';

/**
 * Uploads every file directly under a local directory into a container,
 * and downloads every object of a container into a local directory.
 */
export class BatchTransferService {
  constructor(private readonly storageClient: StorageClient) {}

  /**
   * Fails with InvalidConfigurationError or EnumerationError before any task runs;
   * otherwise resolves with one result per file.
   */
  async uploadDirectory(
    container: string,
    directoryPath: string,
    concurrency: number = resolveDefaultConcurrency(),
    options: BatchTransferOptions = {}
  ): Promise<TransferResult[]> {
    this.validateConfiguration(container, concurrency, options.keyPrefix);

    // Container creation sits outside the per-task boundary and is fatal
    await this.storageClient.createContainerIfNotExists(container);

    const tasks = await enumerateLocalDirectory(container, directoryPath, options.keyPrefix);
    console.log(`Uploading ${tasks.length} files from ${directoryPath} to container ${container}`);

    return runBatch(
      tasks,
      concurrency,
      (task) => this.storageClient.putObject(task.container, task.objectName, task.localPath),
      options.onProgress
    );
  }

  /**
   * The destination directory is expected to exist.
   */
  async downloadDirectory(
    container: string,
    destinationDir: string,
    concurrency: number = resolveDefaultConcurrency(),
    options: BatchTransferOptions = {}
  ): Promise<TransferResult[]> {
    this.validateConfiguration(container, concurrency, options.keyPrefix);

    const tasks = await enumerateRemoteContainer(this.storageClient, container, destinationDir, options.keyPrefix);
    const collisions = findLocalPathCollisions(tasks);
    console.log(`Downloading ${tasks.length} objects from container ${container} to ${destinationDir}`);

    return runBatch(
      tasks,
      concurrency,
      (task) => this.downloadTask(task, destinationDir, collisions),
      options.onProgress
    );
  }

  async uploadDirectoryWithOutcome(
    container: string,
    directoryPath: string,
    concurrency: number = resolveDefaultConcurrency(),
    options: BatchTransferOptions = {}
  ): Promise<BatchOutcome> {
    return ResultAggregator.aggregate(await this.uploadDirectory(container, directoryPath, concurrency, options));
  }

  async downloadDirectoryWithOutcome(
    container: string,
    destinationDir: string,
    concurrency: number = resolveDefaultConcurrency(),
    options: BatchTransferOptions = {}
  ): Promise<BatchOutcome> {
    return ResultAggregator.aggregate(await this.downloadDirectory(container, destinationDir, concurrency, options));
  }

  private async downloadTask(
    task: TaskDescriptor,
    destinationDir: string,
    collisions: Map<string, string>
  ): Promise<void> {
    const owner = collisions.get(task.objectName);
    if (owner !== undefined) {
      throw new ValidationError(
        `Object '${task.objectName}' resolves to local path '${task.localPath}' already used by '${owner}'`
      );
    }

    const pathCheck = ValidationService.validatePathWithin(destinationDir, task.localPath);
    if (!pathCheck.isValid) {
      throw new ValidationError(pathCheck.error || `Object '${task.objectName}' cannot be written locally`);
    }

    await this.storageClient.getObject(task.container, task.objectName, task.localPath);
  }

  private validateConfiguration(container: string, concurrency: number, keyPrefix?: string): void {
    if (!container || container.trim() === '') {
      throw new InvalidConfigurationError('Container name is required');
    }

    if (!Number.isFinite(concurrency)) {
      throw new InvalidConfigurationError(`Concurrency must be a finite number, got ${concurrency}`);
    }

    if (keyPrefix) {
      const prefixValidation = ValidationService.validateKeyPrefix(keyPrefix);
      if (!prefixValidation.isValid) {
        throw new InvalidConfigurationError(prefixValidation.error || 'Invalid key prefix');
      }
    }
  }
}
