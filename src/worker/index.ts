/**
 * Batch transfer worker entry point
 *
 * Reads its configuration from environment variables, uploads a local directory
 * into a container (or downloads a container into a directory), logs a summary
 * and exits 0 only when every object transferred.
 */

import { BatchTransferService } from '../services/BatchTransferService.js';
import { ResultAggregator } from '../services/ResultAggregator.js';
import { S3Service } from '../services/S3Service.js';
import { BatchProgressCallback } from '../types/transfer.js';
import { resolveDefaultConcurrency } from '../utils/concurrency.js';
import { ErrorHandler } from '../utils/errorHandler.js';
import { parseEnvironmentVariables } from './config.js';

/**
 * Logs progress at most once per 10% of completed tasks
 */
function createProgressLogger(): BatchProgressCallback {
  let lastLoggedDecile = -1;

  return (_result, completed, total) => {
    const decile = Math.floor((completed / total) * 10);
    if (decile !== lastLoggedDecile) {
      console.log(`Progress: ${completed}/${total} objects (${decile * 10}%)`);
      lastLoggedDecile = decile;
    }
  };
}

async function main(): Promise<void> {
  try {
    console.log('Parsing environment variables...');
    const config = parseEnvironmentVariables();
    const concurrency = resolveDefaultConcurrency();

    console.log(`Worker started: ${config.direction} ${config.localDirectory} <-> ${config.container}/${config.keyPrefix || ''}`);
    console.log(`Concurrency: ${concurrency}, region: ${config.region}${config.endpoint ? `, endpoint: ${config.endpoint}` : ''}`);

    const s3Service = new S3Service({
      region: config.region,
      endpoint: config.endpoint,
      forcePathStyle: config.forcePathStyle,
    });
    const transferService = new BatchTransferService(s3Service);
    const options = { keyPrefix: config.keyPrefix, onProgress: createProgressLogger() };

    const outcome =
      config.direction === 'upload'
        ? await transferService.uploadDirectoryWithOutcome(config.container, config.localDirectory, concurrency, options)
        : await transferService.downloadDirectoryWithOutcome(config.container, config.localDirectory, concurrency, options);

    console.log(`Batch ${config.direction} complete: ${ResultAggregator.summarize(outcome)}`);

    for (const failure of outcome.failures) {
      console.error(
        `  ${failure.objectName}: [${failure.failureDetail?.kind}] ${failure.failureDetail?.message}`
      );
    }

    process.exit(outcome.failureCount === 0 ? 0 : 1);
  } catch (error) {
    const message = ErrorHandler.formatErrorMessage(error);
    if (error instanceof Error) {
      const { code } = ErrorHandler.formatErrorResponse(error);
      console.error(`Worker error [${code}]: ${message}`);
      if (error.stack) {
        console.error('Error stack:', error.stack);
      }
    } else {
      console.error('Worker error:', message);
    }

    process.exit(1);
  }
}

// Run the worker
main().catch((error) => {
  console.error('Unhandled error in worker:', error);
  process.exit(1);
});
