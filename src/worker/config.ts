import { TransferDirection } from '../types/transfer.js';
import { ValidationService } from '../services/ValidationService.js';
import { ValidationError } from '../utils/errorHandler.js';

export interface WorkerConfig {
  direction: TransferDirection;
  container: string;
  localDirectory: string;
  keyPrefix?: string;
  region: string;
  endpoint?: string;
  forcePathStyle: boolean;
}

/**
 * Parse environment variables and validate required configuration
 */
export function parseEnvironmentVariables(env: NodeJS.ProcessEnv = process.env): WorkerConfig {
  const direction = env.TRANSFER_DIRECTION;
  const container = env.CONTAINER_NAME;
  const localDirectory = env.LOCAL_DIRECTORY;
  const keyPrefix = env.KEY_PREFIX || undefined;
  const region = env.AWS_REGION || 'us-east-1';
  const endpoint = env.S3_ENDPOINT || undefined;

  if (!direction) {
    throw new ValidationError('Missing required environment variable: TRANSFER_DIRECTION');
  }
  if (direction !== 'upload' && direction !== 'download') {
    throw new ValidationError(`TRANSFER_DIRECTION must be "upload" or "download", got "${direction}"`);
  }
  if (!container) {
    throw new ValidationError('Missing required environment variable: CONTAINER_NAME');
  }
  // S3 bucket naming rules
  const containerValidation = ValidationService.validateContainerName(container);
  if (!containerValidation.isValid) {
    throw new ValidationError(containerValidation.error || 'Invalid CONTAINER_NAME');
  }
  if (!localDirectory) {
    throw new ValidationError('Missing required environment variable: LOCAL_DIRECTORY');
  }

  const forcePathStyleValue = env.S3_FORCE_PATH_STYLE;
  if (forcePathStyleValue && forcePathStyleValue !== 'true' && forcePathStyleValue !== 'false') {
    throw new ValidationError(`S3_FORCE_PATH_STYLE must be "true" or "false", got "${forcePathStyleValue}"`);
  }

  return {
    direction,
    container,
    localDirectory,
    keyPrefix,
    region,
    endpoint,
    forcePathStyle: forcePathStyleValue === 'true',
  };
}
