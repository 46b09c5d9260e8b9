import { FailureDetail } from '../types/transfer.js';

/**
 * Custom error classes for different error types
 */

export class EnumerationError extends Error {
  constructor(message: string, public readonly originalError?: unknown) {
    super(message);
    this.name = 'EnumerationError';
  }
}

export class InvalidConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidConfigurationError';
  }
}

export class StorageError extends Error {
  constructor(message: string, public readonly originalError?: unknown) {
    super(message);
    this.name = 'StorageError';
  }
}

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

interface ErrorInfo {
  name?: string;
  code?: string;
  message: string;
  statusCode?: number;
}

const RETRYABLE_ERRORS = [
  'ETIMEDOUT',
  'ECONNRESET',
  'ECONNREFUSED',
  'EPIPE',
  'EAI_AGAIN',
  'NetworkingError',
  'TimeoutError',
  'RequestTimeout',
  'ServiceUnavailable',
  'SlowDown',
  'ThrottlingException',
  'RequestLimitExceeded',
];

/**
 * Error handler utility functions
 */
export class ErrorHandler {
  /**
   * Reads name, code, message and HTTP status off an arbitrary thrown value.
   * AWS SDK errors carry the status under `$metadata.httpStatusCode`.
   */
  static inspect(error: unknown): ErrorInfo {
    const info: ErrorInfo = { message: '' };

    if (error instanceof Error) {
      info.name = error.name;
      info.message = error.message;
    } else if (typeof error === 'string') {
      info.message = error;
    }

    if (typeof error === 'object' && error !== null) {
      if ('code' in error && typeof error.code === 'string') {
        info.code = error.code;
      }
      if (
        '$metadata' in error &&
        typeof error.$metadata === 'object' &&
        error.$metadata !== null &&
        'httpStatusCode' in error.$metadata &&
        typeof error.$metadata.httpStatusCode === 'number'
      ) {
        info.statusCode = error.$metadata.httpStatusCode;
      }
    }

    return info;
  }

  /**
   * Handles storage errors (missing container or object, access denied, throttling, network)
   */
  static handleStorageError(error: unknown, container?: string, objectName?: string): StorageError {
    if (error instanceof StorageError) {
      return error;
    }

    const { name, code, message, statusCode } = this.inspect(error);
    const containerName = container || 'specified container';

    // Missing container or object
    if (name === 'NoSuchBucket') {
      return new StorageError(`Container '${containerName}' does not exist`, error);
    }

    if (name === 'NoSuchKey') {
      return new StorageError(`Object '${objectName ?? 'unknown'}' does not exist in container '${containerName}'`, error);
    }

    if (name === 'NotFound' || statusCode === 404) {
      if (objectName) {
        return new StorageError(`Object '${objectName}' not found in container '${containerName}'`, error);
      }
      return new StorageError(`Container '${containerName}' does not exist`, error);
    }

    // Permission errors
    if (name === 'AccessDenied') {
      return new StorageError(`Access denied to container '${containerName}'`, error);
    }

    if (name === 'Forbidden' || statusCode === 403) {
      return new StorageError(`Insufficient permissions for container '${containerName}'`, error);
    }

    // Quota and naming errors
    if (code === 'QuotaExceeded' || name === 'QuotaExceeded') {
      return new StorageError('Storage quota exceeded', error);
    }

    if (name === 'EntityTooLarge') {
      return new StorageError('Object size exceeds storage limits', error);
    }

    if (name === 'InvalidBucketName') {
      return new StorageError(`Invalid container name: '${containerName}'`, error);
    }

    // Network errors
    if (
      code === 'NetworkingError' ||
      name === 'NetworkingError' ||
      code === 'ECONNRESET' ||
      code === 'ECONNREFUSED' ||
      code === 'ENOTFOUND' ||
      code === 'EPIPE'
    ) {
      return new StorageError('Storage request failed: network error', error);
    }

    if (code === 'RequestTimeout' || name === 'RequestTimeout' || name === 'TimeoutError' || code === 'ETIMEDOUT') {
      return new StorageError('Storage request timed out', error);
    }

    // Throttling errors
    if (name === 'SlowDown' || name === 'ThrottlingException' || name === 'RequestLimitExceeded' || statusCode === 429) {
      return new StorageError('Storage request throttled, please retry', error);
    }

    // Service errors
    if (name === 'ServiceUnavailable' || statusCode === 503) {
      return new StorageError('Storage service temporarily unavailable', error);
    }

    if (name === 'InternalError' || statusCode === 500) {
      return new StorageError('Storage internal server error', error);
    }

    return new StorageError(`Storage operation failed: ${message || 'Unknown error'}`, error);
  }

  /**
   * Determines if an error is retryable. Wrapped errors are judged by their cause.
   */
  static isRetryable(error: unknown): boolean {
    if (error instanceof StorageError || error instanceof EnumerationError) {
      return this.isRetryable(error.originalError);
    }

    const { name, code, message, statusCode } = this.inspect(error);

    if (statusCode !== undefined && (statusCode >= 500 || statusCode === 429)) {
      return true;
    }

    return RETRYABLE_ERRORS.some(
      (errType) =>
        name === errType ||
        code === errType ||
        message.includes(errType)
    );
  }

  /**
   * Formats an arbitrary thrown value for display
   */
  static formatErrorMessage(error: unknown): string {
    if (error === null || error === undefined) {
      return 'Unknown error occurred';
    }

    if (error instanceof Error) {
      return error.message || `${error.name} with no message`;
    }

    if (typeof error === 'string') {
      return error || 'Unknown error occurred';
    }

    try {
      return String(error) || 'Unknown error occurred';
    } catch {
      // Objects without a prototype, or with a throwing toString
      return 'Unserializable error';
    }
  }

  /**
   * Captures a task failure as a serializable record
   */
  static toFailureDetail(error: unknown): FailureDetail {
    return {
      kind: error instanceof Error ? error.name : 'UnknownError',
      message: this.formatErrorMessage(error),
      retryable: this.isRetryable(error),
    };
  }

  /**
   * Formats a fatal error for the worker's log output
   */
  static formatErrorResponse(error: Error): {
    code: string;
    message: string;
    retryable: boolean;
  } {
    let code = 'UNKNOWN_ERROR';

    if (error instanceof EnumerationError) {
      code = 'ENUMERATION_ERROR';
    } else if (error instanceof InvalidConfigurationError) {
      code = 'INVALID_CONFIGURATION';
    } else if (error instanceof StorageError) {
      code = 'STORAGE_ERROR';
    } else if (error instanceof ValidationError) {
      code = 'VALIDATION_ERROR';
    }

    return {
      code,
      message: error.message,
      retryable: this.isRetryable(error),
    };
  }
}
