import os from 'os';
import { InvalidConfigurationError } from './errorHandler.js';

export const MIN_CONCURRENCY = 1;
export const MAX_CONCURRENCY_LIMIT = 64; // Upper bound for the BATCH_CONCURRENCY override

/**
 * Half the available hardware parallelism, floored, never below 1.
 * Recomputed on every call.
 */
export function hardwareDefaultConcurrency(): number {
  return Math.max(MIN_CONCURRENCY, Math.floor(os.availableParallelism() / 2));
}

/**
 * Default number of objects transferred in parallel.
 * BATCH_CONCURRENCY overrides the hardware-derived value when it parses.
 */
export function resolveDefaultConcurrency(): number {
  const fallback = hardwareDefaultConcurrency();
  const envConcurrency = process.env.BATCH_CONCURRENCY;

  if (!envConcurrency) {
    return fallback;
  }

  const parsedValue = parseInt(envConcurrency, 10);
  if (isNaN(parsedValue)) {
    console.warn(`Invalid BATCH_CONCURRENCY value "${envConcurrency}", using default ${fallback}`);
    return fallback;
  }
  if (parsedValue < MIN_CONCURRENCY) {
    console.warn(`BATCH_CONCURRENCY value ${parsedValue} is below minimum ${MIN_CONCURRENCY}, using minimum`);
    return MIN_CONCURRENCY;
  }
  if (parsedValue > MAX_CONCURRENCY_LIMIT) {
    console.warn(`BATCH_CONCURRENCY value ${parsedValue} exceeds maximum ${MAX_CONCURRENCY_LIMIT}, using maximum`);
    return MAX_CONCURRENCY_LIMIT;
  }

  return parsedValue;
}

/**
 * Normalizes a caller-supplied concurrency.
 * Non-finite values are rejected; anything below 1 runs serially.
 */
export function normalizeConcurrency(concurrency: number): number {
  if (!Number.isFinite(concurrency)) {
    throw new InvalidConfigurationError(`Concurrency must be a finite number, got ${concurrency}`);
  }

  const floored = Math.floor(concurrency);
  if (floored < MIN_CONCURRENCY) {
    console.warn(`Concurrency ${concurrency} is below minimum ${MIN_CONCURRENCY}, running serially`);
    return MIN_CONCURRENCY;
  }

  return floored;
}
