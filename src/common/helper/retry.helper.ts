import { Logger } from '@nestjs/common';
import { isTransientDbError } from './db-error.helper';

export interface RetryOptions {
  attempts: number;
  delayMs: number;
  maxDelayMs?: number;
  label?: string;
  logger?: Logger;
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Runs `operation` again when it fails with a connection-level database
 * error, backing off exponentially. Any other error is rethrown at once.
 */
export async function withTransientRetry<T>(
  operation: () => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const attempts = Math.max(1, options.attempts);
  const maxDelayMs = options.maxDelayMs ?? 2000;
  const logger = options.logger ?? new Logger('TransientRetry');

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation();
    } catch (error) {
      if (attempt >= attempts || !isTransientDbError(error)) {
        throw error;
      }
      const delay = Math.min(options.delayMs * 2 ** (attempt - 1), maxDelayMs);
      const reason = error instanceof Error ? error.message : String(error);
      logger.warn(`${options.label ?? 'operation'} failed (attempt ${attempt}/${attempts}): ${reason}. Retrying in ${delay}ms`);
      await sleep(delay);
    }
  }
}
