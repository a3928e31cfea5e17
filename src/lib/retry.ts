import { logger } from "./logger";

export interface RetryOptions {
  maxAttempts: number;
  delayMs: number;
  name: string;
}

// Retry with linearly growing delay; rethrows the last failure
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  const { maxAttempts, delayMs, name } = options;
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (attempt === maxAttempts) {
        logger.error({ err: error, attempt }, `${name} failed after ${maxAttempts} attempts`);
        throw error;
      }
      const waitTime = delayMs * attempt;
      logger.warn({ attempt, waitTime }, `${name} failed, retrying in ${waitTime}ms...`);
      await new Promise((resolve) => setTimeout(resolve, waitTime));
    }
  }
  throw new Error(`${name} failed after ${maxAttempts} attempts`);
}
