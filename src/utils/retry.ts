import type { Logger } from "../core/types";
import { errorMessage, sleep } from "../core/utils";
import { getDefaultLogger } from "./logger";

export interface RetryOptions<T> {
  maxRetries?: number;
  waitSeconds?: number;
  fallback?: (error: unknown, attempt: number) => Promise<T>;
  label?: string;
  logger?: Logger;
}

/**
 * Retry an async function with optional fallback and logging.
 */
export async function retryAsync<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions<T> = {},
): Promise<T> {
  const maxRetries = Math.max(1, options.maxRetries ?? 1);
  const waitSeconds = options.waitSeconds ?? 0;
  const logger = options.logger ?? getDefaultLogger();
  let lastError: unknown = undefined;
  for (let attempt = 0; attempt < maxRetries; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;
      logger.debug(
        `[${options.label ?? "retry"}] Attempt ${attempt + 1}/${maxRetries} failed:`,
        errorMessage(error),
      );
      if (attempt === maxRetries - 1) break;
      if (waitSeconds > 0) await sleep(waitSeconds * 1000);
    }
  }
  if (options.fallback) return options.fallback(lastError, maxRetries - 1);
  throw lastError;
}
