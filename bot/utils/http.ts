import { setTimeout as sleep } from "node:timers/promises";
import { logger } from "./logger";

export class HttpError extends Error {
  constructor(
    message: string,
    readonly status: number
  ) {
    super(message);
    this.name = "HttpError";
  }
}

export interface RetryOptions {
  maxRetries?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  shouldRetry?: (error: unknown) => boolean;
}

function errorCode(error: unknown): string | undefined {
  if (typeof error !== "object" || error === null || !("code" in error)) return undefined;
  return typeof error.code === "string" ? error.code : undefined;
}

// Retry on network errors, 429 (rate limit), 5xx errors
export function isRetryable(error: unknown): boolean {
  if (error instanceof HttpError) {
    return error.status === 429 || (error.status >= 500 && error.status < 600);
  }
  const code = errorCode(error);
  if (code === "ECONNRESET" || code === "ETIMEDOUT") return true;
  return error instanceof Error && error.message.includes("fetch failed");
}

/**
 * Retry a function with exponential backoff
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const { maxRetries = 3, baseDelayMs = 500, maxDelayMs = 5000, shouldRetry = isRetryable } = options;

  let lastError: unknown;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      if (attempt === maxRetries || !shouldRetry(error)) {
        throw error;
      }

      // Exponential backoff with jitter
      const delay = Math.min(baseDelayMs * Math.pow(2, attempt) + Math.random() * 100, maxDelayMs);
      logger.debug(`Retry ${attempt + 1}/${maxRetries} after ${delay.toFixed(0)}ms`);
      await sleep(delay);
    }
  }

  throw lastError;
}
