import { logger } from "./logger";

export class RetryExhaustedError extends Error {
  constructor(operation: string, attempts: number, cause: unknown) {
    super(`${operation} failed after ${attempts} attempts`, { cause });
    this.name = "RetryExhaustedError";
  }
}

export interface RetryOptions {
  operation: string;
  attempts?: number;
  baseDelayMs?: number;
  isRetryable?: (error: unknown) => boolean;
  sleep?: (ms: number) => Promise<void>;
}

const TRANSIENT_CODES = ["ECONNRESET", "ETIMEDOUT", "ECONNREFUSED", "EAI_AGAIN", "rate_limited"];

function statusOf(error: unknown): number | undefined {
  if (typeof error !== "object" || error === null) return undefined;
  if ("status" in error && typeof error.status === "number") return error.status;
  if (
    "response" in error &&
    typeof error.response === "object" &&
    error.response !== null &&
    "status" in error.response &&
    typeof error.response.status === "number"
  ) {
    return error.response.status;
  }
  if ("code" in error && typeof error.code === "number") return error.code;
  return undefined;
}

/** Rate limiting (429), server hiccups (5xx) and dropped connections. */
export function isTransientError(error: unknown): boolean {
  const status = statusOf(error);
  if (status !== undefined) return status === 429 || (status >= 500 && status < 600);
  if (typeof error === "object" && error !== null && "code" in error) {
    return typeof error.code === "string" && TRANSIENT_CODES.includes(error.code);
  }
  return false;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Runs `fn`, retrying transient failures with exponential backoff
 * (baseDelayMs, 2x, 4x, ...). Non-transient errors are rethrown at once.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  const attempts = options.attempts ?? 4;
  const baseDelayMs = options.baseDelayMs ?? 500;
  const isRetryable = options.isRetryable ?? isTransientError;
  const sleep = options.sleep ?? defaultSleep;

  let lastError: unknown;
  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (!isRetryable(error)) throw error;
      lastError = error;
      if (attempt < attempts) {
        const delay = baseDelayMs * 2 ** (attempt - 1);
        logger.warn(`${options.operation}: transient failure, retrying in ${delay}ms (${attempt}/${attempts})`);
        await sleep(delay);
      }
    }
  }
  throw new RetryExhaustedError(options.operation, attempts, lastError);
}
