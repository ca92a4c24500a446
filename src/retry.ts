import {
  MailRulesError,
  TransportAuthError,
  TransportError,
  TransportRateLimitedError,
  errorMessage,
} from "./errors.js";
import { logger } from "./config.js";

/**
 * Retry configuration for exponential backoff
 */
export interface RetryConfig {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
};

const NETWORK_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ETIMEDOUT",
  "EAI_AGAIN",
  "ENOTFOUND",
  "EPIPE",
]);

function readStatus(value: unknown): number | null {
  if (typeof value === "number" && Number.isInteger(value)) {
    return value;
  }
  if (typeof value === "string" && /^\d{3}$/.test(value)) {
    return Number(value);
  }
  return null;
}

/**
 * HTTP status of a googleapis (gaxios) error, when it carries one
 */
export function httpStatusOf(error: unknown): number | null {
  if (typeof error !== "object" || error === null) {
    return null;
  }
  if (
    "response" in error &&
    typeof error.response === "object" &&
    error.response !== null &&
    "status" in error.response
  ) {
    const status = readStatus(error.response.status);
    if (status !== null) {
      return status;
    }
  }
  if ("status" in error) {
    const status = readStatus(error.status);
    if (status !== null) {
      return status;
    }
  }
  if ("code" in error) {
    return readStatus(error.code);
  }
  return null;
}

function networkCodeOf(error: unknown): string | null {
  if (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    typeof error.code === "string" &&
    NETWORK_CODES.has(error.code)
  ) {
    return error.code;
  }
  return null;
}

function isRateLimit(status: number | null, message: string): boolean {
  return (
    status === 429 ||
    (status === 403 && /rate ?limit/i.test(message))
  );
}

/**
 * Map a raw transport failure onto the error taxonomy
 */
export function classifyError(error: unknown, operation: string): MailRulesError {
  if (error instanceof MailRulesError) {
    return error;
  }

  const status = httpStatusOf(error);
  const message = errorMessage(error);
  const detail = `${operation} failed${status !== null ? ` (${status})` : ""}: ${message}`;

  if (isRateLimit(status, message)) {
    return new TransportRateLimitedError(detail, { cause: error });
  }
  if (status === 401 || status === 403 || /invalid_grant/i.test(message)) {
    return new TransportAuthError(detail, status, { cause: error });
  }
  return new TransportError(detail, status, { cause: error });
}

/**
 * Determine if an error is worth retrying
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof TransportAuthError) {
    return false;
  }
  if (error instanceof TransportRateLimitedError) {
    return true;
  }

  const status = error instanceof TransportError ? error.status : httpStatusOf(error);
  const message = errorMessage(error).toLowerCase();

  if (isRateLimit(status, message)) {
    return true;
  }
  if (status !== null && status >= 500 && status <= 599) {
    return true;
  }
  if (networkCodeOf(error) !== null) {
    return true;
  }
  return message.includes("timeout") || message.includes("timed out");
}

/**
 * Calculate delay using exponential backoff with jitter
 */
export function calculateDelay(
  attempt: number,
  config: RetryConfig = DEFAULT_RETRY_CONFIG,
  random: () => number = Math.random
): number {
  const exponentialDelay = config.baseDelayMs * Math.pow(2, attempt);
  const cappedDelay = Math.min(exponentialDelay, config.maxDelayMs);
  // ±25% jitter
  const jitter = cappedDelay * 0.25 * (random() * 2 - 1);
  return Math.floor(cappedDelay + jitter);
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Run a transport call, retrying transient failures. Authentication
 * failures are never retried.
 */
export async function withRetry<T>(
  operation: string,
  fn: () => Promise<T>,
  config: RetryConfig = DEFAULT_RETRY_CONFIG,
  sleep: (ms: number) => Promise<void> = delay
): Promise<T> {
  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      const classified = classifyError(error, operation);
      if (
        classified instanceof TransportAuthError ||
        !isRetryableError(error) ||
        attempt >= config.maxRetries
      ) {
        throw classified;
      }

      const delayMs = calculateDelay(attempt + 1, config);
      logger.warn(
        `${operation} attempt ${attempt + 1} failed (${classified.message}), ` +
          `retrying in ${delayMs}ms...`
      );
      await sleep(delayMs);
    }
  }
}
