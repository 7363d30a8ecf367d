import {
  AccountLockedError,
  AuthenticationError,
  QuotaExhaustedError,
  TransientError,
  ValidationError,
  errorKindOf,
  type ErrorKind,
} from "../core/errors";
import { backoffDelay } from "../core/retry";

export type FailureClass = "transient" | "permanent" | "quota_exhausted" | "auth_failure" | "account_locked";

export interface RetryConfig {
  maxAttempts: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
}

export interface RetryDecision {
  errorClass: FailureClass;
  errorKind: ErrorKind;
  retry: boolean;
  /** The next attempt must run on a different account. */
  rotate: boolean;
  delayMs: number;
}

export function classify(error: unknown): FailureClass {
  if (error instanceof TransientError || error instanceof ValidationError) return "transient";
  if (error instanceof AuthenticationError) return "auth_failure";
  if (error instanceof AccountLockedError) return "account_locked";
  if (error instanceof QuotaExhaustedError) return "quota_exhausted";
  return "permanent";
}

/** `attemptsMade` counts the attempts already spent on the item during this run. */
export function shouldRetry(attemptsMade: number, errorClass: FailureClass, config: RetryConfig): boolean {
  if (errorClass === "permanent") return false;
  return attemptsMade < config.maxAttempts;
}

export function decide(attemptsMade: number, error: unknown, config: RetryConfig): RetryDecision {
  const errorClass = classify(error);
  const retry = shouldRetry(attemptsMade, errorClass, config);
  const rotate = errorClass !== "transient" && errorClass !== "permanent";

  const delayMs =
    retry && errorClass === "transient"
      ? backoffDelay(attemptsMade, { baseDelayMs: config.retryBaseDelayMs, maxDelayMs: config.retryMaxDelayMs })
      : 0;

  return { errorClass, errorKind: errorKindOf(error), retry, rotate, delayMs };
}
