export type ErrorKind =
  | "authentication"
  | "account_locked"
  | "transient"
  | "validation"
  | "quota_exhausted"
  | "no_account_available"
  | "unknown_account"
  | "item_not_found"
  | "permanent";

export abstract class EngineError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class AuthenticationError extends EngineError {
  readonly kind = "authentication";
}

export class AccountLockedError extends EngineError {
  readonly kind = "account_locked";
}

export class TransientError extends EngineError {
  readonly kind = "transient";
}

export class ValidationError extends EngineError {
  readonly kind = "validation";
}

export class QuotaExhaustedError extends EngineError {
  readonly kind = "quota_exhausted";
}

export class PermanentError extends EngineError {
  readonly kind = "permanent";
}

export class NoAccountAvailableError extends EngineError {
  readonly kind = "no_account_available";

  constructor(message = "No usable account available") {
    super(message);
  }
}

export class UnknownAccountError extends EngineError {
  readonly kind = "unknown_account";

  constructor(public readonly accountId: string) {
    super(`Unknown account: ${accountId}`);
  }
}

export class ItemNotFoundError extends EngineError {
  readonly kind = "item_not_found";

  constructor(public readonly itemId: string) {
    super(`Work item not found: ${itemId}`);
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function errorKindOf(error: unknown): ErrorKind {
  return error instanceof EngineError ? error.kind : "permanent";
}

export function errorMessageOf(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === "string") return error;
  return "Unknown error";
}
