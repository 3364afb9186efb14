export type BotErrorCode =
  | "CONFIG_MISSING"
  | "AUTH_CONFIG_MISSING"
  | "AUTH_REQUEST_FAILED"
  | "AUTH_RESPONSE_INVALID"
  | "REMOTE_REQUEST_FAILED"
  | "DATA_SHAPE_INVALID"
  | "EMPTY_RESULT";

export class BotError extends Error {
  constructor(
    message: string,
    public readonly code: BotErrorCode,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = "BotError";
  }
}

/** A required setting is missing or malformed. */
export class ConfigError extends BotError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "CONFIG_MISSING", context);
    this.name = "ConfigError";
  }
}

export class AuthError extends BotError {
  constructor(message: string, code: BotErrorCode, context?: Record<string, unknown>) {
    super(message, code, context);
    this.name = "AuthError";
  }
}

export class AuthConfigError extends AuthError {
  constructor(message: string) {
    super(message, "AUTH_CONFIG_MISSING");
    this.name = "AuthConfigError";
  }
}

export class AuthRequestError extends AuthError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "AUTH_REQUEST_FAILED", context);
    this.name = "AuthRequestError";
  }
}

export class AuthResponseError extends AuthError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "AUTH_RESPONSE_INVALID", context);
    this.name = "AuthResponseError";
  }
}

/** Non-2xx, transport failure or malformed payload from a remote API. */
export class RemoteError extends BotError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "REMOTE_REQUEST_FAILED", context);
    this.name = "RemoteError";
  }
}

/** An expected sheet or column is missing from a ledger workbook. */
export class DataShapeError extends BotError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "DATA_SHAPE_INVALID", context);
    this.name = "DataShapeError";
  }
}

export class EmptyResultError extends BotError {
  constructor(message = "No rows to export") {
    super(message, "EMPTY_RESULT");
    this.name = "EmptyResultError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
