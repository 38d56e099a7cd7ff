import type { TokenErrorCode } from "./codes.js";

export type TokenErrorShape = {
  code: TokenErrorCode;
  message: string;
  details?: unknown;
};

export function err(
  code: TokenErrorCode,
  message: string,
  details?: unknown,
): TokenErrorShape {
  return { code, message, ...(details !== undefined ? { details } : {}) };
}

export class TokenError extends Error {
  readonly code: TokenErrorCode;
  readonly details?: unknown;

  constructor(
    code: TokenErrorCode,
    message: string,
    details?: unknown,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "TokenError";
    this.code = code;
    if (details !== undefined) this.details = details;
  }

  toJSON(): TokenErrorShape {
    return err(this.code, this.message, this.details);
  }
}

/** Raised by `setJTI` when the value is not a canonical UUIDv4. */
export class InvalidJtiError extends TokenError {
  constructor(value: string) {
    super("TOKEN_INVALID_JTI", "JTI must be a UUIDv4 string", { value });
    this.name = "InvalidJtiError";
  }
}

/** An optional claim was read before it was set. */
export class NotConfiguredError extends TokenError {
  constructor(claim: string) {
    super("TOKEN_NOT_CONFIGURED", `${claim} has not been set`, { claim });
    this.name = "NotConfiguredError";
  }
}

/**
 * Key import or RS256 signing failed. The underlying error is kept as `cause`.
 */
export class SigningError extends TokenError {
  constructor(cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(
      "TOKEN_SIGNING_FAILED",
      `Failed to sign token: ${reason}`,
      { cause: reason },
      { cause },
    );
    this.name = "SigningError";
  }
}
