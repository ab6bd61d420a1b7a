/**
 * Custom Error Classes
 * ====================
 * Structured error handling for the application.
 * Messages are shown to API clients: never put token contents or secrets in them.
 */

/**
 * Base application error
 */
export class AppError extends Error {
  constructor(
    message: string,
    public statusCode: number = 500,
    public code?: string
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Resource not found error
 */
export class NotFoundError extends AppError {
  constructor(resource: string, identifier?: string) {
    super(
      identifier
        ? `${resource} with ID '${identifier}' not found`
        : `${resource} not found`,
      404,
      "NOT_FOUND"
    );
  }
}

/**
 * Validation error (malformed or inconsistent client input)
 */
export class ValidationError extends AppError {
  constructor(message: string, public details?: unknown) {
    super(message, 400, "VALIDATION_ERROR");
  }
}

/**
 * Authentication error
 */
export class AuthenticationError extends AppError {
  constructor(message: string = "Authentication failed", code: string = "AUTHENTICATION_ERROR") {
    super(message, 401, code);
  }
}

export type TokenFailureReason = "INVALID" | "EXPIRED" | "REVOKED" | "WRONG_TOKEN_TYPE";

const TOKEN_FAILURE_CODES: Record<TokenFailureReason, string> = {
  INVALID: "TOKEN_INVALID",
  EXPIRED: "TOKEN_EXPIRED",
  REVOKED: "TOKEN_REVOKED",
  WRONG_TOKEN_TYPE: "WRONG_TOKEN_TYPE",
};

/**
 * Token rejected by a validation step.
 *
 * Session tokens fail with 401; action tokens (email links) fail with 400 since
 * the caller is not authenticating.
 */
export class TokenError extends AppError {
  constructor(
    public reason: TokenFailureReason,
    message: string,
    statusCode: number = 401
  ) {
    super(message, statusCode, TOKEN_FAILURE_CODES[reason]);
  }
}

/**
 * Authorization error (authenticated, but not allowed)
 */
export class AuthorizationError extends AppError {
  constructor(message: string = "Forbidden") {
    super(message, 403, "FORBIDDEN");
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super(message, 409, "CONFLICT");
  }
}

/**
 * A dependency (user store, revocation store) failed or timed out.
 * Raised instead of admitting the caller.
 */
export class ServiceUnavailableError extends AppError {
  constructor(service: string, public originalError?: unknown) {
    super(`${service} unavailable`, 503, "SERVICE_UNAVAILABLE");
  }
}

/**
 * External API error
 */
export class ExternalApiError extends AppError {
  constructor(
    public api: string,
    message: string,
    public originalError?: unknown
  ) {
    super(`${api} API error: ${message}`, 502, "EXTERNAL_API_ERROR");
  }
}

/**
 * Configuration error
 */
export class ConfigurationError extends AppError {
  constructor(message: string) {
    super(`Configuration error: ${message}`, 500, "CONFIGURATION_ERROR");
  }
}
