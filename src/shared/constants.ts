/**
 * Shared Constants
 * ================
 * Application-wide constants
 */

export const SERVICE_NAME = "secure-chat-api";
export const SERVICE_VERSION = "1.0.0";

export const API_PREFIX = "/api/v1";

// Action token purposes (each signs with its own derived key)
export const ACTION_PURPOSES = {
  EMAIL_VERIFICATION: "email-verification",
  PASSWORD_RESET: "password-reset",
} as const;

// Email templates (src/templates/<name>.html)
export const EMAIL_TEMPLATES = {
  VERIFICATION: "email_verification",
  WELCOME: "welcome",
  PASSWORD_RESET: "password_reset",
} as const;

export const EMAIL_SUBJECTS = {
  VERIFICATION: "Verify your email address",
  WELCOME: "Welcome! Your account is verified",
  PASSWORD_RESET: "Reset your password",
} as const;

export const DEFAULT_ROLE = "user";

// Generic reply for reset requests: identical whether or not the account exists.
export const PASSWORD_RESET_REQUEST_MESSAGE =
  "Please check your email for instructions to reset your password";
