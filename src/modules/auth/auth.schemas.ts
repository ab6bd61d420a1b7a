/**
 * Auth Schemas
 * ============
 * Validation for authentication endpoints.
 */

import { z } from "zod";

import { ValidationError } from "../../shared/errors.js";
import { logger } from "../../shared/logger.js";

const emailSchema = z.string().trim().toLowerCase().email().max(100);
const passwordSchema = z.string().min(8).max(200);

function parseInput<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown, label: string): T {
  const result = schema.safeParse(data ?? {});
  if (result.success) {return result.data;}

  const issue = result.error.issues[0];
  const field = issue?.path.join(".");
  const message = issue ? (field ? `${field}: ${issue.message}` : issue.message) : `Invalid ${label} input`;
  logger.warn(`Invalid ${label} input`, { issues: result.error.issues.length, field });
  throw new ValidationError(message, result.error.issues);
}

export const signupInputSchema = z.object({
  first_name: z.string().trim().min(2).max(25),
  last_name: z.string().trim().min(2).max(25),
  username: z.string().trim().min(3).max(30),
  email: emailSchema,
  password: passwordSchema,
});

export type SignupInput = z.infer<typeof signupInputSchema>;

export function validateSignupInput(data: unknown): SignupInput {
  return parseInput(signupInputSchema, data, "signup");
}

export const loginInputSchema = z.object({
  email: emailSchema,
  // Any non-empty value: length rules apply at signup, not here.
  password: z.string().min(1).max(200),
});

export type LoginInput = z.infer<typeof loginInputSchema>;

export function validateLoginInput(data: unknown): LoginInput {
  return parseInput(loginInputSchema, data, "login");
}

export const logoutInputSchema = z.object({
  refresh_token: z.string().trim().min(1).optional(),
});

export type LogoutInput = z.infer<typeof logoutInputSchema>;

export function validateLogoutInput(data: unknown): LogoutInput {
  return parseInput(logoutInputSchema, data, "logout");
}

export const passwordResetRequestInputSchema = z.object({
  email: emailSchema,
});

export type PasswordResetRequestInput = z.infer<typeof passwordResetRequestInputSchema>;

export function validatePasswordResetRequestInput(data: unknown): PasswordResetRequestInput {
  return parseInput(passwordResetRequestInputSchema, data, "password reset request");
}

export const passwordResetConfirmInputSchema = z.object({
  new_password: passwordSchema,
  confirm_new_password: z.string().min(1).max(200),
});

export type PasswordResetConfirmInput = z.infer<typeof passwordResetConfirmInputSchema>;

export function validatePasswordResetConfirmInput(data: unknown): PasswordResetConfirmInput {
  return parseInput(passwordResetConfirmInputSchema, data, "password reset");
}
