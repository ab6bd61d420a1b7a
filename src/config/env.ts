/**
 * Application Configuration
 * =========================
 * Environment variables validated once at startup into a typed config that is
 * passed down explicitly (nothing below reads `process.env` for auth settings).
 */

import { z } from "zod";

import { ConfigurationError } from "../shared/errors.js";
import type { LogThreshold } from "../shared/logger.js";
import type { SessionTokenAlgorithm } from "../shared/session-tokens.js";

const DEFAULT_ORIGINS = ["http://localhost:5173", "http://localhost:5174"];

const emptyToUndefined = (value: unknown) =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const optionalString = z.preprocess(emptyToUndefined, z.string().trim().optional());
const positiveInt = (fallback: number) =>
  z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(fallback));

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return null;
  }
}

/**
 * ALLOWED_ORIGINS is a JSON array; anything else falls back to the local dev origins.
 */
function parseOrigins(raw: string | undefined): string[] {
  if (!raw) {return DEFAULT_ORIGINS;}
  const parsed = parseJson(raw);
  if (Array.isArray(parsed) && parsed.every((o): o is string => typeof o === "string")) {
    return parsed;
  }
  return DEFAULT_ORIGINS;
}

function parseList(raw: string): string[] {
  return Array.from(new Set(raw.split(",").map((s) => s.trim()).filter(Boolean)));
}

const envSchema = z.object({
  NODE_ENV: z.preprocess(emptyToUndefined, z.string().default("development")),
  PORT: positiveInt(3000),
  LOG_LEVEL: z.preprocess(
    (v) => (typeof v === "string" ? v.trim().toLowerCase() || undefined : v),
    z.enum(["debug", "info", "warn", "error", "silent"]).default("info")
  ),
  DATABASE_URL: optionalString,

  JWT_SECRET: z.string({ required_error: "JWT_SECRET is required" }).trim().min(1, "JWT_SECRET is required"),
  JWT_ALGORITHM: z.preprocess(emptyToUndefined, z.enum(["HS256", "HS384", "HS512"]).default("HS256")),
  JWT_ISSUER: z.preprocess(emptyToUndefined, z.string().default("secure-chat-api")),
  JWT_AUDIENCE: z.preprocess(emptyToUndefined, z.string().default("secure-chat-api")),
  AUTH_ACCESS_TTL_SECONDS: positiveInt(60 * 60),
  AUTH_REFRESH_TTL_SECONDS: positiveInt(2 * 24 * 60 * 60),
  AUTH_REFRESH_ROTATION: z.preprocess(emptyToUndefined, z.enum(["off", "rotate"]).default("off")),
  AUTH_ROLE_POLICY: z.preprocess(emptyToUndefined, z.enum(["enforced", "disabled"]).default("enforced")),
  AUTH_ME_ROLES: z.preprocess(emptyToUndefined, z.string().default("admin,user")),
  EMAIL_VERIFICATION_MAX_AGE_SECONDS: positiveInt(24 * 60 * 60),
  PASSWORD_RESET_MAX_AGE_SECONDS: positiveInt(60 * 60),

  REDIS_URL: optionalString,
  REDIS_TIMEOUT_MS: positiveInt(2000),
  USER_STORE_TIMEOUT_MS: positiveInt(5000),

  FRONTEND_URL: z.preprocess(emptyToUndefined, z.string().url().default("http://localhost:5173")),
  MAIL_API_URL: z.preprocess(emptyToUndefined, z.string().url().optional()),
  MAIL_API_TOKEN: optionalString,
  MAIL_FROM: z.preprocess(emptyToUndefined, z.string().email().default("no-reply@localhost.localdomain")),
  MAIL_FROM_NAME: optionalString,
  MAIL_TIMEOUT_MS: positiveInt(10000),
  ALLOWED_ORIGINS: optionalString,
  TEMPLATES_DIR: z.preprocess(emptyToUndefined, z.string().default("src/templates")),
});

export type RefreshRotation = "off" | "rotate";
export type RolePolicy = "enforced" | "disabled";

export type AuthSettings = {
  jwtSecret: string;
  jwtAlgorithm: SessionTokenAlgorithm;
  issuer: string;
  audience: string;
  accessTtlSeconds: number;
  refreshTtlSeconds: number;
  refreshRotation: RefreshRotation;
  rolePolicy: RolePolicy;
  meRoles: string[];
  emailVerificationMaxAgeSeconds: number;
  passwordResetMaxAgeSeconds: number;
};

export type AppConfig = {
  nodeEnv: string;
  port: number;
  logLevel: LogThreshold;
  databaseUrl: string | null;
  auth: AuthSettings;
  redis: { url: string | null; timeoutMs: number };
  userStoreTimeoutMs: number;
  frontendUrl: string;
  mail: {
    apiUrl: string | null;
    apiToken: string | null;
    from: string;
    fromName: string | null;
    timeoutMs: number;
  };
  allowedOrigins: string[];
  templatesDir: string;
};

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue?.path.join(".") || "environment";
    throw new ConfigurationError(`${where}: ${issue?.message ?? "invalid value"}`);
  }
  const e = result.data;

  return {
    nodeEnv: e.NODE_ENV,
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
    databaseUrl: e.DATABASE_URL ?? null,
    auth: {
      jwtSecret: e.JWT_SECRET,
      jwtAlgorithm: e.JWT_ALGORITHM,
      issuer: e.JWT_ISSUER,
      audience: e.JWT_AUDIENCE,
      accessTtlSeconds: e.AUTH_ACCESS_TTL_SECONDS,
      refreshTtlSeconds: e.AUTH_REFRESH_TTL_SECONDS,
      refreshRotation: e.AUTH_REFRESH_ROTATION,
      rolePolicy: e.AUTH_ROLE_POLICY,
      meRoles: parseList(e.AUTH_ME_ROLES),
      emailVerificationMaxAgeSeconds: e.EMAIL_VERIFICATION_MAX_AGE_SECONDS,
      passwordResetMaxAgeSeconds: e.PASSWORD_RESET_MAX_AGE_SECONDS,
    },
    redis: { url: e.REDIS_URL ?? null, timeoutMs: e.REDIS_TIMEOUT_MS },
    userStoreTimeoutMs: e.USER_STORE_TIMEOUT_MS,
    frontendUrl: e.FRONTEND_URL.replace(/\/+$/, ""),
    mail: {
      apiUrl: e.MAIL_API_URL ?? null,
      apiToken: e.MAIL_API_TOKEN ?? null,
      from: e.MAIL_FROM,
      fromName: e.MAIL_FROM_NAME ?? null,
      timeoutMs: e.MAIL_TIMEOUT_MS,
    },
    allowedOrigins: parseOrigins(e.ALLOWED_ORIGINS),
    templatesDir: e.TEMPLATES_DIR,
  };
}
