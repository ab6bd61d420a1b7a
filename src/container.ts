/**
 * Dependency Container
 * ====================
 * Builds every long-lived collaborator once at startup and wires them into
 * the auth service. Tests build their own container from fakes.
 */

import pg from "pg";

import type { AppConfig } from "./config/env.js";
import { createAuthService, type AuthService } from "./modules/auth/auth.service.js";
import { createPgUserRepository } from "./modules/auth/auth.repository.js";
import { createActionTokenCodec } from "./shared/action-tokens.js";
import { ACTION_PURPOSES } from "./shared/constants.js";
import { ConfigurationError } from "./shared/errors.js";
import { logger } from "./shared/logger.js";
import { createHttpEmailSender, createLogEmailSender } from "./shared/mailer.js";
import { createScryptCredentialVerifier } from "./shared/password.js";
import { connectRedis, disconnectRedis } from "./shared/redis.js";
import {
  createRevocationStore,
  memoryExpiringKeyValue,
  redisExpiringKeyValue,
} from "./shared/revocation-store.js";
import { createSessionTokenIssuer } from "./shared/session-tokens.js";
import { createTemplateRenderer } from "./shared/templates.js";

export type AppContainer = {
  config: AppConfig;
  authService: AuthService;
  close(): Promise<void>;
};

export async function buildContainer(config: AppConfig): Promise<AppContainer> {
  if (!config.databaseUrl) {
    throw new ConfigurationError("DATABASE_URL is required");
  }

  const pool = new pg.Pool({ connectionString: config.databaseUrl });
  pool.on("error", (err) => {
    logger.error("Idle PostgreSQL client error", { error: err.message });
  });

  const redis = config.redis.url
    ? await connectRedis(config.redis.url, { connectTimeoutMs: config.redis.timeoutMs })
    : null;
  if (!redis) {
    logger.warn("REDIS_URL not set; token revocations are kept in memory (single instance only)");
  }

  const revocations = createRevocationStore(
    redis ? redisExpiringKeyValue(redis) : memoryExpiringKeyValue(),
    { timeoutMs: config.redis.timeoutMs }
  );

  const mailer = config.mail.apiUrl
    ? createHttpEmailSender({
        url: config.mail.apiUrl,
        token: config.mail.apiToken ?? undefined,
        from: config.mail.from,
        fromName: config.mail.fromName ?? undefined,
        timeoutMs: config.mail.timeoutMs,
      })
    : createLogEmailSender();
  if (!config.mail.apiUrl) {
    logger.warn("MAIL_API_URL not set; outgoing emails are only logged");
  }

  const { auth } = config;
  const authService = createAuthService({
    users: createPgUserRepository(pool),
    credentials: createScryptCredentialVerifier(),
    sessionTokens: createSessionTokenIssuer({
      secret: auth.jwtSecret,
      algorithm: auth.jwtAlgorithm,
      issuer: auth.issuer,
      audience: auth.audience,
      accessTtlSeconds: auth.accessTtlSeconds,
      refreshTtlSeconds: auth.refreshTtlSeconds,
    }),
    revocations,
    verificationTokens: createActionTokenCodec({
      secret: auth.jwtSecret,
      purpose: ACTION_PURPOSES.EMAIL_VERIFICATION,
    }),
    resetTokens: createActionTokenCodec({
      secret: auth.jwtSecret,
      purpose: ACTION_PURPOSES.PASSWORD_RESET,
    }),
    mailer,
    templates: createTemplateRenderer(config.templatesDir),
    settings: auth,
    frontendUrl: config.frontendUrl,
    userStoreTimeoutMs: config.userStoreTimeoutMs,
  });

  return {
    config,
    authService,
    async close() {
      if (redis) {await disconnectRedis(redis);}
      await pool.end();
    },
  };
}
