/**
 * Auth Service
 * ============
 * Login / refresh / logout orchestration, token-gated authorization, and the
 * email verification and password reset flows.
 *
 * All collaborators are passed in by `createAuthService`; nothing here reads
 * global configuration.
 */

import { createHash } from "node:crypto";

import type { AuthSettings, RolePolicy } from "../../config/env.js";
import type { ActionTokenCodec } from "../../shared/action-tokens.js";
import type { AuthenticatedUser } from "../../shared/auth-context.js";
import {
  DEFAULT_ROLE,
  EMAIL_SUBJECTS,
  EMAIL_TEMPLATES,
  PASSWORD_RESET_REQUEST_MESSAGE,
} from "../../shared/constants.js";
import {
  AppError,
  AuthenticationError,
  AuthorizationError,
  NotFoundError,
  ServiceUnavailableError,
  TokenError,
  ValidationError,
} from "../../shared/errors.js";
import { logger } from "../../shared/logger.js";
import type { EmailSender } from "../../shared/mailer.js";
import type { CredentialVerifier } from "../../shared/password.js";
import type { RevocationStore } from "../../shared/revocation-store.js";
import type {
  SessionTokenClaims,
  SessionTokenIssuer,
  SessionTokenKind,
} from "../../shared/session-tokens.js";
import type { TemplateRenderer, TemplateVariables } from "../../shared/templates.js";
import { withTimeout } from "../../utils/timeout.js";
import { normalizeEmail, type UserRecord, type UserRepository } from "./auth.repository.js";

export type AuthServiceDeps = {
  users: UserRepository;
  credentials: CredentialVerifier;
  sessionTokens: SessionTokenIssuer;
  revocations: RevocationStore;
  verificationTokens: ActionTokenCodec;
  resetTokens: ActionTokenCodec;
  mailer: EmailSender;
  templates: TemplateRenderer;
  settings: AuthSettings;
  frontendUrl: string;
  userStoreTimeoutMs: number;
  now?: () => Date;
};

export type PublicUser = {
  id: string;
  email: string;
  username: string;
  first_name: string;
  last_name: string;
  role: string;
  is_verified: boolean;
  created_at: string;
  updated_at: string;
};

export type LoginResult = {
  accessToken: string;
  accessTokenExpiresIn: number;
  refreshToken: string;
  user: { id: string; email: string };
};

export type RefreshResult = {
  accessToken: string;
  accessTokenExpiresIn: number;
  /** Present only when refresh rotation is enabled. */
  refreshToken?: string;
};

export type SignupResult = {
  user: PublicUser;
  verificationSentTo: string;
  emailSent: boolean;
};

export type VerifyEmailResult = {
  status: "verification_complete" | "already_verified";
  user: PublicUser;
};

export function toPublicUser(user: UserRecord): PublicUser {
  return {
    id: user.id,
    email: user.email,
    username: user.username,
    first_name: user.firstName,
    last_name: user.lastName,
    role: user.role,
    is_verified: user.isVerified,
    created_at: user.createdAt.toISOString(),
    updated_at: user.updatedAt.toISOString(),
  };
}

function authFailed(): never {
  // Same answer for unknown email and wrong password.
  throw new AuthenticationError("Invalid credentials", "INVALID_CREDENTIALS");
}

/**
 * Short fingerprint of the stored digest. Embedded in reset tokens so a token
 * stops working once the password it was issued against has changed.
 */
function passwordFingerprint(passwordHash: string): string {
  return createHash("sha256").update(passwordHash, "utf8").digest("base64url").slice(0, 16);
}

function readEmail(payload: Record<string, unknown>): string {
  const email = typeof payload.email === "string" ? normalizeEmail(payload.email) : "";
  if (!email) {
    throw new ValidationError("Token does not contain valid email information");
  }
  return email;
}

export function createAuthService(deps: AuthServiceDeps) {
  const { settings } = deps;
  const now = deps.now ?? (() => new Date());
  const log = logger.child({ component: "auth" });

  /**
   * Bound a user-store call. Store failures and timeouts become 503 so no
   * caller is admitted (or rejected as "unknown") on a broken lookup.
   */
  async function userStore<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await withTimeout(fn(), deps.userStoreTimeoutMs, `user store ${operation}`);
    } catch (err: unknown) {
      if (err instanceof AppError) {throw err;}
      log.error("User store call failed", {
        operation,
        error: err instanceof Error ? err.message : String(err),
      });
      throw new ServiceUnavailableError("User store", err);
    }
  }

  async function sendEmail(
    kind: string,
    to: string,
    subject: string,
    template: string,
    variables: TemplateVariables
  ): Promise<boolean> {
    try {
      const html = await deps.templates.render(template, variables);
      await deps.mailer.send([to], subject, html);
      return true;
    } catch (err: unknown) {
      log.error("Email delivery failed", {
        kind,
        error: err instanceof Error ? err.message : String(err),
      });
      return false;
    }
  }

  function remainingSeconds(claims: SessionTokenClaims): number {
    return Math.max(1, Math.ceil((claims.expiresAt.getTime() - now().getTime()) / 1000));
  }

  /**
   * Token validation pipeline, short-circuiting in order:
   * signature/structure, expiry, token class, revocation.
   */
  async function validate(token: string, expected: SessionTokenKind): Promise<SessionTokenClaims> {
    const claims = await deps.sessionTokens.verify(token);

    if (claims.kind !== expected) {
      throw new TokenError(
        "WRONG_TOKEN_TYPE",
        expected === "refresh" ? "Refresh token required" : "Access token required"
      );
    }

    if (await deps.revocations.isRevoked(claims.tokenId)) {
      throw new TokenError("REVOKED", "Token has been revoked");
    }

    return claims;
  }

  async function signup(input: {
    firstName: string;
    lastName: string;
    username: string;
    email: string;
    password: string;
  }): Promise<SignupResult> {
    const email = normalizeEmail(input.email);
    const passwordHash = await deps.credentials.hash(input.password);

    // The unique index is the real guard; create() raises ConflictError on a race.
    const user = await userStore("create", () =>
      deps.users.create({
        email,
        username: input.username,
        firstName: input.firstName,
        lastName: input.lastName,
        passwordHash,
        role: DEFAULT_ROLE,
      })
    );
    log.info("User created", { userId: user.id });

    const token = await deps.verificationTokens.issue({ email: user.email });
    const emailSent = await sendEmail(
      "verification",
      user.email,
      EMAIL_SUBJECTS.VERIFICATION,
      EMAIL_TEMPLATES.VERIFICATION,
      {
        email: user.email,
        verification_link: `${deps.frontendUrl}/verify-email/${encodeURIComponent(token)}`,
        valid_hours: Math.round(settings.emailVerificationMaxAgeSeconds / 3600),
      }
    );

    return { user: toPublicUser(user), verificationSentTo: user.email, emailSent };
  }

  async function login(params: { email: string; password: string }): Promise<LoginResult> {
    const email = normalizeEmail(params.email);
    const password = String(params.password || "");
    if (!email || !password) {authFailed();}

    const user = await userStore("lookup", () => deps.users.findByEmail(email));
    if (!user) {authFailed();}

    if (!user.isVerified) {
      throw new AuthorizationError(
        "Please verify your email address before logging in. Check your email for the verification link."
      );
    }

    const valid = await deps.credentials.verify(password, user.passwordHash);
    if (!valid) {authFailed();}

    const identity = { userId: user.id, email: user.email };
    const [access, refresh] = await Promise.all([
      deps.sessionTokens.issueAccessToken(identity, user.role),
      deps.sessionTokens.issueRefreshToken(identity, user.role),
    ]);

    log.info("User logged in", { userId: user.id });

    return {
      accessToken: access.token,
      accessTokenExpiresIn: settings.accessTtlSeconds,
      refreshToken: refresh.token,
      user: { id: user.id, email: user.email },
    };
  }

  async function refresh(refreshToken: string): Promise<RefreshResult> {
    const claims = await validate(refreshToken, "refresh");
    const identity = { userId: claims.userId, email: claims.email };

    if (settings.refreshRotation !== "rotate") {
      const access = await deps.sessionTokens.issueAccessToken(identity, claims.role);
      return { accessToken: access.token, accessTokenExpiresIn: settings.accessTtlSeconds };
    }

    // Spend the presented token first; only the caller that records the revocation gets a new pair.
    const spent = await deps.revocations.revoke(claims.tokenId, remainingSeconds(claims));
    if (!spent) {
      throw new TokenError("REVOKED", "Token has been revoked");
    }

    const [access, next] = await Promise.all([
      deps.sessionTokens.issueAccessToken(identity, claims.role),
      deps.sessionTokens.issueRefreshToken(identity, claims.role),
    ]);

    return {
      accessToken: access.token,
      accessTokenExpiresIn: settings.accessTtlSeconds,
      refreshToken: next.token,
    };
  }

  /**
   * Revokes the presented access token (and the refresh token, when given)
   * for the rest of its lifetime.
   */
  async function logout(accessToken: string, refreshToken?: string): Promise<void> {
    const claims = await validate(accessToken, "access");

    const refreshClaims = refreshToken ? await validate(refreshToken, "refresh") : null;
    if (refreshClaims && refreshClaims.userId !== claims.userId) {
      throw new TokenError("INVALID", "Invalid token");
    }

    await deps.revocations.revoke(claims.tokenId, remainingSeconds(claims));
    if (refreshClaims) {
      await deps.revocations.revoke(refreshClaims.tokenId, remainingSeconds(refreshClaims));
    }

    log.info("User logged out", { userId: claims.userId, refreshRevoked: Boolean(refreshClaims) });
  }

  async function authorize(
    token: string,
    requiredRoles: readonly string[] = [],
    policy: RolePolicy = settings.rolePolicy
  ): Promise<AuthenticatedUser> {
    const claims = await validate(token, "access");

    if (requiredRoles.length > 0) {
      if (policy === "disabled") {
        log.debug("Role check skipped (role policy disabled)", {
          userId: claims.userId,
          role: claims.role,
          required: requiredRoles,
        });
      } else if (!requiredRoles.includes(claims.role)) {
        throw new AuthorizationError("Insufficient role");
      }
    }

    return {
      userId: claims.userId,
      email: claims.email,
      role: claims.role,
      tokenId: claims.tokenId,
      expiresAt: claims.expiresAt,
    };
  }

  async function verifyEmail(token: string): Promise<VerifyEmailResult> {
    const payload = await deps.verificationTokens.parse(token, settings.emailVerificationMaxAgeSeconds);
    const email = readEmail(payload);

    const user = await userStore("lookup", () => deps.users.findByEmail(email));
    if (!user) {throw new NotFoundError("User");}

    if (user.isVerified) {
      return { status: "already_verified", user: toPublicUser(user) };
    }

    const updated = await userStore("update", () => deps.users.update(user.id, { isVerified: true }));
    if (!updated) {throw new NotFoundError("User");}
    log.info("Email verified", { userId: updated.id });

    await sendEmail("welcome", updated.email, EMAIL_SUBJECTS.WELCOME, EMAIL_TEMPLATES.WELCOME, {
      user_name: updated.firstName,
      email: updated.email,
      login_link: `${deps.frontendUrl}/login`,
    });

    return { status: "verification_complete", user: toPublicUser(updated) };
  }

  async function sendPasswordReset(user: UserRecord): Promise<void> {
    try {
      const token = await deps.resetTokens.issue({
        email: user.email,
        pwd: passwordFingerprint(user.passwordHash),
      });
      await sendEmail(
        "password-reset",
        user.email,
        EMAIL_SUBJECTS.PASSWORD_RESET,
        EMAIL_TEMPLATES.PASSWORD_RESET,
        {
          user_name: user.firstName,
          email: user.email,
          reset_link: `${deps.frontendUrl}/reset-password?token=${encodeURIComponent(token)}`,
          valid_minutes: Math.round(settings.passwordResetMaxAgeSeconds / 60),
        }
      );
    } catch (err: unknown) {
      log.error("Password reset token issue failed", {
        userId: user.id,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }

  /**
   * Always resolves to the same message. Token signing and delivery run in the
   * background, after the reply is decided.
   */
  async function requestPasswordReset(emailInput: string): Promise<{ message: string }> {
    const email = normalizeEmail(emailInput);
    const user = email ? await userStore("lookup", () => deps.users.findByEmail(email)) : null;

    if (user) {
      void sendPasswordReset(user);
    } else {
      log.info("Password reset requested for unknown account");
    }

    return { message: PASSWORD_RESET_REQUEST_MESSAGE };
  }

  async function confirmPasswordReset(input: {
    token: string;
    newPassword: string;
    confirmPassword: string;
  }): Promise<void> {
    if (input.newPassword !== input.confirmPassword) {
      throw new ValidationError("Passwords do not match");
    }

    const payload = await deps.resetTokens.parse(input.token, settings.passwordResetMaxAgeSeconds);
    const email = readEmail(payload);

    const user = await userStore("lookup", () => deps.users.findByEmail(email));
    if (!user) {throw new NotFoundError("User");}

    if (payload.pwd !== passwordFingerprint(user.passwordHash)) {
      throw new TokenError("INVALID", "Token has already been used", 400);
    }

    const passwordHash = await deps.credentials.hash(input.newPassword);
    const updated = await userStore("update", () => deps.users.update(user.id, { passwordHash }));
    if (!updated) {throw new NotFoundError("User");}

    // Outstanding session tokens are not revoked: revocation is indexed by token id only.
    log.info("Password reset completed; existing sessions stay valid until they expire", {
      userId: user.id,
    });
  }

  async function getCurrentUser(auth: AuthenticatedUser): Promise<PublicUser> {
    const user = await userStore("lookup", () => deps.users.findById(auth.userId));
    if (!user) {throw new NotFoundError("User");}
    return toPublicUser(user);
  }

  return {
    signup,
    login,
    refresh,
    logout,
    authorize,
    validate,
    verifyEmail,
    requestPasswordReset,
    confirmPasswordReset,
    getCurrentUser,
  };
}

export type AuthService = ReturnType<typeof createAuthService>;
