import { describe, expect, it, vi } from "vitest";

import {
  AuthenticationError,
  AuthorizationError,
  ConflictError,
  NotFoundError,
  ServiceUnavailableError,
  TokenError,
  ValidationError,
} from "../src/shared/errors.js";
import { extractToken, failingExpiringKeyValue, RESET_LINK, VERIFY_LINK } from "./fakes.js";
import { createVerifiedUser, makeTestContext, TEST_PASSWORD } from "./test-app.js";

const signupInput = {
  firstName: "Ann",
  lastName: "Lee",
  username: "annlee",
  email: "Ann@Example.com",
  password: TEST_PASSWORD,
};

describe("auth service: signup and email verification", () => {
  it("creates an unverified account and emails a verification link", async () => {
    const ctx = makeTestContext();

    const result = await ctx.authService.signup(signupInput);

    expect(result.emailSent).toBe(true);
    expect(result.verificationSentTo).toBe("ann@example.com");
    expect(result.user).toMatchObject({
      email: "ann@example.com",
      username: "annlee",
      first_name: "Ann",
      last_name: "Lee",
      role: "user",
      is_verified: false,
    });
    expect(ctx.mailer.sent).toHaveLength(1);
    expect(ctx.mailer.sent[0]?.to).toEqual(["ann@example.com"]);
    expect(ctx.mailer.sent[0]?.subject).toBe("Verify your email address");
    expect(ctx.mailer.sent[0]?.html).toContain("The link is valid for 24 hours.");
  });

  it("stores a digest, not the password", async () => {
    const ctx = makeTestContext();

    const { user } = await ctx.authService.signup(signupInput);
    const stored = await ctx.users.findById(user.id);

    expect(stored?.passwordHash.startsWith("scrypt-sha256$")).toBe(true);
    expect(stored?.passwordHash).not.toContain(TEST_PASSWORD);
  });

  it("rejects a second account for the same email, ignoring case", async () => {
    const ctx = makeTestContext();
    await ctx.authService.signup(signupInput);

    await expect(
      ctx.authService.signup({ ...signupInput, username: "other", email: "ANN@example.com" })
    ).rejects.toBeInstanceOf(ConflictError);
  });

  it("keeps the account when the verification email cannot be sent", async () => {
    const ctx = makeTestContext();
    ctx.mailer.failNext(new Error("gateway down"));

    const result = await ctx.authService.signup(signupInput);

    expect(result.emailSent).toBe(false);
    await expect(ctx.users.findByEmail("ann@example.com")).resolves.toMatchObject({ isVerified: false });
  });

  it("verifies the account from the emailed link exactly once", async () => {
    const ctx = makeTestContext();
    await ctx.authService.signup(signupInput);
    const token = extractToken(ctx.mailer.sent[0]?.html ?? "", VERIFY_LINK);

    const first = await ctx.authService.verifyEmail(token);
    expect(first.status).toBe("verification_complete");
    expect(first.user.is_verified).toBe(true);
    expect(ctx.mailer.sent[1]?.subject).toBe("Welcome! Your account is verified");

    const second = await ctx.authService.verifyEmail(token);
    expect(second.status).toBe("already_verified");
    expect(ctx.mailer.sent).toHaveLength(2);
  });

  it("rejects an expired verification link", async () => {
    const ctx = makeTestContext();
    await ctx.authService.signup(signupInput);
    const token = extractToken(ctx.mailer.sent[0]?.html ?? "", VERIFY_LINK);

    ctx.clock.advance(86400 + 1);

    await expect(ctx.authService.verifyEmail(token)).rejects.toMatchObject({
      reason: "EXPIRED",
      statusCode: 400,
    });
  });

  it("reports an unknown account behind a valid link", async () => {
    const ctx = makeTestContext();
    const token = await ctx.verificationTokens.issue({ email: "ghost@example.com" });

    await expect(ctx.authService.verifyEmail(token)).rejects.toBeInstanceOf(NotFoundError);
  });

  it("rejects a link without an email", async () => {
    const ctx = makeTestContext();
    const token = await ctx.verificationTokens.issue({ user: 42 });

    await expect(ctx.authService.verifyEmail(token)).rejects.toThrow(
      new ValidationError("Token does not contain valid email information")
    );
  });
});

describe("auth service: login", () => {
  it("issues an access/refresh pair for valid credentials", async () => {
    const ctx = makeTestContext();
    const user = await createVerifiedUser(ctx);

    const result = await ctx.authService.login({ email: "ANN@example.com", password: TEST_PASSWORD });

    expect(result.accessTokenExpiresIn).toBe(3600);
    expect(result.user).toEqual({ id: user.id, email: "ann@example.com" });
    await expect(ctx.authService.validate(result.accessToken, "access")).resolves.toMatchObject({
      userId: user.id,
      role: "user",
      kind: "access",
    });
    await expect(ctx.authService.validate(result.refreshToken, "refresh")).resolves.toMatchObject({
      userId: user.id,
      kind: "refresh",
    });
  });

  it("gives the same answer for an unknown email and a wrong password", async () => {
    const ctx = makeTestContext();
    await createVerifiedUser(ctx);

    const attempts = [
      { email: "nobody@example.com", password: TEST_PASSWORD },
      { email: "ann@example.com", password: "wrong-password" },
    ];

    for (const credentials of attempts) {
      const attempt = ctx.authService.login(credentials);
      await expect(attempt).rejects.toBeInstanceOf(AuthenticationError);
      await expect(attempt).rejects.toMatchObject({
        statusCode: 401,
        code: "INVALID_CREDENTIALS",
        message: "Invalid credentials",
      });
    }
  });

  it("refuses unverified accounts before checking the password", async () => {
    const ctx = makeTestContext();
    await ctx.authService.signup(signupInput);

    for (const password of [TEST_PASSWORD, "wrong-password"]) {
      const attempt = ctx.authService.login({ email: "ann@example.com", password });
      await expect(attempt).rejects.toBeInstanceOf(AuthorizationError);
      await expect(attempt).rejects.toMatchObject({ statusCode: 403 });
    }
  });

  it("returns 503 when the user store fails", async () => {
    const ctx = makeTestContext({
      users: (repo) => ({ ...repo, findByEmail: () => Promise.reject(new Error("connection terminated")) }),
    });

    await expect(
      ctx.authService.login({ email: "ann@example.com", password: TEST_PASSWORD })
    ).rejects.toMatchObject({ statusCode: 503, message: "User store unavailable" });
  });

  it("returns 503 when the user store does not answer in time", async () => {
    const ctx = makeTestContext({
      users: (repo) => ({ ...repo, findByEmail: () => new Promise(() => {}) }),
    });

    await expect(
      ctx.authService.login({ email: "ann@example.com", password: TEST_PASSWORD })
    ).rejects.toBeInstanceOf(ServiceUnavailableError);
  });
});

describe("auth service: token validation", () => {
  it("does not accept a refresh token as an access token, or the reverse", async () => {
    const ctx = makeTestContext();
    await createVerifiedUser(ctx);
    const { accessToken, refreshToken } = await ctx.authService.login({
      email: "ann@example.com",
      password: TEST_PASSWORD,
    });

    await expect(ctx.authService.authorize(refreshToken)).rejects.toMatchObject({
      reason: "WRONG_TOKEN_TYPE",
      message: "Access token required",
    });
    await expect(ctx.authService.refresh(accessToken)).rejects.toMatchObject({
      reason: "WRONG_TOKEN_TYPE",
      message: "Refresh token required",
    });
  });

  it("reports expiry before revocation", async () => {
    const ctx = makeTestContext();
    await createVerifiedUser(ctx);
    const { accessToken } = await ctx.authService.login({ email: "ann@example.com", password: TEST_PASSWORD });

    ctx.clock.advance(600);
    await ctx.authService.logout(accessToken);
    await expect(ctx.authService.authorize(accessToken)).rejects.toMatchObject({ reason: "REVOKED" });

    ctx.clock.advance(3000);
    await expect(ctx.authService.authorize(accessToken)).rejects.toMatchObject({ reason: "EXPIRED" });
  });

  it("fails closed when the revocation store is down", async () => {
    const ctx = makeTestContext({ revocationBackend: failingExpiringKeyValue() });
    await createVerifiedUser(ctx);
    const { accessToken } = await ctx.authService.login({ email: "ann@example.com", password: TEST_PASSWORD });

    await expect(ctx.authService.authorize(accessToken)).rejects.toMatchObject({
      statusCode: 503,
      message: "Revocation store unavailable",
    });
    await expect(ctx.authService.logout(accessToken)).rejects.toBeInstanceOf(ServiceUnavailableError);
  });
});

describe("auth service: role policy", () => {
  it("admits any role when no roles are required", async () => {
    const ctx = makeTestContext();
    const user = await createVerifiedUser(ctx);
    const { accessToken } = await ctx.authService.login({ email: "ann@example.com", password: TEST_PASSWORD });

    await expect(ctx.authService.authorize(accessToken)).resolves.toMatchObject({
      userId: user.id,
      email: "ann@example.com",
      role: "user",
    });
  });

  it("rejects roles outside the required set", async () => {
    const ctx = makeTestContext();
    await createVerifiedUser(ctx);
    const { accessToken } = await ctx.authService.login({ email: "ann@example.com", password: TEST_PASSWORD });

    await expect(ctx.authService.authorize(accessToken, ["admin"])).rejects.toThrow(
      new AuthorizationError("Insufficient role")
    );
  });

  it("admits members of the required set", async () => {
    const ctx = makeTestContext();
    await createVerifiedUser(ctx, { role: "admin" });
    const { accessToken } = await ctx.authService.login({ email: "ann@example.com", password: TEST_PASSWORD });

    await expect(ctx.authService.authorize(accessToken, ["admin"])).resolves.toMatchObject({ role: "admin" });
  });

  it("skips the role check when the policy is disabled", async () => {
    const ctx = makeTestContext({ env: { AUTH_ROLE_POLICY: "disabled" } });
    await createVerifiedUser(ctx);
    const { accessToken } = await ctx.authService.login({ email: "ann@example.com", password: TEST_PASSWORD });

    await expect(ctx.authService.authorize(accessToken, ["admin"])).resolves.toMatchObject({ role: "user" });
    await expect(ctx.authService.authorize(accessToken, ["admin"], "enforced")).rejects.toBeInstanceOf(
      AuthorizationError
    );
  });
});

describe("auth service: refresh and logout", () => {
  it("issues a new access token and keeps the refresh token when rotation is off", async () => {
    const ctx = makeTestContext();
    const user = await createVerifiedUser(ctx);
    const { refreshToken } = await ctx.authService.login({ email: "ann@example.com", password: TEST_PASSWORD });

    const first = await ctx.authService.refresh(refreshToken);
    const second = await ctx.authService.refresh(refreshToken);

    expect(first.refreshToken).toBeUndefined();
    expect(first.accessTokenExpiresIn).toBe(3600);
    await expect(ctx.authService.authorize(first.accessToken)).resolves.toMatchObject({ userId: user.id });
    await expect(ctx.authService.authorize(second.accessToken)).resolves.toMatchObject({ userId: user.id });
  });

  it("rotates and revokes the presented refresh token when rotation is on", async () => {
    const ctx = makeTestContext({ env: { AUTH_REFRESH_ROTATION: "rotate" } });
    await createVerifiedUser(ctx);
    const { refreshToken } = await ctx.authService.login({ email: "ann@example.com", password: TEST_PASSWORD });

    const rotated = await ctx.authService.refresh(refreshToken);

    expect(rotated.refreshToken).toEqual(expect.any(String));
    await expect(ctx.authService.refresh(refreshToken)).rejects.toMatchObject({ reason: "REVOKED" });
    await expect(ctx.authService.refresh(rotated.refreshToken ?? "")).resolves.toMatchObject({
      accessTokenExpiresIn: 3600,
    });
  });

  it("lets only one of two concurrent rotations through", async () => {
    const ctx = makeTestContext({ env: { AUTH_REFRESH_ROTATION: "rotate" } });
    await createVerifiedUser(ctx);
    const { refreshToken } = await ctx.authService.login({ email: "ann@example.com", password: TEST_PASSWORD });

    const results = await Promise.allSettled([
      ctx.authService.refresh(refreshToken),
      ctx.authService.refresh(refreshToken),
    ]);

    expect(results.filter((r) => r.status === "fulfilled")).toHaveLength(1);
    const rejected = results.find((r) => r.status === "rejected");
    expect(rejected?.status === "rejected" ? rejected.reason : null).toMatchObject({ reason: "REVOKED" });
  });

  it("revokes for the rest of the token's lifetime only", async () => {
    const ctx = makeTestContext();
    await createVerifiedUser(ctx);
    const { accessToken } = await ctx.authService.login({ email: "ann@example.com", password: TEST_PASSWORD });
    const setIfAbsent = vi.spyOn(ctx.revocationEntries, "setIfAbsent");

    ctx.clock.advance(600);
    await ctx.authService.logout(accessToken);

    expect(setIfAbsent).toHaveBeenCalledTimes(1);
    expect(setIfAbsent.mock.calls[0]?.[2]).toBe(ctx.config.auth.accessTtlSeconds - 600);
    expect(ctx.revocationEntries.size()).toBe(1);

    ctx.clock.advance(ctx.config.auth.accessTtlSeconds - 600 - 1);
    expect(ctx.revocationEntries.size()).toBe(1);
    ctx.clock.advance(1);
    expect(ctx.revocationEntries.size()).toBe(0);
  });

  it("revokes a rotated refresh token until its own expiry", async () => {
    const ctx = makeTestContext({ env: { AUTH_REFRESH_ROTATION: "rotate" } });
    await createVerifiedUser(ctx);
    const { refreshToken } = await ctx.authService.login({ email: "ann@example.com", password: TEST_PASSWORD });
    const setIfAbsent = vi.spyOn(ctx.revocationEntries, "setIfAbsent");

    ctx.clock.advance(120);
    await ctx.authService.refresh(refreshToken);

    expect(setIfAbsent.mock.calls[0]?.[2]).toBe(ctx.config.auth.refreshTtlSeconds - 120);
  });

  it("revokes the access token and the optional refresh token", async () => {
    const ctx = makeTestContext();
    await createVerifiedUser(ctx);
    const { accessToken, refreshToken } = await ctx.authService.login({
      email: "ann@example.com",
      password: TEST_PASSWORD,
    });

    await ctx.authService.logout(accessToken, refreshToken);

    await expect(ctx.authService.authorize(accessToken)).rejects.toMatchObject({
      reason: "REVOKED",
      code: "TOKEN_REVOKED",
      message: "Token has been revoked",
    });
    await expect(ctx.authService.refresh(refreshToken)).rejects.toMatchObject({ reason: "REVOKED" });
    await expect(ctx.authService.logout(accessToken)).rejects.toMatchObject({ reason: "REVOKED" });
  });

  it("leaves sibling sessions alone", async () => {
    const ctx = makeTestContext();
    await createVerifiedUser(ctx);
    const a = await ctx.authService.login({ email: "ann@example.com", password: TEST_PASSWORD });
    const b = await ctx.authService.login({ email: "ann@example.com", password: TEST_PASSWORD });

    await ctx.authService.logout(a.accessToken);

    await expect(ctx.authService.authorize(b.accessToken)).resolves.toMatchObject({ email: "ann@example.com" });
    await expect(ctx.authService.refresh(a.refreshToken)).resolves.toMatchObject({ accessTokenExpiresIn: 3600 });
  });

  it("refuses to revoke another user's refresh token", async () => {
    const ctx = makeTestContext();
    await createVerifiedUser(ctx);
    await createVerifiedUser(ctx, { email: "bob@example.com" });
    const ann = await ctx.authService.login({ email: "ann@example.com", password: TEST_PASSWORD });
    const bob = await ctx.authService.login({ email: "bob@example.com", password: TEST_PASSWORD });

    await expect(ctx.authService.logout(ann.accessToken, bob.refreshToken)).rejects.toThrow(
      new TokenError("INVALID", "Invalid token")
    );
    await expect(ctx.authService.authorize(ann.accessToken)).resolves.toMatchObject({ email: "ann@example.com" });
    await expect(ctx.authService.refresh(bob.refreshToken)).resolves.toMatchObject({ accessTokenExpiresIn: 3600 });
  });
});

describe("auth service: password reset", () => {
  async function requestResetToken(ctx: ReturnType<typeof makeTestContext>): Promise<string> {
    const before = ctx.mailer.sent.length;
    const reply = await ctx.authService.requestPasswordReset("ann@example.com");
    expect(reply).toEqual({ message: "Please check your email for instructions to reset your password" });

    await vi.waitFor(() => expect(ctx.mailer.sent).toHaveLength(before + 1));
    const mail = ctx.mailer.sent[before];
    expect(mail?.subject).toBe("Reset your password");
    return extractToken(mail?.html ?? "", RESET_LINK);
  }

  it("gives the same reply for unknown accounts and sends nothing", async () => {
    const ctx = makeTestContext();

    const reply = await ctx.authService.requestPasswordReset("nobody@example.com");

    expect(reply).toEqual({ message: "Please check your email for instructions to reset your password" });
    expect(ctx.mailer.sent).toHaveLength(0);
  });

  it("signs the reset token after replying and keeps signing failures out of the reply", async () => {
    const ctx = makeTestContext();
    await createVerifiedUser(ctx);
    const sentBefore = ctx.mailer.sent.length;
    const issue = vi.spyOn(ctx.resetTokens, "issue").mockRejectedValueOnce(new Error("signing failed"));

    const reply = await ctx.authService.requestPasswordReset("ann@example.com");

    expect(reply).toEqual({ message: "Please check your email for instructions to reset your password" });
    await vi.waitFor(() => expect(issue).toHaveBeenCalledTimes(1));
    expect(ctx.mailer.sent).toHaveLength(sentBefore);
  });

  it("replaces the password with the emailed token", async () => {
    const ctx = makeTestContext();
    await createVerifiedUser(ctx);
    const token = await requestResetToken(ctx);

    await ctx.authService.confirmPasswordReset({
      token,
      newPassword: "a-brand-new-secret",
      confirmPassword: "a-brand-new-secret",
    });

    await expect(
      ctx.authService.login({ email: "ann@example.com", password: TEST_PASSWORD })
    ).rejects.toMatchObject({ code: "INVALID_CREDENTIALS" });
    await expect(
      ctx.authService.login({ email: "ann@example.com", password: "a-brand-new-secret" })
    ).resolves.toMatchObject({ user: { email: "ann@example.com" } });
  });

  it("accepts a reset token only once", async () => {
    const ctx = makeTestContext();
    await createVerifiedUser(ctx);
    const token = await requestResetToken(ctx);
    const input = { token, newPassword: "a-brand-new-secret", confirmPassword: "a-brand-new-secret" };

    await ctx.authService.confirmPasswordReset(input);

    await expect(ctx.authService.confirmPasswordReset(input)).rejects.toMatchObject({
      reason: "INVALID",
      statusCode: 400,
      message: "Token has already been used",
    });
  });

  it("rejects mismatched confirmation before touching the token", async () => {
    const ctx = makeTestContext();

    await expect(
      ctx.authService.confirmPasswordReset({
        token: "garbage",
        newPassword: "a-brand-new-secret",
        confirmPassword: "a-different-secret",
      })
    ).rejects.toThrow(new ValidationError("Passwords do not match"));
  });

  it("rejects expired reset tokens", async () => {
    const ctx = makeTestContext();
    await createVerifiedUser(ctx);
    const token = await requestResetToken(ctx);

    ctx.clock.advance(3601);

    await expect(
      ctx.authService.confirmPasswordReset({
        token,
        newPassword: "a-brand-new-secret",
        confirmPassword: "a-brand-new-secret",
      })
    ).rejects.toMatchObject({ reason: "EXPIRED", statusCode: 400 });
  });

  it("does not accept a verification token as a reset token", async () => {
    const ctx = makeTestContext();
    await createVerifiedUser(ctx);
    const token = await ctx.verificationTokens.issue({ email: "ann@example.com" });

    await expect(
      ctx.authService.confirmPasswordReset({
        token,
        newPassword: "a-brand-new-secret",
        confirmPassword: "a-brand-new-secret",
      })
    ).rejects.toMatchObject({ reason: "INVALID", statusCode: 400 });
  });

  it("leaves existing sessions valid after a reset", async () => {
    const ctx = makeTestContext();
    await createVerifiedUser(ctx);
    const { accessToken } = await ctx.authService.login({ email: "ann@example.com", password: TEST_PASSWORD });
    const token = await requestResetToken(ctx);

    await ctx.authService.confirmPasswordReset({
      token,
      newPassword: "a-brand-new-secret",
      confirmPassword: "a-brand-new-secret",
    });

    await expect(ctx.authService.authorize(accessToken)).resolves.toMatchObject({ email: "ann@example.com" });
  });
});

describe("auth service: current user", () => {
  it("returns the public profile without the password digest", async () => {
    const ctx = makeTestContext();
    const user = await createVerifiedUser(ctx);
    const { accessToken } = await ctx.authService.login({ email: "ann@example.com", password: TEST_PASSWORD });
    const auth = await ctx.authService.authorize(accessToken);

    const profile = await ctx.authService.getCurrentUser(auth);

    expect(Object.keys(profile)).toEqual([
      "id",
      "email",
      "username",
      "first_name",
      "last_name",
      "role",
      "is_verified",
      "created_at",
      "updated_at",
    ]);
    expect(profile).toMatchObject({ id: user.id, is_verified: true, created_at: "2026-01-01T00:00:00.000Z" });
  });
});
