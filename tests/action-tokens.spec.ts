import { describe, expect, it } from "vitest";

import { createActionTokenCodec } from "../src/shared/action-tokens.js";
import { createSessionTokenIssuer } from "../src/shared/session-tokens.js";
import { createTestClock } from "./test-app.js";

function makeCodecs() {
  const clock = createTestClock();
  const verification = createActionTokenCodec({
    secret: "test-secret",
    purpose: "email-verification",
    now: clock.now,
  });
  const reset = createActionTokenCodec({ secret: "test-secret", purpose: "password-reset", now: clock.now });
  return { clock, verification, reset };
}

describe("action tokens", () => {
  it("returns the issued payload", async () => {
    const { verification } = makeCodecs();

    const token = await verification.issue({ email: "ann@example.com", attempt: 2, tags: ["a", "b"] });

    await expect(verification.parse(token, 3600)).resolves.toEqual({
      email: "ann@example.com",
      attempt: 2,
      tags: ["a", "b"],
    });
  });

  it("produces URL-safe tokens", async () => {
    const { verification } = makeCodecs();

    const token = await verification.issue({ email: "ann+chat@example.com" });

    expect(token).toMatch(/^[A-Za-z0-9_-]+\.[A-Za-z0-9_-]+\.[A-Za-z0-9_-]+$/);
  });

  it("accepts a token exactly max_age old and rejects it one second later", async () => {
    const { clock, reset } = makeCodecs();
    const token = await reset.issue({ email: "ann@example.com" });

    clock.advance(3600);
    await expect(reset.parse(token, 3600)).resolves.toEqual({ email: "ann@example.com" });

    clock.advance(1);
    await expect(reset.parse(token, 3600)).rejects.toMatchObject({
      reason: "EXPIRED",
      statusCode: 400,
      code: "TOKEN_EXPIRED",
    });
  });

  it("does not accept a token issued for another purpose", async () => {
    const { verification, reset } = makeCodecs();
    const token = await verification.issue({ email: "ann@example.com" });

    await expect(reset.parse(token, 3600)).rejects.toMatchObject({
      reason: "INVALID",
      statusCode: 400,
      code: "TOKEN_INVALID",
      message: "Invalid or malformed token",
    });
  });

  it("does not accept a token signed with another secret", async () => {
    const { verification } = makeCodecs();
    const foreign = createActionTokenCodec({ secret: "other-test-secret", purpose: "email-verification" });
    const token = await foreign.issue({ email: "ann@example.com" });

    await expect(verification.parse(token, 3600)).rejects.toMatchObject({ reason: "INVALID" });
  });

  it("does not accept session tokens", async () => {
    const { verification } = makeCodecs();
    const sessions = createSessionTokenIssuer({
      secret: "test-secret",
      algorithm: "HS256",
      issuer: "secure-chat-api",
      audience: "secure-chat-api",
      accessTtlSeconds: 3600,
      refreshTtlSeconds: 7200,
    });
    const { token } = await sessions.issueAccessToken({ userId: "u1", email: "ann@example.com" }, "user");

    await expect(verification.parse(token, 3600)).rejects.toMatchObject({ reason: "INVALID" });
  });

  it("rejects empty and garbage input as invalid", async () => {
    const { verification } = makeCodecs();

    await expect(verification.parse("", 3600)).rejects.toMatchObject({ reason: "INVALID" });
    await expect(verification.parse("garbage", 3600)).rejects.toMatchObject({ reason: "INVALID" });
  });
});
