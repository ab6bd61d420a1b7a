import { randomUUID } from "node:crypto";

import { errors, jwtVerify, SignJWT } from "jose";

import { TokenError } from "./errors.js";

export type SessionTokenAlgorithm = "HS256" | "HS384" | "HS512";

export type SessionTokenConfig = {
  secret: string;
  algorithm: SessionTokenAlgorithm;
  issuer: string;
  audience: string;
  accessTtlSeconds: number;
  refreshTtlSeconds: number;
  now?: () => Date;
};

export type SessionIdentity = {
  userId: string;
  email: string;
};

export type SessionTokenKind = "access" | "refresh";

export type IssuedSessionToken = {
  token: string;
  tokenId: string;
  expiresAt: Date;
};

/**
 * Claims of a token whose signature and expiry have been checked.
 * Type and revocation are checked by the auth service.
 */
export type SessionTokenClaims = SessionIdentity & {
  role: string;
  tokenId: string;
  kind: SessionTokenKind;
  issuedAt: Date;
  expiresAt: Date;
};

export interface SessionTokenIssuer {
  issueAccessToken(identity: SessionIdentity, role: string): Promise<IssuedSessionToken>;
  issueRefreshToken(identity: SessionIdentity, role: string): Promise<IssuedSessionToken>;
  verify(token: string): Promise<SessionTokenClaims>;
}

function readNonEmptyString(value: unknown): string | null {
  return typeof value === "string" && value.trim() ? value.trim() : null;
}

function invalid(): TokenError {
  return new TokenError("INVALID", "Invalid token");
}

export function createSessionTokenIssuer(config: SessionTokenConfig): SessionTokenIssuer {
  const key = new TextEncoder().encode(config.secret);
  const now = config.now ?? (() => new Date());

  async function issue(
    identity: SessionIdentity,
    role: string,
    kind: SessionTokenKind
  ): Promise<IssuedSessionToken> {
    const issuedAt = Math.floor(now().getTime() / 1000);
    const ttl = kind === "refresh" ? config.refreshTtlSeconds : config.accessTtlSeconds;
    const expiresAt = issuedAt + ttl;
    const tokenId = randomUUID();

    const token = await new SignJWT({
      email: identity.email,
      role,
      refresh: kind === "refresh",
    })
      .setProtectedHeader({ alg: config.algorithm, typ: "JWT" })
      .setIssuer(config.issuer)
      .setAudience(config.audience)
      .setSubject(identity.userId)
      .setJti(tokenId)
      .setIssuedAt(issuedAt)
      .setExpirationTime(expiresAt)
      .sign(key);

    return { token, tokenId, expiresAt: new Date(expiresAt * 1000) };
  }

  async function verify(token: string): Promise<SessionTokenClaims> {
    const raw = String(token || "").trim();
    if (!raw) {throw invalid();}

    try {
      const { payload } = await jwtVerify(raw, key, {
        issuer: config.issuer,
        audience: config.audience,
        algorithms: [config.algorithm],
        currentDate: now(),
      });

      const userId = readNonEmptyString(payload.sub);
      const email = readNonEmptyString(payload.email);
      const role = readNonEmptyString(payload.role);
      const tokenId = readNonEmptyString(payload.jti);
      if (!userId || !email || !role || !tokenId) {throw invalid();}
      if (typeof payload.refresh !== "boolean") {throw invalid();}
      if (typeof payload.exp !== "number" || typeof payload.iat !== "number") {throw invalid();}

      return {
        userId,
        email,
        role,
        tokenId,
        kind: payload.refresh ? "refresh" : "access",
        issuedAt: new Date(payload.iat * 1000),
        expiresAt: new Date(payload.exp * 1000),
      };
    } catch (err: unknown) {
      if (err instanceof TokenError) {throw err;}
      if (err instanceof errors.JWTExpired) {
        throw new TokenError("EXPIRED", "Token has expired");
      }
      if (err instanceof errors.JOSEError) {throw invalid();}
      throw err;
    }
  }

  return {
    issueAccessToken: (identity, role) => issue(identity, role, "access"),
    issueRefreshToken: (identity, role) => issue(identity, role, "refresh"),
    verify,
  };
}

export function extractBearerToken(value: unknown): string | null {
  if (typeof value !== "string") {return null;}
  const v = value.trim();
  if (!v) {return null;}
  const m = /^Bearer\s+(.+)$/i.exec(v);
  if (!m) {return null;}
  const token = m[1]?.trim();
  return token ? token : null;
}
