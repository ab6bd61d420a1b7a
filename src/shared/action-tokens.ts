/**
 * Action Tokens
 * =============
 * Signed, timestamped, URL-safe tokens for out-of-band actions (email
 * verification, password reset links).
 *
 * Notes:
 * - Each purpose signs with its own key derived from the server secret, so a
 *   verification token never validates as a reset token.
 * - Validity is a max age measured from `iat`; there is no `exp` claim.
 * - The codec keeps no state: single use is enforced by the caller
 *   (e.g. flipping `isVerified`).
 */

import { createHmac } from "node:crypto";

import { errors, jwtVerify, SignJWT } from "jose";

import { TokenError } from "./errors.js";

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type ActionTokenPayload = { [key: string]: JsonValue };

export type ActionTokenPurpose = "email-verification" | "password-reset";

export type ActionTokenConfig = {
  secret: string;
  purpose: ActionTokenPurpose;
  now?: () => Date;
};

export interface ActionTokenCodec {
  readonly purpose: ActionTokenPurpose;
  issue(payload: ActionTokenPayload): Promise<string>;
  /**
   * @param maxAgeSeconds - oldest accepted token age; a token exactly this old still passes
   */
  parse(token: string, maxAgeSeconds: number): Promise<ActionTokenPayload>;
}

const ACTION_TOKEN_TYP = "action+jwt";

function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) {return true;}
  switch (typeof value) {
    case "string":
    case "boolean":
      return true;
    case "number":
      return Number.isFinite(value);
    case "object":
      if (Array.isArray(value)) {return value.every(isJsonValue);}
      return isActionTokenPayload(value);
    default:
      return false;
  }
}

export function isActionTokenPayload(value: unknown): value is ActionTokenPayload {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {return false;}
  return Object.values(value).every(isJsonValue);
}

function deriveKey(secret: string, purpose: ActionTokenPurpose): Uint8Array {
  return createHmac("sha256", secret).update(`action-token:${purpose}`, "utf8").digest();
}

function invalid(): TokenError {
  return new TokenError("INVALID", "Invalid or malformed token", 400);
}

export function createActionTokenCodec(config: ActionTokenConfig): ActionTokenCodec {
  const key = deriveKey(config.secret, config.purpose);
  const now = config.now ?? (() => new Date());

  async function issue(payload: ActionTokenPayload): Promise<string> {
    return await new SignJWT({ data: payload })
      .setProtectedHeader({ alg: "HS256", typ: ACTION_TOKEN_TYP })
      .setIssuedAt(Math.floor(now().getTime() / 1000))
      .sign(key);
  }

  async function parse(token: string, maxAgeSeconds: number): Promise<ActionTokenPayload> {
    const raw = String(token || "").trim();
    if (!raw) {throw invalid();}

    let data: unknown;
    try {
      const { payload } = await jwtVerify(raw, key, {
        algorithms: ["HS256"],
        typ: ACTION_TOKEN_TYP,
        maxTokenAge: maxAgeSeconds,
        currentDate: now(),
      });
      data = payload.data;
    } catch (err: unknown) {
      if (err instanceof errors.JWTExpired) {
        throw new TokenError("EXPIRED", "Token has expired", 400);
      }
      if (err instanceof errors.JOSEError) {throw invalid();}
      throw err;
    }

    if (!isActionTokenPayload(data)) {throw invalid();}
    return data;
  }

  return { purpose: config.purpose, issue, parse };
}
