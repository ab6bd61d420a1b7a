/**
 * Revocation Store
 * ================
 * Shared registry of revoked session token ids (`jti`).
 *
 * Notes:
 * - Entries expire with the token they invalidate.
 * - Every backend call is time-bounded; failures and timeouts surface as 503.
 * - No caching: each check goes to the backend.
 */

import { ServiceUnavailableError } from "./errors.js";
import { logger } from "./logger.js";
import type { RedisClient } from "./redis.js";
import { withTimeout } from "../utils/timeout.js";

export interface RevocationStore {
  /**
   * Idempotent: re-revoking keeps the original expiry. Resolves `true` only
   * for the call that recorded the id.
   */
  revoke(tokenId: string, ttlSeconds: number): Promise<boolean>;
  isRevoked(tokenId: string): Promise<boolean>;
}

/**
 * Minimal expiring key/value contract the store needs from its backend.
 */
export interface ExpiringKeyValue {
  /** Resolves `true` when the key was written, `false` when it already existed. */
  setIfAbsent(key: string, value: string, ttlSeconds: number): Promise<boolean>;
  exists(key: string): Promise<boolean>;
}

export const REVOKED_KEY_PREFIX = "revoked:jti:";

export function redisExpiringKeyValue(client: RedisClient): ExpiringKeyValue {
  return {
    setIfAbsent: async (key, value, ttlSeconds) =>
      (await client.set(key, value, { EX: ttlSeconds, NX: true })) === "OK",
    exists: async (key) => (await client.exists(key)) > 0,
  };
}

export type MemoryExpiringKeyValue = ExpiringKeyValue & {
  size(): number;
};

/**
 * In-process backend. Only consistent within a single server instance; used
 * when REDIS_URL is not configured and in tests.
 */
export function memoryExpiringKeyValue(now: () => Date = () => new Date()): MemoryExpiringKeyValue {
  const entries = new Map<string, number>();

  function sweep(at: number) {
    for (const [key, expiresAt] of entries) {
      if (expiresAt <= at) {entries.delete(key);}
    }
  }

  return {
    setIfAbsent: async (key, _value, ttlSeconds) => {
      const at = now().getTime();
      sweep(at);
      if (entries.has(key)) {return false;}
      entries.set(key, at + ttlSeconds * 1000);
      return true;
    },
    exists: async (key) => {
      const expiresAt = entries.get(key);
      if (expiresAt === undefined) {return false;}
      if (expiresAt <= now().getTime()) {
        entries.delete(key);
        return false;
      }
      return true;
    },
    size: () => {
      sweep(now().getTime());
      return entries.size;
    },
  };
}

export function createRevocationStore(
  backend: ExpiringKeyValue,
  options: { timeoutMs: number }
): RevocationStore {
  const log = logger.child({ component: "revocation-store" });

  async function guarded<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await withTimeout(fn(), options.timeoutMs, `revocation store ${operation}`);
    } catch (err: unknown) {
      log.error("Revocation store call failed", {
        operation,
        error: err instanceof Error ? err.message : String(err),
      });
      throw new ServiceUnavailableError("Revocation store", err);
    }
  }

  return {
    revoke: async (tokenId, ttlSeconds) => {
      const ttl = Math.max(1, Math.ceil(ttlSeconds));
      return guarded("revoke", () => backend.setIfAbsent(`${REVOKED_KEY_PREFIX}${tokenId}`, "1", ttl));
    },
    isRevoked: (tokenId) =>
      guarded("lookup", () => backend.exists(`${REVOKED_KEY_PREFIX}${tokenId}`)),
  };
}
