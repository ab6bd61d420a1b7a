/**
 * Redis Connection
 * ================
 * Client setup for the revocation store.
 *
 * Notes:
 * - Created once at process start and handed to the stores that need it.
 * - Offline queue disabled: commands fail fast while disconnected.
 */

import { createClient } from "redis";

import { logger } from "./logger.js";

export type RedisClient = ReturnType<typeof createClient>;

export async function connectRedis(url: string, options: { connectTimeoutMs: number }): Promise<RedisClient> {
  const client = createClient({
    url,
    disableOfflineQueue: true,
    socket: { connectTimeout: options.connectTimeoutMs },
  });

  client.on("error", (err: unknown) => {
    logger.error("Redis client error", { error: err instanceof Error ? err.message : String(err) });
  });
  client.on("reconnecting", () => {
    logger.warn("Redis reconnecting...");
  });

  await client.connect();
  return client;
}

export async function disconnectRedis(client: RedisClient): Promise<void> {
  if (!client.isOpen) {return;}
  try {
    await client.quit();
  } catch (err: unknown) {
    logger.warn("Redis quit failed", { error: err instanceof Error ? err.message : String(err) });
  }
}
