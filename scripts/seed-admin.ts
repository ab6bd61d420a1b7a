#!/usr/bin/env tsx
/**
 * Seed Admin Account
 * ==================
 * Creates (or promotes) a verified account with the `admin` role.
 *
 * Usage:
 *   SEED_ADMIN_EMAIL=admin@example.com SEED_ADMIN_PASSWORD=... npx tsx scripts/seed-admin.ts
 *
 * Options (env):
 *   SEED_ADMIN_EMAIL      required
 *   SEED_ADMIN_PASSWORD   required for a new account (min 8 chars)
 *   SEED_ADMIN_USERNAME   default: "admin"
 */

import "dotenv/config";

import pg from "pg";

import { createPgUserRepository, normalizeEmail } from "../src/modules/auth/auth.repository.js";
import { logger } from "../src/shared/logger.js";
import { hashPassword } from "../src/shared/password.js";

const ADMIN_ROLE = "admin";

async function main() {
  const databaseUrl = process.env.DATABASE_URL?.trim();
  const email = normalizeEmail(process.env.SEED_ADMIN_EMAIL ?? "");
  const password = process.env.SEED_ADMIN_PASSWORD ?? "";
  const username = process.env.SEED_ADMIN_USERNAME?.trim() || "admin";

  if (!databaseUrl) {throw new Error("DATABASE_URL is required");}
  if (!email) {throw new Error("SEED_ADMIN_EMAIL is required");}

  const pool = new pg.Pool({ connectionString: databaseUrl });
  const users = createPgUserRepository(pool);

  try {
    const existing = await users.findByEmail(email);
    if (existing) {
      await users.update(existing.id, { role: ADMIN_ROLE, isVerified: true });
      logger.info("Promoted existing account to admin", { userId: existing.id });
      return;
    }

    if (password.length < 8) {throw new Error("SEED_ADMIN_PASSWORD must be at least 8 characters");}

    const created = await users.create({
      email,
      username,
      firstName: "Admin",
      lastName: "User",
      passwordHash: await hashPassword(password),
      role: ADMIN_ROLE,
    });
    await users.update(created.id, { isVerified: true });
    logger.info("Created admin account", { userId: created.id });
  } finally {
    await pool.end();
  }
}

main().catch((err: unknown) => {
  logger.error("Seeding admin failed", { error: err instanceof Error ? err.message : String(err) });
  process.exit(1);
});
