#!/usr/bin/env tsx
/**
 * Apply SQL Migrations
 * ====================
 * Runs every `db/migrations/*.sql` file not yet recorded in
 * `schema_migrations`, in file-name order, each inside its own transaction.
 *
 * Usage:
 *   npx tsx scripts/migrate.ts
 *   npx tsx scripts/migrate.ts --dry-run
 */

import "dotenv/config";

import { readdir, readFile } from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";

import pg from "pg";

import { logger } from "../src/shared/logger.js";

const MIGRATIONS_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../db/migrations");

async function main() {
  const dryRun = process.argv.includes("--dry-run");
  const databaseUrl = process.env.DATABASE_URL?.trim();
  if (!databaseUrl) {throw new Error("DATABASE_URL is required");}

  const files = (await readdir(MIGRATIONS_DIR)).filter((f) => f.endsWith(".sql")).sort();
  const client = new pg.Client({ connectionString: databaseUrl });
  await client.connect();

  try {
    await client.query(
      `CREATE TABLE IF NOT EXISTS schema_migrations (
         name       TEXT PRIMARY KEY,
         applied_at TIMESTAMPTZ NOT NULL DEFAULT now()
       )`
    );
    const { rows } = await client.query<{ name: string }>("SELECT name FROM schema_migrations");
    const applied = new Set(rows.map((r) => r.name));
    const pending = files.filter((f) => !applied.has(f));

    if (pending.length === 0) {
      logger.info("Database is up to date", { applied: applied.size });
      return;
    }

    for (const file of pending) {
      if (dryRun) {
        logger.info("Would apply migration", { file });
        continue;
      }

      const sql = await readFile(path.join(MIGRATIONS_DIR, file), "utf8");
      await client.query("BEGIN");
      try {
        await client.query(sql);
        await client.query("INSERT INTO schema_migrations (name) VALUES ($1)", [file]);
        await client.query("COMMIT");
      } catch (err: unknown) {
        await client.query("ROLLBACK");
        throw err;
      }
      logger.info("Applied migration", { file });
    }
  } finally {
    await client.end();
  }
}

main().catch((err: unknown) => {
  logger.error("Migration failed", { error: err instanceof Error ? err.message : String(err) });
  process.exit(1);
});
