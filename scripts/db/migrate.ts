/**
 * Applies drizzle/*.sql in name order, once each. Requires DATABASE_URL.
 * Usage: DATABASE_URL=postgresql://... tsx scripts/db/migrate.ts
 */

import { readFile, readdir } from "fs/promises";
import { join } from "path";
import pg from "pg";

const MIGRATIONS_DIR = join(process.cwd(), "drizzle");

async function main(): Promise<void> {
  const url = process.env.DATABASE_URL;
  if (!url) {
    throw new Error("DATABASE_URL is required");
  }
  const sqlFiles = (await readdir(MIGRATIONS_DIR)).filter((f) => f.endsWith(".sql")).sort();
  const client = new pg.Client({ connectionString: url });
  await client.connect();
  try {
    await client.query(`
      CREATE TABLE IF NOT EXISTS "_migrations" (
        "name" text PRIMARY KEY,
        "applied_at" timestamp with time zone NOT NULL DEFAULT now()
      )
    `);
    for (const f of sqlFiles) {
      const { rows } = await client.query("SELECT 1 FROM _migrations WHERE name = $1", [f]);
      if (rows.length > 0) {
        console.log(`[migrate] ${f} already applied, skipping`);
        continue;
      }
      const sql = await readFile(join(MIGRATIONS_DIR, f), "utf-8");
      await client.query("BEGIN");
      try {
        await client.query(sql);
        await client.query("INSERT INTO _migrations (name) VALUES ($1)", [f]);
        await client.query("COMMIT");
      } catch (err) {
        await client.query("ROLLBACK");
        throw err;
      }
      console.log(`[migrate] ${f} applied`);
    }
  } finally {
    await client.end();
  }
}

main().catch((err) => {
  console.error("[migrate]", err);
  process.exit(1);
});
