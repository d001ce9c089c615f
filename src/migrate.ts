import fs from "node:fs";
import path from "node:path";
import { createHash } from "node:crypto";
import { fileURLToPath } from "node:url";
import type Database from "better-sqlite3";
import pino, { type Logger } from "pino";
import { openDatabase } from "./db/connection";

const MIGRATIONS_TABLE = "schema_migrations";

const currentDir = path.dirname(fileURLToPath(import.meta.url));
const migrationsDir = path.resolve(currentDir, "db/migrations");

const ensureMigrationsTable = (db: Database.Database) => {
  db.exec(`
    CREATE TABLE IF NOT EXISTS ${MIGRATIONS_TABLE} (
      id TEXT PRIMARY KEY,
      checksum TEXT NOT NULL,
      applied_at INTEGER NOT NULL
    );
  `);
};

const migrationIdFromFile = (fileName: string): string => {
  const ext = path.extname(fileName);
  return fileName.replace(ext, "");
};

const computeChecksum = (contents: string): string =>
  createHash("sha256").update(contents).digest("hex");

const findApplied = (db: Database.Database, id: string) =>
  db
    .prepare<[string], { checksum: string }>(`SELECT checksum FROM ${MIGRATIONS_TABLE} WHERE id = ?`)
    .get(id);

const markApplied = (db: Database.Database, id: string, checksum: string) => {
  db
    .prepare(
      `INSERT INTO ${MIGRATIONS_TABLE} (id, checksum, applied_at)
       VALUES (@id, @checksum, @applied_at)
       ON CONFLICT(id) DO UPDATE SET checksum = excluded.checksum, applied_at = excluded.applied_at`
    )
    .run({ id, checksum, applied_at: Date.now() });
};

/**
 * Apply every pending `db/migrations/*.sql` file in lexical order.
 * Each file runs inside a transaction together with its bookkeeping row.
 */
export const runMigrations = (db: Database.Database, logger?: Logger): string[] => {
  ensureMigrationsTable(db);

  const files = fs
    .readdirSync(migrationsDir)
    .filter((file) => file.endsWith(".sql"))
    .sort();

  const applied: string[] = [];

  for (const file of files) {
    const id = migrationIdFromFile(file);
    const sql = fs.readFileSync(path.join(migrationsDir, file), "utf8");
    const checksum = computeChecksum(sql);

    const existing = findApplied(db, id);
    if (existing) {
      if (existing.checksum !== checksum) {
        logger?.warn({ id, existing: existing.checksum, next: checksum }, "migrate.checksum_mismatch");
      }
      continue;
    }

    db.transaction(() => {
      const trimmed = sql.trim();
      if (trimmed) db.exec(trimmed);
      markApplied(db, id, checksum);
    })();

    applied.push(id);
    logger?.info({ id }, "migrate.applied");
  }

  return applied;
};

const invokedDirectly =
  process.argv[1] !== undefined && path.resolve(process.argv[1]) === fileURLToPath(import.meta.url);

if (invokedDirectly) {
  const logger = pino({ name: "migrate" });
  const db = openDatabase();
  try {
    const applied = runMigrations(db, logger);
    logger.info({ count: applied.length }, "Migrations applied.");
  } finally {
    db.close();
  }
}
