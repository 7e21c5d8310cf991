import fs from "node:fs";
import { fileURLToPath } from "node:url";
import path from "node:path";
import type { Db } from "./connection.js";
import type { Logger } from "../logger.js";
import { nowIso } from "../utils/time.js";

type Migration = {
  name: string;
  sql: string;
};

function resolveMigrationsDir(): string {
  const besideModule = fileURLToPath(new URL("./migrations", import.meta.url));
  if (fs.existsSync(besideModule)) return besideModule;
  // dist/db/migrate.js reads the .sql files from the source tree
  return fileURLToPath(new URL("../../src/db/migrations", import.meta.url));
}

export function loadMigrations(dir = resolveMigrationsDir()): Migration[] {
  return fs
    .readdirSync(dir)
    .filter((name) => name.endsWith(".sql"))
    .sort((a, b) => a.localeCompare(b))
    .map((name) => ({ name, sql: fs.readFileSync(path.join(dir, name), "utf8") }));
}

/** Applies pending migrations in name order and returns the names it applied. */
export function runMigrations(db: Db, logger?: Logger, migrations: Migration[] = loadMigrations()): string[] {
  db.exec(
    "CREATE TABLE IF NOT EXISTS schema_migrations (name TEXT PRIMARY KEY, applied_at TEXT NOT NULL)",
  );

  const alreadyApplied = new Set(
    db
      .prepare<[], { name: string }>("SELECT name FROM schema_migrations")
      .all()
      .map((row) => row.name),
  );
  const record = db.prepare<[string, string]>("INSERT INTO schema_migrations(name, applied_at) VALUES (?, ?)");
  const apply = db.transaction((migration: Migration) => {
    db.exec(migration.sql);
    record.run(migration.name, nowIso());
  });

  const pending = migrations.filter((migration) => !alreadyApplied.has(migration.name));
  for (const migration of pending) {
    apply(migration);
    logger?.debug("applied migration", { file: migration.name });
  }
  return pending.map((migration) => migration.name);
}
