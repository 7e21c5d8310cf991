import Database from "better-sqlite3";
import path from "node:path";
import fs from "node:fs";

export type Db = Database.Database;

export function openDatabase(filePath: string): Db {
  if (filePath !== ":memory:") {
    const dataDir = path.dirname(path.resolve(filePath));
    if (!fs.existsSync(dataDir)) {
      fs.mkdirSync(dataDir, { recursive: true });
    }
  }

  const db = new Database(filePath);
  db.pragma("foreign_keys = ON");
  if (filePath !== ":memory:") {
    db.pragma("journal_mode = WAL");
  }

  db.exec("PRAGMA busy_timeout = 5000");
  return db;
}
