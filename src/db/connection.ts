import Database from "better-sqlite3";
import fs from "node:fs";
import path from "node:path";
import { runtimeConfig } from "../config";

const ensureDir = (filePath: string) => {
  const dir = path.dirname(filePath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
};

export const openDatabase = (sqlitePath: string = runtimeConfig.sqlitePath) => {
  if (sqlitePath === ":memory:") {
    const memory = new Database(":memory:");
    memory.pragma("foreign_keys = ON");
    return memory;
  }

  const absolutePath = path.resolve(process.cwd(), sqlitePath);
  ensureDir(absolutePath);
  const db = new Database(absolutePath);
  db.pragma("journal_mode = WAL");
  // Concurrent webhook invocations share the file; wait instead of failing fast.
  db.pragma("busy_timeout = 5000");
  db.pragma("synchronous = NORMAL");
  db.pragma("foreign_keys = ON");

  return db;
};
