import { mkdirSync } from "node:fs";
import { dirname, resolve } from "node:path";
import Database from "better-sqlite3";
import { drizzle, type BetterSQLite3Database } from "drizzle-orm/better-sqlite3";

export const IN_MEMORY_DATABASE = ":memory:";

export type DatabaseHandle = {
  db: BetterSQLite3Database;
  sqlite: Database.Database;
  path: string;
};

export const openDatabase = (path: string): DatabaseHandle => {
  const resolvedPath =
    path === IN_MEMORY_DATABASE ? path : resolve(process.cwd(), path);
  if (resolvedPath !== IN_MEMORY_DATABASE) {
    mkdirSync(dirname(resolvedPath), { recursive: true });
  }

  const sqlite = new Database(resolvedPath);
  sqlite.pragma("journal_mode = WAL");
  sqlite.pragma("busy_timeout = 5000");

  return {
    db: drizzle(sqlite),
    sqlite,
    path: resolvedPath,
  };
};
