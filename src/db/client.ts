import Database from "better-sqlite3";
import { drizzle, type BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import { mkdirSync } from "fs";
import { dirname } from "path";
import { env } from "../core/config";
import { logger } from "../core/logger";

export type AppDatabase = BetterSQLite3Database;

export interface DatabaseHandle {
  db: AppDatabase;
  sqlite: Database.Database;
}

export function createDb(path: string): DatabaseHandle {
  if (path !== ":memory:") {
    mkdirSync(dirname(path), { recursive: true });
  }
  const sqlite = new Database(path);
  sqlite.pragma("journal_mode = WAL");
  return { db: drizzle(sqlite), sqlite };
}

let handle: DatabaseHandle | null = null;

function getHandle(): DatabaseHandle {
  if (!handle) {
    handle = createDb(env.DATABASE_PATH);
    logger.info({ path: env.DATABASE_PATH }, "Database connected");
  }
  return handle;
}

export function getDb(): AppDatabase {
  return getHandle().db;
}

export function getSqlite(): Database.Database {
  return getHandle().sqlite;
}

export function closeDb() {
  if (handle) {
    handle.sqlite.close();
    handle = null;
    logger.info("Database connection closed");
  }
}
