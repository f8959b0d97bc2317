import { drizzle, type BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import Database from "better-sqlite3";
import * as schema from "./schema";

export type AppDatabase = BetterSQLite3Database<typeof schema>;

/**
 * Open the settings database, creating the config table on first use so the
 * CLI works without running drizzle-kit.
 */
export function openDatabase(fileName: string): AppDatabase {
  const sqlite = new Database(fileName);
  sqlite.exec(`
    CREATE TABLE IF NOT EXISTS config (
      key TEXT PRIMARY KEY,
      value TEXT NOT NULL
    );
  `);
  return drizzle({ client: sqlite, schema });
}
