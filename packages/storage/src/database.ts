import Database from "better-sqlite3";
import { dirname, join } from "node:path";
import { homedir } from "node:os";
import { mkdirSync } from "node:fs";
import { createLogger } from "@statbeacon/logger";
import { migrations, type Migration } from "./migrations.js";

const logger = createLogger("storage");

export const DEFAULT_DB_DIR = join(homedir(), ".statbeacon");
export const DEFAULT_DB_PATH = join(DEFAULT_DB_DIR, "state.sqlite");

/**
 * Apply the migrations not yet recorded in `_migrations`, all in one
 * transaction, in ascending id order.
 * @returns ids of the migrations applied by this call
 */
export function runMigrations(
  db: Database.Database,
  pending: readonly Migration[] = migrations,
): number[] {
  db.exec(
    "CREATE TABLE IF NOT EXISTS _migrations (id INTEGER PRIMARY KEY, name TEXT NOT NULL, applied_at TEXT NOT NULL)",
  );

  const isApplied = db.prepare("SELECT 1 FROM _migrations WHERE id = ?");
  const record = db.prepare("INSERT INTO _migrations (id, name, applied_at) VALUES (?, ?, ?)");
  const todo = [...pending]
    .sort((a, b) => a.id - b.id)
    .filter((migration) => isApplied.get(migration.id) === undefined);

  if (todo.length === 0) {
    return [];
  }

  db.transaction(() => {
    for (const migration of todo) {
      db.exec(migration.sql);
      record.run(migration.id, migration.name, new Date().toISOString());
    }
  })();

  logger.info(`Schema migrated to ${todo[todo.length - 1].id} (${todo.map((m) => m.name).join(", ")})`);
  return todo.map((migration) => migration.id);
}

export function openDatabase(dbPath?: string): Database.Database {
  const resolvedPath = dbPath ?? DEFAULT_DB_PATH;

  if (resolvedPath !== ":memory:") {
    mkdirSync(dirname(resolvedPath), { recursive: true });
  }

  logger.debug(`Opening database at ${resolvedPath}`);

  const db = new Database(resolvedPath);

  // WAL lets a reader see the last committed settings while a save is in progress
  db.pragma("journal_mode = WAL");

  runMigrations(db);

  return db;
}

export function closeDatabase(db: Database.Database): void {
  logger.debug("Closing database");
  db.close();
}
