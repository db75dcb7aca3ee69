import type Database from "better-sqlite3";
import { openDatabase, closeDatabase } from "./database.js";
import { SettingsRepository } from "./repo-settings.js";

export interface Storage {
  db: Database.Database;
  settings: SettingsRepository;
  close(): void;
}

export function createStorage(dbPath?: string): Storage {
  const db = openDatabase(dbPath);

  return {
    db,
    settings: new SettingsRepository(db),
    close() {
      closeDatabase(db);
    },
  };
}

export { openDatabase, closeDatabase, runMigrations, DEFAULT_DB_PATH } from "./database.js";
export { SettingsRepository } from "./repo-settings.js";
export type { Migration } from "./migrations.js";
