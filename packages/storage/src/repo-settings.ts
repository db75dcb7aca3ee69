import type Database from "better-sqlite3";

interface SettingRow {
  key: string;
  value: string;
}

/** String key/value settings. Callers own the encoding of non-string values. */
export class SettingsRepository {
  constructor(private db: Database.Database) {}

  get(key: string): string | undefined {
    const row = this.db
      .prepare("SELECT key, value FROM settings WHERE key = ?")
      .get(key) as SettingRow | undefined;
    return row?.value;
  }

  set(key: string, value: string): void {
    this.db
      .prepare(
        "INSERT INTO settings (key, value, updated_at) VALUES (?, ?, ?) ON CONFLICT(key) DO UPDATE SET value = excluded.value, updated_at = excluded.updated_at",
      )
      .run(key, value, new Date().toISOString());
  }

  /** Read every setting whose key starts with `prefix`, keyed without the prefix. */
  getByPrefix(prefix: string): Record<string, string> {
    const rows = this.db
      .prepare("SELECT key, value FROM settings WHERE substr(key, 1, ?) = ? ORDER BY key ASC")
      .all(prefix.length, prefix) as SettingRow[];

    const result: Record<string, string> = {};
    for (const row of rows) {
      result[row.key.slice(prefix.length)] = row.value;
    }
    return result;
  }

  /** Write several settings in one transaction; readers see all or none of them. */
  setMany(entries: Record<string, string>): void {
    this.db.transaction((pairs: Array<[string, string]>) => {
      for (const [key, value] of pairs) {
        this.set(key, value);
      }
    })(Object.entries(entries));
  }
}
