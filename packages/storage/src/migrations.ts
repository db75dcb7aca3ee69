export interface Migration {
  id: number;
  name: string;
  sql: string;
}

export const migrations: Migration[] = [
  {
    id: 1,
    name: "settings_table",
    sql: `
      CREATE TABLE IF NOT EXISTS settings (
        key TEXT PRIMARY KEY,
        value TEXT NOT NULL
      );
    `,
  },
  {
    id: 2,
    name: "settings_updated_at",
    sql: `
      ALTER TABLE settings ADD COLUMN updated_at TEXT DEFAULT NULL;
    `,
  },
];
