import type Database from "better-sqlite3";

type MetaRow = { value: string };

export class MetaRepository {
  constructor(private db: Database.Database) {}

  ensureTable() {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS meta (
        key TEXT PRIMARY KEY,
        value TEXT NOT NULL
      );
    `);
  }

  set(key: string, value: string) {
    this.db
      .prepare<[string, string]>(
        "INSERT INTO meta (key, value) VALUES (?, ?) ON CONFLICT(key) DO UPDATE SET value = excluded.value"
      )
      .run(key, value);
  }

  get(key: string): string | null {
    const row = this.db.prepare<[string], MetaRow>("SELECT value FROM meta WHERE key = ?").get(key);
    return row?.value ?? null;
  }
}
