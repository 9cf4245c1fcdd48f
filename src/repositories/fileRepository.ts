import type Database from "better-sqlite3";

export interface FileRow {
  path: string;
  hash: string;
  mtimeMs: number;
  size: number;
}

export class FileRepository {
  constructor(private db: Database.Database) {}

  ensureTable() {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS files (
        path TEXT PRIMARY KEY,
        hash TEXT NOT NULL,
        mtime_ms INTEGER NOT NULL,
        size INTEGER NOT NULL,
        updated_at TEXT NOT NULL
      );
    `);
  }

  upsertFile(params: FileRow): FileRow {
    this.db
      .prepare<[string, string, number, number]>(
        `INSERT INTO files (path, hash, mtime_ms, size, updated_at) VALUES (?, ?, ?, ?, datetime('now'))
         ON CONFLICT(path) DO UPDATE SET hash = excluded.hash, mtime_ms = excluded.mtime_ms,
           size = excluded.size, updated_at = excluded.updated_at`
      )
      .run(params.path, params.hash, Math.trunc(params.mtimeMs), params.size);
    return { ...params };
  }

  getFileByPath(filePath: string): FileRow | null {
    const row = this.db
      .prepare<[string], FileRow>("SELECT path, hash, mtime_ms as mtimeMs, size FROM files WHERE path = ?")
      .get(filePath);
    return row ?? null;
  }

  listPaths(): string[] {
    return this.db
      .prepare<[], { path: string }>("SELECT path FROM files ORDER BY path")
      .all()
      .map((row) => row.path);
  }

  deleteFile(filePath: string) {
    this.db.prepare<[string]>("DELETE FROM files WHERE path = ?").run(filePath);
  }

  deleteAll() {
    this.db.exec("DELETE FROM files");
  }
}
