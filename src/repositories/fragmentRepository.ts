import type Database from "better-sqlite3";

import type { Disposition, FragmentLocation, LanguageId, PatternTag } from "../types.js";
import { StorageFragmentWriteError, StorageUnknownFragmentError } from "../errors/storage.errors.js";
import { blobToVector, vectorToBlob } from "../similarity/vectorMath.js";

export type FragmentRecord = {
  id: string;
  seq: number;
  location: FragmentLocation;
  language: LanguageId;
  disposition: Disposition;
  patterns: PatternTag[];
  vector: Float32Array;
};

export type FragmentInsert = Omit<FragmentRecord, "seq">;

export type FragmentOccurrence = {
  id: string;
  location: FragmentLocation;
};

type FragmentRow = {
  id: string;
  seq: number;
  file: string;
  startLine: number;
  endLine: number;
  language: string;
  disposition: string;
  patterns: string;
  embedding: Buffer;
};

const DISPOSITIONS: readonly Disposition[] = ["confirmed-vulnerable", "confirmed-safe", "unlabeled"];
const PATTERN_TAGS: readonly PatternTag[] = ["validation", "sanitizer", "framework-guard", "unsafe-call", "none"];

export function isDisposition(value: unknown): value is Disposition {
  return DISPOSITIONS.some((entry) => entry === value);
}

function isPatternTag(value: unknown): value is PatternTag {
  return PATTERN_TAGS.some((entry) => entry === value);
}

function parsePatterns(raw: string): PatternTag[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return [];
  }
  return Array.isArray(parsed) ? parsed.filter(isPatternTag) : [];
}

const LANGUAGES: readonly LanguageId[] = [
  "typescript",
  "javascript",
  "python",
  "java",
  "go",
  "ruby",
  "csharp",
  "cpp",
  "php",
  "unknown"
];

function toLanguage(value: string): LanguageId {
  return LANGUAGES.find((entry) => entry === value) ?? "unknown";
}

const SELECT_COLUMNS =
  "id, seq, file, start_line as startLine, end_line as endLine, language, disposition, patterns, embedding";

export class FragmentRepository {
  constructor(private db: Database.Database) {}

  ensureTable() {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS fragments (
        id TEXT PRIMARY KEY,
        seq INTEGER UNIQUE NOT NULL,
        file TEXT NOT NULL,
        start_line INTEGER NOT NULL,
        end_line INTEGER NOT NULL,
        language TEXT NOT NULL,
        disposition TEXT NOT NULL DEFAULT 'unlabeled',
        patterns TEXT NOT NULL DEFAULT '[]',
        embedding BLOB NOT NULL,
        updated_at TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS fragments_file ON fragments(file);
      CREATE TABLE IF NOT EXISTS fragment_occurrences (
        fragment_id TEXT NOT NULL REFERENCES fragments(id) ON DELETE CASCADE,
        file TEXT NOT NULL,
        start_line INTEGER NOT NULL,
        end_line INTEGER NOT NULL,
        PRIMARY KEY (fragment_id, file, start_line)
      );
      CREATE INDEX IF NOT EXISTS fragment_occurrences_file ON fragment_occurrences(file);
    `);
  }

  // Stores written before occurrences were tracked know only the recorded location.
  backfillOccurrences() {
    this.db.exec(`
      INSERT OR IGNORE INTO fragment_occurrences (fragment_id, file, start_line, end_line)
      SELECT id, file, start_line, end_line FROM fragments
    `);
  }

  private toRecord(row: FragmentRow): FragmentRecord {
    return {
      id: row.id,
      seq: row.seq,
      location: { file: row.file, startLine: row.startLine, endLine: row.endLine },
      language: toLanguage(row.language),
      disposition: isDisposition(row.disposition) ? row.disposition : "unlabeled",
      patterns: parsePatterns(row.patterns),
      vector: blobToVector(row.id, row.embedding)
    };
  }

  // Ordered by insertion sequence so a rebuilt index keeps its tie-break order.
  listAll(): FragmentRecord[] {
    return this.db
      .prepare<[], FragmentRow>(`SELECT ${SELECT_COLUMNS} FROM fragments ORDER BY seq`)
      .all()
      .map((row) => this.toRecord(row));
  }

  get(id: string): FragmentRecord | null {
    const row = this.db.prepare<[string], FragmentRow>(`SELECT ${SELECT_COLUMNS} FROM fragments WHERE id = ?`).get(id);
    return row ? this.toRecord(row) : null;
  }

  existingIds(ids: readonly string[]): Set<string> {
    const found = new Set<string>();
    const lookup = this.db.prepare<[string], { id: string }>("SELECT id FROM fragments WHERE id = ?");
    for (const id of ids) {
      if (lookup.get(id)) found.add(id);
    }
    return found;
  }

  listIdsForFile(file: string): string[] {
    return this.db
      .prepare<[string], { id: string }>("SELECT id FROM fragments WHERE file = ? ORDER BY seq")
      .all(file)
      .map((row) => row.id);
  }

  /**
   * Every place a fragment's text appears. The fragment row keeps one of
   * them as its reported location.
   */
  occurrencesOf(id: string): FragmentLocation[] {
    return this.db
      .prepare<[string], FragmentLocation>(
        `SELECT file, start_line as startLine, end_line as endLine FROM fragment_occurrences
         WHERE fragment_id = ? ORDER BY file, start_line`
      )
      .all(id);
  }

  idsOccurringIn(file: string): string[] {
    return this.db
      .prepare<[string], { id: string }>(
        "SELECT DISTINCT fragment_id as id FROM fragment_occurrences WHERE file = ? ORDER BY fragment_id"
      )
      .all(file)
      .map((row) => row.id);
  }

  replaceOccurrences(file: string, occurrences: readonly FragmentOccurrence[]) {
    const clear = this.db.prepare<[string]>("DELETE FROM fragment_occurrences WHERE file = ?");
    const insert = this.db.prepare<[string, string, number, number]>(
      "INSERT OR IGNORE INTO fragment_occurrences (fragment_id, file, start_line, end_line) VALUES (?, ?, ?, ?)"
    );
    const tx = this.db.transaction(() => {
      clear.run(file);
      for (const { id, location } of occurrences) {
        insert.run(id, file, location.startLine, location.endLine);
      }
    });
    tx();
  }

  /**
   * Inserts new fragments after the current highest sequence. A fragment id
   * that already exists keeps its sequence and disposition; only its
   * location, patterns and vector are replaced.
   */
  upsert(fragments: readonly FragmentInsert[]): FragmentRecord[] {
    const nextSeq = this.db.prepare<[], { seq: number | null }>("SELECT MAX(seq) as seq FROM fragments");
    const insert = this.db.prepare<[string, number, string, number, number, string, string, string, Buffer]>(
      `INSERT INTO fragments (id, seq, file, start_line, end_line, language, disposition, patterns, embedding, updated_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, datetime('now'))
       ON CONFLICT(id) DO UPDATE SET file = excluded.file, start_line = excluded.start_line,
         end_line = excluded.end_line, language = excluded.language, patterns = excluded.patterns,
         embedding = excluded.embedding, updated_at = excluded.updated_at`
    );

    const written: FragmentRecord[] = [];
    const tx = this.db.transaction(() => {
      for (const fragment of fragments) {
        const seq = (nextSeq.get()?.seq ?? 0) + 1;
        try {
          insert.run(
            fragment.id,
            seq,
            fragment.location.file,
            fragment.location.startLine,
            fragment.location.endLine,
            fragment.language,
            fragment.disposition,
            JSON.stringify(fragment.patterns),
            vectorToBlob(fragment.vector)
          );
        } catch (err) {
          const message = err instanceof Error ? err.message : String(err);
          throw new StorageFragmentWriteError(`Fragment insert failed (id=${fragment.id}): ${message}`);
        }
        const stored = this.get(fragment.id);
        if (stored) written.push(stored);
      }
    });
    tx();
    return written;
  }

  updateLocation(id: string, location: FragmentLocation): boolean {
    const result = this.db
      .prepare<[string, number, number, string]>(
        "UPDATE fragments SET file = ?, start_line = ?, end_line = ?, updated_at = datetime('now') WHERE id = ?"
      )
      .run(location.file, location.startLine, location.endLine, id);
    return result.changes > 0;
  }

  setDisposition(id: string, disposition: Disposition): FragmentRecord {
    const result = this.db
      .prepare<[string, string]>("UPDATE fragments SET disposition = ?, updated_at = datetime('now') WHERE id = ?")
      .run(disposition, id);
    const record = result.changes > 0 ? this.get(id) : null;
    if (!record) throw new StorageUnknownFragmentError(id);
    return record;
  }

  delete(ids: readonly string[]): number {
    const remove = this.db.prepare<[string]>("DELETE FROM fragments WHERE id = ?");
    let removed = 0;
    const tx = this.db.transaction(() => {
      for (const id of ids) removed += remove.run(id).changes;
    });
    tx();
    return removed;
  }

  deleteAll() {
    this.db.exec("DELETE FROM fragment_occurrences; DELETE FROM fragments");
  }

  count(): number {
    return this.db.prepare<[], { count: number }>("SELECT COUNT(*) as count FROM fragments").get()?.count ?? 0;
  }
}
