import path from "node:path";
import { mkdirSync } from "node:fs";
import Database from "better-sqlite3";

import { noopLogger, type Logger } from "../logging/logger.js";
import { FileRepository } from "../repositories/fileRepository.js";
import { FragmentRepository } from "../repositories/fragmentRepository.js";
import { MetaRepository } from "../repositories/metaRepository.js";
import { RunRepository } from "../repositories/runRepository.js";

const CURRENT_SCHEMA_VERSION = 2;

export interface DbOptions {
  stateDir: string;
  dimensions: number;
  // Defaults to `<stateDir>/triage.db`; ":memory:" is accepted.
  fileName?: string;
  logger?: Logger;
}

/**
 * SQLite store for indexed fragments, file hashes and triage run history.
 * Embeddings are dropped when the configured dimension changes.
 */
export class TriageDb {
  readonly files: FileRepository;
  readonly fragments: FragmentRepository;
  readonly runs: RunRepository;
  readonly meta: MetaRepository;
  private readonly db: Database.Database;
  private readonly logger: Logger;
  private embeddingReset = false;

  constructor(private readonly options: DbOptions) {
    this.logger = options.logger ?? noopLogger;
    const fileName = options.fileName ?? "triage.db";
    if (fileName === ":memory:") {
      this.db = new Database(":memory:");
    } else {
      mkdirSync(options.stateDir, { recursive: true });
      this.db = new Database(path.join(options.stateDir, fileName));
      this.db.pragma("journal_mode = WAL");
    }
    this.db.pragma("foreign_keys = ON");

    this.meta = new MetaRepository(this.db);
    this.files = new FileRepository(this.db);
    this.fragments = new FragmentRepository(this.db);
    this.runs = new RunRepository(this.db);
    this.init();
  }

  private init() {
    this.meta.ensureTable();
    this.files.ensureTable();
    this.fragments.ensureTable();
    this.runs.ensureTable();
    this.runMigrations();

    const existingDims = this.meta.get("embedding_dimensions");
    if (existingDims && Number(existingDims) !== this.options.dimensions) {
      this.logger.warn("Embedding dimensions changed; dropping stored fragments", {
        previous: Number(existingDims),
        current: this.options.dimensions
      });
      this.transaction(() => {
        this.fragments.deleteAll();
        this.files.deleteAll();
      });
      this.embeddingReset = true;
    }
    this.meta.set("embedding_dimensions", String(this.options.dimensions));
  }

  private runMigrations() {
    const rawVersion = this.meta.get("schema_version");
    const parsed = rawVersion ? Number(rawVersion) : 0;
    const version = Number.isFinite(parsed) ? parsed : 0;
    if (version > CURRENT_SCHEMA_VERSION) {
      this.logger.warn("Store was written by a newer schema version", { version, supported: CURRENT_SCHEMA_VERSION });
      return;
    }
    if (version < 2) this.fragments.backfillOccurrences();
    if (version !== CURRENT_SCHEMA_VERSION) {
      this.meta.set("schema_version", String(CURRENT_SCHEMA_VERSION));
    }
  }

  get dimensions(): number {
    return this.options.dimensions;
  }

  didResetEmbeddings(): boolean {
    return this.embeddingReset;
  }

  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  close() {
    this.db.close();
  }
}
