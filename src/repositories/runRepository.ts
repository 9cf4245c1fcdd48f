import type Database from "better-sqlite3";

import type { Classification, Finding, TriageReport } from "../types.js";

export type ClassificationCounts = Record<Classification, number>;

export type RunSummary = {
  id: string;
  startedAt: string;
  findingsPath: string;
  total: number;
  processed: number;
  cancelled: boolean;
  durationMs: number;
  counts: ClassificationCounts;
};

export type StoredVerdict = {
  findingId: string;
  ruleId: string;
  file: string;
  startLine: number;
  score: number;
  classification: Classification;
  flags: string[];
};

type RunRow = {
  id: string;
  startedAt: string;
  findingsPath: string;
  total: number;
  processed: number;
  cancelled: number;
  durationMs: number;
};

type VerdictRow = {
  findingId: string;
  ruleId: string;
  file: string;
  startLine: number;
  score: number;
  classification: string;
  flags: string;
};

export function emptyCounts(): ClassificationCounts {
  return {
    "likely-true-positive": 0,
    "needs-manual-review": 0,
    "likely-false-positive": 0
  };
}

function isClassification(value: string): value is Classification {
  return value === "likely-true-positive" || value === "needs-manual-review" || value === "likely-false-positive";
}

function toClassification(value: string): Classification | null {
  return isClassification(value) ? value : null;
}

function parseStringList(raw: string): string[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return [];
  }
  return Array.isArray(parsed) ? parsed.filter((item): item is string => typeof item === "string") : [];
}

const SELECT_RUNS = `SELECT id, started_at as startedAt, findings_path as findingsPath, total, processed, cancelled,
  duration_ms as durationMs FROM runs`;

export class RunRepository {
  constructor(private db: Database.Database) {}

  ensureTable() {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS runs (
        id TEXT PRIMARY KEY,
        started_at TEXT NOT NULL,
        findings_path TEXT NOT NULL,
        total INTEGER NOT NULL,
        processed INTEGER NOT NULL,
        cancelled INTEGER NOT NULL,
        duration_ms INTEGER NOT NULL
      );
      CREATE TABLE IF NOT EXISTS verdicts (
        run_id TEXT NOT NULL REFERENCES runs(id) ON DELETE CASCADE,
        position INTEGER NOT NULL,
        finding_id TEXT NOT NULL,
        rule_id TEXT NOT NULL,
        file TEXT NOT NULL,
        start_line INTEGER NOT NULL,
        score REAL NOT NULL,
        classification TEXT NOT NULL,
        flags TEXT NOT NULL,
        contributions TEXT NOT NULL,
        PRIMARY KEY (run_id, finding_id)
      );
    `);
  }

  recordRun(report: TriageReport, params: { startedAt: string; findingsPath: string }) {
    const findingsById = new Map<string, Finding>(report.findings.map((finding) => [finding.id, finding]));
    const insertRun = this.db.prepare<[string, string, string, number, number, number, number]>(
      "INSERT INTO runs (id, started_at, findings_path, total, processed, cancelled, duration_ms) VALUES (?, ?, ?, ?, ?, ?, ?)"
    );
    const insertVerdict = this.db.prepare<[string, number, string, string, string, number, number, string, string, string]>(
      `INSERT INTO verdicts (run_id, position, finding_id, rule_id, file, start_line, score, classification, flags, contributions)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
    );

    const tx = this.db.transaction(() => {
      insertRun.run(
        report.runId,
        params.startedAt,
        params.findingsPath,
        report.total,
        report.processed,
        report.cancelled ? 1 : 0,
        Math.round(report.durationMs)
      );
      report.verdicts.forEach((verdict, position) => {
        const finding = findingsById.get(verdict.findingId);
        insertVerdict.run(
          report.runId,
          position,
          verdict.findingId,
          finding?.ruleId ?? "",
          finding?.location.file ?? "",
          finding?.location.startLine ?? 0,
          verdict.score.value,
          verdict.classification,
          JSON.stringify(verdict.score.flags),
          JSON.stringify(verdict.score.contributions)
        );
      });
    });
    tx();
  }

  // Oldest first.
  listRuns(limit?: number): RunSummary[] {
    const rows = this.db.prepare<[], RunRow>(`${SELECT_RUNS} ORDER BY started_at, rowid`).all();
    const selected = limit !== undefined && limit > 0 ? rows.slice(-limit) : rows;
    return selected.map((row) => this.toSummary(row));
  }

  getRun(runId: string): RunSummary | null {
    const row = this.db.prepare<[string], RunRow>(`${SELECT_RUNS} WHERE id = ?`).get(runId);
    return row ? this.toSummary(row) : null;
  }

  private toSummary(row: RunRow): RunSummary {
    const counts = emptyCounts();
    const grouped = this.db
      .prepare<[string], { classification: string; count: number }>(
        "SELECT classification, COUNT(*) as count FROM verdicts WHERE run_id = ? GROUP BY classification"
      )
      .all(row.id);
    for (const entry of grouped) {
      const classification = toClassification(entry.classification);
      if (classification) counts[classification] = entry.count;
    }
    return {
      id: row.id,
      startedAt: row.startedAt,
      findingsPath: row.findingsPath,
      total: row.total,
      processed: row.processed,
      cancelled: row.cancelled === 1,
      durationMs: row.durationMs,
      counts
    };
  }

  // Ranked order, as the run reported them.
  getVerdicts(runId: string): StoredVerdict[] {
    return this.db
      .prepare<[string], VerdictRow>(
        `SELECT finding_id as findingId, rule_id as ruleId, file, start_line as startLine, score, classification, flags
         FROM verdicts WHERE run_id = ? ORDER BY position`
      )
      .all(runId)
      .flatMap((row) => {
        const classification = toClassification(row.classification);
        if (!classification) return [];
        return [
          {
            findingId: row.findingId,
            ruleId: row.ruleId,
            file: row.file,
            startLine: row.startLine,
            score: row.score,
            classification,
            flags: parseStringList(row.flags)
          }
        ];
      });
  }
}
