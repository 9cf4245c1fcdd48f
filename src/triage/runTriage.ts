import path from "node:path";
import { randomUUID } from "node:crypto";

import type { Disposition, TriageBatchResult, TriageReport } from "../types.js";
import { loadConfig, type TriageConfig } from "../config/loadConfig.js";
import { IndexUnavailableError } from "../errors/similarity.errors.js";
import { StorageUnknownRunError } from "../errors/storage.errors.js";
import { PatternAnalyzer } from "../analysis/patternAnalyzer.js";
import { ContextExtractor } from "../context/contextExtractor.js";
import { ingestFile } from "../ingest/sarifIngestor.js";
import { IndexMaintainer, loadIndexFromStore, type RefreshSummary } from "../indexing/indexMaintainer.js";
import { noopLogger, withMeta, type Logger } from "../logging/logger.js";
import type { FragmentRecord } from "../repositories/fragmentRepository.js";
import type { RunSummary, StoredVerdict } from "../repositories/runRepository.js";
import { ConfidenceScorer } from "../scoring/confidenceScorer.js";
import { createEmbedder, type Embedder } from "../services/embeddings/embedding.js";
import type { SimilarityIndex } from "../similarity/similarityIndex.js";
import { TriageDb } from "../storage/db.js";
import type { TriageProgressHandler } from "./progress.js";
import { TriageEngine } from "./triageEngine.js";

export type WorkspaceOptions = {
  projectRoot: string;
  configPath?: string;
  overrides?: Partial<TriageConfig>;
  // A loaded config wins over projectRoot/configPath/overrides.
  config?: TriageConfig;
  // Undefined means "build one from config"; null disables similarity.
  embedder?: Embedder | null;
  logger?: Logger;
};

export type RunTriageOptions = WorkspaceOptions & {
  findingsPath: string;
  refreshIndex?: boolean;
  signal?: AbortSignal;
  onProgress?: TriageProgressHandler;
};

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

async function resolveConfig(options: WorkspaceOptions): Promise<TriageConfig> {
  return (
    options.config ??
    (await loadConfig({ projectRoot: options.projectRoot, configPath: options.configPath, overrides: options.overrides }))
  );
}

function resolveEmbedder(options: WorkspaceOptions, config: TriageConfig): Embedder | null {
  return options.embedder === undefined ? createEmbedder(config.embeddings) : options.embedder;
}

function openDb(config: TriageConfig, embedder: Embedder | null, logger: Logger): TriageDb {
  return new TriageDb({
    stateDir: config.stateDir,
    dimensions: embedder?.dimensions ?? config.embeddings.dimensions,
    logger
  });
}

function createMaintainer(
  config: TriageConfig,
  db: TriageDb,
  index: SimilarityIndex,
  embedder: Embedder,
  logger: Logger,
  onProgress?: TriageProgressHandler
): IndexMaintainer {
  return new IndexMaintainer({
    db,
    index,
    embedder,
    patternLists: config.patterns,
    sourceRoot: config.sourceRoot,
    includeExtensions: config.indexing.includeExtensions,
    exclude: config.indexing.exclude,
    maxFileSizeBytes: config.indexing.maxFileSizeBytes,
    // A fallback window spans what a finding's context window spans.
    windowSize: config.context.windowLines * 2 + 1,
    logger,
    onProgress
  });
}

function loadIndex(config: TriageConfig, db: TriageDb, logger: Logger): SimilarityIndex | null {
  try {
    return loadIndexFromStore(db);
  } catch (err) {
    const reason = errorMessage(err);
    if (config.similarity.onUnavailable === "fail") throw new IndexUnavailableError(reason);
    logger.warn("Similarity index could not be loaded", { signal: "similarity-unavailable", reason });
    return null;
  }
}

/**
 * Ingests a findings document and triages it against the stored index.
 * A malformed document fails before anything is opened or recorded.
 */
export async function runTriage(options: RunTriageOptions): Promise<TriageReport> {
  const config = await resolveConfig(options);
  const startedAt = new Date();
  const runId = randomUUID();
  const logger = withMeta(options.logger ?? noopLogger, { runId });
  const findingsPath = path.resolve(options.projectRoot, options.findingsPath);

  options.onProgress?.({ phase: "ingest", current: 0, total: 1, message: findingsPath });
  const findings = await ingestFile(findingsPath);
  options.onProgress?.({ phase: "ingest", current: 1, total: 1, message: `${findings.length} findings` });
  logger.info("Findings ingested", { findings: findings.length, path: findingsPath });

  const embedder = resolveEmbedder(options, config);
  const db = openDb(config, embedder, logger);
  try {
    const index = embedder ? loadIndex(config, db, logger) : null;
    const background =
      options.refreshIndex && embedder && index
        ? createMaintainer(config, db, index, embedder, logger, options.onProgress).startBackgroundRefresh({
            signal: options.signal
          })
        : null;

    const cacheEnabled = config.cache.invalidation === "content-hash";
    const engine = new TriageEngine({
      extractor: new ContextExtractor({
        sourceRoot: config.sourceRoot,
        windowLines: config.context.windowLines,
        maxFileSizeBytes: config.context.maxFileSizeBytes,
        cache: cacheEnabled
      }),
      analyzer: new PatternAnalyzer({ patternLists: config.patterns, cache: cacheEnabled, logger }),
      scorer: new ConfidenceScorer({
        baseline: config.scoring.baseline,
        severityOffsets: config.scoring.severityOffsets,
        weights: config.scoring.weights,
        similarityFloor: config.similarity.floor
      }),
      thresholds: config.classification,
      index,
      embedder,
      concurrency: config.concurrency,
      topK: config.similarity.topK,
      onIndexUnavailable: config.similarity.onUnavailable,
      logger,
      onProgress: options.onProgress
    });

    let batch: TriageBatchResult;
    try {
      batch = await engine.triageBatch(findings, { signal: options.signal });
    } finally {
      if (background) {
        background.stop();
        await background.done;
      }
    }

    const report: TriageReport = {
      ...batch,
      runId,
      findings,
      durationMs: Date.now() - startedAt.getTime()
    };
    db.runs.recordRun(report, { startedAt: startedAt.toISOString(), findingsPath });
    logger.info("Triage run recorded", { processed: report.processed, cancelled: report.cancelled });
    return report;
  } finally {
    db.close();
  }
}

/**
 * Brings the stored fragment index up to date with the source tree.
 */
export async function runIndexRefresh(
  options: WorkspaceOptions & { signal?: AbortSignal; onProgress?: TriageProgressHandler }
): Promise<RefreshSummary> {
  const logger = options.logger ?? noopLogger;
  const config = await resolveConfig(options);
  const embedder = resolveEmbedder(options, config);
  if (!embedder) {
    throw new IndexUnavailableError("embeddings are disabled; set TRIAGE_API_KEY or configure embeddings.provider");
  }
  const db = openDb(config, embedder, logger);
  try {
    const index = loadIndexFromStore(db);
    return await createMaintainer(config, db, index, embedder, logger, options.onProgress).refresh({
      signal: options.signal
    });
  } finally {
    db.close();
  }
}

/**
 * Attaches a disposition to a stored fragment. The next load of the index
 * picks it up with the vector it was embedded with.
 */
export async function labelFragment(
  options: WorkspaceOptions & { fragmentId: string; disposition: Disposition }
): Promise<FragmentRecord> {
  const logger = options.logger ?? noopLogger;
  const config = await resolveConfig(options);
  const db = openDb(config, resolveEmbedder(options, config), logger);
  try {
    const record = db.fragments.setDisposition(options.fragmentId, options.disposition);
    logger.info("Fragment labeled", { fragmentId: record.id, disposition: record.disposition });
    return record;
  } finally {
    db.close();
  }
}

export async function loadTrend(options: WorkspaceOptions & { limit?: number }): Promise<RunSummary[]> {
  const logger = options.logger ?? noopLogger;
  const config = await resolveConfig(options);
  const db = openDb(config, resolveEmbedder(options, config), logger);
  try {
    return db.runs.listRuns(options.limit);
  } finally {
    db.close();
  }
}

export type RunVerdicts = {
  run: RunSummary;
  verdicts: StoredVerdict[];
};

/**
 * Reads back one recorded run with its verdicts in ranked order.
 */
export async function loadRunVerdicts(options: WorkspaceOptions & { runId: string }): Promise<RunVerdicts> {
  const logger = options.logger ?? noopLogger;
  const config = await resolveConfig(options);
  const db = openDb(config, resolveEmbedder(options, config), logger);
  try {
    const run = db.runs.getRun(options.runId);
    if (!run) throw new StorageUnknownRunError(options.runId);
    return { run, verdicts: db.runs.getVerdicts(run.id) };
  } finally {
    db.close();
  }
}
