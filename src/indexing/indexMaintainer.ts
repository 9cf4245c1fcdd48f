import { readFile } from "node:fs/promises";

import type { Disposition, EmbeddingVector } from "../types.js";
import { VectorDimensionMismatchError } from "../errors/similarity.errors.js";
import type { PatternListsByFamily } from "../config/patternLists.js";
import { hashContent } from "../context/contextExtractor.js";
import { languageForPath } from "../context/languages.js";
import { discoverFiles, type DiscoveredFile } from "../fs/discover.js";
import { noopLogger, type Logger } from "../logging/logger.js";
import type { FragmentInsert, FragmentRecord } from "../repositories/fragmentRepository.js";
import type { Embedder } from "../services/embeddings/embedding.js";
import { SimilarityIndex, type IndexEntryInput, type IndexMutation } from "../similarity/similarityIndex.js";
import type { TriageDb } from "../storage/db.js";
import type { TriageProgressHandler } from "../triage/progress.js";
import { extractFragments, fragmentPatternTags } from "./fragmentExtractor.js";

export type IndexMaintainerOptions = {
  db: TriageDb;
  index: SimilarityIndex;
  embedder: Embedder;
  patternLists: PatternListsByFamily;
  sourceRoot: string;
  includeExtensions: string[];
  exclude: string[];
  maxFileSizeBytes: number;
  windowSize: number;
  logger?: Logger;
  onProgress?: TriageProgressHandler;
};

export type RefreshSummary = {
  filesScanned: number;
  filesChanged: number;
  filesRemoved: number;
  fragmentsEmbedded: number;
  fragmentsMoved: number;
  fragmentsRemoved: number;
  // The store dropped every fragment on open because the embedding dimensions changed.
  embeddingsReset: boolean;
  cancelled: boolean;
};

export type BackgroundRefresh = {
  done: Promise<RefreshSummary | null>;
  stop: () => void;
};

function toEntry(record: FragmentRecord): IndexEntryInput {
  return {
    fragmentId: record.id,
    vector: record.vector,
    disposition: record.disposition,
    location: record.location,
    patterns: record.patterns
  };
}

type SettledFragments = {
  moved: number;
  removed: number;
};

function sameLocation(a: FragmentRecord["location"], b: FragmentRecord["location"]): boolean {
  return a.file === b.file && a.startLine === b.startLine && a.endLine === b.endLine;
}

/**
 * Rebuilds the in-memory index from every stored fragment, in insertion
 * order.
 */
export function loadIndexFromStore(db: TriageDb): SimilarityIndex {
  const index = new SimilarityIndex({ dimensions: db.dimensions });
  index.apply(db.fragments.listAll().map((record): IndexMutation => ({ kind: "insert", entry: toEntry(record) })));
  return index;
}

/**
 * Keeps stored fragments and the in-memory index in step with the source
 * tree. Each changed file is embedded first, then written to the store and
 * published to the index in one step, so a cancelled refresh never leaves a
 * file half-indexed.
 */
export class IndexMaintainer {
  private readonly logger: Logger;

  constructor(private readonly options: IndexMaintainerOptions) {
    this.logger = options.logger ?? noopLogger;
  }

  async refresh(params: { signal?: AbortSignal } = {}): Promise<RefreshSummary> {
    const { signal } = params;
    const { db } = this.options;
    const summary: RefreshSummary = {
      filesScanned: 0,
      filesChanged: 0,
      filesRemoved: 0,
      fragmentsEmbedded: 0,
      fragmentsMoved: 0,
      fragmentsRemoved: 0,
      embeddingsReset: db.didResetEmbeddings(),
      cancelled: false
    };

    const files = await discoverFiles({
      root: this.options.sourceRoot,
      includeExtensions: this.options.includeExtensions,
      exclude: this.options.exclude,
      maxFileSizeBytes: this.options.maxFileSizeBytes,
      logger: this.logger
    });
    this.logger.info("Index refresh started", { files: files.length });

    for (const file of files) {
      if (signal?.aborted) {
        summary.cancelled = true;
        break;
      }
      summary.filesScanned += 1;
      try {
        await this.refreshFile(file, summary, signal);
      } catch (err) {
        if (signal?.aborted) {
          summary.cancelled = true;
          break;
        }
        throw err;
      }
      this.options.onProgress?.({
        phase: "index",
        current: summary.filesScanned,
        total: files.length,
        message: file.relativePath
      });
    }

    if (!summary.cancelled) {
      const present = new Set(files.map((file) => file.relativePath));
      for (const stalePath of db.files.listPaths()) {
        if (present.has(stalePath)) continue;
        const settled = this.dropFile(stalePath);
        summary.fragmentsMoved += settled.moved;
        summary.fragmentsRemoved += settled.removed;
        summary.filesRemoved += 1;
      }
    }

    this.logger.info("Index refresh finished", { ...summary });
    return summary;
  }

  startBackgroundRefresh(params: { signal?: AbortSignal } = {}): BackgroundRefresh {
    const controller = new AbortController();
    const stop = () => controller.abort();
    params.signal?.addEventListener("abort", stop, { once: true });

    const done = this.refresh({ signal: controller.signal })
      .then((summary): RefreshSummary | null => summary)
      .catch((err: unknown) => {
        const message = err instanceof Error ? err.message : String(err);
        this.logger.warn("Background index refresh failed", { error: message });
        return null;
      })
      .finally(() => params.signal?.removeEventListener("abort", stop));
    return { done, stop };
  }

  /**
   * Attaches a disposition to a stored fragment and republishes it with the
   * same vector.
   */
  label(fragmentId: string, disposition: Disposition): EmbeddingVector {
    const record = this.options.db.fragments.setDisposition(fragmentId, disposition);
    const entry = this.options.index.insert(record.id, record.vector, disposition, {
      location: record.location,
      patterns: record.patterns
    });
    this.logger.info("Fragment labeled", { fragmentId, disposition });
    return entry;
  }

  private async refreshFile(file: DiscoveredFile, summary: RefreshSummary, signal?: AbortSignal) {
    const { db, index, embedder } = this.options;
    const text = await readFile(file.absolutePath, "utf-8");
    const hash = hashContent(text);
    if (db.files.getFileByPath(file.relativePath)?.hash === hash) return;

    const language = languageForPath(file.relativePath);
    const fragments = extractFragments(file.relativePath, language, text, { windowSize: this.options.windowSize });
    const currentIds = new Set(fragments.map((fragment) => fragment.id));
    const known = db.fragments.existingIds([...currentIds]);
    const fresh = fragments.filter((fragment) => !known.has(fragment.id));
    // Everything this file held before, or was reported at, is settled again below.
    const affected = new Set([
      ...known,
      ...db.fragments.idsOccurringIn(file.relativePath),
      ...db.fragments.listIdsForFile(file.relativePath)
    ]);

    const vectors = fresh.length ? await embedder.embed(fresh.map((fragment) => fragment.text), signal) : [];
    if (signal?.aborted) {
      summary.cancelled = true;
      return;
    }
    for (const vector of vectors) {
      if (vector.length !== index.dimensions) {
        throw new VectorDimensionMismatchError(index.dimensions, vector.length);
      }
    }

    const inserts: FragmentInsert[] = fresh.map((fragment, position) => ({
      id: fragment.id,
      location: fragment.location,
      language,
      disposition: "unlabeled",
      patterns: fragmentPatternTags(fragment, this.options.patternLists),
      vector: Float32Array.from(vectors[position] ?? [])
    }));

    const mutations: IndexMutation[] = [];
    const settled = db.transaction(() => {
      for (const record of db.fragments.upsert(inserts)) {
        mutations.push({ kind: "insert", entry: toEntry(record) });
      }
      db.fragments.replaceOccurrences(
        file.relativePath,
        fragments.map((fragment) => ({ id: fragment.id, location: fragment.location }))
      );
      db.files.upsertFile({ path: file.relativePath, hash, mtimeMs: file.mtimeMs, size: file.size });
      return this.settle(affected, file.relativePath, mutations);
    });
    index.apply(mutations);

    summary.filesChanged += 1;
    summary.fragmentsEmbedded += inserts.length;
    summary.fragmentsMoved += settled.moved;
    summary.fragmentsRemoved += settled.removed;
    this.logger.debug("Indexed file", {
      file: file.relativePath,
      embedded: inserts.length,
      moved: settled.moved,
      removed: settled.removed
    });
  }

  /**
   * Points each fragment at a place that still holds it, preferring
   * `preferredFile`. A fragment no file holds is removed unless it is
   * labeled; labeled fragments outlive their source as the memory of past
   * triage.
   */
  private settle(ids: Iterable<string>, preferredFile: string, mutations: IndexMutation[]): SettledFragments {
    const { db } = this.options;
    const settled: SettledFragments = { moved: 0, removed: 0 };
    const removed: string[] = [];
    for (const id of ids) {
      const record = db.fragments.get(id);
      if (!record) continue;
      const occurrences = db.fragments.occurrencesOf(id);
      if (occurrences.length === 0) {
        if (record.disposition === "unlabeled") removed.push(id);
        continue;
      }
      if (occurrences.some((location) => sameLocation(location, record.location))) continue;
      const location = occurrences.find((entry) => entry.file === preferredFile) ?? occurrences[0];
      db.fragments.updateLocation(id, location);
      mutations.push({ kind: "insert", entry: toEntry({ ...record, location }) });
      settled.moved += 1;
    }
    db.fragments.delete(removed);
    for (const id of removed) mutations.push({ kind: "remove", fragmentId: id });
    settled.removed = removed.length;
    return settled;
  }

  private dropFile(filePath: string): SettledFragments {
    const { db, index } = this.options;
    const affected = new Set([...db.fragments.idsOccurringIn(filePath), ...db.fragments.listIdsForFile(filePath)]);
    const mutations: IndexMutation[] = [];
    const settled = db.transaction(() => {
      db.fragments.replaceOccurrences(filePath, []);
      db.files.deleteFile(filePath);
      return this.settle(affected, filePath, mutations);
    });
    index.apply(mutations);
    return settled;
  }
}
