import type {
  CodeContext,
  Finding,
  ScoreFlag,
  SimilarityMatch,
  TriageBatchResult,
  TriageVerdict
} from "../types.js";
import type { IndexUnavailablePolicy } from "../config/loadConfig.js";
import { SourceUnavailableError } from "../errors/context.errors.js";
import { IndexUnavailableError } from "../errors/similarity.errors.js";
import { ContextExtractor, emptyContext } from "../context/contextExtractor.js";
import type { PatternAnalyzer } from "../analysis/patternAnalyzer.js";
import { contextFragmentText } from "../indexing/fragmentExtractor.js";
import { noopLogger, type Logger } from "../logging/logger.js";
import type { ConfidenceScorer } from "../scoring/confidenceScorer.js";
import type { Embedder } from "../services/embeddings/embedding.js";
import type { IndexSnapshot, SimilarityIndex } from "../similarity/similarityIndex.js";
import { classify, type ClassificationThresholds } from "./classifier.js";
import type { TriageProgressHandler } from "./progress.js";
import { runWithConcurrency } from "./workerPool.js";

export type TriageEngineOptions = {
  extractor: ContextExtractor;
  analyzer: PatternAnalyzer;
  scorer: ConfidenceScorer;
  thresholds: ClassificationThresholds;
  // Null when no index could be loaded or embeddings are disabled.
  index: SimilarityIndex | null;
  embedder: Embedder | null;
  concurrency: number;
  topK: number;
  onIndexUnavailable: IndexUnavailablePolicy;
  logger?: Logger;
  onProgress?: TriageProgressHandler;
};

export type TriageBatchOptions = {
  signal?: AbortSignal;
};

type SimilarityLookup = { matches: readonly SimilarityMatch[] } | { aborted: true };

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Runs the per-finding pipeline (context, structure, similarity, score,
 * classification) over a batch with bounded concurrency. Findings share no
 * state, so every verdict depends only on its own finding and the index
 * snapshot taken when the batch started.
 */
export class TriageEngine {
  private readonly logger: Logger;

  constructor(private readonly options: TriageEngineOptions) {
    this.logger = options.logger ?? noopLogger;
  }

  async triageBatch(findings: readonly Finding[], params: TriageBatchOptions = {}): Promise<TriageBatchResult> {
    const { signal } = params;
    const total = findings.length;
    const snapshot = this.options.index?.snapshot() ?? null;
    this.logger.info("Triage batch started", {
      findings: total,
      concurrency: this.options.concurrency,
      indexVersion: snapshot?.version ?? null,
      indexSize: snapshot?.size ?? 0
    });

    const outcome = await runWithConcurrency(
      findings,
      this.options.concurrency,
      (finding) => this.triageFinding(finding, snapshot, signal),
      {
        signal,
        onSettled: (_result, settled) => this.options.onProgress?.({ phase: "triage", current: settled, total })
      }
    );

    const ranked: Array<{ verdict: TriageVerdict; index: number }> = [];
    for (const result of outcome.results) {
      if (result.value) ranked.push({ verdict: result.value, index: result.index });
    }
    ranked.sort((a, b) => a.verdict.score.value - b.verdict.score.value || a.index - b.index);

    const cancelled = outcome.cancelled || ranked.length < outcome.results.length;
    const verdicts = ranked.map((entry) => entry.verdict);
    this.logger.info("Triage batch finished", {
      findings: total,
      processed: verdicts.length,
      cancelled
    });
    return { verdicts, cancelled, processed: verdicts.length, total };
  }

  // Null when the batch was cancelled while this finding was in flight.
  private async triageFinding(
    finding: Finding,
    snapshot: IndexSnapshot | null,
    signal?: AbortSignal
  ): Promise<TriageVerdict | null> {
    const flags: ScoreFlag[] = [];

    let context: CodeContext;
    try {
      context = await this.options.extractor.extract(finding);
    } catch (err) {
      if (!(err instanceof SourceUnavailableError)) throw err;
      this.logger.warn("Source unavailable", {
        findingId: finding.id,
        signal: err.signal,
        file: err.filePath,
        reason: err.reason
      });
      flags.push(err.signal);
      context = emptyContext(finding);
    }

    const analysis = this.options.analyzer.analyze(context);
    if (analysis.warning) flags.push(analysis.warning.signal);

    const lookup = await this.findSimilar(finding, context, snapshot, flags, signal);
    if ("aborted" in lookup) return null;

    const score = this.options.scorer.score(finding, analysis.patterns, lookup.matches, flags);
    return classify(score, this.options.thresholds);
  }

  private async findSimilar(
    finding: Finding,
    context: CodeContext,
    snapshot: IndexSnapshot | null,
    flags: ScoreFlag[],
    signal?: AbortSignal
  ): Promise<SimilarityLookup> {
    const { embedder } = this.options;
    const degrade = (reason: string): SimilarityLookup => {
      this.logger.warn("Similarity unavailable", {
        findingId: finding.id,
        signal: "similarity-unavailable",
        reason
      });
      flags.push("similarity-unavailable");
      return { matches: [] };
    };

    if (!embedder) return degrade("embeddings are disabled");
    if (!snapshot) return degrade("similarity index is not loaded");
    if (context.empty || snapshot.size === 0) return { matches: [] };

    const text = contextFragmentText(context);
    if (!text.trim()) return { matches: [] };

    try {
      const [vector] = await embedder.embed([text], signal);
      if (!vector) throw new Error("embedder returned no vector");
      return { matches: snapshot.query(vector, this.options.topK) };
    } catch (err) {
      if (signal?.aborted) return { aborted: true };
      const reason = errorMessage(err);
      if (this.options.onIndexUnavailable === "fail") {
        throw new IndexUnavailableError(reason, finding.id);
      }
      return degrade(reason);
    }
  }
}
