export * from "./triage/runTriage.js";
export * from "./triage/triageEngine.js";
export * from "./triage/classifier.js";
export * from "./triage/progress.js";
export * from "./config/loadConfig.js";
export * from "./ingest/sarifIngestor.js";
export * from "./context/contextExtractor.js";
export * from "./analysis/patternAnalyzer.js";
export * from "./similarity/similarityIndex.js";
export * from "./scoring/confidenceScorer.js";
export * from "./services/embeddings/embedding.js";
export * from "./indexing/indexMaintainer.js";
export * from "./storage/db.js";
export * from "./report/formatters.js";
export * from "./types.js";
