import type { Severity } from "./types/domain/severity.js";

export type { Severity };

export type LanguageId =
  | "typescript"
  | "javascript"
  | "python"
  | "java"
  | "go"
  | "ruby"
  | "csharp"
  | "cpp"
  | "php"
  | "unknown";

export type LineRange = {
  startLine: number;
  endLine: number;
};

export interface SourceLocation extends LineRange {
  file: string;
  startColumn: number;
  endColumn: number;
}

export interface Finding {
  readonly id: string;
  readonly ruleId: string;
  readonly severity: Severity;
  readonly location: Readonly<SourceLocation>;
  readonly message: string;
  readonly codeFlow: readonly Readonly<SourceLocation>[] | null;
  readonly tool: string;
  readonly tags: readonly string[];
}

export type ContextLine = {
  number: number;
  text: string;
};

export interface CodeContext {
  readonly findingId: string;
  readonly file: string;
  readonly language: LanguageId;
  readonly contentHash: string | null;
  readonly lines: readonly ContextLine[];
  readonly focus: LineRange;
  // Lines of code-flow steps that fall inside this context.
  readonly flowLines: readonly number[];
  readonly functionRange: LineRange | null;
  readonly functionName: string | null;
  readonly empty: boolean;
}

export type PatternTag = "validation" | "sanitizer" | "framework-guard" | "unsafe-call" | "none";

export interface AstPattern {
  readonly tag: PatternTag;
  readonly range: LineRange;
  readonly rule: string;
}

export type PatternSet = readonly AstPattern[];

export type Disposition = "confirmed-vulnerable" | "confirmed-safe" | "unlabeled";

export interface FragmentLocation extends LineRange {
  file: string;
}

export interface EmbeddingVector {
  readonly handle: number;
  readonly seq: number;
  readonly fragmentId: string;
  readonly vector: Float32Array;
  readonly location: Readonly<FragmentLocation> | null;
  readonly disposition: Disposition;
  readonly patterns: readonly PatternTag[];
}

export interface SimilarityMatch {
  readonly vector: EmbeddingVector;
  readonly similarity: number;
}

export type ScoreFlag = "source-unavailable" | "parse-degraded" | "similarity-unavailable";

export type ScoreContribution = {
  signal: string;
  contribution: number;
};

export interface ConfidenceScore {
  readonly findingId: string;
  readonly value: number;
  readonly contributions: readonly Readonly<ScoreContribution>[];
  readonly flags: readonly ScoreFlag[];
}

export type Classification = "likely-true-positive" | "likely-false-positive" | "needs-manual-review";

export interface TriageVerdict {
  readonly findingId: string;
  readonly score: ConfidenceScore;
  readonly classification: Classification;
}

export interface TriageBatchResult {
  verdicts: TriageVerdict[];
  cancelled: boolean;
  processed: number;
  total: number;
}

export interface TriageReport extends TriageBatchResult {
  runId: string;
  findings: Finding[];
  durationMs: number;
}
