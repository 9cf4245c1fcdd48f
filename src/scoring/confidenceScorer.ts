import type {
  ConfidenceScore,
  Finding,
  PatternSet,
  PatternTag,
  ScoreContribution,
  ScoreFlag,
  Severity,
  SimilarityMatch
} from "../types.js";
import type { ScoringWeights } from "../config/loadConfig.js";

export type ConfidenceScorerOptions = {
  baseline: number;
  severityOffsets: Record<Severity, number>;
  weights: ScoringWeights;
  similarityFloor: number;
};

const PATTERN_WEIGHTS: ReadonlyArray<[Exclude<PatternTag, "none">, keyof ScoringWeights]> = [
  ["validation", "validation"],
  ["sanitizer", "sanitizer"],
  ["framework-guard", "frameworkGuard"],
  ["unsafe-call", "unsafeCall"]
];

const FLAG_ORDER: readonly ScoreFlag[] = ["source-unavailable", "parse-degraded", "similarity-unavailable"];

export function roundScore(value: number): number {
  const rounded = Math.round(value * 1e6) / 1e6;
  return rounded === 0 ? 0 : rounded;
}

export function clampScore(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

/**
 * Scores how likely a finding is benign: a severity-adjusted baseline plus one
 * contribution per distinct pattern tag and the similarity terms, clamped to
 * [0, 1]. The contributions always add up to the final value.
 */
export class ConfidenceScorer {
  constructor(private readonly options: ConfidenceScorerOptions) {}

  score(
    finding: Finding,
    patterns: PatternSet,
    matches: readonly SimilarityMatch[],
    flags: readonly ScoreFlag[] = []
  ): ConfidenceScore {
    const { weights } = this.options;
    const contributions: ScoreContribution[] = [];
    const add = (signal: string, value: number) => {
      const contribution = roundScore(value);
      if (contribution !== 0) contributions.push(Object.freeze({ signal, contribution }));
    };

    add("baseline", this.options.baseline);
    add(`severity:${finding.severity}`, this.options.severityOffsets[finding.severity]);

    const tags = new Set(patterns.map((pattern) => pattern.tag));
    for (const [tag, weightKey] of PATTERN_WEIGHTS) {
      if (tags.has(tag)) add(`pattern:${tag}`, weights[weightKey]);
    }
    if (tags.has("unsafe-call") && !tags.has("validation") && !tags.has("sanitizer")) {
      add("missing-validation", weights.missingValidation);
    }

    const considered = matches.filter((match) => match.similarity >= this.options.similarityFloor);
    add("similarity:disposition", this.dispositionTerm(considered));
    if (tags.has("sanitizer") && considered.length > 0) {
      const withSanitizer = considered.filter((match) => match.vector.patterns.includes("sanitizer")).length;
      const fraction = withSanitizer / considered.length;
      if (fraction > 0.5) add("similarity:pattern-consistency", weights.patternConsistency * fraction);
    }

    const raw = roundScore(contributions.reduce((sum, entry) => sum + entry.contribution, 0));
    const value = clampScore(raw);
    add("clamp", value - raw);

    const flagSet = new Set(flags);
    return Object.freeze({
      findingId: finding.id,
      value: roundScore(value),
      contributions: Object.freeze(contributions),
      flags: Object.freeze(FLAG_ORDER.filter((flag) => flagSet.has(flag)))
    });
  }

  // Similarity-weighted balance of confirmed-safe against confirmed-vulnerable neighbours.
  private dispositionTerm(considered: readonly SimilarityMatch[]): number {
    let total = 0;
    let balance = 0;
    for (const match of considered) {
      const weight = Math.max(0, match.similarity);
      total += weight;
      if (match.vector.disposition === "confirmed-safe") balance += weight;
      else if (match.vector.disposition === "confirmed-vulnerable") balance -= weight;
    }
    if (total === 0) return 0;
    return this.options.weights.similarityDisposition * (balance / total);
  }
}
