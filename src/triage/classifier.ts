import type { Classification, ConfidenceScore, TriageVerdict } from "../types.js";

export type ClassificationThresholds = {
  truePositiveBelow: number;
  falsePositiveAbove: number;
};

// Both boundaries belong to the manual-review band.
export function classifyScore(value: number, thresholds: ClassificationThresholds): Classification {
  if (value < thresholds.truePositiveBelow) return "likely-true-positive";
  if (value > thresholds.falsePositiveAbove) return "likely-false-positive";
  return "needs-manual-review";
}

export function classify(score: ConfidenceScore, thresholds: ClassificationThresholds): TriageVerdict {
  return Object.freeze({
    findingId: score.findingId,
    score,
    classification: classifyScore(score.value, thresholds)
  });
}
