import type { LanguageId } from "../types.js";

// Carried as data in analysis results; never thrown across the pipeline.
export class ParseDegradedWarning extends Error {
  readonly signal = "parse-degraded";
  findingId: string;
  language: LanguageId;
  reason: string;

  constructor(findingId: string, language: LanguageId, reason: string) {
    super(`Structural analysis degraded for finding ${findingId} (${language}): ${reason}`);
    this.name = "ParseDegradedWarning";
    this.findingId = findingId;
    this.language = language;
    this.reason = reason;
  }
}
