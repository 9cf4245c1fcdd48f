export type SourceUnavailableReason = "missing" | "stale" | "outside-root" | "unreadable" | "too-large";

export class SourceUnavailableError extends Error {
  readonly signal = "source-unavailable";
  findingId: string;
  filePath: string;
  reason: SourceUnavailableReason;

  constructor(params: { findingId: string; filePath: string; reason: SourceUnavailableReason; detail?: string }) {
    const detail = params.detail ? `: ${params.detail}` : "";
    super(
      `Source unavailable for finding ${params.findingId} (${params.reason}) at ${params.filePath}${detail}`
    );
    this.name = "SourceUnavailableError";
    this.findingId = params.findingId;
    this.filePath = params.filePath;
    this.reason = params.reason;
  }
}
