export class IndexUnavailableError extends Error {
  readonly signal = "similarity-unavailable";
  findingId: string | null;
  reason: string;

  constructor(reason: string, findingId?: string | null) {
    const scope = findingId ? ` for finding ${findingId}` : "";
    super(`Similarity index unavailable${scope}: ${reason}`);
    this.name = "IndexUnavailableError";
    this.findingId = findingId ?? null;
    this.reason = reason;
  }
}

export class VectorDimensionMismatchError extends Error {
  constructor(expected: number, actual: number) {
    super(`Vector dimension mismatch: expected ${expected}, got ${actual}.`);
    this.name = "VectorDimensionMismatchError";
  }
}
