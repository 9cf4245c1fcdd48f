export class ProviderRequestFailedError extends Error {
  constructor(label: string, provider: string, url: string, message: string) {
    super(`${label} request failed (${provider}) to ${url}: ${message}`);
    this.name = "ProviderRequestFailedError";
  }
}

export class ProviderApiResponseError extends Error {
  status: number;

  constructor(message: string, status: number) {
    super(message);
    this.name = "ProviderApiResponseError";
    this.status = status;
  }
}

export class EmbeddingResponseLengthMismatchError extends Error {
  constructor(expected: number, actual: number) {
    super(`Embedding response length mismatch: expected ${expected}, got ${actual}.`);
    this.name = "EmbeddingResponseLengthMismatchError";
  }
}
