export class StorageFragmentWriteError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "StorageFragmentWriteError";
  }
}

export class StorageCorruptEmbeddingError extends Error {
  constructor(fragmentId: string, byteLength: number) {
    super(`Stored embedding for fragment ${fragmentId} has invalid byte length ${byteLength}.`);
    this.name = "StorageCorruptEmbeddingError";
  }
}

export class StorageUnknownFragmentError extends Error {
  constructor(fragmentId: string) {
    super(`Unknown fragment: ${fragmentId}`);
    this.name = "StorageUnknownFragmentError";
  }
}

export class StorageUnknownRunError extends Error {
  constructor(runId: string) {
    super(`Unknown triage run: ${runId}`);
    this.name = "StorageUnknownRunError";
  }
}
