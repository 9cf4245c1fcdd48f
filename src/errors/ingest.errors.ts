export class MalformedInputError extends Error {
  path: string | null;

  constructor(reason: string, path?: string | null) {
    super(path ? `Malformed findings document at ${path}: ${reason}` : `Malformed findings document: ${reason}`);
    this.name = "MalformedInputError";
    this.path = path ?? null;
  }
}
