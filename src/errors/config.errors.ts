export class ConfigMissingApiKeyError extends Error {
  constructor() {
    super(
      "Missing embeddings API key. Set TRIAGE_API_KEY (or OPENAI_API_KEY) or embeddings.apiKey in triage.config.json, or set embeddings.provider to \"disabled\"."
    );
    this.name = "ConfigMissingApiKeyError";
  }
}

export class ConfigInvalidValueError extends Error {
  key: string;

  constructor(key: string, message: string) {
    super(`Invalid config value for ${key}: ${message}`);
    this.name = "ConfigInvalidValueError";
    this.key = key;
  }
}

export class ConfigFileParseError extends Error {
  constructor(filePath: string, message: string) {
    super(`Could not parse config file ${filePath}: ${message}`);
    this.name = "ConfigFileParseError";
  }
}
