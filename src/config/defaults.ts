import type { Severity } from "../types.js";

export const DEFAULT_INCLUDE_EXTENSIONS = [
  ".ts",
  ".tsx",
  ".mts",
  ".cts",
  ".js",
  ".jsx",
  ".mjs",
  ".cjs",
  ".py"
];

export const DEFAULT_EXCLUDES = [
  "**/node_modules/**",
  "**/.git/**",
  "**/.triage/**",
  "**/dist/**",
  "**/build/**",
  "**/.next/**",
  "**/coverage/**",
  "**/out/**",
  "**/__pycache__/**",
  "**/.venv/**"
];

export const DEFAULT_WINDOW_LINES = 10;
export const DEFAULT_CONCURRENCY = 4;
export const DEFAULT_SIMILARITY_FLOOR = 0.75;
export const DEFAULT_TOP_K = 5;
export const DEFAULT_BASELINE = 0.5;

export const DEFAULT_SEVERITY_OFFSETS: Record<Severity, number> = {
  critical: -0.1,
  high: -0.05,
  medium: 0,
  low: 0.05,
  info: 0.1
};

export const DEFAULT_WEIGHTS = {
  validation: 0.3,
  sanitizer: 0.2,
  frameworkGuard: 0.2,
  unsafeCall: -0.3,
  missingValidation: -0.2,
  similarityDisposition: 0.2,
  patternConsistency: 0.1
} as const;

export const DEFAULT_THRESHOLDS = {
  truePositiveBelow: 0.3,
  falsePositiveAbove: 0.7
} as const;

const DEFAULT_BASE_URLS = {
  openai: "https://api.openai.com"
} as const;

const DEFAULT_EMBEDDING_MODELS = {
  openai: "text-embedding-3-small"
} as const;

const DEFAULT_EMBEDDING_DIMENSIONS = {
  openai: 1536
} as const;

type EmbeddingProviderId = keyof typeof DEFAULT_EMBEDDING_MODELS;

export function defaultBaseUrl(provider: EmbeddingProviderId): string {
  return DEFAULT_BASE_URLS[provider];
}

export function defaultEmbeddingModel(provider: EmbeddingProviderId): string {
  return DEFAULT_EMBEDDING_MODELS[provider];
}

export function defaultEmbeddingDimensions(provider: EmbeddingProviderId): number {
  return DEFAULT_EMBEDDING_DIMENSIONS[provider];
}
