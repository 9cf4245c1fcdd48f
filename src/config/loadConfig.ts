import path from "node:path";
import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import type { Severity } from "../types.js";
import { SEVERITY_ORDER } from "../types/domain/severity.js";
import { parseJsonEnv, readEnv, readFirstEnv, readListEnv, readNumberEnv } from "./env.js";
import {
  DEFAULT_BASELINE,
  DEFAULT_CONCURRENCY,
  DEFAULT_EXCLUDES,
  DEFAULT_INCLUDE_EXTENSIONS,
  DEFAULT_SEVERITY_OFFSETS,
  DEFAULT_SIMILARITY_FLOOR,
  DEFAULT_THRESHOLDS,
  DEFAULT_TOP_K,
  DEFAULT_WEIGHTS,
  DEFAULT_WINDOW_LINES,
  defaultBaseUrl,
  defaultEmbeddingDimensions,
  defaultEmbeddingModel
} from "./defaults.js";
import {
  loadDefaultPatternLists,
  mergePatternLists,
  parsePatternListOverrides,
  type PatternListsByFamily
} from "./patternLists.js";
import {
  ConfigFileParseError,
  ConfigInvalidValueError,
  ConfigMissingApiKeyError
} from "../errors/config.errors.js";
import { isPlainObject } from "../ingest/dedupeKey.js";

export const EmbeddingProviderId = {
  OpenAI: "openai",
  Disabled: "disabled"
} as const;

export type EmbeddingProvider = (typeof EmbeddingProviderId)[keyof typeof EmbeddingProviderId];

export type IndexUnavailablePolicy = "degrade" | "fail";
export type CacheInvalidation = "content-hash" | "disabled";
export type OutputFormat = "text" | "json";

export type WeightKey = keyof typeof DEFAULT_WEIGHTS;
export type ScoringWeights = Record<WeightKey, number>;

export interface TriageConfig {
  projectRoot: string;
  sourceRoot: string;
  stateDir: string;
  context: {
    windowLines: number;
    maxFileSizeBytes: number;
  };
  patterns: PatternListsByFamily;
  similarity: {
    floor: number;
    topK: number;
    onUnavailable: IndexUnavailablePolicy;
  };
  scoring: {
    baseline: number;
    severityOffsets: Record<Severity, number>;
    weights: ScoringWeights;
  };
  classification: {
    truePositiveBelow: number;
    falsePositiveAbove: number;
  };
  concurrency: number;
  cache: {
    invalidation: CacheInvalidation;
  };
  embeddings: {
    provider: EmbeddingProvider;
    apiKey: string;
    model: string;
    endpoint: string;
    headers: Record<string, string>;
    dimensions: number;
    batchSize: number;
    maxInputChars: number;
  };
  indexing: {
    includeExtensions: string[];
    exclude: string[];
    maxFileSizeBytes: number;
  };
  output: {
    format: OutputFormat;
  };
}

export interface LoadConfigParams {
  projectRoot: string;
  configPath?: string | null;
  overrides?: Partial<TriageConfig>;
}

type ConfigSection = Record<string, unknown>;

const WEIGHT_KEYS = Object.keys(DEFAULT_WEIGHTS).filter((key): key is WeightKey => key in DEFAULT_WEIGHTS);

function section(parent: ConfigSection, key: string, label = key): ConfigSection {
  const value = parent[key];
  if (value === undefined || value === null) return {};
  if (!isPlainObject(value)) throw new ConfigInvalidValueError(label, "expected an object");
  return value;
}

function optionalNumber(value: unknown, key: string): number | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new ConfigInvalidValueError(key, "expected a number");
  }
  return value;
}

function optionalString(value: unknown, key: string): string | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "string") throw new ConfigInvalidValueError(key, "expected a string");
  return value.trim() || undefined;
}

function optionalStringList(value: unknown, key: string): string[] | undefined {
  if (value === undefined || value === null) return undefined;
  if (!Array.isArray(value) || value.some((entry) => typeof entry !== "string")) {
    throw new ConfigInvalidValueError(key, "expected an array of strings");
  }
  return value.filter((entry): entry is string => typeof entry === "string");
}

function optionalStringMap(value: unknown, key: string): Record<string, string> {
  if (value === undefined || value === null) return {};
  if (!isPlainObject(value)) throw new ConfigInvalidValueError(key, "expected an object of strings");
  const map: Record<string, string> = {};
  for (const [name, entry] of Object.entries(value)) {
    if (typeof entry !== "string") throw new ConfigInvalidValueError(`${key}.${name}`, "expected a string");
    map[name] = entry;
  }
  return map;
}

function optionalEnum<T extends string>(value: unknown, key: string, allowed: readonly T[]): T | undefined {
  if (value === undefined || value === null || value === "") return undefined;
  const match = allowed.find((candidate) => candidate === value);
  if (!match) {
    throw new ConfigInvalidValueError(key, `expected one of ${allowed.join(", ")}, got ${JSON.stringify(value)}`);
  }
  return match;
}

function readSeverityOffsets(value: ConfigSection): Record<Severity, number> {
  const offsets: Record<Severity, number> = { ...DEFAULT_SEVERITY_OFFSETS };
  for (const [key, raw] of Object.entries(value)) {
    const severity = SEVERITY_ORDER.find((candidate) => candidate === key);
    if (!severity) throw new ConfigInvalidValueError(`scoring.severityOffsets.${key}`, "unknown severity");
    offsets[severity] = optionalNumber(raw, `scoring.severityOffsets.${key}`) ?? offsets[severity];
  }
  return offsets;
}

function readWeights(value: ConfigSection): ScoringWeights {
  const weights: ScoringWeights = { ...DEFAULT_WEIGHTS };
  for (const [key, raw] of Object.entries(value)) {
    const weight = WEIGHT_KEYS.find((candidate) => candidate === key);
    if (!weight) throw new ConfigInvalidValueError(`scoring.weights.${key}`, "unknown weight");
    weights[weight] = optionalNumber(raw, `scoring.weights.${key}`) ?? weights[weight];
  }
  return weights;
}

async function loadConfigFile(projectRoot: string, configPath?: string | null): Promise<ConfigSection> {
  const candidates = configPath
    ? [path.resolve(projectRoot, configPath)]
    : [path.resolve(projectRoot, "triage.config.json"), path.resolve(projectRoot, ".triagerc.json")];

  for (const candidate of candidates) {
    if (!existsSync(candidate)) continue;
    const raw = await readFile(candidate, "utf-8");
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      throw new ConfigFileParseError(candidate, err instanceof Error ? err.message : String(err));
    }
    if (!isPlainObject(parsed)) throw new ConfigFileParseError(candidate, "expected a JSON object");
    return parsed;
  }

  return {};
}

function assertUnitInterval(value: number, key: string): void {
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new ConfigInvalidValueError(key, `expected a number between 0 and 1, got ${value}`);
  }
}

function assertPositiveInteger(value: number, key: string): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigInvalidValueError(key, `expected a positive integer, got ${value}`);
  }
}

export function validateConfig(cfg: TriageConfig): void {
  assertPositiveInteger(cfg.context.windowLines, "context.windowLines");
  assertPositiveInteger(cfg.context.maxFileSizeBytes, "context.maxFileSizeBytes");
  assertUnitInterval(cfg.similarity.floor, "similarity.floor");
  assertPositiveInteger(cfg.similarity.topK, "similarity.topK");
  assertUnitInterval(cfg.scoring.baseline, "scoring.baseline");
  assertUnitInterval(cfg.classification.truePositiveBelow, "classification.truePositiveBelow");
  assertUnitInterval(cfg.classification.falsePositiveAbove, "classification.falsePositiveAbove");
  if (cfg.classification.truePositiveBelow > cfg.classification.falsePositiveAbove) {
    throw new ConfigInvalidValueError(
      "classification.truePositiveBelow",
      "must not be greater than classification.falsePositiveAbove"
    );
  }
  assertPositiveInteger(cfg.concurrency, "concurrency");
  assertPositiveInteger(cfg.embeddings.dimensions, "embeddings.dimensions");
  assertPositiveInteger(cfg.embeddings.batchSize, "embeddings.batchSize");
  assertPositiveInteger(cfg.embeddings.maxInputChars, "embeddings.maxInputChars");
  assertPositiveInteger(cfg.indexing.maxFileSizeBytes, "indexing.maxFileSizeBytes");
  if (cfg.embeddings.provider === EmbeddingProviderId.OpenAI && !cfg.embeddings.apiKey) {
    throw new ConfigMissingApiKeyError();
  }
}

export async function loadConfig(params: LoadConfigParams): Promise<TriageConfig> {
  const configFile = await loadConfigFile(params.projectRoot, params.configPath);
  const projectRoot = path.resolve(params.projectRoot);

  const context = section(configFile, "context");
  const similarity = section(configFile, "similarity");
  const scoring = section(configFile, "scoring");
  const classification = section(configFile, "classification");
  const cache = section(configFile, "cache");
  const embeddings = section(configFile, "embeddings");
  const indexing = section(configFile, "indexing");
  const output = section(configFile, "output");

  const patternOverrides = parsePatternListOverrides(configFile.patterns);
  const patterns = mergePatternLists(await loadDefaultPatternLists(), patternOverrides);

  const apiKey =
    readFirstEnv(["TRIAGE_API_KEY", "OPENAI_API_KEY"]) || optionalString(embeddings.apiKey, "embeddings.apiKey") || "";
  const explicitProvider = optionalEnum(
    readEnv("TRIAGE_EMBEDDINGS_PROVIDER")?.toLowerCase() ?? embeddings.provider,
    "embeddings.provider",
    Object.values(EmbeddingProviderId)
  );
  const provider = explicitProvider ?? (apiKey ? EmbeddingProviderId.OpenAI : EmbeddingProviderId.Disabled);

  const baseUrl =
    readEnv("TRIAGE_API_BASE") || optionalString(embeddings.baseUrl, "embeddings.baseUrl") || defaultBaseUrl("openai");
  const endpoint =
    readEnv("TRIAGE_EMBEDDINGS_ENDPOINT") ||
    optionalString(embeddings.endpoint, "embeddings.endpoint") ||
    `${baseUrl.replace(/\/$/, "")}/v1/embeddings`;

  const sourceRoot =
    readEnv("TRIAGE_SOURCE_ROOT") || optionalString(configFile.sourceRoot, "sourceRoot") || projectRoot;
  const stateDir = optionalString(configFile.stateDir, "stateDir") || ".triage";

  const cfg: TriageConfig = {
    projectRoot,
    sourceRoot: path.resolve(projectRoot, sourceRoot),
    stateDir: path.resolve(projectRoot, stateDir),
    context: {
      windowLines:
        readNumberEnv("TRIAGE_WINDOW_LINES") ??
        optionalNumber(context.windowLines, "context.windowLines") ??
        DEFAULT_WINDOW_LINES,
      maxFileSizeBytes: optionalNumber(context.maxFileSizeBytes, "context.maxFileSizeBytes") ?? 1024 * 1024
    },
    patterns,
    similarity: {
      floor:
        readNumberEnv("TRIAGE_SIMILARITY_FLOOR") ??
        optionalNumber(similarity.floor, "similarity.floor") ??
        DEFAULT_SIMILARITY_FLOOR,
      topK: readNumberEnv("TRIAGE_TOP_K") ?? optionalNumber(similarity.topK, "similarity.topK") ?? DEFAULT_TOP_K,
      onUnavailable:
        optionalEnum(
          readEnv("TRIAGE_INDEX_UNAVAILABLE") ?? similarity.onUnavailable,
          "similarity.onUnavailable",
          ["degrade", "fail"] as const
        ) ?? "degrade"
    },
    scoring: {
      baseline: optionalNumber(scoring.baseline, "scoring.baseline") ?? DEFAULT_BASELINE,
      severityOffsets: readSeverityOffsets(section(scoring, "severityOffsets", "scoring.severityOffsets")),
      weights: readWeights(section(scoring, "weights", "scoring.weights"))
    },
    classification: {
      truePositiveBelow:
        optionalNumber(classification.truePositiveBelow, "classification.truePositiveBelow") ??
        DEFAULT_THRESHOLDS.truePositiveBelow,
      falsePositiveAbove:
        optionalNumber(classification.falsePositiveAbove, "classification.falsePositiveAbove") ??
        DEFAULT_THRESHOLDS.falsePositiveAbove
    },
    concurrency:
      readNumberEnv("TRIAGE_CONCURRENCY") ??
      optionalNumber(configFile.concurrency, "concurrency") ??
      DEFAULT_CONCURRENCY,
    cache: {
      invalidation:
        optionalEnum(cache.invalidation, "cache.invalidation", ["content-hash", "disabled"] as const) ??
        "content-hash"
    },
    embeddings: {
      provider,
      apiKey,
      model:
        readEnv("TRIAGE_EMBEDDINGS_MODEL") ||
        optionalString(embeddings.model, "embeddings.model") ||
        defaultEmbeddingModel("openai"),
      endpoint,
      headers: {
        ...optionalStringMap(embeddings.headers, "embeddings.headers"),
        ...parseJsonEnv("TRIAGE_API_HEADERS")
      },
      dimensions: optionalNumber(embeddings.dimensions, "embeddings.dimensions") ?? defaultEmbeddingDimensions("openai"),
      batchSize: optionalNumber(embeddings.batchSize, "embeddings.batchSize") ?? 64,
      maxInputChars: optionalNumber(embeddings.maxInputChars, "embeddings.maxInputChars") ?? 8000
    },
    indexing: {
      includeExtensions:
        optionalStringList(indexing.includeExtensions, "indexing.includeExtensions") ?? DEFAULT_INCLUDE_EXTENSIONS,
      exclude:
        readListEnv("TRIAGE_EXCLUDE") ?? optionalStringList(indexing.exclude, "indexing.exclude") ?? DEFAULT_EXCLUDES,
      maxFileSizeBytes: optionalNumber(indexing.maxFileSizeBytes, "indexing.maxFileSizeBytes") ?? 200 * 1024
    },
    output: {
      format:
        optionalEnum(readEnv("TRIAGE_OUTPUT_FORMAT") ?? output.format, "output.format", ["text", "json"] as const) ??
        "text"
    }
  };

  const merged: TriageConfig = {
    ...cfg,
    ...params.overrides
  };
  validateConfig(merged);
  return merged;
}
