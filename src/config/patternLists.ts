import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import type { LanguageId } from "../types.js";
import { ConfigFileParseError, ConfigInvalidValueError } from "../errors/config.errors.js";
import { isPlainObject } from "../ingest/dedupeKey.js";

export const PATTERN_CATEGORIES = ["validators", "sanitizers", "frameworkGuards", "unsafeCalls"] as const;

export type PatternCategory = (typeof PATTERN_CATEGORIES)[number];

export type PatternLists = Record<PatternCategory, string[]>;

// Lists are keyed by language family; typescript shares the javascript lists.
export type PatternListFamily = "javascript" | "python";

export type PatternListsByFamily = Record<PatternListFamily, PatternLists>;

export type PatternListOverrides = Partial<Record<PatternListFamily, Partial<PatternLists>>>;

const DATA_FILE = new URL("../../data/pattern-lists.json", import.meta.url);

export function patternFamilyFor(language: LanguageId): PatternListFamily | null {
  switch (language) {
    case "typescript":
    case "javascript":
      return "javascript";
    case "python":
      return "python";
    default:
      return null;
  }
}

export function emptyPatternLists(): PatternLists {
  return { validators: [], sanitizers: [], frameworkGuards: [], unsafeCalls: [] };
}

function readStringList(value: unknown, key: string): string[] {
  if (!Array.isArray(value)) {
    throw new ConfigInvalidValueError(key, "expected an array of callee patterns");
  }
  const list: string[] = [];
  for (const entry of value) {
    if (typeof entry !== "string" || !entry.trim()) {
      throw new ConfigInvalidValueError(key, "callee patterns must be non-empty strings");
    }
    list.push(entry.trim());
  }
  return list;
}

/**
 * Reads a partial set of per-family lists. Unknown families are rejected so a
 * typo in the config does not silently fall back to the bundled defaults.
 */
export function parsePatternListOverrides(value: unknown, keyPrefix = "patterns"): PatternListOverrides {
  if (value === undefined || value === null) return {};
  if (!isPlainObject(value)) {
    throw new ConfigInvalidValueError(keyPrefix, "expected an object keyed by language");
  }
  const result: PatternListOverrides = {};
  for (const [rawFamily, rawLists] of Object.entries(value)) {
    const family = rawFamily === "typescript" ? "javascript" : rawFamily;
    if (family !== "javascript" && family !== "python") {
      throw new ConfigInvalidValueError(`${keyPrefix}.${rawFamily}`, "unsupported language");
    }
    if (!isPlainObject(rawLists)) {
      throw new ConfigInvalidValueError(`${keyPrefix}.${rawFamily}`, "expected an object of pattern lists");
    }
    const lists: Partial<PatternLists> = { ...result[family] };
    for (const category of PATTERN_CATEGORIES) {
      if (rawLists[category] === undefined) continue;
      lists[category] = readStringList(rawLists[category], `${keyPrefix}.${rawFamily}.${category}`);
    }
    result[family] = lists;
  }
  return result;
}

export function mergePatternLists(
  defaults: PatternListsByFamily,
  overrides: PatternListOverrides
): PatternListsByFamily {
  return {
    javascript: { ...defaults.javascript, ...overrides.javascript },
    python: { ...defaults.python, ...overrides.python }
  };
}

export async function loadDefaultPatternLists(): Promise<PatternListsByFamily> {
  const raw = await readFile(DATA_FILE, "utf-8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigFileParseError(fileURLToPath(DATA_FILE), message);
  }
  const overrides = parsePatternListOverrides(parsed, "pattern-lists.json");
  return mergePatternLists(
    { javascript: emptyPatternLists(), python: emptyPatternLists() },
    overrides
  );
}
