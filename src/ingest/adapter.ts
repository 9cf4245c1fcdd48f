import type { Severity, SourceLocation } from "../types.js";
import { MalformedInputError } from "../errors/ingest.errors.js";
import { normalizeFilepath, parseLineNumber, readString, toRecord } from "./dedupeKey.js";

/**
 * A finding as read off a tool document, before dedupe and id assignment.
 */
export type AdaptedFinding = {
  guid: string | null;
  ruleId: string;
  severity: Severity;
  location: SourceLocation;
  message: string;
  codeFlow: SourceLocation[] | null;
  tool: string;
  tags: string[];
};

export type FindingsAdapter = {
  name: string;
  accepts: (document: Record<string, unknown>) => boolean;
  adapt: (document: Record<string, unknown>) => AdaptedFinding[];
};

export function requireString(value: unknown, path: string, field: string): string {
  const text = readString(value);
  if (!text) {
    throw new MalformedInputError(`missing required field "${field}"`, path);
  }
  return text;
}

export function requireArray(value: unknown, path: string): unknown[] {
  if (!Array.isArray(value)) {
    throw new MalformedInputError("expected an array", path);
  }
  return value;
}

type RawRegion = {
  file: unknown;
  startLine: unknown;
  endLine?: unknown;
  startColumn?: unknown;
  endColumn?: unknown;
};

/**
 * Builds a location from loosely typed fields. Lines and columns are 1-based;
 * a missing end falls back to the start.
 */
export function buildLocation(raw: RawRegion, path: string): SourceLocation {
  const file = normalizeFilepath(raw.file);
  if (!file) {
    throw new MalformedInputError("missing required field \"location.file\"", path);
  }
  const startLine = parseLineNumber(raw.startLine);
  if (startLine === null) {
    throw new MalformedInputError("missing required field \"location.startLine\"", path);
  }
  if (startLine <= 0) {
    throw new MalformedInputError(`start line must be positive, got ${startLine}`, path);
  }
  const endLine = parseLineNumber(raw.endLine) ?? startLine;
  if (endLine <= 0) {
    throw new MalformedInputError(`end line must be positive, got ${endLine}`, path);
  }
  if (endLine < startLine) {
    throw new MalformedInputError(`end line ${endLine} precedes start line ${startLine}`, path);
  }
  const startColumn = parseLineNumber(raw.startColumn) ?? 1;
  if (startColumn <= 0) {
    throw new MalformedInputError(`start column must be positive, got ${startColumn}`, path);
  }
  const endColumn = parseLineNumber(raw.endColumn) ?? startColumn;
  if (endColumn <= 0) {
    throw new MalformedInputError(`end column must be positive, got ${endColumn}`, path);
  }
  return { file, startLine, endLine, startColumn, endColumn };
}

// Code-flow steps are optional context; a step that cannot be placed is skipped.
export function tryBuildLocation(raw: RawRegion): SourceLocation | null {
  try {
    return buildLocation(raw, "");
  } catch (err) {
    if (err instanceof MalformedInputError) return null;
    throw err;
  }
}

export function readTags(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  const tags: string[] = [];
  for (const entry of value) {
    const tag = readString(entry);
    if (tag && !tags.includes(tag)) tags.push(tag);
  }
  return tags;
}

export function readNested(value: unknown, ...keys: string[]): unknown {
  let current: unknown = value;
  for (const key of keys) {
    current = toRecord(current)[key];
  }
  return current;
}
