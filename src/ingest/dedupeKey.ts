import { createHash } from "node:crypto";

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

export function toRecord(value: unknown): Record<string, unknown> {
  return isPlainObject(value) ? value : {};
}

export function readString(value: unknown): string {
  return typeof value === "string" ? value.trim() : "";
}

function decodeUriPath(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

export function normalizeFilepath(value: unknown): string {
  if (typeof value !== "string") return "";
  let normalized = value.trim().replace(/\\/g, "/");
  if (normalized.startsWith("file://")) {
    normalized = decodeUriPath(normalized.slice("file://".length));
  }
  return normalized.replace(/^(\.\/)+/, "").replace(/\/{2,}/g, "/");
}

export function parseLineNumber(value: unknown): number | null {
  if (typeof value === "number" && Number.isFinite(value)) {
    return Math.trunc(value);
  }
  if (typeof value === "string" && value.trim()) {
    const parsed = Number(value);
    if (Number.isFinite(parsed)) {
      return Math.trunc(parsed);
    }
  }
  return null;
}

function normalizeKeyPart(value: string): string {
  return value.trim().replace(/\|/g, "/");
}

export type FindingDedupeInput = {
  ruleId: string;
  file: string;
  startLine: number;
  startColumn: number;
};

export function buildFindingDedupeKey(input: FindingDedupeInput): string {
  return [
    normalizeKeyPart(input.ruleId),
    normalizeKeyPart(normalizeFilepath(input.file)),
    String(input.startLine),
    String(input.startColumn)
  ].join("|");
}

export function stableFindingId(tool: string, dedupeKey: string): string {
  const digest = createHash("sha256").update(`${tool}\u0000${dedupeKey}`).digest("hex");
  return `f_${digest.slice(0, 16)}`;
}
