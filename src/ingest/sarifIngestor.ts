import { readFile } from "node:fs/promises";
import type { Finding, Severity, SourceLocation } from "../types.js";
import { MalformedInputError } from "../errors/ingest.errors.js";
import {
  buildLocation,
  readNested,
  readTags,
  requireArray,
  requireString,
  tryBuildLocation,
  type AdaptedFinding,
  type FindingsAdapter
} from "./adapter.js";
import { semgrepAdapter } from "./semgrepAdapter.js";
import {
  buildFindingDedupeKey,
  isPlainObject,
  parseLineNumber,
  readString,
  stableFindingId,
  toRecord
} from "./dedupeKey.js";

export type RawFindingsInput = string | Uint8Array;

const SARIF_LEVELS: Record<string, Severity> = {
  error: "high",
  warning: "medium",
  note: "low",
  none: "info"
};

export function severityFromScore(score: number): Severity {
  if (score >= 9) return "critical";
  if (score >= 7) return "high";
  if (score >= 4) return "medium";
  if (score > 0) return "low";
  return "info";
}

function readScore(value: unknown): number | null {
  if (typeof value === "number" && Number.isFinite(value)) return value;
  if (typeof value === "string" && value.trim()) {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

type SarifRunContext = {
  tool: string;
  rules: Record<string, unknown>[];
  rulesById: Map<string, Record<string, unknown>>;
  artifacts: unknown[];
};

function buildRunContext(run: Record<string, unknown>): SarifRunContext {
  const driver = toRecord(readNested(run, "tool", "driver"));
  const rawRules = Array.isArray(driver.rules) ? driver.rules : [];
  const rules = rawRules.map((rule) => toRecord(rule));
  const rulesById = new Map<string, Record<string, unknown>>();
  for (const rule of rules) {
    const id = readString(rule.id);
    if (id && !rulesById.has(id)) rulesById.set(id, rule);
  }
  return {
    tool: readString(driver.name) || "sarif",
    rules,
    rulesById,
    artifacts: Array.isArray(run.artifacts) ? run.artifacts : []
  };
}

function resolveRule(
  result: Record<string, unknown>,
  run: SarifRunContext
): Record<string, unknown> | null {
  const index = parseLineNumber(result.ruleIndex ?? readNested(result, "rule", "index"));
  if (index !== null && index >= 0 && index < run.rules.length) {
    return run.rules[index];
  }
  const id = readString(result.ruleId) || readString(readNested(result, "rule", "id"));
  return (id && run.rulesById.get(id)) || null;
}

function formatMessageString(template: string, args: unknown): string {
  const values = Array.isArray(args) ? args : [];
  return template.replace(/\{(\d+)\}/g, (match, index: string) => {
    const value = values[Number(index)];
    return typeof value === "string" ? value : match;
  });
}

function resolveMessage(
  result: Record<string, unknown>,
  rule: Record<string, unknown> | null,
  path: string
): string {
  const message = toRecord(result.message);
  const direct = readString(message.text) || readString(message.markdown);
  if (direct) return direct;
  const messageId = readString(message.id);
  if (messageId && rule) {
    const template = readString(readNested(rule, "messageStrings", messageId, "text"));
    if (template) return formatMessageString(template, message.arguments);
  }
  return requireString(null, `${path}.message`, "message");
}

function resolveSeverity(
  result: Record<string, unknown>,
  rule: Record<string, unknown> | null,
  path: string
): Severity {
  const score =
    readScore(readNested(rule, "properties", "security-severity")) ??
    readScore(readNested(result, "properties", "security-severity"));
  if (score !== null) return severityFromScore(score);

  const level =
    readString(result.level) || readString(readNested(rule, "defaultConfiguration", "level")) || "warning";
  const severity = SARIF_LEVELS[level.toLowerCase()];
  if (!severity) {
    throw new MalformedInputError(`unknown result level "${level}"`, `${path}.level`);
  }
  return severity;
}

function readPhysicalLocation(
  physical: unknown,
  run: SarifRunContext
): { file: unknown; startLine: unknown; endLine: unknown; startColumn: unknown; endColumn: unknown } {
  const artifact = toRecord(readNested(physical, "artifactLocation"));
  let file: unknown = artifact.uri;
  if (!readString(file)) {
    const index = parseLineNumber(artifact.index);
    if (index !== null && index >= 0 && index < run.artifacts.length) {
      file = readNested(run.artifacts[index], "location", "uri");
    }
  }
  const region = toRecord(readNested(physical, "region"));
  return {
    file,
    startLine: region.startLine,
    endLine: region.endLine,
    startColumn: region.startColumn,
    endColumn: region.endColumn
  };
}

function resolveCodeFlow(result: Record<string, unknown>, run: SarifRunContext): SourceLocation[] | null {
  const codeFlows = Array.isArray(result.codeFlows) ? result.codeFlows : [];
  const threadFlows = readNested(codeFlows[0], "threadFlows");
  const steps = readNested(Array.isArray(threadFlows) ? threadFlows[0] : null, "locations");
  if (!Array.isArray(steps)) return null;
  const flow: SourceLocation[] = [];
  for (const step of steps) {
    const location = tryBuildLocation(
      readPhysicalLocation(readNested(step, "location", "physicalLocation"), run)
    );
    if (location) flow.push(location);
  }
  return flow.length ? flow : null;
}

function adaptSarifResult(
  result: Record<string, unknown>,
  run: SarifRunContext,
  path: string
): AdaptedFinding {
  const rule = resolveRule(result, run);
  const ruleId = requireString(
    readString(result.ruleId) || readString(readNested(result, "rule", "id")) || rule?.id,
    `${path}.ruleId`,
    "ruleId"
  );
  const locations = Array.isArray(result.locations) ? result.locations : [];
  if (locations.length === 0) {
    throw new MalformedInputError("missing required field \"locations\"", `${path}.locations`);
  }
  const location = buildLocation(
    readPhysicalLocation(readNested(locations[0], "physicalLocation"), run),
    `${path}.locations[0]`
  );
  const tags = [
    ...readTags(readNested(rule, "properties", "tags")),
    ...readTags(readNested(result, "properties", "tags"))
  ];

  return {
    guid: readString(result.guid) || null,
    ruleId,
    severity: resolveSeverity(result, rule, path),
    location,
    message: resolveMessage(result, rule, path),
    codeFlow: resolveCodeFlow(result, run),
    tool: run.tool,
    tags: [...new Set(tags)]
  };
}

export const sarifAdapter: FindingsAdapter = {
  name: "sarif",
  accepts: (document) => Array.isArray(document.runs),
  adapt: (document) => {
    const runs = requireArray(document.runs, "runs");
    const adapted: AdaptedFinding[] = [];
    runs.forEach((rawRun, runIndex) => {
      if (!isPlainObject(rawRun)) {
        throw new MalformedInputError("expected a run object", `runs[${runIndex}]`);
      }
      const run = buildRunContext(rawRun);
      const results = rawRun.results === undefined ? [] : requireArray(rawRun.results, `runs[${runIndex}].results`);
      results.forEach((rawResult, resultIndex) => {
        const path = `runs[${runIndex}].results[${resultIndex}]`;
        if (!isPlainObject(rawResult)) {
          throw new MalformedInputError("expected a result object", path);
        }
        adapted.push(adaptSarifResult(rawResult, run, path));
      });
    });
    return adapted;
  }
};

const ADAPTERS: readonly FindingsAdapter[] = [sarifAdapter, semgrepAdapter];

function decodeInput(raw: RawFindingsInput): string {
  const text = typeof raw === "string" ? raw : new TextDecoder("utf-8").decode(raw);
  return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
}

export function parseFindingsDocument(raw: RawFindingsInput): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(decodeInput(raw));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new MalformedInputError(`not valid JSON (${message})`);
  }
  if (!isPlainObject(parsed)) {
    throw new MalformedInputError("expected a JSON object at the document root");
  }
  return parsed;
}

function freezeLocation(location: SourceLocation): Readonly<SourceLocation> {
  return Object.freeze({ ...location });
}

/**
 * Drops repeats of (rule id, file, start line, start column), keeping the
 * first occurrence, and assigns ids. Tool guids are used when unique.
 */
export function finalizeFindings(adapted: readonly AdaptedFinding[]): Finding[] {
  const seenKeys = new Set<string>();
  const seenIds = new Set<string>();
  const findings: Finding[] = [];

  for (const item of adapted) {
    const key = buildFindingDedupeKey({
      ruleId: item.ruleId,
      file: item.location.file,
      startLine: item.location.startLine,
      startColumn: item.location.startColumn
    });
    if (seenKeys.has(key)) continue;
    seenKeys.add(key);

    const id = item.guid && !seenIds.has(item.guid) ? item.guid : stableFindingId(item.tool, key);
    seenIds.add(id);

    findings.push(
      Object.freeze({
        id,
        ruleId: item.ruleId,
        severity: item.severity,
        location: freezeLocation(item.location),
        message: item.message,
        codeFlow: item.codeFlow ? Object.freeze(item.codeFlow.map(freezeLocation)) : null,
        tool: item.tool,
        tags: Object.freeze([...item.tags])
      })
    );
  }

  return findings;
}

export function ingest(raw: RawFindingsInput): Finding[] {
  const document = parseFindingsDocument(raw);
  const adapter = ADAPTERS.find((candidate) => candidate.accepts(document));
  if (!adapter) {
    throw new MalformedInputError("unrecognised findings document (expected SARIF runs or Semgrep results)");
  }
  return finalizeFindings(adapter.adapt(document));
}

export async function ingestFile(filePath: string): Promise<Finding[]> {
  const raw = await readFile(filePath);
  return ingest(raw);
}
