import type { Severity, SourceLocation } from "../types.js";
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
import { isPlainObject, readString, toRecord } from "./dedupeKey.js";

const SEMGREP_SEVERITIES: Record<string, Severity> = {
  critical: "critical",
  error: "high",
  high: "high",
  warning: "medium",
  medium: "medium",
  info: "low",
  low: "low",
  inventory: "info",
  experiment: "info"
};

function readSeverity(extra: Record<string, unknown>, path: string): Severity {
  const raw = readString(extra.severity) || "WARNING";
  const severity = SEMGREP_SEVERITIES[raw.toLowerCase()];
  if (!severity) {
    throw new MalformedInputError(`unknown severity "${raw}"`, `${path}.extra.severity`);
  }
  return severity;
}

function readCliLocation(value: unknown, fallbackPath: unknown): SourceLocation | null {
  const location = toRecord(value);
  return tryBuildLocation({
    file: location.path ?? fallbackPath,
    startLine: readNested(location, "start", "line"),
    endLine: readNested(location, "end", "line"),
    startColumn: readNested(location, "start", "col"),
    endColumn: readNested(location, "end", "col")
  });
}

// Trace entries are either ["CliLoc", [location, content]] or ["CliCall", [[location, content], vars]].
function readTraceNode(node: unknown, fallbackPath: unknown): SourceLocation[] {
  if (!Array.isArray(node) || node.length < 2) return [];
  const [kind, payload] = node;
  if (kind === "CliLoc" && Array.isArray(payload)) {
    const location = readCliLocation(payload[0], fallbackPath);
    return location ? [location] : [];
  }
  if (kind === "CliCall" && Array.isArray(payload) && Array.isArray(payload[0])) {
    const location = readCliLocation(payload[0][0], fallbackPath);
    return location ? [location] : [];
  }
  return [];
}

function readDataflowTrace(extra: Record<string, unknown>, fallbackPath: unknown): SourceLocation[] | null {
  const trace = toRecord(extra.dataflow_trace);
  if (Object.keys(trace).length === 0) return null;
  const flow: SourceLocation[] = [...readTraceNode(trace.taint_source, fallbackPath)];
  const intermediates = Array.isArray(trace.intermediate_vars) ? trace.intermediate_vars : [];
  for (const variable of intermediates) {
    const location = readCliLocation(readNested(variable, "location"), fallbackPath);
    if (location) flow.push(location);
  }
  flow.push(...readTraceNode(trace.taint_sink, fallbackPath));
  return flow.length ? flow : null;
}

function readMetadataTags(metadata: Record<string, unknown>): string[] {
  const tags: string[] = [];
  for (const key of ["cwe", "owasp", "category"]) {
    const value = metadata[key];
    const entries = typeof value === "string" ? [value] : readTags(value);
    for (const entry of entries) {
      if (entry && !tags.includes(entry)) tags.push(entry);
    }
  }
  return tags;
}

function adaptSemgrepResult(result: Record<string, unknown>, path: string): AdaptedFinding {
  const extra = toRecord(result.extra);
  const ruleId = requireString(result.check_id, `${path}.check_id`, "check_id");
  const location = buildLocation(
    {
      file: result.path,
      startLine: readNested(result, "start", "line"),
      endLine: readNested(result, "end", "line"),
      startColumn: readNested(result, "start", "col"),
      endColumn: readNested(result, "end", "col")
    },
    path
  );
  const message = requireString(extra.message, `${path}.extra.message`, "message");

  return {
    guid: null,
    ruleId,
    severity: readSeverity(extra, path),
    location,
    message,
    codeFlow: readDataflowTrace(extra, result.path),
    tool: "semgrep",
    tags: readMetadataTags(toRecord(extra.metadata))
  };
}

export const semgrepAdapter: FindingsAdapter = {
  name: "semgrep",
  accepts: (document) => Array.isArray(document.results) && !("runs" in document),
  adapt: (document) => {
    const results = requireArray(document.results, "results");
    return results.map((rawResult, index) => {
      const path = `results[${index}]`;
      if (!isPlainObject(rawResult)) {
        throw new MalformedInputError("expected a result object", path);
      }
      return adaptSemgrepResult(rawResult, path);
    });
  }
};
