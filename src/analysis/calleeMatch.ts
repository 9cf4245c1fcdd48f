import type { CallMatch, SyntaxTree } from "./syntax.js";

type CompiledCalleePattern = {
  source: string;
  anchored: boolean;
  segments: RegExp[];
};

const compiledCache = new Map<string, CompiledCalleePattern>();

function escapeRegex(value: string): string {
  return value.replace(/[.+?^${}()|[\]\\]/g, "\\$&");
}

function compileSegment(segment: string): RegExp {
  if (segment === "*") return /^.+$/;
  return new RegExp(`^${segment.split("*").map(escapeRegex).join(".*")}$`);
}

export function splitCallee(callee: string): string[] {
  return callee
    .split(".")
    .map((segment) => segment.trim())
    .filter(Boolean);
}

/**
 * Patterns match the trailing segments of a dotted callee. `*` stands for any
 * single segment, or any run of characters inside a segment. A leading `^`
 * anchors the pattern at the first segment of the callee.
 */
export function compileCalleePattern(pattern: string): CompiledCalleePattern {
  const cached = compiledCache.get(pattern);
  if (cached) return cached;
  const anchored = pattern.startsWith("^");
  const body = anchored ? pattern.slice(1) : pattern;
  const compiled: CompiledCalleePattern = {
    source: pattern,
    anchored,
    segments: splitCallee(body).map(compileSegment)
  };
  compiledCache.set(pattern, compiled);
  return compiled;
}

export function calleeMatches(callee: string, pattern: string): boolean {
  const compiled = compileCalleePattern(pattern);
  const segments = splitCallee(callee);
  const expected = compiled.segments.length;
  if (expected === 0 || segments.length < expected) return false;
  if (compiled.anchored && segments.length !== expected) return false;
  const offset = segments.length - expected;
  return compiled.segments.every((segmentPattern, index) => segmentPattern.test(segments[offset + index]));
}

export function firstMatchingPattern(callee: string, patterns: readonly string[]): string | null {
  for (const pattern of patterns) {
    if (calleeMatches(callee, pattern)) return pattern;
  }
  return null;
}

export function matchCalls(tree: SyntaxTree, patterns: readonly string[]): CallMatch[] {
  const matches: CallMatch[] = [];
  if (patterns.length === 0) return matches;
  for (const call of tree.calls) {
    const pattern = firstMatchingPattern(call.callee, patterns);
    if (pattern) matches.push({ call, pattern });
  }
  return matches;
}
