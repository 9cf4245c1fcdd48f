import type { AstPattern, CodeContext, LineRange, PatternSet, PatternTag } from "../types.js";
import { ParseDegradedWarning } from "../errors/analysis.errors.js";
import { patternFamilyFor, type PatternListsByFamily } from "../config/patternLists.js";
import { noopLogger, type Logger } from "../logging/logger.js";
import { languageModuleFor } from "./languages/index.js";
import { PATTERN_MATCHERS, computeTaint, type MatcherContext } from "./matchers.js";

export type AnalysisResult = {
  patterns: PatternSet;
  warning: ParseDegradedWarning | null;
};

const TAG_ORDER: Record<PatternTag, number> = {
  validation: 0,
  sanitizer: 1,
  "framework-guard": 2,
  "unsafe-call": 3,
  none: 4
};

function comparePatterns(a: AstPattern, b: AstPattern): number {
  return (
    TAG_ORDER[a.tag] - TAG_ORDER[b.tag] ||
    a.range.startLine - b.range.startLine ||
    a.range.endLine - b.range.endLine ||
    (a.rule < b.rule ? -1 : a.rule > b.rule ? 1 : 0)
  );
}

// Set semantics over (tag, range); the first rule in sort order is kept.
export function toPatternSet(patterns: readonly AstPattern[]): PatternSet {
  const seen = new Set<string>();
  const unique: AstPattern[] = [];
  for (const pattern of [...patterns].sort(comparePatterns)) {
    const key = `${pattern.tag}:${pattern.range.startLine}:${pattern.range.endLine}`;
    if (seen.has(key)) continue;
    seen.add(key);
    unique.push(Object.freeze({ tag: pattern.tag, range: Object.freeze({ ...pattern.range }), rule: pattern.rule }));
  }
  return Object.freeze(unique);
}

function fragmentOf(context: CodeContext): { text: string; startLine: number } | null {
  const range: LineRange | null = context.functionRange;
  const lines = range
    ? context.lines.filter((line) => line.number >= range.startLine && line.number <= range.endLine)
    : context.lines;
  if (lines.length === 0) return null;
  return { text: lines.map((line) => line.text).join("\n"), startLine: lines[0].number };
}

const EMPTY_RESULT: AnalysisResult = Object.freeze({ patterns: Object.freeze([]), warning: null });

export function analyzeContext(context: CodeContext, lists: PatternListsByFamily): AnalysisResult {
  if (context.empty) return EMPTY_RESULT;

  const warn = (reason: string): AnalysisResult => ({
    patterns: Object.freeze([]),
    warning: new ParseDegradedWarning(context.findingId, context.language, reason)
  });

  const language = languageModuleFor(context.language);
  const family = patternFamilyFor(context.language);
  if (!language || !family) return warn(`no structural parser for ${context.language}`);

  const fragment = fragmentOf(context);
  if (!fragment) return warn("no source lines in context");

  const parsed = language.parse(fragment.text, { startLine: fragment.startLine, fileName: context.file });
  if (!parsed.ok) return warn(parsed.reason);

  const sinkLines = new Set<number>(context.flowLines);
  for (let line = context.focus.startLine; line <= context.focus.endLine; line += 1) sinkLines.add(line);

  const matcherContext: MatcherContext = {
    tree: parsed.tree,
    language,
    lists: lists[family],
    focus: context.focus,
    sinkLines,
    tainted: computeTaint(parsed.tree, sinkLines)
  };

  const patterns: AstPattern[] = [];
  for (const matcher of PATTERN_MATCHERS) {
    for (const hit of matcher.match(matcherContext)) {
      patterns.push({ tag: matcher.tag, range: hit.range, rule: hit.rule });
    }
  }
  if (patterns.length === 0) {
    patterns.push({ tag: "none", range: parsed.tree.range, rule: `${language.id}/none` });
  }
  return { patterns: toPatternSet(patterns), warning: null };
}

type CachedAnalysis = {
  contentHash: string | null;
  result: AnalysisResult;
};

export type PatternAnalyzerOptions = {
  patternLists: PatternListsByFamily;
  cache?: boolean;
  logger?: Logger;
};

/**
 * Caches results per finding id; an entry is recomputed when the context's
 * content hash no longer matches.
 */
export class PatternAnalyzer {
  private readonly lists: PatternListsByFamily;
  private readonly cacheEnabled: boolean;
  private readonly logger: Logger;
  private readonly cache = new Map<string, CachedAnalysis>();

  constructor(options: PatternAnalyzerOptions) {
    this.lists = options.patternLists;
    this.cacheEnabled = options.cache ?? true;
    this.logger = options.logger ?? noopLogger;
  }

  analyze(context: CodeContext): AnalysisResult {
    const cached = this.cacheEnabled ? this.cache.get(context.findingId) : undefined;
    if (cached && cached.contentHash === context.contentHash) return cached.result;

    const result = analyzeContext(context, this.lists);
    if (result.warning) {
      this.logger.warn("Structural analysis degraded", {
        findingId: context.findingId,
        signal: result.warning.signal,
        language: context.language,
        reason: result.warning.reason
      });
    }
    if (this.cacheEnabled) {
      this.cache.set(context.findingId, { contentHash: context.contentHash, result });
    }
    return result;
  }

  get cachedEntries(): number {
    return this.cache.size;
  }
}
