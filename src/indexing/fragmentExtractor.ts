import type { CodeContext, FragmentLocation, LanguageId, PatternTag } from "../types.js";
import type { PatternListsByFamily } from "../config/patternLists.js";
import { analyzeContext } from "../analysis/patternAnalyzer.js";
import { languageModuleFor } from "../analysis/languages/index.js";
import type { SyntaxDeclaration } from "../analysis/syntax.js";
import { hashContent, splitSourceLines } from "../context/contextExtractor.js";

export type CodeFragment = {
  id: string;
  location: FragmentLocation;
  language: LanguageId;
  name: string | null;
  text: string;
  format: "declaration" | "line-window";
};

export type FragmentExtractionOptions = {
  // Line count of the fallback windows for files without declarations.
  windowSize: number;
};

// Same text, same id: a fragment that moves keeps its embedding.
export function fragmentIdFor(text: string): string {
  return hashContent(text);
}

function sliceLines(lines: readonly string[], startLine: number, endLine: number): string {
  return lines.slice(startLine - 1, endLine).join("\n");
}

function compareDeclarations(a: SyntaxDeclaration, b: SyntaxDeclaration): number {
  return a.range.startLine - b.range.startLine || b.range.endLine - a.range.endLine;
}

/**
 * Splits a source file into function-level fragments, one per declaration
 * the language module finds (nested ones included). Files that cannot be
 * parsed, or that declare nothing, fall back to fixed line windows.
 */
export function extractFragments(
  file: string,
  language: LanguageId,
  source: string,
  options: FragmentExtractionOptions
): CodeFragment[] {
  const lines = splitSourceLines(source);
  if (lines.length === 0 || (lines.length === 1 && !lines[0].trim())) return [];

  const parsed = languageModuleFor(language)?.parse(lines.join("\n"), { startLine: 1, fileName: file });
  const declarations = parsed?.ok ? [...parsed.tree.declarations].sort(compareDeclarations) : [];

  const fragments: CodeFragment[] = [];
  const seen = new Set<string>();
  const push = (startLine: number, endLine: number, name: string | null, format: CodeFragment["format"]) => {
    const text = sliceLines(lines, startLine, endLine);
    if (!text.trim()) return;
    const id = fragmentIdFor(text);
    if (seen.has(id)) return;
    seen.add(id);
    fragments.push({ id, location: { file, startLine, endLine }, language, name, text, format });
  };

  if (declarations.length) {
    for (const declaration of declarations) {
      push(declaration.range.startLine, declaration.range.endLine, declaration.name, "declaration");
    }
    return fragments;
  }

  const size = Math.max(1, Math.trunc(options.windowSize));
  for (let start = 1; start <= lines.length; start += size) {
    push(start, Math.min(lines.length, start + size - 1), null, "line-window");
  }
  return fragments;
}

/**
 * The text a finding is embedded by: its enclosing declaration when the
 * context found one, otherwise the whole context window.
 */
export function contextFragmentText(context: CodeContext): string {
  const range = context.functionRange;
  const lines = range
    ? context.lines.filter((line) => line.number >= range.startLine && line.number <= range.endLine)
    : context.lines;
  return lines.map((line) => line.text).join("\n");
}

// Distinct pattern tags in a fragment, analysed as if every line were a sink.
export function fragmentPatternTags(fragment: CodeFragment, lists: PatternListsByFamily): PatternTag[] {
  const { startLine, endLine } = fragment.location;
  const context: CodeContext = {
    findingId: fragment.id,
    file: fragment.location.file,
    language: fragment.language,
    contentHash: fragment.id,
    lines: fragment.text.split("\n").map((text, offset) => ({ number: startLine + offset, text })),
    focus: { startLine, endLine },
    flowLines: [],
    functionRange: fragment.format === "declaration" ? { startLine, endLine } : null,
    functionName: fragment.name,
    empty: false
  };

  const tags: PatternTag[] = [];
  for (const pattern of analyzeContext(context, lists).patterns) {
    if (pattern.tag !== "none" && !tags.includes(pattern.tag)) tags.push(pattern.tag);
  }
  return tags;
}
