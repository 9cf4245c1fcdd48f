import type { LanguageId, LineRange } from "../types.js";

export type ConditionCheck = "type" | "range" | "format" | "allow-list";

export type SyntaxCall = {
  callee: string;
  range: LineRange;
  // Root identifiers of the method receiver, e.g. `allowed` in `allowed.includes(x)`.
  receiver: string | null;
  args: string[];
};

export type SyntaxCondition = {
  range: LineRange;
  identifiers: string[];
  checks: ConditionCheck[];
  calls: string[];
};

export type SyntaxAssignment = {
  target: string;
  line: number;
  sources: string[];
};

export type SyntaxDeclaration = {
  name: string;
  range: LineRange;
};

/**
 * Language-neutral view of a parsed fragment. All line numbers are absolute
 * file lines.
 */
export type SyntaxTree = {
  language: LanguageId;
  range: LineRange;
  calls: SyntaxCall[];
  conditions: SyntaxCondition[];
  assignments: SyntaxAssignment[];
  declarations: SyntaxDeclaration[];
  // Outermost statements in source order, leading comments included.
  statements: LineRange[];
};

export type ParseOptions = {
  startLine: number;
  fileName?: string;
};

export type ParseResult = { ok: true; tree: SyntaxTree } | { ok: false; reason: string };

export type LanguageModule = {
  id: LanguageId;
  parse: (source: string, options: ParseOptions) => ParseResult;
  matchCall: (tree: SyntaxTree, patterns: readonly string[]) => CallMatch[];
  matchDeclaration: (tree: SyntaxTree, range: LineRange) => SyntaxDeclaration | null;
};

export type CallMatch = {
  call: SyntaxCall;
  pattern: string;
};

export function rangeContains(outer: LineRange, inner: LineRange): boolean {
  return outer.startLine <= inner.startLine && outer.endLine >= inner.endLine;
}

export function rangeSize(range: LineRange): number {
  return range.endLine - range.startLine + 1;
}

// Innermost declaration wins; among equal sizes the later-starting one.
export function findEnclosingDeclaration(
  declarations: readonly SyntaxDeclaration[],
  range: LineRange
): SyntaxDeclaration | null {
  let best: SyntaxDeclaration | null = null;
  for (const declaration of declarations) {
    if (!rangeContains(declaration.range, range)) continue;
    if (
      !best ||
      rangeSize(declaration.range) < rangeSize(best.range) ||
      (rangeSize(declaration.range) === rangeSize(best.range) &&
        declaration.range.startLine > best.range.startLine)
    ) {
      best = declaration;
    }
  }
  return best;
}

export function uniqueStrings(values: Iterable<string>): string[] {
  return [...new Set(values)];
}
