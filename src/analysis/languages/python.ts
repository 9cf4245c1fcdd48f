import type { LineRange } from "../../types.js";
import { matchCalls } from "../calleeMatch.js";
import {
  findEnclosingDeclaration,
  uniqueStrings,
  type ConditionCheck,
  type LanguageModule,
  type ParseOptions,
  type ParseResult,
  type SyntaxAssignment,
  type SyntaxCall,
  type SyntaxCondition,
  type SyntaxDeclaration
} from "../syntax.js";

type LineStart = { offset: number; line: number };

type LogicalLine = {
  text: string;
  indent: number;
  startLine: number;
  endLine: number;
  starts: LineStart[];
};

type StringState = {
  quote: string;
  triple: boolean;
  raw: boolean;
  format: boolean;
  braceDepth: number;
  expression: string;
  expressions: string[];
};

type SplitResult = { ok: true; lines: LogicalLine[] } | { ok: false; reason: string };

const KEYWORDS = new Set([
  "and",
  "or",
  "not",
  "in",
  "is",
  "None",
  "True",
  "False",
  "lambda",
  "if",
  "else",
  "elif",
  "for",
  "while",
  "return",
  "yield",
  "await",
  "async",
  "def",
  "class",
  "import",
  "from",
  "as",
  "with",
  "try",
  "except",
  "finally",
  "raise",
  "pass",
  "break",
  "continue",
  "global",
  "nonlocal",
  "del",
  "assert"
]);

const STATEMENT_KEYWORDS =
  /^(?:async\s+)?(?:def|class|if|elif|else|while|for|with|return|assert|import|from|raise|del|try|except|finally|yield|global|nonlocal|pass|break|continue|lambda)\b/;

const OPENERS: Record<string, string> = { ")": "(", "]": "[", "}": "{" };

const STRING_PREFIX = /(?:^|[^\w])([rRbBuUfF]{1,2})$/;

function indentWidth(line: string): number {
  let width = 0;
  for (const char of line) {
    if (char === " ") width += 1;
    else if (char === "\t") width += 8 - (width % 8);
    else break;
  }
  return width;
}

function closeString(state: StringState): string {
  if (state.format && state.expressions.length) {
    return `(${state.expressions.join(", ")})`;
  }
  return "\"\"";
}

/**
 * Joins physical lines into logical lines: bracket and backslash
 * continuations are folded, comments dropped and string bodies blanked
 * (f-string expressions are kept as a parenthesised tuple).
 */
function splitLogicalLines(source: string, startLine: number): SplitResult {
  const physical = source.split("\n");
  const lines: LogicalLine[] = [];
  const brackets: string[] = [];
  let current: LogicalLine | null = null;
  let literal: StringState | null = null;

  for (let index = 0; index < physical.length; index += 1) {
    const raw = physical[index].replace(/\r$/, "");
    const lineNumber = startLine + index;
    let column = 0;

    if (!current) {
      const trimmed = raw.trim();
      if (!trimmed || trimmed.startsWith("#")) continue;
      const indent = indentWidth(raw);
      current = { text: "", indent, startLine: lineNumber, endLine: lineNumber, starts: [] };
      column = raw.length - raw.trimStart().length;
    } else {
      current.text += literal ? "" : " ";
      current.endLine = lineNumber;
    }
    current.starts.push({ offset: current.text.length, line: lineNumber });

    let continued = false;
    while (column < raw.length) {
      const char = raw[column];

      if (literal) {
        if (char === "\\" && !literal.raw) {
          if (column === raw.length - 1) {
            continued = true;
          }
          column += 2;
          continue;
        }
        if (literal.format && char === "{") {
          if (literal.braceDepth === 0 && raw[column + 1] === "{") {
            column += 2;
            continue;
          }
          if (literal.braceDepth > 0) literal.expression += char;
          literal.braceDepth += 1;
          column += 1;
          continue;
        }
        if (literal.format && literal.braceDepth > 0) {
          if (char === "}") {
            literal.braceDepth -= 1;
            if (literal.braceDepth === 0) {
              const expression = literal.expression.split(/(?<![=!<>])[:!](?!=)/)[0].trim();
              if (expression) literal.expressions.push(expression);
              literal.expression = "";
            } else {
              literal.expression += char;
            }
          } else {
            literal.expression += char;
          }
          column += 1;
          continue;
        }
        if (raw.startsWith(literal.quote, column)) {
          current.text += closeString(literal);
          column += literal.quote.length;
          literal = null;
          continue;
        }
        column += 1;
        continue;
      }

      if (char === "#") break;

      if (char === "\"" || char === "'") {
        const triple = raw.startsWith(char.repeat(3), column);
        const prefixMatch = STRING_PREFIX.exec(current.text);
        const prefix = prefixMatch ? prefixMatch[1].toLowerCase() : "";
        if (prefix) current.text = current.text.slice(0, current.text.length - prefix.length);
        literal = {
          quote: triple ? char.repeat(3) : char,
          triple,
          raw: prefix.includes("r"),
          format: prefix.includes("f"),
          braceDepth: 0,
          expression: "",
          expressions: []
        };
        column += literal.quote.length;
        continue;
      }

      if (char === "(" || char === "[" || char === "{") {
        brackets.push(char);
      } else if (char === ")" || char === "]" || char === "}") {
        if (brackets.pop() !== OPENERS[char]) {
          return { ok: false, reason: `unbalanced "${char}" on line ${lineNumber}` };
        }
      } else if (char === "\\" && raw.slice(column + 1).trim() === "") {
        continued = true;
        break;
      }

      current.text += char;
      column += 1;
    }

    if (literal && !literal.triple && !continued) {
      return { ok: false, reason: `unterminated string on line ${lineNumber}` };
    }
    if (!literal && brackets.length === 0 && !continued) {
      current.text = current.text.trimEnd();
      if (current.text) lines.push(current);
      current = null;
    }
  }

  if (literal) {
    return { ok: false, reason: "unterminated string at end of fragment" };
  }
  if (brackets.length) {
    return { ok: false, reason: `unclosed "${brackets[brackets.length - 1]}" at end of fragment` };
  }
  if (current) {
    return { ok: false, reason: "line continuation at end of fragment" };
  }
  return { ok: true, lines };
}

function lineAt(line: LogicalLine, offset: number): number {
  let result = line.startLine;
  for (const start of line.starts) {
    if (start.offset > offset) break;
    result = start.line;
  }
  return result;
}

const IDENTIFIER_PATH = /[A-Za-z_]\w*(?:\s*\.\s*[A-Za-z_]\w*)*/g;

function previousNonSpace(text: string, index: number): { char: string; index: number } {
  let cursor = index - 1;
  while (cursor >= 0 && /\s/.test(text[cursor])) cursor -= 1;
  return { char: cursor >= 0 ? text[cursor] : "", index: cursor };
}

function nextNonSpace(text: string, index: number): { char: string; index: number } {
  let cursor = index;
  while (cursor < text.length && /\s/.test(text[cursor])) cursor += 1;
  return { char: cursor < text.length ? text[cursor] : "", index: cursor };
}

function rootOf(segments: string[]): string {
  if ((segments[0] === "self" || segments[0] === "cls") && segments.length > 1) {
    return `${segments[0]}.${segments[1]}`;
  }
  return segments[0];
}

export function pythonIdentifiers(text: string): string[] {
  const found = new Set<string>();
  for (const match of text.matchAll(IDENTIFIER_PATH)) {
    const start = match.index ?? 0;
    const before = previousNonSpace(text, start);
    if (before.char === "." || /\w/.test(text[start - 1] ?? "")) continue;
    const segments = match[0].split(".").map((segment) => segment.trim());
    if (KEYWORDS.has(segments[0])) continue;
    const after = nextNonSpace(text, start + match[0].length);
    if (after.char === "(" && segments.length === 1) continue;
    if (after.char === "=" && text[after.index + 1] !== "=") continue;
    // a trailing method call leaves the receiver as the value read
    found.add(rootOf(after.char === "(" ? segments.slice(0, -1) : segments));
  }
  return [...found];
}

function findClosing(text: string, openIndex: number): number {
  let depth = 0;
  for (let index = openIndex; index < text.length; index += 1) {
    const char = text[index];
    if (char === "(" || char === "[" || char === "{") depth += 1;
    else if (char === ")" || char === "]" || char === "}") {
      depth -= 1;
      if (depth === 0) return index;
    }
  }
  return text.length - 1;
}

const CALL_PATTERN = /([A-Za-z_]\w*(?:\s*\.\s*[A-Za-z_]\w*)*)\s*\(/g;

function collectCalls(line: LogicalLine): SyntaxCall[] {
  const calls: SyntaxCall[] = [];
  const calleeByClose = new Map<number, string>();
  const text = line.text;
  CALL_PATTERN.lastIndex = 0;

  for (let match = CALL_PATTERN.exec(text); match; match = CALL_PATTERN.exec(text)) {
    const start = match.index;
    const segments = match[1].split(".").map((segment) => segment.trim());
    const openIndex = start + match[0].length - 1;
    const head = text.slice(0, start);
    if (KEYWORDS.has(segments[0]) || /\b(?:def|class)\s+$/.test(head)) continue;

    const before = previousNonSpace(text, start);
    let callee = segments.join(".");
    let receiver: string | null = null;
    if (before.char === ".") {
      const beneath = previousNonSpace(text, before.index);
      const inner = beneath.char === ")" ? calleeByClose.get(beneath.index) : undefined;
      callee = `${inner ? `${inner}()` : "<expr>"}.${callee}`;
    } else if (/\w/.test(text[start - 1] ?? "")) {
      continue;
    } else if (segments.length > 1) {
      receiver = rootOf(segments.slice(0, -1));
    }

    const closeIndex = findClosing(text, openIndex);
    calleeByClose.set(closeIndex, callee);
    calls.push({
      callee,
      range: { startLine: lineAt(line, start), endLine: lineAt(line, closeIndex) },
      receiver,
      args: pythonIdentifiers(text.slice(openIndex + 1, closeIndex))
    });
  }
  return calls;
}

// Index of the first character at bracket depth zero matching `accept`.
function findTopLevel(text: string, from: number, accept: (index: number) => boolean): number {
  let depth = 0;
  for (let index = from; index < text.length; index += 1) {
    const char = text[index];
    if (char === "(" || char === "[" || char === "{") depth += 1;
    else if (char === ")" || char === "]" || char === "}") depth -= 1;
    else if (depth === 0 && accept(index)) return index;
  }
  return -1;
}

function splitTopLevel(text: string, separator: string): string[] {
  const parts: string[] = [];
  let from = 0;
  for (;;) {
    const index = findTopLevel(text, from, (cursor) => text[cursor] === separator);
    if (index === -1) break;
    parts.push(text.slice(from, index));
    from = index + 1;
  }
  parts.push(text.slice(from));
  return parts;
}

function conditionChecks(text: string): ConditionCheck[] {
  const checks = new Set<ConditionCheck>();
  if (/\b(?:isinstance|issubclass|type)\s*\(/.test(text)) checks.add("type");
  if (/[^<>=!]\s*(?:<=|>=|<|>)\s*[^<>=]/.test(text)) checks.add("range");
  if (/\bin\b/.test(text) || /(?:==|!=)\s*(?:""|-?\d)|(?:""|\d)\s*(?:==|!=)/.test(text)) {
    checks.add("allow-list");
  }
  if (
    /\.(?:match|fullmatch|search|startswith|endswith|isdigit|isalnum|isalpha|isnumeric|isdecimal|isidentifier|isascii)\s*\(/.test(
      text
    )
  ) {
    checks.add("format");
  }
  return [...checks];
}

function buildCondition(line: LogicalLine, from: number, to: number): SyntaxCondition {
  const text = line.text.slice(from, to);
  const calls: string[] = [];
  for (const match of text.matchAll(CALL_PATTERN)) {
    const callee = match[1].replace(/\s+/g, "");
    if (!KEYWORDS.has(callee.split(".")[0])) calls.push(callee);
  }
  return {
    range: { startLine: lineAt(line, from), endLine: lineAt(line, Math.max(from, to - 1)) },
    identifiers: pythonIdentifiers(text),
    checks: conditionChecks(text),
    calls: uniqueStrings(calls)
  };
}

function collectCondition(line: LogicalLine): SyntaxCondition | null {
  const text = line.text;
  const keyword = /^(if|elif|while|assert)\b/.exec(text);
  if (!keyword) return null;
  const from = keyword[0].length;
  if (keyword[1] === "assert") {
    const comma = findTopLevel(text, from, (index) => text[index] === ",");
    return buildCondition(line, from, comma === -1 ? text.length : comma);
  }
  const colon = findTopLevel(text, from, (index) => text[index] === ":" && text[index + 1] !== "=");
  return buildCondition(line, from, colon === -1 ? text.length : colon);
}

function assignmentTargets(text: string): string[] {
  const targets: string[] = [];
  for (const part of splitTopLevel(text, ",")) {
    const cleaned = part.replace(/^[\s([*]+|[\s)\]]+$/g, "").split(":")[0].trim();
    const match = /^[A-Za-z_]\w*(?:\s*\.\s*[A-Za-z_]\w*)*/.exec(cleaned);
    if (match && !KEYWORDS.has(match[0])) {
      targets.push(rootOf(match[0].split(".").map((segment) => segment.trim())));
    }
  }
  return targets;
}

function collectAssignments(line: LogicalLine): SyntaxAssignment[] {
  const text = line.text;
  const assignments: SyntaxAssignment[] = [];
  const push = (targets: string[], value: string, offset: number) => {
    const sources = pythonIdentifiers(value);
    const at = lineAt(line, offset);
    for (const target of targets) assignments.push({ target, line: at, sources });
  };

  for (const match of text.matchAll(/([A-Za-z_]\w*)\s*:=/g)) {
    const offset = (match.index ?? 0) + match[0].length;
    push([match[1]], text.slice(offset), offset);
  }

  const loop = /^(?:async\s+)?for\s+(.+?)\s+in\s+(.+)$/.exec(text);
  if (loop) {
    const colon = findTopLevel(loop[2], 0, (index) => loop[2][index] === ":");
    push(assignmentTargets(loop[1]), colon === -1 ? loop[2] : loop[2].slice(0, colon), 0);
    return assignments;
  }

  const withStatement = /^(?:async\s+)?with\s+(.+)$/.exec(text);
  if (withStatement) {
    for (const item of splitTopLevel(withStatement[1].replace(/:\s*$/, ""), ",")) {
      const alias = /^(.*)\bas\s+([A-Za-z_]\w*)\s*$/.exec(item.trim());
      if (alias) push([alias[2]], alias[1], 0);
    }
    return assignments;
  }

  if (STATEMENT_KEYWORDS.test(text)) return assignments;

  const parts: string[] = [];
  let from = 0;
  for (;;) {
    const index = findTopLevel(
      text,
      from,
      (cursor) =>
        text[cursor] === "=" &&
        text[cursor + 1] !== "=" &&
        !"=!<>:".includes(text[cursor - 1] ?? "")
    );
    if (index === -1) break;
    parts.push(text.slice(from, index).replace(/(?:\*\*|\/\/|>>|<<|[-+*/%|&^@])$/, ""));
    from = index + 1;
  }
  if (parts.length === 0) return assignments;
  const value = text.slice(from);
  push(
    parts.flatMap((part) => assignmentTargets(part)),
    value,
    from
  );
  return assignments;
}

function declarationRange(lines: LogicalLine[], index: number): LineRange {
  const header = lines[index];
  let startLine = header.startLine;
  for (let cursor = index - 1; cursor >= 0; cursor -= 1) {
    const previous = lines[cursor];
    if (previous.indent !== header.indent || !previous.text.startsWith("@")) break;
    startLine = previous.startLine;
  }
  let endLine = header.endLine;
  for (let cursor = index + 1; cursor < lines.length; cursor += 1) {
    if (lines[cursor].indent <= header.indent) break;
    endLine = lines[cursor].endLine;
  }
  return { startLine, endLine };
}

function checkIndentation(lines: LogicalLine[]): string | null {
  for (let index = 1; index < lines.length; index += 1) {
    const previous = lines[index - 1];
    if (lines[index].indent > previous.indent && !previous.text.endsWith(":")) {
      return `unexpected indent on line ${lines[index].startLine}`;
    }
  }
  return null;
}

export function parsePythonFragment(source: string, options: ParseOptions): ParseResult {
  const split = splitLogicalLines(source, options.startLine);
  if (!split.ok) return split;
  const lines = split.lines;
  const indentError = checkIndentation(lines);
  if (indentError) return { ok: false, reason: indentError };

  const calls: SyntaxCall[] = [];
  const conditions: SyntaxCondition[] = [];
  const assignments: SyntaxAssignment[] = [];
  const declarations: SyntaxDeclaration[] = [];
  const statements: LineRange[] = [];
  const outerIndent = Math.min(...lines.map((line) => line.indent));

  lines.forEach((line, index) => {
    // Decorators belong to the definition below them.
    if (line.indent === outerIndent && !line.text.startsWith("@")) statements.push(declarationRange(lines, index));
    const definition = /^(?:async\s+)?def\s+([A-Za-z_]\w*)\s*\(/.exec(line.text);
    if (definition) {
      declarations.push({ name: definition[1], range: declarationRange(lines, index) });
    }
    calls.push(...collectCalls(line));
    const condition = collectCondition(line);
    if (condition) conditions.push(condition);
    assignments.push(...collectAssignments(line));
  });

  return {
    ok: true,
    tree: {
      language: "python",
      range: { startLine: options.startLine, endLine: options.startLine + source.split("\n").length - 1 },
      calls,
      conditions,
      assignments,
      declarations,
      statements
    }
  };
}

export const pythonLanguage: LanguageModule = {
  id: "python",
  parse: parsePythonFragment,
  matchCall: matchCalls,
  matchDeclaration: (tree, range) => findEnclosingDeclaration(tree.declarations, range)
};
