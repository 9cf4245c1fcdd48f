import path from "node:path";
import { createHash } from "node:crypto";
import type { Stats } from "node:fs";
import { readFile, stat } from "node:fs/promises";
import type { CodeContext, ContextLine, Finding, LanguageId, LineRange } from "../types.js";
import { SourceUnavailableError } from "../errors/context.errors.js";
import { languageModuleFor } from "../analysis/languages/index.js";
import type { LanguageModule, SyntaxDeclaration, SyntaxTree } from "../analysis/syntax.js";
import { normalizeFilepath } from "../ingest/dedupeKey.js";
import { AsyncCache } from "./asyncCache.js";
import { languageForPath } from "./languages.js";

export type ContextExtractorOptions = {
  sourceRoot: string;
  windowLines: number;
  maxFileSizeBytes: number;
  cache?: boolean;
  maxCachedTrees?: number;
};

export type SourceDocument = {
  absolutePath: string;
  relativePath: string;
  language: LanguageId;
  contentHash: string;
  lines: string[];
};

type ContextBody = {
  lines: readonly ContextLine[];
  functionRange: LineRange | null;
  functionName: string | null;
};

export function hashContent(text: string): string {
  return createHash("sha256").update(text).digest("hex");
}

export function splitSourceLines(text: string): string[] {
  const lines = text.split(/\r?\n/);
  if (lines.length > 1 && lines[lines.length - 1] === "") lines.pop();
  return lines;
}

export function toPosixRelative(root: string, absolutePath: string): string {
  return path.relative(root, absolutePath).split(path.sep).join("/");
}

function errorCode(err: unknown): string | null {
  if (err && typeof err === "object" && "code" in err && typeof err.code === "string") return err.code;
  return null;
}

/**
 * Moves the edges of a fallback window off statements they would cut in
 * half: an edge shrinks past a statement that stays clear of the focus and
 * grows over one that reaches into it.
 */
export function snapToStatements(
  window: LineRange,
  focus: LineRange,
  statements: readonly LineRange[]
): LineRange {
  let { startLine, endLine } = window;
  for (const statement of statements) {
    if (statement.startLine < startLine && statement.endLine >= startLine) {
      startLine = statement.endLine < focus.startLine ? statement.endLine + 1 : statement.startLine;
    }
  }
  for (const statement of statements) {
    if (statement.startLine <= endLine && statement.endLine > endLine) {
      endLine = statement.startLine > focus.endLine ? statement.startLine - 1 : statement.endLine;
    }
  }
  return { startLine, endLine };
}

export function emptyContext(finding: Finding): CodeContext {
  return Object.freeze({
    findingId: finding.id,
    file: normalizeFilepath(finding.location.file),
    language: languageForPath(finding.location.file),
    contentHash: null,
    lines: Object.freeze([]),
    focus: Object.freeze({ startLine: finding.location.startLine, endLine: finding.location.endLine }),
    flowLines: Object.freeze([]),
    functionRange: null,
    functionName: null,
    empty: true
  });
}

/**
 * Reads the code around a finding: a window of lines widened to the
 * enclosing function when the language module can find one, and otherwise
 * kept to whole top-level statements.
 */
export class ContextExtractor {
  readonly sourceRoot: string;
  private readonly windowLines: number;
  private readonly maxFileSizeBytes: number;
  private readonly cacheEnabled: boolean;
  private readonly documents = new AsyncCache<string, SourceDocument>({ maxEntries: 512 });
  private readonly trees: AsyncCache<string, SyntaxTree | null>;
  private readonly bodies = new AsyncCache<string, ContextBody>({ maxEntries: 4096 });

  constructor(options: ContextExtractorOptions) {
    this.sourceRoot = path.resolve(options.sourceRoot);
    this.windowLines = options.windowLines;
    this.maxFileSizeBytes = options.maxFileSizeBytes;
    this.cacheEnabled = options.cache ?? true;
    this.trees = new AsyncCache<string, SyntaxTree | null>({ maxEntries: options.maxCachedTrees ?? 128 });
  }

  get cachedTrees(): number {
    return this.trees.size;
  }

  async extract(finding: Finding): Promise<CodeContext> {
    const document = await this.loadDocument(finding.id, finding.location.file);
    const { startLine, endLine } = finding.location;
    if (endLine > document.lines.length) {
      throw new SourceUnavailableError({
        findingId: finding.id,
        filePath: document.relativePath,
        reason: "stale",
        detail: `line ${endLine} is beyond the end of the file (${document.lines.length} lines)`
      });
    }

    const bodyKey = `${document.contentHash}:${startLine}:${endLine}`;
    const computeBody = async () => this.buildBody(document, { startLine, endLine });
    const body = this.cacheEnabled ? await this.bodies.getOrCreate(bodyKey, computeBody) : await computeBody();

    return Object.freeze({
      findingId: finding.id,
      file: document.relativePath,
      language: document.language,
      contentHash: document.contentHash,
      lines: body.lines,
      focus: Object.freeze({ startLine, endLine }),
      flowLines: Object.freeze(this.flowLinesFor(finding, document, body)),
      functionRange: body.functionRange,
      functionName: body.functionName,
      empty: false
    });
  }

  async loadDocument(findingId: string, filePath: string): Promise<SourceDocument> {
    const absolutePath = this.resolveInsideRoot(findingId, filePath);
    const relativePath = toPosixRelative(this.sourceRoot, absolutePath);
    const fail = (reason: "missing" | "unreadable" | "too-large", detail?: string) =>
      new SourceUnavailableError({ findingId, filePath: relativePath, reason, detail });

    let info: Stats;
    try {
      info = await stat(absolutePath);
    } catch (err) {
      const code = errorCode(err);
      throw code === "ENOENT" || code === "ENOTDIR" ? fail("missing") : fail("unreadable", code ?? undefined);
    }
    if (!info.isFile()) throw fail("missing", "not a regular file");
    if (info.size > this.maxFileSizeBytes) {
      throw fail("too-large", `${info.size} bytes exceeds ${this.maxFileSizeBytes}`);
    }

    const load = async (): Promise<SourceDocument> => {
      let text: string;
      try {
        text = await readFile(absolutePath, "utf-8");
      } catch (err) {
        throw fail(errorCode(err) === "ENOENT" ? "missing" : "unreadable", errorCode(err) ?? undefined);
      }
      return {
        absolutePath,
        relativePath,
        language: languageForPath(absolutePath),
        contentHash: hashContent(text),
        lines: splitSourceLines(text)
      };
    };

    if (!this.cacheEnabled) return load();
    return this.documents.getOrCreate(`${absolutePath}:${info.mtimeMs}:${info.size}`, load);
  }

  private resolveInsideRoot(findingId: string, filePath: string): string {
    const absolutePath = path.resolve(this.sourceRoot, normalizeFilepath(filePath));
    const relative = path.relative(this.sourceRoot, absolutePath);
    if (!relative || relative === ".." || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative)) {
      throw new SourceUnavailableError({ findingId, filePath, reason: "outside-root" });
    }
    return absolutePath;
  }

  private async treeFor(document: SourceDocument, languageModule: LanguageModule): Promise<SyntaxTree | null> {
    const parse = async () => {
      const parsed = languageModule.parse(document.lines.join("\n"), {
        startLine: 1,
        fileName: document.relativePath
      });
      return parsed.ok ? parsed.tree : null;
    };
    if (!this.cacheEnabled) return parse();
    return this.trees.getOrCreate(`${document.language}:${document.contentHash}`, parse);
  }

  private async buildBody(document: SourceDocument, focus: LineRange): Promise<ContextBody> {
    const total = document.lines.length;
    let from = Math.max(1, focus.startLine - this.windowLines);
    let to = Math.min(total, focus.endLine + this.windowLines);

    const languageModule = languageModuleFor(document.language);
    const tree = languageModule ? await this.treeFor(document, languageModule) : null;
    const enclosing: SyntaxDeclaration | null =
      languageModule && tree ? languageModule.matchDeclaration(tree, focus) : null;
    if (enclosing) {
      from = Math.min(from, enclosing.range.startLine);
      to = Math.max(to, enclosing.range.endLine);
    } else if (tree) {
      const snapped = snapToStatements({ startLine: from, endLine: to }, focus, tree.statements);
      from = snapped.startLine;
      to = snapped.endLine;
    }

    const lines: ContextLine[] = [];
    for (let number = from; number <= to; number += 1) {
      lines.push(Object.freeze({ number, text: document.lines[number - 1] }));
    }
    return {
      lines: Object.freeze(lines),
      functionRange: enclosing ? Object.freeze({ ...enclosing.range }) : null,
      functionName: enclosing?.name ?? null
    };
  }

  private flowLinesFor(finding: Finding, document: SourceDocument, body: ContextBody): number[] {
    if (!finding.codeFlow || body.lines.length === 0) return [];
    const first = body.lines[0].number;
    const last = body.lines[body.lines.length - 1].number;
    const lines = new Set<number>();
    for (const step of finding.codeFlow) {
      const stepPath = path.resolve(this.sourceRoot, normalizeFilepath(step.file));
      if (stepPath !== document.absolutePath) continue;
      if (step.startLine >= first && step.startLine <= last) lines.add(step.startLine);
    }
    return [...lines].sort((a, b) => a - b);
  }
}

