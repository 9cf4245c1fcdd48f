import assert from "node:assert/strict";
import { test } from "node:test";
import type { CodeContext, LanguageId, LineRange } from "../../types.js";
import { loadDefaultPatternLists } from "../../config/patternLists.js";
import { ParseDegradedWarning } from "../../errors/analysis.errors.js";
import type { Logger } from "../../logging/logger.js";
import { PatternAnalyzer, analyzeContext } from "../patternAnalyzer.js";

type ContextParams = {
  language: LanguageId;
  file: string;
  source: string[];
  focus: LineRange;
  functionRange?: LineRange;
  contentHash?: string;
};

const makeContext = (params: ContextParams): CodeContext => ({
  findingId: "f_test",
  file: params.file,
  language: params.language,
  contentHash: params.contentHash ?? "hash-1",
  lines: params.source.map((text, index) => ({ number: index + 1, text })),
  focus: params.focus,
  flowLines: [],
  functionRange: params.functionRange ?? null,
  functionName: null,
  empty: false
});

test("tainted input reaching a shell call is an unsafe call", async () => {
  const lists = await loadDefaultPatternLists();
  const context = makeContext({
    language: "typescript",
    file: "src/run.ts",
    source: [
      "import { exec } from \"child_process\";",
      "export function run(req, res) {",
      "  exec(req.query.cmd);",
      "}"
    ],
    focus: { startLine: 3, endLine: 3 },
    functionRange: { startLine: 2, endLine: 4 }
  });

  const result = analyzeContext(context, lists);

  assert.equal(result.warning, null);
  assert.deepEqual(result.patterns, [
    { tag: "unsafe-call", range: { startLine: 3, endLine: 3 }, rule: "typescript/unsafe-call:exec" }
  ]);
});

test("validation and sanitizing before the sink are both reported", async () => {
  const lists = await loadDefaultPatternLists();
  const context = makeContext({
    language: "typescript",
    file: "src/greet.ts",
    source: [
      "app.get(\"/greet\", (req, res) => {",
      "  const name = req.query.name;",
      "  if (!isValidName(name)) return res.status(400).end();",
      "  const safe = escape(name);",
      "  res.send(`<p>${safe}</p>`);",
      "});"
    ],
    focus: { startLine: 5, endLine: 5 }
  });

  const result = analyzeContext(context, lists);

  assert.deepEqual(result.patterns, [
    { tag: "validation", range: { startLine: 3, endLine: 3 }, rule: "typescript/validation:isValid*" },
    { tag: "sanitizer", range: { startLine: 4, endLine: 4 }, rule: "typescript/sanitizer:escape" },
    { tag: "unsafe-call", range: { startLine: 5, endLine: 5 }, rule: "typescript/unsafe-call:res.send" }
  ]);
});

test("fragments with no recognised construct produce a single none pattern", async () => {
  const lists = await loadDefaultPatternLists();
  const context = makeContext({
    language: "javascript",
    file: "lib/total.js",
    source: [
      "function total(items) {",
      "  let sum = 0;",
      "  for (const item of items) sum += item.price;",
      "  return sum;",
      "}"
    ],
    focus: { startLine: 4, endLine: 4 },
    functionRange: { startLine: 1, endLine: 5 }
  });

  const result = analyzeContext(context, lists);

  assert.deepEqual(result.patterns, [
    { tag: "none", range: { startLine: 1, endLine: 5 }, rule: "javascript/none" }
  ]);
});

test("python format checks count as validation once per range", async () => {
  const lists = await loadDefaultPatternLists();
  const context = makeContext({
    language: "python",
    file: "app/users.py",
    source: [
      "def show(user_id):",
      "    if not user_id.isdigit():",
      "        abort(400)",
      "    cursor.execute(\"SELECT * FROM users WHERE id = \" + user_id)"
    ],
    focus: { startLine: 4, endLine: 4 },
    functionRange: { startLine: 1, endLine: 4 }
  });

  const result = analyzeContext(context, lists);

  assert.deepEqual(result.patterns, [
    { tag: "validation", range: { startLine: 2, endLine: 2 }, rule: "python/validation:format" },
    { tag: "unsafe-call", range: { startLine: 4, endLine: 4 }, rule: "python/unsafe-call:*.execute" }
  ]);
});

test("unparsable fragments degrade to an empty set with a warning", async () => {
  const lists = await loadDefaultPatternLists();
  const context = makeContext({
    language: "typescript",
    file: "src/broken.ts",
    source: ["const x = (;"],
    focus: { startLine: 1, endLine: 1 }
  });

  const result = analyzeContext(context, lists);

  assert.deepEqual(result.patterns, []);
  assert.ok(result.warning instanceof ParseDegradedWarning);
  assert.equal(result.warning.signal, "parse-degraded");
  assert.equal(result.warning.reason, "syntax error near line 1");
});

test("languages without a parser degrade and empty contexts do not", async () => {
  const lists = await loadDefaultPatternLists();
  const goContext = makeContext({
    language: "go",
    file: "main.go",
    source: ["func main() {}"],
    focus: { startLine: 1, endLine: 1 }
  });

  assert.equal(analyzeContext(goContext, lists).warning?.reason, "no structural parser for go");

  const empty: CodeContext = { ...goContext, lines: [], contentHash: null, empty: true };
  assert.deepEqual(analyzeContext(empty, lists), { patterns: [], warning: null });
});

test("PatternAnalyzer caches per finding until the content hash changes", async () => {
  const lists = await loadDefaultPatternLists();
  const warnings: Array<Record<string, unknown> | undefined> = [];
  const logger: Logger = {
    debug: () => {},
    info: () => {},
    warn: (_message, meta) => warnings.push(meta),
    error: () => {}
  };
  const analyzer = new PatternAnalyzer({ patternLists: lists, logger });
  const context = makeContext({
    language: "typescript",
    file: "src/broken.ts",
    source: ["const x = (;"],
    focus: { startLine: 1, endLine: 1 }
  });

  const first = analyzer.analyze(context);
  const second = analyzer.analyze(context);
  const third = analyzer.analyze({ ...context, contentHash: "hash-2" });

  assert.equal(first, second);
  assert.notEqual(first, third);
  assert.equal(analyzer.cachedEntries, 1);
  assert.equal(warnings.length, 2);
  assert.deepEqual(warnings[0], {
    findingId: "f_test",
    signal: "parse-degraded",
    language: "typescript",
    reason: "syntax error near line 1"
  });
});
