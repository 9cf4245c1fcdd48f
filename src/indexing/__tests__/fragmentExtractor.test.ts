import assert from "node:assert/strict";
import { test } from "node:test";
import type { CodeContext } from "../../types.js";
import { loadDefaultPatternLists } from "../../config/patternLists.js";
import { hashContent } from "../../context/contextExtractor.js";
import { contextFragmentText, extractFragments, fragmentPatternTags } from "../fragmentExtractor.js";

const HANDLERS = [
  "import { exec } from \"child_process\";",
  "",
  "export function run(req, res) {",
  "  exec(req.query.cmd);",
  "}",
  "",
  "export function clean(input) {",
  "  return escapeHtml(input);",
  "}",
  ""
].join("\n");

test("declarations become fragments keyed by their text", () => {
  const fragments = extractFragments("src/handlers.ts", "typescript", HANDLERS, { windowSize: 5 });

  assert.deepEqual(
    fragments.map((fragment) => [fragment.name, fragment.location, fragment.format]),
    [
      ["run", { file: "src/handlers.ts", startLine: 3, endLine: 5 }, "declaration"],
      ["clean", { file: "src/handlers.ts", startLine: 7, endLine: 9 }, "declaration"]
    ]
  );
  const runText = "export function run(req, res) {\n  exec(req.query.cmd);\n}";
  assert.equal(fragments[0]?.text, runText);
  assert.equal(fragments[0]?.id, hashContent(runText));
});

test("identical declarations in one file yield a single fragment", () => {
  const source = ["function a() {", "  return 1;", "}", "function a() {", "  return 1;", "}"].join("\n");
  const fragments = extractFragments("src/dup.js", "javascript", source, { windowSize: 10 });
  assert.equal(fragments.length, 1);
  assert.deepEqual(fragments[0]?.location, { file: "src/dup.js", startLine: 1, endLine: 3 });
});

test("files without declarations fall back to line windows", () => {
  const source = ["x = 1", "y = 2", "", "", "z = x + y"].join("\n");
  const fragments = extractFragments("scripts/setup.py", "python", source, { windowSize: 2 });

  assert.deepEqual(
    fragments.map((fragment) => [fragment.location.startLine, fragment.location.endLine, fragment.format]),
    [
      [1, 2, "line-window"],
      [5, 5, "line-window"]
    ]
  );
});

test("languages without a parser are windowed", () => {
  const source = ["package main", "", "func main() {", "}"].join("\n");
  const fragments = extractFragments("main.go", "go", source, { windowSize: 4 });
  assert.equal(fragments.length, 1);
  assert.equal(fragments[0]?.text, source);
  assert.equal(fragments[0]?.name, null);
});

test("empty files produce no fragments", () => {
  assert.deepEqual(extractFragments("empty.ts", "typescript", "", { windowSize: 5 }), []);
});

test("fragment pattern tags come from the structural analyzer", async () => {
  const lists = await loadDefaultPatternLists();
  const [run, clean] = extractFragments("src/handlers.ts", "typescript", HANDLERS, { windowSize: 5 });
  assert.ok(run && clean);

  assert.deepEqual(fragmentPatternTags(run, lists), ["unsafe-call"]);
  assert.deepEqual(fragmentPatternTags(clean, lists), ["sanitizer"]);
});

test("context text matches the enclosing declaration fragment", () => {
  const context: CodeContext = {
    findingId: "f1",
    file: "src/handlers.ts",
    language: "typescript",
    contentHash: "h",
    lines: HANDLERS.split("\n")
      .slice(0, 9)
      .map((text, index) => ({ number: index + 1, text })),
    focus: { startLine: 4, endLine: 4 },
    flowLines: [],
    functionRange: { startLine: 3, endLine: 5 },
    functionName: "run",
    empty: false
  };
  const [run] = extractFragments("src/handlers.ts", "typescript", HANDLERS, { windowSize: 5 });

  assert.equal(contextFragmentText(context), run?.text);
  assert.equal(
    contextFragmentText({ ...context, functionRange: null, lines: context.lines.slice(0, 2) }),
    "import { exec } from \"child_process\";\n"
  );
});
