import assert from "node:assert/strict";
import { test } from "node:test";
import { javascriptLanguage, typescriptLanguage } from "../languages/typescript.js";
import type { SyntaxTree } from "../syntax.js";

const HANDLER = [
  "export async function handler(req, res) {",
  "  const id = req.params.id;",
  "  if (typeof id !== \"string\" || id.length > 64) {",
  "    return res.status(400).end();",
  "  }",
  "  const rows = await db.query(`SELECT * FROM t WHERE id = ${id}`);",
  "  res.json(rows);",
  "}"
].join("\n");

const parseOk = (source: string, startLine: number): SyntaxTree => {
  const parsed = typescriptLanguage.parse(source, { startLine, fileName: "src/handler.ts" });
  if (!parsed.ok) throw new Error(`expected a parse tree, got: ${parsed.reason}`);
  return parsed.tree;
};

test("typescript parse reports declarations with absolute lines", () => {
  const tree = parseOk(HANDLER, 10);

  assert.deepEqual(tree.range, { startLine: 10, endLine: 17 });
  assert.deepEqual(tree.declarations, [{ name: "handler", range: { startLine: 10, endLine: 17 } }]);
});

test("typescript statements cover each top-level statement with its leading comments", () => {
  const tree = parseOk(
    [
      "// entry point",
      "import { exec } from \"child_process\";",
      "/** Runs the given command. */",
      "function run(cmd) {",
      "  exec(cmd);",
      "}",
      "run(process.argv[2]); // once"
    ].join("\n"),
    1
  );

  assert.deepEqual(tree.statements, [
    { startLine: 1, endLine: 2 },
    { startLine: 3, endLine: 6 },
    { startLine: 7, endLine: 7 }
  ]);
});

test("typescript parse collects calls with receivers and argument roots", () => {
  const tree = parseOk(HANDLER, 10);

  assert.deepEqual(
    tree.calls.map((call) => call.callee),
    ["res.status().end", "res.status", "db.query", "res.json"]
  );
  const query = tree.calls[2];
  assert.deepEqual(query.range, { startLine: 15, endLine: 15 });
  assert.equal(query.receiver, "db");
  assert.deepEqual(query.args, ["id"]);
});

test("typescript parse classifies condition checks", () => {
  const tree = parseOk(HANDLER, 10);

  assert.equal(tree.conditions.length, 1);
  assert.deepEqual(tree.conditions[0], {
    range: { startLine: 12, endLine: 12 },
    identifiers: ["id"],
    checks: ["type", "range"],
    calls: []
  });
});

test("typescript parse records assignments and their sources", () => {
  const tree = parseOk(HANDLER, 10);

  assert.deepEqual(tree.assignments, [
    { target: "id", line: 11, sources: ["req"] },
    { target: "rows", line: 15, sources: ["db", "id"] }
  ]);
});

test("method bodies cut out of a class still parse", () => {
  const source = ["  async find(id: string) {", "    return this.repo.query(\"SELECT \" + id);", "  }"].join("\n");

  const tree = parseOk(source, 20);

  assert.deepEqual(tree.declarations, [{ name: "find", range: { startLine: 20, endLine: 22 } }]);
  assert.deepEqual(tree.calls, [
    { callee: "this.repo.query", range: { startLine: 21, endLine: 21 }, receiver: null, args: ["id"] }
  ]);
});

test("allow-list and regex checks are recognised", () => {
  const source = [
    "function pick(input) {",
    "  if (ALLOWED.includes(input) && /^[a-z]+$/.test(input)) {",
    "    return input;",
    "  }",
    "}"
  ].join("\n");

  const parsed = javascriptLanguage.parse(source, { startLine: 1 });

  assert.ok(parsed.ok);
  if (!parsed.ok) return;
  assert.deepEqual(parsed.tree.conditions[0].checks, ["allow-list", "format"]);
  assert.deepEqual(parsed.tree.conditions[0].identifiers, ["ALLOWED", "input"]);
  assert.deepEqual(parsed.tree.declarations[0], { name: "pick", range: { startLine: 1, endLine: 5 } });
});

test("callbacks are named after the call they are passed to", () => {
  const source = ["app.get(\"/users\", async (req, res) => {", "  res.json(await listUsers());", "});"].join("\n");

  const tree = parseOk(source, 1);

  assert.deepEqual(tree.declarations, [{ name: "app.get callback", range: { startLine: 1, endLine: 3 } }]);
});

test("unparsable fragments fail with a located reason", () => {
  const parsed = typescriptLanguage.parse("const value = (;\n", { startLine: 40 });

  assert.equal(parsed.ok, false);
  if (parsed.ok) return;
  assert.match(parsed.reason, /^syntax error near line 40$/);
});
