import assert from "node:assert/strict";
import { test } from "node:test";
import { ingest, severityFromScore } from "../sarifIngestor.js";
import { MalformedInputError } from "../../errors/ingest.errors.js";

const physical = (uri: string, startLine: number, extra: Record<string, number> = {}) => ({
  physicalLocation: {
    artifactLocation: { uri },
    region: { startLine, ...extra }
  }
});

const sarif = (results: unknown[], rules: unknown[] = [], driverName = "CodeQL") => ({
  version: "2.1.0",
  runs: [{ tool: { driver: { name: driverName, rules } }, results }]
});

const isMalformedAt = (path: string) => (err: unknown) =>
  err instanceof MalformedInputError && err.path === path;

test("ingest reads a SARIF result with rule metadata and code flow", () => {
  const document = sarif(
    [
      {
        ruleId: "js/sql-injection",
        ruleIndex: 0,
        message: { text: "Query built from user input." },
        locations: [physical("./src/db.ts", 12, { startColumn: 5, endColumn: 40 })],
        codeFlows: [
          {
            threadFlows: [
              {
                locations: [
                  { location: physical("src/routes.ts", 4) },
                  { location: physical("src/db.ts", 12, { startColumn: 5 }) }
                ]
              }
            ]
          }
        ]
      }
    ],
    [
      {
        id: "js/sql-injection",
        properties: { "security-severity": "8.8", tags: ["security", "external/cwe/cwe-089"] }
      }
    ]
  );

  const findings = ingest(JSON.stringify(document));

  assert.equal(findings.length, 1);
  const [finding] = findings;
  assert.match(finding.id, /^f_[0-9a-f]{16}$/);
  assert.equal(finding.ruleId, "js/sql-injection");
  assert.equal(finding.severity, "high");
  assert.equal(finding.tool, "CodeQL");
  assert.equal(finding.message, "Query built from user input.");
  assert.deepEqual(finding.location, {
    file: "src/db.ts",
    startLine: 12,
    endLine: 12,
    startColumn: 5,
    endColumn: 40
  });
  assert.deepEqual(finding.tags, ["security", "external/cwe/cwe-089"]);
  assert.deepEqual(finding.codeFlow, [
    { file: "src/routes.ts", startLine: 4, endLine: 4, startColumn: 1, endColumn: 1 },
    { file: "src/db.ts", startLine: 12, endLine: 12, startColumn: 5, endColumn: 5 }
  ]);
  assert.ok(Object.isFrozen(finding));
  assert.ok(Object.isFrozen(finding.location));
});

test("ingest maps result and rule levels onto severities", () => {
  const document = sarif(
    [
      { ruleId: "a", level: "error", message: { text: "m" }, locations: [physical("a.ts", 1)] },
      { ruleId: "a", level: "note", message: { text: "m" }, locations: [physical("a.ts", 2)] },
      { ruleId: "a", message: { text: "m" }, locations: [physical("a.ts", 3)] },
      { ruleId: "b", message: { text: "m" }, locations: [physical("a.ts", 4)] },
      { ruleId: "a", level: "none", message: { text: "m" }, locations: [physical("a.ts", 5)] }
    ],
    [{ id: "a" }, { id: "b", defaultConfiguration: { level: "error" } }]
  );

  const severities = ingest(JSON.stringify(document)).map((finding) => finding.severity);

  assert.deepEqual(severities, ["high", "low", "medium", "high", "info"]);
});

test("severityFromScore follows the security-severity bands", () => {
  assert.equal(severityFromScore(9.8), "critical");
  assert.equal(severityFromScore(9), "critical");
  assert.equal(severityFromScore(7), "high");
  assert.equal(severityFromScore(5.3), "medium");
  assert.equal(severityFromScore(0.1), "low");
  assert.equal(severityFromScore(0), "info");
});

test("ingest formats rule message strings with result arguments", () => {
  const document = sarif(
    [
      {
        ruleIndex: 0,
        message: { id: "default", arguments: ["userId"] },
        locations: [physical("src/api.ts", 7)]
      }
    ],
    [{ id: "js/path-injection", messageStrings: { default: { text: "Tainted value {0} reaches {1}" } } }]
  );

  const [finding] = ingest(JSON.stringify(document));

  assert.equal(finding.ruleId, "js/path-injection");
  assert.equal(finding.message, "Tainted value userId reaches {1}");
});

test("ingest rejects a result without a rule id", () => {
  const document = sarif([{ message: { text: "m" }, locations: [physical("a.ts", 1)] }]);

  assert.throws(() => ingest(JSON.stringify(document)), isMalformedAt("runs[0].results[0].ruleId"));
});

test("ingest rejects a result without a message", () => {
  const document = sarif([{ ruleId: "a", locations: [physical("a.ts", 1)] }]);

  assert.throws(() => ingest(JSON.stringify(document)), isMalformedAt("runs[0].results[0].message"));
});

test("ingest rejects a result without locations", () => {
  const document = sarif([{ ruleId: "a", message: { text: "m" } }]);

  assert.throws(() => ingest(JSON.stringify(document)), isMalformedAt("runs[0].results[0].locations"));
});

test("ingest rejects non-positive line numbers and emits nothing", () => {
  const document = sarif([
    { ruleId: "a", message: { text: "m" }, locations: [physical("a.ts", 3)] },
    { ruleId: "a", message: { text: "m" }, locations: [physical("a.ts", 0)] }
  ]);

  assert.throws(() => ingest(JSON.stringify(document)), isMalformedAt("runs[0].results[1].locations[0]"));
});

test("ingest rejects documents that are not JSON or not a known shape", () => {
  assert.throws(() => ingest("{not json"), MalformedInputError);
  assert.throws(() => ingest("[]"), MalformedInputError);
  assert.throws(() => ingest(JSON.stringify({ findings: [] })), MalformedInputError);
});

test("ingest keeps the first of findings sharing rule, file, line and column", () => {
  const document = {
    version: "2.1.0",
    runs: [
      {
        tool: { driver: { name: "CodeQL" } },
        results: [
          { ruleId: "a", message: { text: "first" }, locations: [physical("a.ts", 3, { startColumn: 2 })] },
          { ruleId: "a", message: { text: "other column" }, locations: [physical("a.ts", 3, { startColumn: 9 })] }
        ]
      },
      {
        tool: { driver: { name: "CodeQL" } },
        results: [
          { ruleId: "a", message: { text: "second" }, locations: [physical("./a.ts", 3, { startColumn: 2 })] }
        ]
      }
    ]
  };

  const findings = ingest(JSON.stringify(document));

  assert.deepEqual(
    findings.map((finding) => finding.message),
    ["first", "other column"]
  );
});

test("ingest is idempotent across repeated reads of the same document", () => {
  const document = sarif([
    { ruleId: "a", message: { text: "m" }, locations: [physical("a.ts", 3)] },
    { ruleId: "b", message: { text: "m" }, locations: [physical("b.ts", 8)] }
  ]);
  const raw = Buffer.from(JSON.stringify(document));

  const first = ingest(raw);
  const second = ingest(raw);

  assert.equal(first.length, 2);
  assert.deepEqual(second, first);
});

test("ingest uses result guids as ids when they are unique", () => {
  const document = sarif([
    { guid: "guid-1", ruleId: "a", message: { text: "m" }, locations: [physical("a.ts", 1)] },
    { guid: "guid-1", ruleId: "a", message: { text: "m" }, locations: [physical("a.ts", 2)] }
  ]);

  const [first, second] = ingest(JSON.stringify(document));

  assert.equal(first.id, "guid-1");
  assert.match(second.id, /^f_[0-9a-f]{16}$/);
});

test("ingest normalises file URIs and backslashes", () => {
  const document = sarif([
    { ruleId: "a", message: { text: "m" }, locations: [physical("file:///repo/src/app%20main.ts", 1)] },
    { ruleId: "a", message: { text: "m" }, locations: [physical(".\\lib\\util.ts", 1)] }
  ]);

  const files = ingest(JSON.stringify(document)).map((finding) => finding.location.file);

  assert.deepEqual(files, ["/repo/src/app main.ts", "lib/util.ts"]);
});
