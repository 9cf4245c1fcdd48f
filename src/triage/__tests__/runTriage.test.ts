import assert from "node:assert/strict";
import path from "node:path";
import { tmpdir } from "node:os";
import { access, mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { test } from "node:test";
import { MalformedInputError } from "../../errors/ingest.errors.js";
import { StorageUnknownFragmentError, StorageUnknownRunError } from "../../errors/storage.errors.js";
import { fragmentIdFor } from "../../indexing/fragmentExtractor.js";
import type { LogMeta, Logger } from "../../logging/logger.js";
import type { Embedder } from "../../services/embeddings/embedding.js";
import { labelFragment, loadRunVerdicts, loadTrend, runIndexRefresh, runTriage } from "../runTriage.js";

const RUN = ["export function run(req, res) {", "  exec(req.query.cmd);", "}"].join("\n");

const ENV_KEYS = [
  "TRIAGE_API_KEY",
  "OPENAI_API_KEY",
  "TRIAGE_EMBEDDINGS_PROVIDER",
  "TRIAGE_SOURCE_ROOT",
  "TRIAGE_WINDOW_LINES",
  "TRIAGE_SIMILARITY_FLOOR",
  "TRIAGE_TOP_K",
  "TRIAGE_INDEX_UNAVAILABLE",
  "TRIAGE_CONCURRENCY",
  "TRIAGE_EXCLUDE"
];

const clearEnv = (t: { after: (fn: () => void) => void }) => {
  const snapshot = new Map(ENV_KEYS.map((key) => [key, process.env[key]]));
  for (const key of ENV_KEYS) delete process.env[key];
  t.after(() => {
    for (const [key, value] of snapshot) {
      if (value === undefined) delete process.env[key];
      else process.env[key] = value;
    }
  });
};

class FakeEmbedder implements Embedder {
  calls = 0;

  constructor(readonly dimensions = 3) {}

  async embed(texts: string[]): Promise<number[][]> {
    this.calls += 1;
    const padding = Array<number>(this.dimensions - 2).fill(1);
    return texts.map((text) => [text.length, text.includes("exec") ? 1 : 0, ...padding]);
  }
}

const result = (uri: string, startLine: number) => ({
  ruleId: "js/command-injection",
  level: "warning",
  message: { text: "Command built from user input." },
  locations: [{ physicalLocation: { artifactLocation: { uri }, region: { startLine } } }]
});

const FINDINGS = {
  version: "2.1.0",
  runs: [
    {
      tool: { driver: { name: "CodeQL", rules: [] } },
      results: [result("src/gone.ts", 2), result("src/run.ts", 2)]
    }
  ]
};

async function withProject(run: (root: string) => Promise<void>) {
  const root = await mkdtemp(path.join(tmpdir(), "triage-run-"));
  try {
    await mkdir(path.join(root, "src"), { recursive: true });
    await writeFile(path.join(root, "src", "run.ts"), `${RUN}\n`);
    await writeFile(path.join(root, "findings.sarif"), JSON.stringify(FINDINGS));
    await run(root);
  } finally {
    await rm(root, { recursive: true, force: true });
  }
}

test("runTriage scores a findings file and records the run", async (t) => {
  clearEnv(t);
  await withProject(async (root) => {
    const embedder = new FakeEmbedder();
    const logs: Array<{ message: string; meta?: LogMeta }> = [];
    const record = (message: string, meta?: LogMeta) => {
      logs.push({ message, meta });
    };
    const logger: Logger = { debug: record, info: record, warn: record, error: record };
    const report = await runTriage({ projectRoot: root, findingsPath: "findings.sarif", embedder, logger });

    assert.equal(report.cancelled, false);
    assert.equal(report.total, 2);
    assert.equal(report.findings.length, 2);
    assert.deepEqual(
      report.verdicts.map((verdict) => {
        const finding = report.findings.find((entry) => entry.id === verdict.findingId);
        return [finding?.location.file, verdict.score.value, verdict.classification, [...verdict.score.flags]];
      }),
      [
        ["src/run.ts", 0, "likely-true-positive", []],
        ["src/gone.ts", 0.5, "needs-manual-review", ["source-unavailable"]]
      ]
    );
    // Nothing is indexed yet, so there is nothing to compare against.
    assert.equal(embedder.calls, 0);
    assert.deepEqual(logs.find((entry) => entry.message === "Triage run recorded")?.meta, {
      runId: report.runId,
      processed: 2,
      cancelled: false
    });
    assert.ok(logs.every((entry) => entry.meta?.runId === report.runId));
    assert.deepEqual(logs.find((entry) => entry.message === "Source unavailable")?.meta, {
      runId: report.runId,
      findingId: report.findings.find((entry) => entry.location.file === "src/gone.ts")?.id,
      signal: "source-unavailable",
      file: "src/gone.ts",
      reason: "missing"
    });

    const trend = await loadTrend({ projectRoot: root, embedder });
    assert.equal(trend.length, 1);
    assert.equal(trend[0]?.id, report.runId);
    assert.equal(trend[0]?.findingsPath, path.join(root, "findings.sarif"));
    assert.deepEqual(trend[0]?.counts, {
      "likely-true-positive": 1,
      "needs-manual-review": 1,
      "likely-false-positive": 0
    });

    const stored = await loadRunVerdicts({ projectRoot: root, embedder, runId: report.runId });
    assert.equal(stored.run.id, report.runId);
    assert.deepEqual(
      stored.verdicts.map((entry) => [entry.file, entry.startLine, entry.score, entry.classification, entry.flags]),
      [
        ["src/run.ts", 2, 0, "likely-true-positive", []],
        ["src/gone.ts", 2, 0.5, "needs-manual-review", ["source-unavailable"]]
      ]
    );
    await assert.rejects(loadRunVerdicts({ projectRoot: root, embedder, runId: "missing" }), StorageUnknownRunError);
  });
});

test("a refresh after an embedding dimension change re-embeds everything", async (t) => {
  clearEnv(t);
  await withProject(async (root) => {
    const first = await runIndexRefresh({ projectRoot: root, embedder: new FakeEmbedder() });
    assert.equal(first.embeddingsReset, false);
    assert.equal(first.fragmentsEmbedded, 1);

    const unchanged = await runIndexRefresh({ projectRoot: root, embedder: new FakeEmbedder() });
    assert.equal(unchanged.embeddingsReset, false);
    assert.equal(unchanged.filesChanged, 0);

    const wider = new FakeEmbedder(4);
    const resized = await runIndexRefresh({ projectRoot: root, embedder: wider });
    assert.equal(resized.embeddingsReset, true);
    assert.equal(resized.filesChanged, 1);
    assert.equal(resized.fragmentsEmbedded, 1);
    assert.equal(wider.calls, 1);
  });
});

test("indexed and labeled fragments inform later runs", async (t) => {
  clearEnv(t);
  await withProject(async (root) => {
    const embedder = new FakeEmbedder();
    const summary = await runIndexRefresh({ projectRoot: root, embedder });
    assert.equal(summary.filesScanned, 1);
    assert.equal(summary.fragmentsEmbedded, 1);

    const record = await labelFragment({
      projectRoot: root,
      embedder,
      fragmentId: fragmentIdFor(RUN),
      disposition: "confirmed-safe"
    });
    assert.equal(record.disposition, "confirmed-safe");
    assert.deepEqual(record.location, { file: "src/run.ts", startLine: 1, endLine: 3 });

    const report = await runTriage({ projectRoot: root, findingsPath: "findings.sarif", embedder });
    const [first] = report.verdicts;
    assert.equal(first?.score.value, 0.2);
    assert.deepEqual(first?.score.contributions.at(-1), { signal: "similarity:disposition", contribution: 0.2 });

    const trend = await loadTrend({ projectRoot: root, embedder });
    assert.equal(trend.length, 1);
  });
});

test("labeling a fragment that was never indexed fails", async (t) => {
  clearEnv(t);
  await withProject(async (root) => {
    await assert.rejects(
      labelFragment({ projectRoot: root, embedder: new FakeEmbedder(), fragmentId: "missing", disposition: "confirmed-safe" }),
      StorageUnknownFragmentError
    );
  });
});

test("a malformed findings document fails before the store is opened", async (t) => {
  clearEnv(t);
  await withProject(async (root) => {
    await writeFile(path.join(root, "broken.sarif"), JSON.stringify({ runs: "nope" }));

    await assert.rejects(
      runTriage({ projectRoot: root, findingsPath: "broken.sarif", embedder: new FakeEmbedder() }),
      MalformedInputError
    );
    await assert.rejects(access(path.join(root, ".triage")));
  });
});
