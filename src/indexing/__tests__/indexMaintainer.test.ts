import assert from "node:assert/strict";
import os from "node:os";
import path from "node:path";
import { mkdir, mkdtemp, rm, unlink, writeFile } from "node:fs/promises";
import { test } from "node:test";

import { DEFAULT_EXCLUDES, DEFAULT_INCLUDE_EXTENSIONS } from "../../config/defaults.js";
import { loadDefaultPatternLists } from "../../config/patternLists.js";
import { StorageUnknownFragmentError } from "../../errors/storage.errors.js";
import type { Embedder } from "../../services/embeddings/embedding.js";
import { SimilarityIndex } from "../../similarity/similarityIndex.js";
import { TriageDb } from "../../storage/db.js";
import { fragmentIdFor } from "../fragmentExtractor.js";
import { IndexMaintainer, loadIndexFromStore } from "../indexMaintainer.js";

const RUN = ["export function run(req, res) {", "  exec(req.query.cmd);", "}"].join("\n");
const SHOW = ["def show(name):", "    return escape(name)"].join("\n");
const CLEAN = ["export function clean(value) {", "  return value.trim();", "}"].join("\n");
const LIST = ["export function list(db) {", "  return db.all();", "}"].join("\n");

class FakeEmbedder implements Embedder {
  readonly dimensions = 3;
  readonly calls: string[][] = [];

  async embed(texts: string[]): Promise<number[][]> {
    this.calls.push(texts);
    return texts.map((text) => [text.length, text.includes("exec") ? 1 : 0, 1]);
  }
}

async function withWorkspace(
  run: (ctx: { root: string; db: TriageDb; index: SimilarityIndex; embedder: FakeEmbedder; maintainer: IndexMaintainer }) => Promise<void>
) {
  const tempDir = await mkdtemp(path.join(os.tmpdir(), "triage-index-"));
  const root = path.join(tempDir, "repo");
  await mkdir(path.join(root, "src"), { recursive: true });
  await mkdir(path.join(root, "node_modules", "dep"), { recursive: true });
  await writeFile(path.join(root, "src", "a.ts"), `${RUN}\n`);
  await writeFile(path.join(root, "src", "b.py"), `${SHOW}\n`);
  await writeFile(path.join(root, "README.md"), "# repo\n");
  await writeFile(path.join(root, "node_modules", "dep", "index.js"), "function dep() {}\n");

  const db = new TriageDb({ stateDir: path.join(tempDir, "state"), dimensions: 3 });
  const index = new SimilarityIndex({ dimensions: 3 });
  const embedder = new FakeEmbedder();
  const maintainer = new IndexMaintainer({
    db,
    index,
    embedder,
    patternLists: await loadDefaultPatternLists(),
    sourceRoot: root,
    includeExtensions: DEFAULT_INCLUDE_EXTENSIONS,
    exclude: DEFAULT_EXCLUDES,
    maxFileSizeBytes: 200_000,
    windowSize: 21
  });

  try {
    await run({ root, db, index, embedder, maintainer });
  } finally {
    db.close();
    await rm(tempDir, { recursive: true, force: true });
  }
}

test("refresh embeds every declaration once and skips unchanged files", async () => {
  await withWorkspace(async ({ db, index, embedder, maintainer }) => {
    const first = await maintainer.refresh();
    assert.deepEqual(first, {
      filesScanned: 2,
      filesChanged: 2,
      filesRemoved: 0,
      fragmentsEmbedded: 2,
      fragmentsMoved: 0,
      fragmentsRemoved: 0,
      embeddingsReset: false,
      cancelled: false
    });
    assert.deepEqual(embedder.calls, [[RUN], [SHOW]]);
    assert.deepEqual(
      index.snapshot().entries().map((entry) => [entry.fragmentId, entry.location]),
      [
        [fragmentIdFor(RUN), { file: "src/a.ts", startLine: 1, endLine: 3 }],
        [fragmentIdFor(SHOW), { file: "src/b.py", startLine: 1, endLine: 2 }]
      ]
    );
    assert.deepEqual(db.fragments.get(fragmentIdFor(RUN))?.patterns, ["unsafe-call"]);

    const second = await maintainer.refresh();
    assert.equal(second.filesChanged, 0);
    assert.equal(embedder.calls.length, 2);
  });
});

test("moved fragments keep their vector and stale ones are dropped", async () => {
  await withWorkspace(async ({ root, db, index, embedder, maintainer }) => {
    await maintainer.refresh();

    await writeFile(path.join(root, "src", "a.ts"), `// moved down\n${RUN}\n`);
    const moved = await maintainer.refresh();
    assert.equal(moved.fragmentsMoved, 1);
    assert.equal(moved.fragmentsEmbedded, 0);
    assert.equal(embedder.calls.length, 2);
    assert.deepEqual(index.snapshot().get(fragmentIdFor(RUN))?.location, { file: "src/a.ts", startLine: 2, endLine: 4 });
    assert.deepEqual(db.fragments.get(fragmentIdFor(RUN))?.location, { file: "src/a.ts", startLine: 2, endLine: 4 });

    await writeFile(path.join(root, "src", "a.ts"), `${LIST}\n`);
    const replaced = await maintainer.refresh();
    assert.equal(replaced.fragmentsEmbedded, 1);
    assert.equal(replaced.fragmentsRemoved, 1);
    assert.deepEqual(embedder.calls[2], [LIST]);
    assert.equal(index.snapshot().has(fragmentIdFor(RUN)), false);
    assert.equal(db.fragments.get(fragmentIdFor(RUN)), null);
  });
});

test("a fragment repeated in two files stays indexed while either file holds it", async () => {
  await withWorkspace(async ({ root, db, index, embedder, maintainer }) => {
    await writeFile(path.join(root, "src", "c.ts"), `${CLEAN}\n`);
    await writeFile(path.join(root, "src", "d.ts"), `${CLEAN}\n`);
    const first = await maintainer.refresh();
    assert.equal(first.fragmentsEmbedded, 3);
    assert.equal(first.fragmentsMoved, 0);
    assert.deepEqual(embedder.calls, [[RUN], [SHOW], [CLEAN]]);
    assert.deepEqual(db.fragments.get(fragmentIdFor(CLEAN))?.location, { file: "src/c.ts", startLine: 1, endLine: 3 });

    await writeFile(path.join(root, "src", "d.ts"), `${LIST}\n`);
    const edited = await maintainer.refresh();
    assert.equal(edited.fragmentsRemoved, 0);
    assert.equal(index.snapshot().has(fragmentIdFor(CLEAN)), true);
    assert.deepEqual(db.fragments.get(fragmentIdFor(CLEAN))?.location, { file: "src/c.ts", startLine: 1, endLine: 3 });

    await writeFile(path.join(root, "src", "d.ts"), `${CLEAN}\n`);
    await unlink(path.join(root, "src", "c.ts"));
    const relocated = await maintainer.refresh();
    assert.equal(relocated.fragmentsEmbedded, 0);
    assert.equal(relocated.fragmentsMoved, 1);
    assert.equal(relocated.fragmentsRemoved, 1);
    assert.equal(embedder.calls.length, 4);
    assert.deepEqual(index.snapshot().get(fragmentIdFor(CLEAN))?.location, { file: "src/d.ts", startLine: 1, endLine: 3 });
    assert.deepEqual(db.fragments.get(fragmentIdFor(CLEAN))?.location, { file: "src/d.ts", startLine: 1, endLine: 3 });
    assert.equal(db.fragments.get(fragmentIdFor(LIST)), null);
  });
});

test("labeled fragments survive the deletion of their file", async () => {
  await withWorkspace(async ({ root, db, index, maintainer }) => {
    await maintainer.refresh();

    const labeled = maintainer.label(fragmentIdFor(SHOW), "confirmed-safe");
    assert.equal(labeled.disposition, "confirmed-safe");
    assert.equal(db.fragments.get(fragmentIdFor(SHOW))?.disposition, "confirmed-safe");

    await unlink(path.join(root, "src", "b.py"));
    await unlink(path.join(root, "src", "a.ts"));
    const summary = await maintainer.refresh();

    assert.equal(summary.filesRemoved, 2);
    assert.equal(summary.fragmentsRemoved, 1);
    assert.deepEqual(
      index.snapshot().entries().map((entry) => [entry.fragmentId, entry.disposition]),
      [[fragmentIdFor(SHOW), "confirmed-safe"]]
    );
    assert.deepEqual(db.files.listPaths(), []);
  });
});

test("labeling an unknown fragment fails", async () => {
  await withWorkspace(async ({ maintainer }) => {
    assert.throws(() => maintainer.label("missing", "confirmed-vulnerable"), StorageUnknownFragmentError);
  });
});

test("the stored fragments rebuild the same index", async () => {
  await withWorkspace(async ({ db, index, maintainer }) => {
    await maintainer.refresh();
    maintainer.label(fragmentIdFor(RUN), "confirmed-vulnerable");

    const reloaded = loadIndexFromStore(db);
    const describe = (target: SimilarityIndex) =>
      target
        .snapshot()
        .entries()
        .map((entry) => [entry.fragmentId, entry.disposition, [...entry.vector]]);
    assert.deepEqual(describe(reloaded), describe(index));
    assert.deepEqual(
      reloaded.query([RUN.length, 1, 1], 1).map((match) => match.vector.fragmentId),
      [fragmentIdFor(RUN)]
    );
  });
});

test("an aborted refresh indexes nothing", async () => {
  await withWorkspace(async ({ db, index, embedder, maintainer }) => {
    const controller = new AbortController();
    controller.abort();
    const summary = await maintainer.refresh({ signal: controller.signal });

    assert.equal(summary.cancelled, true);
    assert.equal(summary.filesScanned, 0);
    assert.equal(embedder.calls.length, 0);
    assert.equal(index.size, 0);
    assert.equal(db.fragments.count(), 0);
  });
});

test("background refresh can be stopped through the caller's signal", async () => {
  await withWorkspace(async ({ index, maintainer }) => {
    const controller = new AbortController();
    const background = maintainer.startBackgroundRefresh({ signal: controller.signal });
    controller.abort();
    const summary = await background.done;

    assert.equal(summary?.cancelled, true);
    assert.equal(index.size, 0);
  });
});
