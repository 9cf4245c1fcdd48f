import assert from "node:assert/strict";
import path from "node:path";
import { tmpdir } from "node:os";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { test } from "node:test";
import { EmbeddingProviderId, loadConfig } from "../loadConfig.js";
import {
  ConfigFileParseError,
  ConfigInvalidValueError,
  ConfigMissingApiKeyError
} from "../../errors/config.errors.js";

const ENV_KEYS = [
  "TRIAGE_API_KEY",
  "OPENAI_API_KEY",
  "TRIAGE_API_BASE",
  "TRIAGE_API_HEADERS",
  "TRIAGE_EMBEDDINGS_PROVIDER",
  "TRIAGE_EMBEDDINGS_MODEL",
  "TRIAGE_EMBEDDINGS_ENDPOINT",
  "TRIAGE_SOURCE_ROOT",
  "TRIAGE_WINDOW_LINES",
  "TRIAGE_SIMILARITY_FLOOR",
  "TRIAGE_TOP_K",
  "TRIAGE_INDEX_UNAVAILABLE",
  "TRIAGE_CONCURRENCY",
  "TRIAGE_EXCLUDE",
  "TRIAGE_OUTPUT_FORMAT"
];

const applyEnv = (t: { after: (fn: () => void) => void }, env: Record<string, string>) => {
  const snapshot = new Map(ENV_KEYS.map((key) => [key, process.env[key]]));

  for (const key of ENV_KEYS) {
    const value = env[key];
    if (value === undefined) {
      delete process.env[key];
    } else {
      process.env[key] = value;
    }
  }

  t.after(() => {
    for (const key of ENV_KEYS) {
      const value = snapshot.get(key);
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
  });
};

const withProject = async (config: unknown, run: (root: string) => Promise<void>) => {
  const root = await mkdtemp(path.join(tmpdir(), "triage-config-"));
  try {
    if (config !== undefined) {
      const text = typeof config === "string" ? config : JSON.stringify(config);
      await writeFile(path.join(root, "triage.config.json"), text, "utf-8");
    }
    await run(root);
  } finally {
    await rm(root, { recursive: true, force: true });
  }
};

test("defaults apply when no config file or env is present", async (t) => {
  applyEnv(t, {});

  await withProject(undefined, async (root) => {
    const cfg = await loadConfig({ projectRoot: root });

    assert.equal(cfg.sourceRoot, path.resolve(root));
    assert.equal(cfg.stateDir, path.join(path.resolve(root), ".triage"));
    assert.equal(cfg.context.windowLines, 10);
    assert.equal(cfg.similarity.floor, 0.75);
    assert.equal(cfg.similarity.topK, 5);
    assert.equal(cfg.similarity.onUnavailable, "degrade");
    assert.equal(cfg.scoring.baseline, 0.5);
    assert.equal(cfg.scoring.weights.unsafeCall, -0.3);
    assert.equal(cfg.classification.truePositiveBelow, 0.3);
    assert.equal(cfg.classification.falsePositiveAbove, 0.7);
    assert.equal(cfg.concurrency, 4);
    assert.equal(cfg.cache.invalidation, "content-hash");
    assert.equal(cfg.embeddings.provider, EmbeddingProviderId.Disabled);
    assert.ok(cfg.patterns.javascript.unsafeCalls.includes("^eval"));
    assert.ok(cfg.patterns.python.sanitizers.includes("shlex.quote"));
  });
});

test("config file values replace defaults and pattern lists per category", async (t) => {
  applyEnv(t, {});

  await withProject(
    {
      sourceRoot: "app",
      similarity: { floor: 0.8, topK: 3 },
      scoring: { weights: { sanitizer: 0.25 }, severityOffsets: { critical: -0.2 } },
      patterns: { typescript: { sanitizers: ["cleanInput"] } },
      cache: { invalidation: "disabled" },
      output: { format: "json" }
    },
    async (root) => {
      const cfg = await loadConfig({ projectRoot: root });

      assert.equal(cfg.sourceRoot, path.join(path.resolve(root), "app"));
      assert.equal(cfg.similarity.floor, 0.8);
      assert.equal(cfg.similarity.topK, 3);
      assert.equal(cfg.scoring.weights.sanitizer, 0.25);
      assert.equal(cfg.scoring.weights.validation, 0.3);
      assert.equal(cfg.scoring.severityOffsets.critical, -0.2);
      assert.equal(cfg.scoring.severityOffsets.info, 0.1);
      assert.deepEqual(cfg.patterns.javascript.sanitizers, ["cleanInput"]);
      assert.ok(cfg.patterns.javascript.validators.includes("isValid*"));
      assert.equal(cfg.cache.invalidation, "disabled");
      assert.equal(cfg.output.format, "json");
    }
  );
});

test("environment variables take precedence over the config file", async (t) => {
  applyEnv(t, {
    TRIAGE_API_KEY: "test-key",
    TRIAGE_CONCURRENCY: "8",
    TRIAGE_SIMILARITY_FLOOR: "0.9",
    TRIAGE_EXCLUDE: "vendor/**, tmp/**"
  });

  await withProject({ concurrency: 2, similarity: { floor: 0.6 } }, async (root) => {
    const cfg = await loadConfig({ projectRoot: root });

    assert.equal(cfg.concurrency, 8);
    assert.equal(cfg.similarity.floor, 0.9);
    assert.deepEqual(cfg.indexing.exclude, ["vendor/**", "tmp/**"]);
    assert.equal(cfg.embeddings.provider, EmbeddingProviderId.OpenAI);
    assert.equal(cfg.embeddings.apiKey, "test-key");
    assert.equal(cfg.embeddings.endpoint, "https://api.openai.com/v1/embeddings");
  });
});

test("overrides are merged last and still validated", async (t) => {
  applyEnv(t, {});

  await withProject(undefined, async (root) => {
    const cfg = await loadConfig({ projectRoot: root, overrides: { concurrency: 1 } });
    assert.equal(cfg.concurrency, 1);

    await assert.rejects(
      loadConfig({ projectRoot: root, overrides: { concurrency: 0 } }),
      (err: unknown) => err instanceof ConfigInvalidValueError && err.key === "concurrency"
    );
  });
});

test("inverted classification thresholds are rejected", async (t) => {
  applyEnv(t, {});

  await withProject({ classification: { truePositiveBelow: 0.8 } }, async (root) => {
    await assert.rejects(
      loadConfig({ projectRoot: root }),
      (err: unknown) => err instanceof ConfigInvalidValueError && err.key === "classification.truePositiveBelow"
    );
  });
});

test("unknown enum values and pattern languages name the offending key", async (t) => {
  applyEnv(t, {});

  await withProject({ output: { format: "xml" } }, async (root) => {
    await assert.rejects(
      loadConfig({ projectRoot: root }),
      (err: unknown) => err instanceof ConfigInvalidValueError && err.key === "output.format"
    );
  });

  await withProject({ patterns: { cobol: { sanitizers: ["x"] } } }, async (root) => {
    await assert.rejects(
      loadConfig({ projectRoot: root }),
      (err: unknown) => err instanceof ConfigInvalidValueError && err.key === "patterns.cobol"
    );
  });
});

test("an explicit openai provider needs an API key", async (t) => {
  applyEnv(t, { TRIAGE_EMBEDDINGS_PROVIDER: "OpenAI" });

  await withProject(undefined, async (root) => {
    await assert.rejects(loadConfig({ projectRoot: root }), ConfigMissingApiKeyError);
  });
});

test("malformed config files fail with a parse error", async (t) => {
  applyEnv(t, {});

  await withProject("{ not json", async (root) => {
    await assert.rejects(loadConfig({ projectRoot: root }), ConfigFileParseError);
  });
});
