#!/usr/bin/env node
import path from "node:path";
import { Command, Option } from "commander";
import pc from "picocolors";
import { loadConfig, type OutputFormat, type TriageConfig } from "./config/loadConfig.js";
import {
  createAppLogger,
  createConsoleLogger,
  noopLogger,
  teeLogger,
  type AppLogger,
  type Logger
} from "./logging/logger.js";
import {
  formatRunVerdictsJson,
  formatRunVerdictsText,
  formatTrendJson,
  formatTrendText,
  formatTriageJson,
  formatTriageText
} from "./report/formatters.js";
import type { TriageProgressEvent, TriageProgressHandler, TriageProgressPhase } from "./triage/progress.js";
import { labelFragment, loadRunVerdicts, loadTrend, runIndexRefresh, runTriage } from "./triage/runTriage.js";
import type { Disposition } from "./types.js";

const program = new Command();

class Spinner {
  private frames = ["-", "\\", "|", "/"];
  private frameIndex = 0;
  private timer: ReturnType<typeof setInterval> | null = null;
  private text = "";

  constructor(private stream: { isTTY?: boolean; write: (chunk: string) => void }) {}

  start(text: string) {
    this.text = text;
    if (!this.stream.isTTY) return;
    if (this.timer) return;
    this.render();
    this.timer = setInterval(() => this.render(), 120);
  }

  update(text: string) {
    this.text = text;
  }

  stop() {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
    this.clear();
  }

  private render() {
    if (!this.stream.isTTY) return;
    const frame = this.frames[this.frameIndex % this.frames.length];
    this.frameIndex += 1;
    this.stream.write(`\r\x1b[2K${frame} ${this.text}`);
  }

  private clear() {
    if (!this.stream.isTTY) return;
    this.stream.write("\r\x1b[2K");
  }
}

const PROGRESS_PHASE_LABELS: Record<TriageProgressPhase, string> = {
  ingest: "Ingest",
  triage: "Triage",
  index: "Index refresh"
};

const DISPOSITION_ALIASES: Record<string, Disposition> = {
  safe: "confirmed-safe",
  "confirmed-safe": "confirmed-safe",
  vulnerable: "confirmed-vulnerable",
  "confirmed-vulnerable": "confirmed-vulnerable",
  unlabeled: "unlabeled"
};

function clampProgress(value: number): number {
  if (!Number.isFinite(value)) return 0;
  if (value <= 0) return 0;
  if (value >= 1) return 1;
  return value;
}

function renderProgressBar(value: number, width = 24): string {
  const normalized = clampProgress(value);
  const filled = Math.round(normalized * width);
  const empty = Math.max(0, width - filled);
  const percent = Math.round(normalized * 100);
  return `[${"#".repeat(filled)}${"-".repeat(empty)}] ${percent}%`;
}

// The background index refresh reports alongside triage; the bar follows
// whichever phase spoke last.
function createProgressReporter(update: (message: string) => void): TriageProgressHandler {
  return (event: TriageProgressEvent) => {
    const total = Math.max(0, Math.trunc(event.total));
    const current = Math.max(0, Math.trunc(event.current));
    const fraction = total === 0 ? 1 : clampProgress(current / total);
    const label = PROGRESS_PHASE_LABELS[event.phase];
    const detail = total === 0 ? event.message ?? "skipped" : `${Math.min(current, total)}/${total}`;
    update(`${renderProgressBar(fraction)} ${label} (${detail})`);
  };
}

function formatDuration(durationMs: number): string {
  if (!Number.isFinite(durationMs) || durationMs <= 0) return "0s";
  const totalSeconds = durationMs / 1000;
  if (totalSeconds < 60) {
    return `${totalSeconds.toFixed(1)}s`;
  }
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = Math.round(totalSeconds - minutes * 60);
  return `${minutes}m ${seconds}s`;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function resolveFormat(options: { format?: string; json?: boolean }, config: TriageConfig): OutputFormat {
  if (options.json) return "json";
  if (options.format === "json" || options.format === "text") return options.format;
  if (options.format) throw new Error(`Unknown output format "${options.format}" (expected text or json).`);
  return config.output.format;
}

type CommandContext = {
  config: TriageConfig;
  appLog: Logger;
  uiLogger: Logger;
};

/**
 * Loads config, opens the JSONL log under the state dir and hands the command
 * a logger that writes there and to the terminal. Errors end with exit code 2.
 */
async function withCommandContext(
  params: { label: string; projectRoot: string; configPath?: string; quiet?: boolean; debug?: boolean },
  run: (ctx: CommandContext) => Promise<void>
): Promise<void> {
  let appLogger: AppLogger | null = null;
  let appLog: Logger = noopLogger;
  const terminal = createConsoleLogger({
    write: (line) => console.error(line),
    quiet: params.quiet,
    style: { warn: pc.yellow, error: pc.red }
  });
  let uiLogger = teeLogger(appLog, terminal);

  try {
    const config = await loadConfig({ projectRoot: params.projectRoot, configPath: params.configPath });
    try {
      appLogger = await createAppLogger({
        stateDir: config.stateDir,
        label: params.label,
        minLevel: params.debug ? "debug" : "info"
      });
      appLog = appLogger;
      uiLogger = teeLogger(appLog, terminal);
    } catch (err) {
      terminal.warn(`Logging to file disabled: ${errorMessage(err)}`);
    }
    await run({ config, appLog, uiLogger });
  } catch (err) {
    uiLogger.error(`Error: ${errorMessage(err)}`);
    process.exitCode = 2;
  } finally {
    await appLogger?.close();
  }
}

// Ctrl-C stops dispatching new work; in-flight findings finish and the
// partial result is still reported.
function abortOnSigint(): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const onSigint = () => controller.abort();
  process.once("SIGINT", onSigint);
  return { signal: controller.signal, dispose: () => process.removeListener("SIGINT", onSigint) };
}

program
  .name("triage")
  .description("Score static-analysis findings by how likely they are to be real")
  .version("0.1.0");

program
  .command("run <findings>")
  .description("Triage a SARIF or Semgrep JSON findings file")
  .option("-C, --project <dir>", "Project root (default: current directory)")
  .option("-c, --config <path>", "Path to triage.config.json")
  .addOption(new Option("-f, --format <format>", "Output format").choices(["text", "json"]))
  .option("--json", "Shortcut for --format json")
  .option("--refresh-index", "Refresh the fragment index in the background while triaging")
  .option("--debug", "Write debug entries to the log file")
  .action(
    async (
      findings: string,
      options: { project?: string; config?: string; format?: string; json?: boolean; refreshIndex?: boolean; debug?: boolean }
    ) => {
      const projectRoot = path.resolve(process.cwd(), options.project ?? ".");
      const quiet = Boolean(options.json || options.format === "json");
      await withCommandContext(
        { label: "run", projectRoot, configPath: options.config, quiet, debug: options.debug },
        async ({ config, appLog, uiLogger }) => {
          const format = resolveFormat(options, config);
          const spinner = format === "text" && process.stderr.isTTY ? new Spinner(process.stderr) : null;
          const interrupt = abortOnSigint();
          spinner?.start("Triaging findings...");
          try {
            const report = await runTriage({
              projectRoot,
              findingsPath: path.resolve(process.cwd(), findings),
              config,
              refreshIndex: options.refreshIndex,
              signal: interrupt.signal,
              // Per-finding warnings reach the terminal in text mode; JSON output stays clean.
              logger: format === "json" ? appLog : uiLogger,
              onProgress: spinner ? createProgressReporter((message) => spinner.update(message)) : undefined
            });
            spinner?.stop();

            if (format === "json") {
              console.log(formatTriageJson(report));
            } else {
              console.log(formatTriageText(report));
              console.log(`\nTriage completed in ${formatDuration(report.durationMs)}.`);
            }
            if (report.cancelled) {
              process.exitCode = 130;
            } else {
              process.exitCode = report.verdicts.some((verdict) => verdict.classification === "likely-true-positive")
                ? 1
                : 0;
            }
          } finally {
            spinner?.stop();
            interrupt.dispose();
          }
        }
      );
    }
  );

program
  .command("index [target]")
  .description("Embed the project's code fragments into the similarity index")
  .option("-c, --config <path>", "Path to triage.config.json")
  .option("--debug", "Write debug entries to the log file")
  .action(async (target: string | undefined, options: { config?: string; debug?: boolean }) => {
    const projectRoot = path.resolve(process.cwd(), target ?? ".");
    await withCommandContext(
      { label: "index", projectRoot, configPath: options.config, debug: options.debug },
      async ({ config, appLog, uiLogger }) => {
        const spinner = process.stderr.isTTY ? new Spinner(process.stderr) : null;
        const interrupt = abortOnSigint();
        spinner?.start("Refreshing index...");
        try {
          const summary = await runIndexRefresh({
            projectRoot,
            config,
            signal: interrupt.signal,
            logger: appLog,
            onProgress: spinner ? createProgressReporter((message) => spinner.update(message)) : undefined
          });
          spinner?.stop();
          if (summary.embeddingsReset) {
            uiLogger.warn("Embedding dimensions changed; stored fragments were dropped and re-embedded.");
          }
          const line =
            `Scanned ${summary.filesScanned} files (${summary.filesChanged} changed, ${summary.filesRemoved} removed); ` +
            `embedded ${summary.fragmentsEmbedded}, moved ${summary.fragmentsMoved}, removed ${summary.fragmentsRemoved} fragments.`;
          if (summary.cancelled) {
            uiLogger.warn(`Index refresh cancelled. ${line}`);
            process.exitCode = 130;
          } else {
            console.log(pc.green(line));
          }
        } finally {
          spinner?.stop();
          interrupt.dispose();
        }
      }
    );
  });

program
  .command("label <fragmentId> <disposition>")
  .description("Mark an indexed fragment as safe, vulnerable or unlabeled")
  .option("-C, --project <dir>", "Project root (default: current directory)")
  .option("-c, --config <path>", "Path to triage.config.json")
  .action(async (fragmentId: string, disposition: string, options: { project?: string; config?: string }) => {
    const projectRoot = path.resolve(process.cwd(), options.project ?? ".");
    await withCommandContext(
      { label: "label", projectRoot, configPath: options.config },
      async ({ config, appLog }) => {
        const resolved = DISPOSITION_ALIASES[disposition.toLowerCase()];
        if (!resolved) {
          throw new Error(`Unknown disposition "${disposition}" (expected safe, vulnerable or unlabeled).`);
        }
        const record = await labelFragment({ projectRoot, config, fragmentId, disposition: resolved, logger: appLog });
        const where = `${record.location.file}:${record.location.startLine}-${record.location.endLine}`;
        console.log(pc.green(`Labeled ${record.id} (${where}) as ${record.disposition}.`));
      }
    );
  });

program
  .command("trend")
  .description("Show classification counts across recorded triage runs")
  .option("-C, --project <dir>", "Project root (default: current directory)")
  .option("-c, --config <path>", "Path to triage.config.json")
  .option("-n, --limit <count>", "Only show the most recent runs")
  .option("-r, --run <id>", "Show the stored verdicts of one run")
  .option("--json", "Output JSON instead of text")
  .action(async (options: { project?: string; config?: string; limit?: string; run?: string; json?: boolean }) => {
    const projectRoot = path.resolve(process.cwd(), options.project ?? ".");
    await withCommandContext(
      { label: "trend", projectRoot, configPath: options.config, quiet: options.json },
      async ({ config, appLog }) => {
        if (options.run) {
          const { run, verdicts } = await loadRunVerdicts({ projectRoot, config, runId: options.run, logger: appLog });
          console.log(options.json ? formatRunVerdictsJson(run, verdicts) : formatRunVerdictsText(run, verdicts));
          return;
        }
        const limit = options.limit === undefined ? undefined : Number(options.limit);
        if (limit !== undefined && (!Number.isInteger(limit) || limit <= 0)) {
          throw new Error(`--limit must be a positive integer, got "${options.limit}".`);
        }
        const runs = await loadTrend({ projectRoot, config, limit, logger: appLog });
        console.log(options.json ? formatTrendJson(runs) : formatTrendText(runs));
      }
    );
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(pc.red(`Error: ${errorMessage(err)}`));
  process.exitCode = 2;
});
