import pc from "picocolors";
import type { Classification, Finding, ScoreContribution, TriageReport, TriageVerdict } from "../types.js";
import {
  emptyCounts,
  type ClassificationCounts,
  type RunSummary,
  type StoredVerdict
} from "../repositories/runRepository.js";

type Colors = ReturnType<typeof pc.createColors>;

export type TextFormatOptions = {
  // Defaults to what the terminal supports; plain text when piping to files.
  color?: boolean;
};

const SECTIONS: ReadonlyArray<{ classification: Classification; title: string }> = [
  { classification: "likely-true-positive", title: "LIKELY TRUE POSITIVES" },
  { classification: "needs-manual-review", title: "NEEDS MANUAL REVIEW" },
  { classification: "likely-false-positive", title: "LIKELY FALSE POSITIVES" }
];

function colorsFor(options: TextFormatOptions): Colors {
  return pc.createColors(options.color ?? pc.isColorSupported);
}

function severityLabel(severity: Finding["severity"], c: Colors): string {
  switch (severity) {
    case "critical":
      return c.bgRed(c.white(" CRITICAL "));
    case "high":
      return c.red("HIGH");
    case "medium":
      return c.yellow("MEDIUM");
    case "info":
      return c.blue("INFO");
    case "low":
    default:
      return c.green("LOW");
  }
}

function classificationLabel(classification: Classification, c: Colors): string {
  switch (classification) {
    case "likely-true-positive":
      return c.red("likely true positive");
    case "likely-false-positive":
      return c.green("likely false positive");
    case "needs-manual-review":
    default:
      return c.yellow("needs manual review");
  }
}

function signed(value: number): string {
  return value > 0 ? `+${value}` : String(value);
}

function formatContributions(contributions: readonly ScoreContribution[]): string {
  return contributions.map((entry) => `${entry.signal} ${signed(entry.contribution)}`).join(", ");
}

export function countClassifications(verdicts: readonly TriageVerdict[]): ClassificationCounts {
  const counts = emptyCounts();
  for (const verdict of verdicts) counts[verdict.classification] += 1;
  return counts;
}

function formatCounts(counts: ClassificationCounts, c: Colors): string {
  return (
    `${classificationLabel("likely-true-positive", c)} ${counts["likely-true-positive"]}, ` +
    `${classificationLabel("needs-manual-review", c)} ${counts["needs-manual-review"]}, ` +
    `${classificationLabel("likely-false-positive", c)} ${counts["likely-false-positive"]}`
  );
}

function formatVerdict(verdict: TriageVerdict, finding: Finding | undefined, rank: number, c: Colors): string {
  const lines: string[] = [];
  const score = verdict.score.value.toFixed(2);
  if (!finding) {
    lines.push(`#${rank} ${score} ${verdict.findingId}`);
  } else {
    lines.push(`#${rank} ${score} ${severityLabel(finding.severity, c)} ${finding.ruleId}`);
    lines.push(`  location: ${finding.location.file}:${finding.location.startLine}`);
    lines.push(`  ${finding.message}`);
  }
  lines.push(`  signals: ${formatContributions(verdict.score.contributions)}`);
  if (verdict.score.flags.length) {
    lines.push(`  ${c.dim("flags:")} ${verdict.score.flags.join(", ")}`);
  }
  return lines.join("\n");
}

/**
 * Human-readable report: a summary, then one section per classification with
 * verdicts in ranked order (most likely real first).
 */
export function formatTriageText(report: TriageReport, options: TextFormatOptions = {}): string {
  const c = colorsFor(options);
  if (!report.verdicts.length) {
    return report.cancelled ? "Triage cancelled before any finding was scored." : "No findings.";
  }

  const findingsById = new Map(report.findings.map((finding) => [finding.id, finding]));
  const counts = countClassifications(report.verdicts);
  const summary = [
    "TRIAGE SUMMARY",
    "--------------",
    `- Findings: ${report.processed} of ${report.total} triaged (${formatCounts(counts, c)})`,
    `- Run: ${report.runId} (${report.durationMs}ms)`
  ];
  if (report.cancelled) {
    summary.push(c.yellow(`- Cancelled: ${report.total - report.processed} findings were not triaged`));
  }

  let rank = 0;
  const sections: string[] = [];
  for (const section of SECTIONS) {
    const verdicts = report.verdicts.filter((verdict) => verdict.classification === section.classification);
    if (!verdicts.length) continue;
    const body = verdicts.map((verdict) => {
      rank += 1;
      return formatVerdict(verdict, findingsById.get(verdict.findingId), rank, c);
    });
    sections.push([c.bold(section.title), ...body].join("\n\n"));
  }

  return `${summary.join("\n")}\n\n${sections.join("\n\n")}`;
}

export function formatTriageJson(report: TriageReport): string {
  const findingsById = new Map(report.findings.map((finding) => [finding.id, finding]));
  return JSON.stringify(
    {
      runId: report.runId,
      total: report.total,
      processed: report.processed,
      cancelled: report.cancelled,
      durationMs: report.durationMs,
      counts: countClassifications(report.verdicts),
      verdicts: report.verdicts.map((verdict) => ({
        finding: findingsById.get(verdict.findingId) ?? null,
        classification: verdict.classification,
        score: verdict.score.value,
        contributions: verdict.score.contributions,
        flags: verdict.score.flags
      }))
    },
    null,
    2
  );
}

function delta(current: number, previous: number | undefined): string {
  if (previous === undefined) return "";
  const diff = current - previous;
  return diff === 0 ? " (=)" : ` (${diff > 0 ? "+" : ""}${diff})`;
}

/**
 * One line per recorded run, oldest first, with changes against the run
 * before it.
 */
export function formatTrendText(runs: readonly RunSummary[], options: TextFormatOptions = {}): string {
  const c = colorsFor(options);
  if (!runs.length) return "No recorded runs.";

  const lines = ["TRIAGE TREND", "------------"];
  runs.forEach((run, position) => {
    const previous = position > 0 ? runs[position - 1] : undefined;
    const tp = run.counts["likely-true-positive"];
    const review = run.counts["needs-manual-review"];
    const fp = run.counts["likely-false-positive"];
    const parts = [
      `${run.startedAt}`,
      `findings ${run.total}${delta(run.total, previous?.total)}`,
      `${c.red("TP")} ${tp}${delta(tp, previous?.counts["likely-true-positive"])}`,
      `${c.yellow("review")} ${review}${delta(review, previous?.counts["needs-manual-review"])}`,
      `${c.green("FP")} ${fp}${delta(fp, previous?.counts["likely-false-positive"])}`
    ];
    if (run.cancelled) parts.push(c.yellow("cancelled"));
    lines.push(parts.join("  "));
  });
  return lines.join("\n");
}

export function formatTrendJson(runs: readonly RunSummary[]): string {
  return JSON.stringify({ runs }, null, 2);
}

/**
 * A recorded run read back from the store: its summary, then every stored
 * verdict in the order the run ranked them.
 */
export function formatRunVerdictsText(
  run: RunSummary,
  verdicts: readonly StoredVerdict[],
  options: TextFormatOptions = {}
): string {
  const c = colorsFor(options);
  const lines = [
    `RUN ${run.id}`,
    "----",
    `- Started: ${run.startedAt}`,
    `- Findings: ${run.processed} of ${run.total} triaged (${formatCounts(run.counts, c)})`
  ];
  if (run.cancelled) lines.push(c.yellow("- Cancelled"));
  if (!verdicts.length) return [...lines, "", "No verdicts recorded."].join("\n");

  lines.push("");
  verdicts.forEach((verdict, position) => {
    lines.push(
      `#${position + 1} ${verdict.score.toFixed(2)} ${classificationLabel(verdict.classification, c)} ` +
        `${verdict.ruleId} ${verdict.file}:${verdict.startLine}`
    );
    if (verdict.flags.length) lines.push(`  ${c.dim("flags:")} ${verdict.flags.join(", ")}`);
  });
  return lines.join("\n");
}

export function formatRunVerdictsJson(run: RunSummary, verdicts: readonly StoredVerdict[]): string {
  return JSON.stringify({ run, verdicts }, null, 2);
}
