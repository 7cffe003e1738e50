import type { TrialRunReport } from "./engine.js";
import type { TrialMode, TrialRunSummary, TrialStats } from "./types.js";

const INDENT = "   ";

function headerLines(stats: TrialStats): string[] {
  return ["", "----SUMMARY----", `${stats.valid} jobs were requested total.`];
}

function finishedLines(stats: TrialStats): string[] {
  const lines = [
    `${INDENT}${stats.finished} jobs are marked finished.`,
    `${INDENT.repeat(2)}${stats["finished.new"]} are newly marked.`,
  ];
  if (stats["finished.wrong"] > 0) {
    lines.push(`${INDENT.repeat(2)}${stats["finished.wrong"]} look unfinished! (!!!)`);
  }
  return lines;
}

export function renderSummary(stats: TrialStats, mode: TrialMode): string[] {
  const lines = [...headerLines(stats), ...finishedLines(stats)];

  if (mode === "check") {
    const unfinished = Math.max(0, stats.valid - stats.finished);
    const warning = unfinished > 0 ? " (!!!)" : "";
    lines.push(`${INDENT}${unfinished} jobs remain unfinished.${warning}`);
    return lines;
  }

  if (mode === "skip") {
    lines.push(`${INDENT}${stats.skipped} unfinished jobs were skipped. (-s)`);
  }
  lines.push(`${INDENT}${stats.submitted} jobs were submitted.`);
  if (mode === "resume") {
    lines.push(`${INDENT.repeat(2)}${stats["submitted.resumed"]} of these were resubmissions. (-r)`);
  }
  if (stats.unprocessed > 0) {
    lines.push(`${INDENT}${stats.unprocessed} remain unprocessed after a failed submission. (!!!)`);
  }
  return lines;
}

export function toRunSummary(report: TrialRunReport): TrialRunSummary {
  const trials = Array.from(report.outcomes.entries())
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([path, outcome]) => {
      const jobId = report.jobIds.get(path);
      return jobId ? { path, outcome, jobId } : { path, outcome };
    });

  return {
    mode: report.mode,
    stats: { ...report.stats },
    trials,
    ...(report.submissionFailure ? { submissionFailure: { ...report.submissionFailure } } : {}),
  };
}
