import { CliError } from "../errors.js";
import { DEFAULT_ATTENTION_DAYS } from "../domain/pull-request.js";
import type { PullRequestRecord } from "../domain/pull-request.js";
import { buildHistogram, renderBin, trimTrailingEmpty } from "./histogram.js";
import type { HistogramBin } from "./histogram.js";

export type LatencySummary = {
  average: number;
  peak: number;
  bins: HistogramBin[];
};

export type StatsInput = {
  periodDays?: number;
  open: readonly PullRequestRecord[];
  abandoned: readonly PullRequestRecord[];
  merged: readonly PullRequestRecord[];
  attentionDays?: number;
};

export function summarizeLatency(records: readonly PullRequestRecord[]): LatencySummary {
  if (records.length === 0) {
    throw new CliError("Cannot summarize time to close for an empty set of pull requests.");
  }

  const latencies = records.map((record) => record.timeToClose());
  const total = latencies.reduce((sum, value) => sum + value, 0);
  return {
    average: Math.floor(total / latencies.length),
    peak: latencies.reduce((max, value) => Math.max(max, value), latencies[0] ?? 0),
    bins: buildHistogram(latencies),
  };
}

export function renderHistogram(records: readonly PullRequestRecord[], action: string): string[] {
  const summary = summarizeLatency(records);
  return [
    `\tAverage time to ${action}: ${summary.average} days`,
    `\tPeak time to ${action}: ${summary.peak} days`,
    `\tHistogram of ${action} time: in days`,
    ...trimTrailingEmpty(summary.bins).map((bin) => renderBin(bin)),
  ];
}

export function describePeriod(periodDays?: number): string {
  return periodDays ? `for the past ${periodDays} days` : "For the entire life of the repository";
}

export function renderStats(input: StatsInput): string {
  const period = describePeriod(input.periodDays);
  const attentionDays = input.attentionDays ?? DEFAULT_ATTENTION_DAYS;
  const lines: string[] = [];

  if (input.merged.length > 0) {
    lines.push(`Merged Pull Requests ${period}: ${input.merged.length}`, "");
    lines.push(...renderHistogram(input.merged, "merge"));
  }

  if (input.abandoned.length > 0) {
    lines.push("", `Abandoned Pull Requests ${period}: ${input.abandoned.length}`, "");
    lines.push(...renderHistogram(input.abandoned, "abandon"));
  }

  lines.push("", `Currently Open Pull Requests: ${input.open.length}`, "");

  const stale = [...input.open]
    .sort((a, b) => b.openFor() - a.openFor())
    .filter((record) => record.needsAttention(attentionDays));

  if (stale.length > 0) {
    lines.push(`Pull Requests needing attention: (open for more than ${attentionDays} days):`);
    for (const record of stale) {
      lines.push(record.render());
    }
  }

  return `${lines.join("\n")}\n`;
}

export function printStats(input: StatsInput): void {
  process.stdout.write(renderStats(input));
}
