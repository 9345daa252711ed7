import { Command } from "commander";
import { GitHubApiClient } from "../core/api/client.js";
import { buildPullsUrl, closedWithin, fetchPullRequests } from "../core/api/pulls.js";
import { UserCache } from "../core/api/users.js";
import { parseRunOptions } from "../core/config/schema.js";
import type { RunOptions } from "../core/config/schema.js";
import { classifyClosed } from "../core/domain/classify.js";
import type { PullRequestRecord } from "../core/domain/pull-request.js";
import { printStats } from "../core/output/report.js";
import type { StatsInput } from "../core/output/report.js";
import { today } from "../core/utils/dates.js";
import type { CalendarDay } from "../core/utils/dates.js";
import { parseDaysOption, parseThresholdOption } from "../core/utils/options.js";

type StatsCommandOptions = {
  repo?: string;
  owner?: string;
  period?: number;
  token: string;
  openOnly?: boolean;
  attentionDays?: number;
  apiUrl?: string;
  verbose?: boolean;
};

export type StatsRunner = (options: RunOptions) => Promise<void>;

export function configureStatsProgram(program: Command, run: StatsRunner = runStats): void {
  program
    .option("--repo <name>", "Repository name (default: scylla)")
    .option("--owner <owner>", "Repository owner (default: scylladb)")
    .option("--period <days>", "Only count pull requests closed in the past N days", parseDaysOption)
    .requiredOption("--token <token>", "GitHub token; unauthenticated requests are rate limited")
    .option("--open-only", "Only look at open pull requests")
    .option("--attention-days <days>", "Flag open pull requests older than N days (default: 15)", parseThresholdOption)
    .option("--api-url <url>", "GitHub API base URL (default: https://api.github.com)")
    .option("--verbose", "Report fetch progress on stderr")
    .action(async (options: StatsCommandOptions) => {
      await run(parseRunOptions(options));
    });
}

export async function runStats(options: RunOptions): Promise<void> {
  printStats(await collectStats(options, today()));
}

/**
 * Fetches open and (unless `openOnly`) closed pull requests and buckets
 * them. Every relative day count is measured from `asOf`.
 */
export async function collectStats(options: RunOptions, asOf: CalendarDay): Promise<StatsInput> {
  const client = new GitHubApiClient(options.token);
  const users = new UserCache();
  const onPage = options.verbose ? reportPage : undefined;

  const open = await fetchPullRequests(client, buildPullsUrl(options.apiUrl, options.owner, options.repo, "open"), {
    users,
    asOf,
    onPage,
  });

  let abandoned: PullRequestRecord[] = [];
  let merged: PullRequestRecord[] = [];
  if (!options.openOnly) {
    const closed = await fetchPullRequests(client, buildPullsUrl(options.apiUrl, options.owner, options.repo, "closed"), {
      users,
      asOf,
      include: closedWithin(options.period, asOf),
      onPage,
    });
    ({ abandoned, merged } = classifyClosed(closed));
  }

  return {
    periodDays: options.period,
    open,
    abandoned,
    merged,
    attentionDays: options.attentionDays,
  };
}

function reportPage(url: string, accepted: number): void {
  process.stderr.write(`Fetched ${accepted} pull requests from ${url}\n`);
}
