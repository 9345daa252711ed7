import type { ApiResponse, GitHubApiClient } from "./client.js";
import { parsePullRequestPage } from "./payload.js";
import type { PullRequestPayload } from "./payload.js";
import { resolveUser } from "./users.js";
import type { UserCache } from "./users.js";
import { PullRequestRecord } from "../domain/pull-request.js";
import { addDays, parseCalendarDay } from "../utils/dates.js";
import type { CalendarDay } from "../utils/dates.js";

export type PullState = "open" | "closed";

export type IncludePredicate = (payload: PullRequestPayload) => boolean;

export type FetchPullRequestsOptions = {
  users: UserCache;
  asOf: CalendarDay;
  include?: IncludePredicate;
  onPage?: (url: string, accepted: number) => void;
};

const SORT_FIELD: Record<PullState, string> = {
  open: "created_at",
  closed: "closed_at",
};

export const includeAll: IncludePredicate = () => true;

/**
 * The list URL is joined with `?` rather than `&`, so the server reads a
 * single `state` parameter and applies its default ordering.
 */
export function buildPullsUrl(baseUrl: string, owner: string, repo: string, state: PullState): string {
  const normalizedBase = baseUrl.endsWith("/") ? baseUrl.slice(0, -1) : baseUrl;
  return `${normalizedBase}/repos/${owner}/${repo}/pulls?state=${state}?sort=${SORT_FIELD[state]}?direction=desc`;
}

/**
 * Walks the `Link: rel="next"` chain from `url` and returns every accepted
 * pull request in page order. Any failed page aborts the whole walk.
 */
export async function fetchPullRequests(
  client: GitHubApiClient,
  url: string,
  options: FetchPullRequestsOptions
): Promise<PullRequestRecord[]> {
  const include = options.include ?? includeAll;
  const lookupUser = (userUrl: string) => resolveUser(client, options.users, userUrl);
  const records: PullRequestRecord[] = [];
  let nextUrl: string | undefined = url;

  while (nextUrl) {
    const response: ApiResponse = await client.get(nextUrl);
    const payloads = parsePullRequestPage(response.body, nextUrl);

    let accepted = 0;
    for (const payload of payloads) {
      if (!include(payload)) {
        continue;
      }
      records.push(await PullRequestRecord.fromPayload(payload, { lookupUser, asOf: options.asOf }));
      accepted += 1;
    }
    options.onPage?.(nextUrl, accepted);

    nextUrl = response.links.next;
  }

  return records;
}

/**
 * Keeps pull requests closed strictly after `asOf - periodDays`. Without a
 * period every pull request is kept. A payload with no `closed_at` is kept
 * so that the classifier reports it.
 */
export function closedWithin(periodDays: number | undefined, asOf: CalendarDay): IncludePredicate {
  if (!periodDays) {
    return includeAll;
  }
  const cutoff = addDays(asOf, -periodDays);
  return (payload) => {
    if (!payload.closed_at) {
      return true;
    }
    return cutoff < parseCalendarDay(payload.closed_at);
  };
}
