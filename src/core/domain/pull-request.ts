import type { PullRequestPayload } from "../api/payload.js";
import { formatUser } from "../api/users.js";
import type { UserIdentity } from "../api/users.js";
import { CliError } from "../errors.js";
import {
  addDays,
  daysBetween,
  formatCalendarDay,
  parseCalendarDay,
  parseOptionalCalendarDay,
} from "../utils/dates.js";
import type { CalendarDay } from "../utils/dates.js";

export const DEFAULT_ATTENTION_DAYS = 15;

export type UserLookup = (url: string) => Promise<UserIdentity>;

export type PullRequestFields = {
  createdAt: CalendarDay;
  closedAt?: CalendarDay;
  mergedAt?: CalendarDay;
  title: string;
  url: string;
  author: UserIdentity;
  reviewers: readonly UserIdentity[];
};

export class PullRequestRecord {
  readonly createdAt: CalendarDay;
  readonly closedAt?: CalendarDay;
  readonly mergedAt?: CalendarDay;
  readonly title: string;
  readonly url: string;
  readonly author: UserIdentity;
  readonly reviewers: readonly UserIdentity[];

  /**
   * @param asOf - the day every relative computation ("N days ago") is measured from
   */
  constructor(fields: PullRequestFields, readonly asOf: CalendarDay) {
    if (fields.mergedAt && !fields.closedAt) {
      throw new CliError(`Pull request ${fields.url} is merged but has no closing date.`);
    }
    this.createdAt = fields.createdAt;
    this.closedAt = fields.closedAt;
    this.mergedAt = fields.mergedAt;
    this.title = fields.title;
    this.url = fields.url;
    this.author = fields.author;
    this.reviewers = [...fields.reviewers];
  }

  /**
   * Parses the dates of one list item and resolves its author and requested
   * reviewers, one at a time.
   */
  static async fromPayload(
    payload: PullRequestPayload,
    context: { lookupUser: UserLookup; asOf: CalendarDay }
  ): Promise<PullRequestRecord> {
    const createdAt = parseCalendarDay(payload.created_at);
    const closedAt = parseOptionalCalendarDay(payload.closed_at);
    const mergedAt = parseOptionalCalendarDay(payload.merged_at);

    const author = await context.lookupUser(payload.user.url);
    const reviewers: UserIdentity[] = [];
    for (const reviewer of payload.requested_reviewers) {
      reviewers.push(await context.lookupUser(reviewer.url));
    }

    return new PullRequestRecord(
      {
        createdAt,
        closedAt,
        mergedAt,
        title: payload.title,
        url: payload.html_url,
        author,
        reviewers,
      },
      context.asOf
    );
  }

  isOpen(): boolean {
    return this.closedAt === undefined;
  }

  isAbandoned(): boolean {
    return this.closedAt !== undefined && this.mergedAt === undefined;
  }

  isMerged(): boolean {
    return this.mergedAt !== undefined;
  }

  needsAttention(days = DEFAULT_ATTENTION_DAYS): boolean {
    return this.isOpen() && addDays(this.asOf, -days) > this.createdAt;
  }

  timeToClose(): number {
    if (!this.closedAt) {
      throw new CliError(`Pull request ${this.url} is still open.`);
    }
    return daysBetween(this.createdAt, this.closedAt);
  }

  openFor(): number {
    return daysBetween(this.createdAt, this.asOf);
  }

  render(): string {
    const lines = [
      `\tAuthor      : ${formatUser(this.author)}`,
      `\tTitle       : ${this.title}`,
      `\tURL         : ${this.url}`,
    ];
    const created = formatCalendarDay(this.createdAt);
    if (this.closedAt) {
      lines.push(
        `\tCreated  at : ${created} and Closed at ${formatCalendarDay(this.closedAt)} (after ${this.timeToClose()} days)`
      );
    } else {
      lines.push(`\tCreated  at : ${created} (${this.openFor()} days ago)`);
    }
    return `${lines.join("\n")}\n`;
  }
}
