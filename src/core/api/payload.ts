import { z } from "zod";
import { CliError } from "../errors.js";
import { formatValidationError } from "../utils/validation.js";

const UserRefSchema = z.object({
  url: z.string().min(1),
});

/** The fields of a pull request list item the report reads. Dates stay unparsed. */
export const PullRequestPayloadSchema = z.object({
  created_at: z.string(),
  closed_at: z.string().nullish(),
  merged_at: z.string().nullish(),
  title: z.string(),
  html_url: z.string(),
  user: UserRefSchema,
  requested_reviewers: z.array(UserRefSchema).default([]),
});

export type PullRequestPayload = z.infer<typeof PullRequestPayloadSchema>;

export function parsePullRequestPage(body: unknown, url: string): PullRequestPayload[] {
  if (!Array.isArray(body)) {
    throw new CliError(`Expected a JSON array of pull requests from ${url}.`);
  }

  const parsed = z.array(PullRequestPayloadSchema).safeParse(body);
  if (!parsed.success) {
    throw new CliError(`Unexpected pull request payload from ${url}: ${formatValidationError(parsed.error)}`, parsed.error);
  }
  return parsed.data;
}
