import { InvariantError } from "../errors.js";
import type { PullRequestRecord } from "./pull-request.js";

export type ClosedBuckets = {
  abandoned: PullRequestRecord[];
  merged: PullRequestRecord[];
};

export function classifyClosed(records: readonly PullRequestRecord[]): ClosedBuckets {
  const buckets: ClosedBuckets = { abandoned: [], merged: [] };

  for (const record of records) {
    if (record.isOpen()) {
      throw new InvariantError(`Not expecting an open pull request in the closed list: ${record.url}`);
    }
    if (record.isAbandoned()) {
      buckets.abandoned.push(record);
    } else if (record.isMerged()) {
      buckets.merged.push(record);
    }
  }

  return buckets;
}
