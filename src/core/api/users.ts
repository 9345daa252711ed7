import { z } from "zod";
import type { GitHubApiClient } from "./client.js";
import { GitHubApiError } from "../errors.js";

export type UserIdentity =
  | { kind: "known"; login: string; name?: string }
  | { kind: "unknown" };

export const UNKNOWN_USER: UserIdentity = { kind: "unknown" };

// Deleted or suspended accounts.
const GONE_STATUSES = new Set([404, 410]);

const UserProfileSchema = z.object({
  login: z.string(),
  name: z.string().nullish(),
});

/** Profiles resolved during one run, keyed by profile URL. */
export class UserCache {
  private readonly entries = new Map<string, UserIdentity>();

  get(url: string): UserIdentity | undefined {
    return this.entries.get(url);
  }

  set(url: string, identity: UserIdentity): void {
    this.entries.set(url, identity);
  }

  get size(): number {
    return this.entries.size;
  }
}

/**
 * Looks a profile up once per run. A profile that is gone (404/410) or whose
 * body has no usable `login` resolves to {@link UNKNOWN_USER}; any other
 * HTTP or network failure propagates.
 */
export async function resolveUser(client: GitHubApiClient, cache: UserCache, url: string): Promise<UserIdentity> {
  const cached = cache.get(url);
  if (cached) {
    return cached;
  }

  const identity = await fetchIdentity(client, url);
  cache.set(url, identity);
  return identity;
}

export function formatUser(identity: UserIdentity): string {
  if (identity.kind === "unknown") {
    return "None";
  }
  return identity.name ? identity.name : identity.login;
}

async function fetchIdentity(client: GitHubApiClient, url: string): Promise<UserIdentity> {
  try {
    const response = await client.get(url);
    return toIdentity(response.body);
  } catch (error) {
    if (error instanceof GitHubApiError && GONE_STATUSES.has(error.status)) {
      return UNKNOWN_USER;
    }
    throw error;
  }
}

function toIdentity(body: unknown): UserIdentity {
  const parsed = UserProfileSchema.safeParse(body);
  if (!parsed.success) {
    return UNKNOWN_USER;
  }
  const { login, name } = parsed.data;
  return name ? { kind: "known", login, name } : { kind: "known", login };
}
