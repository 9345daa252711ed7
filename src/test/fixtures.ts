import { http, HttpResponse } from "msw";
import type { HttpHandler } from "msw";

export const API = "https://api.github.com";
export const TEST_TOKEN = "test-token";

export type PullFixture = {
  created_at: string;
  closed_at: string | null;
  merged_at: string | null;
  title: string;
  html_url: string;
  user: { url: string };
  requested_reviewers: Array<{ url: string }>;
};

export function userUrl(login: string): string {
  return `${API}/users/${login}`;
}

export function pull(number: number, overrides: Partial<PullFixture> = {}): PullFixture {
  return {
    created_at: "2024-01-01T10:00:00Z",
    closed_at: null,
    merged_at: null,
    title: `Change #${number}`,
    html_url: `https://github.com/acme/widgets/pull/${number}`,
    user: { url: userUrl("alice") },
    requested_reviewers: [],
    ...overrides,
  };
}

/** Profiles for `alice` (named) and `bob` (login only); `hits` counts requests per login. */
export function userHandlers(hits: Map<string, number> = new Map()): HttpHandler[] {
  const profiles: Record<string, { login: string; name: string | null }> = {
    alice: { login: "alice", name: "Alice Example" },
    bob: { login: "bob", name: null },
  };

  return [
    http.get(`${API}/users/:login`, ({ params }) => {
      const login = String(params.login);
      hits.set(login, (hits.get(login) ?? 0) + 1);
      const profile = profiles[login];
      if (!profile) {
        return HttpResponse.json({ message: "Not Found" }, { status: 404 });
      }
      return HttpResponse.json(profile);
    }),
  ];
}

/**
 * Serves `pages` from `path`, page N linking to `?page=N+1` through the
 * `Link` header.
 */
export function pagedHandler(path: string, pages: PullFixture[][]): HttpHandler {
  return http.get(`${API}${path}`, ({ request }) => {
    const page = Number(new URL(request.url).searchParams.get("page") ?? "1");
    const items = pages[page - 1] ?? [];
    const headers: Record<string, string> = {};
    if (page < pages.length) {
      headers.Link = `<${API}${path}?page=${page + 1}>; rel="next", <${API}${path}?page=${pages.length}>; rel="last"`;
    }
    return HttpResponse.json(items, { headers });
  });
}
