import { CliError, GitHubApiError } from "../errors.js";

export type ApiResponse = {
  url: string;
  body: unknown;
  links: PageLinks;
};

export type PageLinks = Partial<Record<"next" | "prev" | "first" | "last", string>>;

const USER_AGENT = "pr-stats/0.1.0";

export class GitHubApiClient {
  constructor(private readonly token: string) {}

  async get(url: string): Promise<ApiResponse> {
    let response: Response;
    try {
      response = await fetch(url, {
        method: "GET",
        headers: {
          "Accept": "application/vnd.github+json",
          "Authorization": `Bearer ${this.token}`,
          "User-Agent": USER_AGENT,
        },
      });
    } catch (error) {
      throw new CliError(`Request failed: ${String(error)}`, error);
    }

    if (!response.ok) {
      throw new GitHubApiError(response.status, response.statusText, url);
    }

    return {
      url,
      body: await parseResponseBody(response),
      links: parseLinkHeader(response.headers.get("link")),
    };
  }
}

export function parseLinkHeader(header: string | null): PageLinks {
  if (!header) {
    return {};
  }

  const links: PageLinks = {};
  for (const part of header.split(",")) {
    const match = part.match(/<([^>]+)>;\s*rel="([^"]+)"/);
    if (!match) {
      continue;
    }
    const [, target, rel] = match;
    if (target && isPageRel(rel)) {
      links[rel] = target;
    }
  }
  return links;
}

function isPageRel(rel: string | undefined): rel is keyof PageLinks {
  return rel === "next" || rel === "prev" || rel === "first" || rel === "last";
}

async function parseResponseBody(response: Response): Promise<unknown> {
  const text = await response.text();
  if (!text.trim()) {
    return undefined;
  }
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}
