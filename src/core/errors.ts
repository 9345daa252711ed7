export class CliError extends Error {
  constructor(message: string, public readonly causeError?: unknown, public readonly exitCode = 1) {
    super(message);
    this.name = "CliError";
  }
}

// Exit status 255 is what the shell sees for exit(-1).
export const API_FAILURE_EXIT_CODE = 255;

export class GitHubApiError extends CliError {
  constructor(
    public readonly status: number,
    public readonly statusText: string,
    public readonly url: string
  ) {
    super(formatApiFailure(status, statusText, url), undefined, API_FAILURE_EXIT_CODE);
    this.name = "GitHubApiError";
  }
}

export class InvariantError extends CliError {
  constructor(message: string) {
    super(message);
    this.name = "InvariantError";
  }
}

export type Failure = {
  message: string;
  exitCode: number;
};

export function describeFailure(error: unknown): Failure {
  if (error instanceof CliError) {
    return { message: `Error: ${error.message}`, exitCode: error.exitCode };
  }
  if (error instanceof Error) {
    return { message: `Error: ${error.message}`, exitCode: 1 };
  }
  return { message: `Error: ${String(error)}`, exitCode: 1 };
}

function formatApiFailure(status: number, statusText: string, url: string): string {
  const text = statusText.trim();
  const label = text ? `${status} ${text}` : String(status);
  return `Can't contact GitHub API: ${label} (${url})`;
}
