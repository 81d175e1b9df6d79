import { ExitCode } from './enums';

interface GitHubApiErrorDetails {
  status?: number;
  url?: string;
  cause?: unknown;
}

/**
 * Base class for failures that are reported to the user and end the run
 * with a non-zero exit code. Anything else escaping `run` is a bug.
 */
export class PrStatsError extends Error {
  public readonly exitCode: ExitCode = ExitCode.FAILURE;

  public constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PrStatsError';
  }
}

export class UsageError extends PrStatsError {
  public readonly exitCode = ExitCode.USAGE;

  public constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export class ConfigError extends PrStatsError {
  public readonly path: string;

  public constructor(path: string, message: string, options?: { cause?: unknown }) {
    super(`Invalid configuration in ${path}: ${message}`, options);
    this.name = 'ConfigError';
    this.path = path;
  }
}

export class GitHubApiError extends PrStatsError {
  /**
   * HTTP status reported by Octokit. Transport failures carry 500 and no response.
   */
  public readonly status?: number;
  public readonly url?: string;

  public constructor(message: string, details: GitHubApiErrorDetails = {}) {
    super(message, { cause: details.cause });
    this.name = 'GitHubApiError';
    this.status = details.status;
    this.url = details.url;
  }
}

export class RateLimitError extends GitHubApiError {
  public readonly resetAt?: Date;

  public constructor(resetAt: Date | undefined, details: GitHubApiErrorDetails = {}) {
    const when = resetAt ? ` (resets at ${resetAt.toISOString()})` : '';
    super(`GitHub API rate limit exceeded${when}`, details);
    this.name = 'RateLimitError';
    this.resetAt = resetAt;
  }
}

export class UnknownUserError extends GitHubApiError {
  public readonly user: string;

  public constructor(
    user: string,
    details: GitHubApiErrorDetails = {},
    reason?: string,
  ) {
    const suffix = reason ? `: ${reason}` : '';
    super(`GitHub user "${user}" does not exist or cannot be searched${suffix}`, details);
    this.name = 'UnknownUserError';
    this.user = user;
  }
}
