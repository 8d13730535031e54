export class DemoError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class UsageError extends DemoError {}

export class MissingCredentialsError extends DemoError {
  readonly missing: string[];

  constructor(missing: string[]) {
    super(`Missing Reddit API credentials: ${missing.join(", ")}`);
    this.missing = missing;
  }
}

/**
 * Failure reported by the Reddit API or the transport underneath it.
 * `status` is the HTTP status when a response came back.
 */
export class RedditApiError extends DemoError {
  readonly status: number | undefined;

  constructor(message: string, status?: number, options?: ErrorOptions) {
    super(message, options);
    this.status = status;
  }
}

export class RedditAuthError extends RedditApiError {}

export class RedditNotFoundError extends RedditApiError {
  readonly submissionId: string;

  constructor(submissionId: string, status?: number, options?: ErrorOptions) {
    super(`Submission '${submissionId}' was not found`, status, options);
    this.submissionId = submissionId;
  }
}

export class RedditRequestError extends RedditApiError {}
