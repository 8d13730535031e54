import axios, { type AxiosInstance } from "axios";
import { z } from "zod";
import {
  MissingCredentialsError,
  RedditApiError,
  RedditAuthError,
  RedditNotFoundError,
  RedditRequestError,
} from "./errors";
import type {
  RedditComment,
  RedditCredentials,
  RedditSubmission,
  RedditThread,
  ThreadSource,
} from "./types/reddit";

export const TOKEN_URL = "https://www.reddit.com/api/v1/access_token";
export const API_BASE_URL = "https://oauth.reddit.com";

// Refresh this long before Reddit's stated expiry
const TOKEN_EXPIRY_MARGIN_MS = 60_000;

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string().optional(),
  expires_in: z.number().optional(),
});

const childSchema = z.object({
  kind: z.string(),
  data: z.unknown(),
});

const listingSchema = z.object({
  kind: z.literal("Listing"),
  data: z.object({
    children: z.array(childSchema),
  }),
});

const commentsResponseSchema = z.tuple([listingSchema, listingSchema]);

const submissionDataSchema = z.object({
  id: z.string(),
  title: z.string(),
  subreddit: z.string(),
  permalink: z.string(),
  score: z.number(),
  num_comments: z.number(),
});

const commentDataSchema = z.object({
  id: z.string(),
  author: z.string().nullish(),
  body: z.string(),
  score: z.number(),
  permalink: z.string(),
  created_utc: z.number(),
});

interface CachedToken {
  value: string;
  expiresAt: number;
}

function toSubmission(data: z.infer<typeof submissionDataSchema>): RedditSubmission {
  return {
    id: data.id,
    title: data.title,
    subreddit: data.subreddit,
    permalink: data.permalink,
    score: data.score,
    numComments: data.num_comments,
  };
}

function toComment(data: z.infer<typeof commentDataSchema>): RedditComment {
  return {
    id: data.id,
    author: data.author || "[deleted]",
    score: data.score,
    text: data.body,
    permalink: data.permalink,
    timestamp: new Date(data.created_utc * 1000).toISOString(),
  };
}

function parseResponse<T>(schema: z.ZodType<T>, data: unknown, submissionId: string): T {
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    throw new RedditRequestError(
      `Unexpected response shape for submission '${submissionId}'`,
      undefined,
      { cause: parsed.error }
    );
  }
  return parsed.data;
}

function statusOf(error: unknown): number | undefined {
  return axios.isAxiosError(error) ? error.response?.status : undefined;
}

/**
 * Read-only Reddit client using the app-only (client credentials) OAuth flow.
 */
export class RedditClient implements ThreadSource {
  private readonly credentials: RedditCredentials;
  private readonly http: AxiosInstance;
  private token: CachedToken | null = null;

  constructor(credentials: RedditCredentials, http: AxiosInstance = axios.create()) {
    const missing: string[] = [];
    if (!credentials.clientId.trim()) missing.push("REDDIT_CLIENT_ID");
    if (!credentials.clientSecret.trim()) missing.push("REDDIT_CLIENT_SECRET");
    if (missing.length > 0) {
      throw new MissingCredentialsError(missing);
    }

    this.credentials = credentials;
    this.http = http;
  }

  async authenticate(): Promise<string> {
    if (this.token && this.token.expiresAt > Date.now()) {
      return this.token.value;
    }

    let body: unknown;
    try {
      const response = await this.http.post(
        TOKEN_URL,
        new URLSearchParams({
          grant_type: "client_credentials",
        }),
        {
          auth: {
            username: this.credentials.clientId,
            password: this.credentials.clientSecret,
          },
          headers: {
            "User-Agent": this.credentials.userAgent,
          },
        }
      );
      body = response.data;
    } catch (error) {
      const status = statusOf(error);
      if (status === 401 || status === 403) {
        throw new RedditAuthError(
          `Reddit rejected the app credentials (HTTP ${status})`,
          status,
          { cause: error }
        );
      }
      throw new RedditRequestError(
        `Failed to get access token: ${error instanceof Error ? error.message : String(error)}`,
        status,
        { cause: error }
      );
    }

    const parsed = tokenResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new RedditAuthError("Reddit did not return an access token");
    }

    const lifetimeMs = (parsed.data.expires_in ?? 3600) * 1000;
    this.token = {
      value: parsed.data.access_token,
      expiresAt: Date.now() + lifetimeMs - TOKEN_EXPIRY_MARGIN_MS,
    };
    return this.token.value;
  }

  /**
   * Fetch a submission and up to `limit` of its top-level comments.
   * "Load more" stubs are dropped, not expanded.
   */
  async fetchThread(submissionId: string, limit: number): Promise<RedditThread> {
    const accessToken = await this.authenticate();

    let body: unknown;
    try {
      const response = await this.http.get(`${API_BASE_URL}/comments/${submissionId}`, {
        params: { limit, depth: 1, raw_json: 1 },
        headers: {
          Authorization: `Bearer ${accessToken}`,
          "User-Agent": this.credentials.userAgent,
        },
      });
      body = response.data;
    } catch (error) {
      throw this.toApiError(error, submissionId);
    }

    const [submissionListing, commentListing] = parseResponse(
      commentsResponseSchema,
      body,
      submissionId
    );
    const submissionChild = submissionListing.data.children.find(
      (child) => child.kind === "t3"
    );
    if (!submissionChild) {
      throw new RedditNotFoundError(submissionId);
    }

    const comments: RedditComment[] = [];
    for (const child of commentListing.data.children) {
      if (child.kind !== "t1") continue;
      comments.push(toComment(parseResponse(commentDataSchema, child.data, submissionId)));
    }

    return {
      submission: toSubmission(
        parseResponse(submissionDataSchema, submissionChild.data, submissionId)
      ),
      comments: comments.slice(0, limit),
    };
  }

  private toApiError(error: unknown, submissionId: string): RedditApiError {
    const status = statusOf(error);
    if (status === 404) {
      return new RedditNotFoundError(submissionId, status, { cause: error });
    }
    if (status === 401 || status === 403) {
      return new RedditAuthError(
        `Reddit refused access to submission '${submissionId}' (HTTP ${status})`,
        status,
        { cause: error }
      );
    }
    const detail = error instanceof Error ? error.message : String(error);
    return new RedditRequestError(
      `Request for submission '${submissionId}' failed: ${detail}`,
      status,
      { cause: error }
    );
  }
}

export function initializeReddit(credentials: RedditCredentials): RedditClient {
  return new RedditClient(credentials);
}
