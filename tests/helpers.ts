import axios, {
  AxiosError,
  type AxiosAdapter,
  type AxiosInstance,
  type AxiosResponse,
  type InternalAxiosRequestConfig,
} from "axios";
import type { RedditThread, ThreadSource } from "../types/reddit";

export const NVDA_TEXT = "NVDA calls printing tomorrow, earnings gonna be insane...";

export const TEST_ENV = {
  REDDIT_CLIENT_ID: "test-id",
  REDDIT_CLIENT_SECRET: "test-secret",
};

export interface StubReply {
  status: number;
  data: unknown;
}

export type StubRoute = (config: InternalAxiosRequestConfig) => StubReply;

/**
 * axios instance whose adapter answers in process instead of over the network.
 * Replies with a status of 400 or more reject the way axios' own adapters do.
 */
export function createStubHttp(route: StubRoute): {
  http: AxiosInstance;
  requests: InternalAxiosRequestConfig[];
} {
  const requests: InternalAxiosRequestConfig[] = [];
  const adapter: AxiosAdapter = async (config) => {
    requests.push(config);
    const { status, data } = route(config);
    const response: AxiosResponse = {
      data,
      status,
      statusText: String(status),
      headers: {},
      config,
    };
    if (status >= 400) {
      throw new AxiosError(
        `Request failed with status code ${status}`,
        AxiosError.ERR_BAD_REQUEST,
        config,
        null,
        response
      );
    }
    return response;
  };

  return { http: axios.create({ adapter }), requests };
}

export function listing(children: Array<{ kind: string; data: unknown }>) {
  return { kind: "Listing", data: { children } };
}

export const submissionChild = {
  kind: "t3",
  data: {
    id: "1k0abc123",
    title: "Daily Discussion Thread",
    subreddit: "wallstreetbets",
    permalink: "/r/wallstreetbets/comments/1k0abc123/daily_discussion_thread/",
    score: 1200,
    num_comments: 3,
  },
};

export const commentChildren = [
  {
    kind: "t1",
    data: {
      id: "c1",
      author: "example_user",
      body: NVDA_TEXT,
      score: 42,
      permalink: "/r/wallstreetbets/comments/1k0abc123/_/c1/",
      created_utc: 1700000000,
    },
  },
  {
    kind: "t1",
    data: {
      id: "c2",
      author: null,
      body: "Loading puts on TSLA, this thing is going to crash",
      score: 7,
      permalink: "/r/wallstreetbets/comments/1k0abc123/_/c2/",
      created_utc: 1700000060,
    },
  },
  { kind: "more", data: { count: 12, children: ["c3", "c4"] } },
];

/** Routes the token endpoint and the comments endpoint with canned replies. */
export function redditRoute(comments: StubReply = {
  status: 200,
  data: [listing([submissionChild]), listing(commentChildren)],
}): StubRoute {
  return (config) => {
    if (config.method === "post") {
      return {
        status: 200,
        data: { access_token: "test-token", token_type: "bearer", expires_in: 3600 },
      };
    }
    return comments;
  };
}

export const sampleThread: RedditThread = {
  submission: {
    id: "1k0abc123",
    title: "Daily Discussion Thread",
    subreddit: "wallstreetbets",
    permalink: "/r/wallstreetbets/comments/1k0abc123/daily_discussion_thread/",
    score: 1200,
    numComments: 1,
  },
  comments: [
    {
      id: "c1",
      author: "example_user",
      score: 42,
      text: NVDA_TEXT,
      permalink: "/r/wallstreetbets/comments/1k0abc123/_/c1/",
      timestamp: "2023-11-14T22:13:20.000Z",
    },
  ],
};

export class FakeThreadSource implements ThreadSource {
  readonly calls: Array<{ submissionId: string; limit: number }> = [];
  private readonly result: RedditThread | Error;

  constructor(result: RedditThread | Error) {
    this.result = result;
  }

  async fetchThread(submissionId: string, limit: number): Promise<RedditThread> {
    this.calls.push({ submissionId, limit });
    if (this.result instanceof Error) {
      throw this.result;
    }
    return this.result;
  }
}
