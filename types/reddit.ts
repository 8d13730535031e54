export interface RedditComment {
  id: string;
  author: string;
  score: number;
  text: string;
  permalink: string;
  timestamp: string;
}

export interface RedditSubmission {
  id: string;
  title: string;
  subreddit: string;
  permalink: string;
  score: number;
  numComments: number;
}

export interface RedditThread {
  submission: RedditSubmission;
  // Top-level comments only, in API order
  comments: RedditComment[];
}

export interface RedditCredentials {
  clientId: string;
  clientSecret: string;
  userAgent: string;
}

export interface ThreadSource {
  fetchThread(submissionId: string, limit: number): Promise<RedditThread>;
}
