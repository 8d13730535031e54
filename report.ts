import { calculateDirectionBreakdown } from "./sentiment";
import type { Classification } from "./types/classification";
import type { RedditComment, RedditThread } from "./types/reddit";

export type LineWriter = (line: string) => void;

const REDDIT_URL = "https://reddit.com";
const RULE = "=".repeat(60);
const THIN_RULE = "-".repeat(60);
const MAX_TEXT_LENGTH = 300;

export function formatStageHeader(title: string, detail: string): string[] {
  return ["", RULE, title, detail, RULE];
}

export function formatThreadHeader(thread: RedditThread): string[] {
  const { submission, comments } = thread;
  return [
    "",
    `Thread: ${submission.title}`,
    `URL: ${REDDIT_URL}${submission.permalink}`,
    `Subreddit: r/${submission.subreddit}`,
    `Upvotes: ${submission.score}`,
    "",
    `Fetched ${comments.length} top-level comments`,
  ];
}

export function formatCommentBlock(
  index: number,
  comment: RedditComment,
  classification: Classification
): string[] {
  // Count code points so an emoji is never split in half
  const chars = [...comment.text];
  const truncated = chars.length > MAX_TEXT_LENGTH;
  const text = truncated
    ? `${chars.slice(0, MAX_TEXT_LENGTH).join("")}...`
    : comment.text;

  return [
    "",
    RULE,
    `Comment #${index}`,
    RULE,
    `Author: u/${comment.author}`,
    `Upvotes: ${comment.score}`,
    `Permalink: ${REDDIT_URL}${comment.permalink}`,
    "",
    truncated ? "Text (truncated):" : "Text:",
    `  "${text}"`,
    "",
    "Classification:",
    JSON.stringify(classification, null, 2),
  ];
}

export function formatSummary(classifications: Classification[]): string[] {
  const tickers = [...new Set(classifications.flatMap((c) => c.tickers))];
  const breakdown = calculateDirectionBreakdown(classifications);
  const averageDegen =
    classifications.length > 0
      ? (
          classifications.reduce((sum, c) => sum + c.degen_score, 0) /
          classifications.length
        ).toFixed(1) + "/10"
      : "n/a";

  return [
    ...formatStageHeader("SUMMARY", "Aggregates over the classified comments"),
    "",
    `Comments analyzed: ${classifications.length}`,
    `Unique tickers mentioned: ${tickers.length > 0 ? tickers.join(", ") : "None"}`,
    `Sentiment breakdown: ${breakdown.bullish} bullish, ${breakdown.bearish} bearish, ${breakdown.mixed} mixed, ${breakdown.neutral} neutral`,
    `Average degen score: ${averageDegen}`,
    "",
    THIN_RULE,
    "NOTE: This demo uses mock classification. In production,",
    "an LLM analyzes each comment for more accurate results.",
    THIN_RULE,
  ];
}

export function writeLines(write: LineWriter, lines: string[]): void {
  for (const line of lines) {
    write(line);
  }
}
