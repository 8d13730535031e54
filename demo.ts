import { mockClassifyComment } from "./classifier";
import {
  formatCommentBlock,
  formatStageHeader,
  formatSummary,
  formatThreadHeader,
  writeLines,
  type LineWriter,
} from "./report";
import { classificationSchema } from "./schema";
import type { Classification } from "./types/classification";
import type { RedditComment, RedditThread, ThreadSource } from "./types/reddit";

export interface DemoOptions {
  submissionId: string;
  limit: number;
}

export interface ClassifiedComment {
  comment: RedditComment;
  classification: Classification;
}

export interface DemoReport {
  thread: RedditThread;
  results: ClassifiedComment[];
}

export async function runDemo(
  options: DemoOptions,
  source: ThreadSource,
  write: LineWriter
): Promise<DemoReport> {
  // Stage 1: ingestion (read-only)
  writeLines(
    write,
    formatStageHeader("STAGE 1: INGESTION", "Fetching comments from Reddit...")
  );
  const thread = await source.fetchThread(options.submissionId, options.limit);
  writeLines(write, formatThreadHeader(thread));

  // Stage 2: mocked classification
  writeLines(
    write,
    formatStageHeader(
      "STAGE 2: CLASSIFICATION (mocked)",
      "Analyzing sentiment, tickers, and mood..."
    )
  );
  const results = thread.comments.map((comment, i) => {
    const classification = classificationSchema.parse(
      mockClassifyComment(comment.text)
    );
    writeLines(write, formatCommentBlock(i + 1, comment, classification));
    return { comment, classification };
  });

  writeLines(
    write,
    formatSummary(results.map((result) => result.classification))
  );

  return { thread, results };
}
