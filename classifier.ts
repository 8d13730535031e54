/**
 * Mock comment classifier.
 *
 * Produces records in the same schema as the production classifier using a
 * handful of keyword heuristics. The scores illustrate the format only.
 */

import {
  countKeywords,
  detectSarcasm,
  extractTickers,
} from "./preprocessing";
import { getDirectionFromCounts } from "./sentiment";
import type {
  Classification,
  Mood,
  TopicType,
  TradeDirection,
} from "./types/classification";

const BULLISH_WORDS = ["moon", "calls", "buy", "long", "rocket", "tendies", "print"];
const BEARISH_WORDS = ["puts", "short", "drill", "crash", "dump", "rug"];
const TRADE_INDICATORS = [
  "bought",
  "buying",
  "sold",
  "selling",
  "holding",
  "position",
  "calls",
  "puts",
];
const MEME_INDICATORS = ["lmao", "lol", "ape", "smooth brain", "wife's boyfriend", "wendy's"];
const DEGEN_INDICATORS = ["yolo", "0dte", "all in", "margin", "lotto", "leverage"];

const DESPAIR_PHRASES = ["down bad", "wiped", "lost everything", "it's over", "margin call"];
const COPE_PHRASES = ["bagholder", "bag holder", "it'll come back", "diamond hands", "zoom out"];
const SMUG_PHRASES = ["told you", "called it", "i warned"];

const INDEX_TICKERS = new Set(["SPY", "QQQ"]);

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

function pickMood(
  text: string,
  direction: TradeDirection,
  memeCount: number,
  tickers: string[]
): Mood {
  if (memeCount > 0 || direction === "bullish") return "euphoria";
  if (direction === "bearish") {
    return countKeywords(text, DESPAIR_PHRASES) > 0 ? "despair" : "fear";
  }
  if (direction === "mixed") return "confusion";
  if (countKeywords(text, COPE_PHRASES) > 0) return "cope";
  if (countKeywords(text, SMUG_PHRASES) > 0) return "smug";
  if (text.includes("?") && tickers.length === 0) return "confusion";
  return "neutral";
}

function pickTopicType(tickers: string[]): TopicType {
  if (tickers.some((ticker) => INDEX_TICKERS.has(ticker))) return "index_macro";
  if (tickers.length === 1) return "single_stock";
  if (tickers.length > 1) return "multi_stock";
  return "other";
}

export function mockClassifyComment(text: string): Classification {
  const tickers = extractTickers(text);

  const bullishCount = countKeywords(text, BULLISH_WORDS);
  const bearishCount = countKeywords(text, BEARISH_WORDS);
  const direction = getDirectionFromCounts(bullishCount, bearishCount, text);

  const isTrade = countKeywords(text, TRADE_INDICATORS) > 0;
  const memeCount = countKeywords(text, MEME_INDICATORS);
  const degenCount = countKeywords(text, DEGEN_INDICATORS);

  return {
    is_trade_plan: isTrade,
    is_meme: memeCount >= 2,
    is_commentary: !isTrade || tickers.length > 0,
    tickers,
    primary_mood: pickMood(text, direction, memeCount, tickers),
    topic_type: pickTopicType(tickers),
    sentiment: {
      trade_direction: direction,
      sentiment_confidence: clamp(bullishCount + bearishCount + 3, 1, 10),
      is_sarcastic: detectSarcasm(text) || memeCount >= 2,
    },
    degen_score: Math.min(10, 3 + memeCount + degenCount + (isTrade ? 2 : 0)),
    meme_score: Math.min(10, memeCount * 3),
  };
}
