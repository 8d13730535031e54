import VADER from "vader-sentiment";
import type { Classification, TradeDirection } from "./types/classification";
import type { DirectionBreakdown, SentimentScores } from "./types/sentiment";

// Compound score needed before lexicon polarity alone counts as a direction
const DIRECTION_THRESHOLD = 0.5;

export function analyzeSentiment(text: string): SentimentScores {
  const result = VADER.SentimentIntensityAnalyzer.polarity_scores(text);
  return {
    compound: result.compound,
    pos: result.pos,
    neu: result.neu,
    neg: result.neg,
  };
}

export function getDirectionFromCompound(compound: number): TradeDirection {
  if (compound >= DIRECTION_THRESHOLD) return "bullish";
  if (compound <= -DIRECTION_THRESHOLD) return "bearish";
  return "neutral";
}

export function getDirectionFromCounts(
  bullishCount: number,
  bearishCount: number,
  text: string
): TradeDirection {
  if (bullishCount > bearishCount) return "bullish";
  if (bearishCount > bullishCount) return "bearish";
  if (bullishCount > 0) return "mixed";
  if (!text.trim()) return "neutral";
  return getDirectionFromCompound(analyzeSentiment(text).compound);
}

export function calculateDirectionBreakdown(
  classifications: Classification[]
): DirectionBreakdown {
  return classifications.reduce<DirectionBreakdown>(
    (acc, curr) => ({
      ...acc,
      [curr.sentiment.trade_direction]: acc[curr.sentiment.trade_direction] + 1,
    }),
    { bullish: 0, bearish: 0, mixed: 0, neutral: 0 }
  );
}
