export const TRADE_DIRECTIONS = ["bullish", "bearish", "neutral", "mixed"] as const;
export type TradeDirection = (typeof TRADE_DIRECTIONS)[number];

export const MOODS = [
  "euphoria",
  "fear",
  "despair",
  "cope",
  "smug",
  "confusion",
  "neutral",
] as const;
export type Mood = (typeof MOODS)[number];

export const TOPIC_TYPES = [
  "single_stock",
  "multi_stock",
  "index_macro",
  "other",
] as const;
export type TopicType = (typeof TOPIC_TYPES)[number];

export interface CommentSentiment {
  trade_direction: TradeDirection;
  sentiment_confidence: number;
  is_sarcastic: boolean;
}

export interface Classification {
  is_trade_plan: boolean;
  is_meme: boolean;
  is_commentary: boolean;
  tickers: string[];
  primary_mood: Mood;
  topic_type: TopicType;
  sentiment: CommentSentiment;
  degen_score: number;
  meme_score: number;
}
