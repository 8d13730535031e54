export interface SentimentScores {
  compound: number;
  pos: number;
  neu: number;
  neg: number;
}

export interface DirectionBreakdown {
  bullish: number;
  bearish: number;
  mixed: number;
  neutral: number;
}
