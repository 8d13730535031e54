import { z } from "zod";
import {
  MOODS,
  TOPIC_TYPES,
  TRADE_DIRECTIONS,
  type Classification,
} from "./types/classification";

const score = z.number().int().min(0).max(10);

export const classificationSchema: z.ZodType<Classification> = z.object({
  is_trade_plan: z.boolean(),
  is_meme: z.boolean(),
  is_commentary: z.boolean(),
  tickers: z.array(z.string().regex(/^[A-Z0-9]+$/)),
  primary_mood: z.enum(MOODS),
  topic_type: z.enum(TOPIC_TYPES),
  sentiment: z.object({
    trade_direction: z.enum(TRADE_DIRECTIONS),
    sentiment_confidence: score,
    is_sarcastic: z.boolean(),
  }),
  degen_score: score,
  meme_score: score,
});
